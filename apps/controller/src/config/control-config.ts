/**
 * Control Configuration
 *
 * Loads and validates the control JSON document (cameras, protocol knobs,
 * concurrency, cost weights, hysteresis, feature bands, parameter ranges).
 * Every violation is collected and reported in one ConfigurationError; an
 * invalid configuration never reaches the control loop.
 */

import fs from "fs";
import { z } from "zod";
import {
  APP_CONFIG,
  CGI_DEFAULTS,
  CONCURRENCY_DEFAULTS,
  CONFIG_LIMITS,
  COST_MODEL_DEFAULTS,
  DEFAULT_ADJUSTMENT_RULES,
  DEFAULT_COST_WEIGHTS,
  DEFAULT_HYSTERESIS,
  RECONNECT_DEFAULTS,
  SYNC_DEFAULTS,
  VISCA_DEFAULTS,
} from "@ptz-exposure/config";
import type { FeatureBand, HysteresisPercentages } from "@ptz-exposure/types";
import { ConfigurationError } from "../camera/errors";
import type { FeatureRule } from "../adjustment/engine";
import { registeredTransports } from "../camera/transports/factory";
import type { TransportOptions } from "../camera/transports/factory";
import type { MockFailureMode } from "../camera/transports/mock";
import type { CameraEndpoint } from "../camera/types";

// ============================================================================
// Schema
// ============================================================================

const pct = z.number().min(0).max(1);
const pacingMs = z.number().int().min(CONFIG_LIMITS.PACING_MS.min).max(CONFIG_LIMITS.PACING_MS.max);
const positiveInt = z.number().int().positive();
const nonNegativeInt = z.number().int().nonnegative();

const CameraSchema = z.object({
  id: z.string().min(1),
  protocol: z.string().min(1),
  host: z.string().min(1),
  port: z.number().int().min(1).max(65535).optional(),
  username: z.string().optional(),
  password: z.string().optional(),
  failureMode: z.enum(["none", "flaky", "timeout", "reject", "disconnect"]).optional(),
});

const CgiSchema = z.object({
  timeoutMs: positiveInt.default(CGI_DEFAULTS.TIMEOUT_MS),
  maxRetries: nonNegativeInt.default(CGI_DEFAULTS.MAX_RETRIES),
  retryDelayMs: nonNegativeInt.default(CGI_DEFAULTS.RETRY_DELAY_MS),
  poolSize: positiveInt.default(CGI_DEFAULTS.POOL_SIZE),
  batchSize: positiveInt.default(CGI_DEFAULTS.BATCH_SIZE),
  fixedSetParameters: z.record(z.string()).default(CGI_DEFAULTS.FIXED_SET_PARAMETERS),
});

const ViscaSchema = z.object({
  timeoutMs: positiveInt.default(VISCA_DEFAULTS.TIMEOUT_MS),
  maxRetries: nonNegativeInt.default(VISCA_DEFAULTS.MAX_RETRIES),
  retryDelayMs: nonNegativeInt.default(VISCA_DEFAULTS.RETRY_DELAY_MS),
  batchSize: positiveInt.default(VISCA_DEFAULTS.BATCH_SIZE),
  commandSpacingMs: nonNegativeInt.default(VISCA_DEFAULTS.COMMAND_SPACING_MS),
});

const ConcurrencySchema = z.object({
  enabled: z.boolean().default(CONCURRENCY_DEFAULTS.ENABLED),
  maxConcurrentOperations: z
    .number()
    .int()
    .min(CONFIG_LIMITS.MAX_CONCURRENT_OPERATIONS.min)
    .max(CONFIG_LIMITS.MAX_CONCURRENT_OPERATIONS.max)
    .default(CONCURRENCY_DEFAULTS.MAX_CONCURRENT_OPERATIONS),
  fallbackToSequential: z.boolean().default(CONCURRENCY_DEFAULTS.FALLBACK_TO_SEQUENTIAL),
  pacing: z
    .object({
      concurrentMs: pacingMs.default(CONCURRENCY_DEFAULTS.CONCURRENT_MS),
      sequentialMs: pacingMs.default(CONCURRENCY_DEFAULTS.SEQUENTIAL_MS),
      retryDelayMs: pacingMs.default(CONCURRENCY_DEFAULTS.RETRY_DELAY_MS),
    })
    .default({}),
  rateLimiting: z
    .object({
      setOperations: z.boolean().default(CONCURRENCY_DEFAULTS.RATE_LIMIT_SET),
      getOperations: z.boolean().default(CONCURRENCY_DEFAULTS.RATE_LIMIT_GET),
      maxRequestsPerSecond: z
        .number()
        .int()
        .min(CONFIG_LIMITS.MAX_REQUESTS_PER_SECOND.min)
        .max(CONFIG_LIMITS.MAX_REQUESTS_PER_SECOND.max)
        .default(CONCURRENCY_DEFAULTS.MAX_REQUESTS_PER_SECOND),
    })
    .default({}),
  recovery: z
    .object({
      successThreshold: positiveInt.default(CONCURRENCY_DEFAULTS.RECOVERY_SUCCESS_THRESHOLD),
      step: positiveInt.default(CONCURRENCY_DEFAULTS.RECOVERY_STEP),
      cooldownMs: nonNegativeInt.default(CONCURRENCY_DEFAULTS.RECOVERY_COOLDOWN_MS),
    })
    .default({}),
});

const CostSpecSchema = z.object({
  baseCost: z.number().nonnegative(),
  maxCost: z.number().nonnegative(),
  minCost: z.number().nonnegative(),
  preferredDirection: z.enum(["increase", "decrease", "either"]),
  weight: z.number().nonnegative().optional(),
});

const CostModelSchema = z.object({
  deviationWeight: z.number().nonnegative().default(COST_MODEL_DEFAULTS.DEVIATION_WEIGHT),
  againstPreferencePenalty: z
    .number()
    .min(1)
    .default(COST_MODEL_DEFAULTS.AGAINST_PREFERENCE_PENALTY),
  boundMarginPct: pct.default(COST_MODEL_DEFAULTS.BOUND_MARGIN_PCT),
  tieBreak: z.enum(["config_order", "most_headroom"]).default(COST_MODEL_DEFAULTS.TIE_BREAK),
});

const HysteresisSchema = z.object({
  deadBandPct: pct,
  innerPct: pct,
  outerPct: pct,
});

const FeatureSchema = z.object({
  acceptableLow: pct,
  acceptableHigh: pct,
  parameters: z.array(z.string().min(1)).min(1),
});

const RangeSchema = z.object({
  min: z.number(),
  max: z.number(),
  step: z.number().positive(),
});

const DEFAULT_FEATURES = {
  brightness: { acceptableLow: 0.25, acceptableHigh: 0.5, parameters: DEFAULT_ADJUSTMENT_RULES.brightness },
  saturation: { acceptableLow: 0.3, acceptableHigh: 0.6, parameters: DEFAULT_ADJUSTMENT_RULES.saturation },
};

export const ControlConfigSchema = z.object({
  masterCameraId: z.string().min(1).optional(),
  cameras: z.array(CameraSchema).min(1),
  protocol: z
    .object({
      cgi: CgiSchema.default({}),
      visca: ViscaSchema.default({}),
    })
    .default({}),
  concurrency: ConcurrencySchema.default({}),
  costWeights: z.record(CostSpecSchema).default(DEFAULT_COST_WEIGHTS),
  costModel: CostModelSchema.default({}),
  hysteresis: z
    .object({
      default: HysteresisSchema.default(DEFAULT_HYSTERESIS),
      features: z.record(HysteresisSchema.partial()).default({}),
    })
    .default({}),
  features: z.record(FeatureSchema).default(DEFAULT_FEATURES),
  parameters: z.record(RangeSchema),
  initialParameters: z.record(z.number()).default({}),
  control: z
    .object({
      cycleIntervalMs: positiveInt.default(APP_CONFIG.CYCLE_INTERVAL_MS),
      featureMaxAgeMs: positiveInt.default(APP_CONFIG.FEATURE_MAX_AGE_MS),
      historySize: positiveInt.default(APP_CONFIG.HISTORY_SIZE),
    })
    .default({}),
  reconnect: z
    .object({
      maxConsecutiveFailures: positiveInt.default(RECONNECT_DEFAULTS.MAX_CONSECUTIVE_FAILURES),
      pollIntervalMs: positiveInt.default(RECONNECT_DEFAULTS.POLL_INTERVAL_MS),
    })
    .default({}),
  sync: z
    .object({
      staleAfterMs: positiveInt.default(SYNC_DEFAULTS.STALE_AFTER_MS),
      publishSource: z.enum(["measured", "target"]).default(SYNC_DEFAULTS.PUBLISH_SOURCE),
      /** Host the /ws/sync relay on this service */
      relay: z.boolean().default(false),
      /** Connect to a relay instead of syncing in-process */
      url: z.string().url().optional(),
    })
    .default({}),
});

export type ControlConfig = z.infer<typeof ControlConfigSchema>;
export type CameraConfig = ControlConfig["cameras"][number];

// ============================================================================
// Cross-field checks
// ============================================================================

function crossFieldIssues(config: ControlConfig): string[] {
  const issues: string[] = [];

  const ids = new Set<string>();
  for (const camera of config.cameras) {
    if (ids.has(camera.id)) issues.push(`cameras: duplicate camera id "${camera.id}"`);
    ids.add(camera.id);
    if (!registeredTransports().includes(camera.protocol)) {
      issues.push(
        `cameras.${camera.id}: unknown protocol "${camera.protocol}" (registered: ${registeredTransports().join(", ")})`,
      );
    }
  }

  if (config.masterCameraId && !ids.has(config.masterCameraId)) {
    issues.push(`masterCameraId: "${config.masterCameraId}" is not a configured camera`);
  }

  if (config.cameras.some((c) => c.protocol === "visca")) {
    const { concurrentMs, sequentialMs } = config.concurrency.pacing;
    if (concurrentMs < VISCA_DEFAULTS.MIN_CONCURRENT_SPACING_MS) {
      issues.push(
        `concurrency.pacing.concurrentMs: VISCA needs at least ${VISCA_DEFAULTS.MIN_CONCURRENT_SPACING_MS}ms`,
      );
    }
    if (sequentialMs < VISCA_DEFAULTS.MIN_SEQUENTIAL_SPACING_MS) {
      issues.push(
        `concurrency.pacing.sequentialMs: VISCA needs at least ${VISCA_DEFAULTS.MIN_SEQUENTIAL_SPACING_MS}ms`,
      );
    }
  }

  for (const [name, spec] of Object.entries(config.costWeights)) {
    if (!(spec.minCost <= spec.baseCost && spec.baseCost <= spec.maxCost)) {
      issues.push(`costWeights.${name}: expected minCost ≤ baseCost ≤ maxCost`);
    }
  }

  for (const [name, range] of Object.entries(config.parameters)) {
    if (range.min >= range.max) issues.push(`parameters.${name}: min must be below max`);
  }

  for (const [feature, rule] of Object.entries(config.features)) {
    if (rule.acceptableLow >= rule.acceptableHigh) {
      issues.push(`features.${feature}: acceptableLow must be below acceptableHigh`);
    }
    const band = hysteresisFor(config, feature);
    if (band.innerPct >= band.outerPct) {
      issues.push(`hysteresis.${feature}: innerPct must be below outerPct`);
    }
    for (const parameter of rule.parameters) {
      if (!config.costWeights[parameter]) {
        issues.push(`features.${feature}: parameter "${parameter}" has no cost weights`);
      }
      if (!config.parameters[parameter]) {
        issues.push(`features.${feature}: parameter "${parameter}" has no range`);
      }
    }
  }

  for (const [name, value] of Object.entries(config.initialParameters)) {
    const range = config.parameters[name];
    if (!range) {
      issues.push(`initialParameters.${name}: no range configured`);
    } else if (value < range.min || value > range.max) {
      issues.push(`initialParameters.${name}: ${value} outside ${range.min}..${range.max}`);
    }
  }

  return issues;
}

// ============================================================================
// Loading
// ============================================================================

/**
 * Validate a raw configuration object
 * @throws ConfigurationError listing every problem found
 */
export function parseControlConfig(raw: unknown): ControlConfig {
  const parsed = ControlConfigSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigurationError(
      parsed.error.issues.map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`),
    );
  }

  const issues = crossFieldIssues(parsed.data);
  if (issues.length > 0) {
    throw new ConfigurationError(issues);
  }
  return parsed.data;
}

/**
 * Read and validate the configuration file
 * @throws ConfigurationError when the file is missing, not JSON, or invalid
 */
export function loadControlConfig(filePath: string): ControlConfig {
  let text: string;
  try {
    text = fs.readFileSync(filePath, "utf-8");
  } catch (error) {
    throw new ConfigurationError([`cannot read ${filePath}: ${String(error)}`], {
      operation: "load_config",
    });
  }

  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (error) {
    throw new ConfigurationError([`${filePath} is not valid JSON: ${String(error)}`], {
      operation: "load_config",
    });
  }

  return parseControlConfig(raw);
}

// ============================================================================
// Derived settings
// ============================================================================

export function hysteresisFor(config: ControlConfig, feature: string): HysteresisPercentages {
  return { ...config.hysteresis.default, ...config.hysteresis.features[feature] };
}

export function featureRules(config: ControlConfig): Record<string, FeatureRule> {
  const rules: Record<string, FeatureRule> = {};
  for (const [feature, rule] of Object.entries(config.features)) {
    const band: FeatureBand = {
      acceptableLow: rule.acceptableLow,
      acceptableHigh: rule.acceptableHigh,
      ...hysteresisFor(config, feature),
    };
    rules[feature] = { band, parameters: [...rule.parameters] };
  }
  return rules;
}

export function cameraEndpoint(
  camera: CameraConfig,
  defaults: { username: string; password: string },
): CameraEndpoint {
  return {
    cameraId: camera.id,
    host: camera.host,
    port: camera.port,
    username: camera.username ?? defaults.username,
    password: camera.password ?? defaults.password,
  };
}

export function transportOptions(
  config: ControlConfig,
  camera: CameraConfig,
  defaultFailureMode: MockFailureMode = "none",
): TransportOptions {
  return {
    cgi: { ...config.protocol.cgi },
    visca: { ...config.protocol.visca },
    mock: {
      failureMode: camera.failureMode ?? defaultFailureMode,
      parameters: Object.fromEntries(
        Object.entries(config.parameters).map(([name, range]) => [
          name,
          { ...range, value: config.initialParameters[name] ?? Math.round((range.min + range.max) / 2) },
        ]),
      ),
    },
  };
}
