/**
 * Shared configuration constants for the PTZ exposure control system
 */

import type { CostSpec, HysteresisPercentages } from "@ptz-exposure/types";

// ============================================================================
// Service Ports
// ============================================================================

export const PORTS = {
  CONTROLLER: 4100,
  VISCA: 52381,
} as const;

// ============================================================================
// API Endpoints
// ============================================================================

export const API_ENDPOINTS = {
  HEALTH: "/health",
  CAMERAS: "/api/cameras",
  CAMERA_STATS: "/api/cameras/:cameraId/stats",
  CAMERA_STATUS: "/api/cameras/:cameraId/status",
  CAMERA_HISTORY: "/api/cameras/:cameraId/history",
  CAMERA_FEATURES: "/api/cameras/:cameraId/features",
  CAMERA_RESET: "/api/cameras/:cameraId/reset",

  // WebSocket
  WS_SYNC: "/ws/sync",
} as const;

// ============================================================================
// Application Constants
// ============================================================================

export const APP_CONFIG = {
  APP_NAME: "PTZ Exposure Controller",
  APP_VERSION: "0.1.0",

  CYCLE_INTERVAL_MS: 1000,
  FEATURE_MAX_AGE_MS: 3000,
  HISTORY_SIZE: 200,
} as const;

// ============================================================================
// Sync Topics
// ============================================================================

export const TOPICS = {
  TARGET_PREFIX: "features.target.",
} as const;

export function targetTopic(feature: string): string {
  return `${TOPICS.TARGET_PREFIX}${feature}`;
}

export const SYNC_DEFAULTS = {
  STALE_AFTER_MS: 5000,
  PUBLISH_SOURCE: "target",
} as const;

// ============================================================================
// Protocol Defaults
// ============================================================================

const CGI_FIXED_SET_PARAMETERS: Record<string, string> = {
  ExposureMode: "manual",
  WhiteBalanceMode: "atw",
};

export const CGI_DEFAULTS = {
  TIMEOUT_MS: 2000,
  MAX_RETRIES: 50,
  RETRY_DELAY_MS: 500,
  POOL_SIZE: 6,
  BATCH_SIZE: 1,
  INQUIRY_PATH: "/command/inquiry.cgi?inqjs=imaging",
  SET_PATH: "/command/imaging.cgi",
  FIXED_SET_PARAMETERS: CGI_FIXED_SET_PARAMETERS,
} as const;

export const VISCA_DEFAULTS = {
  PORT: PORTS.VISCA,
  TIMEOUT_MS: 100,
  MAX_RETRIES: 2,
  RETRY_DELAY_MS: 10,
  BATCH_SIZE: 5,
  /** One video frame at 50p */
  COMMAND_SPACING_MS: 20,
  MIN_CONCURRENT_SPACING_MS: 10,
  MIN_SEQUENTIAL_SPACING_MS: 20,
} as const;

export const RECONNECT_DEFAULTS = {
  MAX_CONSECUTIVE_FAILURES: 5,
  POLL_INTERVAL_MS: 3000,
  BACKOFF_DELAYS_MS: [0, 1000, 2000, 4000, 8000],
} as const;

// ============================================================================
// Concurrency Defaults
// ============================================================================

export const CONCURRENCY_DEFAULTS = {
  ENABLED: true,
  MAX_CONCURRENT_OPERATIONS: 5,
  FALLBACK_TO_SEQUENTIAL: true,
  CONCURRENT_MS: 10,
  SEQUENTIAL_MS: 20,
  RETRY_DELAY_MS: 50,
  RATE_LIMIT_SET: true,
  RATE_LIMIT_GET: true,
  MAX_REQUESTS_PER_SECOND: 20,
  RECOVERY_SUCCESS_THRESHOLD: 10,
  RECOVERY_STEP: 1,
  RECOVERY_COOLDOWN_MS: 0,
} as const;

/**
 * Accepted ranges for the externally loaded configuration
 */
export const CONFIG_LIMITS = {
  MAX_CONCURRENT_OPERATIONS: { min: 1, max: 10 },
  MAX_REQUESTS_PER_SECOND: { min: 5, max: 50 },
  PACING_MS: { min: 5, max: 100 },
} as const;

// ============================================================================
// Cost Model Defaults
// ============================================================================

export const DEFAULT_COST_WEIGHTS: Record<string, CostSpec> = {
  // Preferred for brightness corrections
  ExposureIris: {
    baseCost: 0.5,
    maxCost: 2.0,
    minCost: 0.2,
    preferredDirection: "increase",
  },
  // Slower shutter adds motion blur
  ExposureExposureTime: {
    baseCost: 1.5,
    maxCost: 5.0,
    minCost: 0.5,
    preferredDirection: "decrease",
  },
  // Gain adds noise
  ExposureGain: {
    baseCost: 3.0,
    maxCost: 10.0,
    minCost: 1.0,
    preferredDirection: "decrease",
  },
  DigitalBrightLevel: {
    baseCost: 2.0,
    maxCost: 6.0,
    minCost: 0.5,
    preferredDirection: "either",
  },
  ColorSaturation: {
    baseCost: 0.8,
    maxCost: 3.0,
    minCost: 0.3,
    preferredDirection: "either",
  },
};

export const COST_MODEL_DEFAULTS = {
  DEVIATION_WEIGHT: 1.0,
  AGAINST_PREFERENCE_PENALTY: 1.5,
  /** Fraction of the parameter range treated as "near the bound" */
  BOUND_MARGIN_PCT: 0.1,
  TIE_BREAK: "config_order",
} as const;

export const DEFAULT_HYSTERESIS: HysteresisPercentages = {
  deadBandPct: 0.05,
  innerPct: 0.02,
  outerPct: 0.08,
};

/**
 * Feature → candidate parameters, in tie-break order
 */
export const DEFAULT_ADJUSTMENT_RULES: Record<string, string[]> = {
  brightness: [
    "ExposureIris",
    "ExposureExposureTime",
    "ExposureGain",
    "DigitalBrightLevel",
  ],
  saturation: ["ColorSaturation"],
};

// ============================================================================
// Environment Variable Keys
// ============================================================================

export const ENV_KEYS = {
  NODE_ENV: "NODE_ENV",
  CONTROL_PORT: "CONTROL_PORT",
  CONTROL_HOST: "CONTROL_HOST",
  CONTROL_CONFIG_PATH: "CONTROL_CONFIG_PATH",
  CAMERA_USERNAME: "CAMERA_USERNAME",
  CAMERA_PASSWORD: "CAMERA_PASSWORD",
  SYNC_URL: "SYNC_URL",
  LOG_SILENT: "LOG_SILENT",
  MOCK_FAILURE_MODE: "MOCK_FAILURE_MODE",
} as const;

// ============================================================================
// HTTP Status Codes
// ============================================================================

export const HTTP_STATUS = {
  OK: 200,
  ACCEPTED: 202,
  NO_CONTENT: 204,
  BAD_REQUEST: 400,
  UNAUTHORIZED: 401,
  NOT_FOUND: 404,
  REQUEST_TIMEOUT: 408,
  CONFLICT: 409,
  TOO_MANY_REQUESTS: 429,
  INTERNAL_SERVER_ERROR: 500,
  SERVICE_UNAVAILABLE: 503,
} as const;

// ============================================================================
// Error Messages
// ============================================================================

export const ERROR_MESSAGES = {
  INTERNAL_ERROR: "An internal error occurred",
  NOT_FOUND: "Resource not found",
  VALIDATION_ERROR: "Validation failed",

  CAMERA_NOT_FOUND: "Camera not found",
  CAMERA_UNHEALTHY: "Camera marked unhealthy",
  INVALID_FEATURE_SAMPLE: "Feature sample must map feature names to values in [0, 1]",
} as const;
