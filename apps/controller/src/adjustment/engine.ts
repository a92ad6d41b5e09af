/**
 * Adjustment Engine
 *
 * One instance per camera. Each control cycle:
 *
 * 1. run every feature's HysteresisGate against the latest sample, centered on
 *    a fresh synced target when one exists
 * 2. GET the parameters mapped to every feature that needs adjusting
 * 3. pick at most one candidate per feature with the cost model (a parameter
 *    is claimed by the first feature that picks it)
 * 4. SET the chosen values through the concurrency controller; every result
 *    is applied on its own
 *
 * The engine never throws out of a cycle. A parameter's value is trusted only
 * after a successful GET or acknowledged SET; failures mark it stale and
 * rejections exclude it until the next successful GET.
 */

import type {
  AdjustmentCandidate,
  AdjustmentRecord,
  CameraParameter,
  CommandResult,
  CycleReport,
  FeatureBand,
  FeatureReport,
  FeatureSample,
  GateDecision,
  ParameterRange,
  TargetFeature,
} from "@ptz-exposure/types";
import { errorMessage } from "@ptz-exposure/utils";
import { controlLogger } from "../camera/logger";
import type { OperationOptions } from "../concurrency/controller";
import type { ParameterCostModel } from "./cost-model";
import { bandCenter, HysteresisGate } from "./hysteresis";

// ============================================================================
// Collaborators
// ============================================================================

/**
 * The part of the concurrency controller the engine drives
 */
export interface CommandPort {
  get(names: string[], options?: OperationOptions): Promise<CommandResult[]>;
  set(values: Record<string, number>, options?: OperationOptions): Promise<CommandResult[]>;
}

/**
 * Read side of the synced target cache
 */
export interface TargetSource {
  freshTarget(feature: string): TargetFeature | null;
}

export interface FeatureRule {
  band: FeatureBand;
  /** Candidate parameters in tie-break order */
  parameters: string[];
}

export interface EngineSettings {
  cameraId: string;
  features: Record<string, FeatureRule>;
  ranges: Record<string, ParameterRange>;
  historySize: number;
  featureMaxAgeMs: number;
}

export interface EngineDependencies {
  commands: CommandPort;
  costModel: ParameterCostModel;
  targets?: TargetSource;
  now?: () => number;
}

interface PendingFeature {
  report: FeatureReport;
  decision: GateDecision;
  rule: FeatureRule;
}

// ============================================================================
// Engine
// ============================================================================

export class AdjustmentEngine {
  private readonly parameters = new Map<string, CameraParameter>();
  private readonly gates = new Map<string, HysteresisGate>();
  private readonly commands: CommandPort;
  private readonly costModel: ParameterCostModel;
  private readonly targets?: TargetSource;
  private readonly now: () => number;

  private history: AdjustmentRecord[] = [];
  private cycles = 0;
  /** Capture time (epoch ms) of the last sample a cycle acted on */
  private lastSampleAt: number | null = null;

  constructor(
    private readonly settings: EngineSettings,
    dependencies: EngineDependencies,
  ) {
    this.commands = dependencies.commands;
    this.costModel = dependencies.costModel;
    this.targets = dependencies.targets;
    this.now = dependencies.now ?? Date.now;

    for (const [feature, rule] of Object.entries(settings.features)) {
      this.gates.set(feature, new HysteresisGate(feature, rule.band));
      for (const name of rule.parameters) {
        const range = settings.ranges[name];
        if (range && !this.parameters.has(name)) {
          this.parameters.set(name, {
            name,
            ...range,
            currentValue: null,
            stale: true,
            rejected: false,
            updatedAt: null,
          });
        }
      }
    }
  }

  get cycleCount(): number {
    return this.cycles;
  }

  getParameters(): CameraParameter[] {
    return Array.from(this.parameters.values(), (p) => ({ ...p }));
  }

  getHistory(): AdjustmentRecord[] {
    return [...this.history];
  }

  clearHistory(): void {
    this.history = [];
  }

  /**
   * Fold transport results into the parameter table
   */
  applyResults(results: CommandResult[]): void {
    const timestamp = new Date(this.now()).toISOString();

    for (const result of results) {
      const parameter = this.parameters.get(result.parameterName);
      if (!parameter) continue;

      switch (result.outcome) {
        case "ok":
          if (result.achievedValue !== null) {
            parameter.currentValue = result.achievedValue;
            parameter.stale = false;
            parameter.updatedAt = timestamp;
            if (result.kind === "get") parameter.rejected = false;
          }
          break;
        case "rejected":
          parameter.rejected = true;
          break;
        case "timeout":
        case "error":
          parameter.stale = true;
          break;
        case "cancelled":
          break;
      }
    }
  }

  /**
   * Run one control cycle; never throws
   */
  async runCycle(sample: FeatureSample | null, options: OperationOptions = {}): Promise<CycleReport> {
    const started = this.now();
    const cycle = ++this.cycles;
    const isNew = sample !== null && this.isNewer(sample);
    const fresh = sample && isNew && this.isFresh(sample) ? sample : null;
    if (fresh) this.lastSampleAt = Date.parse(fresh.capturedAt);

    const reports: FeatureReport[] = [];
    const pending: PendingFeature[] = [];

    for (const [feature, rule] of Object.entries(this.settings.features)) {
      const gate = this.gate(feature, rule);
      const target = this.targets?.freshTarget(feature) ?? null;
      const center = target ? target.value : bandCenter(rule.band);
      const measured = fresh?.features[feature];

      if (measured === undefined || !Number.isFinite(measured)) {
        reports.push({
          feature,
          state: gate.getState(),
          measured: null,
          center,
          deviation: null,
          targetSource: target ? "sync" : "static",
          action: "skipped",
          detail: skipReason(sample, fresh, isNew),
        });
        continue;
      }

      const decision = gate.evaluate(measured, center);
      const report: FeatureReport = {
        feature,
        state: decision.state,
        measured,
        center,
        deviation: decision.deviation,
        targetSource: target ? "sync" : "static",
        action: "none",
      };
      reports.push(report);

      if (decision.previousState !== decision.state) {
        controlLogger.debug("AdjustmentEngine: Gate transition", {
          cameraId: this.settings.cameraId,
          feature,
          from: decision.previousState,
          to: decision.state,
          deviation: decision.deviation,
        });
      }

      if (decision.shouldAdjust) {
        pending.push({ report, decision, rule });
      }
    }

    if (pending.length > 0) {
      try {
        await this.adjust(pending, options);
      } catch (error) {
        controlLogger.error("AdjustmentEngine: Cycle failed", {
          cameraId: this.settings.cameraId,
          cycle,
          error: errorMessage(error),
        });
        for (const { report } of pending) {
          if (report.action === "none") {
            report.action = "failed";
            report.detail = errorMessage(error);
          }
        }
      }
    }

    return {
      cameraId: this.settings.cameraId,
      cycle,
      startedAt: new Date(started).toISOString(),
      durationMs: this.now() - started,
      features: reports,
    };
  }

  // ============================================================================
  // Internals
  // ============================================================================

  private async adjust(pending: PendingFeature[], options: OperationOptions): Promise<void> {
    const names = new Set<string>();
    for (const { rule } of pending) {
      for (const name of rule.parameters) {
        if (this.parameters.has(name)) names.add(name);
      }
    }

    this.applyResults(await this.commands.get(Array.from(names), options));

    const claimed = new Set<string>();
    const chosen = new Map<string, { pending: PendingFeature; candidate: AdjustmentCandidate }>();

    for (const entry of pending) {
      const candidates = entry.rule.parameters.flatMap((name) => {
        const parameter = this.parameters.get(name);
        return parameter ? [parameter] : [];
      });
      const selection = this.costModel.select(candidates, entry.decision.deviation, claimed);

      if (selection.kind === "no_suitable_parameter") {
        entry.report.action = "no_suitable_parameter";
        controlLogger.warn("AdjustmentEngine: No suitable parameter, will retry next cycle", {
          cameraId: this.settings.cameraId,
          feature: entry.report.feature,
          deviation: entry.decision.deviation,
          evaluations: selection.evaluations.map((e) =>
            e.feasible ? `${e.parameter}:${e.candidate.cost}` : `${e.parameter}:${e.reason}`,
          ),
        });
        continue;
      }

      claimed.add(selection.candidate.parameter);
      chosen.set(selection.candidate.parameter, { pending: entry, candidate: selection.candidate });
      entry.report.candidate = selection.candidate;
    }

    if (chosen.size === 0) return;

    const values: Record<string, number> = {};
    for (const [name, { candidate }] of chosen) values[name] = candidate.to;

    const results = await this.commands.set(values, options);
    this.applyResults(results);

    for (const result of results) {
      const match = chosen.get(result.parameterName);
      if (!match) continue;
      this.settle(match.pending, match.candidate, result);
    }
  }

  private settle(entry: PendingFeature, candidate: AdjustmentCandidate, result: CommandResult): void {
    const report = entry.report;
    report.outcome = result.outcome;

    switch (result.outcome) {
      case "ok":
        report.action = "adjusted";
        break;
      case "rejected":
        report.action = "rejected";
        report.detail = result.detail;
        controlLogger.warn("AdjustmentEngine: Camera rejected adjustment, will retry next cycle", {
          cameraId: this.settings.cameraId,
          feature: report.feature,
          parameter: candidate.parameter,
          value: candidate.to,
          detail: result.detail,
        });
        break;
      case "cancelled":
        report.action = "skipped";
        report.detail = "cancelled";
        break;
      default:
        report.action = "failed";
        report.detail = result.detail;
        break;
    }

    if (result.outcome !== "cancelled") {
      this.record({
        feature: report.feature,
        measured: entry.decision.measured,
        parameter: candidate.parameter,
        from: candidate.from,
        to: candidate.to,
        cost: candidate.cost,
        outcome: result.outcome,
        timestamp: new Date(this.now()).toISOString(),
      });
    }
  }

  private record(entry: AdjustmentRecord): void {
    this.history.push(entry);
    if (this.history.length > this.settings.historySize) {
      this.history.splice(0, this.history.length - this.settings.historySize);
    }
  }

  private gate(feature: string, rule: FeatureRule): HysteresisGate {
    let gate = this.gates.get(feature);
    if (!gate) {
      gate = new HysteresisGate(feature, rule.band);
      this.gates.set(feature, gate);
    }
    return gate;
  }

  /**
   * A sample drives at most one cycle; anything captured at or before the
   * last one acted on is ignored
   */
  private isNewer(sample: FeatureSample): boolean {
    const captured = Date.parse(sample.capturedAt);
    if (Number.isNaN(captured) || this.lastSampleAt === null) return true;
    return captured > this.lastSampleAt;
  }

  private isFresh(sample: FeatureSample): boolean {
    const captured = Date.parse(sample.capturedAt);
    if (Number.isNaN(captured)) return false;
    return this.now() - captured <= this.settings.featureMaxAgeMs;
  }
}

function skipReason(sample: FeatureSample | null, fresh: FeatureSample | null, isNew: boolean): string {
  if (!sample || fresh) return "no measurement";
  return isNew ? "sample too old" : "no new measurement";
}
