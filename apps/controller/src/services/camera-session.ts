/**
 * Camera Session
 *
 * Everything one camera needs to run its control loop: transport, watchdog,
 * concurrency controller, adjustment engine and its side of the sync channel.
 * The master publishes its targets after every cycle; slaves subscribe and
 * steer toward them while they are fresh.
 */

import type {
  AdjustmentRecord,
  CameraParameter,
  CameraSummary,
  ConcurrencyStats,
  CycleReport,
  TargetFeature,
  WatchdogStatus,
} from "@ptz-exposure/types";
import { errorMessage } from "@ptz-exposure/utils";
import { AdjustmentEngine } from "../adjustment/engine";
import { ParameterCostModel } from "../adjustment/cost-model";
import { cameraLogger } from "../camera/logger";
import type { CameraTransport } from "../camera/types";
import { ConnectionWatchdog } from "../camera/watchdog";
import { ConcurrencyController } from "../concurrency/controller";
import { featureRules } from "../config/control-config";
import type { ControlConfig } from "../config/control-config";
import type { SyncBus } from "../sync/bus";
import { SyncPublisher } from "../sync/publisher";
import { SyncSubscriber } from "../sync/subscriber";
import { TargetFeatureCache } from "../sync/target-cache";
import type { FeatureStore } from "./feature-store";

export type CameraRole = "master" | "slave";

export interface CameraSessionOptions {
  cameraId: string;
  role: CameraRole;
  transport: CameraTransport;
  config: ControlConfig;
  bus: SyncBus;
  features: FeatureStore;
  now?: () => number;
  sleep?: (ms: number) => Promise<void>;
}

export interface CameraStatus {
  summary: CameraSummary;
  parameters: CameraParameter[];
  targets: TargetFeature[];
  lastReport: CycleReport | null;
}

export class CameraSession {
  readonly cameraId: string;
  readonly role: CameraRole;

  private readonly transport: CameraTransport;
  private readonly watchdog: ConnectionWatchdog;
  private readonly controller: ConcurrencyController;
  private readonly engine: AdjustmentEngine;
  private readonly targets: TargetFeatureCache;
  private readonly publisher: SyncPublisher | null;
  private readonly subscriber: SyncSubscriber | null;
  private readonly features: FeatureStore;
  private readonly initialParameters: Record<string, number>;
  private readonly cycleIntervalMs: number;
  private readonly now: () => number;

  private cycleTimer: ReturnType<typeof setInterval> | null = null;
  private currentCycle: Promise<CycleReport | null> | null = null;
  private running = false;
  private initialApplied = false;
  private lastReport: CycleReport | null = null;

  constructor(options: CameraSessionOptions) {
    const { config } = options;

    this.cameraId = options.cameraId;
    this.role = options.role;
    this.transport = options.transport;
    this.features = options.features;
    this.initialParameters = { ...config.initialParameters };
    this.cycleIntervalMs = config.control.cycleIntervalMs;
    this.now = options.now ?? Date.now;

    this.watchdog = new ConnectionWatchdog(this.transport, {
      pollIntervalMs: config.reconnect.pollIntervalMs,
      maxConsecutiveFailures: config.reconnect.maxConsecutiveFailures,
      onReconnect: () => this.applyInitialParameters(),
    });

    this.controller = new ConcurrencyController(this.transport, config.concurrency, {
      reconnect: () => this.watchdog.reconnectNow(),
      now: this.now,
      sleep: options.sleep,
    });

    this.targets = new TargetFeatureCache({ staleAfterMs: config.sync.staleAfterMs, now: this.now });

    this.engine = new AdjustmentEngine(
      {
        cameraId: this.cameraId,
        features: featureRules(config),
        ranges: config.parameters,
        historySize: config.control.historySize,
        featureMaxAgeMs: config.control.featureMaxAgeMs,
      },
      {
        commands: this.controller,
        costModel: new ParameterCostModel(config.costWeights, config.costModel),
        targets: this.role === "slave" ? this.targets : undefined,
        now: this.now,
      },
    );

    this.publisher =
      this.role === "master"
        ? new SyncPublisher(options.bus, this.cameraId, config.sync.publishSource, this.now)
        : null;
    this.subscriber =
      this.role === "slave" ? new SyncSubscriber(options.bus, this.targets, this.cameraId) : null;
  }

  // ============================================================================
  // Lifecycle
  // ============================================================================

  /**
   * Connect, apply initial parameters and start the cycle timer
   * A failed first connection leaves the watchdog reconnecting; the session
   * still starts and skips cycles until the camera is back.
   */
  async start(): Promise<void> {
    if (this.running) return;
    this.running = true;

    this.subscriber?.start();

    const connected = await this.watchdog.connect();
    if (connected) {
      await this.applyInitialParameters();
    }
    this.watchdog.start();

    this.cycleTimer = setInterval(() => {
      this.runCycle().catch((error: unknown) => {
        cameraLogger.error("CameraSession: Cycle crashed", {
          cameraId: this.cameraId,
          error: errorMessage(error),
        });
      });
    }, this.cycleIntervalMs);

    cameraLogger.info("CameraSession: Started", {
      cameraId: this.cameraId,
      role: this.role,
      protocol: this.transport.protocol,
      connected,
    });
  }

  /**
   * Stop cycling, abandon queued operations, let in-flight ones settle and
   * disconnect
   */
  async stop(): Promise<void> {
    if (!this.running) return;
    this.running = false;

    if (this.cycleTimer) {
      clearInterval(this.cycleTimer);
      this.cycleTimer = null;
    }
    this.watchdog.stop();
    this.subscriber?.stop();

    this.controller.abort();
    await this.currentCycle;
    await this.controller.drain();

    try {
      await this.transport.disconnect();
    } catch (error) {
      cameraLogger.warn("CameraSession: Disconnect failed", {
        cameraId: this.cameraId,
        error: errorMessage(error),
      });
    }

    cameraLogger.info("CameraSession: Stopped", { cameraId: this.cameraId });
  }

  /**
   * Run one control cycle now
   * @returns null when skipped (cycle already running, camera unhealthy or
   * disconnected)
   */
  runCycle(): Promise<CycleReport | null> {
    if (this.currentCycle) return Promise.resolve(null);

    const cycle = this.cycle().finally(() => {
      this.currentCycle = null;
    });
    this.currentCycle = cycle;
    return cycle;
  }

  /**
   * Clear the unhealthy mark and resume reconnecting
   */
  reset(): void {
    this.watchdog.reset();
  }

  // ============================================================================
  // Queries
  // ============================================================================

  isRunning(): boolean {
    return this.running;
  }

  health(): WatchdogStatus {
    return this.watchdog.getStatus();
  }

  stats(): ConcurrencyStats {
    return this.controller.stats();
  }

  history(): AdjustmentRecord[] {
    return this.engine.getHistory();
  }

  clearHistory(): void {
    this.engine.clearHistory();
  }

  summary(): CameraSummary {
    return {
      cameraId: this.cameraId,
      protocol: this.transport.protocol,
      host: this.transport.endpoint.host,
      role: this.role,
      running: this.running,
      health: this.watchdog.getStatus(),
      cycles: this.engine.cycleCount,
      lastCycleAt: this.lastReport?.startedAt ?? null,
    };
  }

  status(): CameraStatus {
    return {
      summary: this.summary(),
      parameters: this.engine.getParameters(),
      targets: this.targets.snapshot(),
      lastReport: this.lastReport,
    };
  }

  // ============================================================================
  // Internals
  // ============================================================================

  private async cycle(): Promise<CycleReport | null> {
    if (this.watchdog.isUnhealthy()) {
      cameraLogger.debug("CameraSession: Skipping cycle, camera unhealthy", { cameraId: this.cameraId });
      return null;
    }
    if (!this.transport.isConnected()) {
      cameraLogger.debug("CameraSession: Skipping cycle, camera disconnected", { cameraId: this.cameraId });
      return null;
    }

    const report = await this.engine.runCycle(this.features.latest(this.cameraId));
    this.lastReport = report;
    this.publisher?.publishCycle(report);
    return report;
  }

  private async applyInitialParameters(): Promise<void> {
    if (this.initialApplied || Object.keys(this.initialParameters).length === 0) return;
    this.initialApplied = true;

    const results = await this.controller.set(this.initialParameters);
    this.engine.applyResults(results);

    const failed = results.filter((r) => r.outcome !== "ok");
    if (failed.length > 0) {
      cameraLogger.warn("CameraSession: Some initial parameters were not applied", {
        cameraId: this.cameraId,
        failed: failed.map((r) => `${r.parameterName}:${r.outcome}`),
      });
    } else {
      cameraLogger.info("CameraSession: Initial parameters applied", {
        cameraId: this.cameraId,
        count: results.length,
      });
    }
  }
}
