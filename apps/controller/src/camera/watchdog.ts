/**
 * Connection Watchdog
 *
 * Monitors one camera transport and reconnects with backoff when the link
 * drops. After MAX_CONSECUTIVE_FAILURES failed reconnects in a row the camera
 * is marked unhealthy and the loop stops until `reset()` is called.
 */

import { EventEmitter } from "events";
import { RECONNECT_DEFAULTS } from "@ptz-exposure/config";
import type { CameraHealthStatus, WatchdogStatus } from "@ptz-exposure/types";
import { errorMessage, formatDuration } from "@ptz-exposure/utils";
import { ReconnectFailedError } from "./errors";
import { cameraLogger } from "./logger";
import type { CameraTransport } from "./types";

export interface ConnectionWatchdogOptions {
  pollIntervalMs?: number;
  maxConsecutiveFailures?: number;
  backoffDelaysMs?: readonly number[];
  /** Runs after every successful reconnect */
  onReconnect?: () => Promise<void>;
}

export class ConnectionWatchdog extends EventEmitter {
  private readonly pollIntervalMs: number;
  private readonly maxConsecutiveFailures: number;
  private readonly backoffDelays: readonly number[];
  private readonly onReconnectCallback?: () => Promise<void>;

  private isRunning = false;
  private pollTimer: ReturnType<typeof setInterval> | null = null;
  private reconnectTimer: ReturnType<typeof setTimeout> | null = null;

  private connectAttempted = false;
  private isReconnecting = false;
  private unhealthy = false;
  private consecutiveFailures = 0;
  private reconnectAttempts = 0;
  private lastReconnectAt: Date | null = null;
  private inProgress: Promise<void> | null = null;

  constructor(
    private readonly transport: CameraTransport,
    options: ConnectionWatchdogOptions = {},
  ) {
    super();
    this.pollIntervalMs = options.pollIntervalMs ?? RECONNECT_DEFAULTS.POLL_INTERVAL_MS;
    this.maxConsecutiveFailures =
      options.maxConsecutiveFailures ?? RECONNECT_DEFAULTS.MAX_CONSECUTIVE_FAILURES;
    this.backoffDelays = options.backoffDelaysMs ?? RECONNECT_DEFAULTS.BACKOFF_DELAYS_MS;
    this.onReconnectCallback = options.onReconnect;
  }

  /**
   * Start polling the transport's connection state
   */
  start(): void {
    if (this.isRunning) return;

    this.isRunning = true;
    this.connectAttempted = this.connectAttempted || this.transport.isConnected();

    cameraLogger.info("Watchdog: Started monitoring", {
      cameraId: this.transport.endpoint.cameraId,
      pollIntervalMs: this.pollIntervalMs,
    });

    this.pollTimer = setInterval(() => this.checkConnection(), this.pollIntervalMs);
    this.checkConnection();
  }

  stop(): void {
    if (!this.isRunning) return;

    this.isRunning = false;
    this.isReconnecting = false;
    if (this.pollTimer) {
      clearInterval(this.pollTimer);
      this.pollTimer = null;
    }
    this.clearReconnectTimer();

    cameraLogger.info("Watchdog: Stopped", { cameraId: this.transport.endpoint.cameraId });
  }

  getStatus(): WatchdogStatus {
    return {
      status: this.health(),
      consecutiveFailures: this.consecutiveFailures,
      reconnectAttempts: this.reconnectAttempts,
      lastReconnectAt: this.lastReconnectAt?.toISOString() ?? null,
      isConnected: this.transport.isConnected(),
    };
  }

  isUnhealthy(): boolean {
    return this.unhealthy;
  }

  /**
   * Clear the unhealthy mark and failure counters (manual recovery)
   */
  reset(): void {
    this.unhealthy = false;
    this.isReconnecting = false;
    this.consecutiveFailures = 0;
    this.reconnectAttempts = 0;
    this.clearReconnectTimer();

    cameraLogger.info("Watchdog: Reset", { cameraId: this.transport.endpoint.cameraId });
    this.checkConnection();
  }

  /**
   * Connect for the first time; a failure starts the reconnect loop
   */
  async connect(): Promise<boolean> {
    try {
      await this.transport.connect();
      this.connectAttempted = true;
      this.consecutiveFailures = 0;
      return true;
    } catch (error) {
      cameraLogger.error("Watchdog: Initial connection failed", {
        cameraId: this.transport.endpoint.cameraId,
        error: errorMessage(error),
      });
      this.connectAttempted = true;
      this.startReconnectLoop();
      return false;
    }
  }

  /**
   * Drop and re-open the connection once, now
   * Concurrent callers share the same attempt.
   */
  reconnectNow(): Promise<void> {
    if (!this.inProgress) {
      this.inProgress = this.reconnectOnce().finally(() => {
        this.inProgress = null;
      });
    }
    return this.inProgress;
  }

  private health(): CameraHealthStatus {
    if (this.unhealthy) return "unhealthy";
    if (this.isReconnecting || this.inProgress) return "reconnecting";
    if (!this.connectAttempted) return "warming_up";
    return this.transport.isConnected() ? "healthy" : "reconnecting";
  }

  private checkConnection(): void {
    if (!this.isRunning || this.unhealthy || this.isReconnecting) return;

    if (this.connectAttempted && !this.transport.isConnected()) {
      cameraLogger.warn("Watchdog: Camera disconnect detected", {
        cameraId: this.transport.endpoint.cameraId,
      });
      this.emit("camera:disconnected", { timestamp: new Date().toISOString() });
      this.startReconnectLoop();
    }
  }

  private async reconnectOnce(): Promise<void> {
    if (this.unhealthy) {
      throw new ReconnectFailedError(this.consecutiveFailures, {
        cameraId: this.transport.endpoint.cameraId,
      });
    }

    this.reconnectAttempts++;
    this.emit("reconnect_attempt", {
      attempt: this.reconnectAttempts,
      timestamp: new Date().toISOString(),
    });

    try {
      await this.transport.disconnect();
      await this.transport.connect();
    } catch (error) {
      this.consecutiveFailures++;
      this.emit("reconnect_failed", {
        attempt: this.reconnectAttempts,
        error: errorMessage(error),
        timestamp: new Date().toISOString(),
      });

      if (this.consecutiveFailures >= this.maxConsecutiveFailures) {
        this.markUnhealthy();
      }
      throw error;
    }

    this.handleReconnectSuccess();
  }

  private startReconnectLoop(): void {
    if (this.isReconnecting || this.unhealthy) return;

    this.isReconnecting = true;
    cameraLogger.info("Watchdog: Starting reconnection loop", {
      cameraId: this.transport.endpoint.cameraId,
    });
    this.scheduleNextReconnect();
  }

  private scheduleNextReconnect(): void {
    if (!this.isReconnecting || this.unhealthy) return;

    const index = Math.min(this.consecutiveFailures, this.backoffDelays.length - 1);
    const delay = this.backoffDelays[index] ?? 0;

    cameraLogger.debug(`Watchdog: Scheduling next reconnect in ${formatDuration(delay)}`, {
      cameraId: this.transport.endpoint.cameraId,
    });

    this.reconnectTimer = setTimeout(() => {
      this.reconnectTimer = null;
      this.reconnectNow().catch((error: unknown) => {
        cameraLogger.error(`Watchdog: Reconnection attempt ${this.reconnectAttempts} failed`, {
          cameraId: this.transport.endpoint.cameraId,
          error: errorMessage(error),
        });
        this.scheduleNextReconnect();
      });
    }, delay);
  }

  private handleReconnectSuccess(): void {
    this.isReconnecting = false;
    this.consecutiveFailures = 0;
    this.lastReconnectAt = new Date();
    this.clearReconnectTimer();

    cameraLogger.info("Watchdog: Reconnection successful", {
      cameraId: this.transport.endpoint.cameraId,
      attempts: this.reconnectAttempts,
    });

    if (this.onReconnectCallback) {
      this.onReconnectCallback().catch((error: unknown) => {
        cameraLogger.error("Watchdog: onReconnect callback failed", {
          error: errorMessage(error),
        });
      });
    }

    this.emit("camera:reconnected", {
      timestamp: this.lastReconnectAt.toISOString(),
      attempts: this.reconnectAttempts,
    });
  }

  private markUnhealthy(): void {
    this.unhealthy = true;
    this.isReconnecting = false;
    this.clearReconnectTimer();

    const error = new ReconnectFailedError(this.consecutiveFailures, {
      cameraId: this.transport.endpoint.cameraId,
    });
    cameraLogger.error("Watchdog: Camera marked unhealthy", error.toJSON());
    this.emit("camera:unhealthy", error);
  }

  private clearReconnectTimer(): void {
    if (this.reconnectTimer) {
      clearTimeout(this.reconnectTimer);
      this.reconnectTimer = null;
    }
  }
}
