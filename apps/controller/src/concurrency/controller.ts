/**
 * Concurrency Controller
 *
 * Wraps one camera transport with a bounded-parallelism, rate-limited,
 * adaptive execution policy:
 *
 * - operations on the same parameter never overlap (KeyedMutex)
 * - at most `currentLimit` operations are in flight (Semaphore)
 * - dispatches are spaced by `concurrentMs`, or `sequentialMs` once the
 *   limit has fallen to 1
 * - GET and SET traffic share one token bucket when their flags are set
 * - a transport `error` triggers the reconnect hook, then one retry after
 *   `retryDelayMs`
 * - failures (`timeout`, `error`) step the limit down to a floor of 1; a run
 *   of successes steps it back up, optionally gated by a cooldown
 * - when disabled, operations go to the transport one at a time, each waiting
 *   for the previous result, spaced by `sequentialMs`
 *
 * A lowered limit applies to new acquisitions; operations already holding a
 * slot finish first, so in-flight work drains down to the new limit.
 *
 * All counters are owned by this instance. `stats()` returns a snapshot.
 */

import type { CommandKind, CommandResult, ConcurrencyStats } from "@ptz-exposure/types";
import { errorMessage, formatPercent, sleep as defaultSleep } from "@ptz-exposure/utils";
import { isFailureOutcome, OperationCancelledError, outcomeForError } from "../camera/errors";
import { controlLogger } from "../camera/logger";
import { failAll, failedResult } from "../camera/transports/results";
import type { CameraTransport } from "../camera/types";
import { KeyedMutex, Semaphore } from "./mutex";
import { TokenBucketLimiter } from "./rate-limiter";

// ============================================================================
// Settings
// ============================================================================

export interface PacingSettings {
  concurrentMs: number;
  sequentialMs: number;
  retryDelayMs: number;
}

export interface RateLimitSettings {
  setOperations: boolean;
  getOperations: boolean;
  maxRequestsPerSecond: number;
}

export interface RecoverySettings {
  /** Consecutive successes needed before the limit climbs */
  successThreshold: number;
  step: number;
  /** Minimum time since the last limit change before climbing */
  cooldownMs: number;
}

export interface ConcurrencySettings {
  enabled: boolean;
  maxConcurrentOperations: number;
  fallbackToSequential: boolean;
  pacing: PacingSettings;
  rateLimiting: RateLimitSettings;
  recovery: RecoverySettings;
}

export interface ControllerOptions {
  /** Called before retrying an operation that ended in `error` */
  reconnect?: () => Promise<void>;
  now?: () => number;
  sleep?: (ms: number) => Promise<void>;
}

export interface OperationOptions {
  signal?: AbortSignal;
}

type Operation = { kind: "get"; name: string } | { kind: "set"; name: string; value: number };

// ============================================================================
// Controller
// ============================================================================

export class ConcurrencyController {
  private readonly keyed = new KeyedMutex();
  private readonly slots: Semaphore;
  private readonly sequential = new Semaphore(1);
  private readonly limiter: TokenBucketLimiter;
  private readonly now: () => number;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly reconnectHook?: () => Promise<void>;

  private lifecycle = new AbortController();
  private readonly active = new Set<Promise<unknown>>();
  private reconnecting: Promise<void> | null = null;

  private currentLimit: number;
  private successCount = 0;
  private failureCount = 0;
  private rejectedCount = 0;
  private successStreak = 0;
  private lastLimitChangeAt: number;
  private inFlight = 0;
  private peakInFlight = 0;

  private lastDispatchAt = Number.NEGATIVE_INFINITY;
  private paceChain: Promise<void> = Promise.resolve();

  constructor(
    private readonly transport: CameraTransport,
    private readonly settings: ConcurrencySettings,
    options: ControllerOptions = {},
  ) {
    this.now = options.now ?? Date.now;
    this.sleep = options.sleep ?? defaultSleep;
    this.reconnectHook = options.reconnect;

    this.currentLimit = Math.max(1, settings.maxConcurrentOperations);
    this.slots = new Semaphore(this.currentLimit);
    this.limiter = new TokenBucketLimiter(settings.rateLimiting.maxRequestsPerSecond, {
      now: this.now,
      sleep: this.sleep,
    });
    this.lastLimitChangeAt = this.now();
  }

  // ============================================================================
  // Operations
  // ============================================================================

  /**
   * Read parameters; one result per name, in order
   */
  get(names: string[], options: OperationOptions = {}): Promise<CommandResult[]> {
    const operations = names.map((name): Operation => ({ kind: "get", name }));
    return this.track(this.execute(operations, options.signal));
  }

  /**
   * Write parameters; each entry succeeds or fails on its own
   */
  set(values: Record<string, number>, options: OperationOptions = {}): Promise<CommandResult[]> {
    const operations = Object.entries(values).map(
      ([name, value]): Operation => ({ kind: "set", name, value }),
    );
    return this.track(this.execute(operations, options.signal));
  }

  stats(): ConcurrencyStats {
    const total = this.successCount + this.failureCount;
    const { setOperations, getOperations } = this.settings.rateLimiting;

    return {
      enabled: this.settings.enabled,
      currentLimit: this.currentLimit,
      maxLimit: this.settings.maxConcurrentOperations,
      successCount: this.successCount,
      failureCount: this.failureCount,
      successRate: total === 0 ? 1 : this.successCount / total,
      rateLimitingActive: this.settings.enabled && (setOperations || getOperations),
      inFlight: this.inFlight,
      peakInFlight: this.peakInFlight,
      rejectedCount: this.rejectedCount,
    };
  }

  /**
   * Abandon queued operations; in-flight ones are aborted through their signal
   */
  abort(): void {
    this.lifecycle.abort();
    this.slots.cancelWaiting();
    this.sequential.cancelWaiting();
    this.lifecycle = new AbortController();
  }

  /**
   * Wait for every started operation to settle
   */
  async drain(): Promise<void> {
    await Promise.allSettled(Array.from(this.active));
  }

  // ============================================================================
  // Execution
  // ============================================================================

  private async execute(operations: Operation[], callerSignal?: AbortSignal): Promise<CommandResult[]> {
    if (operations.length === 0) return [];

    const signal = linkSignals(this.lifecycle.signal, callerSignal);

    if (!this.settings.enabled) {
      return this.executeLegacy(operations, signal);
    }

    return Promise.all(
      operations.map((operation) =>
        this.keyed.run(operation.name, () => this.runSlotted(operation, signal)),
      ),
    );
  }

  /**
   * Disabled mode: one operation at a time, no retry or adaptation
   */
  private async executeLegacy(operations: Operation[], signal: AbortSignal): Promise<CommandResult[]> {
    const results: CommandResult[] = [];
    for (const operation of operations) {
      results.push(await this.runSequential(operation, signal));
    }
    return results;
  }

  private async runSequential(operation: Operation, signal: AbortSignal): Promise<CommandResult> {
    let release: () => void;
    try {
      release = await this.sequential.acquire(signal);
    } catch (error) {
      return this.cancelled(operation, error);
    }

    try {
      await this.pace(signal);
      this.enter();
      try {
        const [result] = await this.callTransport(operation.kind, [operation], signal);
        const final =
          result ?? failedResult(operation.name, operation.kind, requested(operation), "error", 0, "no result");
        this.count(final);
        return final;
      } finally {
        this.leave();
      }
    } catch (error) {
      return this.cancelled(operation, error);
    } finally {
      release();
    }
  }

  private async runSlotted(operation: Operation, signal: AbortSignal): Promise<CommandResult> {
    let release: () => void;
    try {
      release = await this.slots.acquire(signal);
    } catch (error) {
      return this.cancelled(operation, error);
    }

    try {
      let result = await this.dispatch(operation, signal);

      if (result.outcome === "error" && !signal.aborted) {
        controlLogger.warn("ConcurrencyController: Transport error, reconnecting before retry", {
          cameraId: this.transport.endpoint.cameraId,
          parameter: operation.name,
          detail: result.detail,
        });
        await this.reconnect();
        await this.sleep(this.settings.pacing.retryDelayMs);
        const retry = await this.dispatch(operation, signal);
        result = { ...retry, attempts: result.attempts + retry.attempts };
      }

      this.record(result);
      return result;
    } catch (error) {
      return this.cancelled(operation, error);
    } finally {
      release();
    }
  }

  private async dispatch(operation: Operation, signal: AbortSignal): Promise<CommandResult> {
    if (this.isRateLimited(operation.kind)) {
      await this.limiter.take(signal);
    }
    await this.pace(signal);

    this.enter();
    try {
      const [result] = await this.callTransport(operation.kind, [operation], signal);
      return result ?? failedResult(operation.name, operation.kind, requested(operation), "error", 0, "no result");
    } finally {
      this.leave();
    }
  }

  private async callTransport(
    kind: CommandKind,
    operations: Operation[],
    signal: AbortSignal,
  ): Promise<CommandResult[]> {
    try {
      if (kind === "get") {
        return await this.transport.getParameters(
          operations.map((op) => op.name),
          { signal },
        );
      }
      const values: Record<string, number> = {};
      for (const op of operations) {
        if (op.kind === "set") values[op.name] = op.value;
      }
      return await this.transport.setParameters(values, { signal });
    } catch (error) {
      const outcome = outcomeForError(error);
      return failAll(
        operations.map((op) => [op.name, requested(op)]),
        kind,
        outcome === "ok" ? "error" : outcome,
        errorMessage(error),
      );
    }
  }

  /**
   * Enforce the minimum spacing between dispatches on this connection
   */
  private pace(signal: AbortSignal): Promise<void> {
    const turn = this.paceChain.then(async () => {
      if (signal.aborted) {
        throw new OperationCancelledError({ operation: "pace" });
      }
      const spacing =
        this.settings.enabled && this.currentLimit > 1
          ? this.settings.pacing.concurrentMs
          : this.settings.pacing.sequentialMs;
      const wait = this.lastDispatchAt + spacing - this.now();
      if (wait > 0) {
        await this.sleep(wait);
      }
      this.lastDispatchAt = this.now();
    });
    this.paceChain = turn.catch(() => undefined);
    return turn;
  }

  private reconnect(): Promise<void> {
    const hook = this.reconnectHook;
    if (!hook) return Promise.resolve();

    if (!this.reconnecting) {
      this.reconnecting = hook()
        .catch((error: unknown) => {
          controlLogger.error("ConcurrencyController: Reconnect failed", {
            cameraId: this.transport.endpoint.cameraId,
            error: errorMessage(error),
          });
        })
        .finally(() => {
          this.reconnecting = null;
        });
    }
    return this.reconnecting;
  }

  private isRateLimited(kind: CommandKind): boolean {
    const { setOperations, getOperations } = this.settings.rateLimiting;
    return kind === "set" ? setOperations : getOperations;
  }

  // ============================================================================
  // Adaptive limit
  // ============================================================================

  private count(result: CommandResult): void {
    if (result.outcome === "ok") this.successCount++;
    else if (result.outcome === "rejected") this.rejectedCount++;
    else if (isFailureOutcome(result.outcome)) this.failureCount++;
  }

  private record(result: CommandResult): void {
    this.count(result);

    if (result.outcome === "ok") {
      this.successStreak++;
      this.maybeRecover();
      return;
    }

    if (isFailureOutcome(result.outcome)) {
      this.successStreak = 0;
      if (this.settings.fallbackToSequential && this.currentLimit > 1) {
        this.changeLimit(this.currentLimit - 1, "failure");
      }
    }
  }

  private maybeRecover(): void {
    const { successThreshold, step, cooldownMs } = this.settings.recovery;
    const max = this.settings.maxConcurrentOperations;

    if (this.currentLimit >= max) return;
    if (this.successStreak < successThreshold) return;
    if (this.now() - this.lastLimitChangeAt < cooldownMs) return;

    this.successStreak = 0;
    this.changeLimit(Math.min(max, this.currentLimit + step), "recovery");
  }

  private changeLimit(limit: number, reason: "failure" | "recovery"): void {
    const previous = this.currentLimit;
    this.currentLimit = limit;
    this.lastLimitChangeAt = this.now();
    this.slots.setLimit(limit);

    controlLogger.log(reason === "failure" ? "warn" : "info", "ConcurrencyController: Limit changed", {
      cameraId: this.transport.endpoint.cameraId,
      from: previous,
      to: limit,
      reason,
      successRate: formatPercent(this.stats().successRate),
    });
  }

  // ============================================================================
  // Bookkeeping
  // ============================================================================

  private enter(): void {
    this.inFlight++;
    this.peakInFlight = Math.max(this.peakInFlight, this.inFlight);
  }

  private leave(): void {
    this.inFlight--;
  }

  private track<T>(promise: Promise<T>): Promise<T> {
    this.active.add(promise);
    const forget = () => {
      this.active.delete(promise);
    };
    void promise.then(forget, forget);
    return promise;
  }

  private cancelled(operation: Operation, error: unknown): CommandResult {
    if (!(error instanceof OperationCancelledError)) {
      controlLogger.error("ConcurrencyController: Operation failed unexpectedly", {
        cameraId: this.transport.endpoint.cameraId,
        parameter: operation.name,
        error: errorMessage(error),
      });
      const result = failedResult(operation.name, operation.kind, requested(operation), "error", 0, errorMessage(error));
      this.record(result);
      return result;
    }
    return failedResult(operation.name, operation.kind, requested(operation), "cancelled", 0, "cancelled");
  }
}

function requested(operation: Operation): number | null {
  return operation.kind === "set" ? operation.value : null;
}

/**
 * Signal that aborts when either input aborts
 */
function linkSignals(primary: AbortSignal, secondary?: AbortSignal): AbortSignal {
  if (!secondary) return primary;

  const controller = new AbortController();
  const abort = () => controller.abort();
  if (primary.aborted || secondary.aborted) {
    abort();
  } else {
    primary.addEventListener("abort", abort, { once: true });
    secondary.addEventListener("abort", abort, { once: true });
  }
  return controller.signal;
}
