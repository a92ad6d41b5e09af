/**
 * Token bucket rate limiter
 *
 * Callers wait in FIFO order until a token is available; nothing is dropped.
 * Tokens are scheduled on a theoretical-arrival clock, so with a burst of 1
 * grants are at least 1000/rps ms apart and no 1s window holds more than
 * `rps` of them.
 */

import { sleep as defaultSleep } from "@ptz-exposure/utils";
import { OperationCancelledError } from "../camera/errors";

export interface TokenBucketOptions {
  /** Tokens that may be taken back-to-back after an idle period */
  burst?: number;
  now?: () => number;
  sleep?: (ms: number) => Promise<void>;
}

export class TokenBucketLimiter {
  private readonly intervalMs: number;
  private readonly burst: number;
  private readonly now: () => number;
  private readonly sleep: (ms: number) => Promise<void>;

  private nextArrival = Number.NEGATIVE_INFINITY;
  private chain: Promise<void> = Promise.resolve();
  private waits = 0;

  constructor(
    readonly requestsPerSecond: number,
    options: TokenBucketOptions = {},
  ) {
    this.intervalMs = 1000 / Math.max(1, requestsPerSecond);
    this.burst = Math.max(1, options.burst ?? 1);
    this.now = options.now ?? Date.now;
    this.sleep = options.sleep ?? defaultSleep;
  }

  /**
   * Number of takes that had to wait for a token
   */
  get throttled(): number {
    return this.waits;
  }

  take(signal?: AbortSignal): Promise<void> {
    const turn = this.chain.then(() => this.waitForToken(signal));
    this.chain = turn.catch(() => undefined);
    return turn;
  }

  private async waitForToken(signal?: AbortSignal): Promise<void> {
    const tolerance = (this.burst - 1) * this.intervalMs;
    let waited = false;

    for (;;) {
      if (signal?.aborted) {
        throw new OperationCancelledError({ operation: "rate_limit" });
      }

      const now = this.now();
      const arrival = Math.max(this.nextArrival, now);
      const wait = arrival - tolerance - now;

      if (wait <= 0) {
        this.nextArrival = arrival + this.intervalMs;
        if (waited) this.waits++;
        return;
      }

      waited = true;
      await this.sleep(Math.ceil(wait));
    }
  }
}
