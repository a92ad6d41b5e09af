/**
 * Concurrency primitives
 *
 * KeyedMutex serializes operations that share a key (a parameter name) while
 * letting different keys run in parallel. Semaphore bounds the number of
 * simultaneously held slots; its limit may change while waiters are queued.
 */

import { OperationCancelledError } from "../camera/errors";
import { controlLogger } from "../camera/logger";

// ============================================================================
// KeyedMutex
// ============================================================================

export class KeyedMutex {
  private readonly tails = new Map<string, Promise<void>>();

  /**
   * Run `operation` once every earlier operation on `key` has settled
   */
  async run<T>(key: string, operation: () => Promise<T>): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve();

    let release: () => void = () => undefined;
    const held = new Promise<void>((resolve) => {
      release = resolve;
    });
    const tail = previous.then(() => held);
    this.tails.set(key, tail);

    await previous;
    try {
      return await operation();
    } finally {
      release();
      if (this.tails.get(key) === tail) {
        this.tails.delete(key);
      }
    }
  }

  isLocked(key: string): boolean {
    return this.tails.has(key);
  }
}

// ============================================================================
// Semaphore
// ============================================================================

interface Waiter {
  grant: () => void;
  cancel: (error: Error) => void;
}

export type Release = () => void;

export class Semaphore {
  private active = 0;
  private readonly waiters: Waiter[] = [];

  constructor(private limit: number) {
    this.limit = Math.max(1, limit);
  }

  getLimit(): number {
    return this.limit;
  }

  /**
   * Change the limit; slots already held are never revoked
   */
  setLimit(limit: number): void {
    this.limit = Math.max(1, limit);
    this.grantWaiting();
  }

  get held(): number {
    return this.active;
  }

  get queued(): number {
    return this.waiters.length;
  }

  /**
   * Wait for a free slot
   * @throws OperationCancelledError when `signal` aborts before a slot is granted
   */
  acquire(signal?: AbortSignal): Promise<Release> {
    if (signal?.aborted) {
      return Promise.reject(new OperationCancelledError({ operation: "acquire" }));
    }

    if (this.active < this.limit && this.waiters.length === 0) {
      this.active++;
      return Promise.resolve(this.releaser());
    }

    return new Promise<Release>((resolve, reject) => {
      const onAbort = () => {
        const index = this.waiters.indexOf(waiter);
        if (index >= 0) this.waiters.splice(index, 1);
        reject(new OperationCancelledError({ operation: "acquire" }));
      };

      const waiter: Waiter = {
        grant: () => {
          signal?.removeEventListener("abort", onAbort);
          resolve(this.releaser());
        },
        cancel: (error) => {
          signal?.removeEventListener("abort", onAbort);
          reject(error);
        },
      };

      signal?.addEventListener("abort", onAbort, { once: true });
      this.waiters.push(waiter);
    });
  }

  /**
   * Reject every queued waiter (shutdown)
   */
  cancelWaiting(): void {
    const pending = this.waiters.splice(0, this.waiters.length);
    if (pending.length > 0) {
      controlLogger.debug("Semaphore: Cancelling queued operations", {
        count: pending.length,
      });
    }
    for (const waiter of pending) {
      waiter.cancel(new OperationCancelledError({ operation: "acquire" }));
    }
  }

  private releaser(): Release {
    let released = false;
    return () => {
      if (released) return;
      released = true;
      this.active--;
      this.grantWaiting();
    };
  }

  private grantWaiting(): void {
    while (this.active < this.limit) {
      const next = this.waiters.shift();
      if (!next) return;
      this.active++;
      next.grant();
    }
  }
}
