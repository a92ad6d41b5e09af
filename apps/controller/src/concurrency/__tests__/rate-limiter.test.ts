/**
 * Token Bucket Limiter Tests
 *
 * Critical Invariants:
 * - With a burst of 1, grants are at least 1000/rps ms apart
 * - No 1s window holds more than rps grants
 * - An idle bucket refills up to its burst
 * - An aborted caller is refused with OperationCancelledError
 */

import { describe, it, expect } from "vitest";
import { OperationCancelledError } from "../../camera/errors";
import { TokenBucketLimiter } from "../rate-limiter";

function virtualClock() {
  const clock = { now: 0 };
  return {
    clock,
    now: () => clock.now,
    sleep: async (ms: number) => {
      clock.now += ms;
    },
  };
}

function maxInWindow(times: number[], windowMs: number): number {
  return Math.max(...times.map((start) => times.filter((t) => t >= start && t < start + windowMs).length));
}

describe("TokenBucketLimiter", () => {
  it("spaces grants by 1000/rps and keeps every 1s window within rps", async () => {
    const { clock, now, sleep } = virtualClock();
    const limiter = new TokenBucketLimiter(5, { now, sleep });
    const grants: number[] = [];

    for (let i = 0; i < 12; i++) {
      await limiter.take();
      grants.push(clock.now);
    }

    expect(grants.slice(0, 6)).toEqual([0, 200, 400, 600, 800, 1000]);
    expect(maxInWindow(grants, 1000)).toBe(5);
    expect(limiter.throttled).toBe(11);
  });

  it("serves concurrent callers in call order", async () => {
    const { clock, now, sleep } = virtualClock();
    const limiter = new TokenBucketLimiter(10, { now, sleep });
    const order: string[] = [];

    await Promise.all(
      ["a", "b", "c"].map(async (label) => {
        await limiter.take();
        order.push(`${label}@${clock.now}`);
      }),
    );

    expect(order).toEqual(["a@0", "b@100", "c@200"]);
  });

  it("lets a burst through back-to-back after an idle period", async () => {
    const { clock, now, sleep } = virtualClock();
    const limiter = new TokenBucketLimiter(10, { burst: 3, now, sleep });

    await limiter.take();
    await limiter.take();
    await limiter.take();
    expect(clock.now).toBe(0);

    await limiter.take();
    expect(clock.now).toBe(100);
  });

  it("refuses a caller whose signal has aborted", async () => {
    const { now, sleep } = virtualClock();
    const limiter = new TokenBucketLimiter(10, { now, sleep });
    const controller = new AbortController();
    controller.abort();

    await expect(limiter.take(controller.signal)).rejects.toBeInstanceOf(OperationCancelledError);
    await expect(limiter.take()).resolves.toBeUndefined();
  });
});
