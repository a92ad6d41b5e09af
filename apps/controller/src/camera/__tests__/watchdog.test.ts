/**
 * Connection Watchdog Tests
 *
 * Tests the ConnectionWatchdog which polls a transport's connection state and
 * reconnects with backoff.
 *
 * Critical Invariants:
 * - Emits 'camera:disconnected' when a connected transport drops
 * - Reconnect attempts follow the configured backoff delays
 * - After maxConsecutiveFailures failed reconnects the camera is unhealthy
 *   and the loop stops
 * - reset() clears the unhealthy mark
 * - Concurrent reconnectNow() callers share one attempt
 * - No timers keep firing after stop()
 */

import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import type { CommandResult } from "@ptz-exposure/types";
import { ReconnectFailedError } from "../errors";
import type { CameraTransport } from "../types";
import { ConnectionWatchdog } from "../watchdog";

interface TestTransport extends CameraTransport {
  setConnected(value: boolean): void;
  failNextConnects(count: number): void;
  connectCalls(): number;
}

function createTransport(): TestTransport {
  let connected = false;
  let failures = 0;
  let calls = 0;

  return {
    protocol: "mock",
    endpoint: { cameraId: "cam-watch", host: "127.0.0.1" },
    batchSize: 1,
    connect: async () => {
      calls++;
      if (failures > 0) {
        failures--;
        throw new Error("camera unreachable");
      }
      connected = true;
    },
    disconnect: async () => {
      connected = false;
    },
    isConnected: () => connected,
    getParameters: async (): Promise<CommandResult[]> => [],
    setParameters: async (): Promise<CommandResult[]> => [],
    setConnected: (value) => {
      connected = value;
    },
    failNextConnects: (count) => {
      failures = count;
    },
    connectCalls: () => calls,
  };
}

describe("ConnectionWatchdog", () => {
  let transport: TestTransport;
  let watchdog: ConnectionWatchdog;

  beforeEach(() => {
    vi.useFakeTimers();
    transport = createTransport();
  });

  afterEach(() => {
    watchdog?.stop();
    vi.useRealTimers();
  });

  it("reports warming_up before the first connect and healthy after", async () => {
    watchdog = new ConnectionWatchdog(transport, { pollIntervalMs: 100 });
    expect(watchdog.getStatus().status).toBe("warming_up");

    await expect(watchdog.connect()).resolves.toBe(true);
    expect(watchdog.getStatus()).toMatchObject({ status: "healthy", isConnected: true });
  });

  it("emits camera:disconnected and reconnects with backoff", async () => {
    watchdog = new ConnectionWatchdog(transport, {
      pollIntervalMs: 100,
      backoffDelaysMs: [0, 50, 200],
    });
    const disconnected = vi.fn();
    const reconnected = vi.fn();
    watchdog.on("camera:disconnected", disconnected);
    watchdog.on("camera:reconnected", reconnected);

    await watchdog.connect();
    watchdog.start();

    transport.failNextConnects(1);
    transport.setConnected(false);
    await vi.advanceTimersByTimeAsync(100);

    expect(disconnected).toHaveBeenCalledTimes(1);
    expect(watchdog.getStatus().status).toBe("reconnecting");
    expect(watchdog.getStatus().consecutiveFailures).toBe(1);

    // second attempt waits for the 50ms backoff slot
    await vi.advanceTimersByTimeAsync(49);
    expect(reconnected).not.toHaveBeenCalled();
    await vi.advanceTimersByTimeAsync(1);

    expect(reconnected).toHaveBeenCalledTimes(1);
    expect(watchdog.getStatus()).toMatchObject({
      status: "healthy",
      consecutiveFailures: 0,
      reconnectAttempts: 2,
    });
  });

  it("marks the camera unhealthy after consecutive failures and stops retrying", async () => {
    watchdog = new ConnectionWatchdog(transport, {
      pollIntervalMs: 100,
      maxConsecutiveFailures: 3,
      backoffDelaysMs: [0],
    });
    const unhealthy = vi.fn();
    watchdog.on("camera:unhealthy", unhealthy);

    transport.failNextConnects(100);
    await expect(watchdog.connect()).resolves.toBe(false);
    await vi.advanceTimersByTimeAsync(10);

    expect(watchdog.isUnhealthy()).toBe(true);
    expect(watchdog.getStatus().status).toBe("unhealthy");
    expect(unhealthy).toHaveBeenCalledTimes(1);
    expect(unhealthy.mock.calls[0]?.[0]).toBeInstanceOf(ReconnectFailedError);

    const callsAtUnhealthy = transport.connectCalls();
    await vi.advanceTimersByTimeAsync(1000);
    expect(transport.connectCalls()).toBe(callsAtUnhealthy);
  });

  it("resumes reconnecting after reset()", async () => {
    watchdog = new ConnectionWatchdog(transport, {
      pollIntervalMs: 100,
      maxConsecutiveFailures: 1,
      backoffDelaysMs: [0],
    });
    transport.failNextConnects(2);
    await watchdog.connect();
    await vi.advanceTimersByTimeAsync(10);
    expect(watchdog.isUnhealthy()).toBe(true);

    watchdog.start();
    watchdog.reset();
    await vi.advanceTimersByTimeAsync(10);

    expect(watchdog.isUnhealthy()).toBe(false);
    expect(watchdog.getStatus().status).toBe("healthy");
  });

  it("shares one attempt between concurrent reconnectNow() callers", async () => {
    watchdog = new ConnectionWatchdog(transport, { pollIntervalMs: 100 });
    await watchdog.connect();

    await Promise.all([watchdog.reconnectNow(), watchdog.reconnectNow(), watchdog.reconnectNow()]);

    expect(transport.connectCalls()).toBe(2);
    expect(watchdog.getStatus().reconnectAttempts).toBe(1);
  });

  it("runs the onReconnect hook after a successful reconnect", async () => {
    const onReconnect = vi.fn().mockResolvedValue(undefined);
    watchdog = new ConnectionWatchdog(transport, { pollIntervalMs: 100, onReconnect });
    await watchdog.connect();

    await watchdog.reconnectNow();

    expect(onReconnect).toHaveBeenCalledTimes(1);
  });

  it("stops polling after stop()", async () => {
    watchdog = new ConnectionWatchdog(transport, { pollIntervalMs: 100 });
    const disconnected = vi.fn();
    watchdog.on("camera:disconnected", disconnected);
    await watchdog.connect();
    watchdog.start();
    watchdog.stop();

    transport.setConnected(false);
    await vi.advanceTimersByTimeAsync(500);

    expect(disconnected).not.toHaveBeenCalled();
    expect(vi.getTimerCount()).toBe(0);
  });
});
