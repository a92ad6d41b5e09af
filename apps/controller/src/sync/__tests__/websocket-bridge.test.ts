/**
 * WebSocket Sync Bridge Tests
 *
 * Runs a relay on an ephemeral localhost port with two client buses.
 *
 * Critical Invariants:
 * - A message published on one client reaches the other client and the
 *   relay's local bus exactly once
 * - Messages published on the relay's local bus reach every client
 * - A client never receives its own message back
 */

import { createServer } from "http";
import type { Server } from "http";
import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { LocalSyncBus } from "../bus";
import type { SyncMessage } from "../bus";
import { SyncRelay, WebSocketSyncBus } from "../websocket-bridge";

async function waitFor(condition: () => boolean, timeoutMs = 2000): Promise<void> {
  const deadline = Date.now() + timeoutMs;
  while (!condition()) {
    if (Date.now() > deadline) throw new Error("condition not met in time");
    await new Promise((resolve) => setTimeout(resolve, 5));
  }
}

describe("SyncRelay with WebSocketSyncBus clients", () => {
  let server: Server;
  let relayBus: LocalSyncBus;
  let relay: SyncRelay;
  let clients: WebSocketSyncBus[];

  beforeEach(async () => {
    server = createServer();
    relayBus = new LocalSyncBus();
    relay = new SyncRelay(server, relayBus);
    await new Promise<void>((resolve) => server.listen(0, "127.0.0.1", () => resolve()));

    const address = server.address();
    if (!address || typeof address === "string") throw new Error("relay server has no port");
    const url = `ws://127.0.0.1:${address.port}/ws/sync`;
    clients = [new WebSocketSyncBus(url, { reconnectDelayMs: 50 }), new WebSocketSyncBus(url, { reconnectDelayMs: 50 })];
    await waitFor(() => relay.clientCount === 2 && clients.every((c) => c.isConnected()));
  });

  afterEach(async () => {
    await Promise.all(clients.map((c) => c.close()));
    await relay.close();
    await new Promise<void>((resolve) => server.close(() => resolve()));
  });

  it("relays a client's message to the other client and the local bus", async () => {
    const [first, second] = clients;
    if (!first || !second) throw new Error("clients missing");
    const onFirst: SyncMessage[] = [];
    const onSecond: SyncMessage[] = [];
    const onRelay: SyncMessage[] = [];
    first.subscribe("features.target.", (m) => onFirst.push(m));
    second.subscribe("features.target.", (m) => onSecond.push(m));
    relayBus.subscribe("features.target.", (m) => onRelay.push(m));

    first.publish("features.target.brightness", { value: 0.35, timestamp: 1, camera_id: "cam-1" });
    await waitFor(() => onSecond.length === 1 && onRelay.length === 1);
    await new Promise((resolve) => setTimeout(resolve, 30));

    expect(onSecond[0]?.payload).toEqual({ value: 0.35, timestamp: 1, camera_id: "cam-1" });
    expect(onRelay[0]?.id).toBe(onSecond[0]?.id);
    expect(onFirst).toHaveLength(1);
    expect(onSecond).toHaveLength(1);
  });

  it("fans local bus messages out to every client", async () => {
    const received = clients.map((): SyncMessage[] => []);
    clients.forEach((client, index) => {
      client.subscribe("", (m) => received[index]?.push(m));
    });

    relayBus.publish("features.target.saturation", { value: 0.5, timestamp: 2, camera_id: "cam-1" });
    await waitFor(() => received.every((list) => list.length === 1));

    expect(received.map((list) => list[0]?.topic)).toEqual([
      "features.target.saturation",
      "features.target.saturation",
    ]);
  });
});
