/**
 * WebSocket Sync Bridge
 *
 * Carries sync messages between processes when each camera runs in its own
 * process.
 *
 * - SyncRelay: hosted on the service's HTTP server at /ws/sync. Messages from
 *   one client go to every other client and onto the local bus; local bus
 *   messages go to every client.
 * - WebSocketSyncBus: a SyncBus that connects to a relay URL and reconnects
 *   after the link drops.
 *
 * Wire frames are JSON `{id, topic, payload}`. Ids already seen are dropped.
 */

import type { Server } from "http";
import { WebSocket, WebSocketServer } from "ws";
import type { RawData } from "ws";
import { nanoid } from "nanoid";
import { z } from "zod";
import { API_ENDPOINTS } from "@ptz-exposure/config";
import { errorMessage } from "@ptz-exposure/utils";
import { syncLogger } from "../camera/logger";
import { LocalSyncBus } from "./bus";
import type { SyncBus, SyncHandler, SyncMessage } from "./bus";

const SyncFrameSchema = z.object({
  id: z.string().min(1),
  topic: z.string().min(1),
  payload: z.unknown(),
});

const SEEN_LIMIT = 1000;

function parseFrame(data: RawData): SyncMessage | null {
  try {
    const parsed = SyncFrameSchema.safeParse(JSON.parse(data.toString()));
    if (!parsed.success) return null;
    return { id: parsed.data.id, topic: parsed.data.topic, payload: parsed.data.payload };
  } catch {
    return null;
  }
}

/**
 * Bounded set of recently seen message ids
 */
class SeenIds {
  private readonly ids = new Set<string>();

  /** @returns false when the id was already seen */
  add(id: string): boolean {
    if (this.ids.has(id)) return false;
    this.ids.add(id);
    if (this.ids.size > SEEN_LIMIT) {
      const oldest = this.ids.values().next();
      if (!oldest.done) this.ids.delete(oldest.value);
    }
    return true;
  }
}

// ============================================================================
// Relay (server side)
// ============================================================================

export class SyncRelay {
  private readonly wss: WebSocketServer;
  private readonly clients = new Map<string, WebSocket>();
  private readonly seen = new SeenIds();
  private readonly unsubscribe: () => void;

  constructor(
    server: Server,
    private readonly bus: LocalSyncBus,
    path: string = API_ENDPOINTS.WS_SYNC,
  ) {
    this.wss = new WebSocketServer({ server, path });
    this.wss.on("connection", (ws) => this.handleConnection(ws));

    this.unsubscribe = bus.subscribe("", (message) => {
      if (this.seen.add(message.id)) this.broadcast(message);
    });

    syncLogger.info(`SyncRelay: Listening on ${path}`);
  }

  get clientCount(): number {
    return this.clients.size;
  }

  async close(): Promise<void> {
    this.unsubscribe();
    for (const ws of this.clients.values()) ws.terminate();
    this.clients.clear();
    await new Promise<void>((resolve) => this.wss.close(() => resolve()));
  }

  private handleConnection(ws: WebSocket): void {
    const clientId = nanoid(10);
    this.clients.set(clientId, ws);
    syncLogger.info(`SyncRelay: Client ${clientId} connected (${this.clients.size} total)`);

    ws.on("message", (data) => {
      const message = parseFrame(data);
      if (!message) {
        syncLogger.warn("SyncRelay: Invalid frame from client", { clientId });
        return;
      }
      if (!this.seen.add(message.id)) return;

      this.broadcast(message, clientId);
      this.bus.deliver(message);
    });

    ws.on("close", () => {
      this.clients.delete(clientId);
      syncLogger.info(`SyncRelay: Client ${clientId} disconnected (${this.clients.size} remaining)`);
    });

    ws.on("error", (error) => {
      syncLogger.error(`SyncRelay: Client ${clientId} error`, { error: error.message });
      this.clients.delete(clientId);
    });
  }

  private broadcast(message: SyncMessage, exceptClientId?: string): void {
    const frame = JSON.stringify(message);
    for (const [clientId, ws] of this.clients) {
      if (clientId !== exceptClientId && ws.readyState === WebSocket.OPEN) {
        ws.send(frame);
      }
    }
  }
}

// ============================================================================
// Client bus
// ============================================================================

export interface WebSocketSyncBusOptions {
  reconnectDelayMs?: number;
  createSocket?: (url: string) => WebSocket;
}

export class WebSocketSyncBus implements SyncBus {
  private readonly local = new LocalSyncBus();
  private readonly seen = new SeenIds();
  private readonly reconnectDelayMs: number;
  private readonly createSocket: (url: string) => WebSocket;

  private socket: WebSocket | null = null;
  private reconnectTimer: ReturnType<typeof setTimeout> | null = null;
  private closed = false;

  constructor(
    private readonly url: string,
    options: WebSocketSyncBusOptions = {},
  ) {
    this.reconnectDelayMs = options.reconnectDelayMs ?? 2000;
    this.createSocket = options.createSocket ?? ((target) => new WebSocket(target));
    this.connect();
  }

  publish(topic: string, payload: unknown): void {
    const message: SyncMessage = { id: nanoid(), topic, payload };
    this.seen.add(message.id);
    this.local.deliver(message);

    if (this.socket?.readyState === WebSocket.OPEN) {
      this.socket.send(JSON.stringify(message));
    } else {
      syncLogger.debug("WebSocketSyncBus: Not connected, message kept local", { topic });
    }
  }

  subscribe(topicPrefix: string, handler: SyncHandler): () => void {
    return this.local.subscribe(topicPrefix, handler);
  }

  isConnected(): boolean {
    return this.socket?.readyState === WebSocket.OPEN;
  }

  async close(): Promise<void> {
    this.closed = true;
    if (this.reconnectTimer) {
      clearTimeout(this.reconnectTimer);
      this.reconnectTimer = null;
    }
    this.socket?.close();
    this.socket = null;
    await this.local.close();
  }

  private connect(): void {
    if (this.closed) return;

    const socket = this.createSocket(this.url);
    this.socket = socket;

    socket.on("open", () => {
      syncLogger.info("WebSocketSyncBus: Connected to relay", { url: this.url });
    });

    socket.on("message", (data) => {
      const message = parseFrame(data);
      if (message && this.seen.add(message.id)) {
        this.local.deliver(message);
      }
    });

    socket.on("close", () => {
      if (this.socket === socket) this.socket = null;
      this.scheduleReconnect();
    });

    socket.on("error", (error) => {
      syncLogger.warn("WebSocketSyncBus: Connection error", {
        url: this.url,
        error: errorMessage(error),
      });
    });
  }

  private scheduleReconnect(): void {
    if (this.closed || this.reconnectTimer) return;
    this.reconnectTimer = setTimeout(() => {
      this.reconnectTimer = null;
      this.connect();
    }, this.reconnectDelayMs);
  }
}
