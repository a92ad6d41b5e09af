/**
 * Controller Index - Server Entry Point
 *
 * Loads the control configuration, starts one control session per camera
 * and serves the HTTP API (see app.ts for the routes manifest).
 *
 * Sync: cameras in this process share an in-process bus. With SYNC_URL (or
 * `sync.url`) set, targets travel through a remote /ws/sync relay instead;
 * with `sync.relay` set, this process hosts the relay itself.
 */

import path from "path";
import { fileURLToPath } from "url";
import type { FastifyInstance } from "fastify";
import { createLogger, errorMessage } from "@ptz-exposure/utils";
import { createApp } from "./app";
import { env } from "./config/env";
import { loadControlConfig } from "./config/control-config";
import { SessionManager } from "./services/session-manager";
import { LocalSyncBus } from "./sync/bus";
import type { SyncBus } from "./sync/bus";
import { WebSocketSyncBus } from "./sync/websocket-bridge";

const logger = createLogger("server");

let app: FastifyInstance | null = null;
let sessions: SessionManager | null = null;
let bus: SyncBus | null = null;

export interface ServerOptions {
  port?: number;
  host?: string;
  configPath?: string;
}

export async function startServer(options: ServerOptions = {}): Promise<void> {
  if (app) {
    logger.warn("Server already started");
    return;
  }

  logger.info("Starting PTZ exposure controller...");

  const configPath = options.configPath ?? env.controlConfigPath;
  const config = loadControlConfig(configPath);
  logger.info(`Control configuration loaded from ${configPath}`, {
    cameras: config.cameras.map((c) => `${c.id}:${c.protocol}`),
  });

  const syncUrl = env.syncUrl || config.sync.url;
  const localBus = new LocalSyncBus();
  bus = syncUrl ? new WebSocketSyncBus(syncUrl) : localBus;

  sessions = new SessionManager({
    config,
    bus,
    credentials: env.camera,
    mockFailureMode: env.mockFailureMode,
  });

  app = await createApp({
    sessions,
    relayBus: config.sync.relay && !syncUrl ? localBus : undefined,
  });

  const port = options.port ?? env.port;
  const host = options.host ?? env.host;
  await app.listen({ port, host });

  logger.info(`Server listening on http://${host}:${port}`);
  logger.info(`Environment: ${env.nodeEnv}`);

  await sessions.startAll();
}

export async function stopServer(): Promise<void> {
  logger.info("Stopping server...");

  if (sessions) {
    await sessions.stopAll();
    sessions = null;
  }

  if (app) {
    await app.close();
    app = null;
    logger.info("Fastify app closed");
  }

  if (bus) {
    await bus.close();
    bus = null;
  }

  logger.info("Server stopped successfully");
}

// CLI mode (when run directly)
if (process.argv[1] && path.resolve(process.argv[1]) === fileURLToPath(import.meta.url)) {
  // Handle graceful shutdown
  const gracefulShutdown = async (signal: string) => {
    logger.info(`Received ${signal}, starting graceful shutdown...`);
    try {
      await stopServer();
      process.exit(0);
    } catch (error) {
      logger.error("Error during shutdown:", { error: errorMessage(error) });
      process.exit(1);
    }
  };

  process.on("SIGTERM", () => void gracefulShutdown("SIGTERM"));
  process.on("SIGINT", () => void gracefulShutdown("SIGINT"));

  process.on("unhandledRejection", (reason) => {
    logger.error("Unhandled Rejection:", { reason: errorMessage(reason) });
  });

  process.on("uncaughtException", (error) => {
    logger.error("Uncaught Exception:", { error: error.message, stack: error.stack });
    process.exit(1);
  });

  startServer().catch((error: unknown) => {
    logger.error("Failed to start server:", { error: errorMessage(error) });
    process.exit(1);
  });
}
