import Fastify from "fastify";
import type { FastifyInstance } from "fastify";
import { API_ENDPOINTS, APP_CONFIG, ERROR_MESSAGES, HTTP_STATUS } from "@ptz-exposure/config";
import { createLogger } from "@ptz-exposure/utils";
import { env } from "./config/env";
import { cameraRoutes } from "./routes/cameras";
import type { SessionManager } from "./services/session-manager";
import type { LocalSyncBus } from "./sync/bus";
import { SyncRelay } from "./sync/websocket-bridge";

const logger = createLogger("app");

export interface AppOptions {
  sessions: SessionManager;
  /** Bus bridged to the /ws/sync relay; no relay when omitted */
  relayBus?: LocalSyncBus;
}

/**
 * Create and configure the Fastify application
 *
 * ROUTES MANIFEST:
 * =================
 *   GET    /health                          - Service and fleet health
 *   GET    /api/cameras                     - Fleet summary
 *   GET    /api/cameras/:cameraId/stats     - Concurrency statistics
 *   GET    /api/cameras/:cameraId/status    - Parameters, targets, last cycle
 *   GET    /api/cameras/:cameraId/history   - Applied adjustments
 *   DELETE /api/cameras/:cameraId/history   - Clear adjustment history
 *   POST   /api/cameras/:cameraId/features  - Push a feature sample
 *   POST   /api/cameras/:cameraId/reset     - Clear the unhealthy mark
 *
 * WebSocket:
 *   WS     /ws/sync                         - Target sync relay
 */
export async function createApp(options: AppOptions): Promise<FastifyInstance> {
  const app = Fastify({
    logger: false, // We use Winston instead
  });

  await app.register(cameraRoutes, { sessions: options.sessions });

  app.get(API_ENDPOINTS.HEALTH, async () => {
    const cameras = options.sessions.list().map((session) => ({
      cameraId: session.cameraId,
      status: session.health().status,
    }));
    const unhealthy = cameras.filter((c) => c.status === "unhealthy").length;

    return {
      status: unhealthy === 0 ? "ok" : "degraded",
      version: APP_CONFIG.APP_VERSION,
      timestamp: new Date().toISOString(),
      environment: env.nodeEnv,
      uptime: process.uptime(),
      cameras,
    };
  });

  if (options.relayBus) {
    const relay = new SyncRelay(app.server, options.relayBus);
    app.addHook("onClose", async () => {
      await relay.close();
    });
  }

  // Error handler
  app.setErrorHandler((error, request, reply) => {
    logger.error("Request error:", {
      error: error.message,
      stack: error.stack,
      url: request.url,
      method: request.method,
    });

    const statusCode = error.statusCode ?? HTTP_STATUS.INTERNAL_SERVER_ERROR;
    void reply.status(statusCode).send({
      success: false,
      error: error.name || ERROR_MESSAGES.INTERNAL_ERROR,
      message: error.message || ERROR_MESSAGES.INTERNAL_ERROR,
    });
  });

  app.setNotFoundHandler((request, reply) => {
    void reply.status(HTTP_STATUS.NOT_FOUND).send({
      success: false,
      error: ERROR_MESSAGES.NOT_FOUND,
      message: `Route ${request.method} ${request.url} not found`,
    });
  });

  return app;
}
