import type { FastifyInstance } from "fastify";
import { z } from "zod";
import { API_ENDPOINTS, ERROR_MESSAGES, HTTP_STATUS } from "@ptz-exposure/config";
import { createLogger } from "@ptz-exposure/utils";
import type { SessionManager } from "../services/session-manager";

const logger = createLogger("camera-routes");

const unit = z.number().finite().min(0).max(1);

export const FeatureSampleBodySchema = z.object({
  features: z.record(unit).refine((features) => Object.keys(features).length > 0, {
    message: "at least one feature is required",
  }),
  maskCoverage: unit.optional(),
  capturedAt: z.string().datetime({ offset: true }).optional(),
});

export interface CameraRoutesOptions {
  sessions: SessionManager;
}

interface CameraParams {
  cameraId: string;
}

function cameraNotFound(cameraId: string) {
  return {
    success: false,
    error: ERROR_MESSAGES.CAMERA_NOT_FOUND,
    message: `Unknown camera "${cameraId}"`,
  };
}

/**
 * Camera Routes
 *
 * GET    /api/cameras                      - Fleet summary
 * GET    /api/cameras/:cameraId/stats      - Concurrency statistics
 * GET    /api/cameras/:cameraId/status     - Parameters, targets, last cycle
 * GET    /api/cameras/:cameraId/history    - Applied adjustments
 * DELETE /api/cameras/:cameraId/history    - Clear adjustment history
 * POST   /api/cameras/:cameraId/features   - Push a feature sample
 * POST   /api/cameras/:cameraId/reset      - Clear the unhealthy mark
 */
export async function cameraRoutes(fastify: FastifyInstance, options: CameraRoutesOptions) {
  const { sessions } = options;

  fastify.get(API_ENDPOINTS.CAMERAS, async () => {
    return {
      success: true,
      data: sessions.list().map((session) => session.summary()),
    };
  });

  fastify.get<{ Params: CameraParams }>(API_ENDPOINTS.CAMERA_STATS, async (request, reply) => {
    const session = sessions.get(request.params.cameraId);
    if (!session) {
      return reply.code(HTTP_STATUS.NOT_FOUND).send(cameraNotFound(request.params.cameraId));
    }
    return { success: true, data: session.stats() };
  });

  fastify.get<{ Params: CameraParams }>(API_ENDPOINTS.CAMERA_STATUS, async (request, reply) => {
    const session = sessions.get(request.params.cameraId);
    if (!session) {
      return reply.code(HTTP_STATUS.NOT_FOUND).send(cameraNotFound(request.params.cameraId));
    }
    return { success: true, data: session.status() };
  });

  fastify.get<{ Params: CameraParams }>(API_ENDPOINTS.CAMERA_HISTORY, async (request, reply) => {
    const session = sessions.get(request.params.cameraId);
    if (!session) {
      return reply.code(HTTP_STATUS.NOT_FOUND).send(cameraNotFound(request.params.cameraId));
    }
    return { success: true, data: session.history() };
  });

  fastify.delete<{ Params: CameraParams }>(API_ENDPOINTS.CAMERA_HISTORY, async (request, reply) => {
    const session = sessions.get(request.params.cameraId);
    if (!session) {
      return reply.code(HTTP_STATUS.NOT_FOUND).send(cameraNotFound(request.params.cameraId));
    }
    session.clearHistory();
    logger.info("Adjustment history cleared", { cameraId: session.cameraId });
    return { success: true, message: "History cleared" };
  });

  /**
   * POST /api/cameras/:cameraId/features
   * Feature values are normalized to [0, 1]
   */
  fastify.post<{ Params: CameraParams; Body: unknown }>(
    API_ENDPOINTS.CAMERA_FEATURES,
    async (request, reply) => {
      const session = sessions.get(request.params.cameraId);
      if (!session) {
        return reply.code(HTTP_STATUS.NOT_FOUND).send(cameraNotFound(request.params.cameraId));
      }

      const parsed = FeatureSampleBodySchema.safeParse(request.body);
      if (!parsed.success) {
        return reply.code(HTTP_STATUS.BAD_REQUEST).send({
          success: false,
          error: ERROR_MESSAGES.INVALID_FEATURE_SAMPLE,
          message: parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; "),
        });
      }

      const sample = sessions.features.put(session.cameraId, parsed.data);
      return reply.code(HTTP_STATUS.ACCEPTED).send({ success: true, data: sample });
    },
  );

  fastify.post<{ Params: CameraParams }>(API_ENDPOINTS.CAMERA_RESET, async (request, reply) => {
    const session = sessions.get(request.params.cameraId);
    if (!session) {
      return reply.code(HTTP_STATUS.NOT_FOUND).send(cameraNotFound(request.params.cameraId));
    }

    logger.info("Manual camera reset requested", { cameraId: session.cameraId });
    session.reset();
    return { success: true, data: session.health() };
  });
}
