/**
 * Session Manager
 *
 * Owns the camera fleet: one CameraSession per configured camera, all sharing
 * one sync bus and one feature store. Sessions start and stop independently;
 * one camera failing to start never keeps the others from running.
 */

import { errorMessage } from "@ptz-exposure/utils";
import { cameraLogger } from "../camera/logger";
import { createTransport } from "../camera/transports/factory";
import type { MockFailureMode } from "../camera/transports/mock";
import type { CameraEndpoint, CameraTransport } from "../camera/types";
import { cameraEndpoint, transportOptions } from "../config/control-config";
import type { CameraConfig, ControlConfig } from "../config/control-config";
import type { SyncBus } from "../sync/bus";
import { CameraSession } from "./camera-session";
import { FeatureStore } from "./feature-store";

export interface SessionManagerOptions {
  config: ControlConfig;
  bus: SyncBus;
  features?: FeatureStore;
  /** Fallback credentials for cameras that carry none */
  credentials?: { username: string; password: string };
  mockFailureMode?: MockFailureMode;
  /** Replaces the transport registry lookup */
  transportFor?: (camera: CameraConfig, endpoint: CameraEndpoint) => CameraTransport;
  now?: () => number;
  sleep?: (ms: number) => Promise<void>;
}

export class SessionManager {
  readonly features: FeatureStore;
  readonly masterCameraId: string;

  private readonly sessions = new Map<string, CameraSession>();

  constructor(private readonly options: SessionManagerOptions) {
    const { config } = options;
    this.features = options.features ?? new FeatureStore(options.now);
    this.masterCameraId = config.masterCameraId ?? config.cameras[0].id;

    const credentials = options.credentials ?? { username: "", password: "" };

    for (const camera of config.cameras) {
      const endpoint = cameraEndpoint(camera, credentials);
      const transport = options.transportFor
        ? options.transportFor(camera, endpoint)
        : createTransport(
            camera.protocol,
            endpoint,
            transportOptions(config, camera, options.mockFailureMode),
          );

      this.sessions.set(
        camera.id,
        new CameraSession({
          cameraId: camera.id,
          role: camera.id === this.masterCameraId ? "master" : "slave",
          transport,
          config,
          bus: options.bus,
          features: this.features,
          now: options.now,
          sleep: options.sleep,
        }),
      );
    }
  }

  get(cameraId: string): CameraSession | undefined {
    return this.sessions.get(cameraId);
  }

  list(): CameraSession[] {
    return Array.from(this.sessions.values());
  }

  async startAll(): Promise<void> {
    const sessions = this.list();
    const results = await Promise.allSettled(sessions.map((session) => session.start()));

    results.forEach((result, index) => {
      if (result.status === "rejected") {
        cameraLogger.error("SessionManager: Camera session failed to start", {
          cameraId: sessions[index]?.cameraId,
          error: errorMessage(result.reason),
        });
      }
    });

    cameraLogger.info("SessionManager: Fleet started", {
      cameras: this.sessions.size,
      master: this.masterCameraId,
    });
  }

  async stopAll(): Promise<void> {
    await Promise.allSettled(this.list().map((session) => session.stop()));
    cameraLogger.info("SessionManager: Fleet stopped");
  }
}
