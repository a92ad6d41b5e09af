/**
 * Sync Subscriber
 * Validates published targets and writes them into the target cache.
 */

import { z } from "zod";
import { TOPICS } from "@ptz-exposure/config";
import { syncLogger } from "../camera/logger";
import type { SyncBus, SyncMessage } from "./bus";
import type { TargetFeatureCache } from "./target-cache";

export const TargetFeaturePayloadSchema = z.object({
  value: z.number().finite(),
  timestamp: z.number().finite().nonnegative(),
  camera_id: z.string().min(1),
});

export class SyncSubscriber {
  private unsubscribe: (() => void) | null = null;

  constructor(
    private readonly bus: SyncBus,
    private readonly cache: TargetFeatureCache,
    private readonly cameraId: string,
  ) {}

  start(): void {
    if (this.unsubscribe) return;
    this.unsubscribe = this.bus.subscribe(TOPICS.TARGET_PREFIX, (message) => this.handle(message));
    syncLogger.info("SyncSubscriber: Listening for master targets", { cameraId: this.cameraId });
  }

  stop(): void {
    this.unsubscribe?.();
    this.unsubscribe = null;
  }

  private handle(message: SyncMessage): void {
    const featureName = message.topic.slice(TOPICS.TARGET_PREFIX.length);
    const parsed = TargetFeaturePayloadSchema.safeParse(message.payload);

    if (!featureName || !parsed.success) {
      syncLogger.warn("SyncSubscriber: Ignoring malformed target", {
        cameraId: this.cameraId,
        topic: message.topic,
        issues: parsed.success ? [] : parsed.error.issues.map((i) => i.message),
      });
      return;
    }

    if (parsed.data.camera_id === this.cameraId) return;

    const changed = this.cache.update({
      featureName,
      value: parsed.data.value,
      timestamp: parsed.data.timestamp,
      sourceCameraId: parsed.data.camera_id,
    });

    if (changed) {
      syncLogger.debug("SyncSubscriber: Target updated", {
        cameraId: this.cameraId,
        feature: featureName,
        value: parsed.data.value,
        source: parsed.data.camera_id,
      });
    }
  }
}
