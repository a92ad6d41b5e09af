/**
 * Sync Publisher
 * The master camera publishes one target per monitored feature after each cycle.
 */

import { SYNC_DEFAULTS, targetTopic } from "@ptz-exposure/config";
import type { CycleReport, TargetFeaturePayload } from "@ptz-exposure/types";
import { syncLogger } from "../camera/logger";
import type { SyncBus } from "./bus";

/**
 * `target`: publish the center the master is steering to
 * `measured`: publish what the master camera sees
 */
export type PublishSource = "measured" | "target";

export class SyncPublisher {
  constructor(
    private readonly bus: SyncBus,
    private readonly cameraId: string,
    private readonly source: PublishSource = SYNC_DEFAULTS.PUBLISH_SOURCE,
    private readonly now: () => number = Date.now,
  ) {}

  publishCycle(report: CycleReport): number {
    let published = 0;
    const timestamp = this.now();

    for (const feature of report.features) {
      const value = this.source === "measured" ? feature.measured : feature.center;
      if (value === null) continue;

      const payload: TargetFeaturePayload = { value, timestamp, camera_id: this.cameraId };
      this.bus.publish(targetTopic(feature.feature), payload);
      published++;
    }

    syncLogger.debug("SyncPublisher: Published targets", {
      cameraId: this.cameraId,
      cycle: report.cycle,
      published,
    });
    return published;
  }
}
