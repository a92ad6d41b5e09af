/**
 * Feature Store
 * Latest extractor sample per camera. The features route writes, each
 * camera session reads once per cycle.
 */

import type { FeatureSample } from "@ptz-exposure/types";

export class FeatureStore {
  private readonly samples = new Map<string, FeatureSample>();

  constructor(private readonly now: () => number = Date.now) {}

  /**
   * Store a sample; a missing capture time is stamped with the current time
   */
  put(cameraId: string, sample: Omit<FeatureSample, "capturedAt"> & { capturedAt?: string }): FeatureSample {
    const stored: FeatureSample = {
      features: { ...sample.features },
      maskCoverage: sample.maskCoverage,
      capturedAt: sample.capturedAt ?? new Date(this.now()).toISOString(),
    };
    this.samples.set(cameraId, stored);
    return stored;
  }

  latest(cameraId: string): FeatureSample | null {
    return this.samples.get(cameraId) ?? null;
  }

  clear(cameraId: string): void {
    this.samples.delete(cameraId);
  }
}
