/**
 * Target Feature Cache
 *
 * Latest master target per feature. The sync subscriber is the only writer;
 * the adjustment engine only reads. The freshest timestamp wins and a target
 * older than `staleAfterMs` is ignored.
 */

import { SYNC_DEFAULTS } from "@ptz-exposure/config";
import type { TargetFeature } from "@ptz-exposure/types";
import type { TargetSource } from "../adjustment/engine";

export interface TargetCacheOptions {
  staleAfterMs?: number;
  now?: () => number;
}

export class TargetFeatureCache implements TargetSource {
  private readonly targets = new Map<string, TargetFeature>();
  private readonly staleAfterMs: number;
  private readonly now: () => number;

  constructor(options: TargetCacheOptions = {}) {
    this.staleAfterMs = options.staleAfterMs ?? SYNC_DEFAULTS.STALE_AFTER_MS;
    this.now = options.now ?? Date.now;
  }

  /**
   * Store a target unless a newer one is already held
   * @returns whether the cache changed
   */
  update(target: TargetFeature): boolean {
    const current = this.targets.get(target.featureName);
    if (current && current.timestamp >= target.timestamp) {
      return false;
    }
    this.targets.set(target.featureName, { ...target });
    return true;
  }

  freshTarget(feature: string): TargetFeature | null {
    const target = this.targets.get(feature);
    if (!target) return null;
    return this.now() - target.timestamp < this.staleAfterMs ? { ...target } : null;
  }

  snapshot(): TargetFeature[] {
    return Array.from(this.targets.values(), (t) => ({ ...t }));
  }

  clear(): void {
    this.targets.clear();
  }
}
