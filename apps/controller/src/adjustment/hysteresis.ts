/**
 * Hysteresis Gate
 *
 * Per (camera, feature) state machine: INSIDE_DEAD_BAND ⇄ OUTSIDE_NEEDS_ADJUST.
 *
 *   range     = acceptable_high − acceptable_low
 *   dead_band = range · dead_band_pct          (half-width around the center)
 *   outer     = dead_band + range · outer_pct  (enter correction above this)
 *   inner     = max(0, dead_band − range · inner_pct)  (leave correction at or below this)
 *
 * An adjustment is requested only while OUTSIDE and |Δ| is beyond the dead band.
 */

import type { FeatureBand, GateDecision, GateState, GateThresholds } from "@ptz-exposure/types";

export function bandCenter(band: FeatureBand): number {
  return (band.acceptableLow + band.acceptableHigh) / 2;
}

export function computeThresholds(band: FeatureBand, center: number = bandCenter(band)): GateThresholds {
  const acceptableRange = band.acceptableHigh - band.acceptableLow;
  const deadBand = acceptableRange * band.deadBandPct;

  return {
    center,
    acceptableRange,
    deadBand,
    innerThreshold: Math.max(0, deadBand - acceptableRange * band.innerPct),
    outerThreshold: deadBand + acceptableRange * band.outerPct,
  };
}

export class HysteresisGate {
  private state: GateState = "INSIDE_DEAD_BAND";

  constructor(
    readonly feature: string,
    private readonly band: FeatureBand,
  ) {}

  getState(): GateState {
    return this.state;
  }

  reset(): void {
    this.state = "INSIDE_DEAD_BAND";
  }

  /**
   * Advance the state machine with a new measurement
   * @param center overrides the band midpoint (a synced master target)
   */
  evaluate(measured: number, center?: number): GateDecision {
    const thresholds = computeThresholds(this.band, center);
    const deviation = measured - thresholds.center;
    const magnitude = Math.abs(deviation);
    const previousState = this.state;

    if (this.state === "INSIDE_DEAD_BAND" && magnitude > thresholds.outerThreshold) {
      this.state = "OUTSIDE_NEEDS_ADJUST";
    } else if (this.state === "OUTSIDE_NEEDS_ADJUST" && magnitude <= thresholds.innerThreshold) {
      this.state = "INSIDE_DEAD_BAND";
    }

    return {
      feature: this.feature,
      state: this.state,
      previousState,
      measured,
      deviation,
      thresholds,
      shouldAdjust: this.state === "OUTSIDE_NEEDS_ADJUST" && magnitude > thresholds.deadBand,
    };
  }
}
