/**
 * Hysteresis Gate Tests
 *
 * Critical Invariants:
 * - The gate starts INSIDE_DEAD_BAND
 * - It leaves INSIDE only when |Δ| exceeds the outer threshold
 * - It returns INSIDE only when |Δ| falls to the inner threshold or below
 * - Between the thresholds the state holds
 * - An adjustment is requested only while OUTSIDE and |Δ| > dead band
 */

import { describe, it, expect, beforeEach } from "vitest";
import type { FeatureBand } from "@ptz-exposure/types";
import { bandCenter, computeThresholds, HysteresisGate } from "../hysteresis";

const brightness: FeatureBand = {
  acceptableLow: 0.25,
  acceptableHigh: 0.5,
  deadBandPct: 0.05,
  innerPct: 0.02,
  outerPct: 0.08,
};

describe("computeThresholds", () => {
  it("derives the thresholds from the acceptable range", () => {
    const thresholds = computeThresholds(brightness);

    expect(thresholds.center).toBeCloseTo(0.375, 10);
    expect(thresholds.acceptableRange).toBeCloseTo(0.25, 10);
    expect(thresholds.deadBand).toBeCloseTo(0.0125, 10);
    expect(thresholds.outerThreshold).toBeCloseTo(0.0325, 10);
    expect(thresholds.innerThreshold).toBeCloseTo(0.0075, 10);
  });

  it("floors the inner threshold at zero", () => {
    const thresholds = computeThresholds({ ...brightness, deadBandPct: 0.01, innerPct: 0.05 });
    expect(thresholds.innerThreshold).toBe(0);
  });

  it("centers on an explicit target when given", () => {
    expect(computeThresholds(brightness, 0.35).center).toBe(0.35);
    expect(bandCenter(brightness)).toBeCloseTo(0.375, 10);
  });
});

describe("HysteresisGate", () => {
  let gate: HysteresisGate;

  beforeEach(() => {
    gate = new HysteresisGate("brightness", brightness);
  });

  it("starts inside the dead band", () => {
    expect(gate.getState()).toBe("INSIDE_DEAD_BAND");
  });

  it("holds INSIDE for deviations up to the outer threshold", () => {
    const decision = gate.evaluate(0.375 + 0.03);

    expect(decision.state).toBe("INSIDE_DEAD_BAND");
    expect(decision.shouldAdjust).toBe(false);
  });

  it("crosses to OUTSIDE beyond the outer threshold and asks for an adjustment", () => {
    const decision = gate.evaluate(0.3);

    expect(decision.previousState).toBe("INSIDE_DEAD_BAND");
    expect(decision.state).toBe("OUTSIDE_NEEDS_ADJUST");
    expect(decision.deviation).toBeCloseTo(-0.075, 10);
    expect(decision.shouldAdjust).toBe(true);
  });

  it("stays OUTSIDE between the inner and outer thresholds", () => {
    gate.evaluate(0.3);

    const decision = gate.evaluate(0.375 + 0.02);

    expect(decision.state).toBe("OUTSIDE_NEEDS_ADJUST");
    expect(decision.shouldAdjust).toBe(true);
  });

  it("stays OUTSIDE without adjusting once inside the dead band but above inner", () => {
    gate.evaluate(0.3);

    const decision = gate.evaluate(0.375 + 0.01);

    expect(decision.state).toBe("OUTSIDE_NEEDS_ADJUST");
    expect(decision.shouldAdjust).toBe(false);
  });

  it("returns INSIDE at or below the inner threshold", () => {
    gate.evaluate(0.3);

    const decision = gate.evaluate(0.375 - 0.005);

    expect(decision.previousState).toBe("OUTSIDE_NEEDS_ADJUST");
    expect(decision.state).toBe("INSIDE_DEAD_BAND");
    expect(decision.shouldAdjust).toBe(false);
  });

  it("measures against a synced center", () => {
    const decision = gate.evaluate(0.3, 0.35);

    expect(decision.thresholds.center).toBe(0.35);
    expect(decision.deviation).toBeCloseTo(-0.05, 10);
    expect(decision.state).toBe("OUTSIDE_NEEDS_ADJUST");
  });

  it("reset() returns to INSIDE", () => {
    gate.evaluate(0.9);
    gate.reset();
    expect(gate.getState()).toBe("INSIDE_DEAD_BAND");
  });
});
