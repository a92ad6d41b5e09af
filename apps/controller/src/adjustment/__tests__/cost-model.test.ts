/**
 * Parameter Cost Model Tests
 *
 * Critical Invariants:
 * - Δ < 0 needs an increase, Δ > 0 a decrease
 * - Preferred-direction moves get cheaper with |Δ|, never below min_cost
 * - Moves against the preference are penalized, never above max_cost
 * - Moves that end near a range bound cost more
 * - Stale, rejected, claimed and out-of-range parameters are never chosen
 * - Equal costs resolve by configured order unless most_headroom is set
 */

import { describe, it, expect } from "vitest";
import { DEFAULT_COST_WEIGHTS } from "@ptz-exposure/config";
import type { CameraParameter } from "@ptz-exposure/types";
import { neededDirection, ParameterCostModel } from "../cost-model";

function parameter(name: string, currentValue: number | null, max: number, overrides: Partial<CameraParameter> = {}): CameraParameter {
  return {
    name,
    min: 0,
    max,
    step: 1,
    currentValue,
    stale: false,
    rejected: false,
    updatedAt: null,
    ...overrides,
  };
}

function brightnessParameters(): CameraParameter[] {
  return [
    parameter("ExposureIris", 8, 17),
    parameter("ExposureExposureTime", 10, 20),
    parameter("ExposureGain", 2, 15),
    parameter("DigitalBrightLevel", 7, 14),
  ];
}

describe("neededDirection", () => {
  it("increases for a negative deviation and decreases otherwise", () => {
    expect(neededDirection(-0.1)).toBe("increase");
    expect(neededDirection(0.1)).toBe("decrease");
  });
});

describe("ParameterCostModel", () => {
  const model = new ParameterCostModel(DEFAULT_COST_WEIGHTS);

  it("picks the iris to brighten a dark frame", () => {
    // brightness 0.15 against a 0.375 center
    const selection = model.select(brightnessParameters(), 0.15 - 0.375);

    expect(selection.kind).toBe("selected");
    if (selection.kind !== "selected") return;
    expect(selection.candidate).toMatchObject({
      parameter: "ExposureIris",
      direction: "increase",
      from: 8,
      to: 9,
      cost: 0.275,
    });
  });

  it("scores each candidate by direction preference", () => {
    const selection = model.select(brightnessParameters(), -0.225);
    const costs = Object.fromEntries(
      selection.evaluations.flatMap((e) => (e.feasible ? [[e.parameter, e.candidate.cost] as const] : [])),
    );

    expect(costs).toEqual({
      ExposureIris: 0.275,
      ExposureExposureTime: 2.475,
      ExposureGain: 4.725,
      DigitalBrightLevel: 2,
    });
  });

  it("never goes below min_cost or above max_cost", () => {
    const iris = DEFAULT_COST_WEIGHTS.ExposureIris;
    const gain = DEFAULT_COST_WEIGHTS.ExposureGain;
    if (!iris || !gain) throw new Error("default weights missing");

    expect(model.cost(iris, "increase", 5, 1)).toBe(iris.minCost);
    expect(model.cost(gain, "increase", 50, 1)).toBe(gain.maxCost);
  });

  it("raises the cost of moves that end near a bound", () => {
    const iris = DEFAULT_COST_WEIGHTS.ExposureIris;
    if (!iris) throw new Error("default weights missing");

    const open = model.cost(iris, "increase", -0.1, 0.5);
    const near = model.cost(iris, "increase", -0.1, 0.05);
    const atBound = model.cost(iris, "increase", -0.1, 0);

    expect(near).toBeGreaterThan(open);
    expect(atBound).toBeCloseTo(iris.maxCost, 10);
  });

  it("refuses a step past the range end", () => {
    const evaluation = model.evaluate(parameter("ExposureIris", 17, 17), -0.2);
    expect(evaluation).toEqual({ parameter: "ExposureIris", feasible: false, reason: "at_bound" });
  });

  it("skips stale, rejected, unknown and uncosted parameters", () => {
    const reasons = [
      parameter("ExposureIris", 8, 17, { stale: true }),
      parameter("ExposureGain", 2, 15, { rejected: true }),
      parameter("DigitalBrightLevel", null, 14),
      parameter("Zoom", 3, 10),
    ].map((p) => {
      const evaluation = model.evaluate(p, -0.2);
      return evaluation.feasible ? "feasible" : evaluation.reason;
    });

    expect(reasons).toEqual(["stale", "rejected", "unknown_value", "no_cost_spec"]);
  });

  it("does not pick a parameter another feature has claimed", () => {
    const selection = model.select(brightnessParameters(), -0.225, new Set(["ExposureIris"]));

    expect(selection.kind === "selected" && selection.candidate.parameter).toBe("DigitalBrightLevel");
    expect(selection.evaluations[0]).toEqual({
      parameter: "ExposureIris",
      feasible: false,
      reason: "claimed",
    });
  });

  it("reports no_suitable_parameter when nothing is feasible", () => {
    const selection = model.select([parameter("ExposureIris", 17, 17)], -0.2);
    expect(selection.kind).toBe("no_suitable_parameter");
  });

  describe("ties", () => {
    // iris one step from its top bound costs max_cost (2.0), same as the bright level
    const tied = () => [parameter("ExposureIris", 16, 17), parameter("DigitalBrightLevel", 7, 14)];

    it("go to the earlier parameter in configured order", () => {
      const selection = model.select(tied(), -0.2);
      expect(selection.kind === "selected" && selection.candidate.parameter).toBe("ExposureIris");
    });

    it("go to the one with most headroom when configured", () => {
      const headroomModel = new ParameterCostModel(DEFAULT_COST_WEIGHTS, { tieBreak: "most_headroom" });
      const selection = headroomModel.select(tied(), -0.2);
      expect(selection.kind === "selected" && selection.candidate.parameter).toBe("DigitalBrightLevel");
    });
  });

  it("uses a per-parameter weight override", () => {
    const weighted = new ParameterCostModel({
      ExposureIris: { baseCost: 1, maxCost: 3, minCost: 0.1, preferredDirection: "increase", weight: 2 },
    });

    const evaluation = weighted.evaluate(parameter("ExposureIris", 5, 17), -0.25);

    expect(evaluation.feasible && evaluation.candidate.cost).toBe(0.5);
  });
});
