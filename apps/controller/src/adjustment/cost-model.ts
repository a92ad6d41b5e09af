/**
 * Parameter Cost Model
 *
 * Scores one-step adjustments of the parameters mapped to a feature and picks
 * the cheapest feasible one.
 *
 * For a deviation Δ = measured − target the needed direction is `increase`
 * when Δ < 0. A move in the preferred direction gets cheaper as |Δ| grows,
 * down to min_cost; a move against it is penalized toward max_cost; `either`
 * keeps the base cost. Moves that land within `boundMarginPct` of the
 * parameter's range end are pushed toward max_cost.
 */

import { COST_MODEL_DEFAULTS } from "@ptz-exposure/config";
import type { AdjustmentCandidate, CameraParameter, CostSpec, Direction } from "@ptz-exposure/types";
import { clamp, round } from "@ptz-exposure/utils";

export type TieBreak = "config_order" | "most_headroom";

export interface CostModelSettings {
  deviationWeight: number;
  againstPreferencePenalty: number;
  boundMarginPct: number;
  tieBreak: TieBreak;
}

export const DEFAULT_COST_MODEL_SETTINGS: CostModelSettings = {
  deviationWeight: COST_MODEL_DEFAULTS.DEVIATION_WEIGHT,
  againstPreferencePenalty: COST_MODEL_DEFAULTS.AGAINST_PREFERENCE_PENALTY,
  boundMarginPct: COST_MODEL_DEFAULTS.BOUND_MARGIN_PCT,
  tieBreak: COST_MODEL_DEFAULTS.TIE_BREAK,
};

export type InfeasibleReason =
  | "no_cost_spec"
  | "unknown_value"
  | "stale"
  | "rejected"
  | "at_bound"
  | "claimed";

export type CandidateEvaluation =
  | { parameter: string; feasible: true; candidate: AdjustmentCandidate }
  | { parameter: string; feasible: false; reason: InfeasibleReason };

export type Selection =
  | { kind: "selected"; candidate: AdjustmentCandidate; evaluations: CandidateEvaluation[] }
  | { kind: "no_suitable_parameter"; evaluations: CandidateEvaluation[] };

export function neededDirection(deviation: number): Direction {
  return deviation < 0 ? "increase" : "decrease";
}

export class ParameterCostModel {
  private readonly settings: CostModelSettings;

  constructor(
    private readonly costs: Readonly<Record<string, CostSpec>>,
    settings: Partial<CostModelSettings> = {},
  ) {
    this.settings = { ...DEFAULT_COST_MODEL_SETTINGS, ...settings };
  }

  /**
   * Cost of moving a parameter in `direction` for a deviation of `deviation`
   * @param headroom fraction of the range left beyond the move, in [0, 1]
   */
  cost(spec: CostSpec, direction: Direction, deviation: number, headroom: number): number {
    const weight = spec.weight ?? this.settings.deviationWeight;
    const magnitude = Math.abs(deviation);

    let cost: number;
    if (spec.preferredDirection === "either") {
      cost = spec.baseCost;
    } else if (spec.preferredDirection === direction) {
      cost = Math.max(spec.minCost, spec.baseCost - weight * magnitude);
    } else {
      cost = Math.min(
        spec.maxCost,
        spec.baseCost * this.settings.againstPreferencePenalty + weight * magnitude,
      );
    }

    const margin = this.settings.boundMarginPct;
    if (margin > 0 && headroom < margin) {
      const closeness = 1 - headroom / margin;
      cost += (spec.maxCost - cost) * closeness;
    }

    return clamp(cost, spec.minCost, spec.maxCost);
  }

  evaluate(parameter: CameraParameter, deviation: number): CandidateEvaluation {
    const name = parameter.name;
    const spec = this.costs[name];

    if (!spec) return { parameter: name, feasible: false, reason: "no_cost_spec" };
    if (parameter.stale) return { parameter: name, feasible: false, reason: "stale" };
    if (parameter.rejected) return { parameter: name, feasible: false, reason: "rejected" };
    if (parameter.currentValue === null) {
      return { parameter: name, feasible: false, reason: "unknown_value" };
    }

    const direction = neededDirection(deviation);
    const from = parameter.currentValue;
    const to = direction === "increase" ? from + parameter.step : from - parameter.step;

    if (to > parameter.max || to < parameter.min) {
      return { parameter: name, feasible: false, reason: "at_bound" };
    }

    const span = parameter.max - parameter.min;
    const remaining = direction === "increase" ? parameter.max - to : to - parameter.min;
    const headroom = span > 0 ? remaining / span : 0;

    return {
      parameter: name,
      feasible: true,
      candidate: {
        parameter: name,
        direction,
        from,
        to,
        cost: round(this.cost(spec, direction, deviation, headroom), 6),
        headroom: round(headroom, 6),
      },
    };
  }

  /**
   * Pick the cheapest feasible candidate
   * `parameters` must be in configured order; equal costs resolve to the earlier
   * entry, or to the one with more headroom under `most_headroom`.
   */
  select(parameters: CameraParameter[], deviation: number, claimed: ReadonlySet<string> = new Set()): Selection {
    const evaluations = parameters.map((parameter): CandidateEvaluation =>
      claimed.has(parameter.name)
        ? { parameter: parameter.name, feasible: false, reason: "claimed" }
        : this.evaluate(parameter, deviation),
    );

    let best: AdjustmentCandidate | null = null;
    for (const evaluation of evaluations) {
      if (!evaluation.feasible) continue;
      const candidate = evaluation.candidate;

      if (!best || candidate.cost < best.cost) {
        best = candidate;
      } else if (
        candidate.cost === best.cost &&
        this.settings.tieBreak === "most_headroom" &&
        candidate.headroom > best.headroom
      ) {
        best = candidate;
      }
    }

    return best
      ? { kind: "selected", candidate: best, evaluations }
      : { kind: "no_suitable_parameter", evaluations };
  }
}
