import type {
  AngleTopology,
  BondTopology,
  ChiralCenters,
  Conformation,
  CoordinateBuffer,
  LossEvaluation,
  LossTerm,
  LossWeights,
  RingSet,
  TermBreakdown,
  TotalLossEvaluation,
} from "../types/geometry.js";
import {
  assertAngles,
  assertBonds,
  assertChiralCenters,
  assertConformation,
  assertNonNegative,
  assertRadii,
  assertRingSet,
} from "../utils/validate.js";
import { WarningCollector } from "../utils/warnings.js";
import { bondAngleLoss } from "./bondAngle.js";
import { bondLengthLoss } from "./bondLength.js";
import { chiralityLoss } from "./chirality.js";
import { ringSetPlanarityLoss } from "./ringPlanarity.js";
import { DEFAULT_CLASH_THRESHOLD, stericClashLoss } from "./stericClash.js";

export const DEFAULT_WEIGHTS: Readonly<LossWeights> = {
  bondLength: 1.0,
  bondAngle: 0.5,
  ringPlanarity: 0.3,
  stericClash: 0.2,
  chirality: 0.2,
};

const TERMS: readonly LossTerm[] = ["bondLength", "bondAngle", "ringPlanarity", "stericClash", "chirality"];

export interface TotalLossInput {
  conformation: Conformation;
  bonds?: BondTopology;
  angles?: AngleTopology;
  rings?: RingSet;
  vdwRadii?: CoordinateBuffer;
  chiralCenters?: ChiralCenters;
}

export interface TotalLossOptions {
  /** Merged over DEFAULT_WEIGHTS. */
  weights?: Partial<LossWeights>;
  clashThreshold?: number;
  /** Pass `bonds` to the clash term so bonded pairs are not penalised. Default true. */
  excludeBondedClashes?: boolean;
}

export function resolveWeights(weights: Partial<LossWeights> = {}): LossWeights {
  const out: LossWeights = { ...DEFAULT_WEIGHTS };
  for (const term of TERMS) {
    const w = weights[term];
    if (w === undefined) continue;
    assertNonNegative(w, `weights.${term}`);
    out[term] = w;
  }
  return out;
}

/**
 * Weighted sum of the five geometry terms, with a summed gradient.
 *
 * A term whose topology is absent or empty is skipped outright: it is not evaluated and
 * contributes neither value nor gradient. Passing an empty topology and omitting it are equivalent.
 */
export function totalLoss(input: TotalLossInput, options: TotalLossOptions = {}): TotalLossEvaluation {
  const { conformation: conf, bonds, angles, rings, vdwRadii, chiralCenters } = input;
  const { clashThreshold = DEFAULT_CLASH_THRESHOLD, excludeBondedClashes = true } = options;
  const weights = resolveWeights(options.weights);

  // Everything is checked before the first term runs.
  assertConformation(conf);
  if (bonds) assertBonds(bonds, conf.count);
  if (angles) assertAngles(angles, conf.count);
  if (rings) assertRingSet(rings, conf.count);
  if (vdwRadii) assertRadii(vdwRadii, conf.count);
  if (chiralCenters) assertChiralCenters(chiralCenters, conf.count);
  assertNonNegative(clashThreshold, "clashThreshold");

  const evaluators: Record<LossTerm, (() => LossEvaluation) | undefined> = {
    bondLength: bonds && bonds.count > 0 ? () => bondLengthLoss(conf, bonds) : undefined,
    bondAngle: angles && angles.count > 0 ? () => bondAngleLoss(conf, angles) : undefined,
    ringPlanarity: rings && rings.count > 0 ? () => ringSetPlanarityLoss(conf, rings) : undefined,
    stericClash:
      vdwRadii && conf.count > 1
        ? () => stericClashLoss(conf, vdwRadii, { bonds: excludeBondedClashes ? bonds : undefined, threshold: clashThreshold })
        : undefined,
    chirality: chiralCenters && chiralCenters.count > 0 ? () => chiralityLoss(conf, chiralCenters) : undefined,
  };

  const W = new WarningCollector();
  const gradient = new Float64Array(conf.count * 3);
  let value = 0;

  const run = (term: LossTerm): TermBreakdown => {
    const weight = weights[term];
    const evaluate = evaluators[term];
    if (!evaluate) return { value: 0, weight, weighted: 0, skipped: true };
    const res = evaluate();
    const weighted = weight * res.value;
    value += weighted;
    for (let k = 0; k < gradient.length; k++) gradient[k] += weight * res.gradient[k];
    W.addTagged(term, res.warnings);
    return { value: res.value, weight, weighted, skipped: false };
  };

  const terms: Record<LossTerm, TermBreakdown> = {
    bondLength: run("bondLength"),
    bondAngle: run("bondAngle"),
    ringPlanarity: run("ringPlanarity"),
    stericClash: run("stericClash"),
    chirality: run("chirality"),
  };

  return { value, gradient, warnings: W.toArray(), terms };
}
