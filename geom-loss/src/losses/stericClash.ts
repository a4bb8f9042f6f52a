import type { BondTopology, Conformation, CoordinateBuffer, LossEvaluation } from "../types/geometry.js";
import { EPS_NORM, accumulate, bondedPairMask, pairKey, pairwiseDistances, readVec3, sub } from "../utils/numeric.js";
import { assertBonds, assertConformation, assertNonNegative, assertRadii } from "../utils/validate.js";
import { WarningCollector } from "../utils/warnings.js";

export const DEFAULT_CLASH_THRESHOLD = 0.75;

export interface StericClashOptions {
  /** Bonded pairs never clash. */
  bonds?: BondTopology;
  /** Fraction of the summed van der Waals radii below which two atoms clash. */
  threshold?: number;
}

/**
 * Sum over unordered non-bonded pairs of max(0, threshold (R_i + R_j) - d_ij)^2.
 * All pairs are visited.
 */
export function stericClashLoss(conf: Conformation, vdwRadii: CoordinateBuffer, options: StericClashOptions = {}): LossEvaluation {
  const { bonds, threshold = DEFAULT_CLASH_THRESHOLD } = options;
  assertConformation(conf);
  assertRadii(vdwRadii, conf.count);
  assertNonNegative(threshold, "threshold");
  if (bonds) assertBonds(bonds, conf.count);

  const W = new WarningCollector();
  const n = conf.count;
  const gradient = new Float64Array(n * 3);
  if (n < 2) return { value: 0, gradient, warnings: [] };

  const excluded = bondedPairMask(bonds, n);
  const dist = pairwiseDistances(conf);
  let value = 0;
  for (let i = 0; i < n; i++) {
    for (let j = i + 1; j < n; j++) {
      const clash = threshold * (vdwRadii[i] + vdwRadii[j]) - Math.max(dist[i * n + j], EPS_NORM);
      if (clash <= 0 || excluded.has(pairKey(i, j, n))) continue;
      value += clash * clash;
      const d = dist[i * n + j];
      if (d < EPS_NORM) {
        W.add(`Atoms ${i} and ${j} coincide, clash gradient dropped`);
        continue;
      }
      // d(clash^2)/dr_i = -2 clash (r_i - r_j) / d
      const delta = sub(readVec3(conf.positions, i), readVec3(conf.positions, j));
      accumulate(gradient, i, delta, -2 * clash / d);
      accumulate(gradient, j, delta, 2 * clash / d);
    }
  }
  return { value, gradient, warnings: W.toArray() };
}
