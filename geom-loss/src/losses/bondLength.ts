import type { BondTopology, Conformation, LossEvaluation } from "../types/geometry.js";
import { accumulate, readVec3, safeNormalize, sub } from "../utils/numeric.js";
import { assertBonds, assertConformation } from "../utils/validate.js";
import { WarningCollector } from "../utils/warnings.js";

/**
 * Mean squared deviation of bonded distances from their ideal lengths.
 *
 * Gradient on each endpoint is 2/B (d - ideal) times the unit bond vector, with opposite
 * signs on the two atoms. Bonds whose atoms coincide have no direction and get no gradient.
 */
export function bondLengthLoss(conf: Conformation, bonds: BondTopology): LossEvaluation {
  assertConformation(conf);
  assertBonds(bonds, conf.count);
  const W = new WarningCollector();
  const gradient = new Float64Array(conf.count * 3);
  if (bonds.count === 0) return { value: 0, gradient, warnings: [] };

  const scale = 1 / bonds.count;
  let value = 0;
  for (let b = 0; b < bonds.count; b++) {
    const i = bonds.pairs[b * 2], j = bonds.pairs[b * 2 + 1];
    const { unit, length, floored } = safeNormalize(sub(readVec3(conf.positions, i), readVec3(conf.positions, j)));
    const diff = length - bonds.idealLength[b];
    value += diff * diff;
    if (floored) {
      W.add(`Bond ${b} (${i}-${j}): atoms coincide, length floored and gradient dropped`);
      continue;
    }
    accumulate(gradient, i, unit, 2 * scale * diff);
    accumulate(gradient, j, unit, -2 * scale * diff);
  }
  return { value: value * scale, gradient, warnings: W.toArray() };
}
