import type { ChiralCenters, Conformation, LossEvaluation } from "../types/geometry.js";
import { accumulate, cross, dot, readVec3, sub } from "../utils/numeric.js";
import { assertAtomIndex, assertChiralCenters, assertConformation } from "../utils/validate.js";

/**
 * Signed volume det[n1 - c; n2 - c; n3 - c]. Swapping any two of the three neighbours flips its sign.
 */
export function signedVolume(conf: Conformation, center: number, n1: number, n2: number, n3: number): number {
  assertConformation(conf);
  assertAtomIndex(center, conf.count, "center");
  assertAtomIndex(n1, conf.count, "n1");
  assertAtomIndex(n2, conf.count, "n2");
  assertAtomIndex(n3, conf.count, "n3");
  const c = readVec3(conf.positions, center);
  const v1 = sub(readVec3(conf.positions, n1), c);
  const v2 = sub(readVec3(conf.positions, n2), c);
  const v3 = sub(readVec3(conf.positions, n3), c);
  return dot(v1, cross(v2, v3));
}

/**
 * Sum over stereocenters of relu(-V), V the signed volume of the first three neighbours.
 * The fourth neighbour is validated but does not enter the volume.
 */
export function chiralityLoss(conf: Conformation, chiral: ChiralCenters): LossEvaluation {
  assertConformation(conf);
  assertChiralCenters(chiral, conf.count);
  const gradient = new Float64Array(conf.count * 3);
  let value = 0;

  for (let s = 0; s < chiral.count; s++) {
    const center = chiral.centers[s];
    const n1 = chiral.neighbors[s * 4], n2 = chiral.neighbors[s * 4 + 1], n3 = chiral.neighbors[s * 4 + 2];
    const c = readVec3(conf.positions, center);
    const v1 = sub(readVec3(conf.positions, n1), c);
    const v2 = sub(readVec3(conf.positions, n2), c);
    const v3 = sub(readVec3(conf.positions, n3), c);
    const volume = dot(v1, cross(v2, v3));
    if (volume >= 0) continue;

    value -= volume;
    const d1 = cross(v2, v3), d2 = cross(v3, v1), d3 = cross(v1, v2);
    accumulate(gradient, n1, d1, -1);
    accumulate(gradient, n2, d2, -1);
    accumulate(gradient, n3, d3, -1);
    accumulate(gradient, center, d1, 1);
    accumulate(gradient, center, d2, 1);
    accumulate(gradient, center, d3, 1);
  }
  return { value, gradient, warnings: [] };
}
