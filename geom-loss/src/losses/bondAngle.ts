import type { AngleTopology, Conformation, LossEvaluation } from "../types/geometry.js";
import { EPS_COS, accumulate, dot, readVec3, safeNormalize, sub, type Vec3 } from "../utils/numeric.js";
import { assertAngles, assertConformation } from "../utils/validate.js";
import { WarningCollector } from "../utils/warnings.js";

/**
 * Mean squared deviation (radians) of i-j-k angles from their ideal values, j being the vertex.
 * The cosine is clamped away from ±1 before acos; a clamped angle passes no gradient.
 */
export function bondAngleLoss(conf: Conformation, angles: AngleTopology): LossEvaluation {
  assertConformation(conf);
  assertAngles(angles, conf.count);
  const W = new WarningCollector();
  const gradient = new Float64Array(conf.count * 3);
  if (angles.count === 0) return { value: 0, gradient, warnings: [] };

  const scale = 1 / angles.count;
  let value = 0;
  for (let a = 0; a < angles.count; a++) {
    const i = angles.triples[a * 3], j = angles.triples[a * 3 + 1], k = angles.triples[a * 3 + 2];
    const vertex = readVec3(conf.positions, j);
    const u = safeNormalize(sub(readVec3(conf.positions, i), vertex));
    const w = safeNormalize(sub(readVec3(conf.positions, k), vertex));

    const rawCos = dot(u.unit, w.unit);
    const cos = Math.min(1 - EPS_COS, Math.max(-1 + EPS_COS, rawCos));
    const theta = Math.acos(cos);
    const diff = theta - angles.idealAngle[a];
    value += diff * diff;

    if (u.floored || w.floored) {
      W.add(`Angle ${a} (${i}-${j}-${k}): zero-length arm, gradient dropped`);
      continue;
    }
    if (cos !== rawCos) continue;

    const g = 2 * scale * diff * (-1 / Math.sqrt(1 - cos * cos));
    // d cos / d arm = (other unit - cos * own unit) / own length
    const dI: Vec3 = [
      (w.unit[0] - cos * u.unit[0]) / u.length,
      (w.unit[1] - cos * u.unit[1]) / u.length,
      (w.unit[2] - cos * u.unit[2]) / u.length,
    ];
    const dK: Vec3 = [
      (u.unit[0] - cos * w.unit[0]) / w.length,
      (u.unit[1] - cos * w.unit[1]) / w.length,
      (u.unit[2] - cos * w.unit[2]) / w.length,
    ];
    accumulate(gradient, i, dI, g);
    accumulate(gradient, k, dK, g);
    accumulate(gradient, j, dI, -g);
    accumulate(gradient, j, dK, -g);
  }
  return { value: value * scale, gradient, warnings: W.toArray() };
}
