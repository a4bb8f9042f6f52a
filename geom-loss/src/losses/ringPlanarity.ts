import type { Conformation, LossEvaluation, RingBatch, RingSet } from "../types/geometry.js";
import { symmetricEigen3 } from "../utils/eigen.js";
import { EPS_GAP } from "../utils/numeric.js";
import { assertConformation, assertLength, assertRingBatch, assertRingSet } from "../utils/validate.js";
import { WarningCollector } from "../utils/warnings.js";

/** Copies ring atom coordinates out of a conformation, ring by ring. */
export function gatherRings(conf: Conformation, rings: RingSet): RingBatch {
  assertConformation(conf);
  assertRingSet(rings, conf.count);
  const n = rings.count * rings.size;
  const positions = new Float64Array(n * 3);
  for (let r = 0; r < n; r++) {
    const a = rings.atoms[r];
    positions[r * 3] = conf.positions[a * 3];
    positions[r * 3 + 1] = conf.positions[a * 3 + 1];
    positions[r * 3 + 2] = conf.positions[a * 3 + 2];
  }
  return { count: rings.count, size: rings.size, positions };
}

/** Adds a per-ring-position gradient back onto atoms; atoms shared by rings accumulate. */
export function scatterRingGradient(rings: RingSet, ringGradient: Float64Array, atomCount: number): Float64Array {
  assertRingSet(rings, atomCount);
  assertLength(ringGradient.length, rings.count * rings.size * 3, "ringGradient");
  const out = new Float64Array(atomCount * 3);
  const n = rings.count * rings.size;
  for (let r = 0; r < n; r++) {
    const a = rings.atoms[r];
    out[a * 3] += ringGradient[r * 3];
    out[a * 3 + 1] += ringGradient[r * 3 + 1];
    out[a * 3 + 2] += ringGradient[r * 3 + 2];
  }
  return out;
}

/**
 * Mean squared distance of ring atoms from each ring's best-fit plane.
 *
 * The plane normal is the eigenvector of the smallest eigenvalue of the centred 3×3 scatter
 * matrix. Since the summed squared distances of a ring equal that eigenvalue, its gradient on
 * ring atom a is 2 (c_a · n) n; the centroid contributes nothing because the centred
 * coordinates sum to zero. The returned gradient has the layout of `batch.positions`.
 */
export function ringPlanarityLoss(batch: RingBatch): LossEvaluation {
  assertRingBatch(batch);
  const W = new WarningCollector();
  const gradient = new Float64Array(batch.positions.length);
  if (batch.count === 0) return { value: 0, gradient, warnings: [] };

  const { size } = batch;
  const p = batch.positions;
  const scale = 1 / (batch.count * size);
  const centered = new Float64Array(size * 3);
  let value = 0;

  for (let r = 0; r < batch.count; r++) {
    const base = r * size * 3;
    let cx = 0, cy = 0, cz = 0;
    for (let a = 0; a < size; a++) {
      cx += p[base + a * 3];
      cy += p[base + a * 3 + 1];
      cz += p[base + a * 3 + 2];
    }
    cx /= size; cy /= size; cz /= size;

    const cov = new Float64Array(9);
    for (let a = 0; a < size; a++) {
      const x = p[base + a * 3] - cx, y = p[base + a * 3 + 1] - cy, z = p[base + a * 3 + 2] - cz;
      centered[a * 3] = x; centered[a * 3 + 1] = y; centered[a * 3 + 2] = z;
      cov[0] += x * x; cov[1] += x * y; cov[2] += x * z;
      cov[4] += y * y; cov[5] += y * z;
      cov[8] += z * z;
    }
    cov[3] = cov[1]; cov[6] = cov[2]; cov[7] = cov[5];

    const { values, vectors } = symmetricEigen3(cov);
    if (values[1] - values[0] <= EPS_GAP * Math.max(1, values[2])) {
      W.add(`Ring ${r}: atoms are collinear or coincident, fitted plane is ill-defined`);
    }
    const [nx, ny, nz] = vectors[0];
    for (let a = 0; a < size; a++) {
      const d = centered[a * 3] * nx + centered[a * 3 + 1] * ny + centered[a * 3 + 2] * nz;
      value += d * d;
      const g = 2 * scale * d;
      gradient[base + a * 3] = g * nx;
      gradient[base + a * 3 + 1] = g * ny;
      gradient[base + a * 3 + 2] = g * nz;
    }
  }
  return { value: value * scale, gradient, warnings: W.toArray() };
}

/** Ring planarity evaluated directly on a conformation; the gradient is per atom. */
export function ringSetPlanarityLoss(conf: Conformation, rings: RingSet): LossEvaluation {
  const res = ringPlanarityLoss(gatherRings(conf, rings));
  return { value: res.value, gradient: scatterRingGradient(rings, res.gradient, conf.count), warnings: res.warnings };
}
