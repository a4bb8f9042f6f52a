import type { BondTopology, Conformation } from "../types/geometry.js";

/** Floor applied to vector norms before dividing by them. */
export const EPS_NORM = 1e-8;
/** Cosines are clamped to [-1 + EPS_COS, 1 - EPS_COS] before acos. */
export const EPS_COS = 1e-7;
/** Eigenvalue gap under which a fitted ring normal is reported as ill-defined. */
export const EPS_GAP = 1e-10;

export type Vec3 = [number, number, number];

export function readVec3(buf: ArrayLike<number>, index: number): Vec3 {
  const o = index * 3;
  return [buf[o], buf[o + 1], buf[o + 2]];
}

export function sub(a: Vec3, b: Vec3): Vec3 {
  return [a[0] - b[0], a[1] - b[1], a[2] - b[2]];
}

export function dot(a: Vec3, b: Vec3): number {
  return a[0] * b[0] + a[1] * b[1] + a[2] * b[2];
}

export function cross(a: Vec3, b: Vec3): Vec3 {
  return [
    a[1] * b[2] - a[2] * b[1],
    a[2] * b[0] - a[0] * b[2],
    a[0] * b[1] - a[1] * b[0],
  ];
}

export function norm(v: Vec3): number {
  return Math.hypot(v[0], v[1], v[2]);
}

/** grad[index] += s * v */
export function accumulate(grad: Float64Array, index: number, v: Vec3, s: number): void {
  const o = index * 3;
  grad[o] += s * v[0];
  grad[o + 1] += s * v[1];
  grad[o + 2] += s * v[2];
}

export interface SafeNormalized {
  unit: Vec3;
  length: number;
  /** The raw length was below EPS_NORM; `length` is the floor and `unit` is zero. */
  floored: boolean;
}

export function safeNormalize(v: Vec3): SafeNormalized {
  const len = norm(v);
  if (len < EPS_NORM) return { unit: [0, 0, 0], length: EPS_NORM, floored: true };
  return { unit: [v[0] / len, v[1] / len, v[2] / len], length: len, floored: false };
}

/** Full N×N distance matrix, row-major. */
export function pairwiseDistances(conf: Conformation): Float64Array {
  const n = conf.count;
  const p = conf.positions;
  const out = new Float64Array(n * n);
  for (let i = 0; i < n; i++) {
    const xi = p[i * 3], yi = p[i * 3 + 1], zi = p[i * 3 + 2];
    for (let j = i + 1; j < n; j++) {
      const d = Math.hypot(xi - p[j * 3], yi - p[j * 3 + 1], zi - p[j * 3 + 2]);
      out[i * n + j] = d;
      out[j * n + i] = d;
    }
  }
  return out;
}

export function pairKey(a: number, b: number, count: number): number {
  return a < b ? a * count + b : b * count + a;
}

/** Keys (see pairKey) of every bonded pair, for excluding them from non-bonded terms. */
export function bondedPairMask(bonds: BondTopology | undefined, count: number): Set<number> {
  const mask = new Set<number>();
  if (!bonds) return mask;
  for (let b = 0; b < bonds.count; b++) {
    mask.add(pairKey(bonds.pairs[b * 2], bonds.pairs[b * 2 + 1], count));
  }
  return mask;
}
