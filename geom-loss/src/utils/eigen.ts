import type { Vec3 } from "./numeric.js";

export interface SymmetricEigen3 {
  /** Ascending. */
  values: Vec3;
  /** vectors[k] is the unit eigenvector of values[k]. */
  vectors: [Vec3, Vec3, Vec3];
}

const MAX_SWEEPS = 50;

/**
 * Eigen-decomposition of a symmetric 3×3 matrix (row-major, length 9) by cyclic Jacobi rotations.
 * Only the upper triangle is read.
 */
export function symmetricEigen3(m: ArrayLike<number>): SymmetricEigen3 {
  const a = [
    [m[0], m[1], m[2]],
    [m[1], m[4], m[5]],
    [m[2], m[5], m[8]],
  ];
  const v = [
    [1, 0, 0],
    [0, 1, 0],
    [0, 0, 1],
  ];

  for (let sweep = 0; sweep < MAX_SWEEPS; sweep++) {
    if (a[0][1] === 0 && a[0][2] === 0 && a[1][2] === 0) break;
    for (let p = 0; p < 2; p++) {
      for (let q = p + 1; q < 3; q++) {
        const apq = a[p][q];
        if (apq === 0) continue;
        // off-diagonal already negligible against the diagonal: drop it
        if (Math.abs(apq) < 1e-18 * (Math.abs(a[p][p]) + Math.abs(a[q][q]))) {
          a[p][q] = 0;
          a[q][p] = 0;
          continue;
        }
        const theta = (a[q][q] - a[p][p]) / (2 * apq);
        const t = Math.sign(theta || 1) / (Math.abs(theta) + Math.sqrt(theta * theta + 1));
        const c = 1 / Math.sqrt(t * t + 1);
        const s = t * c;
        for (let k = 0; k < 3; k++) {
          const akp = a[k][p], akq = a[k][q];
          a[k][p] = c * akp - s * akq;
          a[k][q] = s * akp + c * akq;
        }
        for (let k = 0; k < 3; k++) {
          const apk = a[p][k], aqk = a[q][k];
          a[p][k] = c * apk - s * aqk;
          a[q][k] = s * apk + c * aqk;
        }
        a[p][q] = 0;
        a[q][p] = 0;
        for (let k = 0; k < 3; k++) {
          const vkp = v[k][p], vkq = v[k][q];
          v[k][p] = c * vkp - s * vkq;
          v[k][q] = s * vkp + c * vkq;
        }
      }
    }
  }

  const order = [0, 1, 2].sort((i, j) => a[i][i] - a[j][j]);
  const column = (k: number): Vec3 => [v[0][k], v[1][k], v[2][k]];
  return {
    values: [a[order[0]][order[0]], a[order[1]][order[1]], a[order[2]][order[2]]],
    vectors: [column(order[0]), column(order[1]), column(order[2])],
  };
}
