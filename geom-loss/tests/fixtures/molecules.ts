import {
  angleTopology,
  bondTopology,
  conformationFromPoints,
  ringSet,
  type AngleTopology,
  type BondTopology,
  type Conformation,
  type RingSet,
} from "../../src/index.js";

export const CH_BOND = 1.09;
export const CC_AROMATIC = 1.4;
export const TETRAHEDRAL_109_5 = (109.5 * Math.PI) / 180;

export interface Molecule {
  conformation: Conformation;
  bonds: BondTopology;
  angles: AngleTopology;
  vdwRadii: Float64Array;
  rings?: RingSet;
}

/** CH4 with every C-H exactly `CH_BOND` long on the ideal tetrahedron. */
export function methane(angleTarget: number = TETRAHEDRAL_109_5): Molecule {
  const a = CH_BOND / Math.sqrt(3);
  return {
    conformation: conformationFromPoints([
      [0, 0, 0],
      [a, a, a],
      [-a, -a, a],
      [-a, a, -a],
      [a, -a, -a],
    ]),
    bonds: bondTopology([[0, 1], [0, 2], [0, 3], [0, 4]], [CH_BOND, CH_BOND, CH_BOND, CH_BOND]),
    angles: angleTopology(
      [[1, 0, 2], [1, 0, 3], [1, 0, 4], [2, 0, 3], [2, 0, 4], [3, 0, 4]],
      new Array<number>(6).fill(angleTarget)
    ),
    vdwRadii: Float64Array.from([1.7, 1.2, 1.2, 1.2, 1.2]),
  };
}

/** Planar C6H6 in z = 0; carbons 0-5, hydrogen i + 6 on carbon i. */
export function benzene(): Molecule {
  const points: number[][] = [];
  for (let i = 0; i < 6; i++) {
    const t = (i * Math.PI) / 3;
    points.push([CC_AROMATIC * Math.cos(t), CC_AROMATIC * Math.sin(t), 0]);
  }
  for (let i = 0; i < 6; i++) {
    const t = (i * Math.PI) / 3;
    points.push([(CC_AROMATIC + CH_BOND) * Math.cos(t), (CC_AROMATIC + CH_BOND) * Math.sin(t), 0]);
  }
  const ccBonds = [0, 1, 2, 3, 4, 5].map((i) => [i, (i + 1) % 6]);
  const chBonds = [0, 1, 2, 3, 4, 5].map((i) => [i, i + 6]);
  const cccAngles = [0, 1, 2, 3, 4, 5].map((i) => [i, (i + 1) % 6, (i + 2) % 6]);
  const cchAngles = [0, 1, 2, 3, 4, 5].map((i) => [(i + 5) % 6, i, i + 6]);
  const deg120 = (2 * Math.PI) / 3;
  return {
    conformation: conformationFromPoints(points),
    bonds: bondTopology([...ccBonds, ...chBonds], [...new Array<number>(6).fill(CC_AROMATIC), ...new Array<number>(6).fill(CH_BOND)]),
    angles: angleTopology([...cccAngles, ...cchAngles], new Array<number>(12).fill(deg120)),
    vdwRadii: Float64Array.from([...new Array<number>(6).fill(1.7), ...new Array<number>(6).fill(1.2)]),
    rings: ringSet([[0, 1, 2, 3, 4, 5]]),
  };
}

/** Copy of a conformation with `atom` moved by (dx, dy, dz). */
export function displaced(conf: Conformation, atom: number, dx: number, dy: number, dz: number): Conformation {
  const positions = Float64Array.from(conf.positions);
  positions[atom * 3] += dx;
  positions[atom * 3 + 1] += dy;
  positions[atom * 3 + 2] += dz;
  return { count: conf.count, positions };
}
