import type {
  AngleTopology,
  BondTopology,
  ChiralCenters,
  Conformation,
  CoordinateBuffer,
  RingBatch,
  RingSet,
} from "../types/geometry.js";
import { invalidValue, shapeMismatch } from "./errors.js";

function assertCount(count: number, label: string): void {
  if (!Number.isInteger(count) || count < 0) throw shapeMismatch(`${label}.count must be a non-negative integer, got ${count}`);
}

export function assertLength(actual: number, expected: number, label: string): void {
  if (actual !== expected) throw shapeMismatch(`${label} has length ${actual}, expected ${expected}`);
}

function assertIndices(indices: Uint32Array, atomCount: number, label: string): void {
  for (let i = 0; i < indices.length; i++) {
    const a = indices[i];
    if (a >= atomCount) throw shapeMismatch(`${label}[${i}] = ${a} is outside [0, ${atomCount})`);
  }
}

export function assertAtomIndex(index: number, atomCount: number, label: string): void {
  if (!Number.isInteger(index) || index < 0 || index >= atomCount) {
    throw shapeMismatch(`${label} = ${index} is outside [0, ${atomCount})`);
  }
}

export function assertConformation(conf: Conformation): void {
  assertCount(conf.count, "conformation");
  assertLength(conf.positions.length, conf.count * 3, "conformation.positions");
}

export function assertBonds(bonds: BondTopology, atomCount: number): void {
  assertCount(bonds.count, "bonds");
  assertLength(bonds.pairs.length, bonds.count * 2, "bonds.pairs");
  assertLength(bonds.idealLength.length, bonds.count, "bonds.idealLength");
  assertIndices(bonds.pairs, atomCount, "bonds.pairs");
  for (let b = 0; b < bonds.count; b++) {
    if (bonds.pairs[b * 2] === bonds.pairs[b * 2 + 1]) throw shapeMismatch(`bond ${b} joins atom ${bonds.pairs[b * 2]} to itself`);
  }
}

export function assertAngles(angles: AngleTopology, atomCount: number): void {
  assertCount(angles.count, "angles");
  assertLength(angles.triples.length, angles.count * 3, "angles.triples");
  assertLength(angles.idealAngle.length, angles.count, "angles.idealAngle");
  assertIndices(angles.triples, atomCount, "angles.triples");
  for (let a = 0; a < angles.count; a++) {
    const i = angles.triples[a * 3], j = angles.triples[a * 3 + 1], k = angles.triples[a * 3 + 2];
    if (i === j || k === j) throw shapeMismatch(`angle ${a} (${i}, ${j}, ${k}) reuses its vertex atom`);
    if (i === k) throw shapeMismatch(`angle ${a} (${i}, ${j}, ${k}) has the same atom at both ends`);
  }
}

export function assertRingSet(rings: RingSet, atomCount: number): void {
  assertCount(rings.count, "rings");
  if (rings.count > 0 && (!Number.isInteger(rings.size) || rings.size < 3)) {
    throw shapeMismatch(`rings.size must be an integer >= 3, got ${rings.size}`);
  }
  assertLength(rings.atoms.length, rings.count * rings.size, "rings.atoms");
  assertIndices(rings.atoms, atomCount, "rings.atoms");
}

export function assertRingBatch(batch: RingBatch): void {
  assertCount(batch.count, "ringBatch");
  if (batch.count > 0 && (!Number.isInteger(batch.size) || batch.size < 3)) {
    throw shapeMismatch(`ringBatch.size must be an integer >= 3, got ${batch.size}`);
  }
  assertLength(batch.positions.length, batch.count * batch.size * 3, "ringBatch.positions");
}

export function assertChiralCenters(chiral: ChiralCenters, atomCount: number): void {
  assertCount(chiral.count, "chiralCenters");
  assertLength(chiral.centers.length, chiral.count, "chiralCenters.centers");
  assertLength(chiral.neighbors.length, chiral.count * 4, "chiralCenters.neighbors");
  assertIndices(chiral.centers, atomCount, "chiralCenters.centers");
  assertIndices(chiral.neighbors, atomCount, "chiralCenters.neighbors");
  for (let s = 0; s < chiral.count; s++) {
    const atoms = [chiral.centers[s], ...chiral.neighbors.subarray(s * 4, s * 4 + 4)];
    if (new Set(atoms).size !== 5) {
      throw shapeMismatch(`chiral center ${s} (${atoms[0]}; ${atoms.slice(1).join(", ")}) repeats an atom`);
    }
  }
}

export function assertRadii(radii: CoordinateBuffer, atomCount: number): void {
  assertLength(radii.length, atomCount, "vdwRadii");
  for (let i = 0; i < radii.length; i++) {
    const r = radii[i];
    if (!Number.isFinite(r) || r < 0) throw invalidValue(`vdwRadii[${i}] = ${r} must be finite and >= 0`);
  }
}

export function assertNonNegative(value: number, label: string): void {
  if (!Number.isFinite(value) || value < 0) throw invalidValue(`${label} = ${value} must be finite and >= 0`);
}
