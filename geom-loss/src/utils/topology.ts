import type { AngleTopology, BondTopology, ChiralCenters, Conformation, RingSet } from "../types/geometry.js";
import { shapeMismatch } from "./errors.js";

// Builders from plain nested arrays. Each tuple's arity is checked here, since the
// flat typed arrays they produce can no longer tell a short tuple from a long list.

function flatten(tuples: ReadonlyArray<readonly number[]>, arity: number, label: string): Uint32Array {
  const out = new Uint32Array(tuples.length * arity);
  for (let t = 0; t < tuples.length; t++) {
    const tuple = tuples[t];
    if (tuple.length !== arity) throw shapeMismatch(`${label}[${t}] has ${tuple.length} indices, expected ${arity}`);
    for (let k = 0; k < arity; k++) {
      const idx = tuple[k];
      if (!Number.isInteger(idx) || idx < 0) throw shapeMismatch(`${label}[${t}][${k}] = ${idx} is not a valid atom index`);
      out[t * arity + k] = idx;
    }
  }
  return out;
}

function toFloat64(values: ArrayLike<number>, expected: number, label: string): Float64Array {
  if (values.length !== expected) throw shapeMismatch(`${label} has length ${values.length}, expected ${expected}`);
  return Float64Array.from(values);
}

export function conformationFromPoints(points: ReadonlyArray<readonly number[]>): Conformation {
  const positions = new Float64Array(points.length * 3);
  for (let i = 0; i < points.length; i++) {
    const p = points[i];
    if (p.length !== 3) throw shapeMismatch(`points[${i}] has ${p.length} components, expected 3`);
    positions[i * 3] = p[0];
    positions[i * 3 + 1] = p[1];
    positions[i * 3 + 2] = p[2];
  }
  return { count: points.length, positions };
}

export function bondTopology(pairs: ReadonlyArray<readonly number[]>, idealLength: ArrayLike<number>): BondTopology {
  return {
    count: pairs.length,
    pairs: flatten(pairs, 2, "bonds"),
    idealLength: toFloat64(idealLength, pairs.length, "idealLength"),
  };
}

export function angleTopology(triples: ReadonlyArray<readonly number[]>, idealAngle: ArrayLike<number>): AngleTopology {
  return {
    count: triples.length,
    triples: flatten(triples, 3, "angles"),
    idealAngle: toFloat64(idealAngle, triples.length, "idealAngle"),
  };
}

/** All rings must share one size; split differently sized rings into separate sets. */
export function ringSet(rings: ReadonlyArray<readonly number[]>): RingSet {
  if (rings.length === 0) return { count: 0, size: 0, atoms: new Uint32Array(0) };
  const size = rings[0].length;
  if (size < 3) throw shapeMismatch(`rings[0] has ${size} atoms, a ring needs at least 3`);
  return { count: rings.length, size, atoms: flatten(rings, size, "rings") };
}

export function chiralCenters(list: ReadonlyArray<{ center: number; neighbors: readonly number[] }>): ChiralCenters {
  return {
    count: list.length,
    centers: flatten(list.map((c) => [c.center]), 1, "centers"),
    neighbors: flatten(list.map((c) => c.neighbors), 4, "neighbors"),
  };
}
