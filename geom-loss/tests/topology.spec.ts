import { describe, it, expect } from "vitest";
import {
  GeometryInputError,
  angleTopology,
  bondTopology,
  bondedPairMask,
  chiralCenters,
  conformationFromPoints,
  pairwiseDistances,
  ringSet,
  safeNormalize,
} from "../src/index.js";

describe("topology builders", () => {
  it("flattens bonds into pairs and ideal lengths", () => {
    const bonds = bondTopology([[0, 1], [1, 2]], [1.5, 1.2]);
    expect(bonds.count).toBe(2);
    expect(Array.from(bonds.pairs)).toEqual([0, 1, 1, 2]);
    expect(Array.from(bonds.idealLength)).toEqual([1.5, 1.2]);
  });

  it("checks the arity of every tuple", () => {
    expect(() => bondTopology([[0, 1, 2]], [1])).toThrow("ShapeMismatch: bonds[0] has 3 indices, expected 2");
    expect(() => angleTopology([[0, 1]], [1])).toThrow("ShapeMismatch: angles[0] has 2 indices, expected 3");
    expect(() => conformationFromPoints([[0, 0]])).toThrow("ShapeMismatch: points[0] has 2 components, expected 3");
  });

  it("checks that ideal values line up with the tuples", () => {
    expect(() => bondTopology([[0, 1]], [1, 2])).toThrow("ShapeMismatch: idealLength has length 2, expected 1");
  });

  it("rejects negative and fractional indices", () => {
    expect(() => bondTopology([[0, -1]], [1])).toThrow(GeometryInputError);
    expect(() => angleTopology([[0, 1.5, 2]], [1])).toThrow("angles[0][1] = 1.5 is not a valid atom index");
  });

  it("keeps ring sets rectangular", () => {
    const rings = ringSet([[0, 1, 2, 3, 4], [5, 6, 7, 8, 9]]);
    expect(rings.size).toBe(5);
    expect(rings.atoms.length).toBe(10);
    expect(() => ringSet([[0, 1, 2, 3, 4, 5], [6, 7, 8, 9, 10]])).toThrow("rings[1] has 5 indices, expected 6");
    expect(ringSet([]).count).toBe(0);
  });

  it("builds chiral centers with four neighbours each", () => {
    const list = chiralCenters([{ center: 2, neighbors: [0, 1, 3, 4] }]);
    expect(Array.from(list.centers)).toEqual([2]);
    expect(Array.from(list.neighbors)).toEqual([0, 1, 3, 4]);
  });
});

describe("numeric helpers", () => {
  it("builds a symmetric distance matrix with a zero diagonal", () => {
    const d = pairwiseDistances(conformationFromPoints([[0, 0, 0], [3, 4, 0], [0, 0, 1]]));
    expect(Array.from(d.slice(0, 5))).toEqual([0, 5, 1, 5, 0]);
    expect(d[5]).toBeCloseTo(Math.sqrt(26), 12);
    expect(d[7]).toBe(d[5]);
    expect(d[6]).toBe(1);
    expect(d[8]).toBe(0);
  });

  it("masks bonded pairs regardless of order", () => {
    const mask = bondedPairMask(bondTopology([[2, 0]], [1]), 3);
    expect(mask.size).toBe(1);
    expect(mask.has(0 * 3 + 2)).toBe(true);
    expect(bondedPairMask(undefined, 3).size).toBe(0);
  });

  it("floors tiny vectors instead of dividing by zero", () => {
    expect(safeNormalize([0, 0, 0])).toEqual({ unit: [0, 0, 0], length: 1e-8, floored: true });
    expect(safeNormalize([0, 3, 4])).toEqual({ unit: [0, 0.6, 0.8], length: 5, floored: false });
  });
});
