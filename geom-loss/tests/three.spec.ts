import { describe, it, expect } from "vitest";
import * as THREE from "three";
import {
  bondTopology,
  bondLengthLoss,
  conformationFromVectors,
  makeGradientLines,
  vectorsFromBuffer,
} from "../src/index.js";

describe("three adapters", () => {
  it("reads atom positions from Vector3s", () => {
    const conf = conformationFromVectors([new THREE.Vector3(1, 2, 3), new THREE.Vector3(-1, 0, 0.5)]);
    expect(conf.count).toBe(2);
    expect(Array.from(conf.positions)).toEqual([1, 2, 3, -1, 0, 0.5]);
  });

  it("splits a gradient into per-atom vectors", () => {
    const vs = vectorsFromBuffer(Float64Array.from([1, 0, 0, 0, -2, 0]));
    expect(vs).toHaveLength(2);
    expect(vs[1]).toBeInstanceOf(THREE.Vector3);
    expect(vs[1].y).toBe(-2);
  });

  it("rejects a buffer that is not whole xyz triples", () => {
    expect(() => vectorsFromBuffer(Float64Array.from([1, 2, 3, 4]))).toThrow("ShapeMismatch: buffer has length 4, not a multiple of 3");
  });

  it("draws one descent segment per atom with a gradient", () => {
    const conf = conformationFromVectors([new THREE.Vector3(0, 0, 0), new THREE.Vector3(2, 0, 0), new THREE.Vector3(0, 5, 0)]);
    const { gradient } = bondLengthLoss(conf, bondTopology([[0, 1]], [1.5]));
    const lines = makeGradientLines(conf, gradient, { scale: 0.5 });
    expect(lines).toBeInstanceOf(THREE.LineSegments);
    const pos = lines?.geometry.getAttribute("position");
    expect(pos?.count).toBe(4);
    // atom 0 has gradient (-1, 0, 0): its segment runs from the origin to +0.5 x
    expect(pos?.getX(1)).toBe(0.5);
    // atom 1 has gradient (1, 0, 0): its segment runs from 2 to 1.5
    expect(pos?.getX(2)).toBe(2);
    expect(pos?.getX(3)).toBe(1.5);
  });

  it("returns undefined when nothing moves", () => {
    const conf = conformationFromVectors([new THREE.Vector3(0, 0, 0)]);
    expect(makeGradientLines(conf, new Float64Array(3))).toBeUndefined();
  });

  it("rejects a gradient of the wrong size", () => {
    const conf = conformationFromVectors([new THREE.Vector3(0, 0, 0)]);
    expect(() => makeGradientLines(conf, new Float64Array(6))).toThrow("ShapeMismatch: gradient has length 6, expected 3");
  });
});
