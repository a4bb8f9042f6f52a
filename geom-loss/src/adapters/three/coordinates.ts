import * as THREE from "three";
import type { Conformation } from "../../types/geometry.js";
import { shapeMismatch } from "../../utils/errors.js";

export function conformationFromVectors(points: readonly THREE.Vector3[]): Conformation {
  const positions = new Float64Array(points.length * 3);
  for (let i = 0; i < points.length; i++) {
    const v = points[i];
    positions[i * 3] = v.x;
    positions[i * 3 + 1] = v.y;
    positions[i * 3 + 2] = v.z;
  }
  return { count: points.length, positions };
}

/** One Vector3 per atom from an interleaved xyz buffer (positions or a gradient). */
export function vectorsFromBuffer(buffer: ArrayLike<number>): THREE.Vector3[] {
  if (buffer.length % 3 !== 0) throw shapeMismatch(`buffer has length ${buffer.length}, not a multiple of 3`);
  const out: THREE.Vector3[] = [];
  for (let o = 0; o < buffer.length; o += 3) out.push(new THREE.Vector3(buffer[o], buffer[o + 1], buffer[o + 2]));
  return out;
}
