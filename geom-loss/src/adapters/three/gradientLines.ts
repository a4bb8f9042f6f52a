import * as THREE from "three";
import type { Conformation } from "../../types/geometry.js";
import { shapeMismatch } from "../../utils/errors.js";

/**
 * Options for drawing per-atom descent directions.
 */
export interface GradientLineOptions {
  /** Segment length per unit of gradient magnitude. */
  scale?: number;
  color?: number | string | THREE.Color;
  /** Atoms whose gradient norm is at or below this get no segment. */
  minMagnitude?: number;
}

/**
 * Create a THREE.LineSegments with one segment per atom, from its position along -gradient.
 *
 * @returns LineSegments or undefined if no atom has a gradient above `minMagnitude`
 */
export function makeGradientLines(conf: Conformation, gradient: Float64Array, opts: GradientLineOptions = {}): THREE.LineSegments | undefined {
  const { scale = 1, color = 0xff5533, minMagnitude = 1e-9 } = opts;
  if (gradient.length !== conf.count * 3) throw shapeMismatch(`gradient has length ${gradient.length}, expected ${conf.count * 3}`);

  const p = conf.positions;
  const segs: number[] = [];
  for (let i = 0; i < conf.count; i++) {
    const gx = gradient[i * 3], gy = gradient[i * 3 + 1], gz = gradient[i * 3 + 2];
    if (Math.hypot(gx, gy, gz) <= minMagnitude) continue;
    const x = p[i * 3], y = p[i * 3 + 1], z = p[i * 3 + 2];
    segs.push(x, y, z, x - scale * gx, y - scale * gy, z - scale * gz);
  }
  if (segs.length === 0) return undefined;

  const geo = new THREE.BufferGeometry();
  geo.setAttribute("position", new THREE.BufferAttribute(new Float32Array(segs), 3));
  geo.computeBoundingSphere();
  const mat = new THREE.LineBasicMaterial({ color });
  return new THREE.LineSegments(geo, mat);
}
