/**
 * Homogeneous 4D points
 *
 * Control points are stored as Cartesian (x, y, z) plus a weight w. Blending
 * works in weighted space: (w·x, w·y, w·z, w).
 */

import type { Vec3 } from './vec3.js';

export type Vec4 = [number, number, number, number];

/**
 * Lift a Cartesian point and weight into weighted homogeneous space
 */
export function toHomogeneous(p: Vec3, w: number): Vec4 {
  return [p[0] * w, p[1] * w, p[2] * w, w];
}

/**
 * Project a weighted homogeneous point back to Cartesian space.
 * The caller is responsible for checking the weight against tolerance.
 */
export function fromHomogeneous(h: Vec4): Vec3 {
  return [h[0] / h[3], h[1] / h[3], h[2] / h[3]];
}

/**
 * Linear interpolation between two homogeneous points
 */
export function lerp4(a: Vec4, b: Vec4, t: number): Vec4 {
  return [
    a[0] + (b[0] - a[0]) * t,
    a[1] + (b[1] - a[1]) * t,
    a[2] + (b[2] - a[2]) * t,
    a[3] + (b[3] - a[3]) * t,
  ];
}
