/**
 * Geometric predicates
 *
 * Orientation and segment tests in the (s,t) parameter plane. Uses
 * Shewchuk-style adaptive precision robust predicates via mourner/robust-predicates
 * so that extension segments meeting exactly at a knot line are classified
 * consistently.
 */

import type { Vec2 } from './vec2.js';
import type { NumericContext } from './tolerance.js';
import { inClosedRange } from './tolerance.js';
import { orient2d as robustOrient2d } from 'robust-predicates';

/**
 * 2D orientation test using ROBUST predicates (Shewchuk)
 *
 * Returns the exact sign of the 2D cross product (b - a) × (c - a):
 * - positive (>0): c is to the left (counter-clockwise)
 * - negative (<0): c is to the right (clockwise)
 * - zero (0): c is collinear with a and b
 *
 * Note: robust-predicates uses the opposite sign convention, so we negate the result.
 */
export function orient2DRobust(a: Vec2, b: Vec2, c: Vec2): number {
  return -robustOrient2d(a[0], a[1], b[0], b[1], c[0], c[1]);
}

/**
 * 2D orientation test (tolerance-aware wrapper)
 *
 * Returns the orientation of point c relative to the directed line from a to b:
 * - 1: c is to the left (counter-clockwise)
 * - -1: c is to the right (clockwise)
 * - 0: c is collinear with a and b (within tolerance)
 */
export function orient2D(a: Vec2, b: Vec2, c: Vec2, ctx: NumericContext): -1 | 0 | 1 {
  const result = orient2DRobust(a, b, c);

  // The orient2d result is proportional to base * height, so compare
  // against tol * base_length.
  const dx = b[0] - a[0];
  const dy = b[1] - a[1];
  const baseLength = Math.sqrt(dx * dx + dy * dy);

  // Degenerate base (a == b): everything is collinear
  if (baseLength < ctx.tol.length) {
    return 0;
  }

  if (Math.abs(result) < ctx.tol.length * baseLength) {
    return 0;
  }
  return result > 0 ? 1 : -1;
}

/**
 * Check whether c, known to be collinear with a-b, lies within the
 * bounding box of segment a-b.
 */
function onSegment(a: Vec2, b: Vec2, c: Vec2, ctx: NumericContext): boolean {
  return inClosedRange(c[0], a[0], b[0], ctx) && inClosedRange(c[1], a[1], b[1], ctx);
}

/**
 * Closed segment intersection test.
 *
 * Segments that touch at an endpoint, or overlap collinearly, intersect.
 * Degenerate (point) segments are handled as points.
 */
export function segmentsIntersect2D(
  p1: Vec2,
  p2: Vec2,
  q1: Vec2,
  q2: Vec2,
  ctx: NumericContext
): boolean {
  const o1 = orient2D(p1, p2, q1, ctx);
  const o2 = orient2D(p1, p2, q2, ctx);
  const o3 = orient2D(q1, q2, p1, ctx);
  const o4 = orient2D(q1, q2, p2, ctx);

  if (o1 !== o2 && o3 !== o4) {
    return true;
  }

  if (o1 === 0 && onSegment(p1, p2, q1, ctx)) return true;
  if (o2 === 0 && onSegment(p1, p2, q2, ctx)) return true;
  if (o3 === 0 && onSegment(q1, q2, p1, ctx)) return true;
  if (o4 === 0 && onSegment(q1, q2, p2, ctx)) return true;

  return false;
}

/**
 * Intersection point of an axis-aligned horizontal segment (constant t)
 * and a vertical one (constant s), assuming they intersect.
 */
export function axisSegmentCrossing(horizontalT: number, verticalS: number): Vec2 {
  return [verticalS, horizontalT];
}
