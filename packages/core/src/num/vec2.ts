/**
 * 2D points in the (s, t) parameter plane
 *
 * Represented as tuples [number, number].
 */

export type Vec2 = [number, number];

/**
 * Create a 2D vector
 */
export function vec2(s: number, t: number): Vec2 {
  return [s, t];
}
