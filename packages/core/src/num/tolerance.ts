/**
 * Tolerance model and numeric context
 *
 * Provides a centralized tolerance system for all parametric comparisons.
 * Knot equality, axis alignment and rational denominator checks should go
 * through these helpers rather than using raw comparisons.
 */

/**
 * Tolerance values for a mesh
 */
export interface Tolerances {
  /** Parametric length tolerance (knot and coordinate equality) */
  length: number;
  /** Smallest rational denominator accepted by evaluation */
  denominator: number;
}

/**
 * Numeric context containing tolerance information
 */
export interface NumericContext {
  tol: Tolerances;
}

/**
 * Default tolerances
 */
export const DEFAULT_TOLERANCES: Tolerances = {
  length: 1e-9,
  denominator: 1e-9,
};

/**
 * Create a default numeric context
 */
export function createNumericContext(tol?: Partial<Tolerances>): NumericContext {
  return {
    tol: {
      length: tol?.length ?? DEFAULT_TOLERANCES.length,
      denominator: tol?.denominator ?? DEFAULT_TOLERANCES.denominator,
    },
  };
}

/**
 * Check if a value is effectively zero (within length tolerance)
 */
export function isZero(value: number, ctx: NumericContext): boolean {
  return Math.abs(value) <= ctx.tol.length;
}

/**
 * Check if two numbers are equal within length tolerance
 */
export function eq(a: number, b: number, ctx: NumericContext): boolean {
  return Math.abs(a - b) <= ctx.tol.length;
}

/**
 * Check if a is less than b (with tolerance consideration)
 * Returns true if a < b - tol.length
 */
export function lt(a: number, b: number, ctx: NumericContext): boolean {
  return a < b - ctx.tol.length;
}

/**
 * Check if a is greater than b (with tolerance consideration)
 */
export function gt(a: number, b: number, ctx: NumericContext): boolean {
  return a > b + ctx.tol.length;
}

/**
 * Check whether `value` lies in the closed interval spanned by `a` and `b`
 * (in either order), widened by the length tolerance.
 */
export function inClosedRange(value: number, a: number, b: number, ctx: NumericContext): boolean {
  const lo = Math.min(a, b);
  const hi = Math.max(a, b);
  return value >= lo - ctx.tol.length && value <= hi + ctx.tol.length;
}
