/**
 * @tspline/core - T-spline evaluation kernel
 *
 * ## Primary API
 * - TSplineSession: transactional refinement, validation and evaluation
 *
 * ## Modules (for advanced use)
 * - num: numeric utilities, tolerances, predicates
 * - topo: half-edge T-mesh store, builders, mutation primitives
 * - knots: local knot inference and caching
 * - asts: analysis-suitability validation
 * - geom: basis functions, T-spline and NURBS surfaces
 * - mesh: surface tessellation
 */

// =============================================================================
// Primary API
// =============================================================================
export * from './api/index.js';

// =============================================================================
// Modules
// =============================================================================
export * from './topo/index.js';
export * from './knots/index.js';
export * from './asts/index.js';
export * from './geom/index.js';
export * from './mesh/index.js';

// Numeric types and utilities
export { vec2, type Vec2 } from './num/vec2.js';
export { vec3, type Vec3, normalize3, dot3, cross3, length3 } from './num/vec3.js';
export type { Vec4 } from './num/vec4.js';
export {
  type NumericContext,
  type Tolerances,
  createNumericContext,
  DEFAULT_TOLERANCES,
} from './num/tolerance.js';
export { orient2D, segmentsIntersect2D } from './num/predicates.js';
