/**
 * Knot inference module
 *
 * Ray traversal through the T-mesh, local knot vectors and their cache.
 */

export { castRay, clampCrossings, type RayResult } from './traverse.js';
export {
  DEGREE,
  KNOTS_PER_SIDE,
  LOCAL_KNOT_COUNT,
  DEFAULT_KNOT_OPTIONS,
  inferLocalKnots,
  type KnotVector,
  type LocalKnots,
  type BoundaryMode,
  type KnotInferenceOptions,
} from './infer.js';
export { KnotCache } from './cache.js';
