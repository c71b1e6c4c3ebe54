/**
 * Types for the session API
 *
 * Session operations never throw for expected failures. They return a
 * MutationResult, a discriminated union over the core error hierarchy.
 */

import type { TMeshError } from '../topo/errors.js';
import type { VertexId } from '../topo/handles.js';
import type { BoundaryMode } from '../knots/infer.js';
import type { AstsReport } from '../asts/validate.js';

// ============================================================================
// Result Types
// ============================================================================

/**
 * Result of a session operation
 *
 * Usage:
 * ```ts
 * const result = session.insertTJunction(edge, 2.5);
 * if (result.ok) {
 *   const { from, to } = result.value.value;
 * } else {
 *   console.error(result.error.kind, result.error.message);
 * }
 * ```
 */
export type MutationResult<T> = { ok: true; value: T } | { ok: false; error: TMeshError };

export function success<T>(value: T): MutationResult<T> {
  return { ok: true, value };
}

export function failure<T>(error: TMeshError): MutationResult<T> {
  return { ok: false, error };
}

/**
 * What a committed mutation did
 */
export interface MutationOutcome<T> {
  /** Return value of the primitive */
  value: T;
  /** ASTS report of the committed mesh */
  report: AstsReport;
  /** Vertices created by T-junction propagation, in creation order */
  propagated: VertexId[];
  /** Vertices whose cached knots were dropped */
  invalidated: VertexId[];
}

// ============================================================================
// Options
// ============================================================================

/**
 * What to do when a mutation breaks analysis-suitability
 *
 * - `reject`: roll the mutation back and report the violations
 * - `propagate`: extend offending T-junctions until the mesh is valid again
 */
export type ViolationPolicy = 'reject' | 'propagate';

export interface TSplineSessionOptions {
  policy?: ViolationPolicy;
  /** Propagation rounds before giving up */
  maxPropagationSteps?: number;
  boundary?: BoundaryMode;
  verbose?: boolean;
  /** Log sink used when verbose; console.log by default */
  logger?: (message: string) => void;
}

export const DEFAULT_SESSION_OPTIONS: Required<TSplineSessionOptions> = {
  policy: 'reject',
  maxPropagationSteps: 64,
  boundary: 'repeat',
  verbose: false,
  logger: (message) => console.log(message),
};
