/**
 * T-mesh error types
 *
 * Every failure the core reports is a TMeshError subclass with a `kind`
 * discriminant, so callers can switch on the kind and still read the
 * offending entities from the concrete class.
 */

import type { ZodIssue } from 'zod';
import type { VertexId, HalfEdgeId } from './handles.js';
import type { ValidationReport } from './validate.js';
import type { AstsViolation } from '../asts/validate.js';

export type TMeshErrorKind =
  | 'InvalidIndex'
  | 'TopologyCorrupt'
  | 'BoundaryEdge'
  | 'AmbiguousTraversal'
  | 'AstsViolation'
  | 'DegenerateParameter';

export type EntityKind = 'vertex' | 'halfEdge' | 'face';

export abstract class TMeshError extends Error {
  abstract readonly kind: TMeshErrorKind;

  constructor(message: string) {
    super(message);
    this.name = this.constructor.name;
  }
}

/**
 * Identity never allocated, or retired by a later mutation
 */
export class InvalidIndexError extends TMeshError {
  readonly kind = 'InvalidIndex' as const;

  constructor(
    readonly entity: EntityKind,
    readonly id: number,
    readonly reason: 'unallocated' | 'retired' = 'unallocated'
  ) {
    super(`Invalid ${entity} index ${id} (${reason})`);
  }
}

/**
 * Loop closure, twin symmetry or another structural invariant is broken
 */
export class TopologyCorruptError extends TMeshError {
  readonly kind = 'TopologyCorrupt' as const;

  constructor(message: string, readonly report?: ValidationReport) {
    super(message);
  }
}

/**
 * A topology description that does not match the input schema
 */
export class DescriptionError extends TopologyCorruptError {
  constructor(readonly issues: ZodIssue[]) {
    super(
      `Invalid topology description: ${issues
        .map((i) => `${i.path.join('.') || '<root>'}: ${i.message}`)
        .join('; ')}`
    );
  }
}

export class BoundaryEdgeError extends TMeshError {
  readonly kind = 'BoundaryEdge' as const;

  constructor(readonly halfEdge: HalfEdgeId, operation: string) {
    super(`${operation} requires an interior edge, but half-edge ${halfEdge} lies on the boundary`);
  }
}

export class AmbiguousTraversalError extends TMeshError {
  readonly kind = 'AmbiguousTraversal' as const;

  constructor(readonly vertex: VertexId, readonly reason: string) {
    super(`Ambiguous traversal at vertex ${vertex}: ${reason}`);
  }
}

export class AstsViolationError extends TMeshError {
  readonly kind = 'AstsViolation' as const;

  constructor(readonly violations: readonly AstsViolation[]) {
    super(
      `Mesh is not analysis-suitable: ${violations.length} crossing extension pair(s) (${violations
        .map((v) => `${v.horizontal}x${v.vertical}`)
        .join(', ')})`
    );
  }
}

export class DegenerateParameterError extends TMeshError {
  readonly kind = 'DegenerateParameter' as const;

  constructor(readonly u: number, readonly v: number, readonly denominator: number) {
    super(`Degenerate parameter (${u}, ${v}): rational denominator ${denominator} is below tolerance`);
  }
}

export function isTMeshError(error: unknown): error is TMeshError {
  return error instanceof TMeshError;
}
