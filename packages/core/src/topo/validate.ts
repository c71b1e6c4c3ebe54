/**
 * T-mesh topology validation
 *
 * Provides comprehensive validation of a T-mesh to detect:
 * - Structural issues (dangling references, broken cycles)
 * - Twin asymmetry and non-manifold vertex fans
 * - Parametric inconsistencies (misaligned edges, wrong knot intervals)
 * - Degenerate entities (zero-length edges, clockwise or collapsed faces)
 *
 * Validation reads the raw tables and never throws on corrupt input, so it
 * can run on a description before the mesh is handed to anything else.
 */

import type { TMesh } from './TMesh.js';
import { asFaceId, asHalfEdgeId, asVertexId, isNullId, type HalfEdgeId } from './handles.js';
import { eq, isZero } from '../num/tolerance.js';

/**
 * Types of validation issues
 */
export type ValidationIssueKind =
  | 'invalidIndex'
  | 'deletedReference'
  | 'isolatedVertex'
  | 'outgoingMismatch'
  | 'nonManifoldVertex'
  | 'twinMismatch'
  | 'twinDirectionMismatch'
  | 'brokenLoopCycle'
  | 'loopNotClosed'
  | 'loopFaceMismatch'
  | 'axisMisaligned'
  | 'intervalMismatch'
  | 'zeroLengthEdge'
  | 'faceOrientation'
  | 'degenerateFace';

/**
 * Severity levels for validation issues
 */
export type ValidationSeverity = 'error' | 'warning' | 'info';

/**
 * Entity reference for validation issues
 */
export interface ValidationEntityRef {
  type: 'vertex' | 'halfEdge' | 'face';
  id: number;
}

/**
 * A single validation issue
 */
export interface ValidationIssue {
  /** Type of the issue */
  kind: ValidationIssueKind;
  /** Severity level */
  severity: ValidationSeverity;
  /** Human-readable description */
  message: string;
  /** The entity where the issue was found */
  subshape: ValidationEntityRef;
  /** Related entities involved in the issue */
  related?: ValidationEntityRef[];
}

/**
 * Complete validation report
 */
export interface ValidationReport {
  /** Whether the mesh is valid (no errors) */
  isValid: boolean;
  /** All validation issues found */
  issues: ValidationIssue[];
  /** Count by severity */
  errorCount: number;
  warningCount: number;
  infoCount: number;
}

/**
 * Validation options
 */
export interface ValidationOptions {
  /** Require counter-clockwise face loops in (s,t) */
  checkOrientation?: boolean;
  /** Require each edge's knot interval to match its parametric length */
  checkIntervals?: boolean;
  /** Report vertices without edges as errors instead of warnings */
  rejectIsolatedVertices?: boolean;
}

const DEFAULT_OPTIONS: Required<ValidationOptions> = {
  checkOrientation: true,
  checkIntervals: true,
  rejectIsolatedVertices: false,
};

/**
 * Create an empty validation report
 */
function createReport(): ValidationReport {
  return {
    isValid: true,
    issues: [],
    errorCount: 0,
    warningCount: 0,
    infoCount: 0,
  };
}

/**
 * Add an issue to the report
 */
function addIssue(
  report: ValidationReport,
  kind: ValidationIssueKind,
  severity: ValidationSeverity,
  message: string,
  subshape: ValidationEntityRef,
  related?: ValidationEntityRef[]
): void {
  report.issues.push({ kind, severity, message, subshape, related });

  if (severity === 'error') {
    report.errorCount++;
    report.isValid = false;
  } else if (severity === 'warning') {
    report.warningCount++;
  } else {
    report.infoCount++;
  }
}

/**
 * Validate the complete mesh
 *
 * @param mesh The mesh to validate
 * @param options Validation options
 * @returns Validation report with all issues found
 */
export function validateTMesh(mesh: TMesh, options: ValidationOptions = {}): ValidationReport {
  const opts = { ...DEFAULT_OPTIONS, ...options };
  const report = createReport();

  // Half-edges with dangling references are skipped by the later passes
  const sound = validateHalfEdgeReferences(mesh, report);
  validateVertices(mesh, report, sound, opts);
  validateTwins(mesh, report, sound);
  validateLoops(mesh, report, sound, opts);
  validateParameters(mesh, report, sound, opts);

  return report;
}

function halfEdgeRef(id: number): ValidationEntityRef {
  return { type: 'halfEdge', id };
}

function vertexRef(id: number): ValidationEntityRef {
  return { type: 'vertex', id };
}

function faceRef(id: number): ValidationEntityRef {
  return { type: 'face', id };
}

function checkVertexRef(mesh: TMesh, id: number): 'ok' | 'invalidIndex' | 'deletedReference' {
  if (!Number.isInteger(id) || id < 0 || id >= mesh.vertexCount) return 'invalidIndex';
  return mesh.isVertexDeleted(asVertexId(id)) ? 'deletedReference' : 'ok';
}

function checkHalfEdgeRef(mesh: TMesh, id: number): 'ok' | 'invalidIndex' | 'deletedReference' {
  if (!Number.isInteger(id) || id < 0 || id >= mesh.halfEdgeCount) return 'invalidIndex';
  return mesh.isHalfEdgeDeleted(asHalfEdgeId(id)) ? 'deletedReference' : 'ok';
}

function checkFaceRef(mesh: TMesh, id: number): 'ok' | 'invalidIndex' | 'deletedReference' {
  if (!Number.isInteger(id) || id < 0 || id >= mesh.faceCount) return 'invalidIndex';
  return mesh.isFaceDeleted(asFaceId(id)) ? 'deletedReference' : 'ok';
}

/**
 * Every reference held by a live half-edge must point at a live entity.
 * Returns the set of half-edges whose references are all sound.
 */
function validateHalfEdgeReferences(mesh: TMesh, report: ValidationReport): Set<HalfEdgeId> {
  const sound = new Set<HalfEdgeId>();
  for (const h of mesh.halfEdgeIds()) {
    let ok = true;
    const refs: [string, number, (m: TMesh, id: number) => ReturnType<typeof checkVertexRef>, ValidationEntityRef['type']][] = [
      ['origin', mesh.getHalfEdgeOrigin(h), checkVertexRef, 'vertex'],
      ['face', mesh.getHalfEdgeFace(h), checkFaceRef, 'face'],
      ['next', mesh.getHalfEdgeNext(h), checkHalfEdgeRef, 'halfEdge'],
      ['prev', mesh.getHalfEdgePrev(h), checkHalfEdgeRef, 'halfEdge'],
    ];
    const twin = mesh.getHalfEdgeTwin(h);
    if (!isNullId(twin)) refs.push(['twin', twin, checkHalfEdgeRef, 'halfEdge']);

    for (const [field, id, check, type] of refs) {
      const status = check(mesh, id);
      if (status !== 'ok') {
        ok = false;
        addIssue(report, status, 'error', `Half-edge ${h} has invalid ${field} reference ${id}`, halfEdgeRef(h), [
          { type, id },
        ]);
      }
    }
    if (ok) sound.add(h);
  }
  return sound;
}

function validateVertices(
  mesh: TMesh,
  report: ValidationReport,
  sound: Set<HalfEdgeId>,
  opts: Required<ValidationOptions>
): void {
  // Outgoing half-edge count per vertex, from the half-edge table
  const incidence = new Map<number, number>();
  for (const h of sound) {
    const o = mesh.getHalfEdgeOrigin(h);
    incidence.set(o, (incidence.get(o) ?? 0) + 1);
  }

  for (const v of mesh.vertexIds()) {
    const out = mesh.getVertexOutgoing(v);
    if (isNullId(out)) {
      addIssue(
        report,
        'isolatedVertex',
        opts.rejectIsolatedVertices || incidence.has(v) ? 'error' : 'warning',
        `Vertex ${v} has no outgoing half-edge`,
        vertexRef(v)
      );
      continue;
    }
    const status = checkHalfEdgeRef(mesh, out);
    if (status !== 'ok') {
      addIssue(report, status, 'error', `Vertex ${v} references invalid half-edge ${out}`, vertexRef(v), [
        halfEdgeRef(out),
      ]);
      continue;
    }
    if (mesh.getHalfEdgeOrigin(out) !== v) {
      addIssue(report, 'outgoingMismatch', 'error', `Outgoing half-edge ${out} of vertex ${v} starts elsewhere`, vertexRef(v), [
        halfEdgeRef(out),
      ]);
      continue;
    }

    // Circulating from the outgoing edge must reach every half-edge leaving v
    const reached = circulate(mesh, out, sound);
    if (reached === null || reached !== (incidence.get(v) ?? 0)) {
      addIssue(
        report,
        'nonManifoldVertex',
        'error',
        `Spokes of vertex ${v} do not form a single fan`,
        vertexRef(v)
      );
    }
  }
}

/**
 * Count the outgoing half-edges reachable from `start` by circulation,
 * or null if circulation hits an unsound reference or fails to close.
 */
function circulate(mesh: TMesh, start: HalfEdgeId, sound: Set<HalfEdgeId>): number | null {
  const seen = new Set<HalfEdgeId>();
  const limit = mesh.halfEdgeCount;
  let h = start;
  let open = false;
  while (seen.size <= limit) {
    if (!sound.has(h)) return null;
    seen.add(h);
    const twin = mesh.getHalfEdgeTwin(h);
    if (isNullId(twin)) {
      open = true;
      break;
    }
    if (!sound.has(twin)) return null;
    h = mesh.getHalfEdgeNext(twin);
    if (h === start) break;
    if (seen.has(h)) return null;
  }
  if (open) {
    h = start;
    while (seen.size <= limit) {
      const p = mesh.getHalfEdgePrev(h);
      if (!sound.has(p)) return null;
      const twin = mesh.getHalfEdgeTwin(p);
      if (isNullId(twin) || twin === start) break;
      if (!sound.has(twin) || seen.has(twin)) return null;
      seen.add(twin);
      h = twin;
    }
  }
  return seen.size;
}

function validateTwins(mesh: TMesh, report: ValidationReport, sound: Set<HalfEdgeId>): void {
  for (const h of sound) {
    const twin = mesh.getHalfEdgeTwin(h);
    if (isNullId(twin) || !sound.has(twin)) continue;
    if (mesh.getHalfEdgeTwin(twin) !== h) {
      addIssue(report, 'twinMismatch', 'error', `Twin of half-edge ${twin} is not ${h}`, halfEdgeRef(h), [
        halfEdgeRef(twin),
      ]);
      continue;
    }
    if (
      mesh.getHalfEdgeOrigin(twin) !== mesh.getHalfEdgeEnd(h) ||
      mesh.getHalfEdgeEnd(twin) !== mesh.getHalfEdgeOrigin(h)
    ) {
      addIssue(report, 'twinDirectionMismatch', 'error', `Half-edges ${h} and ${twin} are not reversed`, halfEdgeRef(h), [
        halfEdgeRef(twin),
      ]);
    }
  }
}

function validateLoops(
  mesh: TMesh,
  report: ValidationReport,
  sound: Set<HalfEdgeId>,
  opts: Required<ValidationOptions>
): void {
  for (const h of sound) {
    const next = mesh.getHalfEdgeNext(h);
    if (mesh.getHalfEdgePrev(next) !== h) {
      addIssue(report, 'brokenLoopCycle', 'error', `next/prev of half-edge ${h} disagree`, halfEdgeRef(h), [
        halfEdgeRef(next),
      ]);
    }
    if (mesh.getHalfEdgeFace(next) !== mesh.getHalfEdgeFace(h)) {
      addIssue(report, 'loopFaceMismatch', 'error', `Half-edges ${h} and ${next} belong to different faces`, halfEdgeRef(h), [
        halfEdgeRef(next),
      ]);
    }
  }

  const limit = mesh.halfEdgeCount;
  for (const f of mesh.faceIds()) {
    const start = mesh.getFaceEdge(f);
    const status = checkHalfEdgeRef(mesh, start);
    if (status !== 'ok') {
      addIssue(report, status, 'error', `Face ${f} references invalid half-edge ${start}`, faceRef(f));
      continue;
    }

    const loop: HalfEdgeId[] = [];
    let h = start;
    let closed = false;
    while (loop.length <= limit && sound.has(h)) {
      loop.push(h);
      h = mesh.getHalfEdgeNext(h);
      if (h === start) {
        closed = true;
        break;
      }
    }
    if (!closed) {
      addIssue(report, 'loopNotClosed', 'error', `Boundary loop of face ${f} does not return to its start`, faceRef(f));
      continue;
    }

    for (const e of loop) {
      if (mesh.getHalfEdgeFace(e) !== f) {
        addIssue(report, 'loopFaceMismatch', 'error', `Half-edge ${e} in loop of face ${f} names another face`, faceRef(f), [
          halfEdgeRef(e),
        ]);
      }
    }

    if (loop.length < 4) {
      addIssue(report, 'degenerateFace', 'error', `Face ${f} has only ${loop.length} sides`, faceRef(f));
      continue;
    }

    if (opts.checkOrientation) {
      // Shoelace area in (s,t); positive for counter-clockwise loops
      let area = 0;
      for (const e of loop) {
        const [s0, t0] = mesh.getVertexParam(mesh.getHalfEdgeOrigin(e));
        const [s1, t1] = mesh.getVertexParam(mesh.getHalfEdgeEnd(e));
        area += s0 * t1 - s1 * t0;
      }
      area /= 2;
      if (isZero(area, mesh.ctx)) {
        addIssue(report, 'degenerateFace', 'error', `Face ${f} has zero parametric area`, faceRef(f));
      } else if (area < 0) {
        addIssue(report, 'faceOrientation', 'error', `Face ${f} is clockwise in (s,t)`, faceRef(f));
      }
    }
  }
}

function validateParameters(
  mesh: TMesh,
  report: ValidationReport,
  sound: Set<HalfEdgeId>,
  opts: Required<ValidationOptions>
): void {
  const ctx = mesh.ctx;
  for (const h of sound) {
    const a = mesh.getHalfEdgeOrigin(h);
    const b = mesh.getHalfEdgeEnd(h);
    const axis = mesh.getHalfEdgeAxis(h);
    const cross = axis === 's' ? 't' : 's';

    if (!eq(mesh.getVertexCoord(a, cross), mesh.getVertexCoord(b, cross), ctx)) {
      addIssue(report, 'axisMisaligned', 'error', `Half-edge ${h} is tagged ${axis.toUpperCase()} but is not parallel to it`, halfEdgeRef(h), [
        vertexRef(a),
        vertexRef(b),
      ]);
      continue;
    }

    const length = Math.abs(mesh.getVertexCoord(b, axis) - mesh.getVertexCoord(a, axis));
    if (isZero(length, ctx)) {
      addIssue(report, 'zeroLengthEdge', 'error', `Half-edge ${h} has zero parametric length`, halfEdgeRef(h));
      continue;
    }

    if (opts.checkIntervals && !eq(mesh.getHalfEdgeInterval(h), length, ctx)) {
      addIssue(
        report,
        'intervalMismatch',
        'error',
        `Knot interval ${mesh.getHalfEdgeInterval(h)} of half-edge ${h} differs from its length ${length}`,
        halfEdgeRef(h)
      );
    }

    const twin = mesh.getHalfEdgeTwin(h);
    if (!isNullId(twin) && sound.has(twin) && mesh.getHalfEdgeAxis(twin) !== axis) {
      addIssue(report, 'axisMisaligned', 'error', `Half-edges ${h} and ${twin} disagree on axis`, halfEdgeRef(h), [
        halfEdgeRef(twin),
      ]);
    }
  }
}
