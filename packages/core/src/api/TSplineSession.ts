/**
 * TSplineSession - main entry point for editing and evaluating a T-spline
 *
 * The session is the single writer over one T-mesh and its knot cache.
 * Every edit runs as a transaction: the mesh state is saved, the primitive
 * runs, analysis-suitability is checked, and the edit either commits (with
 * selective knot invalidation) or the saved state is restored.
 *
 * Readers take immutable surface snapshots and may evaluate them
 * concurrently with later edits.
 */

import type { Vec3 } from '../num/vec3.js';
import type { TMesh, Direction } from '../topo/TMesh.js';
import type { VertexId, HalfEdgeId } from '../topo/handles.js';
import { AstsViolationError, isTMeshError, type TMeshError } from '../topo/errors.js';
import { createTMesh, describeTMesh, type BuildOptions } from '../topo/build.js';
import type { TopologyDescription, TopologyDescriptionInput } from '../topo/schema.js';
import {
  splitEdge,
  insertTJunction,
  connectVertices,
  removeEdge,
  dissolveVertex,
  extendTJunction,
  type FaceSplit,
} from '../topo/mutate.js';
import { classifyVertex } from '../topo/star.js';
import { KnotCache } from '../knots/cache.js';
import type { LocalKnots } from '../knots/infer.js';
import { validateAsts, type AstsReport, type AstsViolation } from '../asts/validate.js';
import { createTSplineSurface, type TSplineSurface } from '../geom/tspline.js';
import { evalSurface, evalSurfaceDerivatives } from '../geom/surface.js';
import type { DerivativeOrder, SurfaceDerivatives } from '../geom/rational.js';
import {
  DEFAULT_SESSION_OPTIONS,
  success,
  failure,
  type MutationOutcome,
  type MutationResult,
  type TSplineSessionOptions,
} from './types.js';

/**
 * Junctions to extend for a set of violations: the newer junction of each
 * pair, deduplicated, ascending.
 */
function junctionsToExtend(violations: readonly AstsViolation[]): VertexId[] {
  const picked = new Set<VertexId>();
  for (const { horizontal, vertical } of violations) {
    picked.add(horizontal > vertical ? horizontal : vertical);
  }
  return [...picked].sort((a, b) => a - b);
}

/**
 * Direction to extend a junction in: its missing direction, or for a
 * pass-through vertex the first of its two.
 */
function extensionDirection(mesh: TMesh, v: VertexId): Direction | null {
  const info = classifyVertex(mesh, v);
  if (info.kind !== 'tJunction' && info.kind !== 'passThrough') return null;
  return info.missing[0];
}

export class TSplineSession {
  private readonly _mesh: TMesh;
  private readonly _cache: KnotCache;
  private readonly options: Required<TSplineSessionOptions>;
  private _snapshot: TSplineSurface | null = null;

  constructor(mesh: TMesh, options: TSplineSessionOptions = {}) {
    this.options = { ...DEFAULT_SESSION_OPTIONS, ...options };
    this._mesh = mesh;
    this._cache = new KnotCache({ boundary: this.options.boundary });
  }

  /**
   * Build a session over a mesh loaded from a topology description
   */
  static fromDescription(
    description: TopologyDescriptionInput,
    options: TSplineSessionOptions & BuildOptions = {}
  ): TSplineSession {
    return new TSplineSession(createTMesh(description, options), options);
  }

  /**
   * The underlying mesh
   * @internal Mutating it directly bypasses the transaction and the knot cache
   */
  get mesh(): TMesh {
    return this._mesh;
  }

  get knotCache(): KnotCache {
    return this._cache;
  }

  /**
   * Local knots of a control point
   */
  knots(v: VertexId): LocalKnots {
    return this._cache.get(this._mesh, v);
  }

  describe(): TopologyDescription {
    return describeTMesh(this._mesh);
  }

  // ==========================================================================
  // Transactions
  // ==========================================================================

  /**
   * Run a mutation atomically.
   *
   * Errors thrown by the primitive, and ASTS violations it leaves behind
   * (under the `reject` policy, or when propagation does not converge),
   * restore the mesh and are returned as a failure. Anything that is not a
   * TMeshError is rethrown after the rollback.
   */
  mutate<T>(label: string, fn: (mesh: TMesh) => T): MutationResult<MutationOutcome<T>> {
    const mesh = this._mesh;
    const state = mesh.saveState();

    const rollback = (error: TMeshError): MutationResult<MutationOutcome<T>> => {
      mesh.restoreState(state);
      this.log(`${label}: rolled back (${error.kind}: ${error.message})`);
      return failure(error);
    };

    try {
      const value = fn(mesh);
      let report = validateAsts(mesh);
      const propagated: VertexId[] = [];

      if (!report.isValid && this.options.policy === 'propagate') {
        for (let step = 1; !report.isValid; step++) {
          if (step > this.options.maxPropagationSteps) {
            this.log(`${label}: propagation did not converge in ${this.options.maxPropagationSteps} steps`);
            break;
          }
          const before = propagated.length;
          const extensions = this.propagateOnce(report.violations, propagated);
          if (extensions === 0) break;
          this.log(
            `${label}: propagation step ${step} extended ${extensions} junctions, ${propagated.length - before} new vertices`
          );
          report = validateAsts(mesh);
        }
      }

      if (!report.isValid) {
        return rollback(new AstsViolationError(report.violations));
      }

      const invalidated = this._cache.invalidateChanges(mesh, mesh.takeChanges());
      this._snapshot = null;
      this.log(`${label}: committed, ${invalidated.length} knot vectors invalidated`);
      return success({ value, report, propagated, invalidated });
    } catch (error) {
      if (isTMeshError(error)) return rollback(error);
      mesh.restoreState(state);
      throw error;
    }
  }

  /**
   * Extend every junction picked from the violations by one face,
   * appending created vertices to `created`.
   *
   * @returns Number of extensions made
   */
  private propagateOnce(violations: readonly AstsViolation[], created: VertexId[]): number {
    let extensions = 0;
    for (const v of junctionsToExtend(violations)) {
      // An earlier extension in this round may already have completed it
      const d = extensionDirection(this._mesh, v);
      if (d === null) continue;
      created.push(...extendTJunction(this._mesh, v, d).created);
      extensions++;
    }
    return extensions;
  }

  // ==========================================================================
  // Refinement operations
  // ==========================================================================

  splitEdge(edge: HalfEdgeId, coordinate: number): MutationResult<MutationOutcome<VertexId>> {
    return this.mutate('splitEdge', (mesh) => splitEdge(mesh, edge, coordinate));
  }

  insertTJunction(edge: HalfEdgeId, coordinate: number): MutationResult<MutationOutcome<FaceSplit>> {
    return this.mutate('insertTJunction', (mesh) => insertTJunction(mesh, edge, coordinate));
  }

  connectVertices(a: VertexId, b: VertexId): MutationResult<MutationOutcome<HalfEdgeId>> {
    return this.mutate('connectVertices', (mesh) => connectVertices(mesh, a, b));
  }

  removeEdge(edge: HalfEdgeId): MutationResult<MutationOutcome<void>> {
    return this.mutate('removeEdge', (mesh) => removeEdge(mesh, edge));
  }

  dissolveVertex(v: VertexId): MutationResult<MutationOutcome<void>> {
    return this.mutate('dissolveVertex', (mesh) => dissolveVertex(mesh, v));
  }

  /**
   * Move a control point and optionally change its weight. Knots are
   * untouched, but the next snapshot sees the new geometry.
   */
  setControlPoint(v: VertexId, position: Vec3, weight?: number): MutationResult<MutationOutcome<void>> {
    return this.mutate('setControlPoint', (mesh) => mesh.setControlPoint(v, position, weight));
  }

  // ==========================================================================
  // Validation and evaluation
  // ==========================================================================

  /**
   * Refresh the knot cache and check analysis-suitability of the current mesh
   */
  revalidate(): AstsReport {
    const recomputed = this._cache.refresh(this._mesh);
    if (recomputed > 0) this.log(`revalidate: inferred knots for ${recomputed} vertices`);
    return validateAsts(this._mesh);
  }

  /**
   * Immutable surface for the current mesh, cached until the next commit.
   */
  snapshot(): MutationResult<TSplineSurface> {
    if (this._snapshot) return success(this._snapshot);
    const report = validateAsts(this._mesh);
    if (!report.isValid) {
      return failure(new AstsViolationError(report.violations));
    }
    const before = this._cache.recomputeCount;
    this._snapshot = createTSplineSurface(this._mesh, this._cache);
    this.log(`snapshot: ${this._snapshot.count} control points, ${this._cache.recomputeCount - before} knot vectors inferred`);
    return success(this._snapshot);
  }

  /**
   * Evaluate the latest snapshot at (u, v)
   */
  evaluate(u: number, v: number): MutationResult<Vec3> {
    return this.withSnapshot((surface) => evalSurface(surface, u, v));
  }

  evaluateDerivatives(u: number, v: number, order: DerivativeOrder = 1): MutationResult<SurfaceDerivatives> {
    return this.withSnapshot((surface) => evalSurfaceDerivatives(surface, u, v, order));
  }

  private withSnapshot<T>(fn: (surface: TSplineSurface) => T): MutationResult<T> {
    const snap = this.snapshot();
    if (!snap.ok) return snap;
    try {
      return success(fn(snap.value));
    } catch (error) {
      if (isTMeshError(error)) return failure(error);
      throw error;
    }
  }

  private log(message: string): void {
    if (this.options.verbose) {
      this.options.logger(`[tmesh] ${message}`);
    }
  }
}
