/**
 * Knot vector cache
 *
 * Local knots are derived state: memoized per vertex id and dropped when a
 * mutation could have changed them. A cached entry is invalidated when its
 * vertex was touched by the mutation, or when a segment added to or removed
 * from the mesh meets the vertex's s- or t-support line. Rays never look past
 * the support, so no other entry can change.
 */

import type { Vec2 } from '../num/vec2.js';
import { segmentsIntersect2D } from '../num/predicates.js';
import type { TMesh, MeshChanges } from '../topo/TMesh.js';
import { asVertexId, type VertexId } from '../topo/handles.js';
import {
  inferLocalKnots,
  LOCAL_KNOT_COUNT,
  type KnotInferenceOptions,
  type KnotVector,
  type LocalKnots,
} from './infer.js';

const STRIDE = 2 * LOCAL_KNOT_COUNT;

function readKnots(data: Float64Array, offset: number): KnotVector {
  return [data[offset], data[offset + 1], data[offset + 2], data[offset + 3], data[offset + 4]];
}

export class KnotCache {
  private _knots = new Float64Array(0);
  private _valid = new Uint8Array(0);
  private _recomputeCount = 0;
  private readonly _options: KnotInferenceOptions;

  constructor(options: KnotInferenceOptions = {}) {
    this._options = options;
  }

  get options(): KnotInferenceOptions {
    return this._options;
  }

  /**
   * Number of knot inferences performed over the cache's lifetime
   */
  get recomputeCount(): number {
    return this._recomputeCount;
  }

  has(v: VertexId): boolean {
    return v < this._valid.length && this._valid[v] === 1;
  }

  /**
   * Cached knots of a vertex, inferring them on a miss
   */
  get(mesh: TMesh, vertex: VertexId): LocalKnots {
    const v = mesh.assertVertex(vertex);
    if (!this.has(v)) {
      this.store(v, inferLocalKnots(mesh, v, this._options));
    }
    const offset = v * STRIDE;
    return {
      s: readKnots(this._knots, offset),
      t: readKnots(this._knots, offset + LOCAL_KNOT_COUNT),
    };
  }

  invalidate(v: VertexId): void {
    if (v < this._valid.length) this._valid[v] = 0;
  }

  invalidateAll(): void {
    this._valid.fill(0);
  }

  /**
   * Drop every entry a mutation could have changed.
   *
   * @returns The vertices whose entries were dropped, ascending
   */
  invalidateChanges(mesh: TMesh, changes: MeshChanges): VertexId[] {
    const dropped = new Set<VertexId>();
    for (const v of changes.vertices) {
      if (this.has(v)) dropped.add(v);
      this.invalidate(v);
    }

    const limit = Math.min(this._valid.length, mesh.vertexCount);
    for (let i = 0; i < limit; i++) {
      if (this._valid[i] !== 1) continue;
      const v = asVertexId(i);
      if (mesh.isVertexDeleted(v)) {
        this._valid[i] = 0;
        dropped.add(v);
        continue;
      }
      if (changes.segments.length === 0) continue;

      const offset = i * STRIDE;
      const [s, t] = mesh.getVertexParam(v);
      const sLine: [Vec2, Vec2] = [
        [this._knots[offset], t],
        [this._knots[offset + LOCAL_KNOT_COUNT - 1], t],
      ];
      const tLine: [Vec2, Vec2] = [
        [s, this._knots[offset + LOCAL_KNOT_COUNT]],
        [s, this._knots[offset + STRIDE - 1]],
      ];
      for (const [a, b] of changes.segments) {
        if (
          segmentsIntersect2D(sLine[0], sLine[1], a, b, mesh.ctx) ||
          segmentsIntersect2D(tLine[0], tLine[1], a, b, mesh.ctx)
        ) {
          this._valid[i] = 0;
          dropped.add(v);
          break;
        }
      }
    }
    return [...dropped].sort((a, b) => a - b);
  }

  /**
   * Infer knots for every live vertex without a valid entry.
   *
   * @returns Number of vertices recomputed
   */
  refresh(mesh: TMesh): number {
    let count = 0;
    for (const v of mesh.vertexIds()) {
      if (this.has(v)) continue;
      this.store(v, inferLocalKnots(mesh, v, this._options));
      count++;
    }
    return count;
  }

  private store(v: VertexId, knots: LocalKnots): void {
    this.ensureCapacity(v + 1);
    const offset = v * STRIDE;
    this._knots.set(knots.s, offset);
    this._knots.set(knots.t, offset + LOCAL_KNOT_COUNT);
    this._valid[v] = 1;
    this._recomputeCount++;
  }

  private ensureCapacity(slots: number): void {
    if (slots <= this._valid.length) return;
    const capacity = Math.max(slots, this._valid.length * 2, 16);
    const knots = new Float64Array(capacity * STRIDE);
    knots.set(this._knots);
    const valid = new Uint8Array(capacity);
    valid.set(this._valid);
    this._knots = knots;
    this._valid = valid;
  }
}
