/**
 * T-Mesh Topology Store
 *
 * Owns every control point, half-edge and face of a T-spline control mesh.
 * The design uses a struct-of-arrays layout internally for performance while
 * exposing bounds-checked lookups and traversal primitives.
 *
 * Hierarchy:
 * - Face: region of parameter space bounded by a single loop of half-edges
 * - HalfEdge: directed, axis-aligned side of a face (S = horizontal, T = vertical)
 * - Vertex: control point with homogeneous geometry and an (s,t) parameter
 *
 * Cross references are plain indices. Retired entities keep their slot and
 * are flagged DELETED so stale handles fail with InvalidIndex.
 */

import type { Vec2 } from '../num/vec2.js';
import type { Vec3 } from '../num/vec3.js';
import { createNumericContext, type NumericContext } from '../num/tolerance.js';
import {
  type VertexId,
  type HalfEdgeId,
  type FaceId,
  NULL_ID,
  asVertexId,
  asHalfEdgeId,
  asFaceId,
  isNullId,
} from './handles.js';
import { BoundaryEdgeError, InvalidIndexError, TopologyCorruptError } from './errors.js';

/**
 * Parametric axis of an edge: S edges run horizontally (constant t),
 * T edges run vertically (constant s).
 */
export type Axis = 's' | 't';

/**
 * Compass direction in parameter space
 */
export type Direction = 'east' | 'north' | 'west' | 'south';

/**
 * Entity flags (shared across entity types)
 */
const enum EntityFlags {
  NONE = 0,
  DELETED = 1 << 0,
}

const AXIS_S = 0;
const AXIS_T = 1;

/**
 * Vertex table - control point geometry, parameter and connectivity
 */
interface VertexTable {
  x: Float64Array;
  y: Float64Array;
  z: Float64Array;
  w: Float64Array;
  s: Float64Array;
  t: Float64Array;
  outgoing: Int32Array;
  flags: Uint8Array;
  count: number;
  liveCount: number;
}

/**
 * Half-edge table - directed edge usage within a face loop
 */
interface HalfEdgeTable {
  origin: Int32Array;
  twin: Int32Array;
  face: Int32Array;
  next: Int32Array;
  prev: Int32Array;
  axis: Uint8Array;
  interval: Float64Array;
  flags: Uint8Array;
  count: number;
  liveCount: number;
}

/**
 * Face table
 */
interface FaceTable {
  edge: Int32Array;
  flags: Uint8Array;
  count: number;
  liveCount: number;
}

// Default initial capacity for tables
const DEFAULT_INITIAL_CAPACITY = 16;

function createVertexTable(capacity: number = DEFAULT_INITIAL_CAPACITY): VertexTable {
  return {
    x: new Float64Array(capacity),
    y: new Float64Array(capacity),
    z: new Float64Array(capacity),
    w: new Float64Array(capacity),
    s: new Float64Array(capacity),
    t: new Float64Array(capacity),
    outgoing: new Int32Array(capacity).fill(NULL_ID),
    flags: new Uint8Array(capacity),
    count: 0,
    liveCount: 0,
  };
}

function createHalfEdgeTable(capacity: number = DEFAULT_INITIAL_CAPACITY): HalfEdgeTable {
  return {
    origin: new Int32Array(capacity).fill(NULL_ID),
    twin: new Int32Array(capacity).fill(NULL_ID),
    face: new Int32Array(capacity).fill(NULL_ID),
    next: new Int32Array(capacity).fill(NULL_ID),
    prev: new Int32Array(capacity).fill(NULL_ID),
    axis: new Uint8Array(capacity),
    interval: new Float64Array(capacity),
    flags: new Uint8Array(capacity),
    count: 0,
    liveCount: 0,
  };
}

function createFaceTable(capacity: number = DEFAULT_INITIAL_CAPACITY): FaceTable {
  return {
    edge: new Int32Array(capacity).fill(NULL_ID),
    flags: new Uint8Array(capacity),
    count: 0,
    liveCount: 0,
  };
}

function growFloat64(arr: Float64Array, minSize: number): Float64Array {
  const out = new Float64Array(Math.max(minSize, arr.length * 2));
  out.set(arr);
  return out;
}

function growInt32(arr: Int32Array, minSize: number): Int32Array {
  const out = new Int32Array(Math.max(minSize, arr.length * 2)).fill(NULL_ID);
  out.set(arr);
  return out;
}

function growUint8(arr: Uint8Array, minSize: number): Uint8Array {
  const out = new Uint8Array(Math.max(minSize, arr.length * 2));
  out.set(arr);
  return out;
}

function copyVertexTable(v: VertexTable): VertexTable {
  return {
    x: v.x.slice(),
    y: v.y.slice(),
    z: v.z.slice(),
    w: v.w.slice(),
    s: v.s.slice(),
    t: v.t.slice(),
    outgoing: v.outgoing.slice(),
    flags: v.flags.slice(),
    count: v.count,
    liveCount: v.liveCount,
  };
}

function copyHalfEdgeTable(h: HalfEdgeTable): HalfEdgeTable {
  return {
    origin: h.origin.slice(),
    twin: h.twin.slice(),
    face: h.face.slice(),
    next: h.next.slice(),
    prev: h.prev.slice(),
    axis: h.axis.slice(),
    interval: h.interval.slice(),
    flags: h.flags.slice(),
    count: h.count,
    liveCount: h.liveCount,
  };
}

function copyFaceTable(f: FaceTable): FaceTable {
  return {
    edge: f.edge.slice(),
    flags: f.flags.slice(),
    count: f.count,
    liveCount: f.liveCount,
  };
}

/**
 * Read-only view of a control point
 */
export interface ControlPoint {
  id: VertexId;
  /** Cartesian position */
  position: Vec3;
  /** Rational weight */
  weight: number;
  /** (s, t) parameter location */
  param: Vec2;
  /** One outgoing half-edge, or null for an isolated vertex */
  outgoing: HalfEdgeId | null;
}

/**
 * Read-only view of a half-edge
 */
export interface HalfEdgeRecord {
  id: HalfEdgeId;
  origin: VertexId;
  /** Opposite half-edge, absent on the mesh boundary */
  twin: HalfEdgeId | null;
  face: FaceId;
  next: HalfEdgeId;
  prev: HalfEdgeId;
  axis: Axis;
  /** Parametric length of this edge */
  interval: number;
}

/**
 * Read-only view of a face
 */
export interface FaceRecord {
  id: FaceId;
  edge: HalfEdgeId;
}

/**
 * Half-edges incident to a vertex
 */
export interface VertexHalfEdges {
  /** Half-edges whose origin is the vertex */
  outgoing: HalfEdgeId[];
  /** Twinless half-edge ending at the vertex, if the vertex is on the boundary */
  incomingBoundary: HalfEdgeId | null;
}

/**
 * Parametric segment touched by a mutation
 */
export type ParamSegment = [Vec2, Vec2];

/**
 * What the most recent mutations changed, for knot-cache invalidation
 */
export interface MeshChanges {
  vertices: VertexId[];
  segments: ParamSegment[];
}

/**
 * Opaque copy of the mesh tables, used to roll back a rejected mutation
 */
export interface TMeshState {
  readonly vertices: VertexTable;
  readonly halfEdges: HalfEdgeTable;
  readonly faces: FaceTable;
  readonly dirty: ReadonlySet<VertexId>;
  readonly segments: readonly ParamSegment[];
}

/**
 * Mesh statistics (live entities only)
 */
export interface TMeshStats {
  vertices: number;
  halfEdges: number;
  edges: number;
  faces: number;
  boundaryHalfEdges: number;
}

function axisToCode(axis: Axis): number {
  return axis === 's' ? AXIS_S : AXIS_T;
}

function codeToAxis(code: number): Axis {
  return code === AXIS_S ? 's' : 't';
}

/**
 * TMesh - the topology store for a T-spline control mesh
 */
export class TMesh {
  // Internal storage (struct-of-arrays for performance)
  private _vertices: VertexTable;
  private _halfEdges: HalfEdgeTable;
  private _faces: FaceTable;

  // Pending change log
  private _dirty = new Set<VertexId>();
  private _segments: ParamSegment[] = [];

  // Numeric context
  private _ctx: NumericContext;

  constructor(ctx: NumericContext = createNumericContext()) {
    this._ctx = ctx;
    this._vertices = createVertexTable();
    this._halfEdges = createHalfEdgeTable();
    this._faces = createFaceTable();
  }

  /**
   * Get the numeric context
   */
  get ctx(): NumericContext {
    return this._ctx;
  }

  // ==========================================================================
  // Vertex operations
  // ==========================================================================

  /**
   * Add a control point. The vertex starts isolated; connectivity is wired
   * by the builder or mutation that created it.
   */
  addVertex(position: Vec3, weight: number, param: Vec2): VertexId {
    this.ensureVertexCapacity();
    const v = this._vertices;
    const id = v.count;
    v.x[id] = position[0];
    v.y[id] = position[1];
    v.z[id] = position[2];
    v.w[id] = weight;
    v.s[id] = param[0];
    v.t[id] = param[1];
    v.outgoing[id] = NULL_ID;
    v.flags[id] = EntityFlags.NONE;
    v.count++;
    v.liveCount++;
    this._dirty.add(asVertexId(id));
    return asVertexId(id);
  }

  getVertexPosition(id: VertexId): Vec3 {
    return [this._vertices.x[id], this._vertices.y[id], this._vertices.z[id]];
  }

  getVertexWeight(id: VertexId): number {
    return this._vertices.w[id];
  }

  getVertexParam(id: VertexId): Vec2 {
    return [this._vertices.s[id], this._vertices.t[id]];
  }

  /**
   * Parameter coordinate along one axis
   */
  getVertexCoord(id: VertexId, axis: Axis): number {
    return axis === 's' ? this._vertices.s[id] : this._vertices.t[id];
  }

  getVertexOutgoing(id: VertexId): HalfEdgeId {
    return asHalfEdgeId(this._vertices.outgoing[id]);
  }

  setVertexOutgoing(id: VertexId, he: HalfEdgeId): void {
    this._vertices.outgoing[id] = he;
  }

  /**
   * Reposition a control point. Geometry only: knots depend on topology and
   * parameters, so nothing is marked dirty.
   */
  setControlPoint(id: VertexId, position: Vec3, weight: number = this._vertices.w[id]): void {
    this.assertVertex(id);
    this._vertices.x[id] = position[0];
    this._vertices.y[id] = position[1];
    this._vertices.z[id] = position[2];
    this._vertices.w[id] = weight;
  }

  isVertexDeleted(id: VertexId): boolean {
    return (this._vertices.flags[id] & EntityFlags.DELETED) !== 0;
  }

  retireVertex(id: VertexId): void {
    if (this.isVertexDeleted(id)) return;
    this._vertices.flags[id] |= EntityFlags.DELETED;
    this._vertices.outgoing[id] = NULL_ID;
    this._vertices.liveCount--;
    this._dirty.delete(id);
  }

  private ensureVertexCapacity(): void {
    const v = this._vertices;
    if (v.count >= v.x.length) {
      const n = v.count + 1;
      v.x = growFloat64(v.x, n);
      v.y = growFloat64(v.y, n);
      v.z = growFloat64(v.z, n);
      v.w = growFloat64(v.w, n);
      v.s = growFloat64(v.s, n);
      v.t = growFloat64(v.t, n);
      v.outgoing = growInt32(v.outgoing, n);
      v.flags = growUint8(v.flags, n);
    }
  }

  // ==========================================================================
  // Half-edge operations
  // ==========================================================================

  /**
   * Add an unlinked half-edge
   */
  addHalfEdge(origin: VertexId, axis: Axis, interval: number): HalfEdgeId {
    this.ensureHalfEdgeCapacity();
    const h = this._halfEdges;
    const id = h.count;
    h.origin[id] = origin;
    h.twin[id] = NULL_ID;
    h.face[id] = NULL_ID;
    h.next[id] = NULL_ID;
    h.prev[id] = NULL_ID;
    h.axis[id] = axisToCode(axis);
    h.interval[id] = interval;
    h.flags[id] = EntityFlags.NONE;
    h.count++;
    h.liveCount++;
    return asHalfEdgeId(id);
  }

  getHalfEdgeOrigin(id: HalfEdgeId): VertexId {
    return asVertexId(this._halfEdges.origin[id]);
  }

  getHalfEdgeTwin(id: HalfEdgeId): HalfEdgeId {
    return asHalfEdgeId(this._halfEdges.twin[id]);
  }

  getHalfEdgeFace(id: HalfEdgeId): FaceId {
    return asFaceId(this._halfEdges.face[id]);
  }

  getHalfEdgeNext(id: HalfEdgeId): HalfEdgeId {
    return asHalfEdgeId(this._halfEdges.next[id]);
  }

  getHalfEdgePrev(id: HalfEdgeId): HalfEdgeId {
    return asHalfEdgeId(this._halfEdges.prev[id]);
  }

  getHalfEdgeAxis(id: HalfEdgeId): Axis {
    return codeToAxis(this._halfEdges.axis[id]);
  }

  getHalfEdgeInterval(id: HalfEdgeId): number {
    return this._halfEdges.interval[id];
  }

  hasTwin(id: HalfEdgeId): boolean {
    return !isNullId(this._halfEdges.twin[id]);
  }

  setHalfEdgeOrigin(id: HalfEdgeId, origin: VertexId): void {
    this._halfEdges.origin[id] = origin;
  }

  setHalfEdgeFace(id: HalfEdgeId, face: FaceId): void {
    this._halfEdges.face[id] = face;
  }

  setHalfEdgeInterval(id: HalfEdgeId, interval: number): void {
    this._halfEdges.interval[id] = interval;
  }

  /**
   * Set the twin of one half-edge only. Builders that trust their input use
   * pairTwins; description loading sets each side as given so validation can
   * catch asymmetric input.
   */
  setHalfEdgeTwin(id: HalfEdgeId, twin: HalfEdgeId | typeof NULL_ID): void {
    this._halfEdges.twin[id] = twin;
  }

  pairTwins(a: HalfEdgeId, b: HalfEdgeId): void {
    this._halfEdges.twin[a] = b;
    this._halfEdges.twin[b] = a;
  }

  setHalfEdgeNext(id: HalfEdgeId, next: HalfEdgeId): void {
    this._halfEdges.next[id] = next;
  }

  setHalfEdgePrev(id: HalfEdgeId, prev: HalfEdgeId): void {
    this._halfEdges.prev[id] = prev;
  }

  /**
   * Link two half-edges in sequence (a.next = b, b.prev = a)
   */
  linkHalfEdges(a: HalfEdgeId, b: HalfEdgeId): void {
    this._halfEdges.next[a] = b;
    this._halfEdges.prev[b] = a;
  }

  isHalfEdgeDeleted(id: HalfEdgeId): boolean {
    return (this._halfEdges.flags[id] & EntityFlags.DELETED) !== 0;
  }

  retireHalfEdge(id: HalfEdgeId): void {
    if (this.isHalfEdgeDeleted(id)) return;
    this._halfEdges.flags[id] |= EntityFlags.DELETED;
    this._halfEdges.liveCount--;
  }

  private ensureHalfEdgeCapacity(): void {
    const h = this._halfEdges;
    if (h.count >= h.origin.length) {
      const n = h.count + 1;
      h.origin = growInt32(h.origin, n);
      h.twin = growInt32(h.twin, n);
      h.face = growInt32(h.face, n);
      h.next = growInt32(h.next, n);
      h.prev = growInt32(h.prev, n);
      h.axis = growUint8(h.axis, n);
      h.interval = growFloat64(h.interval, n);
      h.flags = growUint8(h.flags, n);
    }
  }

  // ==========================================================================
  // Face operations
  // ==========================================================================

  addFace(edge: HalfEdgeId | typeof NULL_ID = NULL_ID): FaceId {
    this.ensureFaceCapacity();
    const f = this._faces;
    const id = f.count;
    f.edge[id] = edge;
    f.flags[id] = EntityFlags.NONE;
    f.count++;
    f.liveCount++;
    return asFaceId(id);
  }

  getFaceEdge(id: FaceId): HalfEdgeId {
    return asHalfEdgeId(this._faces.edge[id]);
  }

  setFaceEdge(id: FaceId, edge: HalfEdgeId): void {
    this._faces.edge[id] = edge;
  }

  isFaceDeleted(id: FaceId): boolean {
    return (this._faces.flags[id] & EntityFlags.DELETED) !== 0;
  }

  retireFace(id: FaceId): void {
    if (this.isFaceDeleted(id)) return;
    this._faces.flags[id] |= EntityFlags.DELETED;
    this._faces.edge[id] = NULL_ID;
    this._faces.liveCount--;
  }

  private ensureFaceCapacity(): void {
    const f = this._faces;
    if (f.count >= f.edge.length) {
      const n = f.count + 1;
      f.edge = growInt32(f.edge, n);
      f.flags = growUint8(f.flags, n);
    }
  }

  // ==========================================================================
  // Bounds-checked lookup
  // ==========================================================================

  assertVertex(id: number): VertexId {
    if (!Number.isInteger(id) || id < 0 || id >= this._vertices.count) {
      throw new InvalidIndexError('vertex', id);
    }
    const v = asVertexId(id);
    if (this.isVertexDeleted(v)) throw new InvalidIndexError('vertex', id, 'retired');
    return v;
  }

  assertHalfEdge(id: number): HalfEdgeId {
    if (!Number.isInteger(id) || id < 0 || id >= this._halfEdges.count) {
      throw new InvalidIndexError('halfEdge', id);
    }
    const h = asHalfEdgeId(id);
    if (this.isHalfEdgeDeleted(h)) throw new InvalidIndexError('halfEdge', id, 'retired');
    return h;
  }

  assertFace(id: number): FaceId {
    if (!Number.isInteger(id) || id < 0 || id >= this._faces.count) {
      throw new InvalidIndexError('face', id);
    }
    const f = asFaceId(id);
    if (this.isFaceDeleted(f)) throw new InvalidIndexError('face', id, 'retired');
    return f;
  }

  vertex(id: number): ControlPoint {
    const v = this.assertVertex(id);
    const out = this._vertices.outgoing[v];
    return {
      id: v,
      position: this.getVertexPosition(v),
      weight: this._vertices.w[v],
      param: this.getVertexParam(v),
      outgoing: isNullId(out) ? null : asHalfEdgeId(out),
    };
  }

  edge(id: number): HalfEdgeRecord {
    const h = this.assertHalfEdge(id);
    const twin = this._halfEdges.twin[h];
    return {
      id: h,
      origin: this.getHalfEdgeOrigin(h),
      twin: isNullId(twin) ? null : asHalfEdgeId(twin),
      face: this.getHalfEdgeFace(h),
      next: this.getHalfEdgeNext(h),
      prev: this.getHalfEdgePrev(h),
      axis: this.getHalfEdgeAxis(h),
      interval: this._halfEdges.interval[h],
    };
  }

  face(id: number): FaceRecord {
    const f = this.assertFace(id);
    return { id: f, edge: this.getFaceEdge(f) };
  }

  // ==========================================================================
  // Traversal
  // ==========================================================================

  /**
   * Ordered half-edges bounding a face, following `next`.
   * Throws TopologyCorrupt if the loop does not close within the total
   * half-edge count.
   */
  faceBoundary(id: FaceId): HalfEdgeId[] {
    const f = this.assertFace(id);
    const start = this.getFaceEdge(f);
    if (isNullId(start)) {
      throw new TopologyCorruptError(`Face ${f} has no boundary edge`);
    }
    const result: HalfEdgeId[] = [];
    const limit = this._halfEdges.count;
    let h = start;
    do {
      if (result.length >= limit || isNullId(h)) {
        throw new TopologyCorruptError(`Boundary loop of face ${f} does not close`);
      }
      result.push(h);
      h = this.getHalfEdgeNext(h);
    } while (h !== start);
    return result;
  }

  /**
   * Vertex at the far end of a half-edge, taken from the twin's origin.
   * Boundary half-edges have no twin: they throw BoundaryEdge unless the
   * caller asks for a boundary-tolerant lookup, which reads the origin of
   * `next` instead.
   */
  destinationOf(id: HalfEdgeId, options: { boundaryTolerant?: boolean } = {}): VertexId {
    const h = this.assertHalfEdge(id);
    const twin = this._halfEdges.twin[h];
    if (!isNullId(twin)) {
      return asVertexId(this._halfEdges.origin[twin]);
    }
    if (!options.boundaryTolerant) {
      throw new BoundaryEdgeError(h, 'destinationOf');
    }
    return asVertexId(this._halfEdges.origin[this._halfEdges.next[h]]);
  }

  /**
   * Destination without bounds checks; valid for any linked half-edge.
   */
  getHalfEdgeEnd(id: HalfEdgeId): VertexId {
    return asVertexId(this._halfEdges.origin[this._halfEdges.next[id]]);
  }

  /**
   * Circulate the spokes of a vertex: twin→next around the star, and
   * prev→twin the other way when the first pass runs into the boundary.
   */
  vertexHalfEdges(id: VertexId): VertexHalfEdges {
    const start = this.getVertexOutgoing(id);
    const outgoing: HalfEdgeId[] = [];
    if (isNullId(start)) return { outgoing, incomingBoundary: null };

    const limit = this._halfEdges.count;
    let open = false;
    let h = start;
    do {
      if (outgoing.length >= limit) {
        throw new TopologyCorruptError(`Spokes of vertex ${id} do not close`);
      }
      outgoing.push(h);
      const twin = this.getHalfEdgeTwin(h);
      if (isNullId(twin)) {
        open = true;
        break;
      }
      h = this.getHalfEdgeNext(twin);
    } while (h !== start);

    let incomingBoundary: HalfEdgeId | null = null;
    if (open) {
      h = start;
      for (;;) {
        const p = this.getHalfEdgePrev(h);
        const twin = this.getHalfEdgeTwin(p);
        if (isNullId(twin)) {
          incomingBoundary = p;
          break;
        }
        if (twin === start) break;
        if (outgoing.length >= limit) {
          throw new TopologyCorruptError(`Spokes of vertex ${id} do not close`);
        }
        outgoing.push(twin);
        h = twin;
      }
    }
    return { outgoing, incomingBoundary };
  }

  /**
   * Find the half-edge from `start` to `end`, or null if there is none
   * (including when `start` is isolated).
   */
  findEdge(start: VertexId, end: VertexId): HalfEdgeId | null {
    this.assertVertex(start);
    this.assertVertex(end);
    for (const h of this.vertexHalfEdges(start).outgoing) {
      if (this.getHalfEdgeEnd(h) === end) return h;
    }
    return null;
  }

  // ==========================================================================
  // Iteration
  // ==========================================================================

  *vertexIds(): Generator<VertexId> {
    for (let i = 0; i < this._vertices.count; i++) {
      if ((this._vertices.flags[i] & EntityFlags.DELETED) === 0) yield asVertexId(i);
    }
  }

  *halfEdgeIds(): Generator<HalfEdgeId> {
    for (let i = 0; i < this._halfEdges.count; i++) {
      if ((this._halfEdges.flags[i] & EntityFlags.DELETED) === 0) yield asHalfEdgeId(i);
    }
  }

  *faceIds(): Generator<FaceId> {
    for (let i = 0; i < this._faces.count; i++) {
      if ((this._faces.flags[i] & EntityFlags.DELETED) === 0) yield asFaceId(i);
    }
  }

  /**
   * Total allocated vertex slots (including retired)
   */
  get vertexCount(): number {
    return this._vertices.count;
  }

  get halfEdgeCount(): number {
    return this._halfEdges.count;
  }

  get faceCount(): number {
    return this._faces.count;
  }

  getStats(): TMeshStats {
    let boundary = 0;
    for (const h of this.halfEdgeIds()) {
      if (!this.hasTwin(h)) boundary++;
    }
    const halfEdges = this._halfEdges.liveCount;
    return {
      vertices: this._vertices.liveCount,
      halfEdges,
      edges: (halfEdges - boundary) / 2 + boundary,
      faces: this._faces.liveCount,
      boundaryHalfEdges: boundary,
    };
  }

  // ==========================================================================
  // Change tracking
  // ==========================================================================

  /**
   * Mark a vertex whose neighborhood changed
   */
  markDirty(id: VertexId): void {
    this._dirty.add(id);
  }

  /**
   * Record a parametric segment that was added to or removed from the mesh
   */
  recordSegment(a: Vec2, b: Vec2): void {
    this._segments.push([a, b]);
  }

  hasPendingChanges(): boolean {
    return this._dirty.size > 0 || this._segments.length > 0;
  }

  /**
   * Return and clear the pending change log
   */
  takeChanges(): MeshChanges {
    const changes: MeshChanges = {
      vertices: [...this._dirty].filter((v) => !this.isVertexDeleted(v)).sort((a, b) => a - b),
      segments: this._segments,
    };
    this._dirty = new Set();
    this._segments = [];
    return changes;
  }

  // ==========================================================================
  // State save/restore
  // ==========================================================================

  saveState(): TMeshState {
    return {
      vertices: copyVertexTable(this._vertices),
      halfEdges: copyHalfEdgeTable(this._halfEdges),
      faces: copyFaceTable(this._faces),
      dirty: new Set(this._dirty),
      segments: [...this._segments],
    };
  }

  /**
   * Restore tables saved by `saveState`.
   *
   * Allocation never rewinds: ids handed out after the save stay allocated
   * as retired slots, so they fail with InvalidIndex instead of being
   * reassigned by a later edit.
   */
  restoreState(state: TMeshState): void {
    const vertexCount = this._vertices.count;
    const halfEdgeCount = this._halfEdges.count;
    const faceCount = this._faces.count;

    this._vertices = copyVertexTable(state.vertices);
    this._halfEdges = copyHalfEdgeTable(state.halfEdges);
    this._faces = copyFaceTable(state.faces);
    this._dirty = new Set(state.dirty);
    this._segments = [...state.segments];

    while (this._vertices.count < vertexCount) {
      this.ensureVertexCapacity();
      const v = this._vertices;
      v.outgoing[v.count] = NULL_ID;
      v.flags[v.count] = EntityFlags.DELETED;
      v.count++;
    }
    while (this._halfEdges.count < halfEdgeCount) {
      this.ensureHalfEdgeCapacity();
      const h = this._halfEdges;
      h.origin[h.count] = NULL_ID;
      h.twin[h.count] = NULL_ID;
      h.face[h.count] = NULL_ID;
      h.next[h.count] = NULL_ID;
      h.prev[h.count] = NULL_ID;
      h.flags[h.count] = EntityFlags.DELETED;
      h.count++;
    }
    while (this._faces.count < faceCount) {
      this.ensureFaceCapacity();
      const f = this._faces;
      f.edge[f.count] = NULL_ID;
      f.flags[f.count] = EntityFlags.DELETED;
      f.count++;
    }
  }

  /**
   * Deep copy of the mesh, sharing only the numeric context
   */
  clone(): TMesh {
    const copy = new TMesh(this._ctx);
    copy.restoreState(this.saveState());
    return copy;
  }
}
