/**
 * Mutation primitives
 *
 * Low-level refinement operations called by a command layer. Each primitive
 * leaves every topology invariant intact when it returns and records the
 * vertices and parametric segments it touched, so the knot cache can be
 * invalidated selectively.
 *
 * Primitives do not check analysis-suitability; TSplineSession runs them
 * inside an atomic transaction that does.
 */

import type { Vec2 } from '../num/vec2.js';
import { toHomogeneous, fromHomogeneous, lerp4 } from '../num/vec4.js';
import { eq, gt, lt } from '../num/tolerance.js';
import { segmentsIntersect2D } from '../num/predicates.js';
import type { TMesh, Axis, Direction } from './TMesh.js';
import { NULL_ID, type VertexId, type HalfEdgeId, type FaceId } from './handles.js';
import { BoundaryEdgeError, TopologyCorruptError } from './errors.js';
import { axisOf, classifyVertex, directionIndex, DIRECTIONS, halfEdgeDirection, vertexStar, opposite } from './star.js';
import { faceCrossing, faceInDirection } from './faceWalk.js';

/**
 * Insert a vertex on an edge (and its twin) at the given coordinate along the
 * edge's axis. Geometry is interpolated linearly in homogeneous space.
 *
 * @returns The new vertex
 */
export function splitEdge(mesh: TMesh, edge: HalfEdgeId, coordinate: number): VertexId {
  const h = mesh.assertHalfEdge(edge);
  const ctx = mesh.ctx;
  const axis = mesh.getHalfEdgeAxis(h);
  const a = mesh.getHalfEdgeOrigin(h);
  const b = mesh.getHalfEdgeEnd(h);
  const ca = mesh.getVertexCoord(a, axis);
  const cb = mesh.getVertexCoord(b, axis);

  const lo = Math.min(ca, cb);
  const hi = Math.max(ca, cb);
  if (!gt(coordinate, lo, ctx) || !lt(coordinate, hi, ctx)) {
    throw new TopologyCorruptError(
      `Split coordinate ${coordinate} is not strictly inside half-edge ${h} (${lo}..${hi})`
    );
  }

  const ratio = (coordinate - ca) / (cb - ca);
  const blended = lerp4(
    toHomogeneous(mesh.getVertexPosition(a), mesh.getVertexWeight(a)),
    toHomogeneous(mesh.getVertexPosition(b), mesh.getVertexWeight(b)),
    ratio
  );
  const fixed = mesh.getVertexCoord(a, axis === 's' ? 't' : 's');
  const param: Vec2 = axis === 's' ? [coordinate, fixed] : [fixed, coordinate];
  const v = mesh.addVertex(fromHomogeneous(blended), blended[3], param);

  const firstLength = Math.abs(coordinate - ca);
  const secondLength = Math.abs(cb - coordinate);

  // a -> v (h) followed by v -> b (h2)
  const h2 = mesh.addHalfEdge(v, axis, secondLength);
  mesh.setHalfEdgeInterval(h, firstLength);
  mesh.setHalfEdgeFace(h2, mesh.getHalfEdgeFace(h));
  const after = mesh.getHalfEdgeNext(h);
  mesh.linkHalfEdges(h, h2);
  mesh.linkHalfEdges(h2, after);
  mesh.setVertexOutgoing(v, h2);

  if (mesh.hasTwin(h)) {
    // b -> v (twin) followed by v -> a (t2)
    const twin = mesh.getHalfEdgeTwin(h);
    const t2 = mesh.addHalfEdge(v, axis, firstLength);
    mesh.setHalfEdgeInterval(twin, secondLength);
    mesh.setHalfEdgeFace(t2, mesh.getHalfEdgeFace(twin));
    const twinAfter = mesh.getHalfEdgeNext(twin);
    mesh.linkHalfEdges(twin, t2);
    mesh.linkHalfEdges(t2, twinAfter);
    mesh.pairTwins(h, t2);
    mesh.pairTwins(h2, twin);
  }

  mesh.markDirty(a);
  mesh.markDirty(b);
  mesh.markDirty(v);
  return v;
}

function axisBetween(mesh: TMesh, a: VertexId, b: VertexId): Axis {
  const [sa, ta] = mesh.getVertexParam(a);
  const [sb, tb] = mesh.getVertexParam(b);
  const ctx = mesh.ctx;
  if (eq(ta, tb, ctx) && !eq(sa, sb, ctx)) return 's';
  if (eq(sa, sb, ctx) && !eq(ta, tb, ctx)) return 't';
  throw new TopologyCorruptError(`Vertices ${a} and ${b} are not on a common axis-aligned line`);
}

function directionBetween(mesh: TMesh, a: VertexId, b: VertexId, axis: Axis): Direction {
  const delta = mesh.getVertexCoord(b, axis) - mesh.getVertexCoord(a, axis);
  if (axis === 's') return delta > 0 ? 'east' : 'west';
  return delta > 0 ? 'north' : 'south';
}

/**
 * Connect two vertices of the same face with a new axis-aligned edge,
 * splitting the face in two.
 *
 * @returns The new half-edge running from `a` to `b`
 */
export function connectVertices(mesh: TMesh, a: VertexId, b: VertexId): HalfEdgeId {
  mesh.assertVertex(a);
  mesh.assertVertex(b);
  if (mesh.findEdge(a, b) !== null || mesh.findEdge(b, a) !== null) {
    throw new TopologyCorruptError(`Vertices ${a} and ${b} are already connected`);
  }
  const axis = axisBetween(mesh, a, b);
  const d = directionBetween(mesh, a, b, axis);

  const face = faceInDirection(mesh, a, d);
  if (face === null) {
    throw new TopologyCorruptError(`No face lies ${d} of vertex ${a}`);
  }
  const loop = mesh.faceBoundary(face);
  const ha = loop.find((h) => mesh.getHalfEdgeOrigin(h) === a);
  const hb = loop.find((h) => mesh.getHalfEdgeOrigin(h) === b);
  if (ha === undefined || hb === undefined) {
    throw new TopologyCorruptError(`Vertices ${a} and ${b} do not share face ${face}`);
  }

  // The new edge must stay inside the face
  const pa = mesh.getVertexParam(a);
  const pb = mesh.getVertexParam(b);
  for (const h of loop) {
    const o = mesh.getHalfEdgeOrigin(h);
    const e = mesh.getHalfEdgeEnd(h);
    if (o === a || o === b || e === a || e === b) continue;
    if (segmentsIntersect2D(pa, pb, mesh.getVertexParam(o), mesh.getVertexParam(e), mesh.ctx)) {
      throw new TopologyCorruptError(`Edge ${a}->${b} would cross the boundary of face ${face}`);
    }
  }

  const interval = Math.abs(mesh.getVertexCoord(b, axis) - mesh.getVertexCoord(a, axis));
  const ab = mesh.addHalfEdge(a, axis, interval);
  const ba = mesh.addHalfEdge(b, axis, interval);
  mesh.pairTwins(ab, ba);

  const pa0 = mesh.getHalfEdgePrev(ha);
  const pb0 = mesh.getHalfEdgePrev(hb);
  mesh.linkHalfEdges(pa0, ab);
  mesh.linkHalfEdges(ab, hb);
  mesh.linkHalfEdges(pb0, ba);
  mesh.linkHalfEdges(ba, ha);

  // ab keeps the old face; the loop through ba becomes a new one
  const newFace = mesh.addFace(ba);
  mesh.setHalfEdgeFace(ab, face);
  mesh.setFaceEdge(face, ab);
  let h = ba;
  do {
    mesh.setHalfEdgeFace(h, newFace);
    h = mesh.getHalfEdgeNext(h);
  } while (h !== ba);

  mesh.markDirty(a);
  mesh.markDirty(b);
  mesh.recordSegment(pa, pb);
  return ab;
}

/**
 * Result of driving a line across a face
 */
export interface FaceSplit {
  /** Vertex the line starts from */
  from: VertexId;
  /** Vertex the line ends at (existing or newly inserted) */
  to: VertexId;
  /** New half-edge from `from` to `to` */
  edge: HalfEdgeId;
  /** Vertices created, in creation order */
  created: VertexId[];
}

function cutAcrossFace(mesh: TMesh, v: VertexId, face: FaceId, d: Direction, created: VertexId[]): FaceSplit {
  const crossing = faceCrossing(mesh, face, mesh.getVertexParam(v), d);
  let to = crossing.vertex;
  if (to === null) {
    // The crossed side runs across the ray, so it is split at the ray's fixed coordinate
    const [s, t] = mesh.getVertexParam(v);
    to = splitEdge(mesh, crossing.halfEdge, axisOf(d) === 's' ? t : s);
    created.push(to);
  }
  const edge = connectVertices(mesh, v, to);
  return { from: v, to, edge, created };
}

function leftOf(d: Direction): Direction {
  return DIRECTIONS[(directionIndex(d) + 1) % 4];
}

/**
 * Insert a T-junction: split `edge` at `coordinate`, then run a new edge from
 * the inserted vertex straight across the face on the left of `edge` to its
 * opposite side, splitting that side when no vertex lies there.
 */
export function insertTJunction(mesh: TMesh, edge: HalfEdgeId, coordinate: number): FaceSplit {
  const h = mesh.assertHalfEdge(edge);
  const face = mesh.getHalfEdgeFace(h);
  const inward = leftOf(halfEdgeDirection(mesh, h));
  const v = splitEdge(mesh, h, coordinate);
  return cutAcrossFace(mesh, v, face, inward, [v]);
}

/**
 * Continue a T-junction's line across the face it points into. The direction
 * defaults to the junction's missing direction; a pass-through vertex must
 * name one of its two.
 */
export function extendTJunction(mesh: TMesh, vertex: VertexId, direction?: Direction): FaceSplit {
  const v = mesh.assertVertex(vertex);
  const info = classifyVertex(mesh, v);
  if (info.kind !== 'tJunction' && info.kind !== 'passThrough') {
    throw new TopologyCorruptError(`Vertex ${v} is not a T-junction (${info.kind})`);
  }
  const d = direction ?? info.missing[0];
  if (!info.missing.includes(d)) {
    throw new TopologyCorruptError(`Vertex ${v} already has an edge pointing ${d}`);
  }
  const face = faceInDirection(mesh, v, d);
  if (face === null) {
    throw new TopologyCorruptError(`No face lies ${d} of vertex ${v}`);
  }
  return cutAcrossFace(mesh, v, face, d, []);
}

/**
 * Remove an interior edge, merging the faces on either side.
 */
export function removeEdge(mesh: TMesh, edge: HalfEdgeId): void {
  const h = mesh.assertHalfEdge(edge);
  if (!mesh.hasTwin(h)) {
    throw new BoundaryEdgeError(h, 'removeEdge');
  }
  const t = mesh.getHalfEdgeTwin(h);
  const keep = mesh.getHalfEdgeFace(h);
  const drop = mesh.getHalfEdgeFace(t);
  if (keep === drop) {
    throw new TopologyCorruptError(`Half-edges ${h} and ${t} bound the same face`);
  }
  const a = mesh.getHalfEdgeOrigin(h);
  const b = mesh.getHalfEdgeOrigin(t);
  const hNext = mesh.getHalfEdgeNext(h);
  const hPrev = mesh.getHalfEdgePrev(h);
  const tNext = mesh.getHalfEdgeNext(t);
  const tPrev = mesh.getHalfEdgePrev(t);
  if (hNext === t || tNext === h) {
    throw new TopologyCorruptError(`Removing half-edge ${h} would leave a dangling vertex`);
  }
  const segment: [Vec2, Vec2] = [mesh.getVertexParam(a), mesh.getVertexParam(b)];

  // Relabel the dropped face's loop before splicing
  for (const e of mesh.faceBoundary(drop)) {
    mesh.setHalfEdgeFace(e, keep);
  }
  mesh.linkHalfEdges(hPrev, tNext);
  mesh.linkHalfEdges(tPrev, hNext);
  mesh.setFaceEdge(keep, hNext);

  if (mesh.getVertexOutgoing(a) === h) mesh.setVertexOutgoing(a, tNext);
  if (mesh.getVertexOutgoing(b) === t) mesh.setVertexOutgoing(b, hNext);

  mesh.retireHalfEdge(h);
  mesh.retireHalfEdge(t);
  mesh.retireFace(drop);

  mesh.markDirty(a);
  mesh.markDirty(b);
  mesh.recordSegment(segment[0], segment[1]);
}

/**
 * Remove a vertex that has exactly two collinear edges, merging them into
 * one. The inverse of splitEdge.
 */
export function dissolveVertex(mesh: TMesh, vertex: VertexId): void {
  const v = mesh.assertVertex(vertex);
  const spokes = vertexStar(mesh, v);
  if (spokes.length !== 2 || spokes[1].direction !== opposite(spokes[0].direction)) {
    throw new TopologyCorruptError(`Vertex ${v} does not lie between exactly two collinear edges`);
  }

  const neighbors = spokes.map((s) => s.neighbor);
  // One outgoing half-edge per side of the line; prev arrives at v in the same face
  const sides = mesh.vertexHalfEdges(v).outgoing.map((out) => ({ out, incoming: mesh.getHalfEdgePrev(out) }));
  for (const { out, incoming } of sides) {
    mesh.setHalfEdgeInterval(incoming, mesh.getHalfEdgeInterval(incoming) + mesh.getHalfEdgeInterval(out));
    mesh.linkHalfEdges(incoming, mesh.getHalfEdgeNext(out));
    const face = mesh.getHalfEdgeFace(out);
    if (mesh.getFaceEdge(face) === out) mesh.setFaceEdge(face, incoming);
  }
  if (sides.length === 2) {
    mesh.pairTwins(sides[0].incoming, sides[1].incoming);
  } else {
    mesh.setHalfEdgeTwin(sides[0].incoming, NULL_ID);
  }
  for (const { out } of sides) mesh.retireHalfEdge(out);
  mesh.retireVertex(v);

  for (const n of neighbors) mesh.markDirty(n);
}
