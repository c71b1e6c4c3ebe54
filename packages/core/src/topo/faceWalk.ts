/**
 * Walking straight lines through faces
 *
 * Two primitives shared by knot inference, T-junction extension and the
 * refinement operations: which face a ray enters when it leaves a vertex
 * with no edge in that direction, and where a ray leaves a face.
 */

import type { Vec2 } from '../num/vec2.js';
import { gt, inClosedRange, eq } from '../num/tolerance.js';
import type { TMesh, Direction } from './TMesh.js';
import type { FaceId, HalfEdgeId, VertexId } from './handles.js';
import { AmbiguousTraversalError, TopologyCorruptError } from './errors.js';
import { axisOf, directionIndex, directionSign, edgeDirection, halfEdgeDirection, perpendicular } from './star.js';

/**
 * Face whose corner at `v` contains direction `d`, or null if `d` points out
 * of the mesh. Corners are measured counter-clockwise from an outgoing
 * half-edge to the reverse of the half-edge preceding it; a ray can only
 * enter a corner of 180 degrees or more.
 */
export function faceInDirection(mesh: TMesh, v: VertexId, d: Direction): FaceId | null {
  const target = directionIndex(d);
  let found: FaceId | null = null;
  for (const h of mesh.vertexHalfEdges(v).outgoing) {
    const prev = mesh.getHalfEdgePrev(h);
    const start = directionIndex(halfEdgeDirection(mesh, h));
    const end = directionIndex(edgeDirection(mesh, v, mesh.getHalfEdgeOrigin(prev), mesh.getHalfEdgeAxis(prev), v));
    const width = (end - start + 4) % 4;
    if (width === 0) {
      throw new AmbiguousTraversalError(v, `face ${mesh.getHalfEdgeFace(h)} folds back on itself`);
    }
    const rel = (target - start + 4) % 4;
    if (rel > 0 && rel < width) {
      if (found !== null) {
        throw new AmbiguousTraversalError(v, `direction ${d} lies in more than one face`);
      }
      found = mesh.getHalfEdgeFace(h);
    }
  }
  return found;
}

/**
 * Where a ray leaves a face
 */
export interface FaceCrossing {
  /** Boundary half-edge the ray crosses */
  halfEdge: HalfEdgeId;
  /** Coordinate of the crossing along the ray's axis */
  coordinate: number;
  /** Endpoint of `halfEdge` the ray passes through, or null for a mid-edge crossing */
  vertex: VertexId | null;
}

/**
 * Nearest boundary side of face `f` hit by a ray from `origin` in direction
 * `d`. Only sides perpendicular to the ray count; the origin's own side is
 * skipped because the crossing must lie strictly ahead.
 */
export function faceCrossing(mesh: TMesh, f: FaceId, origin: Vec2, d: Direction): FaceCrossing {
  const ctx = mesh.ctx;
  const axis = axisOf(d);
  const cross = perpendicular(axis);
  const sign = directionSign(d);
  const pos = axis === 's' ? origin[0] : origin[1];
  const c = cross === 's' ? origin[0] : origin[1];

  let best: FaceCrossing | null = null;
  let bestDelta = Infinity;
  for (const h of mesh.faceBoundary(f)) {
    if (mesh.getHalfEdgeAxis(h) !== cross) continue;
    const a = mesh.getHalfEdgeOrigin(h);
    const b = mesh.getHalfEdgeEnd(h);
    const ca = mesh.getVertexCoord(a, cross);
    const cb = mesh.getVertexCoord(b, cross);
    if (!inClosedRange(c, ca, cb, ctx)) continue;

    const e = mesh.getVertexCoord(a, axis);
    const delta = (e - pos) * sign;
    if (!gt(delta, 0, ctx) || delta >= bestDelta) continue;

    let vertex: VertexId | null = null;
    if (eq(ca, c, ctx)) vertex = a;
    else if (eq(cb, c, ctx)) vertex = b;
    best = { halfEdge: h, coordinate: e, vertex };
    bestDelta = delta;
  }

  if (best === null) {
    throw new TopologyCorruptError(`Ray ${d} from (${origin[0]}, ${origin[1]}) does not leave face ${f}`);
  }
  return best;
}
