/**
 * Directional ray traversal through a T-mesh
 *
 * The primitive behind local knot inference and T-junction extensions. A ray
 * leaves a vertex along one compass direction and reports the coordinates of
 * the perpendicular mesh lines it crosses:
 *
 * - Along an edge, the ray steps by the edge's knot interval. The vertex it
 *   reaches counts as a crossing only if it carries a perpendicular edge.
 * - Where no edge leaves in the ray's direction, the ray enters the face whose
 *   corner contains that direction and crosses to the nearest perpendicular
 *   side. A crossing at a vertex continues from that vertex; a crossing in the
 *   middle of an edge continues into the face across it.
 * - A ray that runs off the mesh stops; `exhausted` is set and the boundary
 *   coordinate is reported.
 */

import type { TMesh, Direction } from '../topo/TMesh.js';
import type { FaceId, VertexId } from '../topo/handles.js';
import { TopologyCorruptError } from '../topo/errors.js';
import { axisOf, directionSign, hasSpokeAlong, perpendicular, spokesByDirection } from '../topo/star.js';
import { faceCrossing, faceInDirection } from '../topo/faceWalk.js';

export interface RayResult {
  /** Coordinates of the crossings found, in order of distance (at most `count`) */
  crossings: number[];
  /** True if the ray left the mesh before finding `count` crossings */
  exhausted: boolean;
  /** Coordinate where the ray stopped: the last crossing, or the mesh boundary */
  end: number;
}

type RayState =
  | { at: 'vertex'; vertex: VertexId; pos: number }
  | { at: 'face'; face: FaceId; pos: number };

/**
 * Cast a ray from vertex `start` in direction `d`, collecting up to `count`
 * perpendicular crossings.
 */
export function castRay(mesh: TMesh, start: VertexId, d: Direction, count: number): RayResult {
  mesh.assertVertex(start);
  const axis = axisOf(d);
  const cross = perpendicular(axis);
  const sign = directionSign(d);
  const fixed = mesh.getVertexCoord(start, cross);

  const crossings: number[] = [];
  let state: RayState = { at: 'vertex', vertex: start, pos: mesh.getVertexCoord(start, axis) };

  // Every step consumes an edge or a face, so the walk is bounded by the mesh size
  let budget = mesh.halfEdgeCount + mesh.faceCount + 1;

  while (crossings.length < count) {
    if (--budget < 0) {
      throw new TopologyCorruptError(`Ray ${d} from vertex ${start} did not terminate`);
    }

    if (state.at === 'vertex') {
      const byDir = spokesByDirection(mesh, state.vertex);
      const spoke = byDir.get(d);
      if (spoke) {
        const interval = mesh.getHalfEdgeInterval(spoke.halfEdge);
        const pos: number = state.pos + sign * interval;
        const next = spoke.neighbor;
        if (hasSpokeAlong(spokesByDirection(mesh, next), cross)) {
          crossings.push(pos);
        }
        state = { at: 'vertex', vertex: next, pos };
        continue;
      }
      const face = faceInDirection(mesh, state.vertex, d);
      if (face === null) {
        return { crossings, exhausted: true, end: state.pos };
      }
      state = { at: 'face', face, pos: state.pos };
      continue;
    }

    const origin: [number, number] = axis === 's' ? [state.pos, fixed] : [fixed, state.pos];
    const hit = faceCrossing(mesh, state.face, origin, d);
    crossings.push(hit.coordinate);
    if (hit.vertex !== null) {
      state = { at: 'vertex', vertex: hit.vertex, pos: hit.coordinate };
    } else if (mesh.hasTwin(hit.halfEdge)) {
      state = { at: 'face', face: mesh.getHalfEdgeFace(mesh.getHalfEdgeTwin(hit.halfEdge)), pos: hit.coordinate };
    } else {
      // Mid-edge crossing of the boundary: nothing lies beyond
      return { crossings, exhausted: crossings.length < count, end: hit.coordinate };
    }
  }

  return { crossings, exhausted: false, end: crossings[crossings.length - 1] ?? state.pos };
}

/**
 * Pad a ray's crossings to `count` entries by repeating the boundary
 * coordinate.
 */
export function clampCrossings(ray: RayResult, count: number): number[] {
  const out = ray.crossings.slice(0, count);
  while (out.length < count) out.push(ray.end);
  return out;
}
