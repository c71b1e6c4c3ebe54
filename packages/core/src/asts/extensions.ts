/**
 * T-junction extensions
 *
 * The extension of a T-junction is a parameter-space segment along the
 * junction's orientation axis. For degree 3 it covers two crossings into the
 * face the junction points at (the face extension) and one crossing back
 * along its own edge (the edge extension). A pass-through vertex points both
 * ways and takes a face extension on each side.
 */

import type { Vec2 } from '../num/vec2.js';
import type { TMesh, Axis, Direction } from '../topo/TMesh.js';
import type { VertexId } from '../topo/handles.js';
import { classifyVertex, directionsAlong, opposite } from '../topo/star.js';
import { DEGREE } from '../knots/infer.js';
import { castRay } from '../knots/traverse.js';

/** Crossings covered by a face extension */
export const FACE_EXTENSION_CROSSINGS = Math.floor((DEGREE + 1) / 2);

/** Crossings covered by an edge extension */
export const EDGE_EXTENSION_CROSSINGS = Math.ceil((DEGREE - 1) / 2);

export interface TJunctionExtension {
  junction: VertexId;
  /** 's' for horizontal extensions, 't' for vertical ones */
  axis: Axis;
  start: Vec2;
  end: Vec2;
}

function reach(mesh: TMesh, v: VertexId, d: Direction, count: number): number {
  return castRay(mesh, v, d, count).end;
}

/**
 * Extension segment of a T-junction, or null if the vertex is not one.
 */
export function tJunctionExtension(mesh: TMesh, v: VertexId): TJunctionExtension | null {
  const info = classifyVertex(mesh, v);
  if (info.orientation === null) return null;

  const axis = info.orientation;
  const [up, down] = directionsAlong(axis);
  const pointing = info.missing.filter((d) => d === up || d === down);

  let hi: number;
  let lo: number;
  if (pointing.length === 2) {
    hi = reach(mesh, v, up, FACE_EXTENSION_CROSSINGS);
    lo = reach(mesh, v, down, FACE_EXTENSION_CROSSINGS);
  } else {
    const face = pointing[0];
    const faceEnd = reach(mesh, v, face, FACE_EXTENSION_CROSSINGS);
    const edgeEnd = reach(mesh, v, opposite(face), EDGE_EXTENSION_CROSSINGS);
    hi = face === up ? faceEnd : edgeEnd;
    lo = face === up ? edgeEnd : faceEnd;
  }

  const [s, t] = mesh.getVertexParam(v);
  return axis === 's'
    ? { junction: v, axis, start: [lo, t], end: [hi, t] }
    : { junction: v, axis, start: [s, lo], end: [s, hi] };
}

/**
 * Extensions of every T-junction in the mesh, in vertex id order
 */
export function collectExtensions(mesh: TMesh): TJunctionExtension[] {
  const out: TJunctionExtension[] = [];
  for (const v of mesh.vertexIds()) {
    const ext = tJunctionExtension(mesh, v);
    if (ext) out.push(ext);
  }
  return out;
}
