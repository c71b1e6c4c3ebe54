/**
 * Local knot inference
 *
 * Each control point's blending function is a tensor product of two cubic
 * B-splines over local knot vectors of length 5. The centre knot is the
 * vertex's own coordinate; the two knots on each side are the first two
 * perpendicular mesh lines met by rays cast from the vertex.
 */

import type { TMesh, Axis } from '../topo/TMesh.js';
import type { VertexId } from '../topo/handles.js';
import { TopologyCorruptError } from '../topo/errors.js';
import { directionsAlong } from '../topo/star.js';
import { eq } from '../num/tolerance.js';
import { castRay, clampCrossings } from './traverse.js';

/** Polynomial degree of the blending functions */
export const DEGREE = 3;

/** Knots collected on each side of the centre knot */
export const KNOTS_PER_SIDE = (DEGREE + 1) / 2;

/** Length of a local knot vector */
export const LOCAL_KNOT_COUNT = DEGREE + 2;

export type KnotVector = readonly [number, number, number, number, number];

export interface LocalKnots {
  s: KnotVector;
  t: KnotVector;
}

/**
 * How to fill knot slots past the mesh boundary
 *
 * - `repeat`: clamp the remaining slots to the boundary coordinate
 * - `interpolate`: additionally give a vertex on the boundary a quadruple
 *   end knot, so boundary control points are interpolated at the corners
 */
export type BoundaryMode = 'repeat' | 'interpolate';

export interface KnotInferenceOptions {
  boundary?: BoundaryMode;
}

export const DEFAULT_KNOT_OPTIONS: Required<KnotInferenceOptions> = {
  boundary: 'repeat',
};

function inferAxis(mesh: TMesh, v: VertexId, axis: Axis, boundary: BoundaryMode): KnotVector {
  const [up, down] = directionsAlong(axis);
  const centre = mesh.getVertexCoord(v, axis);
  const [hi1, hi2] = clampCrossings(castRay(mesh, v, up, KNOTS_PER_SIDE), KNOTS_PER_SIDE);
  const [lo1, lo2] = clampCrossings(castRay(mesh, v, down, KNOTS_PER_SIDE), KNOTS_PER_SIDE);

  let knots: KnotVector = [lo2, lo1, centre, hi1, hi2];
  if (boundary === 'interpolate') {
    const ctx = mesh.ctx;
    if (eq(lo1, centre, ctx)) {
      knots = [centre, centre, centre, centre, hi1];
    } else if (eq(hi1, centre, ctx)) {
      knots = [lo1, centre, centre, centre, centre];
    }
  }

  for (let i = 1; i < knots.length; i++) {
    if (knots[i] < knots[i - 1]) {
      throw new TopologyCorruptError(`Inferred ${axis}-knots of vertex ${v} are not monotone: [${knots.join(', ')}]`);
    }
  }
  return knots;
}

/**
 * Infer both local knot vectors of a control point.
 */
export function inferLocalKnots(mesh: TMesh, vertex: VertexId, options: KnotInferenceOptions = {}): LocalKnots {
  const { boundary } = { ...DEFAULT_KNOT_OPTIONS, ...options };
  const v = mesh.assertVertex(vertex);
  return {
    s: inferAxis(mesh, v, 's', boundary),
    t: inferAxis(mesh, v, 't', boundary),
  };
}
