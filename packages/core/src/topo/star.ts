/**
 * Vertex stars and T-junction classification
 *
 * A vertex's star is the set of axis-aligned spokes leaving it. Classification
 * is by explicit valence enumeration:
 *
 * | star                                   | kind          |
 * |----------------------------------------|---------------|
 * | no edges                               | isolated      |
 * | any twinless spoke                     | boundary      |
 * | interior, 4 spokes                     | regular       |
 * | interior, 3 spokes                     | tJunction     |
 * | interior, 2 collinear spokes           | passThrough   |
 * | anything else                          | (ambiguous)   |
 *
 * A T-junction is oriented along the axis of its missing direction. A
 * pass-through vertex is missing both perpendicular directions and is treated
 * as a junction pointing both ways.
 */

import type { TMesh, Axis, Direction } from './TMesh.js';
import type { VertexId, HalfEdgeId } from './handles.js';
import { AmbiguousTraversalError } from './errors.js';
import { isZero } from '../num/tolerance.js';

export const DIRECTIONS: readonly Direction[] = ['east', 'north', 'west', 'south'];

/**
 * Quarter-turn index, counter-clockwise from east
 */
export function directionIndex(d: Direction): number {
  switch (d) {
    case 'east':
      return 0;
    case 'north':
      return 1;
    case 'west':
      return 2;
    case 'south':
      return 3;
  }
}

export function opposite(d: Direction): Direction {
  return DIRECTIONS[(directionIndex(d) + 2) % 4];
}

export function axisOf(d: Direction): Axis {
  return d === 'east' || d === 'west' ? 's' : 't';
}

export function perpendicular(axis: Axis): Axis {
  return axis === 's' ? 't' : 's';
}

/**
 * +1 for directions that increase the coordinate, -1 otherwise
 */
export function directionSign(d: Direction): 1 | -1 {
  return d === 'east' || d === 'north' ? 1 : -1;
}

export function directionsAlong(axis: Axis): [Direction, Direction] {
  return axis === 's' ? ['east', 'west'] : ['north', 'south'];
}

/**
 * One spoke of a vertex star
 */
export interface Spoke {
  direction: Direction;
  neighbor: VertexId;
  /** Outgoing half-edge, or the incoming boundary half-edge */
  halfEdge: HalfEdgeId;
  /** False for the incoming boundary half-edge */
  outgoing: boolean;
  /** True when the underlying edge has no twin */
  boundary: boolean;
}

/**
 * Direction of travel from `from` to `to` along an edge with the given axis
 */
export function edgeDirection(mesh: TMesh, from: VertexId, to: VertexId, axis: Axis, at: VertexId): Direction {
  const delta = mesh.getVertexCoord(to, axis) - mesh.getVertexCoord(from, axis);
  if (isZero(delta, mesh.ctx)) {
    throw new AmbiguousTraversalError(at, `zero-length edge ${from}->${to}`);
  }
  const [pos, neg] = directionsAlong(axis);
  return delta > 0 ? pos : neg;
}

/**
 * Direction a half-edge points in, from its origin
 */
export function halfEdgeDirection(mesh: TMesh, h: HalfEdgeId): Direction {
  const from = mesh.getHalfEdgeOrigin(h);
  return edgeDirection(mesh, from, mesh.getHalfEdgeEnd(h), mesh.getHalfEdgeAxis(h), from);
}

/**
 * All spokes around a vertex, in circulation order
 */
export function vertexStar(mesh: TMesh, v: VertexId): Spoke[] {
  const { outgoing, incomingBoundary } = mesh.vertexHalfEdges(v);
  const spokes: Spoke[] = outgoing.map((h) => {
    const neighbor = mesh.getHalfEdgeEnd(h);
    return {
      direction: edgeDirection(mesh, v, neighbor, mesh.getHalfEdgeAxis(h), v),
      neighbor,
      halfEdge: h,
      outgoing: true,
      boundary: !mesh.hasTwin(h),
    };
  });
  if (incomingBoundary !== null) {
    const neighbor = mesh.getHalfEdgeOrigin(incomingBoundary);
    spokes.push({
      direction: edgeDirection(mesh, v, neighbor, mesh.getHalfEdgeAxis(incomingBoundary), v),
      neighbor,
      halfEdge: incomingBoundary,
      outgoing: false,
      boundary: true,
    });
  }
  return spokes;
}

/**
 * Star indexed by direction. Throws AmbiguousTraversal when two spokes leave
 * in the same direction or the vertex has more than four spokes.
 */
export function spokesByDirection(mesh: TMesh, v: VertexId): Map<Direction, Spoke> {
  const spokes = vertexStar(mesh, v);
  if (spokes.length > 4) {
    throw new AmbiguousTraversalError(v, `valence ${spokes.length} exceeds 4`);
  }
  const byDir = new Map<Direction, Spoke>();
  for (const spoke of spokes) {
    if (byDir.has(spoke.direction)) {
      throw new AmbiguousTraversalError(v, `two spokes point ${spoke.direction}`);
    }
    byDir.set(spoke.direction, spoke);
  }
  return byDir;
}

export type VertexKind = 'isolated' | 'boundary' | 'regular' | 'tJunction' | 'passThrough';

export interface VertexClassification {
  kind: VertexKind;
  valence: number;
  /** Directions with no spoke */
  missing: Direction[];
  /**
   * Axis the junction's extension runs along (tJunction and passThrough),
   * otherwise null
   */
  orientation: Axis | null;
}

export function classifyVertex(mesh: TMesh, v: VertexId): VertexClassification {
  const byDir = spokesByDirection(mesh, v);
  const missing = DIRECTIONS.filter((d) => !byDir.has(d));
  const valence = byDir.size;

  if (valence === 0) {
    return { kind: 'isolated', valence, missing, orientation: null };
  }
  for (const spoke of byDir.values()) {
    if (spoke.boundary) {
      return { kind: 'boundary', valence, missing, orientation: null };
    }
  }
  if (valence === 4) {
    return { kind: 'regular', valence, missing, orientation: null };
  }
  if (valence === 3) {
    return { kind: 'tJunction', valence, missing, orientation: axisOf(missing[0]) };
  }
  if (valence === 2 && axisOf(missing[0]) === axisOf(missing[1])) {
    return { kind: 'passThrough', valence, missing, orientation: axisOf(missing[0]) };
  }
  throw new AmbiguousTraversalError(v, `interior vertex with degenerate valence ${valence}`);
}

/**
 * Valence-derived T-junction flag
 */
export function isTJunction(mesh: TMesh, v: VertexId): boolean {
  return classifyVertex(mesh, v).kind === 'tJunction';
}

/**
 * True if the vertex has a spoke along the given axis
 */
export function hasSpokeAlong(byDir: Map<Direction, Spoke>, axis: Axis): boolean {
  const [a, b] = directionsAlong(axis);
  return byDir.has(a) || byDir.has(b);
}
