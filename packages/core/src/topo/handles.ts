/**
 * Branded handle types for T-mesh topology
 *
 * These are numeric handles that provide type safety through TypeScript's
 * structural typing. Each handle type is a number with a phantom brand
 * that prevents accidental mixing of different entity types.
 *
 * The actual values are indices into the corresponding tables in TMesh.
 * Indices are retired, never reused, so a handle that outlives its entity
 * is detected rather than silently aliased.
 */

/**
 * Handle to a control point (vertex) in the mesh
 */
export type VertexId = number & { __brand: `VertexId` };

/**
 * Handle to a half-edge in the mesh
 * A half-edge is one directed side of an axis-aligned mesh edge.
 */
export type HalfEdgeId = number & { __brand: `HalfEdgeId` };

/**
 * Handle to a face in the mesh
 * Faces are bounded by a single loop of half-edges, possibly with more than
 * four sides where T-junctions hang on their boundary.
 */
export type FaceId = number & { __brand: `FaceId` };

/**
 * Sentinel value for "null" handles
 * Used to represent missing/invalid references in tables
 */
export const NULL_ID = -1;

/**
 * Check if a handle is null (invalid/missing)
 */
export function isNullId(id: number): boolean {
  return id === NULL_ID;
}

/**
 * Cast a number to a VertexId
 * @internal Use with caution - only when reading from known valid sources
 */
export function asVertexId(id: number): VertexId {
  return id as VertexId;
}

/**
 * Cast a number to a HalfEdgeId
 * @internal Use with caution - only when reading from known valid sources
 */
export function asHalfEdgeId(id: number): HalfEdgeId {
  return id as HalfEdgeId;
}

/**
 * Cast a number to a FaceId
 * @internal Use with caution - only when reading from known valid sources
 */
export function asFaceId(id: number): FaceId {
  return id as FaceId;
}
