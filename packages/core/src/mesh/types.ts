/**
 * Mesh types and interfaces
 *
 * Provides the triangle mesh produced by surface tessellation.
 * Flat typed arrays, ready for upload to a GPU buffer.
 */

import type { ParamDomain } from '../geom/tspline.js';

/**
 * Triangle mesh output
 *
 * - positions: Float32Array of vertex positions (xyzxyz...)
 * - normals: Float32Array of vertex normals (xyzxyz...), same length as positions
 * - indices: Uint32Array of triangle indices (abc, abc, ...)
 */
export interface Mesh {
  /** Vertex positions (xyzxyz...) */
  positions: Float32Array;
  /** Vertex normals (xyzxyz...), same length as positions */
  normals: Float32Array;
  /** Triangle indices (3 per triangle) */
  indices: Uint32Array;
}

/**
 * Progress report, sent after each tessellated row
 */
export interface TessellationProgress {
  rowsDone: number;
  rowsTotal: number;
}

/**
 * Tessellation options
 */
export interface TessellationOptions {
  /** Grid cells along u */
  resolutionU?: number;
  /** Grid cells along v */
  resolutionV?: number;
  /** Parameter rectangle to sample; the surface's own domain when omitted */
  domain?: ParamDomain;
  /** Checked between rows */
  signal?: AbortSignal;
  onProgress?: (progress: TessellationProgress) => void;
}

/**
 * Default tessellation options
 */
export const DEFAULT_TESSELLATION_OPTIONS = {
  resolutionU: 16,
  resolutionV: 16,
} as const;

/**
 * Create an empty mesh
 */
export function createEmptyMesh(): Mesh {
  return {
    positions: new Float32Array(0),
    normals: new Float32Array(0),
    indices: new Uint32Array(0),
  };
}

/**
 * Create a mesh from arrays
 */
export function createMesh(positions: number[], normals: number[], indices: number[]): Mesh {
  return {
    positions: new Float32Array(positions),
    normals: new Float32Array(normals),
    indices: new Uint32Array(indices),
  };
}

/**
 * Get the number of vertices in a mesh
 */
export function getMeshVertexCount(mesh: Mesh): number {
  return mesh.positions.length / 3;
}

/**
 * Get the number of triangles in a mesh
 */
export function getMeshTriangleCount(mesh: Mesh): number {
  return mesh.indices.length / 3;
}
