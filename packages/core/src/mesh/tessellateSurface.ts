/**
 * Surface tessellation
 *
 * Samples a surface on a regular (u, v) grid and triangulates the cells.
 * Sampling works on row ranges so independent callers (worker threads,
 * chunked async jobs) can each take a slice of the grid and the slices can
 * be assembled afterwards. A surface snapshot is read-only, so slices never
 * contend.
 *
 * Samples where the surface is degenerate are dropped together with every
 * cell that touches them.
 */

import { cross3, length3 } from '../num/vec3.js';
import type { ParamDomain } from '../geom/tspline.js';
import { evalSurfaceDerivatives, surfaceDomain, type Surface } from '../geom/surface.js';
import type { SurfaceDerivatives } from '../geom/rational.js';
import { DegenerateParameterError } from '../topo/errors.js';
import type { Mesh, TessellationOptions } from './types.js';
import { createMesh, DEFAULT_TESSELLATION_OPTIONS } from './types.js';

/**
 * Samples of grid rows [rowStart, rowEnd). Row j sits at v index j and holds
 * resolutionU + 1 samples.
 */
export interface SampleGrid {
  resolutionU: number;
  resolutionV: number;
  domain: ParamDomain;
  rowStart: number;
  rowEnd: number;
  /** xyz per sample */
  positions: Float64Array;
  /** Unit normal per sample, zero where Su × Sv vanishes */
  normals: Float64Array;
  /** 1 where the sample evaluated */
  valid: Uint8Array;
}

export interface TessellationStats {
  samples: number;
  degenerateSamples: number;
  droppedCells: number;
  triangles: number;
}

export interface TessellationResult {
  mesh: Mesh;
  stats: TessellationStats;
}

export interface RowRange {
  start: number;
  end: number;
}

function resolve(surface: Surface, options: TessellationOptions) {
  const resolutionU = options.resolutionU ?? DEFAULT_TESSELLATION_OPTIONS.resolutionU;
  const resolutionV = options.resolutionV ?? DEFAULT_TESSELLATION_OPTIONS.resolutionV;
  if (!Number.isInteger(resolutionU) || !Number.isInteger(resolutionV) || resolutionU < 1 || resolutionV < 1) {
    throw new RangeError(`Tessellation resolution must be a positive integer, got ${resolutionU}×${resolutionV}`);
  }
  return { resolutionU, resolutionV, domain: options.domain ?? surfaceDomain(surface) };
}

/**
 * Evaluate the samples of a row range (all rows by default).
 *
 * @throws the signal's reason when aborted between rows
 */
export function sampleSurfaceGrid(
  surface: Surface,
  options: TessellationOptions = {},
  rows?: RowRange
): SampleGrid {
  const { resolutionU, resolutionV, domain } = resolve(surface, options);
  const rowStart = Math.max(0, rows?.start ?? 0);
  const rowEnd = Math.min(resolutionV + 1, rows?.end ?? resolutionV + 1);
  const rowCount = Math.max(0, rowEnd - rowStart);
  const width = resolutionU + 1;

  const positions = new Float64Array(rowCount * width * 3);
  const normals = new Float64Array(rowCount * width * 3);
  const valid = new Uint8Array(rowCount * width);

  for (let r = 0; r < rowCount; r++) {
    options.signal?.throwIfAborted();
    const j = rowStart + r;
    const v = domain.tMin + ((domain.tMax - domain.tMin) * j) / resolutionV;
    for (let i = 0; i < width; i++) {
      const u = domain.sMin + ((domain.sMax - domain.sMin) * i) / resolutionU;
      const k = r * width + i;
      let ders: SurfaceDerivatives;
      try {
        ders = evalSurfaceDerivatives(surface, u, v, 1);
      } catch (error) {
        if (error instanceof DegenerateParameterError) continue;
        throw error;
      }
      valid[k] = 1;
      positions.set(ders.point, 3 * k);
      const n = cross3(ders.du, ders.dv);
      const len = length3(n);
      if (len > 0) {
        normals.set([n[0] / len, n[1] / len, n[2] / len], 3 * k);
      }
    }
    options.onProgress?.({ rowsDone: r + 1, rowsTotal: rowCount });
  }

  return { resolutionU, resolutionV, domain, rowStart, rowEnd, positions, normals, valid };
}

/**
 * Triangulate sample slices covering every row of one grid.
 */
export function assembleMesh(grids: readonly SampleGrid[]): TessellationResult {
  if (grids.length === 0) {
    throw new RangeError('assembleMesh needs at least one sample grid');
  }
  const sorted = [...grids].sort((a, b) => a.rowStart - b.rowStart);
  const { resolutionU, resolutionV } = sorted[0];
  let expected = 0;
  for (const g of sorted) {
    if (g.resolutionU !== resolutionU || g.resolutionV !== resolutionV) {
      throw new RangeError('Sample grids have different resolutions');
    }
    if (g.rowStart !== expected) {
      throw new RangeError(`Sample grids leave rows ${expected}..${g.rowStart - 1} uncovered`);
    }
    expected = g.rowEnd;
  }
  if (expected !== resolutionV + 1) {
    throw new RangeError(`Sample grids stop at row ${expected}, expected ${resolutionV + 1}`);
  }

  const width = resolutionU + 1;
  const total = width * (resolutionV + 1);
  const remap = new Int32Array(total).fill(-1);
  const positions: number[] = [];
  const normals: number[] = [];
  let degenerateSamples = 0;

  for (const g of sorted) {
    const n = (g.rowEnd - g.rowStart) * width;
    for (let k = 0; k < n; k++) {
      if (g.valid[k] !== 1) {
        degenerateSamples++;
        continue;
      }
      remap[g.rowStart * width + k] = positions.length / 3;
      positions.push(g.positions[3 * k], g.positions[3 * k + 1], g.positions[3 * k + 2]);
      normals.push(g.normals[3 * k], g.normals[3 * k + 1], g.normals[3 * k + 2]);
    }
  }

  const indices: number[] = [];
  let droppedCells = 0;
  for (let j = 0; j < resolutionV; j++) {
    for (let i = 0; i < resolutionU; i++) {
      const a = remap[j * width + i];
      const b = remap[j * width + i + 1];
      const c = remap[(j + 1) * width + i + 1];
      const d = remap[(j + 1) * width + i];
      if (a < 0 || b < 0 || c < 0 || d < 0) {
        droppedCells++;
        continue;
      }
      // Counter-clockwise in (u, v), so faces agree with Su × Sv
      indices.push(a, b, c, a, c, d);
    }
  }

  return {
    mesh: createMesh(positions, normals, indices),
    stats: {
      samples: total,
      degenerateSamples,
      droppedCells,
      triangles: indices.length / 3,
    },
  };
}

/**
 * Tessellate a whole surface on one thread
 */
export function tessellateSurface(surface: Surface, options: TessellationOptions = {}): TessellationResult {
  return assembleMesh([sampleSurfaceGrid(surface, options)]);
}
