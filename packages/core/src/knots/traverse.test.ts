import { describe, it, expect } from 'vitest';
import { createUniformGrid, type GridMesh } from '../topo/build.js';
import { insertTJunction, removeEdge } from '../topo/mutate.js';
import type { TMesh } from '../topo/TMesh.js';
import type { HalfEdgeId, VertexId } from '../topo/handles.js';
import { castRay, clampCrossings } from './traverse.js';

function edgeBetween(mesh: TMesh, a: VertexId, b: VertexId): HalfEdgeId {
  const h = mesh.findEdge(a, b);
  if (h === null) throw new Error(`no edge ${a}->${b}`);
  return h;
}

/** 7x7 grid with the top edge above (2,5) removed */
function gridWithTopJunction(): GridMesh {
  const grid = createUniformGrid(7);
  removeEdge(grid.mesh, edgeBetween(grid.mesh, grid.vertexAt(2, 5), grid.vertexAt(2, 6)));
  return grid;
}

describe('castRay', () => {
  it('should step along edges of a regular grid', () => {
    const { mesh, vertexAt } = createUniformGrid(7);
    expect(castRay(mesh, vertexAt(3, 3), 'east', 2)).toEqual({ crossings: [4, 5], exhausted: false, end: 5 });
    expect(castRay(mesh, vertexAt(3, 3), 'south', 2)).toEqual({ crossings: [2, 1], exhausted: false, end: 1 });
  });

  it('should stop at the boundary', () => {
    const { mesh, vertexAt } = createUniformGrid(7);
    expect(castRay(mesh, vertexAt(0, 0), 'west', 2)).toEqual({ crossings: [], exhausted: true, end: 0 });
    expect(castRay(mesh, vertexAt(5, 6), 'east', 2)).toEqual({ crossings: [6], exhausted: true, end: 6 });
  });

  it('should skip vertices without a perpendicular edge', () => {
    const { mesh, vertexAt } = gridWithTopJunction();
    expect(castRay(mesh, vertexAt(1, 6), 'east', 2)).toEqual({ crossings: [3, 4], exhausted: false, end: 4 });
  });

  it('should cross a face to the vertex opposite a junction', () => {
    const { mesh, vertexAt } = gridWithTopJunction();
    expect(castRay(mesh, vertexAt(2, 5), 'north', 2)).toEqual({ crossings: [6], exhausted: true, end: 6 });
  });

  it('should continue through mid-edge crossings', () => {
    const { mesh, vertexAt } = createUniformGrid(4);
    const { to } = insertTJunction(mesh, edgeBetween(mesh, vertexAt(0, 0), vertexAt(1, 0)), 0.5);
    expect(castRay(mesh, to, 'north', 2)).toEqual({ crossings: [2, 3], exhausted: false, end: 3 });
    expect(castRay(mesh, to, 'north', 1)).toEqual({ crossings: [2], exhausted: false, end: 2 });
    expect(castRay(mesh, to, 'south', 2)).toEqual({ crossings: [0], exhausted: true, end: 0 });
  });
});

describe('clampCrossings', () => {
  it('should pad with the boundary coordinate', () => {
    expect(clampCrossings({ crossings: [6], exhausted: true, end: 6 }, 2)).toEqual([6, 6]);
    expect(clampCrossings({ crossings: [], exhausted: true, end: 0 }, 2)).toEqual([0, 0]);
    expect(clampCrossings({ crossings: [1, 2, 3], exhausted: false, end: 3 }, 2)).toEqual([1, 2]);
  });
});
