import { describe, it, expect } from 'vitest';
import { TMesh } from './TMesh.js';
import { createUniformGrid } from './build.js';
import { removeEdge } from './mutate.js';
import { classifyVertex, vertexStar, opposite, directionSign, isTJunction } from './star.js';
import { faceInDirection, faceCrossing } from './faceWalk.js';
import type { GridMesh } from './build.js';
import type { FaceId } from './handles.js';

/** 3x3 grid with the interior edge east of the centre removed */
function gridWithJunction(): GridMesh & { merged: FaceId } {
  const grid = createUniformGrid(3);
  const h = grid.mesh.findEdge(grid.vertexAt(1, 1), grid.vertexAt(2, 1));
  if (h === null) throw new Error('missing edge');
  const merged = grid.mesh.getHalfEdgeFace(h);
  removeEdge(grid.mesh, h);
  return { ...grid, merged };
}

describe('directions', () => {
  it('should pair opposites and signs', () => {
    expect(opposite('east')).toBe('west');
    expect(opposite('south')).toBe('north');
    expect(directionSign('north')).toBe(1);
    expect(directionSign('west')).toBe(-1);
  });
});

describe('vertexStar', () => {
  it('should list outgoing spokes then the incoming boundary spoke', () => {
    const { mesh, vertexAt } = createUniformGrid(3);
    const spokes = vertexStar(mesh, vertexAt(0, 0));
    expect(spokes.map(({ direction, neighbor, outgoing, boundary }) => ({ direction, neighbor, outgoing, boundary }))).toEqual([
      { direction: 'east', neighbor: vertexAt(1, 0), outgoing: true, boundary: true },
      { direction: 'north', neighbor: vertexAt(0, 1), outgoing: false, boundary: true },
    ]);
  });

  it('should find four interior spokes', () => {
    const { mesh, vertexAt } = createUniformGrid(3);
    const directions = vertexStar(mesh, vertexAt(1, 1)).map((s) => s.direction);
    expect([...directions].sort()).toEqual(['east', 'north', 'south', 'west']);
  });
});

describe('classifyVertex', () => {
  it('should classify grid vertices', () => {
    const { mesh, vertexAt } = createUniformGrid(3);
    expect(classifyVertex(mesh, vertexAt(1, 1))).toEqual({ kind: 'regular', valence: 4, missing: [], orientation: null });
    expect(classifyVertex(mesh, vertexAt(1, 0)).kind).toBe('boundary');
    expect(classifyVertex(mesh, vertexAt(2, 2)).kind).toBe('boundary');
  });

  it('should orient a T-junction along its missing direction', () => {
    const { mesh, vertexAt } = gridWithJunction();
    expect(classifyVertex(mesh, vertexAt(1, 1))).toEqual({
      kind: 'tJunction',
      valence: 3,
      missing: ['east'],
      orientation: 's',
    });
    expect(isTJunction(mesh, vertexAt(1, 1))).toBe(true);
    expect(isTJunction(mesh, vertexAt(2, 1))).toBe(false);
  });

  it('should classify vertices without edges as isolated', () => {
    const mesh = new TMesh();
    const v = mesh.addVertex([0, 0, 0], 1, [0, 0]);
    expect(classifyVertex(mesh, v)).toEqual({
      kind: 'isolated',
      valence: 0,
      missing: ['east', 'north', 'west', 'south'],
      orientation: null,
    });
  });
});

describe('faceInDirection', () => {
  it('should find the face a junction points into', () => {
    const { mesh, vertexAt, merged } = gridWithJunction();
    expect(faceInDirection(mesh, vertexAt(1, 1), 'east')).toBe(merged);
  });

  it('should return null along edges and out of the mesh', () => {
    const { mesh, vertexAt } = createUniformGrid(3);
    expect(faceInDirection(mesh, vertexAt(1, 1), 'north')).toBeNull();
    expect(faceInDirection(mesh, vertexAt(0, 0), 'west')).toBeNull();
  });
});

describe('faceCrossing', () => {
  it('should stop at the nearest side ahead', () => {
    const { mesh, vertexAt, merged } = gridWithJunction();
    const hit = faceCrossing(mesh, merged, [1, 1], 'east');
    expect(hit.coordinate).toBe(2);
    expect(hit.vertex).toBe(vertexAt(2, 1));
  });

  it('should report mid-edge crossings without a vertex', () => {
    const { mesh, vertexAt, merged } = gridWithJunction();
    const hit = faceCrossing(mesh, merged, [1.5, 0], 'north');
    expect(hit.coordinate).toBe(2);
    expect(hit.vertex).toBeNull();
    expect(mesh.getHalfEdgeOrigin(hit.halfEdge)).toBe(vertexAt(2, 2));
  });
});
