import { describe, it, expect } from 'vitest';
import { TMesh } from './TMesh.js';
import { createUniformGrid } from './build.js';
import { removeEdge, splitEdge } from './mutate.js';
import { BoundaryEdgeError, InvalidIndexError } from './errors.js';
import { asFaceId, type HalfEdgeId, type VertexId } from './handles.js';

function edgeBetween(mesh: TMesh, a: VertexId, b: VertexId): HalfEdgeId {
  const h = mesh.findEdge(a, b);
  if (h === null) throw new Error(`no edge ${a}->${b}`);
  return h;
}

describe('TMesh', () => {
  describe('construction', () => {
    it('should start empty', () => {
      const mesh = new TMesh();
      expect(mesh.getStats()).toEqual({ vertices: 0, halfEdges: 0, edges: 0, faces: 0, boundaryHalfEdges: 0 });
    });

    it('should count the entities of a grid', () => {
      const { mesh } = createUniformGrid(3);
      expect(mesh.getStats()).toEqual({ vertices: 9, halfEdges: 16, edges: 12, faces: 4, boundaryHalfEdges: 8 });
    });

    it('should store control point data', () => {
      const mesh = new TMesh();
      const v = mesh.addVertex([1, 2, 3], 0.5, [4, 5]);
      expect(mesh.vertex(v)).toEqual({ id: v, position: [1, 2, 3], weight: 0.5, param: [4, 5], outgoing: null });
    });
  });

  describe('lookups', () => {
    it('should reject indices that were never allocated', () => {
      const { mesh } = createUniformGrid(2);
      expect(() => mesh.vertex(4)).toThrow(InvalidIndexError);
      expect(() => mesh.edge(-1)).toThrow(InvalidIndexError);
      expect(() => mesh.face(1.5)).toThrow(InvalidIndexError);
    });

    it('should reject retired indices and never reuse them', () => {
      const { mesh, vertexAt } = createUniformGrid(3);
      const h = edgeBetween(mesh, vertexAt(1, 1), vertexAt(2, 1));
      removeEdge(mesh, h);

      let caught: unknown;
      try {
        mesh.edge(h);
      } catch (error) {
        caught = error;
      }
      expect(caught).toBeInstanceOf(InvalidIndexError);
      expect(caught).toMatchObject({ kind: 'InvalidIndex', entity: 'halfEdge', id: h, reason: 'retired' });

      const v = mesh.addVertex([0, 0, 0], 1, [9, 9]);
      expect(v).toBe(9);
    });

    it('should expose half-edge records', () => {
      const { mesh, vertexAt } = createUniformGrid(3);
      const bottom = edgeBetween(mesh, vertexAt(0, 0), vertexAt(1, 0));
      const record = mesh.edge(bottom);
      expect(record.origin).toBe(vertexAt(0, 0));
      expect(record.axis).toBe('s');
      expect(record.interval).toBe(1);
      expect(record.twin).toBeNull();
      expect(mesh.getHalfEdgeEnd(bottom)).toBe(vertexAt(1, 0));

      const interior = edgeBetween(mesh, vertexAt(1, 1), vertexAt(1, 2));
      expect(mesh.edge(interior).axis).toBe('t');
      expect(mesh.edge(interior).twin).not.toBeNull();
    });
  });

  describe('traversal', () => {
    it('should walk a face boundary', () => {
      const { mesh, vertexAt } = createUniformGrid(3);
      const loop = mesh.faceBoundary(asFaceId(0));
      expect(loop.map((h) => mesh.getHalfEdgeOrigin(h))).toEqual([
        vertexAt(0, 0),
        vertexAt(1, 0),
        vertexAt(1, 1),
        vertexAt(0, 1),
      ]);
    });

    it('should circulate interior and boundary vertices', () => {
      const { mesh, vertexAt } = createUniformGrid(3);
      const interior = mesh.vertexHalfEdges(vertexAt(1, 1));
      expect(interior.outgoing).toHaveLength(4);
      expect(interior.incomingBoundary).toBeNull();

      const corner = mesh.vertexHalfEdges(vertexAt(0, 0));
      expect(corner.outgoing).toHaveLength(1);
      expect(corner.incomingBoundary).not.toBeNull();

      const side = mesh.vertexHalfEdges(vertexAt(1, 0));
      expect(side.outgoing).toHaveLength(2);
      expect(side.incomingBoundary).not.toBeNull();
    });

    it('should only find edges in their stored direction on the boundary', () => {
      const { mesh, vertexAt } = createUniformGrid(3);
      expect(mesh.findEdge(vertexAt(0, 0), vertexAt(1, 0))).not.toBeNull();
      expect(mesh.findEdge(vertexAt(1, 0), vertexAt(0, 0))).toBeNull();
      expect(mesh.findEdge(vertexAt(0, 0), vertexAt(2, 2))).toBeNull();
    });

    it('should resolve destinations through twins', () => {
      const { mesh, vertexAt } = createUniformGrid(3);
      const interior = edgeBetween(mesh, vertexAt(1, 1), vertexAt(2, 1));
      expect(mesh.destinationOf(interior)).toBe(vertexAt(2, 1));

      const boundary = edgeBetween(mesh, vertexAt(0, 0), vertexAt(1, 0));
      expect(() => mesh.destinationOf(boundary)).toThrow(BoundaryEdgeError);
      expect(mesh.destinationOf(boundary, { boundaryTolerant: true })).toBe(vertexAt(1, 0));
    });
  });

  describe('change tracking', () => {
    it('should report and clear pending changes', () => {
      const mesh = new TMesh();
      const a = mesh.addVertex([0, 0, 0], 1, [0, 0]);
      mesh.recordSegment([0, 0], [1, 0]);
      expect(mesh.hasPendingChanges()).toBe(true);
      expect(mesh.takeChanges()).toEqual({ vertices: [a], segments: [[[0, 0], [1, 0]]] });
      expect(mesh.hasPendingChanges()).toBe(false);
      expect(mesh.takeChanges()).toEqual({ vertices: [], segments: [] });
    });

    it('should leave nothing pending after a build', () => {
      const { mesh } = createUniformGrid(3);
      expect(mesh.hasPendingChanges()).toBe(false);
    });

    it('should not mark vertices dirty when moving control points', () => {
      const { mesh, vertexAt } = createUniformGrid(2);
      mesh.setControlPoint(vertexAt(1, 1), [5, 5, 5], 2);
      expect(mesh.getVertexPosition(vertexAt(1, 1))).toEqual([5, 5, 5]);
      expect(mesh.getVertexWeight(vertexAt(1, 1))).toBe(2);
      expect(mesh.hasPendingChanges()).toBe(false);
    });
  });

  describe('state', () => {
    it('should restore a saved state', () => {
      const { mesh, vertexAt } = createUniformGrid(3);
      const before = mesh.getStats();
      const state = mesh.saveState();

      removeEdge(mesh, edgeBetween(mesh, vertexAt(1, 1), vertexAt(2, 1)));
      expect(mesh.getStats().faces).toBe(3);

      mesh.restoreState(state);
      expect(mesh.getStats()).toEqual(before);
      expect(mesh.hasPendingChanges()).toBe(false);
      expect(mesh.findEdge(vertexAt(1, 1), vertexAt(2, 1))).not.toBeNull();
    });

    it('should keep ids allocated after the save retired once restored', () => {
      const { mesh, vertexAt } = createUniformGrid(3);
      const before = mesh.getStats();
      const state = mesh.saveState();

      expect(splitEdge(mesh, edgeBetween(mesh, vertexAt(0, 0), vertexAt(1, 0)), 0.5)).toBe(9);
      mesh.restoreState(state);

      expect(mesh.getStats()).toEqual(before);
      expect(mesh.vertexCount).toBe(10);
      expect(() => mesh.assertVertex(9)).toThrow(new InvalidIndexError('vertex', 9, 'retired'));
      expect(splitEdge(mesh, edgeBetween(mesh, vertexAt(1, 0), vertexAt(2, 0)), 1.5)).toBe(10);
    });

    it('should clone independently', () => {
      const { mesh, vertexAt } = createUniformGrid(3);
      const copy = mesh.clone();
      removeEdge(copy, edgeBetween(copy, vertexAt(1, 1), vertexAt(2, 1)));
      expect(copy.getStats().faces).toBe(3);
      expect(mesh.getStats().faces).toBe(4);
      expect(copy.ctx).toBe(mesh.ctx);
    });
  });
});
