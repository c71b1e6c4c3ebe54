/**
 * Tests for TSplineSession transactions, propagation and evaluation
 */

import { describe, it, expect } from 'vitest';
import { TSplineSession } from './TSplineSession.js';
import { createUniformGrid, type GridMesh } from '../topo/build.js';
import { insertTJunction, removeEdge } from '../topo/mutate.js';
import { validateAsts } from '../asts/validate.js';
import { createTSplineSurface } from '../geom/tspline.js';
import { evalSurface } from '../geom/surface.js';
import { KnotCache } from '../knots/cache.js';
import { AstsViolationError, InvalidIndexError } from '../topo/errors.js';
import type { TMesh } from '../topo/TMesh.js';
import { asVertexId, type HalfEdgeId, type VertexId } from '../topo/handles.js';
import type { TSplineSessionOptions } from './types.js';

function edgeBetween(mesh: TMesh, a: VertexId, b: VertexId): HalfEdgeId {
  const h = mesh.findEdge(a, b);
  if (h === null) throw new Error(`no edge ${a}->${b}`);
  return h;
}

/** 7x7 grid with a horizontal junction pair at t = 3 */
function junctionGrid(): GridMesh {
  const grid = createUniformGrid(7);
  removeEdge(grid.mesh, edgeBetween(grid.mesh, grid.vertexAt(1, 3), grid.vertexAt(2, 3)));
  grid.mesh.takeChanges();
  return grid;
}

function session(options: TSplineSessionOptions = {}): { session: TSplineSession; grid: GridMesh; messages: string[] } {
  const grid = junctionGrid();
  const messages: string[] = [];
  return {
    session: new TSplineSession(grid.mesh, { verbose: true, logger: (m) => messages.push(m), ...options }),
    grid,
    messages,
  };
}

describe('TSplineSession', () => {
  describe('reject policy', () => {
    it('should commit edits that keep the mesh analysis-suitable', () => {
      const { session: s, grid } = session();
      const result = s.removeEdge(edgeBetween(grid.mesh, grid.vertexAt(4, 4), grid.vertexAt(5, 4)));
      expect(result.ok).toBe(true);
      if (!result.ok) return;
      expect(result.value.report.isValid).toBe(true);
      expect(result.value.propagated).toEqual([]);
    });

    it('should roll back a junction whose extension crosses another', () => {
      const { session: s, grid, messages } = session();
      const before = s.describe();
      const stats = grid.mesh.getStats();

      const result = s.insertTJunction(edgeBetween(grid.mesh, grid.vertexAt(2, 2), grid.vertexAt(3, 2)), 2.5);
      expect(result.ok).toBe(false);
      if (result.ok) return;
      expect(result.error).toBeInstanceOf(AstsViolationError);
      expect(result.error.kind).toBe('AstsViolation');
      expect(result.error.message).toBe(
        'Mesh is not analysis-suitable: 4 crossing extension pair(s) (22x49, 22x50, 23x49, 23x50)'
      );

      expect(s.describe()).toEqual(before);
      expect(grid.mesh.getStats()).toEqual(stats);
      expect(messages).toEqual([`[tmesh] insertTJunction: rolled back (AstsViolation: ${result.error.message})`]);
    });

    it('should retire ids handed out by a rolled-back edit', () => {
      const { session: s, grid } = session();
      const stats = grid.mesh.getStats();
      const rejected = s.insertTJunction(edgeBetween(grid.mesh, grid.vertexAt(2, 2), grid.vertexAt(3, 2)), 2.5);
      expect(rejected.ok).toBe(false);
      expect(grid.mesh.getStats()).toEqual(stats);

      for (const id of [49, 50]) {
        expect(() => grid.mesh.assertVertex(id)).toThrow(new InvalidIndexError('vertex', id, 'retired'));
      }

      const split = s.splitEdge(edgeBetween(grid.mesh, grid.vertexAt(5, 0), grid.vertexAt(6, 0)), 5.5);
      expect(split.ok).toBe(true);
      if (!split.ok) return;
      expect(split.value.value).toBe(51);
      expect(grid.mesh.getVertexParam(split.value.value)).toEqual([5.5, 0]);
    });

    it('should report primitive errors as failures', () => {
      const { session: s, grid } = session();
      const result = s.removeEdge(edgeBetween(grid.mesh, grid.vertexAt(0, 0), grid.vertexAt(1, 0)));
      expect(result.ok).toBe(false);
      if (result.ok) return;
      expect(result.error.kind).toBe('BoundaryEdge');
    });

    it('should restore the mesh and rethrow unexpected errors', () => {
      const { session: s, grid } = session();
      const stats = grid.mesh.getStats();
      expect(() =>
        s.mutate('custom', (mesh) => {
          removeEdge(mesh, edgeBetween(mesh, grid.vertexAt(4, 4), grid.vertexAt(5, 4)));
          throw new Error('boom');
        })
      ).toThrow('boom');
      expect(grid.mesh.getStats()).toEqual(stats);
    });
  });

  describe('propagate policy', () => {
    it('should extend junctions until the mesh is valid', () => {
      const { session: s, grid, messages } = session({ policy: 'propagate' });
      const result = s.insertTJunction(edgeBetween(grid.mesh, grid.vertexAt(2, 2), grid.vertexAt(3, 2)), 2.5);

      expect(result.ok).toBe(true);
      if (!result.ok) return;
      expect(result.value.value.created).toEqual([49, 50]);
      expect(result.value.propagated).toEqual([51, 52, 53]);
      expect(result.value.report.isValid).toBe(true);
      expect(grid.mesh.getStats().vertices).toBe(54);
      expect(grid.mesh.getVertexParam(grid.mesh.assertVertex(53))).toEqual([2.5, 5]);
      expect(validateAsts(grid.mesh).isValid).toBe(true);

      expect(messages.slice(0, 2)).toEqual([
        '[tmesh] insertTJunction: propagation step 1 extended 2 junctions, 2 new vertices',
        '[tmesh] insertTJunction: propagation step 2 extended 1 junctions, 1 new vertices',
      ]);
      expect(messages[2]).toMatch(/^\[tmesh\] insertTJunction: committed, \d+ knot vectors invalidated$/);
    });

    it('should roll back when propagation runs out of steps', () => {
      const { session: s, grid, messages } = session({ policy: 'propagate', maxPropagationSteps: 1 });
      const stats = grid.mesh.getStats();
      const result = s.insertTJunction(edgeBetween(grid.mesh, grid.vertexAt(2, 2), grid.vertexAt(3, 2)), 2.5);

      expect(result.ok).toBe(false);
      if (result.ok) return;
      expect(result.error).toBeInstanceOf(AstsViolationError);
      if (!(result.error instanceof AstsViolationError)) return;
      expect(result.error.violations.map((v) => [v.horizontal, v.vertical])).toEqual([
        [22, 52],
        [23, 52],
      ]);
      expect(grid.mesh.getStats()).toEqual(stats);
      expect(messages[1]).toBe('[tmesh] insertTJunction: propagation did not converge in 1 steps');
    });
  });

  describe('knot cache', () => {
    it('should drop cached knots around a committed edit', () => {
      const { mesh, vertexAt } = createUniformGrid(7);
      const s = new TSplineSession(mesh);
      s.revalidate();
      const result = s.removeEdge(edgeBetween(s.mesh, vertexAt(1, 3), vertexAt(2, 3)));
      expect(result.ok).toBe(true);
      if (!result.ok) return;
      expect(result.value.invalidated).toEqual(expect.arrayContaining([22, 23, 36]));
      expect(result.value.invalidated).not.toContain(40);
      expect(result.value.invalidated).not.toContain(0);
      expect(s.knots(vertexAt(1, 3)).s).toEqual([0, 0, 1, 2, 3]);
    });

    it('should log knot inference on revalidate', () => {
      const { session: s, messages } = session();
      expect(s.revalidate().isValid).toBe(true);
      expect(messages).toEqual(['[tmesh] revalidate: inferred knots for 49 vertices']);
      expect(s.revalidate().isValid).toBe(true);
      expect(messages).toHaveLength(1);
    });
  });

  describe('evaluation', () => {
    it('should cache the snapshot until the next commit', () => {
      const { session: s, grid } = session();
      const first = s.snapshot();
      const second = s.snapshot();
      expect(first.ok && second.ok && first.value === second.value).toBe(true);

      s.removeEdge(edgeBetween(grid.mesh, grid.vertexAt(4, 4), grid.vertexAt(5, 4)));
      const third = s.snapshot();
      expect(first.ok && third.ok && first.value !== third.value).toBe(true);
    });

    it('should keep an old snapshot unchanged by later edits', () => {
      const { session: s, grid } = session();
      const before = s.snapshot();
      if (!before.ok) throw before.error;
      const point = evalSurface(before.value, 3, 3);
      const count = before.value.count;

      const edit = s.insertTJunction(edgeBetween(grid.mesh, grid.vertexAt(4, 1), grid.vertexAt(5, 1)), 4.5);
      expect(edit.ok).toBe(true);
      expect(before.value.count).toBe(count);
      expect(evalSurface(before.value, 3, 3)).toEqual(point);
    });

    it('should evaluate the current surface', () => {
      const { session: s } = session();
      const reference = junctionGrid().mesh;
      const expected = evalSurface(createTSplineSurface(reference, new KnotCache()), 3, 3);

      const result = s.evaluate(3, 3);
      expect(result).toEqual({ ok: true, value: expected });

      const ders = s.evaluateDerivatives(3, 3, 2);
      expect(ders.ok).toBe(true);
      if (!ders.ok) return;
      expect(ders.value.point).toEqual(expected);
    });

    it('should evaluate a moved control point after the edit commits', () => {
      const { mesh, vertexAt } = createUniformGrid(7);
      const s = new TSplineSession(mesh);
      const before = s.evaluate(3, 3);
      expect(before.ok).toBe(true);
      if (!before.ok) return;
      expect(before.value[2]).toBeCloseTo(0, 12);

      const moved = s.setControlPoint(vertexAt(3, 3), [3, 3, 10]);
      expect(moved.ok).toBe(true);

      const after = s.evaluate(3, 3);
      expect(after.ok).toBe(true);
      if (!after.ok) return;
      // Centre basis value at an interior knot is (2/3)^2
      expect(after.value[2]).toBeCloseTo(40 / 9, 12);
      expect(after.value[0]).toBeCloseTo(3, 12);
      expect(after.value[1]).toBeCloseTo(3, 12);
    });

    it('should reject moving a control point that does not exist', () => {
      const { session: s } = session();
      const result = s.setControlPoint(asVertexId(1000), [0, 0, 0]);
      expect(result).toMatchObject({ ok: false, error: { kind: 'InvalidIndex', id: 1000 } });
    });

    it('should report evaluation outside every support as a failure', () => {
      const { session: s } = session();
      const result = s.evaluate(100, 100);
      expect(result.ok).toBe(false);
      if (result.ok) return;
      expect(result.error).toMatchObject({ kind: 'DegenerateParameter', u: 100, v: 100 });
    });

    it('should refuse to snapshot a mesh that is not analysis-suitable', () => {
      const grid = junctionGrid();
      insertTJunction(grid.mesh, edgeBetween(grid.mesh, grid.vertexAt(2, 2), grid.vertexAt(3, 2)), 2.5);
      const s = new TSplineSession(grid.mesh);

      expect(s.snapshot()).toMatchObject({ ok: false, error: { kind: 'AstsViolation' } });
      expect(s.evaluate(3, 3)).toMatchObject({ ok: false, error: { kind: 'AstsViolation' } });
    });
  });

  describe('fromDescription', () => {
    it('should rebuild an equivalent session from a description', () => {
      const { session: s, grid } = session();
      const copy = TSplineSession.fromDescription(s.describe());
      expect(copy.mesh.getStats()).toEqual(grid.mesh.getStats());
      expect(copy.describe()).toEqual(s.describe());
      expect(copy.revalidate().isValid).toBe(true);
    });
  });
});
