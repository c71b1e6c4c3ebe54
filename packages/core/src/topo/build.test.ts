import { readFileSync } from 'node:fs';
import { describe, it, expect } from 'vitest';
import { createTMesh, describeTMesh, buildTMesh, createGrid } from './build.js';
import { topologyDescriptionSchema, type TopologyDescriptionInput } from './schema.js';
import { DescriptionError, TopologyCorruptError } from './errors.js';
import { removeEdge } from './mutate.js';

function unitSquare(): TopologyDescriptionInput {
  const raw: unknown = JSON.parse(
    readFileSync(new URL('../../tests/fixtures/unit-square.json', import.meta.url), 'utf8')
  );
  return topologyDescriptionSchema.parse(raw);
}

describe('createTMesh', () => {
  it('should load a valid description', () => {
    const mesh = createTMesh(unitSquare());
    expect(mesh.getStats()).toEqual({ vertices: 4, halfEdges: 4, edges: 4, faces: 1, boundaryHalfEdges: 4 });
    expect(mesh.edge(1)).toMatchObject({ origin: 1, axis: 't', interval: 1, twin: null, next: 2, prev: 0 });
  });

  it('should default missing weights to 1', () => {
    const desc = unitSquare();
    const vertices = desc.vertices.map((v) => ({ position: v.position, param: v.param, outgoing: v.outgoing }));
    const mesh = createTMesh({ ...desc, vertices });
    expect(mesh.getVertexWeight(mesh.assertVertex(2))).toBe(1);
  });

  it('should reject input that does not match the schema', () => {
    const desc = unitSquare();
    desc.halfEdges[2] = { ...desc.halfEdges[2], interval: -1 };

    let caught: unknown;
    try {
      createTMesh(desc);
    } catch (error) {
      caught = error;
    }
    expect(caught).toBeInstanceOf(DescriptionError);
    if (!(caught instanceof DescriptionError)) return;
    expect(caught.kind).toBe('TopologyCorrupt');
    expect(caught.issues.map((i) => i.path.join('.'))).toEqual(['halfEdges.2.interval']);
  });

  it('should reject broken loops with a validation report', () => {
    const desc = unitSquare();
    desc.halfEdges[3] = { ...desc.halfEdges[3], next: 1 };

    let caught: unknown;
    try {
      createTMesh(desc);
    } catch (error) {
      caught = error;
    }
    expect(caught).toBeInstanceOf(TopologyCorruptError);
    if (!(caught instanceof TopologyCorruptError)) return;
    expect(caught.report?.isValid).toBe(false);
    expect(caught.report?.issues.map((i) => i.kind)).toContain('brokenLoopCycle');
  });

  it('should reject a clockwise face', () => {
    const desc = unitSquare();
    // Same loop with the parameters mirrored in s
    desc.vertices = desc.vertices.map((v): typeof v => ({ ...v, param: [-v.param[0], v.param[1]] }));
    expect(() => createTMesh(desc)).toThrow(TopologyCorruptError);
  });
});

describe('describeTMesh', () => {
  it('should round-trip a mesh', () => {
    const { mesh } = createGrid([0, 1, 3], [0, 2, 3]);
    const copy = createTMesh(describeTMesh(mesh));
    expect(copy.getStats()).toEqual(mesh.getStats());
    expect(describeTMesh(copy)).toEqual(describeTMesh(mesh));
  });

  it('should renumber live entities densely', () => {
    const { mesh, vertexAt } = createGrid([0, 1, 2], [0, 1, 2]);
    const h = mesh.findEdge(vertexAt(1, 1), vertexAt(2, 1));
    expect(h).not.toBeNull();
    if (h === null) return;
    removeEdge(mesh, h);

    const desc = describeTMesh(mesh);
    expect(desc.halfEdges).toHaveLength(14);
    expect(desc.faces).toHaveLength(3);
    for (const e of desc.halfEdges) {
      expect(e.next).toBeLessThan(14);
      expect(e.face).toBeLessThan(3);
    }
    expect(createTMesh(desc).getStats()).toEqual(mesh.getStats());
  });
});

describe('buildTMesh', () => {
  it('should derive axes, intervals and twins', () => {
    const mesh = buildTMesh({
      vertices: [{ param: [0, 0] }, { param: [2, 0] }, { param: [2, 1] }, { param: [0, 1] }, { param: [3, 0] }, { param: [3, 1] }],
      faces: [
        [0, 1, 2, 3],
        [1, 4, 5, 2],
      ],
    });
    const shared = mesh.findEdge(mesh.assertVertex(1), mesh.assertVertex(2));
    expect(shared).not.toBeNull();
    if (shared === null) return;
    expect(mesh.edge(shared)).toMatchObject({ axis: 't', interval: 1 });
    expect(mesh.edge(shared).twin).not.toBeNull();

    const bottom = mesh.findEdge(mesh.assertVertex(0), mesh.assertVertex(1));
    expect(bottom === null ? null : mesh.edge(bottom).interval).toBe(2);
    expect(mesh.getVertexPosition(mesh.assertVertex(4))).toEqual([3, 0, 0]);
  });

  it('should reject diagonal sides', () => {
    expect(() =>
      buildTMesh({
        vertices: [{ param: [0, 0] }, { param: [1, 0] }, { param: [1, 1] }, { param: [0.5, 2] }],
        faces: [[0, 1, 2, 3]],
      })
    ).toThrow(TopologyCorruptError);
  });

  it('should reject faces with fewer than four corners', () => {
    expect(() =>
      buildTMesh({
        vertices: [{ param: [0, 0] }, { param: [1, 0] }, { param: [1, 1] }],
        faces: [[0, 1, 2]],
      })
    ).toThrow(DescriptionError);
  });
});

describe('createGrid', () => {
  it('should apply position and weight callbacks', () => {
    const { mesh, vertexAt } = createGrid([0, 1], [0, 1], {
      position: (s, t) => [10 * s, 10 * t, s + t],
      weight: (i, j) => 1 + i + j,
    });
    expect(mesh.getVertexPosition(vertexAt(1, 1))).toEqual([10, 10, 2]);
    expect(mesh.getVertexWeight(vertexAt(1, 1))).toBe(3);
    expect(mesh.getVertexParam(vertexAt(1, 0))).toEqual([1, 0]);
  });

  it('should need at least two coordinates per axis', () => {
    expect(() => createGrid([0], [0, 1])).toThrow(TopologyCorruptError);
  });
});
