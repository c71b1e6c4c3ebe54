/**
 * T-mesh construction and serialization
 *
 * - createTMesh: load a fully-formed description, fail fast on any invariant
 * - describeTMesh: the inverse, with live entities renumbered densely
 * - buildTMesh: derive half-edges, twins, axes and intervals from face loops
 * - createGrid: rectangular control grid (a T-mesh with no T-junctions)
 */

import type { Vec3 } from '../num/vec3.js';
import { createNumericContext, isZero, type NumericContext } from '../num/tolerance.js';
import { TMesh, type Axis } from './TMesh.js';
import { asFaceId, asHalfEdgeId, asVertexId, isNullId, NULL_ID, type HalfEdgeId, type VertexId } from './handles.js';
import { DescriptionError, TopologyCorruptError } from './errors.js';
import { validateTMesh, type ValidationOptions } from './validate.js';
import {
  faceLoopMeshSchema,
  topologyDescriptionSchema,
  type FaceLoopMesh,
  type TopologyDescription,
  type TopologyDescriptionInput,
} from './schema.js';

export interface BuildOptions {
  ctx?: NumericContext;
  validation?: ValidationOptions;
}

function assertValid(mesh: TMesh, options: BuildOptions): void {
  const report = validateTMesh(mesh, options.validation);
  if (!report.isValid) {
    const first = report.issues.find((i) => i.severity === 'error');
    throw new TopologyCorruptError(
      `Topology failed validation with ${report.errorCount} error(s)${first ? `: ${first.message}` : ''}`,
      report
    );
  }
  // A freshly built mesh has nothing pending for the knot cache
  mesh.takeChanges();
}

/**
 * Load a fully-formed topology description.
 *
 * Throws DescriptionError when the input does not match the schema and
 * TopologyCorruptError (carrying the validation report) when it violates a
 * mesh invariant.
 */
export function createTMesh(description: TopologyDescriptionInput, options: BuildOptions = {}): TMesh {
  const parsed = topologyDescriptionSchema.safeParse(description);
  if (!parsed.success) {
    throw new DescriptionError(parsed.error.issues);
  }
  const desc = parsed.data;
  const mesh = new TMesh(options.ctx ?? createNumericContext());

  for (const v of desc.vertices) {
    mesh.addVertex(v.position, v.weight, v.param);
  }
  for (const h of desc.halfEdges) {
    mesh.addHalfEdge(asVertexId(h.origin), h.axis, h.interval);
  }
  for (const f of desc.faces) {
    mesh.addFace(asHalfEdgeId(f.edge));
  }

  desc.vertices.forEach((v, i) => {
    mesh.setVertexOutgoing(asVertexId(i), v.outgoing === null ? asHalfEdgeId(NULL_ID) : asHalfEdgeId(v.outgoing));
  });
  desc.halfEdges.forEach((h, i) => {
    const id = asHalfEdgeId(i);
    mesh.setHalfEdgeTwin(id, h.twin === null ? NULL_ID : asHalfEdgeId(h.twin));
    mesh.setHalfEdgeFace(id, asFaceId(h.face));
    mesh.setHalfEdgeNext(id, asHalfEdgeId(h.next));
    mesh.setHalfEdgePrev(id, asHalfEdgeId(h.prev));
  });

  assertValid(mesh, options);
  return mesh;
}

/**
 * Serialize a mesh. Live entities are listed in ascending id order and
 * renumbered densely, so retired slots do not appear.
 */
export function describeTMesh(mesh: TMesh): TopologyDescription {
  const vertexIndex = new Map<number, number>();
  const halfEdgeIndex = new Map<number, number>();
  const faceIndex = new Map<number, number>();
  for (const v of mesh.vertexIds()) vertexIndex.set(v, vertexIndex.size);
  for (const h of mesh.halfEdgeIds()) halfEdgeIndex.set(h, halfEdgeIndex.size);
  for (const f of mesh.faceIds()) faceIndex.set(f, faceIndex.size);

  const remap = (map: Map<number, number>, id: number): number => {
    const out = map.get(id);
    if (out === undefined) {
      throw new TopologyCorruptError(`Cannot describe mesh: reference to retired entity ${id}`);
    }
    return out;
  };

  return {
    vertices: [...mesh.vertexIds()].map((v) => {
      const out = mesh.getVertexOutgoing(v);
      return {
        position: mesh.getVertexPosition(v),
        weight: mesh.getVertexWeight(v),
        param: mesh.getVertexParam(v),
        outgoing: isNullId(out) ? null : remap(halfEdgeIndex, out),
      };
    }),
    halfEdges: [...mesh.halfEdgeIds()].map((h) => {
      const twin = mesh.getHalfEdgeTwin(h);
      return {
        origin: remap(vertexIndex, mesh.getHalfEdgeOrigin(h)),
        twin: isNullId(twin) ? null : remap(halfEdgeIndex, twin),
        face: remap(faceIndex, mesh.getHalfEdgeFace(h)),
        next: remap(halfEdgeIndex, mesh.getHalfEdgeNext(h)),
        prev: remap(halfEdgeIndex, mesh.getHalfEdgePrev(h)),
        axis: mesh.getHalfEdgeAxis(h),
        interval: mesh.getHalfEdgeInterval(h),
      };
    }),
    faces: [...mesh.faceIds()].map((f) => ({ edge: remap(halfEdgeIndex, mesh.getFaceEdge(f)) })),
  };
}

/**
 * Build a mesh from counter-clockwise face loops over a vertex list.
 * Half-edges, twins, axis tags and knot intervals are derived from the
 * vertex parameters.
 */
export function buildTMesh(input: FaceLoopMesh, options: BuildOptions = {}): TMesh {
  const parsed = faceLoopMeshSchema.safeParse(input);
  if (!parsed.success) {
    throw new DescriptionError(parsed.error.issues);
  }
  const { vertices, faces } = parsed.data;
  const ctx = options.ctx ?? createNumericContext();
  const mesh = new TMesh(ctx);

  for (const v of vertices) {
    mesh.addVertex(v.position ?? [v.param[0], v.param[1], 0], v.weight ?? 1, v.param);
  }

  const directed = new Map<string, HalfEdgeId>();
  faces.forEach((loop, fi) => {
    const face = mesh.addFace();
    const loopEdges: HalfEdgeId[] = [];
    for (let i = 0; i < loop.length; i++) {
      const a = loop[i];
      const b = loop[(i + 1) % loop.length];
      if (a >= vertices.length || b >= vertices.length) {
        throw new TopologyCorruptError(`Face ${fi} references unknown vertex ${Math.max(a, b)}`);
      }
      const [sa, ta] = vertices[a].param;
      const [sb, tb] = vertices[b].param;
      const ds = sb - sa;
      const dt = tb - ta;
      let axis: Axis;
      if (isZero(dt, ctx) && !isZero(ds, ctx)) {
        axis = 's';
      } else if (isZero(ds, ctx) && !isZero(dt, ctx)) {
        axis = 't';
      } else {
        throw new TopologyCorruptError(`Face ${fi} side ${a}->${b} is not a non-degenerate axis-aligned edge`);
      }

      const key = `${a},${b}`;
      if (directed.has(key)) {
        throw new TopologyCorruptError(`Directed edge ${a}->${b} is used by more than one face`);
      }
      const h = mesh.addHalfEdge(asVertexId(a), axis, Math.abs(axis === 's' ? ds : dt));
      mesh.setHalfEdgeFace(h, face);
      directed.set(key, h);
      loopEdges.push(h);
      if (isNullId(mesh.getVertexOutgoing(asVertexId(a)))) {
        mesh.setVertexOutgoing(asVertexId(a), h);
      }
    }
    for (let i = 0; i < loopEdges.length; i++) {
      mesh.linkHalfEdges(loopEdges[i], loopEdges[(i + 1) % loopEdges.length]);
    }
    mesh.setFaceEdge(face, loopEdges[0]);
  });

  for (const [key, h] of directed) {
    const [a, b] = key.split(',');
    const twin = directed.get(`${b},${a}`);
    if (twin !== undefined) mesh.setHalfEdgeTwin(h, twin);
  }

  assertValid(mesh, options);
  return mesh;
}

export interface GridOptions extends BuildOptions {
  /** Control point position for grid node (i, j); defaults to (s, t, 0) */
  position?: (s: number, t: number, i: number, j: number) => Vec3;
  /** Control point weight for grid node (i, j); defaults to 1 */
  weight?: (i: number, j: number) => number;
}

export interface GridMesh {
  mesh: TMesh;
  /** Vertex at column i (s index) and row j (t index) */
  vertexAt(i: number, j: number): VertexId;
}

/**
 * Rectangular control grid over strictly increasing s and t coordinates.
 * Vertex (i, j) has id j * sCoords.length + i.
 */
export function createGrid(sCoords: readonly number[], tCoords: readonly number[], options: GridOptions = {}): GridMesh {
  const ns = sCoords.length;
  const nt = tCoords.length;
  if (ns < 2 || nt < 2) {
    throw new TopologyCorruptError(`A grid needs at least 2x2 vertices, got ${ns}x${nt}`);
  }
  const vertices: FaceLoopMesh['vertices'] = [];
  for (let j = 0; j < nt; j++) {
    for (let i = 0; i < ns; i++) {
      const s = sCoords[i];
      const t = tCoords[j];
      vertices.push({
        param: [s, t],
        position: options.position?.(s, t, i, j),
        weight: options.weight?.(i, j),
      });
    }
  }
  const faces: number[][] = [];
  for (let j = 0; j < nt - 1; j++) {
    for (let i = 0; i < ns - 1; i++) {
      const v00 = j * ns + i;
      faces.push([v00, v00 + 1, v00 + ns + 1, v00 + ns]);
    }
  }
  const mesh = buildTMesh({ vertices, faces }, options);
  return {
    mesh,
    vertexAt: (i, j) => mesh.assertVertex(j * ns + i),
  };
}

/**
 * Grid with integer coordinates 0..size-1 on both axes
 */
export function createUniformGrid(size: number, options: GridOptions = {}): GridMesh {
  const coords = Array.from({ length: size }, (_, i) => i);
  return createGrid(coords, coords, options);
}
