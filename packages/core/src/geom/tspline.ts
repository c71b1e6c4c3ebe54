/**
 * T-spline surface evaluation
 *
 * A TSplineSurface is an immutable snapshot of a T-mesh: control points,
 * weights and inferred local knots packed into typed arrays, plus a support
 * index. Evaluation never touches the mesh, so a snapshot can be shared
 * across workers while the mesh keeps changing.
 *
 *   S(u,v) = Σ w_i P_i B_i(u,v) / Σ w_i B_i(u,v)
 *   B_i(u,v) = N[s-knots_i](u) · N[t-knots_i](v)
 */

import type { Vec3 } from '../num/vec3.js';
import type { TMesh } from '../topo/TMesh.js';
import type { VertexId } from '../topo/handles.js';
import { asVertexId } from '../topo/handles.js';
import { KnotCache } from '../knots/cache.js';
import { DEGREE, LOCAL_KNOT_COUNT } from '../knots/infer.js';
import { basisDerivatives } from './basis.js';
import { RationalAccumulator, type DerivativeOrder, type SurfaceDerivatives, type BlendTerms } from './rational.js';
import { SupportIndex, type SupportRect } from './supportIndex.js';

/**
 * Axis-aligned rectangle of parameter space
 */
export interface ParamDomain {
  sMin: number;
  sMax: number;
  tMin: number;
  tMax: number;
}

export interface TSplineSurface {
  readonly kind: 'tspline';
  readonly degree: typeof DEGREE;
  /** Number of control points */
  readonly count: number;
  /** Source vertex of each control point */
  readonly vertices: Int32Array;
  /** x, y, z, w per control point */
  readonly points: Float64Array;
  /** LOCAL_KNOT_COUNT s-knots per control point */
  readonly sKnots: Float64Array;
  /** LOCAL_KNOT_COUNT t-knots per control point */
  readonly tKnots: Float64Array;
  /** Parameter rectangle spanned by the control points */
  readonly bounds: ParamDomain;
  /** Region over which the blending functions sum to one (falls back to bounds) */
  readonly domain: ParamDomain;
  /** Rational denominators below this are degenerate */
  readonly denominatorTolerance: number;
  readonly index: SupportIndex;
}

/**
 * Snapshot a mesh for evaluation. Missing knot vectors are inferred
 * through the cache; a fresh cache is used when none is given.
 */
export function createTSplineSurface(mesh: TMesh, cache: KnotCache = new KnotCache()): TSplineSurface {
  cache.refresh(mesh);

  const ids: VertexId[] = [...mesh.vertexIds()];
  const count = ids.length;
  const vertices = new Int32Array(count);
  const points = new Float64Array(count * 4);
  const sKnots = new Float64Array(count * LOCAL_KNOT_COUNT);
  const tKnots = new Float64Array(count * LOCAL_KNOT_COUNT);
  const rects: SupportRect[] = [];
  const bounds: ParamDomain = { sMin: Infinity, sMax: -Infinity, tMin: Infinity, tMax: -Infinity };
  const inner: ParamDomain = { sMin: Infinity, sMax: -Infinity, tMin: Infinity, tMax: -Infinity };

  ids.forEach((v, i) => {
    const [x, y, z] = mesh.getVertexPosition(v);
    const [s, t] = mesh.getVertexParam(v);
    const knots = cache.get(mesh, v);

    vertices[i] = v;
    points.set([x, y, z, mesh.getVertexWeight(v)], 4 * i);
    sKnots.set(knots.s, LOCAL_KNOT_COUNT * i);
    tKnots.set(knots.t, LOCAL_KNOT_COUNT * i);
    rects.push({
      sMin: knots.s[0],
      sMax: knots.s[LOCAL_KNOT_COUNT - 1],
      tMin: knots.t[0],
      tMax: knots.t[LOCAL_KNOT_COUNT - 1],
    });

    bounds.sMin = Math.min(bounds.sMin, s);
    bounds.sMax = Math.max(bounds.sMax, s);
    bounds.tMin = Math.min(bounds.tMin, t);
    bounds.tMax = Math.max(bounds.tMax, t);
    inner.sMin = Math.min(inner.sMin, knots.s[3]);
    inner.sMax = Math.max(inner.sMax, knots.s[1]);
    inner.tMin = Math.min(inner.tMin, knots.t[3]);
    inner.tMax = Math.max(inner.tMax, knots.t[1]);
  });

  const domain = inner.sMin < inner.sMax && inner.tMin < inner.tMax ? inner : { ...bounds };

  return {
    kind: 'tspline',
    degree: DEGREE,
    count,
    vertices,
    points,
    sKnots,
    tKnots,
    bounds,
    domain,
    denominatorTolerance: mesh.ctx.tol.denominator,
    index: SupportIndex.build(rects),
  };
}

function knotsOf(data: Float64Array, i: number): Float64Array {
  return data.subarray(LOCAL_KNOT_COUNT * i, LOCAL_KNOT_COUNT * (i + 1));
}

function inSupport(surface: TSplineSurface, i: number, u: number, v: number): boolean {
  const o = LOCAL_KNOT_COUNT * i;
  const e = o + LOCAL_KNOT_COUNT - 1;
  return (
    u >= surface.sKnots[o] &&
    u <= surface.sKnots[e] &&
    v >= surface.tKnots[o] &&
    v <= surface.tKnots[e]
  );
}

function accumulate(surface: TSplineSurface, u: number, v: number, order: 0 | DerivativeOrder): RationalAccumulator {
  const acc = new RationalAccumulator();
  for (const i of surface.index.candidates(u, v)) {
    if (!inSupport(surface, i, u, v)) continue;
    const [Ns, dNs, ddNs] = basisDerivatives(u, knotsOf(surface.sKnots, i), order);
    if (Ns === 0 && dNs === 0 && ddNs === 0) continue;
    const [Nt, dNt, ddNt] = basisDerivatives(v, knotsOf(surface.tKnots, i), order);
    const terms: BlendTerms = [Ns * Nt, dNs * Nt, Ns * dNt, ddNs * Nt, dNs * dNt, Ns * ddNt];
    const p = 4 * i;
    acc.add(surface.points[p], surface.points[p + 1], surface.points[p + 2], surface.points[p + 3], terms);
  }
  return acc;
}

/**
 * Evaluate the surface point at (u, v).
 *
 * @throws DegenerateParameterError when the blended weight vanishes,
 *   which includes every parameter outside the supports
 */
export function evaluateTSpline(surface: TSplineSurface, u: number, v: number): Vec3 {
  return accumulate(surface, u, v, 0).point(u, v, surface.denominatorTolerance);
}

/**
 * Evaluate the point and partial derivatives at (u, v)
 */
export function evaluateTSplineDerivatives(
  surface: TSplineSurface,
  u: number,
  v: number,
  order: DerivativeOrder = 1
): SurfaceDerivatives {
  return accumulate(surface, u, v, order).derivatives(u, v, order, surface.denominatorTolerance);
}

export interface BlendingWeight {
  vertex: VertexId;
  /** Unweighted tensor-product basis value */
  value: number;
}

/**
 * Non-zero blending functions at (u, v), ordered by vertex id
 */
export function blendingWeights(surface: TSplineSurface, u: number, v: number): BlendingWeight[] {
  const out: BlendingWeight[] = [];
  for (const i of surface.index.candidates(u, v)) {
    if (!inSupport(surface, i, u, v)) continue;
    const [Ns] = basisDerivatives(u, knotsOf(surface.sKnots, i), 0);
    const [Nt] = basisDerivatives(v, knotsOf(surface.tKnots, i), 0);
    const value = Ns * Nt;
    if (value !== 0) out.push({ vertex: asVertexId(surface.vertices[i]), value });
  }
  return out.sort((a, b) => a.vertex - b.vertex);
}
