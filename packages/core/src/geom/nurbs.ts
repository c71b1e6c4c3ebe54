/**
 * Tensor-product rational B-spline (NURBS) surfaces
 *
 * Evaluated with the classic span search and triangular basis algorithms,
 * independently of the local-knot T-spline path. A T-mesh that is a full
 * rectangular grid describes the same surface as the NURBS built from its
 * global knot vectors.
 */

import type { Vec3 } from '../num/vec3.js';
import { DEFAULT_TOLERANCES } from '../num/tolerance.js';
import { DegenerateParameterError } from '../topo/errors.js';
import { RationalAccumulator, type DerivativeOrder, type SurfaceDerivatives, type BlendTerms } from './rational.js';
import type { ParamDomain } from './tspline.js';

export interface NurbsSurface {
  readonly kind: 'nurbs';
  readonly degreeU: number;
  readonly degreeV: number;
  readonly knotsU: Float64Array;
  readonly knotsV: Float64Array;
  readonly countU: number;
  readonly countV: number;
  /** x, y, z, w per control point, u varying fastest */
  readonly points: Float64Array;
  readonly denominatorTolerance: number;
}

export interface NurbsSurfaceInput {
  degreeU: number;
  degreeV: number;
  knotsU: readonly number[];
  knotsV: readonly number[];
  /** countV rows of countU points */
  points: readonly (readonly Vec3[])[];
  /** Same shape as points; all 1 when omitted */
  weights?: readonly (readonly number[])[];
  denominatorTolerance?: number;
}

function checkKnots(name: string, knots: readonly number[], count: number, degree: number): void {
  if (knots.length !== count + degree + 1) {
    throw new RangeError(`${name} has ${knots.length} knots, expected ${count + degree + 1}`);
  }
  for (let i = 1; i < knots.length; i++) {
    if (knots[i] < knots[i - 1]) {
      throw new RangeError(`${name} is not non-decreasing at index ${i}`);
    }
  }
}

export function createNurbsSurface(input: NurbsSurfaceInput): NurbsSurface {
  const { degreeU, degreeV, points, weights } = input;
  const countV = points.length;
  const countU = countV > 0 ? points[0].length : 0;
  if (countU <= degreeU || countV <= degreeV) {
    throw new RangeError(`A degree (${degreeU}, ${degreeV}) surface needs more than ${degreeU}×${degreeV} points`);
  }
  checkKnots('knotsU', input.knotsU, countU, degreeU);
  checkKnots('knotsV', input.knotsV, countV, degreeV);

  const packed = new Float64Array(countU * countV * 4);
  for (let j = 0; j < countV; j++) {
    if (points[j].length !== countU) {
      throw new RangeError(`Row ${j} has ${points[j].length} points, expected ${countU}`);
    }
    for (let i = 0; i < countU; i++) {
      const [x, y, z] = points[j][i];
      packed.set([x, y, z, weights?.[j]?.[i] ?? 1], 4 * (j * countU + i));
    }
  }

  return {
    kind: 'nurbs',
    degreeU,
    degreeV,
    knotsU: Float64Array.from(input.knotsU),
    knotsV: Float64Array.from(input.knotsV),
    countU,
    countV,
    points: packed,
    denominatorTolerance: input.denominatorTolerance ?? DEFAULT_TOLERANCES.denominator,
  };
}

/**
 * Valid parameter rectangle [U_p, U_n+1] × [V_q, V_m+1]
 */
export function nurbsDomain(surface: NurbsSurface): ParamDomain {
  return {
    sMin: surface.knotsU[surface.degreeU],
    sMax: surface.knotsU[surface.countU],
    tMin: surface.knotsV[surface.degreeV],
    tMax: surface.knotsV[surface.countV],
  };
}

/**
 * Knot span index containing u. The end of the domain maps to the last
 * span. Returns -1 outside [U_p, U_n+1].
 */
export function findSpan(u: number, degree: number, knots: ArrayLike<number>, count: number): number {
  const n = count - 1;
  if (u < knots[degree] || u > knots[n + 1]) return -1;
  if (u === knots[n + 1]) {
    let span = n;
    while (span > degree && knots[span] === knots[span + 1]) span--;
    return span;
  }
  let low = degree;
  let high = n + 1;
  let mid = (low + high) >> 1;
  while (u < knots[mid] || u >= knots[mid + 1]) {
    if (u < knots[mid]) high = mid;
    else low = mid;
    mid = (low + high) >> 1;
  }
  return mid;
}

/**
 * Non-zero basis functions on a span and their derivatives up to `order`.
 * `result[k][j]` is the k-th derivative of N_{span-p+j}; rows past the
 * degree are zero.
 */
export function basisFunctionDerivatives(
  span: number,
  u: number,
  degree: number,
  order: number,
  knots: ArrayLike<number>
): number[][] {
  const p = degree;
  const ndu: number[][] = Array.from({ length: p + 1 }, () => new Array<number>(p + 1).fill(0));
  const left = new Array<number>(p + 1).fill(0);
  const right = new Array<number>(p + 1).fill(0);
  ndu[0][0] = 1;

  for (let j = 1; j <= p; j++) {
    left[j] = u - knots[span + 1 - j];
    right[j] = knots[span + j] - u;
    let saved = 0;
    for (let r = 0; r < j; r++) {
      // Lower triangle holds knot differences
      ndu[j][r] = right[r + 1] + left[j - r];
      const temp = ndu[r][j - 1] / ndu[j][r];
      ndu[r][j] = saved + right[r + 1] * temp;
      saved = left[j - r] * temp;
    }
    ndu[j][j] = saved;
  }

  const ders: number[][] = Array.from({ length: order + 1 }, () => new Array<number>(p + 1).fill(0));
  for (let j = 0; j <= p; j++) ders[0][j] = ndu[j][p];
  // Derivatives above the degree vanish
  const top = Math.min(order, p);

  const a: number[][] = [new Array<number>(p + 1).fill(0), new Array<number>(p + 1).fill(0)];
  for (let r = 0; r <= p; r++) {
    let s1 = 0;
    let s2 = 1;
    a[0][0] = 1;
    for (let k = 1; k <= top; k++) {
      let d = 0;
      const rk = r - k;
      const pk = p - k;
      if (r >= k) {
        a[s2][0] = a[s1][0] / ndu[pk + 1][rk];
        d = a[s2][0] * ndu[rk][pk];
      }
      const j1 = rk >= -1 ? 1 : -rk;
      const j2 = r - 1 <= pk ? k - 1 : p - r;
      for (let j = j1; j <= j2; j++) {
        a[s2][j] = (a[s1][j] - a[s1][j - 1]) / ndu[pk + 1][rk + j];
        d += a[s2][j] * ndu[rk + j][pk];
      }
      if (r <= pk) {
        a[s2][k] = -a[s1][k - 1] / ndu[pk + 1][r];
        d += a[s2][k] * ndu[r][pk];
      }
      ders[k][r] = d;
      [s1, s2] = [s2, s1];
    }
  }

  let factor = p;
  for (let k = 1; k <= top; k++) {
    for (let j = 0; j <= p; j++) ders[k][j] *= factor;
    factor *= p - k;
  }
  return ders;
}

function accumulate(surface: NurbsSurface, u: number, v: number, order: 0 | DerivativeOrder): RationalAccumulator {
  const { degreeU: p, degreeV: q } = surface;
  const spanU = findSpan(u, p, surface.knotsU, surface.countU);
  const spanV = findSpan(v, q, surface.knotsV, surface.countV);
  if (spanU < 0 || spanV < 0) {
    throw new DegenerateParameterError(u, v, 0);
  }
  const Nu = basisFunctionDerivatives(spanU, u, p, order, surface.knotsU);
  const Nv = basisFunctionDerivatives(spanV, v, q, order, surface.knotsV);
  const at = (ders: number[][], k: number, j: number): number => (k < ders.length ? ders[k][j] : 0);

  const acc = new RationalAccumulator();
  for (let l = 0; l <= q; l++) {
    for (let k = 0; k <= p; k++) {
      const terms: BlendTerms = [
        Nu[0][k] * Nv[0][l],
        at(Nu, 1, k) * Nv[0][l],
        Nu[0][k] * at(Nv, 1, l),
        at(Nu, 2, k) * Nv[0][l],
        at(Nu, 1, k) * at(Nv, 1, l),
        Nu[0][k] * at(Nv, 2, l),
      ];
      const idx = 4 * ((spanV - q + l) * surface.countU + (spanU - p + k));
      acc.add(surface.points[idx], surface.points[idx + 1], surface.points[idx + 2], surface.points[idx + 3], terms);
    }
  }
  return acc;
}

export function evaluateNurbs(surface: NurbsSurface, u: number, v: number): Vec3 {
  return accumulate(surface, u, v, 0).point(u, v, surface.denominatorTolerance);
}

export function evaluateNurbsDerivatives(
  surface: NurbsSurface,
  u: number,
  v: number,
  order: DerivativeOrder = 1
): SurfaceDerivatives {
  return accumulate(surface, u, v, order).derivatives(u, v, order, surface.denominatorTolerance);
}
