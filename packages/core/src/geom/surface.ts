/**
 * Surface representations and evaluators
 *
 * Every surface is a rational parametric patch over (u, v). The T-spline
 * is the primary kind; the NURBS kind is the tensor-product special case
 * and doubles as an independent reference for it.
 */

import type { Vec3 } from '../num/vec3.js';
import { cross3, length3, normalize3 } from '../num/vec3.js';
import { DegenerateParameterError } from '../topo/errors.js';
import type { DerivativeOrder, SurfaceDerivatives } from './rational.js';
import {
  evaluateTSpline,
  evaluateTSplineDerivatives,
  type ParamDomain,
  type TSplineSurface,
} from './tspline.js';
import { evaluateNurbs, evaluateNurbsDerivatives, nurbsDomain, type NurbsSurface } from './nurbs.js';

/**
 * Type tag for surface kinds
 */
export type SurfaceType = 'tspline' | 'nurbs';

export type Surface = TSplineSurface | NurbsSurface;

/**
 * Evaluate a surface at parameter (u, v)
 */
export function evalSurface(surface: Surface, u: number, v: number): Vec3 {
  switch (surface.kind) {
    case 'tspline':
      return evaluateTSpline(surface, u, v);
    case 'nurbs':
      return evaluateNurbs(surface, u, v);
  }
}

/**
 * Evaluate a surface point with first (and optionally second) partials
 */
export function evalSurfaceDerivatives(
  surface: Surface,
  u: number,
  v: number,
  order: DerivativeOrder = 1
): SurfaceDerivatives {
  switch (surface.kind) {
    case 'tspline':
      return evaluateTSplineDerivatives(surface, u, v, order);
    case 'nurbs':
      return evaluateNurbsDerivatives(surface, u, v, order);
  }
}

/**
 * Unit normal at (u, v): normalized Su × Sv.
 *
 * @throws DegenerateParameterError when the partials are parallel
 */
export function surfaceNormal(surface: Surface, u: number, v: number): Vec3 {
  const { du, dv } = evalSurfaceDerivatives(surface, u, v, 1);
  const n = cross3(du, dv);
  const len = length3(n);
  if (len < surface.denominatorTolerance) {
    throw new DegenerateParameterError(u, v, len);
  }
  return normalize3(n);
}

/**
 * Parameter rectangle over which the surface is evaluated by default
 */
export function surfaceDomain(surface: Surface): ParamDomain {
  switch (surface.kind) {
    case 'tspline':
      return { ...surface.domain };
    case 'nurbs':
      return nurbsDomain(surface);
  }
}
