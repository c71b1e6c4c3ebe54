/**
 * Rational combination of weighted control points
 *
 * Both surface kinds blend control points as homogeneous (w·P, w) and divide
 * by the blended weight. Derivatives follow from the quotient rule applied
 * to the numerator A and denominator W.
 */

import type { Vec3 } from '../num/vec3.js';
import { DegenerateParameterError } from '../topo/errors.js';

/**
 * Surface point with partial derivatives
 */
export interface SurfaceDerivatives {
  point: Vec3;
  du: Vec3;
  dv: Vec3;
  /** Present for second-order requests */
  duu?: Vec3;
  duv?: Vec3;
  dvv?: Vec3;
}

export type DerivativeOrder = 1 | 2;

/**
 * Tensor-product basis value and derivatives for one control point:
 * [B, Bu, Bv, Buu, Buv, Bvv]
 */
export type BlendTerms = [number, number, number, number, number, number];

/** Number of accumulated quantities per term */
const TERMS = 6;

/**
 * Running sums of homogeneous blends. Slot k of `a` holds the xyz of term k,
 * slot k of `w` holds its weight.
 */
export class RationalAccumulator {
  private readonly a = new Float64Array(TERMS * 3);
  private readonly w = new Float64Array(TERMS);

  add(x: number, y: number, z: number, weight: number, terms: BlendTerms): void {
    for (let k = 0; k < TERMS; k++) {
      const b = terms[k] * weight;
      if (b === 0) continue;
      this.a[3 * k] += b * x;
      this.a[3 * k + 1] += b * y;
      this.a[3 * k + 2] += b * z;
      this.w[k] += b;
    }
  }

  /** Blended weight so far */
  get denominator(): number {
    return this.w[0];
  }

  point(u: number, v: number, tolerance: number): Vec3 {
    const W = this.checkedDenominator(u, v, tolerance);
    return [this.a[0] / W, this.a[1] / W, this.a[2] / W];
  }

  derivatives(u: number, v: number, order: DerivativeOrder, tolerance: number): SurfaceDerivatives {
    const W = this.checkedDenominator(u, v, tolerance);
    const [, Wu, Wv, Wuu, Wuv, Wvv] = this.w;
    const A = (k: number): Vec3 => [this.a[3 * k], this.a[3 * k + 1], this.a[3 * k + 2]];

    const S = A(0).map((c) => c / W);
    const Au = A(1);
    const Av = A(2);
    const Su = Au.map((c, i) => (c - Wu * S[i]) / W);
    const Sv = Av.map((c, i) => (c - Wv * S[i]) / W);

    const out: SurfaceDerivatives = {
      point: [S[0], S[1], S[2]],
      du: [Su[0], Su[1], Su[2]],
      dv: [Sv[0], Sv[1], Sv[2]],
    };
    if (order === 2) {
      const Auu = A(3);
      const Auv = A(4);
      const Avv = A(5);
      const second = (src: Vec3, f: (i: number) => number): Vec3 => [
        (src[0] - f(0)) / W,
        (src[1] - f(1)) / W,
        (src[2] - f(2)) / W,
      ];
      out.duu = second(Auu, (i) => 2 * Wu * Su[i] + Wuu * S[i]);
      out.duv = second(Auv, (i) => Wu * Sv[i] + Wv * Su[i] + Wuv * S[i]);
      out.dvv = second(Avv, (i) => 2 * Wv * Sv[i] + Wvv * S[i]);
    }
    return out;
  }

  private checkedDenominator(u: number, v: number, tolerance: number): number {
    const W = this.w[0];
    if (!(Math.abs(W) >= tolerance)) {
      throw new DegenerateParameterError(u, v, W);
    }
    return W;
  }
}
