/**
 * Univariate B-spline basis over a local knot vector
 *
 * A local knot vector of length p+2 defines exactly one basis function of
 * degree p. It is evaluated bottom-up with the Cox–de Boor recurrence, with
 * every 0/0 term taken as 0 so repeated knots need no special casing.
 *
 * Spans are half-open [k_j, k_{j+1}), except that a parameter equal to the
 * last knot falls in the last non-empty span. This keeps the basis defined
 * on the closed support.
 */

/** Knot differences below this are treated as zero */
const KNOT_EPSILON = 1e-12;

/**
 * Basis value and derivatives, indexed by derivative order
 */
export type BasisDerivatives = [number, number, number];

function ratio(num: number, den: number): number {
  return Math.abs(den) < KNOT_EPSILON ? 0 : num / den;
}

/**
 * Triangular table of lower-degree basis functions.
 *
 * `table[d][j]` is the degree-d function over knots[j .. j+d+1].
 */
function basisTable(u: number, knots: ArrayLike<number>, degree: number): number[][] {
  const last = degree + 1;
  const table: number[][] = [];

  const level0 = new Array<number>(last).fill(0);
  if (u >= knots[0] && u <= knots[last]) {
    if (u === knots[last]) {
      for (let j = last - 1; j >= 0; j--) {
        if (knots[j] < knots[j + 1]) {
          level0[j] = 1;
          break;
        }
      }
    } else {
      for (let j = 0; j < last; j++) {
        if (knots[j] <= u && u < knots[j + 1]) {
          level0[j] = 1;
          break;
        }
      }
    }
  }
  table.push(level0);

  for (let d = 1; d <= degree; d++) {
    const prev = table[d - 1];
    const level = new Array<number>(last - d).fill(0);
    for (let j = 0; j < level.length; j++) {
      const left = ratio(u - knots[j], knots[j + d] - knots[j]) * prev[j];
      const right = ratio(knots[j + d + 1] - u, knots[j + d + 1] - knots[j + 1]) * prev[j + 1];
      level[j] = left + right;
    }
    table.push(level);
  }
  return table;
}

/** d/du of the degree-d function starting at knot j */
function firstDerivative(table: number[][], knots: ArrayLike<number>, d: number, j: number): number {
  if (d === 0) return 0;
  const lower = table[d - 1];
  return d * (ratio(lower[j], knots[j + d] - knots[j]) - ratio(lower[j + 1], knots[j + d + 1] - knots[j + 1]));
}

/**
 * Value of the basis function at u (0 outside its support).
 */
export function basis(u: number, knots: ArrayLike<number>): number {
  const degree = knots.length - 2;
  return basisTable(u, knots, degree)[degree][0];
}

/**
 * Value and derivatives of the basis function at u, up to `order` (at most 2).
 * Entries above `order` are 0.
 */
export function basisDerivatives(u: number, knots: ArrayLike<number>, order: 0 | 1 | 2 = 2): BasisDerivatives {
  const p = knots.length - 2;
  const table = basisTable(u, knots, p);
  const out: BasisDerivatives = [table[p][0], 0, 0];
  if (order >= 1) {
    out[1] = firstDerivative(table, knots, p, 0);
  }
  if (order >= 2 && p >= 1) {
    const a = firstDerivative(table, knots, p - 1, 0);
    const b = firstDerivative(table, knots, p - 1, 1);
    out[2] = p * (ratio(a, knots[p] - knots[0]) - ratio(b, knots[p + 1] - knots[1]));
  }
  return out;
}

/**
 * Closed parameter interval on which the basis function can be non-zero
 */
export function basisSupport(knots: ArrayLike<number>): [number, number] {
  return [knots[0], knots[knots.length - 1]];
}
