import { describe, it, expect } from 'vitest';
import { DegenerateParameterError } from '../topo/errors.js';
import { RationalAccumulator } from './rational.js';

describe('RationalAccumulator', () => {
  it('should divide the blended point by the blended weight', () => {
    const acc = new RationalAccumulator();
    acc.add(1, 2, 3, 2, [0.25, 0, 0, 0, 0, 0]);
    acc.add(3, 2, 1, 1, [0.5, 0, 0, 0, 0, 0]);
    expect(acc.denominator).toBe(1);
    expect(acc.point(0, 0, 1e-9)).toEqual([2, 2, 2]);
  });

  it('should apply the quotient rule', () => {
    // Weights 1 and 3 blended linearly in u: S(u) = (0(1-u) + 3u) / (1 + 2u)
    const u = 0.5;
    const acc = new RationalAccumulator();
    acc.add(0, 0, 0, 1, [1 - u, -1, 0, 0, 0, 0]);
    acc.add(1, 0, 0, 3, [u, 1, 0, 0, 0, 0]);

    const ders = acc.derivatives(u, 0, 2, 1e-9);
    expect(ders.point[0]).toBeCloseTo(0.75, 12);
    // S' = 3 / (1 + 2u)^2, S'' = -12 / (1 + 2u)^3
    expect(ders.du[0]).toBeCloseTo(0.75, 12);
    expect(ders.duu?.[0]).toBeCloseTo(-1.5, 12);
    expect(ders.dv).toEqual([0, 0, 0]);
  });

  it('should refuse a vanishing denominator', () => {
    const acc = new RationalAccumulator();
    let caught: unknown;
    try {
      acc.point(7, 8, 1e-9);
    } catch (error) {
      caught = error;
    }
    expect(caught).toBeInstanceOf(DegenerateParameterError);
    expect(caught).toMatchObject({ kind: 'DegenerateParameter', u: 7, v: 8, denominator: 0 });
  });
});
