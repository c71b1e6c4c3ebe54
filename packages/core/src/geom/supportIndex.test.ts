import { describe, it, expect } from 'vitest';
import { SupportIndex } from './supportIndex.js';

describe('SupportIndex', () => {
  const rects = [
    { sMin: 0, sMax: 1, tMin: 0, tMax: 1 },
    { sMin: 2, sMax: 3, tMin: 2, tMax: 3 },
    { sMin: 0, sMax: 3, tMin: 0, tMax: 3 },
  ];

  it('should return the bucket holding the parameter', () => {
    const index = SupportIndex.build(rects);
    expect(Array.from(index.candidates(0.5, 0.5))).toEqual([0, 2]);
    expect(Array.from(index.candidates(2.5, 2.5))).toEqual([1, 2]);
    expect(Array.from(index.candidates(3, 3))).toEqual([1, 2]);
  });

  it('should return nothing outside the bounds', () => {
    const index = SupportIndex.build(rects);
    expect(index.candidates(4, 0)).toHaveLength(0);
    expect(index.candidates(0, -0.1)).toHaveLength(0);
  });

  it('should handle an empty set', () => {
    expect(SupportIndex.build([]).candidates(0, 0)).toHaveLength(0);
  });
});
