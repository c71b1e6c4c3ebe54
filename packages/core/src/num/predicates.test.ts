import { describe, it, expect } from 'vitest';
import { orient2D, segmentsIntersect2D } from './predicates.js';
import { vec2 } from './vec2.js';
import { createNumericContext } from './tolerance.js';

describe('predicates', () => {
  const ctx = createNumericContext();

  describe('orient2D', () => {
    it('should return 1 for left turn', () => {
      expect(orient2D(vec2(0, 0), vec2(1, 0), vec2(0, 1), ctx)).toBe(1);
    });

    it('should return -1 for right turn', () => {
      expect(orient2D(vec2(0, 0), vec2(1, 0), vec2(0, -1), ctx)).toBe(-1);
    });

    it('should return zero for collinear points', () => {
      expect(orient2D(vec2(0, 0), vec2(1, 0), vec2(2, 0), ctx)).toBe(0);
    });

    it('should treat a degenerate base as collinear', () => {
      expect(orient2D(vec2(1, 1), vec2(1, 1), vec2(3, 0), ctx)).toBe(0);
    });
  });

  describe('segmentsIntersect2D', () => {
    it('detects a proper crossing', () => {
      expect(segmentsIntersect2D(vec2(0, 1), vec2(2, 1), vec2(1, 0), vec2(1, 2), ctx)).toBe(true);
    });

    it('counts a touching endpoint as an intersection', () => {
      // T shape: vertical segment ends on the horizontal one
      expect(segmentsIntersect2D(vec2(0, 1), vec2(2, 1), vec2(1, 1), vec2(1, 3), ctx)).toBe(true);
      // L shape: shared corner
      expect(segmentsIntersect2D(vec2(0, 0), vec2(2, 0), vec2(2, 0), vec2(2, 2), ctx)).toBe(true);
    });

    it('rejects separated segments', () => {
      expect(segmentsIntersect2D(vec2(0, 3), vec2(2, 3), vec2(2.5, 1), vec2(2.5, 5), ctx)).toBe(false);
      expect(segmentsIntersect2D(vec2(0, 2), vec2(2, 2), vec2(2, 4), vec2(2, 6), ctx)).toBe(false);
    });

    it('detects collinear overlap but not collinear gaps', () => {
      expect(segmentsIntersect2D(vec2(0, 0), vec2(2, 0), vec2(1, 0), vec2(3, 0), ctx)).toBe(true);
      expect(segmentsIntersect2D(vec2(0, 0), vec2(1, 0), vec2(2, 0), vec2(3, 0), ctx)).toBe(false);
    });
  });
});
