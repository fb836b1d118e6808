import { describe, it, expect } from 'vitest';
import {
  linspace,
  forwardAndBack,
  identity,
  multiply,
  apply,
  roundTo,
  points1d,
  points2d,
  pointsDetune,
} from '../sweep.js';
import { ValidationError } from '../types.js';

function expectClose(actual: number[], expected: number[]): void {
  expect(actual).toHaveLength(expected.length);
  actual.forEach((value, i) => {
    expect(value).toBeCloseTo(expected[i], 10);
  });
}

describe('Sweep Utilities', () => {
  describe('linspace', () => {
    it('should include both ends', () => {
      expect(linspace(-2, 2, 5)).toEqual([-2, -1, 0, 1, 2]);
    });

    it('should end exactly on the end value', () => {
      const values = linspace(-0.7, 0.15, 5);
      expect(values[4]).toBe(0.15);
      expect(values[0]).toBe(-0.7);
    });

    it('should return the start for a single point', () => {
      expect(linspace(3, 7, 1)).toEqual([3]);
    });

    it('should return nothing for zero points', () => {
      expect(linspace(3, 7, 0)).toEqual([]);
    });
  });

  describe('forwardAndBack', () => {
    it('should go forward and come back without repeating the start', () => {
      expect(forwardAndBack(-1, 1, 3)).toEqual([-1, 0, 1, 0]);
    });

    it('should produce the full bipolar sequence for five steps', () => {
      expect(forwardAndBack(-2, 2, 5)).toEqual([-2, -1, 0, 1, 2, 1, 0, -1]);
    });

    it('should have no way back for two steps', () => {
      expect(forwardAndBack(0, 1, 2)).toEqual([0, 1]);
    });
  });

  describe('matrices', () => {
    it('should build an identity matrix', () => {
      expect(identity(3)).toEqual([
        [1, 0, 0],
        [0, 1, 0],
        [0, 0, 1],
      ]);
    });

    it('should multiply square matrices', () => {
      const a = [[1, 2], [3, 4]];
      const b = [[0, 1], [1, 0]];
      expect(multiply(a, b)).toEqual([[2, 1], [4, 3]]);
    });

    it('should apply a matrix to a vector', () => {
      expect(apply([[1, 0.5], [0, 2]], [2, 3])).toEqual([3.5, 6]);
    });

    it('should round and drop negative zero', () => {
      expect(roundTo(0.123456, 3)).toBe(0.123);
      expect(Object.is(roundTo(-0.0001, 2), 0)).toBe(true);
    });
  });

  describe('points', () => {
    it('should make one point per 1-D voltage', () => {
      expect(points1d('plunger', [0.1, 0.2])).toEqual([{ plunger: 0.1 }, { plunger: 0.2 }]);
    });

    it('should order 2-D points outer-major', () => {
      const points = points2d('inner', [10, 20], 'outer', [0, 1]);
      expect(points).toEqual([
        { outer: 0, inner: 10 },
        { outer: 0, inner: 20 },
        { outer: 1, inner: 10 },
        { outer: 1, inner: 20 },
      ]);
    });

    it('should detune every contact along its own line', () => {
      const result = pointsDetune(['a', 'b'], [-0.3, 0.6], [0.3, -0.1], 5);
      expect(result.ok).toBe(true);
      if (result.ok) {
        expect(result.value).toHaveLength(8);
        expectClose(result.value.map(p => p.a), [-0.3, -0.15, 0, 0.15, 0.3, 0.15, 0, -0.15]);
        expectClose(result.value.map(p => p.b), [0.6, 0.425, 0.25, 0.075, -0.1, 0.075, 0.25, 0.425]);
      }
    });

    it('should reject a start list of the wrong length', () => {
      const result = pointsDetune(['a', 'b'], [-0.3], [0.3, -0.1], 5);
      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error).toBeInstanceOf(ValidationError);
        expect(result.error.message).toContain('There must be exactly one voltage per contact');
      }
    });

    it('should reject an end list of the wrong length', () => {
      const result = pointsDetune(['a', 'b'], [-0.3, 0.6], [0.3], 5);
      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error.code).toBe('validation');
      }
    });

    it('should reject fewer than two steps', () => {
      const result = pointsDetune(['a'], [0], [1], 1);
      expect(result.ok).toBe(false);
    });
  });
});
