import { describe, it, expect } from 'vitest';
import {
  averageLagging,
  averageProportion,
  countWords,
  differentiableAverageLagging,
  evalAllLatency,
  mean,
} from '../metrics/latency';

describe('latency metrics', () => {
  describe('evalAllLatency', () => {
    it('scores an ideal wait-1 policy', () => {
      const result = evalAllLatency([1, 2, 3], 3, 3);

      expect(result.AP).toBeCloseTo(2 / 3, 10);
      expect(result.AL).toBeCloseTo(1, 10);
      expect(result.DAL).toBeCloseTo(1, 10);
    });

    it('scores a policy that waits for the whole source', () => {
      expect(evalAllLatency([3, 3, 3], 3, 3)).toEqual({ AL: 3, AP: 1, DAL: 3 });
    });

    it('uses the reference length for gamma when it is longer than the prediction', () => {
      const result = evalAllLatency([2, 4], 4, 4);

      expect(result.AP).toBeCloseTo(0.75, 10);
      expect(result.AL).toBeCloseTo(2.5, 10);
      expect(result.DAL).toBeCloseTo(2, 10);
    });

    it('treats empty delays as a single emission at the end of the source', () => {
      expect(evalAllLatency([], 4)).toEqual({ AL: 4, AP: 1, DAL: 4 });
    });

    it('raises a zero source length to one', () => {
      expect(evalAllLatency([0], 0)).toEqual({ AL: 0, AP: 0, DAL: 0 });
    });
  });

  describe('averageLagging', () => {
    it('returns the first delay when it exceeds the source length', () => {
      expect(averageLagging([5, 6], 4, 2)).toBe(5);
    });

    it('stops accumulating after the source is fully read', () => {
      // t=0: 1, t=1: 4 - 1 = 3, stop
      expect(averageLagging([1, 4, 4, 4], 4, 4)).toBe(2);
    });
  });

  describe('averageProportion', () => {
    it('divides total delay by source length times emissions', () => {
      expect(averageProportion([1, 1, 2], 2)).toBeCloseTo(4 / 6, 10);
    });
  });

  describe('differentiableAverageLagging', () => {
    it('enforces a minimum gap of 1/gamma between emissions', () => {
      // gamma = 2/2 = 1: g = [1, max(1, 2)] = [1, 2] → (1 - 0 + 2 - 1) / 2
      expect(differentiableAverageLagging([1, 1], 2)).toBe(1);
    });
  });

  describe('helpers', () => {
    it('mean of an empty list is zero', () => {
      expect(mean([])).toBe(0);
      expect(mean([1, 2, 6])).toBe(3);
    });

    it('counts whitespace-separated words', () => {
      expect(countWords('  the cat   sat ')).toBe(3);
      expect(countWords('   ')).toBe(0);
    });
  });
});
