// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

import { describe, it, expect } from 'vitest';
import { cosineSimilarity, dotProduct, normalize, vectorNorm } from '../src/utils/vector.js';

describe('Vector Utilities', () => {
  describe('cosineSimilarity', () => {
    it('returns 1 for identical vectors', () => {
      const a = [1, 0, 0];
      const b = [1, 0, 0];
      expect(cosineSimilarity(a, b)).toBeCloseTo(1, 5);
    });

    it('returns 0 for orthogonal vectors', () => {
      const a = [1, 0, 0];
      const b = [0, 1, 0];
      expect(cosineSimilarity(a, b)).toBeCloseTo(0, 5);
    });

    it('returns -1 for opposite vectors', () => {
      const a = [1, 0, 0];
      const b = [-1, 0, 0];
      expect(cosineSimilarity(a, b)).toBeCloseTo(-1, 5);
    });

    it('returns 0 for mismatched lengths', () => {
      const a = [1, 0, 0];
      const b = [1, 0];
      expect(cosineSimilarity(a, b)).toBe(0);
    });

    it('returns 0 for zero vectors', () => {
      const a = [0, 0, 0];
      const b = [1, 0, 0];
      expect(cosineSimilarity(a, b)).toBe(0);
    });

    it('calculates similarity for non-unit vectors', () => {
      const a = [2, 0, 0];
      const b = [3, 0, 0];
      expect(cosineSimilarity(a, b)).toBeCloseTo(1, 5);
    });

    it('calculates partial similarity', () => {
      const a = [1, 1, 0];
      const b = [1, 0, 0];
      // cos(45°) ≈ 0.707
      expect(cosineSimilarity(a, b)).toBeCloseTo(0.707, 2);
    });
  });

  describe('dotProduct', () => {
    it('sums component products', () => {
      expect(dotProduct([1, 2, 3], [4, -5, 6])).toBe(12);
    });

    it('returns 0 for empty vectors', () => {
      expect(dotProduct([], [])).toBe(0);
    });
  });

  describe('vectorNorm', () => {
    it('computes the L2 norm', () => {
      expect(vectorNorm([3, 4])).toBe(5);
    });
  });

  describe('normalize', () => {
    it('scales to unit length', () => {
      expect(normalize([3, 4])).toEqual([0.6, 0.8]);
    });

    it('returns a copy of a zero vector', () => {
      const zero = [0, 0];
      const result = normalize(zero);
      expect(result).toEqual([0, 0]);
      expect(result).not.toBe(zero);
    });
  });
});
