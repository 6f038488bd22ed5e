// Copyright 2026 Layne Penney
// SPDX-License-Identifier: Apache-2.0

/**
 * Vector utilities for embedding-based operations.
 */

/**
 * Inner product of two vectors of equal length.
 * Callers check dimensions first; extra components of the longer vector are ignored.
 */
export function dotProduct(a: number[], b: number[]): number {
  const n = Math.min(a.length, b.length);
  let sum = 0;
  for (let i = 0; i < n; i++) {
    sum += a[i] * b[i];
  }
  return sum;
}

/**
 * Euclidean (L2) norm of a vector.
 */
export function vectorNorm(v: number[]): number {
  return Math.sqrt(dotProduct(v, v));
}

/**
 * Compute cosine similarity between two embedding vectors.
 * Returns value between -1 and 1 (1 = identical, 0 = orthogonal, -1 = opposite).
 */
export function cosineSimilarity(a: number[], b: number[]): number {
  if (a.length !== b.length) return 0;
  const denominator = vectorNorm(a) * vectorNorm(b);
  return denominator === 0 ? 0 : dotProduct(a, b) / denominator;
}

/**
 * Scale a vector to unit length. Zero vectors are returned unchanged.
 */
export function normalize(v: number[]): number[] {
  const norm = vectorNorm(v);
  if (norm === 0) return [...v];
  return v.map((x) => x / norm);
}
