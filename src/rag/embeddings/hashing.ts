// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * Hashing Embedding Provider
 *
 * Offline bag-of-words embedder: every lowercase word is hashed (FNV-1a)
 * into one of `dimensions` signed buckets and the result is L2-normalized.
 * Deterministic and dependency-free, so the pipeline runs without a model.
 */

import { BaseEmbeddingProvider } from './base.js';
import type { BaseEmbeddingProviderOptions } from './base.js';
import { normalize } from '../../utils/vector.js';
import { ConfigurationError } from '../errors.js';

const WORD_PATTERN = /[\p{L}\p{N}]+/gu;

const FNV_OFFSET = 0x811c9dc5;
const FNV_PRIME = 0x01000193;

/**
 * 32-bit FNV-1a hash of a string's UTF-16 code units.
 */
export function fnv1a(text: string): number {
  let hash = FNV_OFFSET;
  for (let i = 0; i < text.length; i++) {
    hash ^= text.charCodeAt(i);
    hash = Math.imul(hash, FNV_PRIME);
  }
  return hash >>> 0;
}

export class HashingEmbeddingProvider extends BaseEmbeddingProvider {
  private dimensions: number;

  constructor(dimensions: number = 512, options: BaseEmbeddingProviderOptions = {}) {
    super(options);
    if (!Number.isInteger(dimensions) || dimensions <= 0) {
      throw new ConfigurationError(`dimensions must be a positive integer, got ${dimensions}`);
    }
    this.dimensions = dimensions;
  }

  getName(): string {
    return 'Hashing';
  }

  getModel(): string {
    return 'bag-of-words-fnv1a';
  }

  getDimensions(): number {
    return this.dimensions;
  }

  /**
   * Embed a single text synchronously.
   */
  vectorize(text: string): number[] {
    const vector = new Array<number>(this.dimensions).fill(0);
    for (const match of text.toLowerCase().matchAll(WORD_PATTERN)) {
      const hash = fnv1a(match[0]);
      const sign = (hash >>> 16) & 1 ? -1 : 1;
      vector[hash % this.dimensions] += sign;
    }
    return normalize(vector);
  }

  protected async embedBatch(texts: string[]): Promise<number[][]> {
    return texts.map((text) => this.vectorize(text));
  }

  async isAvailable(): Promise<boolean> {
    return true;
  }
}
