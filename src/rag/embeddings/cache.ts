// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * Embedding Cache
 *
 * Decorator that keeps recent embeddings keyed by provider, model,
 * dimension and exact text. Only cache misses reach the wrapped embedder.
 */

import { LRUCache } from '../../utils/lru-cache.js';
import type { LRUCacheOptions } from '../../utils/lru-cache.js';
import { EmbeddingError } from '../errors.js';
import type { EmbeddingVector } from '../types.js';
import { singleEmbedding } from './base.js';
import type { EmbedOptions, Embedder } from './base.js';

export class CachedEmbeddingProvider implements Embedder {
  private cache: LRUCache<EmbeddingVector>;

  constructor(
    private inner: Embedder,
    options: LRUCacheOptions = {}
  ) {
    this.cache = new LRUCache<EmbeddingVector>(options);
  }

  getName(): string {
    return this.inner.getName();
  }

  getModel(): string {
    return this.inner.getModel();
  }

  getDimensions(): number {
    return this.inner.getDimensions();
  }

  async embed(texts: string[], options: EmbedOptions = {}): Promise<EmbeddingVector[]> {
    const results: Array<EmbeddingVector | undefined> = new Array(texts.length);
    // Distinct uncached texts, each with every caller position it fills
    const misses = new Map<string, number[]>();

    texts.forEach((text, i) => {
      const cached = this.cache.get(this.key(text));
      if (cached) {
        results[i] = [...cached];
        return;
      }
      const positions = misses.get(text);
      if (positions) {
        positions.push(i);
      } else {
        misses.set(text, [i]);
      }
    });

    if (misses.size > 0) {
      const missTexts = Array.from(misses.keys());
      const missPositions = Array.from(misses.values());

      let vectors: EmbeddingVector[];
      try {
        vectors = await this.inner.embed(missTexts, options);
      } catch (error) {
        if (error instanceof EmbeddingError) {
          throw new EmbeddingError(
            error.message,
            error.failedIndices.flatMap((i) => missPositions[i] ?? []).sort((a, b) => a - b),
            error.provider,
            { cause: error.cause ?? error }
          );
        }
        throw error;
      }
      if (vectors.length !== missTexts.length) {
        throw new EmbeddingError(
          `${this.getName()} returned ${vectors.length} embeddings for ${missTexts.length} inputs`,
          missPositions.flat().sort((a, b) => a - b),
          this.getName()
        );
      }

      missTexts.forEach((text, j) => {
        this.cache.set(this.key(text), vectors[j]);
        for (const i of missPositions[j]) {
          results[i] = [...vectors[j]];
        }
      });
    }

    return results.map((vector, i) => {
      if (!vector) {
        throw new EmbeddingError(`No embedding produced for input ${i}`, [i], this.getName());
      }
      return vector;
    });
  }

  async embedOne(text: string, options: EmbedOptions = {}): Promise<EmbeddingVector> {
    return singleEmbedding(await this.embed([text], options), this.getName());
  }

  getStats(): { size: number; maxSize: number; hits: number; misses: number } {
    return this.cache.getStats();
  }

  clear(): void {
    this.cache.clear();
  }

  private key(text: string): string {
    return `${this.inner.getName()}:${this.inner.getModel()}:${this.inner.getDimensions()}:${text}`;
  }
}
