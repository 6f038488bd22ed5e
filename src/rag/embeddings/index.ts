// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * Embedding Provider Factory
 *
 * Creates the configured embedding provider, wrapped in the cache
 * decorator when caching is enabled.
 */

import { BaseEmbeddingProvider } from './base.js';
import type { Embedder } from './base.js';
import { CachedEmbeddingProvider } from './cache.js';
import { HashingEmbeddingProvider } from './hashing.js';
import { OpenAIEmbeddingProvider } from './openai.js';
import { OllamaEmbeddingProvider } from './ollama.js';
import type { RagConfig } from '../../config/types.js';

export { BaseEmbeddingProvider } from './base.js';
export type { Embedder, EmbedOptions, BaseEmbeddingProviderOptions } from './base.js';
export { CachedEmbeddingProvider } from './cache.js';
export { HashingEmbeddingProvider, fnv1a } from './hashing.js';
export { OpenAIEmbeddingProvider } from './openai.js';
export { OllamaEmbeddingProvider } from './ollama.js';

type EmbeddingConfig = Pick<
  RagConfig,
  | 'embeddingProvider'
  | 'openaiModel'
  | 'openaiApiKey'
  | 'openaiBaseUrl'
  | 'ollamaModel'
  | 'ollamaBaseUrl'
  | 'embeddingDimensions'
  | 'embeddingBatchSize'
>;

/**
 * Create the provider named by the configuration.
 */
export function createEmbeddingProvider(config: EmbeddingConfig): BaseEmbeddingProvider {
  const dimensions = config.embeddingDimensions ?? undefined;
  const batchSize = config.embeddingBatchSize;

  switch (config.embeddingProvider) {
    case 'openai':
      return new OpenAIEmbeddingProvider(config.openaiModel, {
        apiKey: config.openaiApiKey,
        baseUrl: config.openaiBaseUrl,
        dimensions,
        batchSize,
      });

    case 'ollama':
      return new OllamaEmbeddingProvider(config.ollamaModel, config.ollamaBaseUrl, {
        dimensions,
        batchSize,
      });

    case 'hashing':
      return new HashingEmbeddingProvider(dimensions, { batchSize });
  }
}

/**
 * Create the configured embedder, cached unless embeddingCacheSize is 0.
 */
export function createEmbedder(
  config: EmbeddingConfig & Pick<RagConfig, 'embeddingCacheSize' | 'embeddingCacheTtlMinutes'>
): Embedder {
  const provider = createEmbeddingProvider(config);
  if (config.embeddingCacheSize <= 0) {
    return provider;
  }
  return new CachedEmbeddingProvider(provider, {
    maxSize: config.embeddingCacheSize,
    ttlMinutes: config.embeddingCacheTtlMinutes,
  });
}

/**
 * Detect which remote embedding providers are reachable.
 */
export async function detectAvailableProviders(config: EmbeddingConfig): Promise<{
  openai: boolean;
  ollama: boolean;
  hashing: boolean;
}> {
  const openaiProvider = new OpenAIEmbeddingProvider(config.openaiModel, {
    apiKey: config.openaiApiKey,
    baseUrl: config.openaiBaseUrl,
  });
  const ollamaProvider = new OllamaEmbeddingProvider(config.ollamaModel, config.ollamaBaseUrl);

  const [openai, ollama] = await Promise.all([
    openaiProvider.isAvailable(),
    ollamaProvider.isAvailable(),
  ]);

  return { openai, ollama, hashing: true };
}
