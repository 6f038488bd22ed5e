// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * Configuration Types
 *
 * One explicit configuration object, built once at the edge and handed to
 * each component constructor.
 */

import type { SizeUnit } from '../rag/types.js';
import type { SimilarityMetric } from '../rag/vector-index/types.js';

export const EMBEDDING_PROVIDERS = ['openai', 'ollama', 'hashing'] as const;
export type EmbeddingProviderName = (typeof EMBEDDING_PROVIDERS)[number];

export const INDEX_BACKENDS = ['memory', 'vectra'] as const;
export type IndexBackend = (typeof INDEX_BACKENDS)[number];

export const SIMILARITY_METRICS = ['cosine', 'dot'] as const;

export const SIZE_UNITS = ['characters', 'tokens'] as const;

export const GENERATION_PROVIDERS = ['openai', 'none'] as const;
export type GenerationProviderName = (typeof GENERATION_PROVIDERS)[number];

/**
 * Resolved configuration for the retrieval pipeline.
 */
export interface RagConfig {
  /** Embedding backend */
  embeddingProvider: EmbeddingProviderName;
  /** OpenAI embedding model (default: text-embedding-3-small) */
  openaiModel: string;
  /** OpenAI API key; only the config loader reads it from the environment */
  openaiApiKey?: string;
  /** Optional OpenAI-compatible endpoint */
  openaiBaseUrl?: string;
  /** Ollama embedding model (default: nomic-embed-text) */
  ollamaModel: string;
  /** Ollama base URL (default: http://localhost:11434) */
  ollamaBaseUrl: string;
  /** Vector length; null uses the model's native size */
  embeddingDimensions: number | null;
  /** Texts per provider request */
  embeddingBatchSize: number;
  /** Cached embeddings (0 disables the cache) */
  embeddingCacheSize: number;
  embeddingCacheTtlMinutes: number;

  /** Unit for chunk sizes and the prompt budget */
  sizeUnit: SizeUnit;
  chunkSize: number;
  chunkOverlap: number;
  /** Fraction of chunkSize a chunk end may move back to a natural break */
  boundaryTolerance: number;

  indexBackend: IndexBackend;
  metric: SimilarityMetric;
  /** Directory holding the persisted index and source registry */
  indexPath: string;

  /** Number of results to return */
  topK: number;
  /** Search depth multiplier when metadata filters are applied */
  fetchMultiplier: number;
  /** Keep at most this many chunks per document (null: no limit) */
  maxChunksPerDocument: number | null;
  /** Drop results scoring below this (null: keep all) */
  minScore: number | null;
  /** Cached retrievals (0 disables the cache) */
  retrievalCacheSize: number;
  retrievalCacheTtlMinutes: number;

  /** Context budget in sizeUnit */
  maxContextTokens: number;
  /** Smallest acceptable context budget */
  minContextTokens: number;
  systemPrompt: string;

  /** Documents ingested concurrently */
  ingestConcurrency: number;

  generationProvider: GenerationProviderName;
  generationModel: string;

  /** File patterns the CLI ingests */
  includePatterns: string[];
  /** File patterns the CLI skips */
  excludePatterns: string[];
}

/**
 * Configuration as written in a config file: any subset of RagConfig.
 */
export type WorkspaceConfig = Partial<RagConfig>;

/**
 * Default configuration.
 */
export const DEFAULT_RAG_CONFIG: RagConfig = {
  embeddingProvider: 'hashing',
  openaiModel: 'text-embedding-3-small',
  ollamaModel: 'nomic-embed-text',
  ollamaBaseUrl: 'http://localhost:11434',
  embeddingDimensions: null,
  embeddingBatchSize: 64,
  embeddingCacheSize: 1000,
  embeddingCacheTtlMinutes: 60,

  sizeUnit: 'characters',
  chunkSize: 1000,
  chunkOverlap: 200,
  boundaryTolerance: 0.1,

  indexBackend: 'memory',
  metric: 'cosine',
  indexPath: '.groundwork/index',

  topK: 5,
  fetchMultiplier: 4,
  maxChunksPerDocument: null,
  minScore: null,
  retrievalCacheSize: 100,
  retrievalCacheTtlMinutes: 5,

  maxContextTokens: 6000,
  minContextTokens: 200,
  systemPrompt:
    'Answer the question using only the numbered context passages below. ' +
    'Cite the passages you use with their markers, for example [1]. ' +
    'If the context does not contain the answer, say that you do not know.',

  ingestConcurrency: 4,

  generationProvider: 'none',
  generationModel: 'gpt-4o-mini',

  includePatterns: ['**/*.md', '**/*.markdown', '**/*.txt', '**/*.rst'],
  excludePatterns: [
    '**/node_modules/**',
    '**/.git/**',
    '**/dist/**',
    '**/build/**',
    '**/.groundwork/**',
  ],
};
