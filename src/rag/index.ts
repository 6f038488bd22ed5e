// Copyright 2026 Layne Penney
// SPDX-License-Identifier: Apache-2.0

/**
 * Retrieval Pipeline Exports
 */

// Types
export type {
  MetadataValue,
  Metadata,
  SizeUnit,
  EmbeddingVector,
  DocumentInput,
  Document,
  Chunk,
  IndexEntry,
  SearchHit,
  MetadataFilter,
  RetrievalResult,
  Citation,
  ComposedPrompt,
  AnswerSource,
  IngestFailure,
  IngestReport,
  IngestProgressCallback,
} from './types.js';
export { CHUNK_METADATA_KEYS } from './types.js';

// Errors
export {
  ErrorCategory,
  RagError,
  ConfigurationError,
  EmbeddingError,
  DimensionMismatchError,
  IndexIOError,
  CancelledError,
  DocumentError,
  RetrievalError,
  GenerationError,
  isRagError,
  toError,
} from './errors.js';
export type { RetrievalStage } from './errors.js';

// Documents and chunking
export { createDocument, deriveDocumentId } from './documents.js';
export { TextChunker, DEFAULT_CHUNKER_CONFIG, generateChunkId, validateChunkParameters } from './chunker.js';
export type { ChunkerConfig } from './chunker.js';

// Embedding providers
export {
  BaseEmbeddingProvider,
  CachedEmbeddingProvider,
  HashingEmbeddingProvider,
  OpenAIEmbeddingProvider,
  OllamaEmbeddingProvider,
  createEmbeddingProvider,
  createEmbedder,
  detectAvailableProviders,
} from './embeddings/index.js';
export type { Embedder, EmbedOptions } from './embeddings/index.js';

// Vector indexes
export {
  MemoryVectorIndex,
  VectraVectorIndex,
  createVectorIndex,
  getIndexLocation,
} from './vector-index/index.js';
export type { VectorIndex, SimilarityMetric } from './vector-index/index.js';

// Retrieval and prompting
export { Retriever, CachedRetriever, formatResults } from './retriever.js';
export type { ChunkRetriever, RetrieverOptions, RetrieveOptions } from './retriever.js';
export { PromptComposer, renderPrompt, renderUserMessage } from './prompt-composer.js';
export type { PromptComposerOptions } from './prompt-composer.js';
export { parseCitations, toAnswerSources, formatSourcesSection } from './citations.js';

// Ingestion
export { SourceRegistry } from './source-registry.js';
export type { SourceRecord } from './source-registry.js';
export { IngestionPipeline } from './ingestion.js';
export type { IngestionPipelineOptions, IngestOptions } from './ingestion.js';

// Answering
export { OpenAIAnswerGenerator, createAnswerGenerator } from './generation/index.js';
export type { AnswerGenerator, GenerateOptions } from './generation/index.js';
export { QueryEngine } from './query-engine.js';
export type { QueryRequest, QueryResponse, QueryEngineOptions } from './query-engine.js';
export { RagSystem, createRagSystem, openRagSystem } from './system.js';
export type { RagSystemStats } from './system.js';
