// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * Retrieval System
 *
 * Wires every component from one RagConfig. Nothing here reads the
 * environment; the config object is the only input.
 */

import * as fs from 'fs';
import * as path from 'path';
import type { RagConfig } from '../config/types.js';
import { logger } from '../logger.js';
import { TextChunker } from './chunker.js';
import { createEmbedder } from './embeddings/index.js';
import type { Embedder } from './embeddings/base.js';
import { createAnswerGenerator } from './generation/index.js';
import { IngestionPipeline } from './ingestion.js';
import type { IngestOptions } from './ingestion.js';
import { PromptComposer } from './prompt-composer.js';
import { QueryEngine } from './query-engine.js';
import { CachedRetriever, Retriever } from './retriever.js';
import type { ChunkRetriever } from './retriever.js';
import { SourceRegistry } from './source-registry.js';
import type { DocumentInput, IngestReport } from './types.js';
import { createVectorIndex, getIndexLocation } from './vector-index/index.js';
import type { VectorIndex } from './vector-index/types.js';

/** File name of the source registry inside indexPath */
export const REGISTRY_FILE = 'sources.json';

export interface RagSystemStats {
  entries: number;
  sources: number;
  backend: RagConfig['indexBackend'];
  metric: RagConfig['metric'];
  dimensions: number;
  embedder: string;
  indexPath: string;
}

export class RagSystem {
  readonly chunker: TextChunker;
  readonly embedder: Embedder;
  readonly index: VectorIndex;
  readonly pipeline: IngestionPipeline;
  readonly retriever: ChunkRetriever;
  readonly composer: PromptComposer;
  readonly engine: QueryEngine;

  constructor(
    readonly config: RagConfig,
    readonly registry: SourceRegistry = new SourceRegistry()
  ) {
    this.chunker = new TextChunker({
      chunkSize: config.chunkSize,
      overlap: config.chunkOverlap,
      unit: config.sizeUnit,
      boundaryTolerance: config.boundaryTolerance,
    });
    this.embedder = createEmbedder(config);
    this.index = createVectorIndex(config, this.embedder.getDimensions());
    this.pipeline = new IngestionPipeline(this.chunker, this.embedder, this.index, {
      concurrency: config.ingestConcurrency,
      registry,
    });

    const retriever = new Retriever(this.embedder, this.index, {
      fetchMultiplier: config.fetchMultiplier,
      maxChunksPerDocument: config.maxChunksPerDocument,
      minScore: config.minScore,
    });
    this.retriever = config.retrievalCacheSize > 0
      ? new CachedRetriever(retriever, this.index, {
        maxSize: config.retrievalCacheSize,
        ttlMinutes: config.retrievalCacheTtlMinutes,
      })
      : retriever;

    this.composer = new PromptComposer({ unit: config.sizeUnit, minContextTokens: config.minContextTokens });
    this.engine = new QueryEngine(this.retriever, this.composer, {
      systemPrompt: config.systemPrompt,
      maxContextTokens: config.maxContextTokens,
      topK: config.topK,
      generator: createAnswerGenerator(config),
    });
  }

  get indexLocation(): string {
    return getIndexLocation(this.config);
  }

  get registryPath(): string {
    return path.join(this.config.indexPath, REGISTRY_FILE);
  }

  ingest(documents: DocumentInput[], options?: IngestOptions): Promise<IngestReport> {
    return this.pipeline.ingest(documents, options);
  }

  remove(sourceUri: string): Promise<number> {
    return this.pipeline.remove(sourceUri);
  }

  /**
   * Load a previously saved memory index. Vectra folders are opened in place.
   */
  async restoreIndex(): Promise<void> {
    if (this.config.indexBackend === 'memory' && fs.existsSync(this.indexLocation)) {
      await this.index.restore(this.indexLocation);
    }

    // A registry without an index (deleted or rebuilt) would point at nothing
    if (this.registry.size > 0 && (await this.index.size()) === 0) {
      logger.warn(`Index at ${this.config.indexPath} is empty; forgetting ${this.registry.size} registered sources`);
      this.registry.clear();
    }
  }

  /**
   * Persist the index and the source registry under indexPath.
   */
  async save(): Promise<void> {
    await this.index.persist(this.indexLocation);
    await this.registry.save(this.registryPath);
  }

  async stats(): Promise<RagSystemStats> {
    return {
      entries: await this.index.size(),
      sources: this.registry.size,
      backend: this.config.indexBackend,
      metric: this.index.metric,
      dimensions: this.index.dimensions,
      embedder: `${this.embedder.getName()}/${this.embedder.getModel()}`,
      indexPath: this.config.indexPath,
    };
  }
}

/**
 * Build a system with an empty index and registry.
 */
export function createRagSystem(config: RagConfig): RagSystem {
  return new RagSystem(config);
}

/**
 * Build a system and load whatever was saved under indexPath.
 */
export async function openRagSystem(config: RagConfig): Promise<RagSystem> {
  const registry = await SourceRegistry.load(path.join(config.indexPath, REGISTRY_FILE));
  const system = new RagSystem(config, registry);
  await system.restoreIndex();
  return system;
}
