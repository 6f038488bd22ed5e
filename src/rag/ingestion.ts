// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * Ingestion Pipeline
 *
 * Drives documents through chunker, embedder and index:
 * - Documents run concurrently up to a worker limit; the steps of one
 *   document stay sequential (chunk, embed, delete stale, upsert)
 * - A failing document is recorded in the report and the rest continue
 * - Re-ingesting a source first deletes every chunk it owned before
 * - Cancellation aborts the whole run with CancelledError
 */

import { logger } from '../logger.js';
import { KeyedMutex, processInParallel } from '../utils/semaphore.js';
import { throwIfAborted } from '../utils/abort.js';
import { CancelledError, ConfigurationError, toError } from './errors.js';
import type { TextChunker } from './chunker.js';
import { createDocument } from './documents.js';
import type { Embedder } from './embeddings/base.js';
import { SourceRegistry } from './source-registry.js';
import type {
  Document,
  DocumentInput,
  IndexEntry,
  IngestFailure,
  IngestProgressCallback,
  IngestReport,
} from './types.js';
import type { VectorIndex } from './vector-index/types.js';

/** Default number of documents processed at once */
const DEFAULT_CONCURRENCY = 4;

export interface IngestionPipelineOptions {
  /** Documents processed at once (default: 4) */
  concurrency?: number;
  /** Source -> chunk ids mapping; a fresh one is created if omitted */
  registry?: SourceRegistry;
}

export interface IngestOptions {
  signal?: AbortSignal;
  onProgress?: IngestProgressCallback;
}

/** Outcome of one document */
interface DocumentOutcome {
  chunks: number;
  removed: number;
}

/** A document (or its rejection) with its position in the input */
type Prepared =
  | { position: number; document: Document }
  | { position: number; failure: IngestFailure };

export class IngestionPipeline {
  private concurrency: number;
  private registry: SourceRegistry;
  private sourceLocks = new KeyedMutex();

  constructor(
    private chunker: TextChunker,
    private embedder: Embedder,
    private index: VectorIndex,
    options: IngestionPipelineOptions = {}
  ) {
    this.concurrency = options.concurrency ?? DEFAULT_CONCURRENCY;
    if (!Number.isInteger(this.concurrency) || this.concurrency < 1) {
      throw new ConfigurationError(`Ingestion concurrency must be a positive integer, got ${this.concurrency}`);
    }
    this.registry = options.registry ?? new SourceRegistry();
  }

  getRegistry(): SourceRegistry {
    return this.registry;
  }

  /**
   * Ingest a batch of documents.
   *
   * Documents sharing a source URI are applied one after another in input
   * order, so the last one wins.
   */
  async ingest(inputs: DocumentInput[], options: IngestOptions = {}): Promise<IngestReport> {
    const { signal, onProgress } = options;
    throwIfAborted(signal, 'ingestion');

    const report: IngestReport = { accepted: 0, failed: [], chunksIndexed: 0, chunksRemoved: 0 };
    const failures: Array<{ position: number; failure: IngestFailure }> = [];
    const total = inputs.length;
    let done = 0;

    const progress = (documentId: string): void => {
      done++;
      onProgress?.(done, total, documentId);
    };

    const groups = new Map<string, Document[]>();
    const positions = new Map<Document, number>();

    inputs.map((input, position) => prepare(input, position)).forEach((item) => {
      if ('failure' in item) {
        failures.push(item);
        logger.documentFailed(item.failure.documentId, item.failure.error);
        progress(item.failure.documentId);
        return;
      }
      positions.set(item.document, item.position);
      const group = groups.get(item.document.sourceUri);
      if (group) {
        group.push(item.document);
      } else {
        groups.set(item.document.sourceUri, [item.document]);
      }
    });

    await processInParallel(
      Array.from(groups.values()),
      async (group) => {
        for (const document of group) {
          const started = Date.now();
          try {
            const outcome = await this.ingestDocument(document, signal);
            report.accepted++;
            report.chunksIndexed += outcome.chunks;
            report.chunksRemoved += outcome.removed;
            logger.documentIngested(document.id, outcome.chunks, outcome.removed, Date.now() - started);
          } catch (error) {
            if (error instanceof CancelledError) throw error;
            if (signal?.aborted) throw new CancelledError('ingestion');

            const failure: IngestFailure = {
              documentId: document.id,
              sourceUri: document.sourceUri,
              error: toError(error),
            };
            failures.push({ position: positions.get(document) ?? 0, failure });
            logger.documentFailed(document.id, failure.error);
          }
          progress(document.id);
        }
      },
      this.concurrency
    );

    report.failed = failures.sort((a, b) => a.position - b.position).map((f) => f.failure);
    logger.ingestSummary(report.accepted, report.failed.length, report.chunksIndexed, report.chunksRemoved);
    return report;
  }

  /**
   * Delete every chunk a source owns.
   * @returns number of index entries removed
   */
  async remove(sourceUri: string): Promise<number> {
    return this.sourceLocks.run(sourceUri, async () => {
      const record = this.registry.get(sourceUri);
      if (!record) return 0;

      const removed = await this.index.delete(record.chunkIds);
      this.registry.delete(sourceUri);
      logger.verbose(`Removed ${removed} chunks of ${sourceUri}`);
      return removed;
    });
  }

  private ingestDocument(document: Document, signal: AbortSignal | undefined): Promise<DocumentOutcome> {
    return this.sourceLocks.run(document.sourceUri, async () => {
      throwIfAborted(signal, 'chunking');
      const chunks = this.chunker.chunk(document);

      const vectors = chunks.length > 0
        ? await this.embedder.embed(chunks.map((c) => c.text), { signal })
        : [];
      throwIfAborted(signal, 'indexing');

      const entries: IndexEntry[] = chunks.map((chunk, i) => ({
        chunkId: chunk.id,
        vector: vectors[i],
        text: chunk.text,
        metadata: chunk.metadata,
      }));

      let removed = 0;
      const prior = this.registry.get(document.sourceUri);
      if (prior) {
        removed = await this.index.delete(prior.chunkIds);
        // The index no longer holds them, whatever happens next
        this.registry.delete(document.sourceUri);
      }

      await this.index.upsert(entries);
      this.registry.set(document.sourceUri, {
        documentId: document.id,
        chunkIds: entries.map((e) => e.chunkId),
        ingestedAt: new Date().toISOString(),
      });

      return { chunks: entries.length, removed };
    });
  }
}

function prepare(input: DocumentInput, position: number): Prepared {
  try {
    return { position, document: createDocument(input) };
  } catch (error) {
    const label = input.id || input.sourceUri || `document #${position}`;
    return {
      position,
      failure: { documentId: label, sourceUri: input.sourceUri ?? null, error: toError(error) },
    };
  }
}
