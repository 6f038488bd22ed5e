// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * Retrieval Pipeline Errors
 *
 * One class per failure kind so callers can decide between fixing
 * configuration, retrying a provider call, or reporting to the user.
 */

/**
 * Error categories for classification and reporting.
 */
export enum ErrorCategory {
  CONFIGURATION = 'configuration',
  EMBEDDING = 'embedding',
  DIMENSION = 'dimension',
  INDEX_IO = 'index_io',
  CANCELLED = 'cancelled',
  DOCUMENT = 'document',
  RETRIEVAL = 'retrieval',
  GENERATION = 'generation',
}

/**
 * Base class for every error raised by the pipeline.
 */
export class RagError extends Error {
  constructor(
    message: string,
    public category: ErrorCategory,
    public retryable: boolean = false,
    public suggestions: string[] = [],
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'RagError';
  }

  /**
   * Format the error together with its category and suggestions.
   */
  getFullMessage(): string {
    let output = `${this.message}\n`;
    output += `\nCategory: ${this.category}\n`;

    if (this.suggestions.length > 0) {
      output += `\nSuggestions:\n`;
      this.suggestions.forEach((suggestion, index) => {
        output += `   ${index + 1}. ${suggestion}\n`;
      });
    }

    if (this.retryable) {
      output += `\nThis error is retryable.\n`;
    }

    return output;
  }
}

/**
 * Invalid chunking, budget, or component parameters. Never retried.
 */
export class ConfigurationError extends RagError {
  constructor(message: string, suggestions: string[] = []) {
    super(message, ErrorCategory.CONFIGURATION, false, suggestions);
    this.name = 'ConfigurationError';
  }
}

/**
 * Embedding provider failure. The whole batch failed; `failedIndices`
 * lists the inputs (by position in the caller's batch) that were affected.
 */
export class EmbeddingError extends RagError {
  constructor(
    message: string,
    public failedIndices: number[],
    public provider: string,
    options?: { cause?: unknown }
  ) {
    super(
      message,
      ErrorCategory.EMBEDDING,
      true,
      ['Check that the embedding provider is reachable', 'Retry the batch with backoff'],
      options
    );
    this.name = 'EmbeddingError';
  }
}

/**
 * Vector length does not match the configured dimension.
 */
export class DimensionMismatchError extends RagError {
  constructor(
    public expected: number,
    public actual: number,
    context: string = 'vector'
  ) {
    super(
      `Dimension mismatch for ${context}: expected ${expected}, got ${actual}`,
      ErrorCategory.DIMENSION,
      false,
      ['Make sure the embedding model and the index were configured with the same dimension']
    );
    this.name = 'DimensionMismatchError';
  }
}

/**
 * Persisting or restoring an index failed.
 */
export class IndexIOError extends RagError {
  constructor(
    message: string,
    public path: string,
    options?: { cause?: unknown }
  ) {
    super(message, ErrorCategory.INDEX_IO, true, [`Check that ${path} is readable and writable`], options);
    this.name = 'IndexIOError';
  }
}

/**
 * The caller's abort signal fired while work was in flight.
 */
export class CancelledError extends RagError {
  constructor(public stage: string) {
    super(`Operation cancelled during ${stage}`, ErrorCategory.CANCELLED);
    this.name = 'CancelledError';
  }
}

/**
 * A document could not be accepted for ingestion.
 */
export class DocumentError extends RagError {
  constructor(message: string) {
    super(message, ErrorCategory.DOCUMENT);
    this.name = 'DocumentError';
  }
}

/**
 * Stage of a query at which retrieval failed.
 */
export type RetrievalStage = 'embed' | 'search';

/**
 * A query failed before results could be produced.
 */
export class RetrievalError extends RagError {
  constructor(
    public query: string,
    public stage: RetrievalStage,
    cause: Error
  ) {
    super(
      `Retrieval failed at ${stage} stage for query "${truncate(query, 80)}": ${cause.message}`,
      ErrorCategory.RETRIEVAL,
      isRagError(cause) ? cause.retryable : false,
      isRagError(cause) ? cause.suggestions : [],
      { cause }
    );
    this.name = 'RetrievalError';
  }
}

/**
 * The answer generator failed.
 */
export class GenerationError extends RagError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, ErrorCategory.GENERATION, true, [], options);
    this.name = 'GenerationError';
  }
}

export function isRagError(error: unknown): error is RagError {
  return error instanceof RagError;
}

/**
 * Normalize an unknown catch value into an Error.
 */
export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

function truncate(text: string, max: number): string {
  return text.length > max ? text.slice(0, max) + '...' : text;
}
