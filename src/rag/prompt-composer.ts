// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * Prompt Composer
 *
 * Packs ranked passages into a bounded context block. Passages go in rank
 * order, each behind a numbered citation marker, until the next one would
 * overflow the budget. Only passage text counts against the budget.
 */

import { logger } from '../logger.js';
import { measure, truncateTo } from '../utils/token-counter.js';
import { ConfigurationError } from './errors.js';
import { CHUNK_METADATA_KEYS } from './types.js';
import type { Citation, ComposedPrompt, Metadata, RetrievalResult, SizeUnit } from './types.js';

export interface PromptComposerOptions {
  /** Unit of the context budget; must match the chunker's (default: characters) */
  unit?: SizeUnit;
  /** Budgets below this are rejected (default: 0) */
  minContextTokens?: number;
}

const NO_CONTEXT = '(no relevant passages found)';

export class PromptComposer {
  private unit: SizeUnit;
  private minContextTokens: number;

  constructor(options: PromptComposerOptions = {}) {
    this.unit = options.unit ?? 'characters';
    this.minContextTokens = options.minContextTokens ?? 0;
    if (!Number.isInteger(this.minContextTokens) || this.minContextTokens < 0) {
      throw new ConfigurationError(`minContextTokens must be a non-negative integer, got ${this.minContextTokens}`);
    }
  }

  compose(
    systemText: string,
    queryText: string,
    results: RetrievalResult[],
    maxContextTokens: number
  ): ComposedPrompt {
    if (!Number.isInteger(maxContextTokens) || maxContextTokens <= 0 || maxContextTokens < this.minContextTokens) {
      throw new ConfigurationError(
        `maxContextTokens must be an integer >= ${Math.max(1, this.minContextTokens)}, got ${maxContextTokens}`,
        ['Raise the context budget or lower minContextTokens']
      );
    }

    const ordered = [...results].sort((a, b) => a.rank - b.rank);
    const passages: string[] = [];
    const citations: Citation[] = [];
    let used = 0;

    for (const result of ordered) {
      const size = measure(result.text, this.unit);
      let text = result.text;
      let truncated = false;

      if (used + size > maxContextTokens) {
        if (citations.length > 0) break;
        // An oversized top result is cut to the budget rather than dropped
        text = truncateTo(result.text, this.unit, maxContextTokens);
        truncated = true;
      }

      const index = citations.length + 1;
      const marker = `[${index}]`;
      passages.push(`${marker} ${text}`);
      citations.push(toCitation(result, marker, index, truncated));
      used += truncated ? measure(text, this.unit) : size;

      if (truncated) break;
    }

    const composed: ComposedPrompt = {
      systemText,
      contextBlock: passages.join('\n\n'),
      userText: queryText,
      citations,
    };

    logger.promptComposed(citations.length, results.length, used, maxContextTokens, renderPrompt(composed));
    return composed;
  }
}

function toCitation(result: RetrievalResult, marker: string, index: number, truncated: boolean): Citation {
  const documentId = result.metadata[CHUNK_METADATA_KEYS.documentId];
  const sourceUri = result.metadata[CHUNK_METADATA_KEYS.sourceUri];
  const metadata: Metadata = { ...result.metadata };
  return {
    marker,
    index,
    chunkId: result.chunkId,
    documentId: typeof documentId === 'string' ? documentId : null,
    sourceUri: typeof sourceUri === 'string' ? sourceUri : null,
    score: result.score,
    truncated,
    metadata,
  };
}

/**
 * The user message sent to a generator: context block, then question.
 */
export function renderUserMessage(composed: ComposedPrompt): string {
  const context = composed.contextBlock === '' ? NO_CONTEXT : composed.contextBlock;
  return `Context:\n${context}\n\nQuestion: ${composed.userText}`;
}

/**
 * Flatten a composed prompt into one text.
 */
export function renderPrompt(composed: ComposedPrompt): string {
  return `${composed.systemText}\n\n${renderUserMessage(composed)}`;
}
