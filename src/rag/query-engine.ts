// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * Query Engine
 *
 * Answers a question end to end: retrieve passages, compose the prompt,
 * and hand it to the answer generator when one is configured.
 */

import { logger } from '../logger.js';
import { throwIfAborted } from '../utils/abort.js';
import { parseCitations, toAnswerSources } from './citations.js';
import { ConfigurationError } from './errors.js';
import type { AnswerGenerator } from './generation/types.js';
import { renderPrompt } from './prompt-composer.js';
import type { PromptComposer } from './prompt-composer.js';
import type { ChunkRetriever } from './retriever.js';
import type { AnswerSource, ComposedPrompt, MetadataFilter, RetrievalResult } from './types.js';

export interface QueryRequest {
  question: string;
  /** Defaults to the engine's topK */
  topK?: number;
  filters?: MetadataFilter;
}

export interface QueryResponse {
  /** Generated answer; empty when no generator is configured */
  answer: string;
  /** One source per passage included in the prompt */
  sources: AnswerSource[];
  /** The flattened prompt that was (or would be) sent to the generator */
  prompt: string;
  /** Sources the answer actually cites */
  cited: AnswerSource[];
  composed: ComposedPrompt;
  results: RetrievalResult[];
}

export interface QueryEngineOptions {
  systemPrompt: string;
  maxContextTokens: number;
  topK: number;
  generator?: AnswerGenerator | null;
}

export class QueryEngine {
  private generator: AnswerGenerator | null;

  constructor(
    private retriever: ChunkRetriever,
    private composer: PromptComposer,
    private options: QueryEngineOptions
  ) {
    this.generator = options.generator ?? null;
  }

  hasGenerator(): boolean {
    return this.generator !== null;
  }

  async ask(request: QueryRequest, options: { signal?: AbortSignal } = {}): Promise<QueryResponse> {
    const { signal } = options;
    const question = request.question.trim();
    if (question === '') {
      throw new ConfigurationError('A question is required');
    }

    const topK = request.topK ?? this.options.topK;
    const results = await this.retriever.retrieve(question, topK, request.filters, { signal });
    const composed = this.composer.compose(this.options.systemPrompt, question, results, this.options.maxContextTokens);
    const prompt = renderPrompt(composed);
    const sources = toAnswerSources(composed.citations, results);

    let answer = '';
    if (this.generator) {
      throwIfAborted(signal, 'generation');
      const started = Date.now();
      answer = await this.generator.generate(composed, { signal });
      logger.verbose(
        `Generated answer with ${this.generator.getName()}/${this.generator.getModel()} ` +
        `in ${((Date.now() - started) / 1000).toFixed(2)}s`
      );
    }

    const cited = toAnswerSources(parseCitations(answer, composed.citations), results);
    return { answer, sources, prompt, cited, composed, results };
  }
}
