// Copyright 2026 Layne Penney
// SPDX-License-Identifier: Apache-2.0

/**
 * OpenAI Answer Generator
 *
 * Sends the system text and the rendered context + question to an OpenAI
 * (or OpenAI-compatible) chat completion endpoint.
 */

import OpenAI from 'openai';
import { abortable } from '../../utils/abort.js';
import { CancelledError, ConfigurationError, GenerationError, toError } from '../errors.js';
import { renderUserMessage } from '../prompt-composer.js';
import type { ComposedPrompt } from '../types.js';
import type { AnswerGenerator, GenerateOptions } from './types.js';

const DEFAULT_MODEL = 'gpt-4o-mini';
const MAX_TOKENS = 1024;

export interface OpenAIGeneratorOptions {
  apiKey?: string;
  baseUrl?: string;
}

export class OpenAIAnswerGenerator implements AnswerGenerator {
  private client: OpenAI | null = null;
  private model: string;
  private options: OpenAIGeneratorOptions;

  constructor(model: string = DEFAULT_MODEL, options: OpenAIGeneratorOptions = {}) {
    this.model = model;
    this.options = options;
  }

  getName(): string {
    return 'OpenAI';
  }

  getModel(): string {
    return this.model;
  }

  private getClient(): OpenAI {
    if (!this.client) {
      if (!this.options.apiKey) {
        throw new ConfigurationError('OpenAI answer generation needs an API key', [
          'Set OPENAI_API_KEY or openaiApiKey in the config file',
          'Or set "generationProvider" to "none" to get prompts without answers',
        ]);
      }
      this.client = new OpenAI({ apiKey: this.options.apiKey, baseURL: this.options.baseUrl });
    }
    return this.client;
  }

  async generate(prompt: ComposedPrompt, options: GenerateOptions = {}): Promise<string> {
    const { signal } = options;
    const client = this.getClient();

    try {
      const response = await abortable(
        client.chat.completions.create(
          {
            model: this.model,
            max_tokens: MAX_TOKENS,
            messages: [
              { role: 'system', content: prompt.systemText },
              { role: 'user', content: renderUserMessage(prompt) },
            ],
          },
          { signal }
        ),
        signal,
        'generation'
      );
      return response.choices[0]?.message?.content ?? '';
    } catch (error) {
      if (error instanceof CancelledError) throw error;
      if (signal?.aborted) throw new CancelledError('generation');
      throw new GenerationError(`${this.getName()} generation failed: ${toError(error).message}`, { cause: error });
    }
  }
}
