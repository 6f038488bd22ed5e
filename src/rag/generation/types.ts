/**
 * Answer Generation
 *
 * Capability for turning a composed prompt into an answer. The retrieval
 * core never calls a model itself; the query engine hands the prompt to
 * whichever generator it was given.
 */

import type { ComposedPrompt } from '../types.js';

export interface GenerateOptions {
  signal?: AbortSignal;
}

export interface AnswerGenerator {
  getName(): string;
  getModel(): string;
  generate(prompt: ComposedPrompt, options?: GenerateOptions): Promise<string>;
}
