/**
 * Answer generator factory.
 */

import type { RagConfig } from '../../config/types.js';
import { OpenAIAnswerGenerator } from './openai.js';
import type { AnswerGenerator } from './types.js';

export type { AnswerGenerator, GenerateOptions } from './types.js';
export { OpenAIAnswerGenerator } from './openai.js';

/**
 * Create the configured generator, or null when generation is off.
 */
export function createAnswerGenerator(
  config: Pick<RagConfig, 'generationProvider' | 'generationModel' | 'openaiApiKey' | 'openaiBaseUrl'>
): AnswerGenerator | null {
  switch (config.generationProvider) {
    case 'openai':
      return new OpenAIAnswerGenerator(config.generationModel, {
        apiKey: config.openaiApiKey,
        baseUrl: config.openaiBaseUrl,
      });
    case 'none':
      return null;
  }
}
