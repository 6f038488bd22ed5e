// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * Configuration Validator
 *
 * Reads untrusted config file contents into a typed WorkspaceConfig and
 * checks resolved configuration for mistakes.
 */

import { ConfigurationError } from '../rag/errors.js';
import {
  EMBEDDING_PROVIDERS,
  GENERATION_PROVIDERS,
  INDEX_BACKENDS,
  SIMILARITY_METRICS,
  SIZE_UNITS,
} from './types.js';
import type { RagConfig, WorkspaceConfig } from './types.js';

type RawConfig = Record<string, unknown>;

function isRecord(value: unknown): value is RawConfig {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isOneOf<T extends string>(value: unknown, options: readonly T[]): value is T {
  return options.some((option) => option === value);
}

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((item) => typeof item === 'string');
}

const STRING_KEYS = [
  'openaiModel', 'openaiApiKey', 'openaiBaseUrl', 'ollamaModel', 'ollamaBaseUrl',
  'indexPath', 'systemPrompt', 'generationModel',
] as const;

const NUMBER_KEYS = [
  'embeddingBatchSize', 'embeddingCacheSize', 'embeddingCacheTtlMinutes',
  'chunkSize', 'chunkOverlap', 'boundaryTolerance', 'topK', 'fetchMultiplier',
  'retrievalCacheSize', 'retrievalCacheTtlMinutes', 'maxContextTokens',
  'minContextTokens', 'ingestConcurrency',
] as const;

const NULLABLE_NUMBER_KEYS = ['embeddingDimensions', 'maxChunksPerDocument', 'minScore'] as const;

const KNOWN_KEYS = new Set<string>([
  ...STRING_KEYS,
  ...NUMBER_KEYS,
  ...NULLABLE_NUMBER_KEYS,
  'embeddingProvider', 'sizeUnit', 'indexBackend', 'metric', 'generationProvider',
  'includePatterns', 'excludePatterns',
]);

/**
 * Read a parsed config file. Values of the wrong type are dropped with a
 * warning rather than failing the whole file.
 */
export function parseWorkspaceConfig(raw: unknown): { config: WorkspaceConfig; warnings: string[] } {
  const warnings: string[] = [];
  const config: WorkspaceConfig = {};

  if (!isRecord(raw)) {
    return { config, warnings: ['Config file must contain a JSON object'] };
  }

  const reject = (key: string, expected: string): void => {
    warnings.push(`Ignoring "${key}": expected ${expected}`);
  };

  for (const key of Object.keys(raw)) {
    if (!KNOWN_KEYS.has(key)) {
      warnings.push(`Unknown config option "${key}"`);
    }
  }

  for (const key of STRING_KEYS) {
    const value = raw[key];
    if (value === undefined) continue;
    if (typeof value === 'string') config[key] = value;
    else reject(key, 'a string');
  }

  for (const key of NUMBER_KEYS) {
    const value = raw[key];
    if (value === undefined) continue;
    if (typeof value === 'number' && Number.isFinite(value)) config[key] = value;
    else reject(key, 'a number');
  }

  for (const key of NULLABLE_NUMBER_KEYS) {
    const value = raw[key];
    if (value === undefined) continue;
    if (value === null || (typeof value === 'number' && Number.isFinite(value))) config[key] = value;
    else reject(key, 'a number or null');
  }

  if (raw.embeddingProvider !== undefined) {
    if (isOneOf(raw.embeddingProvider, EMBEDDING_PROVIDERS)) config.embeddingProvider = raw.embeddingProvider;
    else reject('embeddingProvider', EMBEDDING_PROVIDERS.join(' | '));
  }
  if (raw.sizeUnit !== undefined) {
    if (isOneOf(raw.sizeUnit, SIZE_UNITS)) config.sizeUnit = raw.sizeUnit;
    else reject('sizeUnit', SIZE_UNITS.join(' | '));
  }
  if (raw.indexBackend !== undefined) {
    if (isOneOf(raw.indexBackend, INDEX_BACKENDS)) config.indexBackend = raw.indexBackend;
    else reject('indexBackend', INDEX_BACKENDS.join(' | '));
  }
  if (raw.metric !== undefined) {
    if (isOneOf(raw.metric, SIMILARITY_METRICS)) config.metric = raw.metric;
    else reject('metric', SIMILARITY_METRICS.join(' | '));
  }
  if (raw.generationProvider !== undefined) {
    if (isOneOf(raw.generationProvider, GENERATION_PROVIDERS)) config.generationProvider = raw.generationProvider;
    else reject('generationProvider', GENERATION_PROVIDERS.join(' | '));
  }

  for (const key of ['includePatterns', 'excludePatterns'] as const) {
    const value = raw[key];
    if (value === undefined) continue;
    if (isStringArray(value)) config[key] = [...value];
    else reject(key, 'an array of strings');
  }

  return { config, warnings };
}

/**
 * Validate resolved configuration.
 * Returns an array of warning messages for questionable options.
 */
export function validateConfig(config: RagConfig): string[] {
  const warnings: string[] = [];

  if (config.embeddingProvider === 'openai' && !config.openaiApiKey) {
    warnings.push('embeddingProvider is "openai" but no OpenAI API key is configured');
  }
  if (config.generationProvider === 'openai' && !config.openaiApiKey) {
    warnings.push('generationProvider is "openai" but no OpenAI API key is configured');
  }
  if (config.chunkOverlap * 2 > config.chunkSize) {
    warnings.push(`chunkOverlap (${config.chunkOverlap}) is more than half of chunkSize (${config.chunkSize})`);
  }
  if (config.maxContextTokens < config.chunkSize) {
    warnings.push('maxContextTokens is smaller than chunkSize; passages will be truncated');
  }
  if (config.minScore !== null && config.metric === 'cosine' && (config.minScore < -1 || config.minScore > 1)) {
    warnings.push(`minScore ${config.minScore} is outside the cosine range [-1, 1]`);
  }

  return warnings;
}

/**
 * Throw ConfigurationError for settings no component can work with.
 */
export function assertValidConfig(config: RagConfig): void {
  const problems: string[] = [];
  const positiveInteger = (key: keyof RagConfig, value: number): void => {
    if (!Number.isInteger(value) || value <= 0) problems.push(`${key} must be a positive integer`);
  };

  positiveInteger('chunkSize', config.chunkSize);
  positiveInteger('topK', config.topK);
  positiveInteger('fetchMultiplier', config.fetchMultiplier);
  positiveInteger('ingestConcurrency', config.ingestConcurrency);
  positiveInteger('embeddingBatchSize', config.embeddingBatchSize);
  positiveInteger('maxContextTokens', config.maxContextTokens);

  if (!Number.isInteger(config.chunkOverlap) || config.chunkOverlap < 0 || config.chunkOverlap >= config.chunkSize) {
    problems.push('chunkOverlap must be an integer with 0 <= chunkOverlap < chunkSize');
  }
  if (!(config.boundaryTolerance >= 0 && config.boundaryTolerance < 1)) {
    problems.push('boundaryTolerance must be in [0, 1)');
  }
  if (!Number.isInteger(config.minContextTokens) || config.minContextTokens < 1) {
    problems.push('minContextTokens must be a positive integer');
  } else if (config.maxContextTokens < config.minContextTokens) {
    problems.push(`maxContextTokens (${config.maxContextTokens}) is below minContextTokens (${config.minContextTokens})`);
  }
  if (config.embeddingDimensions !== null) {
    positiveInteger('embeddingDimensions', config.embeddingDimensions);
  }
  if (config.maxChunksPerDocument !== null) {
    positiveInteger('maxChunksPerDocument', config.maxChunksPerDocument);
  }
  if (config.embeddingCacheSize < 0 || config.retrievalCacheSize < 0) {
    problems.push('cache sizes must not be negative');
  }
  if (config.indexBackend === 'vectra' && config.metric !== 'cosine') {
    problems.push('the vectra index backend only supports the cosine metric');
  }

  if (problems.length > 0) {
    throw new ConfigurationError(`Invalid configuration: ${problems.join('; ')}`, problems);
  }
}
