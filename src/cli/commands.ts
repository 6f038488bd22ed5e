// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * CLI Commands
 *
 * Handlers behind the groundwork subcommands. Each takes an opened
 * RagSystem and returns the text to print, so they can be tested without
 * a process around them.
 */

import chalk from 'chalk';
import { initConfig } from '../config/loader.js';
import { DEFAULT_RAG_CONFIG } from '../config/types.js';
import { logger } from '../logger.js';
import { formatSourcesSection } from '../rag/citations.js';
import { formatResults } from '../rag/retriever.js';
import type { RagSystem, RagSystemStats } from '../rag/system.js';
import type { IngestReport } from '../rag/types.js';
import { discoverFiles, readDocuments } from './files.js';

export interface IngestCommandResult {
  files: number;
  skipped: string[];
  report: IngestReport;
}

/**
 * Ingest files matching `patterns` (or the configured include patterns)
 * and save the index.
 */
export async function runIngest(
  system: RagSystem,
  cwd: string,
  patterns: string[],
  signal?: AbortSignal
): Promise<IngestCommandResult> {
  const include = patterns.length > 0 ? patterns : system.config.includePatterns;
  const files = await discoverFiles(cwd, include, system.config.excludePatterns);
  const { documents, skipped } = await readDocuments(cwd, files);

  for (const file of skipped) {
    logger.verbose(`Skipping ${file} (binary or too large)`);
  }

  const report = await system.ingest(documents, {
    signal,
    onProgress: (done, total, documentId) => {
      logger.trace(`Ingested ${done}/${total}: ${documentId}`);
    },
  });
  await system.save();

  return { files: files.length, skipped, report };
}

export function formatIngestResult(result: IngestCommandResult): string {
  const { report } = result;
  const lines: string[] = [];

  if (result.files === 0) {
    return 'No files matched.';
  }

  lines.push(
    `Ingested ${report.accepted} of ${result.files} files ` +
    `(${report.chunksIndexed} chunks indexed, ${report.chunksRemoved} replaced)`
  );
  if (result.skipped.length > 0) {
    lines.push(`Skipped ${result.skipped.length} binary or oversized files`);
  }
  for (const failure of report.failed) {
    lines.push(chalk.red(`Failed: ${failure.sourceUri ?? failure.documentId}: ${failure.error.message}`));
  }

  return lines.join('\n');
}

export interface QueryCommandOptions {
  topK?: number;
  json?: boolean;
  signal?: AbortSignal;
}

/**
 * Answer a question. Without a generator, prints the retrieved passages
 * and the prompt that would be sent.
 */
export async function runQuery(system: RagSystem, question: string, options: QueryCommandOptions = {}): Promise<string> {
  const response = await system.engine.ask({ question, topK: options.topK }, { signal: options.signal });

  if (options.json) {
    return JSON.stringify(
      { answer: response.answer, sources: response.sources, prompt: response.prompt },
      null,
      2
    );
  }

  if (!system.engine.hasGenerator()) {
    return [formatResults(response.results), chalk.dim('Prompt:'), response.prompt].join('\n');
  }

  const sources = formatSourcesSection(response.cited.length > 0 ? response.cited : response.sources);
  return sources ? `${response.answer}\n\n${sources}` : response.answer;
}

/**
 * Remove one source from the index and save.
 */
export async function runRemove(system: RagSystem, sourceUri: string): Promise<string> {
  if (!system.registry.has(sourceUri)) {
    return `No indexed source named ${sourceUri}`;
  }
  const removed = await system.remove(sourceUri);
  await system.save();
  return `Removed ${removed} chunks of ${sourceUri}`;
}

/**
 * Format index statistics for display.
 */
export function formatStats(stats: RagSystemStats): string {
  const lines: string[] = [];

  lines.push(chalk.bold('Index Statistics'));
  lines.push(`Embedder: ${stats.embedder} (${stats.dimensions} dimensions)`);
  lines.push(`Backend: ${stats.backend} (${stats.metric})`);
  lines.push(`Sources: ${stats.sources}`);
  lines.push(`Chunks: ${stats.entries}`);
  lines.push(`Location: ${stats.indexPath}`);

  return lines.join('\n');
}

export async function runStats(system: RagSystem): Promise<string> {
  return formatStats(await system.stats());
}

/**
 * Write a starter config file in `cwd`.
 */
export function runInit(cwd: string): string {
  const created = initConfig(cwd, DEFAULT_RAG_CONFIG);
  return created ? `Created ${created}` : 'A config file already exists';
}
