#!/usr/bin/env node
// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * groundwork - ingest documents into a local index and query them.
 *
 * Commands:
 *   init                          Write a starter .groundwork.json
 *   ingest [patterns...]          Ingest matching files
 *   query <question>              Retrieve passages and answer
 *   remove <source>               Remove one source from the index
 *   stats                         Show index statistics
 */

import { Command } from 'commander';
import chalk from 'chalk';
import { loadConfig } from '../config/index.js';
import type { WorkspaceConfig } from '../config/types.js';
import { logger, parseLogLevel } from '../logger.js';
import { CancelledError, isRagError, toError } from '../rag/errors.js';
import { openRagSystem } from '../rag/system.js';
import type { RagSystem } from '../rag/system.js';
import { VERSION } from '../version.js';
import { formatIngestResult, runIngest, runInit, runQuery, runRemove, runStats } from './commands.js';

interface GlobalOptions {
  verbose?: boolean;
  debug?: boolean;
  trace?: boolean;
  cwd: string;
  index?: string;
}

const program = new Command();

program
  .name('groundwork')
  .description('Retrieval-augmented answers over your own documents')
  .version(VERSION)
  .option('-C, --cwd <dir>', 'Working directory', process.cwd())
  .option('--index <path>', 'Index directory (overrides config)')
  .option('-v, --verbose', 'Show per-document and per-query details')
  .option('--debug', 'Show embedding batches and index operations')
  .option('--trace', 'Show full prompts');

program.hook('preAction', () => {
  logger.setLevel(parseLogLevel(program.opts<GlobalOptions>()));
});

/**
 * Load config and the saved index for the global options.
 */
async function openSystem(overrides: WorkspaceConfig = {}): Promise<{ system: RagSystem; cwd: string }> {
  const opts = program.opts<GlobalOptions>();
  const config = loadConfig(opts.cwd, opts.index ? { ...overrides, indexPath: opts.index } : overrides);
  return { system: await openRagSystem(config), cwd: opts.cwd };
}

/**
 * Abort controller tied to Ctrl+C for the duration of a command.
 */
function interruptSignal(): AbortSignal {
  const controller = new AbortController();
  process.once('SIGINT', () => controller.abort());
  return controller.signal;
}

program
  .command('init')
  .description('Write a starter .groundwork.json')
  .action(() => {
    console.log(runInit(program.opts<GlobalOptions>().cwd));
  });

program
  .command('ingest [patterns...]')
  .description('Ingest files matching glob patterns (default: configured includePatterns)')
  .option('-c, --concurrency <n>', 'Documents processed at once')
  .action(async (patterns: string[], opts: { concurrency?: string }) => {
    const overrides: WorkspaceConfig = opts.concurrency ? { ingestConcurrency: parseInt(opts.concurrency, 10) } : {};
    const { system, cwd } = await openSystem(overrides);
    const result = await runIngest(system, cwd, patterns, interruptSignal());
    console.log(formatIngestResult(result));
    if (result.report.failed.length > 0) {
      process.exitCode = 1;
    }
  });

program
  .command('query <question>')
  .description('Retrieve passages for a question and answer it')
  .option('-k, --top-k <n>', 'Number of passages to retrieve')
  .option('--json', 'Print {answer, sources, prompt} as JSON')
  .action(async (question: string, opts: { topK?: string; json?: boolean }) => {
    const { system } = await openSystem();
    const topK = opts.topK ? parseInt(opts.topK, 10) : undefined;
    console.log(await runQuery(system, question, { topK, json: opts.json, signal: interruptSignal() }));
  });

program
  .command('remove <source>')
  .description('Remove a source (as shown by ingest) from the index')
  .action(async (source: string) => {
    const { system } = await openSystem();
    console.log(await runRemove(system, source));
  });

program
  .command('stats')
  .description('Show index statistics')
  .action(async () => {
    const { system } = await openSystem();
    console.log(await runStats(system));
  });

program.parseAsync(process.argv).catch((error: unknown) => {
  if (error instanceof CancelledError) {
    console.error(chalk.yellow('Cancelled'));
    process.exitCode = 130;
    return;
  }

  const err = toError(error);
  logger.error(err.message, err);
  if (isRagError(err) && err.suggestions.length > 0) {
    console.error(chalk.dim(err.getFullMessage()));
  }
  process.exitCode = 1;
});
