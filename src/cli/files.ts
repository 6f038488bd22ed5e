// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * File discovery and reading for the ingest command.
 */

import * as fs from 'fs';
import * as path from 'path';
import { glob } from 'glob';
import type { DocumentInput } from '../rag/types.js';

/** Files larger than this are skipped */
export const MAX_FILE_SIZE = 1_000_000;

/**
 * Find files matching the include patterns, minus the exclude patterns.
 * Returns absolute paths, sorted, without duplicates.
 */
export async function discoverFiles(
  cwd: string,
  includePatterns: string[],
  excludePatterns: string[]
): Promise<string[]> {
  const files = new Set<string>();

  for (const pattern of includePatterns) {
    const matches = await glob(pattern, {
      cwd,
      ignore: excludePatterns,
      absolute: true,
      nodir: true,
      dot: false,
    });
    for (const file of matches) {
      files.add(file);
    }
  }

  return Array.from(files).sort();
}

/**
 * Check if content appears to be binary.
 */
export function isBinaryContent(content: string): boolean {
  if (content.length === 0) return false;

  // Null bytes or a high ratio of non-printable characters
  let nonPrintable = 0;
  const sampleSize = Math.min(1000, content.length);

  for (let i = 0; i < sampleSize; i++) {
    const code = content.charCodeAt(i);
    if (code === 0 || (code < 32 && code !== 9 && code !== 10 && code !== 13)) {
      nonPrintable++;
    }
  }

  return nonPrintable / sampleSize > 0.1;
}

/**
 * Title for a text file: its first Markdown heading, else the file name.
 */
export function extractTitle(content: string, filePath: string): string {
  const heading = /^#{1,6}\s+(.+?)\s*#*\s*$/m.exec(content);
  return heading ? heading[1] : path.basename(filePath);
}

/**
 * Read files as documents keyed by their path relative to `cwd`.
 * Binary-looking and oversized files are skipped.
 */
export async function readDocuments(
  cwd: string,
  files: string[]
): Promise<{ documents: DocumentInput[]; skipped: string[] }> {
  const documents: DocumentInput[] = [];
  const skipped: string[] = [];

  for (const file of files) {
    const sourceUri = path.relative(cwd, file).split(path.sep).join('/');
    const stat = await fs.promises.stat(file);
    if (stat.size > MAX_FILE_SIZE) {
      skipped.push(sourceUri);
      continue;
    }

    const rawText = await fs.promises.readFile(file, 'utf-8');
    if (isBinaryContent(rawText)) {
      skipped.push(sourceUri);
      continue;
    }

    documents.push({
      sourceUri,
      rawText,
      metadata: {
        title: extractTitle(rawText, file),
        path: sourceUri,
        modifiedAt: stat.mtime.toISOString(),
      },
    });
  }

  return { documents, skipped };
}
