// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * Document normalization.
 *
 * Turns extractor output into immutable Documents with a resolved id and
 * source URI.
 */

import { createHash } from 'crypto';
import { DocumentError } from './errors.js';
import type { Document, DocumentInput, Metadata } from './types.js';

/**
 * Build an immutable Document from extractor output.
 *
 * - `sourceUri` defaults to the id.
 * - A missing id is derived from the source URI and the text, so a changed
 *   text under the same URI gets a new id (and new chunk ids).
 */
export function createDocument(input: DocumentInput): Document {
  if (typeof input.rawText !== 'string') {
    throw new DocumentError('Document rawText must be a string');
  }

  const id = nonEmpty(input.id);
  const sourceUri = nonEmpty(input.sourceUri);
  if (!id && !sourceUri) {
    throw new DocumentError('Document needs an id or a sourceUri');
  }

  const resolvedSource = sourceUri ?? id ?? '';
  const resolvedId = id ?? deriveDocumentId(resolvedSource, input.rawText);

  return Object.freeze({
    id: resolvedId,
    sourceUri: resolvedSource,
    rawText: input.rawText,
    metadata: Object.freeze(validateMetadata(input.metadata ?? {}, resolvedId)),
  });
}

/**
 * Deterministic document id for a source URI and its text.
 */
export function deriveDocumentId(sourceUri: string, rawText: string): string {
  return createHash('sha256')
    .update(sourceUri)
    .update('\0')
    .update(rawText)
    .digest('hex')
    .slice(0, 16);
}

function validateMetadata(metadata: Metadata, documentId: string): Metadata {
  const copy: Metadata = {};
  for (const [key, value] of Object.entries(metadata)) {
    const type = typeof value;
    if (type !== 'string' && type !== 'number' && type !== 'boolean') {
      throw new DocumentError(
        `Metadata "${key}" of document ${documentId} must be a string, number or boolean`
      );
    }
    copy[key] = value;
  }
  return copy;
}

function nonEmpty(value: string | undefined): string | undefined {
  return value !== undefined && value.trim() !== '' ? value : undefined;
}
