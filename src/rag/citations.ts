/**
 * Answer Citations
 *
 * Maps the `[n]` markers an answer uses back to the citations of the
 * prompt it was generated from, and projects citations into the sources
 * returned with an answer.
 */

import type { AnswerSource, Citation, RetrievalResult } from './types.js';

const MARKER_PATTERN = /\[(\d+(?:\s*,\s*\d+)*)\]/g;

/** Longest snippet attached to a source */
export const SNIPPET_LENGTH = 200;

/**
 * Citations referenced by an answer, in order of first mention.
 * Markers with no matching citation are ignored.
 */
export function parseCitations(answer: string, citations: Citation[]): Citation[] {
  const byIndex = new Map(citations.map((c) => [c.index, c]));
  const seen = new Set<number>();
  const referenced: Citation[] = [];

  for (const match of answer.matchAll(MARKER_PATTERN)) {
    for (const part of match[1].split(',')) {
      const index = Number.parseInt(part.trim(), 10);
      const citation = byIndex.get(index);
      if (citation && !seen.has(index)) {
        seen.add(index);
        referenced.push(citation);
      }
    }
  }

  return referenced;
}

/**
 * Sources for an answer, one per citation, in citation order.
 */
export function toAnswerSources(citations: Citation[], results: RetrievalResult[]): AnswerSource[] {
  const textById = new Map(results.map((r) => [r.chunkId, r.text]));

  return citations.map((citation) => {
    const title = citation.metadata.title;
    const text = textById.get(citation.chunkId) ?? '';
    return {
      id: citation.chunkId,
      title: typeof title === 'string' && title !== '' ? title : citation.sourceUri ?? citation.chunkId,
      snippet: snippet(text),
      score: citation.score,
    };
  });
}

/**
 * Collapse whitespace and cut to SNIPPET_LENGTH characters.
 */
export function snippet(text: string): string {
  const flat = text.replace(/\s+/g, ' ').trim();
  return flat.length > SNIPPET_LENGTH ? flat.slice(0, SNIPPET_LENGTH - 3) + '...' : flat;
}

/**
 * Format sources as a numbered list for display under an answer.
 */
export function formatSourcesSection(sources: AnswerSource[]): string {
  if (sources.length === 0) {
    return '';
  }

  const lines = ['Sources:'];
  sources.forEach((source, i) => {
    lines.push(`[${i + 1}] ${source.title} (${Math.round(source.score * 100)}% match)`);
  });
  return lines.join('\n');
}
