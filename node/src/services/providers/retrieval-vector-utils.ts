// node/src/services/providers/retrieval-vector-utils.ts: shared tokenizer, similarity and filter helpers for both indexes
import type { RankedEntry, StructuredFields, StructuredFilter } from '@/types/core';

export type Embedding = number[];

export function cosineSimilarity(a: Embedding, b: Embedding): number {
  if (a.length !== b.length || a.length === 0) return 0;
  let dot = 0;
  let na = 0;
  let nb = 0;
  for (let i = 0; i < a.length; i++) {
    dot += a[i] * b[i];
    na += a[i] * a[i];
    nb += b[i] * b[i];
  }
  if (na === 0 || nb === 0) return 0;
  return dot / (Math.sqrt(na) * Math.sqrt(nb));
}

export function tokenize(text: string): string[] {
  return text
    .toLowerCase()
    .split(/[^\p{L}\p{N}]+/gu)
    .filter(Boolean);
}

function sameValue(a: string, b: string): boolean {
  return a.trim().toLowerCase() === b.trim().toLowerCase();
}

/**
 * City/country must equal the document's (trimmed, case-insensitive) when set;
 * a non-empty activity filter needs at least one shared activity.
 */
export function matchesFilter(fields: StructuredFields, filter: StructuredFilter): boolean {
  if (filter.city !== null && (fields.city === null || !sameValue(fields.city, filter.city))) {
    return false;
  }
  if (
    filter.country !== null &&
    (fields.country === null || !sameValue(fields.country, filter.country))
  ) {
    return false;
  }
  if (filter.activities.size > 0) {
    for (const id of filter.activities) {
      if (fields.activities.has(id)) return true;
    }
    return false;
  }
  return true;
}

/** Score desc, then docId asc; assigns 1-based ranks after truncation. */
export function rankScored(
  scored: Array<{ docId: string; score: number }>,
  source: RankedEntry['source'],
  limit: number,
): RankedEntry[] {
  return scored
    .sort((a, b) => b.score - a.score || (a.docId < b.docId ? -1 : a.docId > b.docId ? 1 : 0))
    .slice(0, Math.max(0, limit))
    .map((s, i) => ({ docId: s.docId, source, rank: i + 1, rawScore: s.score }));
}
