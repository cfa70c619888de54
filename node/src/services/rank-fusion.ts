// Reciprocal Rank Fusion over independently ranked lists.
import type { FusedResult, RankedEntry, RetrievalSource } from '@/types/core';

export const DEFAULT_RRF_K = 60;

export interface FuseOptions {
  k?: number;
  limit: number;
}

/**
 * fusedScore = Σ 1 / (k + rank) over the lists that contain the doc.
 * Ordered by score desc, then number of contributing sources desc, then docId asc.
 */
export function fuse(lists: ReadonlyArray<readonly RankedEntry[]>, options: FuseOptions): FusedResult[] {
  const k = options.k ?? DEFAULT_RRF_K;
  if (!(k >= 0)) throw new RangeError(`k must be non-negative, got ${k}`);

  const byDoc = new Map<string, FusedResult>();

  for (const list of lists) {
    // best rank per doc within this list
    const best = new Map<string, RankedEntry>();
    for (const entry of list) {
      const seen = best.get(entry.docId);
      if (!seen || entry.rank < seen.rank) best.set(entry.docId, entry);
    }

    for (const entry of best.values()) {
      let fused = byDoc.get(entry.docId);
      if (!fused) {
        fused = { docId: entry.docId, fusedScore: 0, sources: [], ranks: {} };
        byDoc.set(entry.docId, fused);
      }
      fused.fusedScore += 1 / (k + entry.rank);
      if (!fused.sources.includes(entry.source)) fused.sources.push(entry.source);
      const prior = fused.ranks[entry.source];
      fused.ranks[entry.source] = prior === undefined ? entry.rank : Math.min(prior, entry.rank);
    }
  }

  return [...byDoc.values()]
    .sort(
      (a, b) =>
        b.fusedScore - a.fusedScore ||
        b.sources.length - a.sources.length ||
        (a.docId < b.docId ? -1 : a.docId > b.docId ? 1 : 0),
    )
    .slice(0, Math.max(0, options.limit))
    .map((r) => ({ ...r, sources: sortSources(r.sources) }));
}

const SOURCE_ORDER: readonly RetrievalSource[] = ['lexical', 'vector'];

function sortSources(sources: RetrievalSource[]): RetrievalSource[] {
  return SOURCE_ORDER.filter((s) => sources.includes(s));
}
