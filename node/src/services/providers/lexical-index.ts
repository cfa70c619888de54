// Lexical index: in-memory inverted index with BM25 scoring and structured-field filtering.
import type { RankedEntry, StructuredFields, StructuredFilter, TravelDocument } from '@/types/core';
import { activityLabel } from '@/config/taxonomy';
import { matchesFilter, rankScored, tokenize } from './retrieval-vector-utils';

export interface Bm25Params {
  k1: number;
  b: number;
}

export const DEFAULT_BM25: Bm25Params = { k1: 1.2, b: 0.75 };

export interface LexicalSearchIndex {
  search(queryText: string, filter: StructuredFilter, limit: number): RankedEntry[];
  upsert(doc: Pick<TravelDocument, 'docId' | 'title' | 'bodyText' | 'fields'>): Promise<void>;
  remove(docId: string): boolean;
  has(docId: string): boolean;
  ids(): string[];
  clear(): void;
  readonly size: number;
}

interface IndexedDoc {
  length: number;
  terms: Map<string, number>;
  fields: StructuredFields;
}

/** Title, body, city, country and activity labels all feed the term index. */
export function lexicalText(
  doc: Pick<TravelDocument, 'title' | 'bodyText' | 'fields'>,
): string {
  return [
    doc.title,
    doc.bodyText,
    doc.fields.city ?? '',
    doc.fields.country ?? '',
    ...[...doc.fields.activities].map(activityLabel),
  ].join(' ');
}

export class InMemoryLexicalIndex implements LexicalSearchIndex {
  private readonly docs = new Map<string, IndexedDoc>();
  /** term → docId → term frequency */
  private readonly postings = new Map<string, Map<string, number>>();
  private totalLength = 0;

  constructor(private readonly params: Bm25Params = DEFAULT_BM25) {}

  get size(): number {
    return this.docs.size;
  }

  has(docId: string): boolean {
    return this.docs.has(docId);
  }

  ids(): string[] {
    return [...this.docs.keys()];
  }

  async upsert(doc: Pick<TravelDocument, 'docId' | 'title' | 'bodyText' | 'fields'>): Promise<void> {
    this.write(doc);
  }

  remove(docId: string): boolean {
    const existing = this.docs.get(docId);
    if (!existing) return false;
    for (const term of existing.terms.keys()) {
      const list = this.postings.get(term);
      list?.delete(docId);
      if (list && list.size === 0) this.postings.delete(term);
    }
    this.totalLength -= existing.length;
    this.docs.delete(docId);
    return true;
  }

  clear(): void {
    this.docs.clear();
    this.postings.clear();
    this.totalLength = 0;
  }

  search(queryText: string, filter: StructuredFilter, limit: number): RankedEntry[] {
    const queryTerms = [...new Set(tokenize(queryText))];
    const n = this.docs.size;
    if (queryTerms.length === 0 || n === 0 || limit <= 0) return [];

    const { k1, b } = this.params;
    const avgLength = this.totalLength / n;
    const scores = new Map<string, number>();

    for (const term of queryTerms) {
      const list = this.postings.get(term);
      if (!list) continue;
      const idf = Math.log(1 + (n - list.size + 0.5) / (list.size + 0.5));
      for (const [docId, tf] of list) {
        const doc = this.docs.get(docId);
        if (!doc || !matchesFilter(doc.fields, filter)) continue;
        const norm = k1 * (1 - b + (b * doc.length) / Math.max(avgLength, 1));
        const termScore = idf * ((tf * (k1 + 1)) / (tf + norm));
        scores.set(docId, (scores.get(docId) ?? 0) + termScore);
      }
    }

    return rankScored(
      [...scores].map(([docId, score]) => ({ docId, score })),
      'lexical',
      limit,
    );
  }

  private write(doc: Pick<TravelDocument, 'docId' | 'title' | 'bodyText' | 'fields'>): void {
    this.remove(doc.docId);
    const tokens = tokenize(lexicalText(doc));
    const terms = new Map<string, number>();
    for (const t of tokens) {
      terms.set(t, (terms.get(t) ?? 0) + 1);
    }
    for (const [term, tf] of terms) {
      let list = this.postings.get(term);
      if (!list) {
        list = new Map();
        this.postings.set(term, list);
      }
      list.set(doc.docId, tf);
    }
    this.docs.set(doc.docId, { length: tokens.length, terms, fields: doc.fields });
    this.totalLength += tokens.length;
  }
}
