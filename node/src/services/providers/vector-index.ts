// Vector index: exact cosine top-k over stored document embeddings, structured filter applied first.
import type { RankedEntry, StructuredFields, StructuredFilter } from '@/types/core';
import { DimensionMismatchError } from '@/services/errors';
import { cosineSimilarity, matchesFilter, rankScored, type Embedding } from './retrieval-vector-utils';

export interface VectorSearchIndex {
  readonly dimension: number;
  search(queryEmbedding: Embedding, filter: StructuredFilter, limit: number): RankedEntry[];
  upsert(docId: string, embedding: Embedding, fields: StructuredFields): Promise<void>;
  remove(docId: string): boolean;
  has(docId: string): boolean;
  ids(): string[];
  clear(): void;
  readonly size: number;
}

interface StoredVector {
  embedding: Embedding;
  fields: StructuredFields;
}

export class InMemoryVectorIndex implements VectorSearchIndex {
  private readonly vectors = new Map<string, StoredVector>();

  constructor(readonly dimension: number) {
    if (!Number.isInteger(dimension) || dimension < 1) {
      throw new RangeError(`dimension must be a positive integer, got ${dimension}`);
    }
  }

  get size(): number {
    return this.vectors.size;
  }

  has(docId: string): boolean {
    return this.vectors.has(docId);
  }

  ids(): string[] {
    return [...this.vectors.keys()];
  }

  async upsert(docId: string, embedding: Embedding, fields: StructuredFields): Promise<void> {
    this.assertDimension(embedding);
    this.vectors.set(docId, { embedding: [...embedding], fields });
  }

  remove(docId: string): boolean {
    return this.vectors.delete(docId);
  }

  clear(): void {
    this.vectors.clear();
  }

  search(queryEmbedding: Embedding, filter: StructuredFilter, limit: number): RankedEntry[] {
    this.assertDimension(queryEmbedding);
    if (limit <= 0) return [];

    const scored: Array<{ docId: string; score: number }> = [];
    for (const [docId, stored] of this.vectors) {
      if (!matchesFilter(stored.fields, filter)) continue;
      scored.push({ docId, score: cosineSimilarity(queryEmbedding, stored.embedding) });
    }
    return rankScored(scored, 'vector', limit);
  }

  private assertDimension(embedding: Embedding): void {
    if (embedding.length !== this.dimension) {
      throw new DimensionMismatchError(this.dimension, embedding.length);
    }
  }
}
