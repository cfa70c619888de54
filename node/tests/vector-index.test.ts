import { describe, expect, it } from 'vitest';
import { InMemoryVectorIndex } from '@/services/providers/vector-index';
import { cosineSimilarity } from '@/services/providers/retrieval-vector-utils';
import { DimensionMismatchError } from '@/services/errors';
import { emptyFilter } from '@/types/core';
import { fields } from './helpers/stubs';

describe('InMemoryVectorIndex', () => {
  it('ranks by cosine similarity, ties by ascending docId', async () => {
    const index = new InMemoryVectorIndex(3);
    await index.upsert('far', [0, 1, 0], fields());
    await index.upsert('near', [0.9, 0.1, 0], fields());
    await index.upsert('exact-b', [2, 0, 0], fields());
    await index.upsert('exact-a', [1, 0, 0], fields());

    const hits = index.search([1, 0, 0], emptyFilter(), 10);

    expect(hits.map((h) => h.docId)).toEqual(['exact-a', 'exact-b', 'near', 'far']);
    expect(hits.map((h) => h.rank)).toEqual([1, 2, 3, 4]);
    expect(hits[0].rawScore).toBeCloseTo(1);
    expect(hits[2].rawScore).toBeCloseTo(0.9 / Math.sqrt(0.82));
    expect(hits[3].rawScore).toBe(0);
    expect(hits.every((h) => h.source === 'vector')).toBe(true);
  });

  it('applies the structured filter before ranking', async () => {
    const index = new InMemoryVectorIndex(2);
    await index.upsert('lisbon', [1, 0], fields({ city: 'Lisbon', activities: ['surfing'] }));
    await index.upsert('porto', [1, 0], fields({ city: 'Porto', activities: ['wine_tasting'] }));

    const hits = index.search([1, 0], { city: 'lisbon', country: null, activities: new Set() }, 10);
    expect(hits.map((h) => h.docId)).toEqual(['lisbon']);

    const byActivity = index.search([1, 0], { city: null, country: null, activities: new Set(['wine_tasting']) }, 10);
    expect(byActivity.map((h) => h.docId)).toEqual(['porto']);
  });

  it('truncates to the limit', async () => {
    const index = new InMemoryVectorIndex(2);
    await index.upsert('a', [1, 0], fields());
    await index.upsert('b', [0, 1], fields());
    expect(index.search([1, 0], emptyFilter(), 1).map((h) => h.docId)).toEqual(['a']);
  });

  it('rejects writes and queries of the wrong dimension', async () => {
    const index = new InMemoryVectorIndex(3);
    await expect(index.upsert('a', [1, 0], fields())).rejects.toBeInstanceOf(DimensionMismatchError);
    expect(() => index.search([1, 0, 0, 0], emptyFilter(), 5)).toThrow(DimensionMismatchError);
    expect(index.size).toBe(0);
  });

  it('rejects a non-positive dimension', () => {
    expect(() => new InMemoryVectorIndex(0)).toThrow(RangeError);
  });

  it('removes and clears', async () => {
    const index = new InMemoryVectorIndex(2);
    await index.upsert('a', [1, 0], fields());
    await index.upsert('b', [0, 1], fields());
    expect(index.remove('a')).toBe(true);
    expect(index.ids()).toEqual(['b']);
    index.clear();
    expect(index.size).toBe(0);
  });
});

describe('cosineSimilarity', () => {
  it('is zero for zero vectors and mismatched lengths', () => {
    expect(cosineSimilarity([0, 0], [1, 0])).toBe(0);
    expect(cosineSimilarity([1], [1, 0])).toBe(0);
    expect(cosineSimilarity([1, 1], [2, 2])).toBeCloseTo(1);
  });
});
