import { describe, expect, it } from 'vitest';
import { createSearchHandlers } from '@/routes/search';
import { createDocumentHandlers } from '@/routes/documents';
import { healthCheck } from '@/routes/health';
import { httpErrorFor } from '@/utils/errorResponse';
import {
  IndexCorruptionError,
  TotalRetrievalFailureError,
} from '@/services/errors';
import { buildEngine, fixtureCompletion, indexedEngine } from './helpers/fixtures';
import { FailingEmbedder } from './helpers/stubs';

const signal = () => new AbortController().signal;

describe('search handlers', () => {
  it('rejects a blank query', async () => {
    const { search } = createSearchHandlers(await indexedEngine());

    const result = await search({ body: { query: '   ' }, params: {} }, signal());

    expect(result).toEqual({
      status: 400,
      body: {
        success: false,
        message: 'Invalid request',
        errors: [{ path: 'query', message: 'Query is required and cannot be empty' }],
        code: 'VALIDATION_ERROR',
      },
    });
  });

  it('returns hits with plain JSON fields', async () => {
    const { search } = createSearchHandlers(await indexedEngine());

    const result = await search(
      { body: { query: 'wine tasting', mode: 'lexical', limit: '5' }, params: {} },
      signal(),
    );

    expect(result.status).toBe(200);
    expect(result.body).toMatchObject({
      success: true,
      data: {
        hits: [
          {
            docId: 'tuscany',
            title: 'Tuscany Vineyards',
            sources: ['lexical'],
            ranks: { lexical: 1 },
            fields: {
              city: null,
              country: 'Italy',
              activities: ['cooking_classes', 'wine_tasting'],
              priceTier: 'luxury',
              completeness: 'full',
            },
          },
        ],
        metadata: {
          mode: 'lexical',
          filter: { city: null, country: null, activities: [] },
          partial: false,
          failures: [],
        },
      },
    });
  });

  it('propagates corruption to the error middleware', async () => {
    const engine = await indexedEngine();
    engine.health.markCorrupted('test');
    const { search } = createSearchHandlers(engine);

    await expect(search({ body: { query: 'reefs' }, params: {} }, signal())).rejects.toBeInstanceOf(
      IndexCorruptionError,
    );
  });

  it('exposes the rewritten filter', async () => {
    const engine = await buildEngine({
      completion: fixtureCompletion(
        () => '{"city": "Kyoto", "country": "Japan", "activities": ["tea ceremony", "temples"]}',
      ),
    });
    const { rewrite } = createSearchHandlers(engine);

    const result = await rewrite({ body: { query: 'tea and temples in kyoto' }, params: {} }, signal());

    expect(result).toEqual({
      status: 200,
      body: {
        success: true,
        data: {
          filter: { city: 'Kyoto', country: 'Japan', activities: ['tea_ceremonies', 'temple_visits'] },
          degraded: false,
        },
      },
    });
  });
});

describe('document handlers', () => {
  it('indexes a document under the path id', async () => {
    const engine = await buildEngine();
    const { upsert, status } = createDocumentHandlers(engine);

    const result = await upsert(
      { body: { title: 'Lisbon Surf', bodyText: 'Surf lessons on the Atlantic coast.' }, params: { docId: 'lisbon' } },
      signal(),
    );

    expect(result.status).toBe(200);
    expect(result.body).toMatchObject({ success: true, data: { docId: 'lisbon', state: 'indexed' } });
    expect(await status({ body: undefined, params: { docId: 'lisbon' } })).toEqual({
      status: 200,
      body: { success: true, data: { docId: 'lisbon', state: 'indexed' } },
    });
  });

  it('answers 400 for a malformed body', async () => {
    const { upsert } = createDocumentHandlers(await buildEngine());

    const result = await upsert({ body: { bodyText: 'no title' }, params: { docId: 'x' } }, signal());

    expect(result.status).toBe(400);
    expect(result.body).toMatchObject({ errors: [{ path: 'title', message: 'Required' }] });
  });

  it('answers 400 when the document is skipped', async () => {
    const { upsert } = createDocumentHandlers(await buildEngine());

    const result = await upsert(
      { body: { title: 'Somewhere', bodyText: 'Somewhere nice.' }, params: { docId: '   ' } },
      signal(),
    );

    expect(result).toEqual({
      status: 400,
      body: {
        success: false,
        message: 'Invalid request',
        errors: [{ path: 'docId', message: 'docId cannot be empty' }],
        code: 'VALIDATION_ERROR',
      },
    });
  });

  it('answers 500 when an index write fails', async () => {
    const engine = await buildEngine({
      embedder: new FailingEmbedder(64),
      indexing: { writeMaxRetries: 0 },
    });
    const { upsert } = createDocumentHandlers(engine);

    const result = await upsert(
      { body: { title: 'Lisbon Surf', bodyText: 'Surf lessons.' }, params: { docId: 'lisbon' } },
      signal(),
    );

    expect(result).toEqual({
      status: 500,
      body: {
        success: false,
        message: 'vector write failed for lisbon: embedding backend down',
        code: 'INDEX_WRITE_FAILURE',
      },
    });
  });

  it('reports per-document outcomes for a batch', async () => {
    const { batch } = createDocumentHandlers(await buildEngine());

    const result = await batch(
      {
        body: {
          documents: [
            { docId: 'lisbon', title: 'Lisbon Surf', bodyText: 'Surf lessons.' },
            { docId: 'broken' },
          ],
        },
        params: {},
      },
      signal(),
    );

    expect(result.status).toBe(200);
    expect(result.body).toMatchObject({
      success: true,
      data: {
        outcomes: [
          { docId: 'lisbon', state: 'indexed' },
          { docId: 'broken', state: 'skipped' },
        ],
        counts: { indexed: 1, failed: 0, skipped: 1 },
      },
    });
  });

  it('rejects an empty batch', async () => {
    const { batch } = createDocumentHandlers(await buildEngine());

    const result = await batch({ body: { documents: [] }, params: {} }, signal());

    expect(result.body).toMatchObject({
      errors: [{ path: 'documents', message: 'documents cannot be empty' }],
    });
  });

  it('deletes once, then answers 404', async () => {
    const engine = await indexedEngine();
    const { remove, status } = createDocumentHandlers(engine);

    expect(await remove({ body: undefined, params: { docId: 'kyoto' } })).toEqual({ status: 204 });
    expect((await remove({ body: undefined, params: { docId: 'kyoto' } })).status).toBe(404);
    expect((await status({ body: undefined, params: { docId: 'kyoto' } })).status).toBe(404);
  });
});

describe('httpErrorFor', () => {
  it('maps a total retrieval failure to 503 with the per-path reasons', () => {
    const err = new TotalRetrievalFailureError([{ source: 'vector', reason: 'embedding backend down' }]);

    expect(httpErrorFor(err)).toEqual({
      status: 503,
      body: {
        success: false,
        message: 'Search is temporarily unavailable',
        errors: [{ path: 'vector', message: 'embedding backend down' }],
        code: 'TOTAL_RETRIEVAL_FAILURE',
      },
    });
  });

  it('maps corruption to 503', () => {
    expect(httpErrorFor(new IndexCorruptionError('rebuild required'))).toEqual({
      status: 503,
      body: { success: false, message: 'rebuild required', code: 'INDEX_CORRUPTION' },
    });
  });

  it('maps anything else to 500', () => {
    expect(httpErrorFor(new Error('boom'))).toEqual({
      status: 500,
      body: { success: false, message: 'boom', code: 'INTERNAL_ERROR' },
    });
  });
});

describe('healthCheck', () => {
  it('is OK with a healthy index', async () => {
    const result = healthCheck(await indexedEngine());

    expect(result.status).toBe(200);
    expect(result.body).toMatchObject({
      success: true,
      data: {
        status: 'OK',
        documents: 4,
        index: { status: 'healthy', reason: null },
        extractionCircuit: 'CLOSED',
      },
    });
  });

  it('is DEGRADED with 503 once the index is corrupted', async () => {
    const engine = await indexedEngine();
    engine.health.markCorrupted('lexical missing 1');

    const result = healthCheck(engine);

    expect(result.status).toBe(503);
    expect(result.body).toMatchObject({
      data: { status: 'DEGRADED', index: { status: 'corrupted', reason: 'lexical missing 1' } },
    });
  });
});
