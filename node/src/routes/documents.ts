/**
 * Document ingestion and lifecycle.
 *
 * PUT    /api/documents/:docId         { title, bodyText } → indexing outcome
 * POST   /api/documents/batch          { documents: [...] } → outcome per document
 * DELETE /api/documents/:docId         → 204 | 404
 * GET    /api/documents/:docId/status  → { docId, state }
 */
import express, { Router } from 'express';
import type { Engine } from '@/services/engine';
import type { DocumentState } from '@/types/core';
import type { IndexingOutcome } from '@/services/indexing-pipeline';
import {
  batchRequestSchema,
  documentBodySchema,
  validate,
} from '@/validation/request.validation';
import {
  createErrorResponse,
  createSuccessResponse,
  validationFailure,
  type HttpResult,
} from '@/utils/errorResponse';
import { toExpress, type HandlerInput } from './handler';

export interface BatchResponseJson {
  outcomes: IndexingOutcome[];
  counts: Record<'indexed' | 'failed' | 'skipped', number>;
}

function docIdParam(params: Record<string, string>): string {
  return (params.docId ?? '').trim();
}

export function createDocumentHandlers(engine: Pick<Engine, 'pipeline'>) {
  const { pipeline } = engine;

  return {
    async upsert({ body, params }: HandlerInput, signal: AbortSignal): Promise<HttpResult<IndexingOutcome>> {
      const parsed = validate(documentBodySchema, body);
      if (!parsed.success) return validationFailure(parsed.error);

      const outcome = await pipeline.upsert({ docId: docIdParam(params), ...parsed.data }, { signal });
      switch (outcome.state) {
        case 'indexed':
          return { status: 200, body: createSuccessResponse(outcome) };
        case 'skipped':
          return validationFailure(outcome.errors);
        case 'failed':
          return {
            status: 500,
            body: createErrorResponse(outcome.error, undefined, 'INDEX_WRITE_FAILURE'),
          };
      }
    },

    async batch({ body }: HandlerInput, signal: AbortSignal): Promise<HttpResult<BatchResponseJson>> {
      const parsed = validate(batchRequestSchema, body);
      if (!parsed.success) return validationFailure(parsed.error);

      const outcomes = await pipeline.ingestBatch(parsed.data.documents, { signal });
      const counts = { indexed: 0, failed: 0, skipped: 0 };
      for (const o of outcomes) counts[o.state]++;
      return { status: 200, body: createSuccessResponse({ outcomes, counts }) };
    },

    async remove({ params }: HandlerInput): Promise<HttpResult> {
      const removed = await pipeline.delete(docIdParam(params));
      return removed
        ? { status: 204 }
        : { status: 404, body: createErrorResponse('Document not found', undefined, 'NOT_FOUND') };
    },

    async status({ params }: HandlerInput): Promise<HttpResult<{ docId: string; state: DocumentState }>> {
      const docId = docIdParam(params);
      const state = pipeline.status(docId);
      if (state === undefined) {
        return { status: 404, body: createErrorResponse('Document not found', undefined, 'NOT_FOUND') };
      }
      return { status: 200, body: createSuccessResponse({ docId, state }) };
    },
  };
}

export default function createDocumentsRouter(engine: Engine): Router {
  const router = express.Router();
  const handlers = createDocumentHandlers(engine);
  // before /:docId so "batch" is not read as an id
  router.post('/batch', toExpress(handlers.batch));
  router.put('/:docId', toExpress(handlers.upsert));
  router.delete('/:docId', toExpress(handlers.remove));
  router.get('/:docId/status', toExpress(handlers.status));
  return router;
}
