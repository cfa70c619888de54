/**
 * POST /api/search   { query, mode?, limit? } → ranked hits + retrieval metadata
 * POST /api/rewrite  { query }                → structured filter + degraded flag
 */
import express, { Router } from 'express';
import type { Engine } from '@/services/engine';
import type { RetrievalSource, SearchMode } from '@/types/core';
import type { SubSearchFailure } from '@/services/errors';
import { logger } from '@/services/logger';
import {
  rewriteRequestSchema,
  searchRequestSchema,
  validate,
} from '@/validation/request.validation';
import {
  createSuccessResponse,
  validationFailure,
  type HttpResult,
} from '@/utils/errorResponse';
import { serializeFields, serializeFilter, type FieldsJson, type FilterJson } from '@/utils/serialize';
import { toExpress, type HandlerInput } from './handler';

export interface SearchHitJson {
  docId: string;
  title: string;
  fusedScore: number;
  sources: RetrievalSource[];
  ranks: Partial<Record<RetrievalSource, number>>;
  fields: FieldsJson;
}

export interface SearchResponseJson {
  hits: SearchHitJson[];
  metadata: {
    mode: SearchMode;
    filter: FilterJson;
    rewriteDegraded: boolean;
    counts: Record<RetrievalSource, number>;
    partial: boolean;
    failures: SubSearchFailure[];
    durationMs: number;
  };
}

export interface RewriteResponseJson {
  filter: FilterJson;
  degraded: boolean;
}

export function createSearchHandlers(engine: Pick<Engine, 'orchestrator' | 'rewriter'>) {
  return {
    async search({ body }: HandlerInput, signal: AbortSignal): Promise<HttpResult<SearchResponseJson>> {
      const parsed = validate(searchRequestSchema, body);
      if (!parsed.success) return validationFailure(parsed.error);

      const { query, mode, limit } = parsed.data;
      logger.info('search:request', { mode, limit, queryLength: query.length });
      const { hits, metadata } = await engine.orchestrator.search(query, { mode, limit, signal });

      return {
        status: 200,
        body: createSuccessResponse({
          hits: hits.map((h) => ({
            docId: h.docId,
            title: h.title,
            fusedScore: h.fusedScore,
            sources: h.sources,
            ranks: h.ranks,
            fields: serializeFields(h.fields),
          })),
          metadata: { ...metadata, filter: serializeFilter(metadata.filter) },
        }),
      };
    },

    async rewrite({ body }: HandlerInput, signal: AbortSignal): Promise<HttpResult<RewriteResponseJson>> {
      const parsed = validate(rewriteRequestSchema, body);
      if (!parsed.success) return validationFailure(parsed.error);

      const result = await engine.rewriter.rewrite(parsed.data.query, { signal });
      return {
        status: 200,
        body: createSuccessResponse({
          filter: serializeFilter(result.filter),
          degraded: result.degraded,
        }),
      };
    },
  };
}

export default function createSearchRouter(engine: Engine): Router {
  const router = express.Router();
  const handlers = createSearchHandlers(engine);
  router.post('/search', toExpress(handlers.search));
  router.post('/rewrite', toExpress(handlers.rewrite));
  return router;
}
