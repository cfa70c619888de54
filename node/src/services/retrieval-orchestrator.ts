/**
 * Query-time flow: rewrite the query into a structured filter, run the lexical
 * and vector sub-searches concurrently (each under its own deadline), fuse
 * the surviving lists with RRF and hydrate the hits from the document store.
 *
 * The query embedding is requested while the rewrite is still in flight; the
 * sub-search deadline starts once the filter is available.
 */
import type {
  FusedResult,
  RankedEntry,
  RetrievalSource,
  SearchMode,
  StructuredFields,
  StructuredFilter,
} from '@/types/core';
import type { EmbeddingService } from '@/models/types';
import type { QueryRewriter } from './query-rewrite';
import type { LexicalSearchIndex } from './providers/lexical-index';
import type { VectorSearchIndex } from './providers/vector-index';
import type { DocumentStore } from './document-store';
import type { IndexHealth } from './index-health';
import { fuse, DEFAULT_RRF_K } from './rank-fusion';
import { TotalRetrievalFailureError, errorMessage, type SubSearchFailure } from './errors';
import { logger } from './logger';
import { runWithDeadline } from '@/utils/timeout';

export interface OrchestratorSettings {
  rrfK: number;
  subSearchTimeoutMs: number;
  /** Each sub-search fetches `limit * candidateMultiplier` entries before fusion. */
  candidateMultiplier: number;
}

export const DEFAULT_ORCHESTRATOR_SETTINGS: OrchestratorSettings = {
  rrfK: DEFAULT_RRF_K,
  subSearchTimeoutMs: 500,
  candidateMultiplier: 2,
};

export interface RetrievalOrchestratorDeps {
  rewriter: QueryRewriter;
  lexical: LexicalSearchIndex;
  vector: VectorSearchIndex;
  embedder: EmbeddingService;
  store: DocumentStore;
  health: IndexHealth;
  settings?: Partial<OrchestratorSettings>;
}

export interface SearchOptions {
  mode?: SearchMode;
  limit?: number;
  signal?: AbortSignal;
}

export interface SearchHit extends FusedResult {
  title: string;
  fields: StructuredFields;
}

export interface SearchMetadata {
  mode: SearchMode;
  filter: StructuredFilter;
  rewriteDegraded: boolean;
  /** Live entries each sub-search contributed to fusion (0 when it failed or was not requested). */
  counts: Record<RetrievalSource, number>;
  /** True when a requested sub-search failed and the hits come from the other one. */
  partial: boolean;
  failures: SubSearchFailure[];
  durationMs: number;
}

export interface SearchResponse {
  hits: SearchHit[];
  metadata: SearchMetadata;
}

type Settled<T> = { ok: true; value: T } | { ok: false; error: unknown };

function settle<T>(promise: Promise<T>): Promise<Settled<T>> {
  return promise.then(
    (value): Settled<T> => ({ ok: true, value }),
    (error: unknown): Settled<T> => ({ ok: false, error }),
  );
}

export class RetrievalOrchestrator {
  private readonly settings: OrchestratorSettings;

  constructor(private readonly deps: RetrievalOrchestratorDeps) {
    this.settings = { ...DEFAULT_ORCHESTRATOR_SETTINGS, ...deps.settings };
  }

  async search(queryText: string, options: SearchOptions = {}): Promise<SearchResponse> {
    const { mode = 'hybrid', limit = 10, signal } = options;
    this.deps.health.assertServing();
    signal?.throwIfAborted();

    const startedAt = Date.now();
    const wanted: RetrievalSource[] =
      mode === 'hybrid' ? ['lexical', 'vector'] : [mode];

    // Owned by this call; aborted on caller abort or when the vector deadline passes.
    const embedController = new AbortController();
    const onAbort = () => embedController.abort(signal?.reason);
    signal?.addEventListener('abort', onAbort, { once: true });

    try {
      const embedding = wanted.includes('vector')
        ? settle(this.deps.embedder.embed(queryText, { signal: embedController.signal }))
        : null;

      const rewrite = await this.deps.rewriter.rewrite(queryText, { signal });
      const filter = rewrite.filter;
      const candidates = limit * this.settings.candidateMultiplier;

      const runs = wanted.map((source) =>
        runWithDeadline(
          async (deadlineSignal): Promise<RankedEntry[]> => {
            if (source === 'lexical') {
              return this.deps.lexical.search(queryText, filter, candidates);
            }
            deadlineSignal.addEventListener(
              'abort',
              () => embedController.abort(deadlineSignal.reason),
              { once: true },
            );
            const queryEmbedding = embedding ? await embedding : null;
            if (!queryEmbedding) throw new Error('query embedding was not requested');
            if (!queryEmbedding.ok) throw queryEmbedding.error;
            return this.deps.vector.search(queryEmbedding.value, filter, candidates);
          },
          { timeoutMs: this.settings.subSearchTimeoutMs, label: `${source}-search`, signal },
        ),
      );
      const settled = await Promise.allSettled(runs);
      signal?.throwIfAborted();

      const lists: RankedEntry[][] = [];
      const failures: SubSearchFailure[] = [];
      const counts: Record<RetrievalSource, number> = { lexical: 0, vector: 0 };
      settled.forEach((result, i) => {
        const source = wanted[i];
        if (result.status === 'fulfilled') {
          // A doc deleted after the sub-search ran is dropped from every list.
          const live = result.value.filter((entry) => this.deps.store.has(entry.docId));
          counts[source] = live.length;
          lists.push(live);
        } else {
          failures.push({ source, reason: errorMessage(result.reason) });
        }
      });

      if (lists.length === 0) {
        logger.error('retrieval:total_failure', { mode, failures });
        throw new TotalRetrievalFailureError(failures);
      }
      if (failures.length > 0) {
        logger.warn('retrieval:partial', { mode, failures });
      }

      const hits: SearchHit[] = [];
      for (const fused of fuse(lists, { k: this.settings.rrfK, limit })) {
        const doc = this.deps.store.get(fused.docId);
        if (doc) hits.push({ ...fused, title: doc.title, fields: doc.fields });
      }

      const metadata: SearchMetadata = {
        mode,
        filter,
        rewriteDegraded: rewrite.degraded,
        counts,
        partial: failures.length > 0,
        failures,
        durationMs: Date.now() - startedAt,
      };
      logger.debug('retrieval:complete', {
        mode,
        hits: hits.length,
        counts,
        partial: metadata.partial,
        durationMs: metadata.durationMs,
      });
      return { hits, metadata };
    } finally {
      signal?.removeEventListener('abort', onAbort);
      // Releases an embedding request that no sub-search is waiting on any more.
      embedController.abort();
    }
  }
}
