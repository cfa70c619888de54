// src/services/indexing-pipeline.ts
// Raw document → extracted fields → embedding → vector + lexical writes, per document.
//
// pending → extracted → indexed
//               └──────→ failed   (writes exhausted their retries; doc removed everywhere)
// pending → skipped              (raw input failed validation)
import type { DocumentState, TravelDocument } from '@/types/core';
import { activityLabel } from '@/config/taxonomy';
import type { EmbeddingService } from '@/models/types';
import type { FieldExtractor, FallbackReason } from './field-extraction';
import type { LexicalSearchIndex } from './providers/lexical-index';
import type { VectorSearchIndex } from './providers/vector-index';
import type { DocumentStore } from './document-store';
import type { IndexHealth } from './index-health';
import { DimensionMismatchError, IndexWriteFailureError, errorMessage } from './errors';
import { logger } from './logger';
import { rawDocumentSchema, toIssues } from '@/validation/request.validation';
import { KeyedLock, runWithConcurrency } from '@/stability/workQueue';
import { retryWithBackoff } from '@/utils/retryWithBackoff';
import { runWithDeadline } from '@/utils/timeout';

export interface IndexingPipelineSettings {
  concurrency: number;
  writeMaxRetries: number;
  writeRetryDelayMs: number;
  embeddingTimeoutMs: number;
}

export const DEFAULT_PIPELINE_SETTINGS: IndexingPipelineSettings = {
  concurrency: 5,
  writeMaxRetries: 2,
  writeRetryDelayMs: 100,
  embeddingTimeoutMs: 8000,
};

export interface IndexingPipelineDeps {
  store: DocumentStore;
  lexical: LexicalSearchIndex;
  vector: VectorSearchIndex;
  extractor: FieldExtractor;
  embedder: EmbeddingService;
  health: IndexHealth;
  settings?: Partial<IndexingPipelineSettings>;
}

export type IndexingOutcome =
  | {
      docId: string;
      state: 'indexed';
      extraction: 'extracted' | 'fallback';
      fallbackReason?: FallbackReason;
    }
  | { docId: string; state: 'failed'; error: string }
  | { docId: string | null; state: 'skipped'; errors: Array<{ path: string; message: string }> };

export interface ConsistencyReport {
  consistent: boolean;
  documents: number;
  missingFromLexical: string[];
  missingFromVector: string[];
  /** Present in an index but not in the store. */
  orphaned: string[];
}

/** Text the document embedding is computed from. */
export function embeddingText(doc: Pick<TravelDocument, 'title' | 'bodyText' | 'fields'>): string {
  return [doc.title, doc.bodyText, ...[...doc.fields.activities].map(activityLabel)].join('\n');
}

function rawDocId(raw: unknown): string | null {
  if (typeof raw === 'object' && raw !== null && 'docId' in raw && typeof raw.docId === 'string') {
    return raw.docId.trim() || null;
  }
  return null;
}

export class IndexingPipeline {
  private readonly states = new Map<string, DocumentState>();
  private readonly lock = new KeyedLock();
  private readonly settings: IndexingPipelineSettings;

  constructor(private readonly deps: IndexingPipelineDeps) {
    this.settings = { ...DEFAULT_PIPELINE_SETTINGS, ...deps.settings };
    if (deps.embedder.dimension !== deps.vector.dimension) {
      throw new DimensionMismatchError(deps.vector.dimension, deps.embedder.dimension);
    }
  }

  status(docId: string): DocumentState | undefined {
    return this.states.get(docId);
  }

  /**
   * Idempotent insert-or-replace. Resolves with the outcome for every input,
   * including malformed ones; rejects only when `signal` aborts.
   */
  async upsert(raw: unknown, { signal }: { signal?: AbortSignal } = {}): Promise<IndexingOutcome> {
    const parsed = rawDocumentSchema.safeParse(raw);
    if (!parsed.success) {
      const docId = rawDocId(raw);
      const errors = toIssues(parsed.error);
      if (docId !== null && !this.deps.store.has(docId)) this.states.set(docId, 'skipped');
      logger.warn('indexing:skipped', { docId, errors });
      return { docId, state: 'skipped', errors };
    }

    const { docId, title, bodyText } = parsed.data;
    return this.lock.run(docId, () => this.index(docId, title, bodyText, signal));
  }

  /** Bounded worker pool; one document failing never aborts the batch. */
  async ingestBatch(
    raws: readonly unknown[],
    { signal }: { signal?: AbortSignal } = {},
  ): Promise<IndexingOutcome[]> {
    const startedAt = Date.now();
    const worker = async (raw: unknown): Promise<IndexingOutcome> => {
      try {
        return await this.upsert(raw, { signal });
      } catch (err) {
        if (signal?.aborted) throw err;
        const docId = rawDocId(raw) ?? '';
        logger.error('indexing:unexpected_error', { docId, err: errorMessage(err) });
        return { docId, state: 'failed', error: errorMessage(err) };
      }
    };
    const outcomes = await runWithConcurrency(raws, this.settings.concurrency, worker);

    const counts = { indexed: 0, failed: 0, skipped: 0 };
    for (const o of outcomes) counts[o.state]++;
    logger.info('indexing:batch_complete', {
      total: raws.length,
      ...counts,
      durationMs: Date.now() - startedAt,
    });
    return outcomes;
  }

  /** Removes the document from both indexes and the store in one synchronous step. */
  async delete(docId: string): Promise<boolean> {
    return this.lock.run(docId, async () => this.removeEverywhere(docId));
  }

  /** Loads already-indexed documents (from a snapshot) without re-extracting. */
  async restore(documents: readonly TravelDocument[]): Promise<ConsistencyReport> {
    for (const doc of documents) {
      await this.deps.vector.upsert(doc.docId, doc.embedding, doc.fields);
      await this.deps.lexical.upsert(doc);
      this.deps.store.put(doc);
      this.states.set(doc.docId, 'indexed');
    }
    logger.info('indexing:restored', { documents: documents.length });
    return this.verifyConsistency();
  }

  /** Empties the store and both indexes; a rebuild starts here. */
  clear(): void {
    this.deps.store.clear();
    this.deps.lexical.clear();
    this.deps.vector.clear();
    this.states.clear();
    this.deps.health.reset();
  }

  /** Store and both indexes must hold the same id set; otherwise the index is flagged corrupted. */
  verifyConsistency(): ConsistencyReport {
    const { store, lexical, vector, health } = this.deps;
    const storeIds = new Set(store.ids());
    const missingFromLexical = [...storeIds].filter((id) => !lexical.has(id));
    const missingFromVector = [...storeIds].filter((id) => !vector.has(id));
    const orphaned = [...new Set([...lexical.ids(), ...vector.ids()])].filter(
      (id) => !storeIds.has(id),
    );
    const consistent =
      missingFromLexical.length === 0 && missingFromVector.length === 0 && orphaned.length === 0;

    const report = {
      consistent,
      documents: storeIds.size,
      missingFromLexical,
      missingFromVector,
      orphaned,
    };
    if (!consistent) {
      health.markCorrupted(
        `index id sets differ (lexical missing ${missingFromLexical.length}, vector missing ${missingFromVector.length}, orphaned ${orphaned.length})`,
      );
    }
    return report;
  }

  private async index(
    docId: string,
    title: string,
    bodyText: string,
    signal: AbortSignal | undefined,
  ): Promise<IndexingOutcome> {
    const previousState = this.states.get(docId);
    this.states.set(docId, 'pending');

    try {
      const extraction = await this.deps.extractor.extract(`${title}\n\n${bodyText}`, { signal });
      this.states.set(docId, 'extracted');

      const doc: TravelDocument = { docId, title, bodyText, fields: extraction.fields, embedding: [] };

      try {
        // Vector first: the embedding call is the only step that can be cancelled,
        // so an abort leaves the previous version untouched in both indexes.
        doc.embedding = await this.writeWithRetry('vector', docId, signal, async (attemptSignal) => {
          const embedding = await runWithDeadline(
            (callSignal) => this.deps.embedder.embed(embeddingText(doc), { signal: callSignal }),
            { timeoutMs: this.settings.embeddingTimeoutMs, label: 'embedding', signal: attemptSignal },
          );
          await this.deps.vector.upsert(docId, embedding, doc.fields);
          return embedding;
        });
        await this.writeWithRetry('lexical', docId, signal, () => this.deps.lexical.upsert(doc));
      } catch (err) {
        if (signal?.aborted) throw err;
        this.removeEverywhere(docId);
        this.states.set(docId, 'failed');
        logger.error('indexing:failed', { docId, err: errorMessage(err) });
        return { docId, state: 'failed', error: errorMessage(err) };
      }

      this.deps.store.put(doc);
      this.states.set(docId, 'indexed');
      logger.debug('indexing:indexed', { docId, extraction: extraction.status });
      return extraction.status === 'fallback'
        ? { docId, state: 'indexed', extraction: 'fallback', fallbackReason: extraction.reason }
        : { docId, state: 'indexed', extraction: 'extracted' };
    } catch (err) {
      if (previousState === undefined) this.states.delete(docId);
      else this.states.set(docId, previousState);
      throw err;
    }
  }

  private async writeWithRetry<T>(
    index: 'lexical' | 'vector',
    docId: string,
    signal: AbortSignal | undefined,
    write: (signal: AbortSignal | undefined) => Promise<T>,
  ): Promise<T> {
    try {
      return await retryWithBackoff(() => write(signal), {
        maxRetries: this.settings.writeMaxRetries,
        initialDelay: this.settings.writeRetryDelayMs,
        shouldRetry: (err) => !(err instanceof DimensionMismatchError),
        signal,
        label: `${index}-write`,
      });
    } catch (err) {
      if (signal?.aborted) throw err;
      throw new IndexWriteFailureError(index, docId, errorMessage(err), err);
    }
  }

  private removeEverywhere(docId: string): boolean {
    const lexical = this.deps.lexical.remove(docId);
    const vector = this.deps.vector.remove(docId);
    const stored = this.deps.store.delete(docId);
    this.states.delete(docId);
    return lexical || vector || stored;
  }
}
