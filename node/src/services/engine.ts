// src/services/engine.ts: composition root shared by the HTTP server and the rebuild script
import type { AppConfig, IndexingSettings, RetrievalSettings } from '@/config/app.config';
import { DEFAULT_INDEXING_SETTINGS, DEFAULT_RETRIEVAL_SETTINGS } from '@/config/app.config';
import { loadTaxonomy, type Taxonomy } from '@/config/taxonomy';
import type { CompletionService, EmbeddingService } from '@/models/types';
import { DisabledCompletionService, OpenAICompletionService } from '@/models/llms';
import { OpenAIEmbedding, SimpleEmbedder } from '@/models/embeddings';
import { CircuitBreaker } from '@/stability/circuitBreaker';
import { ActivityMatcher } from './activity-matcher';
import { QueryRewriter } from './query-rewrite';
import { FieldExtractor } from './field-extraction';
import { InMemoryLexicalIndex } from './providers/lexical-index';
import { InMemoryVectorIndex } from './providers/vector-index';
import { DocumentStore } from './document-store';
import { IndexHealth } from './index-health';
import { IndexingPipeline } from './indexing-pipeline';
import { RetrievalOrchestrator } from './retrieval-orchestrator';
import { logger } from './logger';

export interface Engine {
  taxonomy: Taxonomy;
  matcher: ActivityMatcher;
  embedder: EmbeddingService;
  store: DocumentStore;
  lexical: InMemoryLexicalIndex;
  vector: InMemoryVectorIndex;
  health: IndexHealth;
  breaker: CircuitBreaker;
  rewriter: QueryRewriter;
  extractor: FieldExtractor;
  pipeline: IndexingPipeline;
  orchestrator: RetrievalOrchestrator;
}

export interface EngineParts {
  taxonomy: Taxonomy;
  completion: CompletionService;
  embedder: EmbeddingService;
  retrieval?: Partial<RetrievalSettings>;
  indexing?: Partial<IndexingSettings>;
}

/** Wires every component from already-built providers. Tests call this with stubs. */
export function assembleEngine(parts: EngineParts): Engine {
  const retrieval = { ...DEFAULT_RETRIEVAL_SETTINGS, ...parts.retrieval };
  const indexing = { ...DEFAULT_INDEXING_SETTINGS, ...parts.indexing };

  const matcher = new ActivityMatcher(parts.taxonomy, { fuzzyThreshold: retrieval.fuzzyThreshold });
  const store = new DocumentStore();
  const lexical = new InMemoryLexicalIndex(retrieval.bm25);
  const vector = new InMemoryVectorIndex(parts.embedder.dimension);
  const health = new IndexHealth();
  const breaker = new CircuitBreaker({
    name: 'field-extraction',
    failureThreshold: indexing.breakerFailureThreshold,
    successThreshold: 1,
    cooldownMs: indexing.breakerCooldownMs,
  });

  const rewriter = new QueryRewriter(parts.completion, matcher, {
    timeoutMs: retrieval.rewriteTimeoutMs,
  });
  const extractor = new FieldExtractor(parts.completion, matcher, breaker, {
    timeoutMs: indexing.extractionTimeoutMs,
    maxRetries: indexing.providerMaxRetries,
  });
  const pipeline = new IndexingPipeline({
    store,
    lexical,
    vector,
    extractor,
    embedder: parts.embedder,
    health,
    settings: {
      concurrency: indexing.concurrency,
      writeMaxRetries: indexing.writeMaxRetries,
      embeddingTimeoutMs: indexing.embeddingTimeoutMs,
    },
  });
  const orchestrator = new RetrievalOrchestrator({
    rewriter,
    lexical,
    vector,
    embedder: parts.embedder,
    store,
    health,
    settings: {
      rrfK: retrieval.rrfK,
      subSearchTimeoutMs: retrieval.subSearchTimeoutMs,
      candidateMultiplier: retrieval.candidateMultiplier,
    },
  });

  return {
    taxonomy: parts.taxonomy,
    matcher,
    embedder: parts.embedder,
    store,
    lexical,
    vector,
    health,
    breaker,
    rewriter,
    extractor,
    pipeline,
    orchestrator,
  };
}

/** Loads the taxonomy and builds the OpenAI (or hashing) providers from config. */
export async function createEngine(config: AppConfig): Promise<Engine> {
  const taxonomy = await loadTaxonomy(config.taxonomyPath);
  let completion: CompletionService;
  if (config.openaiApiKey) {
    completion = new OpenAICompletionService({
      model: config.completionModel,
      apiKey: config.openaiApiKey,
    });
  } else {
    logger.warn('engine:completion_disabled', {
      effect: 'queries are unfiltered and extraction uses the keyword fallback',
    });
    completion = new DisabledCompletionService();
  }
  const embedder: EmbeddingService =
    config.embedding.provider === 'hash'
      ? new SimpleEmbedder(config.embedding.dimension)
      : new OpenAIEmbedding({
          model: config.embedding.model,
          apiKey: config.openaiApiKey,
          dimension: config.embedding.dimension,
        });

  logger.info('engine:ready', {
    activities: taxonomy.activityIds.size,
    categories: taxonomy.categories.size,
    embeddingProvider: config.embedding.provider,
    dimension: embedder.dimension,
  });

  return assembleEngine({
    taxonomy,
    completion,
    embedder,
    retrieval: config.retrieval,
    indexing: config.indexing,
  });
}
