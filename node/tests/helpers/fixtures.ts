// Small travel corpus and an engine wired to in-process providers.
import { SimpleEmbedder } from '@/models/embeddings';
import type { CompletionService, EmbeddingService } from '@/models/types';
import type { IndexingSettings, RetrievalSettings } from '@/config/app.config';
import { assembleEngine, type Engine } from '@/services/engine';
import type { RawDocument } from '@/types/core';
import { routedCompletion, testTaxonomy } from './stubs';

export const DOCS: RawDocument[] = [
  {
    docId: 'bali',
    title: 'Bali Reefs',
    bodyText: 'Snorkeling over coral reefs and shore diving in Amed.',
  },
  {
    docId: 'kyoto',
    title: 'Kyoto Temples',
    bodyText: 'Temple visits and a tea ceremony in the old capital.',
  },
  {
    docId: 'tuscany',
    title: 'Tuscany Vineyards',
    bodyText: 'Wine tasting among the hills with a cooking class on the farm.',
  },
  {
    docId: 'reykjavik',
    title: 'Reykjavik Nights',
    bodyText: 'Northern lights tours and geothermal hot springs.',
  },
];

/** What the extraction model "answers" for each fixture title. */
export const EXTRACTIONS: Record<string, string> = {
  'Bali Reefs':
    '{"city": "Amed", "country": "Indonesia", "activities": ["snorkeling", "diving"], "price_tier": "budget"}',
  'Kyoto Temples':
    '{"city": "Kyoto", "country": "Japan", "activities": ["temples", "tea ceremony"], "price_tier": "moderate"}',
  'Tuscany Vineyards':
    '{"city": null, "country": "Italy", "activities": ["wine tasting", "cooking class"], "price_tier": "luxury"}',
  'Reykjavik Nights':
    '{"city": "Reykjavik", "country": "Iceland", "activities": ["northern lights", "hot springs"], "price_tier": null}',
};

export function fixtureCompletion(rewrite: (query: string) => string = () => '{}') {
  return routedCompletion({
    rewrite,
    extract: (document) => EXTRACTIONS[document.split('\n')[0]] ?? '{}',
  });
}

export async function buildEngine(
  options: {
    completion?: CompletionService;
    embedder?: EmbeddingService;
    retrieval?: Partial<RetrievalSettings>;
    indexing?: Partial<IndexingSettings>;
  } = {},
): Promise<Engine> {
  return assembleEngine({
    taxonomy: await testTaxonomy(),
    completion: options.completion ?? fixtureCompletion(),
    embedder: options.embedder ?? new SimpleEmbedder(64),
    retrieval: { rewriteTimeoutMs: 500, ...options.retrieval },
    indexing: { extractionTimeoutMs: 500, embeddingTimeoutMs: 500, ...options.indexing },
  });
}

export async function indexedEngine(options: Parameters<typeof buildEngine>[0] = {}): Promise<Engine> {
  const engine = await buildEngine(options);
  await engine.pipeline.ingestBatch(DOCS);
  return engine;
}
