/** App configuration, read from the environment (loaded by dotenv in index.ts). */
import path from 'path';
import { z } from 'zod';
import { ConfigError } from '@/services/errors';
import { LOG_LEVELS, type LogLevel } from '@/services/logger';

const optionalPath = z
  .string()
  .trim()
  .optional()
  .transform((v) => (v ? path.resolve(process.cwd(), v) : undefined));

const envSchema = z
  .object({
    PORT: z.coerce.number().int().positive().default(4000),
    NODE_ENV: z.string().default('development'),
    LOG_LEVEL: z.preprocess(
      (v) => (typeof v === 'string' ? v.trim().toLowerCase() : v),
      z.enum(LOG_LEVELS).default('info'),
    ),
    OPENAI_API_KEY: z.string().trim().optional(),
    COMPLETION_MODEL: z.string().default('gpt-4o-mini'),
    EMBEDDING_PROVIDER: z.enum(['openai', 'hash']).default('openai'),
    EMBEDDING_MODEL: z.string().default('text-embedding-3-small'),
    EMBEDDING_DIMENSION: z.coerce.number().int().positive().default(1536),
    TAXONOMY_PATH: z.string().default('node/data/taxonomy.json'),
    CATALOG_PATH: optionalPath,
    SNAPSHOT_PATH: optionalPath,
    RRF_K: z.coerce.number().nonnegative().default(60),
    FUZZY_THRESHOLD: z.coerce.number().gt(0).max(1).default(0.8),
    BM25_K1: z.coerce.number().nonnegative().default(1.2),
    BM25_B: z.coerce.number().min(0).max(1).default(0.75),
    INDEX_CONCURRENCY: z.coerce.number().int().positive().default(5),
    SUBSEARCH_TIMEOUT_MS: z.coerce.number().int().positive().default(500),
    REWRITE_TIMEOUT_MS: z.coerce.number().int().positive().default(4000),
    EXTRACTION_TIMEOUT_MS: z.coerce.number().int().positive().default(8000),
    EMBEDDING_TIMEOUT_MS: z.coerce.number().int().positive().default(8000),
    PROVIDER_MAX_RETRIES: z.coerce.number().int().nonnegative().default(2),
    WRITE_MAX_RETRIES: z.coerce.number().int().nonnegative().default(2),
    BREAKER_FAILURE_THRESHOLD: z.coerce.number().int().positive().default(5),
    BREAKER_COOLDOWN_MS: z.coerce.number().int().nonnegative().default(30_000),
    CANDIDATE_MULTIPLIER: z.coerce.number().int().positive().default(2),
  })
  .superRefine((env, ctx) => {
    if (env.EMBEDDING_PROVIDER === 'openai' && !env.OPENAI_API_KEY) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['OPENAI_API_KEY'],
        message: 'required when EMBEDDING_PROVIDER=openai',
      });
    }
  });

export interface RetrievalSettings {
  rrfK: number;
  fuzzyThreshold: number;
  bm25: { k1: number; b: number };
  subSearchTimeoutMs: number;
  rewriteTimeoutMs: number;
  candidateMultiplier: number;
}

export interface IndexingSettings {
  concurrency: number;
  extractionTimeoutMs: number;
  embeddingTimeoutMs: number;
  providerMaxRetries: number;
  writeMaxRetries: number;
  breakerFailureThreshold: number;
  breakerCooldownMs: number;
}

export interface AppConfig {
  port: number;
  nodeEnv: string;
  logLevel: LogLevel;
  openaiApiKey?: string;
  completionModel: string;
  embedding: { provider: 'openai' | 'hash'; model: string; dimension: number };
  taxonomyPath: string;
  catalogPath?: string;
  snapshotPath?: string;
  retrieval: RetrievalSettings;
  indexing: IndexingSettings;
}

export const DEFAULT_RETRIEVAL_SETTINGS: RetrievalSettings = {
  rrfK: 60,
  fuzzyThreshold: 0.8,
  bm25: { k1: 1.2, b: 0.75 },
  subSearchTimeoutMs: 500,
  rewriteTimeoutMs: 4000,
  candidateMultiplier: 2,
};

export const DEFAULT_INDEXING_SETTINGS: IndexingSettings = {
  concurrency: 5,
  extractionTimeoutMs: 8000,
  embeddingTimeoutMs: 8000,
  providerMaxRetries: 2,
  writeMaxRetries: 2,
  breakerFailureThreshold: 5,
  breakerCooldownMs: 30_000,
};

export function loadAppConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.errors.map((e) => `${e.path.join('.') || 'env'}: ${e.message}`),
    );
  }
  const e = parsed.data;
  return {
    port: e.PORT,
    nodeEnv: e.NODE_ENV,
    logLevel: e.LOG_LEVEL,
    openaiApiKey: e.OPENAI_API_KEY || undefined,
    completionModel: e.COMPLETION_MODEL,
    embedding: {
      provider: e.EMBEDDING_PROVIDER,
      model: e.EMBEDDING_MODEL,
      dimension: e.EMBEDDING_DIMENSION,
    },
    taxonomyPath: path.resolve(process.cwd(), e.TAXONOMY_PATH),
    catalogPath: e.CATALOG_PATH,
    snapshotPath: e.SNAPSHOT_PATH,
    retrieval: {
      rrfK: e.RRF_K,
      fuzzyThreshold: e.FUZZY_THRESHOLD,
      bm25: { k1: e.BM25_K1, b: e.BM25_B },
      subSearchTimeoutMs: e.SUBSEARCH_TIMEOUT_MS,
      rewriteTimeoutMs: e.REWRITE_TIMEOUT_MS,
      candidateMultiplier: e.CANDIDATE_MULTIPLIER,
    },
    indexing: {
      concurrency: e.INDEX_CONCURRENCY,
      extractionTimeoutMs: e.EXTRACTION_TIMEOUT_MS,
      embeddingTimeoutMs: e.EMBEDDING_TIMEOUT_MS,
      providerMaxRetries: e.PROVIDER_MAX_RETRIES,
      writeMaxRetries: e.WRITE_MAX_RETRIES,
      breakerFailureThreshold: e.BREAKER_FAILURE_THRESHOLD,
      breakerCooldownMs: e.BREAKER_COOLDOWN_MS,
    },
  };
}
