// src/services/errors.ts: typed failures surfaced by the retrieval core
import type { RetrievalSource } from '@/types/core';

export type ProviderKind = 'completion' | 'embedding';

export class ProviderUnavailableError extends Error {
  readonly code = 'PROVIDER_UNAVAILABLE';
  readonly provider: ProviderKind;
  readonly status?: number;
  /** Rate limits, timeouts and 5xx are retryable; auth and bad requests are not. */
  readonly retryable: boolean;

  constructor(
    provider: ProviderKind,
    message: string,
    options: { status?: number; retryable: boolean; cause?: unknown },
  ) {
    super(message, { cause: options.cause });
    this.name = 'ProviderUnavailableError';
    this.provider = provider;
    this.status = options.status;
    this.retryable = options.retryable;
  }
}

export class TimeoutError extends Error {
  readonly code = 'TIMEOUT';

  constructor(label: string, readonly timeoutMs: number) {
    super(`${label} timed out after ${timeoutMs}ms`);
    this.name = 'TimeoutError';
  }
}

export interface SubSearchFailure {
  source: RetrievalSource;
  reason: string;
}

export class TotalRetrievalFailureError extends Error {
  readonly code = 'TOTAL_RETRIEVAL_FAILURE';

  constructor(readonly failures: SubSearchFailure[]) {
    super(
      `All retrieval paths failed: ${failures.map((f) => `${f.source} (${f.reason})`).join(', ')}`,
    );
    this.name = 'TotalRetrievalFailureError';
  }
}

export class IndexWriteFailureError extends Error {
  readonly code = 'INDEX_WRITE_FAILURE';

  constructor(
    readonly index: RetrievalSource,
    readonly docId: string,
    message: string,
    cause?: unknown,
  ) {
    super(`${index} write failed for ${docId}: ${message}`, { cause });
    this.name = 'IndexWriteFailureError';
  }
}

export class DimensionMismatchError extends Error {
  readonly code = 'DIMENSION_MISMATCH';

  constructor(readonly expected: number, readonly actual: number) {
    super(`Expected embedding of dimension ${expected}, got ${actual}`);
    this.name = 'DimensionMismatchError';
  }
}

export class TaxonomyConfigError extends Error {
  readonly code = 'TAXONOMY_CONFIG';

  constructor(readonly problems: string[]) {
    super(`Invalid taxonomy: ${problems.join('; ')}`);
    this.name = 'TaxonomyConfigError';
  }
}

export class ConfigError extends Error {
  readonly code = 'CONFIG';

  constructor(readonly problems: string[]) {
    super(`Invalid configuration: ${problems.join('; ')}`);
    this.name = 'ConfigError';
  }
}

export class IndexCorruptionError extends Error {
  readonly code = 'INDEX_CORRUPTION';

  constructor(message: string) {
    super(message);
    this.name = 'IndexCorruptionError';
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/** True for aborts raised by an AbortSignal, by fetch, or by the OpenAI SDK. */
export function isAbortError(err: unknown): boolean {
  return (
    err instanceof Error &&
    (err.name === 'AbortError' || err.name === 'APIUserAbortError')
  );
}
