// src/services/field-extraction.ts
// Indexing-time structured fields (city, country, activities, price tier) from a document's text.
// Falls back to a taxonomy keyword scan when the completion provider is down or answers off-schema.
import { z } from 'zod';
import type { PriceTier, StructuredFields } from '@/types/core';
import { PRICE_TIERS } from '@/types/core';
import type { CompletionService } from '@/models/types';
import type { ActivityMatcher } from './activity-matcher';
import { nullableText, phraseList } from './query-rewrite';
import { safeParseJson } from './safe-parse-json';
import { ProviderUnavailableError, TimeoutError, errorMessage } from './errors';
import { logger } from './logger';
import { CircuitBreaker, CircuitOpenError } from '@/stability/circuitBreaker';
import { retryWithBackoff } from '@/utils/retryWithBackoff';
import { runWithDeadline } from '@/utils/timeout';

export type FallbackReason = 'provider_unavailable' | 'schema_violation' | 'circuit_open';

export type ExtractionResult =
  | { status: 'extracted'; fields: StructuredFields }
  | { status: 'fallback'; fields: StructuredFields; reason: FallbackReason };

export interface FieldExtractorOptions {
  timeoutMs?: number;
  maxRetries?: number;
  initialDelayMs?: number;
}

const priceTierSchema = z.preprocess(
  (v) => (typeof v === 'string' ? v.trim().toLowerCase() : v),
  z.unknown().transform((v): PriceTier | null => {
    const tier = PRICE_TIERS.find((t) => t === v);
    return tier ?? null;
  }),
);

const extractionResponseSchema = z.object({
  city: nullableText,
  country: nullableText,
  activities: phraseList,
  price_tier: priceTierSchema,
});

const EXTRACT_TEMPLATE = `Extract structured fields from this travel document.

Fields:
- city: the main city or destination the document is about, or null
- country: the country it is in, or null
- activities: activities or experiences the document describes (short phrases)
- price_tier: one of "budget", "moderate", "luxury", or null when the text gives no price signal

Return ONLY a JSON object, no markdown:
{"city": string or null, "country": string or null, "activities": [string, ...], "price_tier": string or null}`;

export function buildExtractionPrompt(text: string): string {
  return `${EXTRACT_TEMPLATE}\n\nDocument:\n"""\n${text}\n"""`;
}

/** Rate limits, 5xx and deadlines are worth another attempt; anything else is not. */
export function isRetryableProviderError(err: unknown): boolean {
  if (err instanceof ProviderUnavailableError) return err.retryable;
  return err instanceof TimeoutError;
}

export class FieldExtractor {
  private readonly options: Required<FieldExtractorOptions>;

  constructor(
    private readonly completion: CompletionService,
    private readonly matcher: ActivityMatcher,
    private readonly breaker: CircuitBreaker,
    options: FieldExtractorOptions = {},
  ) {
    this.options = { timeoutMs: 8000, maxRetries: 2, initialDelayMs: 250, ...options };
  }

  /** Never throws, except when the caller aborts. */
  async extract(text: string, { signal }: { signal?: AbortSignal } = {}): Promise<ExtractionResult> {
    const prompt = buildExtractionPrompt(text);

    let raw: string;
    try {
      raw = await this.breaker.execute(() =>
        retryWithBackoff(
          () =>
            runWithDeadline(
              (callSignal) => this.completion.complete(prompt, { signal: callSignal }),
              { timeoutMs: this.options.timeoutMs, label: 'field-extraction', signal },
            ),
          {
            maxRetries: this.options.maxRetries,
            initialDelay: this.options.initialDelayMs,
            shouldRetry: isRetryableProviderError,
            signal,
            label: 'field-extraction',
          },
        ),
      );
    } catch (err) {
      if (signal?.aborted) throw signal.reason ?? err;
      const reason: FallbackReason =
        err instanceof CircuitOpenError ? 'circuit_open' : 'provider_unavailable';
      logger.warn('field-extraction:fallback', { reason, err: errorMessage(err) });
      return this.fallback(text, reason);
    }

    const json = safeParseJson(raw, 'field-extraction');
    const parsed = json.ok ? extractionResponseSchema.safeParse(json.value) : null;
    if (!parsed?.success) {
      logger.warn('field-extraction:fallback', { reason: 'schema_violation' });
      return this.fallback(text, 'schema_violation');
    }

    const { city, country, activities, price_tier } = parsed.data;
    return {
      status: 'extracted',
      fields: {
        city,
        country,
        activities: this.matcher.matchAll(activities),
        priceTier: price_tier,
        completeness: 'full',
      },
    };
  }

  /** Exact taxonomy keyword scan; no city, country or price tier. */
  heuristic(text: string): StructuredFields {
    return {
      city: null,
      country: null,
      activities: this.matcher.scan(text),
      priceTier: null,
      completeness: 'partial',
    };
  }

  private fallback(text: string, reason: FallbackReason): ExtractionResult {
    return { status: 'fallback', fields: this.heuristic(text), reason };
  }
}
