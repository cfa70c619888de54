import { z } from 'zod';
import type { StructuredFilter } from '@/types/core';
import { emptyFilter } from '@/types/core';
import type { CompletionService } from '@/models/types';
import type { ActivityMatcher } from './activity-matcher';
import { safeParseJson } from './safe-parse-json';
import { errorMessage } from './errors';
import { logger } from './logger';
import { retryWithBackoff } from '@/utils/retryWithBackoff';
import { runWithDeadline } from '@/utils/timeout';

/** Model output that could not be read as the expected JSON object. */
export class MalformedResponseError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'MalformedResponseError';
  }
}

/** "", "null" and "none" from the model all mean "not mentioned". */
export const nullableText = z.preprocess(
  (v) =>
    v === undefined ||
    (typeof v === 'string' && ['', 'null', 'none', 'n/a'].includes(v.trim().toLowerCase()))
      ? null
      : v,
  z.string().trim().nullable(),
);

export const phraseList = z.preprocess(
  (v) => (v == null ? [] : typeof v === 'string' ? [v] : v),
  z.array(z.string()),
);

// Unknown keys are stripped; missing keys default to null / [].
const rewriteResponseSchema = z.object({
  city: nullableText,
  country: nullableText,
  activities: phraseList,
});

const REWRITE_TEMPLATE = `Convert the following travel search query into a structured filter.

Extract:
1. city: the city or destination name, if one is mentioned
2. country: the country, if mentioned or clearly implied by a region (e.g. "Tuscany" → "Italy")
3. activities: activities or experiences requested (e.g. "snorkeling", "wine tasting", "city tours"). Keep category words such as "outdoor activities" or "wellness" as they are.

Do not invent constraints that the query does not state.

Return ONLY a JSON object with exactly this shape, no markdown:
{"city": string or null, "country": string or null, "activities": [string, ...]}`;

export interface QueryRewriterOptions {
  timeoutMs?: number;
  /** Retries after the first attempt. */
  maxRetries?: number;
  retryDelayMs?: number;
}

export interface RewriteResult {
  filter: StructuredFilter;
  /** True when rewriting failed and the filter fell back to unconstrained. */
  degraded: boolean;
  attempts: number;
}

export function buildRewritePrompt(query: string): string {
  return `${REWRITE_TEMPLATE}\n\nUser query: ${JSON.stringify(query)}`;
}

export class QueryRewriter {
  private readonly options: Required<QueryRewriterOptions>;

  constructor(
    private readonly completion: CompletionService,
    private readonly matcher: ActivityMatcher,
    options: QueryRewriterOptions = {},
  ) {
    this.options = { timeoutMs: 4000, maxRetries: 1, retryDelayMs: 200, ...options };
  }

  /**
   * Natural-language query → structured filter. Never throws for provider or
   * parse failures (degrades to an unconstrained filter); rethrows only when
   * the caller aborts.
   */
  async rewrite(query: string, { signal }: { signal?: AbortSignal } = {}): Promise<RewriteResult> {
    const message = query.trim();
    if (!message) {
      return { filter: emptyFilter(), degraded: false, attempts: 0 };
    }

    const prompt = buildRewritePrompt(message);
    let attempts = 0;
    try {
      const parsed = await retryWithBackoff(
        async () => {
          attempts++;
          const raw = await runWithDeadline(
            (callSignal) => this.completion.complete(prompt, { signal: callSignal }),
            { timeoutMs: this.options.timeoutMs, label: 'query-rewrite', signal },
          );
          return this.parse(raw);
        },
        {
          maxRetries: this.options.maxRetries,
          initialDelay: this.options.retryDelayMs,
          signal,
          label: 'query-rewrite',
        },
      );

      const activities = this.matcher.matchAll(parsed.activities);
      if (parsed.activities.length > 0 && activities.size === 0) {
        logger.debug('query-rewrite:activities_unmatched', { phrases: parsed.activities });
      }
      return {
        filter: { city: parsed.city, country: parsed.country, activities },
        degraded: false,
        attempts,
      };
    } catch (err) {
      if (signal?.aborted) throw signal.reason ?? err;
      logger.warn('query-rewrite:degraded', { attempts, err: errorMessage(err) });
      return { filter: emptyFilter(), degraded: true, attempts };
    }
  }

  private parse(raw: string): z.infer<typeof rewriteResponseSchema> {
    const json = safeParseJson(raw, 'query-rewrite');
    if (!json.ok) throw new MalformedResponseError(json.error);
    const result = rewriteResponseSchema.safeParse(json.value);
    if (!result.success) {
      throw new MalformedResponseError(
        result.error.errors.map((e) => `${e.path.join('.')}: ${e.message}`).join('; '),
      );
    }
    return result.data;
  }
}
