import { beforeAll, describe, expect, it } from 'vitest';
import { ActivityMatcher } from '@/services/activity-matcher';
import { QueryRewriter, buildRewritePrompt } from '@/services/query-rewrite';
import { ProviderUnavailableError } from '@/services/errors';
import { StubCompletion, hangUntilAborted, testTaxonomy } from './helpers/stubs';

const FAST = { retryDelayMs: 1, timeoutMs: 200 };

describe('QueryRewriter', () => {
  let matcher: ActivityMatcher;

  beforeAll(async () => {
    matcher = new ActivityMatcher(await testTaxonomy());
  });

  it('turns a natural-language query into a structured filter', async () => {
    const completion = new StubCompletion(
      '{"city": null, "country": "Italy", "activities": ["wine tasting"]}',
    );
    const rewriter = new QueryRewriter(completion, matcher, FAST);

    const result = await rewriter.rewrite('wine tasting in Tuscany');

    expect(result.filter.city).toBeNull();
    expect(result.filter.country).toBe('Italy');
    expect(result.filter.activities).toEqual(new Set(['wine_tasting']));
    expect(result.degraded).toBe(false);
    expect(result.attempts).toBe(1);
    expect(completion.prompts[0]).toBe(buildRewritePrompt('wine tasting in Tuscany'));
  });

  it('accepts fenced output, "null" strings, a bare activity string and extra keys', async () => {
    const completion = new StubCompletion(
      '```json\n{"city": "null", "country": " Japan ", "activities": "temples", "budget": 3}\n```',
    );
    const result = await new QueryRewriter(completion, matcher, FAST).rewrite('temples in japan');

    expect(result.filter).toEqual({
      city: null,
      country: 'Japan',
      activities: new Set(['temple_visits']),
    });
    expect(result.degraded).toBe(false);
  });

  it('defaults missing keys and drops phrases that match no activity', async () => {
    const completion = new StubCompletion('{"activities": ["qqqq"]}');
    const result = await new QueryRewriter(completion, matcher, FAST).rewrite('somewhere nice');

    expect(result.filter).toEqual({ city: null, country: null, activities: new Set() });
    expect(result.degraded).toBe(false);
  });

  it('retries once after malformed JSON', async () => {
    const completion = new StubCompletion('not json at all', '{"city": "Lisbon"}');
    const result = await new QueryRewriter(completion, matcher, FAST).rewrite('lisbon');

    expect(result.filter.city).toBe('Lisbon');
    expect(result.degraded).toBe(false);
    expect(result.attempts).toBe(2);
    expect(completion.calls).toBe(2);
  });

  it('degrades to an empty filter after the second malformed response', async () => {
    const completion = new StubCompletion('{"city": 5}');
    const result = await new QueryRewriter(completion, matcher, FAST).rewrite('anything');

    expect(result).toEqual({
      filter: { city: null, country: null, activities: new Set() },
      degraded: true,
      attempts: 2,
    });
    expect(completion.calls).toBe(2);
  });

  it('degrades when the provider keeps failing', async () => {
    const completion = new StubCompletion(
      new ProviderUnavailableError('completion', 'rate limited', { status: 429, retryable: true }),
    );
    const result = await new QueryRewriter(completion, matcher, FAST).rewrite('beach holiday');

    expect(result.degraded).toBe(true);
    expect(completion.calls).toBe(2);
  });

  it('degrades after two timeouts and aborts each timed-out request', async () => {
    const completion = new StubCompletion(hangUntilAborted);
    const rewriter = new QueryRewriter(completion, matcher, { timeoutMs: 20, retryDelayMs: 1 });

    const result = await rewriter.rewrite('slow provider');

    expect(result.degraded).toBe(true);
    expect(result.attempts).toBe(2);
    expect(completion.signals.map((s) => s?.aborted)).toEqual([true, true]);
  });

  it('rethrows caller cancellation instead of degrading', async () => {
    const completion = new StubCompletion(hangUntilAborted);
    const rewriter = new QueryRewriter(completion, matcher, { timeoutMs: 5_000 });
    const controller = new AbortController();

    const pending = rewriter.rewrite('cancel me', { signal: controller.signal });
    controller.abort(new Error('client went away'));

    await expect(pending).rejects.toThrow('client went away');
    expect(completion.signals[0]?.aborted).toBe(true);
  });

  it('does not call the provider for a blank query', async () => {
    const completion = new StubCompletion('{}');
    const result = await new QueryRewriter(completion, matcher, FAST).rewrite('   ');

    expect(result).toEqual({
      filter: { city: null, country: null, activities: new Set() },
      degraded: false,
      attempts: 0,
    });
    expect(completion.calls).toBe(0);
  });
});
