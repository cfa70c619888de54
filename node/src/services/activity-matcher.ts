// src/services/activity-matcher.ts: free text → canonical activity ids (exact, then fuzzy, with category expansion)
import { distance } from 'fastest-levenshtein';
import type { ActivityId } from '@/types/core';
import { normalizePhrase, type Taxonomy } from '@/config/taxonomy';

export const DEFAULT_FUZZY_THRESHOLD = 0.8;
/** Spans shorter than this never fuzzy-match ("in", "spa" vs "sea"...). */
export const MIN_FUZZY_LENGTH = 4;

export interface ActivityMatcherOptions {
  fuzzyThreshold?: number;
}

interface SpanHit {
  length: number;
  ids: Iterable<ActivityId>;
}

type SpanLookup = (candidate: string) => Iterable<ActivityId> | null;

/** 1 - levenshtein / longer length, on a 0–1 scale. */
export function similarityRatio(a: string, b: string): number {
  const longest = Math.max(a.length, b.length);
  if (longest === 0) return 1;
  return 1 - distance(a, b) / longest;
}

function toWords(text: string): string[] {
  const cleaned = text.replace(/[^\p{L}\p{N}\s_-]+/gu, ' ');
  const normalized = normalizePhrase(cleaned);
  return normalized ? normalized.split(' ') : [];
}

export class ActivityMatcher {
  private readonly fuzzyThreshold: number;
  /** Category keys first so "outdoor" expands instead of hitting a same-named synonym. */
  private readonly fuzzyKeys: Array<{ key: string; ids: ReadonlySet<ActivityId> | ActivityId }>;

  constructor(
    private readonly taxonomy: Taxonomy,
    options: ActivityMatcherOptions = {},
  ) {
    this.fuzzyThreshold = options.fuzzyThreshold ?? DEFAULT_FUZZY_THRESHOLD;
    if (!(this.fuzzyThreshold > 0 && this.fuzzyThreshold <= 1)) {
      throw new RangeError(`fuzzyThreshold must be in (0, 1], got ${this.fuzzyThreshold}`);
    }
    this.fuzzyKeys = [
      ...[...taxonomy.categories].map(([key, ids]) => ({ key, ids })),
      ...[...taxonomy.synonyms].map(([key, ids]) => ({ key, ids })),
    ];
  }

  /**
   * Canonical ids mentioned in `text`. Comma-separated segments and
   * space-separated words are matched independently and unioned; a category
   * expands to its members. Empty when nothing clears the threshold.
   */
  match(text: string): Set<ActivityId> {
    return this.collect(text, [this.exactLookup, this.fuzzyLookup]);
  }

  matchAll(phrases: readonly string[]): Set<ActivityId> {
    const out = new Set<ActivityId>();
    for (const phrase of phrases) {
      for (const id of this.match(phrase)) out.add(id);
    }
    return out;
  }

  /** Exact synonym keys only: no fuzzy matching, no category expansion. */
  scan(text: string): Set<ActivityId> {
    return this.collect(text, [this.synonymLookup]);
  }

  private collect(text: string, lookups: SpanLookup[]): Set<ActivityId> {
    const found = new Set<ActivityId>();
    for (const segment of text.split(/[,;\n]+/)) {
      const words = toWords(segment);
      let i = 0;
      while (i < words.length) {
        const hit = this.longestSpan(words, i, lookups);
        if (hit) {
          for (const id of hit.ids) found.add(id);
          i += hit.length;
        } else {
          i++;
        }
      }
    }
    return found;
  }

  private longestSpan(words: string[], start: number, lookups: SpanLookup[]): SpanHit | null {
    const maxLength = Math.min(this.taxonomy.maxKeyWords, words.length - start);
    for (const lookup of lookups) {
      for (let length = maxLength; length >= 1; length--) {
        const ids = lookup(words.slice(start, start + length).join(' '));
        if (ids) return { length, ids };
      }
    }
    return null;
  }

  private readonly synonymLookup: SpanLookup = (candidate) => {
    const id = this.taxonomy.synonyms.get(candidate);
    return id === undefined ? null : [id];
  };

  private readonly exactLookup: SpanLookup = (candidate) =>
    this.taxonomy.categories.get(candidate) ?? this.synonymLookup(candidate);

  private readonly fuzzyLookup: SpanLookup = (candidate) => {
    if (candidate.length < MIN_FUZZY_LENGTH) return null;

    let best: { key: string; ratio: number; ids: ReadonlySet<ActivityId> | ActivityId } | null =
      null;
    for (const entry of this.fuzzyKeys) {
      const ratio = similarityRatio(candidate, entry.key);
      if (ratio < this.fuzzyThreshold) continue;
      if (!best || ratio > best.ratio || (ratio === best.ratio && entry.key < best.key)) {
        best = { key: entry.key, ratio, ids: entry.ids };
      }
    }
    if (!best) return null;
    return typeof best.ids === 'string' ? [best.ids] : best.ids;
  };
}
