/**
 * Canonical activity taxonomy: synonym → canonical id, category → member ids.
 *
 * Loaded once at startup and never mutated; every component receives the same
 * frozen instance through its constructor. Any malformed entry fails the load.
 */
import { readFile } from 'fs/promises';
import { z } from 'zod';
import type { ActivityId } from '@/types/core';
import { TaxonomyConfigError } from '@/services/errors';

const ACTIVITY_ID = /^[a-z][a-z0-9_]*$/;

const taxonomyFileSchema = z.object({
  synonyms: z.record(z.string(), z.string()),
  categories: z.record(z.string(), z.array(z.string())),
});

export type TaxonomyFile = z.infer<typeof taxonomyFileSchema>;

export interface Taxonomy {
  /** Normalized phrase → canonical activity id. Includes every id's own label. */
  readonly synonyms: ReadonlyMap<string, ActivityId>;
  /** Normalized category label → member ids. */
  readonly categories: ReadonlyMap<string, ReadonlySet<ActivityId>>;
  readonly activityIds: ReadonlySet<ActivityId>;
  /** Longest key, in words; bounds the matcher's span search. */
  readonly maxKeyWords: number;
}

/** "ies"→"y", "sses/ches/shes/xes/zes"→drop "es", else drop a trailing "s". */
export function singularizeWord(word: string): string {
  if (word.length <= 3) return word;
  if (word.endsWith('ies')) return `${word.slice(0, -3)}y`;
  if (/(sses|ches|shes|xes|zes)$/.test(word)) return word.slice(0, -2);
  if (/(ss|us|is)$/.test(word)) return word;
  if (word.endsWith('s')) return word.slice(0, -1);
  return word;
}

/** Lowercase, underscores and hyphens to spaces, collapse whitespace, singularize each word. */
export function normalizePhrase(text: string): string {
  return text
    .toLowerCase()
    .replace(/[_-]+/g, ' ')
    .split(/\s+/)
    .filter(Boolean)
    .map(singularizeWord)
    .join(' ');
}

export function activityLabel(id: ActivityId): string {
  return id.replace(/_/g, ' ');
}

export function buildTaxonomy(raw: unknown): Taxonomy {
  const parsed = taxonomyFileSchema.safeParse(raw);
  if (!parsed.success) {
    throw new TaxonomyConfigError(
      parsed.error.errors.map((e) => `${e.path.join('.') || 'root'}: ${e.message}`),
    );
  }

  const problems: string[] = [];
  const synonyms = new Map<string, ActivityId>();
  const activityIds = new Set<ActivityId>();

  const addSynonym = (phrase: string, id: ActivityId, origin: string) => {
    const key = normalizePhrase(phrase);
    if (!key) {
      problems.push(`${origin}: empty phrase`);
      return;
    }
    const existing = synonyms.get(key);
    if (existing !== undefined && existing !== id) {
      problems.push(`${origin}: "${key}" maps to both ${existing} and ${id}`);
      return;
    }
    synonyms.set(key, id);
  };

  for (const [phrase, id] of Object.entries(parsed.data.synonyms)) {
    if (!ACTIVITY_ID.test(id)) {
      problems.push(`synonyms.${phrase}: invalid activity id "${id}"`);
      continue;
    }
    activityIds.add(id);
    addSynonym(phrase, id, `synonyms.${phrase}`);
  }
  for (const id of activityIds) {
    addSynonym(activityLabel(id), id, `activity ${id}`);
  }

  const categories = new Map<string, ReadonlySet<ActivityId>>();
  for (const [categoryId, members] of Object.entries(parsed.data.categories)) {
    if (!ACTIVITY_ID.test(categoryId)) {
      problems.push(`categories.${categoryId}: invalid category id`);
      continue;
    }
    if (members.length === 0) {
      problems.push(`categories.${categoryId}: no member activities`);
      continue;
    }
    const unknown = members.filter((m) => !activityIds.has(m));
    if (unknown.length > 0) {
      problems.push(`categories.${categoryId}: unknown activities ${unknown.join(', ')}`);
      continue;
    }
    const key = normalizePhrase(activityLabel(categoryId));
    if (categories.has(key)) {
      problems.push(`categories.${categoryId}: duplicate category "${key}"`);
      continue;
    }
    categories.set(key, Object.freeze(new Set(members)));
  }

  if (problems.length > 0) {
    throw new TaxonomyConfigError(problems);
  }

  const maxKeyWords = Math.max(
    1,
    ...[...synonyms.keys(), ...categories.keys()].map((k) => k.split(' ').length),
  );

  return Object.freeze({
    synonyms,
    categories,
    activityIds: Object.freeze(activityIds),
    maxKeyWords,
  });
}

export async function loadTaxonomy(filePath: string): Promise<Taxonomy> {
  let raw: unknown;
  try {
    raw = JSON.parse(await readFile(filePath, 'utf8'));
  } catch (err) {
    throw new TaxonomyConfigError([
      `cannot read ${filePath}: ${err instanceof Error ? err.message : String(err)}`,
    ]);
  }
  return buildTaxonomy(raw);
}
