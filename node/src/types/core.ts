// src/types/core.ts
export type RetrievalSource = 'lexical' | 'vector';
export type SearchMode = RetrievalSource | 'hybrid';

export const PRICE_TIERS = ['budget', 'moderate', 'luxury'] as const;
export type PriceTier = (typeof PRICE_TIERS)[number];

/** Canonical activity ids are the join key between free text, document fields and filters. */
export type ActivityId = string;

export interface StructuredFields {
  city: string | null;
  country: string | null;
  activities: ReadonlySet<ActivityId>;
  priceTier: PriceTier | null;
  /** 'partial' when the keyword fallback produced the fields (no city/country/price tier). */
  completeness: 'full' | 'partial';
}

export interface TravelDocument {
  readonly docId: string;
  title: string;
  bodyText: string;
  fields: StructuredFields;
  embedding: number[];
}

/** Input accepted by ingestion before any extraction happens. */
export interface RawDocument {
  docId: string;
  title: string;
  bodyText: string;
}

export interface StructuredFilter {
  city: string | null;
  country: string | null;
  /** Empty = unconstrained. */
  activities: ReadonlySet<ActivityId>;
}

export interface RankedEntry {
  docId: string;
  source: RetrievalSource;
  /** 1-based position in its source list. */
  rank: number;
  rawScore: number;
}

export interface FusedResult {
  docId: string;
  fusedScore: number;
  sources: RetrievalSource[];
  ranks: Partial<Record<RetrievalSource, number>>;
}

export type DocumentState = 'pending' | 'extracted' | 'indexed' | 'failed' | 'skipped';

export function emptyFilter(): StructuredFilter {
  return { city: null, country: null, activities: new Set() };
}
