// JSON shapes for domain types that hold Sets.
import type { StructuredFields, StructuredFilter } from '@/types/core';

export interface FieldsJson {
  city: string | null;
  country: string | null;
  activities: string[];
  priceTier: StructuredFields['priceTier'];
  completeness: StructuredFields['completeness'];
}

export interface FilterJson {
  city: string | null;
  country: string | null;
  activities: string[];
}

export function serializeFields(fields: StructuredFields): FieldsJson {
  return {
    city: fields.city,
    country: fields.country,
    activities: [...fields.activities].sort(),
    priceTier: fields.priceTier,
    completeness: fields.completeness,
  };
}

export function serializeFilter(filter: StructuredFilter): FilterJson {
  return {
    city: filter.city,
    country: filter.country,
    activities: [...filter.activities].sort(),
  };
}
