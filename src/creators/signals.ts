import type { CreatorRecord } from "./types.js";

const SPAIN_COUNTRY_NAMES = new Set(["es", "spain", "españa", "espana"]);

export function normalizeTag(value: string): string {
  return value.trim().toLowerCase().replace(/\s+/g, " ");
}

export function creatorTags(creator: CreatorRecord): Set<string> {
  const tags = new Set<string>();
  for (const interest of creator.interests) {
    const tag = normalizeTag(interest);
    if (tag) tags.add(tag);
  }
  if (creator.primaryNiche) {
    tags.add(normalizeTag(creator.primaryNiche));
  }
  return tags;
}

export function intersectsAny(tags: Set<string>, values: readonly string[]): string[] {
  const hits: string[] = [];
  for (const value of values) {
    const normalized = normalizeTag(value);
    if (normalized && tags.has(normalized)) hits.push(normalized);
  }
  return hits;
}

/** Lowercased bio + interests + niche, used for substring keyword scans. */
export function searchableText(creator: CreatorRecord): string {
  return [creator.bio ?? "", ...creator.interests, creator.primaryNiche ?? ""]
    .join(" ")
    .toLowerCase();
}

export function isSpanishCountry(country: string | null): boolean {
  return country !== null && SPAIN_COUNTRY_NAMES.has(normalizeTag(country));
}

/**
 * Share of the audience located in Spain. An empty geography breakdown falls
 * back to the coarse country field: a Spanish creator is credited with
 * `countryFallbackPct`, a creator known to be elsewhere with 0.
 */
export function spainAudiencePct(
  creator: CreatorRecord,
  countryFallbackPct: number
): number | null {
  const geography = creator.metrics.audienceGeography;
  if (geography && Object.keys(geography).length > 0) {
    return geography.ES ?? geography.es ?? 0;
  }
  if (creator.country === null || creator.country.trim() === "") return null;
  return isSpanishCountry(creator.country) ? countryFallbackPct : 0;
}

/** Code-unit order, so ties break the same way on every machine. */
export function compareIds(a: string, b: string): number {
  if (a === b) return 0;
  return a < b ? -1 : 1;
}
