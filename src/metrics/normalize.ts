import { readFileSync } from "node:fs";
import { z } from "zod";
import type { CreatorMetrics, CreatorRecord, GenderSplit, Platform } from "../creators/types.js";

const nullableNumber = z.number().finite().nullable().optional().catch(null);
const nullableString = z.string().nullable().optional().catch(null);

const AudienceSectionSchema = z.object({
  audience_credibility_percentage: nullableNumber,
  genders: z.record(z.string(), z.number().nullable()).nullable().optional().catch(null),
  average_age: z.array(z.unknown()).nullable().optional().catch(null),
  location_by_country: z.array(z.unknown()).nullable().optional().catch(null),
});

const AgeItemSchema = z.object({
  label: z.string(),
  female: z.number().nullable().optional(),
  male: z.number().nullable().optional(),
});

const CountryItemSchema = z.object({
  name: z.string(),
  percentage: z.number().nullable().optional(),
  value: z.number().nullable().optional(),
});

export const MediaKitSchema = z.object({
  platform_type: z.number().int().optional().catch(undefined),
  username: nullableString,
  fullname: nullableString,
  description: nullableString,
  interests: z.array(z.string()).nullable().optional().catch(null),
  followers: nullableNumber,
  followers_last_6_month_evolution: nullableNumber,
  avg_engagement_rate: nullableNumber,
  brand_mentions: z
    .array(z.object({ username: z.string().optional() }).passthrough())
    .optional()
    .catch([]),
  audience_data: z
    .object({ followers: AudienceSectionSchema.nullable().optional().catch(null) })
    .nullable()
    .optional()
    .catch(null),
});

export type MediaKit = z.infer<typeof MediaKitSchema>;

/** Provider data for one profile, reduced to the fields the pipeline uses. */
export interface MetricsDetail {
  username: string | null;
  displayName: string | null;
  bio: string | null;
  followerCount: number | null;
  interests: string[];
  brandMentions: string[];
  metrics: CreatorMetrics;
}

function round(value: number, digits: number): number {
  const factor = 10 ** digits;
  return Math.round(value * factor) / factor;
}

/** The provider reports rates as percentages; the pipeline works in fractions. */
function percentToFraction(value: number | null | undefined): number | null {
  return value === null || value === undefined ? null : round(value / 100, 6);
}

function normalizeGenders(
  genders: Record<string, number | null> | null | undefined
): GenderSplit | null {
  if (!genders) return null;
  let male: number | null = null;
  let female: number | null = null;
  for (const [key, value] of Object.entries(genders)) {
    if (value === null) continue;
    const k = key.toLowerCase();
    if (k === "male" || k === "m") male = value;
    if (k === "female" || k === "f") female = value;
  }
  if (male === null && female === null) return null;
  return { male: male ?? 0, female: female ?? 0 };
}

function normalizeAges(items: unknown[] | null | undefined): Record<string, number> | null {
  if (!items) return null;
  const ages: Record<string, number> = {};
  for (const item of items) {
    const parsed = AgeItemSchema.safeParse(item);
    if (!parsed.success || !parsed.data.label) continue;
    ages[parsed.data.label] = round((parsed.data.female ?? 0) + (parsed.data.male ?? 0), 4);
  }
  return Object.keys(ages).length > 0 ? ages : null;
}

function normalizeGeography(
  items: unknown[] | null | undefined,
  countryCodes: Readonly<Record<string, string>>
): Record<string, number> | null {
  if (!items) return null;
  const geography: Record<string, number> = {};
  for (const item of items) {
    const parsed = CountryItemSchema.safeParse(item);
    if (!parsed.success) continue;
    const { name } = parsed.data;
    const pct = parsed.data.percentage || parsed.data.value;
    if (!name || !pct) continue;
    // Unmapped names are kept verbatim so the data is not lost.
    geography[countryCodes[name] ?? name] = pct;
  }
  return Object.keys(geography).length > 0 ? geography : null;
}

export function normalizeMediaKit(
  kit: MediaKit,
  platform: Platform,
  countryCodes: Readonly<Record<string, string>>
): MetricsDetail {
  const audience = kit.audience_data?.followers ?? null;

  return {
    username: kit.username ?? null,
    displayName: kit.fullname || null,
    bio: kit.description || null,
    followerCount: kit.followers ?? null,
    interests: (kit.interests ?? []).filter((i) => i.trim().length > 0),
    brandMentions: (kit.brand_mentions ?? []).flatMap((m) =>
      m.username ? [m.username.replace(/^@/, "").toLowerCase()] : []
    ),
    metrics: {
      // Credibility is only meaningful for Instagram.
      credibilityScore:
        platform === "instagram" ? audience?.audience_credibility_percentage ?? null : null,
      engagementRate: percentToFraction(kit.avg_engagement_rate),
      growthRate6m: percentToFraction(kit.followers_last_6_month_evolution),
      audienceGenders: normalizeGenders(audience?.genders),
      audienceAges: normalizeAges(audience?.average_age),
      audienceGeography: normalizeGeography(audience?.location_by_country, countryCodes),
    },
  };
}

export function isMetricsComplete(metrics: CreatorMetrics, platform: Platform): boolean {
  return (
    (platform !== "instagram" || metrics.credibilityScore !== null) &&
    metrics.engagementRate !== null &&
    metrics.audienceGenders !== null &&
    metrics.audienceGeography !== null &&
    Object.keys(metrics.audienceGeography).length > 0
  );
}

/**
 * Folds fresh provider data into a stored record. Metrics come from the
 * provider alone, so a metric it left empty is null afterwards. Profile
 * fields the provider left empty keep their previous value.
 */
export function mergeDetail(
  record: CreatorRecord,
  detail: MetricsDetail,
  token: string | null,
  verifiedAt: Date
): CreatorRecord {
  const metrics: CreatorMetrics = { ...detail.metrics };

  return {
    ...record,
    displayName: detail.displayName ?? record.displayName,
    bio: detail.bio ?? record.bio,
    followerCount:
      detail.followerCount !== null && detail.followerCount > 0
        ? detail.followerCount
        : record.followerCount,
    interests: detail.interests.length > 0 ? detail.interests : record.interests,
    brandMentions: detail.brandMentions.length > 0 ? detail.brandMentions : record.brandMentions,
    metrics,
    metricsComplete: isMetricsComplete(metrics, record.platform),
    externalId: token ?? record.externalId,
    verifiedAt: verifiedAt.toISOString(),
  };
}

const CountryCodesSchema = z.record(z.string(), z.string().length(2));

/** Country display names (English and Spanish) to ISO 3166-1 alpha-2 codes. */
export function parseCountryCodes(jsonContent: string): Readonly<Record<string, string>> {
  return Object.freeze(CountryCodesSchema.parse(JSON.parse(jsonContent)));
}

export function loadCountryCodes(filePath: string): Readonly<Record<string, string>> {
  return parseCountryCodes(readFileSync(filePath, "utf-8"));
}
