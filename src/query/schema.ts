import { readFileSync } from "node:fs";
import { parse as parseYaml } from "yaml";
import { z } from "zod";
import { WeightsSchema, type WeightsInput } from "../config.js";
import type { FactorName } from "../ranking/weights.js";
import { AGE_BANDS, type CampaignQuery } from "./types.js";

const GenderSchema = z.enum(["male", "female"]);

const nullableString = z
  .string()
  .trim()
  .nullable()
  .default(null)
  .transform((v) => (v === "" ? null : v));
const tagList = z
  .array(z.string())
  .default([])
  .transform((list) => list.map((v) => v.trim()).filter((v) => v.length > 0));
const followerBound = z.number().int().nonnegative().nullable().default(null);
const partialWeights = WeightsSchema.partial().nullable().default(null);

export const CampaignQuerySchema = z.object({
  target_count: z.number().int().min(1).max(50).default(5),
  gender_split: z
    .object({
      male: z.number().int().nonnegative(),
      female: z.number().int().nonnegative(),
    })
    .nullable()
    .default(null),
  creator_gender: GenderSchema.nullable().default(null),
  audience_gender: GenderSchema.nullable().default(null),
  audience_age_bands: z.array(z.enum(AGE_BANDS)).default([]),
  brand: z
    .object({
      name: nullableString,
      handle: nullableString,
      category: nullableString,
    })
    .default({}),
  creative: z
    .object({
      concept: nullableString,
      tones: tagList,
      themes: tagList,
    })
    .default({}),
  niche: z
    .object({
      campaign_niche: nullableString,
      topics: tagList,
      exclude_niches: tagList,
    })
    .default({}),
  size: z
    .object({ min: followerBound, max: followerBound })
    .refine(
      (s) => s.min === null || s.max === null || s.min <= s.max,
      "size.min must not exceed size.max"
    )
    .default({}),
  thresholds: z
    .object({
      min_credibility: z.number().min(0).max(100).optional(),
      min_spain_audience_pct: z.number().min(0).max(100).optional(),
      min_engagement_pct: z.number().nonnegative().nullable().default(null),
    })
    .default({}),
  exclude_competitor_ambassadors: z.boolean().default(false),
  ranking_weights: partialWeights,
  suggested_weights: partialWeights,
  search_keywords: tagList,
  confidence: z.number().min(0).max(1).default(1),
  reasoning: z.string().default(""),
});

export type CampaignQueryInput = z.input<typeof CampaignQuerySchema>;

/** Threshold defaults taken from the `filters` config section. */
export interface ThresholdDefaults {
  minCredibility: number;
  minSpainAudiencePct: number;
}

const FACTOR_KEYS: ReadonlyArray<readonly [keyof WeightsInput, FactorName]> = [
  ["engagement", "engagement"],
  ["credibility", "credibility"],
  ["audience_match", "audienceMatch"],
  ["brand_affinity", "brandAffinity"],
  ["creative_fit", "creativeFit"],
  ["geography", "geography"],
  ["growth", "growth"],
  ["niche_match", "nicheMatch"],
];

function toFactorWeights(
  input: Partial<WeightsInput> | null
): Partial<Record<FactorName, number>> | null {
  if (!input) return null;
  const weights: Partial<Record<FactorName, number>> = {};
  for (const [key, factor] of FACTOR_KEYS) {
    const value = input[key];
    if (value !== undefined) weights[factor] = value;
  }
  return Object.keys(weights).length > 0 ? Object.freeze(weights) : null;
}

function dedupeTags(values: string[]): string[] {
  return [...new Set(values.map((v) => v.toLowerCase()))];
}

export function parseCampaignQuery(
  raw: unknown,
  defaults: ThresholdDefaults
): CampaignQuery {
  const q = CampaignQuerySchema.parse(raw ?? {});

  return Object.freeze({
    targetCount: q.target_count,
    genderSplit: q.gender_split ? Object.freeze({ ...q.gender_split }) : null,
    creatorGender: q.creator_gender,
    audienceGender: q.audience_gender,
    audienceAgeBands: Object.freeze([...new Set(q.audience_age_bands)]),
    brand: Object.freeze({
      name: q.brand.name,
      handle: q.brand.handle ? q.brand.handle.replace(/^@/, "").toLowerCase() : null,
      category: q.brand.category,
    }),
    creative: Object.freeze({
      concept: q.creative.concept,
      tones: Object.freeze(dedupeTags(q.creative.tones)),
      themes: Object.freeze(dedupeTags(q.creative.themes)),
    }),
    niche: Object.freeze({
      campaignNiche: q.niche.campaign_niche?.toLowerCase() ?? null,
      topics: Object.freeze(dedupeTags(q.niche.topics)),
      excludeNiches: Object.freeze(dedupeTags(q.niche.exclude_niches)),
    }),
    size: Object.freeze({ min: q.size.min, max: q.size.max }),
    thresholds: Object.freeze({
      minCredibility: q.thresholds.min_credibility ?? defaults.minCredibility,
      minSpainAudiencePct:
        q.thresholds.min_spain_audience_pct ?? defaults.minSpainAudiencePct,
      minEngagementPct: q.thresholds.min_engagement_pct,
    }),
    excludeCompetitorAmbassadors: q.exclude_competitor_ambassadors,
    rankingWeights: toFactorWeights(q.ranking_weights),
    suggestedWeights: toFactorWeights(q.suggested_weights),
    searchKeywords: Object.freeze(dedupeTags(q.search_keywords)),
    confidence: q.confidence,
    reasoning: q.reasoning,
  });
}

/** Reads a query from a YAML or JSON file. */
export function loadCampaignQuery(
  filePath: string,
  defaults: ThresholdDefaults
): CampaignQuery {
  const content = readFileSync(filePath, "utf-8");
  return parseCampaignQuery(parseYaml(content), defaults);
}
