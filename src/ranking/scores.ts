import type { CreatorMatchConfig } from "../config.js";
import { searchableText, spainAudiencePct } from "../creators/signals.js";
import type { CreatorRecord } from "../creators/types.js";
import type { BrandAffinity, BrandGraph } from "../intel/brand_graph.js";
import type { NicheTaxonomy } from "../intel/niche_taxonomy.js";
import type { CampaignQuery } from "../query/types.js";

export interface NicheScores {
  exact: number;
  related: number;
  conflicting: number;
  celebrityConflicting: number;
  celebrityUnrelated: number;
  neutral: number;
}

export interface RankingSettings {
  celebrityThreshold: number;
  unknownSizeMultiplier: number;
  minNicheConfidence: number;
  suggestionVarianceFloor: number;
  nicheScores: NicheScores;
}

export function rankingSettingsFromConfig(ranking: CreatorMatchConfig["ranking"]): RankingSettings {
  return {
    celebrityThreshold: ranking.celebrity_threshold,
    unknownSizeMultiplier: ranking.unknown_size_multiplier,
    minNicheConfidence: ranking.min_niche_confidence,
    suggestionVarianceFloor: ranking.suggestion_variance_floor,
    nicheScores: {
      exact: ranking.niche_scores.exact,
      related: ranking.niche_scores.related,
      conflicting: ranking.niche_scores.conflicting,
      celebrityConflicting: ranking.niche_scores.celebrity_conflicting,
      celebrityUnrelated: ranking.niche_scores.celebrity_unrelated,
      neutral: ranking.niche_scores.neutral,
    },
  };
}

const NEUTRAL = 0.5;
const ENGAGEMENT_CEILING = 0.15;
const GROWTH_FLOOR = -0.2;
const GROWTH_SPAN = 0.7;

// Partial keyword overlap with the campaign niche lands in [0.5, 0.8].
const PARTIAL_BASE = 0.5;
const PARTIAL_SPAN = 0.3;

// Keyword fallback when the campaign names no niche.
const KEYWORD_EXCLUDED = 0.1;
const KEYWORD_MISS = 0.4;
const KEYWORD_HIT_BASE = 0.6;
const KEYWORD_HIT_SPAN = 0.35;

const CREATIVE_THEME_WEIGHT = 0.4;
const CREATIVE_TONE_WEIGHT = 0.3;
const CREATIVE_EXPERIENCE_WEIGHT = 0.3;

export function clamp01(value: number): number {
  return Math.min(1, Math.max(0, value));
}

export function round4(value: number): number {
  return Math.round(value * 10_000) / 10_000;
}

export function credibilityScore(creator: CreatorRecord): number {
  const raw = creator.metrics.credibilityScore;
  return raw === null ? 0 : clamp01(raw / 100);
}

export function engagementScore(creator: CreatorRecord): number {
  const rate = creator.metrics.engagementRate;
  return rate === null ? 0 : clamp01(rate / ENGAGEMENT_CEILING);
}

export function growthScore(creator: CreatorRecord): number {
  const rate = creator.metrics.growthRate6m;
  return rate === null ? NEUTRAL : clamp01((rate - GROWTH_FLOOR) / GROWTH_SPAN);
}

export function geographyScore(creator: CreatorRecord, countryFallbackPct: number): number {
  const pct = spainAudiencePct(creator, countryFallbackPct);
  return pct === null ? 0 : clamp01(pct / 100);
}

export function audienceMatchScore(creator: CreatorRecord, query: CampaignQuery): number {
  const { audienceGenders, audienceAges } = creator.metrics;

  let genderFit = NEUTRAL;
  if (query.audienceGender && audienceGenders) {
    genderFit = clamp01(audienceGenders[query.audienceGender] / 100);
  }

  let ageFit = NEUTRAL;
  if (query.audienceAgeBands.length > 0 && audienceAges) {
    const overlap = query.audienceAgeBands.reduce((sum, band) => sum + (audienceAges[band] ?? 0), 0);
    ageFit = clamp01(overlap / 100);
  }

  return (genderFit + ageFit) / 2;
}

export function brandAffinity(
  creator: CreatorRecord,
  query: CampaignQuery,
  brands: BrandGraph
): BrandAffinity {
  const target = query.brand.handle ?? query.brand.name;
  if (!target) return { score: NEUTRAL, warning: null };
  return brands.affinity(creator.username, creator.brandMentions, target);
}

function keywordOverlap(text: string, keywords: readonly string[]): number {
  if (keywords.length === 0) return NEUTRAL;
  const hits = keywords.filter((k) => text.includes(k.toLowerCase())).length;
  return hits / keywords.length;
}

export function creativeFitScore(creator: CreatorRecord, query: CampaignQuery): number {
  const { concept, tones, themes } = query.creative;
  if (!concept && tones.length === 0 && themes.length === 0) return NEUTRAL;

  const text = searchableText(creator);
  const experience = creator.brandMentions.length > 0 ? 1 : 0;
  return (
    CREATIVE_THEME_WEIGHT * keywordOverlap(text, themes) +
    CREATIVE_TONE_WEIGHT * keywordOverlap(text, tones) +
    CREATIVE_EXPERIENCE_WEIGHT * experience
  );
}

export type NicheMatchType =
  | "exact"
  | "related"
  | "conflicting"
  | "partial"
  | "keyword"
  | "excluded"
  | "neutral";

export interface NicheMatch {
  score: number;
  type: NicheMatchType;
  creatorNiche: string | null;
}

/**
 * The stored classification is trusted when its confidence is unknown or at
 * least `minConfidence`; otherwise the niche is detected from keywords.
 */
export function resolveCreatorNiche(
  creator: CreatorRecord,
  taxonomy: NicheTaxonomy,
  minConfidence: number
): string | null {
  if (
    creator.primaryNiche &&
    (creator.nicheConfidence === null || creator.nicheConfidence >= minConfidence)
  ) {
    return taxonomy.resolve(creator.primaryNiche) ?? creator.primaryNiche.trim().toLowerCase();
  }
  return taxonomy.detect(creator.interests, creator.bio).niche;
}

function keywordNicheMatch(creator: CreatorRecord, query: CampaignQuery): NicheMatch {
  const { topics, excludeNiches } = query.niche;
  if (topics.length === 0 && excludeNiches.length === 0) {
    return { score: NEUTRAL, type: "neutral", creatorNiche: null };
  }

  const text = searchableText(creator);
  if (excludeNiches.some((e) => text.includes(e))) {
    return { score: KEYWORD_EXCLUDED, type: "excluded", creatorNiche: null };
  }
  if (topics.length === 0) return { score: NEUTRAL, type: "neutral", creatorNiche: null };

  const hits = topics.filter((t) => text.includes(t)).length;
  if (hits === 0) return { score: KEYWORD_MISS, type: "keyword", creatorNiche: null };
  return {
    score: KEYWORD_HIT_BASE + KEYWORD_HIT_SPAN * (hits / topics.length),
    type: "keyword",
    creatorNiche: null,
  };
}

export function nicheMatchScore(
  creator: CreatorRecord,
  query: CampaignQuery,
  taxonomy: NicheTaxonomy,
  settings: RankingSettings
): NicheMatch {
  const scores = settings.nicheScores;
  if (!query.niche.campaignNiche) return keywordNicheMatch(creator, query);

  const campaign = taxonomy.get(query.niche.campaignNiche);
  const creatorNiche = resolveCreatorNiche(creator, taxonomy, settings.minNicheConfidence);
  if (!campaign) {
    if (creatorNiche !== null && creatorNiche === query.niche.campaignNiche) {
      return { score: scores.exact, type: "exact", creatorNiche };
    }
    return { score: scores.neutral, type: "neutral", creatorNiche };
  }

  const celebrity = (creator.followerCount ?? 0) > settings.celebrityThreshold;

  if (creatorNiche === campaign.key) {
    return { score: scores.exact, type: "exact", creatorNiche };
  }
  if (creatorNiche !== null && campaign.related.includes(creatorNiche)) {
    return { score: scores.related, type: "related", creatorNiche };
  }
  if (creatorNiche !== null && campaign.conflicting.includes(creatorNiche)) {
    return {
      score: celebrity ? scores.celebrityConflicting : scores.conflicting,
      type: "conflicting",
      creatorNiche,
    };
  }

  if (campaign.keywords.length > 0) {
    const text = searchableText(creator);
    const hits = campaign.keywords.filter((k) => text.includes(k)).length;
    if (hits > 0) {
      return {
        score: PARTIAL_BASE + PARTIAL_SPAN * (hits / campaign.keywords.length),
        type: "partial",
        creatorNiche,
      };
    }
  }

  return {
    score: celebrity ? scores.celebrityUnrelated : scores.neutral,
    type: "neutral",
    creatorNiche,
  };
}

/**
 * Anti-celebrity bias and the unknown-reach penalty. Inside the preferred
 * range, or with no range at all, the multiplier is 1.
 */
export function sizeMultiplier(
  followerCount: number | null,
  size: { min: number | null; max: number | null },
  unknownMultiplier: number
): number {
  if (followerCount === null || followerCount <= 0) return unknownMultiplier;
  if (size.min !== null && followerCount < size.min) {
    return Math.max(0.5, followerCount / size.min);
  }
  if (size.max !== null && followerCount > size.max) {
    return Math.max(0.3, size.max / followerCount);
  }
  return 1;
}
