import { compareIds, creatorTags, intersectsAny, spainAudiencePct } from "../creators/signals.js";
import type { CreatorRecord } from "../creators/types.js";
import type { CampaignQuery } from "../query/types.js";

export interface PrefilterScore {
  creator: CreatorRecord;
  score: number;
}

const CLEARS_THRESHOLDS_BONUS = 3;
const MISSING_METRICS_BONUS = 1.5;
const NICHE_HIT_BONUS = 2;
const EXCLUDED_NICHE_PENALTY = -5;
// Small enough that it only separates otherwise equal candidates.
const REACH_TIE_BREAK = 0.01;

function hasAnyMetrics(creator: CreatorRecord): boolean {
  const m = creator.metrics;
  return (
    m.credibilityScore !== null ||
    m.engagementRate !== null ||
    (m.audienceGeography !== null && Object.keys(m.audienceGeography).length > 0)
  );
}

export function clearsThresholds(
  creator: CreatorRecord,
  query: CampaignQuery,
  countryFallbackPct: number
): boolean {
  const { credibilityScore, engagementRate } = creator.metrics;
  const { minCredibility, minSpainAudiencePct, minEngagementPct } = query.thresholds;

  // Credibility only exists for Instagram profiles.
  if (creator.platform === "instagram") {
    if (credibilityScore === null || credibilityScore < minCredibility) return false;
  }
  const spain = spainAudiencePct(creator, countryFallbackPct);
  if (spain === null || spain < minSpainAudiencePct) return false;
  if (minEngagementPct !== null) {
    if (engagementRate === null || engagementRate * 100 < minEngagementPct) return false;
  }
  return true;
}

export function prefilterScore(
  creator: CreatorRecord,
  query: CampaignQuery,
  countryFallbackPct: number
): number {
  let score = 0;

  if (!hasAnyMetrics(creator)) {
    score += MISSING_METRICS_BONUS;
  } else if (clearsThresholds(creator, query, countryFallbackPct)) {
    score += CLEARS_THRESHOLDS_BONUS;
  }

  const tags = creatorTags(creator);
  const targets = query.niche.campaignNiche
    ? [query.niche.campaignNiche, ...query.niche.topics]
    : query.niche.topics;
  if (intersectsAny(tags, targets).length > 0) score += NICHE_HIT_BONUS;
  if (intersectsAny(tags, query.niche.excludeNiches).length > 0) score += EXCLUDED_NICHE_PENALTY;

  score += Math.log10((creator.followerCount ?? 0) + 1) * REACH_TIE_BREAK;
  return score;
}

/**
 * Picks the `k` candidates worth spending verification budget on, using only
 * data already in the store.
 */
export function selectForVerification(
  pool: readonly CreatorRecord[],
  query: CampaignQuery,
  k: number,
  countryFallbackPct: number
): PrefilterScore[] {
  return pool
    .map((creator) => ({ creator, score: prefilterScore(creator, query, countryFallbackPct) }))
    .sort(
      (a, b) =>
        b.score - a.score ||
        (b.creator.followerCount ?? 0) - (a.creator.followerCount ?? 0) ||
        compareIds(a.creator.id, b.creator.id)
    )
    .slice(0, k);
}
