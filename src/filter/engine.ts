import * as core from "@actions/core";
import { creatorTags, intersectsAny, spainAudiencePct } from "../creators/signals.js";
import type { Candidate, CreatorRecord } from "../creators/types.js";
import type { BrandGraph } from "../intel/brand_graph.js";
import type { CampaignQuery, SizePreference } from "../query/types.js";
import { inferGender, type GenderSignals } from "./gender.js";

export type RejectionReason =
  | "excluded_niche"
  | "competitor_ambassador"
  | "creator_gender"
  | "credibility"
  | "spain_audience"
  | "engagement"
  | "audience_gender"
  | "follower_range";

export interface FilterContext {
  query: CampaignQuery;
  brands: BrandGraph;
  genderSignals: GenderSignals;
  countryFallbackPct: number;
}

export interface FilterResult {
  passed: Candidate[];
  rejections: Partial<Record<RejectionReason, number>>;
  followerRangeRelaxed: boolean;
}

// Audience share a gender needs to count as the majority.
const AUDIENCE_MAJORITY_PCT = 50;

/**
 * A missing value fails in strict mode and passes in lenient mode; a known
 * value is always held to the threshold.
 */
function meets(value: number | null, threshold: number, strict: boolean): boolean {
  if (value === null) return !strict;
  return value >= threshold;
}

function hardFilter(creator: CreatorRecord, ctx: FilterContext): RejectionReason | null {
  const { query } = ctx;

  if (intersectsAny(creatorTags(creator), query.niche.excludeNiches).length > 0) {
    return "excluded_niche";
  }

  if (query.excludeCompetitorAmbassadors) {
    const target = ctx.brands.get(query.brand.handle ?? query.brand.name);
    if (target && ctx.brands.competitorAmbassadorships(creator.username, target).length > 0) {
      return "competitor_ambassador";
    }
  }

  // A requested split picks genders after ranking instead.
  if (query.creatorGender && !query.genderSplit) {
    const inferred = inferGender(creator, ctx.genderSignals);
    if (inferred !== null && inferred !== query.creatorGender) return "creator_gender";
  }

  return null;
}

function thresholdFilter(candidate: Candidate, ctx: FilterContext): RejectionReason | null {
  const { creator } = candidate;
  const { thresholds, audienceGender } = ctx.query;
  const strict = candidate.verification.kind === "verified";
  const m = creator.metrics;

  if (
    creator.platform === "instagram" &&
    !meets(m.credibilityScore, thresholds.minCredibility, strict)
  ) {
    return "credibility";
  }

  const spain = spainAudiencePct(creator, ctx.countryFallbackPct);
  if (!meets(spain, thresholds.minSpainAudiencePct, strict)) return "spain_audience";

  if (thresholds.minEngagementPct !== null) {
    const pct = m.engagementRate === null ? null : m.engagementRate * 100;
    if (!meets(pct, thresholds.minEngagementPct, strict)) return "engagement";
  }

  if (audienceGender) {
    const share = m.audienceGenders ? m.audienceGenders[audienceGender] : null;
    if (!meets(share, AUDIENCE_MAJORITY_PCT, strict)) return "audience_gender";
  }

  return null;
}

/** Unknown reach always passes; the size multiplier deals with it. */
export function inFollowerRange(creator: CreatorRecord, size: SizePreference): boolean {
  const count = creator.followerCount;
  if (count === null || count === 0) return true;
  if (size.min !== null && count < size.min) return false;
  if (size.max !== null && count > size.max) return false;
  return true;
}

export function rejectionReason(candidate: Candidate, ctx: FilterContext): RejectionReason | null {
  return hardFilter(candidate.creator, ctx) ?? thresholdFilter(candidate, ctx);
}

/** Keeps input order. Each rejected candidate is counted under its first failing rule. */
export function applyFilters(candidates: readonly Candidate[], ctx: FilterContext): FilterResult {
  const rejections: Partial<Record<RejectionReason, number>> = {};
  const reject = (reason: RejectionReason, candidate: Candidate) => {
    rejections[reason] = (rejections[reason] ?? 0) + 1;
    core.debug(`Rejected @${candidate.creator.username}: ${reason}`);
  };

  const survivors: Candidate[] = [];
  for (const candidate of candidates) {
    const reason = rejectionReason(candidate, ctx);
    if (reason) reject(reason, candidate);
    else survivors.push(candidate);
  }

  const { size } = ctx.query;
  if (size.min === null && size.max === null) {
    return { passed: survivors, rejections, followerRangeRelaxed: false };
  }

  const inRange = survivors.filter((c) => inFollowerRange(c.creator, size));
  if (inRange.length === 0 && survivors.length > 0) {
    core.warning(
      `Follower range would remove all ${survivors.length} candidates, relaxing it to ranking only`
    );
    return { passed: survivors, rejections, followerRangeRelaxed: true };
  }

  for (const candidate of survivors) {
    if (!inFollowerRange(candidate.creator, size)) reject("follower_range", candidate);
  }
  return { passed: inRange, rejections, followerRangeRelaxed: false };
}
