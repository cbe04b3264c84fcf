import { compareIds } from "../creators/signals.js";
import type { Candidate, CreatorRecord } from "../creators/types.js";
import type { BrandGraph, BrandWarning } from "../intel/brand_graph.js";
import type { NicheTaxonomy } from "../intel/niche_taxonomy.js";
import type { CampaignQuery } from "../query/types.js";
import {
  audienceMatchScore,
  brandAffinity,
  credibilityScore,
  creativeFitScore,
  engagementScore,
  geographyScore,
  growthScore,
  nicheMatchScore,
  round4,
  sizeMultiplier,
  type NicheMatchType,
  type RankingSettings,
} from "./scores.js";
import { FACTORS, type FactorName, type RankingWeights } from "./weights.js";

export type SubScores = Readonly<Record<FactorName, number>>;

export interface RankedResult {
  creator: CreatorRecord;
  verification: Candidate["verification"]["kind"];
  scores: SubScores;
  sizeMultiplier: number;
  /** Weighted sum times the size multiplier, in [0, 1], 4 decimals. */
  relevanceScore: number;
  /** 1-based. */
  rankPosition: number;
  nicheMatchType: NicheMatchType;
  brandWarning: BrandWarning | null;
}

export interface RankingContext {
  query: CampaignQuery;
  weights: RankingWeights;
  taxonomy: NicheTaxonomy;
  brands: BrandGraph;
  settings: RankingSettings;
  countryFallbackPct: number;
}

export function scoreCandidate(candidate: Candidate, ctx: RankingContext): RankedResult {
  const { creator } = candidate;
  const affinity = brandAffinity(creator, ctx.query, ctx.brands);
  const niche = nicheMatchScore(creator, ctx.query, ctx.taxonomy, ctx.settings);

  const scores: SubScores = {
    engagement: round4(engagementScore(creator)),
    credibility: round4(credibilityScore(creator)),
    audienceMatch: round4(audienceMatchScore(creator, ctx.query)),
    brandAffinity: round4(affinity.score),
    creativeFit: round4(creativeFitScore(creator, ctx.query)),
    geography: round4(geographyScore(creator, ctx.countryFallbackPct)),
    growth: round4(growthScore(creator)),
    nicheMatch: round4(niche.score),
  };

  const weighted = FACTORS.reduce((sum, factor) => sum + ctx.weights[factor] * scores[factor], 0);
  const multiplier = sizeMultiplier(
    creator.followerCount,
    ctx.query.size,
    ctx.settings.unknownSizeMultiplier
  );

  return {
    creator,
    verification: candidate.verification.kind,
    scores,
    sizeMultiplier: round4(multiplier),
    relevanceScore: round4(Math.min(1, Math.max(0, weighted * multiplier))),
    rankPosition: 0,
    nicheMatchType: niche.type,
    brandWarning: affinity.warning,
  };
}

/** Score desc, then follower count desc (unknown as 0), then creator id asc. */
export function compareResults(a: RankedResult, b: RankedResult): number {
  return (
    b.relevanceScore - a.relevanceScore ||
    (b.creator.followerCount ?? 0) - (a.creator.followerCount ?? 0) ||
    compareIds(a.creator.id, b.creator.id)
  );
}

export function rankCandidates(candidates: readonly Candidate[], ctx: RankingContext): RankedResult[] {
  return candidates
    .map((c) => scoreCandidate(c, ctx))
    .sort(compareResults)
    .map((result, i) => ({ ...result, rankPosition: i + 1 }));
}
