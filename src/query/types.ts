import type { Gender, GenderSplit } from "../creators/types.js";
import type { FactorName } from "../ranking/weights.js";

export const AGE_BANDS = ["13-17", "18-24", "25-34", "35-44", "45-54", "55+"] as const;

export type AgeBand = (typeof AGE_BANDS)[number];

export interface BrandContext {
  readonly name: string | null;
  readonly handle: string | null;
  readonly category: string | null;
}

export interface CreativeBrief {
  readonly concept: string | null;
  readonly tones: readonly string[];
  readonly themes: readonly string[];
}

export interface NicheTargeting {
  readonly campaignNiche: string | null;
  readonly topics: readonly string[];
  readonly excludeNiches: readonly string[];
}

/** Advisory follower bounds; the ranking size multiplier enforces them softly. */
export interface SizePreference {
  readonly min: number | null;
  readonly max: number | null;
}

export interface QualityThresholds {
  readonly minCredibility: number;
  readonly minSpainAudiencePct: number;
  /** Percentage (2 means 2%), null when the brief sets no floor. */
  readonly minEngagementPct: number | null;
}

export interface CampaignQuery {
  readonly targetCount: number;
  readonly genderSplit: Readonly<GenderSplit> | null;
  readonly creatorGender: Gender | null;
  readonly audienceGender: Gender | null;
  readonly audienceAgeBands: readonly AgeBand[];
  readonly brand: BrandContext;
  readonly creative: CreativeBrief;
  readonly niche: NicheTargeting;
  readonly size: SizePreference;
  readonly thresholds: QualityThresholds;
  readonly excludeCompetitorAmbassadors: boolean;
  readonly rankingWeights: Readonly<Partial<Record<FactorName, number>>> | null;
  readonly suggestedWeights: Readonly<Partial<Record<FactorName, number>>> | null;
  readonly searchKeywords: readonly string[];
  readonly confidence: number;
  readonly reasoning: string;
}
