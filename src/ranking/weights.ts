import * as core from "@actions/core";
import type { WeightsInput } from "../config.js";

export const FACTORS = [
  "engagement",
  "credibility",
  "audienceMatch",
  "brandAffinity",
  "creativeFit",
  "geography",
  "growth",
  "nicheMatch",
] as const;

export type FactorName = (typeof FACTORS)[number];

export type RankingWeights = Readonly<Record<FactorName, number>>;

export type WeightSource = "default" | "campaign" | "suggested";

const SUM_TOLERANCE = 0.001;

export class WeightsError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "WeightsError";
  }
}

/** Validates once and freezes; every later use can trust the vector. */
export function createRankingWeights(
  input: Record<FactorName, number>
): RankingWeights {
  let sum = 0;
  for (const factor of FACTORS) {
    const value = input[factor];
    if (!Number.isFinite(value) || value < 0 || value > 1) {
      throw new WeightsError(`Weight "${factor}" must be within [0, 1], got ${value}`);
    }
    sum += value;
  }
  if (Math.abs(sum - 1) > SUM_TOLERANCE) {
    throw new WeightsError(`Ranking weights must sum to 1.0, got ${sum.toFixed(4)}`);
  }

  return Object.freeze(mapFactors((factor) => input[factor]));
}

export function mapFactors(
  fn: (factor: FactorName) => number
): Record<FactorName, number> {
  return {
    engagement: fn("engagement"),
    credibility: fn("credibility"),
    audienceMatch: fn("audienceMatch"),
    brandAffinity: fn("brandAffinity"),
    creativeFit: fn("creativeFit"),
    geography: fn("geography"),
    growth: fn("growth"),
    nicheMatch: fn("nicheMatch"),
  };
}

export function weightsFromConfig(input: WeightsInput): RankingWeights {
  return createRankingWeights({
    engagement: input.engagement,
    credibility: input.credibility,
    audienceMatch: input.audience_match,
    brandAffinity: input.brand_affinity,
    creativeFit: input.creative_fit,
    geography: input.geography,
    growth: input.growth,
    nicheMatch: input.niche_match,
  });
}

function variance(values: number[]): number {
  const mean = values.reduce((a, b) => a + b, 0) / values.length;
  return values.reduce((acc, v) => acc + (v - mean) ** 2, 0) / values.length;
}

/**
 * Applies a parser weight suggestion on top of the base weights.
 * Factors weighted zero in the base stay zero, niche match never drops below
 * its base weight, and a near-uniform suggestion is discarded. Returns null
 * when the suggestion is discarded.
 */
export function clampSuggestedWeights(
  base: RankingWeights,
  suggested: Partial<Record<FactorName, number>>,
  varianceFloor: number
): RankingWeights | null {
  const raw = mapFactors((factor) => {
    const value = suggested[factor] ?? base[factor];
    return Number.isFinite(value) ? Math.max(0, value) : base[factor];
  });
  if (variance(FACTORS.map((factor) => raw[factor])) < varianceFloor) return null;

  const clamped = mapFactors((factor) => (base[factor] === 0 ? 0 : raw[factor]));
  const niche = Math.min(1, Math.max(clamped.nicheMatch, base.nicheMatch));
  const othersSum = FACTORS.filter((f) => f !== "nicheMatch").reduce(
    (acc, f) => acc + clamped[f],
    0
  );

  return createRankingWeights(
    mapFactors((factor) => {
      if (factor === "nicheMatch") return othersSum > 0 ? niche : 1;
      return othersSum > 0 ? (clamped[factor] * (1 - niche)) / othersSum : 0;
    })
  );
}

export function resolveWeights(
  base: RankingWeights,
  override: Partial<Record<FactorName, number>> | null,
  suggested: Partial<Record<FactorName, number>> | null,
  varianceFloor: number
): { weights: RankingWeights; source: WeightSource } {
  if (override) {
    try {
      return {
        weights: createRankingWeights({ ...base, ...override }),
        source: "campaign",
      };
    } catch (error) {
      core.warning(
        `Ignoring campaign weight override: ${error instanceof Error ? error.message : String(error)}`
      );
    }
  }

  if (suggested) {
    const clamped = clampSuggestedWeights(base, suggested, varianceFloor);
    if (clamped) return { weights: clamped, source: "suggested" };
    core.info("Suggested ranking weights are near-uniform, keeping defaults");
  }

  return { weights: base, source: "default" };
}
