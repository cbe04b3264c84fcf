import * as core from "@actions/core";
import type { CreatorMatchConfig } from "./config.js";
import { discoverCandidates } from "./creators/discovery.js";
import type { CandidateStore } from "./creators/store.js";
import type { Gender } from "./creators/types.js";
import { applyFilters, type RejectionReason } from "./filter/engine.js";
import { inferGender, type GenderSignals } from "./filter/gender.js";
import { selectForVerification } from "./filter/prefilter.js";
import type { BrandGraph } from "./intel/brand_graph.js";
import type { NicheTaxonomy } from "./intel/niche_taxonomy.js";
import type { MetricsGateway } from "./metrics/gateway.js";
import type { CampaignQuery } from "./query/types.js";
import { rankCandidates, type RankedResult } from "./ranking/engine.js";
import { rankingSettingsFromConfig } from "./ranking/scores.js";
import { resolveWeights, weightsFromConfig, type WeightSource } from "./ranking/weights.js";
import { VerificationGate } from "./verify/gate.js";

export interface VerificationStats {
  totalCandidates: number;
  preFiltered: number;
  fromCache: number;
  /** Cache hits plus fresh provider verifications. */
  verified: number;
  failedVerification: number;
  notFound: number;
  skipped: number;
  apiCalls: number;
  passedFilters: number;
  rejections: Partial<Record<RejectionReason, number>>;
  degraded: boolean;
  timedOut: number;
  followerRangeRelaxed: boolean;
}

export interface SearchOutcome {
  results: RankedResult[];
  stats: VerificationStats;
  weightsSource: WeightSource;
}

export interface PipelineDeps {
  store: CandidateStore;
  gateway: MetricsGateway;
  taxonomy: NicheTaxonomy;
  brands: BrandGraph;
  genderSignals: GenderSignals;
  config: CreatorMatchConfig;
}

export interface SearchOptions {
  poolSize?: number;
  verifyCap?: number;
  prefilterK?: number;
  /** Defaults to the query's target count. */
  topN?: number;
  deadlineMs?: number;
  concurrency?: number;
  now?: Date;
}

export function emptyStats(): VerificationStats {
  return {
    totalCandidates: 0,
    preFiltered: 0,
    fromCache: 0,
    verified: 0,
    failedVerification: 0,
    notFound: 0,
    skipped: 0,
    apiCalls: 0,
    passedFilters: 0,
    rejections: {},
    degraded: false,
    timedOut: 0,
    followerRangeRelaxed: false,
  };
}

/**
 * Keeps the best `split.male` men and `split.female` women in rank order,
 * at most `limit` in total. Creators whose gender cannot be inferred are
 * left out.
 */
export function applyGenderSplit(
  ranked: readonly RankedResult[],
  split: { male: number; female: number },
  signals: GenderSignals,
  limit: number
): RankedResult[] {
  const remaining: Record<Gender, number> = { male: split.male, female: split.female };
  const picked: RankedResult[] = [];
  for (const result of ranked) {
    if (picked.length >= limit) break;
    const gender = inferGender(result.creator, signals);
    if (gender === null || remaining[gender] === 0) continue;
    remaining[gender]--;
    picked.push(result);
  }
  return picked.map((result, i) => ({ ...result, rankPosition: i + 1 }));
}

/**
 * One search run: discovery, pre-filter, verification, filtering, ranking.
 * Never rejects; an unexpected failure is logged and returns no results with
 * the counts gathered so far.
 */
export async function runSearch(
  query: CampaignQuery,
  deps: PipelineDeps,
  options: SearchOptions = {}
): Promise<SearchOutcome> {
  const { config } = deps;
  const poolSize = options.poolSize ?? config.search.pool_size;
  const verifyCap = options.verifyCap ?? config.search.verify_cap;
  const prefilterK = options.prefilterK ?? config.search.prefilter_k;
  const topN = options.topN ?? query.targetCount;
  const deadlineMs = options.deadlineMs ?? config.search.deadline_ms;
  const now = options.now ?? new Date();
  const countryFallbackPct = config.filters.country_fallback_pct;

  const stats = emptyStats();
  let weightsSource: WeightSource = "default";

  const deadline = new AbortController();
  const timer = setTimeout(() => deadline.abort(), deadlineMs);

  try {
    core.info("Stage 1/5: Discovering candidates...");
    const { pool, tiers } = await discoverCandidates(deps.store, query, deps.taxonomy, poolSize);
    stats.totalCandidates = pool.length;
    core.info(
      `  Found ${pool.length} candidates (niche ${tiers.niche}, keyword ${tiers.keyword}, generic ${tiers.generic})`
    );

    core.info("Stage 2/5: Pre-filtering candidates...");
    const selected = selectForVerification(pool, query, prefilterK, countryFallbackPct);
    stats.preFiltered = selected.length;
    core.info(`  ${selected.length} candidates selected for verification`);

    core.info("Stage 3/5: Verifying candidates...");
    const gate = new VerificationGate(deps.gateway, deps.store);
    const verification = await gate.verify(
      selected.map((s) => s.creator),
      {
        verifyCap,
        concurrency: options.concurrency ?? config.search.concurrency,
        freshnessHours: config.search.freshness_hours,
        lookupResultCap: config.provider.lookup_result_cap,
        now,
        signal: deadline.signal,
      }
    );
    const gateStats = verification.stats;
    stats.fromCache = gateStats.fromCache;
    stats.verified = gateStats.fromCache + gateStats.verifiedFromProvider;
    stats.failedVerification = gateStats.failed;
    stats.notFound = gateStats.notFound;
    stats.skipped = gateStats.skipped;
    stats.timedOut = gateStats.timedOut;
    stats.apiCalls = gateStats.apiCalls;
    stats.degraded = gateStats.degraded;
    core.info(
      `  ${stats.verified} verified, ${stats.failedVerification} failed, ${stats.timedOut} timed out (${stats.apiCalls} API calls)`
    );

    core.info("Stage 4/5: Filtering candidates...");
    const filtered = applyFilters(verification.candidates, {
      query,
      brands: deps.brands,
      genderSignals: deps.genderSignals,
      countryFallbackPct,
    });
    stats.passedFilters = filtered.passed.length;
    stats.rejections = filtered.rejections;
    stats.followerRangeRelaxed = filtered.followerRangeRelaxed;
    core.info(`  ${filtered.passed.length} candidates passed filters`);

    core.info("Stage 5/5: Ranking candidates...");
    const settings = rankingSettingsFromConfig(config.ranking);
    const resolved = resolveWeights(
      weightsFromConfig(config.ranking.weights),
      query.rankingWeights,
      query.suggestedWeights,
      settings.suggestionVarianceFloor
    );
    weightsSource = resolved.source;
    const ranked = rankCandidates(filtered.passed, {
      query,
      weights: resolved.weights,
      taxonomy: deps.taxonomy,
      brands: deps.brands,
      settings,
      countryFallbackPct,
    });
    const results = query.genderSplit
      ? applyGenderSplit(ranked, query.genderSplit, deps.genderSignals, topN)
      : ranked.slice(0, topN);
    core.info(`  ${results.length} results (${weightsSource} weights)`);

    return { results, stats, weightsSource };
  } catch (error) {
    core.error(`Search failed: ${error instanceof Error ? error.message : String(error)}`);
    return { results: [], stats, weightsSource };
  } finally {
    clearTimeout(timer);
  }
}
