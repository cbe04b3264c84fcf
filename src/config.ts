import { readFileSync } from "node:fs";
import { parse as parseYaml } from "yaml";
import { z } from "zod";

const WEIGHT_SUM_TOLERANCE = 0.001;

const ProviderSchema = z.object({
  base_url: z.string().url(),
  platform: z.enum(["instagram", "tiktok"]).default("instagram"),
  lookup_result_cap: z.number().int().positive().max(50).default(5),
  request_timeout_ms: z.number().int().positive().default(30_000),
});

const RetrySchema = z.object({
  max_retries: z.number().int().nonnegative().default(3),
  base_delay_ms: z.number().int().positive().default(1_000),
  max_delay_ms: z.number().int().positive().default(30_000),
  jitter: z.number().min(0).max(1).default(0.1),
});

const SearchSchema = z.object({
  pool_size: z.number().int().positive().default(200),
  prefilter_k: z.number().int().positive().default(15),
  verify_cap: z.number().int().nonnegative().default(15),
  concurrency: z.number().int().positive().default(5),
  freshness_hours: z.number().positive().default(24),
  deadline_ms: z.number().int().positive().default(45_000),
});

const FiltersSchema = z.object({
  min_credibility: z.number().min(0).max(100).default(70),
  min_spain_audience_pct: z.number().min(0).max(100).default(60),
  country_fallback_pct: z.number().min(0).max(100).default(60),
});

export const WeightsSchema = z.object({
  engagement: z.number().min(0).max(1),
  credibility: z.number().min(0).max(1),
  audience_match: z.number().min(0).max(1),
  brand_affinity: z.number().min(0).max(1),
  creative_fit: z.number().min(0).max(1),
  geography: z.number().min(0).max(1),
  growth: z.number().min(0).max(1),
  niche_match: z.number().min(0).max(1),
});

const DEFAULT_WEIGHTS = {
  engagement: 0.2,
  credibility: 0.15,
  audience_match: 0.15,
  brand_affinity: 0.15,
  creative_fit: 0.15,
  geography: 0.1,
  growth: 0.05,
  niche_match: 0.05,
};

const NicheScoresSchema = z.object({
  exact: z.number().min(0).max(1).default(0.95),
  related: z.number().min(0).max(1).default(0.7),
  conflicting: z.number().min(0).max(1).default(0.2),
  celebrity_conflicting: z.number().min(0).max(1).default(0.15),
  celebrity_unrelated: z.number().min(0).max(1).default(0.3),
  neutral: z.number().min(0).max(1).default(0.5),
});

const RankingSchema = z.object({
  weights: WeightsSchema.refine(
    (w) =>
      Math.abs(Object.values(w).reduce((a, b) => a + b, 0) - 1) <=
      WEIGHT_SUM_TOLERANCE,
    "Ranking weights must sum to 1.0"
  ).default(DEFAULT_WEIGHTS),
  celebrity_threshold: z.number().int().positive().default(5_000_000),
  unknown_size_multiplier: z.number().min(0.3).max(0.4).default(0.35),
  min_niche_confidence: z.number().min(0).max(1).default(0.3),
  suggestion_variance_floor: z.number().nonnegative().default(0.001),
  niche_scores: NicheScoresSchema.default({}),
});

const DataSchema = z.object({
  candidates: z.string().default("data/candidates.json"),
  niche_taxonomy: z.string().default("data/niche_taxonomy.yaml"),
  brand_intelligence: z.string().default("data/brand_intelligence.yaml"),
  gender_signals: z.string().default("data/gender_signals.json"),
  country_codes: z.string().default("data/country_codes.json"),
});

const BriefParserSchema = z.object({
  model: z.string().default("claude-sonnet-4-6"),
  min_confidence: z.number().min(0).max(1).default(0.4),
});

export const CreatorMatchConfigSchema = z.object({
  provider: ProviderSchema,
  retry: RetrySchema.default({}),
  search: SearchSchema.default({}),
  filters: FiltersSchema.default({}),
  ranking: RankingSchema.default({}),
  data: DataSchema.default({}),
  brief_parser: BriefParserSchema.default({}),
});

export type CreatorMatchConfig = z.infer<typeof CreatorMatchConfigSchema>;
export type WeightsInput = z.infer<typeof WeightsSchema>;

export function parseConfig(yamlContent: string): CreatorMatchConfig {
  const raw = parseYaml(yamlContent);
  return CreatorMatchConfigSchema.parse(raw);
}

export function loadConfig(filePath: string): CreatorMatchConfig {
  const content = readFileSync(filePath, "utf-8");
  return parseConfig(content);
}

export { DEFAULT_WEIGHTS };
