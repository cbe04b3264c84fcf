import { parseConfig, type CreatorMatchConfig } from "../src/config.js";
import {
  EMPTY_METRICS,
  type Candidate,
  type CreatorMetrics,
  type CreatorRecord,
  type UnverifiedReason,
} from "../src/creators/types.js";
import { parseCampaignQuery, type CampaignQueryInput } from "../src/query/schema.js";
import type { CampaignQuery } from "../src/query/types.js";

export type CreatorOverrides = Partial<Omit<CreatorRecord, "metrics">> & {
  metrics?: Partial<CreatorMetrics>;
};

export function makeCreator(overrides: CreatorOverrides = {}): CreatorRecord {
  const { metrics, ...rest } = overrides;
  return {
    id: "c-1",
    platform: "instagram",
    username: "creator_one",
    displayName: null,
    bio: null,
    followerCount: 50_000,
    interests: [],
    primaryNiche: null,
    nicheConfidence: null,
    country: null,
    gender: null,
    brandMentions: [],
    verifiedAt: null,
    metricsComplete: false,
    externalId: null,
    isActive: true,
    ...rest,
    metrics: { ...EMPTY_METRICS, ...metrics },
  };
}

export function unverified(creator: CreatorRecord, reason: UnverifiedReason = "budget"): Candidate {
  return { creator, verification: { kind: "unverified", reason } };
}

export const THRESHOLD_DEFAULTS = { minCredibility: 70, minSpainAudiencePct: 60 };

export function makeQuery(raw: CampaignQueryInput = {}): CampaignQuery {
  return parseCampaignQuery(raw, THRESHOLD_DEFAULTS);
}

export function makeConfig(extra = ""): CreatorMatchConfig {
  return parseConfig(`provider:\n  base_url: https://metrics.test/api/v1\n${extra}`);
}
