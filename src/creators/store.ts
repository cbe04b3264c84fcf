import * as core from "@actions/core";
import { readFileSync, writeFileSync } from "node:fs";
import { z } from "zod";
import { compareIds, creatorTags, normalizeTag, searchableText } from "./signals.js";
import type { CreatorRecord } from "./types.js";

/**
 * Local repository of previously ingested creators. Queries never touch the
 * network and never return inactive profiles.
 */
export interface CandidateStore {
  queryByNiche(niches: readonly string[], limit: number): Promise<CreatorRecord[]>;
  queryByKeyword(keywords: readonly string[], limit: number): Promise<CreatorRecord[]>;
  queryGeneric(limit: number): Promise<CreatorRecord[]>;
  get(id: string): Promise<CreatorRecord | null>;
  update(record: CreatorRecord): Promise<void>;
}

const percentMap = z.record(z.string(), z.number()).nullable().default(null);

const StoredMetricsSchema = z.object({
  credibility_score: z.number().nullable().default(null),
  engagement_rate: z.number().nullable().default(null),
  growth_rate_6m: z.number().nullable().default(null),
  audience_genders: z
    .object({ male: z.number(), female: z.number() })
    .nullable()
    .default(null),
  audience_ages: percentMap,
  audience_geography: percentMap,
});

const StoredCreatorSchema = z.object({
  id: z.string().min(1),
  platform: z.enum(["instagram", "tiktok"]).default("instagram"),
  username: z.string().min(1),
  display_name: z.string().nullable().default(null),
  bio: z.string().nullable().default(null),
  follower_count: z.number().int().nonnegative().nullable().default(null),
  interests: z.array(z.string()).default([]),
  primary_niche: z.string().nullable().default(null),
  niche_confidence: z.number().min(0).max(1).nullable().default(null),
  country: z.string().nullable().default(null),
  gender: z.enum(["male", "female"]).nullable().default(null),
  brand_mentions: z.array(z.string()).default([]),
  metrics: StoredMetricsSchema.default({}),
  verified_at: z.string().datetime({ offset: true }).nullable().default(null),
  metrics_complete: z.boolean().default(false),
  external_id: z.string().nullable().default(null),
  is_active: z.boolean().default(true),
});

type StoredCreator = z.infer<typeof StoredCreatorSchema>;

function fromStored(s: StoredCreator): CreatorRecord {
  return {
    id: s.id,
    platform: s.platform,
    username: s.username,
    displayName: s.display_name,
    bio: s.bio,
    followerCount: s.follower_count,
    interests: s.interests,
    primaryNiche: s.primary_niche,
    nicheConfidence: s.niche_confidence,
    country: s.country,
    gender: s.gender,
    brandMentions: s.brand_mentions,
    metrics: {
      credibilityScore: s.metrics.credibility_score,
      engagementRate: s.metrics.engagement_rate,
      growthRate6m: s.metrics.growth_rate_6m,
      audienceGenders: s.metrics.audience_genders,
      audienceAges: s.metrics.audience_ages,
      audienceGeography: s.metrics.audience_geography,
    },
    verifiedAt: s.verified_at,
    metricsComplete: s.metrics_complete,
    externalId: s.external_id,
    isActive: s.is_active,
  };
}

function toStored(r: CreatorRecord): StoredCreator {
  return {
    id: r.id,
    platform: r.platform,
    username: r.username,
    display_name: r.displayName,
    bio: r.bio,
    follower_count: r.followerCount,
    interests: r.interests,
    primary_niche: r.primaryNiche,
    niche_confidence: r.nicheConfidence,
    country: r.country,
    gender: r.gender,
    brand_mentions: r.brandMentions,
    metrics: {
      credibility_score: r.metrics.credibilityScore,
      engagement_rate: r.metrics.engagementRate,
      growth_rate_6m: r.metrics.growthRate6m,
      audience_genders: r.metrics.audienceGenders,
      audience_ages: r.metrics.audienceAges,
      audience_geography: r.metrics.audienceGeography,
    },
    verified_at: r.verifiedAt,
    metrics_complete: r.metricsComplete,
    external_id: r.externalId,
    is_active: r.isActive,
  };
}

/** Bigger reach first, unknown reach last, id as the final tie-break. */
function byReach(a: CreatorRecord, b: CreatorRecord): number {
  const diff = (b.followerCount ?? -1) - (a.followerCount ?? -1);
  return diff !== 0 ? diff : compareIds(a.id, b.id);
}

export class JsonCandidateStore implements CandidateStore {
  private readonly records = new Map<string, CreatorRecord>();

  constructor(records: Iterable<CreatorRecord> = []) {
    for (const record of records) this.records.set(record.id, record);
  }

  static parse(jsonContent: string): JsonCandidateStore {
    const stored = z.array(StoredCreatorSchema).parse(JSON.parse(jsonContent));
    return new JsonCandidateStore(stored.map(fromStored));
  }

  static load(filePath: string): JsonCandidateStore {
    const store = JsonCandidateStore.parse(readFileSync(filePath, "utf-8"));
    core.info(`Loaded ${store.size} creators from ${filePath}`);
    return store;
  }

  get size(): number {
    return this.records.size;
  }

  private active(): CreatorRecord[] {
    return [...this.records.values()].filter((r) => r.isActive);
  }

  async queryByNiche(niches: readonly string[], limit: number): Promise<CreatorRecord[]> {
    const wanted = new Set(niches.map(normalizeTag));
    if (wanted.size === 0) return [];
    return this.active()
      .filter((r) => [...creatorTags(r)].some((tag) => wanted.has(tag)))
      .sort(byReach)
      .slice(0, limit);
  }

  async queryByKeyword(keywords: readonly string[], limit: number): Promise<CreatorRecord[]> {
    const terms = [...new Set(keywords.map(normalizeTag).filter(Boolean))];
    if (terms.length === 0) return [];

    const hits = new Map<string, number>();
    for (const record of this.active()) {
      const text = `${record.username.toLowerCase()} ${(record.displayName ?? "").toLowerCase()} ${searchableText(record)}`;
      const count = terms.filter((t) => text.includes(t)).length;
      if (count > 0) hits.set(record.id, count);
    }

    return this.active()
      .filter((r) => hits.has(r.id))
      .sort((a, b) => (hits.get(b.id) ?? 0) - (hits.get(a.id) ?? 0) || byReach(a, b))
      .slice(0, limit);
  }

  async queryGeneric(limit: number): Promise<CreatorRecord[]> {
    return this.active().sort(byReach).slice(0, limit);
  }

  async get(id: string): Promise<CreatorRecord | null> {
    return this.records.get(id) ?? null;
  }

  async update(record: CreatorRecord): Promise<void> {
    this.records.set(record.id, record);
  }

  save(filePath: string): void {
    const stored = [...this.records.values()].map(toStored);
    writeFileSync(filePath, `${JSON.stringify(stored, null, 2)}\n`, "utf-8");
    core.info(`Saved ${stored.length} creators to ${filePath}`);
  }
}
