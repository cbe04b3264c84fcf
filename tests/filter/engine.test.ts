import { describe, it, expect, vi } from "vitest";
import * as core from "@actions/core";
import { applyFilters, inFollowerRange, rejectionReason, type FilterContext } from "../../src/filter/engine.js";
import { parseGenderSignals } from "../../src/filter/gender.js";
import type { Candidate, CreatorRecord } from "../../src/creators/types.js";
import { BrandGraph } from "../../src/intel/brand_graph.js";
import type { CampaignQueryInput } from "../../src/query/schema.js";
import { makeCreator, makeQuery, unverified, type CreatorOverrides } from "../helpers.js";

vi.mock("@actions/core", () => ({
  info: vi.fn(),
  warning: vi.fn(),
  debug: vi.fn(),
}));

const brands = BrandGraph.parse(`
brands:
  bullpadel:
    name: Bullpadel
    competitors: [head]
  head:
    name: HEAD
    ambassadors:
      - { username: carla_vibora }
`);

const genderSignals = parseGenderSignals(
  JSON.stringify({
    female_names: ["lucia"],
    male_names: ["pablo"],
    female_bio_signals: [],
    male_bio_signals: [],
  })
);

function context(raw: CampaignQueryInput = {}): FilterContext {
  return { query: makeQuery(raw), brands, genderSignals, countryFallbackPct: 60 };
}

function verified(creator: CreatorRecord): Candidate {
  return {
    creator,
    verification: { kind: "verified", source: "provider", verifiedAt: new Date("2026-10-18T00:00:00Z") },
  };
}

const good: CreatorOverrides["metrics"] = {
  credibilityScore: 85,
  engagementRate: 0.04,
  audienceGenders: { male: 40, female: 60 },
  audienceGeography: { ES: 70 },
};

describe("threshold checks", () => {
  it("passes a verified creator with strong metrics (scenario A)", () => {
    const a = verified(makeCreator({ id: "A", metrics: good }));
    expect(rejectionReason(a, context())).toBeNull();
  });

  it("lets an unverified creator with missing data through (scenario B)", () => {
    const b = unverified(makeCreator({ id: "B", followerCount: null }));
    expect(rejectionReason(b, context())).toBeNull();
  });

  it("rejects a verified creator whose credibility is missing", () => {
    const candidate = verified(makeCreator({ metrics: { ...good, credibilityScore: null } }));
    expect(rejectionReason(candidate, context())).toBe("credibility");
  });

  it("still holds known values to the threshold in lenient mode", () => {
    const candidate = unverified(makeCreator({ metrics: { credibilityScore: 50 } }));
    expect(rejectionReason(candidate, context())).toBe("credibility");
  });

  it("skips credibility for TikTok", () => {
    const candidate = verified(
      makeCreator({ platform: "tiktok", metrics: { ...good, credibilityScore: null } })
    );
    expect(rejectionReason(candidate, context())).toBeNull();
  });

  it("rejects a low Spain audience", () => {
    const candidate = verified(makeCreator({ metrics: { ...good, audienceGeography: { ES: 30, MX: 50 } } }));
    expect(rejectionReason(candidate, context())).toBe("spain_audience");
  });

  it("checks engagement against a percentage floor", () => {
    const candidate = verified(makeCreator({ metrics: { ...good, engagementRate: 0.015 } }));
    expect(rejectionReason(candidate, context({ thresholds: { min_engagement_pct: 2 } }))).toBe(
      "engagement"
    );
    expect(rejectionReason(candidate, context({ thresholds: { min_engagement_pct: 1 } }))).toBeNull();
  });

  it("requires the target audience gender to be the majority", () => {
    const ctx = context({ audience_gender: "female" });
    const majority = verified(makeCreator({ metrics: { ...good, audienceGenders: { male: 50, female: 50 } } }));
    const minority = verified(makeCreator({ metrics: { ...good, audienceGenders: { male: 55, female: 45 } } }));
    expect(rejectionReason(majority, ctx)).toBeNull();
    expect(rejectionReason(minority, ctx)).toBe("audience_gender");
  });
});

describe("hard filters", () => {
  it("drops excluded niches in both modes", () => {
    const ctx = context({ niche: { exclude_niches: ["Gaming"] } });
    expect(rejectionReason(unverified(makeCreator({ interests: ["gaming"] })), ctx)).toBe(
      "excluded_niche"
    );
    expect(
      rejectionReason(verified(makeCreator({ primaryNiche: "gaming", metrics: good })), ctx)
    ).toBe("excluded_niche");
  });

  it("drops competitor ambassadors only when asked", () => {
    const creator = unverified(makeCreator({ username: "carla_vibora" }));
    const brand = { name: "Bullpadel", handle: "@bullpadel" };
    expect(
      rejectionReason(creator, context({ brand, exclude_competitor_ambassadors: true }))
    ).toBe("competitor_ambassador");
    expect(rejectionReason(creator, context({ brand }))).toBeNull();
  });

  it("drops creators of the other gender and keeps unknown ones", () => {
    const ctx = context({ creator_gender: "female" });
    expect(rejectionReason(unverified(makeCreator({ displayName: "Pablo" })), ctx)).toBe(
      "creator_gender"
    );
    expect(rejectionReason(unverified(makeCreator({ displayName: "Lucia" })), ctx)).toBeNull();
    expect(rejectionReason(unverified(makeCreator({ username: "padel_daily" })), ctx)).toBeNull();
  });

  it("leaves gender to the split when one is requested", () => {
    const ctx = context({ creator_gender: "female", gender_split: { male: 1, female: 1 } });
    expect(rejectionReason(unverified(makeCreator({ displayName: "Pablo" })), ctx)).toBeNull();
  });
});

describe("inFollowerRange", () => {
  it("lets unknown reach through", () => {
    const size = { min: 10_000, max: 100_000 };
    expect(inFollowerRange(makeCreator({ followerCount: null }), size)).toBe(true);
    expect(inFollowerRange(makeCreator({ followerCount: 0 }), size)).toBe(true);
    expect(inFollowerRange(makeCreator({ followerCount: 5_000 }), size)).toBe(false);
    expect(inFollowerRange(makeCreator({ followerCount: 150_000 }), size)).toBe(false);
  });
});

describe("applyFilters", () => {
  it("keeps input order and counts the first failing rule", () => {
    const ctx = context({ niche: { exclude_niches: ["gaming"] } });
    const candidates = [
      unverified(makeCreator({ id: "1" })),
      verified(makeCreator({ id: "2", metrics: { ...good, credibilityScore: 10 } })),
      unverified(makeCreator({ id: "3", interests: ["gaming"], metrics: { credibilityScore: 10 } })),
      verified(makeCreator({ id: "4", metrics: good })),
    ];

    const result = applyFilters(candidates, ctx);

    expect(result.passed.map((c) => c.creator.id)).toEqual(["1", "4"]);
    expect(result.rejections).toEqual({ credibility: 1, excluded_niche: 1 });
    expect(result.followerRangeRelaxed).toBe(false);
  });

  it("applies the follower range after the other filters", () => {
    const ctx = context({ size: { min: 10_000, max: 100_000 } });
    const candidates = [
      unverified(makeCreator({ id: "small", followerCount: 5_000 })),
      unverified(makeCreator({ id: "fits", followerCount: 50_000 })),
      unverified(makeCreator({ id: "unknown", followerCount: null })),
    ];

    const result = applyFilters(candidates, ctx);

    expect(result.passed.map((c) => c.creator.id)).toEqual(["fits", "unknown"]);
    expect(result.rejections).toEqual({ follower_range: 1 });
  });

  it("relaxes the follower range instead of returning nothing", () => {
    const ctx = context({ size: { min: 1_000_000, max: null } });
    const candidates = [
      unverified(makeCreator({ id: "x", followerCount: 5_000 })),
      unverified(makeCreator({ id: "y", followerCount: 20_000 })),
    ];

    const result = applyFilters(candidates, ctx);

    expect(result.passed.map((c) => c.creator.id)).toEqual(["x", "y"]);
    expect(result.followerRangeRelaxed).toBe(true);
    expect(result.rejections).toEqual({});
    expect(core.warning).toHaveBeenCalledWith(
      "Follower range would remove all 2 candidates, relaxing it to ranking only"
    );
  });
});
