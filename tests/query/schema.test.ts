import { describe, it, expect } from "vitest";
import { fileURLToPath } from "node:url";
import { loadCampaignQuery, parseCampaignQuery } from "../../src/query/schema.js";
import { THRESHOLD_DEFAULTS } from "../helpers.js";

const fixturePath = (name: string) =>
  fileURLToPath(new URL(`../fixtures/${name}`, import.meta.url));

describe("parseCampaignQuery", () => {
  it("applies defaults for an empty query", () => {
    const query = parseCampaignQuery({}, THRESHOLD_DEFAULTS);

    expect(query.targetCount).toBe(5);
    expect(query.genderSplit).toBeNull();
    expect(query.creatorGender).toBeNull();
    expect(query.brand).toEqual({ name: null, handle: null, category: null });
    expect(query.niche).toEqual({ campaignNiche: null, topics: [], excludeNiches: [] });
    expect(query.size).toEqual({ min: null, max: null });
    expect(query.thresholds).toEqual({
      minCredibility: 70,
      minSpainAudiencePct: 60,
      minEngagementPct: null,
    });
    expect(query.excludeCompetitorAmbassadors).toBe(false);
    expect(query.rankingWeights).toBeNull();
    expect(query.confidence).toBe(1);
  });

  it("treats a null input as an empty query", () => {
    expect(parseCampaignQuery(null, THRESHOLD_DEFAULTS).targetCount).toBe(5);
  });

  it("normalizes handles, tags and the campaign niche", () => {
    const query = parseCampaignQuery(
      {
        brand: { name: "Nike", handle: "@NikeRunning" },
        creative: { tones: ["Fun", "fun", " "] },
        niche: { campaign_niche: "Running", topics: ["Trail", "trail"] },
        search_keywords: ["Marathon"],
      },
      THRESHOLD_DEFAULTS
    );

    expect(query.brand.handle).toBe("nikerunning");
    expect(query.creative.tones).toEqual(["fun"]);
    expect(query.niche.campaignNiche).toBe("running");
    expect(query.niche.topics).toEqual(["trail"]);
    expect(query.searchKeywords).toEqual(["marathon"]);
  });

  it("turns empty strings from the parser into null", () => {
    const query = parseCampaignQuery(
      { brand: { name: "", handle: "  " }, niche: { campaign_niche: "" } },
      THRESHOLD_DEFAULTS
    );
    expect(query.brand.name).toBeNull();
    expect(query.brand.handle).toBeNull();
    expect(query.niche.campaignNiche).toBeNull();
  });

  it("keeps explicit thresholds over the defaults", () => {
    const query = parseCampaignQuery(
      { thresholds: { min_credibility: 80, min_spain_audience_pct: 40, min_engagement_pct: 3 } },
      THRESHOLD_DEFAULTS
    );
    expect(query.thresholds).toEqual({
      minCredibility: 80,
      minSpainAudiencePct: 40,
      minEngagementPct: 3,
    });
  });

  it("maps snake_case weight overrides to factor names", () => {
    const query = parseCampaignQuery(
      { ranking_weights: { niche_match: 0.3, brand_affinity: 0.1 } },
      THRESHOLD_DEFAULTS
    );
    expect(query.rankingWeights).toEqual({ nicheMatch: 0.3, brandAffinity: 0.1 });
  });

  it("treats an empty weight object as no override", () => {
    const query = parseCampaignQuery({ suggested_weights: {} }, THRESHOLD_DEFAULTS);
    expect(query.suggestedWeights).toBeNull();
  });

  it("rejects a target count above 50", () => {
    expect(() => parseCampaignQuery({ target_count: 51 }, THRESHOLD_DEFAULTS)).toThrow();
  });

  it("rejects a size range with min above max", () => {
    expect(() =>
      parseCampaignQuery({ size: { min: 100_000, max: 10_000 } }, THRESHOLD_DEFAULTS)
    ).toThrow("size.min must not exceed size.max");
  });

  it("returns a frozen query", () => {
    const query = parseCampaignQuery({ niche: { topics: ["padel"] } }, THRESHOLD_DEFAULTS);
    expect(Object.isFrozen(query)).toBe(true);
    expect(Object.isFrozen(query.niche)).toBe(true);
    expect(Object.isFrozen(query.niche.topics)).toBe(true);
  });
});

describe("loadCampaignQuery", () => {
  it("reads a YAML query file", () => {
    const query = loadCampaignQuery(fixturePath("padel-query.yml"), THRESHOLD_DEFAULTS);

    expect(query.targetCount).toBe(3);
    expect(query.audienceGender).toBe("female");
    expect(query.audienceAgeBands).toEqual(["25-34", "18-24"]);
    expect(query.brand).toEqual({ name: "Bullpadel", handle: "bullpadel", category: "sports" });
    expect(query.creative.tones).toEqual(["authentic", "fun"]);
    expect(query.niche).toEqual({
      campaignNiche: "padel",
      topics: ["padel", "fitness"],
      excludeNiches: ["gaming"],
    });
    expect(query.size).toEqual({ min: 20_000, max: 500_000 });
    expect(query.thresholds.minEngagementPct).toBe(2);
    expect(query.excludeCompetitorAmbassadors).toBe(true);
    expect(query.searchKeywords).toEqual(["pádel"]);
  });
});
