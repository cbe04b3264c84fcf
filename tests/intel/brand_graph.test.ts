import { describe, it, expect, vi } from "vitest";
import { fileURLToPath } from "node:url";
import { AFFINITY_SCORES, BrandGraph, loadBrandGraph } from "../../src/intel/brand_graph.js";

vi.mock("@actions/core", () => ({
  info: vi.fn(),
}));

const BRANDS = `
brands:
  bullpadel:
    name: Bullpadel
    category: sports
    instagram_handles: ["@Bullpadel", bullpadel_es]
    competitors: [head, babolat]
    conflict_severity: high
    ambassadors:
      - { username: lucia_smash, relationship: ambassador, since: 2021 }
      - { username: pablo_bandeja, relationship: lifetime_deal, since: "2018" }
      - { username: eva_drop, relationship: sponsored }
  head:
    name: HEAD
    instagram_handles: [headpadel]
    competitors: [bullpadel]
    conflict_severity: low
    ambassadors:
      - { username: "@Carla_Vibora" }
  babolat:
    name: Babolat
    competitors: [bullpadel]
  loreal:
    name: "L'Oréal Paris"
    instagram_handles: [lorealparis]
`;

const graph = BrandGraph.parse(BRANDS);
const bullpadel = graph.get("bullpadel");

describe("BrandGraph.get", () => {
  it("finds brands by key, handle and display name", () => {
    expect(bullpadel?.name).toBe("Bullpadel");
    expect(graph.get("@bullpadel_es")?.key).toBe("bullpadel");
    expect(graph.get("HEAD")?.key).toBe("head");
    expect(graph.get("L'Oréal Paris")?.key).toBe("loreal");
  });

  it("returns null for unknown or empty names", () => {
    expect(graph.get("acme")).toBeNull();
    expect(graph.get(null)).toBeNull();
  });
});

describe("competitors", () => {
  it("collects competitor keys and their handles", () => {
    expect(bullpadel && [...graph.competitorHandles(bullpadel)]).toEqual([
      "head",
      "headpadel",
      "babolat",
    ]);
  });

  it("names competitor brands a creator represents", () => {
    expect(bullpadel && graph.competitorAmbassadorships("carla_vibora", bullpadel)).toEqual([
      "HEAD",
    ]);
    expect(bullpadel && graph.competitorAmbassadorships("lucia_smash", bullpadel)).toEqual([]);
  });
});

describe("affinity", () => {
  it("is neutral for a brand outside the graph", () => {
    expect(graph.affinity("lucia_smash", ["head"], "acme")).toEqual({
      score: AFFINITY_SCORES.neutral,
      warning: null,
    });
  });

  it("penalises a competitor ambassador the most", () => {
    expect(graph.affinity("carla_vibora", ["bullpadel"], "bullpadel")).toEqual({
      score: 0.05,
      warning: {
        kind: "competitor_conflict",
        message: "Known ambassador for competitor(s): HEAD",
      },
    });
  });

  it("scores competitor mentions by conflict severity", () => {
    expect(graph.affinity("fan", ["@HeadPadel"], "bullpadel")).toEqual({
      score: 0.25,
      warning: {
        kind: "competitor_conflict",
        message: "Has mentioned competitor brand(s): headpadel",
      },
    });
    expect(graph.affinity("fan", ["bullpadel"], "head").score).toBe(0.45);
  });

  it("flags saturation for existing partners", () => {
    expect(graph.affinity("pablo_bandeja", [], "bullpadel")).toEqual({
      score: 0.35,
      warning: { kind: "saturation", message: "Already Bullpadel lifetime_deal since 2018" },
    });
    expect(graph.affinity("lucia_smash", [], "@bullpadel").warning?.message).toBe(
      "Already Bullpadel ambassador since 2021"
    );
    expect(graph.affinity("lucia_smash", [], "bullpadel").score).toBe(0.4);
    expect(graph.affinity("eva_drop", [], "bullpadel")).toEqual({
      score: 0.45,
      warning: { kind: "saturation", message: "Already Bullpadel sponsored" },
    });
  });

  it("rewards a prior mention of the target brand", () => {
    expect(graph.affinity("fan", ["bullpadel_es"], "bullpadel")).toEqual({
      score: 0.75,
      warning: null,
    });
  });

  it("is neutral without any relationship", () => {
    expect(graph.affinity("fan", [], "bullpadel").score).toBe(0.5);
  });
});

describe("loadBrandGraph", () => {
  it("loads the bundled brand intelligence", () => {
    const bundled = loadBrandGraph(
      fileURLToPath(new URL("../../data/brand_intelligence.yaml", import.meta.url))
    );
    const nike = bundled.get("nike");
    expect(nike?.conflictSeverity).toBe("high");
    expect(nike && bundled.competitorAmbassadorships("golazo_diez", nike)).toEqual(["adidas"]);
  });
});
