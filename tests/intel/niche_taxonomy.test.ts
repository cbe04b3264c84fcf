import { describe, it, expect, vi } from "vitest";
import { fileURLToPath } from "node:url";
import { NicheTaxonomy, loadNicheTaxonomy } from "../../src/intel/niche_taxonomy.js";

vi.mock("@actions/core", () => ({
  info: vi.fn(),
}));

const TAXONOMY = `
niches:
  padel:
    keywords: [padel, padel player]
    aliases: [paddle tennis]
    related_niches: [tennis, fitness]
    conflicting_niches: [football]
    parent_category: sports
  tennis:
    keywords: [tennis]
  fitness:
    keywords: [gym, fitness]
  football:
    keywords: [football, futbol]
    aliases: [Soccer, tennis]
`;

const taxonomy = NicheTaxonomy.parse(TAXONOMY);

describe("NicheTaxonomy.parse", () => {
  it("reads niches with defaults for missing lists", () => {
    expect(taxonomy.size).toBe(4);
    expect(taxonomy.get("padel")).toEqual({
      key: "padel",
      keywords: ["padel", "padel player"],
      aliases: ["paddle tennis"],
      related: ["tennis", "fitness"],
      conflicting: ["football"],
      parent: "sports",
    });
    expect(taxonomy.get("tennis")?.related).toEqual([]);
  });

  it("accepts an empty document", () => {
    expect(NicheTaxonomy.parse("").size).toBe(0);
  });
});

describe("resolve", () => {
  it("finds keys and aliases case-insensitively", () => {
    expect(taxonomy.resolve("PADEL")).toBe("padel");
    expect(taxonomy.resolve("soccer")).toBe("football");
    expect(taxonomy.resolve(" Paddle Tennis ")).toBe("padel");
  });

  it("never lets an alias shadow another niche", () => {
    expect(taxonomy.resolve("tennis")).toBe("tennis");
  });

  it("returns null for unknown names", () => {
    expect(taxonomy.resolve("knitting")).toBeNull();
    expect(taxonomy.resolve(null)).toBeNull();
  });
});

describe("allowedNiches", () => {
  it("widens a known niche with its related niches", () => {
    expect(taxonomy.allowedNiches("Padel")).toEqual(["padel", "tennis", "fitness"]);
  });

  it("keeps an unknown niche as is", () => {
    expect(taxonomy.allowedNiches("Knitting")).toEqual(["knitting"]);
  });
});

describe("detect", () => {
  it("weighs bio hits over interests and multi-word keywords over single words", () => {
    const detection = taxonomy.detect(["fitness"], "Padel player and padel coach");
    expect(detection).toEqual({
      niche: "padel",
      matchedKeywords: ["padel", "padel player"],
      confidence: 0.857,
    });
  });

  it("caps repeated hits per field", () => {
    const detection = taxonomy.detect(["fitness"], "padel padel padel padel padel");
    expect(detection.niche).toBe("padel");
    expect(detection.confidence).toBe(0.818);
  });

  it("gives ties to the niche listed first", () => {
    const detection = taxonomy.detect([], "tennis and fitness");
    expect(detection.niche).toBe("tennis");
    expect(detection.confidence).toBe(0.5);
  });

  it("returns no niche without keyword evidence", () => {
    expect(taxonomy.detect(["cooking"], null)).toEqual({
      niche: null,
      matchedKeywords: [],
      confidence: 0,
    });
  });
});

describe("loadNicheTaxonomy", () => {
  it("loads the bundled taxonomy", () => {
    const bundled = loadNicheTaxonomy(
      fileURLToPath(new URL("../../data/niche_taxonomy.yaml", import.meta.url))
    );
    expect(bundled.get("padel")?.conflicting).toContain("football");
    expect(bundled.resolve("soccer")).toBe("football");
  });
});
