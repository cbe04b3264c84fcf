import * as core from "@actions/core";
import { readFileSync } from "node:fs";
import { parse as parseYaml } from "yaml";
import { z } from "zod";

export type ConflictSeverity = "high" | "medium" | "low";

const handle = z.string().transform((v) => v.trim().replace(/^@/, "").toLowerCase());

const AmbassadorSchema = z.object({
  username: handle,
  relationship: z.string().default("ambassador"),
  since: z.union([z.string(), z.number()]).nullable().default(null),
  niche: z.string().nullable().default(null),
});

const BrandSchema = z.object({
  name: z.string().optional(),
  category: z.string().default("unknown"),
  instagram_handles: z.array(handle).default([]),
  competitors: z.array(handle).default([]),
  ambassadors: z.array(AmbassadorSchema).default([]),
  conflict_severity: z.enum(["high", "medium", "low"]).default("medium"),
});

const BrandFileSchema = z.object({
  brands: z.record(z.string(), BrandSchema).default({}),
});

export interface Ambassador {
  username: string;
  relationship: string;
  since: string | null;
  niche: string | null;
}

export interface BrandInfo {
  key: string;
  name: string;
  category: string;
  handles: readonly string[];
  competitors: readonly string[];
  ambassadors: readonly Ambassador[];
  conflictSeverity: ConflictSeverity;
}

export interface BrandWarning {
  kind: "competitor_conflict" | "saturation";
  message: string;
}

export interface BrandAffinity {
  score: number;
  warning: BrandWarning | null;
}

export const AFFINITY_SCORES = {
  neutral: 0.5,
  priorMention: 0.75,
  competitorAmbassador: 0.05,
  competitorMention: { high: 0.25, medium: 0.35, low: 0.45 },
  saturation: { lifetime_deal: 0.35, ambassador: 0.4, other: 0.45 },
} as const;

const NEUTRAL: BrandAffinity = { score: AFFINITY_SCORES.neutral, warning: null };

function stripHandle(value: string): string {
  return value.trim().replace(/^@/, "").toLowerCase();
}

export class BrandGraph {
  private readonly brands = new Map<string, BrandInfo>();
  private readonly handleIndex = new Map<string, string>();
  private readonly ambassadorIndex = new Map<string, Array<{ brand: BrandInfo; ambassador: Ambassador }>>();

  constructor(brands: Iterable<BrandInfo>) {
    for (const brand of brands) {
      this.brands.set(brand.key, brand);
      for (const h of brand.handles) this.handleIndex.set(h, brand.key);
      this.handleIndex.set(stripHandle(brand.name).replace(/\s+/g, ""), brand.key);
      for (const ambassador of brand.ambassadors) {
        const entries = this.ambassadorIndex.get(ambassador.username) ?? [];
        entries.push({ brand, ambassador });
        this.ambassadorIndex.set(ambassador.username, entries);
      }
    }
  }

  static parse(yamlContent: string): BrandGraph {
    const file = BrandFileSchema.parse(parseYaml(yamlContent) ?? {});
    return new BrandGraph(
      Object.entries(file.brands).map(([key, b]) => ({
        key: key.toLowerCase(),
        name: b.name ?? key,
        category: b.category,
        handles: b.instagram_handles,
        competitors: b.competitors,
        ambassadors: b.ambassadors.map((a) => ({
          username: a.username,
          relationship: a.relationship,
          since: a.since === null ? null : String(a.since),
          niche: a.niche,
        })),
        conflictSeverity: b.conflict_severity,
      }))
    );
  }

  get size(): number {
    return this.brands.size;
  }

  /** Looks a brand up by key, Instagram handle or display name. */
  get(keyOrHandle: string | null): BrandInfo | null {
    if (!keyOrHandle) return null;
    const key = stripHandle(keyOrHandle);
    return (
      this.brands.get(key) ??
      this.brands.get(this.handleIndex.get(key) ?? "") ??
      this.brands.get(this.handleIndex.get(key.replace(/\s+/g, "")) ?? "") ??
      null
    );
  }

  competitorHandles(brand: BrandInfo): Set<string> {
    const handles = new Set<string>();
    for (const competitorKey of brand.competitors) {
      handles.add(competitorKey);
      const competitor = this.brands.get(competitorKey);
      if (competitor) competitor.handles.forEach((h) => handles.add(h));
    }
    return handles;
  }

  ambassadorships(username: string): Array<{ brand: BrandInfo; ambassador: Ambassador }> {
    return this.ambassadorIndex.get(stripHandle(username)) ?? [];
  }

  /** Names of competitor brands that count this creator as an ambassador. */
  competitorAmbassadorships(username: string, target: BrandInfo): string[] {
    return this.ambassadorships(username)
      .filter(({ brand }) => target.competitors.includes(brand.key))
      .map(({ brand }) => brand.name);
  }

  /**
   * Competitor conflict beats saturation, saturation beats a prior mention of
   * the target brand. A brand missing from the graph is always neutral.
   */
  affinity(username: string, brandMentions: readonly string[], target: string | null): BrandAffinity {
    const brand = this.get(target);
    if (!brand) return NEUTRAL;

    const conflicts = this.competitorAmbassadorships(username, brand);
    if (conflicts.length > 0) {
      return {
        score: AFFINITY_SCORES.competitorAmbassador,
        warning: {
          kind: "competitor_conflict",
          message: `Known ambassador for competitor(s): ${conflicts.join(", ")}`,
        },
      };
    }

    const mentions = new Set(brandMentions.map(stripHandle));
    const competitorHandles = this.competitorHandles(brand);
    const mentioned = [...mentions].filter((m) => competitorHandles.has(m));
    if (mentioned.length > 0) {
      return {
        score: AFFINITY_SCORES.competitorMention[brand.conflictSeverity],
        warning: {
          kind: "competitor_conflict",
          message: `Has mentioned competitor brand(s): ${mentioned.join(", ")}`,
        },
      };
    }

    const own = this.ambassadorships(username).find((entry) => entry.brand.key === brand.key);
    if (own) {
      const { relationship, since } = own.ambassador;
      const score =
        relationship === "lifetime_deal"
          ? AFFINITY_SCORES.saturation.lifetime_deal
          : relationship === "ambassador"
            ? AFFINITY_SCORES.saturation.ambassador
            : AFFINITY_SCORES.saturation.other;
      return {
        score,
        warning: {
          kind: "saturation",
          message: `Already ${brand.name} ${relationship}${since ? ` since ${since}` : ""}`,
        },
      };
    }

    if (mentions.has(brand.key) || brand.handles.some((h) => mentions.has(h))) {
      return { score: AFFINITY_SCORES.priorMention, warning: null };
    }
    return NEUTRAL;
  }
}

export function loadBrandGraph(filePath: string): BrandGraph {
  const graph = BrandGraph.parse(readFileSync(filePath, "utf-8"));
  core.info(`Loaded ${graph.size} brands from ${filePath}`);
  return graph;
}
