import * as core from "@actions/core";
import { readFileSync } from "node:fs";
import { parse as parseYaml } from "yaml";
import { z } from "zod";

const keyList = z
  .array(z.string())
  .default([])
  .transform((list) => list.map((v) => v.trim().toLowerCase()).filter(Boolean));

const NicheSchema = z.object({
  keywords: keyList,
  aliases: keyList,
  related_niches: keyList,
  conflicting_niches: keyList,
  parent_category: z.string().nullable().default(null),
});

const TaxonomyFileSchema = z.object({
  niches: z.record(z.string(), NicheSchema).default({}),
});

export interface NicheInfo {
  key: string;
  keywords: readonly string[];
  aliases: readonly string[];
  related: readonly string[];
  conflicting: readonly string[];
  parent: string | null;
}

export interface NicheDetection {
  niche: string | null;
  matchedKeywords: string[];
  /** Share of all keyword evidence that points at the winning niche. */
  confidence: number;
}

// Bio text is written by the creator and weighs more than provider-assigned interests.
const BIO_WEIGHT = 3;
const INTERESTS_WEIGHT = 2;
const MAX_HITS_PER_FIELD = 3;

function countOccurrences(text: string, keyword: string): number {
  let count = 0;
  let from = text.indexOf(keyword);
  while (from !== -1 && count < MAX_HITS_PER_FIELD) {
    count++;
    from = text.indexOf(keyword, from + keyword.length);
  }
  return count;
}

export class NicheTaxonomy {
  private readonly niches = new Map<string, NicheInfo>();
  private readonly aliasIndex = new Map<string, string>();

  constructor(niches: Iterable<NicheInfo>) {
    for (const niche of niches) {
      this.niches.set(niche.key, Object.freeze(niche));
    }
    for (const niche of this.niches.values()) {
      for (const alias of niche.aliases) {
        if (!this.niches.has(alias)) this.aliasIndex.set(alias, niche.key);
      }
    }
  }

  static parse(yamlContent: string): NicheTaxonomy {
    const file = TaxonomyFileSchema.parse(parseYaml(yamlContent) ?? {});
    return new NicheTaxonomy(
      Object.entries(file.niches).map(([key, n]) => ({
        key: key.toLowerCase(),
        keywords: n.keywords,
        aliases: n.aliases,
        related: n.related_niches,
        conflicting: n.conflicting_niches,
        parent: n.parent_category,
      }))
    );
  }

  get size(): number {
    return this.niches.size;
  }

  /** Canonical key for a niche name or one of its aliases. */
  resolve(name: string | null): string | null {
    if (!name) return null;
    const key = name.trim().toLowerCase();
    if (this.niches.has(key)) return key;
    return this.aliasIndex.get(key) ?? null;
  }

  get(name: string | null): NicheInfo | null {
    const key = this.resolve(name);
    return key ? this.niches.get(key) ?? null : null;
  }

  /** The niche itself plus its related niches, used to widen discovery. */
  allowedNiches(name: string): string[] {
    const niche = this.get(name);
    if (!niche) return [name.trim().toLowerCase()];
    return [niche.key, ...niche.related.filter((r) => r !== niche.key)];
  }

  /**
   * Keyword scan over bio and interests. Multi-word keywords count once per
   * word so "padel player" outweighs a bare "padel". Ties go to the niche
   * listed first in the taxonomy.
   */
  detect(interests: readonly string[], bio: string | null): NicheDetection {
    const fields: Array<[string, number]> = [
      [(bio ?? "").toLowerCase(), BIO_WEIGHT],
      [interests.join(" ").toLowerCase(), INTERESTS_WEIGHT],
    ];

    let total = 0;
    let best: { key: string; score: number; keywords: string[] } | null = null;

    for (const niche of this.niches.values()) {
      let score = 0;
      const matched: string[] = [];
      for (const keyword of niche.keywords) {
        let keywordScore = 0;
        for (const [text, weight] of fields) {
          if (!text) continue;
          keywordScore += countOccurrences(text, keyword) * weight * keyword.split(" ").length;
        }
        if (keywordScore > 0) {
          score += keywordScore;
          matched.push(keyword);
        }
      }
      if (score === 0) continue;
      total += score;
      if (!best || score > best.score) best = { key: niche.key, score, keywords: matched };
    }

    if (!best) return { niche: null, matchedKeywords: [], confidence: 0 };
    return {
      niche: best.key,
      matchedKeywords: best.keywords,
      confidence: Math.round((best.score / total) * 1000) / 1000,
    };
  }
}

export function loadNicheTaxonomy(filePath: string): NicheTaxonomy {
  const taxonomy = NicheTaxonomy.parse(readFileSync(filePath, "utf-8"));
  core.info(`Loaded ${taxonomy.size} niches from ${filePath}`);
  return taxonomy;
}
