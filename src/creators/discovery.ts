import * as core from "@actions/core";
import type { NicheTaxonomy } from "../intel/niche_taxonomy.js";
import type { CampaignQuery } from "../query/types.js";
import type { CandidateStore } from "./store.js";
import type { CreatorRecord } from "./types.js";

export interface DiscoveryResult {
  pool: CreatorRecord[];
  tiers: { niche: number; keyword: number; generic: number };
}

/**
 * Fills the pool tier by tier: campaign niche and its related niches, then
 * topic and search keywords, then the generic fallback. Earlier tiers keep
 * their place; later tiers only add creators not seen yet.
 */
export async function discoverCandidates(
  store: CandidateStore,
  query: CampaignQuery,
  taxonomy: NicheTaxonomy,
  poolSize: number
): Promise<DiscoveryResult> {
  const pool: CreatorRecord[] = [];
  const seen = new Set<string>();
  const tiers = { niche: 0, keyword: 0, generic: 0 };

  const add = (records: CreatorRecord[], tier: keyof typeof tiers) => {
    for (const record of records) {
      if (pool.length >= poolSize) return;
      if (!record.isActive || seen.has(record.id)) continue;
      seen.add(record.id);
      pool.push(record);
      tiers[tier]++;
    }
  };

  if (query.niche.campaignNiche) {
    const niches = taxonomy.allowedNiches(query.niche.campaignNiche);
    core.debug(`Niche tier: ${niches.join(", ")}`);
    add(await store.queryByNiche(niches, poolSize), "niche");
  }

  const keywords = [...new Set([...query.niche.topics, ...query.searchKeywords])];
  if (pool.length < poolSize && keywords.length > 0) {
    add(await store.queryByKeyword(keywords, poolSize), "keyword");
  }

  if (pool.length < poolSize) {
    add(await store.queryGeneric(poolSize), "generic");
  }

  return { pool, tiers };
}
