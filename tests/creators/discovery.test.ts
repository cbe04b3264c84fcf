import { describe, it, expect, vi } from "vitest";
import { discoverCandidates } from "../../src/creators/discovery.js";
import { JsonCandidateStore } from "../../src/creators/store.js";
import { NicheTaxonomy } from "../../src/intel/niche_taxonomy.js";
import { makeCreator, makeQuery } from "../helpers.js";

vi.mock("@actions/core", () => ({
  info: vi.fn(),
  debug: vi.fn(),
}));

const taxonomy = NicheTaxonomy.parse(`
niches:
  padel:
    keywords: [padel]
    related_niches: [tennis]
  tennis:
    keywords: [tennis]
`);

const store = new JsonCandidateStore([
  makeCreator({ id: "p1", interests: ["padel"], followerCount: 200_000 }),
  makeCreator({ id: "t1", interests: ["tennis"], followerCount: 150_000 }),
  makeCreator({ id: "k1", bio: "Madrid lifestyle", interests: ["lifestyle"], followerCount: 90_000 }),
  makeCreator({ id: "g1", interests: ["cooking"], followerCount: 500_000 }),
  makeCreator({ id: "p2", interests: ["padel"], followerCount: 900_000, isActive: false }),
]);

describe("discoverCandidates", () => {
  it("fills the pool tier by tier without duplicates", async () => {
    const query = makeQuery({
      niche: { campaign_niche: "padel", topics: ["madrid"] },
      search_keywords: ["marathon"],
    });

    const { pool, tiers } = await discoverCandidates(store, query, taxonomy, 200);

    expect(pool.map((c) => c.id)).toEqual(["p1", "t1", "k1", "g1"]);
    expect(tiers).toEqual({ niche: 2, keyword: 1, generic: 1 });
  });

  it("stops at the pool size", async () => {
    const query = makeQuery({ niche: { campaign_niche: "padel", topics: ["madrid"] } });

    const { pool, tiers } = await discoverCandidates(store, query, taxonomy, 2);

    expect(pool.map((c) => c.id)).toEqual(["p1", "t1"]);
    expect(tiers).toEqual({ niche: 2, keyword: 0, generic: 0 });
  });

  it("falls back to the generic tier for an open query", async () => {
    const { pool, tiers } = await discoverCandidates(store, makeQuery(), taxonomy, 200);

    expect(pool.map((c) => c.id)).toEqual(["g1", "p1", "t1", "k1"]);
    expect(tiers).toEqual({ niche: 0, keyword: 0, generic: 4 });
  });

  it("skips the keyword tier when the niche tier fills the pool", async () => {
    const spy = new JsonCandidateStore([
      makeCreator({ id: "p1", interests: ["padel"] }),
    ]);
    const queryByKeyword = vi.spyOn(spy, "queryByKeyword");

    await discoverCandidates(spy, makeQuery({ niche: { campaign_niche: "padel", topics: ["x"] } }), taxonomy, 1);

    expect(queryByKeyword).not.toHaveBeenCalled();
  });
});
