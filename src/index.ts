import * as core from "@actions/core";
import { AnthropicBriefParser } from "./brief/parser.js";
import { loadConfig } from "./config.js";
import { JsonCandidateStore } from "./creators/store.js";
import { loadGenderSignals } from "./filter/gender.js";
import { loadBrandGraph } from "./intel/brand_graph.js";
import { loadNicheTaxonomy } from "./intel/niche_taxonomy.js";
import { HttpMetricsGateway } from "./metrics/gateway.js";
import { loadCountryCodes } from "./metrics/normalize.js";
import { formatReport } from "./output/report.js";
import { runSearch } from "./pipeline.js";
import type { CreatorMatchConfig } from "./config.js";
import { loadCampaignQuery } from "./query/schema.js";
import type { CampaignQuery } from "./query/types.js";

async function readQuery(config: CreatorMatchConfig): Promise<CampaignQuery> {
  const defaults = {
    minCredibility: config.filters.min_credibility,
    minSpainAudiencePct: config.filters.min_spain_audience_pct,
  };

  const queryPath = core.getInput("query_path");
  if (queryPath) {
    core.info(`Loading campaign query from ${queryPath}`);
    return loadCampaignQuery(queryPath, defaults);
  }

  const brief = core.getInput("brief");
  if (!brief) throw new Error("Either query_path or brief must be provided");
  core.info("Parsing campaign brief...");
  return new AnthropicBriefParser(config).parse(brief);
}

function parseTopN(raw: string): number | undefined {
  if (!raw) return undefined;
  const value = Number(raw);
  if (!Number.isInteger(value) || value < 1 || value > 50) {
    throw new Error(`top_n must be an integer between 1 and 50, got "${raw}"`);
  }
  return value;
}

async function run(): Promise<void> {
  try {
    const configPath = core.getInput("config_path");
    const saveStore = core.getInput("save_store") === "true";

    core.info(`Loading config from ${configPath}`);
    const config = loadConfig(configPath);
    const topN = parseTopN(core.getInput("top_n"));

    const store = JsonCandidateStore.load(config.data.candidates);
    const gateway = HttpMetricsGateway.fromConfig(
      config,
      core.getInput("metrics_api_key", { required: true }),
      loadCountryCodes(config.data.country_codes)
    );

    const query = await readQuery(config);
    const outcome = await runSearch(
      query,
      {
        store,
        gateway,
        taxonomy: loadNicheTaxonomy(config.data.niche_taxonomy),
        brands: loadBrandGraph(config.data.brand_intelligence),
        genderSignals: loadGenderSignals(config.data.gender_signals),
        config,
      },
      { topN }
    );

    if (saveStore) store.save(config.data.candidates);

    const report = formatReport(outcome);
    core.info(report);
    if (process.env.GITHUB_STEP_SUMMARY) await core.summary.addRaw(report).write();

    core.setOutput(
      "results",
      JSON.stringify(
        outcome.results.map((r) => ({
          rank: r.rankPosition,
          id: r.creator.id,
          username: r.creator.username,
          relevance_score: r.relevanceScore,
          verified: r.verification === "verified",
        }))
      )
    );
    core.setOutput("verified", outcome.stats.verified);
    core.setOutput("passed_filters", outcome.stats.passedFilters);
    core.setOutput("total_candidates", outcome.stats.totalCandidates);
  } catch (error) {
    if (error instanceof Error) {
      core.setFailed(error.message);
    } else {
      core.setFailed("An unexpected error occurred");
    }
  }
}

void run();
