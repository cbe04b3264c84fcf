import type { SearchOutcome, VerificationStats } from "../pipeline.js";
import type { RankedResult } from "../ranking/engine.js";
import { FACTORS, type FactorName } from "../ranking/weights.js";

const FACTOR_LABELS: Record<FactorName, string> = {
  engagement: "Eng",
  credibility: "Cred",
  audienceMatch: "Aud",
  brandAffinity: "Brand",
  creativeFit: "Creative",
  geography: "Geo",
  growth: "Growth",
  nicheMatch: "Niche",
};

function escapeTableCell(value: string): string {
  return value.replace(/\|/g, "\\|").replace(/\r?\n/g, " ");
}

function formatFollowers(count: number | null): string {
  if (count === null || count <= 0) return "unknown";
  if (count >= 1_000_000) return `${(count / 1_000_000).toFixed(1)}M`;
  if (count >= 1_000) return `${(count / 1_000).toFixed(1)}K`;
  return String(count);
}

function buildResultsTable(results: readonly RankedResult[]): string {
  if (results.length === 0) return "_No creators matched this campaign._";

  const header = [
    "#",
    "Creator",
    "Followers",
    "Score",
    ...FACTORS.map((f) => FACTOR_LABELS[f]),
    "Size",
    "Verified",
    "Notes",
  ];
  const lines = [`| ${header.join(" | ")} |`, `|${header.map(() => "---").join("|")}|`];

  for (const r of results) {
    const notes = [`niche: ${r.nicheMatchType}`];
    if (r.brandWarning) notes.push(r.brandWarning.message);
    const cells = [
      String(r.rankPosition),
      `@${r.creator.username}`,
      formatFollowers(r.creator.followerCount),
      r.relevanceScore.toFixed(4),
      ...FACTORS.map((f) => r.scores[f].toFixed(2)),
      `×${r.sizeMultiplier.toFixed(2)}`,
      r.verification === "verified" ? "yes" : "no",
      notes.join("; "),
    ];
    lines.push(`| ${cells.map(escapeTableCell).join(" | ")} |`);
  }
  return lines.join("\n");
}

function buildStatsSection(stats: VerificationStats): string {
  const lines = [
    `- Candidates discovered: ${stats.totalCandidates}`,
    `- Pre-filtered for verification: ${stats.preFiltered}`,
    `- Verified: ${stats.verified} (${stats.fromCache} from cache, ${stats.apiCalls} API calls)`,
    `- Failed verification: ${stats.failedVerification}`,
    `- Not found: ${stats.notFound}`,
    `- Skipped (budget): ${stats.skipped}`,
    `- Timed out: ${stats.timedOut}`,
    `- Passed filters: ${stats.passedFilters}`,
  ];

  const rejections = Object.entries(stats.rejections)
    .filter(([, count]) => count !== undefined && count > 0)
    .map(([reason, count]) => `${reason} ${count}`);
  if (rejections.length > 0) lines.push(`- Rejected: ${rejections.join(", ")}`);
  if (stats.degraded) {
    lines.push("- **Metrics provider unavailable**: results are ranked on stored data only");
  }
  if (stats.followerRangeRelaxed) {
    lines.push("- Follower range relaxed: no candidate fell inside it");
  }
  return lines.join("\n");
}

export function formatReport(outcome: SearchOutcome): string {
  return [
    `## Creator matches`,
    ``,
    buildResultsTable(outcome.results),
    ``,
    `_Ranking weights: ${outcome.weightsSource}_`,
    ``,
    `### Funnel`,
    ``,
    buildStatsSection(outcome.stats),
    ``,
  ].join("\n");
}

export { buildResultsTable, buildStatsSection, escapeTableCell, formatFollowers };
