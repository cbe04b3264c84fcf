import * as core from "@actions/core";
import type { CandidateStore } from "../creators/store.js";
import type { Candidate, CreatorRecord, UnverifiedReason } from "../creators/types.js";
import { MetricsApiError } from "../metrics/errors.js";
import type { MetricsGateway } from "../metrics/gateway.js";
import { mergeDetail } from "../metrics/normalize.js";
import { WorkerPool } from "./worker_pool.js";

export interface GateOptions {
  /** Hard cap on logical gateway calls for the whole run. */
  verifyCap: number;
  concurrency: number;
  freshnessHours: number;
  lookupResultCap: number;
  now: Date;
  signal?: AbortSignal;
}

export interface GateStats {
  fromCache: number;
  verifiedFromProvider: number;
  failed: number;
  notFound: number;
  skipped: number;
  timedOut: number;
  apiCalls: number;
  degraded: boolean;
  maxInFlight: number;
}

export interface GateResult {
  /** Deduplicated input, in input order. */
  candidates: Candidate[];
  stats: GateStats;
}

type Attempt =
  | { kind: "verified"; record: CreatorRecord; verifiedAt: Date }
  | { kind: "unverified"; reason: UnverifiedReason };

const TIMEOUT: Attempt = { kind: "unverified", reason: "timeout" };

/** When the cached metrics are complete and inside the window, the time they were verified. */
export function freshSince(record: CreatorRecord, now: Date, freshnessHours: number): Date | null {
  if (!record.metricsComplete || !record.verifiedAt) return null;
  const verifiedAt = Date.parse(record.verifiedAt);
  if (Number.isNaN(verifiedAt)) return null;
  // A timestamp ahead of the clock is not evidence of freshness.
  const age = now.getTime() - verifiedAt;
  return age >= 0 && age <= freshnessHours * 3_600_000 ? new Date(verifiedAt) : null;
}

/** Gateway calls one verification costs: direct fetch with a token, else lookup then detail. */
export function verificationCost(record: CreatorRecord): number {
  return record.externalId ? 1 : 2;
}

function untilAborted(signal: AbortSignal | undefined): Promise<Attempt> | null {
  if (!signal) return null;
  return new Promise((resolve) => {
    if (signal.aborted) resolve(TIMEOUT);
    else signal.addEventListener("abort", () => resolve(TIMEOUT), { once: true });
  });
}

export class VerificationGate {
  constructor(
    private readonly gateway: MetricsGateway,
    private readonly store: CandidateStore
  ) {}

  async verify(records: readonly CreatorRecord[], options: GateOptions): Promise<GateResult> {
    const stats: GateStats = {
      fromCache: 0,
      verifiedFromProvider: 0,
      failed: 0,
      notFound: 0,
      skipped: 0,
      timedOut: 0,
      apiCalls: 0,
      degraded: false,
      maxInFlight: 0,
    };

    // Two workers must never verify the same creator.
    const byId = new Map<string, CreatorRecord>();
    for (const record of records) {
      if (!byId.has(record.id)) byId.set(record.id, record);
    }
    const unique = [...byId.values()];

    const results = new Map<string, Candidate>();
    const planned: CreatorRecord[] = [];
    let budget = options.verifyCap;

    for (const record of unique) {
      const cachedAt = freshSince(record, options.now, options.freshnessHours);
      if (cachedAt) {
        results.set(record.id, {
          creator: record,
          verification: { kind: "verified", source: "cache", verifiedAt: cachedAt },
        });
        stats.fromCache++;
        continue;
      }
      const cost = verificationCost(record);
      if (cost <= budget) {
        budget -= cost;
        planned.push(record);
      } else {
        results.set(record.id, { creator: record, verification: { kind: "unverified", reason: "budget" } });
        stats.skipped++;
      }
    }

    core.info(
      `  ${stats.fromCache} fresh in cache, ${planned.length} to verify, ${stats.skipped} over budget`
    );

    const pool = new WorkerPool(options.concurrency);
    const abandoned = untilAborted(options.signal);
    const attempts = await pool.map(planned, (record) => {
      const work = this.attempt(record, options, stats);
      return abandoned ? Promise.race([work, abandoned]) : work;
    });
    stats.maxInFlight = pool.maxInFlight;

    const failures = attempts.filter((a) => a.kind === "unverified" && a.reason === "failed").length;
    const succeeded = attempts.filter((a) => a.kind === "verified").length;
    const notFound = attempts.filter((a) => a.kind === "unverified" && a.reason === "not_found").length;
    stats.degraded = planned.length > 0 && succeeded === 0 && notFound === 0 && failures > 0;
    if (stats.degraded) {
      core.warning(
        `Metrics provider unavailable: all ${failures} verification attempts failed, continuing with unverified data`
      );
    }

    planned.forEach((record, i) => {
      const attempt = attempts[i];
      if (attempt.kind === "verified") {
        stats.verifiedFromProvider++;
        results.set(record.id, {
          creator: attempt.record,
          verification: { kind: "verified", source: "provider", verifiedAt: attempt.verifiedAt },
        });
        return;
      }
      const reason =
        stats.degraded && attempt.reason === "failed" ? "upstream_unavailable" : attempt.reason;
      if (reason === "timeout") stats.timedOut++;
      else if (reason === "not_found") stats.notFound++;
      else stats.failed++;
      results.set(record.id, { creator: record, verification: { kind: "unverified", reason } });
    });

    return {
      candidates: unique.flatMap((r) => {
        const candidate = results.get(r.id);
        return candidate ? [candidate] : [];
      }),
      stats,
    };
  }

  private async attempt(record: CreatorRecord, options: GateOptions, stats: GateStats): Promise<Attempt> {
    const { signal } = options;
    if (signal?.aborted) return TIMEOUT;

    try {
      let token = record.externalId;
      if (!token) {
        stats.apiCalls++;
        const summaries = await this.gateway.lookup(record.username, options.lookupResultCap, signal);
        const handle = record.username.toLowerCase();
        const match = summaries.find((s) => s.username.toLowerCase() === handle);
        if (!match) {
          core.debug(`No provider profile matches @${record.username}`);
          return { kind: "unverified", reason: "not_found" };
        }
        token = match.token ?? match.username;
      }

      if (signal?.aborted) return TIMEOUT;
      stats.apiCalls++;
      const detail = await this.gateway.fetchDetail(token, signal);

      // Work that finishes after the deadline is dropped without touching the store.
      if (signal?.aborted) return TIMEOUT;
      const verifiedAt = options.now;
      const updated = mergeDetail(record, detail, token, verifiedAt);
      await this.store.update(updated);
      core.debug(`Verified @${record.username}`);
      return { kind: "verified", record: updated, verifiedAt };
    } catch (error) {
      if (signal?.aborted) return TIMEOUT;
      if (error instanceof MetricsApiError && error.status === 404) {
        return { kind: "unverified", reason: "not_found" };
      }
      core.warning(
        `Verification failed for @${record.username}: ${error instanceof Error ? error.message : String(error)}`
      );
      return { kind: "unverified", reason: "failed" };
    }
  }
}
