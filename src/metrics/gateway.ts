import * as core from "@actions/core";
import { z } from "zod";
import type { CreatorMatchConfig } from "../config.js";
import type { Platform } from "../creators/types.js";
import { MetricsApiError } from "./errors.js";
import { MediaKitSchema, normalizeMediaKit, type MetricsDetail } from "./normalize.js";
import {
  parseRetryAfter,
  realSleeper,
  retryPolicyFromConfig,
  withRetry,
  type RetryPolicy,
  type Sleeper,
} from "./retry.js";

export interface ProfileSummary {
  /** Direct-fetch token, null when the provider gave no media-kit URL. */
  token: string | null;
  username: string;
  displayName: string | null;
  followers: number | null;
}

/**
 * The two calls the pipeline makes against the metrics provider. Each call
 * is one logical request; retries happen inside it.
 */
export interface MetricsGateway {
  lookup(query: string, cap: number, signal?: AbortSignal): Promise<ProfileSummary[]>;
  fetchDetail(token: string, signal?: AbortSignal): Promise<MetricsDetail>;
}

const PLATFORM_TYPES: Record<Platform, number> = {
  instagram: 2,
  tiktok: 6,
};

const MAX_LOOKUP_LIMIT = 50;

const SummarySchema = z.object({
  username: z.string().min(1),
  display_name: z.string().nullable().optional().catch(null),
  audience_size: z.number().nullable().optional().catch(null),
  mediakit_url: z.string().nullable().optional().catch(null),
});

const SearchResponseSchema = z.object({ response: z.array(z.unknown()) });

const DetailResponseSchema = z.object({ response: MediaKitSchema });

/** Last path segment of a media-kit URL, e.g. `https://host/instagram/<token>`. */
export function extractToken(mediakitUrl: string | null | undefined): string | null {
  if (!mediakitUrl) return null;
  try {
    const parts = new URL(mediakitUrl).pathname.split("/").filter(Boolean);
    return parts.length >= 2 ? parts[parts.length - 1] : null;
  } catch {
    return null;
  }
}

export interface HttpMetricsGatewayOptions {
  baseUrl: string;
  apiKey: string;
  platform: Platform;
  timeoutMs: number;
  retry: RetryPolicy;
  countryCodes: Readonly<Record<string, string>>;
  fetchFn?: typeof fetch;
  sleep?: Sleeper;
  random?: () => number;
}

export class HttpMetricsGateway implements MetricsGateway {
  private readonly baseUrl: string;
  private readonly fetchFn: typeof fetch;
  private readonly sleep: Sleeper;

  constructor(private readonly options: HttpMetricsGatewayOptions) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, "");
    this.fetchFn = options.fetchFn ?? fetch;
    this.sleep = options.sleep ?? realSleeper;
  }

  static fromConfig(
    config: CreatorMatchConfig,
    apiKey: string,
    countryCodes: Readonly<Record<string, string>>,
    fetchFn: typeof fetch = fetch
  ): HttpMetricsGateway {
    return new HttpMetricsGateway({
      baseUrl: config.provider.base_url,
      apiKey,
      platform: config.provider.platform,
      timeoutMs: config.provider.request_timeout_ms,
      retry: retryPolicyFromConfig(config.retry),
      countryCodes,
      fetchFn,
    });
  }

  async lookup(query: string, cap: number, signal?: AbortSignal): Promise<ProfileSummary[]> {
    const url = new URL(`${this.baseUrl}/media-kits`);
    url.searchParams.set("platform_type", String(PLATFORM_TYPES[this.options.platform]));
    url.searchParams.set("search", query);
    url.searchParams.set("limit", String(Math.min(cap, MAX_LOOKUP_LIMIT)));

    const body = await this.request(url.href, `lookup "${query}"`, signal);
    const parsed = SearchResponseSchema.safeParse(body);
    if (!parsed.success) {
      core.warning(`Malformed lookup response for "${query}"`);
      return [];
    }

    const summaries: ProfileSummary[] = [];
    for (const item of parsed.data.response) {
      const summary = SummarySchema.safeParse(item);
      if (!summary.success) continue;
      summaries.push({
        token: extractToken(summary.data.mediakit_url),
        username: summary.data.username,
        displayName: summary.data.display_name ?? null,
        followers: summary.data.audience_size ?? null,
      });
    }
    return summaries.slice(0, cap);
  }

  async fetchDetail(token: string, signal?: AbortSignal): Promise<MetricsDetail> {
    const platformType = PLATFORM_TYPES[this.options.platform];
    const url = `${this.baseUrl}/media-kits/${platformType}/${encodeURIComponent(token)}`;

    const body = await this.request(url, `detail ${token}`, signal);
    const parsed = DetailResponseSchema.safeParse(body);
    if (!parsed.success) {
      throw new MetricsApiError(`Malformed media kit response for ${token}`, { status: 200 });
    }
    return normalizeMediaKit(parsed.data.response, this.options.platform, this.options.countryCodes);
  }

  private request(url: string, label: string, signal?: AbortSignal): Promise<unknown> {
    return withRetry(() => this.getJson(url, signal), this.options.retry, {
      sleep: this.sleep,
      random: this.options.random,
      signal,
      label,
    });
  }

  private async getJson(url: string, signal?: AbortSignal): Promise<unknown> {
    const controller = new AbortController();
    let timedOut = false;
    const timer = setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, this.options.timeoutMs);
    const onAbort = () => controller.abort(signal?.reason);
    signal?.addEventListener("abort", onAbort, { once: true });

    const started = Date.now();
    try {
      let response: Response;
      try {
        response = await this.fetchFn(url, {
          headers: {
            Authorization: `Bearer ${this.options.apiKey}`,
            Accept: "application/json",
          },
          signal: controller.signal,
        });
      } catch (error) {
        if (timedOut) {
          throw new MetricsApiError(`Request timed out after ${this.options.timeoutMs}ms`, {
            timedOut: true,
          });
        }
        if (signal?.aborted) throw error;
        throw new MetricsApiError(
          `Request failed: ${error instanceof Error ? error.message : String(error)}`
        );
      }

      core.info(`Metrics API: GET ${url} -> ${response.status} (${Date.now() - started}ms)`);

      if (!response.ok) {
        throw new MetricsApiError(`GET ${url} failed with status ${response.status}`, {
          status: response.status,
          retryAfterMs: parseRetryAfter(response.headers.get("retry-after")),
        });
      }

      try {
        return await response.json();
      } catch (error) {
        throw new MetricsApiError(
          `Invalid JSON from ${url}: ${error instanceof Error ? error.message : String(error)}`,
          { status: response.status }
        );
      }
    } finally {
      clearTimeout(timer);
      signal?.removeEventListener("abort", onAbort);
    }
  }
}
