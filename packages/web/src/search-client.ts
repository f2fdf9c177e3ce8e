/**
 * Brave Search Client
 * Discovery client with request pacing, schema validation and a single 429 retry
 */

import {
  getBaseConfig,
  logger,
  ConfigError,
  NetworkError,
  SearchError,
  MAX_SEARCH_RESULTS,
  type ChildLogger,
} from "@deepsearch/core";
import {
  BraveSearchResponseSchema,
  normalizeBraveResult,
  type DiscoveryRecord,
} from "./types.js";
import { sleep, withSingleRetry } from "./retry.js";

const BRAVE_BASE_URL = "https://api.search.brave.com/res/v1/web/search";

// Free tier allows one request per second
const MIN_REQUEST_INTERVAL_MS = 1100;
const RATE_LIMIT_DELAY_MS = 2000;

export interface HttpResponseLike {
  ok: boolean;
  status: number;
  text(): Promise<string>;
  json(): Promise<unknown>;
}

export type FetchLike = (
  url: string,
  init: { headers: Record<string, string> }
) => Promise<HttpResponseLike>;

export interface BraveSearchOptions {
  apiKey?: string;
  baseUrl?: string;
  minIntervalMs?: number;
  rateLimitDelayMs?: number;
  fetch?: FetchLike;
  sleep?: (ms: number) => Promise<void>;
  now?: () => number;
}

/**
 * Brave Search API Client
 */
export class BraveSearchClient {
  private readonly log: ChildLogger;
  private readonly apiKey: string;
  private readonly baseUrl: string;
  private readonly minIntervalMs: number;
  private readonly rateLimitDelayMs: number;
  private readonly fetchImpl: FetchLike;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly now: () => number;

  private lastRequestAt: number | null = null;

  constructor(options: BraveSearchOptions = {}) {
    const apiKey = options.apiKey ?? getBaseConfig().brave.apiKey;
    if (!apiKey) {
      throw new ConfigError("BRAVE_API_KEY must be provided or set in the environment");
    }

    this.apiKey = apiKey;
    this.baseUrl = options.baseUrl ?? BRAVE_BASE_URL;
    this.minIntervalMs = options.minIntervalMs ?? MIN_REQUEST_INTERVAL_MS;
    this.rateLimitDelayMs = options.rateLimitDelayMs ?? RATE_LIMIT_DELAY_MS;
    this.fetchImpl = options.fetch ?? ((input, init) => fetch(input, init));
    this.sleep = options.sleep ?? sleep;
    this.now = options.now ?? Date.now;
    this.log = logger.child({ component: "brave-search" });
  }

  /**
   * Search the web. A 429 is retried once after a short pause;
   * any other failure, or a second 429, propagates.
   */
  async search(query: string, count: number = MAX_SEARCH_RESULTS): Promise<DiscoveryRecord[]> {
    return withSingleRetry(() => this.searchOnce(query, count), {
      delayMs: this.rateLimitDelayMs,
      shouldRetry: (error) => error instanceof SearchError && error.rateLimited,
      sleep: this.sleep,
      log: this.log,
      meta: { query },
    });
  }

  /**
   * Discoverer capability
   */
  async discover(query: string, count: number): Promise<DiscoveryRecord[]> {
    return this.search(query, count);
  }

  /**
   * Keep requests at least minIntervalMs apart. The slot is reserved before
   * sleeping so concurrent callers queue behind each other.
   */
  private async waitForRateLimit(): Promise<void> {
    const now = this.now();
    const slot =
      this.lastRequestAt === null ? now : Math.max(now, this.lastRequestAt + this.minIntervalMs);
    this.lastRequestAt = slot;

    if (slot > now) {
      await this.sleep(slot - now);
    }
  }

  private buildUrl(query: string, count: number): string {
    const params = new URLSearchParams({
      q: query,
      count: String(Math.max(1, Math.min(count, MAX_SEARCH_RESULTS))),
    });
    return `${this.baseUrl}?${params.toString()}`;
  }

  private async searchOnce(query: string, count: number): Promise<DiscoveryRecord[]> {
    await this.waitForRateLimit();

    const url = this.buildUrl(query, count);
    this.log.debug("Search request", { query, count });

    try {
      const response = await this.fetchImpl(url, {
        headers: {
          Accept: "application/json",
          "Accept-Encoding": "gzip",
          "X-Subscription-Token": this.apiKey,
        },
      });

      if (!response.ok) {
        const errorText = await response.text();
        throw new SearchError(`Brave Search API error (${response.status}): ${errorText}`, {
          statusCode: response.status,
          query,
        });
      }

      const parsed = BraveSearchResponseSchema.safeParse(await response.json());
      if (!parsed.success) {
        const issue = parsed.error.issues[0];
        throw new SearchError(
          `Unexpected Brave Search response: ${issue ? `${issue.path.join(".")}: ${issue.message}` : "invalid payload"}`,
          { query }
        );
      }

      const results = (parsed.data.web?.results ?? []).map(normalizeBraveResult);
      this.log.debug("Search complete", { query, results: results.length });
      return results;
    } catch (error) {
      if (error instanceof SearchError) throw error;

      if (error instanceof Error) {
        throw new NetworkError(`Failed to reach Brave Search: ${error.message}`, error);
      }

      throw new SearchError(`Brave Search request failed: ${String(error)}`, { query });
    }
  }
}

/**
 * Create a Brave Search client
 */
export function createBraveSearchClient(options?: BraveSearchOptions): BraveSearchClient {
  return new BraveSearchClient(options);
}
