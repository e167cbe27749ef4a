/**
 * SerpAPI Search Provider Implementation (Google results via SerpAPI)
 */

import type { SearchProvider } from "../../interfaces/search-provider";
import type { SearchConfig, SearchResult } from "../../models/search-result";
import { getRecencyBucket, type RecencyBucket } from "../../utils/date-filters";
import { extractDomain } from "../../utils/deduplication";
import {
  getArray,
  getNumber,
  getRecord,
  getString,
  isRecord,
} from "../../utils/json";
import { createModuleLogger } from "../../utils/logger";
import { SearchProviderError } from "./errors";
import {
  DEFAULT_SEARCH_RETRIES,
  DEFAULT_SEARCH_TIMEOUT_MS,
  parseJsonBody,
  requestWithRetry,
  type SearchRequestOptions,
} from "./http";
import { RateLimiter } from "./rate-limiter";

const log = createModuleLogger("serpapi");

const SERPAPI_URL = "https://serpapi.com/search";

const TIME_FILTERS: Record<RecencyBucket, string> = {
  day: "qdr:d",
  week: "qdr:w",
  month: "qdr:m",
  year: "qdr:y",
};

/**
 * SerpAPI implementation of SearchProvider
 */
export class SerpApiSearchProvider implements SearchProvider {
  private readonly rateLimiter: RateLimiter;
  private readonly timeoutMs: number;
  private readonly maxRetries: number;

  constructor(
    private readonly apiKey: string,
    options: SearchRequestOptions = {}
  ) {
    this.rateLimiter = new RateLimiter(options.minIntervalMs ?? 1000);
    this.timeoutMs = options.timeoutMs ?? DEFAULT_SEARCH_TIMEOUT_MS;
    this.maxRetries = options.maxRetries ?? DEFAULT_SEARCH_RETRIES;
  }

  /**
   * Build the API URL for a query
   */
  buildSearchUrl(query: string, config: SearchConfig): string {
    const params = new URLSearchParams({
      q: query,
      engine: "google",
      api_key: this.apiKey,
      num: String(config.maxResults),
    });

    const bucket = getRecencyBucket(config.sinceMs);
    if (bucket) {
      params.set("tbs", TIME_FILTERS[bucket]);
    }

    if (config.language) {
      params.set("hl", config.language);
    }

    return `${SERPAPI_URL}?${params.toString()}`;
  }

  /**
   * Convert an API response body to results
   */
  parseResponse(data: unknown): SearchResult[] {
    if (!isRecord(data)) {
      throw new SearchProviderError(this.getName(), "unexpected response shape");
    }

    // SerpAPI reports errors as a string, older payloads as an object
    const errorText = getString(data, "error");
    if (errorText) {
      throw new SearchProviderError(this.getName(), `API error: ${errorText}`);
    }
    const errorObject = getRecord(data, "error");
    if (errorObject) {
      throw new SearchProviderError(
        this.getName(),
        `API error (${getNumber(errorObject, "code") ?? "unknown"}): ${getString(errorObject, "message") ?? ""}`
      );
    }

    const results: SearchResult[] = [];
    for (const item of getArray(data, "organic_results")) {
      if (!isRecord(item)) continue;
      const url = getString(item, "link");
      if (!url) continue;

      results.push({
        url,
        title: getString(item, "title") ?? "",
        snippet: getString(item, "snippet") ?? "",
        domain: extractDomain(url),
        publishedAt: getString(item, "date"),
        source: "SerpAPI",
        rank: getNumber(item, "position") ?? results.length + 1,
      });
    }
    return results;
  }

  async search(
    query: string,
    config: SearchConfig,
    signal?: AbortSignal
  ): Promise<SearchResult[]> {
    const body = await requestWithRetry({
      provider: this.getName(),
      url: this.buildSearchUrl(query, config),
      headers: { Accept: "application/json" },
      timeoutMs: this.timeoutMs,
      maxRetries: this.maxRetries,
      rateLimiter: this.rateLimiter,
      signal,
    });

    const results = this.parseResponse(parseJsonBody(this.getName(), body));
    log.info("SerpAPI search completed", {
      query,
      resultsFound: results.length,
    });
    return results;
  }

  getName(): string {
    return "SerpAPI";
  }
}
