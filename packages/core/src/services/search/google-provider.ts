/**
 * Google Custom Search Provider Implementation
 */

import { format } from "date-fns";
import type { SearchProvider } from "../../interfaces/search-provider";
import type { SearchConfig, SearchResult } from "../../models/search-result";
import { bucketStartCompact, getRecencyBucket } from "../../utils/date-filters";
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

const log = createModuleLogger("google-search");

const GOOGLE_CSE_API_URL = "https://www.googleapis.com/customsearch/v1";
const GOOGLE_PAGE_SIZE = 10; // Per-request cap of the API
const GOOGLE_MAX_START = 91; // The API serves at most the first 100 results

/**
 * Google Custom Search implementation of SearchProvider
 */
export class GoogleSearchProvider implements SearchProvider {
  private readonly rateLimiter: RateLimiter;
  private readonly timeoutMs: number;
  private readonly maxRetries: number;

  constructor(
    private readonly apiKey: string,
    private readonly searchId: string,
    options: SearchRequestOptions = {}
  ) {
    this.rateLimiter = new RateLimiter(options.minIntervalMs ?? 100);
    this.timeoutMs = options.timeoutMs ?? DEFAULT_SEARCH_TIMEOUT_MS;
    this.maxRetries = options.maxRetries ?? DEFAULT_SEARCH_RETRIES;
  }

  /**
   * Build the API URL for a query
   */
  buildSearchUrl(
    query: string,
    config: SearchConfig,
    now: Date = new Date(),
    start = 1
  ): string {
    const params = new URLSearchParams({
      key: this.apiKey,
      cx: this.searchId,
      q: query,
      num: String(Math.min(config.maxResults - (start - 1), GOOGLE_PAGE_SIZE)),
    });
    if (start > 1) {
      params.set("start", String(start));
    }

    const bucket = getRecencyBucket(config.sinceMs);
    if (bucket) {
      params.set(
        "sort",
        `date:r:${bucketStartCompact(bucket, now)}:${format(now, "yyyyMMdd")}`
      );
    }

    if (config.language) {
      params.set("lr", `lang_${config.language}`);
    }

    return `${GOOGLE_CSE_API_URL}?${params.toString()}`;
  }

  /**
   * Convert an API response body to results
   */
  parseResponse(data: unknown, rankOffset = 0): SearchResult[] {
    if (!isRecord(data)) {
      throw new SearchProviderError(this.getName(), "unexpected response shape");
    }

    const apiError = getRecord(data, "error");
    if (apiError) {
      throw new SearchProviderError(
        this.getName(),
        `API error (${getNumber(apiError, "code") ?? "unknown"}): ${getString(apiError, "message") ?? ""}`,
        { status: getNumber(apiError, "code") }
      );
    }

    const results: SearchResult[] = [];
    for (const item of getArray(data, "items")) {
      if (!isRecord(item)) continue;
      const url = getString(item, "link");
      if (!url) continue;

      results.push({
        url,
        title: getString(item, "title") ?? "",
        snippet: getString(item, "snippet") ?? "",
        domain: extractDomain(url),
        source: "Google",
        rank: rankOffset + results.length + 1,
      });
    }
    return results;
  }

  /**
   * Search, paging in steps of ten until `maxResults` is reached or a page
   * comes back short
   */
  async search(
    query: string,
    config: SearchConfig,
    signal?: AbortSignal
  ): Promise<SearchResult[]> {
    const now = new Date();
    const results: SearchResult[] = [];

    for (
      let start = 1;
      start <= GOOGLE_MAX_START && results.length < config.maxResults;
      start += GOOGLE_PAGE_SIZE
    ) {
      const body = await requestWithRetry({
        provider: this.getName(),
        url: this.buildSearchUrl(query, config, now, start),
        headers: { Accept: "application/json" },
        timeoutMs: this.timeoutMs,
        maxRetries: this.maxRetries,
        rateLimiter: this.rateLimiter,
        signal,
      });

      const page = this.parseResponse(parseJsonBody(this.getName(), body), results.length);
      results.push(...page);
      if (page.length < GOOGLE_PAGE_SIZE) break;
    }

    log.info("Google Custom Search completed", {
      query,
      resultsFound: results.length,
    });
    return results.slice(0, config.maxResults);
  }

  getName(): string {
    return "Google Custom Search";
  }
}
