/**
 * Brave Search Provider Implementation
 */

import * as cheerio from "cheerio";
import type { SearchProvider } from "../../interfaces/search-provider";
import type { SearchConfig, SearchResult } from "../../models/search-result";
import { getRecencyBucket, type RecencyBucket } from "../../utils/date-filters";
import { extractDomain } from "../../utils/deduplication";
import { getArray, getRecord, getString, isRecord } from "../../utils/json";
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

const log = createModuleLogger("brave-search");

const BRAVE_SEARCH_API_URL = "https://api.search.brave.com/res/v1/web/search";
const BRAVE_MAX_RESULTS = 20;

// Brave uses "freshness" values like "pd" (past day), "pw" (past week), etc.
const FRESHNESS: Record<RecencyBucket, string> = {
  day: "pd",
  week: "pw",
  month: "pm",
  year: "py",
};

/**
 * Brave wraps matched terms in <strong>; keep only the text
 */
function stripTags(text: string): string {
  return cheerio.load(`<p>${text}</p>`)("p").text().trim();
}

/**
 * Brave Search implementation of SearchProvider
 */
export class BraveSearchProvider implements SearchProvider {
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
      count: String(Math.min(config.maxResults, BRAVE_MAX_RESULTS)),
    });

    if (config.language) {
      params.set("search_lang", config.language);
    }

    const bucket = getRecencyBucket(config.sinceMs);
    if (bucket) {
      params.set("freshness", FRESHNESS[bucket]);
    }

    return `${BRAVE_SEARCH_API_URL}?${params.toString()}`;
  }

  /**
   * Convert an API response body to results
   */
  parseResponse(data: unknown): SearchResult[] {
    if (!isRecord(data)) {
      throw new SearchProviderError(this.getName(), "unexpected response shape");
    }

    const web = getRecord(data, "web");
    const results: SearchResult[] = [];
    for (const item of web ? getArray(web, "results") : []) {
      if (!isRecord(item)) continue;
      const url = getString(item, "url");
      if (!url) continue;

      results.push({
        url,
        title: stripTags(getString(item, "title") ?? ""),
        snippet: stripTags(getString(item, "description") ?? ""),
        domain: extractDomain(url),
        publishedAt: getString(item, "page_age") ?? getString(item, "age"),
        source: "Brave",
        rank: results.length + 1,
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
      headers: {
        Accept: "application/json",
        "Accept-Encoding": "gzip",
        "X-Subscription-Token": this.apiKey,
      },
      timeoutMs: this.timeoutMs,
      maxRetries: this.maxRetries,
      rateLimiter: this.rateLimiter,
      signal,
    });

    const results = this.parseResponse(parseJsonBody(this.getName(), body));
    log.info("Brave search completed", {
      query,
      resultsFound: results.length,
    });
    return results;
  }

  getName(): string {
    return "Brave Search";
  }
}
