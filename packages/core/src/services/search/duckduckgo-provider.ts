/**
 * DuckDuckGo Search Provider Implementation
 *
 * Scrapes the HTML-only endpoint, so no API key is needed. Result links
 * come back as /l/?uddg= redirects and are decoded to the target URL.
 */

import * as cheerio from "cheerio";
import type { SearchProvider } from "../../interfaces/search-provider";
import type { SearchConfig, SearchResult } from "../../models/search-result";
import { getRecencyBucket, type RecencyBucket } from "../../utils/date-filters";
import { extractDomain } from "../../utils/deduplication";
import { createModuleLogger } from "../../utils/logger";
import { RateLimitedError } from "./errors";
import {
  DEFAULT_SEARCH_RETRIES,
  DEFAULT_SEARCH_TIMEOUT_MS,
  requestWithRetry,
  type SearchRequestOptions,
} from "./http";
import { RateLimiter } from "./rate-limiter";

const log = createModuleLogger("duckduckgo");

const DUCKDUCKGO_HTML_URL = "https://html.duckduckgo.com/html/";
const USER_AGENT =
  "Mozilla/5.0 (X11; Linux x86_64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36";

const DATE_FILTERS: Record<RecencyBucket, string> = {
  day: "d",
  week: "w",
  month: "m",
  year: "y",
};

/**
 * Resolve a DuckDuckGo result href to the page it points at
 */
export function extractFinalUrl(href: string): string {
  if (!href) {
    return "";
  }

  try {
    const parsed = new URL(href, "https://duckduckgo.com");
    if (parsed.hostname.endsWith("duckduckgo.com")) {
      return parsed.pathname === "/l/"
        ? parsed.searchParams.get("uddg") ?? ""
        : "";
    }
    return /^https?:$/.test(parsed.protocol) ? href : "";
  } catch {
    return "";
  }
}

/**
 * Parse result blocks out of the HTML results page
 */
export function parseDuckDuckGoResults(
  html: string,
  maxResults: number
): SearchResult[] {
  const $ = cheerio.load(html);
  const results: SearchResult[] = [];

  $(".result").each((_, element) => {
    if (results.length >= maxResults) {
      return false;
    }

    const block = $(element);
    if (block.hasClass("result--ad")) {
      return;
    }

    const link = block.find("a.result__a").first();
    const url = extractFinalUrl(link.attr("href") ?? "");
    if (!url) {
      return;
    }

    results.push({
      url,
      title: link.text().replace(/\s+/g, " ").trim(),
      snippet: block.find(".result__snippet").text().replace(/\s+/g, " ").trim(),
      domain: extractDomain(url),
      source: "DuckDuckGo",
      rank: results.length + 1,
    });
    return;
  });

  return results;
}

/**
 * DuckDuckGo implementation of SearchProvider
 */
export class DuckDuckGoSearchProvider implements SearchProvider {
  private readonly rateLimiter: RateLimiter;
  private readonly timeoutMs: number;
  private readonly maxRetries: number;

  constructor(options: SearchRequestOptions = {}) {
    this.rateLimiter = new RateLimiter(options.minIntervalMs ?? 2000);
    this.timeoutMs = options.timeoutMs ?? DEFAULT_SEARCH_TIMEOUT_MS;
    this.maxRetries = options.maxRetries ?? DEFAULT_SEARCH_RETRIES;
  }

  /**
   * Build the results page URL for a query
   */
  buildSearchUrl(query: string, config: SearchConfig): string {
    const params = new URLSearchParams();

    const bucket = getRecencyBucket(config.sinceMs);
    if (bucket) {
      params.set("df", DATE_FILTERS[bucket]);
    }

    params.set("q", query);
    params.set("b", "0");
    params.set("kl", config.language === "en" ? "us-en" : "wt-wt");
    params.set("s", "0");

    return `${DUCKDUCKGO_HTML_URL}?${params.toString()}`;
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
        "User-Agent": USER_AGENT,
        Accept:
          "text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8",
        "Accept-Language": "en-US,en;q=0.5",
        DNT: "1",
      },
      timeoutMs: this.timeoutMs,
      maxRetries: this.maxRetries,
      rateLimiter: this.rateLimiter,
      signal,
    });

    const results = parseDuckDuckGoResults(body, config.maxResults);

    // An empty page that mentions a captcha is a block, not a miss
    if (results.length === 0 && /captcha|blocked|anomaly/i.test(body)) {
      log.debug("DuckDuckGo CAPTCHA detected", { query });
      throw new RateLimitedError(
        this.getName(),
        "search blocked by CAPTCHA, try again later or use another provider"
      );
    }

    log.info("DuckDuckGo search completed", {
      query,
      resultsFound: results.length,
    });
    return results;
  }

  getName(): string {
    return "DuckDuckGo";
  }
}
