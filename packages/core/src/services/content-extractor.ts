/**
 * Content extraction service
 *
 * Fetches web pages and parses them into cleaned articles:
 * - Main content text, one line per block, short boilerplate lines dropped
 * - Title with fallbacks
 * - Metadata (description, author, publish date, content type)
 *
 * Configuration is loaded from research-config.yaml
 */

import { createHash } from "crypto";
import * as cheerio from "cheerio";
import type { Article, ArticleMetadata } from "../models/research";
import { createTimeoutController, sleep, throwIfAborted } from "../utils/concurrency";
import { normalizeUrl } from "../utils/deduplication";
import { createModuleLogger, errorMessage } from "../utils/logger";
import { getExtractionConfig } from "./research-engine/config";
import { FetchError } from "./research-engine/errors";

const log = createModuleLogger("content-extractor");

export const UNTITLED_ARTICLE = "Untitled Article";

/**
 * Options for content extraction
 */
export interface ExtractionOptions {
  timeoutMs?: number; // Request timeout in ms (default: from config)
  userAgent?: string; // Custom user agent (default: from config)
  maxRetries?: number; // Retries after the first attempt (default: from config)
  retryDelayMs?: number; // Linear backoff step in ms (default: from config)
  minLineLength?: number; // Lines this short or shorter are dropped
  maxContentChars?: number; // Cleaned text is cut at this length
}

/**
 * Result of parsing one HTML document
 */
export interface ParsedPage {
  title: string;
  cleanedText: string;
  metadata: ArticleMetadata;
}

/**
 * Get default extraction options from config
 */
function getDefaultOptions(): Required<ExtractionOptions> {
  const config = getExtractionConfig();
  return {
    timeoutMs: config.timeoutMs,
    userAgent: config.userAgent,
    maxRetries: config.maxRetries,
    retryDelayMs: config.retryDelayMs,
    minLineLength: config.minLineLength,
    maxContentChars: config.maxContentChars,
  };
}

/**
 * Elements that never carry article text
 */
const NOISE_SELECTORS = [
  "script",
  "style",
  "noscript",
  "template",
  "svg",
  "nav",
  "footer",
  "header",
  "aside",
  "form",
  "iframe",
  '[role="navigation"]',
  '[aria-hidden="true"]',
  '[class*="cookie"]',
  '[id*="cookie"]',
  '[class*="advert"]',
  ".ad",
  ".ads",
  ".share",
  ".social",
].join(", ");

/**
 * Common content selectors (in priority order)
 */
const CONTENT_SELECTORS = [
  "article",
  '[role="main"]',
  "main",
  ".post-content",
  ".article-content",
  ".entry-content",
  ".content",
  "#content",
  ".post",
  ".article",
];

const BLOCK_SELECTORS =
  "p, div, section, li, h1, h2, h3, h4, h5, h6, pre, blockquote, tr, dd, dt, figcaption";

/**
 * Stable article ID derived from the normalized URL
 */
export function articleIdForUrl(url: string): string {
  return createHash("sha256").update(normalizeUrl(url)).digest("hex").slice(0, 16);
}

/**
 * Extract text from a selection, one line per block element
 */
function extractLines(
  $: cheerio.CheerioAPI,
  selector: string,
  minLineLength: number
): string[] {
  const element = $(selector).first();
  if (element.length === 0) {
    return [];
  }

  element.find("br").replaceWith("\n");
  element.find(BLOCK_SELECTORS).after("\n");

  return element
    .text()
    .split("\n")
    .map((line) => line.replace(/\s+/g, " ").trim())
    .filter((line) => line.length > minLineLength);
}

/**
 * Extract main content from the page
 * Tries common content selectors before falling back to the body
 */
function extractMainContent(
  $: cheerio.CheerioAPI,
  minLineLength: number
): string[] {
  for (const selector of CONTENT_SELECTORS) {
    const lines = extractLines($, selector, minLineLength);
    // Minimum viable content length
    if (lines.join(" ").length > 100) {
      return lines;
    }
  }

  return extractLines($, "body", minLineLength);
}

/**
 * Extract metadata from the page
 */
function extractMetadata($: cheerio.CheerioAPI): ArticleMetadata {
  const metadata: ArticleMetadata = {};

  const description =
    $('meta[name="description"]').attr("content") ||
    $('meta[property="og:description"]').attr("content");
  if (description) metadata.description = description.trim();

  const author =
    $('meta[name="author"]').attr("content") ||
    $('meta[property="article:author"]').attr("content") ||
    $('[rel="author"]').first().text().trim();
  if (author) metadata.author = author.trim();

  const publishedDate =
    $('meta[property="article:published_time"]').attr("content") ||
    $('meta[name="date"]').attr("content") ||
    $("time[datetime]").attr("datetime");
  if (publishedDate) metadata.publishedDate = publishedDate.trim();

  // Try to detect content type
  const ogType = $('meta[property="og:type"]').attr("content");
  if (ogType) {
    metadata.contentType = ogType;
  } else if ($("article").length > 0) {
    metadata.contentType = "article";
  } else if ($("video").length > 0 || $('[property="og:video"]').length > 0) {
    metadata.contentType = "video";
  }

  return metadata;
}

/**
 * Pick a title from the document, or from the first plausible content line
 */
function extractTitle($: cheerio.CheerioAPI, lines: string[]): string {
  const title =
    $("title").first().text().trim() ||
    $('meta[property="og:title"]').attr("content")?.trim() ||
    $("h1").first().text().replace(/\s+/g, " ").trim();
  if (title) {
    return title;
  }

  const candidate = lines.find(
    (line) => line.length > 10 && line.length < 200
  );
  return candidate ?? UNTITLED_ARTICLE;
}

/**
 * Parse an HTML document into title, cleaned text and metadata
 */
export function parseHtml(html: string, options?: ExtractionOptions): ParsedPage {
  const opts = { ...getDefaultOptions(), ...options };
  const $ = cheerio.load(html);

  // Metadata and headline elements live in parts removed as noise
  const metadata = extractMetadata($);
  const documentTitle = extractTitle($, []);

  $(NOISE_SELECTORS).remove();
  const lines = extractMainContent($, opts.minLineLength);

  let cleanedText = lines.join("\n");
  if (cleanedText.length > opts.maxContentChars) {
    cleanedText = cleanedText.substring(0, opts.maxContentChars);
  }

  return {
    title:
      documentTitle === UNTITLED_ARTICLE
        ? extractTitle($, lines)
        : documentTitle,
    cleanedText,
    metadata,
  };
}

/**
 * Turn fetched HTML into an article; a page with no text is a fetch failure
 */
export function extractArticle(
  url: string,
  html: string,
  options?: ExtractionOptions
): Article {
  const page = parseHtml(html, options);
  if (!page.cleanedText) {
    throw new FetchError(url, "empty", "no readable content");
  }

  return {
    id: articleIdForUrl(url),
    url,
    title: page.title,
    cleanedText: page.cleanedText,
    fetchedAt: Date.now(),
    metadata: page.metadata,
  };
}

function isHtmlContentType(contentType: string | null): boolean {
  if (!contentType) return true;
  return /text\/html|application\/xhtml\+xml|text\/plain/i.test(contentType);
}

/**
 * Single HTTP fetch of a page
 */
async function fetchOnce(
  url: string,
  opts: Required<ExtractionOptions>,
  signal?: AbortSignal
): Promise<string> {
  const timeout = createTimeoutController(opts.timeoutMs, signal);

  try {
    const response = await fetch(url, {
      signal: timeout.signal,
      redirect: "follow",
      headers: {
        "User-Agent": opts.userAgent,
        Accept:
          "text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8",
        "Accept-Language": "en-US,en;q=0.9",
      },
    });

    if (response.status === 401 || response.status === 403) {
      throw new FetchError(url, "blocked", `access denied (${response.status})`, {
        status: response.status,
      });
    }

    if (!response.ok) {
      throw new FetchError(
        url,
        "http",
        `HTTP ${response.status}: ${response.statusText}`,
        { status: response.status }
      );
    }

    const contentType = response.headers.get("content-type");
    if (!isHtmlContentType(contentType)) {
      throw new FetchError(
        url,
        "unsupported",
        `unsupported content type ${contentType}`
      );
    }

    return await response.text();
  } catch (error) {
    throwIfAborted(signal);
    if (error instanceof FetchError) {
      throw error;
    }
    if (timeout.didTimeout()) {
      throw new FetchError(url, "timeout", `request timeout after ${opts.timeoutMs}ms`, {
        cause: error,
      });
    }
    throw new FetchError(url, "network", errorMessage(error), { cause: error });
  } finally {
    timeout.dispose();
  }
}

/**
 * Fetch a page's HTML with retry logic.
 * Blocked pages, timeouts and client errors are not retried.
 */
export async function fetchPage(
  url: string,
  options?: ExtractionOptions,
  signal?: AbortSignal
): Promise<string> {
  const opts = { ...getDefaultOptions(), ...options };
  const attempts = Math.max(1, opts.maxRetries + 1);

  for (let attempt = 1; ; attempt++) {
    try {
      return await fetchOnce(url, opts, signal);
    } catch (error) {
      const retryable = error instanceof FetchError && error.retryable;
      if (!retryable || attempt >= attempts) {
        throw error;
      }

      log.debug("Fetch attempt failed, retrying", {
        url,
        attempt,
        attempts,
        error: errorMessage(error),
      });
      // Linear backoff based on config delay
      await sleep(opts.retryDelayMs * attempt, signal);
    }
  }
}
