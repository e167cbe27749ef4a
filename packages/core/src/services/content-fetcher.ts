/**
 * Cache-aware content fetcher
 *
 * Resolves a URL to a cleaned article: a fresh cache entry wins, otherwise
 * the page is fetched (over plain HTTP or through a PageRenderer), cleaned
 * and written back. Cache failures never fail a fetch.
 */

import type { ContentCache } from "../interfaces/content-cache";
import type {
  ContentFetcher,
  FetchContentOptions,
  PageRenderer,
} from "../interfaces/research-stages";
import type { Article } from "../models/research";
import { throwIfAborted } from "../utils/concurrency";
import { normalizeUrl } from "../utils/deduplication";
import { createModuleLogger, errorMessage } from "../utils/logger";
import {
  extractArticle,
  fetchPage,
  type ExtractionOptions,
} from "./content-extractor";
import { getCacheConfig } from "./research-engine/config";

const log = createModuleLogger("content-fetcher");

const HOUR_MS = 60 * 60 * 1000;

export interface ContentFetcherOptions {
  cache?: ContentCache;
  renderer?: PageRenderer;
  freshnessMs?: number; // Cached articles older than this are refetched
  extraction?: ExtractionOptions;
}

export class ResearchContentFetcher implements ContentFetcher {
  private readonly cache?: ContentCache;
  private readonly renderer?: PageRenderer;
  private readonly freshnessMs: number;
  private readonly extraction?: ExtractionOptions;
  private readonly inFlight = new Map<string, Promise<Article>>();
  private warnedNoRenderer = false;

  constructor(options: ContentFetcherOptions = {}) {
    this.cache = options.cache;
    this.renderer = options.renderer;
    this.freshnessMs =
      options.freshnessMs ?? getCacheConfig().ttlHours * HOUR_MS;
    this.extraction = options.extraction;
  }

  /**
   * Concurrent calls for the same URL share one request
   */
  fetchContent(url: string, options: FetchContentOptions = {}): Promise<Article> {
    const key = `${options.useJavaScript ? "js" : "http"}:${options.refreshCache ? "refresh" : "cached"}:${normalizeUrl(url)}`;

    const existing = this.inFlight.get(key);
    if (existing) {
      return existing;
    }

    const request = this.load(url, options).finally(() => {
      this.inFlight.delete(key);
    });
    this.inFlight.set(key, request);
    return request;
  }

  private async load(url: string, options: FetchContentOptions): Promise<Article> {
    throwIfAborted(options.signal);

    if (!options.refreshCache) {
      const cached = await this.readCache(url);
      if (cached) {
        log.debug("Cache hit", { url });
        return cached;
      }
    }

    const { html, rendered } = await this.download(url, options);
    const article = extractArticle(url, html, this.extraction);
    if (rendered) {
      article.metadata.renderedWithJavaScript = true;
    }

    await this.writeCache(article);
    return article;
  }

  private async download(
    url: string,
    options: FetchContentOptions
  ): Promise<{ html: string; rendered: boolean }> {
    if (options.useJavaScript) {
      if (this.renderer) {
        return {
          html: await this.renderer.render(url, options.signal),
          rendered: true,
        };
      }
      if (!this.warnedNoRenderer) {
        this.warnedNoRenderer = true;
        log.warn(
          "JavaScript rendering requested but no page renderer is configured, using plain HTTP"
        );
      }
    }

    return {
      html: await fetchPage(url, this.extraction, options.signal),
      rendered: false,
    };
  }

  private async readCache(url: string): Promise<Article | null> {
    if (!this.cache) return null;
    try {
      return await this.cache.get(url, this.freshnessMs);
    } catch (error) {
      log.warn("Cache read failed", { url, error: errorMessage(error) });
      return null;
    }
  }

  private async writeCache(article: Article): Promise<void> {
    if (!this.cache) return;
    try {
      await this.cache.upsert(article);
    } catch (error) {
      log.warn("Cache write failed", {
        url: article.url,
        error: errorMessage(error),
      });
    }
  }
}
