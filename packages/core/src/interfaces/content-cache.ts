/**
 * Content Cache Interface
 *
 * URL-keyed store of cleaned articles, used exclusively by the
 * content fetcher. Implementations must tolerate concurrent reads and
 * writes for distinct URLs.
 */

import type { Article } from "../models/research";

export interface CacheStats {
  articleCount: number;
  oldestFetchedAt?: number;
  newestFetchedAt?: number;
}

export interface ContentCache {
  /**
   * Get the cached article for a URL if it was fetched within `maxAgeMs`
   */
  get(url: string, maxAgeMs: number): Promise<Article | null>;

  /**
   * Insert or replace the article stored under its URL
   */
  upsert(article: Article): Promise<void>;

  /**
   * Remove articles older than `maxAgeMs`, returning how many were removed
   */
  prune(maxAgeMs: number): Promise<number>;

  clear(): Promise<void>;

  stats(): Promise<CacheStats>;

  close(): Promise<void>;
}
