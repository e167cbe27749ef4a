/**
 * In-process content cache
 *
 * Used when the on-disk cache cannot be opened, and in tests.
 */

import type { CacheStats, ContentCache } from "../../interfaces/content-cache";
import type { Article } from "../../models/research";
import { normalizeUrl } from "../../utils/deduplication";

export class MemoryContentCache implements ContentCache {
  private readonly articles = new Map<string, Article>();

  async get(url: string, maxAgeMs: number): Promise<Article | null> {
    const article = this.articles.get(normalizeUrl(url));
    if (!article || article.fetchedAt < Date.now() - maxAgeMs) {
      return null;
    }
    return { ...article, metadata: { ...article.metadata } };
  }

  async upsert(article: Article): Promise<void> {
    this.articles.set(normalizeUrl(article.url), {
      ...article,
      metadata: { ...article.metadata },
    });
  }

  async prune(maxAgeMs: number): Promise<number> {
    const cutoff = Date.now() - maxAgeMs;
    let removed = 0;
    for (const [key, article] of this.articles) {
      if (article.fetchedAt < cutoff) {
        this.articles.delete(key);
        removed++;
      }
    }
    return removed;
  }

  async clear(): Promise<void> {
    this.articles.clear();
  }

  async stats(): Promise<CacheStats> {
    const times = [...this.articles.values()].map((a) => a.fetchedAt);
    return {
      articleCount: times.length,
      oldestFetchedAt: times.length > 0 ? Math.min(...times) : undefined,
      newestFetchedAt: times.length > 0 ? Math.max(...times) : undefined,
    };
  }

  async close(): Promise<void> {
    this.articles.clear();
  }
}
