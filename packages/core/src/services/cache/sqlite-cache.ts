/**
 * SQLite content cache (better-sqlite3)
 *
 * One row per normalized URL. better-sqlite3 is synchronous, so every
 * statement runs to completion before the next one starts; the async
 * methods only exist to satisfy ContentCache.
 */

import Database from "better-sqlite3";
import * as fs from "fs";
import * as path from "path";
import type { CacheStats, ContentCache } from "../../interfaces/content-cache";
import type { Article, ArticleMetadata } from "../../models/research";
import { normalizeUrl } from "../../utils/deduplication";
import { getString, isRecord } from "../../utils/json";
import { createModuleLogger } from "../../utils/logger";

const log = createModuleLogger("content-cache");

interface ArticleRow {
  id: string;
  url: string;
  title: string;
  cleaned_text: string;
  fetched_at: number;
  metadata: string;
}

interface StatsRow {
  article_count: number;
  oldest: number | null;
  newest: number | null;
}

function parseMetadata(json: string): ArticleMetadata {
  let parsed: unknown;
  try {
    parsed = JSON.parse(json);
  } catch {
    return {};
  }
  if (!isRecord(parsed)) {
    return {};
  }

  const metadata: ArticleMetadata = {
    description: getString(parsed, "description"),
    author: getString(parsed, "author"),
    publishedDate: getString(parsed, "publishedDate"),
    contentType: getString(parsed, "contentType"),
  };
  if (typeof parsed.renderedWithJavaScript === "boolean") {
    metadata.renderedWithJavaScript = parsed.renderedWithJavaScript;
  }
  return metadata;
}

function rowToArticle(row: ArticleRow): Article {
  return {
    id: row.id,
    url: row.url,
    title: row.title,
    cleanedText: row.cleaned_text,
    fetchedAt: row.fetched_at,
    metadata: parseMetadata(row.metadata),
  };
}

export class SqliteContentCache implements ContentCache {
  private readonly db: Database.Database;

  /**
   * Open (or create) the cache database. Pass ":memory:" for a throwaway cache.
   */
  constructor(dbPath: string) {
    if (dbPath !== ":memory:") {
      fs.mkdirSync(path.dirname(path.resolve(dbPath)), { recursive: true });
    }

    this.db = new Database(dbPath);
    this.db.pragma("journal_mode = WAL");
    this.initSchema();
    log.debug("Content cache opened", { path: dbPath });
  }

  private initSchema(): void {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS articles (
        url_key TEXT PRIMARY KEY,
        id TEXT NOT NULL,
        url TEXT NOT NULL,
        title TEXT NOT NULL,
        cleaned_text TEXT NOT NULL,
        fetched_at INTEGER NOT NULL,
        metadata TEXT NOT NULL DEFAULT '{}'
      );

      CREATE INDEX IF NOT EXISTS idx_articles_fetched ON articles(fetched_at);
    `);
  }

  async get(url: string, maxAgeMs: number): Promise<Article | null> {
    const row = this.db
      .prepare<[string, number], ArticleRow>(
        `SELECT id, url, title, cleaned_text, fetched_at, metadata
         FROM articles WHERE url_key = ? AND fetched_at >= ?`
      )
      .get(normalizeUrl(url), Date.now() - maxAgeMs);

    return row ? rowToArticle(row) : null;
  }

  async upsert(article: Article): Promise<void> {
    this.db
      .prepare<[string, string, string, string, string, number, string]>(
        `INSERT INTO articles (url_key, id, url, title, cleaned_text, fetched_at, metadata)
         VALUES (?, ?, ?, ?, ?, ?, ?)
         ON CONFLICT(url_key) DO UPDATE SET
           id = excluded.id,
           url = excluded.url,
           title = excluded.title,
           cleaned_text = excluded.cleaned_text,
           fetched_at = excluded.fetched_at,
           metadata = excluded.metadata`
      )
      .run(
        normalizeUrl(article.url),
        article.id,
        article.url,
        article.title,
        article.cleanedText,
        article.fetchedAt,
        JSON.stringify(article.metadata)
      );
  }

  async prune(maxAgeMs: number): Promise<number> {
    const result = this.db
      .prepare<[number]>("DELETE FROM articles WHERE fetched_at < ?")
      .run(Date.now() - maxAgeMs);
    log.info("Pruned content cache", { removed: result.changes });
    return result.changes;
  }

  async clear(): Promise<void> {
    this.db.exec("DELETE FROM articles");
  }

  async stats(): Promise<CacheStats> {
    const row = this.db
      .prepare<[], StatsRow>(
        `SELECT COUNT(*) AS article_count, MIN(fetched_at) AS oldest, MAX(fetched_at) AS newest
         FROM articles`
      )
      .get();

    return {
      articleCount: row?.article_count ?? 0,
      oldestFetchedAt: row?.oldest ?? undefined,
      newestFetchedAt: row?.newest ?? undefined,
    };
  }

  async close(): Promise<void> {
    if (this.db.open) {
      this.db.close();
    }
  }
}
