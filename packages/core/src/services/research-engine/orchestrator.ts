/**
 * Research orchestrator
 * Core logic for executing the research flow:
 * 1. Decompose the topic into sub-queries (Planner)
 * 2. Search each sub-query and fetch every result (bounded pools)
 * 3. Merge in discovery order, collapsing duplicates
 * 4. Rank by relevance and cap to maxSources
 * 5. Synthesize a cited brief and validate its citations
 *
 * The engine holds no global state; every collaborator is injected.
 */

import type {
  Article,
  ResearchBrief,
  ResearchConfig,
  Source,
} from "../../models/research";
import type { SearchConfig, SearchResult } from "../../models/search-result";
import { createLimiter, throwIfAborted, type Limiter } from "../../utils/concurrency";
import { extractDomain, normalizeUrl } from "../../utils/deduplication";
import { deepFreeze } from "../../utils/freeze";
import { createModuleLogger, errorMessage, type Logger } from "../../utils/logger";
import { UNTITLED_ARTICLE } from "../content-extractor";
import { getExtractionConfig, getSearchConfig } from "./config";
import {
  CitationError,
  ResearchCancelledError,
  ResearchError,
  type ResearchStage,
} from "./errors";
import { inferSourceType } from "./source-type";
import type {
  FetchedResult,
  QueryOutcome,
  ResearchEngineDependencies,
  ResearchEngineOptions,
  RunStats,
} from "./types";

/**
 * Per-sub-query result budget
 */
export function perQueryBudget(maxSources: number, subQueryCount: number): number {
  return Math.max(1, Math.floor(maxSources / Math.max(1, subQueryCount)));
}

/**
 * Turn a fetched search result into a Source. Relevance is left at 0 for the ranker.
 */
export function toSource(result: SearchResult, article: Article): Source {
  const domain = result.domain || extractDomain(article.url);
  return {
    id: article.id,
    url: article.url,
    title:
      article.title === UNTITLED_ARTICLE && result.title
        ? result.title
        : article.title,
    domain,
    content: article.cleanedText,
    retrievedAt: article.fetchedAt,
    relevance: 0,
    type: inferSourceType(domain),
  };
}

/**
 * Merge per-query outcomes in discovery order (sub-query order, then result
 * rank), keeping the first occurrence of each URL and source ID
 */
export function mergeSources(outcomes: QueryOutcome[]): {
  sources: Source[];
  duplicates: number;
} {
  const seenUrls = new Set<string>();
  const seenIds = new Set<string>();
  const sources: Source[] = [];
  let duplicates = 0;

  for (const outcome of outcomes) {
    for (const { result, article } of outcome.fetched) {
      if (!article) continue;

      const urlKey = normalizeUrl(article.url);
      if (seenUrls.has(urlKey) || seenIds.has(article.id)) {
        duplicates++;
        continue;
      }
      seenUrls.add(urlKey);
      seenIds.add(article.id);
      sources.push(toSource(result, article));
    }
  }

  return { sources, duplicates };
}

/**
 * Throw a CitationError for the first citation that does not resolve
 */
export function validateCitations(
  brief: Pick<ResearchBrief, "detailedFindings">,
  sourceCount: number
): void {
  for (const finding of brief.detailedFindings) {
    for (const citation of finding.citations) {
      if (!Number.isInteger(citation) || citation < 0 || citation >= sourceCount) {
        throw new CitationError(finding.topic, citation, sourceCount);
      }
    }
  }
}

export class ResearchEngine {
  private readonly log: Logger;

  constructor(
    private readonly deps: ResearchEngineDependencies,
    private readonly options: ResearchEngineOptions = {},
    logger?: Logger
  ) {
    this.log = logger ?? createModuleLogger("research-engine");
  }

  /**
   * Run the full pipeline for one topic
   */
  async research(
    topic: string,
    config: ResearchConfig,
    signal?: AbortSignal
  ): Promise<ResearchBrief> {
    const startedAt = Date.now();
    const trimmedTopic = topic.trim();
    if (!trimmedTopic) {
      throw new ResearchError("planning", "Research topic must not be empty");
    }
    throwIfAborted(signal);

    this.log.info("Starting research", {
      topic: trimmedTopic,
      maxSources: config.maxSources,
      searchProvider: this.deps.searcher.getName(),
    });

    // 1. Decompose topic
    const { subQueries, plannerFallback } = await this.plan(trimmedTopic, signal);

    // 2. Search and fetch (barrier: every task settles before merging)
    const stats: RunStats = { searchesFailed: 0, fetchesFailed: 0, candidates: 0 };
    const outcomes = await this.gather(subQueries, config, stats, signal);

    if (stats.searchesFailed === subQueries.length) {
      throw new ResearchError(
        "search",
        `All ${subQueries.length} searches failed`,
        { cause: outcomes.find((o) => o.searchError)?.searchError }
      );
    }

    // 3. Merge and deduplicate
    const { sources, duplicates } = mergeSources(outcomes);
    if (sources.length === 0) {
      throw new ResearchError(
        "fetch",
        `No sources could be retrieved (${stats.candidates} candidates, ${stats.fetchesFailed} fetch failures)`
      );
    }

    // 4. Rank and cap
    const { ranked, rankingDegraded } = await this.rank(sources, trimmedTopic, signal);
    const capped = ranked.slice(0, config.maxSources);

    // 5. Synthesize and validate
    const synthesized = await this.runStage("synthesis", signal, () =>
      this.deps.synthesizer.synthesizeBrief(trimmedTopic, capped, subQueries, signal)
    );
    try {
      validateCitations(synthesized, capped.length);
    } catch (error) {
      throw new ResearchError("synthesis", errorMessage(error), { cause: error });
    }

    const brief: ResearchBrief = {
      ...synthesized,
      topic: trimmedTopic,
      sources: capped,
      subQueries,
      config,
      metadata: {
        ...synthesized.metadata,
        searchProvider: this.deps.searcher.getName(),
        subQueryCount: subQueries.length,
        searchesFailed: stats.searchesFailed,
        fetchesFailed: stats.fetchesFailed,
        candidatesFound: stats.candidates,
        duplicatesCollapsed: duplicates,
        sourcesRanked: sources.length,
        rankingDegraded,
        plannerFallback,
        durationMs: Date.now() - startedAt,
      },
    };

    this.log.info("Research complete", {
      topic: trimmedTopic,
      sources: capped.length,
      findings: brief.detailedFindings.length,
      durationMs: Date.now() - startedAt,
    });
    return deepFreeze(brief);
  }

  /**
   * Run a fatal stage, wrapping failures in a ResearchError
   */
  private async runStage<T>(
    stage: ResearchStage,
    signal: AbortSignal | undefined,
    task: () => Promise<T>
  ): Promise<T> {
    try {
      return await task();
    } catch (error) {
      this.rethrowIfCancelled(error, signal);
      if (error instanceof ResearchError) {
        throw error;
      }
      throw new ResearchError(stage, `${stage} failed: ${errorMessage(error)}`, {
        cause: error,
      });
    }
  }

  private rethrowIfCancelled(error: unknown, signal?: AbortSignal): void {
    if (error instanceof ResearchCancelledError) {
      throw error;
    }
    if (signal?.aborted) {
      throw new ResearchCancelledError(signal.reason);
    }
  }

  private async plan(
    topic: string,
    signal?: AbortSignal
  ): Promise<{ subQueries: string[]; plannerFallback: boolean }> {
    try {
      const subQueries = await this.deps.planner.decomposeTopic(topic, signal);
      if (subQueries.length === 0) {
        throw new Error("Planner returned no sub-queries");
      }
      this.log.info("Planned sub-queries", { subQueries });
      return { subQueries, plannerFallback: false };
    } catch (error) {
      this.rethrowIfCancelled(error, signal);
      if (!this.options.plannerFallback) {
        throw new ResearchError(
          "planning",
          `Topic decomposition failed: ${errorMessage(error)}`,
          { cause: error }
        );
      }

      this.log.warn("Topic decomposition failed, searching the topic directly", {
        error: errorMessage(error),
      });
      return { subQueries: [topic], plannerFallback: true };
    }
  }

  /**
   * Search every sub-query and fetch its results.
   * Searches and fetches use separate pools; the fetch pool is shared by
   * all sub-queries.
   */
  private async gather(
    subQueries: string[],
    config: ResearchConfig,
    stats: RunStats,
    signal?: AbortSignal
  ): Promise<QueryOutcome[]> {
    const searchLimiter = createLimiter(
      this.options.searchConcurrency ?? getSearchConfig().concurrency
    );
    const fetchLimiter = createLimiter(
      this.options.fetchConcurrency ?? getExtractionConfig().concurrency
    );
    const searchConfig: SearchConfig = {
      maxResults: perQueryBudget(config.maxSources, subQueries.length),
      sinceMs: config.sinceMs,
      language: this.options.language ?? getSearchConfig().language,
    };

    const settled = await Promise.allSettled(
      subQueries.map((query) =>
        this.searchAndFetch(query, searchConfig, config, stats, {
          searchLimiter,
          fetchLimiter,
          signal,
        })
      )
    );

    throwIfAborted(signal);

    return settled.map((outcome) => {
      if (outcome.status === "rejected") {
        throw outcome.reason;
      }
      return outcome.value;
    });
  }

  private async searchAndFetch(
    query: string,
    searchConfig: SearchConfig,
    config: ResearchConfig,
    stats: RunStats,
    context: { searchLimiter: Limiter; fetchLimiter: Limiter; signal?: AbortSignal }
  ): Promise<QueryOutcome> {
    const { signal } = context;

    let results: SearchResult[];
    try {
      results = await context.searchLimiter.run(() => {
        throwIfAborted(signal);
        return this.deps.searcher.search(query, searchConfig, signal);
      });
    } catch (error) {
      this.rethrowIfCancelled(error, signal);
      stats.searchesFailed++;
      this.log.warn("Search failed for sub-query", {
        query,
        error: errorMessage(error),
      });
      return { query, fetched: [], searchError: error };
    }

    // Discovery order is the provider's rank order
    const ordered = [...results]
      .sort((a, b) => a.rank - b.rank)
      .slice(0, searchConfig.maxResults);
    stats.candidates += ordered.length;

    const fetched = await Promise.all(
      ordered.map(async (result): Promise<FetchedResult> => {
        try {
          const article = await context.fetchLimiter.run(() => {
            throwIfAborted(signal);
            return this.deps.fetcher.fetchContent(result.url, {
              useJavaScript: config.useJavaScript,
              refreshCache: config.refreshCache,
              signal,
            });
          });
          return { result, article };
        } catch (error) {
          this.rethrowIfCancelled(error, signal);
          stats.fetchesFailed++;
          this.log.warn("Fetch failed", {
            url: result.url,
            error: errorMessage(error),
          });
          return { result, article: null };
        }
      })
    );

    this.log.debug("Sub-query complete", {
      query,
      results: ordered.length,
      fetched: fetched.filter((f) => f.article).length,
    });
    return { query, fetched };
  }

  /**
   * Rank sources; a ranker failure keeps discovery order instead of failing the run
   */
  private async rank(
    sources: Source[],
    topic: string,
    signal?: AbortSignal
  ): Promise<{ ranked: Source[]; rankingDegraded: boolean }> {
    try {
      const ranked = await this.deps.ranker.rankSources(sources, topic, signal);
      return { ranked, rankingDegraded: false };
    } catch (error) {
      this.rethrowIfCancelled(error, signal);
      this.log.warn("Ranking failed, keeping discovery order", {
        error: errorMessage(error),
      });
      return { ranked: sources, rankingDegraded: true };
    }
  }
}
