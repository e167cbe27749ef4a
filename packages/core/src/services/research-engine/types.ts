/**
 * Type definitions for research engine
 */

import type { SearchProvider } from "../../interfaces/search-provider";
import type {
  ContentFetcher,
  Planner,
  Ranker,
  Synthesizer,
} from "../../interfaces/research-stages";
import type { Article } from "../../models/research";
import type { SearchResult } from "../../models/search-result";

/**
 * Collaborators the engine is built from
 */
export interface ResearchEngineDependencies {
  planner: Planner;
  searcher: SearchProvider;
  fetcher: ContentFetcher;
  ranker: Ranker;
  synthesizer: Synthesizer;
}

/**
 * Research execution options
 */
export interface ResearchEngineOptions {
  searchConcurrency?: number; // Concurrent searches (default: from config)
  fetchConcurrency?: number; // Concurrent page fetches (default: from config)
  language?: string; // Search language hint (default: from config)
  plannerFallback?: boolean; // Search the bare topic if decomposition fails (default: false)
}

/**
 * One search result and its fetched article (null when the fetch failed)
 */
export interface FetchedResult {
  result: SearchResult;
  article: Article | null;
}

/**
 * Everything gathered for one sub-query
 */
export interface QueryOutcome {
  query: string;
  fetched: FetchedResult[];
  searchError?: unknown;
}

/**
 * Counters collected while gathering
 */
export interface RunStats {
  searchesFailed: number;
  fetchesFailed: number;
  candidates: number;
}
