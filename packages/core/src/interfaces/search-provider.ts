/**
 * Search Provider Interface
 *
 * Abstract interface for web search backends.
 * Allows switching between DuckDuckGo, SerpAPI, Google, Brave and a mock.
 */

import type { SearchConfig, SearchResult } from "../models/search-result";

/**
 * Search Provider interface
 * All search providers must implement these methods
 */
export interface SearchProvider {
  /**
   * Execute a single web search
   */
  search(
    query: string,
    config: SearchConfig,
    signal?: AbortSignal
  ): Promise<SearchResult[]>;

  /**
   * Get the provider name
   */
  getName(): string;
}
