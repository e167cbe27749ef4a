/**
 * SearchResult data model
 *
 * Transient record returned by a search backend before its page is fetched.
 * Discarded once converted into a Source (or dropped on fetch failure).
 */

/**
 * Per-query search settings handed to every backend
 */
export interface SearchConfig {
  maxResults: number; // Per-query result cap
  sinceMs: number; // Only results newer than this window (0 = no filter)
  language: string; // ISO 639-1 language hint (e.g., "en")
}

/**
 * Provider-agnostic search result
 */
export interface SearchResult {
  url: string;
  title: string;
  snippet: string;
  domain: string; // Hostname without www.
  publishedAt?: string; // Date string as reported by the backend
  source: string; // Name of the provider that returned it
  rank: number; // 1-based position in the provider's result list
}
