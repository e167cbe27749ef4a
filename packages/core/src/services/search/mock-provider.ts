/**
 * Mock Search Provider
 *
 * Returns canned results without touching the network. Used for offline
 * runs and tests.
 */

import type { SearchProvider } from "../../interfaces/search-provider";
import type { SearchConfig, SearchResult } from "../../models/search-result";
import { throwIfAborted } from "../../utils/concurrency";

const MOCK_RESULTS: ReadonlyArray<Omit<SearchResult, "source" | "rank">> = [
  {
    url: "https://example.com/article1",
    title: "Example Article 1",
    snippet: "This is a mock search result for testing purposes.",
    domain: "example.com",
  },
  {
    url: "https://test.org/article2",
    title: "Test Article 2",
    snippet: "Another mock search result with different content.",
    domain: "test.org",
  },
  {
    url: "https://demo.net/article3",
    title: "Demo Article 3",
    snippet: "Third mock result to simulate multiple search results.",
    domain: "demo.net",
  },
];

export class MockSearchProvider implements SearchProvider {
  async search(
    query: string,
    config: SearchConfig,
    signal?: AbortSignal
  ): Promise<SearchResult[]> {
    throwIfAborted(signal);

    const limit =
      config.maxResults > 0
        ? Math.min(config.maxResults, MOCK_RESULTS.length)
        : MOCK_RESULTS.length;

    return MOCK_RESULTS.slice(0, limit).map((result, index) => ({
      ...result,
      title: `${result.title} (for query: ${query})`,
      source: "Mock",
      rank: index + 1,
    }));
  }

  getName(): string {
    return "Mock";
  }
}
