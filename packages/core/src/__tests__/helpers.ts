/**
 * In-process stand-ins for the research pipeline stages
 */

import type { Article, ResearchConfig, Source, SynthesizedBrief } from "../models/research";
import type { SearchResult } from "../models/search-result";
import { extractDomain, normalizeUrl } from "../utils/deduplication";

export const NOW = Date.UTC(2024, 5, 1, 12, 0, 0);

export function makeConfig(overrides: Partial<ResearchConfig> = {}): ResearchConfig {
  return {
    maxSources: 10,
    sinceMs: 0,
    model: "test-model",
    searchProvider: "mock",
    useJavaScript: false,
    refreshCache: false,
    outputHtml: false,
    ...overrides,
  };
}

export function makeResult(url: string, rank: number): SearchResult {
  return {
    url,
    title: `Result ${rank}`,
    snippet: "",
    domain: extractDomain(url),
    source: "Stub",
    rank,
  };
}

export function makeArticle(url: string, overrides: Partial<Article> = {}): Article {
  return {
    id: `id:${normalizeUrl(url)}`,
    url,
    title: `Article at ${url}`,
    cleanedText: `Content of ${url}`,
    fetchedAt: NOW,
    metadata: {},
    ...overrides,
  };
}

export function makeSource(url: string, relevance = 0): Source {
  return {
    id: `id:${normalizeUrl(url)}`,
    url,
    title: `Article at ${url}`,
    domain: extractDomain(url),
    content: `Content of ${url}`,
    retrievedAt: NOW,
    relevance,
    type: "web",
  };
}

/**
 * A synthesizer result citing the given source indices in a single finding
 */
export function makeSynthesized(
  topic: string,
  sources: Source[],
  subQueries: string[],
  citations: number[] = [0]
): SynthesizedBrief {
  return {
    id: "brief-1",
    topic,
    executiveSummary: "Summary [1].",
    detailedFindings: [
      { topic: "Finding", content: "Details [1].", citations, confidence: 0.8 },
    ],
    openQuestions: ["What next?"],
    sources,
    subQueries,
    generatedAt: NOW,
    metadata: { model: "test-model" },
  };
}

export function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
