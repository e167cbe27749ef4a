/**
 * Research pipeline stage interfaces
 *
 * The engine is constructed from one implementation of each stage
 * plus a SearchProvider.
 */

import type { Article, Source, SynthesizedBrief } from "../models/research";

/**
 * Decomposes a topic into a bounded set of sub-queries
 */
export interface Planner {
  decomposeTopic(topic: string, signal?: AbortSignal): Promise<string[]>;
}

export interface FetchContentOptions {
  useJavaScript?: boolean;
  refreshCache?: boolean; // Skip the cache lookup (the result is still cached)
  signal?: AbortSignal;
}

/**
 * Resolves a URL to cleaned text, consulting the cache first
 */
export interface ContentFetcher {
  fetchContent(url: string, options?: FetchContentOptions): Promise<Article>;
}

/**
 * Scores sources against the topic and orders them by relevance
 */
export interface Ranker {
  rankSources(
    sources: Source[],
    topic: string,
    signal?: AbortSignal
  ): Promise<Source[]>;
}

/**
 * Turns ranked, capped sources into a cited brief
 */
export interface Synthesizer {
  synthesizeBrief(
    topic: string,
    sources: Source[],
    subQueries: string[],
    signal?: AbortSignal
  ): Promise<SynthesizedBrief>;
}

/**
 * Renders a page with JavaScript enabled and returns the resulting HTML
 */
export interface PageRenderer {
  render(url: string, signal?: AbortSignal): Promise<string>;
}
