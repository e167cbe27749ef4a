/**
 * Research data model
 *
 * Value objects produced by a deep research run. A ResearchBrief is the
 * only artifact the engine hands to rendering, persistence and the CLI.
 */

import type { SearchProviderType } from "../providers";

/**
 * Immutable run parameters, created once per invocation
 */
export interface ResearchConfig {
  readonly maxSources: number; // Total sources to retain in the brief
  readonly sinceMs: number; // Recency window for searches (0 = none)
  readonly model: string; // Language model used for planning and synthesis
  readonly searchProvider: SearchProviderType;
  readonly useJavaScript: boolean; // Fetch pages through a JS-capable renderer
  readonly refreshCache: boolean; // Ignore cached articles and refetch
  readonly outputHtml: boolean; // Also render the brief as HTML
}

/**
 * Inferred kind of a source, from its domain
 */
export type SourceType = "paper" | "repo" | "news" | "blog" | "web";

/**
 * A retrieved, deduplicated unit of evidence
 */
export interface Source {
  id: string;
  url: string;
  title: string;
  domain: string;
  content: string; // Cleaned text
  retrievedAt: number; // When the content was fetched (epoch ms)
  relevance: number; // 0-1, assigned by the Ranker
  type: SourceType;
}

/**
 * One synthesized topical section of a brief
 */
export interface DetailedFinding {
  topic: string;
  content: string;
  citations: number[]; // 0-based indices into ResearchBrief.sources
  confidence: number; // 0-1
}

/**
 * The pipeline's terminal artifact
 */
export interface ResearchBrief {
  id: string;
  topic: string;
  executiveSummary: string;
  detailedFindings: DetailedFinding[];
  openQuestions: string[];
  sources: Source[];
  subQueries: string[];
  generatedAt: number; // epoch ms
  config: ResearchConfig;
  metadata: Record<string, unknown>;
}

/**
 * What a Synthesizer produces; the engine attaches the run's config
 */
export type SynthesizedBrief = Omit<ResearchBrief, "config">;

/**
 * Cleaned page content, as returned by the ContentFetcher and cached by URL
 */
export interface Article {
  id: string;
  url: string;
  title: string;
  cleanedText: string;
  fetchedAt: number; // epoch ms
  metadata: ArticleMetadata;
}

export interface ArticleMetadata {
  description?: string;
  author?: string;
  publishedDate?: string;
  contentType?: string; // og:type or detected kind
  renderedWithJavaScript?: boolean;
}
