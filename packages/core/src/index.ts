/**
 * Core package entry point
 *
 * Exports the research engine, its pipeline stages, provider adapters,
 * configuration and rendering.
 */

// Models
export type {
  ResearchConfig,
  ResearchBrief,
  SynthesizedBrief,
  DetailedFinding,
  Source,
  SourceType,
  Article,
  ArticleMetadata,
} from "./models/research";

export type { SearchConfig, SearchResult } from "./models/search-result";

// Interfaces
export type {
  LLMProvider,
  EmbeddingProvider,
  GenerateTextRequest,
  SearchProvider,
  ContentCache,
  CacheStats,
  Planner,
  ContentFetcher,
  FetchContentOptions,
  Ranker,
  Synthesizer,
  PageRenderer,
} from "./interfaces";

// Providers
export {
  createLLMProvider,
  createSearchProvider,
  isSearchProviderType,
  SEARCH_PROVIDER_TYPES,
  type LLMProviderType,
  type SearchProviderType,
  type LLMProviderConfig,
  type SearchProviderConfig,
  type ProviderEnv,
} from "./providers";

// Research engine
export * from "./services/research-engine";

// Pipeline stages and adapters
export * from "./services/llm";
export * from "./services/search";
export * from "./services/ranking";
export * from "./services/cache";
export { ResearchContentFetcher, type ContentFetcherOptions } from "./services/content-fetcher";
export {
  parseHtml,
  extractArticle,
  fetchPage,
  articleIdForUrl,
  UNTITLED_ARTICLE,
  type ExtractionOptions,
  type ParsedPage,
} from "./services/content-extractor";

// Rendering
export * from "./services/render";

// Utilities
export * from "./utils";
