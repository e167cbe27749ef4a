/**
 * Provider interfaces for dependency injection
 */

export type {
  LLMProvider,
  EmbeddingProvider,
  GenerateTextRequest,
} from "./llm-provider";

export type { SearchProvider } from "./search-provider";

export type { ContentCache, CacheStats } from "./content-cache";

export type {
  Planner,
  ContentFetcher,
  FetchContentOptions,
  Ranker,
  Synthesizer,
  PageRenderer,
} from "./research-stages";
