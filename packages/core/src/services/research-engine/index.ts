/**
 * Research Engine service
 *
 * Core orchestrator that coordinates the full research flow:
 * 1. Decompose the topic into sub-queries (Planner)
 * 2. Execute searches (SearchProvider)
 * 3. Fetch and clean pages (ContentFetcher)
 * 4. Rank sources by relevance (Ranker)
 * 5. Synthesize a cited brief (Synthesizer)
 */

export {
  ResearchEngine,
  mergeSources,
  perQueryBudget,
  toSource,
  validateCitations,
} from "./orchestrator";
export { createResearchConfig } from "./run-config";
export { inferSourceType } from "./source-type";
export {
  ResearchError,
  ResearchCancelledError,
  CitationError,
  FetchError,
  type ResearchStage,
  type FetchErrorKind,
} from "./errors";
export * from "./config";
export type {
  ResearchEngineDependencies,
  ResearchEngineOptions,
  QueryOutcome,
  FetchedResult,
} from "./types";
