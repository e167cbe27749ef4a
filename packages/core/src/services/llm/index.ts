/**
 * LLM Provider implementations and LLM-backed pipeline stages
 */

export {
  OpenAIProvider,
  withRetry,
  type OpenAIProviderOptions,
} from "./openai-provider";
export {
  LLMPlanner,
  parsePlannerResponse,
  dedupeQueries,
  type PlannerOptions,
} from "./planner";
export {
  LLMSynthesizer,
  parseSynthesisResponse,
  parseMarkdownSynthesis,
  extractCitations,
  buildSourcesSection,
  type SynthesizerOptions,
  type ParsedSynthesis,
} from "./synthesizer";
export {
  getPlanningPrompts,
  getSynthesisPrompts,
  renderPrompt,
  withModelOverrides,
  type PromptConfig,
  type ModelStep,
} from "./prompts";
