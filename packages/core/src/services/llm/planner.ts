/**
 * Topic decomposition using an LLM
 */

import type { LLMProvider } from "../../interfaces/llm-provider";
import type { Planner } from "../../interfaces/research-stages";
import { getArray, getString, isRecord, parseJsonLoose } from "../../utils/json";
import { createModuleLogger } from "../../utils/logger";
import { getSearchConfig, type ModelConfig } from "../research-engine/config";
import { getPlanningPrompts, renderPrompt, withModelOverrides } from "./prompts";

const log = createModuleLogger("planner");

export interface PlannerOptions {
  maxSubQueries?: number; // Defaults to search.maxSubQueries
  modelOverrides?: Partial<ModelConfig>;
}

/**
 * Pull query strings out of a planner response.
 * Accepts { "queries": [...] } or a bare array; entries may be strings
 * or { "query": "..." } objects.
 */
export function parsePlannerResponse(text: string): string[] {
  let parsed: unknown;
  try {
    parsed = parseJsonLoose(text);
  } catch (error) {
    throw new Error("Planner response is not valid JSON", { cause: error });
  }

  const entries = Array.isArray(parsed)
    ? parsed
    : isRecord(parsed)
      ? getArray(parsed, "queries")
      : [];

  const queries: string[] = [];
  for (const entry of entries) {
    if (typeof entry === "string") {
      queries.push(entry);
    } else if (isRecord(entry)) {
      const query = getString(entry, "query");
      if (query) queries.push(query);
    }
  }
  return queries;
}

/**
 * Drop blanks and case-insensitive duplicates, keeping first occurrences
 */
export function dedupeQueries(queries: string[]): string[] {
  const seen = new Set<string>();
  const unique: string[] = [];

  for (const raw of queries) {
    const query = raw.replace(/\s+/g, " ").trim();
    const key = query.toLowerCase();
    if (!query || seen.has(key)) continue;
    seen.add(key);
    unique.push(query);
  }
  return unique;
}

/**
 * LLM implementation of Planner
 */
export class LLMPlanner implements Planner {
  constructor(
    private readonly llm: LLMProvider,
    private readonly options: PlannerOptions = {}
  ) {}

  async decomposeTopic(topic: string, signal?: AbortSignal): Promise<string[]> {
    const trimmedTopic = topic.trim();
    if (!trimmedTopic) {
      throw new Error("Research topic must not be empty");
    }

    const maxQueries = Math.max(
      1,
      this.options.maxSubQueries ?? getSearchConfig().maxSubQueries
    );
    const prompts = withModelOverrides(
      getPlanningPrompts(),
      this.options.modelOverrides
    );

    const response = await this.llm.generateText({
      system: prompts.system,
      prompt: renderPrompt(prompts.user, {
        topic: trimmedTopic,
        maxQueries,
      }),
      model: prompts.model,
      temperature: prompts.temperature,
      maxTokens: prompts.maxTokens,
      responseFormat: prompts.responseFormat,
      signal,
    });

    const queries = dedupeQueries(parsePlannerResponse(response)).slice(
      0,
      maxQueries
    );
    if (queries.length === 0) {
      throw new Error("Planner returned no sub-queries");
    }

    log.info("Decomposed topic into sub-queries", {
      topic: trimmedTopic,
      count: queries.length,
    });
    return queries;
  }
}
