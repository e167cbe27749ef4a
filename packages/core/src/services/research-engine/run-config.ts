/**
 * Per-run research configuration
 */

import type { ResearchConfig } from "../../models/research";
import { isSearchProviderType } from "../../providers";
import { parseSinceDuration } from "../../utils/date-filters";
import { getConfig } from "./config";

/**
 * Build a frozen ResearchConfig, filling gaps from research-config.yaml
 */
export function createResearchConfig(
  overrides: Partial<ResearchConfig> = {}
): ResearchConfig {
  const appConfig = getConfig();

  const config: ResearchConfig = {
    maxSources: overrides.maxSources ?? appConfig.research.maxSources,
    sinceMs: overrides.sinceMs ?? parseSinceDuration(appConfig.research.since),
    model: overrides.model ?? appConfig.llm.models.synthesis.model,
    searchProvider: overrides.searchProvider ?? appConfig.search.provider,
    useJavaScript: overrides.useJavaScript ?? false,
    refreshCache: overrides.refreshCache ?? false,
    outputHtml: overrides.outputHtml ?? false,
  };

  if (!Number.isInteger(config.maxSources) || config.maxSources < 1) {
    throw new Error(`maxSources must be a positive integer, got ${config.maxSources}`);
  }
  if (!Number.isFinite(config.sinceMs) || config.sinceMs < 0) {
    throw new Error(`sinceMs must be zero or positive, got ${config.sinceMs}`);
  }
  if (!config.model.trim()) {
    throw new Error("model must not be empty");
  }
  if (!isSearchProviderType(config.searchProvider)) {
    throw new Error(`Unsupported search provider: ${config.searchProvider}`);
  }

  return Object.freeze(config);
}
