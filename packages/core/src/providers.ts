/**
 * Provider Factory Functions
 *
 * Centralized provider creation and initialization.
 * Allows easy switching between providers via configuration.
 */

import type {
  EmbeddingProvider,
  LLMProvider,
} from "./interfaces/llm-provider";
import type { SearchProvider } from "./interfaces/search-provider";
import { OpenAIProvider } from "./services/llm/openai-provider";
import { getConfig, getEmbeddingsConfig } from "./services/research-engine/config";
import { BraveSearchProvider } from "./services/search/brave-provider";
import { DuckDuckGoSearchProvider } from "./services/search/duckduckgo-provider";
import {
  MissingApiKeyError,
  MissingSearchIdError,
  UnsupportedProviderError,
} from "./services/search/errors";
import { GoogleSearchProvider } from "./services/search/google-provider";
import type { SearchRequestOptions } from "./services/search/http";
import { MockSearchProvider } from "./services/search/mock-provider";
import { SerpApiSearchProvider } from "./services/search/serpapi-provider";

/**
 * LLM Provider types
 */
export type LLMProviderType = "openai";

/**
 * Search Provider types
 */
export const SEARCH_PROVIDER_TYPES = [
  "duckduckgo",
  "serpapi",
  "google",
  "brave",
  "mock",
] as const;

export type SearchProviderType = (typeof SEARCH_PROVIDER_TYPES)[number];

export function isSearchProviderType(value: string): value is SearchProviderType {
  return SEARCH_PROVIDER_TYPES.some((type) => type === value);
}

/**
 * Where secrets are read from (defaults to process.env)
 */
export type ProviderEnv = Record<string, string | undefined>;

/**
 * LLM Provider configuration
 */
export interface LLMProviderConfig {
  provider?: LLMProviderType;
  apiKey?: string; // Falls back to OPENAI_API_KEY
  model?: string;
  env?: ProviderEnv;
}

/**
 * Search Provider configuration
 */
export interface SearchProviderConfig {
  provider: string;
  env?: ProviderEnv;
  request?: SearchRequestOptions; // Defaults from the search section of the config
}

function requireEnv(
  env: ProviderEnv,
  name: string,
  onMissing: () => Error
): string {
  const value = env[name]?.trim();
  if (!value) {
    throw onMissing();
  }
  return value;
}

/**
 * Create an LLM provider from configuration.
 * The OpenAI provider also serves embeddings.
 */
export function createLLMProvider(
  config: LLMProviderConfig = {}
): LLMProvider & EmbeddingProvider {
  const appConfig = getConfig();
  const provider = config.provider ?? appConfig.llm.provider;

  switch (provider) {
    case "openai": {
      const apiKey =
        config.apiKey ??
        requireEnv(
          config.env ?? process.env,
          "OPENAI_API_KEY",
          () => new MissingApiKeyError("OpenAI", "OPENAI_API_KEY")
        );
      return new OpenAIProvider(apiKey, {
        model: config.model ?? appConfig.llm.models.synthesis.model,
        embeddingModel: getEmbeddingsConfig().model,
        embeddingDimensions: getEmbeddingsConfig().dimensions,
        maxRetries: appConfig.llm.maxRetries,
      });
    }
  }
}

/**
 * Create a search provider from configuration
 */
export function createSearchProvider(
  config: SearchProviderConfig
): SearchProvider {
  const provider = config.provider.trim().toLowerCase();
  if (!isSearchProviderType(provider)) {
    throw new UnsupportedProviderError(config.provider);
  }

  const env = config.env ?? process.env;
  const settings = getConfig().search;
  const request: SearchRequestOptions = {
    timeoutMs: config.request?.timeoutMs ?? settings.timeoutMs,
    maxRetries: config.request?.maxRetries ?? settings.maxRetries,
    minIntervalMs:
      config.request?.minIntervalMs ?? settings.minIntervalMs[provider],
  };

  switch (provider) {
    case "duckduckgo":
      return new DuckDuckGoSearchProvider(request);

    case "serpapi":
      return new SerpApiSearchProvider(
        requireEnv(env, "SERPAPI_KEY", () => new MissingApiKeyError("SerpAPI", "SERPAPI_KEY")),
        request
      );

    case "google":
      return new GoogleSearchProvider(
        requireEnv(
          env,
          "GOOGLE_CSE_API_KEY",
          () => new MissingApiKeyError("Google Custom Search", "GOOGLE_CSE_API_KEY")
        ),
        requireEnv(
          env,
          "GOOGLE_CSE_ID",
          () => new MissingSearchIdError("Google Custom Search", "GOOGLE_CSE_ID")
        ),
        request
      );

    case "brave":
      return new BraveSearchProvider(
        requireEnv(
          env,
          "BRAVE_SEARCH_API_KEY",
          () => new MissingApiKeyError("Brave Search", "BRAVE_SEARCH_API_KEY")
        ),
        request
      );

    case "mock":
      return new MockSearchProvider();
  }
}
