/**
 * Research Configuration System
 *
 * Loads and manages configuration from research-config.yaml
 * Provides strongly typed access to all configurable settings.
 */

import * as fs from "fs";
import * as path from "path";
import * as yaml from "js-yaml";
import type { SearchProviderType } from "../../providers";
import { createModuleLogger, errorMessage } from "../../utils/logger";

const log = createModuleLogger("config");

// =============================================================================
// Type Definitions
// =============================================================================

/**
 * LLM model configuration for a specific step
 */
export interface ModelConfig {
  model: string;
  temperature: number;
  maxTokens: number;
  responseFormat?: "json_object" | "text";
}

/**
 * LLM provider configuration
 */
export interface LLMConfig {
  provider: "openai";
  maxRetries: number;
  models: {
    planning: ModelConfig;
    synthesis: ModelConfig;
  };
  embeddings: {
    model: string;
    dimensions: number;
  };
}

/**
 * Search provider configuration
 */
export interface SearchSettings {
  provider: SearchProviderType;
  maxSubQueries: number;
  concurrency: number;
  language: string;
  timeoutMs: number;
  maxRetries: number;
  minIntervalMs: Record<SearchProviderType, number>;
}

/**
 * Content extraction configuration
 */
export interface ExtractionConfig {
  timeoutMs: number;
  concurrency: number;
  userAgent: string;
  maxRetries: number;
  retryDelayMs: number;
  minLineLength: number; // Shorter lines are treated as navigation/boilerplate
  maxContentChars: number;
}

/**
 * Content cache configuration
 */
export interface CacheConfig {
  enabled: boolean;
  path: string;
  ttlHours: number;
}

/**
 * Relevance ranking configuration
 */
export interface RankingConfig {
  strategy: "embedding" | "keyword";
  maxEmbeddingChars: number;
}

/**
 * Brief synthesis configuration
 */
export interface SynthesisConfig {
  maxSourceTokens: number; // Per-source excerpt budget in the prompt
  defaultConfidence: number;
}

/**
 * Defaults for CLI runs
 */
export interface ResearchDefaultsConfig {
  maxSources: number;
  since: string;
}

/**
 * Complete application configuration
 */
export interface AppConfig {
  llm: LLMConfig;
  search: SearchSettings;
  extraction: ExtractionConfig;
  cache: CacheConfig;
  ranking: RankingConfig;
  synthesis: SynthesisConfig;
  research: ResearchDefaultsConfig;
}

/**
 * Recursive partial, for overrides and YAML files
 */
export type DeepPartial<T> = {
  [K in keyof T]?: T[K] extends object ? DeepPartial<T[K]> : T[K];
};

// =============================================================================
// Default Configuration
// =============================================================================

/**
 * Default configuration values (used when config file is not found)
 */
export const DEFAULT_CONFIG: AppConfig = {
  llm: {
    provider: "openai",
    maxRetries: 3,
    models: {
      planning: {
        model: "gpt-4o-mini",
        temperature: 0.7,
        maxTokens: 800,
        responseFormat: "json_object",
      },
      synthesis: {
        model: "gpt-4o-mini",
        temperature: 0.2,
        maxTokens: 4096,
        responseFormat: "json_object",
      },
    },
    embeddings: {
      model: "text-embedding-3-small",
      dimensions: 1536,
    },
  },
  search: {
    provider: "duckduckgo",
    maxSubQueries: 5,
    concurrency: 2,
    language: "en",
    timeoutMs: 30000,
    maxRetries: 2,
    minIntervalMs: {
      duckduckgo: 2000,
      serpapi: 1000,
      google: 100,
      brave: 1000,
      mock: 0,
    },
  },
  extraction: {
    timeoutMs: 15000,
    concurrency: 5,
    userAgent:
      "Mozilla/5.0 (compatible; ResearchBrief/1.0; +https://example.com/bot)",
    maxRetries: 2,
    retryDelayMs: 1000,
    minLineLength: 20,
    maxContentChars: 50000,
  },
  cache: {
    enabled: true,
    path: ".research-cache/articles.db",
    ttlHours: 24,
  },
  ranking: {
    strategy: "embedding",
    maxEmbeddingChars: 8000,
  },
  synthesis: {
    maxSourceTokens: 400,
    defaultConfidence: 0.8,
  },
  research: {
    maxSources: 25,
    since: "7d",
  },
};

// =============================================================================
// Configuration Loader
// =============================================================================

const CONFIG_FILENAME = "research-config.yaml";

let cachedConfig: AppConfig | null = null;
let configPath: string | null = null;

/**
 * Find the research-config.yaml file by searching upward from a starting directory
 */
function findConfigFile(startDir?: string): string | null {
  let currentDir = startDir || process.cwd();

  // Search up to 10 levels up
  for (let i = 0; i < 10; i++) {
    const configFilePath = path.join(currentDir, CONFIG_FILENAME);
    if (fs.existsSync(configFilePath)) {
      return configFilePath;
    }

    const parentDir = path.dirname(currentDir);
    if (parentDir === currentDir) {
      // Reached root
      break;
    }
    currentDir = parentDir;
  }

  return null;
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Deep merge two objects, with source taking precedence.
 * Keys the target does not know are ignored.
 */
function deepMerge<T extends object>(target: T, source: unknown): T {
  if (!isPlainObject(source)) {
    return target;
  }

  const result: Record<string, unknown> = { ...target };

  for (const [key, targetValue] of Object.entries(target)) {
    const sourceValue = source[key];
    if (sourceValue === undefined || sourceValue === null) {
      continue;
    }

    if (isPlainObject(targetValue)) {
      result[key] = deepMerge(targetValue, sourceValue);
    } else if (typeof sourceValue === typeof targetValue) {
      result[key] = sourceValue;
    } else {
      log.warn("Ignoring config value with unexpected type", {
        key,
        expected: typeof targetValue,
        received: typeof sourceValue,
      });
    }
  }

  return result as T;
}

/**
 * Load configuration from YAML file
 */
export function loadConfig(customPath?: string): AppConfig {
  // Return cached config if available and no custom path specified
  if (cachedConfig && !customPath) {
    return cachedConfig;
  }

  // Find config file
  const filePath = customPath || findConfigFile();

  if (!filePath) {
    log.warn(`${CONFIG_FILENAME} not found, using default configuration`);
    cachedConfig = DEFAULT_CONFIG;
    return DEFAULT_CONFIG;
  }

  try {
    const fileContents = fs.readFileSync(filePath, "utf8");
    const rawConfig: unknown = yaml.load(fileContents);

    // Merge with defaults to ensure all fields are present
    const config = deepMerge(DEFAULT_CONFIG, rawConfig);

    // Cache the config
    cachedConfig = config;
    configPath = filePath;

    log.debug("Loaded research config", { path: filePath });
    return config;
  } catch (error) {
    log.error("Error loading config, using default configuration", {
      path: filePath,
      error: errorMessage(error),
    });
    cachedConfig = DEFAULT_CONFIG;
    return DEFAULT_CONFIG;
  }
}

/**
 * Get the currently loaded configuration
 * Loads from file if not yet loaded
 */
export function getConfig(): AppConfig {
  if (!cachedConfig) {
    return loadConfig();
  }
  return cachedConfig;
}

/**
 * Clear the cached configuration (useful for testing or reloading)
 */
export function clearConfigCache(): void {
  cachedConfig = null;
  configPath = null;
}

/**
 * Get the path to the loaded config file
 */
export function getConfigPath(): string | null {
  return configPath;
}

/**
 * Override specific configuration values at runtime
 * Useful for testing or per-run customization
 */
export function withConfigOverrides(
  overrides: DeepPartial<AppConfig>,
  base: AppConfig = getConfig()
): AppConfig {
  return deepMerge(base, overrides);
}

// =============================================================================
// Convenience Getters
// =============================================================================

/**
 * Get model configuration for a specific step
 */
export function getModelConfig(step: keyof LLMConfig["models"]): ModelConfig {
  return getConfig().llm.models[step];
}

/**
 * Get embeddings configuration
 */
export function getEmbeddingsConfig(): LLMConfig["embeddings"] {
  return getConfig().llm.embeddings;
}

/**
 * Get extraction configuration
 */
export function getExtractionConfig(): ExtractionConfig {
  return getConfig().extraction;
}

/**
 * Get search configuration
 */
export function getSearchConfig(): SearchSettings {
  return getConfig().search;
}

/**
 * Get cache configuration
 */
export function getCacheConfig(): CacheConfig {
  return getConfig().cache;
}

/**
 * Get ranking configuration
 */
export function getRankingConfig(): RankingConfig {
  return getConfig().ranking;
}

/**
 * Get synthesis configuration
 */
export function getSynthesisConfig(): SynthesisConfig {
  return getConfig().synthesis;
}
