/**
 * AI Prompt Configuration
 *
 * Centralized location for all AI prompts used in the research pipeline.
 * Prompts use template placeholders that are filled at runtime.
 *
 * Template syntax: {{placeholder}} - will be replaced with actual values
 *
 * Model and temperature settings are loaded from research-config.yaml
 * and can be overridden per run (e.g. the --model flag).
 */

import {
  getModelConfig,
  type LLMConfig,
  type ModelConfig,
} from "../research-engine/config";

export interface PromptConfig {
  system: string;
  user: string;
  model: string;
  responseFormat?: "json_object" | "text";
  temperature?: number; // 0.0-2.0, lower = more deterministic, higher = more creative
  maxTokens?: number;
}

/**
 * Model step types that can be configured
 */
export type ModelStep = keyof LLMConfig["models"];

/**
 * Get prompt config with model settings from research config
 */
function createPromptConfig(
  step: ModelStep,
  system: string,
  user: string
): PromptConfig {
  const modelConfig = getModelConfig(step);
  return {
    system,
    user,
    model: modelConfig.model,
    temperature: modelConfig.temperature,
    maxTokens: modelConfig.maxTokens,
    responseFormat: modelConfig.responseFormat,
  };
}

/**
 * Prompt templates for topic decomposition
 */
export function getPlanningPrompts(): PromptConfig {
  return createPromptConfig(
    "planning",
    `You are a research planner. Your task is to break a research topic into focused web search queries that together cover the topic.

Cover distinct facets, for example:
1. DEFINITIONS - what the subject is and how it works
2. RECENT DEVELOPMENTS - news, releases and announcements
3. CRITICISMS - limitations, risks and debates
4. COMPARISONS - alternatives and competing approaches

Each query should be distinct and approach the topic from a different angle.
Queries should be concise (3-10 words typically) and use natural search language.`,
    `Research topic:
{{topic}}

Generate at most {{maxQueries}} complementary search queries. Return ONLY a JSON object with this structure:
{
  "queries": ["first search query", "second search query"]
}`
  );
}

/**
 * Prompt templates for brief synthesis
 */
export function getSynthesisPrompts(): PromptConfig {
  return createPromptConfig(
    "synthesis",
    `You are a research analyst tasked with synthesizing information from multiple sources into a comprehensive research brief.

REQUIREMENTS:
- Every factual claim must have an inline citation [n] referencing the numbered sources
- Only cite source numbers that appear in the SOURCES list
- Maintain objectivity and present multiple perspectives when they exist
- Focus on recent developments while providing necessary context
- Synthesize rather than just summarize - look for patterns, connections, and insights across sources
- Keep the total length under 2000 words
- Use clear, professional language appropriate for an informed audience`,
    `TOPIC: {{topic}}

SUB-QUERIES INVESTIGATED:
{{subQueries}}

SOURCES:
{{sources}}

Write a research brief. Return ONLY a JSON object with this structure:
{
  "executiveSummary": "2-3 paragraphs capturing the key insights, current state and main conclusions",
  "findings": [
    {
      "topic": "short label for this aspect of the topic",
      "content": "detailed analysis with inline citations like [1] or [2, 3]",
      "citations": [1, 2],
      "confidence": 0.8
    }
  ],
  "openQuestions": ["3-5 questions that remain unanswered or need further research"]
}

Use 3-6 findings. "citations" lists the source numbers the finding relies on. "confidence" is between 0 and 1.`
  );
}

/**
 * Helper function to replace template placeholders.
 * Unknown placeholders are left as they are.
 */
export function renderPrompt(
  template: string,
  variables: Record<string, string | number>
): string {
  return template.replace(/\{\{(\w+)\}\}/g, (placeholder, key: string) =>
    key in variables ? String(variables[key]) : placeholder
  );
}

/**
 * Get prompt configuration with custom model overrides
 * Useful for per-run customization
 */
export function withModelOverrides(
  config: PromptConfig,
  overrides?: Partial<ModelConfig>
): PromptConfig {
  if (!overrides) {
    return config;
  }

  return {
    ...config,
    model: overrides.model ?? config.model,
    temperature: overrides.temperature ?? config.temperature,
    maxTokens: overrides.maxTokens ?? config.maxTokens,
    responseFormat: overrides.responseFormat ?? config.responseFormat,
  };
}
