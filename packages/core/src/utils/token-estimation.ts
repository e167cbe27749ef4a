/**
 * Token estimation for prompt budgeting and per-call cost reporting
 *
 * Counts are approximate (about four characters per token for English
 * text); real tokenization varies by model.
 */

const CHARS_PER_TOKEN = 4;

/**
 * USD per 1M tokens. Unknown models are priced as gpt-4o-mini.
 */
const PRICE_PER_MILLION: Record<string, { input: number; output: number }> = {
  "gpt-4o-mini": { input: 0.15, output: 0.6 },
  "gpt-4o": { input: 2.5, output: 10 },
  "gpt-4.1-mini": { input: 0.4, output: 1.6 },
  "gpt-4.1": { input: 2, output: 8 },
  "gpt-4-turbo": { input: 10, output: 30 },
};
const FALLBACK_PRICING_MODEL = "gpt-4o-mini";

export function estimateTokens(text: string): number {
  if (!text) return 0;
  return Math.ceil(text.length / CHARS_PER_TOKEN);
}

/**
 * Cut text down to roughly `maxTokens`, preferring a word boundary
 */
export function truncateToTokens(text: string, maxTokens: number): string {
  const maxChars = Math.max(0, maxTokens * CHARS_PER_TOKEN);
  if (text.length <= maxChars) {
    return text;
  }

  const cut = text.substring(0, maxChars);
  const lastSpace = cut.lastIndexOf(" ");
  const trimmed = lastSpace > maxChars * 0.8 ? cut.substring(0, lastSpace) : cut;
  return `${trimmed.trimEnd()}...`;
}

/**
 * Estimated usage of one LLM call
 */
export interface TokenUsage {
  inputTokens: number;
  outputTokens: number;
  totalTokens: number;
}

/**
 * Estimate the usage of a call from its prompt parts and completion
 */
export function estimateUsage(promptParts: string[], completion: string): TokenUsage {
  const inputTokens = promptParts.reduce((sum, part) => sum + estimateTokens(part), 0);
  const outputTokens = estimateTokens(completion);
  return { inputTokens, outputTokens, totalTokens: inputTokens + outputTokens };
}

export function estimateCost(usage: TokenUsage, model: string): number {
  const pricing =
    PRICE_PER_MILLION[model] ?? PRICE_PER_MILLION[FALLBACK_PRICING_MODEL];
  return (usage.inputTokens * pricing.input + usage.outputTokens * pricing.output) / 1e6;
}

/**
 * Format a cost for display, switching to cents below one cent
 */
export function formatCost(costUsd: number): string {
  return costUsd < 0.01
    ? `${(costUsd * 100).toFixed(3)}¢`
    : `$${costUsd.toFixed(4)}`;
}
