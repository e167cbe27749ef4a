/**
 * LLM Provider Interface
 *
 * Abstract text-in/text-out and embedding capabilities.
 * The planner, synthesizer and ranker only depend on these shapes,
 * never on a vendor SDK.
 */

/**
 * A single text generation request
 */
export interface GenerateTextRequest {
  prompt: string;
  system?: string;
  model?: string; // Falls back to the provider's default model
  temperature?: number; // 0.0-2.0, lower = more deterministic
  maxTokens?: number;
  responseFormat?: "json_object" | "text";
  signal?: AbortSignal;
}

/**
 * LLM Provider interface
 * All generation backends must implement these methods
 */
export interface LLMProvider {
  /**
   * Turn a prompt into text
   */
  generateText(request: GenerateTextRequest): Promise<string>;

  /**
   * Get the provider name
   */
  getName(): string;

  /**
   * Get the default model name
   */
  getModel(): string;
}

/**
 * Embedding Provider interface
 * Used by the ranker to score sources by semantic similarity
 */
export interface EmbeddingProvider {
  /**
   * Embed every text; output[i] belongs to texts[i]
   */
  embed(texts: string[], signal?: AbortSignal): Promise<number[][]>;

  getName(): string;
}
