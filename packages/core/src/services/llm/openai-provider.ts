/**
 * OpenAI Provider Implementation
 *
 * Implements LLMProvider and EmbeddingProvider on the openai SDK.
 * Requests are retried with exponential backoff; the SDK's own retries
 * are turned off so the two do not stack.
 */

import OpenAI from "openai";
import type {
  EmbeddingProvider,
  GenerateTextRequest,
  LLMProvider,
} from "../../interfaces/llm-provider";
import { sleep } from "../../utils/concurrency";
import { createModuleLogger, errorMessage } from "../../utils/logger";
import { ResearchCancelledError } from "../research-engine/errors";

const log = createModuleLogger("openai");

const EMBEDDING_BATCH_SIZE = 100;

export interface OpenAIProviderOptions {
  model?: string;
  embeddingModel?: string;
  embeddingDimensions?: number; // Omitted from requests when unset
  maxRetries?: number;
}

/**
 * Client errors other than rate limiting will fail the same way again
 */
function isRetryable(error: unknown): boolean {
  if (error instanceof OpenAI.APIError) {
    const status = error.status;
    return status === undefined || status === 429 || status >= 500;
  }
  return true;
}

/**
 * Run a request with exponential backoff. `maxRetries` counts retries after
 * the first attempt, so 0 still makes one call.
 */
export async function withRetry<T>(
  operation: string,
  maxRetries: number,
  signal: AbortSignal | undefined,
  request: () => Promise<T>
): Promise<T> {
  let lastError: unknown = null;
  const attempts = Math.max(1, maxRetries + 1);

  for (let attempt = 1; attempt <= attempts; attempt++) {
    try {
      return await request();
    } catch (error) {
      if (signal?.aborted) {
        throw new ResearchCancelledError(signal.reason);
      }
      if (!isRetryable(error)) {
        throw error;
      }
      lastError = error;
      log.warn(`${operation} attempt ${attempt}/${attempts} failed`, {
        error: errorMessage(error),
      });

      if (attempt < attempts) {
        const delay = Math.min(1000 * Math.pow(2, attempt - 1), 10000);
        await sleep(delay, signal);
      }
    }
  }

  throw new Error(
    `${operation} failed after ${attempts} attempt(s): ${errorMessage(lastError)}`,
    { cause: lastError }
  );
}

/**
 * OpenAI implementation of LLMProvider and EmbeddingProvider
 */
export class OpenAIProvider implements LLMProvider, EmbeddingProvider {
  private readonly client: OpenAI;
  private readonly modelName: string;
  private readonly embeddingModel: string;
  private readonly embeddingDimensions?: number;
  private readonly maxRetries: number;

  constructor(apiKey: string, options: OpenAIProviderOptions = {}) {
    this.client = new OpenAI({ apiKey, maxRetries: 0 });
    this.modelName = options.model ?? "gpt-4o-mini";
    this.embeddingModel = options.embeddingModel ?? "text-embedding-3-small";
    this.embeddingDimensions = options.embeddingDimensions;
    this.maxRetries = options.maxRetries ?? 3;
  }

  /**
   * Get the provider name
   */
  getName(): string {
    return "openai";
  }

  /**
   * Get the model name being used
   */
  getModel(): string {
    return this.modelName;
  }

  async generateText(request: GenerateTextRequest): Promise<string> {
    const model = request.model ?? this.modelName;
    const messages: OpenAI.Chat.ChatCompletionMessageParam[] = [];
    if (request.system) {
      messages.push({ role: "system", content: request.system });
    }
    messages.push({ role: "user", content: request.prompt });

    return withRetry("Text generation", this.maxRetries, request.signal, async () => {
      const response = await this.client.chat.completions.create(
        {
          model,
          messages,
          temperature: request.temperature,
          max_tokens: request.maxTokens,
          response_format:
            request.responseFormat === "json_object"
              ? { type: "json_object" }
              : undefined,
        },
        { signal: request.signal }
      );

      const content = response.choices[0]?.message?.content;
      if (!content) {
        throw new Error("No content in OpenAI response");
      }

      log.debug("Text generation completed", {
        model,
        promptTokens: response.usage?.prompt_tokens,
        completionTokens: response.usage?.completion_tokens,
      });
      return content;
    });
  }

  /**
   * Generate embeddings for a list of texts
   * Uses batch API for efficiency
   */
  async embed(texts: string[], signal?: AbortSignal): Promise<number[][]> {
    const embeddings: number[][] = [];

    for (let i = 0; i < texts.length; i += EMBEDDING_BATCH_SIZE) {
      const batch = texts.slice(i, i + EMBEDDING_BATCH_SIZE);
      const vectors = await withRetry("Embedding", this.maxRetries, signal, async () => {
        const response = await this.client.embeddings.create(
          {
            model: this.embeddingModel,
            input: batch,
            dimensions: this.embeddingDimensions,
          },
          { signal }
        );
        // Sort by index to ensure correct order
        return [...response.data]
          .sort((a, b) => a.index - b.index)
          .map((item) => item.embedding);
      });
      embeddings.push(...vectors);
    }

    return embeddings;
  }
}
