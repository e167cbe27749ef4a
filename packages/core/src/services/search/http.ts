/**
 * HTTP plumbing shared by the search backends
 */

import {
  createTimeoutController,
  sleep,
  throwIfAborted,
} from "../../utils/concurrency";
import { createModuleLogger, errorMessage } from "../../utils/logger";
import { ResearchCancelledError } from "../research-engine/errors";
import { RateLimitedError, SearchProviderError } from "./errors";
import type { RateLimiter } from "./rate-limiter";

const log = createModuleLogger("search");

/**
 * Settings every HTTP-backed provider accepts
 */
export interface SearchRequestOptions {
  timeoutMs?: number;
  maxRetries?: number;
  minIntervalMs?: number;
}

export const DEFAULT_SEARCH_TIMEOUT_MS = 30000;
export const DEFAULT_SEARCH_RETRIES = 2;

interface RequestParams {
  provider: string;
  url: string;
  headers?: Record<string, string>;
  timeoutMs: number;
  maxRetries: number;
  rateLimiter: RateLimiter;
  signal?: AbortSignal;
}

function isRetryable(error: unknown): boolean {
  if (error instanceof SearchProviderError) {
    return error.status === undefined || error.status >= 500;
  }
  return true;
}

/**
 * Single rate-limited GET with a timeout
 */
async function requestOnce(params: RequestParams): Promise<string> {
  await params.rateLimiter.wait(params.signal);

  const timeout = createTimeoutController(params.timeoutMs, params.signal);
  try {
    const response = await fetch(params.url, {
      method: "GET",
      headers: params.headers,
      signal: timeout.signal,
    });

    if (response.status === 429) {
      throw new RateLimitedError(params.provider);
    }

    if (!response.ok) {
      const errorText = await response.text();
      throw new SearchProviderError(
        params.provider,
        `request failed with status ${response.status}: ${errorText.slice(0, 200)}`,
        { status: response.status }
      );
    }

    return await response.text();
  } catch (error) {
    throwIfAborted(params.signal);
    if (timeout.didTimeout()) {
      throw new SearchProviderError(
        params.provider,
        `request timed out after ${params.timeoutMs}ms`,
        { cause: error }
      );
    }
    if (error instanceof SearchProviderError) {
      throw error;
    }
    throw new SearchProviderError(
      params.provider,
      `request failed: ${errorMessage(error)}`,
      { cause: error }
    );
  } finally {
    timeout.dispose();
  }
}

/**
 * GET with retry logic and exponential backoff.
 * Rate limiting and client errors are not retried.
 */
export async function requestWithRetry(params: RequestParams): Promise<string> {
  let lastError: unknown = null;
  const attempts = Math.max(1, params.maxRetries + 1);

  for (let attempt = 1; attempt <= attempts; attempt++) {
    try {
      return await requestOnce(params);
    } catch (error) {
      if (error instanceof ResearchCancelledError || !isRetryable(error)) {
        throw error;
      }
      lastError = error;

      if (attempt < attempts) {
        log.warn("Search attempt failed, retrying", {
          provider: params.provider,
          attempt,
          attempts,
          error: errorMessage(error),
        });
        // Exponential backoff
        const delay = Math.min(1000 * Math.pow(2, attempt - 1), 10000);
        await sleep(delay, params.signal);
      }
    }
  }

  throw lastError;
}

/**
 * Parse a JSON response body
 */
export function parseJsonBody(provider: string, body: string): unknown {
  try {
    return JSON.parse(body);
  } catch (error) {
    throw new SearchProviderError(provider, "failed to parse response", {
      cause: error,
    });
  }
}
