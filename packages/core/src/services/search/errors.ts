/**
 * Search provider errors
 */

export class SearchProviderError extends Error {
  readonly provider: string;
  readonly status?: number;

  constructor(
    provider: string,
    message: string,
    options?: ErrorOptions & { status?: number }
  ) {
    super(`${provider}: ${message}`, options);
    this.name = "SearchProviderError";
    this.provider = provider;
    this.status = options?.status;
  }
}

/**
 * A required API key is not provided
 */
export class MissingApiKeyError extends Error {
  constructor(provider: string, envVar: string) {
    super(`API key is required for ${provider} (set ${envVar})`);
    this.name = "MissingApiKeyError";
  }
}

/**
 * A required search engine ID is not provided
 */
export class MissingSearchIdError extends Error {
  constructor(provider: string, envVar: string) {
    super(`Search ID is required for ${provider} (set ${envVar})`);
    this.name = "MissingSearchIdError";
  }
}

/**
 * An unknown provider key was requested
 */
export class UnsupportedProviderError extends Error {
  constructor(provider: string) {
    super(`Unsupported search provider: ${provider}`);
    this.name = "UnsupportedProviderError";
  }
}

/**
 * The backend answered with a rate limit or block page
 */
export class RateLimitedError extends SearchProviderError {
  constructor(provider: string, message = "rate limit exceeded") {
    super(provider, message, { status: 429 });
    this.name = "RateLimitedError";
  }
}
