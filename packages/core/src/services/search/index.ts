/**
 * Search Provider implementations
 */

export { DuckDuckGoSearchProvider, parseDuckDuckGoResults, extractFinalUrl } from "./duckduckgo-provider";
export { SerpApiSearchProvider } from "./serpapi-provider";
export { GoogleSearchProvider } from "./google-provider";
export { BraveSearchProvider } from "./brave-provider";
export { MockSearchProvider } from "./mock-provider";
export { RateLimiter } from "./rate-limiter";
export type { SearchRequestOptions } from "./http";
export {
  SearchProviderError,
  MissingApiKeyError,
  MissingSearchIdError,
  UnsupportedProviderError,
  RateLimitedError,
} from "./errors";
