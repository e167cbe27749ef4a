/**
 * Shared utility functions
 */

// Logging
export { logger, createModuleLogger, errorMessage, type Logger } from "./logger";

// Concurrency and cancellation
export {
  createLimiter,
  throwIfAborted,
  sleep,
  createTimeoutController,
  type Limiter,
} from "./concurrency";

// Date filter utilities
export {
  parseSinceDuration,
  getRecencyBucket,
  bucketToDays,
  bucketStartCompact,
  formatReadableDate,
  type RecencyBucket,
} from "./date-filters";

// Deduplication utilities
export { normalizeUrl, extractDomain } from "./deduplication";

// Token estimation
export {
  estimateTokens,
  truncateToTokens,
  estimateUsage,
  estimateCost,
  formatCost,
  type TokenUsage,
} from "./token-estimation";

export { deepFreeze } from "./freeze";
export { isRecord, parseJsonLoose } from "./json";
