/**
 * Content cache implementations
 */

import type { ContentCache } from "../../interfaces/content-cache";
import { createModuleLogger, errorMessage } from "../../utils/logger";
import { MemoryContentCache } from "./memory-cache";
import { SqliteContentCache } from "./sqlite-cache";

export { SqliteContentCache } from "./sqlite-cache";
export { MemoryContentCache } from "./memory-cache";

const log = createModuleLogger("content-cache");

/**
 * Open the on-disk cache, falling back to an in-memory one if it cannot be opened
 */
export function openContentCache(dbPath: string): ContentCache {
  try {
    return new SqliteContentCache(dbPath);
  } catch (error) {
    log.warn("Could not open content cache, using in-memory cache", {
      path: dbPath,
      error: errorMessage(error),
    });
    return new MemoryContentCache();
  }
}
