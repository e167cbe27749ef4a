/**
 * Date filtering utilities
 *
 * Functions for parsing recency windows, mapping them onto the coarse
 * buckets search backends understand, and formatting dates for output.
 */

import { format, subDays } from "date-fns";

const HOUR_MS = 60 * 60 * 1000;
const DAY_MS = 24 * HOUR_MS;

/**
 * Coarse recency filter shared by all search backends
 */
export type RecencyBucket = "day" | "week" | "month" | "year";

/**
 * Parse a recency window such as "24h", "7d", "2w" or "3m" into milliseconds.
 * An empty string, "0" or "all" means no window.
 */
export function parseSinceDuration(value: string): number {
  const trimmed = value.trim().toLowerCase();
  if (trimmed === "" || trimmed === "0" || trimmed === "all") {
    return 0;
  }

  const match = /^(\d+)\s*([hdwmy])$/.exec(trimmed);
  if (!match) {
    throw new Error(
      `Invalid time window "${value}". Use a number followed by h, d, w, m or y (e.g. 7d).`
    );
  }

  const amount = parseInt(match[1], 10);
  switch (match[2]) {
    case "h":
      return amount * HOUR_MS;
    case "d":
      return amount * DAY_MS;
    case "w":
      return amount * 7 * DAY_MS;
    case "m":
      return amount * 30 * DAY_MS;
    default:
      return amount * 365 * DAY_MS;
  }
}

/**
 * Map a recency window onto the nearest bucket that still covers it.
 * Windows longer than a year get no filter.
 */
export function getRecencyBucket(sinceMs: number): RecencyBucket | undefined {
  if (sinceMs <= 0) {
    return undefined;
  }

  // Round up: the bucket must cover the whole window
  const days = Math.ceil(sinceMs / DAY_MS);
  if (days <= 1) return "day";
  if (days <= 7) return "week";
  if (days <= 30) return "month";
  if (days <= 365) return "year";
  return undefined;
}

/**
 * Number of days a bucket spans
 */
export function bucketToDays(bucket: RecencyBucket): number {
  switch (bucket) {
    case "day":
      return 1;
    case "week":
      return 7;
    case "month":
      return 30;
    case "year":
      return 365;
  }
}

/**
 * Compact date (yyyyMMdd) of the start of a bucket, relative to `now`
 */
export function bucketStartCompact(
  bucket: RecencyBucket,
  now: Date = new Date()
): string {
  return format(subDays(now, bucketToDays(bucket)), "yyyyMMdd");
}

/**
 * Format a date for human-readable output, e.g. "January 2, 2024 at 3:04 PM"
 */
export function formatReadableDate(value: number | Date): string {
  return format(value, "MMMM d, yyyy 'at' h:mm a");
}
