/**
 * Deduplication utilities
 *
 * URL normalization and domain extraction used to collapse the same page
 * surfacing from several sub-queries or search backends.
 */

/**
 * Query parameters that only carry tracking information
 */
const TRACKING_PARAMS = new Set([
  "utm_source",
  "utm_medium",
  "utm_campaign",
  "utm_term",
  "utm_content",
  "gclid",
  "fbclid",
  "mc_cid",
  "mc_eid",
  "ref",
]);

/**
 * Normalize URL for consistent comparison
 * - Lowercase hostname, remove www prefix
 * - Remove trailing slashes
 * - Drop fragment and tracking parameters, sort the remaining ones
 */
export function normalizeUrl(url: string): string {
  try {
    const urlObj = new URL(url.trim());

    // Normalize hostname (remove www)
    let hostname = urlObj.hostname.toLowerCase();
    if (hostname.startsWith("www.")) {
      hostname = hostname.substring(4);
    }

    // Normalize pathname (remove trailing slash)
    let pathname = urlObj.pathname;
    if (pathname.endsWith("/") && pathname.length > 1) {
      pathname = pathname.slice(0, -1);
    }
    if (pathname === "/") {
      pathname = "";
    }

    const params = [...urlObj.searchParams.entries()]
      .filter(([key]) => !TRACKING_PARAMS.has(key.toLowerCase()))
      .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
    const search =
      params.length > 0 ? `?${new URLSearchParams(params).toString()}` : "";

    const port = urlObj.port ? `:${urlObj.port}` : "";
    return `${urlObj.protocol}//${hostname}${port}${pathname}${search}`;
  } catch {
    // If URL parsing fails, just lowercase and return
    return url.toLowerCase().trim();
  }
}

/**
 * Extract the domain name from a URL, without the www. prefix
 */
export function extractDomain(url: string): string {
  try {
    const hostname = new URL(url).hostname.toLowerCase();
    return hostname.startsWith("www.") ? hostname.substring(4) : hostname;
  } catch {
    return "";
  }
}
