/**
 * Filesystem-safe slug for brief output files
 */

const MAX_SLUG_LENGTH = 50;

export function briefSlug(topic: string): string {
  const slug = topic
    .toLowerCase()
    .replace(/[^a-z0-9-]/g, "-")
    .replace(/-+/g, "-")
    .replace(/^-+|-+$/g, "");

  return slug.slice(0, MAX_SLUG_LENGTH) || "research-brief";
}
