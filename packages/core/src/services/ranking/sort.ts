import type { Source } from "../../models/research";

/**
 * Order by relevance, highest first; ties keep their input order
 */
export function sortByRelevance(sources: Source[]): Source[] {
  return sources
    .map((source, index) => ({ source, index }))
    .sort((a, b) => b.source.relevance - a.source.relevance || a.index - b.index)
    .map(({ source }) => source);
}

export function clampRelevance(score: number): number {
  if (!Number.isFinite(score)) return 0;
  return Math.min(1, Math.max(0, score));
}
