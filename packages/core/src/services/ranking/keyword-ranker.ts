/**
 * Heuristic relevance ranking
 *
 * Scores sources without any model: topic keyword overlap with the title
 * and the content, source authority, and a small constant recency bonus.
 */

import type { Ranker } from "../../interfaces/research-stages";
import type { Source } from "../../models/research";
import { throwIfAborted } from "../../utils/concurrency";
import { clampRelevance, sortByRelevance } from "./sort";

const WEIGHTS = {
  title: 0.4,
  content: 0.3,
  authority: 0.2,
  recency: 0.1,
};

// Retrieval time stands in for publication date, so every source gets the same bonus
const RECENCY_SCORE = 0.1;

const STOP_WORDS = new Set([
  "the", "a", "an", "and", "or", "but", "in", "on", "at", "to",
  "for", "of", "with", "by", "is", "are", "was", "were", "be", "been",
  "have", "has", "had", "do", "does", "did", "will", "would", "could", "should",
]);

const TYPE_BONUS: Record<Source["type"], number> = {
  paper: 0.3,
  news: 0.2,
  repo: 0.15,
  blog: 0.1,
  web: 0,
};

const HIGH_AUTHORITY_DOMAINS = [
  "arxiv.org", "doi.org", "pubmed.ncbi.nlm.nih.gov",
  "github.com", "stackoverflow.com", "medium.com",
  "nytimes.com", "washingtonpost.com", "reuters.com",
  "bbc.co.uk", "cnn.com", "techcrunch.com",
];

const LOW_QUALITY_DOMAINS = ["wordpress.com", "blogspot.com", "wix.com"];

/**
 * Extract meaningful keywords from text
 */
export function extractKeywords(text: string): string[] {
  return text
    .toLowerCase()
    .split(/\s+/)
    .map((word) => word.replace(/^[.,!?;:]+|[.,!?;:]+$/g, ""))
    .filter((word) => word.length >= 3 && !STOP_WORDS.has(word));
}

/**
 * Share of topic keywords found in the text
 */
export function textRelevance(text: string, topic: string): number {
  if (!text || !topic) return 0;

  const keywords = extractKeywords(topic);
  if (keywords.length === 0) return 0;

  const lower = text.toLowerCase();
  const matches = keywords.filter((word) => lower.includes(word)).length;
  return matches / keywords.length;
}

/**
 * Authority from source type and domain reputation
 */
export function authorityScore(source: Pick<Source, "type" | "domain">): number {
  let score = 0.5 + TYPE_BONUS[source.type];

  const domain = source.domain.toLowerCase();
  if (HIGH_AUTHORITY_DOMAINS.some((d) => domain.includes(d))) {
    score += 0.2;
  }
  if (LOW_QUALITY_DOMAINS.some((d) => domain.includes(d))) {
    score -= 0.1;
  }

  return clampRelevance(score);
}

export function keywordRelevance(source: Source, topic: string): number {
  return clampRelevance(
    textRelevance(source.title, topic) * WEIGHTS.title +
      textRelevance(source.content, topic) * WEIGHTS.content +
      authorityScore(source) * WEIGHTS.authority +
      RECENCY_SCORE * WEIGHTS.recency
  );
}

export class KeywordRanker implements Ranker {
  async rankSources(
    sources: Source[],
    topic: string,
    signal?: AbortSignal
  ): Promise<Source[]> {
    throwIfAborted(signal);
    return sortByRelevance(
      sources.map((source) => ({
        ...source,
        relevance: keywordRelevance(source, topic),
      }))
    );
  }
}
