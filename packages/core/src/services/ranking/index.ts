/**
 * Relevance rankers
 */

export { EmbeddingRanker, sourceEmbeddingText, type EmbeddingRankerOptions } from "./embedding-ranker";
export {
  KeywordRanker,
  keywordRelevance,
  authorityScore,
  textRelevance,
  extractKeywords,
} from "./keyword-ranker";
export { sortByRelevance, clampRelevance } from "./sort";
export { cosineSimilarity } from "./similarity";
