/**
 * Semantic relevance ranking
 *
 * Embeds the topic and every source in one batch and scores each source
 * by cosine similarity to the topic.
 */

import type { EmbeddingProvider } from "../../interfaces/llm-provider";
import type { Ranker } from "../../interfaces/research-stages";
import type { Source } from "../../models/research";
import { throwIfAborted } from "../../utils/concurrency";
import { createModuleLogger } from "../../utils/logger";
import { getRankingConfig } from "../research-engine/config";
import { cosineSimilarity } from "./similarity";
import { clampRelevance, sortByRelevance } from "./sort";

const log = createModuleLogger("ranker");

export interface EmbeddingRankerOptions {
  maxEmbeddingChars?: number; // Leading characters of each source that get embedded
}

/**
 * Text embedded for a source
 */
export function sourceEmbeddingText(source: Source, maxChars: number): string {
  return `${source.title}\n\n${source.content}`.substring(0, maxChars);
}

export class EmbeddingRanker implements Ranker {
  constructor(
    private readonly embeddings: EmbeddingProvider,
    private readonly options: EmbeddingRankerOptions = {}
  ) {}

  async rankSources(
    sources: Source[],
    topic: string,
    signal?: AbortSignal
  ): Promise<Source[]> {
    if (sources.length === 0) {
      return [];
    }
    throwIfAborted(signal);

    const maxChars =
      this.options.maxEmbeddingChars ?? getRankingConfig().maxEmbeddingChars;
    const texts = [
      topic,
      ...sources.map((source) => sourceEmbeddingText(source, maxChars)),
    ];

    const vectors = await this.embeddings.embed(texts, signal);
    if (vectors.length !== texts.length) {
      throw new Error(
        `Embedding provider returned ${vectors.length} vectors for ${texts.length} texts`
      );
    }

    const [topicVector, ...sourceVectors] = vectors;
    const scored = sources.map((source, i) => ({
      ...source,
      relevance: clampRelevance(cosineSimilarity(topicVector, sourceVectors[i])),
    }));

    log.debug("Ranked sources by embedding similarity", {
      count: scored.length,
    });
    return sortByRelevance(scored);
  }
}
