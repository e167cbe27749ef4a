import { describe, it, expect, vi, type Mock } from "vitest";
import type { EmbeddingProvider } from "../interfaces/llm-provider";
import { cosineSimilarity } from "../services/ranking/similarity";
import { EmbeddingRanker } from "../services/ranking/embedding-ranker";
import {
  KeywordRanker,
  authorityScore,
  extractKeywords,
  keywordRelevance,
} from "../services/ranking/keyword-ranker";
import { clampRelevance, sortByRelevance } from "../services/ranking/sort";
import { makeSource } from "./helpers";

type EmbedFn = (texts: string[], signal?: AbortSignal) => Promise<number[][]>;

function vectorEmbeddings(vectors: number[][]): EmbeddingProvider & { embed: Mock<EmbedFn> } {
  return {
    getName: () => "stub",
    embed: vi.fn<EmbedFn>(async () => vectors),
  };
}

describe("cosineSimilarity", () => {
  it("scores identical directions as 1 and orthogonal ones as 0", () => {
    expect(cosineSimilarity([1, 2], [2, 4])).toBeCloseTo(1);
    expect(cosineSimilarity([1, 0], [0, 1])).toBe(0);
  });

  it("returns 0 for a zero vector", () => {
    expect(cosineSimilarity([0, 0], [1, 1])).toBe(0);
  });

  it("rejects vectors of different lengths", () => {
    expect(() => cosineSimilarity([1], [1, 2])).toThrow();
  });
});

describe("sortByRelevance", () => {
  it("sorts highest first and keeps ties in input order", () => {
    const sorted = sortByRelevance([
      makeSource("https://example.com/a", 0.2),
      makeSource("https://example.com/b", 0.9),
      makeSource("https://example.com/c", 0.5),
      makeSource("https://example.com/d", 0.2),
    ]);

    expect(sorted.map((s) => s.url)).toEqual([
      "https://example.com/b",
      "https://example.com/c",
      "https://example.com/a",
      "https://example.com/d",
    ]);
  });

  it("clamps scores into [0, 1]", () => {
    expect(clampRelevance(-0.4)).toBe(0);
    expect(clampRelevance(1.3)).toBe(1);
    expect(clampRelevance(Number.NaN)).toBe(0);
  });
});

describe("EmbeddingRanker", () => {
  it("orders sources by similarity to the topic", async () => {
    const embeddings = vectorEmbeddings([
      [1, 0], // topic
      [0, 1],
      [1, 0],
      [1, 1],
      [-1, 0],
    ]);
    const ranker = new EmbeddingRanker(embeddings, { maxEmbeddingChars: 100 });
    const sources = [
      makeSource("https://example.com/a"),
      makeSource("https://example.com/b"),
      makeSource("https://example.com/c"),
      makeSource("https://example.com/d"),
    ];

    const ranked = await ranker.rankSources(sources, "topic");

    expect(ranked.map((s) => s.url)).toEqual([
      "https://example.com/b",
      "https://example.com/c",
      "https://example.com/a",
      "https://example.com/d",
    ]);
    expect(ranked[0].relevance).toBeCloseTo(1);
    expect(ranked[1].relevance).toBeCloseTo(Math.SQRT1_2);
    expect(ranked[3].relevance).toBe(0);
    expect(sources[1].relevance).toBe(0);
  });

  it("embeds the topic and truncated source text in one batch", async () => {
    const embeddings = vectorEmbeddings([
      [1, 0],
      [1, 0],
    ]);
    const ranker = new EmbeddingRanker(embeddings, { maxEmbeddingChars: 10 });

    await ranker.rankSources([makeSource("https://example.com/a")], "topic");

    expect(embeddings.embed).toHaveBeenCalledTimes(1);
    expect(embeddings.embed.mock.calls[0][0]).toEqual(["topic", "Article at"]);
  });

  it("does not call the provider for an empty source list", async () => {
    const embeddings = vectorEmbeddings([]);

    await expect(new EmbeddingRanker(embeddings).rankSources([], "topic")).resolves.toEqual([]);
    expect(embeddings.embed).not.toHaveBeenCalled();
  });

  it("fails when the provider returns the wrong number of vectors", async () => {
    const ranker = new EmbeddingRanker(vectorEmbeddings([[1, 0]]), {
      maxEmbeddingChars: 100,
    });

    await expect(
      ranker.rankSources([makeSource("https://example.com/a")], "topic")
    ).rejects.toThrow("Embedding provider returned 1 vectors for 2 texts");
  });
});

describe("keyword ranking", () => {
  it("drops stop words, short words and punctuation", () => {
    expect(extractKeywords("The edge, and caching!")).toEqual(["edge", "caching"]);
  });

  it("rewards authoritative domains and penalizes low quality hosts", () => {
    expect(authorityScore({ type: "paper", domain: "arxiv.org" })).toBeCloseTo(1);
    expect(authorityScore({ type: "web", domain: "notes.wordpress.com" })).toBeCloseTo(0.4);
  });

  it("combines title, content, authority and recency", () => {
    const source = {
      ...makeSource("https://github.com/acme/cache"),
      title: "Edge caching strategies",
      content: "Caching at the edge",
      type: "repo" as const,
    };

    // 0.4 title + 0.3 content + 0.85 * 0.2 authority + 0.1 * 0.1 recency
    expect(keywordRelevance(source, "edge caching")).toBeCloseTo(0.88);
  });

  it("ranks sources mentioning the topic first", async () => {
    const onTopic = {
      ...makeSource("https://example.com/on"),
      title: "Edge caching explained",
    };
    const offTopic = {
      ...makeSource("https://example.com/off"),
      title: "Gardening tips",
    };

    const ranked = await new KeywordRanker().rankSources([offTopic, onTopic], "edge caching");

    expect(ranked.map((s) => s.url)).toEqual([
      "https://example.com/on",
      "https://example.com/off",
    ]);
  });
});
