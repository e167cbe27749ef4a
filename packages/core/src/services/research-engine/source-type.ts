/**
 * Source type inference
 *
 * Best-effort, table-driven: the first rule whose patterns appear in the
 * domain wins, anything unmatched is plain "web".
 */

import type { SourceType } from "../../models/research";

const SOURCE_TYPE_RULES: ReadonlyArray<{ type: SourceType; patterns: string[] }> = [
  { type: "paper", patterns: ["arxiv.org", "doi.org", "pubmed.ncbi.nlm.nih.gov"] },
  { type: "repo", patterns: ["github.com", "gitlab.com", "bitbucket.org"] },
  { type: "news", patterns: ["news", "cnn", "bbc", "reuters", "apnews.com", "nytimes"] },
  { type: "blog", patterns: ["blog", "medium.com", "substack.com"] },
];

export function inferSourceType(domain: string): SourceType {
  const lower = domain.toLowerCase();
  const rule = SOURCE_TYPE_RULES.find(({ patterns }) =>
    patterns.some((pattern) => lower.includes(pattern))
  );
  return rule?.type ?? "web";
}
