/**
 * Markdown rendering for research briefs
 */

import type { ResearchBrief } from "../../models/research";
import { formatReadableDate } from "../../utils/date-filters";

/**
 * Render a brief as a Markdown document.
 * Sources are numbered from 1, matching the inline [n] citations.
 */
export function renderBriefMarkdown(brief: ResearchBrief): string {
  const lines: string[] = [];

  // Title and metadata
  lines.push(`# Research Brief: ${brief.topic}`, "");
  lines.push(`**Generated:** ${formatReadableDate(brief.generatedAt)}  `);
  lines.push(`**Model:** ${brief.config.model}  `);
  lines.push(`**Sources:** ${brief.sources.length}  `);
  lines.push(`**Sub-queries:** ${brief.subQueries.length}  `, "");

  lines.push("## Executive Summary", "", brief.executiveSummary, "");

  if (brief.detailedFindings.length > 0) {
    lines.push("## Detailed Findings", "");
    for (const finding of brief.detailedFindings) {
      lines.push(`### ${finding.topic}`, "", finding.content, "");
    }
  }

  if (brief.openQuestions.length > 0) {
    lines.push("## Open Questions", "");
    for (const question of brief.openQuestions) {
      lines.push(`- ${question}`);
    }
    lines.push("");
  }

  lines.push("## Sources", "");
  brief.sources.forEach((source, i) => {
    lines.push(`[${i + 1}] **${source.title}** - ${source.domain}  `);
    lines.push(`    ${source.url}  `);
    lines.push(`    *Type:* ${source.type}  `, "");
  });

  if (brief.subQueries.length > 0) {
    lines.push("## Research Queries Used", "");
    brief.subQueries.forEach((query, i) => {
      lines.push(`${i + 1}. ${query}`);
    });
    lines.push("");
  }

  return lines.join("\n");
}
