/**
 * Standalone HTML rendering for research briefs
 */

import { Marked } from "marked";
import type { ResearchBrief } from "../../models/research";
import { renderBriefMarkdown } from "./markdown";

export function escapeHtml(value: string): string {
  return value
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;")
    .replace(/'/g, "&#39;");
}

/**
 * Titles, findings and summaries come from fetched pages and the model, so
 * raw HTML in them is rendered as text
 */
const briefMarked = new Marked({
  renderer: {
    html: (html: string) => escapeHtml(html),
  },
});

/**
 * Convert the Markdown brief to HTML and wrap it in a styled page
 */
export async function renderBriefHtml(brief: ResearchBrief): Promise<string> {
  const body = await briefMarked.parse(renderBriefMarkdown(brief), { async: true });

  return `<!DOCTYPE html>
<html lang="en">
<head>
  <meta charset="UTF-8">
  <meta name="viewport" content="width=device-width, initial-scale=1.0">
  <title>Research Brief: ${escapeHtml(brief.topic)}</title>
  <style>
    body { font-family: -apple-system, BlinkMacSystemFont, 'Segoe UI', Roboto, sans-serif; color: #1e293b; line-height: 1.6; }
    .container { max-width: 800px; margin: 0 auto; padding: 20px; }
    h1 { color: #0f172a; border-bottom: 2px solid #0284c7; padding-bottom: 10px; }
    h2 { color: #334155; margin-top: 30px; }
    h3 { color: #475569; }
    a { color: #0284c7; }
  </style>
</head>
<body>
  <div class="container">
${body}
  </div>
</body>
</html>
`;
}
