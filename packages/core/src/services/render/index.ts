export { renderBriefMarkdown } from "./markdown";
export { renderBriefHtml, escapeHtml } from "./html";
export { briefSlug } from "./slug";
