/**
 * Research brief synthesis using an LLM
 *
 * Sources are numbered from 1 in the prompt. Citations coming back are
 * converted to 0-based indices here but not range-checked; the engine
 * validates them against the final source list.
 */

import { randomUUID } from "crypto";
import type { LLMProvider } from "../../interfaces/llm-provider";
import type { Synthesizer } from "../../interfaces/research-stages";
import type {
  DetailedFinding,
  Source,
  SynthesizedBrief,
} from "../../models/research";
import {
  getArray,
  getNumber,
  getString,
  isRecord,
  parseJsonLoose,
} from "../../utils/json";
import { createModuleLogger } from "../../utils/logger";
import {
  estimateCost,
  estimateUsage,
  truncateToTokens,
} from "../../utils/token-estimation";
import { getSynthesisConfig, type ModelConfig } from "../research-engine/config";
import { getSynthesisPrompts, renderPrompt, withModelOverrides } from "./prompts";

const log = createModuleLogger("synthesizer");

export interface SynthesizerOptions {
  modelOverrides?: Partial<ModelConfig>;
  maxSourceTokens?: number; // Per-source excerpt budget
  defaultConfidence?: number;
}

/**
 * Parsed content of a synthesis response, citations already 0-based
 */
export interface ParsedSynthesis {
  executiveSummary: string;
  detailedFindings: DetailedFinding[];
  openQuestions: string[];
  format: "json" | "markdown";
}

/**
 * Build the numbered sources section of the prompt
 */
export function buildSourcesSection(
  sources: Source[],
  maxSourceTokens: number
): string {
  return sources
    .map(
      (source, i) =>
        `[${i + 1}] ${source.title} - ${source.domain} (${source.url})\nContent: ${truncateToTokens(source.content, maxSourceTokens)}`
    )
    .join("\n\n");
}

/**
 * Collect cited source numbers from a citations array and inline [n] / [n, m]
 * markers, in first-occurrence order, converted to 0-based indices
 */
export function extractCitations(
  content: string,
  listed: unknown[] = []
): number[] {
  const numbers: number[] = [];

  for (const value of listed) {
    const parsed =
      typeof value === "number"
        ? value
        : typeof value === "string" && /^\s*\d+\s*$/.test(value)
          ? Number(value)
          : NaN;
    if (Number.isInteger(parsed)) numbers.push(parsed);
  }

  for (const match of content.matchAll(/\[(\d+(?:\s*,\s*\d+)*)\]/g)) {
    for (const part of match[1].split(",")) {
      numbers.push(Number(part.trim()));
    }
  }

  return [...new Set(numbers)].map((n) => n - 1);
}

function clampConfidence(value: number | undefined, fallback: number): number {
  if (value === undefined) return fallback;
  return Math.min(1, Math.max(0, value));
}

/**
 * Parse the JSON response format
 */
function parseJsonSynthesis(
  parsed: unknown,
  defaultConfidence: number
): ParsedSynthesis | null {
  if (!isRecord(parsed)) {
    return null;
  }

  const detailedFindings: DetailedFinding[] = [];
  for (const entry of getArray(parsed, "findings")) {
    if (!isRecord(entry)) continue;
    const topic = getString(entry, "topic")?.trim() ?? "";
    const content = getString(entry, "content")?.trim() ?? "";
    if (!topic || !content) continue;

    detailedFindings.push({
      topic,
      content,
      citations: extractCitations(content, getArray(entry, "citations")),
      confidence: clampConfidence(
        getNumber(entry, "confidence"),
        defaultConfidence
      ),
    });
  }

  const openQuestions = getArray(parsed, "openQuestions")
    .filter((q): q is string => typeof q === "string")
    .map((q) => q.trim())
    .filter((q) => q.length > 0);

  return {
    executiveSummary: getString(parsed, "executiveSummary")?.trim() ?? "",
    detailedFindings,
    openQuestions,
    format: "json",
  };
}

/**
 * Split a markdown response into its "## " sections
 */
function extractSections(response: string): Map<string, string> {
  const sections = new Map<string, string>();
  let currentSection = "";
  let currentContent: string[] = [];

  const flush = (): void => {
    if (currentSection) {
      sections.set(currentSection, currentContent.join("\n").trim());
    }
  };

  for (const rawLine of response.split("\n")) {
    const line = rawLine.trim();
    if (line.startsWith("## ")) {
      flush();
      currentSection = line.substring(3).trim();
      currentContent = [];
    } else if (currentSection) {
      currentContent.push(line);
    }
  }
  flush();

  return sections;
}

/**
 * Parse the markdown response format
 */
export function parseMarkdownSynthesis(
  response: string,
  defaultConfidence: number
): ParsedSynthesis {
  const sections = extractSections(response);

  const detailedFindings: DetailedFinding[] = [];
  for (const subsection of (sections.get("Detailed Findings") ?? "").split(
    "### "
  )) {
    const lines = subsection.split("\n");
    const topic = lines[0].trim();
    const content = lines.slice(1).join("\n").trim();
    if (!topic || !content) continue;

    detailedFindings.push({
      topic,
      content,
      citations: extractCitations(content),
      confidence: defaultConfidence,
    });
  }

  const openQuestions: string[] = [];
  for (const rawLine of (sections.get("Open Questions") ?? "").split("\n")) {
    const line = rawLine.trim();
    if (line.startsWith("- ") || line.startsWith("* ")) {
      const question = line.substring(2).trim();
      if (question) openQuestions.push(question);
    }
  }

  return {
    executiveSummary: sections.get("Executive Summary") ?? "",
    detailedFindings,
    openQuestions,
    format: "markdown",
  };
}

/**
 * Parse a synthesis response, JSON first with the markdown format as fallback
 */
export function parseSynthesisResponse(
  response: string,
  defaultConfidence: number
): ParsedSynthesis {
  let parsed: ParsedSynthesis | null = null;
  try {
    parsed = parseJsonSynthesis(parseJsonLoose(response), defaultConfidence);
  } catch {
    parsed = null;
  }

  if (!parsed) {
    log.debug("Synthesis response is not JSON, parsing markdown sections");
    parsed = parseMarkdownSynthesis(response, defaultConfidence);
  }

  if (!parsed.executiveSummary && parsed.detailedFindings.length === 0) {
    throw new Error("Synthesis response contained no summary or findings");
  }
  return parsed;
}

/**
 * LLM implementation of Synthesizer
 */
export class LLMSynthesizer implements Synthesizer {
  constructor(
    private readonly llm: LLMProvider,
    private readonly options: SynthesizerOptions = {}
  ) {}

  async synthesizeBrief(
    topic: string,
    sources: Source[],
    subQueries: string[],
    signal?: AbortSignal
  ): Promise<SynthesizedBrief> {
    if (sources.length === 0) {
      throw new Error("Cannot synthesize a brief without sources");
    }

    const synthesisConfig = getSynthesisConfig();
    const maxSourceTokens =
      this.options.maxSourceTokens ?? synthesisConfig.maxSourceTokens;
    const defaultConfidence =
      this.options.defaultConfidence ?? synthesisConfig.defaultConfidence;
    const prompts = withModelOverrides(
      getSynthesisPrompts(),
      this.options.modelOverrides
    );

    const prompt = renderPrompt(prompts.user, {
      topic,
      subQueries: subQueries.map((q) => `- ${q}`).join("\n"),
      sources: buildSourcesSection(sources, maxSourceTokens),
    });

    const response = await this.llm.generateText({
      system: prompts.system,
      prompt,
      model: prompts.model,
      temperature: prompts.temperature,
      maxTokens: prompts.maxTokens,
      responseFormat: prompts.responseFormat,
      signal,
    });

    const parsed = parseSynthesisResponse(response, defaultConfidence);

    const tokenUsage = estimateUsage([prompts.system, prompt], response);

    log.info("Synthesized research brief", {
      topic,
      findings: parsed.detailedFindings.length,
      openQuestions: parsed.openQuestions.length,
      format: parsed.format,
    });

    return {
      id: randomUUID(),
      topic,
      executiveSummary: parsed.executiveSummary,
      detailedFindings: parsed.detailedFindings,
      openQuestions: parsed.openQuestions,
      sources,
      subQueries,
      generatedAt: Date.now(),
      metadata: {
        model: prompts.model,
        responseFormat: parsed.format,
        tokenUsage,
        estimatedCostUsd: estimateCost(tokenUsage, prompts.model),
      },
    };
  }
}
