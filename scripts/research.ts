/**
 * Deep Research CLI
 *
 * Researches a topic end to end and writes the brief to disk as Markdown,
 * JSON and (optionally) HTML.
 *
 * Usage:
 *   npm run research -- "<topic>" [options]
 *
 * Example:
 *   npm run research -- "sqlite write-ahead logging" --since=30d --max-sources=15
 *
 * Options:
 *   --since=7d                 Recency window (h, d, w, m, y; "all" for none)
 *   --max-sources=25           Sources kept in the brief
 *   --model=gpt-4o-mini        Model used for planning and synthesis
 *   --search-provider=NAME     duckduckgo | serpapi | google | brave | mock
 *   --javascript               Render pages with JavaScript (needs a page renderer)
 *   --refresh                  Ignore cached pages and refetch
 *   --html                     Also write an HTML brief
 *   --fallback-query           Search the bare topic if decomposition fails
 *   --out=research             Output directory
 *
 * Environment variables:
 *   OPENAI_API_KEY (required)
 *   SERPAPI_KEY, GOOGLE_CSE_API_KEY + GOOGLE_CSE_ID, BRAVE_SEARCH_API_KEY
 *     (depending on the search provider)
 */

// Load environment variables from .env file
import * as dotenv from "dotenv";
import * as path from "path";
dotenv.config({ path: path.resolve(__dirname, "../.env") });

import { mkdir, writeFile } from "fs/promises";
import {
  createLLMProvider,
  createResearchConfig,
  createSearchProvider,
  briefSlug,
  errorMessage,
  formatCost,
  getCacheConfig,
  getConfig,
  getRankingConfig,
  isSearchProviderType,
  openContentCache,
  parseSinceDuration,
  renderBriefHtml,
  renderBriefMarkdown,
  EmbeddingRanker,
  KeywordRanker,
  LLMPlanner,
  LLMSynthesizer,
  ResearchCancelledError,
  ResearchContentFetcher,
  ResearchEngine,
  ResearchError,
  type Ranker,
  type ResearchBrief,
  type ResearchConfig,
} from "../packages/core/src";

interface CliOptions {
  topic: string;
  overrides: Partial<ResearchConfig>;
  plannerFallback: boolean;
  outDir: string;
}

const USAGE = `Usage:
  npm run research -- "<topic>" [--since=7d] [--max-sources=25] [--model=NAME]
    [--search-provider=duckduckgo] [--javascript] [--refresh] [--html]
    [--fallback-query] [--out=research]`;

function parseArgs(args: string[]): CliOptions {
  const overrides: { -readonly [K in keyof ResearchConfig]?: ResearchConfig[K] } = {};
  const topicParts: string[] = [];
  let plannerFallback = false;
  let outDir = "research";

  for (const arg of args) {
    if (!arg.startsWith("--")) {
      topicParts.push(arg);
      continue;
    }

    const [flag, ...rest] = arg.slice(2).split("=");
    const value = rest.join("=");

    switch (flag) {
      case "since":
        overrides.sinceMs = parseSinceDuration(value);
        break;
      case "max-sources": {
        const maxSources = Number(value);
        if (!Number.isInteger(maxSources) || maxSources < 1) {
          throw new Error(`--max-sources must be a positive integer, got "${value}"`);
        }
        overrides.maxSources = maxSources;
        break;
      }
      case "model":
        overrides.model = value;
        break;
      case "search-provider": {
        const provider = value.trim().toLowerCase();
        if (!isSearchProviderType(provider)) {
          throw new Error(`Unsupported search provider: ${value}`);
        }
        overrides.searchProvider = provider;
        break;
      }
      case "javascript":
        overrides.useJavaScript = true;
        break;
      case "refresh":
        overrides.refreshCache = true;
        break;
      case "html":
        overrides.outputHtml = true;
        break;
      case "fallback-query":
        plannerFallback = true;
        break;
      case "out":
        outDir = value || outDir;
        break;
      default:
        throw new Error(`Unknown option: --${flag}`);
    }
  }

  const topic = topicParts.join(" ").trim();
  if (!topic) {
    throw new Error("Missing research topic");
  }

  return { topic, overrides, plannerFallback, outDir };
}

/**
 * Write the brief next to its Markdown and HTML renderings
 */
async function writeOutputs(
  brief: ResearchBrief,
  outDir: string
): Promise<{ markdown: string; paths: string[] }> {
  await mkdir(outDir, { recursive: true });

  const slug = briefSlug(brief.topic);
  const markdown = renderBriefMarkdown(brief);
  const paths: string[] = [];

  const markdownPath = path.join(outDir, `${slug}.md`);
  await writeFile(markdownPath, markdown, "utf-8");
  paths.push(markdownPath);

  const jsonPath = path.join(outDir, `${slug}.json`);
  await writeFile(jsonPath, JSON.stringify(brief, null, 2), "utf-8");
  paths.push(jsonPath);

  if (brief.config.outputHtml) {
    const htmlPath = path.join(outDir, `${slug}.html`);
    await writeFile(htmlPath, await renderBriefHtml(brief), "utf-8");
    paths.push(htmlPath);
  }

  return { markdown, paths };
}

async function runResearch(options: CliOptions): Promise<void> {
  const config = createResearchConfig(options.overrides);
  const modelOverrides = options.overrides.model
    ? { model: options.overrides.model }
    : undefined;

  console.log("\n" + "=".repeat(60));
  console.log("  DEEP RESEARCH");
  console.log("=".repeat(60) + "\n");
  console.log(`Topic:           ${options.topic}`);
  console.log(`Search provider: ${config.searchProvider}`);
  console.log(`Model:           ${config.model}`);
  console.log(`Max sources:     ${config.maxSources}\n`);

  // 1. Initialize providers
  const llm = createLLMProvider();
  const searcher = createSearchProvider({ provider: config.searchProvider });
  const cacheConfig = getCacheConfig();
  const cache = cacheConfig.enabled ? openContentCache(cacheConfig.path) : undefined;

  const ranker: Ranker =
    getRankingConfig().strategy === "embedding"
      ? new EmbeddingRanker(llm, {
          maxEmbeddingChars: getRankingConfig().maxEmbeddingChars,
        })
      : new KeywordRanker();

  const engine = new ResearchEngine(
    {
      planner: new LLMPlanner(llm, { modelOverrides }),
      searcher,
      fetcher: new ResearchContentFetcher({ cache }),
      ranker,
      synthesizer: new LLMSynthesizer(llm, { modelOverrides }),
    },
    { plannerFallback: options.plannerFallback }
  );

  // 2. Wire Ctrl-C to cancellation
  const controller = new AbortController();
  const onInterrupt = () => {
    console.log("\n⚠️  Interrupted, cancelling research...");
    controller.abort(new Error("Interrupted by user"));
  };
  process.once("SIGINT", onInterrupt);

  try {
    console.log("🚀 Starting research...\n");
    const brief = await engine.research(options.topic, config, controller.signal);

    // 3. Write outputs
    const { markdown, paths } = await writeOutputs(brief, options.outDir);

    console.log("\n✅ Research completed");
    console.log(`Sub-queries:       ${brief.subQueries.length}`);
    console.log(`Sources:           ${brief.sources.length}`);
    console.log(`Detailed findings: ${brief.detailedFindings.length}`);
    console.log(`Open questions:    ${brief.openQuestions.length}`);
    console.log(`Generated at:      ${new Date(brief.generatedAt).toISOString()}`);
    const cost = brief.metadata.estimatedCostUsd;
    if (typeof cost === "number") {
      console.log(`Estimated cost:    ${formatCost(cost)}`);
    }
    console.log("");
    paths.forEach((p) => console.log(`📄 ${p}`));

    console.log("\n" + "=".repeat(80));
    console.log(markdown);
    console.log("=".repeat(80));
  } finally {
    process.removeListener("SIGINT", onInterrupt);
    await cache?.close();
  }
}

async function main(): Promise<void> {
  let options: CliOptions;
  try {
    getConfig();
    options = parseArgs(process.argv.slice(2));
  } catch (error) {
    console.error(`\n✗ Error: ${errorMessage(error)}\n`);
    console.error(USAGE + "\n");
    process.exit(1);
  }

  try {
    await runResearch(options);
  } catch (error) {
    if (error instanceof ResearchCancelledError) {
      console.error("\n✗ Research cancelled\n");
    } else if (error instanceof ResearchError) {
      console.error(`\n✗ Research failed during ${error.stage}: ${error.message}\n`);
    } else {
      console.error(`\n✗ Research failed: ${errorMessage(error)}\n`);
    }
    process.exit(1);
  }
}

main().catch((error: unknown) => {
  console.error(errorMessage(error));
  process.exit(1);
});
