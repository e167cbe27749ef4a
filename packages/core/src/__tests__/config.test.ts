import * as fs from "fs";
import * as os from "os";
import * as path from "path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import {
  clearConfigCache,
  DEFAULT_CONFIG,
  getConfig,
  getConfigPath,
  loadConfig,
  withConfigOverrides,
} from "../services/research-engine/config";
import { createResearchConfig } from "../services/research-engine/run-config";

describe("config loading", () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), "research-config-"));
  });

  afterEach(() => {
    clearConfigCache();
    fs.rmSync(dir, { recursive: true, force: true });
  });

  function writeConfig(contents: string): string {
    const file = path.join(dir, "research-config.yaml");
    fs.writeFileSync(file, contents, "utf8");
    return file;
  }

  it("merges the file over the defaults", () => {
    const file = writeConfig(
      [
        "search:",
        "  provider: brave",
        "  concurrency: 3",
        "research:",
        "  maxSources: 10",
        "unknownSection: 1",
      ].join("\n")
    );

    const config = loadConfig(file);

    expect(config.search.provider).toBe("brave");
    expect(config.search.concurrency).toBe(3);
    expect(config.search.timeoutMs).toBe(DEFAULT_CONFIG.search.timeoutMs);
    expect(config.research.maxSources).toBe(10);
    expect(config.research.since).toBe(DEFAULT_CONFIG.research.since);
    expect(config.extraction).toEqual(DEFAULT_CONFIG.extraction);
    expect("unknownSection" in config).toBe(false);
    expect(getConfigPath()).toBe(file);
  });

  it("ignores values of the wrong type", () => {
    const file = writeConfig(["search:", "  concurrency: many"].join("\n"));

    expect(loadConfig(file).search.concurrency).toBe(
      DEFAULT_CONFIG.search.concurrency
    );
  });

  it("falls back to the defaults on a parse error", () => {
    const file = writeConfig("search: [unclosed");

    expect(loadConfig(file)).toBe(DEFAULT_CONFIG);
    expect(getConfigPath()).toBeNull();
  });

  it("serves the cached config until cleared", () => {
    const file = writeConfig(["research:", "  since: 30d"].join("\n"));

    const loaded = loadConfig(file);
    expect(getConfig()).toBe(loaded);

    clearConfigCache();
    expect(getConfigPath()).toBeNull();
  });

  it("fills run config gaps from the loaded file", () => {
    loadConfig(
      writeConfig(
        ["research:", "  maxSources: 7", "  since: 2w", "search:", "  provider: mock"].join(
          "\n"
        )
      )
    );

    const config = createResearchConfig();

    expect(config.maxSources).toBe(7);
    expect(config.sinceMs).toBe(14 * 24 * 60 * 60 * 1000);
    expect(config.searchProvider).toBe("mock");
    expect(config.model).toBe(DEFAULT_CONFIG.llm.models.synthesis.model);
    expect(config.useJavaScript).toBe(false);
    expect(Object.isFrozen(config)).toBe(true);
  });
});

describe("withConfigOverrides", () => {
  it("overrides nested values without touching the base", () => {
    const config = withConfigOverrides(
      { search: { concurrency: 4 }, cache: { enabled: false } },
      DEFAULT_CONFIG
    );

    expect(config.search.concurrency).toBe(4);
    expect(config.search.provider).toBe(DEFAULT_CONFIG.search.provider);
    expect(config.cache.enabled).toBe(false);
    expect(DEFAULT_CONFIG.search.concurrency).not.toBe(4);
  });
});

describe("createResearchConfig", () => {
  const valid = {
    maxSources: 5,
    sinceMs: 0,
    model: "test-model",
    searchProvider: "mock",
  } as const;

  it("keeps explicit values", () => {
    const config = createResearchConfig({ ...valid, outputHtml: true });

    expect(config).toEqual({
      maxSources: 5,
      sinceMs: 0,
      model: "test-model",
      searchProvider: "mock",
      useJavaScript: false,
      refreshCache: false,
      outputHtml: true,
    });
  });

  it("rejects a non-positive source cap", () => {
    expect(() => createResearchConfig({ ...valid, maxSources: 0 })).toThrow(
      "maxSources must be a positive integer, got 0"
    );
  });

  it("rejects a negative recency window", () => {
    expect(() => createResearchConfig({ ...valid, sinceMs: -1 })).toThrow(
      "sinceMs must be zero or positive, got -1"
    );
  });

  it("rejects a blank model", () => {
    expect(() => createResearchConfig({ ...valid, model: "  " })).toThrow(
      "model must not be empty"
    );
  });
});
