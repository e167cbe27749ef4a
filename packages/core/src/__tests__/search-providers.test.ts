import { afterEach, describe, it, expect, vi } from "vitest";
import type { SearchConfig } from "../models/search-result";
import { BraveSearchProvider } from "../services/search/brave-provider";
import {
  DuckDuckGoSearchProvider,
  extractFinalUrl,
  parseDuckDuckGoResults,
} from "../services/search/duckduckgo-provider";
import { RateLimitedError, SearchProviderError } from "../services/search/errors";
import { GoogleSearchProvider } from "../services/search/google-provider";
import { MockSearchProvider } from "../services/search/mock-provider";
import { SerpApiSearchProvider } from "../services/search/serpapi-provider";

const DAY_MS = 24 * 60 * 60 * 1000;
const NO_WAIT = { minIntervalMs: 0, maxRetries: 0, timeoutMs: 1000 };

const WEEK: SearchConfig = { maxResults: 5, sinceMs: 7 * DAY_MS, language: "en" };

type FetchFn = (input: string | URL | Request, init?: RequestInit) => Promise<Response>;

function stubFetch(...responses: Array<() => Response>) {
  let call = 0;
  const mock = vi.fn<FetchFn>(async () => {
    const next = responses[Math.min(call, responses.length - 1)];
    call++;
    return next();
  });
  vi.stubGlobal("fetch", mock);
  return mock;
}

const ok = (body: string) => () => new Response(body, { status: 200 });
const httpStatus = (code: number) => () => new Response("error body", { status: code });

afterEach(() => {
  vi.unstubAllGlobals();
});

const DDG_HTML = `<html><body>
  <div class="result result--ad">
    <a class="result__a" href="https://ads.example.com/buy">Sponsored</a>
  </div>
  <div class="result">
    <a class="result__a" href="//duckduckgo.com/l/?uddg=https%3A%2F%2Fwww.example.com%2Fedge&amp;rut=abc">
      Edge   caching
    </a>
    <a class="result__snippet">How edge caches work.</a>
  </div>
  <div class="result">
    <span>No link in this block</span>
  </div>
  <div class="result">
    <a class="result__a" href="https://cdn.example.org/guide">CDN guide</a>
    <div class="result__snippet">A guide to CDNs.</div>
  </div>
  <div class="result">
    <a class="result__a" href="https://third.example.net/">Third</a>
  </div>
</body></html>`;

describe("extractFinalUrl", () => {
  it("decodes DuckDuckGo redirect links", () => {
    expect(extractFinalUrl("//duckduckgo.com/l/?uddg=https%3A%2F%2Fexample.com%2Fpage&rut=abc")).toBe(
      "https://example.com/page"
    );
  });

  it("passes direct links through unchanged", () => {
    expect(extractFinalUrl("https://example.com/x")).toBe("https://example.com/x");
  });

  it("drops internal and non-web links", () => {
    expect(extractFinalUrl("/y.js?ad=1")).toBe("");
    expect(extractFinalUrl("javascript:void(0)")).toBe("");
    expect(extractFinalUrl("")).toBe("");
  });
});

describe("parseDuckDuckGoResults", () => {
  it("skips ads and link-less blocks and stops at maxResults", () => {
    const results = parseDuckDuckGoResults(DDG_HTML, 2);

    expect(results).toEqual([
      {
        url: "https://www.example.com/edge",
        title: "Edge caching",
        snippet: "How edge caches work.",
        domain: "example.com",
        source: "DuckDuckGo",
        rank: 1,
      },
      {
        url: "https://cdn.example.org/guide",
        title: "CDN guide",
        snippet: "A guide to CDNs.",
        domain: "cdn.example.org",
        source: "DuckDuckGo",
        rank: 2,
      },
    ]);
  });
});

describe("DuckDuckGoSearchProvider", () => {
  it("builds the HTML endpoint URL with a date filter and region", () => {
    const provider = new DuckDuckGoSearchProvider(NO_WAIT);

    expect(provider.buildSearchUrl("edge caching", WEEK)).toBe(
      "https://html.duckduckgo.com/html/?df=w&q=edge+caching&b=0&kl=us-en&s=0"
    );
    expect(
      provider.buildSearchUrl("edge caching", { maxResults: 5, sinceMs: 0, language: "de" })
    ).toBe("https://html.duckduckgo.com/html/?q=edge+caching&b=0&kl=wt-wt&s=0");
  });

  it("parses results from the fetched page", async () => {
    stubFetch(ok(DDG_HTML));

    const results = await new DuckDuckGoSearchProvider(NO_WAIT).search("edge caching", WEEK);

    expect(results.map((r) => r.url)).toEqual([
      "https://www.example.com/edge",
      "https://cdn.example.org/guide",
      "https://third.example.net/",
    ]);
  });

  it("reports a CAPTCHA page as rate limiting", async () => {
    stubFetch(ok("<html><body>Please complete the captcha to continue</body></html>"));

    await expect(
      new DuckDuckGoSearchProvider(NO_WAIT).search("edge caching", WEEK)
    ).rejects.toBeInstanceOf(RateLimitedError);
  });

  it("returns no results for an empty page", async () => {
    stubFetch(ok("<html><body>No results.</body></html>"));

    await expect(
      new DuckDuckGoSearchProvider(NO_WAIT).search("edge caching", WEEK)
    ).resolves.toEqual([]);
  });
});

describe("search request handling", () => {
  it("does not retry a rate limited request", async () => {
    const fetchMock = stubFetch(httpStatus(429));
    const provider = new DuckDuckGoSearchProvider({ ...NO_WAIT, maxRetries: 2 });

    await expect(provider.search("q", WEEK)).rejects.toBeInstanceOf(RateLimitedError);
    expect(fetchMock).toHaveBeenCalledTimes(1);
  });

  it("does not retry a client error", async () => {
    const fetchMock = stubFetch(httpStatus(400));
    const provider = new SerpApiSearchProvider("test-secret", { ...NO_WAIT, maxRetries: 2 });

    await expect(provider.search("q", WEEK)).rejects.toMatchObject({
      name: "SearchProviderError",
      status: 400,
    });
    expect(fetchMock).toHaveBeenCalledTimes(1);
  });

  it("retries a server error", async () => {
    const fetchMock = stubFetch(httpStatus(502), ok(JSON.stringify({ organic_results: [] })));
    const provider = new SerpApiSearchProvider("test-secret", { ...NO_WAIT, maxRetries: 1 });

    await expect(provider.search("q", WEEK)).resolves.toEqual([]);
    expect(fetchMock).toHaveBeenCalledTimes(2);
  });

  it("rejects a body that is not JSON", async () => {
    stubFetch(ok("<html>oops</html>"));
    const provider = new BraveSearchProvider("test-secret", NO_WAIT);

    await expect(provider.search("q", WEEK)).rejects.toThrow(
      "Brave Search: failed to parse response"
    );
  });
});

describe("GoogleSearchProvider", () => {
  const provider = new GoogleSearchProvider("test-secret", "test-cx", NO_WAIT);

  it("builds the API URL with a date-restricted sort", () => {
    const url = new URL(
      provider.buildSearchUrl("edge caching", { ...WEEK, maxResults: 25 }, new Date(2024, 5, 15))
    );

    expect(url.origin + url.pathname).toBe("https://www.googleapis.com/customsearch/v1");
    expect(url.searchParams.get("key")).toBe("test-secret");
    expect(url.searchParams.get("cx")).toBe("test-cx");
    expect(url.searchParams.get("q")).toBe("edge caching");
    expect(url.searchParams.get("num")).toBe("10");
    expect(url.searchParams.get("sort")).toBe("date:r:20240608:20240615");
    expect(url.searchParams.get("lr")).toBe("lang_en");
  });

  it("parses items into ranked results", () => {
    const results = provider.parseResponse({
      items: [
        { link: "https://www.example.com/a", title: "A", snippet: "First" },
        { title: "Missing link" },
        { link: "https://example.org/b", title: "B" },
      ],
    });

    expect(results).toEqual([
      {
        url: "https://www.example.com/a",
        title: "A",
        snippet: "First",
        domain: "example.com",
        source: "Google",
        rank: 1,
      },
      {
        url: "https://example.org/b",
        title: "B",
        snippet: "",
        domain: "example.org",
        source: "Google",
        rank: 2,
      },
    ]);
  });

  it("pages past ten results up to the budget", async () => {
    const page = (from: number, count: number) =>
      ok(
        JSON.stringify({
          items: Array.from({ length: count }, (_, i) => ({
            link: `https://example.com/${from + i}`,
            title: `Item ${from + i}`,
          })),
        })
      );
    const fetchMock = stubFetch(page(1, 10), page(11, 2));

    const results = await provider.search("edge caching", {
      maxResults: 12,
      sinceMs: 0,
      language: "en",
    });

    expect(fetchMock).toHaveBeenCalledTimes(2);
    const second = new URL(String(fetchMock.mock.calls[1][0]));
    expect(second.searchParams.get("start")).toBe("11");
    expect(second.searchParams.get("num")).toBe("2");
    expect(results.map((r) => r.rank)).toEqual([1, 2, 3, 4, 5, 6, 7, 8, 9, 10, 11, 12]);
    expect(results[11].url).toBe("https://example.com/12");
  });

  it("stops paging when a page comes back short", async () => {
    const fetchMock = stubFetch(
      ok(JSON.stringify({ items: [{ link: "https://example.com/only", title: "Only" }] }))
    );

    const results = await provider.search("edge caching", { ...WEEK, maxResults: 25 });

    expect(fetchMock).toHaveBeenCalledTimes(1);
    expect(results).toHaveLength(1);
  });

  it("surfaces API errors with their status", () => {
    let error: unknown;
    try {
      provider.parseResponse({ error: { code: 403, message: "Daily limit exceeded" } });
    } catch (e) {
      error = e;
    }

    expect(error).toBeInstanceOf(SearchProviderError);
    expect(error).toMatchObject({
      status: 403,
      message: "Google Custom Search: API error (403): Daily limit exceeded",
    });
  });
});

describe("SerpApiSearchProvider", () => {
  const provider = new SerpApiSearchProvider("test-secret", NO_WAIT);

  it("maps the recency window onto tbs", () => {
    const url = new URL(
      provider.buildSearchUrl("edge caching", { maxResults: 3, sinceMs: DAY_MS, language: "en" })
    );

    expect(url.searchParams.get("engine")).toBe("google");
    expect(url.searchParams.get("api_key")).toBe("test-secret");
    expect(url.searchParams.get("num")).toBe("3");
    expect(url.searchParams.get("tbs")).toBe("qdr:d");
    expect(url.searchParams.get("hl")).toBe("en");
  });

  it("reads organic results with their position and date", () => {
    const results = provider.parseResponse({
      organic_results: [
        {
          position: 1,
          title: "Edge caching",
          link: "https://example.com/edge",
          snippet: "Snippet",
          date: "2 days ago",
        },
        { position: 2, title: "No link" },
      ],
    });

    expect(results).toEqual([
      {
        url: "https://example.com/edge",
        title: "Edge caching",
        snippet: "Snippet",
        domain: "example.com",
        publishedAt: "2 days ago",
        source: "SerpAPI",
        rank: 1,
      },
    ]);
  });

  it("throws on an error string", () => {
    expect(() => provider.parseResponse({ error: "Invalid API key." })).toThrow(
      "SerpAPI: API error: Invalid API key."
    );
  });
});

describe("BraveSearchProvider", () => {
  it("sends the subscription token and strips highlight tags", async () => {
    const fetchMock = stubFetch(
      ok(
        JSON.stringify({
          web: {
            results: [
              {
                url: "https://example.com/edge",
                title: "<strong>Edge</strong> caching",
                description: "All about <strong>caches</strong>.",
                page_age: "2024-06-01T00:00:00",
              },
            ],
          },
        })
      )
    );

    const results = await new BraveSearchProvider("test-secret", NO_WAIT).search(
      "edge caching",
      WEEK
    );

    expect(results).toEqual([
      {
        url: "https://example.com/edge",
        title: "Edge caching",
        snippet: "All about caches.",
        domain: "example.com",
        publishedAt: "2024-06-01T00:00:00",
        source: "Brave",
        rank: 1,
      },
    ]);

    const [input, init] = fetchMock.mock.calls[0];
    const url = new URL(String(input));
    expect(url.searchParams.get("count")).toBe("5");
    expect(url.searchParams.get("freshness")).toBe("pw");
    expect(new Headers(init?.headers).get("X-Subscription-Token")).toBe("test-secret");
  });

  it("returns nothing when the response has no web section", () => {
    expect(new BraveSearchProvider("test-secret", NO_WAIT).parseResponse({})).toEqual([]);
  });
});

describe("MockSearchProvider", () => {
  it("returns canned results up to maxResults", async () => {
    const results = await new MockSearchProvider().search("edge caching", {
      maxResults: 2,
      sinceMs: 0,
      language: "en",
    });

    expect(results.map((r) => r.title)).toEqual([
      "Example Article 1 (for query: edge caching)",
      "Test Article 2 (for query: edge caching)",
    ]);
    expect(results.map((r) => r.rank)).toEqual([1, 2]);
  });
});
