import { describe, expect, it } from "vitest";
import { ResearchCancelledError } from "../services/research-engine/errors";
import {
  createLimiter,
  createTimeoutController,
  sleep,
  throwIfAborted,
} from "../utils/concurrency";
import {
  bucketStartCompact,
  formatReadableDate,
  getRecencyBucket,
  parseSinceDuration,
} from "../utils/date-filters";
import { extractDomain, normalizeUrl } from "../utils/deduplication";
import {
  estimateCost,
  estimateTokens,
  estimateUsage,
  formatCost,
  truncateToTokens,
} from "../utils/token-estimation";
import { delay } from "./helpers";

const HOUR = 60 * 60 * 1000;
const DAY = 24 * HOUR;

describe("parseSinceDuration", () => {
  it("parses each unit", () => {
    expect(parseSinceDuration("24h")).toBe(24 * HOUR);
    expect(parseSinceDuration("7d")).toBe(604_800_000);
    expect(parseSinceDuration("2w")).toBe(14 * DAY);
    expect(parseSinceDuration("3m")).toBe(90 * DAY);
    expect(parseSinceDuration("1y")).toBe(365 * DAY);
  });

  it("is case and whitespace insensitive", () => {
    expect(parseSinceDuration(" 7D ")).toBe(7 * DAY);
  });

  it("treats empty, zero and all as no window", () => {
    expect(parseSinceDuration("")).toBe(0);
    expect(parseSinceDuration("0")).toBe(0);
    expect(parseSinceDuration("all")).toBe(0);
  });

  it("rejects unknown units", () => {
    expect(() => parseSinceDuration("7x")).toThrow('Invalid time window "7x"');
  });
});

describe("getRecencyBucket", () => {
  it("picks the smallest bucket covering the window", () => {
    expect(getRecencyBucket(12 * HOUR)).toBe("day");
    expect(getRecencyBucket(DAY)).toBe("day");
    expect(getRecencyBucket(7 * DAY)).toBe("week");
    expect(getRecencyBucket(8 * DAY)).toBe("month");
    expect(getRecencyBucket(90 * DAY)).toBe("year");
  });

  it("rounds a partial day up so the window is never narrowed", () => {
    expect(getRecencyBucket(parseSinceDuration("36h"))).toBe("week");
    expect(getRecencyBucket(parseSinceDuration("170h"))).toBe("month");
    expect(getRecencyBucket(DAY + 1)).toBe("week");
  });

  it("applies no filter for no window or one over a year", () => {
    expect(getRecencyBucket(0)).toBeUndefined();
    expect(getRecencyBucket(400 * DAY)).toBeUndefined();
  });
});

describe("date formatting", () => {
  it("formats the start of a bucket as yyyyMMdd", () => {
    expect(bucketStartCompact("month", new Date(2024, 2, 15))).toBe("20240214");
    expect(bucketStartCompact("day", new Date(2024, 0, 1))).toBe("20231231");
  });

  it("formats readable dates", () => {
    expect(formatReadableDate(new Date(2024, 0, 2, 15, 4))).toBe(
      "January 2, 2024 at 3:04 PM"
    );
  });
});

describe("normalizeUrl", () => {
  it("drops www, trailing slash, fragment and tracking params", () => {
    expect(
      normalizeUrl("https://WWW.Example.com/Path/?utm_source=x&b=2&a=1#frag")
    ).toBe("https://example.com/Path?a=1&b=2");
  });

  it("collapses the root path", () => {
    expect(normalizeUrl("https://example.com/")).toBe("https://example.com");
  });

  it("keeps explicit ports", () => {
    expect(normalizeUrl("http://example.com:8080/x")).toBe("http://example.com:8080/x");
  });

  it("lowercases strings that are not URLs", () => {
    expect(normalizeUrl("Not A URL ")).toBe("not a url");
  });
});

describe("extractDomain", () => {
  it("strips www and lowercases", () => {
    expect(extractDomain("https://www.Example.com/x")).toBe("example.com");
  });

  it("returns an empty string for invalid URLs", () => {
    expect(extractDomain("not a url")).toBe("");
  });
});

describe("token estimation", () => {
  it("estimates four characters per token", () => {
    expect(estimateTokens("abcd efgh")).toBe(3);
    expect(estimateTokens("")).toBe(0);
  });

  it("leaves short text alone", () => {
    expect(truncateToTokens("short", 10)).toBe("short");
  });

  it("cuts at a word boundary when one is close", () => {
    expect(truncateToTokens("alpha beta gamma", 3)).toBe("alpha beta...");
  });

  it("cuts mid-word when no boundary is close", () => {
    expect(truncateToTokens("abcdefghijklmnop", 2)).toBe("abcdefgh...");
  });
});

describe("createLimiter", () => {
  it("never runs more tasks than it has slots", async () => {
    const limiter = createLimiter(2);
    let inFlight = 0;
    let peak = 0;

    const results = await Promise.all(
      [1, 2, 3, 4, 5].map((n) =>
        limiter.run(async () => {
          inFlight++;
          peak = Math.max(peak, inFlight);
          await delay(10);
          inFlight--;
          return n * 10;
        })
      )
    );

    expect(results).toEqual([10, 20, 30, 40, 50]);
    expect(peak).toBe(2);
    expect(limiter.active).toBe(0);
    expect(limiter.pending).toBe(0);
  });

  it("frees the slot when a task rejects", async () => {
    const limiter = createLimiter(1);

    await expect(limiter.run(() => Promise.reject(new Error("boom")))).rejects.toThrow(
      "boom"
    );
    await expect(limiter.run(() => Promise.resolve("next"))).resolves.toBe("next");
  });
});

describe("cancellation helpers", () => {
  it("throwIfAborted throws only once aborted", () => {
    const controller = new AbortController();
    expect(() => throwIfAborted(controller.signal)).not.toThrow();

    controller.abort();
    expect(() => throwIfAborted(controller.signal)).toThrow(ResearchCancelledError);
  });

  it("sleep rejects when the signal aborts", async () => {
    const controller = new AbortController();
    const pending = sleep(10_000, controller.signal);

    controller.abort();

    await expect(pending).rejects.toBeInstanceOf(ResearchCancelledError);
  });

  it("sleep rejects immediately for an aborted signal", async () => {
    await expect(sleep(10, AbortSignal.abort())).rejects.toBeInstanceOf(
      ResearchCancelledError
    );
  });

  it("timeout controller aborts after the timeout", async () => {
    const timeout = createTimeoutController(5);
    await delay(20);

    expect(timeout.signal.aborted).toBe(true);
    expect(timeout.didTimeout()).toBe(true);
    timeout.dispose();
  });

  it("timeout controller follows its parent", () => {
    const parent = new AbortController();
    const timeout = createTimeoutController(10_000, parent.signal);

    parent.abort();

    expect(timeout.signal.aborted).toBe(true);
    expect(timeout.didTimeout()).toBe(false);
    timeout.dispose();
  });
});

describe("cost estimation", () => {
  it("sums prompt parts and prices the call", () => {
    const usage = estimateUsage(["a".repeat(400_000), "b".repeat(400_000)], "c".repeat(40_000));

    expect(usage).toEqual({ inputTokens: 200_000, outputTokens: 10_000, totalTokens: 210_000 });
    expect(estimateCost(usage, "gpt-4o")).toBeCloseTo(0.6);
    expect(estimateCost(usage, "unknown-model")).toBeCloseTo(0.036);
  });

  it("formats costs", () => {
    expect(formatCost(0.6)).toBe("$0.6000");
    expect(formatCost(0.005)).toBe("0.500¢");
  });
});
