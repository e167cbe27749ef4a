import OpenAI from "openai";
import { afterEach, describe, expect, it, vi } from "vitest";
import { withRetry } from "../services/llm/openai-provider";
import { ResearchCancelledError } from "../services/research-engine/errors";

type Request = () => Promise<string>;

afterEach(() => {
  vi.useRealTimers();
});

describe("withRetry", () => {
  it("makes one call when retries are disabled", async () => {
    const request = vi.fn<Request>(async () => "done");

    await expect(withRetry("Text generation", 0, undefined, request)).resolves.toBe("done");
    expect(request).toHaveBeenCalledTimes(1);
  });

  it("reports the attempts made when every call fails", async () => {
    const request = vi.fn<Request>(async () => {
      throw new Error("boom");
    });

    await expect(withRetry("Text generation", 0, undefined, request)).rejects.toThrow(
      "Text generation failed after 1 attempt(s): boom"
    );
    expect(request).toHaveBeenCalledTimes(1);
  });

  it("retries transient failures after a backoff", async () => {
    vi.useFakeTimers();
    const request = vi
      .fn<Request>()
      .mockRejectedValueOnce(new Error("socket hang up"))
      .mockResolvedValueOnce("second try");

    const result = withRetry("Embedding", 1, undefined, request);
    await vi.advanceTimersByTimeAsync(1000);

    await expect(result).resolves.toBe("second try");
    expect(request).toHaveBeenCalledTimes(2);
  });

  it("does not retry client errors", async () => {
    const error = new OpenAI.APIError(400, undefined, "bad request", undefined);
    const request = vi.fn<Request>(async () => {
      throw error;
    });

    await expect(withRetry("Text generation", 3, undefined, request)).rejects.toBe(error);
    expect(request).toHaveBeenCalledTimes(1);
  });

  it("turns a failure after cancellation into ResearchCancelledError", async () => {
    const controller = new AbortController();
    const request = vi.fn<Request>(async () => {
      controller.abort();
      throw new Error("aborted");
    });

    await expect(
      withRetry("Text generation", 3, controller.signal, request)
    ).rejects.toBeInstanceOf(ResearchCancelledError);
    expect(request).toHaveBeenCalledTimes(1);
  });
});
