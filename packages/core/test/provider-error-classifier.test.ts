import { describe, expect, it } from "vitest";
import {
  JobCancelledError,
  ProviderTimeoutError,
  ProviderUnavailableError,
  RateLimitedError,
  TransientProviderError,
} from "../src/errors";
import { classifyProviderError, parseRetryAfterMs } from "../src/provider-error-classifier";

describe("classifyProviderError", () => {
  it("classifies typed errors by class", () => {
    expect(classifyProviderError(new TransientProviderError("socket hang up")).category).toBe(
      "transient",
    );
    expect(classifyProviderError(new ProviderTimeoutError("search-http", 500)).category).toBe(
      "timeout",
    );
    expect(classifyProviderError(new JobCancelledError("job-1")).category).toBe("cancelled");

    const unavailable = classifyProviderError(
      new ProviderUnavailableError("verify-command", "not installed"),
    );
    expect(unavailable).toEqual({
      category: "unavailable",
      retryable: false,
      retryAfterMs: null,
      reason: "not installed",
    });
  });

  it("keeps the retry hint of rate limit errors", () => {
    const result = classifyProviderError(new RateLimitedError("slow down", 7_000));
    expect(result.category).toBe("rate_limited");
    expect(result.retryable).toBe(true);
    expect(result.retryAfterMs).toBe(7_000);
  });

  it("classifies untyped errors by message", () => {
    const rateLimited = classifyProviderError(new Error("HTTP 429: retry after 3s"));
    expect(rateLimited.category).toBe("rate_limited");
    expect(rateLimited.retryAfterMs).toBe(3_000);

    expect(classifyProviderError(new Error("connect ETIMEDOUT 10.0.0.1:443")).category).toBe(
      "timeout",
    );
    expect(classifyProviderError(new Error("spawn analyzer ENOENT")).category).toBe("unavailable");
  });

  it("treats unknown failures as transient", () => {
    const result = classifyProviderError("boom");
    expect(result).toEqual({
      category: "transient",
      retryable: true,
      retryAfterMs: null,
      reason: "boom",
    });
  });

  it("treats aborted calls as timeouts", () => {
    const abort = new Error("This operation was aborted");
    abort.name = "AbortError";
    expect(classifyProviderError(abort).category).toBe("timeout");
  });
});

describe("parseRetryAfterMs", () => {
  it("reads seconds hints", () => {
    expect(parseRetryAfterMs("Please retry in 2.5s")).toBe(2_500);
    expect(parseRetryAfterMs('{"retryDelay": "12s"}')).toBe(12_000);
  });

  it("returns null without a hint", () => {
    expect(parseRetryAfterMs("quota exceeded")).toBeNull();
  });
});
