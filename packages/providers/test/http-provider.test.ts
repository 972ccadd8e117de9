import { describe, expect, it, vi } from "vitest";
import {
  EvidenceResult,
  ProviderUnavailableError,
  RateLimitedError,
  TransientProviderError,
} from "@factline/core";
import { HttpCapabilityProvider, parseRetryAfterHeader, type FetchLike } from "../src/http-provider";

const context = { signal: new AbortController().signal, jobId: "job-1", stage: "evidence_search" };
const query = { claimId: "c1", claimText: "Water boils at 100C at sea level", context: "" };

function createProvider(fetchImpl: FetchLike, healthUrl: string | null = null) {
  return new HttpCapabilityProvider({
    name: "search-http",
    capability: "search",
    endpoint: "http://search.local/query",
    healthUrl,
    apiKey: "test-secret",
    outputSchema: EvidenceResult,
    fetch: fetchImpl,
  });
}

function jsonResponse(body: unknown, init: ResponseInit = {}): Response {
  return new Response(JSON.stringify(body), {
    status: 200,
    headers: { "content-type": "application/json" },
    ...init,
  });
}

describe("HttpCapabilityProvider", () => {
  it("posts the input and validates the response", async () => {
    const fetchImpl = vi.fn<FetchLike>(async () =>
      jsonResponse({
        items: [{ sourceReference: "https://ref.example.org/1", content: "boils", relevance: 0.9 }],
      }),
    );
    const provider = createProvider(fetchImpl);

    const result = await provider.invoke(query, context);

    expect(result.items).toHaveLength(1);
    const [url, init] = fetchImpl.mock.calls[0] ?? [];
    expect(url).toBe("http://search.local/query");
    expect(init?.method).toBe("POST");
    expect(init?.body).toBe(JSON.stringify(query));
    expect(init?.headers).toMatchObject({
      authorization: "Bearer test-secret",
      "x-job-id": "job-1",
      "x-stage": "evidence_search",
    });
  });

  it("maps 429 to a rate limit with the Retry-After hint", async () => {
    const provider = createProvider(async () =>
      new Response("slow down", { status: 429, headers: { "retry-after": "4" } }),
    );
    const error = await provider.invoke(query, context).catch((caught: unknown) => caught);
    expect(error).toBeInstanceOf(RateLimitedError);
    expect(error instanceof RateLimitedError && error.retryAfterMs).toBe(4_000);
  });

  it("maps 5xx to a transient error", async () => {
    const provider = createProvider(async () => new Response("upstream down", { status: 503 }));
    await expect(provider.invoke(query, context)).rejects.toThrow(
      new TransientProviderError("search-http returned 503: upstream down"),
    );
  });

  it("maps 501 to unavailable", async () => {
    const provider = createProvider(async () => new Response("", { status: 501 }));
    await expect(provider.invoke(query, context)).rejects.toBeInstanceOf(ProviderUnavailableError);
  });

  it("rejects payloads that do not match the capability contract", async () => {
    const provider = createProvider(async () => jsonResponse({ items: [{ relevance: 2 }] }));
    await expect(provider.invoke(query, context)).rejects.toBeInstanceOf(TransientProviderError);
  });

  it("wraps network failures as transient", async () => {
    const provider = createProvider(async () => {
      throw new TypeError("fetch failed");
    });
    await expect(provider.invoke(query, context)).rejects.toThrow(
      "search-http request failed: fetch failed",
    );
  });

  it("probes the health URL when one is configured", async () => {
    const healthy = createProvider(async () => new Response("ok"), "http://search.local/health");
    expect(await healthy.probe()).toEqual({ status: "available" });

    const down = createProvider(
      async () => new Response("", { status: 503 }),
      "http://search.local/health",
    );
    expect(await down.probe()).toEqual({
      status: "unavailable",
      reason: "health check returned 503",
    });
  });

  it("is available without a health URL", async () => {
    const fetchImpl = vi.fn<FetchLike>();
    expect(await createProvider(fetchImpl).probe()).toEqual({ status: "available" });
    expect(fetchImpl).not.toHaveBeenCalled();
  });
});

describe("parseRetryAfterHeader", () => {
  it("accepts seconds and HTTP dates", () => {
    expect(parseRetryAfterHeader("2")).toBe(2_000);
    expect(parseRetryAfterHeader("Thu, 01 Jan 2026 00:00:10 GMT", Date.UTC(2026, 0, 1))).toBe(
      10_000,
    );
    expect(parseRetryAfterHeader("soon")).toBeNull();
    expect(parseRetryAfterHeader(null)).toBeNull();
  });
});
