import { describe, expect, it, vi } from "vitest";
import type { EvidenceQuery, EvidenceResult } from "@factline/core";
import { unavailable, type CapabilityProvider } from "../src/capability-provider";
import { ProviderRegistry } from "../src/provider-registry";
import { SeedUrlEvidenceProvider } from "../src/seed-url-provider";

function searchProvider(
  name: string,
  probe: CapabilityProvider<"search">["probe"],
): CapabilityProvider<"search"> {
  return {
    name,
    capability: "search",
    probe,
    invoke: async (_query: EvidenceQuery): Promise<EvidenceResult> => ({ items: [] }),
  };
}

describe("ProviderRegistry", () => {
  it("resolves a fallback chain in configured order", () => {
    const registry = new ProviderRegistry();
    const primary = searchProvider("search-http", async () => ({ status: "available" }));
    registry.register(primary).register(new SeedUrlEvidenceProvider());

    const chain = registry.resolveChain("search", ["search-http", "search-command", "seed-url"]);
    expect(chain.map((entry) => entry.name)).toEqual(["search-http", "search-command", "seed-url"]);
    expect(chain[0]?.provider).toBe(primary);
    expect(chain[1]?.provider).toBeNull();
  });

  it("probes each provider once and remembers the answer", async () => {
    const registry = new ProviderRegistry();
    const probe = vi.fn(async () => unavailable("not configured"));
    registry.register(searchProvider("search-http", probe));

    const first = await registry.probe("search", "search-http");
    const second = await registry.probe("search", "search-http");

    expect(first).toEqual({ status: "unavailable", reason: "not configured" });
    expect(second).toBe(first);
    expect(probe).toHaveBeenCalledTimes(1);
  });

  it("reports unregistered providers as unavailable", async () => {
    const registry = new ProviderRegistry();
    expect(await registry.probe("verify", "verify-http")).toEqual({
      status: "unavailable",
      reason: "not registered for capability verify",
    });
  });

  it("turns a throwing probe into unavailable", async () => {
    const registry = new ProviderRegistry();
    registry.register(
      searchProvider("search-http", async () => {
        throw new Error("dns lookup failed\nstack line");
      }),
    );
    expect(await registry.probe("search", "search-http")).toEqual({
      status: "unavailable",
      reason: "probe failed: dns lookup failed",
    });
  });

  it("does not mix capabilities that share a provider name", () => {
    const registry = new ProviderRegistry();
    registry.register(new SeedUrlEvidenceProvider());
    expect(registry.get("verify", "seed-url")).toBeUndefined();
    expect(registry.get("search", "seed-url")?.name).toBe("seed-url");
  });

  it("rejects duplicate registrations", () => {
    const registry = new ProviderRegistry();
    registry.register(new SeedUrlEvidenceProvider());
    expect(() => registry.register(new SeedUrlEvidenceProvider())).toThrow(
      "provider seed-url is already registered for search",
    );
  });

  it("probes everything for the startup report", async () => {
    const registry = new ProviderRegistry();
    registry.register(new SeedUrlEvidenceProvider());
    expect(await registry.probeAll()).toEqual([
      { capability: "search", name: "seed-url", result: { status: "available" } },
    ]);
  });
});

describe("SeedUrlEvidenceProvider", () => {
  it("returns URLs found in the claim and its context", async () => {
    const provider = new SeedUrlEvidenceProvider();
    const result = await provider.invoke({
      claimId: "c1",
      claimText: "The study at https://journal.example.org/a1 proves it.",
      context: "See (https://data.example.org/set) and https://journal.example.org/a1",
    });
    expect(result.items.map((item) => item.sourceReference)).toEqual([
      "https://journal.example.org/a1",
      "https://data.example.org/set",
    ]);
    expect(result.items[0]?.relevance).toBe(0.3);
  });
});
