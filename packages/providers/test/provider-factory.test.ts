import { describe, expect, it } from "vitest";
import { defineOrchestratorConfig } from "@factline/core";
import { createProviderRegistry } from "../src/provider-factory";

describe("createProviderRegistry", () => {
  it("registers the configured transports plus the seed-url fallback", () => {
    const config = defineOrchestratorConfig({
      providers: {
        analyze: { http: { endpoint: "http://analyzer.local/analyze" } },
        verify: { command: { command: "verify-claims", args: ["--json"] } },
      },
    });

    const registry = createProviderRegistry(config.providers);

    expect(registry.list()).toEqual([
      { capability: "analyze", name: "analyze-http" },
      { capability: "search", name: "seed-url" },
      { capability: "verify", name: "verify-command" },
    ]);
  });
});
