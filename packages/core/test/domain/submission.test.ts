import { describe, expect, it } from "vitest";
import { StageDefinitionSchema } from "../../src/domain/stage";
import { SubmissionInput } from "../../src/domain/submission";

describe("SubmissionInput", () => {
  it("defaults options and strips unknown option fields", () => {
    const parsed = SubmissionInput.parse({
      tenantId: " acme ",
      videoReference: "https://videos.example.com/watch?v=abc",
      options: { maxVideoDuration: 600, colour: "blue" },
    });
    expect(parsed).toEqual({
      tenantId: "acme",
      videoReference: "https://videos.example.com/watch?v=abc",
      options: { maxVideoDuration: 600 },
    });

    const withoutOptions = SubmissionInput.parse({
      tenantId: "acme",
      videoReference: "http://videos.example.com/1",
    });
    expect(withoutOptions.options).toEqual({});
  });

  it("requires an absolute http(s) video reference", () => {
    for (const videoReference of ["", "not a url", "ftp://videos.example.com/1", "/relative"]) {
      const result = SubmissionInput.safeParse({ tenantId: "acme", videoReference });
      expect(result.success).toBe(false);
    }
  });

  it("validates stage overrides", () => {
    const result = SubmissionInput.safeParse({
      tenantId: "acme",
      videoReference: "https://videos.example.com/1",
      options: { stageOverrides: { analysis: { timeoutMs: 0 } } },
    });
    expect(result.success).toBe(false);
  });
});

describe("StageDefinitionSchema", () => {
  it("defaults optional to false", () => {
    const stage = StageDefinitionSchema.parse({
      name: "analysis",
      capability: "analyze",
      timeoutMs: 1_000,
      maxRetries: 2,
      fallbackChain: ["analyze-http"],
    });
    expect(stage.optional).toBe(false);
  });

  it("requires a fallback chain", () => {
    const result = StageDefinitionSchema.safeParse({
      name: "analysis",
      capability: "analyze",
      timeoutMs: 1_000,
      maxRetries: 2,
      fallbackChain: [],
    });
    expect(result.success).toBe(false);
  });
});
