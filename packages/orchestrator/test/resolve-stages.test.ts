import { describe, expect, it } from "vitest";
import { ValidationError } from "@factline/core";
import { resolveJobStages } from "../src/admission/resolve-stages";
import { stage, threeStagePipeline } from "./helpers";

describe("resolveJobStages", () => {
  it("returns the configured pipeline when there are no overrides", () => {
    expect(resolveJobStages(threeStagePipeline())).toEqual(threeStagePipeline());
  });

  it("applies per-stage overrides", () => {
    const stages = resolveJobStages(threeStagePipeline(), {
      analysis: { timeoutMs: 1_000, maxRetries: 0, fallbackChain: ["analyze-b"], optional: true },
    });
    expect(stages[1]).toEqual(
      stage("analysis", "analyze", ["analyze-b"], { timeoutMs: 1_000, maxRetries: 0, optional: true }),
    );
    expect(stages[0]).toEqual(threeStagePipeline()[0]);
  });

  it("drops disabled stages", () => {
    const stages = resolveJobStages(threeStagePipeline(), { verification: { enabled: false } });
    expect(stages.map((entry) => entry.name)).toEqual(["ingestion", "analysis"]);
  });

  it("rejects overrides for unknown stages", () => {
    expect(() => resolveJobStages(threeStagePipeline(), { transcription: { maxRetries: 1 } })).toThrow(
      "stageOverrides names unknown stage(s): transcription",
    );
  });

  it("rejects a job whose every stage is disabled", () => {
    const overrides = {
      ingestion: { enabled: false },
      analysis: { enabled: false },
      verification: { enabled: false },
    };
    expect(() => resolveJobStages(threeStagePipeline(), overrides)).toThrow(ValidationError);
    expect(() => resolveJobStages(threeStagePipeline(), overrides)).toThrow("job has zero stages");
  });
});
