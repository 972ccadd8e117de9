import {
  StageDefinitionSchema,
  ValidationError,
  type StageDefinition,
  type StageOverride,
} from "@factline/core";

// Applies per-job overrides to the configured pipeline.
// The result is frozen into the job record, so later config changes never alter a running job.
export function resolveJobStages(
  pipeline: readonly StageDefinition[],
  overrides: Record<string, StageOverride> = {},
): StageDefinition[] {
  const known = new Set(pipeline.map((stage) => stage.name));
  const unknown = Object.keys(overrides).filter((name) => !known.has(name));
  if (unknown.length > 0) {
    throw new ValidationError(
      `stageOverrides names unknown stage(s): ${unknown.join(", ")}`,
      unknown.map((name) => `options.stageOverrides.${name}: unknown stage`),
    );
  }

  const stages: StageDefinition[] = [];
  for (const stage of pipeline) {
    const override = overrides[stage.name];
    if (override?.enabled === false) {
      continue;
    }
    const merged = StageDefinitionSchema.safeParse({
      name: stage.name,
      capability: stage.capability,
      timeoutMs: override?.timeoutMs ?? stage.timeoutMs,
      maxRetries: override?.maxRetries ?? stage.maxRetries,
      fallbackChain: [...(override?.fallbackChain ?? stage.fallbackChain)],
      optional: override?.optional ?? stage.optional,
    });
    if (!merged.success) {
      throw new ValidationError(
        `invalid override for stage ${stage.name}`,
        merged.error.issues.map((issue) => `${stage.name}.${issue.path.join(".")}: ${issue.message}`),
      );
    }
    stages.push(merged.data);
  }

  if (stages.length === 0) {
    throw new ValidationError("job has zero stages");
  }
  return stages;
}
