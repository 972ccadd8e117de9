import { z } from "zod";
import { StageCapability } from "./capability";

// Static definition of one pipeline stage
export const StageDefinitionSchema = z.object({
  name: z.string().min(1),
  capability: StageCapability,
  timeoutMs: z.number().int().positive(), // per provider call; zero is invalid
  maxRetries: z.number().int().nonnegative(), // retries per provider in the chain
  fallbackChain: z.array(z.string().min(1)).min(1), // provider names, tried in order
  optional: z.boolean().default(false), // exhausted chain skips instead of failing the job
});
export type StageDefinition = z.infer<typeof StageDefinitionSchema>;

// Ordered pipeline; ordinal = position in the list
export const PipelineDefinitionSchema = z
  .array(StageDefinitionSchema)
  .min(1, "pipeline has zero stages")
  .superRefine((stages, ctx) => {
    const seen = new Set<string>();
    for (const [index, stage] of stages.entries()) {
      if (seen.has(stage.name)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: [index, "name"],
          message: `duplicate stage name: ${stage.name}`,
        });
      }
      seen.add(stage.name);
    }
  });
export type PipelineDefinition = z.infer<typeof PipelineDefinitionSchema>;

// Per-job adjustment of a configured stage
export const StageOverride = z.object({
  timeoutMs: z.number().int().positive().optional(),
  maxRetries: z.number().int().nonnegative().optional(),
  fallbackChain: z.array(z.string().min(1)).min(1).optional(),
  optional: z.boolean().optional(),
  enabled: z.boolean().optional(),
});
export type StageOverride = z.infer<typeof StageOverride>;
