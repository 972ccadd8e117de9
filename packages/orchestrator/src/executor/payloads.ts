import { z } from "zod";
import {
  EvidenceItem,
  IngestOutput,
  ProbabilityDistribution,
  Verdict,
  type Job,
  type StageCapability,
} from "@factline/core";

// Aggregated StageResult payloads, one shape per capability

export const IngestionPayload = IngestOutput.extend({
  truncated: z.boolean(),
  analyzedDurationSeconds: z.number().nonnegative(),
});
export type IngestionPayload = z.infer<typeof IngestionPayload>;

export const AnalyzedClaim = z.object({
  id: z.string(),
  text: z.string(),
  timestampSeconds: z.number().nullable(),
  speaker: z.string().nullable(),
  segmentIndex: z.number().int().nonnegative(),
});
export type AnalyzedClaim = z.infer<typeof AnalyzedClaim>;

export const AnalysisPayload = z.object({
  segmentCount: z.number().int().nonnegative(),
  claims: z.array(AnalyzedClaim),
  summaries: z.array(z.string()),
});
export type AnalysisPayload = z.infer<typeof AnalysisPayload>;

export const SearchPayload = z.object({
  evidence: z.record(z.array(EvidenceItem)),
});
export type SearchPayload = z.infer<typeof SearchPayload>;

export const ClaimVerdict = z.object({
  verdict: Verdict,
  confidence: z.number(),
  explanation: z.string(),
  evidenceReferences: z.array(z.string()),
  probabilities: ProbabilityDistribution.nullable(),
});
export type ClaimVerdict = z.infer<typeof ClaimVerdict>;

export const VerificationPayload = z.object({
  verdicts: z.record(ClaimVerdict),
});
export type VerificationPayload = z.infer<typeof VerificationPayload>;

export const SynthesisPayload = z.object({
  summary: z.string(),
});
export type SynthesisPayload = z.infer<typeof SynthesisPayload>;

export interface CapabilityPayloads {
  ingest: IngestionPayload;
  analyze: AnalysisPayload;
  search: SearchPayload;
  verify: VerificationPayload;
  synthesize: SynthesisPayload;
}

export const PAYLOAD_SCHEMAS: {
  [C in StageCapability]: z.ZodType<CapabilityPayloads[C], z.ZodTypeDef, unknown>;
} = {
  ingest: IngestionPayload,
  analyze: AnalysisPayload,
  search: SearchPayload,
  verify: VerificationPayload,
  synthesize: SynthesisPayload,
};

export type PayloadLookup = Pick<Job, "stages" | "stageResults">;

// Payload of the latest succeeded stage with this capability, or null when it was
// skipped, is absent from the pipeline, or does not match its shape
export function findPayload<C extends StageCapability>(
  job: PayloadLookup,
  capability: C,
  beforeIndex = job.stages.length,
): CapabilityPayloads[C] | null {
  for (let index = Math.min(beforeIndex, job.stages.length) - 1; index >= 0; index -= 1) {
    const stage = job.stages[index];
    if (!stage || stage.capability !== capability) {
      continue;
    }
    const result = job.stageResults[stage.name];
    if (!result || result.outcome !== "succeeded") {
      continue;
    }
    const parsed = PAYLOAD_SCHEMAS[capability].safeParse(result.payload);
    return parsed.success ? parsed.data : null;
  }
  return null;
}
