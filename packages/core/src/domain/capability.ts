import { z } from "zod";
import { EvidenceItem, EvidenceQuery, EvidenceResult } from "./evidence";
import { ProbabilityDistribution, Verdict } from "./verdict";

// Capabilities a stage can call out to
export const StageCapability = z.enum(["ingest", "analyze", "search", "verify", "synthesize"]);
export type StageCapability = z.infer<typeof StageCapability>;

// ingest: resolve the video reference into metadata the later stages need
export const IngestInput = z.object({
  videoReference: z.string().url(),
  maxVideoDurationSeconds: z.number().int().positive().nullable(),
});
export type IngestInput = z.infer<typeof IngestInput>;

export const IngestOutput = z.object({
  videoId: z.string().min(1),
  title: z.string().default(""),
  durationSeconds: z.number().nonnegative(),
  mediaUri: z.string().nullable().default(null),
  channel: z.string().nullable().default(null),
});
export type IngestOutput = z.infer<typeof IngestOutput>;

// analyze: one time segment of the video
export const AnalysisSegment = z.object({
  videoId: z.string().min(1),
  mediaUri: z.string().nullable(),
  index: z.number().int().nonnegative(),
  startSeconds: z.number().nonnegative(),
  endSeconds: z.number().nonnegative(),
});
export type AnalysisSegment = z.infer<typeof AnalysisSegment>;

export const ExtractedClaim = z.object({
  text: z.string().min(1),
  timestampSeconds: z.number().nonnegative().nullable().default(null),
  speaker: z.string().nullable().default(null),
});
export type ExtractedClaim = z.infer<typeof ExtractedClaim>;

export const AnalysisResult = z.object({
  claims: z.array(ExtractedClaim).default([]),
  summary: z.string().nullable().default(null),
});
export type AnalysisResult = z.infer<typeof AnalysisResult>;

// verify: weigh the collected evidence for one claim
export const VerifyInput = z.object({
  claimId: z.string().min(1),
  claimText: z.string().min(1),
  evidence: z.array(EvidenceItem),
});
export type VerifyInput = z.infer<typeof VerifyInput>;

export const VerifyOutput = z
  .object({
    verdict: Verdict.nullable().default(null),
    probabilities: ProbabilityDistribution.nullable().default(null),
    confidence: z.number().min(0).max(1).default(0),
    explanation: z.string().default(""),
    evidenceReferences: z.array(z.string()).default([]),
  })
  .refine((value) => value.verdict !== null || value.probabilities !== null, {
    message: "verify output needs a verdict or a probability distribution",
  });
export type VerifyOutput = z.infer<typeof VerifyOutput>;

// synthesize: free-text summary over the verified claims
export const SynthesizeInput = z.object({
  videoTitle: z.string(),
  claims: z.array(
    z.object({
      id: z.string(),
      text: z.string(),
      verdict: Verdict,
    }),
  ),
});
export type SynthesizeInput = z.infer<typeof SynthesizeInput>;

export const SynthesizeOutput = z.object({
  summary: z.string().min(1),
});
export type SynthesizeOutput = z.infer<typeof SynthesizeOutput>;

// Input/output contract of every capability, keyed by capability name
export interface CapabilityContracts {
  ingest: { input: IngestInput; output: IngestOutput };
  analyze: { input: AnalysisSegment; output: AnalysisResult };
  search: { input: EvidenceQuery; output: EvidenceResult };
  verify: { input: VerifyInput; output: VerifyOutput };
  synthesize: { input: SynthesizeInput; output: SynthesizeOutput };
}

export type CapabilityInput<C extends StageCapability> = CapabilityContracts[C]["input"];
export type CapabilityOutput<C extends StageCapability> = CapabilityContracts[C]["output"];
