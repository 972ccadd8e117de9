import { z } from "zod";
import { StageOutcome } from "./job";
import { Verdict } from "./verdict";

export const ReportEvidence = z.object({
  sourceReference: z.string(),
  relevance: z.number(),
  excerpt: z.string(),
});
export type ReportEvidence = z.infer<typeof ReportEvidence>;

export const ReportClaim = z.object({
  id: z.string(),
  text: z.string(),
  timestampSeconds: z.number().nullable(),
  speaker: z.string().nullable(),
  verdict: Verdict,
  confidence: z.number(),
  explanation: z.string(),
  evidence: z.array(ReportEvidence),
});
export type ReportClaim = z.infer<typeof ReportClaim>;

export const OverallAssessment = z.object({
  verdict: z.union([Verdict, z.literal("UNABLE_TO_DETERMINE")]),
  explanation: z.string(),
  truePercentage: z.number(),
  falsePercentage: z.number(),
});
export type OverallAssessment = z.infer<typeof OverallAssessment>;

export const ReportSchema = z.object({
  jobId: z.string(),
  videoReference: z.string(),
  video: z
    .object({
      videoId: z.string(),
      title: z.string(),
      durationSeconds: z.number(),
      channel: z.string().nullable(),
    })
    .nullable(),
  claims: z.array(ReportClaim),
  overallAssessment: OverallAssessment,
  summary: z.string(),
  partial: z.boolean(),
  stageOutcomes: z.array(z.object({ stage: z.string(), outcome: StageOutcome })),
  artifactKey: z.string(),
});
export type Report = z.infer<typeof ReportSchema>;
