import { z } from "zod";
import { StageOverride } from "./stage";

function isHttpUrl(value: string): boolean {
  try {
    const url = new URL(value);
    return url.protocol === "http:" || url.protocol === "https:";
  } catch {
    return false;
  }
}

export const VideoReference = z
  .string()
  .trim()
  .min(1)
  .refine(isHttpUrl, { message: "videoReference must be an absolute http(s) URL" });

// Recognized submission options; unknown keys are stripped
export const SubmissionOptions = z.object({
  maxVideoDuration: z.number().int().positive().optional(), // seconds
  stageOverrides: z.record(StageOverride).optional(),
});
export type SubmissionOptions = z.infer<typeof SubmissionOptions>;

export const SubmissionInput = z.object({
  tenantId: z.string().trim().min(1),
  videoReference: VideoReference,
  options: SubmissionOptions.default({}),
});
export type SubmissionInput = z.infer<typeof SubmissionInput>;
