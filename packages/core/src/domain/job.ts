import { z } from "zod";
import { StageDefinitionSchema } from "./stage";
import { SubmissionOptions } from "./submission";

// Job status
export const JobStatus = z.enum([
  "queued", // admitted, waiting for a slot
  "running", // holds a concurrency slot
  "completed", // report produced
  "failed", // required stage exhausted, or internal consistency error
  "cancelled", // cancelled by request
]);
export type JobStatus = z.infer<typeof JobStatus>;

// Outcome of one stage
export const StageOutcome = z.enum(["succeeded", "skipped", "failed"]);
export type StageOutcome = z.infer<typeof StageOutcome>;

export const JobErrorKind = z.enum(["StageFailed", "IncompleteInputError", "InternalError"]);
export type JobErrorKind = z.infer<typeof JobErrorKind>;

export const JobError = z.object({
  kind: JobErrorKind,
  message: z.string(),
  stage: z.string().optional(),
});
export type JobError = z.infer<typeof JobError>;

// Recorded once per stage, never rewritten
export const StageResultSchema = z.object({
  stage: z.string().min(1),
  outcome: StageOutcome,
  attemptCount: z.number().int().nonnegative(), // attempts against providerUsed
  attemptsByProvider: z.record(z.number().int().nonnegative()),
  providerUsed: z.string().nullable(),
  payload: z.unknown(),
  error: z.string().nullable(),
  recordedAt: z.string(),
});
export type StageResult = z.infer<typeof StageResultSchema>;

// Pending attempt bookkeeping for the stage in flight
export const StageAttemptState = z.object({
  provider: z.string(),
  attemptsByProvider: z.record(z.number().int().nonnegative()),
  lastError: z.string().nullable(),
});
export type StageAttemptState = z.infer<typeof StageAttemptState>;

export const JobSchema = z.object({
  id: z.string().uuid(),
  tenantId: z.string().min(1),
  videoReference: z.string().min(1),
  options: SubmissionOptions,
  stages: z.array(StageDefinitionSchema).min(1),
  status: JobStatus,
  currentStageIndex: z.number().int().nonnegative(),
  stageResults: z.record(StageResultSchema),
  stageAttempts: z.record(StageAttemptState),
  checkpoints: z.record(z.record(z.unknown())), // stage -> unit key -> unit output
  progressPercent: z.number().int().min(0).max(100),
  message: z.string(),
  error: JobError.nullable(),
  cancelRequested: z.boolean(),
  reportReference: z.string().nullable(),
  version: z.number().int().positive(),
  createdAt: z.date(),
  updatedAt: z.date(),
  startedAt: z.date().nullable(),
  finishedAt: z.date().nullable(),
});
export type Job = z.infer<typeof JobSchema>;

// Fields fixed at creation
export type NewJob = Pick<Job, "id" | "tenantId" | "videoReference" | "options" | "stages">;

// The only way a stored job changes; applied atomically under a version check
export interface JobMutation {
  status?: JobStatus;
  currentStageIndex?: number;
  appendStageResult?: StageResult;
  stageAttempt?: { stage: string; state: StageAttemptState | null };
  checkpoint?: { stage: string; unitKey: string; output: unknown };
  clearCheckpoints?: string;
  progressPercent?: number;
  message?: string;
  error?: JobError | null;
  cancelRequested?: boolean;
  reportReference?: string | null;
  startedAt?: Date;
  finishedAt?: Date;
}

// What a poll returns
export interface JobStatusView {
  jobId: string;
  tenantId: string;
  status: JobStatus;
  currentStage: string | null;
  progressPercent: number;
  message: string;
  error?: JobError;
  reportReference?: string;
  createdAt: string;
  updatedAt: string;
}
