import {
  InvalidTransitionError,
  JobNotFoundError,
  VersionConflictError,
  canTransition,
  isTerminalStatus,
  type Job,
  type JobMutation,
  type JobStatus,
  type NewJob,
} from "@factline/core";

export type CompareAndUpdateResult =
  | { ok: true; job: Job }
  | { ok: false; reason: "version_conflict" | "not_found" };

// Single source of truth for job state. Every mutation goes through compareAndUpdate.
export interface JobStore {
  create(job: NewJob): Promise<string>;
  get(jobId: string): Promise<Job | null>;
  compareAndUpdate(
    jobId: string,
    expectedVersion: number,
    mutation: JobMutation,
  ): Promise<CompareAndUpdateResult>;
  // Snapshots ordered by admission (oldest first)
  listByTenantAndStatus(tenantId: string, statuses: readonly JobStatus[]): Promise<Job[]>;
  listByStatus(statuses: readonly JobStatus[]): Promise<Job[]>;
  ping(): Promise<void>;
}

export function initialJob(newJob: NewJob, now: Date): Job {
  return {
    ...newJob,
    status: "queued",
    currentStageIndex: 0,
    stageResults: {},
    stageAttempts: {},
    checkpoints: {},
    progressPercent: 0,
    message: "Queued",
    error: null,
    cancelRequested: false,
    reportReference: null,
    version: 1,
    createdAt: now,
    updatedAt: now,
    startedAt: null,
    finishedAt: null,
  };
}

export class StageResultAlreadyRecordedError extends Error {
  constructor(
    readonly jobId: string,
    readonly stage: string,
  ) {
    super(`job ${jobId}: result for stage ${stage} is already recorded`);
    this.name = "StageResultAlreadyRecordedError";
  }
}

// Computes the next state of a job; shared by every store implementation
export function applyJobMutation(job: Job, mutation: JobMutation, now: Date): Job {
  const nextStatus = mutation.status ?? job.status;
  if (isTerminalStatus(job.status)) {
    throw new InvalidTransitionError(job.id, job.status, nextStatus);
  }
  if (mutation.status !== undefined && mutation.status !== job.status) {
    if (!canTransition(job.status, mutation.status)) {
      throw new InvalidTransitionError(job.id, job.status, mutation.status);
    }
  }

  const stageResults = { ...job.stageResults };
  if (mutation.appendStageResult) {
    const result = mutation.appendStageResult;
    if (stageResults[result.stage] !== undefined) {
      throw new StageResultAlreadyRecordedError(job.id, result.stage);
    }
    stageResults[result.stage] = result;
  }

  const stageAttempts = { ...job.stageAttempts };
  if (mutation.stageAttempt) {
    const { stage, state } = mutation.stageAttempt;
    if (state) {
      stageAttempts[stage] = state;
    } else {
      delete stageAttempts[stage];
    }
  }

  const checkpoints = { ...job.checkpoints };
  if (mutation.clearCheckpoints !== undefined) {
    delete checkpoints[mutation.clearCheckpoints];
  }
  if (mutation.checkpoint) {
    const { stage, unitKey, output } = mutation.checkpoint;
    checkpoints[stage] = { ...checkpoints[stage], [unitKey]: output };
  }

  const requestedProgress =
    mutation.progressPercent === undefined
      ? job.progressPercent
      : Math.min(100, Math.max(0, Math.floor(mutation.progressPercent)));

  return {
    ...job,
    status: nextStatus,
    currentStageIndex: mutation.currentStageIndex ?? job.currentStageIndex,
    stageResults,
    stageAttempts,
    checkpoints,
    // Overall progress never decreases
    progressPercent: Math.max(job.progressPercent, requestedProgress),
    message: mutation.message ?? job.message,
    error: mutation.error === undefined ? job.error : mutation.error,
    cancelRequested: mutation.cancelRequested ?? job.cancelRequested,
    reportReference:
      mutation.reportReference === undefined ? job.reportReference : mutation.reportReference,
    startedAt: mutation.startedAt ?? job.startedAt,
    finishedAt: mutation.finishedAt ?? job.finishedAt,
    version: job.version + 1,
    updatedAt: now,
  };
}

export interface MutateJobOptions {
  maxAttempts?: number;
}

// Read, decide, compare-and-update; re-reads on conflict.
// `decide` returning null leaves the job untouched.
export async function mutateJob(
  store: JobStore,
  jobId: string,
  decide: (job: Job) => JobMutation | null,
  options: MutateJobOptions = {},
): Promise<Job> {
  const maxAttempts = options.maxAttempts ?? 10;
  let lastVersion = 0;
  for (let attempt = 0; attempt < maxAttempts; attempt += 1) {
    const job = await store.get(jobId);
    if (!job) {
      throw new JobNotFoundError(jobId);
    }
    const mutation = decide(job);
    if (!mutation) {
      return job;
    }
    lastVersion = job.version;
    const result = await store.compareAndUpdate(jobId, job.version, mutation);
    if (result.ok) {
      return result.job;
    }
    if (result.reason === "not_found") {
      throw new JobNotFoundError(jobId);
    }
  }
  throw new VersionConflictError(jobId, lastVersion);
}
