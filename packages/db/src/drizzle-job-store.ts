import { and, asc, eq, inArray } from "drizzle-orm";
import type { Job, JobMutation, JobStatus, NewJob } from "@factline/core";
import type { Database } from "./client";
import { sql } from "./client";
import { applyJobMutation, initialJob, type CompareAndUpdateResult, type JobStore } from "./job-store";
import { verificationJobs, type VerificationJobRecord } from "./schema";

function toJob(row: VerificationJobRecord): Job {
  return {
    id: row.id,
    tenantId: row.tenantId,
    videoReference: row.videoReference,
    options: row.options,
    stages: row.stages,
    status: row.status,
    currentStageIndex: row.currentStageIndex,
    stageResults: row.stageResults,
    stageAttempts: row.stageAttempts,
    checkpoints: row.checkpoints,
    progressPercent: row.progressPercent,
    message: row.message,
    error: row.error ?? null,
    cancelRequested: row.cancelRequested,
    reportReference: row.reportReference,
    version: row.version,
    createdAt: row.createdAt,
    updatedAt: row.updatedAt,
    startedAt: row.startedAt,
    finishedAt: row.finishedAt,
  };
}

export class DrizzleJobStore implements JobStore {
  constructor(private readonly db: Database) {}

  async create(newJob: NewJob): Promise<string> {
    const job = initialJob(newJob, new Date());
    const [row] = await this.db
      .insert(verificationJobs)
      .values({
        id: job.id,
        tenantId: job.tenantId,
        videoReference: job.videoReference,
        options: job.options,
        stages: job.stages,
        status: job.status,
        currentStageIndex: job.currentStageIndex,
        stageResults: job.stageResults,
        stageAttempts: job.stageAttempts,
        checkpoints: job.checkpoints,
        progressPercent: job.progressPercent,
        message: job.message,
        error: null,
        cancelRequested: job.cancelRequested,
        reportReference: null,
        version: job.version,
        createdAt: job.createdAt,
        updatedAt: job.updatedAt,
      })
      .returning({ id: verificationJobs.id });
    if (!row) {
      throw new Error(`failed to insert job ${job.id}`);
    }
    return row.id;
  }

  async get(jobId: string): Promise<Job | null> {
    const [row] = await this.db
      .select()
      .from(verificationJobs)
      .where(eq(verificationJobs.id, jobId))
      .limit(1);
    return row ? toJob(row) : null;
  }

  async compareAndUpdate(
    jobId: string,
    expectedVersion: number,
    mutation: JobMutation,
  ): Promise<CompareAndUpdateResult> {
    const current = await this.get(jobId);
    if (!current) {
      return { ok: false, reason: "not_found" };
    }
    if (current.version !== expectedVersion) {
      return { ok: false, reason: "version_conflict" };
    }
    const next = applyJobMutation(current, mutation, new Date());

    // Whole-record write, applied only if nobody else bumped the version meanwhile
    const [row] = await this.db
      .update(verificationJobs)
      .set({
        status: next.status,
        currentStageIndex: next.currentStageIndex,
        stageResults: next.stageResults,
        stageAttempts: next.stageAttempts,
        checkpoints: next.checkpoints,
        progressPercent: next.progressPercent,
        message: next.message,
        error: next.error,
        cancelRequested: next.cancelRequested,
        reportReference: next.reportReference,
        version: next.version,
        updatedAt: next.updatedAt,
        startedAt: next.startedAt,
        finishedAt: next.finishedAt,
      })
      .where(and(eq(verificationJobs.id, jobId), eq(verificationJobs.version, expectedVersion)))
      .returning();
    if (!row) {
      return { ok: false, reason: "version_conflict" };
    }
    return { ok: true, job: toJob(row) };
  }

  async listByTenantAndStatus(tenantId: string, statuses: readonly JobStatus[]): Promise<Job[]> {
    if (statuses.length === 0) {
      return [];
    }
    const rows = await this.db
      .select()
      .from(verificationJobs)
      .where(
        and(eq(verificationJobs.tenantId, tenantId), inArray(verificationJobs.status, [...statuses])),
      )
      .orderBy(asc(verificationJobs.createdAt), asc(verificationJobs.seq));
    return rows.map(toJob);
  }

  async listByStatus(statuses: readonly JobStatus[]): Promise<Job[]> {
    if (statuses.length === 0) {
      return [];
    }
    const rows = await this.db
      .select()
      .from(verificationJobs)
      .where(inArray(verificationJobs.status, [...statuses]))
      .orderBy(asc(verificationJobs.createdAt), asc(verificationJobs.seq));
    return rows.map(toJob);
  }

  async ping(): Promise<void> {
    await this.db.execute(sql`select 1`);
  }
}
