import type { Job, JobMutation, JobStatus, NewJob } from "@factline/core";
import { applyJobMutation, initialJob, type CompareAndUpdateResult, type JobStore } from "./job-store";

interface StoredJob {
  seq: number;
  job: Job;
}

// Process-local store for tests and single-process deployments
export class InMemoryJobStore implements JobStore {
  private readonly jobs = new Map<string, StoredJob>();
  private nextSeq = 1;
  private readonly now: () => Date;

  constructor(options: { now?: () => Date } = {}) {
    this.now = options.now ?? (() => new Date());
  }

  async create(newJob: NewJob): Promise<string> {
    if (this.jobs.has(newJob.id)) {
      throw new Error(`job ${newJob.id} already exists`);
    }
    const job = initialJob(structuredClone(newJob), this.now());
    this.jobs.set(job.id, { seq: this.nextSeq, job });
    this.nextSeq += 1;
    return job.id;
  }

  async get(jobId: string): Promise<Job | null> {
    const stored = this.jobs.get(jobId);
    return stored ? structuredClone(stored.job) : null;
  }

  async compareAndUpdate(
    jobId: string,
    expectedVersion: number,
    mutation: JobMutation,
  ): Promise<CompareAndUpdateResult> {
    const stored = this.jobs.get(jobId);
    if (!stored) {
      return { ok: false, reason: "not_found" };
    }
    if (stored.job.version !== expectedVersion) {
      return { ok: false, reason: "version_conflict" };
    }
    const next = applyJobMutation(stored.job, structuredClone(mutation), this.now());
    stored.job = next;
    return { ok: true, job: structuredClone(next) };
  }

  async listByTenantAndStatus(tenantId: string, statuses: readonly JobStatus[]): Promise<Job[]> {
    return this.snapshot(
      (job) => job.tenantId === tenantId && statuses.includes(job.status),
    );
  }

  async listByStatus(statuses: readonly JobStatus[]): Promise<Job[]> {
    return this.snapshot((job) => statuses.includes(job.status));
  }

  async ping(): Promise<void> {}

  private snapshot(predicate: (job: Job) => boolean): Job[] {
    return [...this.jobs.values()]
      .filter((stored) => predicate(stored.job))
      .sort(
        (a, b) => a.job.createdAt.getTime() - b.job.createdAt.getTime() || a.seq - b.seq,
      )
      .map((stored) => structuredClone(stored.job));
  }
}
