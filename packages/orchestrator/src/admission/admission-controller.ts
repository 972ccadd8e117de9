import { randomUUID } from "node:crypto";
import {
  AdmissionDeniedError,
  Logger,
  SubmissionInput,
  ValidationError,
  formatIssues,
  tenantConcurrencyCap,
  type JobStatus,
  type OrchestratorConfig,
} from "@factline/core";
import type { JobStore } from "@factline/db";
import { resolveJobStages } from "./resolve-stages";

export interface AdmissionResult {
  jobId: string;
  status: JobStatus;
}

export interface AdmissionControllerOptions {
  store: JobStore;
  config: OrchestratorConfig;
  logger?: Logger;
  // Called after a job is persisted so the dispatcher can look for capacity right away
  onAdmitted?: (jobId: string) => void;
  generateId?: () => string;
}

export class AdmissionController {
  private readonly store: JobStore;
  private readonly config: OrchestratorConfig;
  private readonly logger: Logger;
  private readonly onAdmitted: (jobId: string) => void;
  private readonly generateId: () => string;
  // Admission for one tenant is serialized so the queue bound is checked against a stable count
  private readonly tenantLocks = new Map<string, Promise<unknown>>();

  constructor(options: AdmissionControllerOptions) {
    this.store = options.store;
    this.config = options.config;
    this.logger = options.logger ?? new Logger({ component: "admission" });
    this.onAdmitted = options.onAdmitted ?? (() => undefined);
    this.generateId = options.generateId ?? randomUUID;
  }

  async submit(input: unknown): Promise<AdmissionResult> {
    const parsed = SubmissionInput.safeParse(input);
    if (!parsed.success) {
      throw new ValidationError("invalid submission", formatIssues(parsed.error));
    }
    const submission = parsed.data;
    const stages = resolveJobStages(this.config.pipeline, submission.options.stageOverrides);

    return this.withTenantLock(submission.tenantId, async () => {
      await this.assertCapacity(submission.tenantId);
      const jobId = await this.store.create({
        id: this.generateId(),
        tenantId: submission.tenantId,
        videoReference: submission.videoReference,
        options: submission.options,
        stages,
      });
      this.logger.info("Job admitted", {
        jobId,
        tenantId: submission.tenantId,
        stages: stages.map((stage) => stage.name),
      });
      this.onAdmitted(jobId);
      return { jobId, status: "queued" };
    });
  }

  private async assertCapacity(tenantId: string): Promise<void> {
    const maxQueued = this.config.maxQueuedPerTenant;
    if (maxQueued === null) {
      return;
    }
    const [running, queued] = await Promise.all([
      this.store.listByTenantAndStatus(tenantId, ["running"]),
      this.store.listByTenantAndStatus(tenantId, ["queued"]),
    ]);
    const cap = tenantConcurrencyCap(this.config, tenantId);
    if (running.length >= cap && queued.length >= maxQueued) {
      this.logger.warn("Admission denied", {
        tenantId,
        running: running.length,
        queued: queued.length,
        cap,
        maxQueued,
      });
      throw new AdmissionDeniedError(tenantId);
    }
  }

  private async withTenantLock<T>(tenantId: string, task: () => Promise<T>): Promise<T> {
    const previous = this.tenantLocks.get(tenantId) ?? Promise.resolve();
    const current = previous.catch(() => undefined).then(task);
    const settled = current.catch(() => undefined);
    this.tenantLocks.set(tenantId, settled);
    try {
      return await current;
    } finally {
      if (this.tenantLocks.get(tenantId) === settled) {
        this.tenantLocks.delete(tenantId);
      }
    }
  }
}
