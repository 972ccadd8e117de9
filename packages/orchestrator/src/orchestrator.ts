import {
  JobNotFoundError,
  JobStatus,
  Logger,
  isTerminalStatus,
  type JobStatusView,
  type OrchestratorConfig,
} from "@factline/core";
import { mutateJob, type ArtifactStore, type JobStore } from "@factline/db";
import type { ProviderRegistry } from "@factline/providers";
import type { DispatchQueue } from "@factline/queue";
import { AdmissionController, type AdmissionResult } from "./admission/admission-controller";
import { Dispatcher } from "./dispatch/dispatcher";
import { PipelineExecutor, type SleepFn } from "./executor/pipeline-executor";
import { ProgressReporter } from "./progress/progress-reporter";
import { toStatusView } from "./status-view";

export interface OrchestratorDependencies {
  config: OrchestratorConfig;
  store: JobStore;
  queue: DispatchQueue;
  registry: ProviderRegistry;
  artifacts: ArtifactStore;
  logger?: Logger;
  sleep?: SleepFn;
  generateId?: () => string;
  now?: () => Date;
}

// Composition root: every component gets the same config value and collaborators
export class Orchestrator {
  readonly admission: AdmissionController;
  readonly dispatcher: Dispatcher;
  readonly executor: PipelineExecutor;
  readonly progress: ProgressReporter;
  private readonly store: JobStore;
  private readonly queue: DispatchQueue;
  private readonly artifacts: ArtifactStore;
  private readonly config: OrchestratorConfig;
  private readonly logger: Logger;
  private readonly now: () => Date;
  private workersStarted = false;

  constructor(deps: OrchestratorDependencies) {
    this.store = deps.store;
    this.queue = deps.queue;
    this.artifacts = deps.artifacts;
    this.config = deps.config;
    this.logger = deps.logger ?? new Logger({ component: "orchestrator" });
    this.now = deps.now ?? (() => new Date());

    this.dispatcher = new Dispatcher({
      store: deps.store,
      queue: deps.queue,
      config: deps.config,
      logger: this.logger.child({ component: "dispatcher" }),
      now: this.now,
    });
    this.admission = new AdmissionController({
      store: deps.store,
      config: deps.config,
      logger: this.logger.child({ component: "admission" }),
      onAdmitted: () => this.dispatcher.wake(),
      generateId: deps.generateId,
    });
    this.progress = new ProgressReporter({
      store: deps.store,
      throttleMs: deps.config.progressThrottleMs,
      logger: this.logger.child({ component: "progress" }),
    });
    this.executor = new PipelineExecutor({
      store: deps.store,
      registry: deps.registry,
      artifacts: deps.artifacts,
      config: deps.config,
      progress: this.progress,
      logger: this.logger.child({ component: "executor" }),
      sleep: deps.sleep,
      now: this.now,
      onJobSettled: () => this.dispatcher.wake(),
    });
  }

  submit(input: unknown): Promise<AdmissionResult> {
    return this.admission.submit(input);
  }

  async getStatus(jobId: string): Promise<JobStatusView> {
    const job = await this.store.get(jobId);
    if (!job) {
      throw new JobNotFoundError(jobId);
    }
    return toStatusView(job);
  }

  // A queued job is cancelled at once; a running one is flagged and its worker stops it
  async cancel(jobId: string): Promise<JobStatusView> {
    const job = await mutateJob(this.store, jobId, (current) => {
      if (isTerminalStatus(current.status)) {
        return null;
      }
      if (current.status === "queued") {
        return {
          status: "cancelled",
          cancelRequested: true,
          message: "Cancelled",
          finishedAt: this.now(),
        };
      }
      if (current.cancelRequested) {
        return null;
      }
      return { cancelRequested: true, message: "Cancellation requested" };
    });
    this.logger.info("Cancellation requested", { jobId, status: job.status });
    return toStatusView(job);
  }

  async listJobs(
    tenantId: string,
    statuses: readonly JobStatus[] = JobStatus.options,
  ): Promise<JobStatusView[]> {
    const jobs = await this.store.listByTenantAndStatus(tenantId, statuses);
    return jobs.map(toStatusView);
  }

  // Report artifact bytes, or null while the job has none
  async getReport(jobId: string): Promise<Uint8Array | null> {
    const job = await this.store.get(jobId);
    if (!job) {
      throw new JobNotFoundError(jobId);
    }
    if (!job.reportReference) {
      return null;
    }
    return this.artifacts.get(job.reportReference);
  }

  // After a restart, running jobs have no worker: hand them to the pool again
  async recoverRunningJobs(): Promise<number> {
    const running = await this.store.listByStatus(["running"]);
    for (const job of running) {
      await this.queue.enqueue(job.id);
    }
    if (running.length > 0) {
      this.logger.info(`Re-enqueued ${running.length} running job(s)`, {
        jobIds: running.map((job) => job.id),
      });
    }
    return running.length;
  }

  startWorkers(): void {
    if (this.workersStarted) {
      return;
    }
    this.workersStarted = true;
    this.queue.consume(async (jobId) => {
      await this.executor.execute(jobId);
    }, this.config.workerPoolSize);
  }

  startDispatcher(): Promise<void> {
    return this.dispatcher.start();
  }

  ping(): Promise<void> {
    return this.store.ping();
  }

  async shutdown(): Promise<void> {
    await this.dispatcher.stop();
    await this.queue.close();
  }
}

export function createOrchestrator(deps: OrchestratorDependencies): Orchestrator {
  return new Orchestrator(deps);
}
