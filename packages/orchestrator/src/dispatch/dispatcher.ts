import {
  Logger,
  tenantConcurrencyCap,
  toPublicMessage,
  type Job,
  type OrchestratorConfig,
} from "@factline/core";
import type { JobStore } from "@factline/db";
import type { DispatchQueue } from "@factline/queue";
import { countRunningByTenant, selectJobsForPromotion } from "./promotion-policy";

export function computeBackoffDelayMs(
  baseDelayMs: number,
  idleLoopStreak: number,
  maxDelayMs: number,
): number {
  if (idleLoopStreak <= 0) {
    return baseDelayMs;
  }
  const exponent = Math.min(idleLoopStreak, 6);
  const delay = baseDelayMs * 2 ** exponent;
  return Math.min(delay, Math.max(baseDelayMs, maxDelayMs));
}

export interface DispatcherOptions {
  store: JobStore;
  queue: DispatchQueue;
  config: OrchestratorConfig;
  logger?: Logger;
  now?: () => Date;
}

// Promotes queued jobs into free slots and hands them to the worker pool.
// One dispatcher runs per deployment; the compare-and-update on promotion keeps a
// job from being promoted twice even when two loops overlap.
export class Dispatcher {
  private readonly store: JobStore;
  private readonly queue: DispatchQueue;
  private readonly config: OrchestratorConfig;
  private readonly logger: Logger;
  private readonly now: () => Date;
  // Promoted but not yet handed to the queue
  private readonly pendingEnqueue = new Set<string>();
  private isRunning = false;
  private loop: Promise<void> | null = null;
  private wakeTimer: NodeJS.Timeout | null = null;
  private wakeResolver: (() => void) | null = null;
  private wakeRequested = false;

  constructor(options: DispatcherOptions) {
    this.store = options.store;
    this.queue = options.queue;
    this.config = options.config;
    this.logger = options.logger ?? new Logger({ component: "dispatcher" });
    this.now = options.now ?? (() => new Date());
  }

  // One scan: returns how many jobs were promoted
  async runOnce(): Promise<number> {
    await this.flushPendingEnqueues();

    const [queuedJobs, runningJobs] = await Promise.all([
      this.store.listByStatus(["queued"]),
      this.store.listByStatus(["running"]),
    ]);
    const candidates = selectJobsForPromotion({
      queuedJobs: queuedJobs.filter((job) => !job.cancelRequested),
      runningByTenant: countRunningByTenant(runningJobs),
      globalRunning: runningJobs.length,
      globalCap: this.config.globalConcurrencyCap,
      tenantCap: (tenantId) => tenantConcurrencyCap(this.config, tenantId),
    });

    let promoted = 0;
    for (const job of candidates) {
      if (await this.promote(job)) {
        promoted += 1;
      }
    }
    return promoted;
  }

  start(): Promise<void> {
    if (this.loop) {
      return this.loop;
    }
    this.isRunning = true;
    this.loop = this.runLoop();
    return this.loop;
  }

  // Cuts the current idle wait short (new admission, a slot was released)
  wake(): void {
    this.wakeRequested = true;
    this.resolveWait();
  }

  async stop(): Promise<void> {
    this.isRunning = false;
    this.resolveWait();
    if (this.loop) {
      await this.loop;
      this.loop = null;
    }
  }

  private async promote(job: Job): Promise<boolean> {
    const result = await this.store.compareAndUpdate(job.id, job.version, {
      status: "running",
      startedAt: this.now(),
      message: "Starting",
    });
    if (!result.ok) {
      // Cancelled or promoted elsewhere since the scan
      this.logger.debug("Promotion skipped", { jobId: job.id, reason: result.reason });
      return false;
    }
    this.logger.info("Job promoted", { jobId: job.id, tenantId: job.tenantId });
    this.pendingEnqueue.add(job.id);
    await this.flushPendingEnqueues();
    return true;
  }

  private async flushPendingEnqueues(): Promise<void> {
    for (const jobId of [...this.pendingEnqueue]) {
      try {
        await this.queue.enqueue(jobId);
        this.pendingEnqueue.delete(jobId);
      } catch (error) {
        this.logger.error("Failed to enqueue promoted job; will retry", {
          jobId,
          event: "enqueue_failed",
          error: toPublicMessage(error),
        });
      }
    }
  }

  private async runLoop(): Promise<void> {
    let idleLoopStreak = 0;
    while (this.isRunning) {
      try {
        const promoted = await this.runOnce();
        idleLoopStreak = promoted > 0 ? 0 : idleLoopStreak + 1;
      } catch (error) {
        this.logger.error("Error in dispatch loop", {
          event: "dispatch_loop_error",
          error: toPublicMessage(error),
        });
        idleLoopStreak += 1;
      }
      if (!this.isRunning) {
        break;
      }
      const delayMs = computeBackoffDelayMs(
        this.config.dispatchPollIntervalMs,
        idleLoopStreak,
        this.config.dispatchMaxPollIntervalMs,
      );
      if (await this.waitForNextPoll(delayMs)) {
        idleLoopStreak = 0;
      }
    }
  }

  // Resolves true when woken early
  private waitForNextPoll(delayMs: number): Promise<boolean> {
    if (this.wakeRequested) {
      this.wakeRequested = false;
      return Promise.resolve(true);
    }
    return new Promise((resolve) => {
      this.wakeResolver = () => {
        const woken = this.wakeRequested;
        this.wakeRequested = false;
        resolve(woken);
      };
      this.wakeTimer = setTimeout(() => this.resolveWait(), delayMs);
    });
  }

  private resolveWait(): void {
    if (this.wakeTimer) {
      clearTimeout(this.wakeTimer);
      this.wakeTimer = null;
    }
    const resolver = this.wakeResolver;
    this.wakeResolver = null;
    resolver?.();
  }
}
