import { JobCancelledError, Logger, toPublicMessage, type Job } from "@factline/core";
import type { JobStore } from "@factline/db";

// Watches the store for a cancel request on one running job.
// The flag is also observed on every job snapshot the executor reads or writes.
export class CancellationWatch {
  private readonly controller = new AbortController();
  private timer: NodeJS.Timeout | null = null;
  private polling = false;

  constructor(
    private readonly options: {
      store: JobStore;
      jobId: string;
      pollIntervalMs: number;
      logger: Logger;
    },
  ) {}

  get signal(): AbortSignal {
    return this.controller.signal;
  }

  get cancelled(): boolean {
    return this.controller.signal.aborted;
  }

  start(): void {
    if (this.timer) {
      return;
    }
    this.timer = setInterval(() => {
      void this.poll();
    }, this.options.pollIntervalMs);
    this.timer.unref();
  }

  observe(job: Pick<Job, "cancelRequested" | "status">): void {
    if ((job.cancelRequested || job.status === "cancelled") && !this.cancelled) {
      this.options.logger.info("Cancellation observed");
      this.controller.abort();
    }
  }

  throwIfCancelled(): void {
    if (this.cancelled) {
      throw new JobCancelledError(this.options.jobId);
    }
  }

  stop(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
  }

  private async poll(): Promise<void> {
    if (this.polling || this.cancelled) {
      return;
    }
    this.polling = true;
    try {
      const job = await this.options.store.get(this.options.jobId);
      if (job) {
        this.observe(job);
      }
    } catch (error) {
      this.options.logger.warn("Cancellation poll failed", { error: toPublicMessage(error) });
    } finally {
      this.polling = false;
    }
  }
}
