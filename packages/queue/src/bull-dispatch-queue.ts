import { Queue, Worker, type Job } from "bullmq";
import { Logger, toPublicMessage } from "@factline/core";
import type { DispatchHandler, DispatchQueue } from "./dispatch-queue";

export const DISPATCH_QUEUE_NAME = "factline-jobs";

export interface DispatchJobData {
  jobId: string;
}

// Redis connection from URL
export function getConnectionConfig(redisUrl: string) {
  const url = new URL(redisUrl);
  return {
    host: url.hostname,
    port: Number.parseInt(url.port || "6379", 10),
    username: url.username || undefined,
    password: url.password || undefined,
    maxRetriesPerRequest: null,
  };
}

export interface BullDispatchQueueOptions {
  redisUrl: string;
  queueName?: string;
  // Lock is renewed while the handler runs; this only bounds stall detection
  lockDurationMs?: number;
  logger?: Logger;
}

export class BullDispatchQueue implements DispatchQueue {
  private readonly queue: Queue<DispatchJobData>;
  private worker: Worker<DispatchJobData> | null = null;
  private readonly logger: Logger;

  constructor(private readonly options: BullDispatchQueueOptions) {
    this.logger = options.logger ?? new Logger({ component: "queue" });
    this.queue = new Queue<DispatchJobData>(options.queueName ?? DISPATCH_QUEUE_NAME, {
      connection: getConnectionConfig(options.redisUrl),
      defaultJobOptions: {
        // Stage retries live in the executor, not in the queue
        attempts: 1,
        removeOnComplete: true,
        removeOnFail: true,
      },
    });
  }

  async enqueue(jobId: string): Promise<void> {
    // Custom job id: a second add while the first is waiting or active is ignored
    await this.queue.add(`job-${jobId}`, { jobId }, { jobId });
  }

  consume(handler: DispatchHandler, concurrency: number): void {
    if (this.worker) {
      throw new Error("dispatch queue already has a consumer");
    }
    this.worker = new Worker<DispatchJobData>(
      this.options.queueName ?? DISPATCH_QUEUE_NAME,
      async (job: Job<DispatchJobData>) => {
        await handler(job.data.jobId);
      },
      {
        connection: getConnectionConfig(this.options.redisUrl),
        concurrency,
        lockDuration: this.options.lockDurationMs ?? 60_000,
      },
    );
    this.worker.on("failed", (job, error) => {
      this.logger.error("Dispatch handler failed", {
        jobId: job?.data.jobId,
        error: toPublicMessage(error),
      });
    });
  }

  async close(): Promise<void> {
    await this.worker?.close();
    await this.queue.close();
  }
}
