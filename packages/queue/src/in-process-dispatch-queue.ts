import { Logger, toPublicMessage } from "@factline/core";
import type { DispatchHandler, DispatchQueue } from "./dispatch-queue";

// Single-process queue: the dispatcher and the worker pool share one instance
export class InProcessDispatchQueue implements DispatchQueue {
  private readonly pending: string[] = [];
  private readonly known = new Set<string>();
  private handler: DispatchHandler | null = null;
  private concurrency = 1;
  private active = 0;
  private closed = false;
  private idleWaiters: Array<() => void> = [];
  private readonly logger: Logger;

  constructor(options: { logger?: Logger } = {}) {
    this.logger = options.logger ?? new Logger({ component: "queue" });
  }

  async enqueue(jobId: string): Promise<void> {
    if (this.closed) {
      throw new Error("dispatch queue is closed");
    }
    if (this.known.has(jobId)) {
      return;
    }
    this.known.add(jobId);
    this.pending.push(jobId);
    this.drain();
  }

  consume(handler: DispatchHandler, concurrency: number): void {
    if (this.handler) {
      throw new Error("dispatch queue already has a consumer");
    }
    this.handler = handler;
    this.concurrency = Math.max(1, Math.floor(concurrency));
    this.drain();
  }

  // Resolves once nothing is waiting or running
  onIdle(): Promise<void> {
    if (this.pending.length === 0 && this.active === 0) {
      return Promise.resolve();
    }
    return new Promise((resolve) => {
      this.idleWaiters.push(resolve);
    });
  }

  size(): { pending: number; active: number } {
    return { pending: this.pending.length, active: this.active };
  }

  async close(): Promise<void> {
    this.closed = true;
    this.pending.splice(0);
    await this.onIdle();
  }

  private drain(): void {
    const handler = this.handler;
    if (!handler) {
      return;
    }
    while (this.active < this.concurrency && this.pending.length > 0) {
      const jobId = this.pending.shift();
      if (jobId === undefined) {
        break;
      }
      this.active += 1;
      void this.run(handler, jobId);
    }
    this.notifyIdle();
  }

  private async run(handler: DispatchHandler, jobId: string): Promise<void> {
    try {
      await handler(jobId);
    } catch (error) {
      this.logger.error("Dispatch handler failed", { jobId, error: toPublicMessage(error) });
    } finally {
      this.active -= 1;
      this.known.delete(jobId);
      this.drain();
    }
  }

  private notifyIdle(): void {
    if (this.pending.length > 0 || this.active > 0) {
      return;
    }
    const waiters = this.idleWaiters;
    this.idleWaiters = [];
    for (const resolve of waiters) {
      resolve();
    }
  }
}
