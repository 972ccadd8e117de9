// Hand-off of promoted job ids from the dispatcher to the worker pool.
// Delivery is at-least-once; the store decides whether a delivered job still needs work.
export type DispatchHandler = (jobId: string) => Promise<void>;

export interface DispatchQueue {
  // Enqueuing an id that is already waiting or being processed is a no-op
  enqueue(jobId: string): Promise<void>;
  consume(handler: DispatchHandler, concurrency: number): void;
  close(): Promise<void>;
}
