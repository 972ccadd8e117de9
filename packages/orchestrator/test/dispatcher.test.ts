import { describe, expect, it, vi } from "vitest";
import type { NewJob } from "@factline/core";
import { InMemoryJobStore } from "@factline/db";
import type { DispatchQueue } from "@factline/queue";
import { Dispatcher, computeBackoffDelayMs } from "../src/dispatch/dispatcher";
import { silentLogger, testConfig, threeStagePipeline } from "./helpers";

function newJob(index: number, tenantId: string): NewJob {
  return {
    id: `00000000-0000-4000-8000-${String(index).padStart(12, "0")}`,
    tenantId,
    videoReference: "https://videos.example.com/watch?v=abc",
    options: {},
    stages: threeStagePipeline(),
  };
}

function recordingQueue(): DispatchQueue & { enqueued: string[] } {
  const enqueued: string[] = [];
  return {
    enqueued,
    enqueue: vi.fn(async (jobId: string) => {
      enqueued.push(jobId);
    }),
    consume: vi.fn(),
    close: vi.fn(async () => undefined),
  };
}

describe("computeBackoffDelayMs", () => {
  it("doubles per idle loop up to the max interval", () => {
    expect(computeBackoffDelayMs(1_000, 0, 10_000)).toBe(1_000);
    expect(computeBackoffDelayMs(1_000, 1, 10_000)).toBe(2_000);
    expect(computeBackoffDelayMs(1_000, 3, 10_000)).toBe(8_000);
    expect(computeBackoffDelayMs(1_000, 20, 10_000)).toBe(10_000);
  });
});

describe("Dispatcher", () => {
  it("promotes within caps and hands promoted jobs to the queue", async () => {
    const store = new InMemoryJobStore();
    const queue = recordingQueue();
    const dispatcher = new Dispatcher({
      store,
      queue,
      config: testConfig({ globalConcurrencyCap: 2, defaultTenantConcurrencyCap: 1 }),
      logger: silentLogger,
    });
    await store.create(newJob(1, "acme"));
    await store.create(newJob(2, "acme"));
    await store.create(newJob(3, "big"));
    await store.create(newJob(4, "corp"));

    expect(await dispatcher.runOnce()).toBe(2);
    expect(queue.enqueued).toEqual([newJob(1, "acme").id, newJob(3, "big").id]);

    const promoted = await store.get(newJob(1, "acme").id);
    expect(promoted?.status).toBe("running");
    expect(promoted?.startedAt).toBeInstanceOf(Date);
    expect((await store.get(newJob(2, "acme").id))?.status).toBe("queued");

    // Caps are full: nothing more until a slot frees up
    expect(await dispatcher.runOnce()).toBe(0);
  });

  it("skips jobs whose cancellation is pending", async () => {
    const store = new InMemoryJobStore();
    const queue = recordingQueue();
    const dispatcher = new Dispatcher({ store, queue, config: testConfig(), logger: silentLogger });
    await store.create(newJob(1, "acme"));
    await store.compareAndUpdate(newJob(1, "acme").id, 1, { cancelRequested: true });

    expect(await dispatcher.runOnce()).toBe(0);
    expect(queue.enqueued).toEqual([]);
  });

  it("does not promote a job that changed after the scan", async () => {
    const store = new InMemoryJobStore();
    const queue = recordingQueue();
    const dispatcher = new Dispatcher({ store, queue, config: testConfig(), logger: silentLogger });
    await store.create(newJob(1, "acme"));

    const listByStatus = store.listByStatus.bind(store);
    vi.spyOn(store, "listByStatus").mockImplementation(async (statuses) => {
      const jobs = await listByStatus(statuses);
      if (statuses.includes("queued")) {
        // Cancelled between the scan and the promotion
        await store.compareAndUpdate(newJob(1, "acme").id, 1, { status: "cancelled" });
      }
      return jobs;
    });

    expect(await dispatcher.runOnce()).toBe(0);
    expect((await store.get(newJob(1, "acme").id))?.status).toBe("cancelled");
    expect(queue.enqueued).toEqual([]);
  });

  it("retries a failed hand-off on the next scan", async () => {
    const store = new InMemoryJobStore();
    const queue = recordingQueue();
    vi.mocked(queue.enqueue).mockRejectedValueOnce(new Error("redis down"));
    const dispatcher = new Dispatcher({ store, queue, config: testConfig(), logger: silentLogger });
    await store.create(newJob(1, "acme"));

    expect(await dispatcher.runOnce()).toBe(1);
    expect(queue.enqueued).toEqual([]);

    await dispatcher.runOnce();
    expect(queue.enqueued).toEqual([newJob(1, "acme").id]);
  });

  it("runs until stopped and reacts to wake()", async () => {
    const store = new InMemoryJobStore();
    const queue = recordingQueue();
    const dispatcher = new Dispatcher({
      store,
      queue,
      config: testConfig({ dispatchPollIntervalMs: 5_000, dispatchMaxPollIntervalMs: 5_000 }),
      logger: silentLogger,
    });
    const loop = dispatcher.start();
    await store.create(newJob(1, "acme"));
    dispatcher.wake();

    await vi.waitFor(() => {
      expect(queue.enqueued).toEqual([newJob(1, "acme").id]);
    });
    await dispatcher.stop();
    await expect(loop).resolves.toBeUndefined();
  });
});
