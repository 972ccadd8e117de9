import { describe, expect, it, vi } from "vitest";
import { Logger } from "@factline/core";
import { createWorkerShutdown } from "../src/worker-shutdown";

const logger = new Logger({ component: "worker-test", minLevel: "silent" });

describe("createWorkerShutdown", () => {
  it("closes the runtime once and exits cleanly", async () => {
    const close = vi.fn(async () => undefined);
    const exit = vi.fn();
    const shutdown = createWorkerShutdown({ runtime: { close }, logger, exit });

    await shutdown("SIGTERM");
    await shutdown("SIGINT");

    expect(close).toHaveBeenCalledTimes(1);
    expect(exit).toHaveBeenCalledTimes(1);
    expect(exit).toHaveBeenCalledWith(0);
  });

  it("exits with a failure code when the runtime does not close", async () => {
    const close = vi.fn(async () => {
      throw new Error("redis connection lost");
    });
    const exit = vi.fn();
    const shutdown = createWorkerShutdown({ runtime: { close }, logger, exit });

    await shutdown("SIGTERM");

    expect(exit).toHaveBeenCalledWith(1);
  });

  it("forces an exit when draining takes too long", async () => {
    vi.useFakeTimers();
    try {
      const exit = vi.fn();
      const shutdown = createWorkerShutdown({
        runtime: { close: () => new Promise<void>(() => undefined) },
        logger,
        exit,
        hardExitMs: 1_000,
      });

      void shutdown("SIGTERM");
      await vi.advanceTimersByTimeAsync(1_000);

      expect(exit).toHaveBeenCalledWith(1);
    } finally {
      vi.useRealTimers();
    }
  });
});
