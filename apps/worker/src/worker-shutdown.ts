import { toPublicMessage, type Logger } from "@factline/core";
import type { Runtime } from "@factline/orchestrator";

const DEFAULT_HARD_EXIT_MS = 15_000;

export interface WorkerShutdownOptions {
  runtime: Pick<Runtime, "close">;
  logger: Logger;
  hardExitMs?: number;
  exit?: (code: number) => void;
}

// Jobs interrupted here stay `running` in the store; the next worker start re-enqueues them
export function createWorkerShutdown(
  options: WorkerShutdownOptions,
): (signal: NodeJS.Signals) => Promise<void> {
  const { runtime, logger } = options;
  const exit = options.exit ?? ((code: number) => process.exit(code));
  let shuttingDown = false;

  return async (signal) => {
    if (shuttingDown) {
      return;
    }
    shuttingDown = true;
    logger.warn(`Received ${signal}. Draining worker pool...`);

    const hardExitTimer = setTimeout(() => {
      logger.error("Forced exit after timeout", { event: "shutdown_timeout" });
      exit(1);
    }, options.hardExitMs ?? DEFAULT_HARD_EXIT_MS);
    hardExitTimer.unref();

    let exitCode = 0;
    try {
      await runtime.close();
    } catch (error) {
      logger.error("Failed to close worker runtime", { error: toPublicMessage(error) });
      exitCode = 1;
    }

    clearTimeout(hardExitTimer);
    exit(exitCode);
  };
}

export function setupWorkerShutdownHandlers(options: WorkerShutdownOptions): () => void {
  const shutdown = createWorkerShutdown(options);
  const listeners = (["SIGTERM", "SIGINT", "SIGHUP"] as const).map((signal) => {
    const listener = () => {
      void shutdown(signal);
    };
    process.on(signal, listener);
    return { signal, listener };
  });

  return () => {
    for (const { signal, listener } of listeners) {
      process.off(signal, listener);
    }
  };
}
