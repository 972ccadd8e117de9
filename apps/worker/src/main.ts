import "dotenv/config";
import { createLogger, loadOrchestratorConfig } from "@factline/core";
import { setupProcessLogging } from "@factline/core/process-logging";
import { createRuntime } from "@factline/orchestrator";
import { setupWorkerShutdownHandlers } from "./worker-shutdown";

async function main(): Promise<void> {
  setupProcessLogging(process.env.FACTLINE_LOG_NAME ?? "worker", { label: "Worker" });
  const config = loadOrchestratorConfig();
  if (config.queueMode === "in-process") {
    console.error(
      "Error: a standalone worker needs QUEUE_MODE=bullmq (the API runs the pool itself with the in-process queue)",
    );
    process.exit(1);
  }

  const logger = createLogger("worker", { level: config.logLevel, format: config.logFormat });
  const runtime = await createRuntime(config, { logger });
  setupWorkerShutdownHandlers({ runtime, logger });

  const { orchestrator } = runtime;
  const recovered = await orchestrator.recoverRunningJobs();
  orchestrator.startWorkers();
  logger.info(`Worker pool started with ${config.workerPoolSize} slot(s)`, { recovered });
}

main().catch((error) => {
  console.error("Worker crashed:", error);
  process.exit(1);
});
