import "dotenv/config";
import { createLogger, loadOrchestratorConfig, toPublicMessage } from "@factline/core";
import { setupProcessLogging } from "@factline/core/process-logging";
import { createRuntime } from "@factline/orchestrator";

async function main(): Promise<void> {
  setupProcessLogging(process.env.FACTLINE_LOG_NAME ?? "dispatcher", { label: "Dispatcher" });
  const config = loadOrchestratorConfig();
  if (config.queueMode === "in-process") {
    console.error(
      "Error: a standalone dispatcher needs QUEUE_MODE=bullmq (the API dispatches itself with the in-process queue)",
    );
    process.exit(1);
  }

  const logger = createLogger("dispatcher", { level: config.logLevel, format: config.logFormat });
  const runtime = await createRuntime(config, { logger });

  let shuttingDown = false;
  const shutdown = async (signal: NodeJS.Signals) => {
    if (shuttingDown) {
      return;
    }
    shuttingDown = true;
    logger.info(`Received ${signal}, shutting down dispatcher...`);
    try {
      await runtime.close();
      process.exit(0);
    } catch (error) {
      logger.error("Dispatcher shutdown failed", { error: toPublicMessage(error) });
      process.exit(1);
    }
  };
  process.once("SIGINT", () => void shutdown("SIGINT"));
  process.once("SIGTERM", () => void shutdown("SIGTERM"));

  console.log("=".repeat(60));
  console.log("Dispatcher started");
  console.log("=".repeat(60));
  console.log(`Poll interval: ${config.dispatchPollIntervalMs}ms (max ${config.dispatchMaxPollIntervalMs}ms)`);
  console.log(`Global cap: ${config.globalConcurrencyCap}`);
  console.log(`Default tenant cap: ${config.defaultTenantConcurrencyCap}`);
  console.log(`Queue mode: ${config.queueMode}`);
  console.log("=".repeat(60));

  await runtime.orchestrator.startDispatcher();
}

main().catch((error) => {
  console.error("Dispatcher crashed:", error);
  process.exit(1);
});
