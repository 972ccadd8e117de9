import "dotenv/config";
import { serve } from "@hono/node-server";
import { createLogger, loadOrchestratorConfig, toPublicMessage } from "@factline/core";
import { setupProcessLogging } from "@factline/core/process-logging";
import { createRuntime } from "@factline/orchestrator";
import { createApp } from "./app";

setupProcessLogging(process.env.FACTLINE_LOG_NAME ?? "api", { label: "API" });

async function main(): Promise<void> {
  const config = loadOrchestratorConfig();
  const logger = createLogger("api", { level: config.logLevel, format: config.logFormat });
  const runtime = await createRuntime(config, {
    logger,
    migrate: process.env.FACTLINE_MIGRATE_ON_START === "true",
  });
  const { orchestrator } = runtime;

  // With the in-process queue there is no separate dispatcher or worker process
  let dispatchLoop: Promise<void> | null = null;
  if (config.queueMode === "in-process") {
    await orchestrator.recoverRunningJobs();
    orchestrator.startWorkers();
    dispatchLoop = orchestrator.startDispatcher();
  }

  const app = createApp(orchestrator, { logger });
  const server = serve({ fetch: app.fetch, port: config.apiPort });
  logger.info(`API server listening on port ${config.apiPort}`, { queueMode: config.queueMode });

  let shuttingDown = false;
  const shutdown = async (signal: NodeJS.Signals): Promise<void> => {
    if (shuttingDown) {
      return;
    }
    shuttingDown = true;
    logger.info(`Received ${signal}, shutting down`);
    server.close();
    try {
      await runtime.close();
      await dispatchLoop;
    } catch (error) {
      logger.error("Shutdown did not complete cleanly", { error: toPublicMessage(error) });
      process.exit(1);
    }
    process.exit(0);
  };

  process.once("SIGINT", () => {
    void shutdown("SIGINT");
  });
  process.once("SIGTERM", () => {
    void shutdown("SIGTERM");
  });
}

main().catch((error) => {
  console.error("API crashed:", error);
  process.exit(1);
});
