import { Logger, type OrchestratorConfig } from "@factline/core";
import {
  DrizzleJobStore,
  FileArtifactStore,
  InMemoryJobStore,
  createDbClient,
  runMigrations,
  type JobStore,
} from "@factline/db";
import { createProviderRegistry, type FetchLike } from "@factline/providers";
import { BullDispatchQueue, InProcessDispatchQueue, type DispatchQueue } from "@factline/queue";
import { Orchestrator } from "./orchestrator";

export interface RuntimeOptions {
  logger: Logger;
  fetch?: FetchLike;
  env?: NodeJS.ProcessEnv;
  // Apply pending SQL migrations before anything reads the store
  migrate?: boolean;
}

export interface Runtime {
  orchestrator: Orchestrator;
  close(): Promise<void>;
}

// Builds the collaborators the configuration asks for and wires them together
export async function createRuntime(
  config: OrchestratorConfig,
  options: RuntimeOptions,
): Promise<Runtime> {
  const { logger } = options;
  const closers: Array<() => Promise<void>> = [];

  let store: JobStore;
  if (config.storeMode === "memory") {
    store = new InMemoryJobStore();
    logger.warn("Using the in-memory job store; jobs do not survive a restart");
  } else {
    const dbClient = createDbClient(config.databaseUrl);
    closers.push(() => dbClient.close());
    if (options.migrate ?? false) {
      const applied = await runMigrations(dbClient.client);
      logger.info(`Migrations applied: ${applied.length}`);
    }
    store = new DrizzleJobStore(dbClient.db);
  }

  const queue: DispatchQueue =
    config.queueMode === "in-process"
      ? new InProcessDispatchQueue({ logger: logger.child({ component: "queue" }) })
      : new BullDispatchQueue({
          redisUrl: config.redisUrl,
          logger: logger.child({ component: "queue" }),
        });

  const registry = createProviderRegistry(config.providers, {
    fetch: options.fetch,
    env: options.env,
    logger: logger.child({ component: "providers" }),
  });

  const orchestrator = new Orchestrator({
    config,
    store,
    queue,
    registry,
    artifacts: new FileArtifactStore(config.artifactDir),
    logger,
  });

  return {
    orchestrator,
    async close(): Promise<void> {
      await orchestrator.shutdown();
      for (const close of closers.reverse()) {
        await close();
      }
    },
  };
}
