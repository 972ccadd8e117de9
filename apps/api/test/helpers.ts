import type { z } from "zod";
import {
  Logger,
  defineOrchestratorConfig,
  type OrchestratorConfigInput,
} from "@factline/core";
import { InMemoryArtifactStore, InMemoryJobStore } from "@factline/db";
import { Orchestrator } from "@factline/orchestrator";
import { ProviderRegistry } from "@factline/providers";
import { InProcessDispatchQueue } from "@factline/queue";
import { createApp } from "../src/app";

export const silentLogger = new Logger({ component: "api-test", minLevel: "silent" });

// Orchestrator over in-memory collaborators; nothing dispatches unless a test does it
export function createTestApp(overrides: OrchestratorConfigInput = {}) {
  const store = new InMemoryJobStore();
  const artifacts = new InMemoryArtifactStore();
  const orchestrator = new Orchestrator({
    config: defineOrchestratorConfig({
      storeMode: "memory",
      queueMode: "in-process",
      artifactDir: "test-artifacts",
      logLevel: "silent",
      ...overrides,
    }),
    store,
    queue: new InProcessDispatchQueue({ logger: silentLogger }),
    registry: new ProviderRegistry(),
    artifacts,
    logger: silentLogger,
  });
  const app = createApp(orchestrator, { logger: silentLogger, accessLog: false });
  return { app, orchestrator, store, artifacts };
}

export function jsonRequest(body: unknown): RequestInit {
  return {
    method: "POST",
    headers: { "Content-Type": "application/json" },
    body: JSON.stringify(body),
  };
}

export async function readJson<T>(response: Response, schema: z.ZodType<T>): Promise<T> {
  return schema.parse(await response.json());
}
