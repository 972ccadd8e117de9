import { Hono } from "hono";
import { toPublicMessage } from "@factline/core";
import type { Orchestrator } from "@factline/orchestrator";

async function checkStoreReady(orchestrator: Orchestrator): Promise<{ ok: boolean; error?: string }> {
  try {
    await orchestrator.ping();
    return { ok: true };
  } catch (error) {
    return { ok: false, error: toPublicMessage(error) };
  }
}

export function createHealthRoute(orchestrator: Orchestrator): Hono {
  const healthRoute = new Hono();

  // Liveness
  healthRoute.get("/", (c) => {
    return c.json({
      status: "ok",
      timestamp: new Date().toISOString(),
    });
  });

  // Readiness: the job store must answer
  healthRoute.get("/ready", async (c) => {
    const store = await checkStoreReady(orchestrator);

    return c.json(
      {
        status: store.ok ? "ok" : "degraded",
        services: {
          store: store.ok ? "ok" : "error",
        },
        errors: {
          store: store.error,
        },
        timestamp: new Date().toISOString(),
      },
      store.ok ? 200 : 503,
    );
  });

  return healthRoute;
}
