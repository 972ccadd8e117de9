import { Hono } from "hono";
import { HTTPException } from "hono/http-exception";
import { logger as accessLogger } from "hono/logger";
import { Logger, toPublicMessage } from "@factline/core";
import type { Orchestrator } from "@factline/orchestrator";
import { toErrorResponse } from "./error-response";
import { createHealthRoute } from "./routes/health";
import { createJobsRoute } from "./routes/jobs";

export interface AppOptions {
  logger?: Logger;
  // hono access log lines, routed through the logger
  accessLog?: boolean;
}

export function createApp(orchestrator: Orchestrator, options: AppOptions = {}): Hono {
  const log = options.logger ?? new Logger({ component: "api" });
  const app = new Hono();

  if (options.accessLog ?? true) {
    app.use(
      "*",
      accessLogger((message, ...rest) => {
        log.info([message, ...rest].join(" "));
      }),
    );
  }

  app.route("/health", createHealthRoute(orchestrator));
  app.route("/jobs", createJobsRoute(orchestrator));

  app.get("/", (c) => {
    return c.json({
      name: "factline",
      version: "0.1.0",
      description: "Video claim verification job orchestrator",
    });
  });

  app.notFound((c) => c.json({ error: "Not found", kind: "NotFound" }, 404));

  app.onError((error, c) => {
    // Malformed request bodies rejected by hono itself
    if (error instanceof HTTPException) {
      return error.getResponse();
    }
    const { status, body } = toErrorResponse(error);
    if (status === 500) {
      log.error("Unhandled API error", {
        event: "api_error",
        method: c.req.method,
        path: c.req.path,
        error: toPublicMessage(error),
      });
    }
    return c.json(body, status);
  });

  return app;
}
