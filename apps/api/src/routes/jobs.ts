import { Hono } from "hono";
import { zValidator } from "@hono/zod-validator";
import { z } from "zod";
import { JobStatus, SubmissionInput, formatIssues } from "@factline/core";
import type { Orchestrator } from "@factline/orchestrator";

// ?status=queued,running
const statusFilter = z
  .string()
  .transform((value) =>
    value
      .split(",")
      .map((part) => part.trim())
      .filter((part) => part.length > 0),
  )
  .pipe(z.array(JobStatus).min(1));

const listJobsQuery = z.object({
  tenantId: z.string().trim().min(1),
  status: statusFilter.optional(),
});

const jobIdParam = z.object({
  id: z.string().uuid(),
});

export function createJobsRoute(orchestrator: Orchestrator): Hono {
  const jobsRoute = new Hono();

  // Submit a verification job
  jobsRoute.post(
    "/",
    zValidator("json", SubmissionInput, (result, c) => {
      if (!result.success) {
        return c.json(
          {
            error: "invalid submission",
            kind: "ValidationError",
            issues: formatIssues(result.error),
          },
          400,
        );
      }
    }),
    async (c) => {
      const admitted = await orchestrator.submit(c.req.valid("json"));
      return c.json(admitted, 202);
    },
  );

  // A tenant's jobs, optionally filtered by status
  jobsRoute.get(
    "/",
    zValidator("query", listJobsQuery, (result, c) => {
      if (!result.success) {
        return c.json(
          { error: "invalid query", kind: "ValidationError", issues: formatIssues(result.error) },
          400,
        );
      }
    }),
    async (c) => {
      const { tenantId, status } = c.req.valid("query");
      const jobs = await orchestrator.listJobs(tenantId, status);
      return c.json({ jobs });
    },
  );

  const validJobId = zValidator("param", jobIdParam, (result, c) => {
    if (!result.success) {
      return c.json({ error: "Job not found", kind: "JobNotFound" }, 404);
    }
  });

  jobsRoute.get("/:id", validJobId, async (c) => {
    const job = await orchestrator.getStatus(c.req.valid("param").id);
    return c.json({ job });
  });

  jobsRoute.post("/:id/cancel", validJobId, async (c) => {
    const job = await orchestrator.cancel(c.req.valid("param").id);
    return c.json({ job });
  });

  jobsRoute.get("/:id/report", validJobId, async (c) => {
    const bytes = await orchestrator.getReport(c.req.valid("param").id);
    if (!bytes) {
      return c.json({ error: "Report not available", kind: "ReportNotAvailable" }, 404);
    }
    return c.body(new TextDecoder().decode(bytes), 200, {
      "Content-Type": "application/json; charset=utf-8",
      "Cache-Control": "no-store",
    });
  });

  return jobsRoute;
}
