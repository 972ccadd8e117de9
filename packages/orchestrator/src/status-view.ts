import type { Job, JobStatusView } from "@factline/core";

// What a poll returns: no internal bookkeeping, no provider details
export function toStatusView(job: Job): JobStatusView {
  const view: JobStatusView = {
    jobId: job.id,
    tenantId: job.tenantId,
    status: job.status,
    currentStage: job.stages[job.currentStageIndex]?.name ?? null,
    progressPercent: job.progressPercent,
    message: job.message,
    createdAt: job.createdAt.toISOString(),
    updatedAt: job.updatedAt.toISOString(),
  };
  if (job.error) {
    view.error = job.error;
  }
  if (job.reportReference) {
    view.reportReference = job.reportReference;
  }
  return view;
}
