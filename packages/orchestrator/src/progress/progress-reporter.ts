import { Logger, isTerminalStatus, toPublicMessage } from "@factline/core";
import { mutateJob, type JobStore } from "@factline/db";

// Overall progress from the stage position alone, so retries inside a stage never move it back
export function computeOverallProgress(
  stageIndex: number,
  totalStages: number,
  fraction: number,
): number {
  if (totalStages <= 0) {
    return 0;
  }
  const withinStage = Number.isFinite(fraction) ? Math.min(1, Math.max(0, fraction)) : 0;
  const overall = Math.floor((stageIndex * 100) / totalStages + (withinStage * 100) / totalStages);
  return Math.min(100, Math.max(0, overall));
}

interface PendingReport {
  stage: string;
  fraction: number;
  message?: string;
}

interface JobProgressState {
  lastWriteAt: number;
  pending: PendingReport | null;
  timer: NodeJS.Timeout | null;
  writes: Promise<void>;
}

export interface ProgressReporterOptions {
  store: JobStore;
  throttleMs: number;
  logger?: Logger;
  now?: () => number;
}

// Coalesces progress updates: at most one store write per job per throttle window,
// with a trailing write so the latest value is never lost.
export class ProgressReporter {
  private readonly store: JobStore;
  private readonly throttleMs: number;
  private readonly logger: Logger;
  private readonly now: () => number;
  private readonly jobs = new Map<string, JobProgressState>();

  constructor(options: ProgressReporterOptions) {
    this.store = options.store;
    this.throttleMs = Math.max(0, options.throttleMs);
    this.logger = options.logger ?? new Logger({ component: "progress" });
    this.now = options.now ?? (() => Date.now());
  }

  report(jobId: string, stage: string, fraction: number, message?: string): void {
    const state = this.stateFor(jobId);
    state.pending = { stage, fraction, message };
    if (state.timer) {
      return;
    }
    const elapsed = this.now() - state.lastWriteAt;
    if (elapsed >= this.throttleMs) {
      this.writePending(jobId, state);
      return;
    }
    state.timer = setTimeout(() => {
      state.timer = null;
      this.writePending(jobId, state);
    }, this.throttleMs - elapsed);
  }

  // Writes anything pending now and waits for every write issued so far
  async flush(jobId: string): Promise<void> {
    const state = this.jobs.get(jobId);
    if (!state) {
      return;
    }
    if (state.timer) {
      clearTimeout(state.timer);
      state.timer = null;
    }
    this.writePending(jobId, state);
    await state.writes;
  }

  // Drops pending updates once the job has left the running state
  async release(jobId: string): Promise<void> {
    const state = this.jobs.get(jobId);
    if (!state) {
      return;
    }
    if (state.timer) {
      clearTimeout(state.timer);
      state.timer = null;
    }
    state.pending = null;
    this.jobs.delete(jobId);
    await state.writes;
  }

  private stateFor(jobId: string): JobProgressState {
    let state = this.jobs.get(jobId);
    if (!state) {
      state = {
        lastWriteAt: Number.NEGATIVE_INFINITY,
        pending: null,
        timer: null,
        writes: Promise.resolve(),
      };
      this.jobs.set(jobId, state);
    }
    return state;
  }

  private writePending(jobId: string, state: JobProgressState): void {
    const pending = state.pending;
    if (!pending) {
      return;
    }
    state.pending = null;
    state.lastWriteAt = this.now();
    state.writes = state.writes
      .then(() => this.persist(jobId, pending))
      .catch((error: unknown) => {
        this.logger.warn("Progress update failed", { jobId, error: toPublicMessage(error) });
      });
  }

  private async persist(jobId: string, report: PendingReport): Promise<void> {
    await mutateJob(this.store, jobId, (job) => {
      if (isTerminalStatus(job.status)) {
        return null;
      }
      const stageIndex = job.stages.findIndex((stage) => stage.name === report.stage);
      // A report for a stage that is no longer current is stale
      if (stageIndex < 0 || stageIndex !== job.currentStageIndex) {
        return null;
      }
      const overall = computeOverallProgress(stageIndex, job.stages.length, report.fraction);
      const message = report.message ?? job.message;
      if (overall <= job.progressPercent && message === job.message) {
        return null;
      }
      return { progressPercent: overall, message };
    });
  }
}
