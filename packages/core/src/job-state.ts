import type { JobStatus } from "./domain/job";

// Allowed status transitions. running -> running is a stage advance.
export const JOB_TRANSITIONS: Record<JobStatus, readonly JobStatus[]> = {
  queued: ["running", "cancelled"],
  running: ["running", "completed", "failed", "cancelled"],
  completed: [],
  failed: [],
  cancelled: [],
};

export const TERMINAL_JOB_STATUSES: readonly JobStatus[] = ["completed", "failed", "cancelled"];

// Statuses that hold a concurrency slot
export const ACTIVE_JOB_STATUSES: readonly JobStatus[] = ["running"];

export function isTerminalStatus(status: JobStatus): boolean {
  return TERMINAL_JOB_STATUSES.includes(status);
}

export function canTransition(from: JobStatus, to: JobStatus): boolean {
  return JOB_TRANSITIONS[from].includes(to);
}

// Checks that an observed status sequence is a walk through the transition table
export function isValidStatusPath(path: readonly JobStatus[]): boolean {
  if (path.length === 0) {
    return true;
  }
  if (path[0] !== "queued") {
    return false;
  }
  for (let index = 1; index < path.length; index += 1) {
    const from = path[index - 1];
    const to = path[index];
    if (from === undefined || to === undefined) {
      return false;
    }
    if (from === to && from !== "running") {
      return false;
    }
    if (from !== to && !canTransition(from, to)) {
      return false;
    }
  }
  return true;
}
