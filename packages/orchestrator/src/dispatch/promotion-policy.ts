import type { Job } from "@factline/core";

export type QueuedJob = Pick<Job, "id" | "tenantId">;

function incrementTenantCount(counter: Map<string, number>, tenantId: string): void {
  counter.set(tenantId, (counter.get(tenantId) ?? 0) + 1);
}

export function countRunningByTenant(runningJobs: ReadonlyArray<Pick<Job, "tenantId">>): Map<string, number> {
  const counts = new Map<string, number>();
  for (const job of runningJobs) {
    incrementTenantCount(counts, job.tenantId);
  }
  return counts;
}

// Walks the queue oldest-first. A tenant at its cap is passed over, so its later jobs
// stay behind its earlier ones and other tenants are not blocked.
export function selectJobsForPromotion<T extends QueuedJob>(params: {
  queuedJobs: readonly T[];
  runningByTenant: ReadonlyMap<string, number>;
  globalRunning: number;
  globalCap: number;
  tenantCap: (tenantId: string) => number;
}): T[] {
  const availableSlots = params.globalCap - params.globalRunning;
  if (availableSlots <= 0 || params.queuedJobs.length === 0) {
    return [];
  }

  const selected: T[] = [];
  const thisCycleByTenant = new Map<string, number>();
  for (const job of params.queuedJobs) {
    if (selected.length >= availableSlots) {
      break;
    }
    const running = params.runningByTenant.get(job.tenantId) ?? 0;
    const promoted = thisCycleByTenant.get(job.tenantId) ?? 0;
    if (running + promoted >= params.tenantCap(job.tenantId)) {
      continue;
    }
    selected.push(job);
    incrementTenantCount(thisCycleByTenant, job.tenantId);
  }
  return selected;
}
