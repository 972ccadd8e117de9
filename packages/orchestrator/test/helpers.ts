import {
  Logger,
  defineOrchestratorConfig,
  type CapabilityInput,
  type CapabilityOutput,
  type Job,
  type JobMutation,
  type JobStatus,
  type OrchestratorConfig,
  type OrchestratorConfigInput,
  type StageCapability,
  type StageDefinition,
} from "@factline/core";
import { InMemoryJobStore, type CompareAndUpdateResult } from "@factline/db";
import {
  AVAILABLE,
  createAbortError,
  type CapabilityProvider,
  type InvokeContext,
  type ProbeResult,
} from "@factline/providers";

export const silentLogger = new Logger({ component: "test", minLevel: "silent" });

export function stage(
  name: string,
  capability: StageCapability,
  fallbackChain: string[],
  overrides: Partial<StageDefinition> = {},
): StageDefinition {
  return {
    name,
    capability,
    timeoutMs: 5_000,
    maxRetries: 2,
    fallbackChain,
    optional: false,
    ...overrides,
  };
}

// ingest -> analyze -> verify, one provider each unless overridden
export function threeStagePipeline(): StageDefinition[] {
  return [
    stage("ingestion", "ingest", ["ingest-a"]),
    stage("analysis", "analyze", ["analyze-a"]),
    stage("verification", "verify", ["verify-a"]),
  ];
}

export function testConfig(overrides: OrchestratorConfigInput = {}): OrchestratorConfig {
  return defineOrchestratorConfig({
    storeMode: "memory",
    queueMode: "in-process",
    progressThrottleMs: 0,
    retryBaseDelayMs: 10,
    retryMaxDelayMs: 1_000,
    cancelPollIntervalMs: 5,
    cancelGraceMs: 0,
    dispatchPollIntervalMs: 5,
    dispatchMaxPollIntervalMs: 20,
    segmentDurationSeconds: 60,
    segmentConcurrency: 2,
    pipeline: threeStagePipeline(),
    artifactDir: "test-artifacts",
    logLevel: "silent",
    ...overrides,
  });
}

type Script<C extends StageCapability> = (
  input: CapabilityInput<C>,
  call: number,
  context: InvokeContext,
) => Promise<CapabilityOutput<C>>;

// Provider whose behaviour is a function of the input and the 1-based call count
export class ScriptedProvider<C extends StageCapability> implements CapabilityProvider<C> {
  readonly calls: Array<CapabilityInput<C>> = [];
  probeResult: ProbeResult = AVAILABLE;

  constructor(
    readonly name: string,
    readonly capability: C,
    private readonly script: Script<C>,
  ) {}

  async probe(): Promise<ProbeResult> {
    return this.probeResult;
  }

  invoke(input: CapabilityInput<C>, context: InvokeContext): Promise<CapabilityOutput<C>> {
    this.calls.push(input);
    return this.script(input, this.calls.length, context);
  }
}

export const ingestOutput: CapabilityOutput<"ingest"> = {
  videoId: "vid-1",
  title: "Test video",
  durationSeconds: 120,
  mediaUri: "memory://vid-1",
  channel: null,
};

export function ingestProvider(name = "ingest-a"): ScriptedProvider<"ingest"> {
  return new ScriptedProvider<"ingest">(name, "ingest", async () => ingestOutput);
}

// One claim per segment, named after the segment index
export function analyzeProvider(name = "analyze-a"): ScriptedProvider<"analyze"> {
  return new ScriptedProvider<"analyze">(name, "analyze", async (segment) => ({
    claims: [
      {
        text: `Claim from segment ${segment.index}`,
        timestampSeconds: segment.startSeconds,
        speaker: null,
      },
    ],
    summary: `Summary ${segment.index}`,
  }));
}

export function verifyProvider(name = "verify-a"): ScriptedProvider<"verify"> {
  return new ScriptedProvider<"verify">(name, "verify", async () => ({
    verdict: "LIKELY_TRUE",
    probabilities: null,
    confidence: 0.8,
    explanation: "Supported by evidence",
    evidenceReferences: [],
  }));
}

// Never settles on its own; rejects once the call is aborted
export function waitForAbort(context: InvokeContext): Promise<never> {
  return new Promise((_resolve, reject) => {
    context.signal.addEventListener("abort", () => reject(createAbortError("aborted")), {
      once: true,
    });
  });
}

export function deferred<T = void>(): {
  promise: Promise<T>;
  resolve: (value: T) => void;
} {
  let resolve: (value: T) => void = () => undefined;
  const promise = new Promise<T>((res) => {
    resolve = res;
  });
  return { promise, resolve };
}

export async function waitFor(
  check: () => Promise<boolean> | boolean,
  timeoutMs = 2_000,
): Promise<void> {
  const deadline = Date.now() + timeoutMs;
  while (!(await check())) {
    if (Date.now() > deadline) {
      throw new Error("condition not met in time");
    }
    await new Promise((resolve) => setTimeout(resolve, 2));
  }
}

// Records every status a job passes through and the peak running counts
export class RecordingJobStore extends InMemoryJobStore {
  readonly statusPaths = new Map<string, JobStatus[]>();
  peakRunningByTenant = new Map<string, number>();
  peakRunning = 0;

  async create(newJob: Parameters<InMemoryJobStore["create"]>[0]): Promise<string> {
    const jobId = await super.create(newJob);
    this.statusPaths.set(jobId, ["queued"]);
    return jobId;
  }

  async compareAndUpdate(
    jobId: string,
    expectedVersion: number,
    mutation: JobMutation,
  ): Promise<CompareAndUpdateResult> {
    const result = await super.compareAndUpdate(jobId, expectedVersion, mutation);
    if (result.ok) {
      this.statusPaths.get(jobId)?.push(result.job.status);
      await this.trackRunning();
    }
    return result;
  }

  private async trackRunning(): Promise<void> {
    const running: Job[] = await this.listByStatus(["running"]);
    this.peakRunning = Math.max(this.peakRunning, running.length);
    const byTenant = new Map<string, number>();
    for (const job of running) {
      byTenant.set(job.tenantId, (byTenant.get(job.tenantId) ?? 0) + 1);
    }
    for (const [tenantId, count] of byTenant) {
      this.peakRunningByTenant.set(
        tenantId,
        Math.max(this.peakRunningByTenant.get(tenantId) ?? 0, count),
      );
    }
  }
}
