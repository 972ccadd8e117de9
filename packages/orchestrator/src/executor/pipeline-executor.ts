import { setTimeout as delay } from "node:timers/promises";
import {
  IncompleteInputError,
  JobCancelledError,
  Logger,
  ProviderTimeoutError,
  TransientProviderError,
  classifyProviderError,
  computeStageBackoff,
  isTerminalStatus,
  toPublicMessage,
  type CapabilityInput,
  type CapabilityOutput,
  type Job,
  type JobError,
  type JobMutation,
  type OrchestratorConfig,
  type StageAttemptState,
  type StageCapability,
  type StageDefinition,
  type StageResult,
} from "@factline/core";
import { mutateJob, type ArtifactStore, type JobStore } from "@factline/db";
import type { CapabilityProvider, ProviderRegistry } from "@factline/providers";
import { computeOverallProgress, type ProgressReporter } from "../progress/progress-reporter";
import { assembleReport, serializeReport } from "../report/report-assembler";
import { CancellationWatch } from "./cancellation";
import { runBounded } from "./run-bounded";
import {
  STAGE_HANDLERS,
  type StageContext,
  type StageHandler,
  type StageHandlers,
  type StageUnit,
} from "./stage-handlers";

export type SleepFn = (ms: number, signal: AbortSignal) => Promise<void>;

export interface PipelineExecutorOptions {
  store: JobStore;
  registry: ProviderRegistry;
  artifacts: ArtifactStore;
  config: OrchestratorConfig;
  progress: ProgressReporter;
  logger?: Logger;
  handlers?: StageHandlers;
  sleep?: SleepFn;
  now?: () => Date;
  // Called whenever a job stops holding a slot on this worker
  onJobSettled?: (job: Job) => void;
}

type StageRun =
  | {
      outcome: "succeeded";
      providerUsed: string | null;
      attemptCount: number;
      attemptsByProvider: Record<string, number>;
      payload: unknown;
    }
  | {
      outcome: "exhausted";
      attemptsByProvider: Record<string, number>;
      lastError: string;
    };

type AttemptResult = { ok: true } | { ok: false; error: unknown };

// A provider call failed; anything else thrown during an attempt is not the provider's fault
class ProviderCallFailure extends Error {
  constructor(
    readonly provider: string,
    readonly failure: unknown,
  ) {
    super(`${provider}: ${toPublicMessage(failure)}`);
    this.name = "ProviderCallFailure";
  }
}

const defaultSleep: SleepFn = async (ms, signal) => {
  await delay(ms, undefined, { signal });
};

function totalAttempts(attemptsByProvider: Record<string, number>): number {
  return Object.values(attemptsByProvider).reduce((sum, count) => sum + count, 0);
}

// Runs one job's stages in order. The store is authoritative: every step starts from
// the persisted job, so a restarted worker resumes at currentStageIndex with its checkpoints.
export class PipelineExecutor {
  private readonly store: JobStore;
  private readonly registry: ProviderRegistry;
  private readonly artifacts: ArtifactStore;
  private readonly config: OrchestratorConfig;
  private readonly progress: ProgressReporter;
  private readonly logger: Logger;
  private readonly handlers: StageHandlers;
  private readonly sleep: SleepFn;
  private readonly now: () => Date;
  private readonly onJobSettled: (job: Job) => void;
  private readonly active = new Set<string>();

  constructor(options: PipelineExecutorOptions) {
    this.store = options.store;
    this.registry = options.registry;
    this.artifacts = options.artifacts;
    this.config = options.config;
    this.progress = options.progress;
    this.logger = options.logger ?? new Logger({ component: "executor" });
    this.handlers = options.handlers ?? STAGE_HANDLERS;
    this.sleep = options.sleep ?? defaultSleep;
    this.now = options.now ?? (() => new Date());
    this.onJobSettled = options.onJobSettled ?? (() => undefined);
  }

  isExecuting(jobId: string): boolean {
    return this.active.has(jobId);
  }

  // Returns the job as left by this run, or null when there was nothing to do
  async execute(jobId: string): Promise<Job | null> {
    if (this.active.has(jobId)) {
      this.logger.debug("Job is already executing on this worker", { jobId });
      return null;
    }
    const job = await this.store.get(jobId);
    if (!job) {
      this.logger.warn("Delivered job does not exist", { jobId });
      return null;
    }
    if (job.status !== "running") {
      this.logger.debug("Delivered job is not running, skipping", { jobId, status: job.status });
      return null;
    }

    this.active.add(jobId);
    const logger = this.logger.child({ jobId, tenantId: job.tenantId });
    const watch = new CancellationWatch({
      store: this.store,
      jobId,
      pollIntervalMs: this.config.cancelPollIntervalMs,
      logger,
    });
    watch.observe(job);
    watch.start();

    let finalJob: Job | null = null;
    try {
      finalJob = await this.runPipeline(job, watch, logger);
      return finalJob;
    } catch (error) {
      if (error instanceof JobCancelledError) {
        finalJob = await this.finishCancelled(jobId, logger);
        return finalJob;
      }
      logger.error("Unexpected error while executing job", {
        event: "executor_error",
        error: toPublicMessage(error),
      });
      finalJob = await this.finish(
        jobId,
        { kind: "InternalError", message: toPublicMessage(error) },
        {},
        logger,
      );
      return finalJob;
    } finally {
      watch.stop();
      await this.progress.release(jobId);
      this.active.delete(jobId);
      if (finalJob) {
        this.onJobSettled(finalJob);
      }
    }
  }

  private async runPipeline(initial: Job, watch: CancellationWatch, logger: Logger): Promise<Job> {
    let job = initial;
    if (job.currentStageIndex > 0 || Object.keys(job.checkpoints).length > 0) {
      logger.info("Resuming job", {
        stageIndex: job.currentStageIndex,
        stage: job.stages[job.currentStageIndex]?.name,
      });
    }

    for (let index = job.currentStageIndex; index < job.stages.length; index += 1) {
      watch.throwIfCancelled();
      const stage = job.stages[index];
      if (!stage || job.stageResults[stage.name]) {
        continue;
      }
      const stageLogger = logger.child({ stage: stage.name });
      const startedAt = Date.now();
      stageLogger.stageStart(
        stage.name,
        `Stage ${index + 1}/${job.stages.length} (${stage.fallbackChain.join(" -> ")})`,
      );

      const run = await this.runStage(job, stage, index, watch, stageLogger);
      await this.progress.flush(job.id);

      if (run.outcome === "exhausted" && !stage.optional) {
        stageLogger.stageFailed(stage.name, run.lastError);
        return this.failStage(job.id, stage, run, logger);
      }

      const result: StageResult =
        run.outcome === "succeeded"
          ? {
              stage: stage.name,
              outcome: "succeeded",
              attemptCount: run.attemptCount,
              attemptsByProvider: run.attemptsByProvider,
              providerUsed: run.providerUsed,
              payload: run.payload,
              error: null,
              recordedAt: this.now().toISOString(),
            }
          : {
              stage: stage.name,
              outcome: "skipped",
              attemptCount: totalAttempts(run.attemptsByProvider),
              attemptsByProvider: run.attemptsByProvider,
              providerUsed: null,
              payload: null,
              error: run.lastError,
              recordedAt: this.now().toISOString(),
            };
      job = await this.recordStageResult(job.id, stage, index, result, watch);
      stageLogger.stageComplete(stage.name, Date.now() - startedAt, result.outcome);
    }

    watch.throwIfCancelled();
    return this.complete(job.id, watch, logger);
  }

  private runStage(
    job: Job,
    stage: StageDefinition,
    stageIndex: number,
    watch: CancellationWatch,
    logger: Logger,
  ): Promise<StageRun> {
    const context: StageContext = {
      job,
      stage,
      stageIndex,
      segmentDurationSeconds: this.config.segmentDurationSeconds,
    };
    switch (stage.capability) {
      case "ingest":
        return this.runUnits(this.handlers.ingest, context, watch, logger);
      case "analyze":
        return this.runUnits(this.handlers.analyze, context, watch, logger);
      case "search":
        return this.runUnits(this.handlers.search, context, watch, logger);
      case "verify":
        return this.runUnits(this.handlers.verify, context, watch, logger);
      case "synthesize":
        return this.runUnits(this.handlers.synthesize, context, watch, logger);
    }
  }

  // Walks the fallback chain. Each provider gets maxRetries + 1 attempts; an unavailable
  // provider is passed over without spending any.
  private async runUnits<C extends StageCapability>(
    handler: StageHandler<C>,
    context: StageContext,
    watch: CancellationWatch,
    logger: Logger,
  ): Promise<StageRun> {
    const { job, stage } = context;
    const units = handler.planUnits(context);
    const outputs = new Map<string, CapabilityOutput<C>>();
    const saved = job.checkpoints[stage.name] ?? {};
    for (const unit of units) {
      if (!(unit.key in saved)) {
        continue;
      }
      const parsed = handler.outputSchema.safeParse(saved[unit.key]);
      if (parsed.success) {
        outputs.set(unit.key, parsed.data);
      }
    }

    const pendingState = job.stageAttempts[stage.name];
    const attemptsByProvider: Record<string, number> = { ...pendingState?.attemptsByProvider };
    let lastError: string | null = pendingState?.lastError ?? null;

    if (outputs.size === units.length) {
      // Every unit was checkpointed by an attempt that never got to record its result
      const providerUsed = pendingState?.provider ?? null;
      if (providerUsed) {
        attemptsByProvider[providerUsed] = (attemptsByProvider[providerUsed] ?? 0) + 1;
      }
      return {
        outcome: "succeeded",
        providerUsed,
        attemptCount: providerUsed ? (attemptsByProvider[providerUsed] ?? 0) : 0,
        attemptsByProvider,
        payload: handler.aggregate(context, units, outputs),
      };
    }
    if (outputs.size > 0) {
      logger.info(`Resuming with ${outputs.size}/${units.length} units checkpointed`);
    }
    this.progress.report(
      job.id,
      stage.name,
      outputs.size / units.length,
      handler.describeProgress(outputs.size, units.length),
    );

    const maxAttempts = stage.maxRetries + 1;
    for (const { name, provider } of this.registry.resolveChain(handler.capability, stage.fallbackChain)) {
      if (!provider) {
        lastError = `${name}: not registered for capability ${handler.capability}`;
        logger.warn(`Provider ${name} is not registered, falling back`, { provider: name });
        continue;
      }
      const probe = await this.registry.probe(handler.capability, name);
      if (probe.status === "unavailable") {
        lastError = `${name}: unavailable (${probe.reason})`;
        logger.info(`Provider ${name} is unavailable, falling back`, {
          provider: name,
          reason: probe.reason,
        });
        continue;
      }

      while ((attemptsByProvider[name] ?? 0) < maxAttempts) {
        watch.throwIfCancelled();
        const attempt = (attemptsByProvider[name] ?? 0) + 1;
        await this.saveAttemptState(job.id, stage.name, {
          provider: name,
          attemptsByProvider: { ...attemptsByProvider },
          lastError,
        }, watch);

        const result = await this.runAttempt(handler, context, units, outputs, provider, watch);
        if (result.ok) {
          attemptsByProvider[name] = attempt;
          return {
            outcome: "succeeded",
            providerUsed: name,
            attemptCount: attempt,
            attemptsByProvider,
            payload: handler.aggregate(context, units, outputs),
          };
        }

        watch.throwIfCancelled();
        const classification = classifyProviderError(result.error);
        if (classification.category === "cancelled") {
          throw new JobCancelledError(job.id);
        }
        lastError = `${name}: ${toPublicMessage(classification.reason)}`;
        if (classification.category === "unavailable") {
          logger.info(`Provider ${name} reported unavailable, falling back`, {
            provider: name,
            reason: classification.reason,
          });
          break;
        }

        attemptsByProvider[name] = attempt;
        if (attempt >= maxAttempts) {
          logger.warn(`Provider ${name} exhausted after ${attempt} attempt(s)`, {
            provider: name,
            category: classification.category,
          });
          break;
        }

        const backoff = computeStageBackoff({
          seed: `${job.id}:${stage.name}:${name}`,
          failedAttempts: attempt,
          baseDelayMs: this.config.retryBaseDelayMs,
          maxDelayMs: this.config.retryMaxDelayMs,
          retryAfterMs: classification.retryAfterMs,
        });
        logger.retry(name, attempt + 1, maxAttempts, lastError, backoff.delayMs);
        await this.saveAttemptState(job.id, stage.name, {
          provider: name,
          attemptsByProvider: { ...attemptsByProvider },
          lastError,
        }, watch);
        try {
          await this.sleep(backoff.delayMs, watch.signal);
        } catch (error) {
          if (watch.cancelled) {
            throw new JobCancelledError(job.id);
          }
          throw error;
        }
      }
    }

    return {
      outcome: "exhausted",
      attemptsByProvider,
      lastError: lastError ?? "no provider in the fallback chain could run",
    };
  }

  // Runs every unit still missing an output against one provider
  private async runAttempt<C extends StageCapability>(
    handler: StageHandler<C>,
    context: StageContext,
    units: ReadonlyArray<StageUnit<C>>,
    outputs: Map<string, CapabilityOutput<C>>,
    provider: CapabilityProvider<C>,
    watch: CancellationWatch,
  ): Promise<AttemptResult> {
    const { job, stage } = context;
    const pending = units.filter((unit) => !outputs.has(unit.key));
    try {
      await runBounded(pending, this.config.segmentConcurrency, async (unit) => {
        watch.throwIfCancelled();
        let output: CapabilityOutput<C>;
        try {
          output = await this.invokeWithTimeout(handler, provider, unit.input, context, watch);
        } catch (error) {
          if (error instanceof JobCancelledError) {
            throw error;
          }
          throw new ProviderCallFailure(provider.name, error);
        }
        outputs.set(unit.key, output);
        await this.saveCheckpoint(job.id, stage.name, unit.key, output, watch);
        this.progress.report(
          job.id,
          stage.name,
          outputs.size / units.length,
          handler.describeProgress(outputs.size, units.length),
        );
      });
      return { ok: true };
    } catch (error) {
      if (error instanceof ProviderCallFailure) {
        return { ok: false, error: error.failure };
      }
      throw error;
    }
  }

  // The executor owns the timeout: the provider is raced against it and told to abort
  private async invokeWithTimeout<C extends StageCapability>(
    handler: StageHandler<C>,
    provider: CapabilityProvider<C>,
    input: CapabilityInput<C>,
    context: StageContext,
    watch: CancellationWatch,
  ): Promise<CapabilityOutput<C>> {
    const { job, stage } = context;
    if (watch.cancelled) {
      throw new JobCancelledError(job.id);
    }

    const controller = new AbortController();
    let rejectGuard: (error: Error) => void = () => undefined;
    const guard = new Promise<never>((_resolve, reject) => {
      rejectGuard = reject;
    });
    let inFlight: Promise<unknown> = Promise.resolve();

    const timer = setTimeout(() => {
      rejectGuard(new ProviderTimeoutError(provider.name, stage.timeoutMs));
      controller.abort();
    }, stage.timeoutMs);
    const onCancel = (): void => {
      controller.abort();
      // In-flight calls get a bounded grace period to wind down before the slot is released
      const settled = inFlight.then(
        () => undefined,
        (error: unknown) => {
          this.logger.debug("Provider call ended after cancellation", {
            jobId: job.id,
            provider: provider.name,
            error: toPublicMessage(error),
          });
        },
      );
      void Promise.race([settled, delay(this.config.cancelGraceMs)]).then(() =>
        rejectGuard(new JobCancelledError(job.id)),
      );
    };
    watch.signal.addEventListener("abort", onCancel, { once: true });

    try {
      const call = provider.invoke(input, { signal: controller.signal, jobId: job.id, stage: stage.name });
      inFlight = call;
      let raw: CapabilityOutput<C>;
      try {
        raw = await Promise.race([call, guard]);
      } catch (error) {
        // A provider that gives up as soon as it is aborted still counts as cancelled
        if (watch.cancelled) {
          throw new JobCancelledError(job.id);
        }
        throw error;
      }
      const parsed = handler.outputSchema.safeParse(raw);
      if (!parsed.success) {
        throw new TransientProviderError(
          `${provider.name} returned output that does not match the ${handler.capability} contract`,
        );
      }
      return parsed.data;
    } finally {
      clearTimeout(timer);
      watch.signal.removeEventListener("abort", onCancel);
    }
  }

  private async saveAttemptState(
    jobId: string,
    stage: string,
    state: StageAttemptState,
    watch: CancellationWatch,
  ): Promise<void> {
    const job = await mutateJob(this.store, jobId, (current) =>
      current.status === "running" ? { stageAttempt: { stage, state } } : null,
    );
    watch.observe(job);
  }

  private async saveCheckpoint(
    jobId: string,
    stage: string,
    unitKey: string,
    output: unknown,
    watch: CancellationWatch,
  ): Promise<void> {
    const job = await mutateJob(this.store, jobId, (current) =>
      current.status === "running" ? { checkpoint: { stage, unitKey, output } } : null,
    );
    watch.observe(job);
  }

  // Result, stage advance and progress floor land in one compare-and-update
  private async recordStageResult(
    jobId: string,
    stage: StageDefinition,
    index: number,
    result: StageResult,
    watch: CancellationWatch,
  ): Promise<Job> {
    const job = await mutateJob(this.store, jobId, (current) => {
      if (current.stageResults[stage.name]) {
        return null;
      }
      return {
        appendStageResult: result,
        currentStageIndex: index + 1,
        stageAttempt: { stage: stage.name, state: null },
        clearCheckpoints: stage.name,
        progressPercent: computeOverallProgress(index + 1, current.stages.length, 0),
        message:
          result.outcome === "succeeded" ? `Completed ${stage.name}` : `Skipped ${stage.name}`,
      };
    });
    watch.observe(job);
    return job;
  }

  private async failStage(
    jobId: string,
    stage: StageDefinition,
    run: Extract<StageRun, { outcome: "exhausted" }>,
    logger: Logger,
  ): Promise<Job> {
    const error: JobError = {
      kind: "StageFailed",
      stage: stage.name,
      message: toPublicMessage(`Stage ${stage.name} failed: ${run.lastError}`),
    };
    const result: StageResult = {
      stage: stage.name,
      outcome: "failed",
      attemptCount: totalAttempts(run.attemptsByProvider),
      attemptsByProvider: run.attemptsByProvider,
      providerUsed: null,
      payload: null,
      error: run.lastError,
      recordedAt: this.now().toISOString(),
    };
    const reportReference = await this.writePartialReport(jobId, stage.name, result, logger);
    return this.finish(
      jobId,
      error,
      {
        appendStageResult: result,
        stageAttempt: { stage: stage.name, state: null },
        clearCheckpoints: stage.name,
        ...(reportReference ? { reportReference } : {}),
      },
      logger,
    );
  }

  // Only under allowPartialReports; a failure here never changes the job's outcome
  private async writePartialReport(
    jobId: string,
    failedStage: string,
    failedResult: StageResult,
    logger: Logger,
  ): Promise<string | null> {
    if (!this.config.allowPartialReports) {
      return null;
    }
    try {
      const job = await this.store.get(jobId);
      if (!job) {
        return null;
      }
      const report = assembleReport(
        { ...job, stageResults: { ...job.stageResults, [failedStage]: failedResult } },
        { partial: true },
      );
      const uri = await this.artifacts.put(serializeReport(report), report.artifactKey);
      logger.info("Partial report written", { reportReference: uri });
      return uri;
    } catch (error) {
      logger.error("Failed to write partial report", {
        event: "partial_report_failed",
        error: toPublicMessage(error),
      });
      return null;
    }
  }

  // A cancel acknowledged before the completion write wins over the assembled report
  private async complete(jobId: string, watch: CancellationWatch, logger: Logger): Promise<Job> {
    const job = await this.store.get(jobId);
    if (!job) {
      throw new Error(`job ${jobId} disappeared before completion`);
    }
    watch.observe(job);
    watch.throwIfCancelled();

    let uri: string;
    try {
      const report = assembleReport(job);
      uri = await this.artifacts.put(serializeReport(report), report.artifactKey);
    } catch (error) {
      if (error instanceof IncompleteInputError) {
        logger.error("Report assembly found missing stage results", {
          event: "assembly_incomplete",
          missingStages: error.missingStages,
        });
        return this.finish(jobId, { kind: "IncompleteInputError", message: error.message }, {}, logger);
      }
      throw error;
    }

    const finished = await this.writeFinal(jobId, logger, (current) =>
      current.cancelRequested
        ? { status: "cancelled", message: "Cancelled", finishedAt: this.now() }
        : {
            status: "completed",
            reportReference: uri,
            progressPercent: 100,
            message: "Completed",
            finishedAt: this.now(),
          },
    );
    if (finished.status !== "completed") {
      await this.discardReport(uri, logger);
      logger.info(`Job ${finished.status} while its report was written`);
      return finished;
    }
    logger.info("Job completed", { reportReference: uri });
    return finished;
  }

  private async discardReport(uri: string, logger: Logger): Promise<void> {
    try {
      await this.artifacts.delete(uri);
    } catch (error) {
      logger.warn("Failed to discard unreferenced report", {
        reportReference: uri,
        error: toPublicMessage(error),
      });
    }
  }

  private async finishCancelled(jobId: string, logger: Logger): Promise<Job> {
    const job = await this.writeFinal(jobId, logger, {
      status: "cancelled",
      cancelRequested: true,
      message: "Cancelled",
      finishedAt: this.now(),
    });
    logger.info("Job cancelled");
    return job;
  }

  private async finish(
    jobId: string,
    error: JobError,
    extra: JobMutation,
    logger: Logger,
  ): Promise<Job> {
    const job = await this.writeFinal(jobId, logger, {
      ...extra,
      status: "failed",
      error,
      message: error.message,
      finishedAt: this.now(),
    });
    logger.warn("Job failed", { kind: error.kind, stage: error.stage });
    return job;
  }

  private async writeFinal(
    jobId: string,
    logger: Logger,
    mutation: JobMutation | ((current: Job) => JobMutation),
  ): Promise<Job> {
    try {
      return await mutateJob(this.store, jobId, (current) => {
        if (isTerminalStatus(current.status)) {
          return null;
        }
        return typeof mutation === "function" ? mutation(current) : mutation;
      });
    } catch (error) {
      logger.error("Failed to record final job state", {
        event: "finalize_failed",
        error: toPublicMessage(error),
      });
      throw error;
    }
  }
}
