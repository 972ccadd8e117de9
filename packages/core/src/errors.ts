import type { JobStatus } from "./domain/job";

export type OrchestratorErrorKind =
  | "ValidationError"
  | "AdmissionDenied"
  | "TransientProviderError"
  | "RateLimited"
  | "ProviderTimeout"
  | "ProviderUnavailable"
  | "StageFailed"
  | "IncompleteInputError"
  | "VersionConflict"
  | "InvalidTransition"
  | "JobNotFound"
  | "JobCancelled";

export abstract class OrchestratorError extends Error {
  abstract readonly kind: OrchestratorErrorKind;
}

// Rejected at submission; never retried
export class ValidationError extends OrchestratorError {
  readonly kind = "ValidationError";
  constructor(
    message: string,
    readonly issues: string[] = [],
  ) {
    super(message);
    this.name = "ValidationError";
  }
}

// Tenant at its cap and its queue full; no job record is created
export class AdmissionDeniedError extends OrchestratorError {
  readonly kind = "AdmissionDenied";
  constructor(
    readonly tenantId: string,
    message = `tenant ${tenantId} is at its concurrency cap and its queue is full`,
  ) {
    super(message);
    this.name = "AdmissionDeniedError";
  }
}

export class TransientProviderError extends OrchestratorError {
  readonly kind = "TransientProviderError";
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "TransientProviderError";
  }
}

export class RateLimitedError extends OrchestratorError {
  readonly kind = "RateLimited";
  constructor(
    message: string,
    readonly retryAfterMs: number | null = null,
  ) {
    super(message);
    this.name = "RateLimitedError";
  }
}

export class ProviderTimeoutError extends OrchestratorError {
  readonly kind = "ProviderTimeout";
  constructor(
    readonly provider: string,
    readonly timeoutMs: number,
  ) {
    super(`provider ${provider} timed out after ${timeoutMs}ms`);
    this.name = "ProviderTimeoutError";
  }
}

// Not a failure: the next provider in the chain is tried
export class ProviderUnavailableError extends OrchestratorError {
  readonly kind = "ProviderUnavailable";
  constructor(
    readonly provider: string,
    readonly reason: string,
  ) {
    super(`provider ${provider} is unavailable: ${reason}`);
    this.name = "ProviderUnavailableError";
  }
}

export class StageFailedError extends OrchestratorError {
  readonly kind = "StageFailed";
  constructor(
    readonly stage: string,
    message: string,
  ) {
    super(message);
    this.name = "StageFailedError";
  }
}

// Report assembly was asked for before every required stage had a result
export class IncompleteInputError extends OrchestratorError {
  readonly kind = "IncompleteInputError";
  constructor(
    message: string,
    readonly missingStages: string[] = [],
  ) {
    super(message);
    this.name = "IncompleteInputError";
  }
}

export class VersionConflictError extends OrchestratorError {
  readonly kind = "VersionConflict";
  constructor(
    readonly jobId: string,
    readonly expectedVersion: number,
  ) {
    super(`version conflict on job ${jobId} (expected ${expectedVersion})`);
    this.name = "VersionConflictError";
  }
}

export class InvalidTransitionError extends OrchestratorError {
  readonly kind = "InvalidTransition";
  constructor(
    readonly jobId: string,
    readonly from: JobStatus,
    readonly to: JobStatus,
  ) {
    super(`job ${jobId}: invalid transition ${from} -> ${to}`);
    this.name = "InvalidTransitionError";
  }
}

export class JobNotFoundError extends OrchestratorError {
  readonly kind = "JobNotFound";
  constructor(readonly jobId: string) {
    super(`job ${jobId} not found`);
    this.name = "JobNotFoundError";
  }
}

// Internal control flow: cancellation observed at a checkpoint
export class JobCancelledError extends OrchestratorError {
  readonly kind = "JobCancelled";
  constructor(readonly jobId: string) {
    super(`job ${jobId} was cancelled`);
    this.name = "JobCancelledError";
  }
}

export function isOrchestratorError(error: unknown): error is OrchestratorError {
  return error instanceof OrchestratorError;
}
