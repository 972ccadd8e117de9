import {
  AdmissionDeniedError,
  JobNotFoundError,
  ValidationError,
} from "@factline/core";

export interface ErrorBody {
  error: string;
  kind: string;
  issues?: string[];
}

export type ErrorStatus = 400 | 404 | 429 | 500;

// Maps the error taxonomy onto HTTP. Anything unexpected is a 500 with a generic message.
export function toErrorResponse(error: unknown): { status: ErrorStatus; body: ErrorBody } {
  if (error instanceof ValidationError) {
    return {
      status: 400,
      body: { error: error.message, kind: error.kind, issues: error.issues },
    };
  }
  if (error instanceof AdmissionDeniedError) {
    return { status: 429, body: { error: error.message, kind: error.kind } };
  }
  if (error instanceof JobNotFoundError) {
    return { status: 404, body: { error: "Job not found", kind: error.kind } };
  }
  return { status: 500, body: { error: "Internal server error", kind: "InternalError" } };
}
