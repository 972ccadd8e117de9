import type { CapabilityInput, CapabilityOutput, StageCapability } from "@factline/core";

export type ProbeResult = { status: "available" } | { status: "unavailable"; reason: string };

export interface InvokeContext {
  // Aborted on stage timeout or job cancellation
  signal: AbortSignal;
  jobId: string;
  stage: string;
}

// One implementation of one capability (an analysis backend, a search backend...)
export interface CapabilityProvider<C extends StageCapability = StageCapability> {
  readonly name: string;
  readonly capability: C;
  probe(): Promise<ProbeResult>;
  invoke(input: CapabilityInput<C>, context: InvokeContext): Promise<CapabilityOutput<C>>;
}

export const AVAILABLE: ProbeResult = { status: "available" };

export function unavailable(reason: string): ProbeResult {
  return { status: "unavailable", reason };
}

export function createAbortError(message: string): Error {
  const error = new Error(message);
  error.name = "AbortError";
  return error;
}
