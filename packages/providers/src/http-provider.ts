import type { z } from "zod";
import {
  ProviderUnavailableError,
  RateLimitedError,
  TransientProviderError,
  truncateText,
  type CapabilityInput,
  type CapabilityOutput,
  type StageCapability,
} from "@factline/core";
import {
  AVAILABLE,
  unavailable,
  type CapabilityProvider,
  type InvokeContext,
  type ProbeResult,
} from "./capability-provider";

export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

export interface HttpProviderOptions<C extends StageCapability> {
  name: string;
  capability: C;
  endpoint: string;
  healthUrl?: string | null;
  apiKey?: string | null;
  outputSchema: z.ZodType<CapabilityOutput<C>, z.ZodTypeDef, unknown>;
  probeTimeoutMs?: number;
  fetch?: FetchLike;
}

// Retry-After is either delta-seconds or an HTTP date
export function parseRetryAfterHeader(value: string | null, now = Date.now()): number | null {
  if (!value) {
    return null;
  }
  const seconds = Number(value);
  if (Number.isFinite(seconds) && seconds >= 0) {
    return Math.ceil(seconds * 1000);
  }
  const date = Date.parse(value);
  if (Number.isNaN(date)) {
    return null;
  }
  return Math.max(0, date - now);
}

async function readErrorBody(response: Response): Promise<string> {
  const body = await response.text().catch(() => "");
  const firstLine = body.split("\n")[0]?.trim() ?? "";
  return firstLine ? `: ${truncateText(firstLine, 200)}` : "";
}

// Capability served by a JSON-over-HTTP endpoint: POST input, response body is the output
export class HttpCapabilityProvider<C extends StageCapability> implements CapabilityProvider<C> {
  readonly name: string;
  readonly capability: C;
  private readonly fetchImpl: FetchLike;

  constructor(private readonly options: HttpProviderOptions<C>) {
    this.name = options.name;
    this.capability = options.capability;
    this.fetchImpl = options.fetch ?? ((input, init) => fetch(input, init));
  }

  async probe(): Promise<ProbeResult> {
    const healthUrl = this.options.healthUrl;
    if (!healthUrl) {
      return AVAILABLE;
    }
    try {
      const response = await this.fetchImpl(healthUrl, {
        method: "GET",
        headers: this.headers(),
        signal: AbortSignal.timeout(this.options.probeTimeoutMs ?? 5000),
      });
      return response.ok ? AVAILABLE : unavailable(`health check returned ${response.status}`);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      return unavailable(`health check failed: ${message}`);
    }
  }

  async invoke(input: CapabilityInput<C>, context: InvokeContext): Promise<CapabilityOutput<C>> {
    let response: Response;
    try {
      response = await this.fetchImpl(this.options.endpoint, {
        method: "POST",
        headers: {
          ...this.headers(),
          "content-type": "application/json",
          "x-job-id": context.jobId,
          "x-stage": context.stage,
        },
        body: JSON.stringify(input),
        signal: context.signal,
      });
    } catch (error) {
      if (context.signal.aborted) {
        throw error;
      }
      const message = error instanceof Error ? error.message : String(error);
      throw new TransientProviderError(`${this.name} request failed: ${message}`, { cause: error });
    }

    if (!response.ok) {
      throw await this.toProviderError(response);
    }

    let body: unknown;
    try {
      body = await response.json();
    } catch (error) {
      if (context.signal.aborted) {
        throw error;
      }
      throw new TransientProviderError(`${this.name} returned invalid JSON`, { cause: error });
    }

    const parsed = this.options.outputSchema.safeParse(body);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      const detail = issue ? `${issue.path.join(".") || "(root)"}: ${issue.message}` : "invalid";
      throw new TransientProviderError(`${this.name} returned an unexpected payload (${detail})`);
    }
    return parsed.data;
  }

  private headers(): Record<string, string> {
    return this.options.apiKey ? { authorization: `Bearer ${this.options.apiKey}` } : {};
  }

  private async toProviderError(response: Response): Promise<Error> {
    const detail = await readErrorBody(response);
    switch (response.status) {
      case 429:
        return new RateLimitedError(
          `${this.name} rate limited (429)${detail}`,
          parseRetryAfterHeader(response.headers.get("retry-after")),
        );
      case 408:
      case 504:
        return new TransientProviderError(`${this.name} timed out upstream (${response.status})`);
      case 404:
      case 501:
        return new ProviderUnavailableError(this.name, `endpoint returned ${response.status}`);
      default:
        return new TransientProviderError(`${this.name} returned ${response.status}${detail}`);
    }
  }
}
