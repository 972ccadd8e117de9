import type { z } from "zod";
import {
  AnalysisResult,
  EvidenceResult,
  IngestOutput,
  SynthesizeOutput,
  VerifyOutput,
  mapProbabilitiesToVerdict,
  planSegments,
  type CapabilityInput,
  type CapabilityOutput,
  type EvidenceItem,
  type Job,
  type StageCapability,
  type StageDefinition,
} from "@factline/core";
import {
  findPayload,
  type AnalyzedClaim,
  type CapabilityPayloads,
  type ClaimVerdict,
} from "./payloads";

// One independently retryable piece of a stage; `key` is unique within the stage
export interface StageUnit<C extends StageCapability> {
  key: string;
  input: CapabilityInput<C>;
}

export interface StageContext {
  job: Job;
  stage: StageDefinition;
  stageIndex: number;
  segmentDurationSeconds: number;
}

export interface StageHandler<C extends StageCapability> {
  readonly capability: C;
  // Validates provider output and stored checkpoints
  readonly outputSchema: z.ZodType<CapabilityOutput<C>, z.ZodTypeDef, unknown>;
  planUnits(context: StageContext): Array<StageUnit<C>>;
  // Folds unit outputs in plan order, so completion order never matters
  aggregate(
    context: StageContext,
    units: ReadonlyArray<StageUnit<C>>,
    outputs: ReadonlyMap<string, CapabilityOutput<C>>,
  ): CapabilityPayloads[C];
  describeProgress(done: number, total: number): string;
}

function requireOutput<T>(outputs: ReadonlyMap<string, T>, key: string): T {
  const output = outputs.get(key);
  if (output === undefined) {
    throw new Error(`no output recorded for unit ${key}`);
  }
  return output;
}

export function normalizeClaimText(text: string): string {
  return text.toLowerCase().replace(/\s+/gu, " ").trim();
}

function segmentKey(index: number): string {
  return `segment-${String(index).padStart(4, "0")}`;
}

function upstreamClaims(context: StageContext): AnalyzedClaim[] {
  return findPayload(context.job, "analyze", context.stageIndex)?.claims ?? [];
}

const ingestHandler: StageHandler<"ingest"> = {
  capability: "ingest",
  outputSchema: IngestOutput,
  planUnits: ({ job }) => [
    {
      key: "video",
      input: {
        videoReference: job.videoReference,
        maxVideoDurationSeconds: job.options.maxVideoDuration ?? null,
      },
    },
  ],
  aggregate: ({ job }, _units, outputs) => {
    const output = requireOutput(outputs, "video");
    const maxDuration = job.options.maxVideoDuration;
    const analyzedDurationSeconds =
      maxDuration === undefined ? output.durationSeconds : Math.min(output.durationSeconds, maxDuration);
    return {
      ...output,
      truncated: analyzedDurationSeconds < output.durationSeconds,
      analyzedDurationSeconds,
    };
  },
  describeProgress: () => "Ingesting video",
};

const analyzeHandler: StageHandler<"analyze"> = {
  capability: "analyze",
  outputSchema: AnalysisResult,
  planUnits: (context) => {
    const { job } = context;
    const ingestion = findPayload(job, "ingest", context.stageIndex);
    const segments = ingestion
      ? planSegments(
          ingestion.durationSeconds,
          context.segmentDurationSeconds,
          job.options.maxVideoDuration,
        )
      : [{ index: 0, startSeconds: 0, endSeconds: 0 }];
    return segments.map((segment) => ({
      key: segmentKey(segment.index),
      input: {
        videoId: ingestion?.videoId ?? job.videoReference,
        mediaUri: ingestion ? ingestion.mediaUri : job.videoReference,
        index: segment.index,
        startSeconds: segment.startSeconds,
        endSeconds: segment.endSeconds,
      },
    }));
  },
  aggregate: (_context, units, outputs) => {
    const claims: AnalyzedClaim[] = [];
    const summaries: string[] = [];
    const seen = new Set<string>();
    for (const unit of units) {
      const output = requireOutput(outputs, unit.key);
      if (output.summary && output.summary.trim().length > 0) {
        summaries.push(output.summary.trim());
      }
      for (const claim of output.claims) {
        const normalized = normalizeClaimText(claim.text);
        if (normalized.length === 0 || seen.has(normalized)) {
          continue;
        }
        seen.add(normalized);
        claims.push({
          id: `c${claims.length + 1}`,
          text: claim.text.trim(),
          timestampSeconds: claim.timestampSeconds,
          speaker: claim.speaker,
          segmentIndex: unit.input.index,
        });
      }
    }
    return { segmentCount: units.length, claims, summaries };
  },
  describeProgress: (done, total) => `Analyzing video (segment ${done}/${total})`,
};

const searchHandler: StageHandler<"search"> = {
  capability: "search",
  outputSchema: EvidenceResult,
  planUnits: (context) => {
    const ingestion = findPayload(context.job, "ingest", context.stageIndex);
    const analysis = findPayload(context.job, "analyze", context.stageIndex);
    const searchContext = [ingestion?.title ?? "", ...(analysis?.summaries ?? [])]
      .filter((part) => part.length > 0)
      .join("\n");
    return upstreamClaims(context).map((claim) => ({
      key: claim.id,
      input: { claimId: claim.id, claimText: claim.text, context: searchContext },
    }));
  },
  aggregate: (_context, units, outputs) => {
    const evidence: Record<string, EvidenceItem[]> = {};
    for (const unit of units) {
      evidence[unit.key] = requireOutput(outputs, unit.key).items;
    }
    return { evidence };
  },
  describeProgress: (done, total) => `Searching evidence (claim ${done}/${total})`,
};

const verifyHandler: StageHandler<"verify"> = {
  capability: "verify",
  outputSchema: VerifyOutput,
  planUnits: (context) => {
    const search = findPayload(context.job, "search", context.stageIndex);
    return upstreamClaims(context).map((claim) => ({
      key: claim.id,
      input: {
        claimId: claim.id,
        claimText: claim.text,
        evidence: search?.evidence[claim.id] ?? [],
      },
    }));
  },
  aggregate: (_context, units, outputs) => {
    const verdicts: Record<string, ClaimVerdict> = {};
    for (const unit of units) {
      const output = requireOutput(outputs, unit.key);
      const verdict =
        output.verdict ??
        (output.probabilities ? mapProbabilitiesToVerdict(output.probabilities) : "UNCERTAIN");
      verdicts[unit.key] = {
        verdict,
        confidence: output.confidence,
        explanation: output.explanation,
        evidenceReferences: output.evidenceReferences,
        probabilities: output.probabilities,
      };
    }
    return { verdicts };
  },
  describeProgress: (done, total) => `Verifying claims (claim ${done}/${total})`,
};

const synthesizeHandler: StageHandler<"synthesize"> = {
  capability: "synthesize",
  outputSchema: SynthesizeOutput,
  planUnits: (context) => {
    const ingestion = findPayload(context.job, "ingest", context.stageIndex);
    const verification = findPayload(context.job, "verify", context.stageIndex);
    return [
      {
        key: "summary",
        input: {
          videoTitle: ingestion?.title ?? "",
          claims: upstreamClaims(context).map((claim) => ({
            id: claim.id,
            text: claim.text,
            verdict: verification?.verdicts[claim.id]?.verdict ?? "UNCERTAIN",
          })),
        },
      },
    ];
  },
  aggregate: (_context, _units, outputs) => ({
    summary: requireOutput(outputs, "summary").summary,
  }),
  describeProgress: () => "Synthesizing report",
};

export type StageHandlers = { [C in StageCapability]: StageHandler<C> };

export const STAGE_HANDLERS: StageHandlers = {
  ingest: ingestHandler,
  analyze: analyzeHandler,
  search: searchHandler,
  verify: verifyHandler,
  synthesize: synthesizeHandler,
};
