import { createHash } from "node:crypto";
import type { z } from "zod";
import {
  FALSE_VERDICTS,
  IncompleteInputError,
  TRUE_VERDICTS,
  VERDICT_ORDER,
  truncateText,
  type EvidenceItem,
  type Job,
  type OverallAssessment,
  type Report,
  type ReportClaim,
  type ReportEvidence,
  type Verdict,
} from "@factline/core";
import { PAYLOAD_SCHEMAS, findPayload } from "../executor/payloads";
import { toCanonicalJson } from "./canonical-json";

export const EVIDENCE_EXCERPT_LENGTH = 280;

export type AssembleInput = Pick<Job, "id" | "videoReference" | "stages" | "stageResults">;

export interface AssembleOptions {
  // Build from whatever succeeded instead of requiring every required stage
  partial?: boolean;
}

function formatPercent(value: number): string {
  return value.toFixed(1);
}

function roundPercent(value: number): number {
  return Math.round(value * 10) / 10;
}

export function computeOverallAssessment(verdicts: readonly Verdict[]): OverallAssessment {
  if (verdicts.length === 0) {
    return {
      verdict: "UNABLE_TO_DETERMINE",
      explanation: "No verifiable claims were found in this video.",
      truePercentage: 0,
      falsePercentage: 0,
    };
  }

  const counts = new Map<Verdict, number>();
  for (const verdict of verdicts) {
    counts.set(verdict, (counts.get(verdict) ?? 0) + 1);
  }
  // Highest count wins; ties go to the verdict earliest on the scale
  let majority: Verdict = "UNCERTAIN";
  let majorityCount = 0;
  for (const verdict of VERDICT_ORDER) {
    const count = counts.get(verdict) ?? 0;
    if (count > majorityCount) {
      majority = verdict;
      majorityCount = count;
    }
  }

  const total = verdicts.length;
  const falseCount = verdicts.filter((verdict) => FALSE_VERDICTS.includes(verdict)).length;
  const trueCount = verdicts.filter((verdict) => TRUE_VERDICTS.includes(verdict)).length;
  const falsePercentage = (falseCount / total) * 100;
  const truePercentage = (trueCount / total) * 100;

  let explanation: string;
  if (falsePercentage >= 70) {
    explanation = `The majority of claims (${formatPercent(falsePercentage)}%) in this video are assessed as false or likely false, indicating significant credibility issues.`;
  } else if (truePercentage >= 70) {
    explanation = `The majority of claims (${formatPercent(truePercentage)}%) in this video are assessed as true or likely true, suggesting generally reliable information.`;
  } else {
    explanation = `This video contains a mix of claims with varying credibility levels. ${formatPercent(falsePercentage)}% of claims appear false or likely false, while ${formatPercent(truePercentage)}% appear true or likely true.`;
  }

  return {
    verdict: majority,
    explanation,
    truePercentage: roundPercent(truePercentage),
    falsePercentage: roundPercent(falsePercentage),
  };
}

// One entry per source (highest relevance kept), most relevant first
export function collectEvidence(
  items: readonly EvidenceItem[],
  references: readonly string[],
): ReportEvidence[] {
  const bySource = new Map<string, ReportEvidence>();
  for (const item of items) {
    const existing = bySource.get(item.sourceReference);
    if (!existing || item.relevance > existing.relevance) {
      bySource.set(item.sourceReference, {
        sourceReference: item.sourceReference,
        relevance: item.relevance,
        excerpt: truncateText(item.content.trim(), EVIDENCE_EXCERPT_LENGTH),
      });
    }
  }
  for (const reference of references) {
    if (!bySource.has(reference)) {
      bySource.set(reference, { sourceReference: reference, relevance: 0, excerpt: "" });
    }
  }
  return [...bySource.values()].sort((left, right) => {
    if (left.relevance !== right.relevance) {
      return right.relevance - left.relevance;
    }
    return left.sourceReference < right.sourceReference
      ? -1
      : left.sourceReference > right.sourceReference
        ? 1
        : 0;
  });
}

function assertComplete(input: AssembleInput): void {
  const missing: string[] = [];
  for (const stage of input.stages) {
    if (stage.optional) {
      continue;
    }
    const result = input.stageResults[stage.name];
    const schema: z.ZodTypeAny = PAYLOAD_SCHEMAS[stage.capability];
    if (!result || result.outcome !== "succeeded" || !schema.safeParse(result.payload).success) {
      missing.push(stage.name);
    }
  }
  if (missing.length > 0) {
    throw new IncompleteInputError(
      `cannot assemble report: no usable result for required stage(s) ${missing.join(", ")}`,
      missing,
    );
  }
}

// Pure: the same stage results always give the same report, byte for byte once serialized
export function assembleReport(input: AssembleInput, options: AssembleOptions = {}): Report {
  const partial = options.partial ?? false;
  if (!partial) {
    assertComplete(input);
  }

  const ingestion = findPayload(input, "ingest");
  const analysis = findPayload(input, "analyze");
  const search = findPayload(input, "search");
  const verification = findPayload(input, "verify");
  const synthesis = findPayload(input, "synthesize");

  const claims: ReportClaim[] = (analysis?.claims ?? []).map((claim) => {
    const verdict = verification?.verdicts[claim.id];
    return {
      id: claim.id,
      text: claim.text,
      timestampSeconds: claim.timestampSeconds,
      speaker: claim.speaker,
      verdict: verdict?.verdict ?? "UNCERTAIN",
      confidence: verdict?.confidence ?? 0,
      explanation: verdict?.explanation ?? "Not verified",
      evidence: collectEvidence(search?.evidence[claim.id] ?? [], verdict?.evidenceReferences ?? []),
    };
  });

  const overallAssessment = computeOverallAssessment(claims.map((claim) => claim.verdict));
  const body: Omit<Report, "artifactKey"> = {
    jobId: input.id,
    videoReference: input.videoReference,
    video: ingestion
      ? {
          videoId: ingestion.videoId,
          title: ingestion.title,
          durationSeconds: ingestion.durationSeconds,
          channel: ingestion.channel,
        }
      : null,
    claims,
    overallAssessment,
    summary: synthesis?.summary ?? overallAssessment.explanation,
    partial,
    stageOutcomes: input.stages.flatMap((stage) => {
      const result = input.stageResults[stage.name];
      return result ? [{ stage: stage.name, outcome: result.outcome }] : [];
    }),
  };

  const digest = createHash("sha256").update(toCanonicalJson(body)).digest("hex").slice(0, 16);
  return { ...body, artifactKey: `reports/${input.id}/${digest}.json` };
}

export function serializeReport(report: Report): Uint8Array {
  return new TextEncoder().encode(toCanonicalJson(report));
}
