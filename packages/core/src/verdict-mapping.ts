import type { ProbabilityDistribution, Verdict } from "./domain/verdict";

export const VERDICT_ORDER: readonly Verdict[] = [
  "HIGHLY_LIKELY_TRUE",
  "LIKELY_TRUE",
  "LEANING_TRUE",
  "UNCERTAIN",
  "LEANING_FALSE",
  "LIKELY_FALSE",
  "HIGHLY_LIKELY_FALSE",
];

export const FALSE_VERDICTS: readonly Verdict[] = ["HIGHLY_LIKELY_FALSE", "LIKELY_FALSE"];
export const TRUE_VERDICTS: readonly Verdict[] = ["HIGHLY_LIKELY_TRUE", "LIKELY_TRUE"];

// Thresholds are checked in order; the first match wins.
// Values are percentages (0..100).
export function mapProbabilitiesToVerdict(probabilities: ProbabilityDistribution): Verdict {
  const t = probabilities.true * 100;
  const f = probabilities.false * 100;
  const u = probabilities.uncertain * 100;

  if (t > 70 && f < 10) {
    return "HIGHLY_LIKELY_TRUE";
  }
  if (t + u > 65 && f < 35) {
    return "LIKELY_TRUE";
  }
  if (f + u > 65 && t < 35) {
    return "LIKELY_FALSE";
  }
  if (f > 75) {
    return "HIGHLY_LIKELY_FALSE";
  }
  if (t > 50 && f < 20) {
    return "LIKELY_TRUE";
  }
  if (f > 45 && t < 25) {
    return "LIKELY_FALSE";
  }
  if (t > 40 && f < 35) {
    return "LEANING_TRUE";
  }
  if (f > 35 && t < 30) {
    return "LEANING_FALSE";
  }
  if (Math.abs(t - f) < 10) {
    return "UNCERTAIN";
  }
  return t > f ? "LEANING_TRUE" : "LEANING_FALSE";
}

export function verdictRank(verdict: Verdict): number {
  return VERDICT_ORDER.indexOf(verdict);
}
