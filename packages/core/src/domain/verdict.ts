import { z } from "zod";

// Seven-level verdict scale, most-true first
export const Verdict = z.enum([
  "HIGHLY_LIKELY_TRUE",
  "LIKELY_TRUE",
  "LEANING_TRUE",
  "UNCERTAIN",
  "LEANING_FALSE",
  "LIKELY_FALSE",
  "HIGHLY_LIKELY_FALSE",
]);
export type Verdict = z.infer<typeof Verdict>;

// Probability mass a verifier assigns to each outcome (0..1)
export const ProbabilityDistribution = z.object({
  true: z.number().min(0).max(1),
  false: z.number().min(0).max(1),
  uncertain: z.number().min(0).max(1),
});
export type ProbabilityDistribution = z.infer<typeof ProbabilityDistribution>;
