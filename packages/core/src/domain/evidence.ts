import { z } from "zod";

// One piece of evidence returned by a search provider
export const EvidenceItem = z.object({
  sourceReference: z.string().min(1), // URL or other stable source id
  content: z.string(), // extracted text
  relevance: z.number().min(0).max(1),
});
export type EvidenceItem = z.infer<typeof EvidenceItem>;

export const EvidenceQuery = z.object({
  claimId: z.string().min(1),
  claimText: z.string().min(1),
  context: z.string().default(""),
});
export type EvidenceQuery = z.infer<typeof EvidenceQuery>;

export const EvidenceResult = z.object({
  items: z.array(EvidenceItem).default([]),
});
export type EvidenceResult = z.infer<typeof EvidenceResult>;
