import type { EvidenceItem, EvidenceQuery, EvidenceResult } from "@factline/core";
import { AVAILABLE, type CapabilityProvider, type ProbeResult } from "./capability-provider";

export const SEED_URL_PROVIDER_NAME = "seed-url";

const SEED_URL_RELEVANCE = 0.3;

export function extractUrls(text: string): string[] {
  const matches = text.match(/https?:\/\/[^\s)\]}>"']+/gi) ?? [];
  const urls = matches
    .map((value) => value.trim().replace(/[.,;:!?]+$/u, ""))
    .filter((value) => value.length > 0);
  return Array.from(new Set(urls));
}

// Needs no external search API: only URLs already present in the claim or its context
export class SeedUrlEvidenceProvider implements CapabilityProvider<"search"> {
  readonly name = SEED_URL_PROVIDER_NAME;
  readonly capability = "search" as const;

  async probe(): Promise<ProbeResult> {
    return AVAILABLE;
  }

  async invoke(query: EvidenceQuery): Promise<EvidenceResult> {
    const items: EvidenceItem[] = extractUrls(`${query.claimText}\n${query.context}`).map((url) => ({
      sourceReference: url,
      content: "URL cited alongside the claim. Not fetched; weigh it during verification.",
      relevance: SEED_URL_RELEVANCE,
    }));
    return { items };
  }
}
