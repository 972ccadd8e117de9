import { StageCapability, toPublicMessage } from "@factline/core";
import { unavailable, type CapabilityProvider, type ProbeResult } from "./capability-provider";

type ProviderMap = { [C in StageCapability]: Map<string, CapabilityProvider<C>> };

export interface ResolvedProvider<C extends StageCapability> {
  name: string;
  provider: CapabilityProvider<C> | null;
}

// Which provider implementations exist is decided once, when the registry is built.
// Availability is probed lazily on first use and then remembered.
export class ProviderRegistry {
  private readonly providers: ProviderMap = {
    ingest: new Map(),
    analyze: new Map(),
    search: new Map(),
    verify: new Map(),
    synthesize: new Map(),
  };
  private readonly probes = new Map<string, Promise<ProbeResult>>();

  register<C extends StageCapability>(provider: CapabilityProvider<C>): this {
    const byName = this.providers[provider.capability];
    if (byName.has(provider.name)) {
      throw new Error(`provider ${provider.name} is already registered for ${provider.capability}`);
    }
    byName.set(provider.name, provider);
    return this;
  }

  get<C extends StageCapability>(capability: C, name: string): CapabilityProvider<C> | undefined {
    return this.providers[capability].get(name);
  }

  list(): Array<{ capability: StageCapability; name: string }> {
    const entries: Array<{ capability: StageCapability; name: string }> = [];
    for (const capability of StageCapability.options) {
      for (const name of this.providers[capability].keys()) {
        entries.push({ capability, name });
      }
    }
    return entries;
  }

  // Fallback chain in configured order; unknown names resolve to null
  resolveChain<C extends StageCapability>(
    capability: C,
    chain: readonly string[],
  ): Array<ResolvedProvider<C>> {
    return chain.map((name) => ({ name, provider: this.get(capability, name) ?? null }));
  }

  probe(capability: StageCapability, name: string): Promise<ProbeResult> {
    const key = `${capability}:${name}`;
    const cached = this.probes.get(key);
    if (cached) {
      return cached;
    }
    const provider = this.providers[capability].get(name);
    const pending = provider
      ? provider.probe().catch((error: unknown) => unavailable(`probe failed: ${toPublicMessage(error)}`))
      : Promise.resolve(unavailable(`not registered for capability ${capability}`));
    this.probes.set(key, pending);
    return pending;
  }

  async probeAll(): Promise<Array<{ capability: StageCapability; name: string; result: ProbeResult }>> {
    return Promise.all(
      this.list().map(async ({ capability, name }) => ({
        capability,
        name,
        result: await this.probe(capability, name),
      })),
    );
  }
}
