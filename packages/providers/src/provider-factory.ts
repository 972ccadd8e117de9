import type { z } from "zod";
import {
  AnalysisResult,
  EvidenceResult,
  IngestOutput,
  SynthesizeOutput,
  VerifyOutput,
  type CapabilityOutput,
  type CapabilityTransports,
  type Logger,
  type ProvidersConfig,
  type StageCapability,
} from "@factline/core";
import { CommandCapabilityProvider } from "./command-provider";
import { HttpCapabilityProvider, type FetchLike } from "./http-provider";
import { ProviderRegistry } from "./provider-registry";
import { SeedUrlEvidenceProvider } from "./seed-url-provider";

export interface ProviderFactoryOptions {
  fetch?: FetchLike;
  env?: NodeJS.ProcessEnv;
  logger?: Logger;
}

function registerTransports<C extends StageCapability>(
  registry: ProviderRegistry,
  capability: C,
  transports: CapabilityTransports,
  outputSchema: z.ZodType<CapabilityOutput<C>, z.ZodTypeDef, unknown>,
  options: ProviderFactoryOptions,
): void {
  if (transports.http) {
    registry.register(
      new HttpCapabilityProvider({
        name: `${capability}-http`,
        capability,
        endpoint: transports.http.endpoint,
        healthUrl: transports.http.healthUrl,
        apiKey: transports.http.apiKey,
        outputSchema,
        fetch: options.fetch,
      }),
    );
  }
  if (transports.command) {
    registry.register(
      new CommandCapabilityProvider({
        name: `${capability}-command`,
        capability,
        command: transports.command.command,
        args: transports.command.args,
        outputSchema,
        env: options.env,
      }),
    );
  }
}

// Backend choice is made here, once: which implementations exist for each capability
export function createProviderRegistry(
  providers: ProvidersConfig,
  options: ProviderFactoryOptions = {},
): ProviderRegistry {
  const registry = new ProviderRegistry();
  registerTransports(registry, "ingest", providers.ingest, IngestOutput, options);
  registerTransports(registry, "analyze", providers.analyze, AnalysisResult, options);
  registerTransports(registry, "search", providers.search, EvidenceResult, options);
  registerTransports(registry, "verify", providers.verify, VerifyOutput, options);
  registerTransports(registry, "synthesize", providers.synthesize, SynthesizeOutput, options);
  registry.register(new SeedUrlEvidenceProvider());

  options.logger?.info("Provider registry built", {
    providers: registry.list().map(({ capability, name }) => `${capability}:${name}`),
  });
  return registry;
}
