import { Injectable } from "@nestjs/common";
import type { ProviderSettings } from "../../config/types";
import { SwitchboardError } from "../errors";
import type { ProviderAdapter } from "../types";
import { NoopAdapter } from "./noop";
import { OpenAIAdapter } from "./openai";

export interface ResolvedModel {
  adapter: ProviderAdapter;
  model: string;
}

/** Splits `provider:model` into its parts. */
export function parseModelId(modelId: string): { provider: string; model: string } {
  const separator = modelId.indexOf(":");
  if (separator <= 0 || separator === modelId.length - 1) {
    throw new SwitchboardError(`Model identifier "${modelId}" must look like provider:model`);
  }
  return {
    provider: modelId.slice(0, separator),
    model: modelId.slice(separator + 1),
  };
}

/**
 * ProviderFactory turns model identifiers into adapters. Adapters are cached
 * per provider name.
 */
@Injectable()
export class ProviderFactory {
  private readonly adapters = new Map<string, ProviderAdapter>();

  constructor(private readonly providers: Record<string, ProviderSettings> = {}) {}

  resolve(modelId: string): ResolvedModel {
    const { provider, model } = parseModelId(modelId);
    let adapter = this.adapters.get(provider);
    if (!adapter) {
      adapter = this.create(provider);
      this.adapters.set(provider, adapter);
    }
    return { adapter, model };
  }

  protected create(provider: string): ProviderAdapter {
    switch (provider) {
      case "openai":
      case "openai_compatible":
        return new OpenAIAdapter(provider, this.providers[provider] ?? {});
      case "noop":
        return new NoopAdapter();
      default:
        throw new SwitchboardError(`Unknown provider: ${provider}`);
    }
  }
}
