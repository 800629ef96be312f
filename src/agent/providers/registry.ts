import type { LLMConfig, LLMProviderId } from "../../config/schema.js";
import type { CallOptions, LLMResponse, Message } from "../types.js";

export type ProviderCallFn = (
  config: LLMConfig,
  messages: Message[],
  options?: CallOptions,
) => Promise<LLMResponse>;

class ProviderRegistry {
  private providers = new Map<LLMProviderId, ProviderCallFn>();

  register(id: LLMProviderId, call: ProviderCallFn): void {
    this.providers.set(id, call);
  }

  get(id: LLMProviderId): ProviderCallFn | undefined {
    return this.providers.get(id);
  }

  ids(): LLMProviderId[] {
    return Array.from(this.providers.keys());
  }
}

export const providerRegistry = new ProviderRegistry();
