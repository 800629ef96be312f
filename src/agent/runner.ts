/**
 * Provider dispatch for LLM calls.
 */

import type { LLMConfig } from "../config/schema.js";
import { providerRegistry } from "./providers/index.js";
import { ProviderConfigError, type CallOptions, type LLMResponse, type Message } from "./types.js";

export async function runLLM(
  config: LLMConfig,
  messages: Message[],
  options?: CallOptions,
): Promise<LLMResponse> {
  const call = providerRegistry.get(config.provider);
  if (!call) {
    throw new ProviderConfigError(`Unknown LLM provider: ${config.provider}`);
  }
  return call(config, messages, { timeoutMs: config.timeoutMs, ...options });
}
