/**
 * Shared LLM call types.
 */

import type { LLMProviderId } from "../config/schema.js";

export interface Message {
  role: "system" | "user" | "assistant";
  content: string;
}

export interface CallOptions {
  maxTokens?: number;
  timeoutMs?: number;
}

export interface LLMResponse {
  content: string;
  usage: {
    promptTokens: number;
    completionTokens: number;
  };
  provider: LLMProviderId;
  model: string;
}

export class HTTPError extends Error {
  constructor(
    readonly status: number,
    readonly body: string,
  ) {
    super(`HTTP ${status}: ${body.slice(0, 200)}`);
    this.name = "HTTPError";
  }
}

export class ProviderConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ProviderConfigError";
  }
}
