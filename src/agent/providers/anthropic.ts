import { createLogger } from "../../utils/logger.js";
import type { LLMConfig } from "../../config/schema.js";
import { HTTPError, ProviderConfigError, type CallOptions, type LLMResponse, type Message } from "../types.js";

const log = createLogger("anthropic");

const ANTHROPIC_API_URL = "https://api.anthropic.com/v1/messages";

export async function callAnthropic(
  config: LLMConfig,
  messages: Message[],
  options?: CallOptions,
): Promise<LLMResponse> {
  const { apiKey, model, maxTokens } = config.anthropic;
  if (!apiKey) {
    throw new ProviderConfigError("Anthropic API key is not configured");
  }

  log.debug(`Calling Anthropic ${model}`);

  const anthropicMessages = messages
    .filter((m): m is Message & { role: "user" | "assistant" } => m.role !== "system")
    .map((m) => ({ role: m.role, content: m.content }));

  const systemMessage = messages.find((m) => m.role === "system");

  const body = {
    model,
    max_tokens: options?.maxTokens ?? maxTokens,
    system: systemMessage?.content,
    messages: anthropicMessages,
  };

  const response = await fetch(ANTHROPIC_API_URL, {
    method: "POST",
    headers: {
      "Content-Type": "application/json",
      "x-api-key": apiKey,
      "anthropic-version": "2023-06-01",
    },
    body: JSON.stringify(body),
    signal: options?.timeoutMs ? AbortSignal.timeout(options.timeoutMs) : undefined,
  });

  if (!response.ok) {
    const text = await response.text();
    log.error(`Anthropic error: ${response.status} ${text}`);
    throw new HTTPError(response.status, text);
  }

  const data = (await response.json()) as AnthropicResponse;

  const content = data.content
    .filter((c): c is { type: "text"; text: string } => c.type === "text" && typeof c.text === "string")
    .map((c) => c.text)
    .join("");

  return {
    content: content.trim(),
    usage: {
      promptTokens: data.usage.input_tokens,
      completionTokens: data.usage.output_tokens,
    },
    provider: "anthropic",
    model,
  };
}

interface AnthropicResponse {
  content: Array<{ type: string; text?: string }>;
  usage: {
    input_tokens: number;
    output_tokens: number;
  };
}
