import { createLogger } from "../../utils/logger.js";
import type { LLMConfig } from "../../config/schema.js";
import { HTTPError, ProviderConfigError, type CallOptions, type LLMResponse, type Message } from "../types.js";

const log = createLogger("openai");

export async function callOpenAI(
  config: LLMConfig,
  messages: Message[],
  options?: CallOptions,
): Promise<LLMResponse> {
  const { apiKey, model, baseUrl, temperature } = config.openai;
  if (!apiKey) {
    throw new ProviderConfigError("OpenAI API key is not configured");
  }

  log.debug(`Calling OpenAI ${model}`);

  const body = {
    model,
    messages: messages.map((m) => ({ role: m.role, content: m.content })),
    temperature,
    ...(options?.maxTokens ? { max_tokens: options.maxTokens } : {}),
  };

  const response = await fetch(`${baseUrl.replace(/\/+$/, "")}/chat/completions`, {
    method: "POST",
    headers: {
      "Content-Type": "application/json",
      Authorization: `Bearer ${apiKey}`,
    },
    body: JSON.stringify(body),
    signal: options?.timeoutMs ? AbortSignal.timeout(options.timeoutMs) : undefined,
  });

  if (!response.ok) {
    const text = await response.text();
    log.error(`OpenAI error: ${response.status} ${text}`);
    throw new HTTPError(response.status, text);
  }

  const data = (await response.json()) as OpenAIResponse;

  return {
    content: (data.choices[0]?.message.content ?? "").trim(),
    usage: {
      promptTokens: data.usage?.prompt_tokens ?? 0,
      completionTokens: data.usage?.completion_tokens ?? 0,
    },
    provider: "openai",
    model,
  };
}

interface OpenAIResponse {
  choices: Array<{ message: { content: string | null } }>;
  usage?: {
    prompt_tokens: number;
    completion_tokens: number;
  };
}
