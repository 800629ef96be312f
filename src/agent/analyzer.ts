/**
 * Turns cached messages into a communication report via the configured LLM.
 */

import type { LLMConfig } from "../config/schema.js";
import type { CachedMessage } from "../cache/types.js";
import { createLogger } from "../utils/logger.js";
import { buildChatAnalysisPrompt, buildUserAnalysisPrompt, type UserPromptContext } from "./prompts.js";
import { runLLM } from "./runner.js";
import type { CallOptions, LLMResponse, Message } from "./types.js";

const log = createLogger("analyzer");

export const NOTHING_TO_ANALYZE = "There are no messages to analyze.";

export type LLMCall = (
  config: LLMConfig,
  messages: Message[],
  options?: CallOptions,
) => Promise<LLMResponse>;

export interface Analyzer {
  analyzeChat(messages: readonly CachedMessage[]): Promise<string>;
  analyzeUser(ctx: UserPromptContext): Promise<string>;
}

export function createAnalyzer(config: LLMConfig, call: LLMCall = runLLM): Analyzer {
  async function complete(kind: string, prompt: Message[]): Promise<string> {
    const started = Date.now();
    const response = await call(config, prompt);
    log.info(
      {
        kind,
        provider: response.provider,
        model: response.model,
        promptTokens: response.usage.promptTokens,
        completionTokens: response.usage.completionTokens,
        durationMs: Date.now() - started,
      },
      "analysis complete",
    );
    return response.content;
  }

  return {
    async analyzeChat(messages) {
      if (messages.length === 0) return NOTHING_TO_ANALYZE;
      return complete("chat", buildChatAnalysisPrompt(messages));
    },

    async analyzeUser(ctx) {
      if (ctx.messages.length === 0) return NOTHING_TO_ANALYZE;
      return complete("user", buildUserAnalysisPrompt(ctx));
    },
  };
}
