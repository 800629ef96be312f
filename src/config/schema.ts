/**
 * Config schema (config.yaml)
 */

import { z } from "zod";

export const llmProviderIdSchema = z.enum(["openai", "anthropic"]);

export const cacheConfigSchema = z.object({
  /** Messages kept per chat in the in-memory buffer */
  maxSize: z.number().int().positive().default(1000),
  /** SQLite file; when absent messages live in memory only */
  dbPath: z.string().min(1).optional(),
});

export const llmConfigSchema = z.object({
  provider: llmProviderIdSchema.default("openai"),
  timeoutMs: z.number().int().positive().default(90_000),
  openai: z
    .object({
      apiKey: z.string().optional(),
      model: z.string().default("gpt-4o"),
      baseUrl: z.string().url().default("https://api.openai.com/v1"),
      temperature: z.number().min(0).max(2).default(0.5),
    })
    .default({}),
  anthropic: z
    .object({
      apiKey: z.string().optional(),
      model: z.string().default("claude-sonnet-4-5"),
      maxTokens: z.number().int().positive().default(4096),
    })
    .default({}),
});

export const accessConfigSchema = z.object({
  /** Telegram user id allowed to grant and revoke access */
  primaryUserId: z.coerce.number().int().positive().optional(),
  /** JSON file holding granted user ids */
  storePath: z.string().min(1).optional(),
});

export const analysisConfigSchema = z.object({
  /** Used by /analyze_last without an argument */
  defaultLastN: z.number().int().positive().default(100),
  /** Window for /analyze_last_24h */
  recentHours: z.number().positive().default(24),
  /** Most recent messages considered for personal reports */
  userMessageLimit: z.number().int().positive().default(200),
  /** Interaction records kept per partner in personal reports */
  interactionLimit: z.number().int().positive().default(20),
});

export const configSchema = z.object({
  telegram: z.object({
    token: z.string().min(1, "telegram.token is required (or set TELEGRAM_BOT_TOKEN)"),
  }),
  cache: cacheConfigSchema.default({}),
  llm: llmConfigSchema.default({}),
  access: accessConfigSchema.default({}),
  analysis: analysisConfigSchema.default({}),
});

export type Config = z.infer<typeof configSchema>;
export type LLMConfig = z.infer<typeof llmConfigSchema>;
export type LLMProviderId = z.infer<typeof llmProviderIdSchema>;
export type AnalysisConfig = z.infer<typeof analysisConfigSchema>;
