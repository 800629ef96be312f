/**
 * Config loader: YAML file + ${ENV} expansion + environment fallbacks,
 * validated with zod.
 */

import { readFile } from "node:fs/promises";
import { parse } from "yaml";
import { createLogger } from "../utils/logger.js";
import { resolvePathLike } from "../utils/paths.js";
import { configSchema, type Config } from "./schema.js";

const log = createLogger("config");

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

type Env = Record<string, string | undefined>;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function asRecord(value: unknown): Record<string, unknown> {
  return isRecord(value) ? value : {};
}

/** Replace ${VAR} in every string value; unset variables become "". */
export function expandEnvVars(value: unknown, env: Env): unknown {
  if (typeof value === "string") {
    return value.replace(/\$\{([A-Za-z_][A-Za-z0-9_]*)\}/g, (_, name: string) => env[name] ?? "");
  }
  if (Array.isArray(value)) {
    return value.map((v) => expandEnvVars(v, env));
  }
  if (isRecord(value)) {
    const out: Record<string, unknown> = {};
    for (const [k, v] of Object.entries(value)) out[k] = expandEnvVars(v, env);
    return out;
  }
  return value;
}

/** Values from the file win; environment variables only fill gaps. */
function withEnvFallbacks(raw: Record<string, unknown>, env: Env): Record<string, unknown> {
  const telegram = asRecord(raw.telegram);
  const cache = asRecord(raw.cache);
  const llm = asRecord(raw.llm);
  const access = asRecord(raw.access);

  return {
    ...raw,
    telegram: { token: env.TELEGRAM_BOT_TOKEN, ...telegram },
    cache: { dbPath: env.COMMCOACH_DB_PATH || undefined, ...cache },
    llm: {
      provider: env.AI_PROVIDER?.trim().toLowerCase() || undefined,
      ...llm,
      openai: { apiKey: env.OPENAI_API_KEY, ...asRecord(llm.openai) },
      anthropic: { apiKey: env.ANTHROPIC_API_KEY, ...asRecord(llm.anthropic) },
    },
    access: { primaryUserId: env.COMMCOACH_PRIMARY_USER_ID || undefined, ...access },
  };
}

export function parseConfig(raw: unknown, env: Env = process.env): Config {
  const expanded = asRecord(expandEnvVars(raw ?? {}, env));
  const result = configSchema.safeParse(withEnvFallbacks(expanded, env));
  if (!result.success) {
    const issues = result.error.issues
      .map((i) => `  - ${i.path.join(".") || "(root)"}: ${i.message}`)
      .join("\n");
    throw new ConfigError(`Invalid config:\n${issues}`);
  }

  const config = result.data;
  if (config.cache.dbPath && config.cache.dbPath !== ":memory:") {
    config.cache.dbPath = resolvePathLike(config.cache.dbPath);
  }
  if (config.access.storePath) {
    config.access.storePath = resolvePathLike(config.access.storePath);
  }
  return config;
}

/**
 * Load config from a YAML file. A missing file is not an error: everything
 * can come from the environment.
 */
export async function loadConfig(path: string, env: Env = process.env): Promise<Config> {
  const resolved = resolvePathLike(path);
  let raw: unknown = {};
  try {
    raw = parse(await readFile(resolved, "utf-8"));
    log.info({ path: resolved }, "loaded config file");
  } catch (err) {
    if ((err as NodeJS.ErrnoException).code !== "ENOENT") {
      throw new ConfigError(
        `Failed to read config ${resolved}: ${err instanceof Error ? err.message : String(err)}`,
      );
    }
    log.info({ path: resolved }, "no config file, using environment only");
  }
  return parseConfig(raw, env);
}
