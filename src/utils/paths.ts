import path from "node:path";

export function resolveHomeDir(): string {
  return process.env.HOME ?? process.env.USERPROFILE ?? ".";
}

function expandTilde(p: string, homeDir: string): string {
  if (p === "~") return homeDir;
  if (p.startsWith("~/")) return path.join(homeDir, p.slice(2));
  if (p.startsWith("~")) return p.replace(/^~/, homeDir);
  return p;
}

/**
 * Resolve COMMCOACH_HOME for this process.
 *
 * Precedence:
 * 1) $COMMCOACH_HOME (if set)
 * 2) ~/.commcoach
 */
export function resolveCommcoachHome(): string {
  const homeDir = resolveHomeDir();
  const env = process.env.COMMCOACH_HOME?.trim();
  const base = env && env.length > 0 ? env : path.join(homeDir, ".commcoach");
  return path.resolve(expandTilde(base, homeDir));
}

/** Resolve a user-provided path-like string (supports leading ~). */
export function resolvePathLike(p: string): string {
  const homeDir = resolveHomeDir();
  return path.resolve(expandTilde(p, homeDir));
}

export function defaultConfigPath(): string {
  return path.join(resolveCommcoachHome(), "config.yaml");
}

/** Where granted user ids persist when `access.storePath` is not set */
export function defaultAccessStorePath(): string {
  return path.join(resolveCommcoachHome(), "access.json");
}
