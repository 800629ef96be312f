import pino, { type Logger } from "pino";

export type { Logger };

const logger: Logger = pino({
  name: "commcoach",
  level: process.env.LOG_LEVEL ?? "info",
  transport:
    process.env.NODE_ENV === "development"
      ? {
          target: "pino-pretty",
          options: {
            translateTime: "SYS:standard",
            colorize: true,
          },
        }
      : undefined,
});

/** Child logger whose lines carry `module`. */
export function createLogger(module: string): Logger {
  return logger.child({ module });
}
