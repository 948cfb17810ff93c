import { pino, type Logger } from "pino";

export type { Logger };

export const LOG_LEVELS = ["fatal", "error", "warn", "info", "debug", "trace", "silent"] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

export function createLogger(level: LogLevel = "info"): Logger {
  return pino({
    name: "fund-me",
    level,
    // bigints (balances, nonces) are not JSON-serializable
    formatters: {
      log: (object) =>
        Object.fromEntries(
          Object.entries(object).map(([key, value]) => [
            key,
            typeof value === "bigint" ? value.toString() : value,
          ])
        ),
    },
  });
}

export const logger = createLogger(
  LOG_LEVELS.find((level) => level === process.env.LOG_LEVEL) ?? "info"
);
