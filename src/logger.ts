import pino from "pino";

/**
 * Creates the process-wide pino logger.
 *
 * - String level labels instead of numbers
 * - ISO 8601 timestamps
 * - Level from `LOG_LEVEL`, defaulting to `info`
 * - JSON on stdout, no transport
 */
export function createLogger(level?: string): pino.Logger {
  return pino({
    name: "feed-digest",
    level: level ?? process.env["LOG_LEVEL"] ?? "info",
    formatters: {
      level(label: string) {
        return { level: label };
      },
    },
    timestamp: pino.stdTimeFunctions.isoTime,
  });
}
