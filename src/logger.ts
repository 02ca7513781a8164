import pino from "pino";

/**
 * Creates the service logger: structured JSON on stdout, level as a string
 * label, ISO 8601 timestamps. Level comes from `LOG_LEVEL` unless overridden.
 */
export function createLogger(level?: string): pino.Logger {
  return pino({
    level: level ?? process.env["LOG_LEVEL"] ?? "info",
    base: { service: "rss-torrent-relay" },
    formatters: {
      level(label: string) {
        return { level: label };
      },
    },
    timestamp: pino.stdTimeFunctions.isoTime,
  });
}
