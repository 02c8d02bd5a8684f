import pino from "pino";

/**
 * Creates the pino logger used across a run.
 *
 * JSON lines on stderr; stdout belongs to the dry-run report. Level labels
 * are strings and timestamps ISO 8601. The level comes from the argument,
 * then `LOG_LEVEL`, then `info`.
 */
export function createLogger(level?: string): pino.Logger {
  return pino(
    {
      name: "newsletter-digest",
      level: level ?? process.env["LOG_LEVEL"] ?? "info",
      formatters: {
        level(label: string) {
          return { level: label };
        },
      },
      timestamp: pino.stdTimeFunctions.isoTime,
    },
    pino.destination(2),
  );
}
