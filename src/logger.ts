import pino from "pino";

/**
 * Creates the structured JSON logger shared by a run.
 *
 * Level labels are strings, timestamps ISO 8601. The level comes from the
 * argument, then `LOG_LEVEL`, then `info`. Output goes to stdout unless a
 * destination stream is given.
 */
export function createLogger(
  level?: string,
  destination?: pino.DestinationStream,
): pino.Logger {
  const options: pino.LoggerOptions = {
    name: "arxiv-digest",
    level: level ?? process.env["LOG_LEVEL"] ?? "info",
    formatters: {
      level(label: string) {
        return { level: label };
      },
    },
    timestamp: pino.stdTimeFunctions.isoTime,
  };

  return destination ? pino(options, destination) : pino(options);
}
