import pino from "pino";

export type LoggerOptions = {
  readonly level?: string;
  readonly destination?: pino.DestinationStream;
};

/**
 * Structured JSON logger shared by every component of a run.
 *
 * Levels are emitted as labels, timestamps as ISO 8601, and every line
 * carries `service: "feed-mirror"`. The level falls back to `LOG_LEVEL`,
 * then `info`. Output goes to stdout unless a destination is given.
 */
export function createLogger(options: LoggerOptions = {}): pino.Logger {
  const pinoOptions: pino.LoggerOptions = {
    level: options.level ?? process.env["LOG_LEVEL"] ?? "info",
    base: { service: "feed-mirror" },
    formatters: {
      level(label: string) {
        return { level: label };
      },
    },
    timestamp: pino.stdTimeFunctions.isoTime,
  };

  return options.destination
    ? pino(pinoOptions, options.destination)
    : pino(pinoOptions);
}
