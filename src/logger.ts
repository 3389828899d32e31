import pino from "pino";

/**
 * Creates the service logger: JSON lines with string level labels, ISO
 * timestamps and a `service` field. The level comes from the argument, then
 * `LOG_LEVEL`, then `info`. Anything logged under a `token` key is redacted.
 *
 * @param destination - Where to write; stdout when omitted
 */
export function createLogger(
  level?: string,
  destination?: pino.DestinationStream,
): pino.Logger {
  const options: pino.LoggerOptions = {
    level: level ?? process.env["LOG_LEVEL"] ?? "info",
    base: { service: "threadwatch" },
    redact: ["token", "*.token"],
    formatters: {
      level(label: string) {
        return { level: label };
      },
    },
    timestamp: pino.stdTimeFunctions.isoTime,
  };

  return destination ? pino(options, destination) : pino(options);
}
