import winston from "winston";

const { combine, timestamp, printf, errors, colorize } = winston.format;

const SERVICE = "bid-extractor";

const lineFormat = printf(({ timestamp: ts, level, message, service, stack, ...meta }) => {
  const metaPart = Object.keys(meta).length > 0 ? ` ${JSON.stringify(meta)}` : "";
  const stackPart = typeof stack === "string" ? `\n${stack}` : "";
  return `${String(ts)} [${level}] [${String(service)}] ${String(message)}${metaPart}${stackPart}`;
});

export const logger = winston.createLogger({
  level: process.env["LOG_LEVEL"] ?? "info",
  defaultMeta: { service: SERVICE },
  format: combine(errors({ stack: true }), timestamp({ format: "YYYY-MM-DD HH:mm:ss" })),
  transports: [
    new winston.transports.Console({
      format: combine(colorize(), lineFormat),
    }),
  ],
});

/**
 * Applies the validated level and adds the file transport. Called once by the
 * CLI after configuration has loaded.
 */
export function configureLogger(options: { level: string; file?: string }): void {
  logger.level = options.level;
  if (options.file) {
    logger.add(
      new winston.transports.File({
        filename: options.file,
        format: lineFormat,
        maxsize: 10 * 1024 * 1024,
        maxFiles: 5,
      }),
    );
  }
}
