import winston, { Logger } from "winston";
import TransportStream from "winston-transport";

const loggers = new Map<string, Logger>();

export function getLogger(label: string): Logger {
  const existing = loggers.get(label);
  if (existing) return existing;

  const transports: TransportStream[] = [new winston.transports.Console()];

  const logger = winston.createLogger({
    format: winston.format.combine(
      winston.format.timestamp(),
      winston.format.label({
        label: label,
      }),
      winston.format.printf(info => {
        if (info.label) {
          return `${info.timestamp} - ${info.label}:[${info.level}]: ${info.message}`;
        } else {
          return `${info.timestamp} - [${info.level}]: ${info.message}`;
        }
      })
    ),
    level: process.env.LOG_LEVEL || "info",
    transports: transports,
  });

  loggers.set(label, logger);
  return logger;
}

/** Logs error and its cause if defined. */
export function logError(logger: Logger, error: unknown, labelText: string | null = null) {
  const label = labelText ? `${labelText}: ` : "";

  if (error instanceof Error) {
    const errorDetails = (e: Error) => (e.stack ? `\n${e.stack}` : e.message);
    const cause = error.cause instanceof Error ? `\n[Caused by]: ${errorDetails(error.cause)}` : "";
    const msg = label + errorDetails(error) + cause;
    logger.error(msg);
  } else {
    logger.error(`${label}Caught a non-error object: ${JSON.stringify(error)}`);
  }
}
