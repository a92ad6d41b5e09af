import winston from "winston";
import { isDevelopment, isLogSilent, PATHS } from "@ptz-exposure/config/node";

export type Logger = winston.Logger;

/**
 * Create a logger instance with consistent formatting
 * Console output is colorized; production additionally writes log files
 */
export function createLogger(service: string): Logger {
  const format = winston.format.combine(
    winston.format.timestamp({ format: "YYYY-MM-DD HH:mm:ss" }),
    winston.format.errors({ stack: true }),
    winston.format.splat(),
    winston.format.json(),
  );

  const consoleFormat = winston.format.combine(
    winston.format.colorize(),
    winston.format.printf(({ level, message, timestamp, service, ...metadata }) => {
      let msg = `${String(timestamp)} [${String(service)}] ${level}: ${String(message)}`;
      if (Object.keys(metadata).length > 0) {
        msg += ` ${JSON.stringify(metadata)}`;
      }
      return msg;
    }),
  );

  const logger = winston.createLogger({
    level: isDevelopment() ? "debug" : "info",
    format,
    defaultMeta: { service },
    silent: isLogSilent(),
    transports: [
      new winston.transports.Console({
        format: consoleFormat,
      }),
    ],
  });

  // Add file transports in production
  if (!isDevelopment() && !isLogSilent()) {
    logger.add(
      new winston.transports.File({
        filename: `${PATHS.LOGS}/error.log`,
        level: "error",
      }),
    );
    logger.add(
      new winston.transports.File({
        filename: `${PATHS.LOGS}/combined.log`,
      }),
    );
  }

  return logger;
}
