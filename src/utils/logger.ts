import winston from "winston";
import util from "util";

const { combine, timestamp, printf, colorize, uncolorize } = winston.format;

const SPLAT = Symbol.for("splat");

const lineFormat = printf((info) => {
  // Format message using util.format if splat args exist
  // This handles both interpolation ("%s") and appending extra args
  const splatArgs = info[SPLAT];
  const message = Array.isArray(splatArgs) && splatArgs.length > 0
    ? util.format(info.message, ...splatArgs)
    : String(info.message);

  return `${String(info.timestamp)} [${info.level}]: ${message}`;
});

export interface LoggerOptions {
  level?: string;
  /** Also write plain-text lines to this file */
  file?: string | null;
  silent?: boolean;
}

export type Logger = winston.Logger;

export function createLogger(options: LoggerOptions = {}): Logger {
  const consoleTransport = new winston.transports.Console({
    format: combine(colorize(), lineFormat),
  });

  const transports = options.file
    ? [
        consoleTransport,
        new winston.transports.File({
          filename: options.file,
          format: combine(uncolorize(), lineFormat),
        }),
      ]
    : [consoleTransport];

  return winston.createLogger({
    level: options.level || "info",
    silent: options.silent,
    format: timestamp({ format: "YYYY-MM-DD HH:mm:ss" }),
    transports,
  });
}

export const logger = createLogger({ level: process.env.LOG_LEVEL });
