/**
 * Structured Logger
 *
 * Winston-based logger: colorized console output in development, JSON lines
 * in production, silent under test.
 */

import winston from 'winston';

const { combine, timestamp, json, printf, colorize, errors } = winston.format;

const isDevelopment = process.env.NODE_ENV !== 'production';
const isTest = process.env.NODE_ENV === 'test';

export type LogLevel = 'error' | 'warn' | 'info' | 'http' | 'verbose' | 'debug' | 'silly';

// Start-up default; the configured level is applied with setLogLevel
const DEFAULT_LEVEL: LogLevel = isDevelopment ? 'debug' : 'info';

// Readable single-line output for local runs
const devFormat = printf(({ level, message, timestamp, service, ...metadata }) => {
  let msg = `${timestamp} [${level}]: ${message}`;
  if (Object.keys(metadata).length > 0) {
    msg += ` ${JSON.stringify(metadata)}`;
  }
  return msg;
});

export const logger = winston.createLogger({
  level: DEFAULT_LEVEL,
  format: combine(errors({ stack: true }), timestamp({ format: 'YYYY-MM-DD HH:mm:ss' })),
  defaultMeta: { service: 'fleet-booking-api' },
  transports: [
    new winston.transports.Console({
      format: isDevelopment ? combine(colorize(), devFormat) : json(),
      silent: isTest,
    }),
  ],
  exitOnError: false,
});

export function setLogLevel(level: LogLevel): void {
  logger.level = level;
}

// Stream for Morgan HTTP logging
export const stream = {
  write: (message: string) => {
    logger.info(message.trim());
  },
};

export const logHelpers = {
  business: (event: string, meta?: Record<string, unknown>) => {
    logger.info(`Business Event: ${event}`, meta);
  },
};
