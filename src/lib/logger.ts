/**
 * Application logger.
 *
 * Console output is colourised printf in development and JSON in production.
 * `configureLogger` applies the validated config: level, plus an optional
 * JSON file transport alongside the console.
 */

import winston from 'winston';

const logLevel = process.env.LOG_LEVEL || 'info';
const isDevelopment = process.env.NODE_ENV !== 'production';

const consoleFormat = isDevelopment
  ? winston.format.combine(
      winston.format.colorize(),
      winston.format.printf(({ timestamp, level, message, ...meta }) => {
        const metaStr = Object.keys(meta).length ? JSON.stringify(meta) : '';
        return `${timestamp} [${level}] ${message} ${metaStr}`.trimEnd();
      })
    )
  : winston.format.json();

const logger = winston.createLogger({
  level: logLevel,
  format: winston.format.combine(
    winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
    winston.format.errors({ stack: true }),
    winston.format.splat()
  ),
  transports: [
    new winston.transports.Console({
      stderrLevels: ['error'],
      format: consoleFormat,
      silent: process.env.NODE_ENV === 'test',
    }),
  ],
});

export function configureLogger(options: { level: string; file?: string }): void {
  logger.level = options.level;
  if (options.file) {
    logger.add(
      new winston.transports.File({
        filename: options.file,
        format: winston.format.json(),
      })
    );
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export default logger;
