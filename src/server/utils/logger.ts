import winston from 'winston';
import { config } from '../config';
import type { LogFormat, LogLevel } from '../config';

// ============================================================================
// Types
// ============================================================================

export type LogMeta = Record<string, unknown>;

export interface LoggerOptions {
  level: LogLevel;
  format: LogFormat;
  environment: string;
  service?: string;
}

const DEFAULT_SERVICE = 'shogi-engine';

// ============================================================================
// Formats
// ============================================================================

/**
 * Custom format to structure log metadata consistently.
 */
const structuredFormat = winston.format((info) => {
  if (info.error instanceof Error) {
    info.error = {
      message: info.error.message,
      name: info.error.name,
      stack: info.error.stack,
    };
  }
  return info;
});

/**
 * Format for structured JSON logging.
 */
const jsonFormat = winston.format.combine(
  winston.format.timestamp({
    format: () => new Date().toISOString(),
  }),
  winston.format.errors({ stack: true }),
  structuredFormat(),
  winston.format.json()
);

/**
 * Format for human-readable console output.
 */
const consoleFormat = winston.format.combine(
  winston.format.timestamp({
    format: 'YYYY-MM-DD HH:mm:ss',
  }),
  winston.format.errors({ stack: true }),
  structuredFormat(),
  winston.format.colorize(),
  winston.format.printf(({ timestamp, level, message, service: _service, environment: _env, ...meta }) => {
    const metaStr = Object.keys(meta).length > 0 ? ` ${JSON.stringify(meta)}` : '';
    return `${String(timestamp)} ${level}: ${String(message)}${metaStr}`;
  })
);

// ============================================================================
// Logger Construction
// ============================================================================

/**
 * Create a console logger. All levels go to stderr so scripts can write
 * their results to stdout.
 */
export const createLogger = (options: LoggerOptions): winston.Logger =>
  winston.createLogger({
    level: options.level,
    defaultMeta: {
      service: options.service ?? DEFAULT_SERVICE,
      environment: options.environment,
    },
    transports: [
      new winston.transports.Console({
        format: options.format === 'json' ? jsonFormat : consoleFormat,
        stderrLevels: ['error', 'warn', 'info', 'debug'],
        silent: options.environment === 'test',
      }),
    ],
  });

const logger = createLogger({
  level: config.logging.level,
  format: config.logging.format,
  environment: config.nodeEnv,
});

// ============================================================================
// Exports
// ============================================================================

export { logger };
