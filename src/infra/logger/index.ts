/**
 * Logger factory using Pino
 * Provides structured JSON logging with configurable levels
 */

import pinoLib, { type Logger, type LoggerOptions } from 'pino';

export type LogLevel = 'fatal' | 'error' | 'warn' | 'info' | 'debug' | 'trace' | 'silent';

export interface LoggerConfig {
  level: LogLevel;
  name: string;
  pretty?: boolean;
}

/** Longest SQL text copied into a log line */
export const MAX_LOGGED_QUERY_LENGTH = 200;

const defaultConfig: LoggerConfig = {
  level: 'info',
  name: 'il-fiscal-data-server',
  pretty: process.env['NODE_ENV'] !== 'production',
};

/**
 * Options for the pino-pretty transport, shared with Fastify's own logger.
 */
export const prettyTransport = {
  target: 'pino-pretty',
  options: {
    colorize: true,
    translateTime: 'SYS:standard',
    ignore: 'pid,hostname',
  },
} as const;

/**
 * Creates a configured Pino logger instance
 */
export const createLogger = (config: Partial<LoggerConfig> = {}): Logger => {
  const finalConfig = { ...defaultConfig, ...config };

  const options: LoggerOptions = {
    name: finalConfig.name,
    level: finalConfig.level,
  };

  if (finalConfig.pretty === true && finalConfig.level !== 'silent') {
    options.transport = prettyTransport;
  }

  return pinoLib(options);
};

/**
 * Creates a child logger with additional context
 */
export const createChildLogger = (parent: Logger, context: Record<string, unknown>): Logger => {
  return parent.child(context);
};

/**
 * Shortens query text for log lines; whitespace runs collapse to one space.
 */
export const truncateQuery = (query: string, maxLength = MAX_LOGGED_QUERY_LENGTH): string => {
  const compact = query.replace(/\s+/g, ' ').trim();
  return compact.length > maxLength ? compact.slice(0, maxLength) : compact;
};

export { type Logger } from 'pino';
