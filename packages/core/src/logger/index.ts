/**
 * Pino logger for the absence runtime
 *
 * Features:
 * - Level and pretty printing resolved from the validated environment
 * - Silent under NODE_ENV=test unless LOG_LEVEL says otherwise
 * - Pretty printing when NODE_ENV=development, structured JSON elsewhere
 */

import pino, { type Logger, type LoggerOptions } from 'pino';

import { loadLoggingSettings } from '../env.js';

/**
 * Logger configuration options
 */
export interface LoggerConfig {
  /** Log level (default: from LOG_LEVEL, else based on NODE_ENV) */
  level?: string;
  /** Service name for log identification */
  serviceName?: string;
  /** Enable pretty printing (default: from LOG_PRETTY, else true when NODE_ENV=development) */
  pretty?: boolean;
}

/**
 * Context that can be attached to log entries
 */
export interface LogContext {
  /** Correlation ID for tracing a caller's operation */
  correlationId?: string;
  /** Name of the operation being logged */
  operation?: string;
  /** Additional context */
  [key: string]: unknown;
}

/**
 * Create the logger configuration
 */
function createLoggerOptions(config: LoggerConfig, nodeEnv: string): LoggerOptions {
  const { level = 'info', serviceName = 'absential' } = config;

  return {
    level,
    name: serviceName,
    timestamp: pino.stdTimeFunctions.isoTime,

    base: {
      service: serviceName,
      env: nodeEnv,
    },

    formatters: {
      level: (label) => ({ level: label }),
    },

    messageKey: 'msg',
  };
}

/**
 * Create a logger instance; unset options come from the environment.
 * Invalid logging variables fall back to their defaults instead of throwing.
 */
export function createLogger(config: LoggerConfig = {}): Logger {
  const env = loadLoggingSettings();
  const options = createLoggerOptions(
    {
      level: config.level ?? env.logLevel,
      serviceName: config.serviceName ?? env.serviceName,
    },
    env.nodeEnv
  );
  const pretty = config.pretty ?? env.logPretty;

  if (pretty) {
    const transport = pino.transport({
      target: 'pino-pretty',
      options: {
        colorize: true,
        translateTime: 'SYS:standard',
        ignore: 'pid,hostname',
        messageFormat: '{msg}',
        singleLine: false,
      },
    }) as pino.DestinationStream;
    return pino(options, transport);
  }

  return pino(options);
}

/**
 * Create a child logger with context
 */
export function createChildLogger(parent: Logger, context: LogContext): Logger {
  return parent.child(context);
}

let defaultLogger: Logger | undefined;

/**
 * Default logger instance, created on first use so that importing the
 * package neither reads the environment nor starts a transport
 */
export function getLogger(): Logger {
  if (defaultLogger === undefined) {
    defaultLogger = createLogger();
  }
  return defaultLogger;
}

/**
 * Replace (or with no argument, reset) the default logger
 */
export function setLogger(logger?: Logger): void {
  defaultLogger = logger;
}

export type { Logger, LoggerOptions } from 'pino';
