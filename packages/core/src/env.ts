import { z } from 'zod';
import { Cell, cellSchema } from '@absential/types';

import { ConfigurationError } from './errors.js';

/**
 * Environment Variable Validation
 * Read once per call; nothing is cached so tests can stub the environment.
 */

const IDENTIFIER_PATTERN = /^[A-Za-z_$][\w$]*$/;

const BindingNameSchema = z
  .string()
  .regex(IDENTIFIER_PATTERN, 'Must be a valid JavaScript identifier');

export const LogLevelSchema = z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']);

const LogPrettySchema = z.enum(['true', 'false']).transform((v) => v === 'true');

export const CoreEnvSchema = z.object({
  /** Any deployment name; only development and test change the logging defaults */
  NODE_ENV: cellSchema(z.string()),
  LOG_LEVEL: cellSchema(LogLevelSchema),
  /** Pretty-print logs through pino-pretty (default: on when NODE_ENV=development) */
  LOG_PRETTY: cellSchema(LogPrettySchema),
  SERVICE_NAME: z.string().min(1).default('absential'),
  /** Global name `install()` binds the sentinel to */
  ABSENCE_SENTINEL_NAME: BindingNameSchema.default('Absent'),
  /** Global name `install()` binds the isAbsent predicate to */
  ABSENCE_PREDICATE_NAME: BindingNameSchema.default('isAbsent'),
});

// Logging must come up whatever else is wrong with the environment
const LoggingEnvSchema = z.object({
  NODE_ENV: cellSchema(z.string()).catch(() => Cell.empty<string>()),
  LOG_LEVEL: cellSchema(LogLevelSchema).catch(() => Cell.empty<LogLevel>()),
  LOG_PRETTY: cellSchema(LogPrettySchema).catch(() => Cell.empty<boolean>()),
  SERVICE_NAME: z.string().min(1).catch('absential'),
});

export type CoreEnv = z.infer<typeof CoreEnvSchema>;

export type LogLevel = z.infer<typeof LogLevelSchema>;

type LoggingEnv = z.infer<typeof LoggingEnvSchema>;

export interface LoggingSettings {
  /** NODE_ENV as given, `development` when unset */
  nodeEnv: string;
  logLevel: LogLevel;
  logPretty: boolean;
  serviceName: string;
}

export interface CoreConfig extends LoggingSettings {
  sentinelName: string;
  predicateName: string;
}

/**
 * Default log level per environment
 */
function defaultLevel(nodeEnv: string | undefined): LogLevel {
  switch (nodeEnv) {
    case 'development':
      return 'debug';
    case 'test':
      return 'silent';
    default:
      return 'info';
  }
}

/**
 * An unset NODE_ENV is reported as development but keeps the quiet
 * defaults (info, no pretty transport) so plain scripts stay plain.
 */
function resolveLogging(data: LoggingEnv): LoggingSettings {
  const nodeEnv = data.NODE_ENV.filter((value) => value !== '');
  return {
    nodeEnv: nodeEnv.extractOr('development'),
    logLevel: data.LOG_LEVEL.extractOrCompute(() => defaultLevel(nodeEnv.toUndefined())),
    logPretty: data.LOG_PRETTY.extractOrCompute(() =>
      nodeEnv.evaluateOrFalse((value) => value === 'development')
    ),
    serviceName: data.SERVICE_NAME,
  };
}

/**
 * Resolve logging settings, ignoring invalid values. Never throws.
 */
export function loadLoggingSettings(env: NodeJS.ProcessEnv = process.env): LoggingSettings {
  return resolveLogging(LoggingEnvSchema.parse(env));
}

/**
 * Validate the environment and resolve defaults
 *
 * @throws {ConfigurationError} listing every invalid variable
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): CoreConfig {
  const result = CoreEnvSchema.safeParse(env);

  if (!result.success) {
    throw new ConfigurationError(result.error.flatten().fieldErrors);
  }

  const data = result.data;
  return {
    ...resolveLogging(data),
    sentinelName: data.ABSENCE_SENTINEL_NAME,
    predicateName: data.ABSENCE_PREDICATE_NAME,
  };
}
