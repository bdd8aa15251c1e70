export {
  createLogger,
  createChildLogger,
  getLogger,
  setLogger,
  type Logger,
  type LoggerOptions,
  type LoggerConfig,
  type LogContext,
} from './logger/index.js';

export { ConfigurationError, type FieldErrors } from './errors.js';

export {
  CoreEnvSchema,
  LogLevelSchema,
  loadConfig,
  loadLoggingSettings,
  type CoreEnv,
  type CoreConfig,
  type LoggingSettings,
  type LogLevel,
} from './env.js';

export { install, uninstall, type InstallOptions } from './installer.js';
