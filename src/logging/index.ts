/**
 * Structured logging.
 *
 * Component loggers write through a shared pino root logger. The root
 * logger is created on first use from the environment configuration and
 * can be replaced, which tests use to capture output.
 */

import { type DestinationStream, type Logger, type LoggerOptions, pino } from 'pino';
import { type CatchwireConfig, loadConfig } from '../config/index.js';

/**
 * Structured logging fields.
 *
 * Common fields include:
 * - component: Component identifier (e.g., "registry", "bridge")
 * - operation: Operation being performed (e.g., "register", "dispatch")
 * - exception_type: Type identifier of the exception involved
 * - target: Catcher target type identifier
 * - error_message: Error message for error logs
 */
export interface LogFields {
  [key: string]: string | number | boolean | null | undefined;
}

type LevelName = 'error' | 'warn' | 'info' | 'debug' | 'trace';

/**
 * Logger with preset fields, as returned by createLogger.
 */
export interface ComponentLogger {
  error(message: string, fields?: LogFields): void;
  warn(message: string, fields?: LogFields): void;
  info(message: string, fields?: LogFields): void;
  debug(message: string, fields?: LogFields): void;
  trace(message: string, fields?: LogFields): void;
}

let rootLogger: Logger | null = null;

/**
 * Create a pino logger from configuration.
 *
 * Development output goes through pino-pretty; other environments log JSON lines.
 *
 * @param config - Configuration (defaults to the environment)
 * @param destination - Optional destination stream; disables the pretty transport
 */
export function createRootLogger(
  config: CatchwireConfig = loadConfig(),
  destination?: DestinationStream
): Logger {
  const options: LoggerOptions = {
    name: 'catchwire',
    level: config.logLevel,
  };

  if (destination) {
    return pino(options, destination);
  }

  if (config.environment === 'development') {
    options.transport = {
      target: 'pino-pretty',
      options: { colorize: true },
    };
  }

  return pino(options);
}

/**
 * Get the shared root logger, creating it on first use.
 */
export function getRootLogger(): Logger {
  if (!rootLogger) {
    rootLogger = createRootLogger();
  }
  return rootLogger;
}

/**
 * Replace the shared root logger. Passing null recreates it from the environment on next use.
 */
export function setRootLogger(logger: Logger | null): void {
  rootLogger = logger;
}

function compactFields(fields: LogFields): Record<string, string | number | boolean | null> {
  const result: Record<string, string | number | boolean | null> = {};
  for (const [key, value] of Object.entries(fields)) {
    if (value !== undefined) {
      result[key] = value;
    }
  }
  return result;
}

/**
 * Fallback console logging when the pino logger cannot be created or written to.
 */
function fallbackLog(level: LevelName, message: string, fields: LogFields, cause: unknown): void {
  const timestamp = new Date().toISOString();
  const reason = cause instanceof Error ? cause.message : String(cause);
  console.error(
    `[${timestamp}] ${level.toUpperCase()}: ${message} ${JSON.stringify(compactFields(fields))} (logger unavailable: ${reason})`
  );
}

/**
 * Create a logger with preset fields.
 *
 * Useful for creating component-specific loggers that automatically
 * include common fields in every log message.
 *
 * @param defaultFields - Fields to include in every log message
 * @param base - Logger to write to (defaults to the shared root logger, resolved on each call)
 *
 * @example
 * const log = createLogger({ component: 'registry' });
 * log.info('Registered catcher', { target: 'DiskFullException' });
 * // {"level":30,"name":"catchwire","component":"registry","target":"DiskFullException","msg":"Registered catcher"}
 */
export function createLogger(defaultFields: LogFields, base?: Logger): ComponentLogger {
  const write = (level: LevelName, message: string, fields?: LogFields): void => {
    const merged: LogFields = { ...defaultFields, ...fields };
    try {
      const logger = base ?? getRootLogger();
      logger[level](compactFields(merged), message);
    } catch (error) {
      fallbackLog(level, message, merged, error);
    }
  };

  return {
    error: (message, fields) => write('error', message, fields),
    warn: (message, fields) => write('warn', message, fields),
    info: (message, fields) => write('info', message, fields),
    debug: (message, fields) => write('debug', message, fields),
    trace: (message, fields) => write('trace', message, fields),
  };
}
