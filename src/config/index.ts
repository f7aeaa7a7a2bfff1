/**
 * Environment-driven configuration.
 *
 * Environment Variables:
 *   CATCHWIRE_ENV               - Environment: development, test, production (falls back to NODE_ENV;
 *                                 an unrecognised NODE_ENV such as 'staging' means production)
 *   CATCHWIRE_LOG_LEVEL         - Log level: fatal, error, warn, info, debug, trace, silent
 *   CATCHWIRE_ERROR_REPORTING   - Severity mask: a number or flag names, e.g. "ERROR|WARNING"
 *   CATCHWIRE_EXIT_ON_UNCAUGHT  - Exit the process after dispatching an uncaught exception
 *                                 (true/1 or false/0, default true)
 */

import { parseSeverityMask, SEVERITY_ALL } from '../types/severity.js';

export type Environment = 'development' | 'test' | 'production';

export type LogLevel = 'fatal' | 'error' | 'warn' | 'info' | 'debug' | 'trace' | 'silent';

export interface CatchwireConfig {
  environment: Environment;
  logLevel: LogLevel;
  /** Severity mask applied to runtime errors before dispatch. */
  errorReporting: number;
  exitOnUncaught: boolean;
}

/**
 * Error thrown when an environment variable holds an unusable value.
 */
export class ConfigError extends Error {
  readonly variable: string;

  constructor(variable: string, value: string) {
    super(`Invalid value for ${variable}: '${value}'`);
    this.name = 'ConfigError';
    this.variable = variable;
  }
}

const ENVIRONMENTS: readonly Environment[] = ['development', 'test', 'production'];
const LOG_LEVELS: readonly LogLevel[] = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'];

function isEnvironment(value: string): value is Environment {
  return ENVIRONMENTS.some((environment) => environment === value);
}

function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

/**
 * Load configuration from environment variables.
 *
 * Unset or empty variables take their defaults; values that cannot be
 * interpreted throw a ConfigError.
 *
 * @example
 * const config = loadConfig({ CATCHWIRE_ERROR_REPORTING: 'ERROR|WARNING' });
 * config.errorReporting; // 3
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): CatchwireConfig {
  const environment = resolveEnvironment(env);

  const rawLevel = env.CATCHWIRE_LOG_LEVEL || (environment === 'test' ? 'silent' : 'info');
  if (!isLogLevel(rawLevel)) {
    throw new ConfigError('CATCHWIRE_LOG_LEVEL', rawLevel);
  }

  let errorReporting = SEVERITY_ALL;
  if (env.CATCHWIRE_ERROR_REPORTING) {
    const mask = parseSeverityMask(env.CATCHWIRE_ERROR_REPORTING);
    if (mask === null) {
      throw new ConfigError('CATCHWIRE_ERROR_REPORTING', env.CATCHWIRE_ERROR_REPORTING);
    }
    errorReporting = mask;
  }

  return {
    environment,
    logLevel: rawLevel,
    errorReporting,
    exitOnUncaught: parseFlag('CATCHWIRE_EXIT_ON_UNCAUGHT', env.CATCHWIRE_EXIT_ON_UNCAUGHT, true),
  };
}

function resolveEnvironment(env: NodeJS.ProcessEnv): Environment {
  const explicit = env.CATCHWIRE_ENV;
  if (explicit) {
    if (!isEnvironment(explicit)) {
      throw new ConfigError('CATCHWIRE_ENV', explicit);
    }
    return explicit;
  }

  // NODE_ENV is shared with other tools; names outside the known set mean production
  const nodeEnv = env.NODE_ENV;
  if (nodeEnv) {
    return isEnvironment(nodeEnv) ? nodeEnv : 'production';
  }

  return 'development';
}

function parseFlag(variable: string, value: string | undefined, fallback: boolean): boolean {
  const normalized = (value ?? '').trim().toLowerCase();
  switch (normalized) {
    case '':
      return fallback;
    case 'true':
    case '1':
      return true;
    case 'false':
    case '0':
      return false;
    default:
      throw new ConfigError(variable, value ?? '');
  }
}
