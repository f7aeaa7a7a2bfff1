/**
 * catchwire
 *
 * Type-ordered exception catchers with process-wide interception for Node.js.
 *
 * @packageDocumentation
 */

// =============================================================================
// Process-wide API
// =============================================================================
export {
  dispatch,
  format,
  getDefaultBridge,
  handle,
  register,
  registerGlobalHandlers,
  resetDefaults,
  restore,
} from './global.js';

// =============================================================================
// Registry
// =============================================================================
export * from './registry/index.js';

// =============================================================================
// Exceptions and severities
// =============================================================================
export * from './types/index.js';

// =============================================================================
// Runtime bridge
// =============================================================================
export * from './bridge/index.js';

// =============================================================================
// Formatting
// =============================================================================
export {
  createDefaultCatcher,
  type DiagnosticWriter,
  type FormattableException,
} from './formatter/index.js';

// =============================================================================
// Events
// =============================================================================
export * from './events/index.js';

// =============================================================================
// Configuration and logging
// =============================================================================
export {
  type CatchwireConfig,
  ConfigError,
  type Environment,
  loadConfig,
  type LogLevel,
} from './config/index.js';
export {
  type ComponentLogger,
  createLogger,
  createRootLogger,
  getRootLogger,
  type LogFields,
  setRootLogger,
} from './logging/index.js';
