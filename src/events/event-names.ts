/**
 * Standard event names emitted by catcher registries and runtime bridges.
 */

/**
 * Event names for registry changes and dispatch
 */
export const RegistryEventNames = {
  /** Emitted when a catcher is registered or replaces an existing one */
  CATCHER_REGISTERED: 'catcher.registered',

  /** Emitted when a catcher is removed */
  CATCHER_UNREGISTERED: 'catcher.unregistered',

  /** Emitted when every catcher is removed at once */
  REGISTRY_CLEARED: 'registry.cleared',

  /** Emitted after a catcher handled an exception */
  EXCEPTION_HANDLED: 'exception.handled',

  /** Emitted when no catcher matched an exception */
  EXCEPTION_UNHANDLED: 'exception.unhandled',
} as const;

/**
 * Event names for the runtime bridge lifecycle
 */
export const BridgeEventNames = {
  /** Emitted when the global hooks are installed */
  BRIDGE_INSTALLED: 'bridge.installed',

  /** Emitted when the global hooks are uninstalled */
  BRIDGE_RESTORED: 'bridge.restored',

  /** Emitted when a runtime error is dropped by the error-reporting mask */
  RUNTIME_ERROR_FILTERED: 'runtime_error.filtered',
} as const;

