/**
 * Process-wide API.
 *
 * Free functions bound to the default registry and a default bridge over
 * the Node.js process. Applications that want isolated registries create
 * their own `CatcherRegistry` and `RuntimeBridge` instead.
 *
 * @example
 * ```typescript
 * import { register, registerGlobalHandlers } from 'catchwire';
 *
 * registerGlobalHandlers();
 * register(DatabaseException, (error) => alertOnCall(error.message));
 * ```
 */

import { NodeHostRuntime } from './bridge/node-runtime.js';
import { RuntimeBridge } from './bridge/runtime-bridge.js';
import { loadConfig } from './config/index.js';
import { CatcherRegistry, type DispatchOutcome } from './registry/catcher-registry.js';
import type { CatcherHandler, TypedCatcher } from './registry/typed-catcher.js';
import type { Exception, ExceptionClass } from './types/exception.js';

let defaultBridge: RuntimeBridge | null = null;

/**
 * Get the default bridge, creating it from the environment configuration on first use.
 */
export function getDefaultBridge(): RuntimeBridge {
  if (!defaultBridge) {
    const config = loadConfig();
    defaultBridge = new RuntimeBridge(
      CatcherRegistry.instance(),
      new NodeHostRuntime({ errorReporting: config.errorReporting }),
      { exitOnUncaught: config.exitOnUncaught }
    );
  }
  return defaultBridge;
}

/**
 * Restore and drop the default bridge and registry.
 *
 * This is primarily for testing.
 */
export function resetDefaults(): void {
  defaultBridge?.restore();
  defaultBridge = null;
  CatcherRegistry.resetInstance();
}

/**
 * Register a catcher on the default registry.
 *
 * @see CatcherRegistry.register
 */
export function register(catcher: CatcherHandler | TypedCatcher): void;
export function register<E extends Exception>(
  target: ExceptionClass<E>,
  handler: CatcherHandler<E>
): void;
export function register(target: string, handler: CatcherHandler): void;
export function register(target: unknown, handler?: unknown): void {
  CatcherRegistry.instance().registerEntry(target, handler);
}

/**
 * Handle an exception with the default registry.
 *
 * @returns The catcher's result, or undefined when no catcher matched
 */
export function handle(exception: unknown): unknown {
  return CatcherRegistry.instance().handle(exception);
}

/**
 * Dispatch an exception with the default registry.
 */
export function dispatch(exception: unknown): DispatchOutcome {
  return CatcherRegistry.instance().dispatch(exception);
}

/**
 * Install the default registry as the process's global exception hooks.
 */
export function registerGlobalHandlers(): void {
  getDefaultBridge().registerGlobalHandlers();
}

/**
 * Uninstall the global hooks and empty the default registry.
 */
export function restore(): void {
  getDefaultBridge().restore();
}

export { format } from './formatter/index.js';
