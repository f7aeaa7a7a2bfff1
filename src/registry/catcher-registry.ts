import { CatcherEventEmitter } from '../events/event-emitter.js';
import { createLogger } from '../logging/index.js';
import { Exception, type ExceptionClass, isExceptionClass, typeNameOf } from '../types/exception.js';
import { InvalidHandlerError, MissingTargetError } from './errors.js';
import { type CatcherHandler, inferTargetType, type TypedCatcher } from './typed-catcher.js';

const log = createLogger({ component: 'registry' });

/**
 * Result of dispatching an exception.
 *
 * Distinguishes a catcher that returned nothing from an exception that no
 * catcher matched.
 */
export type DispatchOutcome =
  | { handled: true; target: string; result: unknown; exception: Exception }
  | { handled: false; exception: Exception };

export interface CatcherRegistryOptions {
  /** Emitter receiving registry events (a private one is created when omitted). */
  emitter?: CatcherEventEmitter;
}

/**
 * Ordered registry of exception catchers.
 *
 * Catchers are keyed by the exception type they catch. Dispatch walks
 * the registry from the most recently inserted type to the oldest and
 * runs the first catcher whose type is in the exception's ancestry.
 * Replacing the catcher of an existing type keeps that type's original
 * position, so ordering is the order of first registration.
 *
 * Ordering alone decides priority: a catcher for a broad type inserted
 * after a catcher for one of its subtypes shadows it.
 *
 * A catcher that throws propagates the error to the caller of `handle`;
 * it is not redispatched. Catchers that re-enter `handle` with an
 * exception they themselves match recurse without limit.
 *
 * @example
 * ```typescript
 * const registry = new CatcherRegistry();
 *
 * registry.register(StorageException, (error) => `storage: ${error.message}`);
 * registry.register(catching(DiskFullException, () => 'disk full'));
 * registry.register(() => 'anything else');
 *
 * registry.handle(new DiskFullException('no space')); // 'anything else'
 * ```
 */
export class CatcherRegistry {
  private static _instance: CatcherRegistry | null = null;

  private readonly _catchers: Map<string, CatcherHandler> = new Map();

  readonly events: CatcherEventEmitter;

  constructor(options: CatcherRegistryOptions = {}) {
    this.events = options.emitter ?? new CatcherEventEmitter();
  }

  /**
   * Get the process-wide registry instance.
   */
  static instance(): CatcherRegistry {
    if (!CatcherRegistry._instance) {
      CatcherRegistry._instance = new CatcherRegistry();
    }
    return CatcherRegistry._instance;
  }

  /**
   * Dispose and drop the process-wide instance.
   *
   * This is primarily for testing to ensure a clean state between tests.
   */
  static resetInstance(): void {
    CatcherRegistry._instance?.dispose();
    CatcherRegistry._instance = null;
  }

  /**
   * Register a catcher.
   *
   * The target is an exception class, a type identifier, or the catcher
   * itself, in which case the type is taken from its `catches` tag or
   * defaults to the root type.
   *
   * @throws MissingTargetError if no target is given, a type identifier is empty, or
   *   a function that is not an exception class is given together with a handler
   * @throws InvalidHandlerError if the resolved handler is not a function
   *
   * @example
   * ```typescript
   * registry.register(DiskFullException, (error) => error.file);
   * registry.register('RangeError', () => 'out of range');
   * registry.register(catching(StorageException, (error) => error.code));
   * ```
   */
  register(catcher: CatcherHandler | TypedCatcher): void;
  register<E extends Exception>(target: ExceptionClass<E>, handler: CatcherHandler<E>): void;
  register(target: string, handler: CatcherHandler): void;
  register(target: CatcherHandler | TypedCatcher | ExceptionClass | string, handler?: unknown): void {
    this.registerEntry(target, handler);
  }

  /**
   * Untyped form of `register` for callers forwarding arguments they have
   * not narrowed themselves; validates both arguments at runtime.
   */
  registerEntry(target: unknown, handler?: unknown): void {
    if (target === null || target === undefined || target === '') {
      throw new MissingTargetError();
    }

    let type: string;
    let resolved: unknown;

    if (isExceptionClass(target)) {
      type = typeNameOf(target);
      resolved = handler;
    } else if (typeof target === 'function') {
      // a plain function followed by a handler is a constructor mistaken for an exception class
      if (handler !== undefined) {
        throw new MissingTargetError();
      }
      type = inferTargetType(target);
      resolved = target;
    } else if (typeof target === 'string') {
      type = target;
      resolved = handler;
    } else {
      throw new MissingTargetError();
    }

    if (!isCatcherHandler(resolved)) {
      throw new InvalidHandlerError(type, resolved);
    }

    const replaced = this._catchers.has(type);
    if (replaced) {
      log.warn(`Replacing catcher for ${type}`, { operation: 'register', target: type });
    }

    this._catchers.set(type, resolved);
    log.debug(`Registered catcher for ${type}`, { operation: 'register', target: type });
    this.events.emitRegistered(type, replaced);
  }

  /**
   * Remove the catcher for a type.
   *
   * @returns True if a catcher was removed, false if none was registered
   */
  unregister(type: string): boolean {
    if (!this._catchers.delete(type)) {
      return false;
    }
    log.debug(`Unregistered catcher for ${type}`, { operation: 'unregister', target: type });
    this.events.emitUnregistered(type);
    return true;
  }

  /**
   * Handle an exception with the first matching catcher.
   *
   * Values that are not `Exception` instances are converted with
   * `Exception.from` first.
   *
   * @returns The catcher's result, or undefined when no catcher matched
   */
  handle(exception: unknown): unknown {
    const outcome = this.dispatch(exception);
    return outcome.handled ? outcome.result : undefined;
  }

  /**
   * Dispatch an exception and report whether a catcher matched.
   *
   * @example
   * ```typescript
   * const outcome = registry.dispatch(error);
   * if (!outcome.handled) {
   *   throw outcome.exception;
   * }
   * ```
   */
  dispatch(exception: unknown): DispatchOutcome {
    const normalized = Exception.from(exception);
    const ancestry = normalized.ancestry;

    const entries = Array.from(this._catchers).reverse();
    for (const [target, catcher] of entries) {
      if (ancestry.includes(target)) {
        log.debug(`Dispatching ${normalized.type} to catcher for ${target}`, {
          operation: 'dispatch',
          exception_type: normalized.type,
          target,
        });
        const result = catcher(normalized);
        this.events.emitHandled(normalized, target);
        return { handled: true, target, result, exception: normalized };
      }
    }

    log.warn(`No catcher matched ${normalized.type}`, {
      operation: 'dispatch',
      exception_type: normalized.type,
      error_message: normalized.message,
    });
    this.events.emitUnhandled(normalized);
    return { handled: false, exception: normalized };
  }

  /**
   * Get the catcher registered for a type.
   */
  getCatcher(type: string): CatcherHandler | undefined {
    return this._catchers.get(type);
  }

  /**
   * Check if a catcher is registered for a type.
   */
  isRegistered(type: string): boolean {
    return this._catchers.has(type);
  }

  /**
   * List registered type identifiers in registration order.
   */
  listTargets(): string[] {
    return Array.from(this._catchers.keys());
  }

  /**
   * Get the number of registered catchers.
   */
  catcherCount(): number {
    return this._catchers.size;
  }

  /**
   * Remove every catcher.
   */
  clear(): void {
    const removed = this._catchers.size;
    this._catchers.clear();
    log.debug('Cleared all catchers from registry', { operation: 'clear', removed });
    this.events.emitCleared(removed);
  }

  /**
   * Clear the registry and detach every event listener.
   */
  dispose(): void {
    this.clear();
    this.events.removeAllListeners();
  }

  /**
   * Get debug information about the registry.
   *
   * @returns Object with registry state; `targets` lists types in dispatch order
   */
  debugInfo(): Record<string, unknown> {
    return {
      catcherCount: this._catchers.size,
      targets: this.listTargets().reverse(),
    };
  }
}

function isCatcherHandler(value: unknown): value is CatcherHandler {
  return typeof value === 'function' && !isExceptionClass(value);
}
