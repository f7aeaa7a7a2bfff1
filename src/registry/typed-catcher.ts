/**
 * Type-tagged catchers.
 *
 * A catcher registered without an explicit target declares what it
 * catches by carrying a `catches` tag. `catching()` attaches the tag and
 * types the handler's parameter with the caught exception class.
 *
 * @example
 * ```typescript
 * registry.register(
 *   catching(DiskFullException, (error) => cleanupTempFiles(error.file))
 * );
 * // same as registry.register(DiskFullException, (error) => ...)
 *
 * registry.register(() => 'anything');
 * // same as registry.register('Exception', () => 'anything')
 * ```
 */

import {
  type Exception,
  type ExceptionClass,
  ROOT_EXCEPTION_TYPE,
  typeNameOf,
} from '../types/exception.js';

/**
 * Function invoked with a matching exception.
 */
export type CatcherHandler<E extends Exception = Exception, R = unknown> = (exception: E) => R;

/**
 * Catcher carrying the type identifier it catches.
 */
export type TypedCatcher<E extends Exception = Exception, R = unknown> = CatcherHandler<E, R> & {
  readonly catches: string;
};

/**
 * Tag a handler with the exception type it catches.
 *
 * @param type - Exception class or type identifier
 * @param handler - Function invoked with a matching exception
 * @returns A copy of the handler carrying the `catches` tag
 */
export function catching<E extends Exception, R>(
  type: ExceptionClass<E>,
  handler: CatcherHandler<E, R>
): TypedCatcher<E, R>;
export function catching<R>(type: string, handler: CatcherHandler<Exception, R>): TypedCatcher<Exception, R>;
export function catching<R>(
  type: ExceptionClass | string,
  handler: CatcherHandler<Exception, R>
): TypedCatcher<Exception, R> {
  const catches = typeof type === 'string' ? type : typeNameOf(type);
  const tagged = (exception: Exception): R => handler(exception);
  return Object.assign(tagged, { catches });
}

/**
 * Check whether a handler carries a `catches` tag.
 */
export function isTypedCatcher(handler: unknown): handler is TypedCatcher {
  return (
    typeof handler === 'function' &&
    'catches' in handler &&
    typeof handler.catches === 'string' &&
    handler.catches !== ''
  );
}

/**
 * Determine the exception type a handler catches.
 *
 * Tagged handlers catch their declared type; every other handler catches
 * the root type and therefore any exception.
 */
export function inferTargetType(handler: unknown): string {
  return isTypedCatcher(handler) ? handler.catches : ROOT_EXCEPTION_TYPE;
}
