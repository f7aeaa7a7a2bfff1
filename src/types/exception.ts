/**
 * Uniform exception representation.
 *
 * Every value that reaches the catcher registry is an `Exception`. Each
 * subclass declares its type identifier through a static `typeName`, and
 * the chain of declared identifiers up to the root `Exception` is the
 * exception's ancestry. Dispatch matches a catcher when its target is in
 * that chain.
 *
 * @example
 * ```typescript
 * class StorageException extends Exception {
 *   static readonly typeName = 'StorageException';
 * }
 *
 * class DiskFullException extends StorageException {
 *   static readonly typeName = 'DiskFullException';
 * }
 *
 * const error = new DiskFullException('disk full');
 * error.type;      // 'DiskFullException'
 * error.ancestry;  // ['DiskFullException', 'StorageException', 'Exception']
 * ```
 */

import { locate } from './stack-location.js';
import { Severity, severityName } from './severity.js';

/**
 * Type identifier of the root exception type; a catcher for it matches everything.
 */
export const ROOT_EXCEPTION_TYPE = 'Exception';

/**
 * Construction options for exceptions.
 */
export interface ExceptionOptions {
  /** Numeric code (default 0). */
  code?: number;

  /** Originating file. Taken from the construction site's stack when omitted. */
  file?: string;

  /** Originating line. Taken from the construction site's stack when omitted. */
  line?: number;

  /** Underlying error. */
  cause?: unknown;
}

/**
 * Constructor of an exception type.
 */
export type ExceptionClass<E extends Exception = Exception> = (abstract new (
  ...args: never[]
) => E) & {
  readonly typeName: string;
};

/**
 * Base class of all dispatchable exceptions.
 */
export class Exception extends Error {
  static readonly typeName: string = ROOT_EXCEPTION_TYPE;

  readonly code: number;
  readonly file: string;
  readonly line: number;

  constructor(message = '', options: ExceptionOptions = {}) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    Error.captureStackTrace?.(this, new.target);

    this.name = typeNameOf(new.target);
    this.code = options.code ?? 0;

    const location = locate(this.stack);
    this.file = options.file ?? location.file;
    this.line = options.line ?? location.line;
  }

  /**
   * Type identifier of this exception.
   */
  get type(): string {
    return this.ancestry[0] ?? ROOT_EXCEPTION_TYPE;
  }

  /**
   * Declared type identifiers from this exception's own type up to the root.
   */
  get ancestry(): readonly string[] {
    return declaredAncestry(this.constructor);
  }

  /**
   * Check whether this exception is of the given type or descends from it.
   */
  is(target: string): boolean {
    return this.ancestry.includes(target);
  }

  /**
   * Convert any thrown value into an exception.
   *
   * Exceptions are returned unchanged; anything else is wrapped in a
   * `ForeignException`.
   */
  static from(value: unknown): Exception {
    if (value instanceof Exception) {
      return value;
    }
    return new ForeignException(value);
  }
}

/**
 * Wrapper for thrown values that are not `Exception` instances.
 *
 * For native errors the ancestry follows the wrapped error's own class
 * chain, so a catcher for `TypeError` or `Error` matches a thrown
 * `TypeError`. Non-error values only match the root type.
 */
export class ForeignException extends Exception {
  static readonly typeName = 'ForeignException';

  readonly original: unknown;

  constructor(original: unknown) {
    const location = original instanceof Error ? locate(original.stack) : undefined;
    super(original instanceof Error ? original.message : describeThrown(original), {
      cause: original,
      file: location?.file,
      line: location?.line,
    });
    this.original = original;
    if (original instanceof Error) {
      this.name = original.name;
    }
  }

  override get ancestry(): readonly string[] {
    if (!(this.original instanceof Error)) {
      return [ROOT_EXCEPTION_TYPE];
    }
    return [...nativeAncestry(this.original), ROOT_EXCEPTION_TYPE];
  }
}

/**
 * Uniform representation of a runtime error reported by the host.
 *
 * The severity flag doubles as the exception code.
 */
export class RuntimeErrorException extends Exception {
  static readonly typeName = 'RuntimeErrorException';

  readonly severity: Severity;

  constructor(message: string, severity: Severity, file: string, line: number) {
    super(message, { code: severity, file, line });
    this.severity = severity;
  }

  get severityLabel(): string {
    return severityName(this.severity);
  }
}

/**
 * Check whether a value is `Exception` or one of its subclasses.
 */
export function isExceptionClass(value: unknown): value is ExceptionClass {
  return (
    typeof value === 'function' &&
    (value === Exception || value.prototype instanceof Exception)
  );
}

/**
 * Get the type identifier an exception class declares.
 *
 * A class without its own static `typeName` is identified by its class name.
 */
export function typeNameOf(exceptionClass: unknown): string {
  if (typeof exceptionClass !== 'function') {
    return ROOT_EXCEPTION_TYPE;
  }
  if (Object.hasOwn(exceptionClass, 'typeName') && isExceptionClass(exceptionClass)) {
    return exceptionClass.typeName;
  }
  return exceptionClass.name || ROOT_EXCEPTION_TYPE;
}

function declaredAncestry(exceptionClass: unknown): string[] {
  const chain: string[] = [];
  let current: unknown = exceptionClass;

  while (isExceptionClass(current) && current !== Exception) {
    chain.push(typeNameOf(current));
    current = Object.getPrototypeOf(current);
  }

  chain.push(ROOT_EXCEPTION_TYPE);
  return chain;
}

function nativeAncestry(error: Error): string[] {
  const chain: string[] = [];
  let proto: unknown = Object.getPrototypeOf(error);

  while (proto !== null && proto !== Object.prototype && typeof proto === 'object') {
    const ctor: unknown = Object.getOwnPropertyDescriptor(proto, 'constructor')?.value;
    if (typeof ctor === 'function' && ctor.name) {
      chain.push(ctor.name);
    }
    proto = Object.getPrototypeOf(proto);
  }

  return chain;
}

function describeThrown(value: unknown): string {
  try {
    return String(value);
  } catch {
    // null-prototype objects and objects whose toString throws
    return Object.prototype.toString.call(value);
  }
}
