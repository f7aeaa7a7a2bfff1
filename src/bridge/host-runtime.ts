/**
 * Host runtime interface consumed by the runtime bridge.
 *
 * A host delivers two kinds of failures: uncaught exceptions (any thrown
 * value nothing else caught) and runtime errors (non-fatal problems
 * reported with a severity and a source location). Handlers for both are
 * stacked: installing a handler replaces the active one, restoring pops
 * back to whatever was active before.
 */

import type { Severity } from '../types/severity.js';

/**
 * Receives a thrown value that nothing else caught.
 */
export type UncaughtExceptionHandler = (error: unknown) => void;

/**
 * Receives a runtime error reported by the host.
 */
export type RuntimeErrorHandler = (
  severity: Severity,
  message: string,
  file: string,
  line: number
) => void;

/**
 * Interface for host-specific hook implementations.
 */
export interface HostRuntime {
  /**
   * Get the runtime name
   */
  readonly name: string;

  /**
   * Make a handler the active uncaught-exception handler.
   */
  setExceptionHandler(handler: UncaughtExceptionHandler): void;

  /**
   * Reinstate the uncaught-exception handler active before the last `setExceptionHandler`.
   */
  restoreExceptionHandler(): void;

  /**
   * Make a handler the active runtime-error handler.
   */
  setErrorHandler(handler: RuntimeErrorHandler): void;

  /**
   * Reinstate the runtime-error handler active before the last `setErrorHandler`.
   */
  restoreErrorHandler(): void;

  /**
   * Current error-reporting mask (bitwise OR of severities to deliver).
   */
  errorReporting(): number;

  /**
   * End the host process with an exit code.
   */
  terminate(code: number): void;
}
