/**
 * Node.js host runtime.
 *
 * Maps the host runtime hooks onto process events:
 * - uncaught exceptions: `uncaughtException` and `unhandledRejection`
 * - runtime errors: `warning`, with the severity taken from the warning name
 *
 * Process listeners are attached while at least one handler of their kind
 * is installed and detached when the last one is restored.
 */

import { createLogger } from '../logging/index.js';
import { SEVERITY_ALL, severityFromWarning } from '../types/severity.js';
import { locate } from '../types/stack-location.js';
import type { HostRuntime, RuntimeErrorHandler, UncaughtExceptionHandler } from './host-runtime.js';

const log = createLogger({ component: 'node-runtime' });

export interface NodeHostRuntimeOptions {
  /** Initial error-reporting mask (default: every severity). */
  errorReporting?: number;
}

/**
 * Node.js host runtime implementation
 */
export class NodeHostRuntime implements HostRuntime {
  readonly name = 'node';

  private readonly _exceptionHandlers: UncaughtExceptionHandler[] = [];
  private readonly _errorHandlers: RuntimeErrorHandler[] = [];
  private _errorReporting: number;

  constructor(options: NodeHostRuntimeOptions = {}) {
    this._errorReporting = options.errorReporting ?? SEVERITY_ALL;
  }

  private readonly onUncaughtException = (error: Error): void => {
    this._exceptionHandlers.at(-1)?.(error);
  };

  private readonly onUnhandledRejection = (reason: unknown): void => {
    this._exceptionHandlers.at(-1)?.(reason);
  };

  private readonly onWarning = (warning: Error): void => {
    const handler = this._errorHandlers.at(-1);
    if (!handler) {
      return;
    }
    const { file, line } = locate(warning.stack);
    handler(severityFromWarning(warning.name), warning.message, file, line);
  };

  setExceptionHandler(handler: UncaughtExceptionHandler): void {
    if (this._exceptionHandlers.length === 0) {
      process.on('uncaughtException', this.onUncaughtException);
      process.on('unhandledRejection', this.onUnhandledRejection);
      log.debug('Attached uncaught exception listeners', { operation: 'set_exception_handler' });
    }
    this._exceptionHandlers.push(handler);
  }

  restoreExceptionHandler(): void {
    if (this._exceptionHandlers.pop() === undefined) {
      return;
    }
    if (this._exceptionHandlers.length === 0) {
      process.off('uncaughtException', this.onUncaughtException);
      process.off('unhandledRejection', this.onUnhandledRejection);
      log.debug('Detached uncaught exception listeners', { operation: 'restore_exception_handler' });
    }
  }

  setErrorHandler(handler: RuntimeErrorHandler): void {
    if (this._errorHandlers.length === 0) {
      process.on('warning', this.onWarning);
      log.debug('Attached warning listener', { operation: 'set_error_handler' });
    }
    this._errorHandlers.push(handler);
  }

  restoreErrorHandler(): void {
    if (this._errorHandlers.pop() === undefined) {
      return;
    }
    if (this._errorHandlers.length === 0) {
      process.off('warning', this.onWarning);
      log.debug('Detached warning listener', { operation: 'restore_error_handler' });
    }
  }

  errorReporting(): number {
    return this._errorReporting;
  }

  /**
   * Change the error-reporting mask.
   *
   * @returns The previous mask
   */
  setErrorReporting(mask: number): number {
    const previous = this._errorReporting;
    this._errorReporting = mask & SEVERITY_ALL;
    return previous;
  }

  terminate(code: number): void {
    process.exit(code);
  }
}
