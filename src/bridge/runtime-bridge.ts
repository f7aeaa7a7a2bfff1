/**
 * Runtime bridge.
 *
 * Installs a catcher registry as the host's global interception hooks.
 * Runtime errors are filtered through the host's error-reporting mask and
 * converted to `RuntimeErrorException` before dispatch; uncaught
 * exceptions are forwarded as they are.
 *
 * @example
 * ```typescript
 * const bridge = new RuntimeBridge(CatcherRegistry.instance(), new NodeHostRuntime());
 * bridge.registerGlobalHandlers();
 *
 * // ... application runs; failures reach the registry ...
 *
 * bridge.restore();
 * ```
 */

import { createDefaultCatcher, type DiagnosticWriter } from '../formatter/index.js';
import { createLogger } from '../logging/index.js';
import type { CatcherRegistry } from '../registry/catcher-registry.js';
import { ROOT_EXCEPTION_TYPE, RuntimeErrorException } from '../types/exception.js';
import { isReported, type Severity, severityName } from '../types/severity.js';
import type { HostRuntime } from './host-runtime.js';

const log = createLogger({ component: 'bridge' });

export interface RuntimeBridgeOptions {
  /**
   * Terminate the host with exit code 1 after dispatching an uncaught
   * exception (default: true). Once the hooks are installed the host no
   * longer exits on its own.
   */
  exitOnUncaught?: boolean;

  /** Sink for the default catch-all catcher (defaults to standard error). */
  write?: DiagnosticWriter;
}

export class RuntimeBridge {
  private _installed = false;

  constructor(
    private readonly registry: CatcherRegistry,
    private readonly runtime: HostRuntime,
    private readonly options: RuntimeBridgeOptions = {}
  ) {}

  /**
   * Check whether the global hooks are installed.
   */
  get isInstalled(): boolean {
    return this._installed;
  }

  /**
   * Install the runtime-error and uncaught-exception hooks and register
   * the default catch-all catcher for the root type.
   *
   * The default catcher replaces any root catcher registered before
   * installation, keeping that catcher's position. Register a custom root
   * catcher after this call to override it.
   */
  registerGlobalHandlers(): void {
    if (this._installed) {
      log.warn('Global handlers already installed, ignoring', { operation: 'install' });
      return;
    }

    this.runtime.setErrorHandler(this.handleRuntimeError);
    this.runtime.setExceptionHandler(this.handleUncaught);
    this.registry.register(ROOT_EXCEPTION_TYPE, createDefaultCatcher(this.options.write));

    this._installed = true;
    log.info('Installed global exception handlers', {
      operation: 'install',
      runtime: this.runtime.name,
    });
    this.registry.events.emitBridgeInstalled();
  }

  /**
   * Uninstall both hooks, reinstating the host's previous handlers, and
   * empty the registry.
   *
   * The registry is emptied even when the hooks were never installed.
   */
  restore(): void {
    if (this._installed) {
      this.runtime.restoreErrorHandler();
      this.runtime.restoreExceptionHandler();
      this._installed = false;
      log.info('Restored previous exception handlers', {
        operation: 'restore',
        runtime: this.runtime.name,
      });
    }

    this.registry.clear();
    this.registry.events.emitBridgeRestored();
  }

  /**
   * Runtime-error hook.
   *
   * Errors whose severity is outside the error-reporting mask are dropped.
   */
  readonly handleRuntimeError = (
    severity: Severity,
    message: string,
    file: string,
    line: number
  ): void => {
    const mask = this.runtime.errorReporting();
    if (!isReported(severity, mask)) {
      log.debug(`Dropped ${severityName(severity)} outside error-reporting mask`, {
        operation: 'runtime_error',
        severity,
        mask,
      });
      this.registry.events.emitRuntimeErrorFiltered(severity, message, file, line, mask);
      return;
    }

    this.registry.handle(new RuntimeErrorException(message, severity, file, line));
  };

  /**
   * Uncaught-exception hook.
   */
  readonly handleUncaught = (error: unknown): void => {
    this.registry.handle(error);

    if (this.options.exitOnUncaught ?? true) {
      log.error('Terminating after uncaught exception', {
        operation: 'uncaught',
        error_message: error instanceof Error ? error.message : String(error),
      });
      this.runtime.terminate(1);
    }
  };
}
