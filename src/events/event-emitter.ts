/**
 * Typed event emitter for catcher registries and runtime bridges.
 */

import { EventEmitter } from 'eventemitter3';
import type { Exception } from '../types/exception.js';
import type { Severity } from '../types/severity.js';
import { BridgeEventNames, RegistryEventNames } from './event-names.js';

/**
 * Event payload types
 */
export interface CatcherRegisteredPayload {
  target: string;
  replaced: boolean;
  timestamp: Date;
}

export interface CatcherUnregisteredPayload {
  target: string;
  timestamp: Date;
}

export interface RegistryClearedPayload {
  removed: number;
  timestamp: Date;
}

export interface ExceptionHandledPayload {
  exception: Exception;
  target: string;
  timestamp: Date;
}

export interface ExceptionUnhandledPayload {
  exception: Exception;
  timestamp: Date;
}

export interface BridgeLifecyclePayload {
  timestamp: Date;
}

export interface RuntimeErrorFilteredPayload {
  severity: Severity;
  message: string;
  file: string;
  line: number;
  mask: number;
  timestamp: Date;
}

/**
 * Event map for type-safe event handling
 */
export interface CatcherEventMap {
  'catcher.registered': [payload: CatcherRegisteredPayload];
  'catcher.unregistered': [payload: CatcherUnregisteredPayload];
  'registry.cleared': [payload: RegistryClearedPayload];
  'exception.handled': [payload: ExceptionHandledPayload];
  'exception.unhandled': [payload: ExceptionUnhandledPayload];

  'bridge.installed': [payload: BridgeLifecyclePayload];
  'bridge.restored': [payload: BridgeLifecyclePayload];
  'runtime_error.filtered': [payload: RuntimeErrorFilteredPayload];
}

/**
 * Type-safe event emitter for registry and bridge events
 */
export class CatcherEventEmitter extends EventEmitter<CatcherEventMap> {
  /**
   * Emit a catcher registered event
   */
  emitRegistered(target: string, replaced: boolean): void {
    this.emit(RegistryEventNames.CATCHER_REGISTERED, {
      target,
      replaced,
      timestamp: new Date(),
    });
  }

  /**
   * Emit a catcher unregistered event
   */
  emitUnregistered(target: string): void {
    this.emit(RegistryEventNames.CATCHER_UNREGISTERED, { target, timestamp: new Date() });
  }

  /**
   * Emit a registry cleared event
   */
  emitCleared(removed: number): void {
    this.emit(RegistryEventNames.REGISTRY_CLEARED, { removed, timestamp: new Date() });
  }

  /**
   * Emit an exception handled event
   */
  emitHandled(exception: Exception, target: string): void {
    this.emit(RegistryEventNames.EXCEPTION_HANDLED, {
      exception,
      target,
      timestamp: new Date(),
    });
  }

  /**
   * Emit an exception unhandled event
   */
  emitUnhandled(exception: Exception): void {
    this.emit(RegistryEventNames.EXCEPTION_UNHANDLED, { exception, timestamp: new Date() });
  }

  emitBridgeInstalled(): void {
    this.emit(BridgeEventNames.BRIDGE_INSTALLED, { timestamp: new Date() });
  }

  emitBridgeRestored(): void {
    this.emit(BridgeEventNames.BRIDGE_RESTORED, { timestamp: new Date() });
  }

  /**
   * Emit a runtime error filtered event
   */
  emitRuntimeErrorFiltered(
    severity: Severity,
    message: string,
    file: string,
    line: number,
    mask: number
  ): void {
    this.emit(BridgeEventNames.RUNTIME_ERROR_FILTERED, {
      severity,
      message,
      file,
      line,
      mask,
      timestamp: new Date(),
    });
  }
}
