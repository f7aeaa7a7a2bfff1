/**
 * Runtime bridge module.
 *
 * Connects a catcher registry to the host's global failure hooks.
 */

export type { HostRuntime, RuntimeErrorHandler, UncaughtExceptionHandler } from './host-runtime.js';
export { NodeHostRuntime, type NodeHostRuntimeOptions } from './node-runtime.js';
export { RuntimeBridge, type RuntimeBridgeOptions } from './runtime-bridge.js';
