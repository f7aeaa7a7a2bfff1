/**
 * Events module.
 *
 * Provides event names and the typed emitter shared by registries and bridges.
 */

export {
  type BridgeLifecyclePayload,
  CatcherEventEmitter,
  type CatcherEventMap,
  type CatcherRegisteredPayload,
  type CatcherUnregisteredPayload,
  type ExceptionHandledPayload,
  type ExceptionUnhandledPayload,
  type RegistryClearedPayload,
  type RuntimeErrorFilteredPayload,
} from './event-emitter.js';
export { BridgeEventNames, RegistryEventNames } from './event-names.js';
