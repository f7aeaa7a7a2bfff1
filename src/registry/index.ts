/**
 * Catcher registry module.
 */

export {
  CatcherRegistry,
  type CatcherRegistryOptions,
  type DispatchOutcome,
} from './catcher-registry.js';
export { InvalidHandlerError, MissingTargetError, RegistrationError } from './errors.js';
export {
  type CatcherHandler,
  catching,
  inferTargetType,
  isTypedCatcher,
  type TypedCatcher,
} from './typed-catcher.js';
