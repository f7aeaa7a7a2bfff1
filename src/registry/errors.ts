/**
 * Error types for catcher registration.
 */

/**
 * Error thrown when `register` receives an invalid argument.
 *
 * This is a programmer error; it is never dispatched through the registry.
 */
export class RegistrationError extends TypeError {
  readonly argument: 'target' | 'handler';

  constructor(argument: 'target' | 'handler', message: string) {
    super(message);
    this.name = 'RegistrationError';
    this.argument = argument;
  }
}

/**
 * Error thrown when no target was supplied to `register`.
 */
export class MissingTargetError extends RegistrationError {
  constructor() {
    super(
      'target',
      'Parameter target must be a catcher function, an Exception class or a non-empty exception type name'
    );
    this.name = 'MissingTargetError';
  }
}

/**
 * Error thrown when the handler given to `register` is not callable.
 */
export class InvalidHandlerError extends RegistrationError {
  readonly target: string;

  constructor(target: string, received: unknown) {
    super('handler', `Handler for '${target}' must be a function, got ${typeof received}`);
    this.name = 'InvalidHandlerError';
    this.target = target;
  }
}
