/**
 * CatcherRegistry tests.
 *
 * Verifies registration, ordered dispatch with ancestry matching, and lifecycle.
 */

import { afterEach, describe, expect, it, vi } from 'vitest';
import { CatcherEventEmitter } from '../../../src/events/event-emitter.js';
import { CatcherRegistry } from '../../../src/registry/catcher-registry.js';
import {
  InvalidHandlerError,
  MissingTargetError,
  RegistrationError,
} from '../../../src/registry/errors.js';
import { catching } from '../../../src/registry/typed-catcher.js';
import { Exception, ForeignException } from '../../../src/types/exception.js';
import {
  AlphaException,
  BetaException,
  DiskFullException,
  RuntimeFault,
  StorageException,
} from '../../fixtures/exceptions.js';

describe('CatcherRegistry', () => {
  describe('register', () => {
    it('registers a catcher for a type identifier', () => {
      const registry = new CatcherRegistry();
      registry.register('RuntimeFault', () => 'fault');

      expect(registry.isRegistered('RuntimeFault')).toBe(true);
    });

    it('registers a catcher for an exception class under its type identifier', () => {
      const registry = new CatcherRegistry();
      registry.register(DiskFullException, (error) => error.file);

      expect(registry.listTargets()).toEqual(['DiskFullException']);
    });

    it('registers a tagged catcher under its declared type', () => {
      const registry = new CatcherRegistry();
      registry.register(catching(StorageException, () => 'storage'));

      expect(registry.listTargets()).toEqual(['StorageException']);
    });

    it('registers an untagged catcher under the root type', () => {
      const registry = new CatcherRegistry();
      registry.register(() => 'anything');

      expect(registry.listTargets()).toEqual(['Exception']);
    });

    it('treats a tagged catcher like an explicit registration', () => {
      const handler = vi.fn(() => 'storage');
      const tagged = new CatcherRegistry();
      const explicit = new CatcherRegistry();

      tagged.register(catching(StorageException, handler));
      explicit.register('StorageException', handler);

      expect(tagged.listTargets()).toEqual(explicit.listTargets());
      expect(tagged.handle(new DiskFullException('no space'))).toBe('storage');
      expect(explicit.handle(new DiskFullException('no space'))).toBe('storage');
    });

    it('keeps the position of a replaced catcher', () => {
      const registry = new CatcherRegistry();
      registry.register('AlphaException', () => 'first');
      registry.register('BetaException', () => 'beta');
      registry.register('AlphaException', () => 'second');

      expect(registry.listTargets()).toEqual(['AlphaException', 'BetaException']);
      expect(registry.handle(new AlphaException('a'))).toBe('second');
    });

    it('emits registered events with the replaced flag', () => {
      const registry = new CatcherRegistry();
      const listener = vi.fn();
      registry.events.on('catcher.registered', listener);

      registry.register('AlphaException', () => 'first');
      registry.register('AlphaException', () => 'second');

      expect(listener).toHaveBeenCalledTimes(2);
      expect(listener.mock.calls[0]?.[0]).toMatchObject({ target: 'AlphaException', replaced: false });
      expect(listener.mock.calls[1]?.[0]).toMatchObject({ target: 'AlphaException', replaced: true });
    });
  });

  describe('registration errors', () => {
    it('rejects a missing target', () => {
      const registry = new CatcherRegistry();

      expect(() => registry.registerEntry(undefined)).toThrow(MissingTargetError);
      expect(() => registry.registerEntry(null, () => 'x')).toThrow(MissingTargetError);
    });

    it('rejects an empty type identifier', () => {
      const registry = new CatcherRegistry();

      expect(() => registry.register('', () => 'x')).toThrow(
        'Parameter target must be a catcher function, an Exception class or a non-empty exception type name'
      );
    });

    it('rejects targets that are neither strings nor functions', () => {
      const registry = new CatcherRegistry();

      expect(() => registry.registerEntry(42, () => 'x')).toThrow(MissingTargetError);
    });

    it('rejects a constructor that is not an exception class given with a handler', () => {
      const registry = new CatcherRegistry();

      expect(() => registry.registerEntry(TypeError, () => 'x')).toThrow(MissingTargetError);
      expect(registry.catcherCount()).toBe(0);
    });

    it('rejects a non-function handler for a string target', () => {
      const registry = new CatcherRegistry();

      expect(() => registry.registerEntry('RuntimeFault', 'not a function')).toThrow(
        "Handler for 'RuntimeFault' must be a function, got string"
      );
    });

    it('rejects an exception class without a handler', () => {
      const registry = new CatcherRegistry();

      expect(() => registry.registerEntry(StorageException)).toThrow(
        "Handler for 'StorageException' must be a function, got undefined"
      );
    });

    it('rejects an exception class given as the handler', () => {
      const registry = new CatcherRegistry();

      expect(() => registry.registerEntry('StorageException', StorageException)).toThrow(
        InvalidHandlerError
      );
    });

    it('reports the offending argument', () => {
      const registry = new CatcherRegistry();

      try {
        registry.registerEntry('RuntimeFault', 17);
        expect.unreachable('registerEntry should have thrown');
      } catch (error) {
        expect(error).toBeInstanceOf(RegistrationError);
        expect(error).toBeInstanceOf(TypeError);
        expect(error instanceof RegistrationError && error.argument).toBe('handler');
      }
    });

    it('leaves the registry unchanged', () => {
      const registry = new CatcherRegistry();

      expect(() => registry.registerEntry('RuntimeFault', undefined)).toThrow(InvalidHandlerError);
      expect(registry.catcherCount()).toBe(0);
    });
  });

  describe('handle', () => {
    it('invokes the catcher for the exact type once and returns its result', () => {
      const registry = new CatcherRegistry();
      const catcher = vi.fn(() => 'handled');
      registry.register(RuntimeFault, catcher);
      const error = new RuntimeFault('disk full');

      const result = registry.handle(error);

      expect(result).toBe('handled');
      expect(catcher).toHaveBeenCalledTimes(1);
      expect(catcher).toHaveBeenCalledWith(error);
    });

    it('invokes the catcher of an ancestor type', () => {
      const registry = new CatcherRegistry();
      const catcher = vi.fn(() => 'storage');
      registry.register(StorageException, catcher);

      expect(registry.handle(new DiskFullException('no space'))).toBe('storage');
      expect(catcher).toHaveBeenCalledTimes(1);
    });

    it('prefers the most recently inserted matching catcher over a closer one', () => {
      const registry = new CatcherRegistry();
      const storage = vi.fn(() => 'storage');
      const root = vi.fn(() => 'root');
      registry.register(StorageException, storage);
      registry.register(Exception, root);

      expect(registry.handle(new DiskFullException('no space'))).toBe('root');
      expect(storage).not.toHaveBeenCalled();
    });

    it('consults a narrow catcher inserted after a broad one first', () => {
      const registry = new CatcherRegistry();
      registry.register(Exception, () => 'root');
      registry.register(StorageException, () => 'storage');

      expect(registry.handle(new DiskFullException('no space'))).toBe('storage');
      expect(registry.handle(new RuntimeFault('fault'))).toBe('root');
    });

    it('keeps the original dispatch position after replacement', () => {
      const registry = new CatcherRegistry();
      registry.register(Exception, () => 'root-first');
      registry.register(StorageException, () => 'storage');
      registry.register(Exception, () => 'root-second');

      expect(registry.handle(new DiskFullException('no space'))).toBe('storage');
      expect(registry.handle(new RuntimeFault('fault'))).toBe('root-second');
    });

    it('runs at most one catcher', () => {
      const registry = new CatcherRegistry();
      const alpha = vi.fn();
      const root = vi.fn();
      registry.register(Exception, root);
      registry.register(AlphaException, alpha);

      registry.handle(new AlphaException('a'));

      expect(alpha).toHaveBeenCalledTimes(1);
      expect(root).not.toHaveBeenCalled();
    });

    it('returns undefined when nothing matches', () => {
      const registry = new CatcherRegistry();
      const alpha = vi.fn(() => 'alpha');
      registry.register(AlphaException, alpha);

      expect(registry.handle(new BetaException('b'))).toBeUndefined();
      expect(alpha).not.toHaveBeenCalled();
    });

    it('wraps native errors before dispatch', () => {
      const registry = new CatcherRegistry();
      const catcher = vi.fn((error: Exception) => error.type);
      registry.register('TypeError', catcher);
      const original = new TypeError('bad input');

      expect(registry.handle(original)).toBe('TypeError');
      const received = catcher.mock.calls[0]?.[0];
      expect(received).toBeInstanceOf(ForeignException);
      expect(received instanceof ForeignException && received.original).toBe(original);
    });

    it('handles thrown objects that cannot be converted to a string', () => {
      const registry = new CatcherRegistry();
      registry.register(Exception, (error) => error.message);

      expect(registry.handle(Object.create(null))).toBe('[object Object]');
    });

    it('propagates errors thrown by a catcher', () => {
      const registry = new CatcherRegistry();
      registry.register(RuntimeFault, () => {
        throw new Error('catcher failed');
      });

      expect(() => registry.handle(new RuntimeFault('fault'))).toThrow('catcher failed');
    });
  });

  describe('dispatch', () => {
    it('reports the matched target and result', () => {
      const registry = new CatcherRegistry();
      registry.register(StorageException, () => undefined);
      const error = new DiskFullException('no space');

      const outcome = registry.dispatch(error);

      expect(outcome).toEqual({
        handled: true,
        target: 'StorageException',
        result: undefined,
        exception: error,
      });
    });

    it('reports unmatched exceptions', () => {
      const registry = new CatcherRegistry();
      const error = new BetaException('b');

      expect(registry.dispatch(error)).toEqual({ handled: false, exception: error });
    });

    it('emits handled and unhandled events', () => {
      const registry = new CatcherRegistry();
      const handled = vi.fn();
      const unhandled = vi.fn();
      registry.events.on('exception.handled', handled);
      registry.events.on('exception.unhandled', unhandled);
      registry.register(AlphaException, () => 'alpha');
      const alpha = new AlphaException('a');
      const beta = new BetaException('b');

      registry.dispatch(alpha);
      registry.dispatch(beta);

      expect(handled).toHaveBeenCalledTimes(1);
      expect(handled.mock.calls[0]?.[0]).toMatchObject({ exception: alpha, target: 'AlphaException' });
      expect(unhandled).toHaveBeenCalledTimes(1);
      expect(unhandled.mock.calls[0]?.[0]).toMatchObject({ exception: beta });
    });
  });

  describe('unregister', () => {
    it('removes a registered catcher', () => {
      const registry = new CatcherRegistry();
      registry.register(AlphaException, () => 'alpha');

      expect(registry.unregister('AlphaException')).toBe(true);
      expect(registry.isRegistered('AlphaException')).toBe(false);
    });

    it('returns false for unknown types', () => {
      const registry = new CatcherRegistry();

      expect(registry.unregister('AlphaException')).toBe(false);
    });
  });

  describe('inspection', () => {
    it('returns the registered catcher', () => {
      const registry = new CatcherRegistry();
      const catcher = (): string => 'alpha';
      registry.register('AlphaException', catcher);

      expect(registry.getCatcher('AlphaException')).toBe(catcher);
      expect(registry.getCatcher('BetaException')).toBeUndefined();
    });

    it('counts catchers', () => {
      const registry = new CatcherRegistry();
      registry.register(AlphaException, () => 'alpha');
      registry.register(BetaException, () => 'beta');

      expect(registry.catcherCount()).toBe(2);
    });

    it('lists targets in dispatch order in debug info', () => {
      const registry = new CatcherRegistry();
      registry.register(AlphaException, () => 'alpha');
      registry.register(BetaException, () => 'beta');

      expect(registry.debugInfo()).toEqual({
        catcherCount: 2,
        targets: ['BetaException', 'AlphaException'],
      });
    });
  });

  describe('clear and dispose', () => {
    it('clear removes every catcher', () => {
      const registry = new CatcherRegistry();
      const cleared = vi.fn();
      registry.events.on('registry.cleared', cleared);
      registry.register(AlphaException, () => 'alpha');
      registry.register(BetaException, () => 'beta');

      registry.clear();

      expect(registry.catcherCount()).toBe(0);
      expect(registry.handle(new AlphaException('a'))).toBeUndefined();
      expect(cleared.mock.calls[0]?.[0]).toMatchObject({ removed: 2 });
    });

    it('dispose also detaches event listeners', () => {
      const emitter = new CatcherEventEmitter();
      const registry = new CatcherRegistry({ emitter });
      emitter.on('catcher.registered', () => undefined);
      registry.register(AlphaException, () => 'alpha');

      registry.dispose();

      expect(registry.catcherCount()).toBe(0);
      expect(emitter.listenerCount('catcher.registered')).toBe(0);
    });
  });

  describe('instance', () => {
    afterEach(() => {
      CatcherRegistry.resetInstance();
    });

    it('returns the same instance', () => {
      expect(CatcherRegistry.instance()).toBe(CatcherRegistry.instance());
    });

    it('creates a fresh instance after reset', () => {
      const first = CatcherRegistry.instance();
      first.register(AlphaException, () => 'alpha');

      CatcherRegistry.resetInstance();

      expect(first.catcherCount()).toBe(0);
      expect(CatcherRegistry.instance()).not.toBe(first);
    });

    it('is independent from constructed registries', () => {
      const local = new CatcherRegistry();
      local.register(AlphaException, () => 'alpha');

      expect(CatcherRegistry.instance().catcherCount()).toBe(0);
    });
  });
});
