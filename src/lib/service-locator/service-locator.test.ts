import { describe, expect, test, vi } from 'vitest';
import { ConfigurationError } from '../errors';
import { ServiceLocator, createServiceKey } from './service-locator';
import {
  ServiceLocatorSealedError,
  ServiceNotFoundError,
  ServiceRegistrationError,
} from './errors';

interface ModelCache {
  models: string[];
}

const CACHE = createServiceKey<ModelCache>('model-cache');
const GREETING = createServiceKey<string>('greeting');

describe('ServiceLocator', () => {
  test('should return what was registered', () => {
    const locator = new ServiceLocator();
    const cache = { models: ['small'] };

    locator.register(CACHE, cache);

    expect(locator.get(CACHE)).toBe(cache);
    expect(locator.has(CACHE)).toBe(true);
    expect(locator.keys()).toEqual(['model-cache']);
  });

  test('should keep registrations separate per locator', () => {
    const first = new ServiceLocator();
    const second = new ServiceLocator();

    first.register(GREETING, 'hello');

    expect(second.has(GREETING)).toBe(false);
    expect(second.getOptional(GREETING)).toBeUndefined();
  });

  test('should throw ServiceNotFoundError for unknown keys', () => {
    const locator = new ServiceLocator();

    expect(() => locator.get(GREETING)).toThrow(ServiceNotFoundError);
    expect(() => locator.get(GREETING)).toThrow(ConfigurationError);
  });

  test('should reject duplicate registrations', () => {
    const locator = new ServiceLocator();
    locator.register(GREETING, 'hello');

    expect(() => locator.register(GREETING, 'again')).toThrow(
      ServiceRegistrationError,
    );
    expect(locator.get(GREETING)).toBe('hello');
  });

  test('should build factories once, on first lookup', () => {
    const locator = new ServiceLocator();
    const factory = vi.fn(() => ({ models: ['large'] }));

    locator.registerFactory(CACHE, factory);
    expect(factory).not.toHaveBeenCalled();

    const first = locator.get(CACHE);
    const second = locator.get(CACHE);

    expect(first).toBe(second);
    expect(factory).toHaveBeenCalledTimes(1);
  });

  test('should let factories resolve other services', () => {
    const locator = new ServiceLocator();
    locator.register(GREETING, 'hi');
    locator.registerFactory(CACHE, (services) => ({
      models: [services.get(GREETING)],
    }));

    expect(locator.get(CACHE)).toEqual({ models: ['hi'] });
  });

  test('should detect a factory that requests itself', () => {
    const locator = new ServiceLocator();
    locator.registerFactory(CACHE, (services) => services.get(CACHE));

    expect(() => locator.get(CACHE)).toThrow(
      'Factory for "model-cache" requested itself while resolving',
    );
  });

  test('should wrap factory failures and allow a retry', () => {
    const locator = new ServiceLocator();
    let attempts = 0;
    locator.registerFactory(GREETING, () => {
      attempts++;
      if (attempts === 1) {
        throw new Error('not ready');
      }
      return 'ready';
    });

    expect(() => locator.get(GREETING)).toThrow(ServiceRegistrationError);
    expect(locator.get(GREETING)).toBe('ready');
  });

  test('should refuse registration once sealed but keep lookups', () => {
    const locator = new ServiceLocator();
    locator.register(GREETING, 'hello');
    locator.seal();

    expect(locator.isSealed()).toBe(true);
    expect(() => locator.register(CACHE, { models: [] })).toThrow(
      ServiceLocatorSealedError,
    );
    expect(locator.get(GREETING)).toBe('hello');
  });

  test('should refuse unregister and clear once sealed', () => {
    const locator = new ServiceLocator();
    locator.register(GREETING, 'hello');
    locator.seal();

    expect(() => locator.unregister(GREETING)).toThrow(
      'Cannot unregister "greeting": the service locator is sealed',
    );
    expect(() => locator.unregister(CACHE)).toThrow(ServiceLocatorSealedError);
    expect(() => locator.clear()).toThrow('Cannot clear: the service locator is sealed');
    expect(locator.keys()).toEqual(['greeting']);
    expect(locator.get(GREETING)).toBe('hello');
  });

  test('should unregister and clear', () => {
    const locator = new ServiceLocator();
    locator.register(GREETING, 'hello');
    locator.register(CACHE, { models: [] });

    expect(locator.unregister(GREETING)).toBe(true);
    expect(locator.unregister(GREETING)).toBe(false);
    expect(locator.keys()).toEqual(['model-cache']);

    locator.clear();
    expect(locator.keys()).toEqual([]);
    expect(locator.has(CACHE)).toBe(false);
  });
});
