import {
  ServiceLocatorSealedError,
  ServiceNotFoundError,
  ServiceRegistrationError,
} from './errors';

export type ServiceFactory<T> = (locator: ServiceLocator) => T;

export type ServiceEntry<T> =
  | { kind: 'instance'; value: T }
  | { kind: 'factory'; factory: ServiceFactory<T>; resolving: boolean };

/**
 * Typed handle for one service. Entries are stored on the key itself, keyed
 * by locator, so lookups come back with the right type.
 */
export class ServiceKey<T> {
  private readonly entries = new WeakMap<ServiceLocator, ServiceEntry<T>>();

  constructor(public readonly name: string) {}

  /** @internal */
  public read(locator: ServiceLocator): ServiceEntry<T> | undefined {
    return this.entries.get(locator);
  }

  /** @internal */
  public write(locator: ServiceLocator, entry: ServiceEntry<T>): void {
    this.entries.set(locator, entry);
  }

  /** @internal */
  public erase(locator: ServiceLocator): boolean {
    return this.entries.delete(locator);
  }

  public toString(): string {
    return `ServiceKey(${this.name})`;
  }
}

export function createServiceKey<T>(name: string): ServiceKey<T> {
  return new ServiceKey<T>(name);
}

/**
 * Registry of shared services for one runtime.
 *
 * Constructed at bootstrap and passed down; there is no process-wide
 * instance. Registration is synchronous, so two registrations can never
 * interleave.
 */
export class ServiceLocator {
  private readonly registered = new Set<ServiceKey<unknown>>();
  private sealed = false;

  public register<T>(key: ServiceKey<T>, instance: T): void {
    this.assertCanRegister(key);
    key.write(this, { kind: 'instance', value: instance });
    this.registered.add(key);
  }

  /**
   * Register a lazy singleton, built on first `get()`
   */
  public registerFactory<T>(key: ServiceKey<T>, factory: ServiceFactory<T>): void {
    this.assertCanRegister(key);
    key.write(this, { kind: 'factory', factory, resolving: false });
    this.registered.add(key);
  }

  public get<T>(key: ServiceKey<T>): T {
    const entry = key.read(this);

    if (!entry) {
      throw new ServiceNotFoundError({ key: key.name });
    }

    if (entry.kind === 'instance') {
      return entry.value;
    }

    if (entry.resolving) {
      throw new ServiceRegistrationError(
        `Factory for "${key.name}" requested itself while resolving`,
        { key: key.name, reason: 'circular_factory' },
      );
    }

    entry.resolving = true;

    let value: T;
    try {
      value = entry.factory(this);
    } catch (error) {
      if (error instanceof ServiceRegistrationError) {
        throw error;
      }

      throw new ServiceRegistrationError(
        `Factory for "${key.name}" failed`,
        { key: key.name, reason: 'factory_failed' },
        error,
      );
    } finally {
      entry.resolving = false;
    }

    key.write(this, { kind: 'instance', value });
    return value;
  }

  public getOptional<T>(key: ServiceKey<T>): T | undefined {
    return this.has(key) ? this.get(key) : undefined;
  }

  public has(key: ServiceKey<unknown>): boolean {
    return this.registered.has(key);
  }

  /**
   * @throws {ServiceLocatorSealedError} Once the locator is sealed
   */
  public unregister(key: ServiceKey<unknown>): boolean {
    if (this.sealed) {
      throw new ServiceLocatorSealedError({ operation: 'unregister', key: key.name });
    }

    if (!this.registered.delete(key)) {
      return false;
    }

    key.erase(this);
    return true;
  }

  /**
   * Names of every registered key, in registration order
   */
  public keys(): string[] {
    return Array.from(this.registered, (key) => key.name);
  }

  /**
   * @throws {ServiceLocatorSealedError} Once the locator is sealed
   */
  public clear(): void {
    if (this.sealed) {
      throw new ServiceLocatorSealedError({ operation: 'clear' });
    }

    for (const key of this.registered) {
      key.erase(this);
    }

    this.registered.clear();
  }

  /**
   * End bootstrap registration. Lookups keep working; register(),
   * unregister() and clear() throw from here on.
   */
  public seal(): void {
    this.sealed = true;
  }

  public isSealed(): boolean {
    return this.sealed;
  }

  private assertCanRegister(key: ServiceKey<unknown>): void {
    if (this.sealed) {
      throw new ServiceLocatorSealedError({ operation: 'register', key: key.name });
    }

    if (this.registered.has(key)) {
      throw new ServiceRegistrationError(
        `Service "${key.name}" is already registered`,
        { key: key.name, reason: 'duplicate' },
      );
    }
  }
}
