import { ConfigurationError } from '../errors';

/**
 * Error thrown when `get()` is called for a key nobody registered
 */
export class ServiceNotFoundError extends ConfigurationError<{ key: string }> {
  public readonly errPrefix = 'ServiceLocatorErr';
  public readonly errType = 'Service';
  public readonly errCode = 'NotFound';

  constructor(additionalInfo: { key: string }) {
    super(`Service "${additionalInfo.key}" is not registered`, additionalInfo);
  }
}

export type SealedOperation = 'register' | 'unregister' | 'clear';

/**
 * Error thrown when registering, unregistering or clearing after `seal()`
 */
export class ServiceLocatorSealedError extends ConfigurationError<{
  operation: SealedOperation;
  key?: string;
}> {
  public readonly errPrefix = 'ServiceLocatorErr';
  public readonly errType = 'Locator';
  public readonly errCode = 'Sealed';

  constructor(additionalInfo: { operation: SealedOperation; key?: string }) {
    const target = additionalInfo.key === undefined ? '' : ` "${additionalInfo.key}"`;

    super(
      `Cannot ${additionalInfo.operation}${target}: the service locator is sealed`,
      additionalInfo,
    );
  }
}

/**
 * Error thrown for a second registration under the same key, or a factory
 * that ends up requesting itself
 */
export class ServiceRegistrationError extends ConfigurationError<{
  key: string;
  reason: 'duplicate' | 'circular_factory' | 'factory_failed';
}> {
  public readonly errPrefix = 'ServiceLocatorErr';
  public readonly errType = 'Service';
  public readonly errCode = 'RegistrationFailed';

  constructor(
    message: string,
    additionalInfo: {
      key: string;
      reason: 'duplicate' | 'circular_factory' | 'factory_failed';
    },
    cause?: unknown,
  ) {
    super(message, additionalInfo, cause);
  }
}
