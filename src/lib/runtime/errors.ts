import { RuntimeError, type ErrorCategory } from '../errors';
import type { StartupResult } from '../lifecycle-manager/types';

export type RuntimeStartupFailure = 'configuration' | 'initialization' | 'stopped';

export interface RuntimeStartupErrorInfo {
  failure: RuntimeStartupFailure;
  errors: Error[];
  startup?: StartupResult;
}

/**
 * The only error Runtime.start() throws. Wraps the configuration errors, or
 * the initialization failures of the first startup; `category` follows
 * what went wrong.
 */
export class RuntimeStartupError extends RuntimeError<RuntimeStartupErrorInfo> {
  public readonly category: ErrorCategory;
  public readonly errPrefix = 'RuntimeErr';
  public readonly errType = 'Startup';
  public readonly errCode: string;

  constructor(additionalInfo: RuntimeStartupErrorInfo) {
    const [first] = additionalInfo.errors;
    const more =
      additionalInfo.errors.length > 1
        ? ` (and ${additionalInfo.errors.length - 1} more)`
        : '';

    super(
      first
        ? `Runtime failed to start: ${first.message}${more}`
        : 'Runtime failed to start',
      additionalInfo,
      first,
    );

    this.category =
      additionalInfo.failure === 'initialization'
        ? 'InitializationFailure'
        : 'ConfigurationError';
    this.errCode =
      additionalInfo.failure === 'configuration'
        ? 'ConfigurationFailed'
        : additionalInfo.failure === 'initialization'
          ? 'InitializationFailed'
          : 'AlreadyStopped';
  }
}
