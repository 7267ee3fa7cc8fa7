import { ConfigurationError } from '../errors';

/**
 * Error thrown when a configuration document fails validation.
 * Each issue reads `path: message`, with `(root)` for top-level problems.
 */
export class InvalidConfigurationError extends ConfigurationError<{
  issues: string[];
  source?: string;
}> {
  public readonly errPrefix = 'ConfigErr';
  public readonly errType = 'Config';
  public readonly errCode = 'Invalid';

  constructor(
    additionalInfo: { issues: string[]; source?: string },
    cause?: unknown,
  ) {
    const from = additionalInfo.source ? ` (${additionalInfo.source})` : '';
    super(
      `Invalid configuration${from}: ${additionalInfo.issues.join('; ')}`,
      additionalInfo,
      cause,
    );
  }
}
