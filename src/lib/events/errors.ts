import { ConfigurationError } from '../errors';

/**
 * Error thrown when an event payload cannot be copied (functions, class
 * instances with private slots, or other values structuredClone refuses)
 */
export class InvalidEventPayloadError extends ConfigurationError<{
  type: string;
  source: string;
}> {
  public readonly errPrefix = 'EventErr';
  public readonly errType = 'Event';
  public readonly errCode = 'InvalidPayload';

  constructor(additionalInfo: { type: string; source: string }, cause: unknown) {
    super(
      `Payload for "${additionalInfo.type}" event from "${additionalInfo.source}" cannot be cloned`,
      additionalInfo,
      cause,
    );
  }
}
