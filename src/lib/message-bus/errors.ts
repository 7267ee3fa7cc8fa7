import {
  ConfigurationError,
  DeliveryOverflow,
  HandlerFailure,
} from '../errors';
import type { DropReason } from './types';

/**
 * Error thrown when a subscriber id is refused by the bus's validator,
 * usually because no component with that name is registered
 */
export class UnknownSubscriberError extends ConfigurationError<{
  subscriberId: string;
  eventType: string;
}> {
  public readonly errPrefix = 'MessageBusErr';
  public readonly errType = 'Subscription';
  public readonly errCode = 'UnknownSubscriber';

  constructor(additionalInfo: { subscriberId: string; eventType: string }) {
    super(
      `Cannot subscribe "${additionalInfo.subscriberId}" to "${additionalInfo.eventType}": unknown subscriber`,
      additionalInfo,
    );
  }
}

/**
 * Error thrown when subscribing to a bus that has shut down
 */
export class MessageBusClosedError extends ConfigurationError<{
  subscriberId: string;
  eventType: string;
}> {
  public readonly errPrefix = 'MessageBusErr';
  public readonly errType = 'Bus';
  public readonly errCode = 'Closed';

  constructor(additionalInfo: { subscriberId: string; eventType: string }) {
    super(
      `Cannot subscribe "${additionalInfo.subscriberId}" to "${additionalInfo.eventType}": the bus is shut down`,
      additionalInfo,
    );
  }
}

interface HandlerFailureInfo {
  subscriberId: string;
  eventId: string;
  eventType: string;
}

/**
 * A subscriber's handler threw or rejected. Contained by the bus.
 */
export class EventHandlerError extends HandlerFailure<HandlerFailureInfo> {
  public readonly errPrefix = 'MessageBusErr';
  public readonly errType = 'Handler';
  public readonly errCode = 'Failed';

  constructor(additionalInfo: HandlerFailureInfo, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(
      `Handler of "${additionalInfo.subscriberId}" failed on ${additionalInfo.eventType} event ${additionalInfo.eventId}: ${reason}`,
      additionalInfo,
      cause,
    );
  }
}

export class EventHandlerTimeoutError extends HandlerFailure<
  HandlerFailureInfo & { timeoutMS: number }
> {
  public readonly errPrefix = 'MessageBusErr';
  public readonly errType = 'Handler';
  public readonly errCode = 'Timeout';

  constructor(additionalInfo: HandlerFailureInfo & { timeoutMS: number }) {
    super(
      `Handler of "${additionalInfo.subscriberId}" did not finish ${additionalInfo.eventType} event ${additionalInfo.eventId} within ${additionalInfo.timeoutMS}ms`,
      additionalInfo,
    );
  }
}

/**
 * Diagnostic for an event a full queue could not take. Emitted, never thrown.
 */
export class DeliveryOverflowError extends DeliveryOverflow<{
  subscriberId: string;
  eventId: string;
  eventType: string;
  reason: DropReason;
  capacity: number;
}> {
  public readonly errPrefix = 'MessageBusErr';
  public readonly errType = 'Queue';
  public readonly errCode = 'Overflow';

  constructor(additionalInfo: {
    subscriberId: string;
    eventId: string;
    eventType: string;
    reason: DropReason;
    capacity: number;
  }) {
    super(
      `Queue of "${additionalInfo.subscriberId}" is full (${additionalInfo.capacity}), dropped ${additionalInfo.eventType} event ${additionalInfo.eventId} (${additionalInfo.reason})`,
      additionalInfo,
    );
  }
}
