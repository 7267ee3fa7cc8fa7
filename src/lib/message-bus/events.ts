import type { EventType, RuntimeEvent } from '../events/types';
import type {
  DeliveryOverflowError,
  EventHandlerError,
  EventHandlerTimeoutError,
} from './errors';
import type { BusShutdownResult, DropReason } from './types';

export interface MessageBusEventMap {
  'event:published': {
    event: RuntimeEvent;
    accepted: number;
    replay: boolean;
  };
  'event:dropped': {
    subscriberId: string;
    event: RuntimeEvent;
    reason: DropReason;
    error: DeliveryOverflowError;
  };
  'event:rejected': { event: RuntimeEvent; reason: 'bus_closed' };
  'handler:failed': {
    subscriberId: string;
    event: RuntimeEvent;
    error: EventHandlerError | EventHandlerTimeoutError;
    consecutiveFailures: number;
  };
  'subscriber:degraded': {
    subscriberId: string;
    consecutiveFailures: number;
    lastError: EventHandlerError | EventHandlerTimeoutError;
  };
  'subscriber:recovered': { subscriberId: string };
  'subscription:added': {
    subscriptionId: string;
    subscriberId: string;
    eventType: EventType;
  };
  'subscription:replaced': {
    subscriptionId: string;
    previousSubscriptionId: string;
    subscriberId: string;
    eventType: EventType;
  };
  'subscription:removed': {
    subscriptionId: string;
    subscriberId: string;
    eventType: EventType;
  };
  'subscriber:removed': {
    subscriberId: string;
    discarded: number;
    releasedPublishers: number;
  };
  'bus:shutdown': BusShutdownResult;
}

export type MessageBusEventName = keyof MessageBusEventMap;

export type MessageBusEmit = <K extends MessageBusEventName>(
  event: K,
  data: MessageBusEventMap[K],
) => void;

export class MessageBusEvents {
  constructor(private readonly emit: MessageBusEmit) {}

  public eventPublished(event: RuntimeEvent, accepted: number, replay: boolean): void {
    this.emit('event:published', { event, accepted, replay });
  }

  public eventDropped(
    subscriberId: string,
    event: RuntimeEvent,
    reason: DropReason,
    error: DeliveryOverflowError,
  ): void {
    this.emit('event:dropped', { subscriberId, event, reason, error });
  }

  public eventRejected(event: RuntimeEvent): void {
    this.emit('event:rejected', { event, reason: 'bus_closed' });
  }

  public handlerFailed(input: MessageBusEventMap['handler:failed']): void {
    this.emit('handler:failed', input);
  }

  public subscriberDegraded(input: MessageBusEventMap['subscriber:degraded']): void {
    this.emit('subscriber:degraded', input);
  }

  public subscriberRecovered(subscriberId: string): void {
    this.emit('subscriber:recovered', { subscriberId });
  }

  public subscriptionAdded(
    subscriptionId: string,
    subscriberId: string,
    eventType: EventType,
  ): void {
    this.emit('subscription:added', { subscriptionId, subscriberId, eventType });
  }

  public subscriptionReplaced(input: MessageBusEventMap['subscription:replaced']): void {
    this.emit('subscription:replaced', input);
  }

  public subscriptionRemoved(
    subscriptionId: string,
    subscriberId: string,
    eventType: EventType,
  ): void {
    this.emit('subscription:removed', { subscriptionId, subscriberId, eventType });
  }

  public subscriberRemoved(input: MessageBusEventMap['subscriber:removed']): void {
    this.emit('subscriber:removed', input);
  }

  public busShutdown(result: BusShutdownResult): void {
    this.emit('bus:shutdown', result);
  }
}
