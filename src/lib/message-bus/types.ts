import type { EventType, RuntimeEvent } from '../events/types';
import type { IdentifierType } from '../id-helpers';

export const BACKPRESSURE_POLICIES = [
  'drop-oldest',
  'drop-newest',
  'block',
] as const;

export type BackpressurePolicy = (typeof BACKPRESSURE_POLICIES)[number];

export type DropReason = 'drop-oldest' | 'drop-newest' | 'block-timeout';

/**
 * Receives one event at a time per subscriber. `signal` aborts when the
 * handler exceeds `handlerTimeoutMS`; the subscriber's next event waits until
 * the abandoned call settles.
 */
export type EventHandler = (
  event: RuntimeEvent,
  signal: AbortSignal,
) => void | Promise<void>;

/**
 * Checked at publish time. A filter that throws lets the event through.
 */
export type EventFilter = (event: RuntimeEvent) => boolean;

/**
 * Decides whether an id may subscribe. The lifecycle manager installs one
 * that accepts registered component names only.
 */
export type SubscriberValidator = (subscriberId: string) => boolean;

export interface SubscribeOptions {
  filter?: EventFilter;
}

/**
 * Returned by `subscribe()`. Only the handle of the current subscription for
 * a `(subscriberId, eventType)` pair can remove it.
 */
export interface SubscriptionHandle {
  readonly id: string;
  readonly subscriberId: string;
  readonly eventType: EventType;
}

export interface Subscription extends SubscriptionHandle {
  readonly handler: EventHandler;
  readonly filter?: EventFilter;
  readonly createdAt: number;
}

export interface SubscriptionInfo {
  id: string;
  subscriberId: string;
  eventType: EventType;
  hasFilter: boolean;
  createdAt: number;
}

export interface MessageBusOptions {
  /** Per-subscriber queue capacity (default: 1000) */
  queueCapacity?: number;
  /** What a full queue does with a new event (default: 'drop-oldest') */
  backpressure?: BackpressurePolicy;
  /** How long a publisher waits under 'block'; must be positive (default: 5000) */
  blockTimeoutMS?: number;
  /** 0 disables the handler timeout (default: 30000) */
  handlerTimeoutMS?: number;
  /** Consecutive failures before a subscriber is degraded (default: 3) */
  failureThreshold?: number;
  /** Published events kept for getHistory() and replay(); 0 disables (default: 1000) */
  historySize?: number;
  /** Drain queues on shutdown instead of discarding them (default: true) */
  drainOnShutdown?: boolean;
  /** Upper bound on the shutdown drain; must be positive (default: 5000) */
  drainTimeoutMS?: number;
  /** Id format for subscriptions (default: 'ulid') */
  idType?: IdentifierType;
}

export interface SubscriberStatus {
  subscriberId: string;
  subscriptions: EventType[];
  queueDepth: number;
  capacity: number;
  blockedPublishers: number;
  processing: boolean;
  delivered: number;
  failed: number;
  dropped: number;
  consecutiveFailures: number;
  degraded: boolean;
}

export interface MessageBusStatistics {
  published: number;
  delivered: number;
  failed: number;
  dropped: number;
  rejected: number;
  replayed: number;
  /** Dequeued events whose subscription was gone */
  skipped: number;
  subscriptionsByType: Record<string, number>;
  subscriptionsBySubscriber: Record<string, number>;
  queueDepths: Record<string, number>;
  degradedSubscribers: string[];
  historySize: number;
  closed: boolean;
}

export interface HistoryFilter {
  type?: EventType | EventType[];
  source?: string;
  correlationId?: string;
  /** Only events with a timestamp at or after this */
  since?: number;
  /** Keep the most recent N matches */
  limit?: number;
}

export interface BusShutdownOptions {
  /** Overrides `drainOnShutdown` */
  drain?: boolean;
  /** Overrides `drainTimeoutMS` */
  timeoutMS?: number;
}

export interface BusShutdownResult {
  drained: boolean;
  timedOut: boolean;
  discarded: number;
  releasedPublishers: number;
  durationMS: number;
}
