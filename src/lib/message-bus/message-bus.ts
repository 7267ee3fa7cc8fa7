import { EventEmitterProtected } from '../event-emitter';
import { MESSAGE_BUS_SOURCE } from '../constants';
import { toError } from '../errors';
import { generateID, type IdentifierType } from '../id-helpers';
import type { Logger, LoggerService } from '../logger';
import { isBoundedTimeout, runWithTimeout } from '../with-timeout';
import type { EventType, RuntimeEvent } from '../events/types';
import {
  DeliveryOverflowError,
  EventHandlerError,
  EventHandlerTimeoutError,
  MessageBusClosedError,
  UnknownSubscriberError,
} from './errors';
import { MessageBusEvents, type MessageBusEventMap } from './events';
import { SubscriberQueue } from './subscriber-queue';
import type {
  BackpressurePolicy,
  BusShutdownOptions,
  BusShutdownResult,
  DropReason,
  EventHandler,
  HistoryFilter,
  MessageBusOptions,
  MessageBusStatistics,
  SubscribeOptions,
  SubscriberStatus,
  SubscriberValidator,
  Subscription,
  SubscriptionHandle,
  SubscriptionInfo,
} from './types';

const DEFAULT_BLOCK_TIMEOUT_MS = 5000;
const DEFAULT_DRAIN_TIMEOUT_MS = 5000;

/**
 * In-process publish/subscribe router.
 *
 * Every subscriber owns one bounded FIFO queue drained by its own loop, so a
 * slow subscriber never holds up the others. `publish()` only enqueues:
 * delivery always starts on a later macrotask.
 *
 * ```typescript
 * const bus = new MessageBus(logger, { queueCapacity: 100 });
 *
 * bus.subscribe('text-input', 'nlp', async (event) => {
 *   // ...
 * });
 *
 * await bus.publish(
 *   createEvent({ type: 'text-input', payload: { text: 'hi' }, source: 'keyboard' }),
 * );
 * ```
 */
export class MessageBus extends EventEmitterProtected<MessageBusEventMap> {
  private readonly logger: LoggerService;
  private readonly events: MessageBusEvents;

  private readonly queueCapacity: number;
  private readonly backpressure: BackpressurePolicy;
  private readonly blockTimeoutMS: number;
  private readonly handlerTimeoutMS: number;
  private readonly failureThreshold: number;
  private readonly historySize: number;
  private readonly drainOnShutdown: boolean;
  private readonly drainTimeoutMS: number;
  private readonly idType: IdentifierType;

  // eventType -> subscriberId -> subscription, in subscription order
  private readonly subscriptions = new Map<EventType, Map<string, Subscription>>();
  private readonly queues = new Map<string, SubscriberQueue>();
  private history: RuntimeEvent[] = [];
  private idleWaiters: Array<() => void> = [];
  private subscriberValidator?: SubscriberValidator;

  private closed = false;
  private shutdownPromise: Promise<BusShutdownResult> | null = null;

  private stats = {
    published: 0,
    delivered: 0,
    failed: 0,
    dropped: 0,
    rejected: 0,
    replayed: 0,
    skipped: 0,
  };

  constructor(rootLogger: Logger, options: MessageBusOptions = {}) {
    super();

    this.logger = rootLogger.service(MESSAGE_BUS_SOURCE);
    this.events = new MessageBusEvents((event, data) => this.emit(event, data));

    this.queueCapacity = Math.max(1, options.queueCapacity ?? 1000);
    this.backpressure = options.backpressure ?? 'drop-oldest';
    this.blockTimeoutMS = this.boundedTimeout(
      'blockTimeoutMS',
      options.blockTimeoutMS,
      DEFAULT_BLOCK_TIMEOUT_MS,
    );
    this.handlerTimeoutMS = options.handlerTimeoutMS ?? 30_000;
    this.failureThreshold = Math.max(1, options.failureThreshold ?? 3);
    this.historySize = Math.max(0, options.historySize ?? 1000);
    this.drainOnShutdown = options.drainOnShutdown ?? true;
    this.drainTimeoutMS = this.boundedTimeout(
      'drainTimeoutMS',
      options.drainTimeoutMS,
      DEFAULT_DRAIN_TIMEOUT_MS,
    );
    this.idType = options.idType ?? 'ulid';
  }

  public get isClosed(): boolean {
    return this.closed;
  }

  public getBackpressurePolicy(): BackpressurePolicy {
    return this.backpressure;
  }

  /**
   * Install (or remove, with undefined) the check every new subscriber id
   * must pass
   */
  public setSubscriberValidator(validator: SubscriberValidator | undefined): void {
    this.subscriberValidator = validator;
  }

  /**
   * Register `handler` for `eventType` on behalf of `subscriberId`.
   *
   * Subscribing the same pair again replaces the handler in place, keeping
   * its delivery position, and makes the previous handle stale.
   */
  public subscribe(
    eventType: EventType,
    subscriberId: string,
    handler: EventHandler,
    options: SubscribeOptions = {},
  ): SubscriptionHandle {
    if (this.closed) {
      throw new MessageBusClosedError({ subscriberId, eventType });
    }

    if (this.subscriberValidator && !this.subscriberValidator(subscriberId)) {
      throw new UnknownSubscriberError({ subscriberId, eventType });
    }

    let byType = this.subscriptions.get(eventType);

    if (!byType) {
      byType = new Map();
      this.subscriptions.set(eventType, byType);
    }

    const subscription: Subscription = {
      id: generateID(this.idType),
      subscriberId,
      eventType,
      handler,
      filter: options.filter,
      createdAt: Date.now(),
    };

    const previous = byType.get(subscriberId);
    byType.set(subscriberId, subscription);
    this.getOrCreateQueue(subscriberId);

    if (previous) {
      this.logger
        .entity(subscriberId)
        .warn('Replaced existing subscription to {{eventType}}', {
          params: { eventType },
        });

      this.events.subscriptionReplaced({
        subscriptionId: subscription.id,
        previousSubscriptionId: previous.id,
        subscriberId,
        eventType,
      });
    } else {
      this.logger
        .entity(subscriberId)
        .debug('Subscribed to {{eventType}}', { params: { eventType } });

      this.events.subscriptionAdded(subscription.id, subscriberId, eventType);
    }

    return { id: subscription.id, subscriberId, eventType };
  }

  /**
   * Remove a subscription. Stale handles are ignored.
   *
   * A delivery already dequeued still runs; queued events of this type are
   * skipped when they come up.
   */
  public unsubscribe(handle: SubscriptionHandle): boolean {
    const byType = this.subscriptions.get(handle.eventType);
    const current = byType?.get(handle.subscriberId);

    if (!byType || !current || current.id !== handle.id) {
      return false;
    }

    byType.delete(handle.subscriberId);

    if (byType.size === 0) {
      this.subscriptions.delete(handle.eventType);
    }

    this.logger
      .entity(handle.subscriberId)
      .debug('Unsubscribed from {{eventType}}', {
        params: { eventType: handle.eventType },
      });

    this.events.subscriptionRemoved(
      handle.id,
      handle.subscriberId,
      handle.eventType,
    );

    return true;
  }

  /**
   * Drop every subscription of `subscriberId`, release its blocked
   * publishers and discard its queue without dispatching.
   *
   * @returns The number of queued events discarded
   */
  public removeSubscriber(subscriberId: string): number {
    for (const [eventType, byType] of this.subscriptions) {
      const subscription = byType.get(subscriberId);

      if (!subscription) {
        continue;
      }

      byType.delete(subscriberId);

      if (byType.size === 0) {
        this.subscriptions.delete(eventType);
      }

      this.events.subscriptionRemoved(subscription.id, subscriberId, eventType);
    }

    const queue = this.queues.get(subscriberId);

    if (!queue) {
      return 0;
    }

    this.queues.delete(subscriberId);

    const releasedPublishers = queue.cancelWaiters();
    const discarded = queue.clear();

    if (discarded > 0 || releasedPublishers > 0) {
      this.logger
        .entity(subscriberId)
        .info(
          'Removed subscriber, discarded {{discarded}} queued events and released {{released}} publishers',
          { params: { discarded, released: releasedPublishers } },
        );
    }

    this.events.subscriberRemoved({ subscriberId, discarded, releasedPublishers });
    this.notifyIfIdle();

    return discarded;
  }

  /**
   * Enqueue `event` for every current subscriber of its type.
   *
   * Resolves with how many subscriber queues accepted it. Under the drop
   * policies enqueueing is finished before this returns its promise; under
   * `block` the promise waits for room, up to `blockTimeoutMS`.
   */
  public publish(event: RuntimeEvent): Promise<number> {
    return this.dispatch(event, false);
  }

  /**
   * Publish matching events from history again, oldest first.
   * Replayed events are not added to history a second time.
   *
   * @returns Total queue acceptances across all replayed events
   */
  public async replay(filter: HistoryFilter = {}): Promise<number> {
    const events = this.getHistory(filter);
    let accepted = 0;

    this.logger.info('Replaying {{count}} events', {
      params: { count: events.length },
    });

    for (const event of events) {
      accepted += await this.dispatch(event, true);
    }

    return accepted;
  }

  public getHistory(filter: HistoryFilter = {}): RuntimeEvent[] {
    const types =
      filter.type === undefined
        ? undefined
        : new Set(Array.isArray(filter.type) ? filter.type : [filter.type]);

    const matches = this.history.filter(
      (event) =>
        (!types || types.has(event.type)) &&
        (filter.source === undefined || event.source === filter.source) &&
        (filter.correlationId === undefined ||
          event.correlationId === filter.correlationId) &&
        (filter.since === undefined || event.timestamp >= filter.since),
    );

    return filter.limit !== undefined && filter.limit >= 0
      ? matches.slice(Math.max(0, matches.length - filter.limit))
      : matches;
  }

  public clearHistory(): void {
    this.history = [];
  }

  /**
   * Resolves true once every queue is empty and no delivery is running, or
   * false if that takes longer than `timeoutMS` (0 waits indefinitely).
   */
  public waitForIdle(timeoutMS = 0): Promise<boolean> {
    if (this.isIdle()) {
      return Promise.resolve(true);
    }

    return new Promise<boolean>((resolve) => {
      let timer: NodeJS.Timeout | undefined;

      const onIdle = (): void => {
        clearTimeout(timer);
        resolve(true);
      };

      if (timeoutMS > 0) {
        timer = setTimeout(() => {
          this.idleWaiters = this.idleWaiters.filter((waiter) => waiter !== onIdle);
          resolve(false);
        }, timeoutMS);
      }

      this.idleWaiters.push(onIdle);
    });
  }

  /**
   * Stop accepting publishes, then drain or discard the queues, release
   * blocked publishers and drop every subscription. Repeated calls share
   * the first call's result.
   */
  public shutdown(options: BusShutdownOptions = {}): Promise<BusShutdownResult> {
    if (!this.shutdownPromise) {
      this.shutdownPromise = this.performShutdown(options);
    }

    return this.shutdownPromise;
  }

  public hasSubscribers(eventType: EventType): boolean {
    return (this.subscriptions.get(eventType)?.size ?? 0) > 0;
  }

  public getSubscriptions(subscriberId?: string): SubscriptionInfo[] {
    const result: SubscriptionInfo[] = [];

    for (const byType of this.subscriptions.values()) {
      for (const subscription of byType.values()) {
        if (subscriberId !== undefined && subscription.subscriberId !== subscriberId) {
          continue;
        }

        result.push({
          id: subscription.id,
          subscriberId: subscription.subscriberId,
          eventType: subscription.eventType,
          hasFilter: subscription.filter !== undefined,
          createdAt: subscription.createdAt,
        });
      }
    }

    return result;
  }

  public getSubscriberStatus(subscriberId: string): SubscriberStatus | undefined {
    const queue = this.queues.get(subscriberId);

    if (!queue) {
      return undefined;
    }

    return {
      subscriberId,
      subscriptions: this.getSubscriptions(subscriberId).map(
        (subscription) => subscription.eventType,
      ),
      queueDepth: queue.depth,
      capacity: queue.capacity,
      blockedPublishers: queue.blockedPublishers,
      processing: queue.processing,
      delivered: queue.delivered,
      failed: queue.failed,
      dropped: queue.dropped,
      consecutiveFailures: queue.consecutiveFailures,
      degraded: queue.degraded,
    };
  }

  public getStatistics(): MessageBusStatistics {
    const subscriptionsByType: Record<string, number> = {};
    const subscriptionsBySubscriber: Record<string, number> = {};
    const queueDepths: Record<string, number> = {};
    const degradedSubscribers: string[] = [];

    for (const [eventType, byType] of this.subscriptions) {
      subscriptionsByType[eventType] = byType.size;

      for (const subscriberId of byType.keys()) {
        subscriptionsBySubscriber[subscriberId] =
          (subscriptionsBySubscriber[subscriberId] ?? 0) + 1;
      }
    }

    for (const [subscriberId, queue] of this.queues) {
      queueDepths[subscriberId] = queue.depth;

      if (queue.degraded) {
        degradedSubscribers.push(subscriberId);
      }
    }

    return {
      ...this.stats,
      subscriptionsByType,
      subscriptionsBySubscriber,
      queueDepths,
      degradedSubscribers,
      historySize: this.history.length,
      closed: this.closed,
    };
  }

  protected override handleListenerError(
    error: Error,
    callbackName: string,
  ): void {
    this.logger.errorObject(`Message bus ${callbackName} failed`, error);
  }

  private async dispatch(event: RuntimeEvent, replay: boolean): Promise<number> {
    if (this.closed) {
      this.stats.rejected++;
      this.logger.warn(
        'Rejected {{eventType}} event {{eventId}} from {{source}}: bus is shut down',
        {
          params: {
            eventType: event.type,
            eventId: event.id,
            source: event.source,
          },
        },
      );
      this.events.eventRejected(event);
      return 0;
    }

    if (replay) {
      this.stats.replayed++;
    } else {
      this.record(event);
      this.stats.published++;
    }

    let accepted = 0;
    const blocked: Array<Promise<boolean>> = [];

    // Everything up to the first await runs synchronously, so the drop
    // policies have enqueued before the caller gets the promise back
    for (const subscription of this.subscriptions.get(event.type)?.values() ?? []) {
      if (!this.passesFilter(subscription, event)) {
        continue;
      }

      const offered = this.offer(this.getOrCreateQueue(subscription.subscriberId), event);

      if (typeof offered === 'boolean') {
        accepted += offered ? 1 : 0;
      } else {
        blocked.push(offered);
      }
    }

    if (blocked.length > 0) {
      const results = await Promise.all(blocked);
      accepted += results.filter(Boolean).length;
    }

    this.events.eventPublished(event, accepted, replay);
    return accepted;
  }

  private offer(
    queue: SubscriberQueue,
    event: RuntimeEvent,
  ): boolean | Promise<boolean> {
    if (queue.hasRoom()) {
      queue.push(event);
      this.scheduleDrain(queue);
      return true;
    }

    switch (this.backpressure) {
      case 'drop-oldest': {
        const evicted = queue.evictOldest();

        if (evicted) {
          this.reportDrop(queue, evicted, 'drop-oldest');
        }

        queue.push(event);
        this.scheduleDrain(queue);
        return true;
      }
      case 'drop-newest':
        this.reportDrop(queue, event, 'drop-newest');
        return false;
      case 'block':
        return queue.waitForRoom(event, this.blockTimeoutMS).then((outcome) => {
          switch (outcome) {
            case 'admitted':
              this.scheduleDrain(queue);
              return true;
            case 'timeout':
              this.reportDrop(queue, event, 'block-timeout');
              return false;
            case 'cancelled':
              return false;
          }
        });
    }
  }

  private passesFilter(subscription: Subscription, event: RuntimeEvent): boolean {
    if (!subscription.filter) {
      return true;
    }

    try {
      return subscription.filter(event);
    } catch (error) {
      this.logger
        .entity(subscription.subscriberId)
        .warn('Filter for {{eventType}} threw, delivering anyway: {{error}}', {
          params: { eventType: event.type, error: toError(error) },
        });
      return true;
    }
  }

  private reportDrop(
    queue: SubscriberQueue,
    event: RuntimeEvent,
    reason: DropReason,
  ): void {
    queue.dropped++;
    this.stats.dropped++;

    const error = new DeliveryOverflowError({
      subscriberId: queue.subscriberId,
      eventId: event.id,
      eventType: event.type,
      reason,
      capacity: queue.capacity,
    });

    this.logger
      .entity(queue.subscriberId)
      .warn('Dropped {{eventType}} event {{eventId}} ({{reason}}), queue capacity {{capacity}}', {
        params: {
          eventType: event.type,
          eventId: event.id,
          reason,
          capacity: queue.capacity,
        },
      });

    this.events.eventDropped(queue.subscriberId, event, reason, error);
  }

  private scheduleDrain(queue: SubscriberQueue): void {
    if (queue.drainScheduled || queue.processing) {
      return;
    }

    queue.drainScheduled = true;

    setImmediate(() => {
      queue.drainScheduled = false;

      this.drainQueue(queue).catch((error: unknown) => {
        this.logger
          .entity(queue.subscriberId)
          .errorObject('Drain loop failed', error);
      });
    });
  }

  private async drainQueue(queue: SubscriberQueue): Promise<void> {
    if (queue.processing) {
      return;
    }

    queue.processing = true;

    try {
      let event = queue.shift();

      while (event !== undefined) {
        // Look up at dequeue time so unsubscribed handlers are never called
        const subscription = this.subscriptions
          .get(event.type)
          ?.get(queue.subscriberId);

        if (subscription) {
          await this.deliver(queue, subscription, event);
        } else {
          this.stats.skipped++;
        }

        event = queue.shift();
      }
    } finally {
      queue.processing = false;
      this.notifyIfIdle();
    }
  }

  private async deliver(
    queue: SubscriberQueue,
    subscription: Subscription,
    event: RuntimeEvent,
  ): Promise<void> {
    const info = {
      subscriberId: queue.subscriberId,
      eventId: event.id,
      eventType: event.type,
    };

    const controller = new AbortController();
    const running = new Promise<void>((resolve) => {
      resolve(subscription.handler(event, controller.signal));
    });

    try {
      await runWithTimeout(
        () => running,
        this.handlerTimeoutMS,
        () =>
          new EventHandlerTimeoutError({
            ...info,
            timeoutMS: this.handlerTimeoutMS,
          }),
        () => controller.abort(),
      );
    } catch (error) {
      if (error instanceof EventHandlerTimeoutError) {
        this.recordFailure(queue, event, error);
        await this.settleAbandonedHandler(queue, event, running);
      } else {
        this.recordFailure(queue, event, new EventHandlerError(info, error));
      }

      return;
    }

    queue.delivered++;
    this.stats.delivered++;
    queue.consecutiveFailures = 0;

    if (queue.degraded) {
      queue.degraded = false;
      this.logger.entity(queue.subscriberId).info('Subscriber recovered');
      this.events.subscriberRecovered(queue.subscriberId);
    }
  }

  /**
   * Hold the subscriber's next dispatch until a timed-out handler settles,
   * so one subscriber never runs two handlers at once
   */
  private async settleAbandonedHandler(
    queue: SubscriberQueue,
    event: RuntimeEvent,
    running: Promise<void>,
  ): Promise<void> {
    const logger = this.logger.entity(queue.subscriberId);

    logger.warn('Waiting for timed-out handler on {{eventType}} event {{eventId}} to settle', {
      params: { eventType: event.type, eventId: event.id },
    });

    await running.then(
      () => {
        logger.debug('Timed-out handler on {{eventId}} finished late', {
          params: { eventId: event.id },
        });
      },
      (lateError: unknown) => {
        logger.warn('Timed-out handler on {{eventId}} failed late: {{error}}', {
          params: { eventId: event.id, error: toError(lateError) },
        });
      },
    );
  }

  private recordFailure(
    queue: SubscriberQueue,
    event: RuntimeEvent,
    error: EventHandlerError | EventHandlerTimeoutError,
  ): void {
    queue.failed++;
    queue.consecutiveFailures++;
    this.stats.failed++;

    this.logger
      .entity(queue.subscriberId)
      .error(
        'Handler failed on {{eventType}} event {{eventId}} ({{failures}} in a row): {{error}}',
        {
          params: {
            eventType: event.type,
            eventId: event.id,
            failures: queue.consecutiveFailures,
            error,
          },
        },
      );

    this.events.handlerFailed({
      subscriberId: queue.subscriberId,
      event,
      error,
      consecutiveFailures: queue.consecutiveFailures,
    });

    if (!queue.degraded && queue.consecutiveFailures >= this.failureThreshold) {
      queue.degraded = true;

      this.logger
        .entity(queue.subscriberId)
        .warn('Subscriber degraded after {{failures}} consecutive failures', {
          params: { failures: queue.consecutiveFailures },
        });

      this.events.subscriberDegraded({
        subscriberId: queue.subscriberId,
        consecutiveFailures: queue.consecutiveFailures,
        lastError: error,
      });
    }
  }

  private record(event: RuntimeEvent): void {
    if (this.historySize === 0) {
      return;
    }

    this.history.push(event);

    if (this.history.length > this.historySize) {
      this.history.splice(0, this.history.length - this.historySize);
    }
  }

  private getOrCreateQueue(subscriberId: string): SubscriberQueue {
    let queue = this.queues.get(subscriberId);

    if (!queue) {
      queue = new SubscriberQueue(subscriberId, this.queueCapacity);
      this.queues.set(subscriberId, queue);
    }

    return queue;
  }

  private isIdle(): boolean {
    for (const queue of this.queues.values()) {
      if (!queue.isIdle()) {
        return false;
      }
    }

    return true;
  }

  private notifyIfIdle(): void {
    if (this.idleWaiters.length === 0 || !this.isIdle()) {
      return;
    }

    const waiters = this.idleWaiters;
    this.idleWaiters = [];

    for (const waiter of waiters) {
      waiter();
    }
  }

  private boundedTimeout(
    field: string,
    value: number | undefined,
    fallback: number,
  ): number {
    if (value === undefined) {
      return fallback;
    }

    if (isBoundedTimeout(value)) {
      return value;
    }

    this.logger.warn('{{field}} must be positive, using {{fallback}}ms instead of {{value}}', {
      params: { field, value, fallback },
    });

    return fallback;
  }

  private async performShutdown(
    options: BusShutdownOptions,
  ): Promise<BusShutdownResult> {
    const startedAt = Date.now();
    const drain = options.drain ?? this.drainOnShutdown;
    const timeoutMS = this.boundedTimeout(
      'timeoutMS',
      options.timeoutMS,
      this.drainTimeoutMS,
    );

    this.closed = true;
    this.logger.info('Shutting down ({{mode}})', {
      params: { mode: drain ? 'drain' : 'discard' },
    });

    let drained = false;
    let timedOut = false;

    if (drain) {
      drained = await this.waitForIdle(timeoutMS);
      timedOut = !drained;

      if (timedOut) {
        this.logger.warn('Drain did not finish within {{timeoutMS}}ms', {
          params: { timeoutMS },
        });
      }
    }

    let releasedPublishers = 0;
    let discarded = 0;

    for (const queue of this.queues.values()) {
      releasedPublishers += queue.cancelWaiters();
      discarded += queue.clear();
    }

    this.subscriptions.clear();
    this.queues.clear();
    this.notifyIfIdle();

    const result: BusShutdownResult = {
      drained,
      timedOut,
      discarded,
      releasedPublishers,
      durationMS: Date.now() - startedAt,
    };

    this.logger.info(
      'Shut down: discarded {{discarded}} events, released {{released}} publishers',
      { params: { discarded, released: releasedPublishers } },
    );
    this.events.busShutdown(result);

    return result;
  }
}
