import type { RuntimeEvent } from '../events/types';

export type WaitOutcome = 'admitted' | 'timeout' | 'cancelled';

interface Waiter {
  event: RuntimeEvent;
  resolve: (outcome: WaitOutcome) => void;
  timer?: NodeJS.Timeout;
}

/**
 * Bounded FIFO of events waiting for one subscriber, plus the publishers
 * blocked on it under the `block` policy.
 *
 * A blocked publisher's event moves into the queue at the moment room opens
 * up, so a later publisher can never slip in ahead of it.
 */
export class SubscriberQueue {
  public processing = false;
  public drainScheduled = false;
  public consecutiveFailures = 0;
  public degraded = false;
  public delivered = 0;
  public failed = 0;
  public dropped = 0;

  private items: RuntimeEvent[] = [];
  private waiters: Waiter[] = [];

  constructor(
    public readonly subscriberId: string,
    public readonly capacity: number,
  ) {}

  public get depth(): number {
    return this.items.length;
  }

  public get blockedPublishers(): number {
    return this.waiters.length;
  }

  public hasRoom(): boolean {
    return this.items.length < this.capacity && this.waiters.length === 0;
  }

  public isIdle(): boolean {
    return this.items.length === 0 && !this.processing && !this.drainScheduled;
  }

  public push(event: RuntimeEvent): void {
    this.items.push(event);
  }

  /**
   * Take the next event and let the oldest blocked publisher in
   */
  public shift(): RuntimeEvent | undefined {
    const event = this.items.shift();
    this.admitWaiters();
    return event;
  }

  /**
   * Remove the oldest event without admitting anyone; used by drop-oldest
   */
  public evictOldest(): RuntimeEvent | undefined {
    return this.items.shift();
  }

  /**
   * Wait up to `timeoutMS` for room, or until cancelled
   */
  public waitForRoom(event: RuntimeEvent, timeoutMS: number): Promise<WaitOutcome> {
    return new Promise<WaitOutcome>((resolve) => {
      const waiter: Waiter = { event, resolve };

      waiter.timer = setTimeout(() => {
        const index = this.waiters.indexOf(waiter);
        if (index !== -1) {
          this.waiters.splice(index, 1);
          resolve('timeout');
        }
      }, timeoutMS);

      this.waiters.push(waiter);
    });
  }

  /**
   * Release every blocked publisher without admitting its event
   * @returns How many were released
   */
  public cancelWaiters(): number {
    const waiters = this.waiters;
    this.waiters = [];

    for (const waiter of waiters) {
      clearTimeout(waiter.timer);
      waiter.resolve('cancelled');
    }

    return waiters.length;
  }

  /**
   * Discard queued events without dispatching them
   * @returns How many were discarded
   */
  public clear(): number {
    const count = this.items.length;
    this.items = [];
    return count;
  }

  private admitWaiters(): void {
    while (this.items.length < this.capacity && this.waiters.length > 0) {
      const waiter = this.waiters.shift();

      if (!waiter) {
        break;
      }

      clearTimeout(waiter.timer);
      this.items.push(waiter.event);
      waiter.resolve('admitted');
    }
  }
}
