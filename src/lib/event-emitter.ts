/**
 * Typed event emitter whose `emit` is protected, so only the owning class can
 * raise events while anyone holding a reference can listen.
 *
 * Listener failures (sync or async) never reach the emitter's caller; they are
 * handed to `handleListenerError`, which subclasses override to route them to
 * their logger.
 */

import { safeHandleCallback } from './safe-handle-callback';

export type EventListener<T> = (data: T) => void | Promise<void>;

type ListenerRegistry<TEventMap> = {
  [K in keyof TEventMap]?: Set<EventListener<TEventMap[K]>>;
};

export class EventEmitterProtected<TEventMap extends object> {
  private listeners: ListenerRegistry<TEventMap> = {};

  /**
   * Subscribe to an event
   * @returns A function that removes the listener
   */
  public on<K extends keyof TEventMap>(
    event: K,
    listener: EventListener<TEventMap[K]>,
  ): () => void {
    let registered = this.listeners[event];

    if (!registered) {
      registered = new Set();
      this.listeners[event] = registered;
    }

    registered.add(listener);

    return () => {
      this.off(event, listener);
    };
  }

  /**
   * Subscribe for a single emission
   */
  public once<K extends keyof TEventMap>(
    event: K,
    listener: EventListener<TEventMap[K]>,
  ): () => void {
    const unsubscribe = this.on(event, (data) => {
      unsubscribe();
      return listener(data);
    });

    return unsubscribe;
  }

  public off<K extends keyof TEventMap>(
    event: K,
    listener: EventListener<TEventMap[K]>,
  ): boolean {
    const registered = this.listeners[event];

    if (!registered) {
      return false;
    }

    const removed = registered.delete(listener);

    if (registered.size === 0) {
      delete this.listeners[event];
    }

    return removed;
  }

  public hasListeners<K extends keyof TEventMap>(event: K): boolean {
    return this.listenerCount(event) > 0;
  }

  public listenerCount<K extends keyof TEventMap>(event: K): number {
    return this.listeners[event]?.size ?? 0;
  }

  /**
   * Remove listeners for one event, or for all events when none is given
   */
  public removeAllListeners<K extends keyof TEventMap>(event?: K): void {
    if (event === undefined) {
      this.listeners = {};
    } else {
      delete this.listeners[event];
    }
  }

  protected emit<K extends keyof TEventMap>(
    event: K,
    data: TEventMap[K],
  ): void {
    const registered = this.listeners[event];

    if (!registered) {
      return;
    }

    // Copy so listeners that unsubscribe during emit don't skip their neighbours
    for (const listener of [...registered]) {
      safeHandleCallback(
        `listener for ${String(event)}`,
        listener,
        (error, callbackName) => this.handleListenerError(error, callbackName),
        data,
      );
    }
  }

  protected handleListenerError(error: Error, callbackName: string): void {
    // eslint-disable-next-line no-console
    console.error(`Error in ${callbackName}: ${error.message}`);
  }
}
