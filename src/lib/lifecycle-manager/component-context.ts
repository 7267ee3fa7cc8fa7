import type { ComponentState, EventType, RuntimeEvent } from '../events/types';
import type { IdentifierType } from '../id-helpers';
import type { MessageBus } from '../message-bus';
import type {
  EventHandler,
  SubscribeOptions,
  SubscriptionHandle,
} from '../message-bus/types';
import type { ServiceKey, ServiceLocator } from '../service-locator';
import type { ComponentContextRef } from './types';

/**
 * What the manager lends each context. Closures, so a context never holds
 * the manager itself.
 */
export interface ComponentContextHost {
  readonly locator: ServiceLocator;
  getBus(): MessageBus;
  getEventIdType(): IdentifierType;
  getComponentState(name: string): ComponentState | undefined;
  getComponentNames(): string[];
  getRunningComponentNames(): string[];
  getStartOrder(): string[];
}

/**
 * Component-scoped view of the runtime. Bus operations are bound to the
 * component's name; everything else is read-only.
 */
export class ComponentContext implements ComponentContextRef {
  public readonly componentName: string;
  private readonly host: ComponentContextHost;

  constructor(componentName: string, host: ComponentContextHost) {
    this.componentName = componentName;
    this.host = host;
  }

  public publish(event: RuntimeEvent): Promise<number> {
    return this.host.getBus().publish(event);
  }

  public subscribe(
    eventType: EventType,
    handler: EventHandler,
    options?: SubscribeOptions,
  ): SubscriptionHandle {
    return this.host
      .getBus()
      .subscribe(eventType, this.componentName, handler, options);
  }

  /**
   * Handles belonging to other subscribers are ignored
   */
  public unsubscribe(handle: SubscriptionHandle): boolean {
    if (handle.subscriberId !== this.componentName) {
      return false;
    }

    return this.host.getBus().unsubscribe(handle);
  }

  public getService<T>(key: ServiceKey<T>): T {
    return this.host.locator.get(key);
  }

  public getOptionalService<T>(key: ServiceKey<T>): T | undefined {
    return this.host.locator.getOptional(key);
  }

  public getEventIdType(): IdentifierType {
    return this.host.getEventIdType();
  }

  public getComponentState(name: string): ComponentState | undefined {
    return this.host.getComponentState(name);
  }

  public getComponentNames(): string[] {
    return this.host.getComponentNames();
  }

  public getRunningComponentNames(): string[] {
    return this.host.getRunningComponentNames();
  }

  public getStartOrder(): string[] {
    return this.host.getStartOrder();
  }
}
