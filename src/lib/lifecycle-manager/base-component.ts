import type { Logger, LoggerService } from '../logger';
import { createEvent, createResponseEvent } from '../events/event';
import type { EventType, PayloadFor, RuntimeEvent } from '../events/types';
import { runWithTimeout } from '../with-timeout';
import {
  ComponentNotInitializedError,
  InvalidComponentNameError,
  OffloadedWorkTimeoutError,
} from './errors';
import type {
  ComponentContextRef,
  ComponentHealthResult,
  ComponentOptions,
  ComponentRole,
  HandleEventResult,
  InitializeResult,
} from './types';

const KEBAB_CASE_REGEX = /^[a-z][a-z0-9]*(-[a-z0-9]+)*$/;

export interface OffloadOptions {
  /** Abort the work and reject once this elapses; 0 or unset waits indefinitely */
  timeoutMS?: number;
  /** Abort the work when this aborts, e.g. the signal handed to handleEvent() */
  signal?: AbortSignal;
}

/**
 * Abstract base class for all runtime components
 *
 * Components extend this class (or one of the role classes built on it) and
 * implement initialize() and shutdown(). The LifecycleManager:
 * - Calls initialize() once every dependency is running
 * - Subscribes handleEvent() to `subscribesTo` after initialize() succeeds
 * - Drops the component's subscriptions, aborts its offloaded work and calls
 *   shutdown() when stopping it
 *
 * Components never hold a reference to the bus or to each other. Everything
 * goes through the context the manager attaches at registration.
 *
 * @example
 * ```typescript
 * class ClockComponent extends BaseComponent {
 *   constructor(logger: Logger) {
 *     super(logger, {
 *       name: 'clock',
 *       role: 'processor',
 *       subscribesTo: ['text-input'],
 *     });
 *   }
 *
 *   initialize() {
 *     return true;
 *   }
 *
 *   shutdown() {}
 *
 *   handleEvent(event: RuntimeEvent) {
 *     return this.respond(event, 'speak', { text: new Date().toISOString() });
 *   }
 * }
 * ```
 */
export abstract class BaseComponent {
  /** Names of components this one depends on */
  public readonly dependencies: readonly string[];

  public readonly role: ComponentRole;

  /** Event types the manager subscribes to handleEvent() */
  public readonly subscribesTo: readonly EventType[];

  /** Unset means the manager's default applies */
  public readonly initializeTimeoutMS?: number;
  public readonly shutdownTimeoutMS?: number;
  public readonly healthCheckTimeoutMS?: number;

  /** Component logger (scoped to component name) */
  protected readonly logger: LoggerService;

  /** Component name (kebab-case) */
  protected readonly name: string;

  private context?: ComponentContextRef;
  private initialized = false;
  private readonly offloaded = new Set<AbortController>();

  /**
   * @param rootLogger - Root logger instance (component will create scoped logger)
   * @throws {InvalidComponentNameError} If name doesn't match kebab-case pattern
   */
  constructor(rootLogger: Logger, options: ComponentOptions) {
    if (!KEBAB_CASE_REGEX.test(options.name)) {
      throw new InvalidComponentNameError({ name: options.name });
    }

    this.name = options.name;
    this.role = options.role;
    this.logger = rootLogger.service(this.name);

    this.dependencies = [...(options.dependencies ?? [])];
    this.subscribesTo = [...new Set(options.subscribesTo ?? [])];

    this.initializeTimeoutMS = options.initializeTimeoutMS;
    this.shutdownTimeoutMS = options.shutdownTimeoutMS;
    this.healthCheckTimeoutMS = options.healthCheckTimeoutMS;
  }

  /**
   * Bring the component up
   *
   * Dependencies are running by the time this is called. Return false or
   * throw to fail initialization; either rolls back the whole startup.
   */
  public abstract initialize(): InitializeResult | Promise<InitializeResult>;

  /**
   * Release everything initialize() acquired
   *
   * Subscriptions are already gone and offloaded work already aborted when
   * this runs. Dependents have stopped.
   */
  public abstract shutdown(): void | Promise<void>;

  /**
   * Handle an event of one of the `subscribesTo` types
   *
   * A returned event is published as the response. The default ignores
   * the event. `signal` aborts when the bus gives up on the delivery;
   * pass it on to offload().
   */
  public handleEvent(_event: RuntimeEvent, _signal?: AbortSignal): HandleEventResult {
    return undefined;
  }

  /**
   * Called when initialize() times out, before rollback begins.
   * Must be fast; the manager does not wait for it.
   */
  public onInitializeAborted?(): void;

  /**
   * Called when shutdown() times out. The component is forced to `stopped`.
   * Must be fast; the manager does not wait for it.
   */
  public onShutdownAborted?(): void;

  /**
   * Optional health check for runtime monitoring
   *
   * Return a simple boolean or a rich result with metadata.
   * Only called on running or degraded components.
   *
   * @example
   * ```typescript
   * healthCheck() {
   *   return {
   *     healthy: this.pending < 100,
   *     details: { pending: this.pending },
   *   };
   * }
   * ```
   */
  public healthCheck?():
    | Promise<boolean | ComponentHealthResult>
    | boolean
    | ComponentHealthResult;

  /**
   * Entry point for delivered events. Refuses events until initialize()
   * has succeeded, and publishes whatever handleEvent() returns.
   *
   * @throws {ComponentNotInitializedError}
   */
  public async receive(
    event: RuntimeEvent,
    signal?: AbortSignal,
  ): Promise<RuntimeEvent | undefined> {
    if (!this.initialized) {
      throw new ComponentNotInitializedError({
        name: this.name,
        operation: `receive "${event.type}"`,
      });
    }

    const response = await this.handleEvent(event, signal);

    if (!response) {
      return undefined;
    }

    await this.requireContext('publish a response').publish(response);

    return response;
  }

  public getName(): string {
    return this.name;
  }

  public getRole(): ComponentRole {
    return this.role;
  }

  public getDependencies(): string[] {
    return [...this.dependencies];
  }

  public getSubscribedEventTypes(): EventType[] {
    return [...this.subscribesTo];
  }

  public isInitialized(): boolean {
    return this.initialized;
  }

  public isAttached(): boolean {
    return this.context !== undefined;
  }

  public getOffloadedWorkCount(): number {
    return this.offloaded.size;
  }

  /**
   * @internal Called by the lifecycle manager on registration
   */
  public attachContext(context: ComponentContextRef | undefined): void {
    this.context = context;
  }

  /**
   * @internal Called by the lifecycle manager around initialize/shutdown
   */
  public setInitialized(initialized: boolean): void {
    this.initialized = initialized;
  }

  /**
   * Abort every outstanding offload. Work already handed to other
   * components through published events is untouched.
   *
   * @returns How many controllers were aborted
   */
  public abortOffloadedWork(reason?: unknown): number {
    const controllers = [...this.offloaded];
    this.offloaded.clear();

    for (const controller of controllers) {
      controller.abort(reason);
    }

    return controllers.length;
  }

  /**
   * Run `work` with an AbortSignal the manager can trip when this
   * component stops, and that follows `options.signal`
   *
   * @throws {OffloadedWorkTimeoutError} When `timeoutMS` elapses first
   */
  protected async offload<T>(
    work: (signal: AbortSignal) => T | Promise<T>,
    options: OffloadOptions = {},
  ): Promise<T> {
    const controller = new AbortController();
    const timeoutMS = options.timeoutMS ?? 0;
    const { signal } = options;
    const abortFromParent = (): void => controller.abort(signal?.reason);

    if (signal?.aborted) {
      controller.abort(signal.reason);
    } else {
      signal?.addEventListener('abort', abortFromParent, { once: true });
    }

    this.offloaded.add(controller);

    try {
      return await runWithTimeout(
        () => work(controller.signal),
        timeoutMS,
        () => new OffloadedWorkTimeoutError({ name: this.name, timeoutMS }),
        () => controller.abort(),
      );
    } finally {
      signal?.removeEventListener('abort', abortFromParent);
      this.offloaded.delete(controller);
    }
  }

  /**
   * Create and publish an event sourced from this component
   *
   * @returns How many subscriber queues accepted it
   */
  protected publish<T extends EventType>(
    type: T,
    payload: PayloadFor<T>,
    correlationId?: string,
  ): Promise<number> {
    const context = this.requireContext('publish');

    return context.publish(
      createEvent<T>({
        type,
        payload,
        source: this.name,
        correlationId,
        idType: context.getEventIdType(),
      }),
    );
  }

  /**
   * Build (not publish) a response to `request` that keeps its correlation id.
   * Return it from handleEvent() to have it published.
   */
  protected respond<T extends EventType>(
    request: RuntimeEvent,
    type: T,
    payload: PayloadFor<T>,
  ): RuntimeEvent<PayloadFor<T>> {
    return createResponseEvent<T>(request, {
      type,
      payload,
      source: this.name,
      idType: this.context?.getEventIdType(),
    });
  }

  /**
   * @throws {ComponentNotInitializedError} If the manager hasn't attached a context yet
   */
  protected requireContext(operation: string): ComponentContextRef {
    if (!this.context) {
      throw new ComponentNotInitializedError({ name: this.name, operation });
    }

    return this.context;
  }
}
