/**
 * Test components for LifecycleManager and runtime tests
 *
 * They record what the manager does to them in a shared journal, so tests
 * can assert on the exact order of initialize/shutdown calls across
 * components.
 */

import type { Logger } from '../logger';
import type { RuntimeEvent } from '../events/types';
import { sleep } from '../sleep';
import { BaseComponent } from './base-component';
import type {
  ComponentHealthResult,
  ComponentOptions,
  HandleEventResult,
  InitializeResult,
} from './types';

export interface TestComponentOptions extends Partial<ComponentOptions> {
  name: string;

  /** Entries like `initialize:nlp` and `shutdown:nlp` are appended here */
  journal?: string[];

  initializeDelayMS?: number;
  shutdownDelayMS?: number;

  /** What initialize() returns (default: true) */
  initializeResult?: boolean;
  initializeError?: Error;
  shutdownError?: Error;

  /** Never settle, so the manager's timeout fires */
  hangOnInitialize?: boolean;
  hangOnShutdown?: boolean;

  /** Replaces the default handleEvent(), which only records the event */
  onEvent?: (event: RuntimeEvent) => HandleEventResult;
}

/**
 * Configurable component with no health check
 */
export class TestComponent extends BaseComponent {
  public initializeCalls = 0;
  public shutdownCalls = 0;
  public initializeAborted = false;
  public shutdownAborted = false;
  public readonly received: RuntimeEvent[] = [];

  private readonly testOptions: TestComponentOptions;

  constructor(logger: Logger, options: TestComponentOptions) {
    super(logger, {
      role: 'processor',
      ...options,
    });

    this.testOptions = options;
  }

  public async initialize(): Promise<InitializeResult> {
    this.initializeCalls++;
    this.testOptions.journal?.push(`initialize:${this.name}`);

    if (this.testOptions.hangOnInitialize) {
      await new Promise<never>(() => undefined);
    }

    if (this.testOptions.initializeDelayMS) {
      await sleep(this.testOptions.initializeDelayMS);
    }

    if (this.testOptions.initializeError) {
      throw this.testOptions.initializeError;
    }

    return this.testOptions.initializeResult ?? true;
  }

  public async shutdown(): Promise<void> {
    this.shutdownCalls++;
    this.testOptions.journal?.push(`shutdown:${this.name}`);

    if (this.testOptions.hangOnShutdown) {
      await new Promise<never>(() => undefined);
    }

    if (this.testOptions.shutdownDelayMS) {
      await sleep(this.testOptions.shutdownDelayMS);
    }

    if (this.testOptions.shutdownError) {
      throw this.testOptions.shutdownError;
    }
  }

  public override handleEvent(event: RuntimeEvent): HandleEventResult {
    this.received.push(event);

    return this.testOptions.onEvent?.(event);
  }

  public override onInitializeAborted(): void {
    this.initializeAborted = true;
  }

  public override onShutdownAborted(): void {
    this.shutdownAborted = true;
  }

  /**
   * Start offloaded work that only ends when aborted
   */
  public startLongWork(): Promise<string> {
    return this.offload(
      (signal) =>
        new Promise<string>((resolve) => {
          signal.addEventListener('abort', () => resolve('aborted'), {
            once: true,
          });
        }),
    );
  }

  public publishFromComponent(text: string, correlationId?: string): Promise<number> {
    return this.publish('display-text', { text }, correlationId);
  }
}

/**
 * Test component whose health check result can be changed at runtime
 */
export class HealthCheckedComponent extends TestComponent {
  public health: boolean | ComponentHealthResult = true;
  public healthDelayMS = 0;
  public healthError?: Error;

  public override async healthCheck(): Promise<boolean | ComponentHealthResult> {
    if (this.healthDelayMS) {
      await sleep(this.healthDelayMS);
    }

    if (this.healthError) {
      throw this.healthError;
    }

    return this.health;
  }
}
