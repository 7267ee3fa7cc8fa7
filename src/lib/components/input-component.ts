import type { Logger } from '../logger';
import type { EventType, PayloadFor } from '../events/types';
import { BaseComponent } from '../lifecycle-manager/base-component';
import { ComponentNotInitializedError } from '../lifecycle-manager/errors';
import type { InputComponentOptions, InputEmit, InputSource } from './types';

/**
 * Input role: feeds events from an `InputSource` onto the bus
 *
 * The source is started during initialize() and receives an `emit` callback
 * bound to this component. Emits are refused once the component stops.
 *
 * ```typescript
 * const keyboard = new InputComponent(logger, {
 *   name: 'keyboard',
 *   source: {
 *     start(emit, signal) {
 *       readLines(signal, (line) => emit('text-input', { text: line }));
 *     },
 *   },
 * });
 * ```
 */
export class InputComponent extends BaseComponent {
  private readonly source: InputSource;
  private controller: AbortController | null = null;
  private emitted = 0;

  constructor(logger: Logger, options: InputComponentOptions) {
    const { source, ...componentOptions } = options;
    super(logger, { ...componentOptions, role: 'input' });

    this.source = source;
  }

  public async initialize(): Promise<boolean> {
    const controller = new AbortController();
    this.controller = controller;

    await this.source.start(this.emit, controller.signal);
    this.logger.info('Input source started');

    return true;
  }

  public async shutdown(): Promise<void> {
    this.controller?.abort();
    this.controller = null;

    await this.source.stop?.();
    this.logger.info('Input source stopped after {{emitted}} events', {
      params: { emitted: this.emitted },
    });
  }

  public override onInitializeAborted(): void {
    this.controller?.abort();
  }

  public getEmittedCount(): number {
    return this.emitted;
  }

  private readonly emit: InputEmit = async <T extends EventType>(
    type: T,
    payload: PayloadFor<T>,
    correlationId?: string,
  ): Promise<number> => {
    if (!this.controller || this.controller.signal.aborted) {
      throw new ComponentNotInitializedError({
        name: this.name,
        operation: `emit "${type}"`,
      });
    }

    this.emitted++;

    return this.publish(type, payload, correlationId);
  };
}
