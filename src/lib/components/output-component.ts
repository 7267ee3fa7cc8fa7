import type { Logger } from '../logger';
import type { RuntimeEvent } from '../events/types';
import { BaseComponent } from '../lifecycle-manager/base-component';
import type { OutputComponentOptions, OutputRenderer } from './types';

/**
 * Output role: renders consumed events through an `OutputRenderer`
 *
 * Publishes nothing back into the pipeline, except an `output-ack` per
 * rendered event when `acknowledge` is set.
 */
export class OutputComponent extends BaseComponent {
  private readonly renderer: OutputRenderer;
  private readonly acknowledge: boolean;
  private rendered = 0;

  constructor(logger: Logger, options: OutputComponentOptions) {
    const { renderer, consumes, acknowledge, ...componentOptions } = options;

    super(logger, {
      ...componentOptions,
      role: 'output',
      subscribesTo: [...consumes, ...(componentOptions.subscribesTo ?? [])],
    });

    this.renderer = renderer;
    this.acknowledge = acknowledge ?? false;
  }

  public async initialize(): Promise<boolean> {
    await this.renderer.initialize?.();
    return true;
  }

  public async shutdown(): Promise<void> {
    await this.renderer.dispose?.();
  }

  public override async handleEvent(
    event: RuntimeEvent,
    signal?: AbortSignal,
  ): Promise<RuntimeEvent | undefined> {
    await this.offload((workSignal) => this.renderer.render(event, workSignal), {
      signal,
    });
    this.rendered++;

    if (!this.acknowledge) {
      return undefined;
    }

    return this.respond(event, 'output-ack', {
      eventId: event.id,
      eventType: event.type,
      renderer: this.name,
    });
  }

  public getRenderedCount(): number {
    return this.rendered;
  }
}
