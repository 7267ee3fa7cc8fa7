import type { Logger } from '../logger';
import type { RuntimeEvent } from '../events/types';
import { BaseComponent } from '../lifecycle-manager/base-component';
import type { ComponentHealthResult } from '../lifecycle-manager/types';
import type {
  InferenceStrategy,
  ProcessorComponentOptions,
  ProcessorStatistics,
} from './types';

/**
 * Processor role: hands each consumed event to an `InferenceStrategy` and
 * publishes what it returns, keeping the request's correlation id
 *
 * The bus delivers to a subscriber one event at a time, so inference runs
 * in queue order and responses leave in request order. Inference is
 * offloaded: stopping the component, or the bus timing out the delivery,
 * aborts it through the signal.
 */
export class ProcessorComponent extends BaseComponent {
  private readonly strategy: InferenceStrategy;
  private readonly inferenceTimeoutMS: number;

  private processed = 0;
  private responded = 0;
  private failed = 0;
  private totalDurationMS = 0;

  constructor(logger: Logger, options: ProcessorComponentOptions) {
    const { strategy, consumes, inferenceTimeoutMS, ...componentOptions } = options;

    super(logger, {
      ...componentOptions,
      role: 'processor',
      subscribesTo: [...consumes, ...(componentOptions.subscribesTo ?? [])],
    });

    this.strategy = strategy;
    this.inferenceTimeoutMS = inferenceTimeoutMS ?? 0;
  }

  public async initialize(): Promise<boolean> {
    await this.strategy.initialize?.();
    return true;
  }

  public async shutdown(): Promise<void> {
    await this.strategy.dispose?.();
  }

  public override async handleEvent(
    event: RuntimeEvent,
    signal?: AbortSignal,
  ): Promise<RuntimeEvent | undefined> {
    const startedAt = Date.now();

    try {
      const output = await this.offload(
        (workSignal) => this.strategy.infer(event, workSignal),
        { timeoutMS: this.inferenceTimeoutMS, signal },
      );

      if (!output) {
        return undefined;
      }

      this.responded++;

      return this.respond(event, output.type, output.payload);
    } catch (error) {
      this.failed++;
      throw error;
    } finally {
      this.processed++;
      this.totalDurationMS += Date.now() - startedAt;
    }
  }

  public override healthCheck(): ComponentHealthResult {
    return {
      healthy: true,
      details: { ...this.getStatistics() },
    };
  }

  public getStatistics(): ProcessorStatistics {
    return {
      processed: this.processed,
      responded: this.responded,
      failed: this.failed,
      averageDurationMS:
        this.processed === 0 ? 0 : this.totalDurationMS / this.processed,
    };
  }
}
