import type { Logger } from '../logger';
import { toError } from '../errors';
import { isEventOfType } from '../events/event';
import type { ActionResultPayload, RuntimeEvent } from '../events/types';
import type { PermissionPolicy } from '../permissions';
import { BaseComponent } from '../lifecycle-manager/base-component';
import type {
  ActionComponentOptions,
  ActionExecutor,
  ActionRecord,
  ActionStatistics,
} from './types';

const DEFAULT_HISTORY_SIZE = 1000;

/**
 * Action role: executes `execute-action` requests the permission policy
 * allows and answers every request with an `action-result`
 *
 * A denied request gets a `permission-denied` result and never reaches the
 * executor. An executor that throws gets a `failed` result; neither counts
 * as a handler failure.
 *
 * ```typescript
 * const system = new ActionComponent(logger, {
 *   name: 'system-control',
 *   executor: { execute: (request) => automation.run(request.operation) },
 *   policy,
 * });
 * ```
 */
export class ActionComponent extends BaseComponent {
  private readonly executor: ActionExecutor;
  private readonly policy: PermissionPolicy;
  private readonly historySize: number;
  private readonly executionTimeoutMS: number;
  private history: ActionRecord[] = [];

  constructor(logger: Logger, options: ActionComponentOptions) {
    const { executor, policy, historySize, executionTimeoutMS, ...componentOptions } =
      options;

    super(logger, {
      ...componentOptions,
      role: 'action',
      subscribesTo: ['execute-action'],
    });

    this.executor = executor;
    this.policy = policy;
    this.historySize = historySize ?? DEFAULT_HISTORY_SIZE;
    this.executionTimeoutMS = executionTimeoutMS ?? 0;
  }

  public initialize(): boolean {
    this.logger.info('Accepting actions at permission level {{level}}', {
      params: {
        level: this.policy.getLevel(),
        allowListEnabled: this.policy.isAllowListEnabled(),
      },
    });

    return true;
  }

  public shutdown(): void {
    this.logger.info('Stopped after {{total}} actions', {
      params: { total: this.history.length },
    });
  }

  public override async handleEvent(
    event: RuntimeEvent,
    signal?: AbortSignal,
  ): Promise<RuntimeEvent | undefined> {
    if (!isEventOfType(event, 'execute-action')) {
      return undefined;
    }

    const request = event.payload;
    const startedAt = Date.now();

    const decision = this.policy.check({
      operation: request.operation,
      requiredLevel: request.requiredLevel,
      requestedBy: event.source,
      correlationId: event.correlationId,
    });

    let payload: ActionResultPayload;

    if (!decision.allowed) {
      payload = {
        operation: request.operation,
        outcome: 'permission-denied',
        error: decision.error.message,
        durationMS: 0,
      };
    } else {
      try {
        const result = await this.offload(
          (workSignal) => this.executor.execute(request, workSignal),
          { timeoutMS: this.executionTimeoutMS, signal },
        );

        payload = {
          operation: request.operation,
          outcome: 'succeeded',
          result,
          durationMS: Date.now() - startedAt,
        };
      } catch (error) {
        const err = toError(error);

        this.logger.errorObject(`Action ${request.operation} failed`, err);

        payload = {
          operation: request.operation,
          outcome: 'failed',
          error: err.message,
          durationMS: Date.now() - startedAt,
        };
      }
    }

    this.record(event, payload);

    return this.respond(event, 'action-result', payload);
  }

  /**
   * Most recent records last
   *
   * @param limit - Only the last N records
   */
  public getActionHistory(limit?: number): ActionRecord[] {
    if (limit !== undefined && limit <= 0) {
      return [];
    }

    const records = limit === undefined ? this.history : this.history.slice(-limit);
    return records.map((record) => ({ ...record }));
  }

  public clearActionHistory(): void {
    this.history = [];
  }

  public getActionStatistics(): ActionStatistics {
    const totalActions = this.history.length;
    const succeeded = this.countOutcome('succeeded');
    const denied = this.countOutcome('permission-denied');
    const totalDurationMS = this.history.reduce(
      (sum, record) => sum + record.durationMS,
      0,
    );

    return {
      totalActions,
      succeeded,
      failed: this.countOutcome('failed'),
      denied,
      successRate: totalActions === 0 ? 0 : succeeded / totalActions,
      averageDurationMS: totalActions === 0 ? 0 : totalDurationMS / totalActions,
    };
  }

  private countOutcome(outcome: ActionRecord['outcome']): number {
    return this.history.filter((record) => record.outcome === outcome).length;
  }

  private record(event: RuntimeEvent, payload: ActionResultPayload): void {
    if (this.historySize === 0) {
      return;
    }

    this.history.push({
      eventId: event.id,
      correlationId: event.correlationId,
      operation: payload.operation,
      requestedBy: event.source,
      outcome: payload.outcome,
      error: payload.error,
      durationMS: payload.durationMS,
      timestamp: Date.now(),
    });

    if (this.history.length > this.historySize) {
      this.history = this.history.slice(-this.historySize);
    }
  }
}
