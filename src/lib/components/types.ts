import type {
  ActionOutcome,
  EventType,
  ExecuteActionPayload,
  PayloadFor,
  RuntimeEvent,
} from '../events/types';
import type { PermissionPolicy } from '../permissions';
import type { ComponentOptions } from '../lifecycle-manager/types';

/**
 * Options every role component accepts. The role itself is fixed by the class.
 */
export type RoleComponentOptions = Omit<ComponentOptions, 'role'>;

// ============================================================================
// Input
// ============================================================================

/**
 * Handed to an input source. Resolves with how many subscriber queues
 * accepted the event.
 */
export type InputEmit = <T extends EventType>(
  type: T,
  payload: PayloadFor<T>,
  correlationId?: string,
) => Promise<number>;

/**
 * Where an input component's events come from: a keyboard reader, a
 * microphone, a file watcher...
 *
 * start() should return once the source is listening; long-running loops
 * keep going in the background until `signal` is aborted.
 */
export interface InputSource {
  start(emit: InputEmit, signal: AbortSignal): void | Promise<void>;
  stop?(): void | Promise<void>;
}

export interface InputComponentOptions extends RoleComponentOptions {
  source: InputSource;
}

// ============================================================================
// Processor
// ============================================================================

export interface InferenceOutput<T extends EventType = EventType> {
  type: T;
  payload: PayloadFor<T>;
}

/**
 * Turns one consumed event into at most one response event.
 * Throwing (or rejecting) counts as a handler failure.
 */
export interface InferenceStrategy {
  /** Load models, open connections */
  initialize?(): void | Promise<void>;
  infer(
    event: RuntimeEvent,
    signal: AbortSignal,
  ): InferenceOutput | undefined | Promise<InferenceOutput | undefined>;
  dispose?(): void | Promise<void>;
}

export interface ProcessorComponentOptions extends RoleComponentOptions {
  strategy: InferenceStrategy;
  /** Event types handed to the strategy */
  consumes: EventType[];
  /** Abort an inference after this long; 0 or unset waits indefinitely */
  inferenceTimeoutMS?: number;
}

export interface ProcessorStatistics {
  processed: number;
  responded: number;
  failed: number;
  averageDurationMS: number;
}

// ============================================================================
// Output
// ============================================================================

export interface OutputRenderer {
  initialize?(): void | Promise<void>;
  render(event: RuntimeEvent, signal: AbortSignal): void | Promise<void>;
  dispose?(): void | Promise<void>;
}

export interface OutputComponentOptions extends RoleComponentOptions {
  renderer: OutputRenderer;
  consumes: EventType[];
  /** Publish an `output-ack` after each render (default: false) */
  acknowledge?: boolean;
}

// ============================================================================
// Action
// ============================================================================

/**
 * Performs an operation the permission policy already allowed. The resolved
 * value becomes `result` in the `action-result` payload, so it has to be
 * structured-cloneable.
 */
export interface ActionExecutor {
  execute(request: ExecuteActionPayload, signal: AbortSignal): unknown;
}

export interface ActionComponentOptions extends Omit<RoleComponentOptions, 'subscribesTo'> {
  executor: ActionExecutor;
  policy: PermissionPolicy;
  /** Records kept by getActionHistory() (default: 1000) */
  historySize?: number;
  /** Abort an execution after this long; 0 or unset waits indefinitely */
  executionTimeoutMS?: number;
}

export interface ActionRecord {
  eventId: string;
  correlationId: string;
  operation: string;
  requestedBy: string;
  outcome: ActionOutcome;
  error?: string;
  durationMS: number;
  timestamp: number;
}

export interface ActionStatistics {
  totalActions: number;
  succeeded: number;
  failed: number;
  denied: number;
  /** Share of all recorded actions that succeeded, 0 when there are none */
  successRate: number;
  averageDurationMS: number;
}
