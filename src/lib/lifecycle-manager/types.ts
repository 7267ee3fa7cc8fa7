import type { ComponentState, EventType, RuntimeEvent } from '../events/types';
import type { IdentifierType } from '../id-helpers';
import type {
  EventHandler,
  SubscribeOptions,
  SubscriptionHandle,
} from '../message-bus/types';
import type { ServiceKey } from '../service-locator';
import type {
  ComponentInitializationError,
  DependencyCycleError,
  MissingDependencyError,
} from './errors';

export type { ComponentState } from '../events/types';

export const COMPONENT_ROLES = ['input', 'processor', 'output', 'action'] as const;

export type ComponentRole = (typeof COMPONENT_ROLES)[number];

/**
 * Component configuration options
 */
export interface ComponentOptions {
  /** Component name (must be kebab-case) */
  name: string;

  role: ComponentRole;

  /** Names of components that must be running before this one starts */
  dependencies?: string[];

  /** Event types routed to handleEvent() once initialize() succeeds */
  subscribesTo?: EventType[];

  /** Overrides the manager's initialize() timeout (default: 30000) */
  initializeTimeoutMS?: number;

  /** Overrides the manager's shutdown() timeout (default: 5000) */
  shutdownTimeoutMS?: number;

  /** Overrides the manager's healthCheck() timeout (default: 5000) */
  healthCheckTimeoutMS?: number;
}

export type InitializeResult = boolean | void;

export type HandleEventResult =
  | RuntimeEvent
  | void
  | Promise<RuntimeEvent | void>;

/**
 * Component health check result (simple or rich)
 */
export interface ComponentHealthResult {
  healthy: boolean;
  message?: string;
  details?: Record<string, unknown>;
}

/**
 * What a component can reach of the runtime. Injected by the manager;
 * there is no way to get at another component instance through it.
 */
export interface ComponentContextRef {
  readonly componentName: string;

  publish(event: RuntimeEvent): Promise<number>;
  subscribe(
    eventType: EventType,
    handler: EventHandler,
    options?: SubscribeOptions,
  ): SubscriptionHandle;
  unsubscribe(handle: SubscriptionHandle): boolean;

  getService<T>(key: ServiceKey<T>): T;
  getOptionalService<T>(key: ServiceKey<T>): T | undefined;
  getEventIdType(): IdentifierType;

  getComponentState(name: string): ComponentState | undefined;
  getComponentNames(): string[];
  getRunningComponentNames(): string[];
  getStartOrder(): string[];
}

export interface LifecycleManagerOptions {
  /** Default initialize() timeout (default: 30000) */
  initializeTimeoutMS?: number;

  /** Default shutdown() timeout (default: 5000) */
  shutdownTimeoutMS?: number;

  /** Default healthCheck() timeout (default: 5000) */
  healthCheckTimeoutMS?: number;

  /** Publish `component-status` and `system-status` events (default: true) */
  publishStatusEvents?: boolean;

  /** Id format for events the manager and its contexts create (default: 'ulid') */
  eventIdType?: IdentifierType;
}

/**
 * Per-registration overrides, usually taken from the `components` config section
 */
export interface RegisterComponentOptions {
  /** Added to the component's own dependencies */
  extraDependencies?: string[];
  initializeTimeoutMS?: number;
  shutdownTimeoutMS?: number;
}

/**
 * Public snapshot of a component record
 */
export interface ComponentStatus {
  name: string;
  role: ComponentRole;
  state: ComponentState;
  dependencies: string[];
  registrationIndex: number;

  /** Unix timestamp (ms) when initialize() completed */
  startedAt: number | null;

  /** Unix timestamp (ms) when shutdown() completed */
  stoppedAt: number | null;

  /** Last error from initialize/shutdown/handler degradation */
  lastError: Error | null;
}

/**
 * Overall state derived from every component's state
 */
export type SystemState =
  | 'idle'
  | 'ready'
  | 'starting'
  | 'running'
  | 'degraded'
  | 'partial'
  | 'shutting-down'
  | 'failed';

/**
 * Base interface for all operation results
 */
export interface BaseOperationResult {
  /** Whether the operation succeeded */
  success: boolean;

  /** Human-readable explanation if !success */
  reason?: string;

  /** Machine-readable failure code if !success */
  code?: string;

  /** Underlying error if applicable */
  error?: Error;
}

export type RegistrationFailureCode =
  | 'duplicate_name'
  | 'duplicate_instance'
  | 'dependency_cycle'
  | 'invalid_timeout'
  | 'bulk_operation_in_progress';

export interface RegisterComponentResult extends BaseOperationResult {
  componentName: string;
  code?: RegistrationFailureCode;
  registrationIndex: number | null;
  dependencies: string[];
}

export type UnregisterFailureCode =
  | 'component_not_found'
  | 'component_running'
  | 'bulk_operation_in_progress';

export interface UnregisterComponentResult extends BaseOperationResult {
  componentName: string;
  code?: UnregisterFailureCode;
}

/**
 * Stable, machine-readable failure codes for individual component operations
 */
export type ComponentOperationFailureCode =
  | 'component_not_found'
  | 'component_already_running'
  | 'component_busy'
  | 'component_failed'
  | 'component_not_running'
  | 'missing_dependency'
  | 'dependency_not_running'
  | 'has_running_dependents'
  | 'bulk_operation_in_progress'
  | 'initialization_failed'
  | 'stop_timeout'
  | 'stop_error'
  | 'restart_stop_failed'
  | 'restart_start_failed';

export interface ComponentOperationResult extends BaseOperationResult {
  componentName: string;
  code?: ComponentOperationFailureCode;

  /** Component status after the operation */
  status?: ComponentStatus;
}

export interface StopComponentOptions {
  /** Stop even while running components depend on this one (default: false) */
  force?: boolean;
}

export interface RestartComponentOptions {
  stopOptions?: StopComponentOptions;
}

export type StartupFailureCode =
  | 'already_starting'
  | 'shutdown_in_progress'
  | 'partially_running'
  | 'component_failed'
  | 'missing_dependency'
  | 'dependency_cycle'
  | 'initialization_failed'
  | 'shutdown_requested';

export interface StartupResult extends BaseOperationResult {
  code?: StartupFailureCode;

  /** Achieved start order; empty whenever success is false */
  startedComponents: string[];

  /** Components that failed to initialize */
  failedComponents: string[];

  /** Components that were never attempted */
  notStartedComponents: string[];

  /** One entry per failure: configuration problems or initialization failures */
  errors: Array<
    ComponentInitializationError | MissingDependencyError | DependencyCycleError
  >;

  durationMS: number;
}

export interface ComponentStopOutcome {
  name: string;
  timedOut: boolean;
  error?: Error;
}

export interface ShutdownResult extends BaseOperationResult {
  /** In the order they were stopped */
  stoppedComponents: string[];
  timedOutComponents: string[];
  failedComponents: string[];
  durationMS: number;
}

export interface StartupOrderResult extends BaseOperationResult {
  startupOrder: string[];
  code?: 'dependency_cycle';
}

export interface StartupLayersResult extends BaseOperationResult {
  layers: string[][];
  code?: 'dependency_cycle';
}

export interface DependencyValidationResult {
  valid: boolean;
  missingDependencies: Array<{
    componentName: string;
    missingDependency: string;
  }>;
  summary: {
    totalMissing: number;
    componentsWithMissing: number;
  };
}

/**
 * Result of checking a single component's health
 */
export interface HealthCheckResult {
  name: string;
  healthy: boolean;
  state: ComponentState | null;
  message?: string;
  details?: Record<string, unknown>;
  checkedAt: number;
  durationMS: number;
  error: Error | null;
  timedOut: boolean;
  code:
    | 'ok'
    | 'unhealthy'
    | 'not_found'
    | 'not_running'
    | 'no_handler'
    | 'timeout'
    | 'error';
}

/**
 * Aggregate health report for all components
 */
export interface HealthReport {
  /** True only if every component is healthy */
  healthy: boolean;
  components: HealthCheckResult[];
  checkedAt: number;
  durationMS: number;
  timedOut: boolean;
  code: 'ok' | 'degraded' | 'timeout' | 'error';
}
