import { EventEmitterProtected } from '../event-emitter';
import { LIFECYCLE_MANAGER_SOURCE } from '../constants';
import { toError } from '../errors';
import { createEvent } from '../events/event';
import type { ComponentState, EventType } from '../events/types';
import type { IdentifierType } from '../id-helpers';
import type { Logger, LoggerService } from '../logger';
import type { MessageBus } from '../message-bus';
import { ServiceKeys, type ServiceLocator } from '../service-locator';
import { safeHandleCallback } from '../safe-handle-callback';
import { isBoundedTimeout, runWithTimeout } from '../with-timeout';
import type { BaseComponent } from './base-component';
import { ComponentContext, type ComponentContextHost } from './component-context';
import {
  ComponentHealthCheckTimeoutError,
  ComponentInitializationError,
  ComponentInitializeTimeoutError,
  ComponentRegistrationError,
  ComponentShutdownTimeoutError,
  DependencyCycleError,
  MissingDependencyError,
} from './errors';
import { LifecycleManagerEvents, type LifecycleManagerEventMap } from './events';
import type {
  ComponentHealthResult,
  ComponentOperationResult,
  ComponentRole,
  ComponentStatus,
  ComponentStopOutcome,
  DependencyValidationResult,
  HealthCheckResult,
  HealthReport,
  InitializeResult,
  LifecycleManagerOptions,
  RegisterComponentOptions,
  RegisterComponentResult,
  RegistrationFailureCode,
  RestartComponentOptions,
  ShutdownResult,
  StartupFailureCode,
  StartupLayersResult,
  StartupOrderResult,
  StartupResult,
  StopComponentOptions,
  SystemState,
  UnregisterComponentResult,
} from './types';

/**
 * Legal state transitions. `failed` is absorbing: a failed component has
 * to be unregistered and registered again.
 */
const ALLOWED_TRANSITIONS: Record<ComponentState, readonly ComponentState[]> = {
  registered: ['initializing'],
  initializing: ['running', 'failed'],
  running: ['degraded', 'stopping', 'failed'],
  degraded: ['running', 'stopping', 'failed'],
  stopping: ['stopped'],
  stopped: ['initializing'],
  failed: [],
};

const ACTIVE_STATES: readonly ComponentState[] = ['running', 'degraded'];

interface ComponentRecord {
  readonly component: BaseComponent;
  readonly name: string;
  readonly role: ComponentRole;
  readonly registrationIndex: number;
  readonly dependencies: string[];
  readonly initializeTimeoutMS: number;
  readonly shutdownTimeoutMS: number;
  readonly healthCheckTimeoutMS: number;
  state: ComponentState;
  startedAt: number | null;
  stoppedAt: number | null;
  lastError: Error | null;
}

type InitializeOutcome =
  | { success: true }
  | { success: false; error: ComponentInitializationError };

/**
 * Owns every component record: registration, dependency-ordered startup,
 * supervision and ordered shutdown.
 *
 * The manager reaches the bus through the service locator. Once attached it
 * only lets registered components subscribe, and follows the bus's
 * degraded/recovered signals.
 *
 * ```typescript
 * const manager = new LifecycleManager(logger, locator);
 *
 * manager.registerComponent(new KeyboardInput(logger));
 * manager.registerComponent(new NLPProcessor(logger));
 *
 * const result = await manager.startAllComponents();
 * if (!result.success) {
 *   // result.errors has one entry per failure
 * }
 * ```
 */
export class LifecycleManager extends EventEmitterProtected<LifecycleManagerEventMap> {
  private readonly logger: LoggerService;
  private readonly locator: ServiceLocator;
  private readonly events: LifecycleManagerEvents;
  private readonly contextHost: ComponentContextHost;

  private readonly defaultInitializeTimeoutMS: number;
  private readonly defaultShutdownTimeoutMS: number;
  private readonly defaultHealthCheckTimeoutMS: number;
  private readonly publishStatusEvents: boolean;
  private readonly eventIdType: IdentifierType;

  // Insertion order is registration order
  private readonly records = new Map<string, ComponentRecord>();
  private registrationCounter = 0;

  // Achieved start order: components in the order their initialize() succeeded
  private startOrder: string[] = [];

  private isStarting = false;
  private isShuttingDown = false;
  private startupAbortRequested = false;
  private startupInFlight: Promise<StartupResult> | null = null;
  private shutdownInFlight: Promise<ShutdownResult> | null = null;

  private attachedBus: MessageBus | null = null;
  private busListenerRemovers: Array<() => void> = [];

  private healthMonitorTimer: NodeJS.Timeout | null = null;
  private healthCheckInFlight = false;

  constructor(
    rootLogger: Logger,
    locator: ServiceLocator,
    options: LifecycleManagerOptions = {},
  ) {
    super();

    this.logger = rootLogger.service(LIFECYCLE_MANAGER_SOURCE);
    this.locator = locator;
    this.events = new LifecycleManagerEvents((event, data) =>
      this.emit(event, data),
    );

    this.defaultInitializeTimeoutMS = this.boundedDefault(
      'initializeTimeoutMS',
      options.initializeTimeoutMS,
      30_000,
    );
    this.defaultShutdownTimeoutMS = this.boundedDefault(
      'shutdownTimeoutMS',
      options.shutdownTimeoutMS,
      5000,
    );
    this.defaultHealthCheckTimeoutMS = this.boundedDefault(
      'healthCheckTimeoutMS',
      options.healthCheckTimeoutMS,
      5000,
    );
    this.publishStatusEvents = options.publishStatusEvents ?? true;
    this.eventIdType = options.eventIdType ?? 'ulid';

    this.contextHost = {
      locator,
      getBus: () => this.locator.get(ServiceKeys.MESSAGE_BUS),
      getEventIdType: () => this.eventIdType,
      getComponentState: (name) => this.getComponentState(name),
      getComponentNames: () => this.getComponentNames(),
      getRunningComponentNames: () => this.getRunningComponentNames(),
      getStartOrder: () => this.getStartOrder(),
    };

    this.attachBus();
  }

  // ============================================================================
  // Component Registration
  // ============================================================================

  /**
   * Register a component
   *
   * Rejected (with a result, never a throw) for duplicate names or
   * instances, during bulk startup/shutdown, and when the component would
   * close a dependency cycle. Missing dependencies are allowed here and
   * reported at startup.
   */
  public registerComponent(
    component: BaseComponent,
    options: RegisterComponentOptions = {},
  ): RegisterComponentResult {
    const name = component.getName();

    if (this.isStarting || this.isShuttingDown) {
      return this.rejectRegistration(
        name,
        'bulk_operation_in_progress',
        `Cannot register component "${name}" while ${this.isStarting ? 'startup' : 'shutdown'} is in progress`,
      );
    }

    for (const record of this.records.values()) {
      if (record.component === component) {
        return this.rejectRegistration(
          name,
          'duplicate_instance',
          `This component instance is already registered as "${record.name}"`,
        );
      }
    }

    if (this.records.has(name)) {
      return this.rejectRegistration(
        name,
        'duplicate_name',
        `Component "${name}" is already registered`,
      );
    }

    const timeouts = {
      initializeTimeoutMS: options.initializeTimeoutMS ?? component.initializeTimeoutMS,
      shutdownTimeoutMS: options.shutdownTimeoutMS ?? component.shutdownTimeoutMS,
      healthCheckTimeoutMS: component.healthCheckTimeoutMS,
    };

    for (const [field, value] of Object.entries(timeouts)) {
      if (value !== undefined && !isBoundedTimeout(value)) {
        return this.rejectRegistration(
          name,
          'invalid_timeout',
          `Component "${name}" has ${field} ${value}; timeouts must be positive`,
        );
      }
    }

    const dependencies = [
      ...new Set([
        ...component.getDependencies(),
        ...(options.extraDependencies ?? []),
      ]),
    ];

    const cycle = this.findCycleThrough(name, dependencies);

    if (cycle) {
      const error = new DependencyCycleError({ cycle });

      this.logger.entity(name).error('Registration rejected: {{message}}', {
        params: { message: error.message },
      });

      this.events.componentRegistrationRejected({
        name,
        reason: 'dependency_cycle',
        message: error.message,
        cycle,
      });

      return {
        success: false,
        componentName: name,
        code: 'dependency_cycle',
        reason: error.message,
        error,
        registrationIndex: null,
        dependencies,
      };
    }

    const record: ComponentRecord = {
      component,
      name,
      role: component.getRole(),
      registrationIndex: this.registrationCounter++,
      dependencies,
      initializeTimeoutMS:
        timeouts.initializeTimeoutMS ?? this.defaultInitializeTimeoutMS,
      shutdownTimeoutMS: timeouts.shutdownTimeoutMS ?? this.defaultShutdownTimeoutMS,
      healthCheckTimeoutMS:
        timeouts.healthCheckTimeoutMS ?? this.defaultHealthCheckTimeoutMS,
      state: 'registered',
      startedAt: null,
      stoppedAt: null,
      lastError: null,
    };

    this.records.set(name, record);
    component.attachContext(new ComponentContext(name, this.contextHost));

    this.logger.entity(name).info('Registered {{role}} component', {
      params: { role: record.role, dependencies },
    });

    this.events.componentRegistered({
      name,
      role: record.role,
      registrationIndex: record.registrationIndex,
      dependencies,
    });

    return {
      success: true,
      componentName: name,
      registrationIndex: record.registrationIndex,
      dependencies,
    };
  }

  /**
   * Remove a component that is not running. Failed components can only
   * come back this way.
   */
  public unregisterComponent(name: string): UnregisterComponentResult {
    if (this.isStarting || this.isShuttingDown) {
      return {
        success: false,
        componentName: name,
        code: 'bulk_operation_in_progress',
        reason: 'Bulk operation in progress',
      };
    }

    const record = this.records.get(name);

    if (!record) {
      return {
        success: false,
        componentName: name,
        code: 'component_not_found',
        reason: `Component "${name}" is not registered`,
      };
    }

    if (!['registered', 'stopped', 'failed'].includes(record.state)) {
      return {
        success: false,
        componentName: name,
        code: 'component_running',
        reason: `Component "${name}" is ${record.state}; stop it first`,
      };
    }

    this.records.delete(name);
    this.attachedBus?.removeSubscriber(name);
    record.component.attachContext(undefined);

    this.logger.entity(name).info('Unregistered component');
    this.events.componentUnregistered(name);

    return { success: true, componentName: name };
  }

  public validateDependencies(): DependencyValidationResult {
    const missingDependencies: DependencyValidationResult['missingDependencies'] = [];

    for (const record of this.records.values()) {
      for (const dependency of record.dependencies) {
        if (!this.records.has(dependency)) {
          missingDependencies.push({
            componentName: record.name,
            missingDependency: dependency,
          });
        }
      }
    }

    const componentsWithMissing = new Set(
      missingDependencies.map((missing) => missing.componentName),
    ).size;

    return {
      valid: missingDependencies.length === 0,
      missingDependencies,
      summary: {
        totalMissing: missingDependencies.length,
        componentsWithMissing,
      },
    };
  }

  /**
   * Kahn layers: each layer holds the components whose registered
   * dependencies all sit in earlier layers, in registration order
   */
  public getStartupLayers(): StartupLayersResult {
    try {
      return { success: true, layers: this.computeLayers() };
    } catch (error) {
      const err = toError(error);

      return {
        success: false,
        layers: [],
        code: 'dependency_cycle',
        reason: err.message,
        error: err,
      };
    }
  }

  public getStartupOrder(): StartupOrderResult {
    const result = this.getStartupLayers();

    if (!result.success) {
      return {
        success: false,
        startupOrder: [],
        code: 'dependency_cycle',
        reason: result.reason,
        error: result.error,
      };
    }

    return { success: true, startupOrder: result.layers.flat() };
  }

  // ============================================================================
  // Bulk Operations
  // ============================================================================

  /**
   * Start every registered component, one layer at a time
   *
   * Members of a layer start concurrently; the next layer waits for all of
   * them to settle. A single failure stops every component that did start
   * (reverse order) and leaves later layers `registered`: partial success
   * is never reported.
   */
  public startAllComponents(): Promise<StartupResult> {
    if (this.startupInFlight) {
      this.logger.warn('Cannot start all components: startup already in progress');
      return Promise.resolve(this.startupFailure('already_starting', 'Startup already in progress', Date.now()));
    }

    const startup = this.runStartup().finally(() => {
      this.startupInFlight = null;
    });

    this.startupInFlight = startup;

    return startup;
  }

  /**
   * Stop every running component in exact reverse of the achieved start
   * order. Timeouts and errors force `stopped` and never block the rest.
   *
   * Called during startup, it lets the current layer settle, rolls the
   * startup back and then reports.
   */
  public stopAllComponents(): Promise<ShutdownResult> {
    if (this.shutdownInFlight) {
      return this.shutdownInFlight;
    }

    const shutdown = this.runShutdown().finally(() => {
      this.shutdownInFlight = null;
    });

    this.shutdownInFlight = shutdown;

    return shutdown;
  }

  // ============================================================================
  // Individual Component Lifecycle
  // ============================================================================

  /**
   * Start one component whose dependencies are already running
   */
  public async startComponent(name: string): Promise<ComponentOperationResult> {
    if (this.isStarting || this.isShuttingDown) {
      return this.bulkOperationRejection(name);
    }

    const record = this.records.get(name);

    if (!record) {
      return this.notFound(name);
    }

    if (ACTIVE_STATES.includes(record.state)) {
      return {
        success: false,
        componentName: name,
        code: 'component_already_running',
        reason: `Component "${name}" is already ${record.state}`,
        status: this.toStatus(record),
      };
    }

    if (record.state === 'failed') {
      return {
        success: false,
        componentName: name,
        code: 'component_failed',
        reason: `Component "${name}" has failed; unregister and register it again`,
        error: record.lastError ?? undefined,
        status: this.toStatus(record),
      };
    }

    if (record.state === 'initializing' || record.state === 'stopping') {
      return {
        success: false,
        componentName: name,
        code: 'component_busy',
        reason: `Component "${name}" is ${record.state}`,
        status: this.toStatus(record),
      };
    }

    for (const dependency of record.dependencies) {
      const dependencyRecord = this.records.get(dependency);

      if (!dependencyRecord) {
        const error = new MissingDependencyError({
          componentName: name,
          missingDependency: dependency,
        });

        return {
          success: false,
          componentName: name,
          code: 'missing_dependency',
          reason: error.message,
          error,
          status: this.toStatus(record),
        };
      }

      if (!ACTIVE_STATES.includes(dependencyRecord.state)) {
        return {
          success: false,
          componentName: name,
          code: 'dependency_not_running',
          reason: `Dependency "${dependency}" is ${dependencyRecord.state}`,
          status: this.toStatus(record),
        };
      }
    }

    this.attachBus();
    const outcome = await this.initializeRecord(record);

    if (!outcome.success) {
      return {
        success: false,
        componentName: name,
        code: 'initialization_failed',
        reason: outcome.error.message,
        error: outcome.error,
        status: this.toStatus(record),
      };
    }

    this.publishSystemStatus();

    return { success: true, componentName: name, status: this.toStatus(record) };
  }

  /**
   * Stop one component. Refused while running components depend on it,
   * unless `force` is set.
   */
  public async stopComponent(
    name: string,
    options: StopComponentOptions = {},
  ): Promise<ComponentOperationResult> {
    if (this.isStarting || this.isShuttingDown) {
      return this.bulkOperationRejection(name);
    }

    const record = this.records.get(name);

    if (!record) {
      return this.notFound(name);
    }

    if (!ACTIVE_STATES.includes(record.state)) {
      return {
        success: false,
        componentName: name,
        code: 'component_not_running',
        reason: `Component "${name}" is ${record.state}`,
        status: this.toStatus(record),
      };
    }

    if (!options.force) {
      const runningDependents = this.getRunningDependents(name);

      if (runningDependents.length > 0) {
        this.logger
          .entity(name)
          .warn('Cannot stop component with running dependents', {
            params: { runningDependents },
          });

        return {
          success: false,
          componentName: name,
          code: 'has_running_dependents',
          reason: `Component has running dependents: ${runningDependents.join(', ')}. Use { force: true } to bypass.`,
          status: this.toStatus(record),
        };
      }
    }

    const outcome = await this.stopRecord(record);
    this.publishSystemStatus();

    if (outcome.error) {
      return {
        success: false,
        componentName: name,
        code: outcome.timedOut ? 'stop_timeout' : 'stop_error',
        reason: outcome.error.message,
        error: outcome.error,
        status: this.toStatus(record),
      };
    }

    return { success: true, componentName: name, status: this.toStatus(record) };
  }

  /**
   * Stop then start a component
   */
  public async restartComponent(
    name: string,
    options: RestartComponentOptions = {},
  ): Promise<ComponentOperationResult> {
    if (this.isStarting || this.isShuttingDown) {
      return this.bulkOperationRejection(name);
    }

    const stopResult = await this.stopComponent(name, options.stopOptions);

    // A stop that timed out or threw still leaves the component stopped
    const record = this.records.get(name);
    if (!stopResult.success && record?.state !== 'stopped') {
      return {
        success: false,
        componentName: name,
        code: 'restart_stop_failed',
        reason: `Failed to stop: ${stopResult.reason}`,
        error: stopResult.error,
        status: stopResult.status,
      };
    }

    const startResult = await this.startComponent(name);

    if (!startResult.success) {
      return {
        success: false,
        componentName: name,
        code: 'restart_start_failed',
        reason: `Failed to start: ${startResult.reason}`,
        error: startResult.error,
        status: startResult.status,
      };
    }

    return startResult;
  }

  // ============================================================================
  // Health Checks
  // ============================================================================

  public async checkComponentHealth(name: string): Promise<HealthCheckResult> {
    const checkedAt = Date.now();
    const record = this.records.get(name);

    if (!record) {
      return {
        name,
        healthy: false,
        state: null,
        message: 'Component not found',
        checkedAt,
        durationMS: 0,
        error: null,
        timedOut: false,
        code: 'not_found',
      };
    }

    if (!ACTIVE_STATES.includes(record.state)) {
      return {
        name,
        healthy: false,
        state: record.state,
        message: 'Component not running',
        checkedAt,
        durationMS: Date.now() - checkedAt,
        error: null,
        timedOut: false,
        code: 'not_running',
      };
    }

    const component = record.component;
    const healthCheck = component.healthCheck;

    if (!healthCheck) {
      return {
        name,
        healthy: true,
        state: record.state,
        message: 'No health check implemented',
        checkedAt,
        durationMS: Date.now() - checkedAt,
        error: null,
        timedOut: false,
        code: 'no_handler',
      };
    }

    let result: HealthCheckResult;

    try {
      const outcome = await runWithTimeout<boolean | ComponentHealthResult>(
        () => healthCheck.call(component),
        record.healthCheckTimeoutMS,
        () =>
          new ComponentHealthCheckTimeoutError({
            name,
            timeoutMS: record.healthCheckTimeoutMS,
          }),
      );
      const health: ComponentHealthResult =
        typeof outcome === 'boolean' ? { healthy: outcome } : outcome;

      result = {
        name,
        healthy: health.healthy,
        state: record.state,
        message: health.message,
        details: health.details,
        checkedAt,
        durationMS: Date.now() - checkedAt,
        error: null,
        timedOut: false,
        code: health.healthy ? 'ok' : 'unhealthy',
      };
    } catch (error) {
      const err = toError(error);
      const timedOut = err instanceof ComponentHealthCheckTimeoutError;

      this.logger.entity(name).warn('Health check {{outcome}}: {{error}}', {
        params: { outcome: timedOut ? 'timed out' : 'failed', error: err.message },
      });

      result = {
        name,
        healthy: false,
        state: record.state,
        message: err.message,
        checkedAt,
        durationMS: Date.now() - checkedAt,
        error: err,
        timedOut,
        code: timedOut ? 'timeout' : 'error',
      };
    }

    this.events.componentHealthCheckCompleted(result);

    return result;
  }

  /**
   * Check every registered component concurrently
   */
  public async checkAllHealth(): Promise<HealthReport> {
    const checkedAt = Date.now();
    const components = await Promise.all(
      this.getComponentNames().map((name) => this.checkComponentHealth(name)),
    );

    const healthy = components.every((component) => component.healthy);
    const timedOut = components.some((component) => component.timedOut);
    const errored = components.some((component) => component.code === 'error');

    let code: HealthReport['code'] = 'ok';

    if (timedOut) {
      code = 'timeout';
    } else if (errored) {
      code = 'error';
    } else if (!healthy) {
      code = 'degraded';
    }

    return {
      healthy,
      components,
      checkedAt,
      durationMS: Date.now() - checkedAt,
      timedOut,
      code,
    };
  }

  /**
   * Run checkAllHealth() every `intervalMS` and log unhealthy components.
   * The timer is unref'd and never keeps the process alive.
   *
   * @returns false when `intervalMS` is not positive
   */
  public startHealthMonitor(intervalMS: number): boolean {
    this.stopHealthMonitor();

    if (intervalMS <= 0) {
      return false;
    }

    this.healthMonitorTimer = setInterval(() => {
      this.runMonitoredHealthCheck();
    }, intervalMS);
    this.healthMonitorTimer.unref();

    this.logger.debug('Health monitor started every {{intervalMS}}ms', {
      params: { intervalMS },
    });

    return true;
  }

  public stopHealthMonitor(): void {
    if (this.healthMonitorTimer) {
      clearInterval(this.healthMonitorTimer);
      this.healthMonitorTimer = null;
      this.logger.debug('Health monitor stopped');
    }
  }

  public isHealthMonitorRunning(): boolean {
    return this.healthMonitorTimer !== null;
  }

  // ============================================================================
  // Status Queries
  // ============================================================================

  public hasComponent(name: string): boolean {
    return this.records.has(name);
  }

  public getComponentNames(): string[] {
    return [...this.records.keys()];
  }

  public getComponentCount(): number {
    return this.records.size;
  }

  public getComponentState(name: string): ComponentState | undefined {
    return this.records.get(name)?.state;
  }

  public isComponentRunning(name: string): boolean {
    const state = this.records.get(name)?.state;
    return state !== undefined && ACTIVE_STATES.includes(state);
  }

  /**
   * Running and degraded components, in registration order
   */
  public getRunningComponentNames(): string[] {
    return [...this.records.values()]
      .filter((record) => ACTIVE_STATES.includes(record.state))
      .map((record) => record.name);
  }

  public getRunningComponentCount(): number {
    return this.getRunningComponentNames().length;
  }

  /**
   * Components in the order their initialize() succeeded
   */
  public getStartOrder(): string[] {
    return [...this.startOrder];
  }

  public getComponentStatus(name: string): ComponentStatus | undefined {
    const record = this.records.get(name);
    return record ? this.toStatus(record) : undefined;
  }

  public getAllComponentStatuses(): ComponentStatus[] {
    return [...this.records.values()].map((record) => this.toStatus(record));
  }

  public getSystemState(): SystemState {
    if (this.isStarting) {
      return 'starting';
    }

    if (this.isShuttingDown) {
      return 'shutting-down';
    }

    const states = [...this.records.values()].map((record) => record.state);

    if (states.length === 0) {
      return 'idle';
    }

    const active = states.filter((state) => ACTIVE_STATES.includes(state));

    if (active.length === states.length) {
      return states.includes('degraded') ? 'degraded' : 'running';
    }

    if (active.length > 0) {
      return 'partial';
    }

    if (states.includes('failed')) {
      return 'failed';
    }

    return 'ready';
  }

  /**
   * Stop following the bus and remove the subscriber validator
   */
  public detachFromBus(): void {
    for (const remove of this.busListenerRemovers) {
      remove();
    }

    this.busListenerRemovers = [];
    this.attachedBus?.setSubscriberValidator(undefined);
    this.attachedBus = null;
  }

  protected override handleListenerError(
    error: Error,
    callbackName: string,
  ): void {
    this.logger.errorObject(`Lifecycle manager ${callbackName} failed`, error);
  }

  // ============================================================================
  // Startup / Shutdown Internals
  // ============================================================================

  private async runStartup(): Promise<StartupResult> {
    const startTime = Date.now();

    if (this.isShuttingDown) {
      this.logger.warn('Cannot start all components: shutdown in progress');
      return this.startupFailure('shutdown_in_progress', 'Shutdown in progress', startTime);
    }

    const records = [...this.records.values()];
    const activeCount = records.filter((record) =>
      ACTIVE_STATES.includes(record.state),
    ).length;

    if (activeCount === records.length && records.length > 0) {
      this.logger.info('All components already running');
      return {
        success: true,
        startedComponents: this.getStartOrder(),
        failedComponents: [],
        notStartedComponents: [],
        errors: [],
        durationMS: Date.now() - startTime,
      };
    }

    if (activeCount > 0) {
      this.logger.error(
        'Cannot start: {{running}}/{{total}} components already running. Call stopAllComponents() first.',
        { params: { running: activeCount, total: records.length } },
      );
      return this.startupFailure(
        'partially_running',
        `${activeCount}/${records.length} components already running`,
        startTime,
      );
    }

    const failed = records.filter((record) => record.state === 'failed');

    if (failed.length > 0) {
      const names = failed.map((record) => record.name);
      this.logger.error('Cannot start: failed components must be re-registered', {
        params: { failed: names },
      });
      return this.startupFailure(
        'component_failed',
        `Failed components must be re-registered: ${names.join(', ')}`,
        startTime,
      );
    }

    const validation = this.validateDependencies();

    if (!validation.valid) {
      const errors = validation.missingDependencies.map(
        (missing) => new MissingDependencyError(missing),
      );

      for (const error of errors) {
        this.logger.entity(error.additionalInfo.componentName).error(error.message);
      }

      const result = this.startupFailure(
        'missing_dependency',
        errors.map((error) => error.message).join('; '),
        startTime,
        errors,
      );
      this.events.lifecycleManagerStartupFailed(result);

      return result;
    }

    let layers: string[][];

    try {
      layers = this.computeLayers();
    } catch (error) {
      if (!(error instanceof DependencyCycleError)) {
        throw error;
      }

      const result = this.startupFailure('dependency_cycle', error.message, startTime, [error]);
      this.events.lifecycleManagerStartupFailed(result);
      return result;
    }

    this.isStarting = true;
    this.startupAbortRequested = false;
    this.startOrder = [];
    this.attachBus();

    this.logger.info('Starting {{count}} components in {{layers}} layers', {
      params: { count: records.length, layers: layers.length },
    });

    const attempted = new Set<string>();

    try {
      for (const layer of layers) {
        if (this.startupAbortRequested) {
          this.logger.warn('Shutdown requested during startup, rolling back');
          await this.rollbackStartup();

          return this.startupFailure('shutdown_requested', 'Shutdown requested during startup', startTime);
        }

        for (const name of layer) {
          attempted.add(name);
        }

        const outcomes = await Promise.all(
          layer.map((name) => this.initializeByName(name)),
        );

        const errors: ComponentInitializationError[] = [];

        for (const outcome of outcomes) {
          if (!outcome.success) {
            errors.push(outcome.error);
          }
        }

        if (errors.length > 0) {
          const failedComponents = errors.map((error) => error.additionalInfo.name);

          this.logger.error(
            'Startup failed ({{failed}}), rolling back {{started}} started components',
            {
              params: {
                failed: failedComponents.join(', '),
                started: this.startOrder.length,
              },
            },
          );

          await this.rollbackStartup();

          const result: StartupResult = {
            success: false,
            code: 'initialization_failed',
            reason: errors.map((error) => error.message).join('; '),
            error: errors[0],
            startedComponents: [],
            failedComponents,
            notStartedComponents: this.getComponentNames().filter(
              (name) => !attempted.has(name),
            ),
            errors,
            durationMS: Date.now() - startTime,
          };

          this.events.lifecycleManagerStartupFailed(result);

          return result;
        }
      }

      const durationMS = Date.now() - startTime;
      const startedComponents = this.getStartOrder();

      this.logger.success('All components started in {{durationMS}}ms', {
        params: { durationMS, started: startedComponents.length },
      });

      this.events.lifecycleManagerStarted(startedComponents, durationMS);

      return {
        success: true,
        startedComponents,
        failedComponents: [],
        notStartedComponents: [],
        errors: [],
        durationMS,
      };
    } finally {
      this.isStarting = false;
      this.publishSystemStatus();
    }
  }

  private async runShutdown(): Promise<ShutdownResult> {
    const startTime = Date.now();

    if (this.startupInFlight) {
      this.logger.warn('Shutdown requested during startup, waiting for the current layer');
      this.startupAbortRequested = true;
      await this.startupInFlight;
    }

    const order = [...this.startOrder].reverse();

    this.isShuttingDown = true;
    this.logger.info('Stopping {{count}} components', {
      params: { count: order.length, order },
    });
    this.events.lifecycleManagerShutdownInitiated(order);

    const stoppedComponents: string[] = [];
    const timedOutComponents: string[] = [];
    const failedComponents: string[] = [];

    try {
      for (const name of order) {
        const record = this.records.get(name);

        if (!record || !ACTIVE_STATES.includes(record.state)) {
          continue;
        }

        const outcome = await this.stopRecord(record);
        stoppedComponents.push(name);

        if (outcome.timedOut) {
          timedOutComponents.push(name);
        } else if (outcome.error) {
          failedComponents.push(name);
        }
      }
    } finally {
      this.isShuttingDown = false;
    }

    const result: ShutdownResult = {
      success: timedOutComponents.length === 0 && failedComponents.length === 0,
      stoppedComponents,
      timedOutComponents,
      failedComponents,
      durationMS: Date.now() - startTime,
    };

    this.logger[result.success ? 'success' : 'warn'](
      'Stopped {{stopped}} components in {{durationMS}}ms ({{timedOut}} timed out, {{failed}} failed)',
      {
        params: {
          stopped: stoppedComponents.length,
          durationMS: result.durationMS,
          timedOut: timedOutComponents.length,
          failed: failedComponents.length,
        },
      },
    );

    this.events.lifecycleManagerShutdownCompleted(result);
    this.publishSystemStatus();

    return result;
  }

  private initializeByName(name: string): Promise<InitializeOutcome> {
    const record = this.records.get(name);

    if (!record) {
      // unregisterComponent() is refused during startup
      return Promise.resolve({
        success: false,
        error: new ComponentInitializationError({ name, reason: 'invalid_state' }),
      });
    }

    return this.initializeRecord(record);
  }

  private async initializeRecord(record: ComponentRecord): Promise<InitializeOutcome> {
    const { component, name } = record;
    const logger = this.logger.entity(name);

    if (!this.transition(record, 'initializing')) {
      return {
        success: false,
        error: new ComponentInitializationError({ name, reason: 'invalid_state' }),
      };
    }

    record.lastError = null;
    logger.info('Initializing component');

    let initialized: InitializeResult;

    try {
      initialized = await runWithTimeout<InitializeResult>(
        () => component.initialize(),
        record.initializeTimeoutMS,
        () =>
          new ComponentInitializeTimeoutError({
            name,
            timeoutMS: record.initializeTimeoutMS,
          }),
        () => this.notifyInitializeAborted(record),
      );
    } catch (error) {
      const reason =
        error instanceof ComponentInitializeTimeoutError ? 'timeout' : 'threw';
      return this.failInitialization(
        record,
        new ComponentInitializationError({ name, reason }, error),
      );
    }

    if (initialized === false) {
      return this.failInitialization(
        record,
        new ComponentInitializationError({ name, reason: 'returned_false' }),
      );
    }

    component.setInitialized(true);

    try {
      this.subscribeComponent(record);
    } catch (error) {
      return this.failInitialization(
        record,
        new ComponentInitializationError({ name, reason: 'subscribe_failed' }, error),
      );
    }

    record.startedAt = Date.now();
    record.stoppedAt = null;
    this.startOrder.push(name);
    this.transition(record, 'running');

    return { success: true };
  }

  private subscribeComponent(record: ComponentRecord): void {
    const { component, name } = record;
    const eventTypes: EventType[] = component.getSubscribedEventTypes();

    if (eventTypes.length === 0) {
      return;
    }

    const bus = this.locator.get(ServiceKeys.MESSAGE_BUS);

    for (const eventType of eventTypes) {
      bus.subscribe(eventType, name, async (event, signal) => {
        await component.receive(event, signal);
      });
    }
  }

  private failInitialization(
    record: ComponentRecord,
    error: ComponentInitializationError,
  ): InitializeOutcome {
    const { component, name } = record;

    component.setInitialized(false);
    component.abortOffloadedWork();
    this.attachedBus?.removeSubscriber(name);

    record.lastError = error;
    this.transition(record, 'failed', error.message);

    this.logger.entity(name).errorObject('Initialization failed', error);
    this.events.componentInitializeFailed(name, error);

    return { success: false, error };
  }

  /**
   * Stop the components started so far, newest first
   */
  private async rollbackStartup(): Promise<void> {
    const order = [...this.startOrder].reverse();

    if (order.length === 0) {
      return;
    }

    this.logger.warn('Rolling back startup, stopping started components', {
      params: { components: order },
    });

    for (const name of order) {
      const record = this.records.get(name);

      if (!record || !ACTIVE_STATES.includes(record.state)) {
        continue;
      }

      this.events.componentStartupRollback(name);
      await this.stopRecord(record, 'startup rollback');
    }

    this.logger.info('Rollback completed');
  }

  /**
   * Drop subscriptions, abort offloaded work, then shutdown() under its
   * timeout. Always ends in `stopped`.
   */
  private async stopRecord(
    record: ComponentRecord,
    reason?: string,
  ): Promise<ComponentStopOutcome> {
    const { component, name } = record;
    const logger = this.logger.entity(name);

    if (!this.transition(record, 'stopping', reason)) {
      return { name, timedOut: false };
    }

    const discarded = this.attachedBus?.removeSubscriber(name) ?? 0;
    component.setInitialized(false);
    const aborted = component.abortOffloadedWork();

    logger.info('Stopping component', { params: { discarded, aborted } });

    let outcome: ComponentStopOutcome = { name, timedOut: false };

    try {
      await runWithTimeout(
        () => component.shutdown(),
        record.shutdownTimeoutMS,
        () =>
          new ComponentShutdownTimeoutError({
            name,
            timeoutMS: record.shutdownTimeoutMS,
          }),
        () => this.notifyShutdownAborted(record),
      );
    } catch (error) {
      if (error instanceof ComponentShutdownTimeoutError) {
        logger.warn('{{message}}, forcing stopped', {
          params: { message: error.message },
        });
        this.events.componentShutdownTimeout(name, error);
        outcome = { name, timedOut: true, error };
      } else {
        const err = toError(error);
        logger.errorObject('shutdown() failed, forcing stopped', err);
        this.events.componentShutdownFailed(name, err);
        outcome = { name, timedOut: false, error: err };
      }

      record.lastError = outcome.error ?? null;
    }

    record.stoppedAt = Date.now();
    this.startOrder = this.startOrder.filter((started) => started !== name);
    this.transition(record, 'stopped', outcome.error ? 'forced' : reason);

    return outcome;
  }

  private notifyInitializeAborted(record: ComponentRecord): void {
    const { component, name } = record;
    component.abortOffloadedWork();

    const hook = component.onInitializeAborted;

    if (hook) {
      safeHandleCallback(
        'onInitializeAborted',
        () => hook.call(component),
        (error, callbackName) =>
          this.logger.entity(name).errorObject(`${callbackName} failed`, error),
      );
    }
  }

  private notifyShutdownAborted(record: ComponentRecord): void {
    const { component, name } = record;
    const hook = component.onShutdownAborted;

    if (hook) {
      safeHandleCallback(
        'onShutdownAborted',
        () => hook.call(component),
        (error, callbackName) =>
          this.logger.entity(name).errorObject(`${callbackName} failed`, error),
      );
    }
  }

  // ============================================================================
  // State Transitions
  // ============================================================================

  /**
   * Apply a transition if the table allows it. Every applied transition is
   * logged, emitted and published as a `component-status` event.
   */
  private transition(
    record: ComponentRecord,
    to: ComponentState,
    reason?: string,
  ): boolean {
    const from = record.state;

    if (!ALLOWED_TRANSITIONS[from].includes(to)) {
      this.logger
        .entity(record.name)
        .warn('Refused illegal transition {{from}} -> {{to}}', {
          params: { from, to },
        });
      this.events.componentTransitionRefused(record.name, from, to);
      return false;
    }

    record.state = to;

    this.logger
      .entity(record.name)
      .info('{{previousState}} -> {{state}}', {
        params: { previousState: from, state: to, reason },
      });

    this.events.componentStateChanged({
      name: record.name,
      previousState: from,
      state: to,
      reason,
    });

    this.publishComponentStatus(record.name, from, to, reason);

    return true;
  }

  private publishComponentStatus(
    name: string,
    previousState: ComponentState,
    state: ComponentState,
    reason?: string,
  ): void {
    const bus = this.attachedBus;

    if (!this.publishStatusEvents || !bus || bus.isClosed) {
      return;
    }

    bus
      .publish(
        createEvent({
          type: 'component-status',
          payload: { name, previousState, state, reason },
          source: LIFECYCLE_MANAGER_SOURCE,
          idType: this.eventIdType,
        }),
      )
      .catch((error: unknown) => {
        this.logger.errorObject('Failed to publish component status', error);
      });
  }

  private publishSystemStatus(): void {
    const bus = this.attachedBus;

    if (!this.publishStatusEvents || !bus || bus.isClosed) {
      return;
    }

    bus
      .publish(
        createEvent({
          type: 'system-status',
          payload: {
            state: this.getSystemState(),
            running: this.getRunningComponentNames(),
            failed: this.getNamesInState('failed'),
          },
          source: LIFECYCLE_MANAGER_SOURCE,
          idType: this.eventIdType,
        }),
      )
      .catch((error: unknown) => {
        this.logger.errorObject('Failed to publish system status', error);
      });
  }

  // ============================================================================
  // Bus Integration
  // ============================================================================

  /**
   * Follow whichever bus the locator currently holds
   */
  private attachBus(): MessageBus | null {
    const bus = this.locator.getOptional(ServiceKeys.MESSAGE_BUS) ?? null;

    if (bus === this.attachedBus) {
      return bus;
    }

    this.detachFromBus();

    if (!bus) {
      return null;
    }

    bus.setSubscriberValidator((subscriberId) => this.records.has(subscriberId));

    this.busListenerRemovers = [
      bus.on('subscriber:degraded', ({ subscriberId, lastError }) => {
        this.handleSubscriberDegraded(subscriberId, lastError);
      }),
      bus.on('subscriber:recovered', ({ subscriberId }) => {
        this.handleSubscriberRecovered(subscriberId);
      }),
    ];

    this.attachedBus = bus;

    return bus;
  }

  private handleSubscriberDegraded(subscriberId: string, lastError: Error): void {
    const record = this.records.get(subscriberId);

    if (!record || record.state !== 'running') {
      return;
    }

    record.lastError = lastError;
    this.transition(record, 'degraded', lastError.message);
  }

  private handleSubscriberRecovered(subscriberId: string): void {
    const record = this.records.get(subscriberId);

    if (!record || record.state !== 'degraded') {
      return;
    }

    this.transition(record, 'running', 'handler recovered');
  }

  // ============================================================================
  // Dependency Graph
  // ============================================================================

  /**
   * Walk dependency edges from `name` (using the proposed `dependencies`)
   * and return the path back to `name`, if there is one. The registered
   * graph is acyclic, so any new cycle runs through the new node.
   */
  private findCycleThrough(name: string, dependencies: string[]): string[] | null {
    const visited = new Set<string>();
    const path: string[] = [name];

    const visit = (current: string): boolean => {
      const edges =
        current === name
          ? dependencies
          : (this.records.get(current)?.dependencies ?? []);

      for (const dependency of edges) {
        if (dependency === name) {
          return true;
        }

        if (visited.has(dependency) || !this.records.has(dependency)) {
          continue;
        }

        visited.add(dependency);
        path.push(dependency);

        if (visit(dependency)) {
          return true;
        }

        path.pop();
      }

      return false;
    };

    return visit(name) ? path : null;
  }

  /**
   * @throws {DependencyCycleError} If some components can never be placed
   */
  private computeLayers(): string[][] {
    const placed = new Set<string>();
    const layers: string[][] = [];
    const records = [...this.records.values()];

    while (placed.size < records.length) {
      const layer = records
        .filter(
          (record) =>
            !placed.has(record.name) &&
            record.dependencies.every(
              (dependency) => placed.has(dependency) || !this.records.has(dependency),
            ),
        )
        .map((record) => record.name);

      if (layer.length === 0) {
        throw new DependencyCycleError({
          cycle: records
            .filter((record) => !placed.has(record.name))
            .map((record) => record.name),
        });
      }

      for (const name of layer) {
        placed.add(name);
      }

      layers.push(layer);
    }

    return layers;
  }

  private getRunningDependents(name: string): string[] {
    return [...this.records.values()]
      .filter(
        (record) =>
          record.dependencies.includes(name) &&
          ACTIVE_STATES.includes(record.state),
      )
      .map((record) => record.name);
  }

  // ============================================================================
  // Helpers
  // ============================================================================

  private getNamesInState(state: ComponentState): string[] {
    return [...this.records.values()]
      .filter((record) => record.state === state)
      .map((record) => record.name);
  }

  private toStatus(record: ComponentRecord): ComponentStatus {
    return {
      name: record.name,
      role: record.role,
      state: record.state,
      dependencies: [...record.dependencies],
      registrationIndex: record.registrationIndex,
      startedAt: record.startedAt,
      stoppedAt: record.stoppedAt,
      lastError: record.lastError,
    };
  }

  private runMonitoredHealthCheck(): void {
    if (this.healthCheckInFlight) {
      return;
    }

    this.healthCheckInFlight = true;

    this.checkAllHealth()
      .then((report) => {
        for (const result of report.components) {
          if (!result.healthy && result.code !== 'not_running') {
            this.logger.entity(result.name).warn('Unhealthy: {{message}}', {
              params: { message: result.message ?? result.code },
            });
          }
        }

        this.events.lifecycleManagerHealthReport(report);
      })
      .catch((error: unknown) => {
        this.logger.errorObject('Health monitor check failed', error);
      })
      .finally(() => {
        this.healthCheckInFlight = false;
      });
  }

  private boundedDefault(
    field: string,
    value: number | undefined,
    fallback: number,
  ): number {
    if (value === undefined) {
      return fallback;
    }

    if (isBoundedTimeout(value)) {
      return value;
    }

    this.logger.warn('{{field}} must be positive, using {{fallback}}ms instead of {{value}}', {
      params: { field, value, fallback },
    });

    return fallback;
  }

  private rejectRegistration(
    name: string,
    code: RegistrationFailureCode,
    message: string,
  ): RegisterComponentResult {
    const error = new ComponentRegistrationError(message, { name, code });

    this.logger.entity(name).warn('Registration rejected: {{message}}', {
      params: { message },
    });
    this.events.componentRegistrationRejected({ name, reason: code, message });

    return {
      success: false,
      componentName: name,
      code,
      reason: message,
      error,
      registrationIndex: null,
      dependencies: [],
    };
  }

  private startupFailure(
    code: StartupFailureCode,
    reason: string,
    startTime: number,
    errors: StartupResult['errors'] = [],
  ): StartupResult {
    return {
      success: false,
      code,
      reason,
      error: errors[0],
      startedComponents: [],
      failedComponents: [],
      notStartedComponents: this.getComponentNames().filter(
        (name) => !this.isComponentRunning(name),
      ),
      errors,
      durationMS: Date.now() - startTime,
    };
  }

  private bulkOperationRejection(name: string): ComponentOperationResult {
    this.logger.entity(name).warn('Cannot change component during bulk operation', {
      params: { isStarting: this.isStarting, isShuttingDown: this.isShuttingDown },
    });

    return {
      success: false,
      componentName: name,
      code: 'bulk_operation_in_progress',
      reason: this.isStarting ? 'Bulk startup in progress' : 'Shutdown in progress',
    };
  }

  private notFound(name: string): ComponentOperationResult {
    return {
      success: false,
      componentName: name,
      code: 'component_not_found',
      reason: `Component "${name}" is not registered`,
    };
  }
}
