import { ConfigurationError, InitializationFailure } from '../errors';
import {
  loadConfig,
  loadConfigFile,
  type RuntimeConfig,
} from '../config';
import { ConsoleSink, Logger, logLevelFromName, type LoggerService } from '../logger';
import { MessageBus } from '../message-bus';
import { PermissionPolicy } from '../permissions';
import { ServiceKeys, ServiceLocator } from '../service-locator';
import { LifecycleManager } from '../lifecycle-manager/lifecycle-manager';
import { ComponentRegistrationError } from '../lifecycle-manager/errors';
import type { StartupResult } from '../lifecycle-manager/types';
import { RuntimeStartupError } from './errors';
import type {
  AddComponentResult,
  ComponentFactory,
  RuntimeOptions,
  RuntimeStatus,
  RuntimeStopResult,
} from './types';

/**
 * Bootstrap facade: builds the logger, locator, bus, permission policy and
 * lifecycle manager from one configuration document, and owns their order
 * of teardown.
 *
 * ```typescript
 * const runtime = await Runtime.fromConfigFile('switchyard.json', {
 *   env: process.env,
 * });
 *
 * runtime.addComponent('keyboard', ({ logger }) =>
 *   new InputComponent(logger, { name: 'keyboard', source }),
 * );
 * runtime.attachToLoggerExit();
 *
 * await runtime.start();
 * ```
 */
export class Runtime {
  public readonly config: RuntimeConfig;
  public readonly logger: Logger;
  public readonly locator: ServiceLocator;
  public readonly bus: MessageBus;
  public readonly policy: PermissionPolicy;
  public readonly manager: LifecycleManager;

  private readonly runtimeLogger: LoggerService;
  private readonly registrationErrors: ConfigurationError[] = [];
  private readonly disabledComponents = new Set<string>();

  private startAttempted = false;
  private stopInFlight: Promise<RuntimeStopResult> | null = null;

  /**
   * @throws {InvalidConfigurationError} If the configuration does not validate
   */
  constructor(options: RuntimeOptions = {}) {
    this.config = loadConfig(options.config ?? {}, { env: options.env });
    this.logger = options.logger ?? Runtime.createLogger(this.config);
    this.runtimeLogger = this.logger.service('runtime');

    const { bus: busConfig, lifecycle, security } = this.config;

    this.bus = new MessageBus(this.logger, {
      queueCapacity: busConfig.queueCapacity,
      backpressure: busConfig.backpressure,
      blockTimeoutMS: busConfig.blockTimeoutMS,
      handlerTimeoutMS: busConfig.handlerTimeoutMS,
      failureThreshold: busConfig.failureThreshold,
      historySize: busConfig.historySize,
      drainOnShutdown: busConfig.drainOnShutdown,
      drainTimeoutMS: busConfig.drainTimeoutMS,
      idType: busConfig.eventIdType,
    });

    this.policy = new PermissionPolicy(this.logger, {
      level: security.permissionLevel,
      allowLists: security.allowLists,
      allowListEnabled: security.allowListEnabled,
      auditLogging: security.auditLogging,
    });

    this.locator = new ServiceLocator();
    this.locator.register(ServiceKeys.RUNTIME_CONFIG, this.config);
    this.locator.register(ServiceKeys.ROOT_LOGGER, this.logger);
    this.locator.register(ServiceKeys.MESSAGE_BUS, this.bus);
    options.registerServices?.(this.locator);
    this.locator.seal();

    this.manager = new LifecycleManager(this.logger, this.locator, {
      initializeTimeoutMS: lifecycle.initializeTimeoutMS,
      shutdownTimeoutMS: lifecycle.shutdownTimeoutMS,
      eventIdType: busConfig.eventIdType,
    });

    this.runtimeLogger.info('Runtime created', {
      params: {
        backpressure: busConfig.backpressure,
        queueCapacity: busConfig.queueCapacity,
        permissionLevel: security.permissionLevel,
      },
    });
  }

  /**
   * @throws {InvalidConfigurationError} If the file can't be read or doesn't validate
   */
  public static async fromConfigFile(
    path: string,
    options: Omit<RuntimeOptions, 'config'> = {},
  ): Promise<Runtime> {
    const config = await loadConfigFile(path, { env: options.env });
    return new Runtime({ ...options, config });
  }

  /**
   * Console logger honouring `config.logging`
   */
  public static createLogger(config: RuntimeConfig): Logger {
    return new Logger({
      sinks: [
        new ConsoleSink({
          colors: config.logging.colors,
          timestamps: config.logging.timestamps,
          minLevel: logLevelFromName(config.logging.level),
        }),
      ],
    });
  }

  // ============================================================================
  // Components
  // ============================================================================

  /**
   * Build and register a component, applying `components[name]` from the
   * configuration: `enabled`, timeouts and extra dependencies.
   *
   * Registration failures are returned and also kept; start() throws them.
   *
   * @throws {ComponentRegistrationError} If the factory builds a component with another name
   */
  public addComponent(name: string, factory: ComponentFactory): AddComponentResult {
    const componentConfig = this.config.components[name];

    if (componentConfig?.enabled === false) {
      this.disabledComponents.add(name);
      this.runtimeLogger.info('Component {{name}} is disabled by configuration', {
        params: { name },
      });

      return {
        success: false,
        componentName: name,
        code: 'component_disabled',
        reason: `Component "${name}" is disabled by configuration`,
      };
    }

    const component = factory({
      name,
      logger: this.logger,
      config: this.config,
      locator: this.locator,
      policy: this.policy,
      options: componentConfig?.options ?? {},
    });

    if (component.getName() !== name) {
      throw new ComponentRegistrationError(
        `Factory for "${name}" built a component named "${component.getName()}"`,
        { name, builtName: component.getName() },
      );
    }

    const result = this.manager.registerComponent(component, {
      extraDependencies: componentConfig?.dependencies,
      initializeTimeoutMS: componentConfig?.initializeTimeoutMS,
      shutdownTimeoutMS: componentConfig?.shutdownTimeoutMS,
    });

    if (
      !result.success &&
      result.code !== 'bulk_operation_in_progress' &&
      result.error instanceof ConfigurationError
    ) {
      this.registrationErrors.push(result.error);
    }

    return result;
  }

  public isComponentDisabled(name: string): boolean {
    return this.disabledComponents.has(name);
  }

  // ============================================================================
  // Start / Stop
  // ============================================================================

  /**
   * Start every registered component
   *
   * Throws only for configuration errors, and for initialization failures
   * of the first startup. Later startups report failures in the result.
   *
   * @throws {RuntimeStartupError}
   */
  public async start(): Promise<StartupResult> {
    if (this.stopInFlight) {
      throw new RuntimeStartupError({
        failure: 'stopped',
        errors: [new Error('Runtime has been stopped')],
      });
    }

    const isFirstStartup = !this.startAttempted;
    this.startAttempted = true;

    if (this.registrationErrors.length > 0) {
      const error = new RuntimeStartupError({
        failure: 'configuration',
        errors: [...this.registrationErrors],
      });

      this.runtimeLogger.errorObject('Refusing to start', error);
      throw error;
    }

    this.warnAboutUnknownComponents();

    const result = await this.manager.startAllComponents();

    if (result.success) {
      const intervalMS = this.config.lifecycle.healthCheckIntervalMS;

      if (this.manager.startHealthMonitor(intervalMS)) {
        this.runtimeLogger.info('Health monitor running every {{intervalMS}}ms', {
          params: { intervalMS },
        });
      }

      return result;
    }

    const configurationErrors = result.errors.filter(
      (error) => error instanceof ConfigurationError,
    );

    if (configurationErrors.length > 0) {
      throw new RuntimeStartupError({
        failure: 'configuration',
        errors: configurationErrors,
        startup: result,
      });
    }

    const initializationErrors = result.errors.filter(
      (error) => error instanceof InitializationFailure,
    );

    if (isFirstStartup && initializationErrors.length > 0) {
      throw new RuntimeStartupError({
        failure: 'initialization',
        errors: initializationErrors,
        startup: result,
      });
    }

    this.runtimeLogger.warn('Startup failed: {{reason}}', {
      params: { reason: result.reason ?? result.code },
    });

    return result;
  }

  /**
   * Stop every component in reverse start order, then shut the bus down.
   * Safe to call more than once; later calls share the first one's result.
   */
  public stop(): Promise<RuntimeStopResult> {
    if (!this.stopInFlight) {
      this.stopInFlight = this.performStop();
    }

    return this.stopInFlight;
  }

  /**
   * Stop the runtime before the process exits through `logger.exit()`
   */
  public attachToLoggerExit(): void {
    this.logger.setBeforeExitCallback(async (exitCode, isFirstExit) => {
      if (!isFirstExit) {
        return { action: 'wait' };
      }

      this.runtimeLogger.info('Exit requested with code {{exitCode}}, stopping', {
        params: { exitCode },
      });

      await this.stop();

      return { action: 'proceed' };
    });
  }

  public isStopped(): boolean {
    return this.stopInFlight !== null;
  }

  public getStatus(): RuntimeStatus {
    return {
      state: this.manager.getSystemState(),
      started: this.startAttempted,
      stopped: this.isStopped(),
      components: this.manager.getAllComponentStatuses(),
      bus: this.bus.getStatistics(),
    };
  }

  private async performStop(): Promise<RuntimeStopResult> {
    this.manager.stopHealthMonitor();

    const components = await this.manager.stopAllComponents();
    const bus = await this.bus.shutdown({
      drain: this.config.bus.drainOnShutdown,
      timeoutMS: this.config.bus.drainTimeoutMS,
    });

    this.manager.detachFromBus();

    this.runtimeLogger[components.success && !bus.timedOut ? 'success' : 'warn'](
      'Runtime stopped ({{stopped}} components, {{discarded}} events discarded)',
      {
        params: {
          stopped: components.stoppedComponents.length,
          discarded: bus.discarded,
        },
      },
    );

    return { components, bus };
  }

  private warnAboutUnknownComponents(): void {
    for (const name of Object.keys(this.config.components)) {
      if (!this.manager.hasComponent(name) && !this.disabledComponents.has(name)) {
        this.runtimeLogger.warn('Configuration mentions unknown component {{name}}', {
          params: { name },
        });
      }
    }
  }
}
