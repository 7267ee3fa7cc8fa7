import type {
  ComponentInitializationError,
  ComponentShutdownTimeoutError,
} from './errors';
import type {
  ComponentRole,
  ComponentState,
  HealthCheckResult,
  HealthReport,
  RegistrationFailureCode,
  ShutdownResult,
  StartupResult,
} from './types';

export interface LifecycleManagerEventMap {
  'component:registered': {
    name: string;
    role: ComponentRole;
    registrationIndex: number;
    dependencies: string[];
  };
  'component:registration-rejected': {
    name: string;
    reason: RegistrationFailureCode;
    message: string;
    cycle?: string[];
  };
  'component:unregistered': { name: string };
  'component:state-changed': {
    name: string;
    previousState: ComponentState;
    state: ComponentState;
    reason?: string;
  };
  'component:transition-refused': {
    name: string;
    from: ComponentState;
    to: ComponentState;
  };
  'component:initialize-failed': {
    name: string;
    error: ComponentInitializationError;
  };
  'component:shutdown-timeout': {
    name: string;
    error: ComponentShutdownTimeoutError;
  };
  'component:shutdown-failed': { name: string; error: Error };
  'component:startup-rollback': { name: string };
  'component:health-check-completed': HealthCheckResult;
  'lifecycle-manager:started': {
    startedComponents: string[];
    durationMS: number;
  };
  'lifecycle-manager:startup-failed': StartupResult;
  'lifecycle-manager:shutdown-initiated': { components: string[] };
  'lifecycle-manager:shutdown-completed': ShutdownResult;
  'lifecycle-manager:health-report': HealthReport;
}

export type LifecycleManagerEventName = keyof LifecycleManagerEventMap;

export type LifecycleManagerEmit = <K extends LifecycleManagerEventName>(
  event: K,
  data: LifecycleManagerEventMap[K],
) => void;

export class LifecycleManagerEvents {
  constructor(private readonly emit: LifecycleManagerEmit) {}

  public componentRegistered(
    input: LifecycleManagerEventMap['component:registered'],
  ): void {
    this.emit('component:registered', input);
  }

  public componentRegistrationRejected(
    input: LifecycleManagerEventMap['component:registration-rejected'],
  ): void {
    this.emit('component:registration-rejected', input);
  }

  public componentUnregistered(name: string): void {
    this.emit('component:unregistered', { name });
  }

  public componentStateChanged(
    input: LifecycleManagerEventMap['component:state-changed'],
  ): void {
    this.emit('component:state-changed', input);
  }

  public componentTransitionRefused(
    name: string,
    from: ComponentState,
    to: ComponentState,
  ): void {
    this.emit('component:transition-refused', { name, from, to });
  }

  public componentInitializeFailed(
    name: string,
    error: ComponentInitializationError,
  ): void {
    this.emit('component:initialize-failed', { name, error });
  }

  public componentShutdownTimeout(
    name: string,
    error: ComponentShutdownTimeoutError,
  ): void {
    this.emit('component:shutdown-timeout', { name, error });
  }

  public componentShutdownFailed(name: string, error: Error): void {
    this.emit('component:shutdown-failed', { name, error });
  }

  public componentStartupRollback(name: string): void {
    this.emit('component:startup-rollback', { name });
  }

  public componentHealthCheckCompleted(result: HealthCheckResult): void {
    this.emit('component:health-check-completed', result);
  }

  public lifecycleManagerStarted(
    startedComponents: string[],
    durationMS: number,
  ): void {
    this.emit('lifecycle-manager:started', { startedComponents, durationMS });
  }

  public lifecycleManagerStartupFailed(result: StartupResult): void {
    this.emit('lifecycle-manager:startup-failed', result);
  }

  public lifecycleManagerShutdownInitiated(components: string[]): void {
    this.emit('lifecycle-manager:shutdown-initiated', { components });
  }

  public lifecycleManagerShutdownCompleted(result: ShutdownResult): void {
    this.emit('lifecycle-manager:shutdown-completed', result);
  }

  public lifecycleManagerHealthReport(report: HealthReport): void {
    this.emit('lifecycle-manager:health-report', report);
  }
}
