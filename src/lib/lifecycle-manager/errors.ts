import {
  ConfigurationError,
  HandlerFailure,
  InitializationFailure,
  ShutdownTimeout,
} from '../errors';

/**
 * Error thrown when a component name doesn't match kebab-case validation
 *
 * Component names must match the pattern: `/^[a-z][a-z0-9]*(-[a-z0-9]+)*$/`
 *
 * Valid names: 'keyboard', 'speech-output', 'nlp-v2'
 * Invalid names: 'Keyboard', 'speech_output', 'SpeechOutput', '', 'my input'
 */
export class InvalidComponentNameError extends ConfigurationError<{
  name: string;
}> {
  public readonly errPrefix = 'LifecycleManagerErr';
  public readonly errType = 'Component';
  public readonly errCode = 'InvalidName';

  constructor(additionalInfo: { name: string }) {
    super(
      `Invalid component name: "${additionalInfo.name}". Component names must be kebab-case (lowercase letters, numbers, and hyphens only).`,
      additionalInfo,
    );
  }
}

/**
 * Error thrown when component registration fails
 *
 * Common causes:
 * - Duplicate component name or instance
 * - Registration attempted during startup or shutdown
 */
export class ComponentRegistrationError extends ConfigurationError {
  public readonly errPrefix = 'LifecycleManagerErr';
  public readonly errType = 'Component';
  public readonly errCode = 'RegistrationFailed';

  constructor(message: string, additionalInfo: Record<string, unknown> = {}) {
    super(message, additionalInfo);
  }
}

/**
 * Error thrown when a registration would close a dependency cycle
 *
 * Example: keyboard depends on nlp, nlp depends on speech, speech depends on keyboard
 */
export class DependencyCycleError extends ConfigurationError<{
  cycle: string[];
}> {
  public readonly errPrefix = 'LifecycleManagerErr';
  public readonly errType = 'Dependency';
  public readonly errCode = 'CyclicDependency';

  constructor(additionalInfo: { cycle: string[] }) {
    super(
      `Circular dependency detected: ${additionalInfo.cycle.join(' -> ')} -> ${additionalInfo.cycle[0]}`,
      additionalInfo,
    );
  }
}

/**
 * Error thrown when a component depends on another component that doesn't exist
 */
export class MissingDependencyError extends ConfigurationError<{
  componentName: string;
  missingDependency: string;
}> {
  public readonly errPrefix = 'LifecycleManagerErr';
  public readonly errType = 'Dependency';
  public readonly errCode = 'NotFound';

  constructor(additionalInfo: {
    componentName: string;
    missingDependency: string;
  }) {
    super(
      `Component "${additionalInfo.componentName}" depends on "${additionalInfo.missingDependency}", but it is not registered.`,
      additionalInfo,
    );
  }
}

/**
 * Error thrown when a component is used before the manager has attached it
 * or before its initialize() succeeded
 */
export class ComponentNotInitializedError extends ConfigurationError<{
  name: string;
  operation: string;
}> {
  public readonly errPrefix = 'LifecycleManagerErr';
  public readonly errType = 'Component';
  public readonly errCode = 'NotInitialized';

  constructor(additionalInfo: { name: string; operation: string }) {
    super(
      `Component "${additionalInfo.name}" cannot ${additionalInfo.operation} before it is initialized`,
      additionalInfo,
    );
  }
}

export type InitializationFailureReason =
  | 'returned_false'
  | 'threw'
  | 'timeout'
  | 'subscribe_failed'
  | 'invalid_state';

/**
 * One per component that failed during startup
 */
export class ComponentInitializationError extends InitializationFailure<{
  name: string;
  reason: InitializationFailureReason;
}> {
  public readonly errPrefix = 'LifecycleManagerErr';
  public readonly errType = 'Component';
  public readonly errCode = 'InitializationFailed';

  constructor(
    additionalInfo: { name: string; reason: InitializationFailureReason },
    cause?: unknown,
  ) {
    super(
      ComponentInitializationError.describe(additionalInfo, cause),
      additionalInfo,
      cause,
    );
  }

  private static describe(
    info: { name: string; reason: InitializationFailureReason },
    cause: unknown,
  ): string {
    switch (info.reason) {
      case 'returned_false':
        return `Component "${info.name}" failed to initialize: initialize() returned false`;
      case 'timeout':
        return `Component "${info.name}" failed to initialize: timed out`;
      case 'invalid_state':
        return `Component "${info.name}" cannot be initialized from its current state`;
      case 'threw':
      case 'subscribe_failed': {
        const detail = cause instanceof Error ? cause.message : String(cause);
        return `Component "${info.name}" failed to initialize: ${detail}`;
      }
    }
  }
}

/**
 * Error thrown when initialize() exceeds the component's timeout
 */
export class ComponentInitializeTimeoutError extends InitializationFailure<{
  name: string;
  timeoutMS: number;
}> {
  public readonly errPrefix = 'LifecycleManagerErr';
  public readonly errType = 'Component';
  public readonly errCode = 'InitializeTimeout';

  constructor(additionalInfo: { name: string; timeoutMS: number }) {
    super(
      `Component "${additionalInfo.name}" initialize() timed out after ${additionalInfo.timeoutMS}ms`,
      additionalInfo,
    );
  }
}

/**
 * Error thrown when shutdown() exceeds the component's timeout.
 * The component is forced to `stopped` anyway.
 */
export class ComponentShutdownTimeoutError extends ShutdownTimeout<{
  name: string;
  timeoutMS: number;
}> {
  public readonly errPrefix = 'LifecycleManagerErr';
  public readonly errType = 'Component';
  public readonly errCode = 'ShutdownTimeout';

  constructor(additionalInfo: { name: string; timeoutMS: number }) {
    super(
      `Component "${additionalInfo.name}" shutdown() timed out after ${additionalInfo.timeoutMS}ms`,
      additionalInfo,
    );
  }
}

/**
 * Error thrown when healthCheck() exceeds the component's timeout
 */
export class ComponentHealthCheckTimeoutError extends HandlerFailure<{
  name: string;
  timeoutMS: number;
}> {
  public readonly errPrefix = 'LifecycleManagerErr';
  public readonly errType = 'Component';
  public readonly errCode = 'HealthCheckTimeout';

  constructor(additionalInfo: { name: string; timeoutMS: number }) {
    super(
      `Component "${additionalInfo.name}" healthCheck() timed out after ${additionalInfo.timeoutMS}ms`,
      additionalInfo,
    );
  }
}

/**
 * Offloaded work ran past its timeout and was aborted
 */
export class OffloadedWorkTimeoutError extends HandlerFailure<{
  name: string;
  timeoutMS: number;
}> {
  public readonly errPrefix = 'LifecycleManagerErr';
  public readonly errType = 'Component';
  public readonly errCode = 'OffloadTimeout';

  constructor(additionalInfo: { name: string; timeoutMS: number }) {
    super(
      `Offloaded work of component "${additionalInfo.name}" timed out after ${additionalInfo.timeoutMS}ms`,
      additionalInfo,
    );
  }
}
