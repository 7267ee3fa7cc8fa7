/**
 * LifecycleManager - dependency-ordered startup, supervision and ordered
 * shutdown of runtime components
 *
 * - Registration rejects names that aren't kebab-case, duplicates and
 *   dependency cycles
 * - Startup runs Kahn layers concurrently and rolls back on any failure
 * - Shutdown runs in exact reverse of the achieved start order
 * - Bus degradation signals move components between running and degraded
 *
 * @module lifecycle-manager
 */

// Core classes
export { LifecycleManager } from './lifecycle-manager';
export { BaseComponent, type OffloadOptions } from './base-component';
export { ComponentContext, type ComponentContextHost } from './component-context';
export {
  LifecycleManagerEvents,
  type LifecycleManagerEventMap,
  type LifecycleManagerEventName,
  type LifecycleManagerEmit,
} from './events';

// Types
export { COMPONENT_ROLES } from './types';
export type {
  ComponentRole,
  ComponentOptions,
  ComponentState,
  ComponentStatus,
  ComponentContextRef,
  ComponentHealthResult,
  InitializeResult,
  HandleEventResult,
  LifecycleManagerOptions,
  RegisterComponentOptions,
  RegisterComponentResult,
  RegistrationFailureCode,
  UnregisterComponentResult,
  UnregisterFailureCode,
  BaseOperationResult,
  ComponentOperationResult,
  ComponentOperationFailureCode,
  StopComponentOptions,
  RestartComponentOptions,
  StartupResult,
  StartupFailureCode,
  ShutdownResult,
  ComponentStopOutcome,
  StartupOrderResult,
  StartupLayersResult,
  DependencyValidationResult,
  HealthCheckResult,
  HealthReport,
  SystemState,
} from './types';

// Errors
export {
  InvalidComponentNameError,
  ComponentRegistrationError,
  DependencyCycleError,
  MissingDependencyError,
  ComponentNotInitializedError,
  ComponentInitializationError,
  ComponentInitializeTimeoutError,
  ComponentShutdownTimeoutError,
  ComponentHealthCheckTimeoutError,
  OffloadedWorkTimeoutError,
  type InitializationFailureReason,
} from './errors';
