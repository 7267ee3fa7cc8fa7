import type { Logger } from '../logger';
import type { RuntimeConfig, RuntimeConfigInput } from '../config';
import type { PermissionPolicy } from '../permissions';
import type { ServiceLocator } from '../service-locator';
import type { BusShutdownResult, MessageBusStatistics } from '../message-bus';
import type { BaseComponent } from '../lifecycle-manager/base-component';
import type {
  ComponentStatus,
  RegisterComponentResult,
  ShutdownResult,
  SystemState,
} from '../lifecycle-manager/types';

export interface RuntimeOptions {
  /** Raw configuration document; validated and frozen (default: all defaults) */
  config?: RuntimeConfigInput;
  /** Environment for `SWITCHYARD_*` overrides; omit to skip them */
  env?: NodeJS.ProcessEnv;
  /** Root logger; by default a ConsoleSink logger built from `config.logging` */
  logger?: Logger;
  /** Register extra services before the locator is sealed */
  registerServices?: (locator: ServiceLocator) => void;
}

/**
 * What a component factory gets to build its component with
 */
export interface ComponentFactoryContext {
  name: string;
  logger: Logger;
  config: RuntimeConfig;
  locator: ServiceLocator;
  policy: PermissionPolicy;
  /** `components[name].options` from the configuration */
  options: Readonly<Record<string, unknown>>;
}

export type ComponentFactory = (context: ComponentFactoryContext) => BaseComponent;

export type AddComponentResult =
  | RegisterComponentResult
  | {
      success: false;
      componentName: string;
      code: 'component_disabled';
      reason: string;
    };

export interface RuntimeStopResult {
  components: ShutdownResult;
  bus: BusShutdownResult;
}

export interface RuntimeStatus {
  state: SystemState;
  started: boolean;
  stopped: boolean;
  components: ComponentStatus[];
  bus: MessageBusStatistics;
}
