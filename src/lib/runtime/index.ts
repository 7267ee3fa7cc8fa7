export { Runtime } from './runtime';
export * from './errors';
export type {
  RuntimeOptions,
  ComponentFactoryContext,
  ComponentFactory,
  AddComponentResult,
  RuntimeStopResult,
  RuntimeStatus,
} from './types';
