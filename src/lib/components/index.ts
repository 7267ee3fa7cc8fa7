export { InputComponent } from './input-component';
export { ProcessorComponent } from './processor-component';
export { OutputComponent } from './output-component';
export { ActionComponent } from './action-component';
export type {
  RoleComponentOptions,
  InputEmit,
  InputSource,
  InputComponentOptions,
  InferenceOutput,
  InferenceStrategy,
  ProcessorComponentOptions,
  ProcessorStatistics,
  OutputRenderer,
  OutputComponentOptions,
  ActionExecutor,
  ActionComponentOptions,
  ActionRecord,
  ActionStatistics,
} from './types';
