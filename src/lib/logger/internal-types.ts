import type { LogOptions, LogType } from './types';

/**
 * Options handleLog accepts on top of the public LogOptions
 */
export interface HandleLogOptions extends LogOptions {
  serviceName?: string;
  entityName?: string;
  error?: unknown;
}

export type HandleLog = (
  type: LogType,
  template: string,
  options?: HandleLogOptions,
) => void;
