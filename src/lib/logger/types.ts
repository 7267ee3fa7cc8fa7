/**
 * Log level enum for filtering logs by severity
 * Lower numbers = more important
 */
export enum LogLevel {
  ERROR = 0,
  WARN = 1,
  NOTICE = 2,
  SUCCESS = 3,
  // eslint-disable-next-line @typescript-eslint/no-duplicate-enum-values
  INFO = 3, // routine operational info, same weight as SUCCESS
  DEBUG = 4,
  RAW = 99,
}

export type LogType =
  | 'error'
  | 'info'
  | 'warn'
  | 'success'
  | 'notice'
  | 'debug'
  | 'raw';

/** Level names accepted from configuration */
export const LOG_LEVEL_NAMES = [
  'error',
  'warn',
  'notice',
  'info',
  'debug',
] as const;

export type LogLevelName = (typeof LOG_LEVEL_NAMES)[number];

export function getLogLevel(type: LogType): LogLevel {
  switch (type) {
    case 'error':
      return LogLevel.ERROR;
    case 'warn':
      return LogLevel.WARN;
    case 'notice':
      return LogLevel.NOTICE;
    case 'success':
      return LogLevel.SUCCESS;
    case 'info':
      return LogLevel.INFO;
    case 'debug':
      return LogLevel.DEBUG;
    case 'raw':
      return LogLevel.RAW;
  }
}

export function logLevelFromName(name: LogLevelName): LogLevel {
  switch (name) {
    case 'error':
      return LogLevel.ERROR;
    case 'warn':
      return LogLevel.WARN;
    case 'notice':
      return LogLevel.NOTICE;
    case 'info':
      return LogLevel.INFO;
    case 'debug':
      return LogLevel.DEBUG;
  }
}

export interface LogOptions {
  exitCode?: number;
  params?: Record<string, unknown>;
  tags?: string[];
}

/**
 * Complete log entry handed to every sink
 */
export interface LogEntry {
  timestamp: number;
  type: LogType;
  serviceName?: string; // e.g. 'message-bus'
  entityName?: string; // e.g. a component or subscriber id
  template: string; // "Component {{name}} started"
  message: string; // "Component nlp started"
  params?: Record<string, unknown>;
  error?: unknown; // original error from errorObject() calls
  exitCode?: number;
  tags?: string[];
}

export interface LogSink {
  write(entry: LogEntry): void | Promise<void>;
  close?(): void | Promise<void>;
}

/**
 * Result from beforeExit callback indicating whether to proceed with exit
 * - 'proceed': continue with process exit
 * - 'wait': shutdown already in progress, let it finish the exit
 */
export interface BeforeExitResult {
  action: 'proceed' | 'wait';
}

export type BeforeExitCallback = (
  exitCode: number,
  isFirstExit: boolean,
) => BeforeExitResult | Promise<BeforeExitResult>;

/**
 * Receives an entry and returns a replacement, or false to keep the original
 */
export type ArrayLogTransformer = (entry: LogEntry) => LogEntry | false;

export type SinkErrorHandler = (
  error: Error,
  context: 'write' | 'close',
  sink: LogSink,
) => void;

export interface LoggerOptions {
  sinks?: LogSink[];
  callProcessExit?: boolean;
  beforeExitCallback?: BeforeExitCallback;
  onSinkError?: SinkErrorHandler;
}

export type LoggerEvent =
  | {
      eventType: 'log';
      logType: LogType;
      message: string;
      timestamp: number;
    }
  | { eventType: 'exit-called'; code: number; isFirstExit: boolean }
  | { eventType: 'exit-process'; code: number }
  | { eventType: 'close' };

export interface LoggerEventMap {
  logger: LoggerEvent;
}
