import { EventEmitterProtected } from '../event-emitter';
import { safeHandleCallbackAndWait } from '../safe-handle-callback';
import { isPromise } from '../is-promise';
import type {
  BeforeExitCallback,
  LogEntry,
  LoggerEventMap,
  LoggerOptions,
  LogOptions,
  LogSink,
  LogType,
  SinkErrorHandler,
  ArrayLogTransformer,
} from './types';
import type { HandleLogOptions } from './internal-types';
import { ArraySink } from './sinks/array';
import { ConsoleSink } from './sinks/console';
import { prepareErrorObjectLog } from './utils/error-object';
import { renderTemplate } from './utils/template';
import { LoggerService } from './logger-service';

function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}

/**
 * Sink-based logger. Every entry is templated once and handed to each sink;
 * a failing sink is reported through `onSinkError` and never interrupts the
 * caller or the other sinks.
 */
export class Logger extends EventEmitterProtected<LoggerEventMap> {
  private sinks: LogSink[];
  private readonly callProcessExit: boolean;
  private beforeExitCallback?: BeforeExitCallback;
  private readonly onSinkError?: SinkErrorHandler;

  private _didExit = false;
  private _exitCode = 0;
  private _exitRequested = false;
  private _isPendingExit = false;
  private _closed = false;

  constructor(options: LoggerOptions = {}) {
    super();

    this.sinks = [...(options.sinks ?? [])];
    this.callProcessExit = options.callProcessExit ?? true;
    this.beforeExitCallback = options.beforeExitCallback;
    this.onSinkError = options.onSinkError;
  }

  public get didExit(): boolean {
    return this._didExit;
  }

  public get exitCode(): number {
    return this._exitCode;
  }

  public get isPendingExit(): boolean {
    return this._isPendingExit;
  }

  public get closed(): boolean {
    return this._closed;
  }

  /**
   * Exit the process with the given code, running the beforeExit callback
   * first when one is set.
   */
  public exit(code: number): void {
    const isFirstExit = !this._exitRequested;
    this._exitRequested = true;

    if (!this._didExit) {
      this._isPendingExit = true;
    }

    this.emit('logger', { eventType: 'exit-called', code, isFirstExit });

    const callback = this.beforeExitCallback;

    if (!callback) {
      this.processExit(code);
      return;
    }

    safeHandleCallbackAndWait(
      'beforeExit',
      callback,
      (error) => this.errorObject('beforeExit callback failed', error),
      code,
      isFirstExit,
    )
      .then((result) => {
        // A shutdown already in flight owns the exit
        if (result.success && result.value?.action === 'wait') {
          return;
        }

        this.processExit(code);
      })
      .catch((error: unknown) => {
        this.errorObject('beforeExit handling failed', error);
        this.processExit(code);
      });
  }

  /**
   * Set or replace the beforeExit callback. Pass undefined to remove it.
   *
   * Useful when the callback needs objects that are built from this logger:
   *
   * ```typescript
   * const logger = new Logger({ sinks: [new ConsoleSink()] });
   * const runtime = new Runtime({ logger });
   *
   * logger.setBeforeExitCallback(async (exitCode, isFirstExit) => {
   *   if (isFirstExit) {
   *     await runtime.stop();
   *   }
   *   return { action: 'proceed' };
   * });
   * ```
   */
  public setBeforeExitCallback(callback: BeforeExitCallback | undefined): void {
    this.beforeExitCallback = callback;
  }

  public error(message: string, options?: LogOptions): void {
    this.handleLog('error', message, options);
  }

  public errorObject(
    prefix: string,
    error: unknown,
    options?: LogOptions,
  ): void {
    this.handleLog('error', prepareErrorObjectLog(prefix, error), {
      ...options,
      error,
    });
  }

  public info(message: string, options?: LogOptions): void {
    this.handleLog('info', message, options);
  }

  public warn(message: string, options?: LogOptions): void {
    this.handleLog('warn', message, options);
  }

  public success(message: string, options?: LogOptions): void {
    this.handleLog('success', message, options);
  }

  public notice(message: string, options?: LogOptions): void {
    this.handleLog('notice', message, options);
  }

  public debug(message: string, options?: LogOptions): void {
    this.handleLog('debug', message, options);
  }

  /**
   * Log a message without any formatting
   */
  public raw(message: string, options?: LogOptions): void {
    this.handleLog('raw', message, options);
  }

  /**
   * Create a scoped logger with a service name
   */
  public service(serviceName: string): LoggerService {
    return new LoggerService(this.handleLog.bind(this), serviceName);
  }

  public addSink(sink: LogSink): void {
    this.sinks.push(sink);
  }

  public removeSink(sink: LogSink): boolean {
    const index = this.sinks.indexOf(sink);

    if (index === -1) {
      return false;
    }

    this.sinks.splice(index, 1);
    return true;
  }

  public getSinks(): readonly LogSink[] {
    return [...this.sinks];
  }

  /**
   * Close every sink and stop accepting entries
   */
  public async close(): Promise<void> {
    this._closed = true;

    await Promise.all(
      this.sinks.map(async (sink) => {
        if (!sink.close) {
          return;
        }

        try {
          await sink.close();
        } catch (error) {
          this.handleSinkError(toError(error), 'close', sink);
        }
      }),
    );

    this.sinks = [];
    this.emit('logger', { eventType: 'close' });
  }

  /**
   * Logger for tests: an ArraySink to inspect, and no process exit
   */
  public static createTestOptimizedLogger(options?: {
    sinks?: LogSink[];
    arrayLogTransformer?: ArrayLogTransformer;
    includeConsoleSink?: boolean;
    muteConsole?: boolean;
  }): { logger: Logger; arraySink: ArraySink; consoleSink?: ConsoleSink } {
    const arraySink = new ArraySink({
      transformer: options?.arrayLogTransformer,
    });

    const consoleSink = options?.includeConsoleSink
      ? new ConsoleSink({ muted: options.muteConsole ?? true })
      : undefined;

    const sinks: LogSink[] = [arraySink];

    if (consoleSink) {
      sinks.push(consoleSink);
    }

    sinks.push(...(options?.sinks ?? []));

    return {
      logger: new Logger({ sinks, callProcessExit: false }),
      arraySink,
      consoleSink,
    };
  }

  protected handleLog(
    type: LogType,
    template: string,
    options?: HandleLogOptions,
  ): void {
    if (this._closed) {
      return;
    }

    const timestamp = Date.now();
    const params = options?.params;
    const tags = options?.tags;
    const exitCode = options?.exitCode;

    const entry: LogEntry = {
      timestamp,
      type,
      serviceName: options?.serviceName?.trim() || undefined,
      entityName: options?.entityName?.trim() || undefined,
      template,
      message: params ? renderTemplate(template, params) : template,
      params,
      error: options?.error,
      exitCode: Number.isInteger(exitCode) ? exitCode : undefined,
      tags: tags && tags.length > 0 ? tags : undefined,
    };

    for (const sink of this.sinks) {
      try {
        const result = sink.write(entry);

        if (isPromise(result)) {
          result.then(undefined, (error: unknown) => {
            this.handleSinkError(toError(error), 'write', sink);
          });
        }
      } catch (error) {
        this.handleSinkError(toError(error), 'write', sink);
      }
    }

    this.emit('logger', {
      eventType: 'log',
      logType: type,
      message: entry.message,
      timestamp,
    });

    if (entry.exitCode !== undefined) {
      this.exit(entry.exitCode);
    }
  }

  protected override handleListenerError(
    error: Error,
    callbackName: string,
  ): void {
    // Logging here could recurse through the failing listener, so go to stderr
    // eslint-disable-next-line no-console
    console.error(`Logger ${callbackName} failed: ${error.message}`);
  }

  private handleSinkError(
    error: Error,
    context: 'write' | 'close',
    sink: LogSink,
  ): void {
    if (!this.onSinkError) {
      // eslint-disable-next-line no-console
      console.error(
        `Error ${context === 'write' ? 'writing to' : 'closing'} sink: ${error.message}`,
      );
      return;
    }

    try {
      this.onSinkError(error, context, sink);
    } catch (handlerError) {
      // eslint-disable-next-line no-console
      console.error(
        `Error in onSinkError handler: ${toError(handlerError).message}`,
      );
    }
  }

  private processExit(code: number): void {
    this._didExit = true;
    this._exitCode = code;
    this._isPendingExit = false;

    this.emit('logger', { eventType: 'exit-process', code });

    void this.close()
      .catch((error: unknown) => {
        // eslint-disable-next-line no-console
        console.error(`Error closing logger: ${toError(error).message}`);
      })
      .finally(() => {
        if (this.callProcessExit) {
          process.exit(code);
        }
      });
  }
}

export * from './types';
export * from './sinks';
export { LoggerService } from './logger-service';
