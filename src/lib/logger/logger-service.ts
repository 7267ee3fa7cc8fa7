import type { LogOptions, LogType } from './types';
import type { HandleLog } from './internal-types';
import { prepareErrorObjectLog } from './utils/error-object';

/**
 * Logger scoped to a service name, and optionally to one entity within it
 * (a component, a subscriber, a queue).
 *
 * ```typescript
 * const busLogger = logger.service('message-bus');
 * busLogger.entity('nlp').warn('Queue full, dropped {{eventId}}', {
 *   params: { eventId },
 * });
 * ```
 */
export class LoggerService {
  constructor(
    private readonly handleLog: HandleLog,
    private readonly serviceName: string,
    private readonly entityName?: string,
  ) {}

  /**
   * Same service, tagged with an entity name
   */
  public entity(entityName: string): LoggerService {
    return new LoggerService(this.handleLog, this.serviceName, entityName);
  }

  public getServiceName(): string {
    return this.serviceName;
  }

  public error(message: string, options?: LogOptions): void {
    this.log('error', message, options);
  }

  public errorObject(
    prefix: string,
    error: unknown,
    options?: LogOptions,
  ): void {
    this.log('error', prepareErrorObjectLog(prefix, error), options, error);
  }

  public info(message: string, options?: LogOptions): void {
    this.log('info', message, options);
  }

  public warn(message: string, options?: LogOptions): void {
    this.log('warn', message, options);
  }

  public success(message: string, options?: LogOptions): void {
    this.log('success', message, options);
  }

  public notice(message: string, options?: LogOptions): void {
    this.log('notice', message, options);
  }

  public debug(message: string, options?: LogOptions): void {
    this.log('debug', message, options);
  }

  public raw(message: string, options?: LogOptions): void {
    this.log('raw', message, options);
  }

  private log(
    type: LogType,
    message: string,
    options: LogOptions | undefined,
    error?: unknown,
  ): void {
    this.handleLog(type, message, {
      ...options,
      serviceName: this.serviceName,
      entityName: this.entityName,
      error,
    });
  }
}
