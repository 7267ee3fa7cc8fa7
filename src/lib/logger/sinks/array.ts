import type { ArrayLogTransformer, LogEntry, LogSink, LogType } from '../types';

/**
 * Keeps entries in memory for tests and diagnostics
 */
export class ArraySink implements LogSink {
  public logs: LogEntry[] = [];
  private readonly transformer?: ArrayLogTransformer;
  private closed = false;

  constructor(options?: { transformer?: ArrayLogTransformer }) {
    this.transformer = options?.transformer;
  }

  public write(entry: LogEntry): void {
    if (this.closed) {
      return;
    }

    const transformed = this.transformer ? this.transformer(entry) : false;
    this.logs.push(transformed === false ? entry : transformed);
  }

  public clear(): void {
    this.logs = [];
  }

  /**
   * `type: message` lines, handy for equality assertions
   */
  public getLines(): string[] {
    return this.logs.map((log) => `${log.type}: ${log.message}`);
  }

  public findByType(type: LogType): LogEntry[] {
    return this.logs.filter((log) => log.type === type);
  }

  /**
   * Entries whose service (and entity, when given) match
   */
  public findByScope(serviceName: string, entityName?: string): LogEntry[] {
    return this.logs.filter(
      (log) =>
        log.serviceName === serviceName &&
        (entityName === undefined || log.entityName === entityName),
    );
  }

  public close(): void {
    this.closed = true;
  }
}
