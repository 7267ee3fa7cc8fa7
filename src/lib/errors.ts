/**
 * Error taxonomy shared by every runtime module.
 *
 * Concrete errors live next to the module that raises them (`errors.ts` in
 * each folder) and extend one of the category classes below, so callers can
 * branch on the category with `instanceof` and still read the conventional
 * `errPrefix` / `errType` / `errCode` / `additionalInfo` fields.
 *
 * | Category                | Policy                                         |
 * | ----------------------- | ---------------------------------------------- |
 * | `ConfigurationError`    | fatal, aborts startup                          |
 * | `InitializationFailure` | aborts startup of dependents, rolls back       |
 * | `HandlerFailure`        | contained by the bus, counted per subscriber   |
 * | `DeliveryOverflow`      | handled per backpressure policy, diagnostic    |
 * | `PermissionDenied`      | reported in an action result, never executes   |
 * | `ShutdownTimeout`       | forces `stopped`, logged                       |
 */

export const ERROR_CATEGORIES = [
  'ConfigurationError',
  'InitializationFailure',
  'HandlerFailure',
  'DeliveryOverflow',
  'PermissionDenied',
  'ShutdownTimeout',
] as const;

export type ErrorCategory = (typeof ERROR_CATEGORIES)[number];

export abstract class RuntimeError<
  TInfo extends object = Record<string, unknown>,
> extends Error {
  public abstract readonly category: ErrorCategory;
  public abstract readonly errPrefix: string;
  public abstract readonly errType: string;
  public abstract readonly errCode: string;
  public readonly additionalInfo: TInfo;

  constructor(message: string, additionalInfo: TInfo, cause?: unknown) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = new.target.name;
    this.additionalInfo = additionalInfo;
  }
}

export abstract class ConfigurationError<
  TInfo extends object = Record<string, unknown>,
> extends RuntimeError<TInfo> {
  public readonly category = 'ConfigurationError';
}

export abstract class InitializationFailure<
  TInfo extends object = Record<string, unknown>,
> extends RuntimeError<TInfo> {
  public readonly category = 'InitializationFailure';
}

export abstract class HandlerFailure<
  TInfo extends object = Record<string, unknown>,
> extends RuntimeError<TInfo> {
  public readonly category = 'HandlerFailure';
}

export abstract class DeliveryOverflow<
  TInfo extends object = Record<string, unknown>,
> extends RuntimeError<TInfo> {
  public readonly category = 'DeliveryOverflow';
}

export abstract class PermissionDenied<
  TInfo extends object = Record<string, unknown>,
> extends RuntimeError<TInfo> {
  public readonly category = 'PermissionDenied';
}

export abstract class ShutdownTimeout<
  TInfo extends object = Record<string, unknown>,
> extends RuntimeError<TInfo> {
  public readonly category = 'ShutdownTimeout';
}

export function isRuntimeError(value: unknown): value is RuntimeError<object> {
  return value instanceof RuntimeError;
}

/**
 * Normalizes a thrown value into an Error
 */
export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}
