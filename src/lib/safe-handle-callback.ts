import { isPromise } from './is-promise';

export type CallbackErrorHandler = (error: Error, callbackName: string) => void;

function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}

/**
 * Runs a callback without letting its failure escape.
 *
 * Sync throws and async rejections both go to `onError`. The callback's
 * promise, if any, is not awaited.
 */
export function safeHandleCallback<TArgs extends unknown[]>(
  callbackName: string,
  callback: (...args: TArgs) => unknown,
  onError: CallbackErrorHandler,
  ...args: TArgs
): void {
  const report = (error: unknown): void => {
    try {
      onError(toError(error), callbackName);
    } catch (reportError) {
      // eslint-disable-next-line no-console
      console.error(
        `Error reporting failure of ${callbackName}: ${toError(reportError).message}`,
      );
    }
  };

  try {
    const result = callback(...args);

    if (isPromise(result)) {
      result.then(undefined, report);
    }
  } catch (error) {
    report(error);
  }
}

export interface CallbackResult<T> {
  success: boolean;
  value?: T;
  error?: Error;
}

/**
 * Like `safeHandleCallback`, but waits for the callback and reports the
 * outcome instead of throwing.
 */
export async function safeHandleCallbackAndWait<T, TArgs extends unknown[]>(
  callbackName: string,
  callback: (...args: TArgs) => T | PromiseLike<T>,
  onError: CallbackErrorHandler,
  ...args: TArgs
): Promise<CallbackResult<T>> {
  try {
    const value = await callback(...args);
    return { success: true, value };
  } catch (error) {
    const err = toError(error);
    onError(err, callbackName);
    return { success: false, error: err };
  }
}
