/**
 * True for a finite timeout greater than zero
 */
export function isBoundedTimeout(timeoutMS: number | undefined): timeoutMS is number {
  return timeoutMS !== undefined && Number.isFinite(timeoutMS) && timeoutMS > 0;
}

/**
 * Runs `work` and rejects with `createTimeoutError()` if it has not settled
 * within `timeoutMS`. A timeout of 0 or less waits indefinitely.
 *
 * Sync throws from `work` become rejections. The timer is always cleared once
 * the race settles. `onTimeout` runs right after the rejection so the caller
 * can tell the abandoned work to give up; it must not throw.
 */
export async function runWithTimeout<T>(
  work: () => T | PromiseLike<T>,
  timeoutMS: number,
  createTimeoutError: () => Error,
  onTimeout?: () => void,
): Promise<T> {
  const pending = new Promise<T>((resolve) => {
    resolve(work());
  });

  if (timeoutMS <= 0) {
    return pending;
  }

  let timeoutHandle: NodeJS.Timeout | undefined;

  const timeout = new Promise<never>((_, reject) => {
    timeoutHandle = setTimeout(() => {
      reject(createTimeoutError());
      onTimeout?.();
    }, timeoutMS);
  });

  try {
    return await Promise.race([pending, timeout]);
  } finally {
    if (timeoutHandle) {
      clearTimeout(timeoutHandle);
    }
  }
}
