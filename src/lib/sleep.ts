/**
 * Resolves after `time` milliseconds.
 *
 * When a signal is given the wait ends early once it aborts, and the returned
 * promise rejects with the signal's reason.
 *
 * ```typescript
 * await sleep(250);
 * await sleep(5000, controller.signal);
 * ```
 */
export async function sleep(time: number, signal?: AbortSignal): Promise<void> {
  if (signal?.aborted) {
    throw signal.reason;
  }

  return new Promise<void>((resolve, reject) => {
    const onAbort = (): void => {
      clearTimeout(handle);
      reject(signal?.reason);
    };

    const handle = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, time);

    signal?.addEventListener('abort', onAbort, { once: true });
  });
}
