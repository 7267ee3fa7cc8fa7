/**
 * Narrows a value to something that can be awaited.
 * Works for native promises and any thenable.
 */
export function isPromise(value: unknown): value is PromiseLike<unknown> {
  if (value === null) {
    return false;
  }

  if (typeof value !== 'object' && typeof value !== 'function') {
    return false;
  }

  return 'then' in value && typeof value.then === 'function';
}
