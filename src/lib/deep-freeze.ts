/**
 * Recursively freezes plain data in place and returns it.
 *
 * Typed arrays and ArrayBuffers are left as they are since the engine refuses
 * to freeze views with elements. Already-frozen branches are not revisited,
 * which also stops the walk on cycles.
 */
export function deepFreeze<T>(value: T): T {
  if (value === null || typeof value !== 'object') {
    return value;
  }

  if (ArrayBuffer.isView(value) || value instanceof ArrayBuffer) {
    return value;
  }

  if (Object.isFrozen(value)) {
    return value;
  }

  Object.freeze(value);

  if (value instanceof Map) {
    for (const [key, entry] of value) {
      deepFreeze(key);
      deepFreeze(entry);
    }
    return value;
  }

  if (value instanceof Set) {
    for (const entry of value) {
      deepFreeze(entry);
    }
    return value;
  }

  const children: unknown[] = Object.values(value);
  for (const child of children) {
    deepFreeze(child);
  }

  return value;
}

/**
 * Structured-clones `value` and deep-freezes the copy, leaving the caller's
 * object untouched.
 */
export function frozenCopy<T>(value: T): T {
  return deepFreeze(structuredClone(value));
}
