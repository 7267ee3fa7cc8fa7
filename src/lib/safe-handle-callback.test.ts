import { describe, expect, test, vi } from 'vitest';
import {
  safeHandleCallback,
  safeHandleCallbackAndWait,
} from './safe-handle-callback';

describe('safeHandleCallback', () => {
  test('should pass arguments through', () => {
    const callback = vi.fn();
    const onError = vi.fn();

    safeHandleCallback('cb', callback, onError, 'a', 2);

    expect(callback).toHaveBeenCalledWith('a', 2);
    expect(onError).not.toHaveBeenCalled();
  });

  test('should report sync throws with the callback name', () => {
    const onError = vi.fn();

    safeHandleCallback(
      'handler',
      () => {
        throw new Error('sync');
      },
      onError,
    );

    expect(onError).toHaveBeenCalledTimes(1);
    expect(onError.mock.calls[0][0].message).toBe('sync');
    expect(onError.mock.calls[0][1]).toBe('handler');
  });

  test('should report async rejections and wrap non-errors', async () => {
    const onError = vi.fn();

    safeHandleCallback(
      'async-handler',
      () => Promise.reject('plain string'),
      onError,
    );

    await Promise.resolve();
    await Promise.resolve();

    expect(onError).toHaveBeenCalledTimes(1);
    expect(onError.mock.calls[0][0]).toBeInstanceOf(Error);
    expect(onError.mock.calls[0][0].message).toBe('plain string');
  });
});

describe('safeHandleCallbackAndWait', () => {
  test('should return the awaited value', async () => {
    const result = await safeHandleCallbackAndWait(
      'cb',
      async (value: number) => value * 2,
      vi.fn(),
      21,
    );

    expect(result).toEqual({ success: true, value: 42 });
  });

  test('should report failures instead of throwing', async () => {
    const onError = vi.fn();

    const result = await safeHandleCallbackAndWait(
      'cb',
      async () => {
        throw new Error('nope');
      },
      onError,
    );

    expect(result.success).toBe(false);
    expect(result.error?.message).toBe('nope');
    expect(onError).toHaveBeenCalledWith(result.error, 'cb');
  });
});
