import { describe, expect, test } from 'vitest';
import { prepareErrorObjectLog } from './error-object';

describe('prepareErrorObjectLog', () => {
  test('should put the prefix on its own line before the error', () => {
    const result = prepareErrorObjectLog('Start failed', 'plain value');

    expect(result).toBe('Start failed: \n\nValue: plain value');
  });

  test('should omit a blank prefix', () => {
    expect(prepareErrorObjectLog('   ', 42)).toBe('Value: 42');
  });

  test('should include error fields', () => {
    const error = new Error('queue closed');
    const result = prepareErrorObjectLog('Bus', error);

    expect(result.split('\n').slice(0, 4)).toEqual([
      'Bus: ',
      '',
      'Message: queue closed',
      'Name: Error',
    ]);
  });
});
