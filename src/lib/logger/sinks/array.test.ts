import { describe, expect, test } from 'vitest';
import { ArraySink } from './array';
import type { LogEntry } from '../types';

function entry(overrides: Partial<LogEntry> = {}): LogEntry {
  return {
    timestamp: 1_700_000_000_000,
    type: 'info',
    template: 'hello',
    message: 'hello',
    ...overrides,
  };
}

describe('ArraySink', () => {
  test('should store entries in order', () => {
    const sink = new ArraySink();
    sink.write(entry({ message: 'first' }));
    sink.write(entry({ type: 'warn', message: 'second' }));

    expect(sink.getLines()).toEqual(['info: first', 'warn: second']);
  });

  test('should apply the transformer unless it returns false', () => {
    const sink = new ArraySink({
      transformer: (log) =>
        log.type === 'debug' ? false : { ...log, message: log.message.toUpperCase() },
    });

    sink.write(entry({ message: 'loud' }));
    sink.write(entry({ type: 'debug', message: 'quiet' }));

    expect(sink.getLines()).toEqual(['info: LOUD', 'debug: quiet']);
  });

  test('should filter by type and scope', () => {
    const sink = new ArraySink();
    sink.write(entry({ serviceName: 'message-bus', entityName: 'nlp' }));
    sink.write(entry({ serviceName: 'message-bus', entityName: 'tts', type: 'error' }));
    sink.write(entry({ serviceName: 'lifecycle-manager' }));

    expect(sink.findByType('error')).toHaveLength(1);
    expect(sink.findByScope('message-bus')).toHaveLength(2);
    expect(sink.findByScope('message-bus', 'nlp')).toHaveLength(1);
  });

  test('should ignore writes after close and support clear', () => {
    const sink = new ArraySink();
    sink.write(entry());
    sink.clear();
    expect(sink.logs).toHaveLength(0);

    sink.close();
    sink.write(entry());
    expect(sink.logs).toHaveLength(0);
  });
});
