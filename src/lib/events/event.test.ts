import { describe, expect, test } from 'vitest';
import { validateID } from '../id-helpers';
import { ConfigurationError } from '../errors';
import {
  createEvent,
  createResponseEvent,
  isEventOfType,
  isRuntimeEvent,
} from './event';
import { InvalidEventPayloadError } from './errors';

describe('createEvent', () => {
  test('should stamp id, timestamp and default correlation id', () => {
    const before = Date.now();
    const event = createEvent({
      type: 'text-input',
      payload: { text: 'hello' },
      source: 'keyboard',
    });

    expect(validateID('ulid', event.id)).toBe(true);
    expect(event.correlationId).toBe(event.id);
    expect(event.timestamp).toBeGreaterThanOrEqual(before);
    expect(event.source).toBe('keyboard');
    expect(event.payload).toEqual({ text: 'hello' });
  });

  test('should keep a given correlation id and honour the id type', () => {
    const event = createEvent({
      type: 'speak',
      payload: { text: 'hi' },
      source: 'nlp',
      correlationId: 'conversation-1',
      idType: 'uuid4',
    });

    expect(event.correlationId).toBe('conversation-1');
    expect(validateID('uuid4', event.id)).toBe(true);
  });

  test('should freeze the event and a copy of its payload', () => {
    const payload = { text: 'hello', entities: { city: 'Oslo' } };
    const event = createEvent({ type: 'nlp-response', payload, source: 'nlp' });

    payload.entities.city = 'Bergen';

    expect(event.payload.entities).toEqual({ city: 'Oslo' });
    expect(Object.isFrozen(event)).toBe(true);
    expect(Object.isFrozen(event.payload)).toBe(true);
    expect(Object.isFrozen(event.payload.entities)).toBe(true);
  });

  test('should accept custom event types with any payload', () => {
    const event = createEvent({
      type: 'weather-lookup',
      payload: ['a', 'b'],
      source: 'weather',
    });

    expect(event.type).toBe('weather-lookup');
    expect(event.payload).toEqual(['a', 'b']);
  });

  test('should reject payloads that cannot be cloned', () => {
    let thrown: unknown;

    try {
      createEvent({
        type: 'custom',
        payload: { callback: () => undefined },
        source: 'tester',
      });
    } catch (error) {
      thrown = error;
    }

    expect(thrown).toBeInstanceOf(InvalidEventPayloadError);
    expect(thrown).toBeInstanceOf(ConfigurationError);
    expect(thrown).toMatchObject({
      errCode: 'InvalidPayload',
      additionalInfo: { type: 'custom', source: 'tester' },
    });
  });
});

describe('createResponseEvent', () => {
  test('should carry the request correlation id unchanged', () => {
    const request = createEvent({
      type: 'text-input',
      payload: { text: 'weather?' },
      source: 'keyboard',
      correlationId: 'chain-7',
    });

    const response = createResponseEvent(request, {
      type: 'nlp-response',
      payload: { text: 'sunny' },
      source: 'nlp',
    });

    expect(response.correlationId).toBe('chain-7');
    expect(response.id).not.toBe(request.id);
    expect(response.source).toBe('nlp');
  });
});

describe('event guards', () => {
  test('isRuntimeEvent should check the shape', () => {
    const event = createEvent({ type: 'error', payload: { message: 'x' }, source: 's' });

    expect(isRuntimeEvent(event)).toBe(true);
    expect(isRuntimeEvent({ ...event, timestamp: 'now' })).toBe(false);
    expect(isRuntimeEvent(null)).toBe(false);
    expect(isRuntimeEvent('event')).toBe(false);
  });

  test('isEventOfType should narrow by type', () => {
    const event = createEvent({
      type: 'speak',
      payload: { text: 'hi' },
      source: 's',
    });

    expect(isEventOfType(event, 'speak')).toBe(true);
    expect(isEventOfType(event, 'display-text')).toBe(false);
  });
});
