import { frozenCopy } from '../deep-freeze';
import { generateID } from '../id-helpers';
import { InvalidEventPayloadError } from './errors';
import type {
  CreateEventInput,
  CreateResponseEventInput,
  EventType,
  PayloadFor,
  RuntimeEvent,
} from './types';

function copyPayload<T>(payload: T, type: string, source: string): T {
  try {
    return frozenCopy(payload);
  } catch (error) {
    throw new InvalidEventPayloadError({ type, source }, error);
  }
}

/**
 * Build a new event. The payload is cloned and deep-frozen, and the event's
 * own id doubles as the correlation id when none is given.
 *
 * ```typescript
 * const event = createEvent({
 *   type: 'text-input',
 *   payload: { text: 'what time is it' },
 *   source: 'keyboard',
 * });
 * ```
 */
export function createEvent<T extends EventType>(
  input: CreateEventInput<T>,
): RuntimeEvent<PayloadFor<T>> {
  const id = generateID(input.idType);

  return Object.freeze({
    id,
    type: input.type,
    payload: copyPayload(input.payload, input.type, input.source),
    source: input.source,
    correlationId: input.correlationId ?? id,
    timestamp: Date.now(),
  });
}

/**
 * Build an event caused by `request`, carrying its correlation id unchanged
 */
export function createResponseEvent<T extends EventType>(
  request: RuntimeEvent,
  input: CreateResponseEventInput<T>,
): RuntimeEvent<PayloadFor<T>> {
  return createEvent<T>({
    type: input.type,
    payload: input.payload,
    source: input.source,
    correlationId: request.correlationId,
    idType: input.idType,
  });
}

export function isRuntimeEvent(value: unknown): value is RuntimeEvent {
  if (typeof value !== 'object' || value === null) {
    return false;
  }

  return (
    'id' in value &&
    typeof value.id === 'string' &&
    'type' in value &&
    typeof value.type === 'string' &&
    'payload' in value &&
    'source' in value &&
    typeof value.source === 'string' &&
    'correlationId' in value &&
    typeof value.correlationId === 'string' &&
    'timestamp' in value &&
    typeof value.timestamp === 'number'
  );
}

/**
 * Narrow an event to a built-in type so its payload is typed.
 *
 * The payload shape is trusted: built-in events are created through
 * `createEvent`, whose input is checked against the same map.
 */
export function isEventOfType<T extends EventType>(
  event: RuntimeEvent,
  type: T,
): event is RuntimeEvent<PayloadFor<T>> {
  return event.type === type;
}
