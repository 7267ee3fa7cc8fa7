import type { IdentifierType } from '../id-helpers';

export const EVENT_TYPES = [
  'text-input',
  'voice-input',
  'image-input',
  'nlp-response',
  'vision-response',
  'context-update',
  'context-response',
  'speak',
  'display-text',
  'ui-update',
  'execute-action',
  'action-result',
  'output-ack',
  'component-status',
  'system-status',
  'error',
] as const;

export type BuiltInEventType = (typeof EVENT_TYPES)[number];

/**
 * Built-in types plus any string a component chooses to publish.
 * The `string & {}` keeps editor completion for the built-in names.
 */
// eslint-disable-next-line @typescript-eslint/ban-types
export type EventType = BuiltInEventType | (string & {});

export interface TextInputPayload {
  text: string;
  language?: string;
}

export interface VoiceInputPayload {
  /** Recognized transcript, when the input component already ran recognition */
  transcript?: string;
  audio?: Uint8Array;
  sampleRate?: number;
  confidence?: number;
}

export interface ImageInputPayload {
  image: Uint8Array;
  mimeType: string;
  width?: number;
  height?: number;
}

export interface NLPResponsePayload {
  text: string;
  intent?: string;
  confidence?: number;
  entities?: Record<string, string>;
}

export interface VisionResponsePayload {
  description: string;
  labels?: string[];
  confidence?: number;
}

export interface ContextUpdatePayload {
  key: string;
  value: unknown;
}

export interface ContextResponsePayload {
  key: string;
  value?: unknown;
  found: boolean;
}

export interface SpeakPayload {
  text: string;
  voice?: string;
  rate?: number;
}

export interface DisplayTextPayload {
  text: string;
  format?: 'plain' | 'markdown';
}

export interface UIUpdatePayload {
  view: string;
  data: Record<string, unknown>;
}

export const PERMISSION_LEVELS = [
  'restricted',
  'safe',
  'moderate',
  'elevated',
] as const;

export type PermissionLevel = (typeof PERMISSION_LEVELS)[number];

export interface ExecuteActionPayload {
  operation: string;
  parameters?: Record<string, unknown>;
  /** Level the action needs; defaults to `safe` */
  requiredLevel?: PermissionLevel;
}

export type ActionOutcome = 'succeeded' | 'failed' | 'permission-denied';

export interface ActionResultPayload {
  operation: string;
  outcome: ActionOutcome;
  result?: unknown;
  error?: string;
  durationMS: number;
}

export interface OutputAckPayload {
  eventId: string;
  eventType: EventType;
  renderer: string;
}

export type ComponentState =
  | 'registered'
  | 'initializing'
  | 'running'
  | 'degraded'
  | 'stopping'
  | 'stopped'
  | 'failed';

export interface ComponentStatusPayload {
  name: string;
  previousState: ComponentState;
  state: ComponentState;
  reason?: string;
}

export interface SystemStatusPayload {
  state: string;
  running: string[];
  failed: string[];
}

export interface ErrorPayload {
  message: string;
  errCode?: string;
  details?: Record<string, unknown>;
}

export interface EventPayloadMap {
  'text-input': TextInputPayload;
  'voice-input': VoiceInputPayload;
  'image-input': ImageInputPayload;
  'nlp-response': NLPResponsePayload;
  'vision-response': VisionResponsePayload;
  'context-update': ContextUpdatePayload;
  'context-response': ContextResponsePayload;
  speak: SpeakPayload;
  'display-text': DisplayTextPayload;
  'ui-update': UIUpdatePayload;
  'execute-action': ExecuteActionPayload;
  'action-result': ActionResultPayload;
  'output-ack': OutputAckPayload;
  'component-status': ComponentStatusPayload;
  'system-status': SystemStatusPayload;
  error: ErrorPayload;
}

export type PayloadFor<T extends EventType> = T extends keyof EventPayloadMap
  ? EventPayloadMap[T]
  : unknown;

/**
 * Immutable message routed by the bus.
 * Payloads are deep-frozen copies; nothing downstream can mutate them.
 */
export interface RuntimeEvent<TPayload = unknown> {
  readonly id: string;
  readonly type: EventType;
  readonly payload: TPayload;
  readonly source: string;
  readonly correlationId: string;
  readonly timestamp: number;
}

export interface CreateEventInput<T extends EventType> {
  type: T;
  payload: PayloadFor<T>;
  source: string;
  correlationId?: string;
  idType?: IdentifierType;
}

export interface CreateResponseEventInput<T extends EventType> {
  type: T;
  payload: PayloadFor<T>;
  source: string;
  idType?: IdentifierType;
}
