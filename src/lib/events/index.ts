export * from './types';
export * from './errors';
export {
  createEvent,
  createResponseEvent,
  isRuntimeEvent,
  isEventOfType,
} from './event';
