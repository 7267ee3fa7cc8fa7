// module entry point

// Runtime facade
export * from './lib/runtime/index';

// Core modules
export * from './lib/errors';
export * from './lib/events/index';
export * from './lib/logger/index';
export * from './lib/config/index';
export * from './lib/service-locator/index';
export * from './lib/message-bus/index';
export * from './lib/permissions/index';
export * from './lib/lifecycle-manager/index';
export * from './lib/components/index';

// ID Helpers
export {
  generateID,
  validateID,
  isIdentifierType,
  type IdentifierType,
  IDENTIFIER_TYPES,
} from './lib/id-helpers';

// Event handling
export { EventEmitterProtected, type EventListener } from './lib/event-emitter';

// Callback handling
export {
  safeHandleCallback,
  safeHandleCallbackAndWait,
  type CallbackErrorHandler,
  type CallbackResult,
} from './lib/safe-handle-callback';

// Utility functions
export { runWithTimeout } from './lib/with-timeout';
export { sleep } from './lib/sleep';
export { deepFreeze, frozenCopy } from './lib/deep-freeze';
export { errorToString } from './lib/error-to-string';
export { isPromise } from './lib/is-promise';
