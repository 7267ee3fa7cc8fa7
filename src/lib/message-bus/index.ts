export { MessageBus } from './message-bus';
export * from './types';
export * from './errors';
export * from './events';
