import type { Logger } from '../logger';
import type { MessageBus } from '../message-bus';
import type { RuntimeConfig } from '../config';
import { createServiceKey } from './service-locator';

/**
 * Keys the runtime registers during bootstrap
 */
export const ServiceKeys = {
  MESSAGE_BUS: createServiceKey<MessageBus>('message-bus'),
  RUNTIME_CONFIG: createServiceKey<RuntimeConfig>('runtime-config'),
  ROOT_LOGGER: createServiceKey<Logger>('root-logger'),
} as const;
