import { z } from 'zod';
import { IDENTIFIER_TYPES } from '../id-helpers';
import { LOG_LEVEL_NAMES } from '../logger/types';
import { BACKPRESSURE_POLICIES } from '../message-bus/types';
import { PERMISSION_LEVELS } from '../events/types';
import defaultAllowLists from './default-allow-lists.json';

const operationList = z.array(z.string().min(1));

export const allowListsSchema = z.object({
  restricted: operationList.default([]),
  safe: operationList.default([]),
  moderate: operationList.default([]),
  elevated: operationList.default([]),
});

export const busConfigSchema = z.object({
  queueCapacity: z.number().int().positive().max(100_000).default(1000),
  backpressure: z.enum(BACKPRESSURE_POLICIES).default('drop-oldest'),
  blockTimeoutMS: z.number().int().positive().default(5000),
  /** 0 disables the handler timeout */
  handlerTimeoutMS: z.number().int().nonnegative().default(30_000),
  failureThreshold: z.number().int().positive().default(3),
  historySize: z.number().int().nonnegative().default(1000),
  drainOnShutdown: z.boolean().default(true),
  drainTimeoutMS: z.number().int().positive().default(5000),
  eventIdType: z.enum(IDENTIFIER_TYPES).default('ulid'),
});

export const lifecycleConfigSchema = z.object({
  initializeTimeoutMS: z.number().int().positive().default(30_000),
  shutdownTimeoutMS: z.number().int().positive().default(5000),
  /** 0 leaves the health monitor off */
  healthCheckIntervalMS: z.number().int().nonnegative().default(0),
});

export const componentConfigSchema = z.object({
  enabled: z.boolean().default(true),
  initializeTimeoutMS: z.number().int().positive().optional(),
  shutdownTimeoutMS: z.number().int().positive().optional(),
  dependencies: z.array(z.string().min(1)).default([]),
  options: z.record(z.string(), z.unknown()).default({}),
});

export const securityConfigSchema = z.object({
  allowListEnabled: z.boolean().default(true),
  permissionLevel: z.enum(PERMISSION_LEVELS).default('moderate'),
  allowLists: allowListsSchema.default(defaultAllowLists),
  auditLogging: z.boolean().default(true),
});

export const loggingConfigSchema = z.object({
  level: z.enum(LOG_LEVEL_NAMES).default('info'),
  colors: z.boolean().default(true),
  timestamps: z.boolean().default(false),
});

export const runtimeConfigSchema = z.object({
  bus: busConfigSchema.default({}),
  lifecycle: lifecycleConfigSchema.default({}),
  components: z.record(z.string(), componentConfigSchema).default({}),
  security: securityConfigSchema.default({}),
  logging: loggingConfigSchema.default({}),
});

export type RuntimeConfig = z.infer<typeof runtimeConfigSchema>;
export type RuntimeConfigInput = z.input<typeof runtimeConfigSchema>;
export type BusConfig = z.infer<typeof busConfigSchema>;
export type LifecycleConfig = z.infer<typeof lifecycleConfigSchema>;
export type ComponentConfig = z.infer<typeof componentConfigSchema>;
export type SecurityConfig = z.infer<typeof securityConfigSchema>;
export type AllowLists = z.infer<typeof allowListsSchema>;
export type LoggingConfig = z.infer<typeof loggingConfigSchema>;
