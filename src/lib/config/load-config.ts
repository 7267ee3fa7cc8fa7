import { promises as fs } from 'fs';
import type { ZodError } from 'zod';
import { deepFreeze } from '../deep-freeze';
import { toError } from '../errors';
import { runtimeConfigSchema, type RuntimeConfig } from './schema';
import { InvalidConfigurationError } from './errors';

export interface LoadConfigOptions {
  /** Environment to read overrides from; omit to skip overrides */
  env?: NodeJS.ProcessEnv;
  /** Shown in error messages, usually the file path */
  source?: string;
}

/**
 * Environment variables that override the loaded document
 */
export const ENV_OVERRIDES = {
  logLevel: 'SWITCHYARD_LOG_LEVEL',
  permissionLevel: 'SWITCHYARD_PERMISSION_LEVEL',
  backpressure: 'SWITCHYARD_BACKPRESSURE',
  queueCapacity: 'SWITCHYARD_QUEUE_CAPACITY',
} as const;

function formatIssues(error: ZodError): string[] {
  return error.issues.map((issue) => {
    const path = issue.path.length > 0 ? issue.path.join('.') : '(root)';
    return `${path}: ${issue.message}`;
  });
}

function parse(raw: unknown, source?: string): RuntimeConfig {
  const result = runtimeConfigSchema.safeParse(raw);

  if (!result.success) {
    throw new InvalidConfigurationError({
      issues: formatIssues(result.error),
      source,
    });
  }

  return result.data;
}

function readEnv(env: NodeJS.ProcessEnv, name: string): string | undefined {
  const value = env[name]?.trim();
  return value ? value : undefined;
}

/**
 * Validate a configuration document, fill in defaults and freeze it.
 *
 * ```typescript
 * const config = loadConfig({ bus: { queueCapacity: 50 } }, { env: process.env });
 * config.bus.backpressure; // 'drop-oldest'
 * ```
 */
export function loadConfig(
  raw: unknown = {},
  options: LoadConfigOptions = {},
): RuntimeConfig {
  const parsed = parse(raw, options.source);
  const config = options.env
    ? applyEnvironmentOverrides(parsed, options.env, options.source)
    : parsed;

  return deepFreeze(config);
}

/**
 * Read a JSON configuration file and load it with `loadConfig`
 */
export async function loadConfigFile(
  path: string,
  options: Omit<LoadConfigOptions, 'source'> = {},
): Promise<RuntimeConfig> {
  let text: string;

  try {
    text = await fs.readFile(path, 'utf8');
  } catch (error) {
    throw new InvalidConfigurationError(
      { issues: [`(root): cannot read file: ${toError(error).message}`], source: path },
      error,
    );
  }

  let raw: unknown;

  try {
    raw = JSON.parse(text);
  } catch (error) {
    throw new InvalidConfigurationError(
      { issues: [`(root): invalid JSON: ${toError(error).message}`], source: path },
      error,
    );
  }

  return loadConfig(raw, { ...options, source: path });
}

/**
 * Return a new, revalidated config with the `SWITCHYARD_*` variables applied.
 * Unset or blank variables leave the value alone; invalid ones throw
 * `InvalidConfigurationError`.
 */
export function applyEnvironmentOverrides(
  config: RuntimeConfig,
  env: NodeJS.ProcessEnv,
  source?: string,
): RuntimeConfig {
  const logLevel = readEnv(env, ENV_OVERRIDES.logLevel);
  const permissionLevel = readEnv(env, ENV_OVERRIDES.permissionLevel);
  const backpressure = readEnv(env, ENV_OVERRIDES.backpressure);
  const queueCapacity = readEnv(env, ENV_OVERRIDES.queueCapacity);

  if (
    logLevel === undefined &&
    permissionLevel === undefined &&
    backpressure === undefined &&
    queueCapacity === undefined
  ) {
    return config;
  }

  const raw = {
    ...config,
    bus: {
      ...config.bus,
      ...(backpressure !== undefined && { backpressure }),
      ...(queueCapacity !== undefined && { queueCapacity: Number(queueCapacity) }),
    },
    security: {
      ...config.security,
      ...(permissionLevel !== undefined && { permissionLevel }),
    },
    logging: {
      ...config.logging,
      ...(logLevel !== undefined && { level: logLevel }),
    },
  };

  return deepFreeze(
    parse(raw, source ? `${source} + environment` : 'environment'),
  );
}
