export * from './schema';
export * from './errors';
export {
  loadConfig,
  loadConfigFile,
  applyEnvironmentOverrides,
  ENV_OVERRIDES,
  type LoadConfigOptions,
} from './load-config';
