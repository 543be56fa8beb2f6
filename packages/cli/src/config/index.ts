export { ConfigSchema, ConfigDefaults, type RawConfig, type Config, type OutputFormat } from './schema.js';
export {
  loadConfig,
  loadConfigWithMeta,
  getConfigPath,
  setConfigValue,
  expandTilde,
  type LoadConfigOptions,
  type LoadConfigResult,
  ConfigError,
} from './loader.js';
export { toEngineOptions } from './options.js';
