/**
 * Config Module
 *
 * Exports for programmatic config access.
 * CLI users interact via `lantern config` commands.
 */

// Schema and types
export {
  ConfigSchema,
  PartialConfigSchema,
  EmbeddingConfigSchema,
  ChunkingConfigSchema,
  ContextConfigSchema,
  IndexConfigSchema,
  SearchConfigSchema,
} from './schema.js';
export type { Config, PartialConfig } from './schema.js';

// Defaults
export { DEFAULT_CONFIG, CONFIG_TEMPLATE } from './defaults.js';

// Loader functions
export {
  loadConfig,
  applyEnvOverrides,
  resolveIndexPath,
  getConfigValue,
  setConfigValue,
  listConfig,
} from './loader.js';
export type { LoadConfigOptions } from './loader.js';

// Paths
export { getLanternDir, getConfigPath, getDefaultIndexPath, expandHome } from './paths.js';

// Environment variables
export { loadEnv, parseEnv, getEnv, getOllamaHost, EnvSchema, _clearEnvCache } from './env.js';
export type { EnvVars } from './env.js';
