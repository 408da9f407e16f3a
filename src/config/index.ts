/**
 * Config Module
 *
 * Exports for programmatic config access.
 * CLI users interact via `docweave config` commands.
 */

// Schema and types
export {
  ConfigSchema,
  PartialConfigSchema,
  LLMProviderTypeSchema,
  EmbeddingProviderTypeSchema,
  GenerationStrategySchema,
} from './schema.js';
export type {
  Config,
  PartialConfig,
  LLMProviderType,
  EmbeddingProviderType,
  GenerationStrategy,
} from './schema.js';

// Defaults
export { DEFAULT_CONFIG, CONFIG_TEMPLATE } from './defaults.js';

// Loader functions
export {
  loadConfig,
  initConfig,
  getConfigValue,
  setConfigValue,
  listConfig,
  deepMerge,
  deepFreeze,
} from './loader.js';

// Paths
export { getConfigPath, resolveRepoPaths, STATE_DIR_NAME } from './paths.js';
export type { RepoPaths } from './paths.js';

// Environment variables
export {
  loadEnv,
  loadEnvFile,
  getEnv,
  hasApiKey,
  getOllamaHost,
  getOpenAICompatibleConfig,
  SETUP_INSTRUCTIONS,
  EnvSchema,
  _clearEnvCache,
} from './env.js';
export type { EnvVars, CredentialProvider } from './env.js';
