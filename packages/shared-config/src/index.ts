/**
 * Centralized Storage Configuration
 *
 * Single source of truth for storage engine settings:
 * - Schema validation via Zod
 * - Type normalization (numbers, enums)
 * - Environment variable and .env loading
 * - Presets for local-only and remote-enabled setups
 */

export {
  loadConfig,
  parseConfig,
  parseEnvFile,
  readEnv,
  localOnlyConfig,
  remoteConfig,
  printConfig,
  clearConfigCache,
  type ConfigOptions,
} from './loader.js';
export {
  storageConfigSchema,
  ENV_KEYS,
  BACKENDS,
  SYNC_STRATEGIES,
  COMPRESSION_LEVELS,
  LOG_LEVELS,
  DEFAULT_MAX_DECOMPRESSED_BYTES,
  type StorageConfig,
  type StorageConfigInput,
  type Backend,
  type SyncStrategy,
  type CompressionLevel,
  type ConfigLogLevel,
} from './schema.js';
