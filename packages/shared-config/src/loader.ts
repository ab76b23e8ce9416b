/**
 * Configuration Loader
 *
 * Loads and validates storage configuration from environment variables.
 * Supports .env files outside production.
 */

import { readFileSync, existsSync } from 'node:fs';
import { resolve } from 'node:path';
import {
  ENV_KEYS,
  storageConfigSchema,
  type StorageConfig,
  type StorageConfigInput,
  type SyncStrategy,
} from './schema.js';

export interface ConfigOptions {
  /**
   * Environment to read from (default: process.env merged with .env)
   */
  env?: Record<string, string | undefined>;

  /**
   * Whether to load .env files (default: true outside production)
   */
  loadEnvFile?: boolean;

  /**
   * Path to .env file (default: searches the working directory)
   */
  envFilePath?: string;

  /**
   * Values that take precedence over the environment
   */
  overrides?: StorageConfigInput;
}

let cachedConfig: StorageConfig | null = null;

/**
 * Parse .env file content into key-value pairs
 */
export function parseEnvFile(content: string): Record<string, string> {
  const result: Record<string, string> = {};

  for (const line of content.split('\n')) {
    const trimmed = line.trim();

    if (!trimmed || trimmed.startsWith('#')) {
      continue;
    }

    const match = trimmed.match(/^([^#=]+)=(.*)$/);
    if (match && match[1] && match[2] !== undefined) {
      const key = match[1].trim();
      let value = match[2].trim();

      if ((value.startsWith('"') && value.endsWith('"')) ||
          (value.startsWith("'") && value.endsWith("'"))) {
        value = value.slice(1, -1);
      }

      result[key] = value;
    }
  }

  return result;
}

function findEnvFile(startPath: string = process.cwd()): string | null {
  const searchPaths = [
    resolve(startPath, '.env'),
    resolve(startPath, '.env.local'),
  ];

  for (const path of searchPaths) {
    if (existsSync(path)) {
      return path;
    }
  }

  return null;
}

function loadEnvFile(filePath?: string): Record<string, string> {
  if (process.env.NODE_ENV === 'production') {
    return {};
  }

  const envPath = filePath ?? findEnvFile();
  if (!envPath) {
    return {};
  }

  try {
    return parseEnvFile(readFileSync(envPath, 'utf-8'));
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      return {};
    }
    throw new Error(`Failed to load .env file at ${envPath}: ${error instanceof Error ? error.message : String(error)}`);
  }
}

/**
 * Merge environment variables (process.env takes precedence over .env file)
 */
function mergeEnvVars(envFileVars: Record<string, string>): Record<string, string | undefined> {
  const result: Record<string, string | undefined> = { ...envFileVars };

  for (const [key, value] of Object.entries(process.env)) {
    if (value !== undefined) {
      result[key] = value;
    }
  }

  return result;
}

/**
 * Pick the anchorlog settings out of an environment
 */
export function readEnv(env: Record<string, string | undefined>): Record<string, string> {
  const raw: Record<string, string> = {};

  for (const [key, envKey] of Object.entries(ENV_KEYS)) {
    const value = env[envKey];
    if (value !== undefined && value !== '') {
      raw[key] = value;
    }
  }

  return raw;
}

/**
 * Validate a partial configuration, filling defaults
 */
export function parseConfig(input: Record<string, unknown>): StorageConfig {
  const parseResult = storageConfigSchema.safeParse(input);

  if (!parseResult.success) {
    const errors = parseResult.error.errors
      .map((err) => {
        const path = err.path.join('.');
        return `  • ${path || 'root'}: ${err.message}`;
      })
      .join('\n');

    throw new Error(`Invalid configuration:\n${errors}`);
  }

  return parseResult.data;
}

/**
 * Load and validate configuration
 */
export function loadConfig(options: ConfigOptions = {}): StorageConfig {
  // Explicit env or overrides bypass the cache
  const usesCache = options.env === undefined && options.overrides === undefined;
  if (usesCache && cachedConfig) {
    return cachedConfig;
  }

  const isProduction = process.env.NODE_ENV === 'production';
  const { loadEnvFile: shouldLoadEnvFile = !isProduction, envFilePath } = options;

  const env = options.env ?? mergeEnvVars(shouldLoadEnvFile ? loadEnvFile(envFilePath) : {});
  const config = parseConfig({ ...readEnv(env), ...options.overrides });

  if (usesCache) {
    cachedConfig = config;
  }

  return config;
}

/**
 * Local-only preset: no remote replica, balanced compression
 */
export function localOnlyConfig(overrides: StorageConfigInput = {}): StorageConfig {
  return parseConfig({ ...overrides, backend: 'local-only' });
}

/**
 * Remote-enabled preset, syncing on every save unless told otherwise
 */
export function remoteConfig(
  syncStrategy: SyncStrategy = 'on-save',
  overrides: StorageConfigInput = {}
): StorageConfig {
  return parseConfig({ ...overrides, backend: 'remote', syncStrategy });
}

/**
 * Print the resolved configuration
 */
export function printConfig(config?: StorageConfig): void {
  const configToPrint = config ?? loadConfig();

  // eslint-disable-next-line no-console
  console.log(JSON.stringify(configToPrint, null, 2));
}

/**
 * Clear cached configuration (useful for testing)
 */
export function clearConfigCache(): void {
  cachedConfig = null;
}
