/**
 * Configuration Schema
 *
 * Defines every storage setting with validation, types, and defaults.
 */

import { z } from 'zod';

/** 512 MiB */
export const DEFAULT_MAX_DECOMPRESSED_BYTES = 512 * 1024 * 1024;

export const BACKENDS = ['local-only', 'remote'] as const;
export const SYNC_STRATEGIES = ['manual', 'on-save'] as const;
export const COMPRESSION_LEVELS = ['none', 'balanced'] as const;
export const LOG_LEVELS = ['debug', 'info', 'warn', 'error'] as const;

/**
 * Complete configuration schema for the storage engine
 */
export const storageConfigSchema = z.object({
  // ============================================================================
  // Backend & Sync
  // ============================================================================
  backend: z.enum(BACKENDS).default('local-only'),
  syncStrategy: z.enum(SYNC_STRATEGIES).default('manual'),

  // ============================================================================
  // Payload Compression
  // ============================================================================
  compression: z.enum(COMPRESSION_LEVELS).default('balanced'),
  maxDecompressedBytes: z.coerce.number().int().min(1024).default(DEFAULT_MAX_DECOMPRESSED_BYTES),

  // ============================================================================
  // Local Store
  // ============================================================================
  dataDir: z.string().min(1).default('.anchorlog'),

  // ============================================================================
  // Retry Queue
  // ============================================================================
  maxRetryAttempts: z.coerce.number().int().min(1).max(100).default(5),

  // ============================================================================
  // Logging
  // ============================================================================
  logLevel: z.enum(LOG_LEVELS).default('info'),
});

export type StorageConfig = z.infer<typeof storageConfigSchema>;
export type StorageConfigInput = z.input<typeof storageConfigSchema>;
export type Backend = StorageConfig['backend'];
export type SyncStrategy = StorageConfig['syncStrategy'];
export type CompressionLevel = StorageConfig['compression'];
export type ConfigLogLevel = StorageConfig['logLevel'];

/**
 * Environment variable backing each setting
 */
export const ENV_KEYS = {
  backend: 'ANCHORLOG_BACKEND',
  syncStrategy: 'ANCHORLOG_SYNC_STRATEGY',
  compression: 'ANCHORLOG_COMPRESSION',
  maxDecompressedBytes: 'ANCHORLOG_MAX_DECOMPRESSED_BYTES',
  dataDir: 'ANCHORLOG_DATA_DIR',
  maxRetryAttempts: 'ANCHORLOG_MAX_RETRY_ATTEMPTS',
  logLevel: 'ANCHORLOG_LOG_LEVEL',
} as const satisfies Record<keyof StorageConfig, string>;
