/**
 * Core Utilities Module
 *
 * Shared utilities for error handling, logging, atomic file writes and
 * per-key locking.
 */

export * from './errors.js';
export * from './logger.js';
export * from './atomic-write.js';
export * from './keyed-mutex.js';
