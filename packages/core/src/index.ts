/**
 * @anchorlog/core - Versioning and sync engine for spatial anchors
 *
 * - Append-only per-space event logs with gapless per-anchor versions
 * - Timeline queries: state at a date, diffs, scrubber positions
 * - Local-first persistence with optional remote replication
 * - Payload compression for space maps
 */

export * from './utils/index.js';
export * from './models/index.js';
export * from './compression/index.js';
export * from './timeline/index.js';
export * from './storage/index.js';
export * from './remote/index.js';
export * from './sync/index.js';
