/**
 * Storage Module
 *
 * Local persistence for spaces, anchors and their event logs, and the
 * AnchorStorage entry point built on top of it.
 *
 * @module storage
 */

export {
  AnchorStorage,
  type AnchorStorageOptions,
  type EventLogSummary,
  type LoadAnchorsOptions,
} from './anchor-storage.js';
export { LocalStore, type LocalStoreOptions } from './local-store.js';
export {
  anchorRecordSchema,
  eventRecordSchema,
  spaceHeaderSchema,
  pendingOperationSchema,
  syncStateSchema,
} from './schemas.js';
