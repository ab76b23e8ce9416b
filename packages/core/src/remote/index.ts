export { toRemoteEvent, type RemoteAdapter, type RemoteCollection, type RemoteEvent } from './types.js';
export {
  InMemoryCollection,
  InMemoryRemoteAdapter,
  RemoteUnavailableError,
  type RemoteCollectionName,
  type RemoteOperationName,
} from './in-memory.js';
