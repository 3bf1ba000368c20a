/**
 * Per-image persisted state.
 */

export {
  serializeState,
  deserializeState,
  isSerializedState,
  stringifyState,
  parseState,
  createDefaultState
} from './persisted-state.js';
export type { PersistedState, SerializedState } from './persisted-state.js';
export {
  FileStorageAdapter,
  MemoryStorageAdapter,
  configPathFor,
  resolveConfigDir,
  loadOrDefault
} from './storage.js';
export type { StorageAdapter, SaveResult, LoadResult } from './storage.js';
