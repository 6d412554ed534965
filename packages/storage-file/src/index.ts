/**
 * @packageDocumentation
 *
 * JSON file key-value store for streamkv.
 *
 * ```typescript
 * import { getStreamingStore } from '@streamkv/core';
 * import { FileKeyValueStore } from '@streamkv/storage-file';
 *
 * const store = await getStreamingStore({
 *   open: () => FileKeyValueStore.open({ path: './settings.json' }),
 * });
 * ```
 *
 * @module @streamkv/storage-file
 */
export { FileKeyValueStore, type FileStoreConfig } from './file-store.js';
export {
  STORE_FILE_VERSION,
  StoreFileSchema,
  StoredEntrySchema,
  type StoreFile,
  type StoredEntry,
} from './file-format.js';
