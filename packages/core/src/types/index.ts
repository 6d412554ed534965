export type { KeyValueStore, StoredPrimitive } from './storage.js';
