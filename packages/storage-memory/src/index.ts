/**
 * @packageDocumentation
 *
 * In-memory key-value store for streamkv.
 *
 * Keeps every value in memory and loses it when the process ends. Suited to
 * tests, development and server-side rendering.
 *
 * ```typescript
 * import { StreamingStore } from '@streamkv/core';
 * import { createMemoryStore } from '@streamkv/storage-memory';
 *
 * const store = new StreamingStore(createMemoryStore());
 * const count = store.getInt('count', { defaultValue: 0 });
 * ```
 *
 * @module @streamkv/storage-memory
 */
export * from './memory-store.js';
