import { StreamKvError } from '../errors/streamkv-error.js';
import { createLogger } from '../observability/logger.js';
import type { KeyValueStore } from '../types/storage.js';
import { StreamingStore, type StreamingStoreConfig } from './streaming-store.js';

/**
 * Options for {@link getStreamingStore}
 */
export interface SessionOptions extends StreamingStoreConfig {
  /** Opens the backing store. Called once per session. */
  open: () => KeyValueStore | Promise<KeyValueStore>;
}

let pending: Promise<StreamingStore> | null = null;
let current: StreamingStore | null = null;

/**
 * The shared {@link StreamingStore} of this process.
 *
 * The first call opens the backing store through `options.open`; every later
 * call, including calls made while the store is still opening, resolves to
 * the same instance and ignores its options. When opening fails the promise
 * rejects with `STREAMKV_S302` and the next call tries again.
 *
 * @example
 * ```typescript
 * const store = await getStreamingStore({
 *   open: () => FileKeyValueStore.open({ path: './settings.json' }),
 * });
 *
 * store.getBool('onboarded', { defaultValue: false }).subscribe(render);
 * ```
 */
export function getStreamingStore(options: SessionOptions): Promise<StreamingStore> {
  if (pending) return pending;

  const log = (options.logger ?? createLogger({ module: 'streamkv' })).child('session');

  const opening = openSession(options).then(
    (streaming) => {
      // Reset while opening: this store is no longer the shared one.
      if (pending !== opening) {
        streaming.close();
        log.debug('Session opened after reset; closed');
        return streaming;
      }
      current = streaming;
      log.info('Session opened');
      return streaming;
    },
    (error: unknown) => {
      if (pending === opening) pending = null;
      const wrapped = StreamKvError.wrap(
        error instanceof Error ? error : new Error(String(error)),
        'STREAMKV_S302'
      );
      log.error('Session failed to open', wrapped);
      throw wrapped;
    }
  );

  pending = opening;
  return opening;
}

async function openSession(options: SessionOptions): Promise<StreamingStore> {
  const { open, ...config } = options;
  const store = await open();
  return new StreamingStore(store, config);
}

/**
 * Close the shared store and forget it, so the next
 * {@link getStreamingStore} call opens a new one. A store still opening
 * is closed as soon as it opens.
 */
export function resetStreamingStoreForTesting(): void {
  current?.close();
  current = null;
  pending = null;
}
