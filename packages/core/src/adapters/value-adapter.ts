import type { KeyValueStore } from '../types/storage.js';

/**
 * Knows how to read and write a value of type `T` through the primitive
 * getters and setters of a {@link KeyValueStore}.
 *
 * `valueType` names the value type together with its primitive
 * representation. Two stored values for the same key are equal only when
 * their adapters share a `valueType`, so two adapters that persist the same
 * `T` differently must use different tags.
 *
 * @example
 * ```typescript
 * const PointAdapter: ValueAdapter<Point> = {
 *   valueType: 'point',
 *   read: (store, key) => {
 *     const raw = key === null ? null : store.getStringList(key);
 *     return raw ? { x: Number(raw[0]), y: Number(raw[1]) } : null;
 *   },
 *   write: (store, key, value) => store.setStringList(key, [String(value.x), String(value.y)]),
 * };
 * ```
 */
export interface ValueAdapter<T> {
  readonly valueType: string;

  /**
   * Read the value for `key`, or `null` when the store holds none. The key is
   * `null` only for the aggregate key view.
   */
  read(store: KeyValueStore, key: string | null): T | null;

  /** Persist `value` for `key`. Resolves to `true` on success. */
  write(store: KeyValueStore, key: string, value: T): Promise<boolean>;
}
