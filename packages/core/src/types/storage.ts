/**
 * Primitive representations a backing store knows how to persist.
 */
export type StoredPrimitive = boolean | number | string | string[];

/**
 * Synchronous, typed key-value storage.
 *
 * Reads are synchronous and return `null` for a missing key (or a key holding
 * a value of another type). Writes are asynchronous and resolve to `true`
 * once the value is persisted, `false` when the store could not persist it.
 *
 * For a reactive layer on top of a store, wrap it in a {@link StreamingStore}.
 */
export interface KeyValueStore {
  /** All keys that currently hold a value. `null` or empty when there are none. */
  getKeys(): ReadonlySet<string> | null;

  getBool(key: string): boolean | null;
  getInt(key: string): number | null;
  getDouble(key: string): number | null;
  getString(key: string): string | null;
  getStringList(key: string): string[] | null;

  setBool(key: string, value: boolean): Promise<boolean>;
  setInt(key: string, value: number): Promise<boolean>;
  setDouble(key: string, value: number): Promise<boolean>;
  setString(key: string, value: string): Promise<boolean>;
  setStringList(key: string, value: readonly string[]): Promise<boolean>;

  /** Remove the entry for `key`. Resolves to `true` when the store is consistent afterwards. */
  remove(key: string): Promise<boolean>;

  /** Remove every entry. */
  clear(): Promise<boolean>;
}
