import type { KeyValueStore, StoredPrimitive } from '@streamkv/core';

type Entry =
  | { type: 'bool'; value: boolean }
  | { type: 'int'; value: number }
  | { type: 'double'; value: number }
  | { type: 'string'; value: string }
  | { type: 'string-list'; value: string[] };

/**
 * Initial contents for {@link createMemoryStore}. Numbers that are integers
 * are stored as ints, other numbers as doubles.
 */
export type MemoryStoreContents = Record<string, StoredPrimitive>;

/**
 * In-memory key-value store
 *
 * Keeps every value in a `Map`, tagged with the type it was written with.
 * Reading a key with another type's getter returns `null`. Lists are copied
 * on the way in and out, so callers cannot mutate stored values.
 */
export class MemoryKeyValueStore implements KeyValueStore {
  private readonly entries = new Map<string, Entry>();

  constructor(initial: MemoryStoreContents = {}) {
    for (const [key, value] of Object.entries(initial)) {
      this.entries.set(key, toEntry(value));
    }
  }

  /** Number of keys holding a value */
  get size(): number {
    return this.entries.size;
  }

  getKeys(): ReadonlySet<string> {
    return new Set(this.entries.keys());
  }

  getBool(key: string): boolean | null {
    const entry = this.entries.get(key);
    return entry?.type === 'bool' ? entry.value : null;
  }

  getInt(key: string): number | null {
    const entry = this.entries.get(key);
    return entry?.type === 'int' ? entry.value : null;
  }

  getDouble(key: string): number | null {
    const entry = this.entries.get(key);
    return entry?.type === 'double' ? entry.value : null;
  }

  getString(key: string): string | null {
    const entry = this.entries.get(key);
    return entry?.type === 'string' ? entry.value : null;
  }

  getStringList(key: string): string[] | null {
    const entry = this.entries.get(key);
    return entry?.type === 'string-list' ? [...entry.value] : null;
  }

  async setBool(key: string, value: boolean): Promise<boolean> {
    this.entries.set(key, { type: 'bool', value });
    return true;
  }

  async setInt(key: string, value: number): Promise<boolean> {
    if (!Number.isInteger(value)) return false;
    this.entries.set(key, { type: 'int', value });
    return true;
  }

  async setDouble(key: string, value: number): Promise<boolean> {
    this.entries.set(key, { type: 'double', value });
    return true;
  }

  async setString(key: string, value: string): Promise<boolean> {
    this.entries.set(key, { type: 'string', value });
    return true;
  }

  async setStringList(key: string, value: readonly string[]): Promise<boolean> {
    this.entries.set(key, { type: 'string-list', value: [...value] });
    return true;
  }

  async remove(key: string): Promise<boolean> {
    this.entries.delete(key);
    return true;
  }

  async clear(): Promise<boolean> {
    this.entries.clear();
    return true;
  }

  /**
   * Plain copy of the contents, in the shape {@link createMemoryStore} takes
   */
  toJSON(): MemoryStoreContents {
    const contents: MemoryStoreContents = {};
    for (const [key, entry] of this.entries) {
      contents[key] = entry.type === 'string-list' ? [...entry.value] : entry.value;
    }
    return contents;
  }
}

function toEntry(value: StoredPrimitive): Entry {
  if (typeof value === 'boolean') return { type: 'bool', value };
  if (typeof value === 'string') return { type: 'string', value };
  if (typeof value === 'number') {
    return Number.isInteger(value) ? { type: 'int', value } : { type: 'double', value };
  }
  return { type: 'string-list', value: [...value] };
}

/**
 * Create an in-memory key-value store
 *
 * @example
 * ```typescript
 * import { StreamingStore } from '@streamkv/core';
 * import { createMemoryStore } from '@streamkv/storage-memory';
 *
 * const store = new StreamingStore(createMemoryStore({ theme: 'dark', launches: 3 }));
 * ```
 */
export function createMemoryStore(initial?: MemoryStoreContents): MemoryKeyValueStore {
  return new MemoryKeyValueStore(initial);
}
