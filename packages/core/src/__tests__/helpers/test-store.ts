import type { KeyValueStore, StoredPrimitive } from '../../types/storage.js';

export type WriteMode = 'ok' | 'false' | 'reject';

/**
 * Map-backed store for tests. Values keep the JavaScript type they were
 * written with; `writeMode` makes every write succeed, resolve to `false`
 * or reject without touching the data.
 */
export class TestStore implements KeyValueStore {
  readonly data = new Map<string, StoredPrimitive>();
  writeMode: WriteMode = 'ok';
  writes = 0;

  constructor(initial: Record<string, StoredPrimitive> = {}) {
    for (const [key, value] of Object.entries(initial)) {
      this.data.set(key, value);
    }
  }

  getKeys(): ReadonlySet<string> {
    return new Set(this.data.keys());
  }

  getBool(key: string): boolean | null {
    const value = this.data.get(key);
    return typeof value === 'boolean' ? value : null;
  }

  getInt(key: string): number | null {
    const value = this.data.get(key);
    return typeof value === 'number' && Number.isInteger(value) ? value : null;
  }

  getDouble(key: string): number | null {
    const value = this.data.get(key);
    return typeof value === 'number' ? value : null;
  }

  getString(key: string): string | null {
    const value = this.data.get(key);
    return typeof value === 'string' ? value : null;
  }

  getStringList(key: string): string[] | null {
    const value = this.data.get(key);
    return Array.isArray(value) ? [...value] : null;
  }

  setBool(key: string, value: boolean): Promise<boolean> {
    return this.write(() => this.data.set(key, value));
  }

  setInt(key: string, value: number): Promise<boolean> {
    return this.write(() => this.data.set(key, value));
  }

  setDouble(key: string, value: number): Promise<boolean> {
    return this.write(() => this.data.set(key, value));
  }

  setString(key: string, value: string): Promise<boolean> {
    return this.write(() => this.data.set(key, value));
  }

  setStringList(key: string, value: readonly string[]): Promise<boolean> {
    return this.write(() => this.data.set(key, [...value]));
  }

  remove(key: string): Promise<boolean> {
    return this.write(() => this.data.delete(key));
  }

  clear(): Promise<boolean> {
    return this.write(() => this.data.clear());
  }

  private async write(apply: () => void): Promise<boolean> {
    this.writes++;
    if (this.writeMode === 'reject') {
      throw new Error('disk unavailable');
    }
    if (this.writeMode === 'false') {
      return false;
    }
    apply();
    return true;
  }
}
