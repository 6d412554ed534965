import type { KeyValueStore } from '../types/storage.js';
import type { ValueAdapter } from './value-adapter.js';

/**
 * Stores one member of a string union by its name.
 *
 * A stored name that is not one of `values` reads as absent, so the stored
 * value falls back to its default.
 *
 * @example
 * ```typescript
 * const THEMES = ['light', 'dark', 'system'] as const;
 *
 * const theme = store.getCustomValue('theme', {
 *   defaultValue: 'system',
 *   adapter: new EnumAdapter(THEMES),
 * });
 * ```
 */
export class EnumAdapter<T extends string> implements ValueAdapter<T> {
  readonly valueType: string;

  private readonly members: ReadonlySet<string>;

  constructor(readonly values: readonly T[]) {
    this.valueType = `enum:${values.join('|')}`;
    this.members = new Set(values);
  }

  read(store: KeyValueStore, key: string | null): T | null {
    if (key === null) return null;

    const raw = store.getString(key);
    if (raw === null) return null;

    return this.values.find((member) => member === raw) ?? null;
  }

  write(store: KeyValueStore, key: string, value: T): Promise<boolean> {
    if (!this.members.has(value)) {
      return Promise.resolve(false);
    }
    return store.setString(key, value);
  }
}
