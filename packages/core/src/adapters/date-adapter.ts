import { StreamKvError } from '../errors/streamkv-error.js';
import type { KeyValueStore } from '../types/storage.js';
import type { ValueAdapter } from './value-adapter.js';

/**
 * Stores a `Date` as its UTC epoch milliseconds, written as a decimal string.
 */
export class DateAdapter implements ValueAdapter<Date> {
  static readonly instance = new DateAdapter();
  readonly valueType = 'date';

  private constructor() {}

  read(store: KeyValueStore, key: string | null): Date | null {
    if (key === null) return null;

    const raw = store.getString(key);
    if (raw === null) return null;

    const millis = Number(raw);
    if (raw.trim() === '' || !Number.isInteger(millis)) {
      throw new StreamKvError({
        code: 'STREAMKV_V200',
        message: `Stored value for "${key}" is not an epoch timestamp`,
        context: { key, raw, valueType: this.valueType },
      });
    }
    return new Date(millis);
  }

  write(store: KeyValueStore, key: string, value: Date): Promise<boolean> {
    return store.setString(key, String(value.getTime()));
  }
}
