import { PreconditionError } from '../errors/streamkv-error.js';
import type { KeyValueStore } from '../types/storage.js';
import type { ValueAdapter } from './value-adapter.js';

/**
 * Reads the set of keys that currently hold a value. Backs the aggregate key
 * view and cannot be written.
 */
export class KeysAdapter implements ValueAdapter<ReadonlySet<string>> {
  static readonly instance = new KeysAdapter();
  readonly valueType = 'keys';

  private constructor() {}

  read(store: KeyValueStore): ReadonlySet<string> {
    return new Set(store.getKeys() ?? []);
  }

  write(): Promise<boolean> {
    throw new PreconditionError('STREAMKV_A100', { operation: 'write' });
  }
}
