import type { KeyValueStore } from '../types/storage.js';
import type { ValueAdapter } from './value-adapter.js';

/** Reads and writes a `boolean`. */
export class BoolAdapter implements ValueAdapter<boolean> {
  static readonly instance = new BoolAdapter();
  readonly valueType = 'bool';

  private constructor() {}

  read(store: KeyValueStore, key: string | null): boolean | null {
    return key === null ? null : store.getBool(key);
  }

  write(store: KeyValueStore, key: string, value: boolean): Promise<boolean> {
    return store.setBool(key, value);
  }
}

/** Reads and writes an integer `number`. */
export class IntAdapter implements ValueAdapter<number> {
  static readonly instance = new IntAdapter();
  readonly valueType = 'int';

  private constructor() {}

  read(store: KeyValueStore, key: string | null): number | null {
    return key === null ? null : store.getInt(key);
  }

  write(store: KeyValueStore, key: string, value: number): Promise<boolean> {
    return store.setInt(key, value);
  }
}

/** Reads and writes a floating point `number`. */
export class DoubleAdapter implements ValueAdapter<number> {
  static readonly instance = new DoubleAdapter();
  readonly valueType = 'double';

  private constructor() {}

  read(store: KeyValueStore, key: string | null): number | null {
    return key === null ? null : store.getDouble(key);
  }

  write(store: KeyValueStore, key: string, value: number): Promise<boolean> {
    return store.setDouble(key, value);
  }
}

/** Reads and writes a `string`. */
export class StringAdapter implements ValueAdapter<string> {
  static readonly instance = new StringAdapter();
  readonly valueType = 'string';

  private constructor() {}

  read(store: KeyValueStore, key: string | null): string | null {
    return key === null ? null : store.getString(key);
  }

  write(store: KeyValueStore, key: string, value: string): Promise<boolean> {
    return store.setString(key, value);
  }
}

/** Reads and writes a list of strings. */
export class StringListAdapter implements ValueAdapter<readonly string[]> {
  static readonly instance = new StringListAdapter();
  readonly valueType = 'string-list';

  private constructor() {}

  read(store: KeyValueStore, key: string | null): readonly string[] | null {
    return key === null ? null : store.getStringList(key);
  }

  write(store: KeyValueStore, key: string, value: readonly string[]): Promise<boolean> {
    return store.setStringList(key, value);
  }
}
