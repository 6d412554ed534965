import type { Observable } from 'rxjs';
import { DateAdapter } from '../adapters/date-adapter.js';
import { EnumAdapter } from '../adapters/enum-adapter.js';
import { JsonAdapter, type JsonAdapterOptions } from '../adapters/json-adapter.js';
import { KeysAdapter } from '../adapters/keys-adapter.js';
import {
  BoolAdapter,
  DoubleAdapter,
  IntAdapter,
  StringAdapter,
  StringListAdapter,
} from '../adapters/primitive-adapters.js';
import type { ValueAdapter } from '../adapters/value-adapter.js';
import { ChangeBus } from '../change-bus/change-bus.js';
import {
  combineLatestValues,
  type CombineOptions,
  type StoredValues,
} from '../combinator/combine-values.js';
import { ValueCombinator } from '../combinator/value-combinator.js';
import { PreconditionError } from '../errors/streamkv-error.js';
import { createLogger, type KvLogger } from '../observability/logger.js';
import { RateGuard, type RateGuardConfig } from '../rate-guard/rate-guard.js';
import { commitWrite } from '../stored-value/commit.js';
import { StoredValue } from '../stored-value/stored-value.js';
import type { KeyValueStore } from '../types/storage.js';

/**
 * Configuration for a {@link StreamingStore}
 */
export interface StreamingStoreConfig {
  logger?: KvLogger;
  /**
   * Rate guard settings, an existing guard to share, or `false` to disable
   * tracking.
   */
  rateGuard?: RateGuardConfig | RateGuard | false;
}

/** Options shared by the typed getters */
export interface ValueOptions<T> {
  /** Emitted while the key holds no value */
  defaultValue: T;
}

/** Options for {@link StreamingStore.getCustomValue} */
export interface CustomValueOptions<T> extends ValueOptions<T> {
  adapter: ValueAdapter<T>;
}

/**
 * Reactive layer over a {@link KeyValueStore}.
 *
 * Every `getXxx()` returns a {@link StoredValue} that starts with the current
 * value and emits again whenever the key changes through this store. Writes
 * made directly on the wrapped store are not seen, so create one
 * `StreamingStore` per backing store and share it, for example through
 * {@link getStreamingStore}.
 *
 * @example
 * ```typescript
 * const store = new StreamingStore(createMemoryStore());
 *
 * const theme = store.getString('theme', { defaultValue: 'light' });
 * theme.subscribe((value) => applyTheme(value));
 *
 * await store.setString('theme', 'dark');
 *
 * store.getKeys().subscribe((keys) => console.log([...keys]));
 * // ['theme']
 * ```
 */
export class StreamingStore {
  readonly changeBus: ChangeBus;

  private readonly store: KeyValueStore;
  private readonly logger: KvLogger;
  private readonly rateGuardInstance: RateGuard | null;

  constructor(store: KeyValueStore, config: StreamingStoreConfig = {}) {
    this.store = store;
    this.logger = config.logger ?? createLogger({ module: 'streamkv' });
    this.changeBus = new ChangeBus(this.logger);
    this.rateGuardInstance = resolveRateGuard(config.rateGuard, this.logger);
  }

  /** The wrapped store */
  get backingStore(): KeyValueStore {
    return this.store;
  }

  /** The rate guard tracking subscriptions, or `null` when disabled */
  get rateGuard(): RateGuard | null {
    return this.rateGuardInstance;
  }

  get closed(): boolean {
    return this.changeBus.closed;
  }

  /**
   * The set of keys that currently hold a value. Emits again after every
   * change to any key. Read-only: `set()` and `clear()` throw.
   */
  getKeys(): StoredValue<ReadonlySet<string>> {
    return this.createValue(null, new Set<string>(), KeysAdapter.instance);
  }

  getBool(key: string, options: ValueOptions<boolean>): StoredValue<boolean> {
    return this.getCustomValue(key, { ...options, adapter: BoolAdapter.instance });
  }

  getInt(key: string, options: ValueOptions<number>): StoredValue<number> {
    return this.getCustomValue(key, { ...options, adapter: IntAdapter.instance });
  }

  getDouble(key: string, options: ValueOptions<number>): StoredValue<number> {
    return this.getCustomValue(key, { ...options, adapter: DoubleAdapter.instance });
  }

  getString(key: string, options: ValueOptions<string>): StoredValue<string> {
    return this.getCustomValue(key, { ...options, adapter: StringAdapter.instance });
  }

  getStringList(
    key: string,
    options: ValueOptions<readonly string[]>
  ): StoredValue<readonly string[]> {
    return this.getCustomValue(key, { ...options, adapter: StringListAdapter.instance });
  }

  getDate(key: string, options: ValueOptions<Date>): StoredValue<Date> {
    return this.getCustomValue(key, { ...options, adapter: DateAdapter.instance });
  }

  getJson<T>(key: string, options: ValueOptions<T> & JsonAdapterOptions<T>): StoredValue<T> {
    return this.getCustomValue(key, {
      defaultValue: options.defaultValue,
      adapter: new JsonAdapter<T>(options),
    });
  }

  getEnum<T extends string>(
    key: string,
    options: ValueOptions<T> & { values: readonly T[] }
  ): StoredValue<T> {
    return this.getCustomValue(key, {
      defaultValue: options.defaultValue,
      adapter: new EnumAdapter(options.values),
    });
  }

  /**
   * A stored value of any type, persisted through `adapter`.
   */
  getCustomValue<T>(key: string, options: CustomValueOptions<T>): StoredValue<T> {
    requireKey(key, 'get');
    return this.createValue(key, options.defaultValue, options.adapter);
  }

  setBool(key: string, value: boolean): Promise<boolean> {
    return this.setCustomValue(key, value, BoolAdapter.instance);
  }

  setInt(key: string, value: number): Promise<boolean> {
    return this.setCustomValue(key, value, IntAdapter.instance);
  }

  setDouble(key: string, value: number): Promise<boolean> {
    return this.setCustomValue(key, value, DoubleAdapter.instance);
  }

  setString(key: string, value: string): Promise<boolean> {
    return this.setCustomValue(key, value, StringAdapter.instance);
  }

  setStringList(key: string, value: readonly string[]): Promise<boolean> {
    return this.setCustomValue(key, value, StringListAdapter.instance);
  }

  setDate(key: string, value: Date): Promise<boolean> {
    return this.setCustomValue(key, value, DateAdapter.instance);
  }

  /**
   * Persist `value` through `adapter` and notify every subscriber of `key`.
   *
   * @returns Whether the store persisted the value
   */
  setCustomValue<T>(key: string, value: T, adapter: ValueAdapter<T>): Promise<boolean> {
    requireKey(key, 'set');
    if (!adapter) {
      throw new PreconditionError('STREAMKV_A101', { key });
    }
    return commitWrite(
      () => adapter.write(this.store, key, value),
      () => this.changeBus.publish(key),
      this.logger,
      { key, operation: 'set', valueType: adapter.valueType }
    );
  }

  /**
   * Remove the value for `key`. Its subscribers then receive their default.
   */
  remove(key: string): Promise<boolean> {
    requireKey(key, 'remove');
    return commitWrite(
      () => this.store.remove(key),
      () => this.changeBus.publish(key),
      this.logger,
      { key, operation: 'remove' }
    );
  }

  /**
   * Remove every value. Each key that existed before is published, so every
   * subscriber receives its default.
   */
  clear(): Promise<boolean> {
    const keys = [...(this.store.getKeys() ?? [])];
    return commitWrite(
      () => this.store.clear(),
      () => this.changeBus.publishAll(keys),
      this.logger,
      { operation: 'clear', keys: keys.length }
    );
  }

  /** Snapshots of several stored values, see {@link combineLatestValues} */
  combine<V extends readonly unknown[] | []>(
    inputs: StoredValues<V>,
    options?: CombineOptions
  ): Observable<Readonly<V>> {
    return combineLatestValues(inputs, { logger: this.logger, ...options });
  }

  /** A rebindable combination of stored values, see {@link ValueCombinator} */
  createCombinator<V extends readonly unknown[] | []>(
    inputs: StoredValues<V>,
    options?: CombineOptions
  ): ValueCombinator<V> {
    return new ValueCombinator(inputs, { logger: this.logger, ...options });
  }

  /**
   * Complete every stream of this store. The backing store is left open.
   */
  close(): void {
    if (this.closed) return;

    this.changeBus.close();
    this.rateGuardInstance?.destroy();
    this.logger.info('Streaming store closed');
  }

  private createValue<T>(key: string | null, defaultValue: T, adapter: ValueAdapter<T>): StoredValue<T> {
    return new StoredValue<T>({
      store: this.store,
      key,
      defaultValue,
      adapter,
      changeBus: this.changeBus,
      rateGuard: this.rateGuardInstance,
      logger: this.logger,
    });
  }
}

function requireKey(key: unknown, operation: string): void {
  if (typeof key !== 'string') {
    throw new PreconditionError('STREAMKV_A103', { operation, key: String(key) });
  }
}

function resolveRateGuard(
  option: StreamingStoreConfig['rateGuard'],
  logger: KvLogger
): RateGuard | null {
  if (option === false) return null;
  if (option instanceof RateGuard) return option;
  return new RateGuard({ logger, ...option });
}
