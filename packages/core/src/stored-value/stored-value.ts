import { Observable, map, type Observer, type Subscribable } from 'rxjs';
import type { ValueAdapter } from '../adapters/value-adapter.js';
import type { ChangeBus } from '../change-bus/change-bus.js';
import { PreconditionError } from '../errors/streamkv-error.js';
import { createLogger, type KvLogger } from '../observability/logger.js';
import type { RateGuard } from '../rate-guard/rate-guard.js';
import type { KeyValueStore } from '../types/storage.js';
import { isEqual, type EqualityFn } from '../utils/equality.js';
import { commitWrite } from './commit.js';
import { dedupe } from './dedupe.js';
import { ValueSubscription } from './value-subscription.js';

/**
 * Everything a stored value is bound to.
 */
export interface StoredValueOptions<T> {
  store: KeyValueStore;
  /** The key, or `null` for the aggregate key view */
  key: string | null;
  /** Emitted while the store holds no value for the key */
  defaultValue: T;
  adapter: ValueAdapter<T>;
  changeBus: ChangeBus;
  /** Records every subscription, when given */
  rateGuard?: RateGuard | null;
  logger?: KvLogger;
}

/**
 * Options for {@link StoredValue.subscribe}
 */
export interface SubscribeOptions<T> {
  /**
   * Drop values equal to the last one delivered to this subscriber. `true`
   * compares structurally; a function replaces the comparison.
   */
  distinct?: boolean | EqualityFn<T>;
}

/**
 * A reactive handle on one key of a {@link KeyValueStore}.
 *
 * Read the current value synchronously with {@link value}, follow it with
 * {@link subscribe} or {@link asObservable}, and change it with {@link set}
 * and {@link clear}. Every subscription first receives the current value
 * (or the default while the key is absent), then a fresh read after each
 * change to the key.
 *
 * Handles hold no state until subscribed, and two handles on the same key
 * and value type are {@link equals | equal}. A UI layer can compare a newly
 * requested handle with the one it already follows instead of subscribing
 * again.
 *
 * @typeParam T - The type of value stored under the key
 *
 * @example
 * ```typescript
 * const counter = store.getInt('counter', { defaultValue: 0 });
 *
 * counter.value; // 0
 *
 * const sub = counter.subscribe((value) => console.log('counter', value));
 * // logs "counter 0"
 *
 * await counter.set(1);
 * // logs "counter 1"
 *
 * await counter.clear();
 * // logs "counter 0"
 *
 * sub.unsubscribe();
 * ```
 */
export class StoredValue<T> implements Subscribable<T> {
  readonly key: string | null;
  readonly defaultValue: T;

  private readonly store: KeyValueStore;
  private readonly adapter: ValueAdapter<T>;
  private readonly changeBus: ChangeBus;
  private readonly rateGuard: RateGuard | null;
  private readonly logger: KvLogger;

  constructor(options: StoredValueOptions<T>) {
    const { key, defaultValue, adapter } = options;
    const label = key ?? '(all keys)';

    // Plain JavaScript callers can get past the types.
    if (!adapter) {
      throw new PreconditionError('STREAMKV_A101', { key: label });
    }
    if (defaultValue === null || defaultValue === undefined) {
      throw new PreconditionError('STREAMKV_A102', { key: label });
    }

    this.key = key;
    this.defaultValue = defaultValue;
    this.store = options.store;
    this.adapter = adapter;
    this.changeBus = options.changeBus;
    this.rateGuard = options.rateGuard ?? null;
    this.logger = (options.logger ?? createLogger({ module: 'streamkv' })).child('value');
  }

  /** Value type tag of the adapter */
  get valueType(): string {
    return this.adapter.valueType;
  }

  /** Equal for every handle on the same key and value type */
  get identity(): string {
    return `${this.adapter.valueType}:${this.key ?? '*'}`;
  }

  /**
   * The value currently in the store, or {@link defaultValue} when there is
   * none. Reads the store on every access and never touches the change bus.
   */
  get value(): T {
    return this.adapter.read(this.store, this.key) ?? this.defaultValue;
  }

  /**
   * Cold observable of this value: emits the current value on subscribe,
   * then the re-read value after each change to the key (after every change
   * for the aggregate key view). Completes when the store session closes.
   */
  asObservable(): Observable<T> {
    return new Observable<T>((subscriber) => {
      this.rateGuard?.track(this.key);
      subscriber.next(this.value);
      return this.changeBus
        .changes(this.key)
        .pipe(map(() => this.value))
        .subscribe(subscriber);
    });
  }

  /**
   * Like {@link asObservable}, without consecutive duplicates.
   */
  distinct(equals: EqualityFn<T> = isEqual): Observable<T> {
    return this.asObservable().pipe(dedupe(undefined, equals));
  }

  /**
   * Follow this value. Each call builds an independent pipeline, so every
   * subscriber sees every change.
   *
   * @returns A subscription that can be paused, resumed and unsubscribed
   */
  subscribe(
    observerOrNext?: Partial<Observer<T>> | ((value: T) => void),
    options: SubscribeOptions<T> = {}
  ): ValueSubscription<T> {
    const observer: Partial<Observer<T>> =
      typeof observerOrNext === 'function' ? { next: observerOrNext } : (observerOrNext ?? {});
    const equals =
      options.distinct === true ? isEqual : typeof options.distinct === 'function' ? options.distinct : null;

    this.rateGuard?.track(this.key);

    return new ValueSubscription<T>(
      () => this.value,
      this.changeBus.changes(this.key),
      observer,
      equals
    ).start();
  }

  /**
   * Persist `value` and notify every subscriber of the key.
   *
   * @returns Whether the store persisted the value. Store failures resolve to `false`.
   * @throws PreconditionError synchronously on the aggregate key view
   */
  set(value: T): Promise<boolean> {
    const key = this.requireKey('set');
    return commitWrite(
      () => this.adapter.write(this.store, key, value),
      () => this.changeBus.publish(key),
      this.logger,
      { key, operation: 'set', valueType: this.adapter.valueType }
    );
  }

  /**
   * Remove the value. Subscribers then receive {@link defaultValue}.
   *
   * @returns Whether the store removed the value
   * @throws PreconditionError synchronously on the aggregate key view
   */
  clear(): Promise<boolean> {
    const key = this.requireKey('clear');
    return commitWrite(
      () => this.store.remove(key),
      () => this.changeBus.publish(key),
      this.logger,
      { key, operation: 'clear' }
    );
  }

  /**
   * Whether `other` is bound to the same key with the same value type.
   * Object identity does not matter.
   */
  equals(other: unknown): boolean {
    return (
      other instanceof StoredValue &&
      other.key === this.key &&
      other.valueType === this.adapter.valueType
    );
  }

  toString(): string {
    return `StoredValue(${this.identity})`;
  }

  private requireKey(operation: string): string {
    if (this.key === null) {
      throw new PreconditionError('STREAMKV_A100', { operation });
    }
    return this.key;
  }
}
