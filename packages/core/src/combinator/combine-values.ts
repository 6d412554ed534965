import { Observable, Subject, type Observer, type Subscription, type Unsubscribable } from 'rxjs';
import { ensureStreamKvError } from '../errors/streamkv-error.js';
import { createLogger, type KvLogger } from '../observability/logger.js';
import type { StoredValue } from '../stored-value/stored-value.js';
import type { ValueSubscription } from '../stored-value/value-subscription.js';
import { isEqual } from '../utils/equality.js';

/**
 * A tuple of stored values, one per slot of `V`.
 */
export type StoredValues<V extends readonly unknown[]> = {
  readonly [K in keyof V]: StoredValue<V[K]>;
};

/**
 * Options for combining stored values
 */
export interface CombineOptions {
  /**
   * When an input fails, cancel every other input and forward the error.
   * With `false`, only the failing input stops and the others keep emitting.
   * @default true
   */
  cancelOnError?: boolean;
  /** Receives input errors when `cancelOnError` is `false`. Logged when absent. */
  onError?: (error: unknown, index: number) => void;
  logger?: KvLogger;
}

/**
 * Follows several stored values as one stream of snapshots.
 *
 * The current value of every input is read before any of them is
 * subscribed, and that snapshot is emitted first. Afterwards each change of
 * input `i` replaces slot `i` and emits a new frozen snapshot; inputs are
 * deduplicated, so an unchanged value emits nothing.
 *
 * Completes once every input has completed, immediately for no inputs.
 * Pause, resume and unsubscribe act on every input at once.
 */
export class CombinedSubscription<V extends readonly unknown[]> implements Unsubscribable {
  private readonly output = new Subject<Readonly<V>>();
  private readonly outputSubscription: Subscription;
  private readonly branches: ValueSubscription<unknown>[] = [];
  private readonly cancelOnError: boolean;
  private readonly onError?: (error: unknown, index: number) => void;
  private readonly logger: KvLogger;
  private values: unknown[] = [];
  private running = 0;
  private isPaused = false;
  private isClosed = false;

  constructor(
    inputs: StoredValues<V>,
    observer: Partial<Observer<Readonly<V>>>,
    options: CombineOptions = {}
  ) {
    this.cancelOnError = options.cancelOnError ?? true;
    this.onError = options.onError;
    this.logger = (options.logger ?? createLogger({ module: 'streamkv' })).child('combine');
    this.outputSubscription = this.output.subscribe(observer);

    const list: readonly StoredValue<unknown>[] = inputs;
    try {
      this.values = list.map((input) => input.value);
    } catch (error) {
      this.close(() => this.output.error(error));
      return;
    }

    this.output.next(this.snapshot);

    if (list.length === 0) {
      this.close(() => this.output.complete());
      return;
    }

    this.running = list.length;
    list.forEach((input, index) => this.connect(input, index));
  }

  get closed(): boolean {
    return this.isClosed;
  }

  get paused(): boolean {
    return this.isPaused;
  }

  /** The latest snapshot */
  get snapshot(): Readonly<V> {
    return freezeSnapshot<V>(this.values);
  }

  pause(): void {
    if (this.isClosed || this.isPaused) return;

    this.isPaused = true;
    for (const branch of this.branches) {
      branch.pause();
    }
  }

  resume(): void {
    if (this.isClosed || !this.isPaused) return;

    this.isPaused = false;
    for (const branch of this.branches) {
      branch.resume();
    }
  }

  unsubscribe(): void {
    this.close(() => this.outputSubscription.unsubscribe());
  }

  private connect(input: StoredValue<unknown>, index: number): void {
    if (this.isClosed) return;

    let connected = false;
    const branch = input.subscribe(
      {
        next: (value) => {
          // The value replayed on subscribe is already in the snapshot.
          if (!connected && isEqual(this.values[index], value)) return;
          this.update(index, value);
        },
        error: (error: unknown) => this.handleError(error, index),
        complete: () => this.handleComplete(),
      },
      { distinct: true }
    );
    connected = true;

    if (this.isClosed) {
      branch.unsubscribe();
      return;
    }
    this.branches.push(branch);
  }

  private update(index: number, value: unknown): void {
    if (this.isClosed) return;

    const next = this.values.slice();
    next[index] = value;
    this.values = next;
    this.output.next(this.snapshot);
  }

  private handleError(error: unknown, index: number): void {
    if (this.isClosed) return;

    if (this.cancelOnError) {
      this.close(() => this.output.error(error));
      return;
    }

    if (this.onError) {
      this.onError(error, index);
    } else {
      this.logger.error('Combined input failed', ensureStreamKvError(error), { index });
    }
    this.handleComplete();
  }

  private handleComplete(): void {
    if (this.isClosed) return;

    this.running--;
    if (this.running === 0) {
      this.close(() => this.output.complete());
    }
  }

  private close(signal: () => void): void {
    if (this.isClosed) return;

    this.isClosed = true;
    for (const branch of this.branches) {
      branch.unsubscribe();
    }
    this.branches.length = 0;
    signal();
  }
}

/**
 * Combine stored values and deliver snapshots to `observer`.
 *
 * @example
 * ```typescript
 * const sub = combineValues([username, fontSize], ([name, size]) => {
 *   render(name, size);
 * });
 *
 * sub.pause(); // while hidden
 * sub.resume();
 * sub.unsubscribe();
 * ```
 */
export function combineValues<V extends readonly unknown[] | []>(
  inputs: StoredValues<V>,
  observerOrNext: Partial<Observer<Readonly<V>>> | ((snapshot: Readonly<V>) => void),
  options?: CombineOptions
): CombinedSubscription<V> {
  const observer: Partial<Observer<Readonly<V>>> =
    typeof observerOrNext === 'function' ? { next: observerOrNext } : observerOrNext;
  return new CombinedSubscription<V>(inputs, observer, options);
}

/**
 * Combine stored values into a cold observable of snapshots. Every
 * subscription reads the inputs afresh.
 *
 * @example
 * ```typescript
 * combineLatestValues([a, b]).subscribe(([first, second]) => {
 *   console.log(first, second);
 * });
 * ```
 */
export function combineLatestValues<V extends readonly unknown[] | []>(
  inputs: StoredValues<V>,
  options?: CombineOptions
): Observable<Readonly<V>> {
  return new Observable<Readonly<V>>((subscriber) => {
    const combined = new CombinedSubscription<V>(inputs, subscriber, options);
    return () => combined.unsubscribe();
  });
}

// Slots are filled by position from inputs typed by V.
function freezeSnapshot<V extends readonly unknown[]>(values: readonly unknown[]): Readonly<V> {
  return Object.freeze(values.slice()) as unknown as Readonly<V>;
}
