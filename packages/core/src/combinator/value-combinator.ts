import { BehaviorSubject, Subject, type Observable } from 'rxjs';
import {
  CombinedSubscription,
  type CombineOptions,
  type StoredValues,
} from './combine-values.js';

/**
 * A long-lived combination of stored values whose input list can change,
 * such as the inputs of a UI component that re-renders.
 *
 * When the list passed to {@link setInputs} is a different list, every
 * input subscription is torn down and the combination is rebuilt from the
 * new list, re-reading all values. Passing the same list again does nothing.
 *
 * @example
 * ```typescript
 * const combinator = new ValueCombinator([username, fontSize]);
 *
 * combinator.snapshots$.subscribe(([name, size]) => render(name, size));
 *
 * combinator.setInputs([username, lineHeight]); // rebuilt
 * combinator.dispose();
 * ```
 */
export class ValueCombinator<V extends readonly unknown[] | []> {
  private readonly snapshotsSubject: BehaviorSubject<Readonly<V>>;
  private readonly errorsSubject = new Subject<unknown>();
  private readonly options: CombineOptions;
  private inputs: StoredValues<V>;
  private subscription: CombinedSubscription<V> | null = null;
  private lastError: unknown = null;
  private isPaused = false;
  private isDisposed = false;
  private isComplete = false;

  constructor(inputs: StoredValues<V>, options: CombineOptions = {}) {
    this.inputs = inputs;
    this.options = options;
    this.snapshotsSubject = new BehaviorSubject<Readonly<V>>(this.connect());
  }

  /** The latest snapshot, in input order */
  get values(): Readonly<V> {
    return this.snapshotsSubject.getValue();
  }

  /** Snapshots, starting with the latest one */
  get snapshots$(): Observable<Readonly<V>> {
    return this.snapshotsSubject.asObservable();
  }

  /** Errors that stopped the combination */
  get errors$(): Observable<unknown> {
    return this.errorsSubject.asObservable();
  }

  /** The error that stopped the combination, or `null` */
  get error(): unknown {
    return this.lastError;
  }

  get paused(): boolean {
    return this.isPaused;
  }

  /** Whether every input has completed */
  get completed(): boolean {
    return this.isComplete;
  }

  /**
   * Bind to `inputs`. A different list rebuilds the combination.
   *
   * @returns Whether the combination was rebuilt
   */
  setInputs(inputs: StoredValues<V>): boolean {
    if (this.isDisposed || inputs === this.inputs) return false;

    this.inputs = inputs;
    this.rebuild();
    return true;
  }

  /** Tear down and rebuild from the current inputs, for example after an error. */
  reconnect(): void {
    if (this.isDisposed) return;
    this.rebuild();
  }

  pause(): void {
    if (this.isDisposed || this.isPaused) return;

    this.isPaused = true;
    this.subscription?.pause();
  }

  resume(): void {
    if (this.isDisposed || !this.isPaused) return;

    this.isPaused = false;
    this.subscription?.resume();
  }

  dispose(): void {
    if (this.isDisposed) return;

    this.isDisposed = true;
    this.subscription?.unsubscribe();
    this.subscription = null;
    this.snapshotsSubject.complete();
    this.errorsSubject.complete();
  }

  private rebuild(): void {
    this.subscription?.unsubscribe();
    this.subscription = null;
    this.snapshotsSubject.next(this.connect());
  }

  /** Subscribe to the current inputs and return their initial snapshot. */
  private connect(): Readonly<V> {
    this.lastError = null;
    this.isComplete = false;

    let initial: Readonly<V> | null = null;
    const subscription = new CombinedSubscription<V>(
      this.inputs,
      {
        next: (snapshot) => {
          if (initial === null) {
            initial = snapshot;
            return;
          }
          this.snapshotsSubject.next(snapshot);
        },
        error: (error: unknown) => {
          this.lastError = error;
          this.errorsSubject.next(error);
        },
        complete: () => {
          this.isComplete = true;
        },
      },
      this.options
    );

    if (this.isPaused) {
      subscription.pause();
    }
    this.subscription = subscription;
    return initial ?? subscription.snapshot;
  }
}
