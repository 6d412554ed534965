import { Subject, type Observable, type Observer, type Subscription, type Unsubscribable } from 'rxjs';
import type { EqualityFn } from '../utils/equality.js';

/**
 * One subscriber's pipeline on a stored value: the current value first, then
 * a fresh read after every matching change event.
 *
 * Pausing detaches from the change bus and resuming attaches again; changes
 * published in between are not replayed. With an equality function, values
 * equal to the last delivered one are dropped. That state survives
 * pause/resume and is cleared on unsubscribe.
 */
export class ValueSubscription<T> implements Unsubscribable {
  private readonly output = new Subject<T>();
  private readonly outputSubscription: Subscription;
  private inner: Subscription | null = null;
  private last: { value: T } | null = null;
  private isPaused = false;
  private isClosed = false;

  /** @internal Use {@link StoredValue.subscribe}. */
  constructor(
    private readonly read: () => T,
    private readonly changes$: Observable<unknown>,
    observer: Partial<Observer<T>>,
    private readonly equals: EqualityFn<T> | null
  ) {
    this.outputSubscription = this.output.subscribe(observer);
  }

  get closed(): boolean {
    return this.isClosed;
  }

  get paused(): boolean {
    return this.isPaused;
  }

  /** @internal Emits the current value and attaches to the change bus. */
  start(): this {
    const current = this.tryRead();
    if (current === null) return this;

    if (this.equals) {
      this.last = current;
    }
    this.output.next(current.value);

    // The observer may have paused or unsubscribed while handling the first value.
    if (!this.isClosed && !this.isPaused) {
      this.attach();
    }
    return this;
  }

  /** Stop following changes until {@link resume}. */
  pause(): void {
    if (this.isClosed || this.isPaused) return;

    this.isPaused = true;
    this.detach();
  }

  /** Follow changes again. Changes published while paused are not delivered. */
  resume(): void {
    if (this.isClosed || !this.isPaused) return;

    this.isPaused = false;
    this.attach();
  }

  unsubscribe(): void {
    if (this.isClosed) return;

    this.isClosed = true;
    this.detach();
    this.last = null;
    this.outputSubscription.unsubscribe();
  }

  private attach(): void {
    if (this.inner) return;

    this.inner = this.changes$.subscribe({
      next: () => {
        const value = this.tryRead();
        if (value !== null) {
          this.deliver(value.value);
        }
      },
      error: (error: unknown) => this.terminate(() => this.output.error(error)),
      complete: () => this.terminate(() => this.output.complete()),
    });

    // The change stream may have completed while subscribing.
    if (this.isClosed) {
      this.detach();
    }
  }

  private detach(): void {
    this.inner?.unsubscribe();
    this.inner = null;
  }

  private deliver(value: T): void {
    if (this.equals) {
      if (this.last !== null && this.equals(this.last.value, value)) return;
      this.last = { value };
    }
    this.output.next(value);
  }

  private tryRead(): { value: T } | null {
    try {
      return { value: this.read() };
    } catch (error) {
      this.terminate(() => this.output.error(error));
      return null;
    }
  }

  private terminate(signal: () => void): void {
    if (this.isClosed) return;

    this.isClosed = true;
    this.detach();
    this.last = null;
    signal();
  }
}
