import { Subject, filter, type Observable } from 'rxjs';
import { createLogger, type KvLogger } from '../observability/logger.js';

/**
 * Broadcast channel of changed keys, one per store session.
 *
 * Delivery is synchronous: `publish()` returns after every current
 * subscriber has seen the key. A key published from inside a subscriber is
 * queued and delivered once the event in flight has reached every
 * subscriber, so all subscribers observe publications in the same order.
 *
 * @example
 * ```typescript
 * const bus = new ChangeBus();
 *
 * bus.changes('theme').subscribe(() => console.log('theme changed'));
 * bus.changes(null).subscribe((key) => console.log('changed:', key));
 *
 * bus.publish('theme'); // logs both
 * bus.publish('locale'); // logs "changed: locale"
 * ```
 */
export class ChangeBus {
  private readonly changes$ = new Subject<string>();
  private readonly pending: string[] = [];
  private readonly logger: KvLogger;
  private dispatching = false;
  private isClosed = false;
  private published = 0;

  constructor(logger: KvLogger = createLogger({ module: 'streamkv' })) {
    this.logger = logger.child('bus');
  }

  /** Whether {@link close} has been called */
  get closed(): boolean {
    return this.isClosed;
  }

  /** Whether anything is currently subscribed */
  get observed(): boolean {
    return this.changes$.observed;
  }

  /** Number of keys delivered since the bus was created */
  get publishedCount(): number {
    return this.published;
  }

  /**
   * Broadcast `key` to every current subscriber.
   */
  publish(key: string): void {
    if (this.closed) return;

    this.pending.push(key);
    if (this.dispatching) return;

    this.dispatching = true;
    try {
      let next = this.pending.shift();
      while (next !== undefined) {
        this.published++;
        this.changes$.next(next);
        next = this.pending.shift();
      }
    } finally {
      this.dispatching = false;
      this.pending.length = 0;
    }
  }

  /**
   * Broadcast each of `keys`, in iteration order.
   */
  publishAll(keys: Iterable<string>): void {
    for (const key of keys) {
      this.publish(key);
    }
  }

  /**
   * Stream of changed keys. With a key, only that key's changes pass; with
   * `null`, every change passes.
   */
  changes(key: string | null): Observable<string> {
    const all$ = this.changes$.asObservable();
    return key === null ? all$ : all$.pipe(filter((changed) => changed === key));
  }

  /**
   * Complete every stream. Later publishes are ignored.
   */
  close(): void {
    if (this.closed) return;

    this.isClosed = true;
    this.logger.debug('Change bus closed', { published: this.published });
    this.pending.length = 0;
    this.changes$.complete();
  }
}
