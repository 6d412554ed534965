/**
 * RateGuard - Detects stored values that are re-subscribed too often.
 *
 * Creating a fresh stored value and subscribing to it on every render
 * re-reads the store each time and defeats reuse. The guard keeps the last
 * few subscription times per key and reports a diagnostic when they are
 * packed into a short window. Subscriptions always proceed.
 *
 * @module rate-guard
 */

import { Subject, type Observable } from 'rxjs';
import { StreamKvError } from '../errors/streamkv-error.js';
import { createLogger, type KvLogger } from '../observability/logger.js';

/** Configuration for the rate guard */
export interface RateGuardConfig {
  /** Whether subscriptions are tracked. @default process.env.NODE_ENV !== 'production' */
  enabled?: boolean;
  /** Subscriptions to the same key closer together than this are suspicious. @default 750 */
  windowMs?: number;
  /** Number of subscriptions that must fall inside the window. @default 4 */
  threshold?: number;
  /** Time source in milliseconds. @default Date.now */
  clock?: () => number;
  /** Logger that receives a warning per diagnostic */
  logger?: KvLogger;
}

/** Reported when a key is subscribed to suspiciously often */
export interface RateGuardDiagnostic {
  /** The key, or `null` for the aggregate key view */
  key: string | null;
  /** Time between the oldest and newest subscription in the window */
  elapsedMs: number;
  /** Time of the subscription that triggered the diagnostic */
  timestamp: number;
  error: StreamKvError;
}

/**
 * Tracks subscription times per key.
 *
 * @example
 * ```typescript
 * let now = 0;
 * const guard = new RateGuard({ clock: () => now });
 * guard.diagnostics$.subscribe((d) => console.warn(d.error.format()));
 *
 * for (let i = 0; i < 4; i++) {
 *   guard.track('theme');
 *   now += 100;
 * }
 * // one diagnostic for "theme"
 * ```
 */
export class RateGuard {
  private readonly config: Required<Omit<RateGuardConfig, 'logger'>>;
  private readonly logger: KvLogger;
  private readonly diagnosticsSubject = new Subject<RateGuardDiagnostic>();
  private readonly log = new Map<string | null, number[]>();

  constructor(config: RateGuardConfig = {}) {
    this.config = {
      enabled: config.enabled ?? process.env.NODE_ENV !== 'production',
      windowMs: config.windowMs ?? 750,
      threshold: Math.max(2, config.threshold ?? 4),
      clock: config.clock ?? Date.now,
    };
    this.logger = (config.logger ?? createLogger({ module: 'streamkv' })).child('rate-guard');
  }

  /** Diagnostics, delivered apart from the data streams */
  get diagnostics$(): Observable<RateGuardDiagnostic> {
    return this.diagnosticsSubject.asObservable();
  }

  get enabled(): boolean {
    return this.config.enabled;
  }

  /** Turn tracking on or off. Turning it off also forgets the recorded times. */
  setEnabled(enabled: boolean): void {
    this.config.enabled = enabled;
    if (!enabled) {
      this.log.clear();
    }
  }

  /**
   * Record a subscription to `key`.
   *
   * @returns The diagnostic raised by this subscription, or `null`
   */
  track(key: string | null): RateGuardDiagnostic | null {
    if (!this.config.enabled) return null;

    const now = this.config.clock();
    const times = this.log.get(key) ?? [];
    times.push(now);
    if (times.length > this.config.threshold) {
      times.shift();
    }
    this.log.set(key, times);

    if (times.length < this.config.threshold) return null;

    const elapsedMs = now - (times[0] ?? now);
    if (elapsedMs >= this.config.windowMs) return null;

    const diagnostic: RateGuardDiagnostic = {
      key,
      elapsedMs,
      timestamp: now,
      error: new StreamKvError({
        code: 'STREAMKV_D400',
        message: `Stored value for ${key === null ? 'the key listing' : `"${key}"`} was subscribed ${this.config.threshold} times within ${elapsedMs}ms`,
        context: { key, elapsedMs, windowMs: this.config.windowMs },
      }),
    };

    this.logger.warn(diagnostic.error.message, { key, elapsedMs });
    this.diagnosticsSubject.next(diagnostic);
    return diagnostic;
  }

  /** Forget every recorded subscription time */
  reset(): void {
    this.log.clear();
  }

  destroy(): void {
    this.log.clear();
    this.diagnosticsSubject.complete();
  }
}

/**
 * Create a rate guard
 */
export function createRateGuard(config?: RateGuardConfig): RateGuard {
  return new RateGuard(config);
}
