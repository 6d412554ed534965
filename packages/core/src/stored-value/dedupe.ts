import { defer, filter, type MonoTypeOperatorFunction } from 'rxjs';
import { isEqual, type EqualityFn } from '../utils/equality.js';

/**
 * Drops values structurally equal to the last value let through.
 *
 * State is kept per subscription and dropped on unsubscribe. With a `seed`,
 * the last value starts as `seed()` read at subscribe time, so a first value
 * equal to it is dropped too; without one, the first value always passes.
 *
 * @example
 * ```typescript
 * theme.asObservable().pipe(dedupe(() => theme.value)).subscribe(render);
 * // render runs only when the theme actually changes
 * ```
 */
export function dedupe<T>(
  seed?: () => T,
  equals: EqualityFn<T> = isEqual
): MonoTypeOperatorFunction<T> {
  return (source) =>
    defer(() => {
      let last: { value: T } | null = seed ? { value: seed() } : null;

      return source.pipe(
        filter((value) => {
          if (last !== null && equals(last.value, value)) {
            return false;
          }
          last = { value };
          return true;
        })
      );
    });
}
