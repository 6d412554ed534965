/**
 * Compares two values for equality by value.
 */
export type EqualityFn<T> = (a: T, b: T) => boolean;

/**
 * Structural equality.
 *
 * Supports:
 * - **Primitives**: `===`, with `NaN` equal to itself
 * - **Dates**: Timestamp comparison
 * - **Arrays**: Element-wise, in order
 * - **Sets**: Same size, each member matched to a distinct deep-equal member
 * - **Maps**: Same keys, values compared structurally
 * - **Objects**: Same own enumerable keys, values compared structurally
 *
 * @example
 * ```typescript
 * isEqual(['a', 'b'], ['a', 'b']); // true
 * isEqual(new Set(['x']), new Set(['x'])); // true
 * isEqual({ theme: 'dark' }, { theme: 'light' }); // false
 * ```
 */
export function isEqual<T>(a: T, b: T): boolean {
  if (a === b) return true;
  if (a === null || b === null) return false;
  if (typeof a !== typeof b) return false;

  if (typeof a === 'number' && typeof b === 'number') {
    return Number.isNaN(a) && Number.isNaN(b);
  }

  if (a instanceof Date && b instanceof Date) {
    return a.getTime() === b.getTime();
  }

  if (Array.isArray(a) && Array.isArray(b)) {
    if (a.length !== b.length) return false;
    return a.every((item: unknown, index) => isEqual(item, b[index]));
  }

  if (a instanceof Set && b instanceof Set) {
    if (a.size !== b.size) return false;
    const unmatched: unknown[] = [...b].filter((item) => !a.has(item));
    for (const item of a) {
      if (b.has(item)) continue;
      const index = unmatched.findIndex((candidate) => isEqual(item, candidate));
      if (index === -1) return false;
      unmatched.splice(index, 1);
    }
    return true;
  }

  if (a instanceof Map && b instanceof Map) {
    if (a.size !== b.size) return false;
    for (const [key, value] of a) {
      if (!b.has(key) || !isEqual<unknown>(value, b.get(key))) return false;
    }
    return true;
  }

  if (isRecord(a) && isRecord(b)) {
    if (isCollection(a) || isCollection(b)) return false;
    const aKeys = Object.keys(a);
    const bKeys = Object.keys(b);
    if (aKeys.length !== bKeys.length) return false;
    return aKeys.every(
      (key) => Object.prototype.hasOwnProperty.call(b, key) && isEqual(a[key], b[key])
    );
  }

  return false;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

function isCollection(value: unknown): boolean {
  return Array.isArray(value) || value instanceof Set || value instanceof Map || value instanceof Date;
}
