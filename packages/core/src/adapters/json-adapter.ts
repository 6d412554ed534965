import type { z } from 'zod';
import { StreamKvError } from '../errors/streamkv-error.js';
import type { KeyValueStore } from '../types/storage.js';
import type { ValueAdapter } from './value-adapter.js';

interface JsonAdapterBaseOptions<T> {
  /**
   * Distinguishes this JSON type from other JSON types in stored value
   * equality. The `valueType` becomes `json:<name>`.
   */
  name?: string;
  /** Maps the value to a JSON-compatible value before encoding */
  serializer?: (value: T) => unknown;
}

/**
 * Options for {@link JsonAdapter}. A `schema`, a `deserializer`, or both
 * must be given to turn decoded JSON back into a `T`. With both, the
 * deserializer runs first and the schema checks its result.
 */
export type JsonAdapterOptions<T> = JsonAdapterBaseOptions<T> &
  (
    | { schema: z.ZodType<T, z.ZodTypeDef, unknown>; deserializer?: (json: unknown) => T }
    | { schema?: z.ZodType<T, z.ZodTypeDef, unknown>; deserializer: (json: unknown) => T }
  );

/**
 * Stores any value as a JSON string.
 *
 * @example With a Zod schema
 * ```typescript
 * const Settings = z.object({ theme: z.enum(['light', 'dark']), fontSize: z.number() });
 *
 * const settings = store.getCustomValue('settings', {
 *   defaultValue: { theme: 'light', fontSize: 14 },
 *   adapter: new JsonAdapter({ name: 'settings', schema: Settings }),
 * });
 * ```
 *
 * @example With a reviver
 * ```typescript
 * const adapter = new JsonAdapter<Session>({
 *   serializer: (session) => session.toJSON(),
 *   deserializer: (json) => Session.fromJSON(json),
 * });
 * ```
 */
export class JsonAdapter<T> implements ValueAdapter<T> {
  readonly valueType: string;

  private readonly schema?: z.ZodType<T, z.ZodTypeDef, unknown>;
  private readonly serializer?: (value: T) => unknown;
  private readonly deserializer?: (json: unknown) => T;

  constructor(options: JsonAdapterOptions<T>) {
    this.valueType = options.name ? `json:${options.name}` : 'json';
    this.schema = options.schema;
    this.serializer = options.serializer;
    this.deserializer = options.deserializer;
  }

  read(store: KeyValueStore, key: string | null): T | null {
    if (key === null) return null;

    const raw = store.getString(key);
    if (raw === null) return null;

    let decoded: unknown;
    try {
      decoded = JSON.parse(raw);
    } catch (error) {
      throw new StreamKvError({
        code: 'STREAMKV_V200',
        message: `Stored value for "${key}" is not valid JSON`,
        context: { key, valueType: this.valueType },
        cause: error instanceof Error ? error : undefined,
      });
    }

    return this.revive(key, decoded);
  }

  async write(store: KeyValueStore, key: string, value: T): Promise<boolean> {
    if (this.schema) {
      this.validate(this.schema, key, value);
    }
    const serialized = this.serializer ? this.serializer(value) : value;
    return store.setString(key, JSON.stringify(serialized));
  }

  private revive(key: string, decoded: unknown): T {
    if (this.deserializer) {
      const value = this.deserializer(decoded);
      return this.schema ? this.validate(this.schema, key, value) : value;
    }
    if (this.schema) {
      return this.validate(this.schema, key, decoded);
    }
    throw new StreamKvError({
      code: 'STREAMKV_X900',
      message: 'JsonAdapter has neither a schema nor a deserializer',
    });
  }

  private validate(schema: z.ZodType<T, z.ZodTypeDef, unknown>, key: string, value: unknown): T {
    const result = schema.safeParse(value);
    if (!result.success) {
      throw new StreamKvError({
        code: 'STREAMKV_V201',
        message: `Value for "${key}" failed schema validation: ${result.error.issues
          .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
          .join('; ')}`,
        context: { key, valueType: this.valueType },
        cause: result.error,
      });
    }
    return result.data;
  }
}
