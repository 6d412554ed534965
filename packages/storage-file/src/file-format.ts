import { z } from 'zod';

export const STORE_FILE_VERSION = 1;

export const StoredEntrySchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('bool'), value: z.boolean() }),
  z.object({ type: z.literal('int'), value: z.number().int() }),
  z.object({ type: z.literal('double'), value: z.number() }),
  z.object({ type: z.literal('string'), value: z.string() }),
  z.object({ type: z.literal('string-list'), value: z.array(z.string()) }),
]);

/**
 * Layout of a store file:
 *
 * ```json
 * { "version": 1, "entries": { "theme": { "type": "string", "value": "dark" } } }
 * ```
 */
export const StoreFileSchema = z.object({
  version: z.literal(STORE_FILE_VERSION),
  entries: z.record(StoredEntrySchema),
});

export type StoredEntry = z.infer<typeof StoredEntrySchema>;
export type StoreFile = z.infer<typeof StoreFileSchema>;
