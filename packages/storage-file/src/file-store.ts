import { mkdir, readFile, rename, rm, writeFile } from 'node:fs/promises';
import { basename, dirname, join } from 'node:path';
import {
  StreamKvError,
  createLogger,
  ensureStreamKvError,
  type KeyValueStore,
  type KvLogger,
} from '@streamkv/core';
import {
  STORE_FILE_VERSION,
  StoreFileSchema,
  type StoreFile,
  type StoredEntry,
} from './file-format.js';

/**
 * Configuration for {@link FileKeyValueStore.open}
 */
export interface FileStoreConfig {
  /** Path of the JSON file. Created on the first write. */
  path: string;
  /** Indent the file for humans (default: false) */
  pretty?: boolean;
  logger?: KvLogger;
}

let tempCounter = 0;

/**
 * Key-value store persisted to a single JSON file.
 *
 * The file is read once when the store opens; reads are then served from
 * memory. Every mutation rewrites the file through a temporary file and a
 * rename, one write at a time in call order. When a write fails the promise
 * resolves to `false`; unless another mutation has started since, the
 * in-memory contents go back to what the file last received, so reads agree
 * with the file.
 *
 * @example
 * ```typescript
 * const store = await FileKeyValueStore.open({ path: './data/settings.json' });
 * const streaming = new StreamingStore(store);
 *
 * await streaming.setBool('onboarded', true);
 * ```
 */
export class FileKeyValueStore implements KeyValueStore {
  readonly path: string;

  private readonly entries: Map<string, StoredEntry>;
  private readonly pretty: boolean;
  private readonly logger: KvLogger;
  private writeChain: Promise<void> = Promise.resolve();
  /** Contents of the last successful write */
  private persisted: ReadonlyMap<string, StoredEntry>;
  private version = 0;

  private constructor(config: Required<FileStoreConfig>, entries: Map<string, StoredEntry>) {
    this.path = config.path;
    this.pretty = config.pretty;
    this.logger = config.logger;
    this.entries = entries;
    this.persisted = new Map(entries);
  }

  /**
   * Open the store at `config.path`. A missing file opens an empty store.
   *
   * @throws StreamKvError `STREAMKV_S301` when the file cannot be read or is
   * not a store file
   */
  static async open(config: FileStoreConfig): Promise<FileKeyValueStore> {
    const logger = (config.logger ?? createLogger({ module: 'streamkv' })).child('file');
    const file = await readStoreFile(config.path);
    const entries: Record<string, StoredEntry> = file?.entries ?? {};

    logger.debug('Store file loaded', { path: config.path, keys: Object.keys(entries).length });

    return new FileKeyValueStore(
      { path: config.path, pretty: config.pretty ?? false, logger },
      new Map(Object.entries(entries))
    );
  }

  getKeys(): ReadonlySet<string> {
    return new Set(this.entries.keys());
  }

  getBool(key: string): boolean | null {
    const entry = this.entries.get(key);
    return entry?.type === 'bool' ? entry.value : null;
  }

  getInt(key: string): number | null {
    const entry = this.entries.get(key);
    return entry?.type === 'int' ? entry.value : null;
  }

  getDouble(key: string): number | null {
    const entry = this.entries.get(key);
    return entry?.type === 'double' ? entry.value : null;
  }

  getString(key: string): string | null {
    const entry = this.entries.get(key);
    return entry?.type === 'string' ? entry.value : null;
  }

  getStringList(key: string): string[] | null {
    const entry = this.entries.get(key);
    return entry?.type === 'string-list' ? [...entry.value] : null;
  }

  setBool(key: string, value: boolean): Promise<boolean> {
    return this.put(key, { type: 'bool', value });
  }

  setInt(key: string, value: number): Promise<boolean> {
    if (!Number.isInteger(value)) return Promise.resolve(false);
    return this.put(key, { type: 'int', value });
  }

  setDouble(key: string, value: number): Promise<boolean> {
    // JSON has no NaN or Infinity
    if (!Number.isFinite(value)) return Promise.resolve(false);
    return this.put(key, { type: 'double', value });
  }

  setString(key: string, value: string): Promise<boolean> {
    return this.put(key, { type: 'string', value });
  }

  setStringList(key: string, value: readonly string[]): Promise<boolean> {
    return this.put(key, { type: 'string-list', value: [...value] });
  }

  remove(key: string): Promise<boolean> {
    this.entries.delete(key);
    return this.persist('remove');
  }

  clear(): Promise<boolean> {
    this.entries.clear();
    return this.persist('clear');
  }

  /**
   * Resolves once every write started so far has settled.
   */
  flush(): Promise<void> {
    return this.writeChain;
  }

  private put(key: string, entry: StoredEntry): Promise<boolean> {
    this.entries.set(key, entry);
    return this.persist('set');
  }

  private persist(operation: string): Promise<boolean> {
    const version = ++this.version;
    const snapshot: ReadonlyMap<string, StoredEntry> = new Map(this.entries);
    const file: StoreFile = {
      version: STORE_FILE_VERSION,
      entries: Object.fromEntries(snapshot),
    };
    const contents = JSON.stringify(file, null, this.pretty ? 2 : undefined) + '\n';

    const write = this.writeChain.then(() => writeAtomically(this.path, contents));
    const result = write.then(
      () => {
        this.persisted = snapshot;
        this.logger.debug('Store file written', { path: this.path, operation });
        return true;
      },
      (error: unknown) => {
        // Writes settle in call order, so the latest mutation sees every earlier outcome.
        if (version === this.version) {
          this.restore();
        }
        this.logger.error(
          'Store file write failed',
          ensureStreamKvError(error, 'STREAMKV_S300'),
          { path: this.path, operation }
        );
        return false;
      }
    );
    this.writeChain = result.then(() => undefined);
    return result;
  }

  private restore(): void {
    this.entries.clear();
    for (const [key, entry] of this.persisted) {
      this.entries.set(key, entry);
    }
  }
}

async function readStoreFile(path: string): Promise<StoreFile | null> {
  let raw: string;
  try {
    raw = await readFile(path, 'utf-8');
  } catch (error) {
    if (isMissingFile(error)) return null;
    throw unreadable(path, error);
  }

  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (error) {
    throw unreadable(path, error);
  }

  const parsed = StoreFileSchema.safeParse(json);
  if (!parsed.success) {
    throw new StreamKvError({
      code: 'STREAMKV_S301',
      context: { path, issues: parsed.error.issues.map((issue) => issue.message) },
      cause: parsed.error,
    });
  }
  return parsed.data;
}

async function writeAtomically(path: string, contents: string): Promise<void> {
  const directory = dirname(path);
  const temp = join(directory, `.${basename(path)}.${process.pid}.${++tempCounter}.tmp`);

  await mkdir(directory, { recursive: true });
  try {
    await writeFile(temp, contents, 'utf-8');
    await rename(temp, path);
  } catch (error) {
    await rm(temp, { force: true });
    throw error;
  }
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

function unreadable(path: string, error: unknown): StreamKvError {
  return new StreamKvError({
    code: 'STREAMKV_S301',
    context: { path },
    cause: error instanceof Error ? error : undefined,
  });
}
