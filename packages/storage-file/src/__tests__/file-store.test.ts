import { mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { StreamKvError, StreamingStore, createLogger, type LogEntry } from '@streamkv/core';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { FileKeyValueStore } from '../file-store.js';

describe('FileKeyValueStore', () => {
  let dir: string;
  let path: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'streamkv-file-'));
    path = join(dir, 'settings.json');
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('should open an empty store when the file is missing', async () => {
    const store = await FileKeyValueStore.open({ path });
    expect(store.getKeys()).toEqual(new Set());
  });

  it('should persist every type and read it back after reopening', async () => {
    const store = await FileKeyValueStore.open({ path });

    await store.setBool('flag', true);
    await store.setInt('count', 3);
    await store.setDouble('ratio', 1);
    await store.setString('name', 'ada');
    await store.setStringList('tags', ['a', 'b']);

    const reopened = await FileKeyValueStore.open({ path });
    expect(reopened.getBool('flag')).toBe(true);
    expect(reopened.getInt('count')).toBe(3);
    expect(reopened.getDouble('ratio')).toBe(1);
    expect(reopened.getInt('ratio')).toBeNull();
    expect(reopened.getString('name')).toBe('ada');
    expect(reopened.getStringList('tags')).toEqual(['a', 'b']);
  });

  it('should write the store file layout', async () => {
    const store = await FileKeyValueStore.open({ path });

    await store.setString('theme', 'dark');

    expect(await readFile(path, 'utf-8')).toBe(
      '{"version":1,"entries":{"theme":{"type":"string","value":"dark"}}}\n'
    );
  });

  it('should indent the file when pretty', async () => {
    const store = await FileKeyValueStore.open({ path, pretty: true });

    await store.setInt('count', 1);

    expect(await readFile(path, 'utf-8')).toBe(
      [
        '{',
        '  "version": 1,',
        '  "entries": {',
        '    "count": {',
        '      "type": "int",',
        '      "value": 1',
        '    }',
        '  }',
        '}',
        '',
      ].join('\n')
    );
  });

  it('should apply writes in call order', async () => {
    const store = await FileKeyValueStore.open({ path });

    const results = await Promise.all([
      store.setInt('count', 1),
      store.setInt('count', 2),
      store.remove('count'),
      store.setInt('count', 3),
    ]);

    expect(results).toEqual([true, true, true, true]);
    const reopened = await FileKeyValueStore.open({ path });
    expect(reopened.getInt('count')).toBe(3);
  });

  it('should remove and clear', async () => {
    const store = await FileKeyValueStore.open({ path });
    await store.setString('a', 'x');
    await store.setString('b', 'y');

    await store.remove('a');
    expect([...(await FileKeyValueStore.open({ path })).getKeys()]).toEqual(['b']);

    await store.clear();
    expect((await FileKeyValueStore.open({ path })).getKeys().size).toBe(0);
  });

  it('should refuse values JSON cannot hold', async () => {
    const store = await FileKeyValueStore.open({ path });

    await expect(store.setDouble('ratio', Number.POSITIVE_INFINITY)).resolves.toBe(false);
    await expect(store.setInt('count', 0.5)).resolves.toBe(false);
    expect(store.getKeys().size).toBe(0);
  });

  it('should reject a malformed file', async () => {
    await writeFile(path, '{"version":1,', 'utf-8');

    const error = await FileKeyValueStore.open({ path }).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(StreamKvError);
    expect(StreamKvError.isCode(error, 'STREAMKV_S301')).toBe(true);
  });

  it('should reject a file that is not a store file', async () => {
    await writeFile(path, '{"version":2,"entries":{}}', 'utf-8');

    await expect(FileKeyValueStore.open({ path })).rejects.toMatchObject({
      code: 'STREAMKV_S301',
      context: { path },
    });
  });

  it('should resolve to false and log when the file cannot be written', async () => {
    const entries: LogEntry[] = [];
    const parent = join(dir, 'nested');
    const store = await FileKeyValueStore.open({
      path: join(parent, 'settings.json'),
      logger: createLogger({ handler: (e) => entries.push(e) }),
    });
    // The parent directory is now a regular file
    await writeFile(parent, '', 'utf-8');

    await expect(store.setString('theme', 'dark')).resolves.toBe(false);
    await expect(store.setString('theme', 'light')).resolves.toBe(false);

    expect(store.getString('theme')).toBeNull();
    expect(entries.map((e) => [e.level, e.module, e.message])).toEqual([
      ['error', 'streamkv:file', 'Store file write failed'],
      ['error', 'streamkv:file', 'Store file write failed'],
    ]);
  });

  it('should restore the last written contents when a removal cannot be written', async () => {
    const parent = join(dir, 'nested');
    const store = await FileKeyValueStore.open({ path: join(parent, 'settings.json') });
    await store.setString('a', 'x');
    await store.setString('b', 'y');
    // The parent directory is now a regular file
    await rm(parent, { recursive: true, force: true });
    await writeFile(parent, '', 'utf-8');

    await expect(store.remove('a')).resolves.toBe(false);
    await expect(store.clear()).resolves.toBe(false);

    expect(store.getString('a')).toBe('x');
    expect([...store.getKeys()]).toEqual(['a', 'b']);
  });

  it('should keep the value read and the value delivered in agreement after a failed write', async () => {
    const parent = join(dir, 'nested');
    const streaming = new StreamingStore(
      await FileKeyValueStore.open({ path: join(parent, 'settings.json') }),
      { rateGuard: false }
    );
    await writeFile(parent, '', 'utf-8');
    const theme = streaming.getString('theme', { defaultValue: 'light' });
    const seen: string[] = [];
    theme.subscribe((v) => seen.push(v));

    await expect(theme.set('dark')).resolves.toBe(false);

    expect(theme.value).toBe('light');
    expect(seen).toEqual(['light']);
  });

  it('should keep the in-memory value when a later write has started', async () => {
    const parent = join(dir, 'nested');
    const store = await FileKeyValueStore.open({ path: join(parent, 'settings.json') });
    await writeFile(parent, '', 'utf-8');

    const first = store.setString('theme', 'dark');
    const second = store.setString('theme', 'light');

    await expect(first).resolves.toBe(false);
    expect(store.getString('theme')).toBe('light');
    await expect(second).resolves.toBe(false);
    expect(store.getString('theme')).toBeNull();
  });

  it('should back a streaming store', async () => {
    const streaming = new StreamingStore(await FileKeyValueStore.open({ path }), { rateGuard: false });
    const seen: number[] = [];
    streaming.getInt('launches', { defaultValue: 0 }).subscribe((v) => seen.push(v));

    await streaming.setInt('launches', 1);
    await streaming.setInt('launches', 2);

    expect(seen).toEqual([0, 1, 2]);
    expect((await FileKeyValueStore.open({ path })).getInt('launches')).toBe(2);
  });
});
