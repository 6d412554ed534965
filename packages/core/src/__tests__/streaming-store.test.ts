import { beforeEach, describe, expect, it, vi } from 'vitest';
import { z } from 'zod';
import { JsonAdapter } from '../adapters/json-adapter.js';
import { PreconditionError } from '../errors/streamkv-error.js';
import { createLogger, type LogEntry } from '../observability/logger.js';
import { RateGuard } from '../rate-guard/rate-guard.js';
import { StreamingStore } from '../streaming-store/streaming-store.js';
import { TestStore } from './helpers/test-store.js';

describe('StreamingStore', () => {
  let backing: TestStore;
  let store: StreamingStore;

  beforeEach(() => {
    backing = new TestStore();
    store = new StreamingStore(backing, { rateGuard: false });
  });

  describe('typed values', () => {
    it('should read every primitive type with its default', () => {
      expect(store.getBool('flag', { defaultValue: true }).value).toBe(true);
      expect(store.getInt('count', { defaultValue: 3 }).value).toBe(3);
      expect(store.getDouble('ratio', { defaultValue: 0.5 }).value).toBe(0.5);
      expect(store.getString('name', { defaultValue: 'anon' }).value).toBe('anon');
      expect(store.getStringList('tags', { defaultValue: ['x'] }).value).toEqual(['x']);
      expect(store.getDate('seen', { defaultValue: new Date(0) }).value).toEqual(new Date(0));
    });

    it('should write through the setters', async () => {
      await store.setBool('flag', false);
      await store.setInt('count', 4);
      await store.setDouble('ratio', 0.25);
      await store.setString('name', 'ada');
      await store.setStringList('tags', ['a', 'b']);
      await store.setDate('seen', new Date(86_400_000));

      expect(Object.fromEntries(backing.data)).toEqual({
        flag: false,
        count: 4,
        ratio: 0.25,
        name: 'ada',
        tags: ['a', 'b'],
        seen: '86400000',
      });
    });

    it('should notify stored values of setter writes', async () => {
      const seen: number[] = [];
      store.getInt('count', { defaultValue: 0 }).subscribe((v) => seen.push(v));

      await store.setInt('count', 1);
      await store.remove('count');

      expect(seen).toEqual([0, 1, 0]);
    });

    it('should store JSON values through a schema', async () => {
      const Profile = z.object({ name: z.string(), admin: z.boolean() });
      const profile = store.getJson('profile', {
        name: 'profile',
        schema: Profile,
        defaultValue: { name: 'anon', admin: false },
      });
      const seen: Array<{ name: string; admin: boolean }> = [];
      profile.subscribe((v) => seen.push(v));

      await profile.set({ name: 'ada', admin: true });

      expect(backing.data.get('profile')).toBe('{"name":"ada","admin":true}');
      expect(seen).toEqual([
        { name: 'anon', admin: false },
        { name: 'ada', admin: true },
      ]);
      expect(profile.valueType).toBe('json:profile');
    });

    it('should store enum members', async () => {
      const theme = store.getEnum('theme', {
        values: ['light', 'dark'] as const,
        defaultValue: 'light',
      });

      await expect(theme.set('dark')).resolves.toBe(true);
      expect(theme.value).toBe('dark');
    });

    it('should take a custom adapter', async () => {
      const adapter = new JsonAdapter<number[]>({ schema: z.array(z.number()) });
      const scores = store.getCustomValue('scores', { defaultValue: [], adapter });

      await store.setCustomValue('scores', [3, 1], adapter);

      expect(scores.value).toEqual([3, 1]);
    });

    it('should hand out equal handles for the same key and type', () => {
      const a = store.getString('name', { defaultValue: '' });
      const b = store.getString('name', { defaultValue: 'x' });
      const c = store.getInt('name', { defaultValue: 0 });

      expect(a.equals(b)).toBe(true);
      expect(a.equals(c)).toBe(false);
    });

    it('should require a key', () => {
      // As passed by an untyped caller
      const key: string = JSON.parse('null');

      expect(() => store.getString(key, { defaultValue: '' })).toThrow(PreconditionError);
      expect(() => store.remove(key)).toThrow(PreconditionError);
      expect(backing.writes).toBe(0);
    });
  });

  describe('getKeys', () => {
    it('should follow the set of keys', async () => {
      const seen: string[][] = [];
      store.getKeys().subscribe((keys) => seen.push([...keys]));

      await store.setInt('x', 1);
      await store.setInt('y', 2);
      await store.remove('x');

      expect(seen).toEqual([[], ['x'], ['x', 'y'], ['y']]);
    });

    it('should start from the existing keys', async () => {
      backing.data.set('x', 1);
      const seen: Array<ReadonlySet<string>> = [];
      store.getKeys().subscribe((keys) => seen.push(keys));

      await store.setString('y', 'b');
      await store.remove('x');

      expect(seen).toEqual([new Set(['x']), new Set(['x', 'y']), new Set(['y'])]);
    });

    it('should be read-only', () => {
      const keys = store.getKeys();
      expect(() => keys.set(new Set<string>())).toThrow(PreconditionError);
      expect(() => keys.clear()).toThrow(PreconditionError);
    });
  });

  describe('clear', () => {
    it('should send every subscriber its default', async () => {
      backing.data.set('name', 'ada');
      backing.data.set('count', 2);
      const names: string[] = [];
      const counts: number[] = [];
      const keys: number[] = [];
      store.getString('name', { defaultValue: 'anon' }).subscribe((v) => names.push(v));
      store.getInt('count', { defaultValue: 0 }).subscribe((v) => counts.push(v));
      store.getKeys().subscribe((v) => keys.push(v.size));

      await expect(store.clear()).resolves.toBe(true);

      expect(names).toEqual(['ada', 'anon']);
      expect(counts).toEqual([2, 0]);
      expect(keys).toEqual([2, 0, 0]);
      expect(store.changeBus.publishedCount).toBe(2);
    });

    it('should publish nothing when the store fails to clear', async () => {
      backing.data.set('name', 'ada');
      backing.writeMode = 'false';

      await expect(store.clear()).resolves.toBe(false);
      expect(store.changeBus.publishedCount).toBe(0);
    });
  });

  describe('combine', () => {
    it('should combine stored values of this store', async () => {
      const name = store.getString('name', { defaultValue: 'anon' });
      const count = store.getInt('count', { defaultValue: 0 });
      const snapshots: Array<readonly [string, number]> = [];
      store.combine([name, count]).subscribe((snapshot) => snapshots.push(snapshot));

      await store.setInt('count', 1);

      expect(snapshots).toEqual([
        ['anon', 0],
        ['anon', 1],
      ]);
    });

    it('should emit once per distinct change of either input', async () => {
      const a = store.getString('a', { defaultValue: 'a1' });
      const b = store.getString('b', { defaultValue: 'b1' });
      const snapshots: Array<readonly [string, string]> = [];
      store.combine([a, b]).subscribe((snapshot) => snapshots.push(snapshot));

      await a.set('a2');
      await b.set('b2');
      await a.set('a2');
      await b.set('b2');

      expect(snapshots).toEqual([
        ['a1', 'b1'],
        ['a2', 'b1'],
        ['a2', 'b2'],
      ]);
    });

    it('should create a rebindable combinator', async () => {
      const combinator = store.createCombinator([store.getInt('a', { defaultValue: 1 })]);

      await store.setInt('a', 5);

      expect(combinator.values).toEqual([5]);
    });
  });

  describe('rate guard', () => {
    it('should share a given guard with its stored values', () => {
      let now = 0;
      const guard = new RateGuard({ enabled: true, clock: () => now });
      const guarded = new StreamingStore(backing, { rateGuard: guard });
      const keys: Array<string | null> = [];
      guard.diagnostics$.subscribe((d) => keys.push(d.key));

      for (let i = 0; i < 4; i++) {
        guarded.getString('name', { defaultValue: '' }).subscribe().unsubscribe();
        now += 10;
      }

      expect(guarded.rateGuard).toBe(guard);
      expect(keys).toEqual(['name']);
    });

    it('should build a guard from options', () => {
      const guarded = new StreamingStore(backing, { rateGuard: { enabled: true, windowMs: 100 } });
      expect(guarded.rateGuard?.enabled).toBe(true);
    });

    it('should run without a guard when disabled', () => {
      expect(store.rateGuard).toBeNull();
    });
  });

  describe('close', () => {
    it('should complete every subscription and log once', () => {
      const entries: LogEntry[] = [];
      const logged = new StreamingStore(backing, {
        rateGuard: false,
        logger: createLogger({ handler: (e) => entries.push(e) }),
      });
      const complete = vi.fn();
      logged.getInt('count', { defaultValue: 0 }).subscribe({ complete });

      logged.close();
      logged.close();

      expect(logged.closed).toBe(true);
      expect(complete).toHaveBeenCalledTimes(1);
      expect(entries.map((e) => e.message)).toEqual(['Streaming store closed']);
    });

    it('should leave the backing store usable', async () => {
      store.close();
      await expect(store.setInt('count', 1)).resolves.toBe(true);
      expect(backing.getInt('count')).toBe(1);
    });
  });
});
