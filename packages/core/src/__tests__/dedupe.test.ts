import { Subject } from 'rxjs';
import { describe, expect, it } from 'vitest';
import { dedupe } from '../stored-value/dedupe.js';

describe('dedupe', () => {
  it('should drop values equal to the last one let through', () => {
    const source = new Subject<number[]>();
    const seen: number[][] = [];
    source.pipe(dedupe<number[]>()).subscribe((v) => seen.push(v));

    source.next([1]);
    source.next([1]);
    source.next([2]);
    source.next([1]);

    expect(seen).toEqual([[1], [2], [1]]);
  });

  it('should drop a first value equal to the seed', () => {
    const source = new Subject<string>();
    const seen: string[] = [];
    source.pipe(dedupe(() => 'a')).subscribe((v) => seen.push(v));

    source.next('a');
    source.next('b');

    expect(seen).toEqual(['b']);
  });

  it('should keep separate state per subscription', () => {
    const source = new Subject<string>();
    const deduped = source.pipe(dedupe<string>());
    const first: string[] = [];
    const second: string[] = [];

    deduped.subscribe((v) => first.push(v));
    source.next('a');
    const late = deduped.subscribe((v) => second.push(v));
    source.next('a');
    late.unsubscribe();

    expect(first).toEqual(['a']);
    expect(second).toEqual(['a']);
  });

  it('should start over after resubscribing', () => {
    const source = new Subject<string>();
    const deduped = source.pipe(dedupe<string>());
    const seen: string[] = [];

    const subscription = deduped.subscribe((v) => seen.push(v));
    source.next('a');
    subscription.unsubscribe();
    deduped.subscribe((v) => seen.push(v));
    source.next('a');

    expect(seen).toEqual(['a', 'a']);
  });

  it('should use a custom comparison', () => {
    type Item = { id: number; label: string };
    const source = new Subject<Item>();
    const seen: string[] = [];
    source.pipe(dedupe<Item>(undefined, (a, b) => a.id === b.id)).subscribe((v) => seen.push(v.label));

    source.next({ id: 1, label: 'one' });
    source.next({ id: 1, label: 'uno' });
    source.next({ id: 2, label: 'two' });

    expect(seen).toEqual(['one', 'two']);
  });
});
