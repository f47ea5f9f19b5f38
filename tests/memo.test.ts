import { describe, expect, test, vi } from 'vitest';
import { memoize, sameDependency, sameMembers } from '../src/memo';

interface Source {
  a: number;
  b: ReadonlySet<string>;
  c: string;
}

describe('sameDependency', () => {
  test('compares scalars by identity', () => {
    expect(sameDependency(1, 1)).toBe(true);
    expect(sameDependency(Number.NaN, Number.NaN)).toBe(true);
    expect(sameDependency('x', 'y')).toBe(false);
    expect(sameDependency({}, {})).toBe(false);
  });

  test('compares sets and arrays element-wise in order', () => {
    expect(sameDependency(new Set(['a', 'b']), new Set(['a', 'b']))).toBe(true);
    expect(sameDependency(new Set(['a', 'b']), new Set(['b', 'a']))).toBe(false);
    expect(sameDependency(new Set(['a']), new Set(['a', 'b']))).toBe(false);
    expect(sameDependency(['x', 'y'], ['x', 'y'])).toBe(true);
    expect(sameDependency(['x'], ['x', 'y'])).toBe(false);
  });
});

describe('sameMembers', () => {
  test('compares sets by membership only', () => {
    expect(sameMembers(new Set(['a', 'b']), new Set(['b', 'a']))).toBe(true);
    expect(sameMembers(new Set(['a', 'b']), new Set(['a', 'c']))).toBe(false);
    expect(sameMembers(new Set(['a']), new Set(['a', 'b']))).toBe(false);
  });

  test('falls back to ordered comparison for other values', () => {
    expect(sameMembers(['x', 'y'], ['y', 'x'])).toBe(false);
    expect(sameMembers(3, 3)).toBe(true);
  });
});

describe('memoize', () => {
  test('recomputes only when a declared dependency changes', () => {
    const compute = vi.fn(({ a, b }: Pick<Source, 'a' | 'b'>) => `${a}:${[...b].join('+')}`);
    const memo = memoize<Source, 'a' | 'b', string>('joined', ['a', 'b'], compute);

    const first: Source = { a: 1, b: new Set(['x']), c: 'one' };
    expect(memo.get(first)).toBe('1:x');
    expect(memo.get({ ...first, c: 'two' })).toBe('1:x');
    expect(memo.get({ ...first, b: new Set(['x']) })).toBe('1:x');
    expect(compute).toHaveBeenCalledTimes(1);

    expect(memo.get({ ...first, a: 2 })).toBe('2:x');
    expect(compute).toHaveBeenCalledTimes(2);
    expect(memo.stats).toEqual({ computes: 2, hits: 2 });
  });

  test('returns the cached object itself on a hit', () => {
    const memo = memoize<Source, 'a', { doubled: number }>('doubled', ['a'], ({ a }) => ({ doubled: a * 2 }));
    const source: Source = { a: 3, b: new Set(), c: '' };
    const value = memo.get(source);
    expect(memo.get({ ...source, c: 'changed' })).toBe(value);
    expect(memo.isFresh({ ...source, a: 4 })).toBe(false);
  });

  test('invalidate forces the next read to recompute', () => {
    const compute = vi.fn(({ c }: Pick<Source, 'c'>) => c.toUpperCase());
    const memo = memoize<Source, 'c', string>('upper', ['c'], compute);
    const source: Source = { a: 0, b: new Set(), c: 'abc' };
    memo.get(source);
    memo.invalidate();
    expect(memo.isFresh(source)).toBe(false);
    expect(memo.get(source)).toBe('ABC');
    expect(compute).toHaveBeenCalledTimes(2);
  });

  test('a failing computation is not cached', () => {
    let calls = 0;
    const memo = memoize<Source, 'a', number>('failing', ['a'], ({ a }) => {
      calls += 1;
      if (a < 0) throw new Error('negative');
      return a;
    });
    const source: Source = { a: -1, b: new Set(), c: '' };
    expect(() => memo.get(source)).toThrow('negative');
    expect(() => memo.get(source)).toThrow('negative');
    expect(calls).toBe(2);
  });

  test('a dependency can declare its own equality', () => {
    const compute = vi.fn(({ b }: Pick<Source, 'b'>) => b.size);
    const ordered = memoize<Source, 'b', number>('ordered', ['b'], compute);
    const unordered = memoize<Source, 'b', number>('unordered', ['b'], compute, { equals: { b: sameMembers } });
    const first: Source = { a: 0, b: new Set(['x', 'y']), c: '' };
    const reordered: Source = { ...first, b: new Set(['y', 'x']) };

    ordered.get(first);
    ordered.get(reordered);
    unordered.get(first);
    unordered.get(reordered);

    expect(ordered.stats).toEqual({ computes: 2, hits: 0 });
    expect(unordered.stats).toEqual({ computes: 1, hits: 1 });
  });
});
