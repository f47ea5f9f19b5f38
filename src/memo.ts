import { logger } from './logger';

/**
 * Single-entry cache over a derived value with an explicit dependency list.
 *
 * The compute function is typed against the declared fields of its source only, so
 * reading an undeclared dependency does not compile. A cached value is reused while
 * every declared field is equal to the one it was computed from.
 */
export interface Memo<TSource, K extends keyof TSource, TResult> {
  readonly name: string;
  readonly deps: readonly K[];
  get(source: TSource): TResult;
  /** Whether `get(source)` would be served from cache. */
  isFresh(source: TSource): boolean;
  invalidate(): void;
  readonly stats: Readonly<MemoStats>;
}

export interface MemoStats {
  computes: number;
  hits: number;
}

/**
 * Equality used for dependency values: identity, or element-wise identity in
 * iteration order for arrays and sets.
 */
export function sameDependency(a: unknown, b: unknown): boolean {
  if (Object.is(a, b)) return true;
  if (a instanceof Set && b instanceof Set) {
    return a.size === b.size && sameSequence([...a], [...b]);
  }
  if (Array.isArray(a) && Array.isArray(b)) {
    return sameSequence(a, b);
  }
  return false;
}

/** Set equality regardless of insertion order; other values fall back to `sameDependency`. */
export function sameMembers(a: unknown, b: unknown): boolean {
  if (a instanceof Set && b instanceof Set) {
    if (a.size !== b.size) return false;
    for (const value of a) {
      if (!b.has(value)) return false;
    }
    return true;
  }
  return sameDependency(a, b);
}

function sameSequence(a: readonly unknown[], b: readonly unknown[]): boolean {
  return a.length === b.length && a.every((value, i) => Object.is(value, b[i]));
}

export type DependencyEquality = (a: unknown, b: unknown) => boolean;

export interface MemoOptions<K extends PropertyKey> {
  /** Per-dependency equality; dependencies not listed use `sameDependency`. */
  equals?: Partial<Record<K, DependencyEquality>>;
}

export function memoize<TSource, K extends keyof TSource, TResult>(
  name: string,
  deps: readonly K[],
  compute: (input: Pick<TSource, K>) => TResult,
  options: MemoOptions<K> = {}
): Memo<TSource, K, TResult> {
  let cached: { key: unknown[]; value: TResult } | null = null;
  const stats: MemoStats = { computes: 0, hits: 0 };

  const keyOf = (source: TSource): unknown[] => deps.map((dep) => source[dep]);
  const equalities = deps.map((dep) => options.equals?.[dep] ?? sameDependency);

  const isFresh = (source: TSource): boolean => {
    if (cached === null) return false;
    const key = cached.key;
    return deps.every((dep, i) => equalities[i](key[i], source[dep]));
  };

  return {
    name,
    deps,
    stats,
    isFresh,
    get(source) {
      if (cached !== null && isFresh(source)) {
        stats.hits += 1;
        return cached.value;
      }
      stats.computes += 1;
      logger.debug('Engine', `Recompute ${name}`, { deps, computes: stats.computes });
      const value = compute(source);
      cached = { key: keyOf(source), value };
      return value;
    },
    invalidate() {
      cached = null;
    }
  };
}
