import type { DatasetStore } from './data';
import { ConfigurationError } from './errors';
import { memoize, sameMembers, type Memo } from './memo';
import { competitionRanks } from './stats';
import type { CurrentSlice, CurrentSliceRow, HealthRow, IndicatorKey, Selection, TrendSlice, TrendSliceRow } from './types';

export const CURRENT_SLICE_DEPS = ['states', 'year', 'indicator'] as const;
export const TREND_SLICE_DEPS = ['states', 'indicator'] as const;

type CurrentSliceDep = typeof CURRENT_SLICE_DEPS[number];
type TrendSliceDep = typeof TREND_SLICE_DEPS[number];
type CurrentSliceInput = Pick<Selection, CurrentSliceDep>;
type TrendSliceInput = Pick<Selection, TrendSliceDep>;

function requireIndicator(indicator: IndicatorKey | null, operation: string): IndicatorKey {
  if (indicator == null) {
    throw new ConfigurationError(`${operation} requires an indicator`);
  }
  return indicator;
}

function requireYear(year: number | null, operation: string): number {
  if (year == null) {
    throw new ConfigurationError(`${operation} requires a year`);
  }
  return year;
}

/** First row per (state, year) in source order. */
function firstRowPerYear(rows: readonly HealthRow[]): HealthRow[] {
  const seen = new Set<number>();
  return rows.filter((row) => {
    if (seen.has(row.year)) return false;
    seen.add(row.year);
    return true;
  });
}

export function computeCurrentSlice(dataset: DatasetStore, { states, year, indicator }: CurrentSliceInput): CurrentSlice {
  const key = requireIndicator(indicator, 'currentSlice');
  const selectedYear = requireYear(year, 'currentSlice');
  if (states.size === 0) {
    return [];
  }

  const seen = new Set<string>();
  const survivors: { state: string; value: number }[] = [];
  for (const row of dataset.rows) {
    if (row.year !== selectedYear || !states.has(row.state) || seen.has(row.state)) continue;
    seen.add(row.state);
    const value = row.values[key];
    if (value == null) continue;
    survivors.push({ state: row.state, value });
  }

  const ranks = competitionRanks(survivors.map((d) => d.value));
  return survivors.map(
    (d, i): CurrentSliceRow => ({
      state: d.state,
      year: selectedYear,
      value: d.value,
      region: dataset.regionOf(d.state),
      rank: ranks[i]
    })
  );
}

export function computeTrendSlice(dataset: DatasetStore, { states, indicator }: TrendSliceInput): TrendSlice {
  const key = requireIndicator(indicator, 'trendSlice');
  const slice: TrendSliceRow[] = [];
  for (const state of states) {
    const rows = firstRowPerYear(dataset.rowsForState(state)).sort((a, b) => a.year - b.year);
    for (const row of rows) {
      const value = row.values[key];
      if (value == null) continue;
      slice.push({ state, year: row.year, value });
    }
  }
  return slice;
}

/**
 * Memoized slices of one session. `currentSlice` is keyed on the set of states, year
 * and indicator; `trendSlice` on the ordered states and indicator, so a year change
 * leaves a cached trend untouched and a reorder leaves the current slice untouched.
 */
export class DerivationEngine {
  private readonly current: Memo<Selection, CurrentSliceDep, CurrentSlice>;

  private readonly trend: Memo<Selection, TrendSliceDep, TrendSlice>;

  constructor(
    private readonly dataset: DatasetStore,
    private readonly selection: () => Selection
  ) {
    // Current rows follow dataset order, so only the members of `states` matter here.
    this.current = memoize<Selection, CurrentSliceDep, CurrentSlice>(
      'currentSlice',
      CURRENT_SLICE_DEPS,
      (input) => computeCurrentSlice(this.dataset, input),
      { equals: { states: sameMembers } }
    );
    this.trend = memoize<Selection, TrendSliceDep, TrendSlice>('trendSlice', TREND_SLICE_DEPS, (input) =>
      computeTrendSlice(this.dataset, input)
    );
  }

  currentSlice(): CurrentSlice {
    return this.current.get(this.selection());
  }

  trendSlice(): TrendSlice {
    return this.trend.get(this.selection());
  }

  stats() {
    return {
      currentSlice: { ...this.current.stats },
      trendSlice: { ...this.trend.stats }
    };
  }

  dependencies() {
    return {
      currentSlice: this.current.deps,
      trendSlice: this.trend.deps
    };
  }
}
