import * as d3 from 'd3';
import type { IndicatorKey } from './types';
import { INDICATORS } from './types';

/**
 * Descending standard competition ranks (1-based). Equal values share the best rank
 * and the next distinct value takes its position, so [20, 35, 35] ranks as [3, 1, 1].
 */
export function competitionRanks(values: readonly number[]): number[] {
  const ranks = d3.rank(values, d3.descending);
  return Array.from(ranks, (rank) => rank + 1);
}

export function roundTo(value: number, digits = 2): number {
  const factor = 10 ** digits;
  return Math.round(value * factor) / factor;
}

export function formatNumber(value: number | null): string {
  if (value == null || Number.isNaN(value)) {
    return '—';
  }
  return d3.format('.2f')(value);
}

export function indicatorLabel(indicator: IndicatorKey | null): string {
  return indicator ? INDICATORS[indicator].label : 'Not selected';
}

export function axisLabel(indicator: IndicatorKey): string {
  return INDICATORS[indicator].axisLabel;
}
