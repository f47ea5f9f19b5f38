import { indicatorLabel } from '../stats';
import type { IndicatorKey } from '../types';

export function stateCountText(states: ReadonlySet<string>): string {
  return `${states.size}`;
}

export function selectedYearText(year: number | null): string {
  return year == null ? 'Not selected' : String(year);
}

export function selectedIndicatorText(indicator: IndicatorKey | null): string {
  return indicatorLabel(indicator);
}
