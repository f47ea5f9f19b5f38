import { readFile } from 'node:fs/promises';
import * as d3 from 'd3';
import { dsvFormat } from 'd3-dsv';
import { DatasetLoadError } from './errors';
import { logger } from './logger';
import { classifyRegion } from './regions';
import type { HealthRow, IndicatorKey, Region } from './types';
import { INDICATOR_KEYS, INDICATORS, STATE_COLUMN, YEAR_COLUMN } from './types';

export type RawRecord = Readonly<Record<string, string | undefined>>;

/**
 * Comma decimal separators become points and every other non-numeric character is
 * dropped before parsing. Unparsable input yields `null`.
 */
export function cleanNumericField(value: string | undefined | null): number | null {
  if (value == null) {
    return null;
  }
  const stripped = value.replace(/,/g, '.').replace(/[^0-9.]/g, '');
  if (stripped === '') {
    return null;
  }
  const n = Number(stripped);
  return Number.isFinite(n) ? n : null;
}

function parseYear(value: string | undefined): number | null {
  const trimmed = value?.trim() ?? '';
  return /^\d+$/.test(trimmed) ? Number(trimmed) : null;
}

/**
 * Read-only view over the cleaned dataset. One instance is shared by every session.
 */
export class DatasetStore {
  readonly rows: readonly HealthRow[];

  private readonly regions: ReadonlyMap<string, Region>;

  private readonly byState: ReadonlyMap<string, readonly HealthRow[]>;

  private readonly states: readonly string[];

  private readonly years: readonly number[];

  constructor(rows: readonly HealthRow[]) {
    this.rows = Object.freeze(rows.map((row) => Object.freeze({ ...row, values: Object.freeze({ ...row.values }) })));
    this.byState = d3.group(this.rows, (row) => row.state);
    this.states = Object.freeze(d3.sort(this.byState.keys()));
    this.years = Object.freeze(d3.sort(new Set(this.rows.map((row) => row.year))));
    this.regions = new Map(this.states.map((state) => [state, classifyRegion(state)] as const));
  }

  get size(): number {
    return this.rows.length;
  }

  regionOf(state: string): Region {
    return this.regions.get(state) ?? classifyRegion(state);
  }

  allStates(): readonly string[] {
    return this.states;
  }

  allYears(): readonly number[] {
    return this.years;
  }

  maxYear(): number | null {
    return this.years.length ? this.years[this.years.length - 1] : null;
  }

  hasState(state: string): boolean {
    return this.byState.has(state);
  }

  /** Rows of one state in source order. */
  rowsForState(state: string): readonly HealthRow[] {
    return this.byState.get(state) ?? [];
  }
}

export function load(rawRows: readonly RawRecord[]): DatasetStore {
  const rows: HealthRow[] = [];
  let dropped = 0;
  const missing: Record<IndicatorKey, number> = { obesity: 0, smoking: 0, physicalDays: 0, mentalDays: 0 };

  for (const raw of rawRows) {
    const state = raw[STATE_COLUMN]?.trim() ?? '';
    const year = parseYear(raw[YEAR_COLUMN]);
    if (!state || year == null) {
      dropped += 1;
      continue;
    }
    const values: Record<IndicatorKey, number | null> = {
      obesity: cleanNumericField(raw[INDICATORS.obesity.column]),
      smoking: cleanNumericField(raw[INDICATORS.smoking.column]),
      physicalDays: cleanNumericField(raw[INDICATORS.physicalDays.column]),
      mentalDays: cleanNumericField(raw[INDICATORS.mentalDays.column])
    };
    for (const key of INDICATOR_KEYS) {
      if (values[key] == null) missing[key] += 1;
    }
    rows.push({ state, year, values });
  }

  const store = new DatasetStore(rows);
  logger.info('Data', `Loaded ${store.size} rows`, {
    states: store.allStates().length,
    years: store.allYears()
  });
  if (dropped > 0) {
    logger.warn('Data', `Dropped ${dropped} rows without a state or integer year`);
  }
  if (INDICATOR_KEYS.some((key) => missing[key] > 0)) {
    logger.debug('Data', 'Indicator values without a number', missing);
  }
  return store;
}

const REQUIRED_COLUMNS = [STATE_COLUMN, YEAR_COLUMN, ...INDICATOR_KEYS.map((key) => INDICATORS[key].column)];

export function parseDataset(text: string, delimiter = ';'): DatasetStore {
  const parsed = dsvFormat(delimiter).parse(text);
  const absent = REQUIRED_COLUMNS.filter((column) => !parsed.columns.includes(column));
  if (absent.length) {
    throw new DatasetLoadError(`Dataset is missing columns: ${absent.join(', ')}`);
  }
  return load(parsed);
}

export async function loadDatasetFile(path: string, delimiter = ';'): Promise<DatasetStore> {
  let text: string;
  try {
    text = await readFile(path, 'utf8');
  } catch (error) {
    throw new DatasetLoadError(`Failed to read dataset ${path}: ${error instanceof Error ? error.message : String(error)}`);
  }
  return parseDataset(text, delimiter);
}
