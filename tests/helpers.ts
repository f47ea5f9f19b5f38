import { readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import { load, parseDataset, type DatasetStore } from '../src/data';
import type { IndicatorKey } from '../src/types';

export const samplePath = fileURLToPath(new URL('./fixtures/sample.csv', import.meta.url));

export function sampleDataset(): DatasetStore {
  return parseDataset(readFileSync(samplePath, 'utf8'));
}

type Values = Partial<Record<IndicatorKey, string>>;

/** Builds a dataset from raw records keyed the way the dataset file names its columns. */
export function datasetOf(rows: Array<{ state: string; year: number } & Values>): DatasetStore {
  return load(
    rows.map(({ state, year, obesity, smoking, physicalDays, mentalDays }) => ({
      State: state,
      year: String(year),
      'Adult obesity [in %]': obesity,
      'Adult smoking [in %]': smoking,
      'Physically Unhealthy Days': physicalDays,
      'Mentally Unhealthy Days': mentalDays
    }))
  );
}
