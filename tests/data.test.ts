import { describe, expect, test } from 'vitest';
import { cleanNumericField, loadDatasetFile, parseDataset } from '../src/data';
import { DatasetLoadError } from '../src/errors';
import { classifyRegion } from '../src/regions';
import { datasetOf, samplePath, sampleDataset } from './helpers';

// ---------------------------------------------------------------------------
// cleanNumericField
// ---------------------------------------------------------------------------

describe('cleanNumericField', () => {
  test('reads a comma decimal separator and drops the percent sign', () => {
    expect(cleanNumericField('30,5%')).toBe(30.5);
  });

  test('plain numbers pass through', () => {
    expect(cleanNumericField('4.25')).toBe(4.25);
    expect(cleanNumericField('12')).toBe(12);
  });

  test('strips stray characters around the number', () => {
    expect(cleanNumericField(' 27,9 % ')).toBe(27.9);
  });

  test('unparsable input yields null instead of throwing', () => {
    expect(cleanNumericField('N/A')).toBeNull();
    expect(cleanNumericField('')).toBeNull();
    expect(cleanNumericField('n.v.')).toBeNull();
    expect(cleanNumericField('1,2,3')).toBeNull();
    expect(cleanNumericField(undefined)).toBeNull();
    expect(cleanNumericField(null)).toBeNull();
  });
});

// ---------------------------------------------------------------------------
// classifyRegion / regionOf
// ---------------------------------------------------------------------------

describe('regions', () => {
  test('enumerated states map to their region', () => {
    expect(classifyRegion('Texas')).toBe('South');
    expect(classifyRegion('Vermont')).toBe('Northeast');
    expect(classifyRegion('Ohio')).toBe('Midwest');
  });

  test('states outside the enumerated lists are West', () => {
    expect(classifyRegion('Montana')).toBe('West');
    expect(classifyRegion('California')).toBe('West');
    expect(classifyRegion('Atlantis')).toBe('West');
  });

  test('regionOf covers every state in the dataset and unknown names', () => {
    const dataset = sampleDataset();
    expect(dataset.allStates().map((state) => dataset.regionOf(state))).toEqual([
      'South',
      'Northeast',
      'West',
      'South'
    ]);
    expect(dataset.regionOf('Ohio')).toBe('Midwest');
    expect(dataset.regionOf('Atlantis')).toBe('West');
  });
});

// ---------------------------------------------------------------------------
// DatasetStore
// ---------------------------------------------------------------------------

describe('parseDataset', () => {
  test('keeps rows with a state and integer year in source order', () => {
    const dataset = sampleDataset();
    expect(dataset.size).toBe(8);
    expect(dataset.rows.map((row) => `${row.state}:${row.year}`)).toEqual([
      'Alabama:2020',
      'Alabama:2021',
      'Texas:2021',
      'Texas:2020',
      'Montana:2020',
      'Montana:2021',
      'Maine:2021',
      'Texas:2021'
    ]);
  });

  test('cleans every indicator column', () => {
    const dataset = sampleDataset();
    expect(dataset.rows[0].values).toEqual({
      obesity: 36.2,
      smoking: 20.1,
      physicalDays: 4.5,
      mentalDays: 4.9
    });
    expect(dataset.rows[3].values.smoking).toBeNull();
    expect(dataset.rows[5].values.obesity).toBeNull();
  });

  test('exposes sorted states and years', () => {
    const dataset = sampleDataset();
    expect(dataset.allStates()).toEqual(['Alabama', 'Maine', 'Montana', 'Texas']);
    expect(dataset.allYears()).toEqual([2020, 2021]);
    expect(dataset.maxYear()).toBe(2021);
  });

  test('rows are frozen', () => {
    const dataset = sampleDataset();
    expect(Object.isFrozen(dataset.rows)).toBe(true);
    expect(Object.isFrozen(dataset.rows[0])).toBe(true);
    expect(Object.isFrozen(dataset.rows[0].values)).toBe(true);
  });

  test('rowsForState returns source order and an empty list for unknown states', () => {
    const dataset = sampleDataset();
    expect(dataset.rowsForState('Texas').map((row) => row.year)).toEqual([2021, 2020, 2021]);
    expect(dataset.rowsForState('Ohio')).toEqual([]);
  });

  test('honours a different delimiter', () => {
    const text = [
      'State|year|Adult obesity [in %]|Adult smoking [in %]|Physically Unhealthy Days|Mentally Unhealthy Days',
      'Utah|2020|25,1%|8,0%|3,5|4,2'
    ].join('\n');
    const dataset = parseDataset(text, '|');
    expect(dataset.rows[0].values.obesity).toBe(25.1);
    expect(dataset.regionOf('Utah')).toBe('West');
  });

  test('rejects a file without the indicator columns', () => {
    expect(() => parseDataset('State;year;Obesity\nTexas;2020;30')).toThrow(DatasetLoadError);
    expect(() => parseDataset('State;year;Obesity\nTexas;2020;30')).toThrow(
      'Dataset is missing columns: Adult obesity [in %], Adult smoking [in %], Physically Unhealthy Days, Mentally Unhealthy Days'
    );
  });

  test('an empty record list gives an empty store', () => {
    const dataset = datasetOf([]);
    expect(dataset.size).toBe(0);
    expect(dataset.allStates()).toEqual([]);
    expect(dataset.maxYear()).toBeNull();
  });
});

describe('loadDatasetFile', () => {
  test('reads and parses a file from disk', async () => {
    const dataset = await loadDatasetFile(samplePath);
    expect(dataset.allStates()).toEqual(['Alabama', 'Maine', 'Montana', 'Texas']);
  });

  test('reports an unreadable file as a DatasetLoadError', async () => {
    await expect(loadDatasetFile('does-not-exist/health.csv')).rejects.toBeInstanceOf(DatasetLoadError);
  });
});
