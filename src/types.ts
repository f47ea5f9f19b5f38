export const INDICATOR_KEYS = ['obesity', 'smoking', 'physicalDays', 'mentalDays'] as const;

export type IndicatorKey = typeof INDICATOR_KEYS[number];

export type Region = 'Northeast' | 'Midwest' | 'South' | 'West';

export const TABLE_COLUMNS = ['State', 'Year', 'Value', 'Region', 'Rank'] as const;

export type TableColumn = typeof TABLE_COLUMNS[number];

export interface IndicatorInfo {
  key: IndicatorKey;
  /** Header of the column in the raw dataset file. */
  column: string;
  label: string;
  axisLabel: string;
}

export const INDICATORS: Record<IndicatorKey, IndicatorInfo> = {
  obesity: {
    key: 'obesity',
    column: 'Adult obesity [in %]',
    label: 'Obesity Rate',
    axisLabel: 'Obesity Rate (%)'
  },
  smoking: {
    key: 'smoking',
    column: 'Adult smoking [in %]',
    label: 'Smoking Rate',
    axisLabel: 'Smoking Rate (%)'
  },
  physicalDays: {
    key: 'physicalDays',
    column: 'Physically Unhealthy Days',
    label: 'Physically Unhealthy Days',
    axisLabel: 'Physically Unhealthy Days'
  },
  mentalDays: {
    key: 'mentalDays',
    column: 'Mentally Unhealthy Days',
    label: 'Mentally Unhealthy Days',
    axisLabel: 'Mentally Unhealthy Days'
  }
};

export const STATE_COLUMN = 'State';
export const YEAR_COLUMN = 'year';

export interface HealthRow {
  state: string;
  year: number;
  values: Record<IndicatorKey, number | null>;
}

export interface Selection {
  /** Iteration order is the order the states were selected in. */
  states: ReadonlySet<string>;
  year: number | null;
  indicator: IndicatorKey | null;
  tableColumns: readonly TableColumn[];
  searchText: string;
}

export type SelectionField = keyof Selection;

export interface CurrentSliceRow {
  state: string;
  year: number;
  value: number;
  region: Region;
  rank: number;
}

export interface TrendSliceRow {
  state: string;
  year: number;
  value: number;
}

export type CurrentSlice = readonly CurrentSliceRow[];

export type TrendSlice = readonly TrendSliceRow[];

export const DEFAULT_TABLE_COLUMNS: readonly TableColumn[] = ['State', 'Year', 'Value'];
