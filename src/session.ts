import type { DatasetStore } from './data';
import { DerivationEngine } from './engine';
import { ConfigurationError } from './errors';
import { logger } from './logger';
import { memoize, type Memo, type MemoStats } from './memo';
import { InputState, type InputStateOptions, type SelectionChange } from './state';
import type { CurrentSlice, IndicatorKey, Selection, SelectionField, TrendSlice } from './types';
import { buildBarChart, type BarChartSpec } from './viz/bar';
import { selectedIndicatorText, selectedYearText, stateCountText } from './viz/status';
import { buildDataTable, type DataTable } from './viz/table';
import { buildTrendChart, type TrendChartSpec } from './viz/trend';

export interface DashboardArtifacts {
  barChart: BarChartSpec | null;
  trendChart: TrendChartSpec | null;
  dataTable: DataTable;
  stateCount: string;
  selectedYear: string;
  selectedIndicator: string;
}

export type OutputName = keyof DashboardArtifacts;

export const OUTPUT_NAMES: readonly OutputName[] = [
  'barChart',
  'trendChart',
  'dataTable',
  'stateCount',
  'selectedYear',
  'selectedIndicator'
];

/** What an output can depend on: the selection plus the two derived slices. */
export type OutputSources = Omit<Selection, 'indicator' | 'year'> & {
  indicator: IndicatorKey;
  year: number;
  currentSlice: CurrentSlice;
  trendSlice: TrendSlice;
};

export const OUTPUT_DEPS = {
  barChart: ['currentSlice', 'indicator', 'year'],
  trendChart: ['trendSlice', 'indicator'],
  dataTable: ['currentSlice', 'tableColumns'],
  stateCount: ['states'],
  selectedYear: ['year'],
  selectedIndicator: ['indicator']
} as const satisfies Record<OutputName, readonly (keyof OutputSources)[]>;

type OutputMemos = { [N in OutputName]: Memo<OutputSources, keyof OutputSources, DashboardArtifacts[N]> };

export interface SessionUpdate {
  /** Selection field whose change triggered the pass; `null` for an explicit refresh. */
  field: SelectionField | null;
  changed: OutputName[];
  artifacts: DashboardArtifacts;
}

export type SessionListener = (update: SessionUpdate) => void;

function createOutputMemos(): OutputMemos {
  return {
    barChart: memoize<OutputSources, typeof OUTPUT_DEPS.barChart[number], BarChartSpec | null>(
      'barChart',
      OUTPUT_DEPS.barChart,
      ({ currentSlice, indicator, year }) => buildBarChart(currentSlice, { indicator, year })
    ),
    trendChart: memoize<OutputSources, typeof OUTPUT_DEPS.trendChart[number], TrendChartSpec | null>(
      'trendChart',
      OUTPUT_DEPS.trendChart,
      ({ trendSlice, indicator }) => buildTrendChart(trendSlice, { indicator })
    ),
    dataTable: memoize<OutputSources, typeof OUTPUT_DEPS.dataTable[number], DataTable>(
      'dataTable',
      OUTPUT_DEPS.dataTable,
      ({ currentSlice, tableColumns }) => buildDataTable(currentSlice, tableColumns)
    ),
    stateCount: memoize<OutputSources, typeof OUTPUT_DEPS.stateCount[number], string>(
      'stateCount',
      OUTPUT_DEPS.stateCount,
      ({ states }) => stateCountText(states)
    ),
    selectedYear: memoize<OutputSources, typeof OUTPUT_DEPS.selectedYear[number], string>(
      'selectedYear',
      OUTPUT_DEPS.selectedYear,
      ({ year }) => selectedYearText(year)
    ),
    selectedIndicator: memoize<OutputSources, typeof OUTPUT_DEPS.selectedIndicator[number], string>(
      'selectedIndicator',
      OUTPUT_DEPS.selectedIndicator,
      ({ indicator }) => selectedIndicatorText(indicator)
    )
  };
}

/**
 * Everything one user owns: the selection, the slice caches and the output caches.
 * Sessions share the dataset and nothing else.
 */
export class DashboardSession {
  readonly input: InputState;

  readonly engine: DerivationEngine;

  private readonly outputs: OutputMemos = createOutputMemos();

  private readonly listeners = new Set<SessionListener>();

  private readonly unsubscribeInput: () => void;

  private current: DashboardArtifacts | null = null;

  private refreshing = false;

  private pending: SelectionField[] = [];

  constructor(dataset: DatasetStore, options: InputStateOptions = {}) {
    this.input = new InputState(dataset, options);
    this.engine = new DerivationEngine(dataset, () => this.input.selection);
    this.unsubscribeInput = this.input.subscribe((change) => this.onInputChange(change));
  }

  get artifacts(): DashboardArtifacts {
    return this.current ?? this.refresh();
  }

  /**
   * Runs one synchronous pass over every output. Outputs whose dependencies did not
   * change come back from cache with the same artifact.
   */
  refresh(): DashboardArtifacts {
    return this.runPass(null).artifacts;
  }

  subscribe(listener: SessionListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  stats(): { slices: ReturnType<DerivationEngine['stats']>; outputs: Record<OutputName, MemoStats> } {
    const outputs = {
      barChart: { ...this.outputs.barChart.stats },
      trendChart: { ...this.outputs.trendChart.stats },
      dataTable: { ...this.outputs.dataTable.stats },
      stateCount: { ...this.outputs.stateCount.stats },
      selectedYear: { ...this.outputs.selectedYear.stats },
      selectedIndicator: { ...this.outputs.selectedIndicator.stats }
    };
    return { slices: this.engine.stats(), outputs };
  }

  dispose() {
    this.unsubscribeInput();
    this.listeners.clear();
  }

  private onInputChange({ field }: SelectionChange) {
    this.pending.push(field);
    if (this.refreshing) {
      return;
    }
    try {
      while (this.pending.length) {
        const next = this.pending.shift() ?? null;
        const update = this.runPass(next);
        if (update.changed.length) {
          this.notify(update);
        }
      }
    } catch (error) {
      // Queued changes never got their pass; rebuild from the selection on next read.
      this.current = null;
      logger.warn('Session', 'Refresh pass aborted', { field, dropped: this.pending });
      throw error;
    } finally {
      this.pending = [];
    }
  }

  private runPass(field: SelectionField | null): SessionUpdate {
    this.refreshing = true;
    try {
      const sources = this.sources();
      const previous = this.current;
      const artifacts: DashboardArtifacts = {
        barChart: this.outputs.barChart.get(sources),
        trendChart: this.outputs.trendChart.get(sources),
        dataTable: this.outputs.dataTable.get(sources),
        stateCount: this.outputs.stateCount.get(sources),
        selectedYear: this.outputs.selectedYear.get(sources),
        selectedIndicator: this.outputs.selectedIndicator.get(sources)
      };
      const changed = OUTPUT_NAMES.filter((name) => previous === null || !Object.is(previous[name], artifacts[name]));
      this.current = artifacts;
      logger.debug('Session', 'Refresh', { field, changed });
      return { field, changed, artifacts };
    } finally {
      this.refreshing = false;
    }
  }

  private notify(update: SessionUpdate) {
    this.refreshing = true;
    try {
      for (const listener of this.listeners) {
        listener(update);
      }
    } finally {
      this.refreshing = false;
    }
  }

  private sources(): OutputSources {
    const selection = this.input.selection;
    if (selection.indicator == null) {
      throw new ConfigurationError('Session outputs require an indicator');
    }
    if (selection.year == null) {
      throw new ConfigurationError('Session outputs require a year');
    }
    return {
      ...selection,
      indicator: selection.indicator,
      year: selection.year,
      currentSlice: this.engine.currentSlice(),
      trendSlice: this.engine.trendSlice()
    };
  }
}

export function createSession(dataset: DatasetStore, options: InputStateOptions = {}): DashboardSession {
  if (dataset.size === 0) {
    throw new ConfigurationError('Cannot start a session over an empty dataset');
  }
  return new DashboardSession(dataset, options);
}
