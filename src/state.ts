import { Store } from '@tanstack/store';
import { z } from 'zod';
import type { DatasetStore } from './data';
import { ConfigurationError } from './errors';
import { logger } from './logger';
import { memoize, type Memo } from './memo';
import type { IndicatorKey, Selection, SelectionField, TableColumn } from './types';
import { DEFAULT_TABLE_COLUMNS, INDICATOR_KEYS, TABLE_COLUMNS } from './types';

const statesSchema = z.array(z.string().min(1));
const yearSchema = z.number().int();
const indicatorSchema = z.enum(INDICATOR_KEYS);
const tableColumnsSchema = z.array(z.enum(TABLE_COLUMNS));
const searchTextSchema = z.string();

export interface SelectionChange {
  field: SelectionField;
  selection: Selection;
}

export interface InputStateOptions {
  /** Falls back to the first state in sorted order when absent from the dataset. */
  defaultState?: string;
}

function validate<T>(schema: z.ZodType<T>, value: unknown, context: string): T {
  const parsed = schema.safeParse(value);
  if (!parsed.success) {
    throw ConfigurationError.fromZod(context, parsed.error);
  }
  return parsed.data;
}

/**
 * Current selection of one session. Every mutator replaces exactly one field, and
 * subscribers hear about each replacement synchronously.
 */
export class InputState {
  readonly store: Store<Selection>;

  private readonly universe: readonly string[];

  private readonly defaultState: string | null;

  private readonly choices: Memo<Selection, 'searchText', readonly string[]>;

  private lastField: SelectionField | null = null;

  constructor(dataset: DatasetStore, options: InputStateOptions = {}) {
    this.universe = dataset.allStates();
    const preferred = options.defaultState;
    this.defaultState = preferred && dataset.hasState(preferred) ? preferred : this.universe[0] ?? null;
    this.store = new Store<Selection>({
      states: this.defaultStates(),
      year: dataset.maxYear(),
      indicator: INDICATOR_KEYS[0],
      tableColumns: DEFAULT_TABLE_COLUMNS,
      searchText: ''
    });
    this.choices = memoize<Selection, 'searchText', readonly string[]>('stateChoices', ['searchText'], ({ searchText }) =>
      this.matchStates(searchText)
    );
  }

  get selection(): Selection {
    return this.store.state;
  }

  setStates(states: Iterable<string>) {
    const list = validate(statesSchema, [...states], 'setStates');
    this.update('states', new Set(list));
  }

  setYear(year: number) {
    this.update('year', validate(yearSchema, year, 'setYear'));
  }

  setIndicator(indicator: IndicatorKey) {
    this.update('indicator', validate(indicatorSchema, indicator, 'setIndicator'));
  }

  setTableColumns(columns: Iterable<TableColumn>) {
    const list = validate(tableColumnsSchema, [...columns], 'setTableColumns');
    this.update('tableColumns', [...new Set(list)]);
  }

  setSearchText(text: string) {
    this.update('searchText', validate(searchTextSchema, text, 'setSearchText'));
  }

  isFullSelection(): boolean {
    const current = this.selection.states;
    return current.size === this.universe.length && this.universe.every((state) => current.has(state));
  }

  /**
   * Selects every state, or goes back to the default single state when every state
   * is already selected.
   */
  toggleSelectAll() {
    this.setStates(this.isFullSelection() ? this.defaultStates() : this.universe);
  }

  /** Sorted states matching the search text; the whole list when nothing matches. */
  filteredStateChoices(): readonly string[] {
    return this.choices.get(this.selection);
  }

  subscribe(listener: (change: SelectionChange) => void): () => void {
    return this.store.subscribe(() => {
      if (this.lastField === null) return;
      listener({ field: this.lastField, selection: this.selection });
    });
  }

  private defaultStates(): Set<string> {
    return new Set(this.defaultState === null ? [] : [this.defaultState]);
  }

  private matchStates(searchText: string): readonly string[] {
    const term = searchText.toLowerCase();
    if (!term) return this.universe;
    const matches = this.universe.filter((state) => state.toLowerCase().includes(term));
    return matches.length ? matches : this.universe;
  }

  private update<F extends SelectionField>(field: F, value: Selection[F]) {
    this.lastField = field;
    logger.debug('State', `Set ${field}`, value);
    this.store.setState((prev) => ({ ...prev, [field]: value }));
  }
}
