import * as d3 from 'd3';
import { csvFormatRows } from 'd3-dsv';
import { roundTo } from '../stats';
import type { CurrentSlice, CurrentSliceRow, TableColumn } from '../types';
import { DEFAULT_TABLE_COLUMNS } from '../types';

export type TableCell = string | number;

export interface DataTable {
  columns: readonly TableColumn[];
  /** One array per row, aligned with `columns`. */
  rows: TableCell[][];
}

const cellOf: Record<TableColumn, (row: CurrentSliceRow) => TableCell> = {
  State: (row) => row.state,
  Year: (row) => row.year,
  Value: (row) => roundTo(row.value, 2),
  Region: (row) => row.region,
  Rank: (row) => row.rank
};

/**
 * Projects the current slice onto the chosen columns in the chosen order. Values are
 * rounded here only; rows are ordered by value, highest first, when Value is shown.
 */
export function buildDataTable(slice: CurrentSlice, columns: readonly TableColumn[]): DataTable {
  const chosen = columns.length ? columns : DEFAULT_TABLE_COLUMNS;
  const ordered = chosen.includes('Value') ? d3.sort(slice, (a, b) => d3.descending(a.value, b.value)) : slice;
  return {
    columns: chosen,
    rows: ordered.map((row) => chosen.map((column) => cellOf[column](row)))
  };
}

function cellText(cell: TableCell, column: TableColumn): string {
  return column === 'Value' && typeof cell === 'number' ? d3.format('.2f')(cell) : String(cell);
}

export function tableToText(table: DataTable): string {
  if (table.rows.length === 0) {
    return 'No data for the current selection.';
  }
  const header = table.columns.map(String);
  const body = table.rows.map((row) => row.map((cell, i) => cellText(cell, table.columns[i])));
  const widths = header.map((title, i) => Math.max(title.length, ...body.map((row) => row[i].length)));
  const format = (cells: string[]) => cells.map((cell, i) => cell.padEnd(widths[i])).join('  ').trimEnd();
  return [format(header), format(widths.map((w) => '-'.repeat(w))), ...body.map(format)].join('\n');
}

export function tableToCsv(table: DataTable): string {
  return csvFormatRows([table.columns.map(String), ...table.rows.map((row) => row.map(String))]);
}
