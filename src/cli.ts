import { mkdir, writeFile } from 'node:fs/promises';
import path from 'node:path';
import { parseArgs } from 'node:util';
import { z } from 'zod';
import { loadConfig } from './config';
import { loadDatasetFile } from './data';
import { formatZodIssues, UsageError } from './errors';
import { logger } from './logger';
import { createSession, type DashboardSession } from './session';
import { INDICATOR_KEYS, TABLE_COLUMNS } from './types';
import { barChartToSvg } from './viz/bar';
import { tableToCsv, tableToText } from './viz/table';
import { trendChartToSvg } from './viz/trend';

export const USAGE = `Usage: health-explorer [options]

  --states <list>     comma-separated state names
  --select-all        toggle between every state and the default state
  --year <year>       year to compare (defaults to the latest year)
  --indicator <key>   one of ${INDICATOR_KEYS.join(', ')}
  --columns <list>    table columns, any of ${TABLE_COLUMNS.join(', ')}
  --search <text>     filter the state choices
  --out <dir>         where charts are written (HEALTH_OUTPUT_DIR)
  --csv               also write the table as table.csv
  --help              show this message`;

const argsSchema = z.object({
  states: z.string().optional(),
  'select-all': z.boolean().optional(),
  year: z.coerce.number().int().optional(),
  indicator: z.enum(INDICATOR_KEYS).optional(),
  columns: z.string().optional(),
  search: z.string().optional(),
  out: z.string().optional(),
  csv: z.boolean().optional(),
  help: z.boolean().optional()
});

export type CliArgs = z.infer<typeof argsSchema>;

const columnListSchema = z.array(z.enum(TABLE_COLUMNS));

function splitList(value: string): string[] {
  return value
    .split(',')
    .map((part) => part.trim())
    .filter(Boolean);
}

function parseFlags(argv: string[]) {
  try {
    return parseArgs({
      args: argv,
      options: {
        states: { type: 'string' },
        'select-all': { type: 'boolean' },
        year: { type: 'string' },
        indicator: { type: 'string' },
        columns: { type: 'string' },
        search: { type: 'string' },
        out: { type: 'string' },
        csv: { type: 'boolean' },
        help: { type: 'boolean' }
      }
    }).values;
  } catch (error) {
    throw new UsageError(`Invalid arguments: ${error instanceof Error ? error.message : String(error)}`);
  }
}

export function readArgs(argv: string[]): CliArgs {
  const parsed = argsSchema.safeParse(parseFlags(argv));
  if (!parsed.success) {
    throw new UsageError(`Invalid arguments: ${formatZodIssues(parsed.error)}`);
  }
  return parsed.data;
}

/** Applies the flags in a fixed order: states, select-all, year, indicator, columns, search. */
export function applyArgs(session: DashboardSession, args: CliArgs) {
  const { input } = session;
  if (args.states) input.setStates(splitList(args.states));
  if (args['select-all']) input.toggleSelectAll();
  if (args.year != null) input.setYear(args.year);
  if (args.indicator) input.setIndicator(args.indicator);
  if (args.columns) {
    const columns = columnListSchema.safeParse(splitList(args.columns));
    if (!columns.success) {
      throw new UsageError(`Invalid --columns: ${formatZodIssues(columns.error)}`);
    }
    input.setTableColumns(columns.data);
  }
  if (args.search != null) input.setSearchText(args.search);
}

export interface CliOptions {
  env?: NodeJS.ProcessEnv;
  print?: (line: string) => void;
}

export async function runCli(argv: string[], { env = process.env, print = console.log }: CliOptions = {}) {
  const args = readArgs(argv);
  if (args.help) {
    print(USAGE);
    return;
  }
  const config = loadConfig(env);
  logger.setConsoleLevel(config.logLevel);

  const dataset = await loadDatasetFile(config.dataPath, config.delimiter);
  const session = createSession(dataset, { defaultState: config.defaultState });
  try {
    applyArgs(session, args);

    const { artifacts } = session;
    print(`Selected states:  ${artifacts.stateCount}`);
    print(`Year:             ${artifacts.selectedYear}`);
    print(`Health indicator: ${artifacts.selectedIndicator}`);
    if (args.search != null) {
      print(`State choices:    ${session.input.filteredStateChoices().join(', ')}`);
    }
    print('');
    print(tableToText(artifacts.dataTable));

    const outDir = args.out ?? config.outputDir;
    await mkdir(outDir, { recursive: true });
    const written: string[] = [];
    if (artifacts.barChart) {
      const file = path.join(outDir, 'bar.svg');
      await writeFile(file, barChartToSvg(artifacts.barChart));
      written.push(file);
    }
    if (artifacts.trendChart) {
      const file = path.join(outDir, 'trend.svg');
      await writeFile(file, trendChartToSvg(artifacts.trendChart));
      written.push(file);
    }
    if (args.csv) {
      const file = path.join(outDir, 'table.csv');
      await writeFile(file, tableToCsv(artifacts.dataTable));
      written.push(file);
    }
    logger.info('Cli', written.length ? `Wrote ${written.join(', ')}` : 'No data to chart for the current selection');
  } finally {
    session.dispose();
  }
}
