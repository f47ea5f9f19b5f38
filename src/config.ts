import { fileURLToPath } from 'node:url';
import { z } from 'zod';
import { ConfigurationError } from './errors';
import { LOG_LEVELS, type LogLevel } from './logger';

const defaultDataPath = fileURLToPath(new URL('../data/us_health_states.csv', import.meta.url));

const logLevelSchema = z.enum(LOG_LEVELS);

const envSchema = z.object({
  HEALTH_DATA_PATH: z.string().min(1).default(defaultDataPath),
  HEALTH_DATA_DELIMITER: z
    .string()
    .length(1, 'delimiter must be a single character')
    .refine((value) => value !== ',', 'comma is reserved as the decimal separator')
    .default(';'),
  HEALTH_DEFAULT_STATE: z.string().min(1).default('Alabama'),
  HEALTH_LOG_LEVEL: logLevelSchema.default('info'),
  HEALTH_OUTPUT_DIR: z.string().min(1).default('out')
});

export interface AppConfig {
  dataPath: string;
  delimiter: string;
  defaultState: string;
  logLevel: LogLevel;
  outputDir: string;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    throw ConfigurationError.fromZod('Invalid environment configuration', parsed.error);
  }
  const values = parsed.data;
  return {
    dataPath: values.HEALTH_DATA_PATH,
    delimiter: values.HEALTH_DATA_DELIMITER,
    defaultState: values.HEALTH_DEFAULT_STATE,
    logLevel: values.HEALTH_LOG_LEVEL,
    outputDir: values.HEALTH_OUTPUT_DIR
  };
}
