import type { ZodError } from 'zod';

export function formatZodIssues(error: ZodError): string {
  return error.issues
    .map((issue) => {
      const path = issue.path.length ? `${issue.path.join('.')}: ` : '';
      return `${path}${issue.message}`;
    })
    .join('; ');
}

export abstract class ExplorerError extends Error {
  abstract readonly code: string;

  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/**
 * Raised when a caller breaks a contract: an unset indicator or year at read time,
 * an invalid mutator argument, or an unusable configuration.
 */
export class ConfigurationError extends ExplorerError {
  readonly code = 'CONFIGURATION';

  static fromZod(context: string, error: ZodError): ConfigurationError {
    return new ConfigurationError(`${context}: ${formatZodIssues(error)}`);
  }
}

/** Bad command-line input; the CLI answers it with its usage text. */
export class UsageError extends ConfigurationError {}

export class DatasetLoadError extends ExplorerError {
  readonly code = 'DATASET_LOAD';
}
