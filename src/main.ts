import { runCli, USAGE } from './cli';
import { ExplorerError, UsageError } from './errors';
import { logger } from './logger';

runCli(process.argv.slice(2)).catch((error: unknown) => {
  if (error instanceof UsageError) {
    logger.error('Cli', error.message);
    console.error(USAGE);
  } else if (error instanceof ExplorerError) {
    logger.error('Cli', `${error.code}: ${error.message}`);
  } else {
    logger.error('Cli', 'Unexpected failure', error instanceof Error ? error.stack : String(error));
  }
  process.exitCode = 1;
});
