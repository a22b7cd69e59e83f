/**
 * Helpers shared by the build tool's commands.
 */
import * as path from 'node:path';
import chalk from 'chalk';
import type { BuildFailure } from '../../core/build/pipeline.js';
import type { Config } from '../../core/config/schema.js';
import { logger } from '../../utils/logger.js';

export interface LoggingOptions {
  verbose?: boolean;
  quiet?: boolean;
}

/**
 * Set the log level from --verbose/--quiet, else from the config.
 */
export function applyLogLevel(options: LoggingOptions, config: Config): void {
  if (options.verbose) {
    logger.setLevel('debug');
  } else if (options.quiet) {
    logger.setLevel('error');
  } else {
    logger.setLevel(config.log_level);
  }
}

export function printFailures(failures: readonly BuildFailure[], projectRoot: string): void {
  for (const failure of failures) {
    const file = path.relative(projectRoot, failure.file) || failure.file;
    const where = failure.function ? `${file} (${failure.function})` : file;
    console.error(`${chalk.red(failure.error.code)} ${chalk.bold(where)}`);
    console.error(`  ${failure.error.message}`);
  }
  logger.fail(`${failures.length} error(s); no manifest written`);
}
