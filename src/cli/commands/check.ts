/**
 * check command - validate command sources without writing a manifest.
 */
import { Command } from 'commander';
import { buildCommands } from '../../core/build/pipeline.js';
import { loadConfig, resolveProgramInfo } from '../../core/config/loader.js';
import { logger } from '../../utils/logger.js';
import { applyLogLevel, printFailures, type LoggingOptions } from './shared.js';

interface CheckCommandOptions extends LoggingOptions {
  config?: string;
}

/**
 * Create the check command.
 */
export function createCheckCommand(): Command {
  return new Command('check')
    .description('Check command functions without writing the manifest')
    .option('--config <path>', 'Path to config file')
    .option('--verbose', 'Show debug output')
    .option('--quiet', 'Only show errors')
    .action(async (options: CheckCommandOptions) => {
      try {
        const projectRoot = process.cwd();
        const config = await loadConfig(projectRoot, options.config);
        applyLogLevel(options, config);

        const outcome = await buildCommands({
          projectRoot,
          config,
          program: await resolveProgramInfo(projectRoot, config),
        });

        if (!outcome.ok) {
          printFailures(outcome.failures, projectRoot);
          process.exit(1);
        }
        logger.success(`${outcome.entries.length} command(s) OK`);
      } catch (error) {
        logger.error(
          error instanceof Error ? error.message : 'Unknown error',
          error instanceof Error ? error : undefined
        );
        process.exit(1);
      }
    });
}
