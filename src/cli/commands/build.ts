/**
 * build command - compile command sources into a manifest.
 */
import { Command } from 'commander';
import * as path from 'node:path';
import { buildCommands, writeBuildManifest } from '../../core/build/pipeline.js';
import { loadConfig, resolveProgramInfo } from '../../core/config/loader.js';
import { logger } from '../../utils/logger.js';
import { applyLogLevel, printFailures, type LoggingOptions } from './shared.js';

interface BuildCommandOptions extends LoggingOptions {
  config?: string;
  out?: string;
}

/**
 * Create the build command.
 */
export function createBuildCommand(): Command {
  return new Command('build')
    .description('Extract command functions and write the manifest')
    .option('--config <path>', 'Path to config file')
    .option('--out <path>', 'Manifest path (overrides config)')
    .option('--verbose', 'Show debug output')
    .option('--quiet', 'Only show errors')
    .action(async (options: BuildCommandOptions) => {
      try {
        const projectRoot = process.cwd();
        const config = await loadConfig(projectRoot, options.config);
        applyLogLevel(options, config);

        const program = await resolveProgramInfo(projectRoot, config);
        const outcome = await buildCommands({
          projectRoot,
          config,
          program,
          ...(options.out !== undefined ? { manifestPath: options.out } : {}),
        });

        if (!outcome.ok) {
          printFailures(outcome.failures, projectRoot);
          process.exit(1);
        }

        await writeBuildManifest(outcome);
        logger.success(
          `${program.name}: ${outcome.entries.length} command(s) from ${outcome.files.length} file(s) written to ${path.relative(projectRoot, outcome.manifestPath)}`
        );
      } catch (error) {
        logger.error(
          error instanceof Error ? error.message : 'Unknown error',
          error instanceof Error ? error : undefined
        );
        process.exit(1);
      }
    });
}
