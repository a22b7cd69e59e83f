/**
 * exec command - run a command line against a manifest.
 */
import { Command } from 'commander';
import * as path from 'node:path';
import { loadConfig } from '../../core/config/loader.js';
import { runManifest } from '../../core/dispatch/dispatcher.js';
import { NodeTextStreams } from '../../core/streams/text-streams.js';
import { TypeRegistry } from '../../core/types/registry.js';
import { logger } from '../../utils/logger.js';

interface ExecCommandOptions {
  config?: string;
}

/**
 * Create the exec command. Everything after the manifest path is passed
 * to the generated command line untouched.
 */
export function createExecCommand(): Command {
  return new Command('exec')
    .description('Run a command line against a manifest')
    .argument('<manifest>', 'Manifest path')
    .argument('[argv...]', 'Command line for the manifest program')
    .option('--config <path>', 'Path to config file (newline and log level)')
    .passThroughOptions()
    .action(async (manifestPath: string, argv: string[], options: ExecCommandOptions) => {
      try {
        const projectRoot = process.cwd();
        const config = await loadConfig(projectRoot, options.config);
        logger.setLevel(config.log_level);

        const registry = new TypeRegistry(new NodeTextStreams({ newline: config.newline }));
        const exitCode = await runManifest(path.resolve(projectRoot, manifestPath), argv, { registry });
        if (exitCode !== 0) {
          process.exit(exitCode);
        }
      } catch (error) {
        logger.error(
          error instanceof Error ? error.message : 'Unknown error',
          error instanceof Error ? error : undefined
        );
        process.exit(1);
      }
    });
}
