/**
 * commands command - list the terminal commands of a manifest.
 */
import { Command } from 'commander';
import * as path from 'node:path';
import { loadConfig } from '../../core/config/loader.js';
import { formatCommandListing } from '../../core/dispatch/command-listing.js';
import { loadManifest } from '../../core/manifest/manifest.js';
import { UsageError, ErrorCodes } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';

interface CommandsCommandOptions {
  manifest?: string;
  config?: string;
}

/**
 * Create the commands command.
 */
export function createCommandsCommand(): Command {
  return new Command('commands')
    .description('List the terminal commands in a manifest')
    .argument('[prefix...]', 'Command tokens to list below')
    .option('--manifest <path>', 'Manifest path (default from config)')
    .option('--config <path>', 'Path to config file')
    .action(async (prefix: string[], options: CommandsCommandOptions) => {
      try {
        const projectRoot = process.cwd();
        const manifestPath =
          options.manifest ?? (await loadConfig(projectRoot, options.config)).manifest;
        const manifest = await loadManifest(path.resolve(projectRoot, manifestPath));

        if (prefix.length > 0 && (!manifest.tree.has(prefix) || manifest.tree.lookup(prefix))) {
          throw new UsageError(ErrorCodes.UNKNOWN_COMMAND, `no command group ${prefix.join(' ')}`);
        }
        process.stdout.write(formatCommandListing(manifest.program.name, manifest.tree, prefix));
      } catch (error) {
        logger.error(
          error instanceof Error ? error.message : 'Unknown error',
          error instanceof Error ? error : undefined
        );
        process.exit(1);
      }
    });
}
