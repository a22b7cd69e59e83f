import { Command } from 'commander';
import { readFileSync } from 'node:fs';
import { dirname, resolve } from 'node:path';
import { fileURLToPath } from 'node:url';
import { createBuildCommand } from './commands/build.js';
import { createCheckCommand } from './commands/check.js';
import { createCommandsCommand } from './commands/commands.js';
import { createExecCommand } from './commands/exec.js';

const __dirname = dirname(fileURLToPath(import.meta.url));

function readVersion(): string {
  const pkg: unknown = JSON.parse(readFileSync(resolve(__dirname, '../../package.json'), 'utf-8'));
  const version: unknown = typeof pkg === 'object' && pkg !== null ? Reflect.get(pkg, 'version') : undefined;
  return typeof version === 'string' ? version : '0.0.0';
}

/** Create the CLI program. */
export function createCli(): Command {
  const program = new Command()
    .name('fncli')
    .description('Compile documented functions into a command line')
    .version(readVersion())
    .enablePositionalOptions();
  [createBuildCommand, createCheckCommand, createCommandsCommand, createExecCommand].forEach((cmd) =>
    program.addCommand(cmd())
  );
  return program;
}
