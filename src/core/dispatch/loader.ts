/**
 * Loading command functions named by manifest entries.
 */
import * as path from 'node:path';
import { pathToFileURL } from 'node:url';
import { ErrorCodes, SystemError, describeError } from '../../utils/errors.js';
import type { CommandEntry } from '../manifest/manifest.js';

/** Any function; arguments are validated against its specification before the call. */
export type CommandFunction = (...args: never[]) => unknown;

export interface FunctionLoader {
  load(entry: CommandEntry, baseDir: string): Promise<CommandFunction>;
}

function isCommandFunction(value: unknown): value is CommandFunction {
  return typeof value === 'function';
}

/**
 * Imports the entry's module and picks its export.
 */
export class ModuleFunctionLoader implements FunctionLoader {
  async load(entry: CommandEntry, baseDir: string): Promise<CommandFunction> {
    const modulePath = path.resolve(baseDir, entry.module);
    let loaded: unknown;
    try {
      loaded = await import(pathToFileURL(modulePath).href);
    } catch (error) {
      throw new SystemError(
        ErrorCodes.MODULE_LOAD_ERROR,
        `cannot load module ${entry.module}: ${describeError(error)}`,
        { module: modulePath }
      );
    }

    const exported: unknown =
      typeof loaded === 'object' && loaded !== null ? Reflect.get(loaded, entry.exportName) : undefined;
    if (!isCommandFunction(exported)) {
      throw new SystemError(
        ErrorCodes.MODULE_LOAD_ERROR,
        `module ${entry.module} does not export a function named ${entry.exportName}`,
        { module: modulePath, exportName: entry.exportName }
      );
    }
    return exported;
  }
}

/**
 * Serves functions from a map keyed by export name.
 */
export class StaticFunctionLoader implements FunctionLoader {
  constructor(private readonly functions: Readonly<Record<string, CommandFunction>>) {}

  async load(entry: CommandEntry): Promise<CommandFunction> {
    const fn = this.functions[entry.exportName];
    if (!fn) {
      throw new SystemError(ErrorCodes.MODULE_LOAD_ERROR, `no function registered as ${entry.exportName}`, {
        exportName: entry.exportName,
      });
    }
    return fn;
  }
}
