/**
 * Build pipeline: command sources → specifications → command tree →
 * manifest.
 */
import * as path from 'node:path';
import { ConfigError, ErrorCodes, FncliError, SpecificationError, SystemError, describeError } from '../../utils/errors.js';
import { globFiles, readFile, relativePosixPath, writeFile } from '../../utils/file-system.js';
import { logger as defaultLogger, type Logger } from '../../utils/logger.js';
import type { Config, EmitConfig } from '../config/schema.js';
import { createManifest, stringifyManifest, type CommandEntry } from '../manifest/manifest.js';
import type { Manifest, ProgramInfo } from '../manifest/schema.js';
import { buildSpec } from '../spec/builder.js';
import { FunctionExtractor, type ExtractedFunction } from '../spec/extractor.js';
import { CommandTree } from '../tree/command-tree.js';
import { TypeRegistry } from '../types/registry.js';

export interface BuildFailure {
  readonly file: string;
  readonly function?: string;
  readonly error: FncliError;
}

export type BuildOutcome =
  | {
      readonly ok: true;
      readonly files: readonly string[];
      readonly tree: CommandTree;
      readonly entries: readonly CommandEntry[];
      readonly manifest: Manifest;
      /** Absolute manifest path the module paths are relative to. */
      readonly manifestPath: string;
    }
  | {
      readonly ok: false;
      readonly files: readonly string[];
      readonly failures: readonly BuildFailure[];
    };

export interface BuildOptions {
  projectRoot: string;
  config: Config;
  program: ProgramInfo;
  /** Overrides `config.manifest`. */
  manifestPath?: string;
  registry?: TypeRegistry;
  logger?: Logger;
}

function toFailure(file: string, functionName: string | undefined, error: unknown): BuildFailure {
  const wrapped =
    error instanceof FncliError
      ? error
      : new SystemError(ErrorCodes.PARSE_ERROR, describeError(error), { file });
  return { file, ...(functionName !== undefined ? { function: functionName } : {}), error: wrapped };
}

const EMITTED_EXTENSIONS: ReadonlyArray<[RegExp, string]> = [
  [/\.mts$/, '.mjs'],
  [/\.cts$/, '.cjs'],
  [/\.tsx?$/, '.js'],
];

/**
 * Path of the module the runtime imports for a command source: the source
 * itself, or its compiled counterpart under `emit.out_dir`.
 */
export function emittedModulePath(projectRoot: string, file: string, emit: EmitConfig | undefined): string {
  if (!emit) return file;
  const rootDir = path.resolve(projectRoot, emit.root_dir);
  const relative = path.relative(rootDir, file);
  if (relative.startsWith('..') || path.isAbsolute(relative)) {
    throw new ConfigError(
      ErrorCodes.CONFIG_LOAD_ERROR,
      `${relativePosixPath(projectRoot, file)} is outside emit.root_dir ${emit.root_dir}`,
      { file, rootDir }
    );
  }
  const emitted = EMITTED_EXTENSIONS.reduce(
    (current, [pattern, extension]) => current.replace(pattern, extension),
    relative
  );
  return path.resolve(projectRoot, emit.out_dir, emitted);
}

/**
 * Extract and check every command function under the configured sources.
 * All failures are collected; the tree is only built when there are none.
 */
export async function buildCommands(options: BuildOptions): Promise<BuildOutcome> {
  const { projectRoot, config } = options;
  const registry = options.registry ?? new TypeRegistry();
  const log = (options.logger ?? defaultLogger).child('build');
  const manifestPath = path.resolve(projectRoot, options.manifestPath ?? config.manifest);
  const manifestDir = path.dirname(manifestPath);

  const files = await globFiles(config.sources, { cwd: projectRoot, ignore: config.exclude, absolute: true });
  log.debug(`found ${files.length} command source file(s)`, { files });

  const extractor = new FunctionExtractor();
  const failures: BuildFailure[] = [];
  const entries: CommandEntry[] = [];
  const definedIn = new Map<string, string>();

  try {
    for (const file of files) {
      let functions: ExtractedFunction[];
      try {
        functions = extractor.extractFromSource(file, await readFile(file));
      } catch (error) {
        failures.push(toFailure(file, undefined, error));
        continue;
      }

      for (const fn of functions) {
        const previous = definedIn.get(fn.name);
        if (previous !== undefined) {
          failures.push(
            toFailure(
              file,
              fn.name,
              new SpecificationError(
                ErrorCodes.DUPLICATE_COMMAND,
                `${fn.name}: also defined in ${relativePosixPath(projectRoot, previous)}`,
                { function: fn.name, files: [previous, file] }
              )
            )
          );
          continue;
        }
        definedIn.set(fn.name, file);

        try {
          const spec = buildSpec(fn, { registry });
          const modulePath = emittedModulePath(projectRoot, file, config.emit);
          entries.push({ module: relativePosixPath(manifestDir, modulePath), exportName: fn.name, spec });
          log.debug(`built ${spec.commandPath.join(' ')}`);
        } catch (error) {
          failures.push(toFailure(file, fn.name, error));
        }
      }
    }
  } finally {
    extractor.dispose();
  }

  if (failures.length > 0) {
    return { ok: false, files, failures };
  }

  const builder = CommandTree.builder();
  for (const entry of entries) {
    try {
      builder.insert(entry.spec.commandPath, entry.spec);
    } catch (error) {
      failures.push(toFailure(path.resolve(manifestDir, entry.module), entry.spec.name, error));
    }
  }
  if (failures.length > 0) {
    return { ok: false, files, failures };
  }

  const tree = builder.build();
  let manifest: Manifest;
  try {
    manifest = createManifest(options.program, tree, entries, registry);
  } catch (error) {
    return { ok: false, files, failures: [toFailure(manifestPath, undefined, error)] };
  }
  return { ok: true, files, tree, entries, manifest, manifestPath };
}

/**
 * Write a successful build's manifest.
 */
export async function writeBuildManifest(outcome: Extract<BuildOutcome, { ok: true }>): Promise<void> {
  await writeFile(outcome.manifestPath, stringifyManifest(outcome.manifest));
}
