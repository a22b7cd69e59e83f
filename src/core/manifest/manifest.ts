/**
 * Build manifest: the serialised command tree a generated command line is
 * dispatched from.
 */
import * as path from 'node:path';
import { ConfigError, ErrorCodes, SystemError, describeError } from '../../utils/errors.js';
import { readFile, writeFile } from '../../utils/file-system.js';
import { formatZodError } from '../../utils/yaml.js';
import type { FunctionSpec, ParamSpec } from '../spec/types.js';
import { CommandTree } from '../tree/command-tree.js';
import { TypeRegistry } from '../types/registry.js';
import {
  ManifestSchema,
  MANIFEST_FORMAT,
  type Manifest,
  type ProgramInfo,
  type StoredParam,
  type StoredSpec,
} from './schema.js';

export interface CommandEntry {
  /** Module path relative to the manifest's directory. */
  readonly module: string;
  readonly exportName: string;
  readonly spec: FunctionSpec;
}

export interface LoadedManifest {
  readonly program: ProgramInfo;
  readonly tree: CommandTree;
  /** Entries keyed by function name. */
  readonly entries: ReadonlyMap<string, CommandEntry>;
  /** Directory module paths are resolved against. */
  readonly baseDir: string;
}

function serializeParam(param: ParamSpec, registry: TypeRegistry): StoredParam {
  const { hasDefault, defaultValue, ...rest } = param;
  if (!hasDefault) {
    return rest;
  }
  const type = defaultValue === null ? 'none' : param.type;
  return { ...rest, default: { type, line: registry.toLine(type, defaultValue) } };
}

function deserializeParam(stored: StoredParam, registry: TypeRegistry): ParamSpec {
  const { default: storedDefault, ...rest } = stored;
  return Object.freeze({
    ...rest,
    hasDefault: storedDefault !== undefined,
    defaultValue: storedDefault ? registry.fromLine(storedDefault.type, storedDefault.line) : null,
  });
}

export function serializeSpec(spec: FunctionSpec, registry: TypeRegistry = new TypeRegistry()): StoredSpec {
  return {
    ...spec,
    commandPath: [...spec.commandPath],
    params: spec.params.map((param) => serializeParam(param, registry)),
    ioChannels: {
      ...(spec.ioChannels.input ? { input: { ...spec.ioChannels.input, params: [...spec.ioChannels.input.params] } } : {}),
      ...(spec.ioChannels.output ? { output: { ...spec.ioChannels.output, params: [...spec.ioChannels.output.params] } } : {}),
    },
  };
}

export function deserializeSpec(stored: StoredSpec, registry: TypeRegistry = new TypeRegistry()): FunctionSpec {
  return Object.freeze({
    ...stored,
    commandPath: Object.freeze([...stored.commandPath]),
    params: Object.freeze(stored.params.map((param) => deserializeParam(param, registry))),
    ioChannels: Object.freeze({ ...stored.ioChannels }),
  });
}

/**
 * Assemble a manifest with commands in walk order.
 */
export function createManifest(
  program: ProgramInfo,
  tree: CommandTree,
  entries: readonly CommandEntry[],
  registry: TypeRegistry = new TypeRegistry()
): Manifest {
  const byName = new Map(entries.map((entry) => [entry.spec.name, entry] as const));
  const commands = tree.leaves().map((spec) => {
    const entry = byName.get(spec.name);
    if (!entry) {
      throw new Error(`no module recorded for command ${spec.name}`);
    }
    return { module: entry.module, exportName: entry.exportName, spec: serializeSpec(spec, registry) };
  });
  return { format: MANIFEST_FORMAT, program, commands };
}

export function stringifyManifest(manifest: Manifest): string {
  return `${JSON.stringify(manifest, null, 2)}\n`;
}

/**
 * Validate manifest text and rebuild its command tree.
 *
 * @throws ConfigError when the text is not a valid manifest.
 */
export function parseManifest(
  text: string,
  options: { baseDir: string; registry?: TypeRegistry }
): LoadedManifest {
  const registry = options.registry ?? new TypeRegistry();
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (error) {
    throw new ConfigError(ErrorCodes.INVALID_MANIFEST, `manifest is not valid JSON: ${describeError(error)}`);
  }

  const result = ManifestSchema.safeParse(raw);
  if (!result.success) {
    throw new ConfigError(ErrorCodes.INVALID_MANIFEST, `invalid manifest: ${formatZodError(result.error)}`, {
      issues: result.error.issues,
    });
  }

  const builder = CommandTree.builder();
  const entries = new Map<string, CommandEntry>();
  for (const command of result.data.commands) {
    const spec = deserializeSpec(command.spec, registry);
    builder.insert(spec.commandPath, spec);
    entries.set(spec.name, Object.freeze({ module: command.module, exportName: command.exportName, spec }));
  }

  return Object.freeze({
    program: result.data.program,
    tree: builder.build(),
    entries,
    baseDir: options.baseDir,
  });
}

export async function loadManifest(manifestPath: string, registry?: TypeRegistry): Promise<LoadedManifest> {
  let text: string;
  try {
    text = await readFile(manifestPath);
  } catch (error) {
    throw new SystemError(ErrorCodes.FILE_ERROR, `cannot read manifest ${manifestPath}: ${describeError(error)}`, {
      path: manifestPath,
    });
  }
  return parseManifest(text, { baseDir: path.dirname(path.resolve(manifestPath)), ...(registry ? { registry } : {}) });
}

export async function writeManifest(manifestPath: string, manifest: Manifest): Promise<void> {
  await writeFile(manifestPath, stringifyManifest(manifest));
}
