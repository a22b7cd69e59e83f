import * as path from 'node:path';
import { z } from 'zod';
import { ConfigSchema, type Config } from './schema.js';
import type { ProgramInfo } from '../manifest/schema.js';
import { fileExists, loadYamlWithSchema, readFile } from '../../utils/index.js';
import { ConfigError, ErrorCodes, describeError } from '../../utils/errors.js';

export const DEFAULT_CONFIG_PATH = 'fncli.config.yaml';

const PackageJsonSchema = z.object({
  name: z.string().optional(),
  version: z.string().optional(),
  description: z.string().optional(),
});

/**
 * Default configuration values.
 * Used when no config file exists.
 */
export function getDefaultConfig(): Config {
  return ConfigSchema.parse({});
}

/**
 * Load configuration from a file.
 * Falls back to defaults if the default config file doesn't exist; an
 * explicitly named file must exist.
 */
export async function loadConfig(projectRoot: string, configPath?: string): Promise<Config> {
  const fullPath = path.resolve(projectRoot, configPath ?? DEFAULT_CONFIG_PATH);

  if (!(await fileExists(fullPath))) {
    if (configPath !== undefined) {
      throw new ConfigError(ErrorCodes.CONFIG_LOAD_ERROR, `Config file not found: ${fullPath}`, { path: fullPath });
    }
    return getDefaultConfig();
  }

  try {
    return await loadYamlWithSchema(fullPath, ConfigSchema);
  } catch (error) {
    throw new ConfigError(
      ErrorCodes.CONFIG_LOAD_ERROR,
      `Failed to load config from ${fullPath}: ${describeError(error)}`,
      { path: fullPath }
    );
  }
}

/**
 * Program name, version and description for the manifest: the config's
 * `program` section, then the project's package.json, then the project
 * directory name.
 */
export async function resolveProgramInfo(projectRoot: string, config: Config): Promise<ProgramInfo> {
  const packageJsonPath = path.join(projectRoot, 'package.json');
  let pkg: z.output<typeof PackageJsonSchema> = {};

  if (await fileExists(packageJsonPath)) {
    let raw: unknown;
    try {
      raw = JSON.parse(await readFile(packageJsonPath));
    } catch (error) {
      throw new ConfigError(ErrorCodes.CONFIG_LOAD_ERROR, `Failed to read ${packageJsonPath}: ${describeError(error)}`, {
        path: packageJsonPath,
      });
    }
    const parsed = PackageJsonSchema.safeParse(raw);
    if (parsed.success) {
      pkg = parsed.data;
    }
  }

  const name = config.program.name ?? pkg.name?.replace(/^@[^/]+\//, '') ?? path.basename(path.resolve(projectRoot));
  const description = config.program.description ?? pkg.description;
  return {
    name,
    version: config.program.version ?? pkg.version ?? '0.0.0',
    ...(description !== undefined ? { description } : {}),
  };
}
