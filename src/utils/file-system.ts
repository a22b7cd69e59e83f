/**
 * File system operations used by the build tool: reading sources, writing
 * the manifest, and globbing command modules.
 */
import * as fs from 'node:fs';
import * as path from 'node:path';
import fg from 'fast-glob';

/**
 * Read a file and return its contents as a string.
 */
export async function readFile(filePath: string): Promise<string> {
  return fs.promises.readFile(filePath, 'utf-8');
}

/**
 * Write content to a file, creating parent directories as needed.
 */
export async function writeFile(filePath: string, content: string): Promise<void> {
  await ensureDir(path.dirname(filePath));
  await fs.promises.writeFile(filePath, content, 'utf-8');
}

/**
 * Check if a file exists.
 */
export async function fileExists(filePath: string): Promise<boolean> {
  try {
    await fs.promises.access(filePath, fs.constants.F_OK);
    return true;
  } catch {
    return false;
  }
}

/**
 * Ensure a directory exists, creating it if necessary.
 */
export async function ensureDir(dirPath: string): Promise<void> {
  await fs.promises.mkdir(dirPath, { recursive: true });
}

/**
 * Find files matching glob patterns, sorted so that builds are stable.
 */
export async function globFiles(
  patterns: string | string[],
  options: {
    cwd?: string;
    ignore?: string[];
    absolute?: boolean;
  } = {}
): Promise<string[]> {
  const files = await fg(patterns, {
    cwd: options.cwd || process.cwd(),
    ignore: ['**/node_modules/**', '**/dist/**', ...(options.ignore ?? [])],
    absolute: options.absolute ?? true,
    onlyFiles: true,
  });
  return files.sort();
}

/**
 * Relative path from a directory to a file, always with forward slashes.
 */
export function relativePosixPath(fromDir: string, to: string): string {
  const relative = path.relative(fromDir, to).split(path.sep).join('/');
  return relative.startsWith('.') ? relative : `./${relative}`;
}
