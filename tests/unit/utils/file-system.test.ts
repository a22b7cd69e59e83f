/**
 * Tests for file system utilities.
 */
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'node:fs/promises';
import * as os from 'node:os';
import * as path from 'node:path';
import {
  ensureDir,
  fileExists,
  globFiles,
  readFile,
  relativePosixPath,
  writeFile,
} from '../../../src/utils/file-system.js';

describe('file-system utilities', () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'fncli-fs-'));
  });

  afterEach(async () => {
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  describe('readFile and writeFile', () => {
    it('should create parent directories when writing', async () => {
      const filePath = path.join(tempDir, 'a', 'b', 'file.txt');
      await writeFile(filePath, 'content');

      expect(await readFile(filePath)).toBe('content');
    });

    it('should reject a missing file', async () => {
      await expect(readFile(path.join(tempDir, 'missing.txt'))).rejects.toThrow();
    });
  });

  describe('fileExists', () => {
    it('should report whether a path exists', async () => {
      await fs.writeFile(path.join(tempDir, 'present.txt'), '');

      expect(await fileExists(path.join(tempDir, 'present.txt'))).toBe(true);
      expect(await fileExists(path.join(tempDir, 'absent.txt'))).toBe(false);
    });
  });

  describe('ensureDir', () => {
    it('should accept an existing directory', async () => {
      await ensureDir(tempDir);
      await ensureDir(path.join(tempDir, 'nested'));

      expect((await fs.stat(path.join(tempDir, 'nested'))).isDirectory()).toBe(true);
    });
  });

  describe('globFiles', () => {
    it('should return sorted absolute paths and skip ignored files', async () => {
      await writeFile(path.join(tempDir, 'src', 'b.ts'), '');
      await writeFile(path.join(tempDir, 'src', 'a.ts'), '');
      await writeFile(path.join(tempDir, 'src', 'a.test.ts'), '');
      await writeFile(path.join(tempDir, 'node_modules', 'pkg', 'index.ts'), '');

      const files = await globFiles('**/*.ts', { cwd: tempDir, ignore: ['**/*.test.ts'] });

      expect(files).toEqual([path.join(tempDir, 'src', 'a.ts'), path.join(tempDir, 'src', 'b.ts')]);
    });
  });

  describe('relativePosixPath', () => {
    it('should start paths inside the directory with ./', () => {
      expect(relativePosixPath('/project', '/project/src/commands/a.ts')).toBe('./src/commands/a.ts');
    });

    it('should keep paths that leave the directory', () => {
      expect(relativePosixPath('/project/build', '/project/src/a.ts')).toBe('../src/a.ts');
    });
  });
});
