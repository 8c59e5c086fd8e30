/**
 * helm-values-lint - File System Utils Test
 */

import * as fs from 'node:fs/promises';
import { tmpdir } from 'node:os';
import * as path from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import {
  directoryExists,
  fileExists,
  findFilesByExtension,
  pathExists,
  readTextFile,
} from '@/utils/fileSystem';
import { ConfigurationError } from '@/errors';

const DEFAULT_IGNORE = ['**/node_modules/**', '**/.git/**'];

describe('FileSystem Utils', () => {
  let testDir: string;

  beforeEach(async () => {
    testDir = await fs.mkdtemp(path.join(tmpdir(), 'lint-fs-test-'));
  });

  afterEach(async () => {
    await fs.rm(testDir, { recursive: true, force: true });
  });

  describe('findFilesByExtension', () => {
    it('should find files with the given extensions', async () => {
      await fs.writeFile(path.join(testDir, 'test1.yaml'), 'content');
      await fs.writeFile(path.join(testDir, 'test2.yml'), 'content');
      await fs.writeFile(path.join(testDir, 'test3.txt'), 'content');

      const files = await findFilesByExtension(testDir, ['.yaml', '.yml'], DEFAULT_IGNORE);

      expect(files).toEqual([path.join(testDir, 'test1.yaml'), path.join(testDir, 'test2.yml')]);
    });

    it('should return files sorted by relative path', async () => {
      await fs.mkdir(path.join(testDir, 'templates'));
      await fs.writeFile(path.join(testDir, 'templates', 'service.yaml'), 'content');
      await fs.writeFile(path.join(testDir, 'templates', '_helpers.tpl'), 'content');
      await fs.writeFile(path.join(testDir, 'Chart.yaml'), 'content');

      const files = await findFilesByExtension(testDir, ['.yaml', '.tpl'], DEFAULT_IGNORE);

      expect(files.map(file => path.relative(testDir, file))).toEqual([
        'Chart.yaml',
        path.join('templates', '_helpers.tpl'),
        path.join('templates', 'service.yaml'),
      ]);
    });

    it('should ignore node_modules by default patterns', async () => {
      await fs.mkdir(path.join(testDir, 'node_modules'));
      await fs.writeFile(path.join(testDir, 'node_modules', 'test.yaml'), 'content');
      await fs.writeFile(path.join(testDir, 'test.yaml'), 'content');

      const files = await findFilesByExtension(testDir, ['.yaml'], DEFAULT_IGNORE);

      expect(files).toEqual([path.join(testDir, 'test.yaml')]);
    });

    it('should respect custom ignore patterns', async () => {
      await fs.mkdir(path.join(testDir, 'build'));
      await fs.writeFile(path.join(testDir, 'build', 'test.yaml'), 'content');
      await fs.writeFile(path.join(testDir, 'test.yaml'), 'content');

      const files = await findFilesByExtension(testDir, ['.yaml'], ['**/build/**']);

      expect(files).toEqual([path.join(testDir, 'test.yaml')]);
    });

    it('should match extensions case-insensitively', async () => {
      await fs.writeFile(path.join(testDir, 'UPPER.YAML'), 'content');

      const files = await findFilesByExtension(testDir, ['.yaml'], DEFAULT_IGNORE);

      expect(files).toEqual([path.join(testDir, 'UPPER.YAML')]);
    });

    it('should report a directory that cannot be listed as a configuration error', async () => {
      const file = path.join(testDir, 'not-a-dir.yaml');
      await fs.writeFile(file, 'content');

      const listing = findFilesByExtension(file, ['.yaml'], DEFAULT_IGNORE);

      await expect(listing).rejects.toBeInstanceOf(ConfigurationError);
      await expect(listing).rejects.toThrow(`Cannot list files under ${file}: `);
    });
  });

  describe('readTextFile', () => {
    it('should read UTF-8 content', async () => {
      const file = path.join(testDir, 'test.yaml');
      await fs.writeFile(file, 'name: ✓ ok', 'utf-8');

      expect(await readTextFile(file)).toBe('name: ✓ ok');
    });

    it('should reject invalid UTF-8', async () => {
      const file = path.join(testDir, 'bad.yaml');
      await fs.writeFile(file, Buffer.from([0xff, 0xfe, 0xfd]));

      await expect(readTextFile(file)).rejects.toThrow();
    });

    it('should reject a missing file', async () => {
      await expect(readTextFile(path.join(testDir, 'missing.yaml'))).rejects.toThrow();
    });
  });

  describe('existence checks', () => {
    it('should tell files and directories apart', async () => {
      const file = path.join(testDir, 'test.yaml');
      await fs.writeFile(file, 'content');

      expect(await fileExists(file)).toBe(true);
      expect(await fileExists(testDir)).toBe(false);
      expect(await directoryExists(testDir)).toBe(true);
      expect(await directoryExists(file)).toBe(false);
      expect(await pathExists(file)).toBe(true);
      expect(await pathExists(path.join(testDir, 'missing'))).toBe(false);
    });
  });
});
