/**
 * Tests for command file helpers
 */

import { promises as fs } from 'node:fs';
import { join } from 'node:path';
import tmp from 'tmp';

import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import { checkReadableFile, InputNotFoundError, writeFileAtomically } from '../file-utils.js';

describe('file-utils', () => {
  let testDir: string;

  beforeEach(() => {
    // Use a securely created temporary directory for tests
    testDir = tmp.dirSync({ unsafeCleanup: true }).name;
  });

  afterEach(async () => {
    await fs.rm(testDir, { recursive: true, force: true });
  });

  describe('checkReadableFile', () => {
    it('accepts an existing file', async () => {
      const path = join(testDir, 'events.csv');
      await fs.writeFile(path, 'type,client,tx,amount\n', 'utf8');

      expect((await checkReadableFile(path)).isOk()).toBe(true);
    });

    it('reports a missing file as InputNotFoundError', async () => {
      const path = join(testDir, 'missing.csv');

      const error = (await checkReadableFile(path))._unsafeUnwrapErr();
      expect(error).toBeInstanceOf(InputNotFoundError);
      expect(error.message).toBe(`Input file not found: ${path}`);
    });

    it('rejects a directory', async () => {
      const error = (await checkReadableFile(testDir))._unsafeUnwrapErr();

      expect(error).not.toBeInstanceOf(InputNotFoundError);
      expect(error.message).toBe(`Input path is not a file: ${testDir}`);
    });
  });

  describe('writeFileAtomically', () => {
    it('writes the file and leaves no temp file behind', async () => {
      const path = join(testDir, 'accounts.csv');

      const result = await writeFileAtomically(path, 'client,available,held,total,locked\n');
      expect(result._unsafeUnwrap()).toBe(path);

      expect(await fs.readFile(path, 'utf8')).toBe('client,available,held,total,locked\n');
      expect(await fs.readdir(testDir)).toEqual(['accounts.csv']);
    });

    it('creates parent directories if needed', async () => {
      const nestedPath = join(testDir, 'nested', 'deep', 'accounts.csv');

      const result = await writeFileAtomically(nestedPath, '');
      expect(result.isOk()).toBe(true);

      expect(await fs.readFile(nestedPath, 'utf8')).toBe('');
    });

    it('overwrites an existing file', async () => {
      const path = join(testDir, 'accounts.csv');
      await fs.writeFile(path, 'old', 'utf8');

      await writeFileAtomically(path, 'new');

      expect(await fs.readFile(path, 'utf8')).toBe('new');
    });

    it('fails when the target is a directory', async () => {
      const target = join(testDir, 'taken');
      await fs.mkdir(target);

      const result = await writeFileAtomically(target, 'data');

      expect(result.isErr()).toBe(true);
      expect(await fs.readdir(testDir)).toEqual(['taken']);
    });
  });
});
