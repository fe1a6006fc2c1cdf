/**
 * File helpers for command input and output.
 */

import { promises as fs } from 'node:fs';
import { dirname } from 'node:path';

import { toError } from '@txledger/core';
import { err, ok, type Result } from 'neverthrow';

/**
 * Input file that does not exist; reported with its own exit code
 */
export class InputNotFoundError extends Error {
  constructor(public readonly path: string) {
    super(`Input file not found: ${path}`);
    this.name = 'InputNotFoundError';
  }
}

/**
 * Check that a path names a readable regular file.
 */
export async function checkReadableFile(path: string): Promise<Result<void, Error>> {
  try {
    const stats = await fs.stat(path);
    if (!stats.isFile()) {
      return err(new Error(`Input path is not a file: ${path}`));
    }
    await fs.access(path, fs.constants.R_OK);
    return ok(undefined);
  } catch (error) {
    if (isNodeError(error) && error.code === 'ENOENT') {
      return err(new InputNotFoundError(path));
    }
    return err(new Error(`Cannot read input file ${path}: ${toError(error).message}`));
  }
}

/**
 * Atomically write a file.
 * Writes to a temp file first, then renames it over the target.
 * The temp file is removed if the write fails.
 */
export async function writeFileAtomically(path: string, content: string): Promise<Result<string, Error>> {
  const tempPath = `${path}.tmp`;

  try {
    await fs.mkdir(dirname(path), { recursive: true });
    await fs.writeFile(tempPath, content, 'utf8');
    await fs.rename(tempPath, path);
    return ok(path);
  } catch (error) {
    await fs.unlink(tempPath).catch(() => {
      /* empty */
    });

    return err(toError(error));
  }
}

function isNodeError(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error;
}
