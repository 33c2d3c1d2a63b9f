import { promises as fs } from 'fs';
import type { FileHandle } from 'fs/promises';
import * as path from 'path';
import { randomUUID } from 'crypto';

import logger from '../logger.js';
import { PersistenceError, errorMessage } from './errors.js';

/**
 * Replace `filePath` with `contents` so that a crash leaves either the old or
 * the new file, never a torn one: write a sibling temp file, fsync it, then
 * rename over the target and fsync the directory.
 */
export async function writeFileAtomic(filePath: string, contents: string): Promise<void> {
  const dir = path.dirname(filePath);
  const tempPath = path.join(dir, `.${path.basename(filePath)}.${process.pid}.${randomUUID()}.tmp`);
  try {
    await fs.mkdir(dir, { recursive: true });
    const handle = await fs.open(tempPath, 'w');
    try {
      await handle.writeFile(contents, 'utf8');
      await handle.sync();
    } finally {
      await handle.close();
    }
    await fs.rename(tempPath, filePath);
    await syncDirectory(dir);
  } catch (err: unknown) {
    await fs.rm(tempPath, { force: true }).catch((rmErr: unknown) => {
      logger.warn({ path: tempPath, error: errorMessage(rmErr) }, '[atomic-write] failed to remove temp file');
    });
    throw new PersistenceError(`Failed to write ${filePath}: ${errorMessage(err)}`, { path: filePath, cause: err });
  }
}

export async function writeJsonAtomic(filePath: string, value: unknown): Promise<void> {
  await writeFileAtomic(filePath, `${JSON.stringify(value, null, 2)}\n`);
}

/** Parsed JSON, or null when the file does not exist. */
export async function readJsonFile(filePath: string): Promise<unknown> {
  let raw: string;
  try {
    raw = await fs.readFile(filePath, 'utf8');
  } catch (err: unknown) {
    if (isNotFoundError(err)) return null;
    throw new PersistenceError(`Failed to read ${filePath}: ${errorMessage(err)}`, { path: filePath, cause: err });
  }
  try {
    return JSON.parse(raw);
  } catch (err: unknown) {
    throw new PersistenceError(`Corrupt JSON in ${filePath}: ${errorMessage(err)}`, { path: filePath, cause: err });
  }
}

export function isNotFoundError(err: unknown): boolean {
  return typeof err === 'object' && err !== null && 'code' in err && err.code === 'ENOENT';
}

async function syncDirectory(dir: string): Promise<void> {
  // Directory fsync is unsupported on some platforms (EISDIR/EPERM on Windows).
  let handle: FileHandle | null = null;
  try {
    handle = await fs.open(dir, 'r');
    await handle.sync();
  } catch (err: unknown) {
    const code = typeof err === 'object' && err !== null && 'code' in err ? err.code : undefined;
    if (code !== 'EISDIR' && code !== 'EPERM' && code !== 'EINVAL') throw err;
  } finally {
    await handle?.close();
  }
}
