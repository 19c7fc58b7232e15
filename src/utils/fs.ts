import { promises as fs } from 'node:fs';
import { TextDecoder } from 'node:util';

import { DotlinkError, ErrorCode, isErrno } from '../core/errors.js';

const utf8 = new TextDecoder('utf-8', { fatal: true });

/**
 * Read a file as UTF-8 text. Bytes that do not decode are an IO_ERROR rather
 * than replacement characters.
 */
export async function readTextFile(file: string): Promise<string> {
  const bytes = await fs.readFile(file);
  try {
    return utf8.decode(bytes);
  } catch {
    throw new DotlinkError(ErrorCode.IO_ERROR, 'stream did not contain valid UTF-8', {
      errno: 'EILSEQ',
    });
  }
}

/**
 * Create one directory level. An existing entry counts as success.
 */
export async function createDirectory(dir: string): Promise<void> {
  try {
    await fs.mkdir(dir);
  } catch (error) {
    if (isErrno(error, 'EEXIST')) return;
    throw error;
  }
}

/**
 * Unlink a file or symlink. Returns whether something was removed; a missing
 * entry is not an error.
 */
export async function removeIfExists(target: string): Promise<boolean> {
  try {
    await fs.unlink(target);
    return true;
  } catch (error) {
    if (isErrno(error, 'ENOENT')) return false;
    throw error;
  }
}

export async function createSymlink(target: string, linkPath: string): Promise<void> {
  await fs.symlink(target, linkPath);
}
