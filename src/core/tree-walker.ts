import { promises as fs, type Stats } from 'node:fs';
import path from 'node:path';

import { ErrorCollection, fail, ok, type Result } from './error-collection.js';
import { locate } from './errors.js';

import type { Logger } from '../utils/logger.js';

/**
 * What a walk does at each node. Relative paths are shared by every tree
 * involved, so an action maps one relative path onto whichever roots it
 * reads and writes.
 */
export interface TreeVisitor<T> {
  /** Tree that is listed and recursed. */
  sourceRoot: string;
  logger: Logger;
  /**
   * Runs before a directory is listed, e.g. to create its mirror at the
   * destination. Throwing skips that directory's subtree only. Throw a
   * LocatedError naming the destination (see `at()`); any other error is
   * reported against the source directory.
   */
  prepareDirectory?: (relative: string) => Promise<void>;
  /** Per-file action. Throw a LocatedError to report a failure. */
  visitFile: (relative: string) => Promise<T>;
  empty: () => T;
  combine: (acc: T, next: T) => T;
}

type EntryKind = 'directory' | 'file' | 'other';

function kindOf(stat: Stats): EntryKind {
  if (stat.isDirectory()) return 'directory';
  if (stat.isFile()) return 'file';
  return 'other';
}

async function settle<T>(work: Promise<T>, location: string): Promise<Result<T>> {
  try {
    return ok(await work);
  } catch (error) {
    return fail(locate(error, location));
  }
}

/**
 * Walk `visitor.sourceRoot/relative`, running every subdirectory and every file
 * concurrently. A failure never stops sibling work; all failures of the
 * subtree come back together. Only a directory that cannot be prepared or
 * listed is cut short, and then only that directory.
 */
export async function walkTree<T>(visitor: TreeVisitor<T>, relative = ''): Promise<Result<T>> {
  const sourceDir = path.join(visitor.sourceRoot, relative);
  visitor.logger.info(`traversing ${sourceDir}`);

  if (visitor.prepareDirectory) {
    try {
      await visitor.prepareDirectory(relative);
    } catch (error) {
      return fail(locate(error, sourceDir));
    }
  }

  let names: string[];
  try {
    names = await fs.readdir(sourceDir);
  } catch (error) {
    return fail(locate(error, sourceDir));
  }

  const errors = new ErrorCollection();
  const entries = await Promise.all(
    names.map(async (name) => {
      const entryPath = path.join(sourceDir, name);
      const stat = await settle(fs.lstat(entryPath), entryPath);
      return { relative: path.join(relative, name), stat };
    }),
  );

  const dirTasks: Array<Promise<Result<T>>> = [];
  const fileTasks: Array<Promise<Result<T>>> = [];
  for (const entry of entries) {
    if (!entry.stat.ok) {
      errors.merge(entry.stat.errors);
      continue;
    }
    switch (kindOf(entry.stat.value)) {
      case 'directory': {
        dirTasks.push(walkTree(visitor, entry.relative));
        break;
      }
      case 'file': {
        const location = path.join(visitor.sourceRoot, entry.relative);
        fileTasks.push(settle(visitor.visitFile(entry.relative), location));
        break;
      }
      default: {
        visitor.logger.trace(`skipping ${entry.relative}: not a file or directory`);
      }
    }
  }

  const [dirs, files] = await Promise.all([Promise.all(dirTasks), Promise.all(fileTasks)]);

  let value = visitor.empty();
  for (const result of [...files, ...dirs]) {
    if (result.ok) value = visitor.combine(value, result.value);
    else errors.merge(result.errors);
  }

  return errors.isEmpty() ? ok(value) : fail(errors);
}
