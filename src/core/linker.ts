import path from 'node:path';

import { at } from './errors.js';
import { walkTree } from './tree-walker.js';
import { createDirectory, createSymlink, removeIfExists } from '../utils/fs.js';
import { resolveLinkTarget } from '../utils/path.js';

import type { Result } from './error-collection.js';
import type { DotlinkConfig } from '../types/config.js';
import type { CLIContext } from '../utils/context.js';

/**
 * Mirror the build tree's directories under the link tree and point one
 * symlink at every build file. Whatever file or link already sits at a link
 * path is replaced. Resolves to the relative paths that were linked.
 */
export async function linkTree(
  ctx: Pick<CLIContext, 'logger'>,
  config: Pick<DotlinkConfig, 'buildDir' | 'linkDir'>,
): Promise<Result<string[]>> {
  const { buildDir, linkDir } = config;

  return walkTree<string[]>({
    sourceRoot: buildDir,
    logger: ctx.logger,
    empty: () => [],
    combine: (acc, next) => {
      acc.push(...next);
      return acc;
    },
    prepareDirectory: async (relative) => {
      const dir = path.join(linkDir, relative);
      await at(dir, () => createDirectory(dir));
    },
    visitFile: async (relative) => {
      const buildPath = path.join(buildDir, relative);
      const linkPath = path.join(linkDir, relative);

      if (await at(linkPath, () => removeIfExists(linkPath))) {
        ctx.logger.debug(`removed existing file ${linkPath}`);
      }

      const target = resolveLinkTarget(linkPath, buildPath);
      ctx.logger.debug(`linking ${linkPath} -> ${target}`);
      await at(linkPath, () => createSymlink(target, linkPath));
      return [relative];
    },
  });
}
