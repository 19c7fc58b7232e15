import path from 'node:path';

import { ok, type Result } from './error-collection.js';
import { at } from './errors.js';
import { parseTemplate } from './template-renderer.js';
import { walkTree } from './tree-walker.js';
import { readTextFile } from '../utils/fs.js';
import { isTemplatePath } from '../utils/path.js';

import type { DotlinkConfig } from '../types/config.js';
import type { CLIContext } from '../utils/context.js';

function sortUnique(names: string[]): string[] {
  return [...new Set(names)].sort();
}

/**
 * Statically list every variable the template tree's `.hbs` files read.
 * Nothing is rendered and nothing is written. The result is sorted and
 * deduplicated once, across the whole tree.
 */
export async function collectVariables(
  ctx: Pick<CLIContext, 'logger'>,
  config: Pick<DotlinkConfig, 'templateDir'>,
): Promise<Result<string[]>> {
  const { templateDir } = config;

  const result = await walkTree<string[]>({
    sourceRoot: templateDir,
    logger: ctx.logger,
    empty: () => [],
    combine: (acc, next) => {
      acc.push(...next);
      return acc;
    },
    visitFile: async (relative) => {
      if (!isTemplatePath(relative)) return [];
      const templatePath = path.join(templateDir, relative);
      ctx.logger.debug(`reading ${templatePath}`);
      const source = await at(templatePath, () => readTextFile(templatePath));
      const template = await at(templatePath, () => parseTemplate(source));
      return template.listVariables();
    },
  });

  return result.ok ? ok(sortUnique(result.value)) : result;
}

/**
 * Iterate over the template tree and print every variable used, one per line.
 */
export async function printVariables(
  ctx: Pick<CLIContext, 'logger'>,
  config: Pick<DotlinkConfig, 'templateDir'>,
  write: (line: string) => void = (line) => process.stdout.write(`${line}\n`),
): Promise<Result<string[]>> {
  const result = await collectVariables(ctx, config);
  if (result.ok) {
    for (const name of result.value) write(name);
  }
  return result;
}
