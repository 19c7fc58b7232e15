import { promises as fs } from 'node:fs';
import path from 'node:path';

import { at } from './errors.js';
import { parseTemplate } from './template-renderer.js';
import { walkTree } from './tree-walker.js';
import { createDirectory, readTextFile } from '../utils/fs.js';
import { isTemplatePath, stripTemplateExtension } from '../utils/path.js';

import type { Env } from './environment.js';
import type { Result } from './error-collection.js';
import type { DotlinkConfig } from '../types/config.js';
import type { CLIContext } from '../utils/context.js';

export interface BuildSummary {
  // Relative paths in the build tree
  rendered: string[];
  copied: string[];
}

function emptySummary(): BuildSummary {
  return { rendered: [], copied: [] };
}

function combineSummaries(acc: BuildSummary, next: BuildSummary): BuildSummary {
  acc.rendered.push(...next.rendered);
  acc.copied.push(...next.copied);
  return acc;
}

/**
 * Render one template into the build tree. Read, parse and render failures
 * are located at the template; write and chmod failures at the output.
 */
async function renderFile(
  ctx: Pick<CLIContext, 'logger'>,
  templatePath: string,
  outputPath: string,
  env: Env,
): Promise<void> {
  ctx.logger.debug(`rendering ${templatePath}`);
  const source = await at(templatePath, () => readTextFile(templatePath));
  const { mode } = await at(templatePath, () => fs.stat(templatePath));
  const template = await at(templatePath, () => parseTemplate(source));
  const rendered = await at(templatePath, () => template.render(env));

  await at(outputPath, () => fs.writeFile(outputPath, rendered));
  await at(outputPath, () => fs.chmod(outputPath, mode & 0o7777));
}

/**
 * Materialize the template tree into the build tree: `.hbs` files are
 * rendered with the binding set (suffix dropped), everything else is copied
 * byte for byte. Existing build directories and files are reused.
 */
export async function buildTree(
  ctx: Pick<CLIContext, 'logger'>,
  config: Pick<DotlinkConfig, 'templateDir' | 'buildDir'>,
  env: Env,
): Promise<Result<BuildSummary>> {
  const { templateDir, buildDir } = config;

  return walkTree<BuildSummary>({
    sourceRoot: templateDir,
    logger: ctx.logger,
    empty: emptySummary,
    combine: combineSummaries,
    prepareDirectory: async (relative) => {
      const dir = path.join(buildDir, relative);
      await at(dir, () => createDirectory(dir));
    },
    visitFile: async (relative) => {
      const templatePath = path.join(templateDir, relative);

      if (isTemplatePath(relative)) {
        const outRelative = stripTemplateExtension(relative);
        await renderFile(ctx, templatePath, path.join(buildDir, outRelative), env);
        return { rendered: [outRelative], copied: [] };
      }

      const outputPath = path.join(buildDir, relative);
      ctx.logger.debug(`copying ${templatePath} -> ${outputPath}`);
      await at(templatePath, () => fs.copyFile(templatePath, outputPath));
      return { rendered: [], copied: [relative] };
    },
  });
}
