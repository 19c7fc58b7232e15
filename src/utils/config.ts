import { promises as fs } from 'node:fs';
import os from 'node:os';
import path from 'node:path';

import { DotlinkError, ErrorCode } from '../core/errors.js';
import { DotlinkConfigSchema, type DotlinkConfig } from '../types/config.js';

const APP_DIRNAME = 'dotlink';
const TREE_DIRNAME = 'tree';
const VARIABLES_FILENAME = 'variables.toml';

export interface ConfigOverrides {
  templateDir?: string;
  buildDir?: string;
  linkDir?: string;
  variables?: string;
  flags?: string[];
}

type EnvLike = Record<string, string | undefined>;

function nonEmpty(value: string | undefined): string | undefined {
  return value && value.length > 0 ? value : undefined;
}

function homeDir(env: EnvLike): string {
  return nonEmpty(env.HOME) ?? os.homedir();
}

export function getConfigDir(env: EnvLike = process.env): string {
  const base = nonEmpty(env.XDG_CONFIG_HOME) ?? path.join(homeDir(env), '.config');
  return path.join(base, APP_DIRNAME);
}

export function getCacheDir(env: EnvLike = process.env): string {
  const base = nonEmpty(env.XDG_CACHE_HOME) ?? path.join(homeDir(env), '.cache');
  return path.join(base, APP_DIRNAME);
}

async function ensureDirExists(dir: string): Promise<void> {
  try {
    await fs.mkdir(dir, { recursive: true });
  } catch (error) {
    throw new DotlinkError(
      ErrorCode.CONFIG_INVALID,
      `cannot create ${dir}: ${error instanceof Error ? error.message : String(error)}`,
    );
  }
}

/**
 * Fill in the directories the command line left out:
 *
 * - template tree: `$DOTFILES_PATH`, else `<config>/dotlink/tree` (created)
 * - build tree: `<cache>/dotlink` (created)
 * - link tree: `$HOME`
 * - variables file: `<config>/dotlink/variables.toml`
 */
export async function resolveConfig(
  overrides: ConfigOverrides,
  env: EnvLike = process.env,
): Promise<DotlinkConfig> {
  let templateDir = nonEmpty(overrides.templateDir) ?? nonEmpty(env.DOTFILES_PATH);
  if (!templateDir) {
    templateDir = path.join(getConfigDir(env), TREE_DIRNAME);
    await ensureDirExists(templateDir);
  }

  let buildDir = nonEmpty(overrides.buildDir);
  if (!buildDir) {
    buildDir = getCacheDir(env);
    await ensureDirExists(buildDir);
  }

  const candidate = {
    templateDir,
    buildDir,
    linkDir: nonEmpty(overrides.linkDir) ?? homeDir(env),
    variablesPath:
      nonEmpty(overrides.variables) ?? path.join(getConfigDir(env), VARIABLES_FILENAME),
    flags: overrides.flags ?? [],
  };

  const parsed = DotlinkConfigSchema.safeParse(candidate);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new DotlinkError(ErrorCode.CONFIG_INVALID, issues);
  }
  return parsed.data;
}
