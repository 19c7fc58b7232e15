import { RunFailure } from '../core/error-collection.js';
import { DotlinkError } from '../core/errors.js';
import { resolveConfig } from '../utils/config.js';

import type { DotlinkConfig } from '../types/config.js';
import type { CLIContext } from '../utils/context.js';
import type { HostProbe } from '../utils/host.js';
import type { Command } from 'commander';

export interface GlobalOptions {
  templateDir?: string;
  buildDir?: string;
  linkDir?: string;
  variables?: string;
  verbose: number;
}

export type ContextFactory = (opts: { verbosity?: number }) => CLIContext;

export interface CommandDeps {
  probe?: HostProbe;
  // Where `print` writes its result lines
  write?: (line: string) => void;
}

export async function configFromProgram(program: Command, flags: string[]): Promise<DotlinkConfig> {
  const opts = program.opts<GlobalOptions>();
  return await resolveConfig({
    templateDir: opts.templateDir,
    buildDir: opts.buildDir,
    linkDir: opts.linkDir,
    variables: opts.variables,
    flags,
  });
}

/**
 * Run a command body, turning failures into log output and an exit code.
 * Partial work already written to disk is left in place.
 */
export async function runAction(
  ctx: CLIContext,
  body: () => Promise<void>,
): Promise<void> {
  try {
    await body();
  } catch (error) {
    if (error instanceof RunFailure) {
      for (const line of error.errors.format().split('\n')) ctx.logger.error(line);
      process.exitCode = error.getExitCode();
    } else if (error instanceof DotlinkError) {
      ctx.logger.error(error.toUserMessage());
      process.exitCode = error.getExitCode();
    } else {
      ctx.logger.error(error instanceof Error ? error : String(error));
      process.exitCode = 1;
    }
  }
}
