import {
  configFromProgram,
  runAction,
  type CommandDeps,
  type ContextFactory,
  type GlobalOptions,
} from './shared.js';
import { buildTree } from '../core/builder.js';
import { buildEnvironment } from '../core/environment.js';
import { RunFailure } from '../core/error-collection.js';
import { DotlinkError, ErrorCode } from '../core/errors.js';

import type { Command } from 'commander';

export function registerDiffCommand(
  program: Command,
  createCtx: ContextFactory,
  deps: CommandDeps = {},
): void {
  program
    .command('diff')
    .description('Build the template tree and compare it with the linked tree (not implemented)')
    .argument('[flags...]', 'Names bound to true while rendering')
    .action(async (flags: string[]) => {
      const opts = program.opts<GlobalOptions>();
      const ctx = createCtx({ verbosity: opts.verbose });

      await runAction(ctx, async () => {
        const config = await configFromProgram(program, flags);

        const env = await buildEnvironment(config, { logger: ctx.logger, probe: deps.probe });
        if (!env.ok) throw new RunFailure(env.errors);

        ctx.logger.info('building tree');
        const built = await buildTree(ctx, config, env.value);
        if (!built.ok) throw new RunFailure(built.errors);

        ctx.logger.info('checking differences between current state and dotfiles');
        throw new DotlinkError(
          ErrorCode.NOT_IMPLEMENTED,
          'comparing the build tree with the link tree is not supported yet',
        );
      });
    });
}
