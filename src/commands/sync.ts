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
import { linkTree } from '../core/linker.js';

import type { Command } from 'commander';

export function registerSyncCommand(
  program: Command,
  createCtx: ContextFactory,
  deps: CommandDeps = {},
): void {
  program
    .command('sync')
    .description('Build the template tree, then link the build tree into place')
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
        ctx.logger.info(
          `built ${built.value.rendered.length} rendered and ${built.value.copied.length} copied file(s)`,
        );

        ctx.logger.info('linking tree');
        const linked = await linkTree(ctx, config);
        if (!linked.ok) throw new RunFailure(linked.errors);
        ctx.logger.info(`linked ${linked.value.length} file(s) into ${config.linkDir}`);
      });
    });
}
