import {
  configFromProgram,
  runAction,
  type CommandDeps,
  type ContextFactory,
  type GlobalOptions,
} from './shared.js';
import { RunFailure } from '../core/error-collection.js';
import { printVariables } from '../core/peeker.js';

import type { Command } from 'commander';

export function registerPrintCommand(
  program: Command,
  createCtx: ContextFactory,
  deps: CommandDeps = {},
): void {
  program
    .command('print')
    .description('Print every variable the templates use, one per line')
    .action(async () => {
      const opts = program.opts<GlobalOptions>();
      const ctx = createCtx({ verbosity: opts.verbose });

      await runAction(ctx, async () => {
        const config = await configFromProgram(program, []);
        ctx.logger.info('scanning tree');
        const result = await printVariables(ctx, config, deps.write);
        if (!result.ok) throw new RunFailure(result.errors);
      });
    });
}
