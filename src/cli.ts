import { Command } from 'commander';

import { registerDiffCommand } from './commands/diff.js';
import { registerPrintCommand } from './commands/print.js';
import { registerSyncCommand } from './commands/sync.js';
import { createCLIContext } from './utils/context.js';

import type { CommandDeps, ContextFactory } from './commands/shared.js';

export const CLI_VERSION = '0.1.0';

function increaseVerbosity(_value: string, previous: number): number {
  return previous + 1;
}

export function buildProgram(
  createCtx: ContextFactory = createCLIContext,
  deps: CommandDeps = {},
): Command {
  const program = new Command();

  program
    .name('dotlink')
    .description('Render a dotfiles template tree and link it into place')
    .version(CLI_VERSION)
    .option('-t, --template-dir <dir>', 'Template tree (default: $DOTFILES_PATH or config dir)')
    .option('-b, --build-dir <dir>', 'Build tree (default: cache dir)')
    .option('-l, --link-dir <dir>', 'Link tree (default: $HOME)')
    .option('--variables <file>', 'Variables file (default: <config>/dotlink/variables.toml)')
    .option('-v, --verbose', 'Increase log verbosity (repeatable)', increaseVerbosity, 0);

  registerSyncCommand(program, createCtx, deps);
  registerDiffCommand(program, createCtx, deps);
  registerPrintCommand(program, createCtx, deps);

  program.showHelpAfterError();
  program.showSuggestionAfterError();

  return program;
}

export async function main(argv: string[]): Promise<void> {
  await buildProgram().parseAsync(argv);
}
