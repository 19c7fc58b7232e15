import { createLogger, levelFromVerbosity, type Logger } from './logger.js';

export interface CLIContext {
  logger: Logger;
}

export function createCLIContext(opts: { verbosity?: number } = {}): CLIContext {
  return { logger: createLogger({ level: levelFromVerbosity(opts.verbosity ?? 0) }) };
}
