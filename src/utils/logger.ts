export type LogLevel = 'error' | 'warn' | 'info' | 'debug' | 'trace';

const LEVEL_ORDER: Record<LogLevel, number> = {
  error: 0,
  warn: 1,
  info: 2,
  debug: 3,
  trace: 4,
};

export interface Logger {
  error(msg: string | Error): void;
  warn(msg: string): void;
  info(msg: string): void;
  debug(msg: string): void;
  trace(msg: string): void;
  isVerbose(): boolean;
  readonly level: LogLevel;
}

export interface LoggerOptions {
  level?: LogLevel;
  // Sinks default to the console; tests pass their own
  out?: (line: string) => void;
  err?: (line: string) => void;
}

/**
 * Map the number of repeated `-v` flags onto a level.
 */
export function levelFromVerbosity(verbosity: number): LogLevel {
  if (verbosity <= 0) return 'warn';
  if (verbosity === 1) return 'info';
  if (verbosity === 2) return 'debug';
  return 'trace';
}

export function createLogger(opts: LoggerOptions = {}): Logger {
  const level = opts.level ?? 'warn';
  const out = opts.out ?? ((line: string) => console.log(line));
  const err = opts.err ?? ((line: string) => console.error(line));
  const enabled = (l: LogLevel) => LEVEL_ORDER[l] <= LEVEL_ORDER[level];

  return {
    level,
    error(msg) {
      if (!enabled('error')) return;
      err(`error: ${msg instanceof Error ? msg.message : msg}`);
    },
    warn(msg) {
      if (enabled('warn')) err(`warn: ${msg}`);
    },
    info(msg) {
      if (enabled('info')) out(msg);
    },
    debug(msg) {
      if (enabled('debug')) err(`[debug] ${msg}`);
    },
    trace(msg) {
      if (enabled('trace')) err(`[trace] ${msg}`);
    },
    isVerbose() {
      return enabled('debug');
    },
  };
}
