export enum ErrorCode {
  IO_ERROR = 'IO_ERROR',
  TEMPLATE_PARSE_ERROR = 'TEMPLATE_PARSE_ERROR',
  TEMPLATE_RENDER_ERROR = 'TEMPLATE_RENDER_ERROR',
  CONFIG_INVALID = 'CONFIG_INVALID',
  UNSUPPORTED_VARIABLE_TYPE = 'UNSUPPORTED_VARIABLE_TYPE',
  INVALID_ARGUMENT = 'INVALID_ARGUMENT',
  NOT_IMPLEMENTED = 'NOT_IMPLEMENTED',
  RUN_FAILED = 'RUN_FAILED',
  UNKNOWN_ERROR = 'UNKNOWN_ERROR',
}

const EXIT_CODES: Record<ErrorCode, number> = {
  [ErrorCode.IO_ERROR]: 1,
  [ErrorCode.TEMPLATE_PARSE_ERROR]: 1,
  [ErrorCode.TEMPLATE_RENDER_ERROR]: 1,
  [ErrorCode.CONFIG_INVALID]: 2,
  [ErrorCode.UNSUPPORTED_VARIABLE_TYPE]: 2,
  [ErrorCode.INVALID_ARGUMENT]: 2,
  [ErrorCode.NOT_IMPLEMENTED]: 1,
  [ErrorCode.RUN_FAILED]: 1,
  [ErrorCode.UNKNOWN_ERROR]: 1,
};

const PREFIXES: Record<ErrorCode, string> = {
  [ErrorCode.IO_ERROR]: 'IO Error',
  [ErrorCode.TEMPLATE_PARSE_ERROR]: 'Failed to parse template file',
  [ErrorCode.TEMPLATE_RENDER_ERROR]: 'Failed to render template file',
  [ErrorCode.CONFIG_INVALID]: 'Invalid configuration',
  [ErrorCode.UNSUPPORTED_VARIABLE_TYPE]: 'Unsupported variable type',
  [ErrorCode.INVALID_ARGUMENT]: 'Invalid argument',
  [ErrorCode.NOT_IMPLEMENTED]: 'Not implemented',
  [ErrorCode.RUN_FAILED]: 'Run failed',
  [ErrorCode.UNKNOWN_ERROR]: 'Error',
};

export class DotlinkError extends Error {
  constructor(
    public readonly code: ErrorCode,
    message: string,
    public readonly details?: Record<string, unknown>,
  ) {
    super(message);
    this.name = 'DotlinkError';
  }

  toUserMessage(): string {
    return `${PREFIXES[this.code]}: ${this.message}`;
  }

  getExitCode(): number {
    return EXIT_CODES[this.code];
  }
}

/**
 * A failure tagged with the filesystem path it concerns.
 */
export class LocatedError extends Error {
  constructor(
    public readonly location: string,
    public readonly error: DotlinkError,
  ) {
    super(`${location}: ${error.message}`);
    this.name = 'LocatedError';
  }
}

function errnoOf(error: unknown): string | undefined {
  if (error && typeof error === 'object' && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

export function isErrno(error: unknown, code: string): boolean {
  return errnoOf(error) === code;
}

/**
 * Wrap any thrown value into a LocatedError. An already located error is
 * returned as-is, a DotlinkError keeps its own code, anything else gets `code`.
 */
export function locate(
  error: unknown,
  location: string,
  code: ErrorCode = ErrorCode.IO_ERROR,
): LocatedError {
  if (error instanceof LocatedError) return error;
  if (error instanceof DotlinkError) return new LocatedError(location, error);
  const message = error instanceof Error ? error.message : String(error);
  const errno = errnoOf(error);
  const details = errno ? { errno } : undefined;
  return new LocatedError(location, new DotlinkError(code, message, details));
}

/**
 * Await `op`, relabelling any failure with `location`.
 */
export async function at<T>(
  location: string,
  op: () => Promise<T> | T,
  code: ErrorCode = ErrorCode.IO_ERROR,
): Promise<T> {
  try {
    return await op();
  } catch (error) {
    throw locate(error, location, code);
  }
}
