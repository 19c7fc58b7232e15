import { DotlinkError, ErrorCode, type LocatedError } from './errors.js';

/**
 * Append-only list of located failures.
 *
 * Each concurrent branch of a walk owns its own collection; branches are
 * merged only at the join point of their parent directory, so no locking is
 * involved. Order is completion order, not sorted.
 */
export class ErrorCollection implements Iterable<LocatedError> {
  private readonly errors: LocatedError[] = [];

  constructor(errors: Iterable<LocatedError> = []) {
    for (const error of errors) this.errors.push(error);
  }

  static of(error: LocatedError): ErrorCollection {
    return new ErrorCollection([error]);
  }

  push(error: LocatedError): this {
    this.errors.push(error);
    return this;
  }

  merge(other: ErrorCollection): this {
    for (const error of other.errors) this.errors.push(error);
    return this;
  }

  isEmpty(): boolean {
    return this.errors.length === 0;
  }

  get size(): number {
    return this.errors.length;
  }

  toArray(): LocatedError[] {
    return [...this.errors];
  }

  [Symbol.iterator](): Iterator<LocatedError> {
    return this.errors[Symbol.iterator]();
  }

  format(): string {
    if (this.errors.length === 0) return '';
    const lines = [`${this.errors.length} errors occurred:`];
    this.errors.forEach((entry, i) => {
      lines.push(`  err ${String(i).padStart(2, '0')} at ${entry.location}:`);
      lines.push(`      ${entry.error.toUserMessage()}`);
    });
    return lines.join('\n');
  }
}

/**
 * Raised by a command when a walk (or the environment) produced failures.
 * The shared command handler prints the collected report.
 */
export class RunFailure extends DotlinkError {
  constructor(public readonly errors: ErrorCollection) {
    super(ErrorCode.RUN_FAILED, `${errors.size} errors occurred`);
    this.name = 'RunFailure';
  }
}

export type Result<T> = { ok: true; value: T } | { ok: false; errors: ErrorCollection };

export function ok<T>(value: T): Result<T> {
  return { ok: true, value };
}

export function fail<T = never>(errors: ErrorCollection | LocatedError): Result<T> {
  const collection = errors instanceof ErrorCollection ? errors : ErrorCollection.of(errors);
  return { ok: false, errors: collection };
}
