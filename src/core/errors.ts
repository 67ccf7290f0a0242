/**
 * Custom error classes for stream-cmp.
 */

/**
 * Exit status for usage, open and read failures.
 * 0 and 1 are reserved for "equal" and "differ".
 */
export const EXIT_TROUBLE = 2;

export class CmpError extends Error {
  constructor(
    message: string,
    public readonly exitCode: number = EXIT_TROUBLE
  ) {
    super(message);
    this.name = "CmpError";
  }
}

export class UsageError extends CmpError {
  constructor(message: string) {
    super(message);
    this.name = "UsageError";
  }
}

export class OffsetParseError extends UsageError {
  constructor(
    public readonly label: string,
    public readonly token: string,
    reason: string
  ) {
    super(`bad ${label}: ${token}: ${reason}`);
    this.name = "OffsetParseError";
  }
}

export class SourceOpenError extends CmpError {
  constructor(
    public readonly source: string,
    reason: string
  ) {
    super(`cannot open ${source}: ${reason}`);
    this.name = "SourceOpenError";
  }
}

export class SourceReadError extends CmpError {
  constructor(
    public readonly source: string,
    reason: string
  ) {
    super(`read error on ${source}: ${reason}`);
    this.name = "SourceReadError";
  }
}

/**
 * Extract a printable reason from anything thrown.
 */
export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
