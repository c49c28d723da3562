/**
 * Shrine error types
 *
 * Every domain failure surfaces as one of these classes. The `code` is stable
 * and travels over the agent socket so the client can rebuild the same class;
 * `exitCode` is what the CLI exits with.
 */

export const ERROR_CODES = {
  INTEGRITY: 'INTEGRITY',
  FORMAT: 'FORMAT',
  NOT_FOUND: 'NOT_FOUND',
  ALREADY_EXISTS: 'ALREADY_EXISTS',
  CONCURRENT_MODIFICATION: 'CONCURRENT_MODIFICATION',
  IO: 'IO',
  GIT: 'GIT',
  SESSION_EXPIRED: 'SESSION_EXPIRED',
  VALIDATION: 'VALIDATION',
  AGENT_UNAVAILABLE: 'AGENT_UNAVAILABLE',
} as const;

export type ErrorCode = (typeof ERROR_CODES)[keyof typeof ERROR_CODES];

export abstract class ShrineError extends Error {
  abstract readonly code: ErrorCode;
  abstract readonly exitCode: number;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    Error.captureStackTrace?.(this, new.target);
  }
}

/**
 * Wrong password or corrupted container. The two are deliberately reported
 * the same way.
 */
export class IntegrityError extends ShrineError {
  readonly code = ERROR_CODES.INTEGRITY;
  readonly exitCode = 3;

  constructor(message = 'Invalid password or corrupted shrine') {
    super(message);
  }
}

export class FormatError extends ShrineError {
  readonly code = ERROR_CODES.FORMAT;
  readonly exitCode = 4;
}

export class NotFoundError extends ShrineError {
  readonly code = ERROR_CODES.NOT_FOUND;
  readonly exitCode = 2;
}

export class AlreadyExistsError extends ShrineError {
  readonly code = ERROR_CODES.ALREADY_EXISTS;
  readonly exitCode = 5;
}

export class ConcurrentModificationError extends ShrineError {
  readonly code = ERROR_CODES.CONCURRENT_MODIFICATION;
  readonly exitCode = 6;

  constructor(message = 'Shrine was modified by another process; nothing was written') {
    super(message);
  }
}

export class IoError extends ShrineError {
  readonly code = ERROR_CODES.IO;
  readonly exitCode = 7;
}

/** Reported as a warning only: the shrine file is already persisted when git runs. */
export class GitError extends ShrineError {
  readonly code = ERROR_CODES.GIT;
  readonly exitCode = 0;
}

export class SessionExpiredError extends ShrineError {
  readonly code = ERROR_CODES.SESSION_EXPIRED;
  readonly exitCode = 8;

  constructor(message = 'No active agent session') {
    super(message);
  }
}

export class ValidationError extends ShrineError {
  readonly code = ERROR_CODES.VALIDATION;
  readonly exitCode = 9;
  public readonly issues: unknown[];

  constructor(message: string, issues: unknown[] = []) {
    super(message);
    this.issues = issues;
  }
}

export class AgentUnavailableError extends ShrineError {
  readonly code = ERROR_CODES.AGENT_UNAVAILABLE;
  readonly exitCode = 10;
}

/**
 * Rebuild an error received from the agent.
 */
export function errorFromCode(code: string, message: string): ShrineError {
  switch (code) {
    case ERROR_CODES.INTEGRITY:
      return new IntegrityError(message);
    case ERROR_CODES.FORMAT:
      return new FormatError(message);
    case ERROR_CODES.NOT_FOUND:
      return new NotFoundError(message);
    case ERROR_CODES.ALREADY_EXISTS:
      return new AlreadyExistsError(message);
    case ERROR_CODES.CONCURRENT_MODIFICATION:
      return new ConcurrentModificationError(message);
    case ERROR_CODES.GIT:
      return new GitError(message);
    case ERROR_CODES.SESSION_EXPIRED:
      return new SessionExpiredError(message);
    case ERROR_CODES.VALIDATION:
      return new ValidationError(message);
    case ERROR_CODES.AGENT_UNAVAILABLE:
      return new AgentUnavailableError(message);
    default:
      return new IoError(message);
  }
}

export function isShrineError(error: unknown): error is ShrineError {
  return error instanceof ShrineError;
}
