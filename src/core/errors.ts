export interface ErrorDetails {
  hint?: string;
  cause?: unknown;
}

export class GitUsrError extends Error {
  readonly hint?: string;

  constructor(message: string, details: ErrorDetails = {}) {
    super(message, details.cause === undefined ? undefined : { cause: details.cause });
    this.name = 'GitUsrError';
    this.hint = details.hint;
  }
}

export class IOError extends GitUsrError {
  readonly path: string;

  constructor(message: string, path: string, details: ErrorDetails = {}) {
    super(message, details);
    this.name = 'IOError';
    this.path = path;
  }
}

export class ParseError extends GitUsrError {
  readonly path: string;

  constructor(message: string, path: string, details: ErrorDetails = {}) {
    super(message, details);
    this.name = 'ParseError';
    this.path = path;
  }
}

export class NotFoundError extends GitUsrError {
  readonly profile: string;
  readonly available: string[];

  constructor(profile: string, available: string[], details: ErrorDetails = {}) {
    super(`Profile '${profile}' not found!`, details);
    this.name = 'NotFoundError';
    this.profile = profile;
    this.available = available;
  }
}

export class ValidationError extends GitUsrError {
  constructor(message: string, details: ErrorDetails = {}) {
    super(message, details);
    this.name = 'ValidationError';
  }
}

export class ExternalToolError extends GitUsrError {
  readonly args: string[];
  readonly status: number | null;
  readonly stderr: string;

  constructor(
    message: string,
    invocation: { args: string[]; status: number | null; stderr: string },
    details: ErrorDetails = {}
  ) {
    super(message, details);
    this.name = 'ExternalToolError';
    this.args = invocation.args;
    this.status = invocation.status;
    this.stderr = invocation.stderr;
  }
}

export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}

// Node's fs errors carry a string `code` (ENOENT, EACCES, ...).
export function errorCode(error: unknown): string | undefined {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}
