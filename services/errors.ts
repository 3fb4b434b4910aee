export type PreconditionCode =
  | 'NO_ACTIVE_SESSION'
  | 'NO_PREVIOUS_QUESTION'
  | 'NO_MOCK_QUESTIONS'
  | 'NO_CURRENT_QUESTION';

/**
 * Raised when a caller invokes an operation the current session state cannot
 * support. These are the only exceptions the public workflows throw.
 */
export class SessionPreconditionError extends Error {
  readonly code: PreconditionCode;

  constructor(code: PreconditionCode, message: string) {
    super(message);
    this.name = 'SessionPreconditionError';
    this.code = code;
  }
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

export const describeError = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);
