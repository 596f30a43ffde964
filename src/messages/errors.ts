/**
 * msgate — Compilation Errors
 */

export type CompilationErrorCode =
  | 'TOO_MANY_QUICK_REPLIES'
  | 'EMPTY_BODY'
  | 'UNKNOWN_LANGUAGE'
  | 'UNSUPPORTED_MEDIA'
  | 'MISSING_CATALOG'
  | 'INVALID_MESSAGE';

/**
 * The message cannot be expressed within the channel's limits. Raised
 * before any network call; never retried.
 */
export class CompilationError extends Error {
  constructor(
    message: string,
    public readonly code: CompilationErrorCode
  ) {
    super(message);
    this.name = 'CompilationError';
  }
}
