/**
 * Error taxonomy for streaming sessions
 */

export enum SessionErrorCode {
  INVALID_SOURCE = 'INVALID_SOURCE',
  BACKEND_LAUNCH_FAILED = 'BACKEND_LAUNCH_FAILED',
  BACKEND_DIED = 'BACKEND_DIED',
  FIRST_BYTE_TIMEOUT = 'FIRST_BYTE_TIMEOUT',
  MEDIA_NOT_FOUND = 'MEDIA_NOT_FOUND',
  PLAYER_ATTACH_FAILED = 'PLAYER_ATTACH_FAILED',
  CANCELLED = 'CANCELLED'
}

export interface SessionErrorDetails {
  // Shown to the user as suggested next steps
  remediation?: string[];
  // Log-only context (output tails, directory listings)
  diagnostics?: string[];
  cause?: unknown;
}

export class SessionError extends Error {
  readonly code: SessionErrorCode;
  readonly remediation: readonly string[];
  readonly diagnostics: readonly string[];

  constructor(code: SessionErrorCode, message: string, details: SessionErrorDetails = {}) {
    super(message, details.cause === undefined ? undefined : { cause: details.cause });
    this.name = 'SessionError';
    this.code = code;
    this.remediation = details.remediation ?? [];
    this.diagnostics = details.diagnostics ?? [];
  }

  /**
   * Whether the user can act on the error (as opposed to log-only failures)
   */
  get actionable(): boolean {
    return this.remediation.length > 0;
  }

  static cancelled(): SessionError {
    return new SessionError(SessionErrorCode.CANCELLED, 'Session cancelled by user');
  }
}

export function isSessionError(error: unknown): error is SessionError {
  return error instanceof SessionError;
}

export function isCancellation(error: unknown): boolean {
  return isSessionError(error) && error.code === SessionErrorCode.CANCELLED;
}
