export type ErrorCode =
  | 'LOAD_FAILED'
  | 'SAVE_FAILED'
  | 'WORKBOOK_CLOSED'
  | 'SHEET_NOT_FOUND'
  | 'ACCESS_CANCELLED'
  | 'INVALID_PASSWORD_FORMAT'
  | 'CONFIG_INVALID';

interface ErrorDetails {
  path?: string;
  sheetName?: string;
  cause?: unknown;
}

/**
 *
 * An error with a human-readable message and a machine-readable code.
 * Makes it easier to change the human-readable message without breaking
 * error handlers.
 *
 */
export class ErrorWithCode extends Error {
  constructor(public code: ErrorCode, message: string, public details: ErrorDetails = {}) {
    super(message);
  }
  public get path() { return this.details?.path; }
  public get sheetName() { return this.details?.sheetName; }
}

export function isErrorWithCode(err: unknown, code?: ErrorCode): err is ErrorWithCode {
  return err instanceof ErrorWithCode && (code === undefined || err.code === code);
}

/**
 * Returns the message of an Error, or the stringified value of anything else that was thrown.
 */
export function getErrorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
