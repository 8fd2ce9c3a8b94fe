export type ErrorCode = 'VALIDATION' | 'INVALID_STATUS' | 'INVALID_VERDICT' | 'NOT_FOUND';

export class FocuslineError extends Error {
  constructor(message: string, readonly code: ErrorCode) {
    super(message);
    this.name = new.target.name;
  }
}

export class ValidationError extends FocuslineError {
  constructor(message: string, code: ErrorCode = 'VALIDATION') {
    super(message, code);
  }
}

export class NotFoundError extends FocuslineError {
  constructor(what: string, id: number | string) {
    super(`${what} ${id} not found.`, 'NOT_FOUND');
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
