export interface ErrorDetail {
  path: string;
  message: string;
}

export class FitlisticError extends Error {
  public readonly code: string;
  public readonly status: number;

  constructor(message: string, code: string, status = 500, options?: ErrorOptions) {
    super(message, options);
    this.name = 'FitlisticError';
    this.code = code;
    this.status = status;
    Error.captureStackTrace(this, this.constructor);
  }
}

/** Credentials or session rejected. The message never says which part was wrong. */
export class AuthenticationError extends FitlisticError {
  constructor(message = 'Invalid username or password', options?: ErrorOptions) {
    super(message, 'AUTHENTICATION_FAILED', 401, options);
    this.name = 'AuthenticationError';
  }
}

export class ValidationError extends FitlisticError {
  public readonly details: ErrorDetail[];

  constructor(message: string, details: ErrorDetail[] = [], options?: ErrorOptions) {
    super(message, 'VALIDATION_FAILED', 400, options);
    this.name = 'ValidationError';
    this.details = details;
  }
}

export class NotFoundError extends FitlisticError {
  constructor(resource: string, options?: ErrorOptions) {
    super(`${resource} not found`, 'NOT_FOUND', 404, options);
    this.name = 'NotFoundError';
  }
}

export class ConflictError extends FitlisticError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, 'CONFLICT', 409, options);
    this.name = 'ConflictError';
  }
}

export class AdapterError extends FitlisticError {
  constructor(adapter: string, message: string, options?: ErrorOptions) {
    super(message, `ADAPTER_${adapter.toUpperCase()}`, 502, options);
    this.name = 'AdapterError';
  }
}

export class LLMError extends AdapterError {
  constructor(message: string, options?: ErrorOptions) {
    super('LLM', message, options);
    this.name = 'LLMError';
  }
}

/** better-sqlite3 raises SqliteError with a SQLITE_* code. */
export function isSqliteError(error: unknown): error is Error & { code: string } {
  return (
    error instanceof Error &&
    'code' in error &&
    typeof error.code === 'string' &&
    error.code.startsWith('SQLITE_')
  );
}
