/**
 * Application error: every expected failure is thrown as an AppError so the
 * HTTP layer and the logs see one shape with a stable `kind`.
 */

export const ErrorKind = {
  CONFLICT: 'CONFLICT',
  UNAUTHORIZED: 'UNAUTHORIZED',
  FORBIDDEN: 'FORBIDDEN',
  NOT_FOUND: 'NOT_FOUND',
  INVALID_TOKEN: 'INVALID_TOKEN',
  EXPIRED_TOKEN: 'EXPIRED_TOKEN',
  PURPOSE_MISMATCH: 'PURPOSE_MISMATCH',
  VALIDATION_ERROR: 'VALIDATION_ERROR',
  EXTERNAL_SERVICE_ERROR: 'EXTERNAL_SERVICE_ERROR',
  INTERNAL_ERROR: 'INTERNAL_ERROR',
} as const;

export type ErrorKind = (typeof ErrorKind)[keyof typeof ErrorKind];

const STATUS_MAP: Record<ErrorKind, number> = {
  CONFLICT: 409,
  UNAUTHORIZED: 401,
  FORBIDDEN: 403,
  NOT_FOUND: 404,
  INVALID_TOKEN: 401,
  EXPIRED_TOKEN: 401,
  PURPOSE_MISMATCH: 401,
  VALIDATION_ERROR: 400,
  EXTERNAL_SERVICE_ERROR: 503,
  INTERNAL_ERROR: 500,
};

export class AppError extends Error {
  readonly kind: ErrorKind;

  constructor(kind: ErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'AppError';
    this.kind = kind;
  }

  get statusCode(): number {
    return STATUS_MAP[this.kind];
  }

  /** Token failures are all some flavour of "not authenticated" */
  get isTokenError(): boolean {
    return this.kind === ErrorKind.INVALID_TOKEN
      || this.kind === ErrorKind.EXPIRED_TOKEN
      || this.kind === ErrorKind.PURPOSE_MISMATCH;
  }
}

export function isAppError(error: unknown): error is AppError {
  return error instanceof AppError;
}

export const conflict = (message: string): AppError =>
  new AppError(ErrorKind.CONFLICT, message);

export const unauthorized = (message = 'Could not validate credentials'): AppError =>
  new AppError(ErrorKind.UNAUTHORIZED, message);

export const forbidden = (message = 'Insufficient permissions'): AppError =>
  new AppError(ErrorKind.FORBIDDEN, message);

export const notFound = (resource: string): AppError =>
  new AppError(ErrorKind.NOT_FOUND, `${resource} not found`);

export const invalidToken = (message = 'Invalid token'): AppError =>
  new AppError(ErrorKind.INVALID_TOKEN, message);

export const expiredToken = (message = 'Token has expired'): AppError =>
  new AppError(ErrorKind.EXPIRED_TOKEN, message);

export const purposeMismatch = (expected: string, actual: string): AppError =>
  new AppError(ErrorKind.PURPOSE_MISMATCH, `Expected a ${expected} token, got ${actual}`);

export const validationError = (message: string): AppError =>
  new AppError(ErrorKind.VALIDATION_ERROR, message);

export const externalServiceError = (service: string, cause?: unknown): AppError =>
  new AppError(ErrorKind.EXTERNAL_SERVICE_ERROR, `${service} is unavailable`, { cause });

export function httpStatus(kind: ErrorKind): number {
  return STATUS_MAP[kind];
}
