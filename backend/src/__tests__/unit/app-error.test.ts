/**
 * Unit Tests: Application Errors
 */

import { describe, it, expect } from 'vitest';
import {
  AppError,
  ErrorKind,
  conflict,
  expiredToken,
  externalServiceError,
  forbidden,
  httpStatus,
  invalidToken,
  isAppError,
  notFound,
  purposeMismatch,
  unauthorized,
  validationError,
} from '../../application/errors/app-error.js';

describe('AppError', () => {
  it.each([
    [conflict('taken'), 409],
    [unauthorized(), 401],
    [forbidden(), 403],
    [notFound('Contact'), 404],
    [invalidToken(), 401],
    [expiredToken(), 401],
    [purposeMismatch('access', 'refresh'), 401],
    [validationError('bad'), 400],
    [externalServiceError('smtp'), 503],
    [new AppError(ErrorKind.INTERNAL_ERROR, 'boom'), 500],
  ])('should map %s to HTTP %d', (error, status) => {
    expect(error.statusCode).toBe(status);
    expect(httpStatus(error.kind)).toBe(status);
  });

  it('should flag only token failures as token errors', () => {
    expect(invalidToken().isTokenError).toBe(true);
    expect(expiredToken().isTokenError).toBe(true);
    expect(purposeMismatch('access', 'refresh').isTokenError).toBe(true);
    expect(unauthorized().isTokenError).toBe(false);
  });

  it('should build readable messages', () => {
    expect(notFound('Contact').message).toBe('Contact not found');
    expect(purposeMismatch('refresh', 'access').message).toBe('Expected a refresh token, got access');
    expect(externalServiceError('cloudinary').message).toBe('cloudinary is unavailable');
  });

  it('should keep the cause of an external failure', () => {
    const cause = new Error('connect ECONNREFUSED');

    expect(externalServiceError('redis', cause).cause).toBe(cause);
  });

  it('should recognise AppError instances only', () => {
    expect(isAppError(forbidden())).toBe(true);
    expect(isAppError(new Error('plain'))).toBe(false);
    expect(isAppError({ kind: 'FORBIDDEN' })).toBe(false);
  });
});
