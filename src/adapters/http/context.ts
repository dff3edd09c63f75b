import type { Request } from 'express';
import type { Logger } from 'pino';
import type { AuthenticatedSession } from '../../core/auth/AuthService.js';
import { AuthenticationError, ValidationError } from '../../utils/errors.js';

declare global {
  namespace Express {
    interface Request {
      requestId: string;
      log: Logger;
      /** Set by requireSession */
      auth?: AuthenticatedSession;
    }
  }
}

/** The session resolved by requireSession. Routes behind it can rely on one being present. */
export function sessionOf(req: Request): AuthenticatedSession {
  if (!req.auth) {
    throw new AuthenticationError('Authentication required');
  }
  return req.auth;
}

export function userIdOf(req: Request): number {
  return sessionOf(req).user.id;
}

/** Route ids are positive integers. */
export function parseId(value: string | undefined): number {
  const id = Number(value);
  if (!Number.isSafeInteger(id) || id <= 0) {
    throw new ValidationError('Invalid id', [{ path: 'id', message: 'Id must be a positive integer' }]);
  }
  return id;
}
