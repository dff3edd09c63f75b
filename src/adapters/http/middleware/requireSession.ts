import type { NextFunction, Request, RequestHandler, Response } from 'express';
import type { AuthService } from '../../../core/auth/AuthService.js';

export function bearerToken(req: Request): string | undefined {
  const header = req.get('authorization');
  if (!header) return undefined;
  const [scheme, token] = header.split(' ');
  return scheme?.toLowerCase() === 'bearer' && token ? token : undefined;
}

/** Rejects the request with 401 unless it carries a live session token. */
export function requireSession(authService: AuthService): RequestHandler {
  return (req: Request, _res: Response, next: NextFunction) => {
    try {
      req.auth = authService.authenticate(bearerToken(req));
      next();
    } catch (error) {
      next(error);
    }
  };
}
