import type { NextFunction, Request, Response } from 'express';
import { z } from 'zod';
import { FitlisticError, ValidationError, isSqliteError, type ErrorDetail } from '../../../utils/errors.js';

interface ErrorBody {
  error: {
    code: string;
    message: string;
    details?: ErrorDetail[];
  };
  requestId: string;
}

function send(req: Request, res: Response, status: number, error: ErrorBody['error']): void {
  const body: ErrorBody = { error, requestId: req.requestId };
  res.status(status).json(body);
}

/** body-parser tags its failures with a `type` such as 'entity.parse.failed'. */
function bodyParserFailure(err: unknown): string | undefined {
  return err instanceof Error && 'type' in err && typeof err.type === 'string' ? err.type : undefined;
}

/**
 * Maps thrown errors to the JSON error envelope. Expected failures are logged at warn,
 * the rest at error with the stack.
 */
export function errorHandler(err: unknown, req: Request, res: Response, _next: NextFunction): void {
  if (err instanceof ValidationError) {
    req.log.warn({ code: err.code, details: err.details }, err.message);
    send(req, res, err.status, { code: err.code, message: err.message, details: err.details });
    return;
  }

  if (err instanceof FitlisticError) {
    const level = err.status >= 500 ? 'error' : 'warn';
    req.log[level]({ code: err.code, error: err.status >= 500 ? err : undefined }, err.message);
    send(req, res, err.status, { code: err.code, message: err.message });
    return;
  }

  if (err instanceof z.ZodError) {
    const details = err.issues.map((issue) => ({ path: issue.path.join('.'), message: issue.message }));
    req.log.warn({ details }, 'Validation failed');
    send(req, res, 400, { code: 'VALIDATION_FAILED', message: 'Validation failed', details });
    return;
  }

  const bodyFailure = bodyParserFailure(err);
  if (bodyFailure === 'entity.parse.failed') {
    req.log.warn('Malformed JSON body');
    send(req, res, 400, { code: 'VALIDATION_FAILED', message: 'Request body is not valid JSON' });
    return;
  }
  if (bodyFailure === 'entity.too.large') {
    req.log.warn('Request body too large');
    send(req, res, 413, { code: 'PAYLOAD_TOO_LARGE', message: 'Request body is too large' });
    return;
  }

  if (isSqliteError(err)) {
    req.log.error({ error: err, sqliteCode: err.code }, 'Storage error');
    send(req, res, 503, { code: 'STORAGE_UNAVAILABLE', message: 'Storage is temporarily unavailable' });
    return;
  }

  req.log.error({ error: err }, 'Unhandled error');
  send(req, res, 500, { code: 'INTERNAL_ERROR', message: 'Internal server error' });
}

export function notFoundHandler(req: Request, res: Response): void {
  send(req, res, 404, { code: 'NOT_FOUND', message: `Route ${req.method} ${req.path} not found` });
}
