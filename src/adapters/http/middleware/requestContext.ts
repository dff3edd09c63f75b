import { randomUUID } from 'node:crypto';
import type { NextFunction, Request, Response } from 'express';
import { createLogger } from '../../../utils/logger.js';

const REQUEST_ID_PATTERN = /^[\w.-]{1,128}$/;

/**
 * Tags the request with an id (reusing a sane X-Request-ID from upstream) and a child logger
 * carrying it as the correlation id.
 */
export function requestContext(req: Request, res: Response, next: NextFunction): void {
  const incoming = req.get('x-request-id');
  const requestId = incoming && REQUEST_ID_PATTERN.test(incoming) ? incoming : randomUUID();

  req.requestId = requestId;
  req.log = createLogger({ component: 'http', correlationId: requestId });
  res.setHeader('X-Request-ID', requestId);
  next();
}

/** One line per request, written when the response finishes. */
export function requestLogger(req: Request, res: Response, next: NextFunction): void {
  const startTime = Date.now();

  res.on('finish', () => {
    const details = {
      method: req.method,
      path: req.originalUrl.split('?')[0],
      statusCode: res.statusCode,
      durationMs: Date.now() - startTime,
      userId: req.auth?.user.id,
    };
    if (res.statusCode >= 500) {
      req.log.error(details, 'Request failed');
    } else if (res.statusCode >= 400) {
      req.log.warn(details, 'Request completed');
    } else {
      req.log.info(details, 'Request completed');
    }
  });

  next();
}
