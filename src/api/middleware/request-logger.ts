import { Request, Response, NextFunction } from 'express';
import crypto from 'crypto';

declare global {
  namespace Express {
    interface Request {
      correlationId?: string;
    }
  }
}

export const CORRELATION_HEADER = 'x-correlation-id';

const UUID_PATTERN = /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/i;

// Reuse a caller-supplied UUID so client and server logs line up
function correlationIdFor(req: Request): string {
  const supplied = req.get(CORRELATION_HEADER);
  return supplied && UUID_PATTERN.test(supplied) ? supplied.toLowerCase() : crypto.randomUUID();
}

export function requestLogger(req: Request, res: Response, next: NextFunction) {
  req.correlationId = correlationIdFor(req);
  res.setHeader(CORRELATION_HEADER, req.correlationId);

  const start = Date.now();

  console.log('[API Request]', {
    correlationId: req.correlationId,
    method: req.method,
    path: req.path,
    query: req.query,
    contentLength: req.get('content-length'),
    ip: req.ip,
    userAgent: req.get('user-agent')
  });

  res.on('finish', () => {
    const entry = {
      correlationId: req.correlationId,
      method: req.method,
      path: req.path,
      statusCode: res.statusCode,
      duration: `${Date.now() - start}ms`
    };
    if (res.statusCode >= 500) {
      console.error('[API Response]', entry);
    } else if (res.statusCode >= 400) {
      console.warn('[API Response]', entry);
    } else {
      console.log('[API Response]', entry);
    }
  });

  next();
}
