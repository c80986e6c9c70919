import { Request, Response, NextFunction } from 'express';
import { ZodError } from 'zod';
import { RegistryError } from '../../errors';
import { ApiErrorBody } from '../types';

function sendError(
  res: Response,
  req: Request,
  status: number,
  error: Omit<ApiErrorBody['error'], 'correlationId'>
) {
  const body: ApiErrorBody = {
    success: false,
    error: { ...error, correlationId: req.correlationId }
  };
  res.status(status).json(body);
}

// body-parser attaches an HTTP status and a machine-readable type to its errors
function bodyParserFailure(err: unknown): { status: number; type: string } | null {
  if (typeof err !== 'object' || err === null) return null;
  if (!('status' in err) || !('type' in err)) return null;
  const { status, type } = err;
  if (typeof status !== 'number' || typeof type !== 'string') return null;
  return { status, type };
}

export function errorHandler(err: unknown, req: Request, res: Response, _next: NextFunction) {
  const error = err instanceof Error ? err : new Error(String(err));

  console.error('[API Error]', {
    correlationId: req.correlationId,
    path: req.path,
    method: req.method,
    error: error.message,
    stack: process.env.NODE_ENV === 'development' ? error.stack : undefined
  });

  if (err instanceof RegistryError) {
    return sendError(res, req, err.statusCode, {
      code: err.code,
      message: err.message,
      details: err.details
    });
  }

  if (err instanceof ZodError) {
    return sendError(res, req, 400, {
      code: 'VALIDATION_ERROR',
      message: 'Request validation failed',
      details: { issues: err.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`) }
    });
  }

  const parserFailure = bodyParserFailure(err);
  if (parserFailure && parserFailure.status >= 400 && parserFailure.status < 500) {
    return sendError(res, req, parserFailure.status, {
      code: parserFailure.type === 'entity.too.large' ? 'PAYLOAD_TOO_LARGE' : 'INVALID_BODY',
      message: parserFailure.type === 'entity.too.large'
        ? 'Request body exceeds the upload limit'
        : 'Request body could not be parsed'
    });
  }

  // Never leak internal errors to client
  sendError(res, req, 500, {
    code: 'INTERNAL_ERROR',
    message: 'An unexpected error occurred'
  });
}

export function notFoundHandler(req: Request, res: Response) {
  sendError(res, req, 404, {
    code: 'NOT_FOUND',
    message: `Route ${req.method} ${req.path} not found`
  });
}
