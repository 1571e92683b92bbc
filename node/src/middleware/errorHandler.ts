import type { Request, Response, NextFunction } from 'express';
import { getRequestContext } from '@/middleware/correlation';
import { AuthError, FlightSearchError } from '@/types/errors';
import { createErrorResponse, toErrorResponse } from '@/utils/errorResponse';

function isJsonParseError(err: unknown): boolean {
  return err instanceof SyntaxError && 'type' in err && err.type === 'entity.parse.failed';
}

export function errorHandler(err: unknown, req: Request, res: Response, _next: NextFunction): void {
  const { log } = getRequestContext(req);

  if (isJsonParseError(err)) {
    res.status(400).json(createErrorResponse('Request body must be valid JSON', undefined, 'INVALID_JSON'));
    return;
  }

  // The search service already logged the operator hint for auth failures.
  if (err instanceof AuthError) {
    log.debug(`❌ ${err.name}`, { code: err.code, error: err.message });
  } else if (err instanceof FlightSearchError) {
    log.warn(`❌ ${err.name}`, { code: err.code, error: err.message });
  } else {
    log.error('Unhandled error', { error: err instanceof Error ? err.stack ?? err.message : String(err) });
  }

  if (res.headersSent) return;
  const { status, body } = toErrorResponse(err);
  res.status(status).json(body);
}

export function notFoundHandler(req: Request, res: Response): void {
  res.status(404).json(createErrorResponse(`Route ${req.method} ${req.path} not found`, undefined, 'NOT_FOUND'));
}
