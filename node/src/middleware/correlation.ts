// node/src/middleware/correlation.ts — correlation ID and request-scoped logger
import type { Request, Response, NextFunction } from 'express';
import { randomUUID } from 'crypto';
import { logger, type AppLogger } from '@/services/logger';

export interface RequestContext {
  correlationId: string;
  log: AppLogger;
}

declare global {
  namespace Express {
    interface Request {
      context?: RequestContext;
    }
  }
}

/** Context set by attachCorrelationId; the root logger when the middleware did not run. */
export function getRequestContext(req: Request): RequestContext {
  return req.context ?? { correlationId: 'none', log: logger };
}

export function attachCorrelationId(
  req: Request,
  res: Response,
  next: NextFunction,
): void {
  const headerId = req.header('x-correlation-id');
  const correlationId = headerId && headerId.length <= 128 ? headerId : randomUUID();

  req.context = { correlationId, log: logger.getSubLogger({ name: correlationId }) };
  res.setHeader('x-correlation-id', correlationId);
  next();
}
