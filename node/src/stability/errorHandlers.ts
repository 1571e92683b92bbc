// Process-level error handlers, graceful shutdown and the request timeout guard.

import type { Server } from 'http';
import type { Request, Response, NextFunction } from 'express';
import { logger } from '@/services/logger';
import { getRequestContext } from '@/middleware/correlation';
import { NetworkError } from '@/types/errors';
import { toErrorResponse } from '@/utils/errorResponse';

const SHUTDOWN_GRACE_MS = 15000;

let serverInstance: Server | null = null;
let shuttingDown = false;

export function setServerInstance(server: Server): void {
  serverInstance = server;
}

/**
 * Unhandled rejections are logged; the interactive process keeps serving in production
 * and exits in development so the failure is noticed.
 */
export function setupUnhandledRejectionHandler(nodeEnv: string): void {
  process.on('unhandledRejection', (reason: unknown) => {
    logger.error('❌ Unhandled Promise Rejection', {
      reason: reason instanceof Error ? reason.stack ?? reason.message : String(reason),
    });

    if (nodeEnv !== 'production') {
      logger.fatal('💥 Exiting outside production after unhandled rejection');
      process.exit(1);
    }
  });
}

export function setupUncaughtExceptionHandler(): void {
  process.on('uncaughtException', (error: Error) => {
    logger.fatal('❌ Uncaught Exception', { error: error.stack ?? error.message });
    gracefulShutdown('uncaughtException', 1);
  });
}

export function setupGracefulShutdown(): void {
  const signals: NodeJS.Signals[] = ['SIGTERM', 'SIGINT'];

  signals.forEach((signal) => {
    process.on(signal, () => {
      logger.info(`🛑 Received ${signal}, starting graceful shutdown...`);
      gracefulShutdown(signal, 0);
    });
  });
}

function gracefulShutdown(reason: string, exitCode: number): void {
  if (shuttingDown) return;
  shuttingDown = true;
  logger.info(`🔄 Graceful shutdown initiated: ${reason}`);

  // In-flight searches get the grace period to finish.
  const forced = setTimeout(() => {
    logger.error('⚠️ Forced shutdown after timeout');
    process.exit(1);
  }, SHUTDOWN_GRACE_MS);
  forced.unref();

  if (!serverInstance) {
    process.exit(exitCode);
  }

  serverInstance.close((err) => {
    if (err) {
      logger.error('❌ Error while closing HTTP server', { error: err.message });
      process.exit(1);
    }
    logger.info('✅ HTTP server closed');
    process.exit(exitCode);
  });
}

/**
 * Answers with the NetworkError envelope (504) when a handler has not responded within timeoutMs.
 * Closing the response abandons whatever search the handler was waiting on.
 */
export function requestTimeout(timeoutMs: number = 15000) {
  return (req: Request, res: Response, next: NextFunction): void => {
    const timeout = setTimeout(() => {
      if (!res.headersSent) {
        getRequestContext(req).log.warn(`⏱️ Request exceeded ${timeoutMs}ms, answering 504`);
        const { status, body } = toErrorResponse(new NetworkError(`Request exceeded ${timeoutMs}ms timeout`, 'ETIMEDOUT'));
        res.status(status).json(body);
      }
    }, timeoutMs);

    res.on('finish', () => clearTimeout(timeout));
    res.on('close', () => clearTimeout(timeout));

    next();
  };
}
