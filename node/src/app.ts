// Express app wiring. Startup (config, directory, listen) lives in index.ts.
import express from 'express';
import cors from 'cors';
import helmet from 'helmet';
import morgan from 'morgan';
import compression from 'compression';

import { attachCorrelationId } from '@/middleware/correlation';
import { errorHandler, notFoundHandler } from '@/middleware/errorHandler';
import { createApiRouter } from '@/routes';
import { logger } from '@/services/logger';
import type { FlightSearchService } from '@/services/flightSearch';
import type { AirportDirectory } from '@/services/providers/flights/airport-directory';
import { requestTimeout } from '@/stability/errorHandlers';

export interface AppDeps {
  directory: AirportDirectory;
  searchService: FlightSearchService;
  corsOrigins?: string[];
  /** Upper bound for any handler; keep it above the provider timeout. */
  requestTimeoutMs?: number;
  accessLog?: boolean;
  rateLimit?: boolean;
}

export function createApp(deps: AppDeps): express.Express {
  const app = express();

  app.use(helmet());
  app.use(cors({ origin: deps.corsOrigins ?? ['http://localhost:3000'], credentials: true }));
  app.use(compression());
  app.use(express.json({ limit: '16kb' }));
  app.use(attachCorrelationId);
  app.use(requestTimeout(deps.requestTimeoutMs ?? 35000));

  if (deps.accessLog ?? true) {
    const accessLog = logger.getSubLogger({ name: 'http' });
    app.use(morgan('combined', { stream: { write: (line: string) => accessLog.info(line.trim()) } }));
  }

  app.get('/health', (_req, res) => {
    res.status(200).json({
      status: 'OK',
      timestamp: new Date().toISOString(),
      uptime: process.uptime(),
      cities: deps.directory.size,
    });
  });

  app.use(
    '/api',
    createApiRouter({ directory: deps.directory, searchService: deps.searchService, rateLimit: deps.rateLimit }),
  );

  app.use(notFoundHandler);
  app.use(errorHandler);

  return app;
}
