// Load environment variables FIRST
import dotenv from 'dotenv';
import path from 'path';
dotenv.config({ path: path.resolve(process.cwd(), '.env') });

import { createApp } from '@/app';
import { loadAppConfig, type AppConfig } from '@/config/app.config';
import { logger } from '@/services/logger';
import { FlightQueryBuilder } from '@/services/flight-query';
import { FlightSearchService } from '@/services/flightSearch';
import { AirportDirectory } from '@/services/providers/flights/airport-directory';
import { SerpApiFlightProvider } from '@/services/providers/flights/serpapi-flight-provider';
import { SearchQueue } from '@/stability/searchQueue';
import {
  setServerInstance,
  setupGracefulShutdown,
  setupUncaughtExceptionHandler,
  setupUnhandledRejectionHandler,
} from '@/stability/errorHandlers';
import { ConfigError } from '@/types/errors';

function start(): void {
  let config: AppConfig;
  let directory: AirportDirectory;
  try {
    config = loadAppConfig();
    directory = AirportDirectory.load(config.airportsFile);
  } catch (err) {
    if (err instanceof ConfigError) {
      logger.fatal(`💥 ${err.message}`);
      process.exit(1);
    }
    throw err;
  }

  setupUnhandledRejectionHandler(config.nodeEnv);
  setupUncaughtExceptionHandler();
  setupGracefulShutdown();

  const provider = new SerpApiFlightProvider({
    timeoutMs: config.search.timeoutMs,
    currency: config.search.currency,
    language: config.search.language,
  });
  const searchService = new FlightSearchService({
    queryBuilder: new FlightQueryBuilder(directory),
    provider,
    apiKey: config.serpApiKey,
    ordering: config.search.ordering,
    currency: config.search.currency,
    queue: new SearchQueue(config.search.maxQueueSize),
  });

  const app = createApp({
    directory,
    searchService,
    corsOrigins: config.corsOrigins,
    requestTimeoutMs: config.search.timeoutMs + 5000,
  });

  const server = app.listen(config.port, () => {
    logger.info(`🚀 Flight search server listening on port ${config.port}`, {
      cities: directory.size,
      ordering: config.search.ordering,
      environment: config.nodeEnv,
    });
  });
  setServerInstance(server);
}

start();
