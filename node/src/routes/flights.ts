/**
 * Flight search endpoints
 *
 * GET  /api/flights/cities  → selectable cities plus default selections
 * POST /api/flights/search  → { originCity, destinationCity, outboundDate, returnDate? }
 *
 * Search response:
 * {
 *   success: true,
 *   data: { request, options: FlightOption[], summaries, message?, provider, searchedAt }
 * }
 */
import express, { type Request, type Response, type NextFunction } from 'express';
import { summarizeFlight } from '@/format/flightSummary';
import { getRequestContext } from '@/middleware/correlation';
import { searchRateLimiter } from '@/middleware/rate-limit-search';
import type { FlightSearchService } from '@/services/flightSearch';
import type { AirportDirectory } from '@/services/providers/flights/airport-directory';
import { createErrorResponse, createSuccessResponse } from '@/utils/errorResponse';
import { validateFlightSearchRequest } from './flights.validation';

export interface FlightsRouterDeps {
  directory: AirportDirectory;
  searchService: FlightSearchService;
  rateLimit?: boolean;
}

export function createFlightsRouter({ directory, searchService, rateLimit = true }: FlightsRouterDeps) {
  const router = express.Router();

  router.get('/cities', (_req: Request, res: Response) => {
    const cities = directory.cities();
    res.json(
      createSuccessResponse({
        cities: cities.map((name) => ({ name, airports: [...directory.lookup(name)] })),
        defaults: {
          originCity: cities[0] ?? null,
          destinationCity: cities[1] ?? cities[0] ?? null,
        },
      }),
    );
  });

  if (rateLimit) {
    router.use('/search', searchRateLimiter);
  }

  router.post('/search', async (req: Request, res: Response, next: NextFunction) => {
    const validation = validateFlightSearchRequest(req.body);
    if (!validation.success) {
      res.status(400).json(createErrorResponse('Invalid search request', validation.error, 'INVALID_REQUEST'));
      return;
    }

    const { log } = getRequestContext(req);
    const { originCity, destinationCity, outboundDate, returnDate } = validation.data;
    log.info(`🔍 Flight search: ${originCity} → ${destinationCity} on ${outboundDate}${returnDate ? `, back ${returnDate}` : ''}`);

    // A response that closes early (client gone, timeout guard) abandons the search.
    const abandon = new AbortController();
    res.on('close', () => abandon.abort());

    try {
      const outcome = await searchService.run(
        { originCity, destinationCity, outboundDate, returnDate },
        log,
        abandon.signal,
      );
      if (res.headersSent) {
        log.debug('Search finished after the response was sent; result dropped');
        return;
      }
      res.json(createSuccessResponse({ ...outcome, summaries: outcome.options.map(summarizeFlight) }));
    } catch (err) {
      if (res.headersSent) {
        log.debug('Search ended after the response was sent', { error: err instanceof Error ? err.message : String(err) });
        return;
      }
      next(err);
    }
  });

  return router;
}
