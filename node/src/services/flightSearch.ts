// src/services/flightSearch.ts
// One search = build → search → present, with at most one outbound call in flight.
import { logger as rootLogger, type AppLogger } from '@/services/logger';
import type { FlightQueryBuilder, FlightQueryInput } from '@/services/flight-query';
import type { FlightProvider, SearchResult } from '@/services/providers/flights/flight-provider';
import { present } from '@/services/result-presenter';
import { SearchQueue } from '@/stability/searchQueue';
import { AuthError, isValidationError } from '@/types/errors';
import type { AirportCode, CalendarDate, CityName, FlightOption, ResultOrdering, SearchRequest } from '@/types/flights';

export const NO_FLIGHTS_MESSAGE = 'No flights found.';

/** JSON-friendly view of a SearchRequest. */
export interface SearchRequestSummary {
  originCity: CityName;
  destinationCity: CityName;
  originCodes: AirportCode[];
  destinationCodes: AirportCode[];
  outboundDate: CalendarDate;
  returnDate?: CalendarDate;
  tripType: 'round_trip' | 'one_way';
}

export interface FlightSearchOutcome {
  request: SearchRequestSummary;
  options: FlightOption[];
  /** Set when the search succeeded with nothing to show. */
  message?: string;
  provider: string;
  searchedAt: string;
}

export interface FlightSearchServiceDeps {
  queryBuilder: FlightQueryBuilder;
  provider: FlightProvider;
  apiKey: string;
  ordering?: ResultOrdering;
  currency?: string;
  queue?: SearchQueue;
  logger?: AppLogger;
}

export function summarizeRequest(request: SearchRequest): SearchRequestSummary {
  return {
    originCity: request.originCity,
    destinationCity: request.destinationCity,
    originCodes: [...request.originCodes],
    destinationCodes: [...request.destinationCodes],
    outboundDate: request.outboundDate,
    ...(request.returnDate ? { returnDate: request.returnDate } : {}),
    tripType: request.returnDate ? 'round_trip' : 'one_way',
  };
}

export class FlightSearchService {
  private readonly queue: SearchQueue;
  private readonly log: AppLogger;

  constructor(private readonly deps: FlightSearchServiceDeps) {
    this.queue = deps.queue ?? new SearchQueue();
    this.log = deps.logger ?? rootLogger;
  }

  /**
   * Validation errors surface before anything is queued or sent.
   * Provider and network errors propagate unchanged for the caller to present.
   * Aborting the signal drops a queued search and cancels one in flight.
   */
  async run(input: FlightQueryInput, log: AppLogger = this.log, signal?: AbortSignal): Promise<FlightSearchOutcome> {
    let request: SearchRequest;
    try {
      request = this.deps.queryBuilder.build(input);
    } catch (err) {
      if (isValidationError(err)) {
        log.info('🚫 Rejected flight query', { code: err.code, message: err.message });
      }
      throw err;
    }

    const { provider, apiKey } = this.deps;
    let result: SearchResult;
    try {
      result = await this.queue.run(() => provider.search(request, apiKey, signal), signal);
    } catch (err) {
      if (err instanceof AuthError) {
        log.error('🔑 Flight provider authentication failed; check SERPAPI_API_KEY', { status: err.providerStatus });
      }
      throw err;
    }

    const options = present(result, { ordering: this.deps.ordering, currency: this.deps.currency });
    log.info(`✈️ ${options.length} flight options for ${request.originCity} → ${request.destinationCity}`);

    return {
      request: summarizeRequest(request),
      options,
      ...(options.length === 0 && { message: NO_FLIGHTS_MESSAGE }),
      provider: provider.name,
      searchedAt: result.searchedAt,
    };
  }
}
