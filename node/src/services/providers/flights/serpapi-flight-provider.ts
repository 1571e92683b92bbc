// SerpAPI Google Flights adapter: request encoding, one outbound call, response validation.
import axios, { type AxiosInstance, type AxiosResponse } from 'axios';
import { logger as rootLogger, type AppLogger } from '@/services/logger';
import { AuthError, NetworkError, ProviderError } from '@/types/errors';
import type { SearchRequest } from '@/types/flights';
import type { FlightProvider, ProviderOffer, SearchResult } from './flight-provider';
import { serpApiResponseSchema } from './serpapi-schema';

export const SERPAPI_SEARCH_URL = 'https://serpapi.com/search.json';

// Google Flights answers "no results" as a 200 carrying an error string.
const NO_RESULTS_PATTERN = /hasn't returned any results/i;

export interface SerpApiFlightProviderOptions {
  timeoutMs?: number;
  currency?: string;
  language?: string;
  /** Injected for tests; defaults to a fresh axios instance. */
  http?: AxiosInstance;
  logger?: AppLogger;
}

export type SerpApiFlightParams = Record<string, string>;

/** Encodes a SearchRequest into SerpAPI's google_flights parameters. */
export function toSerpApiParams(
  request: SearchRequest,
  apiKey: string,
  options: { currency?: string; language?: string } = {},
): SerpApiFlightParams {
  const params: SerpApiFlightParams = {
    engine: 'google_flights',
    departure_id: [...request.originCodes].join(','),
    arrival_id: [...request.destinationCodes].join(','),
    outbound_date: request.outboundDate,
    type: request.returnDate ? '1' : '2', // 1 = round trip, 2 = one way
    currency: options.currency ?? 'USD',
    hl: options.language ?? 'en',
    api_key: apiKey,
  };
  if (request.returnDate) {
    params.return_date = request.returnDate;
  }
  return params;
}

function providerMessage(data: unknown): string | undefined {
  if (typeof data === 'object' && data !== null && 'error' in data && typeof data.error === 'string') {
    return data.error;
  }
  if (typeof data === 'string' && data.trim()) {
    return data.trim().slice(0, 200);
  }
  return undefined;
}

export class SerpApiFlightProvider implements FlightProvider {
  readonly name = 'serpapi-google-flights';

  private readonly http: AxiosInstance;
  private readonly timeoutMs: number;
  private readonly currency: string;
  private readonly language: string;
  private readonly log: AppLogger;

  constructor(options: SerpApiFlightProviderOptions = {}) {
    this.http = options.http ?? axios.create();
    this.timeoutMs = options.timeoutMs ?? 30_000;
    this.currency = options.currency ?? 'USD';
    this.language = options.language ?? 'en';
    this.log = (options.logger ?? rootLogger).getSubLogger({ name: this.name });
  }

  async search(request: SearchRequest, apiKey: string, signal?: AbortSignal): Promise<SearchResult> {
    if (!apiKey.trim()) {
      throw new AuthError('SerpAPI API key is missing');
    }

    const params = toSerpApiParams(request, apiKey, { currency: this.currency, language: this.language });
    this.log.info('✈️ Flight search', {
      departure_id: params.departure_id,
      arrival_id: params.arrival_id,
      outbound_date: params.outbound_date,
      return_date: params.return_date,
    });

    const searchedAt = new Date().toISOString();
    let response: AxiosResponse<unknown>;
    try {
      response = await this.http.get<unknown>(SERPAPI_SEARCH_URL, {
        params,
        timeout: this.timeoutMs,
        signal,
        // Every status is classified below.
        validateStatus: () => true,
      });
    } catch (err) {
      if (axios.isCancel(err)) {
        this.log.debug('SerpAPI request cancelled by the caller');
        throw new NetworkError('SerpAPI request cancelled', 'ERR_CANCELED');
      }
      if (axios.isAxiosError(err)) {
        this.log.warn('❌ SerpAPI transport failure', { code: err.code, message: err.message });
        throw new NetworkError(`SerpAPI request failed: ${err.message}`, err.code);
      }
      throw err;
    }

    return this.parseResponse(response, searchedAt);
  }

  private parseResponse(response: AxiosResponse<unknown>, searchedAt: string): SearchResult {
    const { status, data } = response;
    const message = providerMessage(data);

    if (status === 401 || status === 403) {
      this.log.debug('SerpAPI rejected the API key', { status, message });
      throw new AuthError(`SerpAPI authentication failed (${status})${message ? `: ${message}` : ''}`, status);
    }

    if (status < 200 || status >= 300) {
      this.log.warn('❌ SerpAPI returned an error status', { status, message });
      throw new ProviderError(`SerpAPI error ${status}${message ? `: ${message}` : ''}`, status, message);
    }

    const parsed = serpApiResponseSchema.safeParse(data);
    if (!parsed.success) {
      const details = parsed.error.errors
        .slice(0, 5)
        .map((e) => `${e.path.join('.') || 'root'}: ${e.message}`)
        .join('; ');
      this.log.warn('❌ SerpAPI response failed validation', { details });
      throw new ProviderError(`Malformed SerpAPI response: ${details}`, status);
    }

    const body = parsed.data;
    if (body.error) {
      if (NO_RESULTS_PATTERN.test(body.error)) {
        this.log.info('✈️ No flights found');
        return { offers: [], rawProviderPayload: data, searchedAt };
      }
      this.log.warn('❌ SerpAPI reported an error', { message: body.error });
      throw new ProviderError(`SerpAPI error: ${body.error}`, status, body.error);
    }

    const offers: ProviderOffer[] = [
      ...(body.best_flights ?? []).map((offer): ProviderOffer => ({ category: 'best', offer })),
      ...(body.other_flights ?? []).map((offer): ProviderOffer => ({ category: 'other', offer })),
    ];
    this.log.info(`✈️ Found ${offers.length} flights`);

    return { offers, rawProviderPayload: data, searchedAt };
  }
}
