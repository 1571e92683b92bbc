// src/services/providers/flights/flight-provider.ts
// Contract between the search service and the outbound flight data provider.
import type { OfferCategory, SearchRequest } from '@/types/flights';
import type { SerpApiOffer } from './serpapi-schema';

export interface ProviderOffer {
  category: OfferCategory;
  offer: SerpApiOffer;
}

export interface SearchResult {
  /** Schema-validated offers in provider order: best flights first, then the rest. */
  offers: ProviderOffer[];
  rawProviderPayload: unknown;
  /** ISO timestamp of the outbound call. */
  searchedAt: string;
}

export interface FlightProvider {
  readonly name: string;
  /**
   * Performs exactly one outbound call for the request.
   * Rejects with AuthError, ProviderError or NetworkError; never retries.
   * An aborted signal cancels the call with NetworkError.
   */
  search(request: SearchRequest, apiKey: string, signal?: AbortSignal): Promise<SearchResult>;
}
