// Shared fixtures and in-process stand-ins for the test suite.
import fs from 'fs';
import path from 'path';
import axios, { AxiosError, type AxiosInstance, type InternalAxiosRequestConfig } from 'axios';
import { AirportDirectory } from '@/services/providers/flights/airport-directory';
import type { ProviderOffer, SearchResult } from '@/services/providers/flights/flight-provider';
import { serpApiResponseSchema } from '@/services/providers/flights/serpapi-schema';
import type { SearchRequest } from '@/types/flights';

export const TEST_API_KEY = 'test-secret';

/** 2025-05-15 local time; every "today" check in the suite is relative to this. */
export const fixedClock = () => new Date(2025, 4, 15, 9, 30);

export function loadFixture(name: string): unknown {
  const text = fs.readFileSync(path.join(process.cwd(), 'node/tests/fixtures', name), 'utf8');
  return JSON.parse(text);
}

export function testDirectory(): AirportDirectory {
  return AirportDirectory.fromJson({
    Paris: ['CDG', 'ORY'],
    Tokyo: ['NRT', 'HND'],
    Austin: 'AUS',
    Beijing: ['PEK'],
  });
}

export function parisTokyoRequest(overrides: Partial<SearchRequest> = {}): SearchRequest {
  return {
    originCity: 'Paris',
    destinationCity: 'Tokyo',
    originCodes: new Set(['CDG', 'ORY']),
    destinationCodes: new Set(['NRT', 'HND']),
    outboundDate: '2025-06-01',
    returnDate: '2025-06-10',
    ...overrides,
  };
}

/** Builds a SearchResult the way the provider does, without a network call. */
export function searchResultFrom(payload: unknown): SearchResult {
  const body = serpApiResponseSchema.parse(payload);
  const offers: ProviderOffer[] = [
    ...(body.best_flights ?? []).map((offer): ProviderOffer => ({ category: 'best', offer })),
    ...(body.other_flights ?? []).map((offer): ProviderOffer => ({ category: 'other', offer })),
  ];
  return { offers, rawProviderPayload: payload, searchedAt: '2025-05-15T09:30:00.000Z' };
}

export interface StubReply {
  status: number;
  data: unknown;
}

/**
 * axios instance whose adapter answers in-process. `reply` may throw an AxiosError
 * (see transportError) to simulate a failure below HTTP.
 */
export function stubHttp(reply: (config: InternalAxiosRequestConfig) => StubReply): {
  http: AxiosInstance;
  calls: InternalAxiosRequestConfig[];
} {
  const calls: InternalAxiosRequestConfig[] = [];
  const http = axios.create({
    adapter: async (config) => {
      calls.push(config);
      const { status, data } = reply(config);
      return { data, status, statusText: String(status), headers: {}, config };
    },
  });
  return { http, calls };
}

export function transportError(config: InternalAxiosRequestConfig, code: string, message: string): AxiosError {
  return new AxiosError(message, code, config);
}

export function deferred<T>() {
  let resolve: (value: T) => void = () => {};
  const promise = new Promise<T>((res) => {
    resolve = res;
  });
  return { promise, resolve: (value: T) => resolve(value) };
}
