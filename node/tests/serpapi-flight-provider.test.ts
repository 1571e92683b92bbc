import { Logger, type ILogObj } from 'tslog';
import { describe, expect, it, vi } from 'vitest';
import {
  SERPAPI_SEARCH_URL,
  SerpApiFlightProvider,
  toSerpApiParams,
} from '@/services/providers/flights/serpapi-flight-provider';
import { AuthError, NetworkError, ProviderError } from '@/types/errors';
import { TEST_API_KEY, loadFixture, parisTokyoRequest, stubHttp, transportError } from './helpers';

describe('toSerpApiParams', () => {
  it('encodes a round trip with joined airport codes', () => {
    expect(toSerpApiParams(parisTokyoRequest(), TEST_API_KEY)).toEqual({
      engine: 'google_flights',
      departure_id: 'CDG,ORY',
      arrival_id: 'NRT,HND',
      outbound_date: '2025-06-01',
      return_date: '2025-06-10',
      type: '1',
      currency: 'USD',
      hl: 'en',
      api_key: TEST_API_KEY,
    });
  });

  it('marks one-way searches and omits return_date', () => {
    const params = toSerpApiParams(parisTokyoRequest({ returnDate: undefined }), TEST_API_KEY, {
      currency: 'EUR',
      language: 'fr',
    });

    expect(params.type).toBe('2');
    expect(params).not.toHaveProperty('return_date');
    expect(params.currency).toBe('EUR');
    expect(params.hl).toBe('fr');
  });
});

describe('SerpApiFlightProvider.search', () => {
  it('issues exactly one GET and returns offers in provider order', async () => {
    const payload = loadFixture('google-flights-round-trip.json');
    const { http, calls } = stubHttp(() => ({ status: 200, data: payload }));
    const provider = new SerpApiFlightProvider({ http });

    const result = await provider.search(parisTokyoRequest(), TEST_API_KEY);

    expect(calls).toHaveLength(1);
    expect(calls[0].method).toBe('get');
    expect(calls[0].url).toBe(SERPAPI_SEARCH_URL);
    expect(calls[0].timeout).toBe(30000);
    expect(calls[0].params).toMatchObject({ departure_id: 'CDG,ORY', arrival_id: 'NRT,HND', type: '1' });
    expect(result.offers.map((o) => o.category)).toEqual(['best', 'best', 'other']);
    expect(result.offers.map((o) => o.offer.price)).toEqual([1234, 980, 980]);
    expect(result.rawProviderPayload).toEqual(payload);
  });

  it('applies the configured timeout', async () => {
    const { http, calls } = stubHttp(() => ({ status: 200, data: { best_flights: [] } }));
    await new SerpApiFlightProvider({ http, timeoutMs: 5000 }).search(parisTokyoRequest(), TEST_API_KEY);
    expect(calls[0].timeout).toBe(5000);
  });

  it('returns an empty result when the provider lists no flights', async () => {
    const { http } = stubHttp(() => ({ status: 200, data: { search_metadata: { status: 'Success' }, best_flights: [] } }));

    const result = await new SerpApiFlightProvider({ http }).search(parisTokyoRequest(), TEST_API_KEY);

    expect(result.offers).toEqual([]);
  });

  it('treats the "no results" error body as an empty result', async () => {
    const { http } = stubHttp(() => ({
      status: 200,
      data: { error: "Google Flights hasn't returned any results for this query." },
    }));

    const result = await new SerpApiFlightProvider({ http }).search(parisTokyoRequest(), TEST_API_KEY);

    expect(result.offers).toEqual([]);
  });

  it('accepts numeric strings for price and durations', async () => {
    const { http } = stubHttp(() => ({
      status: 200,
      data: {
        best_flights: [
          {
            flights: [
              {
                departure_airport: { id: 'CDG', name: 'Paris CDG', time: '08:00' },
                arrival_airport: { id: 'NRT', name: 'Narita', time: '12:00' },
                duration: '240',
              },
            ],
            price: '200',
            total_duration: '240',
          },
        ],
      },
    }));

    const result = await new SerpApiFlightProvider({ http }).search(parisTokyoRequest(), TEST_API_KEY);

    expect(result.offers[0].offer.price).toBe(200);
    expect(result.offers[0].offer.total_duration).toBe(240);
  });

  it('fails with AuthError on 401 without retrying', async () => {
    const { http, calls } = stubHttp(() => ({ status: 401, data: { error: 'Invalid API key.' } }));

    const search = new SerpApiFlightProvider({ http }).search(parisTokyoRequest(), 'wrong-key');

    await expect(search).rejects.toBeInstanceOf(AuthError);
    await expect(search).rejects.toThrow('SerpAPI authentication failed (401): Invalid API key.');
    expect(calls).toHaveLength(1);
  });

  it('leaves the error-level auth log to the search service', async () => {
    const parent = new Logger<ILogObj>({ minLevel: 6 });
    const child = new Logger<ILogObj>({ minLevel: 6 });
    vi.spyOn(parent, 'getSubLogger').mockReturnValue(child);
    const errorSpy = vi.spyOn(child, 'error');
    const debugSpy = vi.spyOn(child, 'debug');
    const { http } = stubHttp(() => ({ status: 401, data: { error: 'Invalid API key.' } }));

    await expect(
      new SerpApiFlightProvider({ http, logger: parent }).search(parisTokyoRequest(), 'wrong-key'),
    ).rejects.toBeInstanceOf(AuthError);

    expect(errorSpy).not.toHaveBeenCalled();
    expect(debugSpy).toHaveBeenCalledWith('SerpAPI rejected the API key', { status: 401, message: 'Invalid API key.' });
  });

  it('fails with AuthError before any call when the key is blank', async () => {
    const { http, calls } = stubHttp(() => ({ status: 200, data: {} }));

    await expect(new SerpApiFlightProvider({ http }).search(parisTokyoRequest(), '  ')).rejects.toBeInstanceOf(
      AuthError,
    );
    expect(calls).toHaveLength(0);
  });

  it('fails with ProviderError carrying the status and message on other HTTP errors', async () => {
    const { http, calls } = stubHttp(() => ({ status: 500, data: { error: 'Internal provider failure' } }));

    const search = new SerpApiFlightProvider({ http }).search(parisTokyoRequest(), TEST_API_KEY);

    await expect(search).rejects.toMatchObject({
      code: 'PROVIDER_ERROR',
      providerStatus: 500,
      providerMessage: 'Internal provider failure',
    });
    expect(calls).toHaveLength(1);
  });

  it('fails with ProviderError when a 200 body reports another error', async () => {
    const { http } = stubHttp(() => ({ status: 200, data: { error: 'Missing departure_id parameter.' } }));

    await expect(new SerpApiFlightProvider({ http }).search(parisTokyoRequest(), TEST_API_KEY)).rejects.toThrow(
      'SerpAPI error: Missing departure_id parameter.',
    );
  });

  it('fails with ProviderError when an offer has no price', async () => {
    const { http } = stubHttp(() => ({
      status: 200,
      data: {
        best_flights: [
          {
            flights: [{ departure_airport: { id: 'CDG' }, arrival_airport: { id: 'NRT' } }],
          },
        ],
      },
    }));

    await expect(
      new SerpApiFlightProvider({ http }).search(parisTokyoRequest(), TEST_API_KEY),
    ).rejects.toBeInstanceOf(ProviderError);
  });

  it('fails with ProviderError when an offer has no legs', async () => {
    const { http } = stubHttp(() => ({ status: 200, data: { other_flights: [{ flights: [], price: 300 }] } }));

    await expect(new SerpApiFlightProvider({ http }).search(parisTokyoRequest(), TEST_API_KEY)).rejects.toThrow(
      'Malformed SerpAPI response: other_flights.0.flights: offer has no flight legs',
    );
  });

  it('fails with ProviderError when the body is not JSON', async () => {
    const { http } = stubHttp(() => ({ status: 200, data: '<html>gateway</html>' }));

    await expect(
      new SerpApiFlightProvider({ http }).search(parisTokyoRequest(), TEST_API_KEY),
    ).rejects.toBeInstanceOf(ProviderError);
  });

  it.each([
    ['ECONNABORTED', 'timeout of 30000ms exceeded'],
    ['ENOTFOUND', 'getaddrinfo ENOTFOUND serpapi.com'],
    ['ECONNREFUSED', 'connect ECONNREFUSED 127.0.0.1:443'],
  ])('fails with NetworkError on %s', async (code, message) => {
    const { http, calls } = stubHttp((config) => {
      throw transportError(config, code, message);
    });

    const search = new SerpApiFlightProvider({ http }).search(parisTokyoRequest(), TEST_API_KEY);

    await expect(search).rejects.toBeInstanceOf(NetworkError);
    await expect(search).rejects.toMatchObject({ transportCode: code });
    expect(calls).toHaveLength(1);
  });

  it('cancels the call when the caller aborts', async () => {
    const { http, calls } = stubHttp(() => ({ status: 200, data: {} }));
    const abandon = new AbortController();
    abandon.abort();

    const search = new SerpApiFlightProvider({ http }).search(parisTokyoRequest(), TEST_API_KEY, abandon.signal);

    await expect(search).rejects.toBeInstanceOf(NetworkError);
    await expect(search).rejects.toMatchObject({ transportCode: 'ERR_CANCELED' });
    expect(calls).toHaveLength(0);
  });
});
