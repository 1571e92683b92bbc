/**
 * Error taxonomy for the flight search pipeline.
 *
 * Each error carries a stable `code`, the HTTP status the API answers with and
 * the message shown to the user. `message` keeps the diagnostic detail for logs.
 */

export type FlightSearchErrorCode =
  | 'CONFIG_ERROR'
  | 'UNKNOWN_CITY'
  | 'INVALID_ROUTE'
  | 'INVALID_DATE'
  | 'AUTH_ERROR'
  | 'PROVIDER_ERROR'
  | 'NETWORK_ERROR'
  | 'SEARCH_BUSY';

export abstract class FlightSearchError extends Error {
  abstract readonly code: FlightSearchErrorCode;
  abstract readonly httpStatus: number;

  constructor(message: string, readonly userMessage: string = message) {
    super(message);
    this.name = new.target.name;
  }
}

/** Startup-time failure: the process must not serve searches. */
export class ConfigError extends FlightSearchError {
  readonly code = 'CONFIG_ERROR';
  readonly httpStatus = 500;
}

// Validation errors: raised by the query builder, never reach the provider.

export class UnknownCityError extends FlightSearchError {
  readonly code = 'UNKNOWN_CITY';
  readonly httpStatus = 400;

  constructor(readonly city: string) {
    super(`Unknown city: "${city}"`, `We don't know any airports for "${city}". Please pick a city from the list.`);
  }
}

export class InvalidRouteError extends FlightSearchError {
  readonly code = 'INVALID_ROUTE';
  readonly httpStatus = 400;

  constructor(readonly originCity: string, readonly destinationCity: string) {
    super(
      `Origin "${originCity}" and destination "${destinationCity}" resolve to the same airports`,
      'Departure and arrival cities must be different.',
    );
  }
}

export class InvalidDateError extends FlightSearchError {
  readonly code = 'INVALID_DATE';
  readonly httpStatus = 400;

  constructor(readonly field: 'outboundDate' | 'returnDate', message: string) {
    super(`${field}: ${message}`, message);
  }
}

// Provider errors: raised by the search client adapter.

export class AuthError extends FlightSearchError {
  readonly code = 'AUTH_ERROR';
  readonly httpStatus = 503;

  constructor(message: string, readonly providerStatus?: number) {
    super(message, 'Flight search service unavailable.');
  }
}

export class ProviderError extends FlightSearchError {
  readonly code = 'PROVIDER_ERROR';
  readonly httpStatus = 502;

  constructor(message: string, readonly providerStatus?: number, readonly providerMessage?: string) {
    super(message, 'Flight search failed, please try again.');
  }
}

export class NetworkError extends FlightSearchError {
  readonly code = 'NETWORK_ERROR';
  readonly httpStatus = 504;

  constructor(message: string, readonly transportCode?: string) {
    super(message, 'Connection problem while contacting the flight search service.');
  }
}

export class SearchBusyError extends FlightSearchError {
  readonly code = 'SEARCH_BUSY';
  readonly httpStatus = 429;

  constructor(readonly queueSize: number) {
    super(
      `Search queue is full (${queueSize} waiting)`,
      'Another search is in progress. Please wait for it to finish.',
    );
  }
}

export type ValidationError = UnknownCityError | InvalidRouteError | InvalidDateError;

export function isValidationError(err: unknown): err is ValidationError {
  return err instanceof UnknownCityError || err instanceof InvalidRouteError || err instanceof InvalidDateError;
}
