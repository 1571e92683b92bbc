// Domain types shared by the query builder, the provider adapter and the presenter.

export type CityName = string;
export type AirportCode = string;
/** Calendar date, `YYYY-MM-DD`. */
export type CalendarDate = string;

/** Marks a value the provider did not report, as opposed to a reported zero. */
export const UNKNOWN = 'unknown' as const;
export type Unknown = typeof UNKNOWN;
export type Reported<T> = T | Unknown;

export function isKnown<T>(value: Reported<T>): value is T {
  return value !== UNKNOWN;
}

export interface SearchRequest {
  originCity: CityName;
  destinationCity: CityName;
  originCodes: ReadonlySet<AirportCode>;
  destinationCodes: ReadonlySet<AirportCode>;
  outboundDate: CalendarDate;
  returnDate?: CalendarDate;
}

export interface Money {
  amount: number;
  currency: string;
}

export interface AirportStop {
  name: string;
  code: AirportCode;
  /** Local time as reported by the provider, e.g. "2025-06-01 10:35". */
  time: string;
}

export interface FlightLeg {
  departure: AirportStop;
  arrival: AirportStop;
  durationMinutes: Reported<number>;
  airline: string;
  airlineLogo?: string;
  flightNumber: string;
  airplane?: string;
  travelClass?: string;
  legroom?: string;
  extensions: string[];
  overnight: boolean;
  oftenDelayed: boolean;
}

export interface Layover {
  airportName: string;
  airportCode: AirportCode;
  durationMinutes: Reported<number>;
  overnight: boolean;
}

export type OfferCategory = 'best' | 'other';

export interface FlightOption {
  /** 1-based position in the presented list. */
  rank: number;
  category: OfferCategory;
  price: Money;
  durationMinutes: Reported<number>;
  legs: FlightLeg[];
  stops: Layover[];
  carbonEmissionsGrams: Reported<number>;
  airline: string;
  flightNumber: string;
  airlineLogo?: string;
  bookingToken?: string;
}

export type ResultOrdering = 'provider' | 'price';
