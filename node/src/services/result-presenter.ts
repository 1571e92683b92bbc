// src/services/result-presenter.ts
// Maps provider offers into the display-ready FlightOption list.
import type { ProviderOffer, SearchResult } from '@/services/providers/flights/flight-provider';
import type { SerpApiLayover, SerpApiLeg } from '@/services/providers/flights/serpapi-schema';
import {
  UNKNOWN,
  type FlightLeg,
  type FlightOption,
  type Layover,
  type Reported,
  type ResultOrdering,
} from '@/types/flights';

export interface PresentOptions {
  /** `provider` keeps the provider's ranking; `price` is a stable ascending-price sort. */
  ordering?: ResultOrdering;
  currency?: string;
}

function reported(value: number | undefined): Reported<number> {
  return value === undefined ? UNKNOWN : value;
}

function presentLeg(leg: SerpApiLeg): FlightLeg {
  return {
    departure: {
      name: leg.departure_airport.name ?? leg.departure_airport.id,
      code: leg.departure_airport.id,
      time: leg.departure_airport.time ?? '',
    },
    arrival: {
      name: leg.arrival_airport.name ?? leg.arrival_airport.id,
      code: leg.arrival_airport.id,
      time: leg.arrival_airport.time ?? '',
    },
    durationMinutes: reported(leg.duration),
    airline: leg.airline ?? 'Flight',
    airlineLogo: leg.airline_logo,
    flightNumber: leg.flight_number ?? '',
    airplane: leg.airplane,
    travelClass: leg.travel_class,
    legroom: leg.legroom,
    extensions: leg.extensions ?? [],
    overnight: leg.overnight ?? false,
    oftenDelayed: leg.often_delayed_by_over_30_min ?? false,
  };
}

function presentLayover(layover: SerpApiLayover): Layover {
  return {
    airportName: layover.name ?? layover.id ?? 'Unknown airport',
    airportCode: layover.id ?? '',
    durationMinutes: reported(layover.duration),
    overnight: layover.overnight ?? false,
  };
}

function presentOffer({ category, offer }: ProviderOffer, currency: string): Omit<FlightOption, 'rank'> {
  const legs = offer.flights.map(presentLeg);
  const [first] = legs;
  return {
    category,
    price: { amount: offer.price, currency },
    durationMinutes: reported(offer.total_duration),
    legs,
    stops: (offer.layovers ?? []).map(presentLayover),
    carbonEmissionsGrams: reported(offer.carbon_emissions?.this_flight),
    airline: first.airline,
    flightNumber: first.flightNumber,
    airlineLogo: offer.airline_logo ?? first.airlineLogo,
    bookingToken: offer.booking_token ?? offer.departure_token,
  };
}

/** Pure transformation; the SearchResult is left untouched. */
export function present(result: SearchResult, options: PresentOptions = {}): FlightOption[] {
  const currency = options.currency ?? 'USD';
  const presented = result.offers.map((offer) => presentOffer(offer, currency));

  // Array.prototype.sort is stable, so equal prices keep provider order.
  const ordered = options.ordering === 'price'
    ? [...presented].sort((a, b) => a.price.amount - b.price.amount)
    : presented;

  return ordered.map((option, i) => ({ rank: i + 1, ...option }));
}
