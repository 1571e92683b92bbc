// Display text for a flight option: a collapsible title plus detail sections.

import { isKnown, type FlightLeg, type FlightOption, type Money, type Reported } from '@/types/flights';

export interface FlightSummary {
  rank: number;
  title: string;
  logo?: string;
  overview: string[];
  legs: string[][];
  layovers: string[];
}

export function formatPrice(price: Money): string {
  return price.currency === 'USD' ? `$${price.amount}` : `${price.amount} ${price.currency}`;
}

function minutes(value: Reported<number>): string {
  return isKnown(value) ? `${value} minutes` : 'unknown';
}

function orNA(value: string | undefined): string {
  return value && value.trim() ? value : 'N/A';
}

function legLines(leg: FlightLeg): string[] {
  const lines = [
    `Flight Number: ${orNA(leg.flightNumber)}`,
    `Airline: ${orNA(leg.airline)}`,
    `Departure: ${leg.departure.name} (${leg.departure.code}), Time: ${orNA(leg.departure.time)}`,
    `Arrival: ${leg.arrival.name} (${leg.arrival.code}), Time: ${orNA(leg.arrival.time)}`,
    `Duration: ${minutes(leg.durationMinutes)}`,
    `Airplane: ${orNA(leg.airplane)}`,
    `Class: ${orNA(leg.travelClass)}`,
    `Legroom: ${orNA(leg.legroom)}`,
  ];
  if (leg.overnight) lines.push('Overnight flight');
  if (leg.oftenDelayed) lines.push('Often delayed by over 30 min');
  if (leg.extensions.length > 0) {
    lines.push('Extensions:', ...leg.extensions.map((ext) => `- ${ext}`));
  }
  return lines;
}

export function summarizeFlight(option: FlightOption): FlightSummary {
  const emissions = isKnown(option.carbonEmissionsGrams) ? `${option.carbonEmissionsGrams}g` : 'unknown';

  return {
    rank: option.rank,
    title: `Flight Option ${formatPrice(option.price)}: ${option.airline} ${option.flightNumber}`.trimEnd(),
    logo: option.airlineLogo,
    overview: [
      `Total Duration: ${minutes(option.durationMinutes)}`,
      `Carbon Emissions: ${emissions}`,
      `Stops: ${option.stops.length === 0 ? 'nonstop' : option.stops.length}`,
    ],
    legs: option.legs.map(legLines),
    layovers: option.stops.map(
      (stop) => `${stop.airportName} for ${minutes(stop.durationMinutes)}${stop.overnight ? ' (overnight)' : ''}`,
    ),
  };
}
