// src/services/flight-query.ts
// Turns the four user selections into a validated SearchRequest.
import { format, isBefore, isValid, parse, startOfDay } from 'date-fns';
import type { AirportDirectory } from '@/services/providers/flights/airport-directory';
import { InvalidDateError, InvalidRouteError, UnknownCityError } from '@/types/errors';
import type { AirportCode, CalendarDate, CityName, SearchRequest } from '@/types/flights';

const DATE_FORMAT = 'yyyy-MM-dd';
const DATE_PATTERN = /^\d{4}-\d{2}-\d{2}$/;

export interface FlightQueryInput {
  originCity: CityName;
  destinationCity: CityName;
  outboundDate: CalendarDate | Date;
  returnDate?: CalendarDate | Date;
}

export type Clock = () => Date;

function sameCodes(a: ReadonlySet<AirportCode>, b: ReadonlySet<AirportCode>): boolean {
  if (a.size !== b.size) return false;
  for (const code of a) {
    if (!b.has(code)) return false;
  }
  return true;
}

/** Parses a `YYYY-MM-DD` string (or a Date) into a local-midnight Date, rejecting impossible dates. */
function toCalendarDay(value: CalendarDate | Date, field: 'outboundDate' | 'returnDate'): Date {
  if (value instanceof Date) {
    if (!isValid(value)) {
      throw new InvalidDateError(field, `${field} is not a valid date`);
    }
    return startOfDay(value);
  }

  const trimmed = value.trim();
  if (!DATE_PATTERN.test(trimmed)) {
    throw new InvalidDateError(field, `${field} must use the YYYY-MM-DD format, got "${value}"`);
  }
  const day = parse(trimmed, DATE_FORMAT, new Date(0));
  if (!isValid(day) || format(day, DATE_FORMAT) !== trimmed) {
    throw new InvalidDateError(field, `${trimmed} is not a real calendar date`);
  }
  return day;
}

export class FlightQueryBuilder {
  constructor(
    private readonly directory: AirportDirectory,
    private readonly clock: Clock = () => new Date(),
  ) {}

  /**
   * Validates the selections and resolves cities to airport codes.
   * @throws UnknownCityError when a city has no airports in the directory
   * @throws InvalidRouteError when both cities resolve to the same airports
   * @throws InvalidDateError for impossible, past or inverted dates
   */
  build(input: FlightQueryInput): SearchRequest {
    const originCity = input.originCity.trim();
    const destinationCity = input.destinationCity.trim();

    const originCodes = this.directory.lookup(originCity);
    if (originCodes.size === 0) throw new UnknownCityError(originCity);

    const destinationCodes = this.directory.lookup(destinationCity);
    if (destinationCodes.size === 0) throw new UnknownCityError(destinationCity);

    if (sameCodes(originCodes, destinationCodes)) {
      throw new InvalidRouteError(originCity, destinationCity);
    }

    const today = startOfDay(this.clock());
    const outbound = toCalendarDay(input.outboundDate, 'outboundDate');
    if (isBefore(outbound, today)) {
      throw new InvalidDateError('outboundDate', `Outbound date ${format(outbound, DATE_FORMAT)} is in the past`);
    }

    const request: SearchRequest = {
      originCity,
      destinationCity,
      originCodes,
      destinationCodes,
      outboundDate: format(outbound, DATE_FORMAT),
    };

    if (input.returnDate !== undefined) {
      const back = toCalendarDay(input.returnDate, 'returnDate');
      if (isBefore(back, outbound)) {
        throw new InvalidDateError(
          'returnDate',
          `Return date ${format(back, DATE_FORMAT)} is before outbound date ${request.outboundDate}`,
        );
      }
      request.returnDate = format(back, DATE_FORMAT);
    }

    return request;
  }
}
