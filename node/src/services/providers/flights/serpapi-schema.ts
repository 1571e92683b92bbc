// Schema of the SerpAPI Google Flights response, limited to the fields the app reads.
// Objects are passthrough: fields we don't map survive in rawProviderPayload and the parsed offer.
import { z } from 'zod';

/** Numbers sometimes arrive as numeric strings ("200"). */
const numeric = z.union([
  z.number().finite(),
  z
    .string()
    .regex(/^\s*-?\d+(\.\d+)?\s*$/, 'expected a number')
    .transform((s) => Number(s)),
]);

const airportSchema = z
  .object({
    id: z.string().min(1),
    name: z.string().optional(),
    time: z.string().optional(),
  })
  .passthrough();

export const serpApiLegSchema = z
  .object({
    departure_airport: airportSchema,
    arrival_airport: airportSchema,
    duration: numeric.optional(),
    airplane: z.string().optional(),
    airline: z.string().optional(),
    airline_logo: z.string().optional(),
    travel_class: z.string().optional(),
    flight_number: z.string().optional(),
    legroom: z.string().optional(),
    extensions: z.array(z.string()).optional(),
    overnight: z.boolean().optional(),
    often_delayed_by_over_30_min: z.boolean().optional(),
  })
  .passthrough();

export const serpApiLayoverSchema = z
  .object({
    duration: numeric.optional(),
    name: z.string().optional(),
    id: z.string().optional(),
    overnight: z.boolean().optional(),
  })
  .passthrough();

export const serpApiOfferSchema = z
  .object({
    flights: z.array(serpApiLegSchema).min(1, 'offer has no flight legs'),
    layovers: z.array(serpApiLayoverSchema).optional(),
    total_duration: numeric.optional(),
    carbon_emissions: z
      .object({
        this_flight: numeric.optional(),
        typical_for_this_route: numeric.optional(),
        difference_percent: numeric.optional(),
      })
      .passthrough()
      .optional(),
    price: numeric,
    type: z.string().optional(),
    airline_logo: z.string().optional(),
    departure_token: z.string().optional(),
    booking_token: z.string().optional(),
  })
  .passthrough();

export const serpApiResponseSchema = z
  .object({
    search_metadata: z
      .object({
        id: z.string().optional(),
        status: z.string().optional(),
      })
      .passthrough()
      .optional(),
    error: z.string().optional(),
    best_flights: z.array(serpApiOfferSchema).optional(),
    other_flights: z.array(serpApiOfferSchema).optional(),
  })
  .passthrough();

export type SerpApiLeg = z.infer<typeof serpApiLegSchema>;
export type SerpApiLayover = z.infer<typeof serpApiLayoverSchema>;
export type SerpApiOffer = z.infer<typeof serpApiOfferSchema>;
