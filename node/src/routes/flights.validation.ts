import { z } from 'zod';
import type { FieldError } from '@/utils/errorResponse';

// Request body for POST /api/flights/search. Calendar rules live in the query builder.
export const flightSearchRequestSchema = z.object({
  originCity: z.string().trim().min(1, 'Departure city is required'),
  destinationCity: z.string().trim().min(1, 'Arrival city is required'),
  outboundDate: z.string().trim().min(1, 'Outbound date is required'),
  // Date inputs left blank arrive as "" or null; both mean one-way.
  returnDate: z
    .union([z.string().trim(), z.null()])
    .optional()
    .transform((value) => (value ? value : undefined)),
});

export type FlightSearchRequestBody = z.infer<typeof flightSearchRequestSchema>;

export function validateFlightSearchRequest(data: unknown):
  | { success: true; data: FlightSearchRequestBody }
  | { success: false; error: FieldError[] } {
  const result = flightSearchRequestSchema.safeParse(data);

  if (!result.success) {
    return {
      success: false,
      error: result.error.errors.map((e) => ({
        path: e.path.join('.') || 'root',
        message: e.message,
      })),
    };
  }

  return { success: true, data: result.data };
}
