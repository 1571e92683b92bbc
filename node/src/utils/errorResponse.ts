/**
 * Response envelopes shared by every endpoint.
 * Errors carry the user-facing message; diagnostics stay in the logs.
 */
import { FlightSearchError } from '@/types/errors';

export interface FieldError {
  path: string;
  message: string;
}

export interface ErrorResponse {
  success: false;
  message: string;
  errors?: FieldError[];
  code?: string;
}

export interface SuccessResponse<T> {
  success: true;
  data: T;
}

export function createErrorResponse(message: string, errors?: FieldError[], code?: string): ErrorResponse {
  return {
    success: false,
    message,
    ...(errors && errors.length > 0 ? { errors } : {}),
    ...(code ? { code } : {}),
  };
}

export function createSuccessResponse<T>(data: T): SuccessResponse<T> {
  return {
    success: true,
    data,
  };
}

/** Maps any thrown value to an HTTP status and envelope. Unknown errors become a generic 500. */
export function toErrorResponse(err: unknown): { status: number; body: ErrorResponse } {
  if (err instanceof FlightSearchError) {
    return {
      status: err.httpStatus,
      body: createErrorResponse(err.userMessage, undefined, err.code),
    };
  }
  return {
    status: 500,
    body: createErrorResponse('Internal Server Error', undefined, 'INTERNAL_ERROR'),
  };
}
