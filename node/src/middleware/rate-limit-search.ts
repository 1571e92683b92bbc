// node/src/middleware/rate-limit-search.ts — search endpoint rate limiter
import rateLimit from 'express-rate-limit';
import { createErrorResponse } from '@/utils/errorResponse';

export const searchRateLimiter = rateLimit({
  windowMs: 60 * 1000, // 1 minute
  limit: 30, // each search costs one provider call
  standardHeaders: true,
  legacyHeaders: false,
  message: createErrorResponse('Too many searches, please slow down.', undefined, 'RATE_LIMITED'),
});
