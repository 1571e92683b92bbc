/** App configuration, read once from the environment at startup. */
import { z } from 'zod';
import { ConfigError } from '@/types/errors';

const envSchema = z.object({
  SERPAPI_API_KEY: z
    .string({ required_error: 'SERPAPI_API_KEY is required' })
    .trim()
    .min(1, 'SERPAPI_API_KEY must not be empty'),
  AIRPORTS_FILE: z.string().trim().min(1).default('data/cities_airports.json'),
  PORT: z.coerce.number().int().min(0).max(65535).default(4000),
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  SEARCH_TIMEOUT_MS: z.coerce.number().int().positive().default(30_000),
  SEARCH_CURRENCY: z.string().trim().length(3).toUpperCase().default('USD'),
  SEARCH_LANGUAGE: z.string().trim().min(2).default('en'),
  RESULT_ORDERING: z.enum(['provider', 'price']).default('provider'),
  SEARCH_QUEUE_SIZE: z.coerce.number().int().min(0).default(10),
  CORS_ORIGIN: z.string().optional(),
});

export interface AppConfig {
  port: number;
  nodeEnv: 'development' | 'production' | 'test';
  serpApiKey: string;
  airportsFile: string;
  search: {
    timeoutMs: number;
    currency: string;
    language: string;
    ordering: 'provider' | 'price';
    maxQueueSize: number;
  };
  corsOrigins: string[];
}

/**
 * Validates the environment and builds the app configuration.
 * @throws ConfigError listing every invalid or missing variable
 */
export function loadAppConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const result = envSchema.safeParse(env);

  if (!result.success) {
    const details = result.error.errors
      .map((e) => `${e.path.join('.') || 'env'}: ${e.message}`)
      .join('; ');
    throw new ConfigError(`Invalid configuration: ${details}`);
  }

  const vars = result.data;
  return {
    port: vars.PORT,
    nodeEnv: vars.NODE_ENV,
    serpApiKey: vars.SERPAPI_API_KEY,
    airportsFile: vars.AIRPORTS_FILE,
    search: {
      timeoutMs: vars.SEARCH_TIMEOUT_MS,
      currency: vars.SEARCH_CURRENCY,
      language: vars.SEARCH_LANGUAGE,
      ordering: vars.RESULT_ORDERING,
      maxQueueSize: vars.SEARCH_QUEUE_SIZE,
    },
    corsOrigins: vars.CORS_ORIGIN
      ? vars.CORS_ORIGIN.split(',').map((o) => o.trim()).filter(Boolean)
      : ['http://localhost:3000'],
  };
}
