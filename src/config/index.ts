import { z } from 'zod';
import dotenv from 'dotenv';
import { getOptionalSecret } from '../utils/secrets.js';
import logger from '../utils/logger.js';

dotenv.config();

// z.coerce.boolean() treats the string 'false' as true
const envBoolean = (fallback: boolean) =>
  z.preprocess(
    (value) => (typeof value === 'string' ? value.trim().toLowerCase() === 'true' : value),
    z.boolean().default(fallback)
  );

const configSchema = z.object({
  port: z.coerce.number().int().positive().default(3010),
  nodeEnv: z.enum(['development', 'production', 'test']).default('development'),

  dataset: z.object({
    path: z.string().min(1).default('data/road_segment_traffic_clusters.csv'),
  }),

  google: z.object({
    apiKey: z.string().optional(),
    model: z.string().default('gemini-2.0-flash'),
    enabled: envBoolean(true),
    timeoutMs: z.coerce.number().int().positive().default(10000),
  }),

  query: z.object({
    topK: z.coerce.number().int().positive().default(5),
    maxRows: z.coerce.number().int().positive().default(10),
  }),

  rateLimit: z.object({
    windowMs: z.coerce.number().default(60000),
    maxRequests: z.coerce.number().default(40),
  }),

  cors: z.object({
    origin: z.string().default('http://localhost:3000'),
  }),
});

export type Config = z.infer<typeof configSchema>;

export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  const rawConfig = {
    port: env.PORT,
    nodeEnv: env.NODE_ENV,

    dataset: {
      path: env.DATASET_PATH,
    },

    google: {
      apiKey: getOptionalSecret('google_api_key') || env.GOOGLE_API_KEY || undefined,
      model: env.GOOGLE_MODEL,
      enabled: env.GOOGLE_ENABLED,
      timeoutMs: env.AI_TIMEOUT_MS,
    },

    query: {
      topK: env.QUERY_TOP_K,
      maxRows: env.QUERY_MAX_ROWS,
    },

    rateLimit: {
      windowMs: env.RATE_LIMIT_WINDOW_MS,
      maxRequests: env.RATE_LIMIT_MAX,
    },

    cors: {
      origin: env.CORS_ORIGIN,
    },
  };

  return configSchema.parse(rawConfig);
}

/**
 * Load the configuration, or log what is wrong with it and exit.
 */
export function loadConfigOrExit(env: NodeJS.ProcessEnv = process.env): Config {
  try {
    return loadConfig(env);
  } catch (error) {
    logger.error('Invalid configuration', {
      error: error instanceof z.ZodError ? error.errors : (error as Error).message,
    });
    process.exit(1);
  }
}

export const config = loadConfigOrExit();

export default config;
