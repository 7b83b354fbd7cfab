import { z, ZodError } from 'zod';

const optionalString = z.preprocess(
  (value) => (value === '' ? undefined : value),
  z.string().optional()
);

/**
 * Environment variable schema with strict validation.
 * Names match the container's env template so the compose file can pass them straight through.
 */
const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  PORT: z.coerce.number().int().default(8000),

  // Gateway
  API_KEY: z.string().min(1, { message: 'API_KEY must not be empty' }),
  MAX_UPLOAD_BYTES: z.coerce.number().int().min(1).default(50 * 1024 * 1024),
  HEALTH_TIMEOUT_MS: z.coerce.number().int().min(1).default(2000),
  SOURCE_FETCH_TIMEOUT_MS: z.coerce.number().int().min(1).default(30000),

  // Object storage (S3-compatible, Aliyun OSS in production)
  ALIYUN_OSS_ACCESS_KEY: z.string().min(1),
  ALIYUN_OSS_SECRET_KEY: z.string().min(1),
  ALIYUN_OSS_ENDPOINT: z.string().url(),
  ALIYUN_OSS_REGION: z.string().min(1),
  ALIYUN_OSS_BUCKET_NAME: z.string().min(1),
  ALIYUN_OSS_PATH: z
    .string()
    .default('books')
    .transform((value) => value.replace(/^\/+|\/+$/g, '')),

  // State store (Redis-compatible)
  REDIS_HOST: z.string().default('127.0.0.1'),
  REDIS_PORT: z.coerce.number().int().default(6379),
  REDIS_DB: z.coerce.number().int().min(0).default(0),
  REDIS_PASSWORD: optionalString,
  REDIS_KEY_PREFIX: z.string().default('book-pipeline:'),

  // Workers
  WORKER_POOL_SIZE: z.coerce
    .number()
    .int()
    .min(1, { message: 'WORKER_POOL_SIZE must be at least 1' })
    .default(2),
  WORKER_POLL_INTERVAL_MS: z.coerce.number().int().min(10).default(1000),
  LEASE_TTL_SECONDS: z.coerce.number().int().min(1).default(60),
  STAGE_TIMEOUT_SECONDS: z.coerce.number().int().min(1).default(300),
  STAGE_MAX_ATTEMPTS: z.coerce
    .number()
    .int()
    .min(1, { message: 'STAGE_MAX_ATTEMPTS must be at least 1' })
    .default(3),
  RETRY_BACKOFF_BASE_MS: z.coerce.number().int().min(0).default(1000),
  RETRY_BACKOFF_MAX_MS: z.coerce.number().int().min(0).default(60000),
  STORE_RETRY_ATTEMPTS: z.coerce.number().int().min(1).default(3),
  REAPER_CRON: z.string().default('*/15 * * * * *'),
  JOB_RETENTION_HOURS: z.coerce.number().int().min(1).default(168),

  // Logging
  LOG_LEVEL: z.enum(['error', 'warn', 'info', 'debug']).default('info'),
  LOG_FILE: optionalString,

  // Rate limiting (API)
  RATE_LIMIT_WINDOW_MS: z.coerce.number().int().default(60000),
  RATE_LIMIT_MAX_REQUESTS: z.coerce.number().int().default(120),
});

export type Env = z.infer<typeof envSchema>;

/**
 * Parses a raw environment map. Throws ZodError on invalid input.
 */
export function parseEnv(source: NodeJS.ProcessEnv): Env {
  return envSchema.parse(source);
}

/**
 * Validates and parses environment variables
 * Exits process with code 1 if validation fails (fail-fast principle)
 */
export function validateEnv(): Env {
  try {
    return parseEnv(process.env);
  } catch (error) {
    if (error instanceof ZodError) {
      console.error('❌ Environment validation failed:');
      error.issues.forEach((err) => {
        console.error(`  - ${err.path.join('.')}: ${err.message}`);
      });
      console.error('\nCheck .env.example for required variables');
      process.exit(1);
    }
    throw error;
  }
}
