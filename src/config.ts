import { z } from 'zod';

const envSchema = z.object({
  NODE_ENV: z.string().default('development'),
  API_PORT: z.coerce.number().int().min(0).max(65535).default(8000),
  OUTPUT_DIR: z.string().min(1).default('./output'),
  STORE_DRIVER: z.enum(['file', 'postgres']).default('file'),
  DATABASE_URL: z.string().min(1).optional(),
  CORS_ORIGIN: z.string().min(1).default('*'),
  MAX_UPLOAD_BYTES: z.coerce.number().int().positive().default(25 * 1024 * 1024),
  RATE_LIMIT_WINDOW_MS: z.coerce.number().int().positive().default(60 * 1000),
  RATE_LIMIT_MAX: z.coerce.number().int().positive().default(60),
  LOCK_RETRIES: z.coerce.number().int().positive().default(20),
  LOCK_RETRY_DELAY_MS: z.coerce.number().int().nonnegative().default(25),
  LOCK_STALE_MS: z.coerce.number().int().positive().default(30_000),
}).superRefine((env, ctx) => {
  if (env.STORE_DRIVER === 'postgres' && !env.DATABASE_URL) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ['DATABASE_URL'],
      message: 'DATABASE_URL is required when STORE_DRIVER=postgres',
    });
  }
});

export type StoreDriver = 'file' | 'postgres';

export interface RegistryConfig {
  nodeEnv: string;
  port: number;
  outputDir: string;
  storeDriver: StoreDriver;
  databaseUrl?: string;
  corsOrigin: string;
  maxUploadBytes: number;
  rateLimit: {
    windowMs: number;
    max: number;
  };
  lock: {
    retries: number;
    retryDelayMs: number;
    staleMs: number;
  };
}

/**
 * Reads registry settings from the environment.
 * Throws CONFIG_INVALID listing every offending variable.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): RegistryConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const problems = parsed.error.issues
      .map(issue => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new Error(`CONFIG_INVALID: ${problems}`);
  }

  const values = parsed.data;
  return {
    nodeEnv: values.NODE_ENV,
    port: values.API_PORT,
    outputDir: values.OUTPUT_DIR,
    storeDriver: values.STORE_DRIVER,
    databaseUrl: values.DATABASE_URL,
    corsOrigin: values.CORS_ORIGIN,
    maxUploadBytes: values.MAX_UPLOAD_BYTES,
    rateLimit: {
      windowMs: values.RATE_LIMIT_WINDOW_MS,
      max: values.RATE_LIMIT_MAX,
    },
    lock: {
      retries: values.LOCK_RETRIES,
      retryDelayMs: values.LOCK_RETRY_DELAY_MS,
      staleMs: values.LOCK_STALE_MS,
    },
  };
}
