import { z } from 'zod';
import { isValidTimeZone } from './date';

const envSchema = z.object({
  // Supabase
  NEXT_PUBLIC_SUPABASE_URL: z.string().url(),
  SUPABASE_SERVICE_ROLE_KEY: z.string().min(1),

  // Inference service (GI regressor + glucose forecaster)
  INFERENCE_SERVICE_URL: z.string().url().default('http://127.0.0.1:8000'),
  INFERENCE_TIMEOUT_MS: z.coerce.number().int().positive().default(3000),

  // Dashboard day boundaries when the request carries no tz
  DEFAULT_TIMEZONE: z.string().refine(isValidTimeZone, 'must be an IANA time zone').default('UTC'),

  // Rate limiting (optional)
  UPSTASH_REDIS_REST_URL: z.string().url().optional(),
  UPSTASH_REDIS_REST_TOKEN: z.string().optional(),

  // Application
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
});

export type Env = z.infer<typeof envSchema>;

/**
 * Validates the environment variables and returns a typed object.
 * Throws an error if any required environment variables are missing or invalid.
 */
export function getEnv(): Env {
  try {
    return envSchema.parse(process.env);
  } catch (error) {
    if (error instanceof z.ZodError) {
      const missingEnvs = error.issues.map((issue) => {
        const path = issue.path.join('.');
        return `- ${path}: ${issue.message}`;
      });

      throw new Error(
        `Missing or invalid environment variables:\n${missingEnvs.join('\n')}\n\n` +
        'Please check your .env.local file and ensure all required variables are set.'
      );
    }

    throw error;
  }
}

/** Time zone used for day/week boundaries when a request does not name one. */
export function getDefaultTimeZone(): string {
  const parsed = envSchema.pick({ DEFAULT_TIMEZONE: true }).safeParse(process.env);
  if (parsed.success) return parsed.data.DEFAULT_TIMEZONE;
  console.warn('[env] DEFAULT_TIMEZONE is not a known time zone, using UTC', {
    value: process.env.DEFAULT_TIMEZONE,
  });
  return 'UTC';
}

// Validate environment variables on module load
if (process.env.NODE_ENV !== 'test') {
  getEnv();
}
