import { config } from 'dotenv';
import { z } from 'zod';

config();

const flag = (fallback: 'true' | 'false') =>
  z
    .enum(['true', 'false', '1', '0'])
    .default(fallback)
    .transform((value) => value === 'true' || value === '1');

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  PORT: z.string().default('3000').transform(Number),
  LOG_LEVEL: z.enum(['silent', 'error', 'warn', 'info', 'debug']).default('info'),
  DB_HOST: z.string().default('localhost'),
  DB_PORT: z.string().default('5432').transform(Number),
  DB_USER: z.string().default('glossary'),
  DB_PASSWORD: z.string().default('glossary_dev_pass'),
  DB_NAME: z.string().default('acronym_glossary'),
  REDIS_URL: z.string().optional(),
  WEB_LOOKUP_ENABLED: flag('true'),
  WEB_MAX_CANDIDATES: z.string().default('5').transform(Number).pipe(z.number().int().min(1).max(20)),
  WEB_TIMEOUT_MS: z.string().default('5000').transform(Number).pipe(z.number().int().positive()),
  WEB_USER_AGENT: z.string().default('AcronymGlossary/1.0 (+https://example.invalid)'),
  INCLUDE_COMMON_TERMS: flag('true'),
  RESOLVE_CONCURRENCY: z.string().default('4').transform(Number).pipe(z.number().int().min(1).max(32)),
  MAX_UPLOAD_MB: z.string().default('20').transform(Number).pipe(z.number().positive()),
});

export type Env = z.infer<typeof envSchema>;

function validateEnv(): Env {
  try {
    return envSchema.parse(process.env);
  } catch (error) {
    if (error instanceof z.ZodError) {
      const errors = error.issues.map((err) => `${err.path.join('.')}: ${err.message}`);
      throw new Error(`Environment validation failed:\n${errors.join('\n')}`);
    }
    throw error;
  }
}

export const env = validateEnv();
