/**
 * Environment Configuration
 * Parses and validates process environment once at startup
 *
 * Load `.env` first (`import 'dotenv/config'`) in entry points.
 */

import { z } from 'zod';

import type { Result } from '@/types/index.js';
import {
  success,
  failure,
  DEFAULT_EMBEDDING_CONFIG,
  DEFAULT_ENGINE_CONFIG,
} from '@/types/index.js';

const optionalString = z
  .string()
  .optional()
  .transform((value) => (value === undefined || value.trim() === '' ? undefined : value));

export const envSchema = z.object({
  SUPABASE_URL: z.string().url(),
  SUPABASE_SERVICE_KEY: z.string().min(1),
  OPENAI_API_KEY: z.string().min(1),
  OPENAI_BASE_URL: optionalString.pipe(z.string().url().optional()),
  JUDGMENT_MODEL: z.string().min(1).default(DEFAULT_ENGINE_CONFIG.judgmentModel),
  EMBEDDING_MODEL: z.string().min(1).default(DEFAULT_EMBEDDING_CONFIG.model),
  EMBEDDING_DIMENSIONS: z.coerce
    .number()
    .int()
    .positive()
    .default(DEFAULT_EMBEDDING_CONFIG.dimensions),
  UPSTASH_REDIS_URL: optionalString,
  UPSTASH_REDIS_TOKEN: optionalString,
  PORT: z.coerce.number().int().positive().default(3000),
  ALLOWED_ORIGINS: z
    .string()
    .default('http://localhost:3000')
    .transform((value) =>
      value
        .split(',')
        .map((origin) => origin.trim())
        .filter((origin) => origin.length > 0)
    ),
});

export type Env = z.infer<typeof envSchema>;

/**
 * Validate an environment map
 */
export function parseEnv(
  source: Record<string, string | undefined>
): Result<Env> {
  const parsed = envSchema.safeParse(source);
  if (!parsed.success) {
    return failure('VALIDATION_ERROR', 'Invalid environment configuration', {
      issues: parsed.error.issues.map(
        (issue) => `${issue.path.join('.')}: ${issue.message}`
      ),
    });
  }
  return success(parsed.data);
}

/**
 * Parse process.env or exit with the list of problems
 */
export function loadEnv(): Env {
  const parsed = envSchema.safeParse(process.env);
  if (!parsed.success) {
    console.error('Invalid environment configuration');
    for (const issue of parsed.error.issues) {
      console.error(`  - ${issue.path.join('.')}: ${issue.message}`);
    }
    process.exit(1);
  }
  return parsed.data;
}
