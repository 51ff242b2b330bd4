import { z } from 'zod';

// `KEY=` in a shell or .env file means unset
const blankAsUndefined = (value: unknown) => (value === '' ? undefined : value);

export const envSchema = z.object({
  // Core
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error', 'silent']).default('warn'),

  // AWS
  AWS_ENDPOINT: z.preprocess(blankAsUndefined, z.string().url().optional()), // For LocalStack / S3-compatible stores

  // Model source
  MODEL_BUCKET: z.string().min(1).default('rfq-models'),
  MODEL_PREFIX: z
    .string()
    .default('Mistral-7B-Instruct-v0-3/')
    .refine((prefix) => prefix === '' || prefix.endsWith('/'), {
      message: 'must be empty or end with "/"',
    }),
  MODEL_DIR: z.preprocess(blankAsUndefined, z.string().min(1).optional()),
});

export type EnvConfig = z.infer<typeof envSchema>;

export function validateEnv(config: Record<string, unknown>): EnvConfig {
  const result = envSchema.safeParse(config);

  if (!result.success) {
    const errors = result.error.errors
      .map((e) => `  - ${e.path.join('.')}: ${e.message}`)
      .join('\n');
    throw new Error(`Environment validation failed:\n${errors}`);
  }

  return result.data;
}
