import { config as loadDotenv } from 'dotenv';
import { z } from 'zod';

const envSchema = z.object({
  OPENAI_API_KEY: z.string().min(1, 'OPENAI_API_KEY is required'),
  OPENAI_MODEL: z.string().min(1).optional().default('gpt-4o-mini'),
  OPENAI_TIMEOUT_MS: z.coerce.number().int().positive().optional().default(30_000),
  WEBHOOK_SECRET: z
    .string()
    .optional()
    .transform((value) => (value && value.trim() ? value.trim() : undefined)),
  AGENT_PROFILE_PATH: z.string().min(1).optional(),
  PORT: z.coerce.number().int().min(0).max(65_535).optional().default(3000),
  RATE_LIMIT_WINDOW_MS: z.coerce.number().int().positive().optional().default(60_000),
  RATE_LIMIT_MAX_REQUESTS: z.coerce.number().int().positive().optional().default(60),
});

export type EnvConfig = Readonly<z.infer<typeof envSchema>>;

export function parseEnv(source: Record<string, string | undefined>): EnvConfig {
  const parsed = envSchema.safeParse(source);

  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.join('.') || 'env'}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid environment configuration: ${details}`);
  }

  return Object.freeze(parsed.data);
}

/**
 * Read `.env` into process.env, then validate it.
 */
export function loadEnv(): EnvConfig {
  loadDotenv();
  return parseEnv(process.env);
}
