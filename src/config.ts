import { z } from 'zod';

import { ValidationError } from './errors.js';

const EnvSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  PORT: z.coerce.number().int().positive().default(3001),
  TICKETMASTER_API_KEY: z.string().min(1, 'TICKETMASTER_API_KEY is required'),
  ANTHROPIC_API_KEY: z.string().min(1, 'ANTHROPIC_API_KEY is required'),
  EXA_API_KEY: z.string().min(1).optional(),
  JUDGE_MODEL: z.string().min(1).default('claude-haiku-4-5'),
  JUDGE_TIMEOUT_MS: z.coerce.number().int().positive().default(30_000),
  HTTP_TIMEOUT_MS: z.coerce.number().int().positive().default(10_000),
});

export type AppConfig = z.infer<typeof EnvSchema>;

/** Empty strings count as unset, so `.env` templates with blank optional keys parse cleanly. */
function withoutBlanks(source: NodeJS.ProcessEnv): Record<string, string> {
  const entries = Object.entries(source).filter((entry): entry is [string, string] => {
    const value = entry[1];
    return value !== undefined && value.trim() !== '';
  });
  return Object.fromEntries(entries);
}

/**
 * Validate configuration once, at startup. Every problem is reported together.
 * Keys are handed to the clients explicitly; nothing else reads the environment.
 */
export function loadConfig(source: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = EnvSchema.safeParse(withoutBlanks(source));
  if (!parsed.success) {
    throw new ValidationError(
      'Environment validation failed',
      parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`),
    );
  }
  return parsed.data;
}
