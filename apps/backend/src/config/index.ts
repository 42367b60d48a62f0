import { z } from 'zod';
import { ConfigError } from '@/errors';
import type { LogLevel } from '@/lib/logger';

const LOG_LEVELS = ['debug', 'info', 'warn', 'error', 'silent'] as const satisfies readonly LogLevel[];

const envSchema = z.object({
  COHERE_API_KEY: z.string().trim().min(1, 'must not be empty'),
  GOOGLE_BOOKS_API_KEY: z.string().trim().min(1, 'must not be empty'),
  COHERE_MODEL: z.string().trim().min(1).default('command'),
  GOOGLE_BOOKS_BASE_URL: z
    .string()
    .url()
    .default('https://www.googleapis.com/books/v1/volumes'),
  REQUEST_TIMEOUT_MS: z.coerce.number().int().positive().default(30000),
  LOG_LEVEL: z.enum(LOG_LEVELS).default('info'),
  PORT: z.coerce.number().int().min(0).max(65535).default(3000),
});

export interface AppConfig {
  cohereApiKey: string;
  googleBooksApiKey: string;
  cohereModel: string;
  googleBooksBaseUrl: string;
  requestTimeoutMs: number;
  logLevel: LogLevel;
  port: number;
}

/**
 * Read and validate configuration from the environment.
 * Throws ConfigError naming every missing or malformed variable.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(env);

  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map((issue) => {
        const key = issue.path.join('.');
        // zod reports a missing key as "Required"
        return issue.message === 'Required' ? `${key} is required` : `${key}: ${issue.message}`;
      })
    );
  }

  const vars = parsed.data;
  return {
    cohereApiKey: vars.COHERE_API_KEY,
    googleBooksApiKey: vars.GOOGLE_BOOKS_API_KEY,
    cohereModel: vars.COHERE_MODEL,
    googleBooksBaseUrl: vars.GOOGLE_BOOKS_BASE_URL,
    requestTimeoutMs: vars.REQUEST_TIMEOUT_MS,
    logLevel: vars.LOG_LEVEL,
    port: vars.PORT,
  };
}
