/**
 * Runtime configuration read from the environment (and an optional .env file)
 */

import { z } from 'zod';
import { ConfigError } from '../errors/index.js';

const positiveInt = (fallback: number) =>
  z.coerce.number().int().positive().default(fallback);

/**
 * Raw environment shape. Everything arrives as a string.
 */
export const EnvSchema = z
  .object({
    // Service Account JSON string from Google Cloud Console
    GOOGLE_SERVICE_ACCOUNT_JSON: z.string().min(1).optional(),
    // Path to the same JSON on disk
    GOOGLE_APPLICATION_CREDENTIALS: z.string().min(1).optional(),
    // Optional: User email for domain-wide delegation
    GOOGLE_IMPERSONATION_EMAIL: z.string().email().optional(),

    OUTPUT_DIR: z.string().min(1).default('synced_content'),
    MAX_CHUNK_BYTES: positiveInt(200 * 1024 * 1024),
    MAX_CHUNK_WORDS: positiveInt(450_000),
    MAX_RETRIES: positiveInt(3),
    RETRY_DELAY_MS: z.coerce.number().int().nonnegative().default(1000),
    DRIVE_REQUESTS_PER_100S: positiveInt(900),

    UPDATE_CHECK_URL: z.string().url().optional(),
  })
  .refine(env => env.GOOGLE_SERVICE_ACCOUNT_JSON || env.GOOGLE_APPLICATION_CREDENTIALS, {
    message: 'Set GOOGLE_SERVICE_ACCOUNT_JSON or GOOGLE_APPLICATION_CREDENTIALS',
    path: ['GOOGLE_SERVICE_ACCOUNT_JSON'],
  });

export type Env = z.infer<typeof EnvSchema>;

export interface AppConfig {
  credentials:
    | { kind: 'json'; json: string; subject?: string }
    | { kind: 'file'; path: string; subject?: string };
  outputDir: string;
  limits: {
    maxBytes: number;
    maxWords: number;
  };
  retry: {
    maxRetries: number;
    delayMs: number;
  };
  driveRequestsPer100s: number;
  updateCheckUrl?: string;
}

/**
 * Validate the environment and map it onto the application config.
 * Empty strings are treated as unset so a blank line in .env does not fail validation.
 */
export function loadConfig(source: NodeJS.ProcessEnv = process.env): AppConfig {
  const cleaned: Record<string, string> = {};
  for (const [key, value] of Object.entries(source)) {
    if (value !== undefined && value.trim() !== '') {
      cleaned[key] = value.trim();
    }
  }

  const parsed = EnvSchema.safeParse(cleaned);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`);
    throw new ConfigError(`Invalid configuration: ${issues.join('; ')}`, { issues });
  }

  const env = parsed.data;
  const subject = env.GOOGLE_IMPERSONATION_EMAIL;

  return {
    credentials: env.GOOGLE_SERVICE_ACCOUNT_JSON
      ? { kind: 'json', json: env.GOOGLE_SERVICE_ACCOUNT_JSON, subject }
      : { kind: 'file', path: env.GOOGLE_APPLICATION_CREDENTIALS ?? '', subject },
    outputDir: env.OUTPUT_DIR,
    limits: {
      maxBytes: env.MAX_CHUNK_BYTES,
      maxWords: env.MAX_CHUNK_WORDS,
    },
    retry: {
      maxRetries: env.MAX_RETRIES,
      delayMs: env.RETRY_DELAY_MS,
    },
    driveRequestsPer100s: env.DRIVE_REQUESTS_PER_100S,
    updateCheckUrl: env.UPDATE_CHECK_URL,
  };
}
