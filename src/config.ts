import dotenv from 'dotenv';
import { z } from 'zod';
import { ConfigError } from './errors.js';

const GIB = 1024 * 1024 * 1024;

const optionalString = z
  .string()
  .trim()
  .optional()
  .transform((value) => (value ? value : undefined));

// Environment variables, all strings on the way in
export const EnvSchema = z.object({
  GOOGLE_CLIENT_ID: optionalString,
  GOOGLE_CLIENT_SECRET: optionalString,
  REDIRECT_URL: z.string().url().default('http://localhost:8000/auth/callback'),
  HOST: z.string().min(1).default('0.0.0.0'),
  PORT: z.coerce.number().int().min(0).max(65535).default(8000),
  BACKUP_ROOT: z.string().min(1).default('downloads'),
  ARCHIVE_BUDGET_BYTES: z.coerce.number().int().positive().default(2 * GIB),
  COMPRESSION_LEVEL: z.coerce.number().int().min(0).max(9).default(6),
  LIST_PAGE_SIZE: z.coerce.number().int().min(1).max(1000).default(1000),
  SESSION_TTL_MS: z.coerce.number().int().positive().default(4 * 60 * 60 * 1000),
  CLEANUP_INTERVAL_MS: z.coerce.number().int().positive().default(60 * 60 * 1000),
  COOKIE_MAX_AGE_S: z.coerce.number().int().positive().default(3600),
  ALLOWED_ORIGINS: optionalString,
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
});

export interface OAuthConfig {
  clientId: string;
  clientSecret: string;
  redirectUri: string;
}

export interface AppConfig {
  oauth: OAuthConfig | null;
  redirectUri: string;
  host: string;
  port: number;
  backupRoot: string;
  archiveBudgetBytes: number;
  compressionLevel: number;
  listPageSize: number;
  sessionTtlMs: number;
  cleanupIntervalMs: number;
  cookieMaxAgeMs: number;
  allowedOrigins: string[] | '*' | null;
  logLevel: 'debug' | 'info' | 'warn' | 'error';
}

function parseOrigins(value: string | undefined): AppConfig['allowedOrigins'] {
  if (!value) return null;
  if (value === '*') return '*';
  return value
    .split(',')
    .map((origin) => origin.trim())
    .filter((origin) => origin.length > 0);
}

/**
 * Validate an environment map into the typed application config.
 * OAuth client settings are optional here; routes that need them refuse to
 * run without them.
 */
export function parseConfig(env: Record<string, string | undefined>): AppConfig {
  const result = EnvSchema.safeParse(env);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new ConfigError(`Invalid configuration (${issues.join('; ')})`, issues);
  }

  const values = result.data;
  const oauth =
    values.GOOGLE_CLIENT_ID && values.GOOGLE_CLIENT_SECRET
      ? {
          clientId: values.GOOGLE_CLIENT_ID,
          clientSecret: values.GOOGLE_CLIENT_SECRET,
          redirectUri: values.REDIRECT_URL,
        }
      : null;

  return {
    oauth,
    redirectUri: values.REDIRECT_URL,
    host: values.HOST,
    port: values.PORT,
    backupRoot: values.BACKUP_ROOT,
    archiveBudgetBytes: values.ARCHIVE_BUDGET_BYTES,
    compressionLevel: values.COMPRESSION_LEVEL,
    listPageSize: values.LIST_PAGE_SIZE,
    sessionTtlMs: values.SESSION_TTL_MS,
    cleanupIntervalMs: values.CLEANUP_INTERVAL_MS,
    cookieMaxAgeMs: values.COOKIE_MAX_AGE_S * 1000,
    allowedOrigins: parseOrigins(values.ALLOWED_ORIGINS),
    logLevel: values.LOG_LEVEL,
  };
}

/**
 * Load `.env` into `process.env` and parse it.
 */
export function loadConfig(): AppConfig {
  dotenv.config();
  return parseConfig(process.env);
}
