import { z } from 'zod';
import { ConfigurationError } from './errors';
import type { LogLevel } from './logger';

export const DEFAULT_BASE_URL = 'https://euvdservices.enisa.europa.eu';

export const DEFAULT_USER_AGENT =
  'Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36';

export type TransportMode = 'http' | 'stdio';

export interface Settings {
  host: string;
  port: number;
  transport: TransportMode;
  euvdBaseUrl: string;
  /** Per-request timeout in seconds. */
  euvdTimeout: number;
  /** Retries after the first attempt. */
  euvdMaxRetries: number;
  userAgent: string;
  logLevel: LogLevel;
}

const envSchema = z.object({
  HOST: z.string().default('127.0.0.1'),
  PORT: z.coerce.number().int().min(1).max(65535).default(8000),
  MCP_TRANSPORT: z.enum(['http', 'stdio']).default('http'),
  EUVD_BASE_URL: z
    .string()
    .url()
    .default(DEFAULT_BASE_URL)
    .transform(url => url.replace(/\/+$/, '')),
  EUVD_TIMEOUT: z.coerce.number().positive().default(30),
  EUVD_MAX_RETRIES: z.coerce.number().int().min(0).default(3),
  USER_AGENT: z.string().default(DEFAULT_USER_AGENT),
  LOG_LEVEL: z
    .string()
    .transform(level => level.toLowerCase())
    .pipe(z.enum(['debug', 'info', 'warn', 'error']))
    .default('info'),
});

/**
 * Variable names match case-insensitively and empty values count as unset.
 */
function normalizeEnv(env: NodeJS.ProcessEnv): Record<string, string> {
  const normalized: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined && value.trim() !== '') {
      normalized[key.toUpperCase()] = value.trim();
    }
  }
  return normalized;
}

export function loadSettings(env: NodeJS.ProcessEnv = process.env): Settings {
  const parsed = envSchema.safeParse(normalizeEnv(env));
  if (!parsed.success) {
    throw new ConfigurationError(parsed.error.issues);
  }
  const values = parsed.data;

  return {
    host: values.HOST,
    port: values.PORT,
    transport: values.MCP_TRANSPORT,
    euvdBaseUrl: values.EUVD_BASE_URL,
    euvdTimeout: values.EUVD_TIMEOUT,
    euvdMaxRetries: values.EUVD_MAX_RETRIES,
    userAgent: values.USER_AGENT,
    logLevel: values.LOG_LEVEL,
  };
}
