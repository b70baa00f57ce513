import { ConfigError } from './errors';
import { ServerConfig } from './types';

export const DEFAULT_HEADER_ROW = 12;
export const DEFAULT_CACHE_TTL_SECONDS = 300;
export const DEFAULT_FETCH_TIMEOUT_MS = 60_000;
export const DEFAULT_STALE_RETRY_SECONDS = 30;
export const DEFAULT_PORT = 8000;

type Env = Record<string, string | undefined>;

function readString(env: Env, name: string): string | undefined {
  const value = env[name]?.trim();
  return value ? value : undefined;
}

function readInteger(env: Env, name: string, fallback: number, min: number): number {
  const raw = readString(env, name);
  if (raw === undefined) return fallback;

  const parsed = Number(raw);
  if (!Number.isInteger(parsed) || parsed < min) {
    throw new ConfigError(`${name} must be an integer >= ${min} (got "${raw}")`);
  }
  return parsed;
}

function readBoolean(env: Env, name: string, fallback: boolean): boolean {
  const raw = readString(env, name);
  if (raw === undefined) return fallback;

  switch (raw.toLowerCase()) {
    case '1':
    case 'true':
    case 'yes':
      return true;
    case '0':
    case 'false':
    case 'no':
      return false;
    default:
      throw new ConfigError(`${name} must be true or false (got "${raw}")`);
  }
}

export function requireSecretKey(env: Env = process.env): string {
  const secretKey = readString(env, 'SECRET_KEY');
  if (!secretKey) {
    throw new ConfigError('Missing environment variable: SECRET_KEY', ['SECRET_KEY']);
  }
  return secretKey;
}

export interface ConfigOverrides {
  port?: number;
  logFilePath?: string;
  logLevel?: string;
}

/**
 * Reads the server configuration. Throws ConfigError at start-up when a
 * required variable is missing, so a misconfigured process never serves.
 */
export function loadConfig(env: Env = process.env, overrides: ConfigOverrides = {}): ServerConfig {
  const missing = ['SECRET_KEY', 'ONEDRIVE_URL'].filter((name) => !readString(env, name));
  if (missing.length > 0) {
    throw new ConfigError(`Missing environment variables: ${missing.join(', ')}`, missing);
  }

  return {
    secretKey: requireSecretKey(env),
    sourceUrl: readString(env, 'ONEDRIVE_URL') ?? '',
    sheetName: readString(env, 'SHEET_NAME'),
    headerRow: readInteger(env, 'HEADER_ROW', DEFAULT_HEADER_ROW, 1),
    cacheTtlSeconds: readInteger(env, 'CACHE_TTL_SECONDS', DEFAULT_CACHE_TTL_SECONDS, 0),
    fetchTimeoutMs: readInteger(env, 'FETCH_TIMEOUT_MS', DEFAULT_FETCH_TIMEOUT_MS, 1),
    serveStaleOnError: readBoolean(env, 'SERVE_STALE_ON_ERROR', true),
    staleRetrySeconds: readInteger(env, 'STALE_RETRY_SECONDS', DEFAULT_STALE_RETRY_SECONDS, 0),
    allowedOrigin: readString(env, 'ALLOWED_ORIGIN'),
    port: overrides.port ?? readInteger(env, 'PORT', DEFAULT_PORT, 0),
    logFilePath: overrides.logFilePath ?? readString(env, 'LOG_FILE'),
    logLevel: overrides.logLevel ?? readString(env, 'LOG_LEVEL') ?? 'info',
  };
}
