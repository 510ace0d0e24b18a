import os from 'os';
import path from 'path';
import { DEFAULT_BASE_URL, env, type Env } from './env';
import pkg from '../../package.json';

/**
 * Resolved PMS connection settings. Built once at startup and never mutated;
 * every component receives it by reference.
 */
export interface PmsSettings {
  readonly clientId: string;
  readonly clientSecret: string;
  /** API root including its version suffix, without trailing slash. */
  readonly baseUrl: string;
  readonly propertyId: string;
  /** Per-request timeout. Nothing bounds the whole retry loop. */
  readonly timeoutSeconds: number;
  readonly maxRetries: number;
  readonly mockMode: boolean;
}

export interface ServerSettings {
  readonly enableHttpTransport: boolean;
  readonly httpHost: string;
  readonly httpPort: number;
  /** Written by `start`, read by `stop` and `status`. */
  readonly pidFile: string;
}

export function normalizeBaseUrl(url: string): string {
  const trimmed = url.trim().replace(/\/+$/, '');
  return trimmed === '' ? DEFAULT_BASE_URL : trimmed;
}

export function buildPmsSettings(source: Env = env): PmsSettings {
  return Object.freeze({
    clientId: source.PMS_CLIENT_ID,
    clientSecret: source.PMS_CLIENT_SECRET,
    baseUrl: normalizeBaseUrl(source.PMS_BASE_URL),
    propertyId: source.PMS_PROPERTY_ID,
    timeoutSeconds: source.PMS_TIMEOUT_SECONDS,
    maxRetries: source.PMS_MAX_RETRIES,
    mockMode: source.PMS_MOCK_MODE,
  });
}

export function buildServerSettings(source: Env = env): ServerSettings {
  return Object.freeze({
    enableHttpTransport: source.PMS_ENABLE_HTTP_TRANSPORT,
    httpHost: source.HTTP_HOST,
    httpPort: source.HTTP_PORT,
    pidFile: source.PMS_PID_FILE.trim() || path.join(os.tmpdir(), `${pkg.name}.pid`),
  });
}

export function hasCredentials(settings: PmsSettings): boolean {
  return settings.clientId !== '' && settings.clientSecret !== '';
}

/** Client id reduced to its last four characters for logs and health output. */
export function maskClientId(settings: PmsSettings): string {
  const { clientId } = settings;
  if (clientId.length <= 4) return '***';
  return `...${clientId.slice(-4)}`;
}
