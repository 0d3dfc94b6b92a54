/**
 * Configuration from environment variables, validated and defaulted by ajv.
 * Empty variables count as unset.
 */

import { LicenseError } from './core/errors.js';
import { LogLevel, parseLogLevel } from './core/logger.js';
import { Ajv } from './core/schemas.js';
import { SECONDS_PER_DAY, type OfflinePolicy } from './core/types.js';

type Env = Record<string, string | undefined>;

const envAjv = new Ajv({ strict: false, coerceTypes: true, useDefaults: true, allErrors: true });

// ── License Server ──

export interface ServerSettings {
  host: string;
  port: number;
  ttlSeconds: number;
  /** Hex seed; a fresh key is generated when absent */
  signingKey?: string;
  /** SQLite file; the ledger stays in memory when absent */
  dbPath?: string;
  adminToken?: string;
  logLevel: LogLevel;
}

interface ServerEnv {
  TRIALGATE_HOST: string;
  TRIALGATE_PORT: number;
  TRIALGATE_TTL_DAYS: number;
  TRIALGATE_SIGNING_KEY?: string;
  TRIALGATE_DB_PATH?: string;
  TRIALGATE_ADMIN_TOKEN?: string;
  TRIALGATE_LOG_LEVEL: string;
}

const validateServerEnv = envAjv.compile<ServerEnv>({
  type: 'object',
  properties: {
    TRIALGATE_HOST: { type: 'string', default: '127.0.0.1' },
    TRIALGATE_PORT: { type: 'integer', minimum: 0, maximum: 65535, default: 8081 },
    TRIALGATE_TTL_DAYS: { type: 'integer', minimum: 1, default: 14 },
    TRIALGATE_SIGNING_KEY: { type: 'string', pattern: '^[0-9a-fA-F]{64}$' },
    TRIALGATE_DB_PATH: { type: 'string' },
    TRIALGATE_ADMIN_TOKEN: { type: 'string', minLength: 8 },
    TRIALGATE_LOG_LEVEL: { type: 'string', enum: ['debug', 'info', 'warn', 'error', 'silent', 'DEBUG', 'INFO', 'WARN', 'ERROR', 'SILENT'], default: 'info' },
  },
  required: ['TRIALGATE_HOST', 'TRIALGATE_PORT', 'TRIALGATE_TTL_DAYS', 'TRIALGATE_LOG_LEVEL'],
});

export function loadServerConfig(env: Env = process.env): ServerSettings {
  const raw: unknown = pick(env, [
    'TRIALGATE_HOST',
    'TRIALGATE_PORT',
    'TRIALGATE_TTL_DAYS',
    'TRIALGATE_SIGNING_KEY',
    'TRIALGATE_DB_PATH',
    'TRIALGATE_ADMIN_TOKEN',
    'TRIALGATE_LOG_LEVEL',
  ]);
  if (!validateServerEnv(raw)) {
    throw new LicenseError('InvalidRequest', `Invalid configuration: ${envAjv.errorsText(validateServerEnv.errors, { dataVar: 'env' })}`);
  }

  const settings: ServerSettings = {
    host: raw.TRIALGATE_HOST,
    port: raw.TRIALGATE_PORT,
    ttlSeconds: raw.TRIALGATE_TTL_DAYS * SECONDS_PER_DAY,
    logLevel: parseLogLevel(raw.TRIALGATE_LOG_LEVEL) ?? LogLevel.INFO,
  };
  if (raw.TRIALGATE_SIGNING_KEY !== undefined) settings.signingKey = raw.TRIALGATE_SIGNING_KEY;
  if (raw.TRIALGATE_DB_PATH !== undefined) settings.dbPath = raw.TRIALGATE_DB_PATH;
  if (raw.TRIALGATE_ADMIN_TOKEN !== undefined) settings.adminToken = raw.TRIALGATE_ADMIN_TOKEN;
  return settings;
}

// ── Verifying Application ──

export interface VerifierSettings {
  /** Pinned trust anchor (hex) */
  publicKey?: string;
  serverUrl: string;
  cacheFile: string;
  licenseDir: string;
  queryTimeoutMs: number;
  maxCacheAgeSeconds: number;
  offlinePolicy: OfflinePolicy;
  maxUnconfirmedSeconds?: number;
}

interface VerifierEnv {
  TRIALGATE_PUBLIC_KEY?: string;
  TRIALGATE_SERVER_URL: string;
  TRIALGATE_CACHE_FILE: string;
  TRIALGATE_LICENSE_DIR: string;
  TRIALGATE_QUERY_TIMEOUT_MS: number;
  TRIALGATE_MAX_CACHE_AGE_HOURS: number;
  TRIALGATE_OFFLINE_POLICY: OfflinePolicy;
  TRIALGATE_MAX_UNCONFIRMED_HOURS?: number;
}

const validateVerifierEnv = envAjv.compile<VerifierEnv>({
  type: 'object',
  properties: {
    TRIALGATE_PUBLIC_KEY: { type: 'string', pattern: '^[0-9a-fA-F]{64}$' },
    TRIALGATE_SERVER_URL: { type: 'string', pattern: '^https?://', default: 'http://127.0.0.1:8081' },
    TRIALGATE_CACHE_FILE: { type: 'string', default: '.trialgate-cache.json' },
    TRIALGATE_LICENSE_DIR: { type: 'string', default: '.' },
    TRIALGATE_QUERY_TIMEOUT_MS: { type: 'integer', minimum: 1, default: 5000 },
    TRIALGATE_MAX_CACHE_AGE_HOURS: { type: 'number', minimum: 0, default: 24 },
    TRIALGATE_OFFLINE_POLICY: { type: 'string', enum: ['fail-open', 'fail-closed'], default: 'fail-open' },
    TRIALGATE_MAX_UNCONFIRMED_HOURS: { type: 'number', minimum: 0 },
  },
  required: [
    'TRIALGATE_SERVER_URL',
    'TRIALGATE_CACHE_FILE',
    'TRIALGATE_LICENSE_DIR',
    'TRIALGATE_QUERY_TIMEOUT_MS',
    'TRIALGATE_MAX_CACHE_AGE_HOURS',
    'TRIALGATE_OFFLINE_POLICY',
  ],
});

export function loadVerifierConfig(env: Env = process.env): VerifierSettings {
  const raw: unknown = pick(env, [
    'TRIALGATE_PUBLIC_KEY',
    'TRIALGATE_SERVER_URL',
    'TRIALGATE_CACHE_FILE',
    'TRIALGATE_LICENSE_DIR',
    'TRIALGATE_QUERY_TIMEOUT_MS',
    'TRIALGATE_MAX_CACHE_AGE_HOURS',
    'TRIALGATE_OFFLINE_POLICY',
    'TRIALGATE_MAX_UNCONFIRMED_HOURS',
  ]);
  if (!validateVerifierEnv(raw)) {
    throw new LicenseError('InvalidRequest', `Invalid configuration: ${envAjv.errorsText(validateVerifierEnv.errors, { dataVar: 'env' })}`);
  }

  const settings: VerifierSettings = {
    serverUrl: raw.TRIALGATE_SERVER_URL,
    cacheFile: raw.TRIALGATE_CACHE_FILE,
    licenseDir: raw.TRIALGATE_LICENSE_DIR,
    queryTimeoutMs: raw.TRIALGATE_QUERY_TIMEOUT_MS,
    maxCacheAgeSeconds: Math.round(raw.TRIALGATE_MAX_CACHE_AGE_HOURS * 3600),
    offlinePolicy: raw.TRIALGATE_OFFLINE_POLICY,
  };
  if (raw.TRIALGATE_PUBLIC_KEY !== undefined) settings.publicKey = raw.TRIALGATE_PUBLIC_KEY.toLowerCase();
  if (raw.TRIALGATE_MAX_UNCONFIRMED_HOURS !== undefined) {
    settings.maxUnconfirmedSeconds = Math.round(raw.TRIALGATE_MAX_UNCONFIRMED_HOURS * 3600);
  }
  return settings;
}

/** Fresh object holding the non-empty values of `keys`, for ajv to coerce in place */
function pick(env: Env, keys: string[]): Record<string, string> {
  const out: Record<string, string> = {};
  for (const key of keys) {
    const value = env[key];
    if (value !== undefined && value.trim() !== '') out[key] = value.trim();
  }
  return out;
}
