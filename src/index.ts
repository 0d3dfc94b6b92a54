/**
 * trialgate — signed, time-limited trial licenses with online revocation
 * and offline verification.
 *
 * @packageDocumentation
 */

// ── Core Types ──
export type {
  Clock,
  KeyPair,
  LicenseToken,
  SignedLicense,
  EncodedLicense,
  RevocationRecord,
  RevokeOutcome,
  RevocationQuery,
  RevocationStorage,
  OfflineCacheEntry,
  DenialReason,
  Confirmation,
  OfflinePolicy,
  ValidLicense,
  InvalidLicense,
  VerificationResult,
} from './core/types.js';
export { SECONDS_PER_DAY } from './core/types.js';
export { systemClock } from './core/clock.js';

// ── Errors ──
export { LicenseError, isLicenseError } from './core/errors.js';
export type { LicenseErrorKind } from './core/errors.js';

// ── Crypto ──
export {
  generateKeypair,
  sign,
  verify,
  canonicalize,
  toHex,
  fromHex,
} from './core/crypto.js';

// ── Protocol ──
export { KeyAuthority } from './core/key-authority.js';
export { encodeToken, encodeTokenString, decodeToken } from './core/codec.js';
export { Issuer, DEFAULT_TTL_SECONDS } from './core/issuer.js';
export type { IssuerOptions } from './core/issuer.js';
export { StoredRevocationLedger, ledgerQuery } from './core/revocation.js';
export type { RevocationLedger, LedgerOptions } from './core/revocation.js';
export { Verifier, verifyLicense, describeResult } from './core/verifier.js';
export type { VerifierOptions } from './core/verifier.js';
export { MemoryOfflineCache, FileOfflineCache } from './core/offline-cache.js';
export type { OfflineCache } from './core/offline-cache.js';

// ── Resilience ──
export { CircuitBreaker, CircuitOpenError } from './core/circuit-breaker.js';
export type { CircuitBreakerConfig, CircuitState } from './core/circuit-breaker.js';

// ── Observability ──
export { createLogger, setGlobalLogLevel, setLogOutput, resetLogOutput, LogLevel } from './core/logger.js';
export type { Logger, LogEntry } from './core/logger.js';
export { MetricsCollector, globalMetrics } from './core/metrics.js';
export type { MetricsSnapshot } from './core/metrics.js';

// ── Storage ──
export { MemoryRevocationStorage } from './storage/memory.js';
export { SqliteRevocationStorage } from './storage/sqlite.js';
export { writeLicenseFiles, readLicenseFiles, TOKEN_FILE, SIGNATURE_FILE } from './storage/license-files.js';

// ── Transport ──
export { LicenseHttpServer } from './transport/http-server.js';
export type { LicenseServices } from './transport/http-server.js';
export { LicenseClient } from './transport/http-client.js';
export type { LicenseClientOptions, RetryConfig } from './transport/http-client.js';
export type { ServerConfig } from './transport/types.js';

// ── Configuration ──
export { loadServerConfig, loadVerifierConfig } from './config.js';
export type { ServerSettings, VerifierSettings } from './config.js';
export { createLicenseService } from './app.js';
export type { LicenseService } from './app.js';
