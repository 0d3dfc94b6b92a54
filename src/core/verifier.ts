/**
 * Verifier — two-phase license check.
 *
 * Order is fixed and short-circuits on the first failure:
 *   1. signature over the canonical token bytes (nothing in the token is trusted before this)
 *   2. expiry
 *   3. online revocation query, bounded by a deadline; success refreshes the offline cache
 *   4. on query failure, the offline cache, then the offline policy
 *   5. valid, with whole days remaining
 */

import { systemClock } from './clock.js';
import { encodeToken, decodeToken } from './codec.js';
import { PUBLIC_KEY_BYTES, SIGNATURE_BYTES, fromHex, verify } from './crypto.js';
import { LicenseError, errorMessage, isLicenseError } from './errors.js';
import { createLogger } from './logger.js';
import { globalMetrics, type MetricsCollector } from './metrics.js';
import type { OfflineCache } from './offline-cache.js';
import {
  SECONDS_PER_DAY,
  type Clock,
  type Confirmation,
  type DenialReason,
  type InvalidLicense,
  type LicenseToken,
  type OfflinePolicy,
  type RevocationQuery,
  type SignedLicense,
  type ValidLicense,
  type VerificationResult,
} from './types.js';

export const DEFAULT_QUERY_TIMEOUT_MS = 5_000;
export const DEFAULT_MAX_CACHE_AGE_SECONDS = 24 * 3600;

export interface VerifierOptions {
  /** Trust anchor: the authority's 32-byte public key, raw or hex */
  trustedPublicKey: Uint8Array | string;
  /** Online revocation lookup; without one every check takes the offline path */
  revocationQuery?: RevocationQuery;
  offlineCache?: OfflineCache;
  clock?: Clock;
  /** Deadline for a single revocation query */
  queryTimeoutMs?: number;
  /** Cache entries older than this no longer vouch for a non-revoked user */
  maxCacheAgeSeconds?: number;
  /** Decision when the ledger is unreachable and no usable cache entry exists */
  offlinePolicy?: OfflinePolicy;
  /**
   * Under 'fail-open', the longest a license may run without any confirmed
   * check, measured from the last online check or, failing that, from issuance.
   * Unbounded when omitted.
   */
  maxUnconfirmedSeconds?: number;
  metrics?: MetricsCollector;
}

export class Verifier {
  private publicKey: Uint8Array;
  private query?: RevocationQuery;
  private cache?: OfflineCache;
  private clock: Clock;
  private queryTimeoutMs: number;
  private maxCacheAgeSeconds: number;
  private offlinePolicy: OfflinePolicy;
  private maxUnconfirmedSeconds?: number;
  private metrics: MetricsCollector;
  private logger = createLogger('Verifier');

  constructor(opts: VerifierOptions) {
    const key = typeof opts.trustedPublicKey === 'string'
      ? fromHex(opts.trustedPublicKey.trim(), PUBLIC_KEY_BYTES)
      : opts.trustedPublicKey;
    if (!key || key.length !== PUBLIC_KEY_BYTES) {
      throw new LicenseError('InvalidRequest', `Trusted public key must be ${PUBLIC_KEY_BYTES} bytes`);
    }
    this.publicKey = Uint8Array.from(key);
    this.query = opts.revocationQuery;
    this.cache = opts.offlineCache;
    this.clock = opts.clock ?? systemClock;
    this.queryTimeoutMs = opts.queryTimeoutMs ?? DEFAULT_QUERY_TIMEOUT_MS;
    this.maxCacheAgeSeconds = opts.maxCacheAgeSeconds ?? DEFAULT_MAX_CACHE_AGE_SECONDS;
    this.offlinePolicy = opts.offlinePolicy ?? 'fail-open';
    this.maxUnconfirmedSeconds = opts.maxUnconfirmedSeconds;
    this.metrics = opts.metrics ?? globalMetrics;
  }

  /** Verify a license held as a structured token plus signature. */
  async verify(license: SignedLicense): Promise<VerificationResult> {
    let message: Uint8Array;
    try {
      message = encodeToken(license.token);
    } catch (err) {
      if (!isLicenseError(err, 'MalformedToken')) throw err;
      return this.deny('SignatureMismatch', 'Token fields do not form a signable token');
    }
    if (!verify(this.publicKey, message, license.signature)) {
      return this.deny('SignatureMismatch', 'Signature does not match the token or the trusted key');
    }
    return this.evaluate(license.token);
  }

  /**
   * Verify persisted artifacts: the exact stored token bytes and the
   * signature (raw, or hex). The signature is checked over the bytes as
   * stored, before they are parsed, so any change to them is a mismatch.
   */
  async verifyEncoded(token: Uint8Array | string, signature: Uint8Array | string): Promise<VerificationResult> {
    const message = typeof token === 'string' ? new TextEncoder().encode(token) : token;
    const sig = typeof signature === 'string' ? fromHex(signature, SIGNATURE_BYTES) : signature;
    if (!sig || !verify(this.publicKey, message, sig)) {
      return this.deny('SignatureMismatch', 'Signature does not match the token or the trusted key');
    }

    let decoded: LicenseToken;
    try {
      decoded = decodeToken(message);
    } catch (err) {
      if (!isLicenseError(err, 'MalformedToken')) throw err;
      return this.deny('MalformedToken', err.message);
    }
    return this.evaluate(decoded);
  }

  // ── Phase 2: time and revocation ──

  private async evaluate(token: LicenseToken): Promise<VerificationResult> {
    const now = this.clock();
    if (now >= token.expiresAt) {
      const daysAgo = Math.floor((now - token.expiresAt) / SECONDS_PER_DAY);
      return this.deny('Expired', `License expired ${daysAgo} day(s) ago`, token);
    }
    const daysRemaining = Math.floor((token.expiresAt - now) / SECONDS_PER_DAY);

    if (this.query) {
      let revoked: boolean | undefined;
      try {
        revoked = await this.queryWithDeadline(this.query, token.userId);
      } catch (err) {
        this.logger.warn('Revocation ledger unreachable', { userId: token.userId, error: errorMessage(err) });
      }
      if (revoked !== undefined) {
        await this.remember(token.userId, revoked, now);
        if (revoked) {
          return this.deny('Revoked', 'License has been revoked by the license server', token);
        }
        return this.accept(token, daysRemaining, 'online');
      }
    }

    return this.evaluateOffline(token, daysRemaining, now);
  }

  private async evaluateOffline(token: LicenseToken, daysRemaining: number, now: number): Promise<VerificationResult> {
    const entry = this.cache ? await this.cache.get(token.userId) : null;

    // A known revocation is permanent, however old the entry
    if (entry?.lastKnownRevoked) {
      return this.deny('Revoked', 'License was revoked (last known status; license server unreachable)', token);
    }
    if (entry && now - entry.checkedAt <= this.maxCacheAgeSeconds) {
      return this.accept(token, daysRemaining, 'cached', entry.checkedAt);
    }

    const lastCheck = entry
      ? `last online check was ${Math.floor((now - entry.checkedAt) / 3600)} hour(s) ago`
      : 'no previous online check found';

    if (this.offlinePolicy === 'fail-closed') {
      return this.deny('Unreachable', `License server unreachable and ${lastCheck}`, token);
    }
    if (this.maxUnconfirmedSeconds !== undefined) {
      const since = entry?.checkedAt ?? token.issuedAt;
      if (now - since > this.maxUnconfirmedSeconds) {
        return this.deny('Unreachable', `Offline allowance used up: ${lastCheck}`, token);
      }
    }
    return this.accept(token, daysRemaining, 'unconfirmed');
  }

  private async queryWithDeadline(query: RevocationQuery, userId: string): Promise<boolean> {
    const controller = new AbortController();
    let timer: ReturnType<typeof setTimeout> | undefined;
    const deadline = new Promise<never>((_, reject) => {
      timer = setTimeout(() => {
        const err = new LicenseError('Unreachable', `Revocation query timed out after ${this.queryTimeoutMs} ms`);
        controller.abort(err);
        reject(err);
      }, this.queryTimeoutMs);
    });
    try {
      return await Promise.race([query(userId, controller.signal), deadline]);
    } finally {
      clearTimeout(timer);
    }
  }

  private async remember(userId: string, revoked: boolean, checkedAt: number): Promise<void> {
    if (!this.cache) return;
    try {
      await this.cache.put({ userId, lastKnownRevoked: revoked, checkedAt });
    } catch (err) {
      this.logger.warn('Could not update offline cache', { userId, error: errorMessage(err) });
    }
  }

  private accept(token: LicenseToken, daysRemaining: number, confirmation: Confirmation, checkedAt?: number): ValidLicense {
    this.metrics.counter('verify.outcome', { result: 'valid', confirmation });
    const result: ValidLicense = { valid: true, token, daysRemaining, confirmation };
    if (checkedAt !== undefined) result.checkedAt = checkedAt;
    return result;
  }

  private deny(reason: DenialReason, message: string, token?: LicenseToken): InvalidLicense {
    this.metrics.counter('verify.outcome', { result: reason });
    this.logger.info('License rejected', { reason, userId: token?.userId });
    const result: InvalidLicense = { valid: false, reason, message };
    if (token) result.token = token;
    return result;
  }
}

/** Functional form: verify one license against a trust anchor and a revocation query. */
export function verifyLicense(
  license: SignedLicense,
  trustedPublicKey: Uint8Array | string,
  revocationQuery: RevocationQuery,
  opts: Omit<VerifierOptions, 'trustedPublicKey' | 'revocationQuery'> = {},
): Promise<VerificationResult> {
  return new Verifier({ ...opts, trustedPublicKey, revocationQuery }).verify(license);
}

/** One-line user-facing explanation, distinct per outcome kind */
export function describeResult(result: VerificationResult): string {
  if (result.valid) {
    const base = `License valid for ${result.token.userId}: ${result.daysRemaining} day(s) remaining`;
    switch (result.confirmation) {
      case 'online':
        return `${base} (verified online)`;
      case 'cached':
        return `${base} (UNCONFIRMED: license server unreachable, using status cached at ${new Date((result.checkedAt ?? 0) * 1000).toISOString()})`;
      case 'unconfirmed':
        return `${base} (UNCONFIRMED: license server unreachable, no cached status)`;
    }
  }
  switch (result.reason) {
    case 'SignatureMismatch':
      return `INVALID LICENSE: ${result.message}. The license was not issued by the trusted authority or has been modified.`;
    case 'MalformedToken':
      return `INVALID LICENSE: ${result.message}.`;
    case 'Expired':
      return `TRIAL EXPIRED: ${result.message}. Please contact support to upgrade.`;
    case 'Revoked':
      return `LICENSE REVOKED: ${result.message}.`;
    case 'Unreachable':
      return `LICENSE CHECK REQUIRED: ${result.message}. Please connect to the license server to verify your license.`;
  }
}
