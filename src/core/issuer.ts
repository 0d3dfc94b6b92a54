/**
 * Issuer — mints signed licenses for a user identity.
 */

import { systemClock } from './clock.js';
import { encodeToken } from './codec.js';
import { LicenseError } from './errors.js';
import type { KeyAuthority } from './key-authority.js';
import { SECONDS_PER_DAY, type Clock, type LicenseToken, type SignedLicense } from './types.js';

export const DEFAULT_TTL_SECONDS = 14 * SECONDS_PER_DAY;

export interface IssuerOptions {
  clock?: Clock;
  defaultTtlSeconds?: number;
}

export class Issuer {
  private clock: Clock;
  readonly defaultTtlSeconds: number;

  constructor(
    private authority: KeyAuthority,
    opts: IssuerOptions = {},
  ) {
    this.clock = opts.clock ?? systemClock;
    this.defaultTtlSeconds = opts.defaultTtlSeconds ?? DEFAULT_TTL_SECONDS;
    assertTtl(this.defaultTtlSeconds);
  }

  /**
   * Issue a license valid for `ttlSeconds` from now.
   * @throws LicenseError InvalidRequest for a blank userId or a non-positive ttl
   */
  issue(userId: string, ttlSeconds: number = this.defaultTtlSeconds): SignedLicense {
    if (userId.trim().length === 0) {
      throw new LicenseError('InvalidRequest', 'userId must not be empty');
    }
    assertTtl(ttlSeconds);

    const issuedAt = this.clock();
    if (issuedAt + ttlSeconds > Number.MAX_SAFE_INTEGER) {
      throw new LicenseError('InvalidRequest', `ttl ${ttlSeconds} puts the expiry past the largest supported timestamp`);
    }
    const token: LicenseToken = { userId, issuedAt, expiresAt: issuedAt + ttlSeconds };
    const signature = this.authority.sign(encodeToken(token));
    return { token, signature };
  }
}

function assertTtl(ttlSeconds: number): void {
  if (!Number.isSafeInteger(ttlSeconds) || ttlSeconds <= 0) {
    throw new LicenseError('InvalidRequest', `ttl must be a positive whole number of seconds, got ${ttlSeconds}`);
  }
}
