/**
 * Revocation Ledger — authoritative registry of revoked user identities.
 *
 * Per user the state is either not-revoked (the default, including for users
 * never seen) or revoked. There is no transition back.
 */

import { systemClock } from './clock.js';
import { LicenseError } from './errors.js';
import { createLogger } from './logger.js';
import { globalMetrics, type MetricsCollector } from './metrics.js';
import type {
  Clock,
  RevocationQuery,
  RevocationRecord,
  RevocationStorage,
  RevokeOutcome,
} from './types.js';
import { MemoryRevocationStorage } from '../storage/memory.js';

/** Capability interface handed to whoever may read or revoke */
export interface RevocationLedger {
  isRevoked(userId: string): Promise<boolean>;
  revoke(userId: string): Promise<RevokeOutcome>;
  getRecord(userId: string): Promise<RevocationRecord>;
  list(): Promise<RevocationRecord[]>;
}

export interface LedgerOptions {
  storage?: RevocationStorage;
  clock?: Clock;
  metrics?: MetricsCollector;
}

/**
 * Ledger over a RevocationStorage. Every operation runs inside one
 * serializing lock, so a revoke and a concurrent read never interleave
 * across the storage's await points.
 */
export class StoredRevocationLedger implements RevocationLedger {
  private storage: RevocationStorage;
  private clock: Clock;
  private metrics: MetricsCollector;
  private tail: Promise<void> = Promise.resolve();
  private logger = createLogger('RevocationLedger');

  constructor(opts: LedgerOptions = {}) {
    this.storage = opts.storage ?? new MemoryRevocationStorage();
    this.clock = opts.clock ?? systemClock;
    this.metrics = opts.metrics ?? globalMetrics;
  }

  async isRevoked(userId: string): Promise<boolean> {
    const record = await this.getRecord(userId);
    this.metrics.counter('license.checks', { revoked: String(record.revoked) });
    return record.revoked;
  }

  async getRecord(userId: string): Promise<RevocationRecord> {
    assertUserId(userId);
    return this.exclusive(async () => {
      const stored = await this.storage.getRevocation(userId);
      return stored ?? { userId, revoked: false };
    });
  }

  /** Idempotent: revoking a revoked user keeps the original revokedAt */
  async revoke(userId: string): Promise<RevokeOutcome> {
    assertUserId(userId);
    return this.exclusive(async () => {
      const existing = await this.storage.getRevocation(userId);
      if (existing?.revoked) {
        return { record: existing, changed: false };
      }
      const record: RevocationRecord = { userId, revoked: true, revokedAt: this.clock() };
      await this.storage.saveRevocation(record);
      this.metrics.counter('license.revoked');
      this.logger.info('License revoked', { userId });
      return { record, changed: true };
    });
  }

  async list(): Promise<RevocationRecord[]> {
    return this.exclusive(() => this.storage.listRevocations());
  }

  private exclusive<T>(fn: () => Promise<T>): Promise<T> {
    const run = this.tail.then(fn);
    // Keep the chain alive whether or not this operation fails
    this.tail = run.then(
      () => undefined,
      () => undefined,
    );
    return run;
  }
}

/** Adapt an in-process ledger to the verifier's query signature */
export function ledgerQuery(ledger: Pick<RevocationLedger, 'isRevoked'>): RevocationQuery {
  return async (userId, signal) => {
    signal.throwIfAborted();
    return ledger.isRevoked(userId);
  };
}

function assertUserId(userId: string): void {
  if (userId.trim().length === 0) {
    throw new LicenseError('InvalidRequest', 'userId must not be empty');
  }
}
