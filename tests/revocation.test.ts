import { describe, it, expect, beforeEach } from 'vitest';
import { StoredRevocationLedger, ledgerQuery } from '../src/core/revocation.js';
import { MetricsCollector } from '../src/core/metrics.js';
import { isLicenseError } from '../src/core/errors.js';
import { MemoryRevocationStorage } from '../src/storage/memory.js';
import type { RevocationRecord, RevocationStorage } from '../src/core/types.js';

describe('StoredRevocationLedger', () => {
  let now: number;
  let metrics: MetricsCollector;
  let ledger: StoredRevocationLedger;

  beforeEach(() => {
    now = 5_000;
    metrics = new MetricsCollector();
    ledger = new StoredRevocationLedger({ storage: new MemoryRevocationStorage(), clock: () => now, metrics });
  });

  it('reports unknown users as not revoked', async () => {
    expect(await ledger.isRevoked('never-seen')).toBe(false);
    expect(await ledger.getRecord('never-seen')).toEqual({ userId: 'never-seen', revoked: false });
  });

  it('revokes a user and records when', async () => {
    const outcome = await ledger.revoke('alice');
    expect(outcome).toEqual({ record: { userId: 'alice', revoked: true, revokedAt: 5_000 }, changed: true });
    expect(await ledger.isRevoked('alice')).toBe(true);
    expect(await ledger.isRevoked('bob')).toBe(false);
  });

  it('is idempotent and keeps the first revocation time', async () => {
    await ledger.revoke('alice');
    now = 9_000;
    const second = await ledger.revoke('alice');
    expect(second).toEqual({ record: { userId: 'alice', revoked: true, revokedAt: 5_000 }, changed: false });
    expect(metrics.getCounter('license.revoked')).toBe(1);
  });

  it('lists revocations sorted by user', async () => {
    await ledger.revoke('carol');
    await ledger.revoke('alice');
    expect((await ledger.list()).map(r => r.userId)).toEqual(['alice', 'carol']);
  });

  it('counts checks by outcome', async () => {
    await ledger.revoke('alice');
    await ledger.isRevoked('alice');
    await ledger.isRevoked('bob');
    await ledger.isRevoked('bob');
    expect(metrics.getCounter('license.checks', { revoked: 'true' })).toBe(1);
    expect(metrics.getCounter('license.checks', { revoked: 'false' })).toBe(2);
  });

  it('rejects a blank user id', async () => {
    const err = await ledger.revoke(' ').catch((e: unknown) => e);
    expect(isLicenseError(err, 'InvalidRequest')).toBe(true);
    await expect(ledger.isRevoked('')).rejects.toThrow('userId must not be empty');
  });

  it('serializes concurrent revocations of the same user', async () => {
    const outcomes = await Promise.all(Array.from({ length: 10 }, () => ledger.revoke('alice')));
    expect(outcomes.filter(o => o.changed)).toHaveLength(1);
    expect(await ledger.list()).toHaveLength(1);
  });

  it('a read issued after a revoke observes it', async () => {
    const revoked = ledger.revoke('alice');
    const read = ledger.isRevoked('alice');
    await revoked;
    expect(await read).toBe(true);
  });

  it('keeps serving after a storage failure', async () => {
    const failing = new MemoryRevocationStorage();
    let fail = true;
    const storage: RevocationStorage = {
      getRevocation: (userId) => failing.getRevocation(userId),
      saveRevocation: async (record: RevocationRecord) => {
        if (fail) throw new Error('disk full');
        await failing.saveRevocation(record);
      },
      listRevocations: () => failing.listRevocations(),
    };
    const fragile = new StoredRevocationLedger({ storage, clock: () => now, metrics });
    await expect(fragile.revoke('alice')).rejects.toThrow('disk full');
    fail = false;
    expect((await fragile.revoke('alice')).changed).toBe(true);
  });
});

describe('ledgerQuery', () => {
  it('answers from the ledger', async () => {
    const ledger = new StoredRevocationLedger({ metrics: new MetricsCollector() });
    await ledger.revoke('alice');
    const query = ledgerQuery(ledger);
    expect(await query('alice', new AbortController().signal)).toBe(true);
    expect(await query('bob', new AbortController().signal)).toBe(false);
  });

  it('refuses to run once aborted', async () => {
    const query = ledgerQuery({ isRevoked: async () => false });
    const controller = new AbortController();
    controller.abort();
    await expect(query('alice', controller.signal)).rejects.toBeDefined();
  });
});
