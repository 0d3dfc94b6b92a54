import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { FileOfflineCache, MemoryOfflineCache } from '../src/core/offline-cache.js';
import { setLogOutput, resetLogOutput, type LogEntry } from '../src/core/logger.js';
import { Issuer } from '../src/core/issuer.js';
import { KeyAuthority } from '../src/core/key-authority.js';
import { MetricsCollector } from '../src/core/metrics.js';
import { Verifier } from '../src/core/verifier.js';

describe('MemoryOfflineCache', () => {
  it('stores the latest entry per user', async () => {
    const cache = new MemoryOfflineCache();
    expect(await cache.get('alice')).toBeNull();
    await cache.put({ userId: 'alice', lastKnownRevoked: false, checkedAt: 10 });
    await cache.put({ userId: 'alice', lastKnownRevoked: true, checkedAt: 20 });
    expect(await cache.get('alice')).toEqual({ userId: 'alice', lastKnownRevoked: true, checkedAt: 20 });
  });

  it('hands out copies', async () => {
    const cache = new MemoryOfflineCache();
    await cache.put({ userId: 'alice', lastKnownRevoked: false, checkedAt: 10 });
    const entry = await cache.get('alice');
    if (entry) entry.lastKnownRevoked = true;
    expect((await cache.get('alice'))?.lastKnownRevoked).toBe(false);
  });
});

describe('FileOfflineCache', () => {
  let dir: string;
  let path: string;
  let logs: LogEntry[];

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'trialgate-cache-'));
    path = join(dir, 'cache.json');
    logs = [];
    setLogOutput(entry => logs.push(entry));
  });

  afterEach(async () => {
    resetLogOutput();
    await rm(dir, { recursive: true, force: true });
  });

  it('treats a missing file as empty', async () => {
    expect(await new FileOfflineCache(path).get('alice')).toBeNull();
  });

  it('persists entries across instances', async () => {
    await new FileOfflineCache(path).put({ userId: 'alice', lastKnownRevoked: true, checkedAt: 1_000 });
    expect(await new FileOfflineCache(path).get('alice')).toEqual({ userId: 'alice', lastKnownRevoked: true, checkedAt: 1_000 });
  });

  it('writes a versioned JSON document', async () => {
    const cache = new FileOfflineCache(path);
    await cache.put({ userId: 'bob', lastKnownRevoked: false, checkedAt: 5 });
    await cache.put({ userId: 'alice', lastKnownRevoked: true, checkedAt: 6 });
    expect(JSON.parse(await readFile(path, 'utf-8'))).toEqual({
      version: 1,
      entries: {
        bob: { lastKnownRevoked: false, checkedAt: 5 },
        alice: { lastKnownRevoked: true, checkedAt: 6 },
      },
    });
  });

  it('keeps every entry under concurrent puts', async () => {
    const cache = new FileOfflineCache(path);
    await Promise.all(
      ['a', 'b', 'c', 'd'].map((userId, i) => cache.put({ userId, lastKnownRevoked: false, checkedAt: i })),
    );
    const reloaded = new FileOfflineCache(path);
    for (const userId of ['a', 'b', 'c', 'd']) {
      expect(await reloaded.get(userId)).not.toBeNull();
    }
  });

  it('merges concurrent puts with entries already on disk', async () => {
    await writeFile(path, JSON.stringify({ version: 1, entries: { old: { lastKnownRevoked: true, checkedAt: 1 } } }));
    const cache = new FileOfflineCache(path);
    await Promise.all([
      cache.put({ userId: 'x', lastKnownRevoked: false, checkedAt: 2 }),
      cache.put({ userId: 'y', lastKnownRevoked: true, checkedAt: 3 }),
    ]);
    expect(JSON.parse(await readFile(path, 'utf-8'))).toEqual({
      version: 1,
      entries: {
        old: { lastKnownRevoked: true, checkedAt: 1 },
        x: { lastKnownRevoked: false, checkedAt: 2 },
        y: { lastKnownRevoked: true, checkedAt: 3 },
      },
    });
  });

  it('stores a user named __proto__ like any other', async () => {
    const cache = new FileOfflineCache(path);
    await cache.put({ userId: '__proto__', lastKnownRevoked: true, checkedAt: 7 });
    expect(await cache.get('__proto__')).toEqual({ userId: '__proto__', lastKnownRevoked: true, checkedAt: 7 });
    expect(await new FileOfflineCache(path).get('__proto__')).toEqual({
      userId: '__proto__',
      lastKnownRevoked: true,
      checkedAt: 7,
    });
  });

  it('keeps a cached revocation for a user named __proto__ when offline', async () => {
    const authority = KeyAuthority.generate();
    const license = new Issuer(authority, { clock: () => 1_000 }).issue('__proto__');
    const cache = new FileOfflineCache(path);
    await cache.put({ userId: '__proto__', lastKnownRevoked: true, checkedAt: 900 });

    const result = await new Verifier({
      trustedPublicKey: authority.publicKey(),
      offlineCache: new FileOfflineCache(path),
      clock: () => 1_000,
      metrics: new MetricsCollector(),
    }).verify(license);
    expect(result.valid ? undefined : result.reason).toBe('Revoked');
  });

  it('does not resolve inherited property names as users', async () => {
    await writeFile(path, JSON.stringify({ version: 1, entries: {} }));
    expect(await new FileOfflineCache(path).get('constructor')).toBeNull();
  });

  it('discards a corrupt file with a warning and recovers on the next put', async () => {
    await writeFile(path, '{ not json');
    const cache = new FileOfflineCache(path);
    expect(await cache.get('alice')).toBeNull();
    expect(logs).toHaveLength(1);
    expect(logs[0]).toMatchObject({
      level: 'WARN',
      message: 'Discarding unreadable offline cache',
      context: { path, error: 'invalid JSON' },
    });

    await cache.put({ userId: 'alice', lastKnownRevoked: false, checkedAt: 1 });
    expect(await new FileOfflineCache(path).get('alice')).toEqual({ userId: 'alice', lastKnownRevoked: false, checkedAt: 1 });
  });

  it('discards a file with the wrong shape', async () => {
    await writeFile(path, JSON.stringify({ version: 2, entries: {} }));
    expect(await new FileOfflineCache(path).get('alice')).toBeNull();
    expect(logs).toHaveLength(1);
  });

  it('propagates write failures', async () => {
    const cache = new FileOfflineCache(join(dir, 'missing-dir', 'cache.json'));
    await expect(cache.put({ userId: 'alice', lastKnownRevoked: false, checkedAt: 1 })).rejects.toThrow();
  });
});
