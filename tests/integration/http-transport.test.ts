/**
 * Integration tests — license server and client over real HTTP on a loopback port.
 */

import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import { LicenseHttpServer } from '../../src/transport/http-server.js';
import { LicenseClient } from '../../src/transport/http-client.js';
import { Issuer } from '../../src/core/issuer.js';
import { KeyAuthority } from '../../src/core/key-authority.js';
import { StoredRevocationLedger } from '../../src/core/revocation.js';
import { Verifier } from '../../src/core/verifier.js';
import { CircuitOpenError } from '../../src/core/circuit-breaker.js';
import { MetricsCollector } from '../../src/core/metrics.js';
import { isLicenseError } from '../../src/core/errors.js';
import type { RevocationLedger } from '../../src/core/revocation.js';

const NOW = 1_760_000_000;
const ADMIN_TOKEN = 'test-admin-token';

describe('HTTP Transport Integration', () => {
  const authority = KeyAuthority.fromPrivateKey('33'.repeat(32));
  const metrics = new MetricsCollector();
  let server: LicenseHttpServer;
  let baseUrl: string;

  beforeAll(async () => {
    server = new LicenseHttpServer(
      { port: 0, host: '127.0.0.1', basePath: '', adminToken: ADMIN_TOKEN },
      {
        authority,
        issuer: new Issuer(authority, { clock: () => NOW }),
        ledger: new StoredRevocationLedger({ clock: () => NOW, metrics }),
      },
      { metrics },
    );
    await server.start();
    baseUrl = `http://127.0.0.1:${server.port}`;
  });

  afterAll(async () => {
    await server.stop();
  });

  const post = (path: string, body: string, headers: Record<string, string> = {}) =>
    fetch(`${baseUrl}${path}`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json', ...headers },
      body,
    });

  describe('routes', () => {
    it('issues a 14-day trial', async () => {
      const res = await post('/api/trial/issue', JSON.stringify({ user_id: 'alice' }));
      expect(res.status).toBe(200);
      const body: unknown = await res.json();
      expect(body).toMatchObject({
        token: `{"expires_at":${NOW + 1_209_600},"issued_at":${NOW},"user_id":"alice"}`,
        expires_at: NOW + 1_209_600,
        message: 'Trial issued for alice (14 days)',
      });
    });

    it('reports revocation status', async () => {
      const res = await fetch(`${baseUrl}/api/trial/check?user_id=nobody`);
      const body: unknown = await res.json();
      expect(body).toEqual({ revoked: false, message: 'User nobody is active' });
    });

    it('serves the public key as hex', async () => {
      const body: unknown = await (await fetch(`${baseUrl}/api/public-key`)).json();
      expect(body).toEqual({ public_key: authority.publicKeyHex(), format: 'ed25519' });
    });

    it('answers health checks', async () => {
      const res = await fetch(`${baseUrl}/health`);
      expect(res.status).toBe(200);
      expect(await res.json()).toMatchObject({ status: 'ok' });
    });

    it('requires the admin token to revoke', async () => {
      const res = await post('/api/trial/revoke', JSON.stringify({ user_id: 'alice' }));
      expect(res.status).toBe(401);
      expect(await res.json()).toEqual({ error: { code: 401, kind: 'Unauthorized', message: 'Admin token required' } });

      const wrong = await post('/api/trial/revoke', JSON.stringify({ user_id: 'alice' }), { Authorization: 'Bearer test-admin-tokeX' });
      expect(wrong.status).toBe(401);
    });

    it('requires the admin token for a custom ttl', async () => {
      const body = JSON.stringify({ user_id: 'bob', ttl_seconds: 60 });
      expect((await post('/api/trial/issue', body)).status).toBe(401);

      const res = await post('/api/trial/issue', body, { Authorization: `Bearer ${ADMIN_TOKEN}` });
      expect(res.status).toBe(200);
      expect(await res.json()).toMatchObject({ expires_at: NOW + 60, message: 'Trial issued for bob (0 days)' });
    });

    it('requires the admin token for metrics', async () => {
      expect((await fetch(`${baseUrl}/metrics`)).status).toBe(401);
      const res = await fetch(`${baseUrl}/metrics`, { headers: { Authorization: `Bearer ${ADMIN_TOKEN}` } });
      expect(res.status).toBe(200);
      expect(await res.json()).toHaveProperty('counters');
    });
  });

  describe('request errors', () => {
    it('returns 404 for unknown paths', async () => {
      const res = await fetch(`${baseUrl}/api/unknown`);
      expect(res.status).toBe(404);
      expect(await res.json()).toEqual({ error: { code: 404, kind: 'NotFound', message: 'Not found' } });
    });

    it('returns 405 with the allowed methods', async () => {
      const res = await fetch(`${baseUrl}/api/trial/issue`);
      expect(res.status).toBe(405);
      expect(res.headers.get('allow')).toBe('POST');
      expect(await res.json()).toEqual({ error: { code: 405, kind: 'MethodNotAllowed', message: 'Method GET not allowed' } });
    });

    it('returns 415 for a non-JSON content type', async () => {
      const res = await post('/api/trial/issue', 'user_id=alice', { 'Content-Type': 'text/plain' });
      expect(res.status).toBe(415);
      expect(await res.json()).toEqual({
        error: { code: 415, kind: 'UnsupportedMediaType', message: 'Content-Type must be application/json' },
      });
    });

    it('returns 400 for an unparseable body', async () => {
      const res = await post('/api/trial/issue', '{"user_id":');
      expect(res.status).toBe(400);
      expect(await res.json()).toEqual({ error: { code: 400, kind: 'InvalidRequest', message: 'Invalid JSON body' } });
    });

    it('returns 400 for a body that fails validation', async () => {
      for (const body of [{}, { user_id: '' }, { user_id: 'alice', extra: true }, { user_id: 'alice', ttl_seconds: 0 }]) {
        const res = await post('/api/trial/issue', JSON.stringify(body), { Authorization: `Bearer ${ADMIN_TOKEN}` });
        expect(res.status).toBe(400);
      }
    });

    it('returns 400 when issuing for a blank user', async () => {
      const res = await post('/api/trial/issue', JSON.stringify({ user_id: '   ' }));
      expect(res.status).toBe(400);
      expect(await res.json()).toEqual({ error: { code: 400, kind: 'InvalidRequest', message: 'userId must not be empty' } });
    });

    it('returns 400 for a ttl that overflows the expiry timestamp', async () => {
      const res = await post('/api/trial/issue', '{"user_id":"erin","ttl_seconds":9007199254740991}', {
        Authorization: `Bearer ${ADMIN_TOKEN}`,
      });
      expect(res.status).toBe(400);
      expect(await res.json()).toEqual({
        error: {
          code: 400,
          kind: 'InvalidRequest',
          message: 'ttl 9007199254740991 puts the expiry past the largest supported timestamp',
        },
      });
    });

    it('treats a null ttl as the default without requiring the admin token', async () => {
      const res = await post('/api/trial/issue', JSON.stringify({ user_id: 'frank', ttl_seconds: null }));
      expect(res.status).toBe(200);
      expect(await res.json()).toMatchObject({
        expires_at: NOW + 1_209_600,
        message: 'Trial issued for frank (14 days)',
      });
    });

    it('returns 400 when the check has no user', async () => {
      const res = await fetch(`${baseUrl}/api/trial/check`);
      expect(res.status).toBe(400);
      expect(await res.json()).toEqual({ error: { code: 400, kind: 'InvalidRequest', message: 'Missing user_id query parameter' } });
    });
  });

  describe('LicenseClient', () => {
    it('issues, verifies, revokes and sees the revocation', async () => {
      const admin = new LicenseClient(baseUrl, { adminToken: ADMIN_TOKEN });
      const client = new LicenseClient(`${baseUrl}/`);

      const license = await client.issue('carol');
      expect(license.expiresAt).toBe(NOW + 1_209_600);

      const verifier = new Verifier({
        trustedPublicKey: await client.publicKey(),
        revocationQuery: client.revocationQuery(),
        clock: () => NOW + 60,
        metrics,
      });
      const before = await verifier.verifyEncoded(license.token, license.signature);
      expect(before.valid && before.confirmation).toBe('online');
      expect(before.valid && before.daysRemaining).toBe(13);

      expect(await admin.revoke('carol')).toEqual({ changed: true });
      expect(await admin.revoke('carol')).toEqual({ changed: false });
      expect(await client.check('carol')).toBe(true);

      const after = await verifier.verifyEncoded(license.token, license.signature);
      expect(after.valid ? undefined : after.reason).toBe('Revoked');
    });

    it('counts calls on the injected metrics collector', async () => {
      const clientMetrics = new MetricsCollector();
      await new LicenseClient(baseUrl, { metrics: clientMetrics }).publicKey();
      expect(clientMetrics.getCounter('client.calls', { path: '/api/public-key' })).toBe(1);
    });

    it('surfaces a 4xx as InvalidRequest with the server message', async () => {
      const err = await new LicenseClient(baseUrl).revoke('dave').catch((e: unknown) => e);
      expect(isLicenseError(err, 'InvalidRequest')).toBe(true);
      expect(err instanceof Error ? err.message : '').toBe(
        'License server rejected POST /api/trial/revoke: Admin token required',
      );
    });
  });
});

describe('LicenseClient failure handling', () => {
  let deadUrl: string;

  beforeAll(async () => {
    const authority = KeyAuthority.generate();
    const probe = new LicenseHttpServer(
      { port: 0, host: '127.0.0.1', basePath: '' },
      { authority, issuer: new Issuer(authority), ledger: new StoredRevocationLedger({ metrics: new MetricsCollector() }) },
      { metrics: new MetricsCollector() },
    );
    await probe.start();
    deadUrl = `http://127.0.0.1:${probe.port}`;
    await probe.stop();
  });

  it('reports a refused connection as Unreachable', async () => {
    const client = new LicenseClient(deadUrl, { retry: { maxRetries: 0 } });
    const err = await client.check('alice').catch((e: unknown) => e);
    expect(isLicenseError(err, 'Unreachable')).toBe(true);
  });

  it('opens the circuit after repeated failures', async () => {
    const client = new LicenseClient(deadUrl, { circuitBreaker: { failureThreshold: 2, resetTimeoutMs: 60_000 } });
    await client.check('alice').catch(() => undefined);
    await client.check('alice').catch(() => undefined);
    expect(client.getCircuitBreaker().getState()).toBe('OPEN');
    await expect(client.check('alice')).rejects.toThrow(CircuitOpenError);
  });

  it('lets the verifier fall back when the server is down', async () => {
    const authority = KeyAuthority.generate();
    const license = new Issuer(authority, { clock: () => NOW }).issue('alice');
    const client = new LicenseClient(deadUrl);
    const result = await new Verifier({
      trustedPublicKey: authority.publicKey(),
      revocationQuery: client.revocationQuery(),
      clock: () => NOW,
      offlinePolicy: 'fail-closed',
      metrics: new MetricsCollector(),
    }).verify(license);
    expect(result).toEqual({
      valid: false,
      reason: 'Unreachable',
      message: 'License server unreachable and no previous online check found',
      token: license.token,
    });
  });

  it('maps a server-side failure to a 500 and to Unreachable in the client', async () => {
    const authority = KeyAuthority.generate();
    const failingLedger: RevocationLedger = {
      isRevoked: async () => {
        throw new Error('database is locked');
      },
      revoke: async () => {
        throw new Error('database is locked');
      },
      getRecord: async (userId) => ({ userId, revoked: false }),
      list: async () => [],
    };
    const broken = new LicenseHttpServer(
      { port: 0, host: '127.0.0.1', basePath: '' },
      { authority, issuer: new Issuer(authority), ledger: failingLedger },
      { metrics: new MetricsCollector() },
    );
    await broken.start();
    try {
      const url = `http://127.0.0.1:${broken.port}`;
      const res = await fetch(`${url}/api/trial/check?user_id=alice`);
      expect(res.status).toBe(500);
      expect(await res.json()).toEqual({ error: { code: 500, kind: 'Internal', message: 'Internal server error' } });

      const err = await new LicenseClient(url).check('alice').catch((e: unknown) => e);
      expect(isLicenseError(err, 'Unreachable')).toBe(true);
      expect(err instanceof Error ? err.message : '').toBe('License server error 500');
    } finally {
      await broken.stop();
    }
  });
});
