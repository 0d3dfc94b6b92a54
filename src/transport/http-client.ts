/**
 * License HTTP Client — talks to a LicenseHttpServer from the consuming side.
 */

import type { ValidateFunction } from 'ajv';
import { CircuitBreaker, type CircuitBreakerConfig } from '../core/circuit-breaker.js';
import { LicenseError, errorMessage } from '../core/errors.js';
import { createLogger } from '../core/logger.js';
import { globalMetrics, type MetricsCollector } from '../core/metrics.js';
import {
  describeErrors,
  validateCheckResponse,
  validateIssueResponse,
  validatePublicKeyResponse,
  validateRevokeResponse,
  type CheckResponseBody,
  type IssueResponseBody,
  type PublicKeyResponseBody,
  type RevokeResponseBody,
} from '../core/schemas.js';
import type { EncodedLicense, RevocationQuery } from '../core/types.js';
import { API_ROUTES } from './types.js';

export interface RetryConfig {
  maxRetries: number;
  baseDelayMs: number;
  maxDelayMs: number;
}

export interface LicenseClientOptions {
  /** Sent as a bearer token on admin calls (revoke) */
  adminToken?: string;
  retry?: Partial<RetryConfig>;
  circuitBreaker?: CircuitBreakerConfig;
  metrics?: MetricsCollector;
}

const DEFAULT_RETRY: RetryConfig = { maxRetries: 2, baseDelayMs: 100, maxDelayMs: 2000 };

/**
 * Client for the license server. Every failure to get a well-formed
 * answer surfaces as LicenseError('Unreachable'), except 4xx answers,
 * which are the caller's fault and surface as InvalidRequest.
 */
export class LicenseClient {
  private baseUrl: string;
  private retryConfig: RetryConfig;
  private circuitBreaker: CircuitBreaker;
  private metrics: MetricsCollector;
  private logger = createLogger('LicenseClient');

  constructor(baseUrl: string, private opts: LicenseClientOptions = {}) {
    this.baseUrl = baseUrl.replace(/\/$/, '');
    this.retryConfig = { ...DEFAULT_RETRY, ...opts.retry };
    this.metrics = opts.metrics ?? globalMetrics;
    this.circuitBreaker = new CircuitBreaker(
      opts.circuitBreaker ?? { failureThreshold: 5, resetTimeoutMs: 30_000 },
    );
  }

  /** Get the circuit breaker for inspection/testing. */
  getCircuitBreaker(): CircuitBreaker {
    return this.circuitBreaker;
  }

  /** Request a new trial license; returns the wire form to store as-is. */
  async issue(userId: string): Promise<EncodedLicense & { expiresAt: number }> {
    const body = await this.request<IssueResponseBody>(
      'POST', API_ROUTES.issue, validateIssueResponse, { body: { user_id: userId }, retry: false },
    );
    return { token: body.token, signature: body.signature, expiresAt: body.expires_at };
  }

  /** Online revocation status. Not retried: the verifier's deadline bounds it. */
  async check(userId: string, signal?: AbortSignal): Promise<boolean> {
    const query = new URLSearchParams({ user_id: userId });
    const body = await this.request<CheckResponseBody>(
      'GET', `${API_ROUTES.check}?${query}`, validateCheckResponse, { signal, retry: false },
    );
    return body.revoked;
  }

  async revoke(userId: string): Promise<{ changed: boolean }> {
    const body = await this.request<RevokeResponseBody>(
      'POST', API_ROUTES.revoke, validateRevokeResponse, { body: { user_id: userId }, admin: true, retry: false },
    );
    return { changed: body.changed };
  }

  /** Fetch the server's public key as hex. Pin it; never trust it per-check. */
  async publicKey(): Promise<string> {
    const body = await this.request<PublicKeyResponseBody>('GET', API_ROUTES.publicKey, validatePublicKeyResponse);
    return body.public_key;
  }

  /** This client as the verifier's revocation query */
  revocationQuery(): RevocationQuery {
    return (userId, signal) => this.check(userId, signal);
  }

  // ── Internals ──

  private async request<T>(
    method: 'GET' | 'POST',
    path: string,
    validate: ValidateFunction<T>,
    init: { body?: unknown; signal?: AbortSignal; admin?: boolean; retry?: boolean } = {},
  ): Promise<T> {
    const headers: Record<string, string> = {};
    if (init.body !== undefined) headers['Content-Type'] = 'application/json';
    if (init.admin && this.opts.adminToken) headers['Authorization'] = `Bearer ${this.opts.adminToken}`;

    const resp = await this.circuitBreaker.execute(() =>
      this.fetchWithRetry(`${this.baseUrl}${path}`, {
        method,
        headers,
        body: init.body === undefined ? undefined : JSON.stringify(init.body),
        signal: init.signal,
      }, init.retry ?? true),
    );

    let payload: unknown;
    try {
      payload = await resp.json();
    } catch (err) {
      throw new LicenseError('Unreachable', `Unreadable response from ${path}: ${errorMessage(err)}`, { cause: err });
    }

    if (resp.status >= 400 && resp.status < 500) {
      throw new LicenseError('InvalidRequest', `License server rejected ${method} ${path}: ${extractMessage(payload) ?? resp.status}`);
    }
    if (!validate(payload)) {
      throw new LicenseError('Unreachable', `Unexpected response from ${path}: ${describeErrors(validate)}`);
    }
    this.metrics.counter('client.calls', { path: path.split('?')[0] });
    return payload;
  }

  /** Transport failures and 5xx count against the circuit; 4xx do not. */
  private async fetchWithRetry(url: string, init: RequestInit, retry: boolean): Promise<Response> {
    const attempts = retry ? this.retryConfig.maxRetries + 1 : 1;
    let lastError: unknown;
    for (let attempt = 0; attempt < attempts; attempt++) {
      try {
        const resp = await fetch(url, init);
        if (resp.status >= 500) {
          throw new LicenseError('Unreachable', `License server error ${resp.status}`);
        }
        return resp;
      } catch (err) {
        lastError = err;
        if (init.signal?.aborted) break;
        if (attempt < attempts - 1) {
          const delay = Math.min(this.retryConfig.baseDelayMs * 2 ** attempt, this.retryConfig.maxDelayMs);
          this.logger.debug('Retrying license server request', { url, attempt, delay });
          await new Promise(r => setTimeout(r, delay));
        }
      }
    }
    if (lastError instanceof LicenseError) throw lastError;
    throw new LicenseError('Unreachable', `Could not reach license server: ${errorMessage(lastError)}`, { cause: lastError });
  }
}

function extractMessage(payload: unknown): string | undefined {
  if (typeof payload !== 'object' || payload === null || !('error' in payload)) return undefined;
  const error = payload.error;
  if (typeof error !== 'object' || error === null || !('message' in error)) return undefined;
  return typeof error.message === 'string' ? error.message : undefined;
}
