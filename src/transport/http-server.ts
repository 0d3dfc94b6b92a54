/**
 * License HTTP Server — exposes issue / check / revoke / public-key over HTTP.
 * Uses Node.js built-in http module (no Express).
 */

import { createServer, type Server, type IncomingMessage, type ServerResponse } from 'node:http';
import type { Socket } from 'node:net';
import { timingSafeEqual } from 'node:crypto';
import { encodeTokenString } from '../core/codec.js';
import { toHex } from '../core/crypto.js';
import { errorMessage, isLicenseError } from '../core/errors.js';
import type { Issuer } from '../core/issuer.js';
import type { KeyAuthority } from '../core/key-authority.js';
import { createLogger, type Logger } from '../core/logger.js';
import { globalMetrics, type MetricsCollector } from '../core/metrics.js';
import type { RevocationLedger } from '../core/revocation.js';
import { describeErrors, validateUserRequest, type UserRequestBody } from '../core/schemas.js';
import { API_ROUTES, type ErrorBody, type ServerConfig } from './types.js';

/** Maximum request body size in bytes (64 KiB) */
const MAX_BODY_BYTES = 65_536;

/** Request body read timeout in milliseconds */
const REQUEST_TIMEOUT_MS = 10_000;

export interface LicenseServices {
  authority: KeyAuthority;
  issuer: Issuer;
  ledger: RevocationLedger;
}

type BodyResult =
  | { ok: true; value: unknown }
  | { ok: false; error: string };

type Handler = (req: IncomingMessage, res: ServerResponse, url: URL) => Promise<void> | void;

class HttpError extends Error {
  constructor(
    readonly status: number,
    readonly kind: ErrorBody['error']['kind'],
    message: string,
  ) {
    super(message);
  }
}

export class LicenseHttpServer {
  private server: Server | null = null;
  private startedAt = 0;
  private connections = new Set<Socket>();
  private logger: Logger;
  private metrics: MetricsCollector;
  private routes: Map<string, Partial<Record<string, Handler>>>;

  constructor(
    private config: ServerConfig,
    private services: LicenseServices,
    opts?: { metrics?: MetricsCollector },
  ) {
    this.logger = createLogger('LicenseHttpServer');
    this.metrics = opts?.metrics ?? globalMetrics;
    this.routes = new Map<string, Partial<Record<string, Handler>>>([
      [API_ROUTES.issue, { POST: (req, res) => this.handleIssue(req, res) }],
      [API_ROUTES.check, { GET: (_req, res, url) => this.handleCheck(res, url) }],
      [API_ROUTES.revoke, { POST: (req, res) => this.handleRevoke(req, res) }],
      [API_ROUTES.publicKey, { GET: (_req, res) => this.handlePublicKey(res) }],
      [API_ROUTES.health, { GET: (_req, res) => this.handleHealth(res) }],
      [API_ROUTES.metrics, { GET: (req, res) => this.handleMetrics(req, res) }],
    ]);
  }

  async start(): Promise<void> {
    return new Promise((resolve, reject) => {
      this.server = createServer((req, res) => {
        void this.handleRequest(req, res);
      });
      this.server.on('connection', (socket) => {
        this.connections.add(socket);
        socket.on('close', () => this.connections.delete(socket));
      });
      this.server.once('error', reject);
      this.server.listen(this.config.port, this.config.host, () => {
        this.startedAt = Date.now();
        this.logger.info('Server started', {
          host: this.config.host,
          port: this.port,
          publicKey: this.services.authority.publicKeyHex(),
        });
        resolve();
      });
    });
  }

  async stop(): Promise<void> {
    this.logger.info('Server stopping');
    for (const socket of this.connections) {
      socket.destroy();
    }
    this.connections.clear();

    return new Promise((resolve) => {
      if (!this.server) { resolve(); return; }
      this.server.close(() => resolve());
      this.server = null;
    });
  }

  /** The actual port after listen (useful when port=0) */
  get port(): number {
    const addr = this.server?.address();
    if (addr && typeof addr === 'object') return addr.port;
    return this.config.port;
  }

  // ── Request Router ──

  private async handleRequest(req: IncomingMessage, res: ServerResponse): Promise<void> {
    const startTime = Date.now();
    this.setCors(res);
    if (req.method === 'OPTIONS') {
      res.writeHead(204);
      res.end();
      return;
    }

    const url = new URL(req.url ?? '/', `http://${req.headers.host ?? 'localhost'}`);
    const base = this.config.basePath;
    const route = url.pathname.startsWith(base) ? url.pathname.slice(base.length) : url.pathname;
    const method = req.method ?? 'GET';
    this.metrics.counter('http.requests', { method, path: route });

    try {
      const handlers = this.routes.get(route);
      if (!handlers) {
        throw new HttpError(404, 'NotFound', 'Not found');
      }
      const handler = handlers[method];
      if (!handler) {
        res.setHeader('Allow', Object.keys(handlers).join(', '));
        throw new HttpError(405, 'MethodNotAllowed', `Method ${method} not allowed`);
      }
      await handler(req, res, url);
    } catch (err) {
      this.sendError(res, req, route, err);
    } finally {
      this.metrics.histogram('http.duration_ms', Date.now() - startTime, { path: route });
    }
  }

  // ── Route Handlers ──

  private async handleIssue(req: IncomingMessage, res: ServerResponse): Promise<void> {
    const body = await this.readUserRequest(req);
    // null means "use the default ttl"
    const ttlSeconds = body.ttl_seconds ?? undefined;
    if (ttlSeconds !== undefined) {
      this.requireAdmin(req);
    }

    const license = this.services.issuer.issue(body.user_id, ttlSeconds);
    const days = Math.floor((license.token.expiresAt - license.token.issuedAt) / 86_400);
    this.metrics.counter('license.issued');
    this.logger.info('Issued trial', { userId: body.user_id, expiresAt: license.token.expiresAt });

    this.sendJson(res, 200, {
      token: encodeTokenString(license.token),
      signature: toHex(license.signature),
      expires_at: license.token.expiresAt,
      message: `Trial issued for ${body.user_id} (${days} days)`,
    });
  }

  private async handleCheck(res: ServerResponse, url: URL): Promise<void> {
    const userId = url.searchParams.get('user_id');
    if (!userId) {
      throw new HttpError(400, 'InvalidRequest', 'Missing user_id query parameter');
    }
    const revoked = await this.services.ledger.isRevoked(userId);
    this.sendJson(res, 200, {
      revoked,
      message: revoked ? `User ${userId} has been revoked` : `User ${userId} is active`,
    });
  }

  private async handleRevoke(req: IncomingMessage, res: ServerResponse): Promise<void> {
    this.requireAdmin(req);
    const body = await this.readUserRequest(req);
    const { changed } = await this.services.ledger.revoke(body.user_id);
    this.sendJson(res, 200, {
      ok: true,
      changed,
      message: changed ? `Trial revoked for ${body.user_id}` : `Trial for ${body.user_id} was already revoked`,
    });
  }

  private handlePublicKey(res: ServerResponse): void {
    this.sendJson(res, 200, {
      public_key: this.services.authority.publicKeyHex(),
      format: 'ed25519',
    });
  }

  private handleHealth(res: ServerResponse): void {
    this.sendJson(res, 200, {
      status: 'ok',
      uptime: Date.now() - this.startedAt,
    });
  }

  private handleMetrics(req: IncomingMessage, res: ServerResponse): void {
    this.requireAdmin(req);
    this.sendJson(res, 200, this.metrics.getSnapshot());
  }

  // ── Helpers ──

  private requireAdmin(req: IncomingMessage): void {
    const expected = this.config.adminToken;
    if (!expected) return;
    const auth = req.headers.authorization ?? '';
    const presented = auth.startsWith('Bearer ') ? auth.slice(7) : '';
    const a = Buffer.from(presented);
    const b = Buffer.from(expected);
    if (a.length !== b.length || !timingSafeEqual(a, b)) {
      throw new HttpError(401, 'Unauthorized', 'Admin token required');
    }
  }

  private async readUserRequest(req: IncomingMessage): Promise<UserRequestBody> {
    const contentType = req.headers['content-type'] ?? '';
    if (!contentType.includes('application/json')) {
      throw new HttpError(415, 'UnsupportedMediaType', 'Content-Type must be application/json');
    }
    const body = await this.readBody(req);
    if (!body.ok) {
      throw new HttpError(400, 'InvalidRequest', body.error);
    }
    if (!validateUserRequest(body.value)) {
      throw new HttpError(400, 'InvalidRequest', `Invalid request: ${describeErrors(validateUserRequest)}`);
    }
    return body.value;
  }

  private sendError(res: ServerResponse, req: IncomingMessage, route: string, err: unknown): void {
    if (err instanceof HttpError) {
      this.sendJson(res, err.status, { error: { code: err.status, kind: err.kind, message: err.message } });
      return;
    }
    if (isLicenseError(err, 'InvalidRequest')) {
      this.sendJson(res, 400, { error: { code: 400, kind: err.kind, message: err.message } });
      return;
    }
    this.logger.error('Request error', { method: req.method, path: route, error: errorMessage(err) });
    this.metrics.counter('http.errors', { path: route });
    this.sendJson(res, 500, { error: { code: 500, kind: 'Internal', message: 'Internal server error' } });
  }

  private setCors(res: ServerResponse): void {
    const origins = this.config.corsOrigins;
    res.setHeader('Access-Control-Allow-Origin', origins && origins.length > 0 ? origins[0] : '*');
    res.setHeader('Access-Control-Allow-Methods', 'GET, POST, OPTIONS');
    res.setHeader('Access-Control-Allow-Headers', 'Content-Type, Authorization');
  }

  private sendJson(res: ServerResponse, status: number, body: unknown): void {
    if (res.headersSent) return;
    res.writeHead(status, { 'Content-Type': 'application/json' });
    res.end(JSON.stringify(body));
  }

  private readBody(req: IncomingMessage): Promise<BodyResult> {
    return new Promise((resolve) => {
      const chunks: Buffer[] = [];
      let size = 0;
      const timeout = setTimeout(() => {
        req.destroy();
        resolve({ ok: false, error: 'Request body timed out' });
      }, REQUEST_TIMEOUT_MS);

      req.on('data', (chunk: Buffer) => {
        size += chunk.length;
        if (size > MAX_BODY_BYTES) {
          clearTimeout(timeout);
          req.destroy();
          resolve({ ok: false, error: 'Request body too large' });
          return;
        }
        chunks.push(chunk);
      });
      req.on('end', () => {
        clearTimeout(timeout);
        try {
          resolve({ ok: true, value: JSON.parse(Buffer.concat(chunks).toString('utf-8')) });
        } catch {
          resolve({ ok: false, error: 'Invalid JSON body' });
        }
      });
      req.on('error', (err) => {
        clearTimeout(timeout);
        resolve({ ok: false, error: `Request error: ${err.message}` });
      });
    });
  }
}
