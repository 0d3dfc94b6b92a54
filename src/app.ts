/**
 * Composition root for the license server: builds the key authority, issuer,
 * ledger and HTTP server from settings.
 */

import { Issuer } from './core/issuer.js';
import { KeyAuthority } from './core/key-authority.js';
import { createLogger, setGlobalLogLevel } from './core/logger.js';
import { StoredRevocationLedger } from './core/revocation.js';
import type { Clock, RevocationStorage } from './core/types.js';
import { MemoryRevocationStorage } from './storage/memory.js';
import { SqliteRevocationStorage } from './storage/sqlite.js';
import { LicenseHttpServer } from './transport/http-server.js';
import type { ServerSettings } from './config.js';

export interface LicenseService {
  authority: KeyAuthority;
  issuer: Issuer;
  ledger: StoredRevocationLedger;
  server: LicenseHttpServer;
  /** Stop the HTTP server and release storage */
  close(): Promise<void>;
}

export function createLicenseService(settings: ServerSettings, opts: { clock?: Clock } = {}): LicenseService {
  const logger = createLogger('trialgate');
  setGlobalLogLevel(settings.logLevel);

  let authority: KeyAuthority;
  if (settings.signingKey) {
    authority = KeyAuthority.fromPrivateKey(settings.signingKey);
  } else {
    authority = KeyAuthority.generate();
    logger.warn('No signing key configured; generated an ephemeral key. Licenses will not verify after restart.', {
      publicKey: authority.publicKeyHex(),
    });
  }

  let sqlite: SqliteRevocationStorage | undefined;
  let storage: RevocationStorage;
  if (settings.dbPath) {
    sqlite = new SqliteRevocationStorage(settings.dbPath);
    storage = sqlite;
  } else {
    storage = new MemoryRevocationStorage();
  }

  const issuer = new Issuer(authority, { clock: opts.clock, defaultTtlSeconds: settings.ttlSeconds });
  const ledger = new StoredRevocationLedger({ storage, clock: opts.clock });
  const server = new LicenseHttpServer(
    { host: settings.host, port: settings.port, basePath: '', adminToken: settings.adminToken },
    { authority, issuer, ledger },
  );

  return {
    authority,
    issuer,
    ledger,
    server,
    async close() {
      await server.stop();
      sqlite?.close();
    },
  };
}
