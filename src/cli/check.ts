#!/usr/bin/env node

import { Command } from 'commander';
import { loadVerifierConfig } from '../config.js';
import { errorMessage } from '../core/errors.js';
import { FileOfflineCache } from '../core/offline-cache.js';
import { Verifier, describeResult } from '../core/verifier.js';
import { readLicenseFiles } from '../storage/license-files.js';
import { LicenseClient } from '../transport/http-client.js';

const program = new Command();

program
  .name('trialgate-check')
  .description('Verify the stored trial license against the pinned public key')
  .version('0.1.0')
  .option('-k, --public-key <hex>', 'Pinned authority public key (default: TRIALGATE_PUBLIC_KEY)')
  .option('-s, --server <url>', 'License server URL (default: TRIALGATE_SERVER_URL)')
  .option('-d, --dir <dir>', 'Directory holding trial.token and trial.signature')
  .option('--offline', 'Skip the online revocation check')
  .action(async (options: { publicKey?: string; server?: string; dir?: string; offline?: boolean }) => {
    try {
      const settings = loadVerifierConfig();
      const publicKey = options.publicKey ?? settings.publicKey;
      if (!publicKey) {
        process.stderr.write('No trusted public key: pass --public-key or set TRIALGATE_PUBLIC_KEY\n');
        process.exit(2);
      }

      const client = new LicenseClient(options.server ?? settings.serverUrl, {
        circuitBreaker: { failureThreshold: 1, resetTimeoutMs: 60_000 },
      });
      const verifier = new Verifier({
        trustedPublicKey: publicKey,
        revocationQuery: options.offline ? undefined : client.revocationQuery(),
        offlineCache: new FileOfflineCache(settings.cacheFile),
        queryTimeoutMs: settings.queryTimeoutMs,
        maxCacheAgeSeconds: settings.maxCacheAgeSeconds,
        offlinePolicy: settings.offlinePolicy,
        maxUnconfirmedSeconds: settings.maxUnconfirmedSeconds,
      });

      const stored = await readLicenseFiles(options.dir ?? settings.licenseDir);
      const result = await verifier.verifyEncoded(stored.token, stored.signature);
      if (result.valid) {
        process.stdout.write(`${describeResult(result)}\n`);
        return;
      }
      process.stderr.write(`${describeResult(result)}\n`);
      process.exit(1);
    } catch (error) {
      process.stderr.write(`License check failed: ${errorMessage(error)}\n`);
      process.exit(1);
    }
  });

program.parseAsync(process.argv).catch((error: unknown) => {
  process.stderr.write(`${errorMessage(error)}\n`);
  process.exit(1);
});
