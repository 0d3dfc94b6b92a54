#!/usr/bin/env node

import { writeFile } from 'node:fs/promises';
import { Command } from 'commander';
import { createLicenseService } from '../app.js';
import { loadServerConfig } from '../config.js';
import { errorMessage } from '../core/errors.js';
import { KeyAuthority } from '../core/key-authority.js';
import { createLogger } from '../core/logger.js';

const logger = createLogger('trialgate-server');
const program = new Command();

program
  .name('trialgate-server')
  .description('Trial license authority: issues, checks and revokes signed licenses')
  .version('0.1.0');

program
  .command('serve', { isDefault: true })
  .description('Start the license server (configured through TRIALGATE_* variables)')
  .option('-p, --port <port>', 'Override TRIALGATE_PORT')
  .action(async (options: { port?: string }) => {
    try {
      const env = options.port ? { ...process.env, TRIALGATE_PORT: options.port } : process.env;
      const service = createLicenseService(loadServerConfig(env));
      await service.server.start();
      process.stdout.write(`Public key (embed in the verifying application): ${service.authority.publicKeyHex()}\n`);

      const shutdown = (signal: string) => {
        logger.info('Shutting down', { signal });
        service.close().then(
          () => process.exit(0),
          (err: unknown) => {
            logger.error('Shutdown failed', { error: errorMessage(err) });
            process.exit(1);
          },
        );
      };
      process.once('SIGINT', shutdown);
      process.once('SIGTERM', shutdown);
    } catch (error) {
      process.stderr.write(`Failed to start server: ${errorMessage(error)}\n`);
      process.exit(1);
    }
  });

program
  .command('keygen')
  .description('Generate a signing key and print its public key')
  .requiredOption('-o, --output <file>', 'File to write the hex signing key to (mode 0600)')
  .action(async (options: { output: string }) => {
    try {
      const authority = KeyAuthority.generate();
      await writeFile(options.output, authority.exportPrivateKeyHex() + '\n', { mode: 0o600, flag: 'wx' });
      process.stdout.write(`Signing key written to ${options.output}\n`);
      process.stdout.write(`Public key: ${authority.publicKeyHex()}\n`);
    } catch (error) {
      process.stderr.write(`Failed to generate key: ${errorMessage(error)}\n`);
      process.exit(1);
    }
  });

program.parseAsync(process.argv).catch((error: unknown) => {
  process.stderr.write(`${errorMessage(error)}\n`);
  process.exit(1);
});
