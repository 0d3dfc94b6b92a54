#!/usr/bin/env node

import { Command } from 'commander';
import { loadVerifierConfig } from '../config.js';
import { errorMessage } from '../core/errors.js';
import { writeLicenseFiles } from '../storage/license-files.js';
import { LicenseClient } from '../transport/http-client.js';

const program = new Command();

program
  .name('trialgate-license')
  .description('Request a trial license and store it as trial.token / trial.signature')
  .version('0.1.0')
  .argument('[user-id]', 'Identity to license', 'demo-user')
  .option('-s, --server <url>', 'License server URL (default: TRIALGATE_SERVER_URL)')
  .option('-d, --dir <dir>', 'Directory for the license files (default: TRIALGATE_LICENSE_DIR)')
  .action(async (userId: string, options: { server?: string; dir?: string }) => {
    try {
      const settings = loadVerifierConfig();
      const client = new LicenseClient(options.server ?? settings.serverUrl);
      const dir = options.dir ?? settings.licenseDir;

      process.stdout.write(`Requesting license for: ${userId}\n`);
      const license = await client.issue(userId);
      await writeLicenseFiles(dir, license);

      process.stdout.write(`License files written to ${dir}\n`);
      process.stdout.write(`  expires: ${new Date(license.expiresAt * 1000).toISOString()}\n`);
    } catch (error) {
      process.stderr.write(`Failed to obtain license: ${errorMessage(error)}\n`);
      process.exit(1);
    }
  });

program.parseAsync(process.argv).catch((error: unknown) => {
  process.stderr.write(`${errorMessage(error)}\n`);
  process.exit(1);
});
