/**
 * License artifacts on the verifying side: `trial.token` holds the canonical
 * token bytes and `trial.signature` the hex signature. Both are written and
 * read back byte-for-byte; any change must fail signature verification, so
 * nothing here trims or normalizes.
 */

import { mkdir, readFile, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { LicenseError } from '../core/errors.js';
import type { EncodedLicense } from '../core/types.js';

export const TOKEN_FILE = 'trial.token';
export const SIGNATURE_FILE = 'trial.signature';

export interface StoredLicense {
  token: Uint8Array;
  signature: string;
}

export async function writeLicenseFiles(dir: string, license: EncodedLicense): Promise<void> {
  await mkdir(dir, { recursive: true });
  await writeFile(join(dir, TOKEN_FILE), license.token, 'utf-8');
  await writeFile(join(dir, SIGNATURE_FILE), license.signature, 'utf-8');
}

export async function readLicenseFiles(dir: string): Promise<StoredLicense> {
  const token = await readArtifact(dir, TOKEN_FILE);
  const signature = await readArtifact(dir, SIGNATURE_FILE);
  return { token, signature: Buffer.from(signature).toString('utf-8') };
}

async function readArtifact(dir: string, name: string): Promise<Uint8Array> {
  try {
    return new Uint8Array(await readFile(join(dir, name)));
  } catch (err) {
    if (err instanceof Error && 'code' in err && err.code === 'ENOENT') {
      throw new LicenseError('MalformedToken', `${name} not found in ${dir}`, { cause: err });
    }
    throw err;
  }
}
