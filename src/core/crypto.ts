/**
 * Cryptographic utilities for trialgate.
 * Uses @noble/ed25519 for signing and @noble/hashes for SHA-512 and hex.
 */

import * as ed from '@noble/ed25519';
import { sha512 } from '@noble/hashes/sha2.js';
import { bytesToHex, hexToBytes } from '@noble/hashes/utils.js';
import canonicalizeJson from 'canonicalize';
import type { KeyPair } from './types.js';

// ed25519 v2 requires setting the sha512 hash
ed.etc.sha512Sync = (...m: Uint8Array[]) => {
  const h = sha512.create();
  for (const msg of m) h.update(msg);
  return h.digest();
};

export const PUBLIC_KEY_BYTES = 32;
export const PRIVATE_KEY_BYTES = 32;
export const SIGNATURE_BYTES = 64;

/** Lowercase hex encoding */
export function toHex(bytes: Uint8Array): string {
  return bytesToHex(bytes);
}

/**
 * Strict hex decoding. Returns null for odd length, non-hex characters,
 * or a length other than `expectedBytes` when given.
 */
export function fromHex(hex: string, expectedBytes?: number): Uint8Array | null {
  if (!/^(?:[0-9a-fA-F]{2})*$/.test(hex)) return null;
  const bytes = hexToBytes(hex);
  if (expectedBytes !== undefined && bytes.length !== expectedBytes) return null;
  return bytes;
}

/** Generate an Ed25519 keypair from the platform CSPRNG */
export function generateKeypair(): KeyPair {
  const privateKey = ed.utils.randomPrivateKey();
  return { privateKey, publicKey: ed.getPublicKey(privateKey) };
}

/** Derive the public key for a 32-byte seed */
export function derivePublicKey(privateKey: Uint8Array): Uint8Array {
  return ed.getPublicKey(privateKey);
}

/** Sign a message with Ed25519 */
export function sign(privateKey: Uint8Array, message: Uint8Array): Uint8Array {
  return ed.sign(message, privateKey);
}

/** Verify an Ed25519 signature; malformed keys or signatures verify as false */
export function verify(publicKey: Uint8Array, message: Uint8Array, signature: Uint8Array): boolean {
  if (publicKey.length !== PUBLIC_KEY_BYTES || signature.length !== SIGNATURE_BYTES) {
    return false;
  }
  try {
    return ed.verify(signature, message, publicKey);
  } catch {
    return false;
  }
}

/** Canonical JSON (RFC 8785) */
export function canonicalize(obj: unknown): string {
  const result = canonicalizeJson(obj);
  if (result === undefined) {
    throw new Error('Failed to canonicalize object');
  }
  return result;
}

