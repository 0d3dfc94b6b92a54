/**
 * Key Authority — owns the issuing Ed25519 key for the life of the process.
 * The seed is held in a private field and has no accessor; callers get
 * signatures and the public key only.
 */

import {
  PRIVATE_KEY_BYTES,
  derivePublicKey,
  fromHex,
  generateKeypair,
  sign,
  toHex,
} from './crypto.js';
import { LicenseError } from './errors.js';

export class KeyAuthority {
  readonly #privateKey: Uint8Array;
  readonly #publicKey: Uint8Array;

  private constructor(privateKey: Uint8Array, publicKey: Uint8Array) {
    this.#privateKey = privateKey;
    this.#publicKey = publicKey;
  }

  /** Fresh authority from the platform CSPRNG. Entropy failures propagate. */
  static generate(): KeyAuthority {
    const { privateKey, publicKey } = generateKeypair();
    return new KeyAuthority(privateKey, publicKey);
  }

  /** Load a persisted 32-byte seed, raw or hex-encoded */
  static fromPrivateKey(seed: Uint8Array | string): KeyAuthority {
    const bytes = typeof seed === 'string' ? fromHex(seed.trim(), PRIVATE_KEY_BYTES) : seed;
    if (!bytes || bytes.length !== PRIVATE_KEY_BYTES) {
      throw new LicenseError('InvalidRequest', `Signing key must be ${PRIVATE_KEY_BYTES} bytes (${PRIVATE_KEY_BYTES * 2} hex chars)`);
    }
    const copy = Uint8Array.from(bytes);
    return new KeyAuthority(copy, derivePublicKey(copy));
  }

  publicKey(): Uint8Array {
    return Uint8Array.from(this.#publicKey);
  }

  publicKeyHex(): string {
    return toHex(this.#publicKey);
  }

  sign(message: Uint8Array): Uint8Array {
    return sign(this.#privateKey, message);
  }

  /** Only for writing the seed to an operator-owned key file. */
  exportPrivateKeyHex(): string {
    return toHex(this.#privateKey);
  }

  toJSON(): { publicKey: string } {
    return { publicKey: this.publicKeyHex() };
  }
}
