/**
 * trialgate Core Types
 * Single source of truth for shared types and interfaces.
 */

// ── Time ──

/** Source of the current time in integer seconds since the Unix epoch */
export type Clock = () => number;

export const SECONDS_PER_DAY = 86_400;

// ── Keys ──

/** Ed25519 keypair. `privateKey` is the 32-byte seed. */
export interface KeyPair {
  privateKey: Uint8Array;
  publicKey: Uint8Array;
}

// ── License Token ──

/** The unsigned entitlement record. Timestamps are integer epoch seconds. */
export interface LicenseToken {
  userId: string;
  issuedAt: number;
  expiresAt: number;
}

/** A token plus the 64-byte Ed25519 signature over its canonical encoding */
export interface SignedLicense {
  token: LicenseToken;
  signature: Uint8Array;
}

/** Wire form of a signed license: canonical token text and hex signature */
export interface EncodedLicense {
  token: string;
  signature: string;
}

// ── Revocation ──

export interface RevocationRecord {
  userId: string;
  revoked: boolean;
  /** Epoch seconds of the first revocation */
  revokedAt?: number;
}

/** Outcome of a revoke call; `changed` is false when the user was already revoked */
export interface RevokeOutcome {
  record: RevocationRecord;
  changed: boolean;
}

/**
 * Online revocation lookup used by the verifier. Implementations must honour
 * the abort signal, which fires when the verifier's deadline passes.
 */
export type RevocationQuery = (userId: string, signal: AbortSignal) => Promise<boolean>;

// ── Offline Cache ──

export interface OfflineCacheEntry {
  userId: string;
  lastKnownRevoked: boolean;
  /** Epoch seconds of the online check that produced this entry */
  checkedAt: number;
}

// ── Verification ──

export type DenialReason =
  | 'SignatureMismatch'
  | 'MalformedToken'
  | 'Expired'
  | 'Revoked'
  | 'Unreachable';

/**
 * How the revocation status of a valid license was established.
 * Only 'online' is a confirmed result.
 */
export type Confirmation = 'online' | 'cached' | 'unconfirmed';

/** What to do when the ledger is unreachable and no usable cache entry exists */
export type OfflinePolicy = 'fail-open' | 'fail-closed';

export interface ValidLicense {
  valid: true;
  token: LicenseToken;
  daysRemaining: number;
  confirmation: Confirmation;
  /** For 'cached': when the cached status was obtained online */
  checkedAt?: number;
}

export interface InvalidLicense {
  valid: false;
  reason: DenialReason;
  message: string;
  /** Present once the signature has been verified */
  token?: LicenseToken;
}

export type VerificationResult = ValidLicense | InvalidLicense;

// ── Storage ──

/** Persistence behind the revocation ledger. Implementations need not lock. */
export interface RevocationStorage {
  getRevocation(userId: string): Promise<RevocationRecord | null>;
  saveRevocation(record: RevocationRecord): Promise<void>;
  listRevocations(): Promise<RevocationRecord[]>;
}
