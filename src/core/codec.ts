/**
 * Token Codec — the frozen canonical byte form of a license token.
 *
 * Canonical form: RFC 8785 JSON of `{expires_at, issued_at, user_id}` as UTF-8.
 * The same bytes are signed at issuance and re-derived at verification, so
 * neither the field names nor the serialization may change.
 */

import { canonicalize } from './crypto.js';
import { LicenseError } from './errors.js';
import { describeErrors, validateTokenWire, type TokenWire } from './schemas.js';
import type { LicenseToken } from './types.js';

const encoder = new TextEncoder();
const decoder = new TextDecoder('utf-8', { fatal: true });

function toWire(token: LicenseToken): TokenWire {
  return {
    user_id: token.userId,
    issued_at: token.issuedAt,
    expires_at: token.expiresAt,
  };
}

function checkWindow(wire: TokenWire): void {
  if (wire.expires_at <= wire.issued_at) {
    throw new LicenseError(
      'MalformedToken',
      `expires_at (${wire.expires_at}) must be after issued_at (${wire.issued_at})`,
    );
  }
}

/** Canonical text of a token. Throws MalformedToken for tokens that break the model invariants. */
export function encodeTokenString(token: LicenseToken): string {
  const wire = toWire(token);
  if (!validateTokenWire(wire)) {
    throw new LicenseError('MalformedToken', `Invalid token: ${describeErrors(validateTokenWire)}`);
  }
  checkWindow(wire);
  return canonicalize(wire);
}

/** Canonical bytes of a token */
export function encodeToken(token: LicenseToken): Uint8Array {
  return encoder.encode(encodeTokenString(token));
}

/**
 * Decode canonical token bytes (or text). Anything encodeToken could not have
 * produced, including a non-canonical spelling of a valid token, throws MalformedToken.
 */
export function decodeToken(input: Uint8Array | string): LicenseToken {
  let text: string;
  if (typeof input === 'string') {
    text = input;
  } else {
    try {
      text = decoder.decode(input);
    } catch {
      throw new LicenseError('MalformedToken', 'Token is not valid UTF-8');
    }
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch {
    throw new LicenseError('MalformedToken', 'Token is not valid JSON');
  }

  if (!validateTokenWire(parsed)) {
    throw new LicenseError('MalformedToken', `Invalid token: ${describeErrors(validateTokenWire)}`);
  }
  checkWindow(parsed);

  if (canonicalize(parsed) !== text) {
    throw new LicenseError('MalformedToken', 'Token is not in canonical form');
  }

  return {
    userId: parsed.user_id,
    issuedAt: parsed.issued_at,
    expiresAt: parsed.expires_at,
  };
}
