/**
 * Error taxonomy shared by issuance, decoding, the ledger and transport.
 */

export type LicenseErrorKind =
  | 'InvalidRequest'
  | 'MalformedToken'
  | 'SignatureMismatch'
  | 'Expired'
  | 'Revoked'
  | 'Unreachable';

export class LicenseError extends Error {
  readonly kind: LicenseErrorKind;

  constructor(kind: LicenseErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'LicenseError';
    this.kind = kind;
  }
}

/** Narrow an unknown thrown value to a LicenseError of the given kind. */
export function isLicenseError(err: unknown, kind?: LicenseErrorKind): err is LicenseError {
  if (!(err instanceof LicenseError)) return false;
  return kind === undefined || err.kind === kind;
}

/** Message of any thrown value, for logging. */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
