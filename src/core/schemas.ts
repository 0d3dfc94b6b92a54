/**
 * JSON schemas for everything trialgate reads from outside the process:
 * token bytes, HTTP bodies and the offline cache file.
 */

import AjvModule, { type JSONSchemaType, type ValidateFunction } from 'ajv';

export const Ajv = AjvModule.default;

export const ajv = new Ajv({ strict: false, allErrors: true });

/** Human-readable error text for the last run of `validate` */
export function describeErrors(validate: Pick<ValidateFunction, 'errors'>): string {
  return ajv.errorsText(validate.errors, { dataVar: 'value' });
}

// ── License Token (wire form) ──

/** Field names are frozen: they are part of the signed bytes. */
export interface TokenWire {
  user_id: string;
  issued_at: number;
  expires_at: number;
}

const timestamp = { type: 'integer', minimum: 0, maximum: Number.MAX_SAFE_INTEGER } as const;

export const tokenWireSchema: JSONSchemaType<TokenWire> = {
  type: 'object',
  properties: {
    user_id: { type: 'string', minLength: 1 },
    issued_at: timestamp,
    expires_at: timestamp,
  },
  required: ['user_id', 'issued_at', 'expires_at'],
  additionalProperties: false,
};

export const validateTokenWire = ajv.compile(tokenWireSchema);

// ── HTTP Bodies ──

export interface UserRequestBody {
  user_id: string;
  ttl_seconds?: number | null;
}

export const userRequestSchema: JSONSchemaType<UserRequestBody> = {
  type: 'object',
  properties: {
    user_id: { type: 'string', minLength: 1, maxLength: 256 },
    ttl_seconds: { type: 'integer', minimum: 1, nullable: true },
  },
  required: ['user_id'],
  additionalProperties: false,
};

export const validateUserRequest = ajv.compile(userRequestSchema);

export interface IssueResponseBody {
  token: string;
  signature: string;
  expires_at: number;
  message: string;
}

export const validateIssueResponse = ajv.compile<IssueResponseBody>({
  type: 'object',
  properties: {
    token: { type: 'string' },
    signature: { type: 'string' },
    expires_at: { type: 'integer' },
    message: { type: 'string' },
  },
  required: ['token', 'signature', 'expires_at', 'message'],
});

export interface CheckResponseBody {
  revoked: boolean;
  message: string;
}

export const validateCheckResponse = ajv.compile<CheckResponseBody>({
  type: 'object',
  properties: {
    revoked: { type: 'boolean' },
    message: { type: 'string' },
  },
  required: ['revoked', 'message'],
});

export interface RevokeResponseBody {
  ok: boolean;
  changed: boolean;
  message: string;
}

export const validateRevokeResponse = ajv.compile<RevokeResponseBody>({
  type: 'object',
  properties: {
    ok: { type: 'boolean' },
    changed: { type: 'boolean' },
    message: { type: 'string' },
  },
  required: ['ok', 'changed', 'message'],
});

export interface PublicKeyResponseBody {
  public_key: string;
  format: string;
}

export const validatePublicKeyResponse = ajv.compile<PublicKeyResponseBody>({
  type: 'object',
  properties: {
    public_key: { type: 'string', pattern: '^[0-9a-f]{64}$' },
    format: { type: 'string' },
  },
  required: ['public_key', 'format'],
});

// ── Offline Cache File ──

export interface CacheFileEntry {
  lastKnownRevoked: boolean;
  checkedAt: number;
}

export interface CacheFile {
  version: 1;
  entries: Record<string, CacheFileEntry>;
}

export const validateCacheFile = ajv.compile<CacheFile>({
  type: 'object',
  properties: {
    version: { const: 1 },
    entries: {
      type: 'object',
      additionalProperties: {
        type: 'object',
        properties: {
          lastKnownRevoked: { type: 'boolean' },
          checkedAt: { type: 'integer', minimum: 0 },
        },
        required: ['lastKnownRevoked', 'checkedAt'],
      },
    },
  },
  required: ['version', 'entries'],
});
