/**
 * Transport types for the license server HTTP API.
 */

import type { LicenseErrorKind } from '../core/errors.js';

/** Server configuration */
export interface ServerConfig {
  port: number;
  host: string;
  /** Prefix for every route, e.g. '' or '/licensing' */
  basePath: string;
  corsOrigins?: string[];
  /** When set, revoking and custom ttls need `Authorization: Bearer <adminToken>` */
  adminToken?: string;
}

/** Error body returned for every non-2xx response */
export interface ErrorBody {
  error: {
    code: number;
    kind: LicenseErrorKind | 'NotFound' | 'MethodNotAllowed' | 'Unauthorized' | 'UnsupportedMediaType' | 'Internal';
    message: string;
  };
}

export const API_ROUTES = {
  issue: '/api/trial/issue',
  check: '/api/trial/check',
  revoke: '/api/trial/revoke',
  publicKey: '/api/public-key',
  health: '/health',
  metrics: '/metrics',
} as const;
