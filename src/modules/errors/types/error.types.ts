/**
 * Error Types
 */

import type { LeanvoxError } from '../leanvox-error';

/**
 * Kind tag carried by every error the SDK raises, so callers can branch
 * without string matching.
 */
export enum LeanvoxErrorKind {
  INVALID_CREDENTIAL = 'invalid_credential',
  MISSING_CREDENTIAL = 'missing_credential',
  INVALID_REQUEST = 'invalid_request',
  AUTHENTICATION = 'authentication',
  INSUFFICIENT_BALANCE = 'insufficient_balance',
  NOT_FOUND = 'not_found',
  RATE_LIMIT = 'rate_limit',
  SERVER = 'server',
  CONNECTION = 'connection',
  GENERIC = 'generic',
}

export interface LeanvoxErrorOptions {
  code?: string;
  statusCode?: number; // 0 when no HTTP response was received
  body?: Record<string, unknown>;
  cause?: unknown;
}

/**
 * `error` object of a failed API response, after normalization
 */
export interface ErrorDetails {
  message: string;
  code: string;
  fields: Record<string, unknown>; // kind-specific extras (balance_cents, retry_after, ...)
}

export type ClassificationResult =
  | { retryable: true }
  | { retryable: false; error: LeanvoxError };

export type TransportFailureReason = 'timeout' | 'connection' | 'unknown';

export interface ClassifiedTransportFailure {
  reason: TransportFailureReason;
  retryable: boolean;
  message: string;
}
