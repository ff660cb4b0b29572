/**
 * Leanvox Error Hierarchy
 *
 * Every failure surfaced by the SDK is a LeanvoxError carrying a kind tag,
 * a machine code, the originating HTTP status (0 without a response) and the
 * parsed response body.
 */

import { LeanvoxErrorKind, type LeanvoxErrorOptions } from './types';

export class LeanvoxError extends Error {
  readonly kind: LeanvoxErrorKind = LeanvoxErrorKind.GENERIC;
  readonly code: string;
  readonly statusCode: number;
  readonly body: Record<string, unknown>;

  constructor(message: string, options: LeanvoxErrorOptions = {}) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = new.target.name;
    this.code = options.code ?? 'unknown';
    this.statusCode = options.statusCode ?? 0;
    this.body = options.body ?? {};
  }
}

/** 400, client-side validation, or a failed async job */
export class InvalidRequestError extends LeanvoxError {
  override readonly kind: LeanvoxErrorKind = LeanvoxErrorKind.INVALID_REQUEST;
}

/** Non-MP3 format passed to stream() */
export class StreamingFormatError extends InvalidRequestError {}

/** 401 */
export class AuthenticationError extends LeanvoxError {
  override readonly kind: LeanvoxErrorKind = LeanvoxErrorKind.AUTHENTICATION;
}

/** API key is empty or lacks a recognized prefix */
export class InvalidCredentialError extends AuthenticationError {
  override readonly kind: LeanvoxErrorKind = LeanvoxErrorKind.INVALID_CREDENTIAL;
}

/** No API key could be resolved by the time a request was made */
export class MissingCredentialError extends AuthenticationError {
  override readonly kind: LeanvoxErrorKind = LeanvoxErrorKind.MISSING_CREDENTIAL;
}

/** 402 */
export class InsufficientBalanceError extends LeanvoxError {
  override readonly kind: LeanvoxErrorKind = LeanvoxErrorKind.INSUFFICIENT_BALANCE;
  readonly balanceCents: number;

  constructor(message: string, options: LeanvoxErrorOptions & { balanceCents?: number } = {}) {
    super(message, options);
    this.balanceCents = options.balanceCents ?? 0;
  }
}

/** 404 */
export class NotFoundError extends LeanvoxError {
  override readonly kind: LeanvoxErrorKind = LeanvoxErrorKind.NOT_FOUND;
}

/** 429 once retries are exhausted */
export class RateLimitError extends LeanvoxError {
  override readonly kind: LeanvoxErrorKind = LeanvoxErrorKind.RATE_LIMIT;
  readonly retryAfter: number; // seconds, as reported in the error body

  constructor(message: string, options: LeanvoxErrorOptions & { retryAfter?: number } = {}) {
    super(message, options);
    this.retryAfter = options.retryAfter ?? 0;
  }
}

/** 500 once retries are exhausted */
export class ServerError extends LeanvoxError {
  override readonly kind: LeanvoxErrorKind = LeanvoxErrorKind.SERVER;
}

/** Transport failure (refused, reset, DNS, timeout) once retries are exhausted */
export class ConnectionError extends LeanvoxError {
  override readonly kind: LeanvoxErrorKind = LeanvoxErrorKind.CONNECTION;

  constructor(message: string, options: LeanvoxErrorOptions = {}) {
    super(message, { code: 'connection_error', ...options, statusCode: 0 });
  }
}

/**
 * Type guard for SDK errors
 */
export function isLeanvoxError(error: unknown): error is LeanvoxError {
  return error instanceof LeanvoxError;
}
