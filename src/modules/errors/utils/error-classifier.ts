/**
 * Leanvox Error Classifier
 * Maps failed API responses and transport failures onto retry decisions and typed errors
 */

import { errorConfig } from '../config';
import {
  AuthenticationError,
  InsufficientBalanceError,
  InvalidRequestError,
  LeanvoxError,
  NotFoundError,
  RateLimitError,
  ServerError,
} from '../leanvox-error';
import type {
  ClassificationResult,
  ClassifiedTransportFailure,
  ErrorDetails,
  LeanvoxErrorOptions,
} from '../types';

const retryableStatuses: ReadonlySet<number> = new Set(errorConfig.retryableStatusCodes);

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function toNumber(value: unknown): number {
  if (typeof value === 'number' && Number.isFinite(value)) return value;
  if (typeof value === 'string' && value.trim() !== '') {
    const parsed = Number(value);
    return Number.isFinite(parsed) ? parsed : 0;
  }
  return 0;
}

/**
 * Check whether a status may be retried
 */
export function isRetryableStatus(status: number): boolean {
  return retryableStatuses.has(status);
}

/**
 * Parse the body of a failed response. Never throws: an absent or
 * unparseable body yields the synthesized "API error <status>" details.
 */
export function parseErrorBody(
  status: number,
  raw?: Uint8Array | string
): { details: ErrorDetails; body: Record<string, unknown> } {
  const fallback: ErrorDetails = {
    message: errorConfig.fallbackMessage(status),
    code: errorConfig.fallbackCode,
    fields: {},
  };

  const text = typeof raw === 'string' ? raw : raw ? Buffer.from(raw).toString('utf8') : '';
  if (text.trim() === '') {
    return { details: fallback, body: {} };
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch {
    // Plain-text error pages (proxies, load balancers) keep the raw text on the body
    return { details: fallback, body: { raw: text } };
  }

  if (!isRecord(parsed)) {
    return { details: fallback, body: { raw: text } };
  }

  const errorObject = isRecord(parsed.error) ? parsed.error : parsed;
  const message =
    typeof errorObject.message === 'string' && errorObject.message !== ''
      ? errorObject.message
      : fallback.message;
  const code =
    typeof errorObject.code === 'string' && errorObject.code !== ''
      ? errorObject.code
      : fallback.code;

  return { details: { message, code, fields: errorObject }, body: parsed };
}

/**
 * Build the typed error for a failed response, whatever its status
 */
export function createApiError(status: number, raw?: Uint8Array | string): LeanvoxError {
  const { details, body } = parseErrorBody(status, raw);
  const options: LeanvoxErrorOptions = { code: details.code, statusCode: status, body };

  switch (status) {
    case 400:
      return new InvalidRequestError(details.message, options);
    case 401:
      return new AuthenticationError(details.message, options);
    case 402:
      return new InsufficientBalanceError(details.message, {
        ...options,
        balanceCents: toNumber(details.fields.balance_cents),
      });
    case 404:
      return new NotFoundError(details.message, options);
    case 429:
      return new RateLimitError(details.message, {
        ...options,
        retryAfter: toNumber(details.fields.retry_after),
      });
    case 500:
      return new ServerError(details.message, options);
    default:
      return new LeanvoxError(details.message, options);
  }
}

/**
 * Classify a failed response (status >= 400) as retryable or terminal
 */
export function classifyResponse(status: number, raw?: Uint8Array | string): ClassificationResult {
  if (isRetryableStatus(status)) {
    return { retryable: true };
  }
  return { retryable: false, error: createApiError(status, raw) };
}

/**
 * Classify a transport-level failure (no HTTP response received)
 */
export function classifyTransportFailure(error: unknown): ClassifiedTransportFailure {
  if (!(error instanceof Error)) {
    return { reason: 'unknown', retryable: false, message: String(error) };
  }

  const code = 'code' in error && typeof error.code === 'string' ? error.code.toUpperCase() : '';
  const lowerMessage = error.message.toLowerCase();

  // Timeout errors
  if (
    errorConfig.timeoutErrorCodes.some((c) => c === code) ||
    lowerMessage.includes('timeout') ||
    lowerMessage.includes('timed out')
  ) {
    return { reason: 'timeout', retryable: true, message: error.message };
  }

  // Connection errors
  if (
    errorConfig.connectionErrorCodes.some((c) => c === code) ||
    lowerMessage.includes('econnrefused') ||
    lowerMessage.includes('econnreset') ||
    lowerMessage.includes('enotfound') ||
    lowerMessage.includes('socket hang up') ||
    lowerMessage.includes('network error')
  ) {
    return { reason: 'connection', retryable: true, message: error.message };
  }

  return { reason: 'unknown', retryable: false, message: error.message };
}
