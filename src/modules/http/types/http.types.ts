/**
 * HTTP Types
 * Contract between the request executor and the pluggable transport
 */

import type { LeanvoxError } from '@/modules/errors';

export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'PATCH' | 'DELETE';

export type QueryParams = Record<string, string | number | boolean | undefined>;

/** Lower-cased header names */
export type HttpHeaders = Record<string, string>;

export type FormPart =
  | { name: string; value: string }
  | { name: string; filename: string; content: Uint8Array; contentType?: string };

export interface TransportRequest {
  method: HttpMethod;
  /** Path relative to the base URL, or an absolute URL */
  url: string;
  headers: HttpHeaders;
  json?: unknown;
  formParts?: FormPart[];
  params?: QueryParams;
  timeoutMs: number;
}

export interface TransportResponse {
  status: number;
  headers: HttpHeaders;
  body: Uint8Array;
}

export interface TransportStreamResponse {
  status: number;
  headers: HttpHeaders;
  body: AsyncIterable<Uint8Array>;
  /** Free the underlying connection; safe to call more than once */
  release(): void;
}

/**
 * Anything able to send one HTTP request. Implementations reject with the
 * underlying error on transport failure and resolve for every status code.
 */
export interface HttpTransport {
  request(request: TransportRequest): Promise<TransportResponse>;
  stream(request: TransportRequest): Promise<TransportStreamResponse>;
  close(): void;
}

export interface RequestOptions {
  json?: unknown;
  formParts?: FormPart[];
  params?: QueryParams;
  /** Per-call override of the client timeout */
  timeoutMs?: number;
}

export interface StreamRequestOptions {
  json?: unknown;
}

export type AttemptOutcome =
  | { type: 'response'; status: number; headers: HttpHeaders; body?: Uint8Array }
  | { type: 'transport-error'; error: unknown };

export type RetryDecision =
  | { action: 'retry'; delayMs: number }
  | { action: 'fail'; error: LeanvoxError };

export interface RetryContext {
  attempt: number; // 0-based
  maxRetries: number;
  outcome: AttemptOutcome;
}
