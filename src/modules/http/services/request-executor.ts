/**
 * Request Executor
 * Sends one logical API call as a sequence of attempts with bounded retry
 */

import { LeanvoxError } from '@/modules/errors';
import { USER_AGENT } from '@/shared/config';
import { generateId, logger, sleep as defaultSleep, type SleepFn } from '@/shared/utils';
import { ByteStream } from '../utils/byte-stream';
import { decideRetry } from '../utils/retry-policy';
import type {
  AttemptOutcome,
  HttpHeaders,
  HttpMethod,
  HttpTransport,
  RequestOptions,
  StreamRequestOptions,
  TransportRequest,
} from '../types';

export interface RequestExecutorConfig {
  apiKey: string;
  transport: HttpTransport;
  timeoutMs: number;
  streamTimeoutMs: number;
  streamIdleTimeoutMs: number;
  maxRetries: number;
  sleep?: SleepFn;
}

/** Lazily yields the executor; throws when no API key is available */
export type ExecutorProvider = () => RequestExecutor;

type AttemptResult<T> = { ok: true; value: T } | { ok: false; outcome: AttemptOutcome };

/**
 * RequestExecutor - retry/backoff state machine shared by buffered and streamed calls
 */
export class RequestExecutor {
  private readonly sleep: SleepFn;
  private closed = false;

  constructor(private readonly config: RequestExecutorConfig) {
    if (!Number.isInteger(config.maxRetries) || config.maxRetries < 0) {
      throw new RangeError(`maxRetries must be a non-negative integer, got ${config.maxRetries}`);
    }
    this.sleep = config.sleep ?? defaultSleep;
  }

  /**
   * Buffered request. Resolves with the parsed JSON body ({} when empty).
   */
  async execute(method: HttpMethod, path: string, options: RequestOptions = {}): Promise<unknown> {
    if (options.json !== undefined && options.formParts !== undefined) {
      throw new TypeError('json and formParts cannot be sent on the same request');
    }

    const request = this.buildRequest(method, path, {
      json: options.json,
      formParts: options.formParts,
      params: options.params,
      timeoutMs: options.timeoutMs ?? this.config.timeoutMs,
    });

    const body = await this.runWithRetry(request, () => this.bufferedAttempt(request));

    return this.parseJson(body, method, path);
  }

  /**
   * GET an absolute URL (e.g. generated audio on the CDN) and return its bytes
   */
  async fetchBytes(url: string): Promise<Buffer> {
    const request = this.buildRequest('GET', url, { timeoutMs: this.config.timeoutMs }, false);

    const body = await this.runWithRetry(request, () => this.bufferedAttempt(request));

    return Buffer.from(body);
  }

  /**
   * Streamed request. Only the connect/header phase is retried; once the
   * ByteStream is returned, failures propagate to the consumer.
   */
  async openStream(
    method: HttpMethod,
    path: string,
    options: StreamRequestOptions = {}
  ): Promise<ByteStream> {
    const request = this.buildRequest(method, path, {
      json: options.json,
      timeoutMs: this.config.streamTimeoutMs,
    });

    return this.runWithRetry<ByteStream>(request, async () => {
      const response = await this.config.transport.stream(request);
      if (response.status < 400) {
        return { ok: true, value: new ByteStream(response, this.config.streamIdleTimeoutMs) };
      }

      // Error bodies are small: read them for classification, then free the socket
      const chunks: Uint8Array[] = [];
      try {
        for await (const chunk of response.body) {
          chunks.push(chunk);
        }
      } finally {
        response.release();
      }
      return {
        ok: false,
        outcome: {
          type: 'response',
          status: response.status,
          headers: response.headers,
          body: Buffer.concat(chunks),
        },
      };
    });
  }

  /**
   * Release the transport. Idempotent.
   */
  close(): void {
    if (this.closed) return;
    this.closed = true;
    this.config.transport.close();
  }

  private async runWithRetry<T>(
    request: TransportRequest,
    attemptFn: () => Promise<AttemptResult<T>>
  ): Promise<T> {
    const requestId = generateId();

    for (let attempt = 0; ; attempt++) {
      logger.debug('Sending request', { requestId, method: request.method, url: request.url, attempt });

      let outcome: AttemptOutcome;
      try {
        const result = await attemptFn();
        if (result.ok) {
          return result.value;
        }
        outcome = result.outcome;
      } catch (error) {
        outcome = { type: 'transport-error', error };
      }

      const decision = decideRetry({ attempt, maxRetries: this.config.maxRetries, outcome });
      if (decision.action === 'fail') {
        logger.debug('Request failed', {
          requestId,
          attempt,
          kind: decision.error.kind,
          statusCode: decision.error.statusCode,
        });
        throw decision.error;
      }

      logger.warn('Retrying request', {
        requestId,
        method: request.method,
        url: request.url,
        attempt,
        delayMs: decision.delayMs,
        reason:
          outcome.type === 'response'
            ? `HTTP ${outcome.status}`
            : outcome.error instanceof Error
              ? outcome.error.message
              : String(outcome.error),
      });
      await this.sleep(decision.delayMs);
    }
  }

  private async bufferedAttempt(request: TransportRequest): Promise<AttemptResult<Uint8Array>> {
    const response = await this.config.transport.request(request);
    if (response.status < 400) {
      return { ok: true, value: response.body };
    }
    return {
      ok: false,
      outcome: { type: 'response', status: response.status, headers: response.headers, body: response.body },
    };
  }

  private buildRequest(
    method: HttpMethod,
    url: string,
    parts: Omit<TransportRequest, 'method' | 'url' | 'headers'>,
    authenticated = true
  ): TransportRequest {
    const headers: HttpHeaders = { 'user-agent': USER_AGENT };
    if (authenticated) {
      headers.authorization = `Bearer ${this.config.apiKey}`;
    }
    if (parts.json !== undefined) {
      headers['content-type'] = 'application/json';
    }

    const request: TransportRequest = { method, url, headers, timeoutMs: parts.timeoutMs };
    if (parts.json !== undefined) request.json = parts.json;
    if (parts.formParts !== undefined) request.formParts = parts.formParts;
    if (parts.params !== undefined) request.params = parts.params;
    return request;
  }

  private parseJson(body: Uint8Array, method: HttpMethod, path: string): unknown {
    if (body.length === 0) {
      return {};
    }
    const text = Buffer.from(body).toString('utf8');
    if (text.trim() === '') {
      return {};
    }
    try {
      return JSON.parse(text);
    } catch (error) {
      throw new LeanvoxError(`Invalid JSON in response to ${method} ${path}`, {
        code: 'invalid_response',
        statusCode: 200,
        cause: error,
      });
    }
  }
}
